import type { WebsocketClient } from "binance";
import {
	type Observable,
	Subject,
	concat,
	defer,
	from,
	merge,
	of,
} from "rxjs";
import { catchError, concatMap, filter, finalize, map, share } from "rxjs/operators";
import { z } from "zod";
import { wsMessages$ } from "../clients/binance";
import type { KlineRange } from "../clients/binance";
import { timeframeSchema } from "../config";
import type { Candle, FeedEvent, Timeframe } from "../types";
import { logger } from "../utils/logger";

export type KlineFetcher = (
	symbol: string,
	timeframe: Timeframe,
	range: KlineRange,
) => Promise<Candle[]>;

export type MarketFeedOptions = {
	symbols: string[];
	timeframes: Timeframe[];
	/** Candles of history loaded per pair before live candles flow. */
	historyLimit: number;
	fetchKlines: KlineFetcher;
	/** Closed and unclosed candles as they arrive from the venue. */
	live$: Observable<Candle>;
};

const klineSchema = z
	.object({
		startTime: z.coerce.number(),
		closeTime: z.coerce.number().optional(),
		endTime: z.coerce.number().optional(),
		interval: z.string(),
		open: z.coerce.number(),
		high: z.coerce.number(),
		low: z.coerce.number(),
		close: z.coerce.number(),
		volume: z.coerce.number(),
		final: z.boolean().optional(),
		isFinal: z.boolean().optional(),
		isKlineClosed: z.boolean().optional(),
		isClosed: z.boolean().optional(),
		x: z.boolean().optional(),
	})
	.passthrough();

const klineEventSchema = z
	.object({
		symbol: z.string(),
		kline: klineSchema,
	})
	.passthrough();

type KlinePayload = z.infer<typeof klineSchema>;

function isFinalKline(kline: KlinePayload): boolean {
	return Boolean(
		kline.final ?? kline.isFinal ?? kline.isKlineClosed ?? kline.isClosed ?? kline.x,
	);
}

/** Parses a beautified kline message; anything else yields null. */
export function parseKlineMessage(message: unknown): Candle | null {
	const event = klineEventSchema.safeParse(message);
	if (!event.success) return null;
	const { kline, symbol } = event.data;
	const timeframe = timeframeSchema.safeParse(kline.interval);
	if (!timeframe.success) return null;

	const closeTime = kline.closeTime ?? kline.endTime;
	if (closeTime === undefined) return null;

	return {
		symbol: symbol.toUpperCase(),
		timeframe: timeframe.data,
		openTime: kline.startTime,
		closeTime,
		open: kline.open,
		high: kline.high,
		low: kline.low,
		close: kline.close,
		volume: kline.volume,
		closed: isFinalKline(kline),
	};
}

export const klineTopic = (symbol: string, timeframe: Timeframe) =>
	`${symbol.toLowerCase()}@kline_${timeframe}`;

/** Subscribes to every (symbol, timeframe) kline stream and emits parsed candles. */
export function binanceKlines$(
	ws: WebsocketClient,
	symbols: string[],
	timeframes: Timeframe[],
): Observable<Candle> {
	return defer(() => {
		const topics = symbols.flatMap((symbol) =>
			timeframes.map((timeframe) => klineTopic(symbol, timeframe)),
		);
		if (topics.length > 0) {
			ws.subscribe(topics, "usdm");
			logger.info({ topics }, "Subscribed to kline streams");
		}
		return wsMessages$(ws).pipe(
			map(parseKlineMessage),
			filter((candle): candle is Candle => candle !== null),
			filter((candle) =>
				topics.includes(klineTopic(candle.symbol, candle.timeframe)),
			),
		);
	}).pipe(share());
}

/** Rows per REST page when refilling a hole; Binance caps klines at 1500. */
export const BACKFILL_PAGE = 1_500;

/**
 * Closed candles covering `[startTime, endTime]` back to back, fetched page by
 * page. Null when the venue's answer leaves any part of the range uncovered.
 */
export async function fetchRange(
	fetchKlines: KlineFetcher,
	symbol: string,
	timeframe: Timeframe,
	startTime: number,
	endTime: number,
): Promise<Candle[] | null> {
	const candles: Candle[] = [];
	let cursor = startTime;
	while (cursor <= endTime) {
		const page = (
			await fetchKlines(symbol, timeframe, {
				startTime: cursor,
				endTime,
				limit: BACKFILL_PAGE,
			})
		)
			.filter((c) => c.closed && c.openTime >= cursor && c.closeTime <= endTime)
			.sort((a, b) => a.openTime - b.openTime);

		for (const candle of page) {
			if (candle.openTime !== cursor) return null;
			candles.push(candle);
			cursor = candle.closeTime + 1;
		}
		if (page.length === 0) return null;
	}
	return candles;
}

/**
 * History for one pair followed by its live closed candles. Candles already
 * seen are dropped; a hole between two candles is backfilled over REST, and
 * when the backfill fails or comes back short a `gap` event precedes the next
 * candle.
 */
function pairFeed(
	symbol: string,
	timeframe: Timeframe,
	options: MarketFeedOptions,
): Observable<FeedEvent> {
	return defer(() => {
		// Live candles wait here until history has been replayed.
		let pending: Candle[] | null = [];
		const handoff = new Subject<Candle>();
		const live = options.live$
			.pipe(
				filter(
					(c) => c.symbol === symbol && c.timeframe === timeframe && c.closed,
				),
			)
			.subscribe({
				next: (candle) => {
					if (pending) pending.push(candle);
					else handoff.next(candle);
				},
				error: (error) => handoff.error(error),
				complete: () => handoff.complete(),
			});

		const history$ = from(
			options.fetchKlines(symbol, timeframe, { limit: options.historyLimit }),
		).pipe(
			catchError((error) => {
				logger.error({ symbol, timeframe, error }, "Failed to load kline history");
				return of<Candle[]>([]);
			}),
			concatMap((candles) => from(candles.filter((c) => c.closed))),
		);

		const live$ = defer(() => {
			const buffered = pending ?? [];
			pending = null;
			return concat(from(buffered), handoff);
		});

		let lastCloseTime: number | undefined;

		const bridge = (candle: Candle): Observable<FeedEvent> => {
			const last = lastCloseTime;
			if (last !== undefined && candle.closeTime <= last) return of();
			lastCloseTime = candle.closeTime;

			const event: FeedEvent = { type: "candle", candle };
			if (last === undefined || candle.openTime <= last + 1) return of(event);

			const gap: FeedEvent = { type: "gap", symbol, timeframe, at: candle.openTime };
			const range = { startTime: last + 1, endTime: candle.openTime - 1 };
			return from(
				fetchRange(options.fetchKlines, symbol, timeframe, range.startTime, range.endTime),
			).pipe(
				map((candles): FeedEvent[] => {
					if (!candles) {
						logger.warn({ symbol, timeframe, ...range }, "Kline backfill incomplete");
						return [gap, event];
					}
					logger.info(
						{ symbol, timeframe, backfilled: candles.length },
						"Bridged kline gap",
					);
					return [
						...candles.map((c): FeedEvent => ({ type: "candle", candle: c })),
						event,
					];
				}),
				catchError((error) => {
					logger.warn({ symbol, timeframe, error }, "Kline backfill failed");
					return of([gap, event]);
				}),
				concatMap((events) => from(events)),
			);
		};

		return concat(history$, live$).pipe(
			concatMap(bridge),
			finalize(() => live.unsubscribe()),
		);
	});
}

/** Feed events for every configured (symbol, timeframe) pair. */
export function marketFeed(options: MarketFeedOptions): Observable<FeedEvent> {
	return merge(
		...options.symbols.flatMap((symbol) =>
			options.timeframes.map((timeframe) => pairFeed(symbol, timeframe, options)),
		),
	);
}
