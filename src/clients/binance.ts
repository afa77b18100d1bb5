import type { EventEmitter } from "node:events";
import { USDMClient, WebsocketClient } from "binance";
import { type Observable, fromEvent } from "rxjs";
import { z } from "zod";
import type { AgentConfig } from "../config";
import type { Candle, SymbolMeta, Timeframe } from "../types";
import { logger } from "../utils/logger";

export type BinanceSettings = AgentConfig["binance"];

export type BinanceClients = {
	rest: USDMClient;
	ws: WebsocketClient;
};

export type KlineRange = {
	limit?: number;
	startTime?: number;
	endTime?: number;
};

const filterSchema = z
	.object({
		filterType: z.string(),
		stepSize: z.coerce.number().optional(),
		tickSize: z.coerce.number().optional(),
		notional: z.coerce.number().optional(),
		minNotional: z.coerce.number().optional(),
	})
	.passthrough();

const symbolInfoSchema = z
	.object({
		symbol: z.string(),
		quoteAsset: z.string(),
		status: z.string(),
		filters: z.array(filterSchema).default([]),
	})
	.passthrough();

export function createBinanceClients(settings: BinanceSettings): BinanceClients {
	const rest = new USDMClient({
		api_key: settings.apiKey,
		api_secret: settings.apiSecret,
		beautifyResponses: true,
		testnet: settings.useTestnet,
	});

	const ws = new WebsocketClient({
		api_key: settings.apiKey,
		api_secret: settings.apiSecret,
		beautify: true,
		testnet: settings.useTestnet,
	});

	ws.on("reconnected", (data) => {
		logger.info({ wsKey: data?.wsKey }, "Binance WS reconnected");
	});

	ws.on("reconnecting", (data) => {
		logger.warn({ wsKey: data?.wsKey }, "Binance WS reconnecting");
	});

	ws.on("exception", (data) => {
		logger.error({ wsKey: data?.wsKey, error: data }, "Binance WS exception");
	});

	return { rest, ws };
}

/** Every beautified message the socket delivers, unparsed. */
export function wsMessages$(ws: WebsocketClient): Observable<unknown> {
	return fromEvent<unknown>(ws as unknown as EventEmitter, "formattedMessage");
}

function toSymbolMeta(info: z.infer<typeof symbolInfoSchema>): SymbolMeta {
	const find = (...types: string[]) =>
		info.filters.find((f) => types.includes(f.filterType));
	const notional = find("NOTIONAL", "MIN_NOTIONAL");
	return {
		symbol: info.symbol,
		quoteAsset: info.quoteAsset,
		status: info.status,
		stepSize: find("MARKET_LOT_SIZE")?.stepSize || find("LOT_SIZE")?.stepSize,
		tickSize: find("PRICE_FILTER")?.tickSize,
		minNotional: notional?.notional || notional?.minNotional,
	};
}

export async function fetchTradingSymbols(
	rest: USDMClient,
	quoteAsset: string,
): Promise<SymbolMeta[]> {
	const info = await rest.getExchangeInfo();
	const symbols = z.array(symbolInfoSchema).parse(info.symbols);

	return symbols
		.filter(
			(s) =>
				s.status === "TRADING" &&
				s.quoteAsset === quoteAsset &&
				!s.symbol.includes("_"),
		)
		.map(toSymbolMeta);
}

export async function fetchKlines(
	rest: USDMClient,
	symbol: string,
	timeframe: Timeframe,
	range: KlineRange,
	now: number = Date.now(),
): Promise<Candle[]> {
	const data = await rest.getKlines({ symbol, interval: timeframe, ...range });

	return data.map((kline) => ({
		symbol,
		timeframe,
		openTime: Number(kline[0]),
		open: Number(kline[1]),
		high: Number(kline[2]),
		low: Number(kline[3]),
		close: Number(kline[4]),
		volume: Number(kline[5]),
		closeTime: Number(kline[6]),
		closed: Number(kline[6]) < now,
	}));
}
