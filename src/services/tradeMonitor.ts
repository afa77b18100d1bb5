import type { WebsocketClient } from "binance";
import type { Observable } from "rxjs";
import { filter, map, mergeMap, tap } from "rxjs/operators";
import { z } from "zod";
import { wsMessages$ } from "../clients/binance";
import type { VenueCloseEvent } from "../types";
import { logger } from "../utils/logger";
import type { BinanceExecutor } from "./orderService";

const orderUpdateSchema = z
	.object({
		eventType: z.literal("ORDER_TRADE_UPDATE"),
		eventTime: z.coerce.number().optional(),
		order: z
			.object({
				symbol: z.string(),
				clientOrderId: z.string(),
				orderSide: z.enum(["BUY", "SELL"]),
				orderStatus: z.string(),
				averagePrice: z.coerce.number(),
				originalQuantity: z.coerce.number(),
				orderFilledAccumulatedQuantity: z.coerce.number().optional(),
				realisedProfit: z.coerce.number().optional(),
			})
			.passthrough(),
	})
	.passthrough();

export type OrderUpdate = z.infer<typeof orderUpdateSchema>;

export function parseOrderUpdate(message: unknown): OrderUpdate | null {
	const parsed = orderUpdateSchema.safeParse(message);
	return parsed.success ? parsed.data : null;
}

/** Fills of our own protective orders, as venue-close events. */
export function venueCloses$(
	messages$: Observable<unknown>,
	isProtectiveOrder: (clientOrderId: string) => boolean,
	now: () => number = Date.now,
): Observable<VenueCloseEvent> {
	return messages$.pipe(
		map(parseOrderUpdate),
		filter((event): event is OrderUpdate => event !== null),
		filter(
			(event) =>
				event.order.orderStatus === "FILLED" &&
				isProtectiveOrder(event.order.clientOrderId),
		),
		map((event): VenueCloseEvent => {
			const { symbol, averagePrice, originalQuantity } = event.order;
			return {
				type: "venue_close",
				symbol,
				price: averagePrice,
				quantity: event.order.orderFilledAccumulatedQuantity || originalQuantity,
				at: event.eventTime ?? now(),
			};
		}),
	);
}

/** Listens on the user data stream; the sibling protective order is cancelled on each fill. */
export async function startTradeMonitor(
	ws: WebsocketClient,
	executor: BinanceExecutor,
): Promise<Observable<VenueCloseEvent>> {
	await ws.subscribeUsdFuturesUserDataStream();

	return venueCloses$(wsMessages$(ws), (id) => executor.isProtectiveOrder(id)).pipe(
		tap((event) =>
			logger.info(
				{ symbol: event.symbol, price: event.price, quantity: event.quantity },
				"Protective order filled",
			),
		),
		mergeMap(async (event) => {
			await executor.clearProtection(event.symbol);
			return event;
		}),
	);
}
