import { lastValueFrom, of } from "rxjs";
import { toArray } from "rxjs/operators";
import { parseOrderUpdate, venueCloses$ } from "../tradeMonitor";

function orderUpdate(clientOrderId: string, orderStatus: string, extra: Record<string, unknown> = {}) {
	return {
		eventType: "ORDER_TRADE_UPDATE",
		eventTime: 1_700_000_000_000,
		order: {
			symbol: "BTCUSDT",
			clientOrderId,
			orderSide: "SELL",
			orderStatus,
			averagePrice: "97.5",
			originalQuantity: "0.002",
			...extra,
		},
	};
}

describe("parseOrderUpdate", () => {
	it("should coerce numeric strings", () => {
		expect(parseOrderUpdate(orderUpdate("abc-sl", "FILLED"))?.order.averagePrice).toBe(97.5);
	});

	it("should ignore other events", () => {
		expect(parseOrderUpdate({ eventType: "ACCOUNT_UPDATE" })).toBeNull();
		expect(parseOrderUpdate("pong")).toBeNull();
	});
});

describe("venueCloses$", () => {
	it("should emit fills of protective orders only", async () => {
		const messages = of(
			orderUpdate("abc-sl", "FILLED", { orderFilledAccumulatedQuantity: "0.001" }),
			orderUpdate("abc-sl", "NEW"),
			orderUpdate("entry-1", "FILLED"),
			{ eventType: "kline" },
		);
		const events = await lastValueFrom(
			venueCloses$(messages, (id) => id === "abc-sl").pipe(toArray()),
		);
		expect(events).toEqual([
			{
				type: "venue_close",
				symbol: "BTCUSDT",
				price: 97.5,
				quantity: 0.001,
				at: 1_700_000_000_000,
			},
		]);
	});

	it("should fall back to the original quantity and the local clock", async () => {
		const { eventTime: _eventTime, ...withoutTime } = orderUpdate("abc-tp", "FILLED");
		const events = await lastValueFrom(
			venueCloses$(of(withoutTime), () => true, () => 42).pipe(toArray()),
		);
		expect(events).toEqual([
			{ type: "venue_close", symbol: "BTCUSDT", price: 97.5, quantity: 0.002, at: 42 },
		]);
	});
});
