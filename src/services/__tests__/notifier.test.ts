import type { AgentRecord, TradeOutcome } from "../../types";
import { formatRecord, notifyRecord } from "../notifier";

const outcome: TradeOutcome = {
	positionId: "p-1",
	symbol: "BTCUSDT",
	side: "BUY",
	kind: "final",
	quantity: 1,
	entryPrice: 100,
	exitPrice: 97,
	pnl: -3,
	positionPnl: -3,
	reason: "stop_loss",
	closedAt: 0,
};

describe("formatRecord", () => {
	it("should describe a closed trade", () => {
		expect(formatRecord({ type: "outcome", record: outcome })).toBe(
			"Trade closed BTCUSDT\nClose Long\nReason: stop_loss\nPrice: 97.0000\nQty: 1.000000\nPnL: -3.00",
		);
	});

	it("should title partial exits separately", () => {
		const text = formatRecord({
			type: "outcome",
			record: { ...outcome, side: "SELL", kind: "partial", reason: "partial_profit", pnl: 1.5 },
		});
		expect(text?.split("\n").slice(0, 2)).toEqual(["Partial profit BTCUSDT", "Close Short"]);
	});

	it("should describe stop moves", () => {
		const record: AgentRecord = {
			type: "transition",
			record: {
				symbol: "BTCUSDT",
				from: "OPEN",
				to: "OPEN",
				reason: "breakeven",
				at: 0,
				details: { from: 97, to: 100 },
			},
		};
		expect(formatRecord(record)).toBe("Breakeven BTCUSDT\nSL: 97.0000 -> 100.0000");
	});

	it("should stay quiet for decisions and routine transitions", () => {
		expect(
			formatRecord({
				type: "transition",
				record: { symbol: "BTCUSDT", from: "FLAT", to: "ENTERING", reason: "signal", at: 0 },
			}),
		).toBeNull();
		expect(
			formatRecord({
				type: "diagnostic",
				record: { symbol: "BTCUSDT", kind: "data", message: "gap", at: 0 },
			}),
		).toBeNull();
	});
});

describe("notifyRecord", () => {
	it("should send the formatted text", async () => {
		const send = jest.fn().mockResolvedValue(undefined);
		await notifyRecord(send, { type: "outcome", record: outcome });
		expect(send).toHaveBeenCalledTimes(1);
	});

	it("should swallow delivery failures", async () => {
		const send = jest.fn().mockRejectedValue(new Error("telegram down"));
		await expect(notifyRecord(send, { type: "outcome", record: outcome })).resolves.toBeUndefined();
	});
});
