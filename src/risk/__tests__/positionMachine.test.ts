import {
	FakeExecutor,
	candleAt,
	fillEverything,
	sequentialIds,
	testConfig,
} from "../../__tests__/helpers/fixtures";
import type { RiskSettings } from "../../config";
import type { Candle, ExecutionReport, OrderIntent } from "../../types";
import { type EntryRequest, PositionMachine, pnlOf } from "../positionMachine";

const quiet = { trailing: { enabled: false }, breakeven: { enabled: false }, partialProfits: { enabled: false } };

function riskWith(overrides: Record<string, unknown>): RiskSettings {
	return testConfig({ risk: { ...quiet, ...overrides } }).risk;
}

const longEntry: EntryRequest = {
	side: "BUY",
	referencePrice: 100,
	atr: 2,
	quantity: 1,
	leverage: 5,
	marginPercent: 5,
	at: 0,
};

function bar(index: number, open: number, high: number, low: number, close: number): Candle {
	return candleAt(index, { open, high, low, close });
}

function machineWith(risk: RiskSettings, executor = new FakeExecutor()) {
	const machine = new PositionMachine("BTCUSDT", risk, executor, sequentialIds());
	return { machine, executor };
}

describe("pnlOf", () => {
	it("should sign P&L by side", () => {
		expect(pnlOf("BUY", 100, 103, 2)).toBe(6);
		expect(pnlOf("SELL", 100, 103, 2)).toBe(-6);
	});
});

describe("PositionMachine", () => {
	it("should open with ATR-based stop and take profit and push protection", async () => {
		const { machine, executor } = machineWith(riskWith({ stopLossAtr: 1.5, takeProfitAtr: 5 }));
		const step = await machine.enter(longEntry);

		expect(step.transitions.map((t) => `${t.from}->${t.to}:${t.reason}`)).toEqual([
			"FLAT->ENTERING:signal",
			"ENTERING->OPEN:entry_filled",
		]);
		expect(machine.status()).toBe("OPEN");
		expect(machine.position()).toMatchObject({
			id: "intent-1",
			entryPrice: 100,
			stopPrice: 97,
			takeProfitPrice: 110,
			protectionSynced: true,
		});
		expect(executor.ofKind("protection")).toEqual([
			{
				kind: "protection",
				intentId: "intent-2",
				symbol: "BTCUSDT",
				side: "BUY",
				quantity: 1,
				stopPrice: 97,
				takeProfitPrice: 110,
			},
		]);
	});

	it("should mirror levels for a short", async () => {
		const { machine } = machineWith(riskWith({ stopLossAtr: 1.5, takeProfitAtr: 5 }));
		await machine.enter({ ...longEntry, side: "SELL" });
		expect(machine.position()).toMatchObject({ stopPrice: 103, takeProfitPrice: 90 });

		const step = await machine.onCandle(bar(1, 100, 101, 89.5, 90));
		expect(step.outcomes).toHaveLength(1);
		expect(step.outcomes[0]).toMatchObject({ reason: "take_profit", exitPrice: 90, pnl: 10 });
		expect(machine.status()).toBe("FLAT");
	});

	it("should ignore a second entry while a position is open", async () => {
		const { machine, executor } = machineWith(riskWith({}));
		await machine.enter(longEntry);
		const step = await machine.enter(longEntry);
		expect(step.transitions).toEqual([]);
		expect(executor.ofKind("entry")).toHaveLength(1);
	});

	it("should move the stop to breakeven exactly once", async () => {
		const { machine, executor } = machineWith(
			riskWith({
				stopLossAtr: 1.5,
				takeProfitAtr: 5,
				breakeven: { enabled: true, triggerAtr: 2, bufferAtr: 0 },
			}),
		);
		await machine.enter(longEntry);

		const first = await machine.onCandle(bar(1, 100, 106, 99, 105));
		expect(first.transitions).toEqual([
			expect.objectContaining({
				from: "OPEN",
				to: "OPEN",
				reason: "breakeven",
				details: { from: 97, to: 100 },
			}),
		]);
		expect(machine.position()?.stopPrice).toBe(100);
		expect(machine.position()?.breakevenApplied).toBe(true);

		const second = await machine.onCandle(bar(2, 105, 108, 103, 107));
		expect(second.transitions).toEqual([]);
		expect(executor.ofKind("protection")).toHaveLength(2);

		const third = await machine.onCandle(bar(3, 104, 106, 99.5, 100));
		expect(third.outcomes).toEqual([
			expect.objectContaining({ kind: "final", reason: "stop_loss", exitPrice: 100, pnl: 0 }),
		]);
		expect(machine.status()).toBe("FLAT");
	});

	it("should treat a candle touching both levels as a stop", async () => {
		const { machine } = machineWith(riskWith({ stopLossAtr: 1.5, takeProfitAtr: 5 }));
		await machine.enter(longEntry);
		const step = await machine.onCandle(bar(1, 100, 111, 96, 100));
		expect(step.outcomes[0]).toMatchObject({ reason: "stop_loss", exitPrice: 97, pnl: -3 });
		expect(step.transitions.map((t) => t.to)).toEqual(["CLOSING", "FLAT"]);
	});

	it("should only ever tighten a trailing stop", async () => {
		const { machine } = machineWith(
			riskWith({
				stopLossAtr: 1.5,
				takeProfitAtr: 10,
				trailing: { enabled: true, activationAtr: 1, distanceAtr: 1.2, stepAtr: 0.1 },
			}),
		);
		await machine.enter(longEntry);

		const stops: number[] = [];
		for (const candle of [
			bar(1, 100, 103, 101, 102),
			bar(2, 102, 102, 101, 101.5),
			bar(3, 103, 105, 103, 104),
		]) {
			await machine.onCandle(candle);
			stops.push(machine.position()?.stopPrice ?? Number.NaN);
		}

		expect(stops[0]).toBeCloseTo(100.6, 10);
		expect(stops[1]).toBeCloseTo(100.6, 10);
		expect(stops[2]).toBeCloseTo(102.6, 10);
		expect(machine.position()?.trailing.active).toBe(true);
	});

	it("should scale out at each partial level and settle the rest at take profit", async () => {
		const { machine, executor } = machineWith(
			riskWith({
				stopLossAtr: 1.5,
				takeProfitAtr: 3,
				partialProfits: {
					enabled: true,
					levels: [
						{ atr: 1.5, fraction: 0.5 },
						{ atr: 2.5, fraction: 0.25 },
					],
				},
			}),
		);
		await machine.enter(longEntry);

		const first = await machine.onCandle(bar(1, 100, 103.5, 100, 103));
		expect(first.outcomes).toEqual([
			expect.objectContaining({ kind: "partial", reason: "partial_profit", quantity: 0.5, exitPrice: 103, pnl: 1.5 }),
		]);
		expect(machine.status()).toBe("PARTIALLY_CLOSED");

		const second = await machine.onCandle(bar(2, 103, 105.2, 104, 105));
		expect(second.outcomes[0]).toMatchObject({ quantity: 0.25, pnl: 1.25, positionPnl: 2.75 });
		expect(machine.position()?.quantity).toBe(0.25);

		const third = await machine.onCandle(bar(3, 105, 106.5, 105, 106));
		expect(third.outcomes).toEqual([
			expect.objectContaining({
				kind: "final",
				reason: "take_profit",
				quantity: 0.25,
				exitPrice: 106,
				pnl: 1.5,
				positionPnl: 4.25,
			}),
		]);
		expect(executor.ofKind("close")[0].quantity).toBe(0.25);
		expect(machine.status()).toBe("FLAT");
	});

	it("should close after the maximum holding time", async () => {
		const { machine } = machineWith(riskWith({ maxHoldingHours: 1 }));
		await machine.enter(longEntry);
		const step = await machine.onCandle(
			candleAt(11, { open: 100, high: 101, low: 99.5, close: 100.5 }, { closeTime: 3_600_000 }),
		);
		expect(step.outcomes[0]).toMatchObject({ reason: "time_exit", exitPrice: 100.5, pnl: 0.5 });
	});

	it("should return to FLAT when the entry is rejected", async () => {
		const executor = new FakeExecutor(
			(intent): ExecutionReport => ({ intentId: intent.intentId, status: "REJECTED", reason: "insufficient margin" }),
		);
		const { machine } = machineWith(riskWith({}), executor);
		const step = await machine.enter(longEntry);

		expect(machine.status()).toBe("FLAT");
		expect(step.transitions.map((t) => t.reason)).toEqual(["signal", "entry_failed"]);
		expect(step.diagnostics[0].message).toBe("Entry failed: insufficient margin");
		expect(executor.cancelled).toEqual(["intent-1"]);
	});

	it("should cancel and return to FLAT when the entry times out", async () => {
		const executor = new FakeExecutor(() => new Promise<ExecutionReport>(() => undefined));
		const { machine } = machineWith(riskWith({ orderTimeoutMs: 20 }), executor);
		const step = await machine.enter(longEntry);

		expect(machine.status()).toBe("FLAT");
		expect(step.diagnostics[0].message).toBe("Entry failed: timed out");
		expect(executor.cancelled).toEqual(["intent-1"]);
	});

	it("should adopt an unresolved entry that turns out to have filled", async () => {
		const executor = new FakeExecutor((intent: OrderIntent): ExecutionReport => ({
			intentId: intent.intentId,
			status: "ACKNOWLEDGED",
		}));
		executor.lookupReport = (intentId) => ({ intentId, status: "FILLED", price: 100.5, quantity: 1 });
		const { machine } = machineWith(riskWith({ stopLossAtr: 1.5 }), executor);
		const step = await machine.enter(longEntry);

		expect(executor.cancelled).toEqual(["intent-1"]);
		expect(executor.lookedUp).toEqual(["intent-1"]);
		expect(step.diagnostics.map((d) => d.message)).toEqual([
			"Entry filled after it was reported unresolved",
		]);
		expect(machine.status()).toBe("OPEN");
		expect(machine.position()).toMatchObject({ entryPrice: 100.5, stopPrice: 97.5, protectionSynced: true });
		expect(executor.ofKind("protection")).toHaveLength(1);
	});

	it("should stay flat when an unresolved entry never filled", async () => {
		const executor = new FakeExecutor((intent: OrderIntent): ExecutionReport => ({
			intentId: intent.intentId,
			status: "ACKNOWLEDGED",
		}));
		const { machine } = machineWith(riskWith({}), executor);
		const step = await machine.enter(longEntry);

		expect(executor.lookedUp).toEqual(["intent-1"]);
		expect(step.diagnostics.map((d) => d.message)).toEqual(["Entry failed: not filled"]);
		expect(machine.status()).toBe("FLAT");
	});

	it("should adopt a timed-out entry that filled before the cancel", async () => {
		const executor = new FakeExecutor((intent: OrderIntent) =>
			intent.kind === "entry" ? new Promise<ExecutionReport>(() => undefined) : fillEverything(intent),
		);
		executor.lookupReport = (intentId) => ({ intentId, status: "FILLED", price: 100, quantity: 1 });
		const { machine } = machineWith(riskWith({ orderTimeoutMs: 20 }), executor);
		const step = await machine.enter(longEntry);

		expect(executor.cancelled).toEqual(["intent-1"]);
		expect(step.transitions.map((t) => t.reason)).toEqual(["signal", "entry_filled"]);
		expect(machine.status()).toBe("OPEN");
	});

	it("should treat a throwing executor as a rejection", async () => {
		const executor = new FakeExecutor(() => Promise.reject(new Error("socket hang up")));
		const { machine } = machineWith(riskWith({}), executor);
		const step = await machine.enter(longEntry);
		expect(step.diagnostics[0].message).toBe("Entry failed: socket hang up");
		expect(machine.status()).toBe("FLAT");
	});

	it("should retry protection on the next candle after a failed push", async () => {
		let protectionAttempts = 0;
		const executor = new FakeExecutor((intent: OrderIntent): ExecutionReport => {
			if (intent.kind === "protection") {
				protectionAttempts += 1;
				return protectionAttempts === 1
					? { intentId: intent.intentId, status: "REJECTED", reason: "venue down" }
					: { intentId: intent.intentId, status: "ACKNOWLEDGED" };
			}
			return { intentId: intent.intentId, status: "FILLED", price: intent.referencePrice, quantity: intent.quantity };
		});
		const { machine } = machineWith(riskWith({ stopLossAtr: 1.5 }), executor);

		const entered = await machine.enter(longEntry);
		expect(entered.diagnostics[0].message).toBe("Protective orders not placed: venue down");
		expect(machine.position()?.protectionSynced).toBe(false);

		await machine.onCandle(bar(1, 100, 101, 99, 100.5));
		expect(machine.position()?.protectionSynced).toBe(true);
		expect(executor.ofKind("protection").map((i) => i.stopPrice)).toEqual([97, 97]);
	});

	it("should keep the stop where it was when a breakeven push fails", async () => {
		let protectionAttempts = 0;
		const executor = new FakeExecutor((intent: OrderIntent): ExecutionReport | Promise<ExecutionReport> => {
			if (intent.kind === "protection") {
				protectionAttempts += 1;
				return protectionAttempts === 2
					? { intentId: intent.intentId, status: "REJECTED", reason: "x" }
					: { intentId: intent.intentId, status: "ACKNOWLEDGED" };
			}
			return fillEverything(intent);
		});
		const { machine } = machineWith(
			riskWith({ stopLossAtr: 1.5, breakeven: { enabled: true, triggerAtr: 1.5, bufferAtr: 0 } }),
			executor,
		);
		await machine.enter(longEntry);

		const failed = await machine.onCandle(bar(1, 101, 103.5, 101, 103));
		expect(failed.diagnostics.map((d) => d.message)).toEqual(["Stop update failed: x"]);
		expect(failed.transitions).toEqual([]);
		expect(machine.position()).toMatchObject({ stopPrice: 97, breakevenApplied: false });

		const retried = await machine.onCandle(bar(2, 103, 103.2, 102, 103));
		expect(retried.transitions.map((t) => t.reason)).toEqual(["breakeven"]);
		expect(machine.position()).toMatchObject({ stopPrice: 100, breakevenApplied: true });
	});

	it("should close on a reversal against the position", async () => {
		const { machine, executor } = machineWith(riskWith({}));
		await machine.enter(longEntry);
		const step = await machine.onCandle(bar(1, 100, 101, 99.5, 99.8), { reversal: ["supertrend_flip"] });

		expect(step.transitions.map((t) => `${t.from}->${t.to}:${t.reason}`)).toEqual([
			"OPEN->CLOSING:reversal_exit",
			"CLOSING->FLAT:reversal_exit",
		]);
		expect(step.transitions[0].details).toEqual({ referencePrice: 99.8, triggers: "supertrend_flip" });
		expect(step.outcomes[0]).toMatchObject({ reason: "reversal_exit", exitPrice: 99.8 });
		expect(step.outcomes[0].pnl).toBeCloseTo(-0.2, 10);
		expect(executor.ofKind("close")).toHaveLength(1);
	});

	it("should ignore reversals when the reversal exit is off", async () => {
		const { machine } = machineWith(riskWith({ reversalExit: false }));
		await machine.enter(longEntry);
		const step = await machine.onCandle(bar(1, 100, 101, 99.5, 99.8), { reversal: ["engulfing"] });
		expect(step.outcomes).toEqual([]);
		expect(machine.status()).toBe("OPEN");
	});

	it("should hand out copies of the position", async () => {
		const { machine } = machineWith(riskWith({}));
		await machine.enter(longEntry);
		const copy = machine.position();
		if (!copy) throw new Error("expected an open position");
		copy.trailing.bestPrice = 500;
		copy.partialExits.push({ level: 0, price: 1, quantity: 1, pnl: 0, closedAt: 0 });
		expect(machine.position()).toMatchObject({ trailing: { bestPrice: 100 }, partialExits: [] });
	});

	it("should reopen when a close is rejected", async () => {
		const executor = new FakeExecutor((intent: OrderIntent): ExecutionReport => {
			if (intent.kind === "close") {
				return { intentId: intent.intentId, status: "REJECTED", reason: "reduce only rejected" };
			}
			if (intent.kind === "protection") return { intentId: intent.intentId, status: "ACKNOWLEDGED" };
			return { intentId: intent.intentId, status: "FILLED", price: intent.referencePrice, quantity: intent.quantity };
		});
		const { machine } = machineWith(riskWith({ stopLossAtr: 1.5 }), executor);
		await machine.enter(longEntry);

		const step = await machine.onCandle(bar(1, 100, 100.5, 96, 97));
		expect(step.transitions.map((t) => `${t.from}->${t.to}:${t.reason}`)).toEqual([
			"OPEN->CLOSING:stop_loss",
			"CLOSING->OPEN:close_failed",
		]);
		expect(step.outcomes).toEqual([]);
		expect(machine.status()).toBe("OPEN");
	});

	it("should settle a venue-side close with the position quantity when none is reported", async () => {
		const { machine } = machineWith(riskWith({ stopLossAtr: 1.5 }));
		await machine.enter(longEntry);
		const step = await machine.onVenueClose({
			type: "venue_close",
			symbol: "BTCUSDT",
			price: 97,
			quantity: 0,
			at: 1_000,
		});
		expect(step.outcomes[0]).toMatchObject({ reason: "venue_close", quantity: 1, pnl: -3 });
		expect(machine.status()).toBe("FLAT");
	});

	it("should ignore candles and venue closes while flat", async () => {
		const { machine } = machineWith(riskWith({}));
		expect(await machine.onCandle(bar(1, 100, 101, 99, 100))).toEqual({
			transitions: [],
			outcomes: [],
			diagnostics: [],
		});
		const venue = await machine.onVenueClose({ type: "venue_close", symbol: "BTCUSDT", price: 1, quantity: 1, at: 0 });
		expect(venue.outcomes).toEqual([]);
	});
});
