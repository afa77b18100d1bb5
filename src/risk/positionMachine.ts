import crypto from "node:crypto";
import { TimeoutError, from, lastValueFrom, timeout } from "rxjs";
import type { RiskSettings } from "../config";
import type {
	Candle,
	Diagnostic,
	ExecutionReport,
	ExitReason,
	OrderExecutor,
	OrderIntent,
	Position,
	PositionStatus,
	TradeOutcome,
	TradeSide,
	TransitionRecord,
	VenueCloseEvent,
} from "../types";
import { logger } from "../utils/logger";

export type EntryRequest = {
	side: TradeSide;
	referencePrice: number;
	atr: number;
	quantity: number;
	leverage: number;
	marginPercent: number;
	at: number;
};

/** Signals read from the candle that the machine manages on. */
export type CandleSignals = {
	/** Reasons the market turned against the open side; empty when it has not. */
	reversal?: readonly string[];
};

/** Everything one call on the machine produced, in order. */
export type MachineStep = {
	transitions: TransitionRecord[];
	outcomes: TradeOutcome[];
	diagnostics: Diagnostic[];
};

type MachineState =
	| { status: "FLAT" }
	| { status: "ENTERING"; intentId: string }
	| { status: "OPEN" | "PARTIALLY_CLOSED"; position: Position }
	| {
			status: "CLOSING";
			position: Position;
			previous: "OPEN" | "PARTIALLY_CLOSED";
	  };

type Submission = ExecutionReport | { intentId: string; status: "TIMEOUT" };

type StopCandidate = { price: number; reason: "breakeven" | "trailing_stop" };

const HOUR = 3_600_000;

const emptyStep = (): MachineStep => ({
	transitions: [],
	outcomes: [],
	diagnostics: [],
});

export function pnlOf(
	side: TradeSide,
	entryPrice: number,
	exitPrice: number,
	quantity: number,
): number {
	const move = side === "BUY" ? exitPrice - entryPrice : entryPrice - exitPrice;
	return move * quantity;
}

/** Price `distance` away from `origin` in the direction of profit for `side`. */
const favourable = (side: TradeSide, origin: number, distance: number) =>
	side === "BUY" ? origin + distance : origin - distance;

/** Whether `a` is strictly better than `b` as a stop for `side`. */
const tighter = (side: TradeSide, a: number, b: number) =>
	side === "BUY" ? a > b : a < b;

/**
 * Drives one symbol's position through FLAT → ENTERING → OPEN →
 * PARTIALLY_CLOSED → CLOSING → FLAT. Calls must not overlap; the pipeline
 * serializes them per symbol.
 */
export class PositionMachine {
	private state: MachineState = { status: "FLAT" };

	constructor(
		readonly symbol: string,
		private readonly risk: RiskSettings,
		private readonly executor: OrderExecutor,
		private readonly newId: () => string = () => crypto.randomUUID(),
	) {}

	status(): PositionStatus {
		return this.state.status;
	}

	position(): Readonly<Position> | null {
		if (!("position" in this.state)) return null;
		const { position } = this.state;
		return {
			...position,
			trailing: { ...position.trailing },
			partialExits: position.partialExits.map((exit) => ({ ...exit })),
		};
	}

	private transition(
		step: MachineStep,
		to: MachineState,
		reason: string,
		at: number,
		details?: TransitionRecord["details"],
	): void {
		const previous = this.state.status;
		this.state = to;
		const positionId = "position" in to ? to.position.id : undefined;
		step.transitions.push({
			symbol: this.symbol,
			from: previous,
			to: to.status,
			reason,
			at,
			positionId,
			details,
		});
	}

	private diagnose(
		step: MachineStep,
		message: string,
		at: number,
		details?: Diagnostic["details"],
	): void {
		step.diagnostics.push({ symbol: this.symbol, kind: "venue", message, at, details });
	}

	private async submit(intent: OrderIntent): Promise<Submission> {
		try {
			return await lastValueFrom(
				from(this.executor.submit(intent)).pipe(
					timeout(this.risk.orderTimeoutMs),
				),
			);
		} catch (error) {
			if (error instanceof TimeoutError) {
				await this.cancelQuietly(intent.intentId);
				return { intentId: intent.intentId, status: "TIMEOUT" };
			}
			return {
				intentId: intent.intentId,
				status: "REJECTED",
				reason: error instanceof Error ? error.message : String(error),
			};
		}
	}

	private async cancelQuietly(intentId: string): Promise<void> {
		try {
			await this.executor.cancel(this.symbol, intentId);
		} catch (err) {
			logger.warn({ symbol: this.symbol, intentId, err }, "Failed to cancel order");
		}
	}

	private async lookup(intentId: string): Promise<ExecutionReport | null> {
		try {
			return await lastValueFrom(
				from(this.executor.lookup(this.symbol, intentId)).pipe(
					timeout(this.risk.orderTimeoutMs),
				),
			);
		} catch (err) {
			logger.warn({ symbol: this.symbol, intentId, err }, "Order lookup failed");
			return null;
		}
	}

	/**
	 * An entry still unresolved after submission is cancelled, then looked up
	 * once: a fill that beat the cancel is adopted rather than left unprotected.
	 */
	private async settleEntry(
		step: MachineStep,
		report: Submission,
		at: number,
	): Promise<Submission> {
		if (report.status === "FILLED") return report;
		if (report.status === "REJECTED") {
			await this.cancelQuietly(report.intentId);
			return report;
		}
		if (report.status === "ACKNOWLEDGED") await this.cancelQuietly(report.intentId);

		const settled = await this.lookup(report.intentId);
		if (!settled || settled.status !== "FILLED") return report;
		this.diagnose(step, "Entry filled after it was reported unresolved", at, {
			intentId: report.intentId,
			price: settled.price,
			quantity: settled.quantity,
		});
		return settled;
	}

	private failureReason(report: Submission): string {
		if (report.status === "REJECTED") return report.reason;
		if (report.status === "TIMEOUT") return "timed out";
		return "not filled";
	}

	async enter(request: EntryRequest): Promise<MachineStep> {
		const step = emptyStep();
		if (this.state.status !== "FLAT") return step;

		const intentId = this.newId();
		this.transition(step, { status: "ENTERING", intentId }, "signal", request.at, {
			side: request.side,
			quantity: request.quantity,
			leverage: request.leverage,
		});

		const submitted = await this.submit({
			kind: "entry",
			intentId,
			symbol: this.symbol,
			side: request.side,
			quantity: request.quantity,
			leverage: request.leverage,
			referencePrice: request.referencePrice,
		});
		const report = await this.settleEntry(step, submitted, request.at);

		if (report.status !== "FILLED" || report.quantity <= 0) {
			const reason = this.failureReason(report);
			this.diagnose(step, `Entry failed: ${reason}`, request.at, { intentId });
			this.transition(step, { status: "FLAT" }, "entry_failed", request.at);
			return step;
		}

		const { stopLossAtr, takeProfitAtr } = this.risk;
		const entryPrice = report.price;
		const position: Position = {
			id: intentId,
			symbol: this.symbol,
			side: request.side,
			entryPrice,
			quantity: report.quantity,
			initialQuantity: report.quantity,
			leverage: request.leverage,
			marginPercent: request.marginPercent,
			atrAtEntry: request.atr,
			stopPrice: favourable(request.side, entryPrice, -request.atr * stopLossAtr),
			takeProfitPrice: favourable(request.side, entryPrice, request.atr * takeProfitAtr),
			trailing: { active: false, bestPrice: entryPrice },
			breakevenApplied: false,
			partialExits: [],
			realizedPnl: 0,
			openedAt: request.at,
			protectionSynced: false,
		};
		this.transition(step, { status: "OPEN", position }, "entry_filled", request.at, {
			entryPrice,
			quantity: position.quantity,
			stopPrice: position.stopPrice,
			takeProfitPrice: position.takeProfitPrice,
		});

		await this.syncProtection(step, position, request.at);
		return step;
	}

	private async pushProtection(
		position: Position,
		stopPrice: number,
	): Promise<Submission> {
		return this.submit({
			kind: "protection",
			intentId: this.newId(),
			symbol: this.symbol,
			side: position.side,
			quantity: position.quantity,
			stopPrice,
			takeProfitPrice: position.takeProfitPrice,
		});
	}

	private async syncProtection(
		step: MachineStep,
		position: Position,
		at: number,
	): Promise<void> {
		const report = await this.pushProtection(position, position.stopPrice);
		position.protectionSynced =
			report.status === "ACKNOWLEDGED" || report.status === "FILLED";
		if (!position.protectionSynced) {
			this.diagnose(
				step,
				`Protective orders not placed: ${this.failureReason(report)}`,
				at,
				{ stopPrice: position.stopPrice, takeProfitPrice: position.takeProfitPrice },
			);
		}
	}

	async onCandle(candle: Candle, signals: CandleSignals = {}): Promise<MachineStep> {
		const step = emptyStep();
		const state = this.state;
		if (state.status !== "OPEN" && state.status !== "PARTIALLY_CLOSED") {
			return step;
		}
		const { position } = state;
		const at = candle.closeTime;
		const long = position.side === "BUY";

		if (!position.protectionSynced) {
			await this.syncProtection(step, position, at);
		}

		const stopTouched = long
			? candle.low <= position.stopPrice
			: candle.high >= position.stopPrice;
		const targetTouched = long
			? candle.high >= position.takeProfitPrice
			: candle.low <= position.takeProfitPrice;
		if (stopTouched) {
			await this.close(step, "stop_loss", position.stopPrice, at);
			return step;
		}
		if (targetTouched) {
			await this.close(step, "take_profit", position.takeProfitPrice, at);
			return step;
		}

		const maxHolding = this.risk.maxHoldingHours * HOUR;
		if (maxHolding > 0 && at - position.openedAt >= maxHolding) {
			await this.close(step, "time_exit", candle.close, at);
			return step;
		}

		const reversal = signals.reversal ?? [];
		if (this.risk.reversalExit && reversal.length > 0) {
			await this.close(step, "reversal_exit", candle.close, at, {
				triggers: reversal.join(","),
			});
			return step;
		}

		await this.takePartials(step, position, candle);
		await this.tightenStop(step, position, candle);
		return step;
	}

	private async takePartials(
		step: MachineStep,
		position: Position,
		candle: Candle,
	): Promise<void> {
		const { partialProfits } = this.risk;
		if (!partialProfits.enabled) return;
		const long = position.side === "BUY";

		for (const [index, level] of partialProfits.levels.entries()) {
			if (position.partialExits.some((exit) => exit.level === index)) continue;

			const target = favourable(
				position.side,
				position.entryPrice,
				position.atrAtEntry * level.atr,
			);
			const reached = long ? candle.high >= target : candle.low <= target;
			if (!reached) break;

			const quantity = Math.min(
				position.initialQuantity * level.fraction,
				position.quantity,
			);
			if (quantity <= 0) break;

			const report = await this.submit({
				kind: "partial_close",
				intentId: this.newId(),
				symbol: this.symbol,
				side: position.side,
				quantity,
				referencePrice: target,
			});
			if (report.status !== "FILLED") {
				this.diagnose(
					step,
					`Partial close failed: ${this.failureReason(report)}`,
					candle.closeTime,
					{ level: index },
				);
				break;
			}

			const filled = Math.min(report.quantity, position.quantity);
			const pnl = pnlOf(position.side, position.entryPrice, report.price, filled);
			position.quantity -= filled;
			position.realizedPnl += pnl;
			position.partialExits.push({
				level: index,
				price: report.price,
				quantity: filled,
				pnl,
				closedAt: candle.closeTime,
			});
			step.outcomes.push(
				this.outcome(position, "partial", "partial_profit", filled, report.price, pnl, candle.closeTime),
			);
			this.transition(
				step,
				{ status: "PARTIALLY_CLOSED", position },
				"partial_profit",
				candle.closeTime,
				{ level: index, price: report.price, quantity: filled },
			);
		}
	}

	private stopCandidates(position: Position, candle: Candle): StopCandidate[] {
		const { breakeven, trailing } = this.risk;
		const side = position.side;
		const atr = position.atrAtEntry;
		const extreme = side === "BUY" ? candle.high : candle.low;
		if (tighter(side, extreme, position.trailing.bestPrice)) {
			position.trailing.bestPrice = extreme;
		}
		const best = position.trailing.bestPrice;
		const excursion = Math.abs(best - position.entryPrice);
		const inProfit = tighter(side, best, position.entryPrice);
		const candidates: StopCandidate[] = [];

		if (
			breakeven.enabled &&
			!position.breakevenApplied &&
			inProfit &&
			excursion >= atr * breakeven.triggerAtr
		) {
			candidates.push({
				price: favourable(side, position.entryPrice, atr * breakeven.bufferAtr),
				reason: "breakeven",
			});
		}

		if (trailing.enabled) {
			if (inProfit && excursion >= atr * trailing.activationAtr) {
				position.trailing.active = true;
			}
			if (position.trailing.active) {
				const price = favourable(side, best, -atr * trailing.distanceAtr);
				const gain = Math.abs(price - position.stopPrice);
				if (
					tighter(side, price, position.stopPrice) &&
					gain >= atr * trailing.stepAtr
				) {
					candidates.push({ price, reason: "trailing_stop" });
				}
			}
		}

		return candidates.filter((c) => tighter(side, c.price, position.stopPrice));
	}

	private async tightenStop(
		step: MachineStep,
		position: Position,
		candle: Candle,
	): Promise<void> {
		const candidates = this.stopCandidates(position, candle);
		if (!candidates.length) return;

		const chosen = candidates.reduce((best, c) =>
			tighter(position.side, c.price, best.price) ? c : best,
		);
		const report = await this.pushProtection(position, chosen.price);
		if (report.status !== "ACKNOWLEDGED" && report.status !== "FILLED") {
			this.diagnose(
				step,
				`Stop update failed: ${this.failureReason(report)}`,
				candle.closeTime,
				{ stopPrice: chosen.price },
			);
			return;
		}

		const previousStop = position.stopPrice;
		position.stopPrice = chosen.price;
		position.protectionSynced = true;
		const breakevenCandidate = candidates.find((c) => c.reason === "breakeven");
		if (
			breakevenCandidate &&
			!tighter(position.side, breakevenCandidate.price, chosen.price)
		) {
			position.breakevenApplied = true;
		}

		const status = this.state.status;
		if (status === "OPEN" || status === "PARTIALLY_CLOSED") {
			this.transition(step, { status, position }, chosen.reason, candle.closeTime, {
				from: previousStop,
				to: chosen.price,
			});
		}
	}

	private outcome(
		position: Position,
		kind: TradeOutcome["kind"],
		reason: ExitReason,
		quantity: number,
		exitPrice: number,
		pnl: number,
		closedAt: number,
	): TradeOutcome {
		return {
			positionId: position.id,
			symbol: this.symbol,
			side: position.side,
			kind,
			quantity,
			entryPrice: position.entryPrice,
			exitPrice,
			pnl,
			positionPnl: position.realizedPnl,
			reason,
			closedAt,
		};
	}

	private async close(
		step: MachineStep,
		reason: ExitReason,
		referencePrice: number,
		at: number,
		details: TransitionRecord["details"] = {},
	): Promise<void> {
		const state = this.state;
		if (state.status !== "OPEN" && state.status !== "PARTIALLY_CLOSED") return;
		const { position } = state;

		this.transition(
			step,
			{ status: "CLOSING", position, previous: state.status },
			reason,
			at,
			{ referencePrice, ...details },
		);

		const report = await this.submit({
			kind: "close",
			intentId: this.newId(),
			symbol: this.symbol,
			side: position.side,
			quantity: position.quantity,
			referencePrice,
		});

		if (report.status !== "FILLED") {
			this.diagnose(step, `Close failed: ${this.failureReason(report)}`, at, {
				reason,
			});
			this.transition(step, { status: state.status, position }, "close_failed", at);
			return;
		}

		this.finish(step, reason, report.price, report.quantity, at);
	}

	private finish(
		step: MachineStep,
		reason: ExitReason,
		price: number,
		quantity: number,
		at: number,
	): void {
		const state = this.state;
		if (!("position" in state)) return;
		const { position } = state;
		const filled = Math.min(quantity, position.quantity);
		const pnl = pnlOf(position.side, position.entryPrice, price, filled);
		position.realizedPnl += pnl;
		position.quantity -= filled;
		step.outcomes.push(
			this.outcome(position, "final", reason, filled, price, pnl, at),
		);
		this.transition(step, { status: "FLAT" }, reason, at, {
			exitPrice: price,
			pnl,
			positionPnl: position.realizedPnl,
		});
	}

	/** A protective order filled on the venue side. */
	async onVenueClose(event: VenueCloseEvent): Promise<MachineStep> {
		const step = emptyStep();
		const state = this.state;
		if (state.status !== "OPEN" && state.status !== "PARTIALLY_CLOSED") {
			return step;
		}
		const quantity =
			event.quantity > 0 ? event.quantity : state.position.quantity;
		this.finish(step, "venue_close", event.price, quantity, event.at);
		return step;
	}
}
