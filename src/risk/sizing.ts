import type { SizingSettings } from "../config";
import type { SizingDecision, SizingState, TradeOutcome } from "../types";

const GLOBAL_SCOPE = "*";

export type SizingStats = {
	trades: number;
	wins: number;
	losses: number;
	winRate: number;
	netPnl: number;
	consecutiveWins: number;
	consecutiveLosses: number;
};

/**
 * Shrinks margin after consecutive losing positions and raises leverage only
 * as far as needed to clear the venue's minimum order value.
 */
export class SizingController {
	private readonly losses = new Map<string, number>();
	private readonly wins = new Map<string, number>();
	private readonly history = new Map<string, TradeOutcome[]>();

	constructor(private readonly settings: SizingSettings) {}

	private scope(symbol: string): string {
		return this.settings.lossScope === "global" ? GLOBAL_SCOPE : symbol;
	}

	private marginPercentFor(consecutiveLosses: number): number {
		const { defaultMarginPercent, marginStepPercent, minMarginPercent } =
			this.settings;
		return Math.max(
			minMarginPercent,
			defaultMarginPercent - consecutiveLosses * marginStepPercent,
		);
	}

	state(symbol: string): SizingState {
		const consecutiveLosses = this.losses.get(this.scope(symbol)) ?? 0;
		return {
			consecutiveLosses,
			marginPercent: this.marginPercentFor(consecutiveLosses),
			leverage: this.settings.defaultLeverage,
		};
	}

	nextEntrySize(symbol: string, balance: number): SizingDecision {
		const { defaultLeverage, maxLeverage, minOrderValue } = this.settings;
		const { marginPercent } = this.state(symbol);
		const margin = balance > 0 ? (balance * marginPercent) / 100 : 0;

		let leverage = defaultLeverage;
		if (margin * leverage < minOrderValue && margin > 0) {
			leverage = Math.min(maxLeverage, Math.ceil(minOrderValue / margin));
		}
		const notional = margin * leverage;

		const status =
			margin > 0 && notional >= minOrderValue ? "ok" : "insufficient";
		return { status, marginPercent, leverage, margin, notional };
	}

	/** Only final outcomes count; a flat position leaves the streak alone. */
	recordOutcome(outcome: TradeOutcome): SizingState {
		const key = this.scope(outcome.symbol);
		if (outcome.kind !== "final") return this.state(outcome.symbol);

		const history = this.history.get(key) ?? [];
		history.push(outcome);
		if (history.length > this.settings.historyLimit) history.shift();
		this.history.set(key, history);

		if (outcome.positionPnl < 0) {
			this.losses.set(key, (this.losses.get(key) ?? 0) + 1);
			this.wins.set(key, 0);
		} else if (outcome.positionPnl > 0) {
			this.wins.set(key, (this.wins.get(key) ?? 0) + 1);
			this.losses.set(key, 0);
		}
		return this.state(outcome.symbol);
	}

	recentOutcomes(symbol: string): readonly TradeOutcome[] {
		return this.history.get(this.scope(symbol)) ?? [];
	}

	/** Win/loss tally over the retained history. */
	stats(symbol: string): SizingStats {
		const outcomes = this.recentOutcomes(symbol);
		const wins = outcomes.filter((o) => o.positionPnl > 0).length;
		const losses = outcomes.filter((o) => o.positionPnl < 0).length;
		return {
			trades: outcomes.length,
			wins,
			losses,
			winRate: outcomes.length ? (wins / outcomes.length) * 100 : 0,
			netPnl: outcomes.reduce((sum, o) => sum + o.positionPnl, 0),
			consecutiveWins: this.wins.get(this.scope(symbol)) ?? 0,
			consecutiveLosses: this.losses.get(this.scope(symbol)) ?? 0,
		};
	}
}
