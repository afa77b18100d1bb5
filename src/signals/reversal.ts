import type {
	Direction,
	FilterName,
	Lean,
	PatternType,
	SignalVote,
	SrProximity,
} from "../types";

export type ReversalTrigger =
	| "ema_cross"
	| "engulfing"
	| "rejection_at_level"
	| "supertrend_flip";

const leanOf = (vote: SignalVote | undefined, filter: FilterName | PatternType): Lean =>
	vote?.leans.find((l) => l.filter === filter)?.lean ?? "none";

/**
 * Reasons the primary timeframe turned against a position held in `held`:
 * the fast EMA crossing the slow one on this candle, an opposite engulfing
 * candle, a rejection wick at the level in the way, or Supertrend pointing
 * the other way.
 */
export function reversalTriggers(
	held: Direction,
	vote: SignalVote,
	previous: SignalVote | undefined,
	sr: SrProximity | undefined,
): ReversalTrigger[] {
	const against: Direction = held === "long" ? "short" : "long";
	const triggers: ReversalTrigger[] = [];

	if (
		leanOf(vote, "emaTrend") === against &&
		previous !== undefined &&
		leanOf(previous, "emaTrend") !== against
	) {
		triggers.push("ema_cross");
	}

	const engulfing = held === "long" ? "bearish_engulfing" : "bullish_engulfing";
	if (leanOf(vote, engulfing) === against) triggers.push("engulfing");

	const rejection =
		held === "long"
			? leanOf(vote, "shooting_star") === against && sr?.nearResistance === true
			: leanOf(vote, "hammer") === against && sr?.nearSupport === true;
	if (rejection) triggers.push("rejection_at_level");

	if (leanOf(vote, "supertrend") === against) triggers.push("supertrend_flip");
	return triggers;
}
