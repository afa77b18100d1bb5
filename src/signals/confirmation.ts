import type { SignalVote, Timeframe } from "../types";

export type VotesByTimeframe = ReadonlyMap<Timeframe, SignalVote>;

/**
 * The primary vote survives when every higher timeframe has a ready vote,
 * none of them points the other way and at least one agrees.
 */
export function confirm(
	votes: VotesByTimeframe,
	primary: Timeframe,
	higher: readonly Timeframe[],
): SignalVote | null {
	const vote = votes.get(primary);
	if (!vote || !vote.ready || vote.direction === "none") return null;
	if (!higher.length) return vote;

	let agreeing = 0;
	for (const timeframe of higher) {
		const other = votes.get(timeframe);
		if (!other || !other.ready) return null;
		if (other.direction === vote.direction) agreeing += 1;
		else if (other.direction !== "none") return null;
	}

	return agreeing > 0 ? vote : null;
}
