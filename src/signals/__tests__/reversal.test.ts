import { voteOf } from "../../__tests__/helpers/fixtures";
import type { FilterLean, SignalVote } from "../../types";
import { reversalTriggers } from "../reversal";

function voteWith(...leans: FilterLean[]): SignalVote {
	return { ...voteOf("5m", "none"), leans };
}

const lean = (filter: FilterLean["filter"], direction: FilterLean["lean"]): FilterLean => ({
	filter,
	lean: direction,
	weight: 1,
});

describe("reversalTriggers", () => {
	it("should flag the fast EMA crossing under the slow one against a long", () => {
		const previous = voteWith(lean("emaTrend", "long"));
		const current = voteWith(lean("emaTrend", "short"));
		expect(reversalTriggers("long", current, previous, undefined)).toEqual(["ema_cross"]);
		expect(reversalTriggers("long", current, current, undefined)).toEqual([]);
	});

	it("should flag an opposite engulfing candle", () => {
		const vote = voteWith(lean("bearish_engulfing", "short"));
		expect(reversalTriggers("long", vote, undefined, undefined)).toEqual(["engulfing"]);
		expect(reversalTriggers("short", vote, undefined, undefined)).toEqual([]);
	});

	it("should only count a shooting star at resistance", () => {
		const vote = voteWith(lean("shooting_star", "short"));
		expect(
			reversalTriggers("long", vote, undefined, { nearResistance: true, nearSupport: false }),
		).toEqual(["rejection_at_level"]);
		expect(
			reversalTriggers("long", vote, undefined, { nearResistance: false, nearSupport: false }),
		).toEqual([]);
	});

	it("should mirror the rules for a short", () => {
		const vote = voteWith(lean("hammer", "long"), lean("supertrend", "long"));
		expect(
			reversalTriggers("short", vote, undefined, { nearResistance: false, nearSupport: true }),
		).toEqual(["rejection_at_level", "supertrend_flip"]);
	});
});
