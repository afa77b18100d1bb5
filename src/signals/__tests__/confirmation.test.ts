import { voteOf } from "../../__tests__/helpers/fixtures";
import type { SignalVote, Timeframe } from "../../types";
import { confirm } from "../confirmation";

const votes = (...list: SignalVote[]) =>
	new Map<Timeframe, SignalVote>(list.map((vote) => [vote.timeframe, vote]));

describe("confirm", () => {
	it("should pass the primary vote through when there are no higher timeframes", () => {
		const primary = voteOf("5m", "long");
		expect(confirm(votes(primary), "5m", [])).toBe(primary);
	});

	it("should return null when the primary vote is missing or neutral", () => {
		expect(confirm(votes(), "5m", [])).toBeNull();
		expect(confirm(votes(voteOf("5m", "none")), "5m", [])).toBeNull();
		expect(confirm(votes(voteOf("5m", "long", false)), "5m", [])).toBeNull();
	});

	it("should confirm when a higher timeframe agrees", () => {
		const primary = voteOf("5m", "short");
		expect(confirm(votes(primary, voteOf("1h", "short")), "5m", ["1h"])).toBe(primary);
	});

	it("should reject an opposing higher timeframe", () => {
		expect(confirm(votes(voteOf("5m", "long"), voteOf("1h", "short")), "5m", ["1h"])).toBeNull();
	});

	it("should reject a missing or unready higher timeframe", () => {
		expect(confirm(votes(voteOf("5m", "long")), "5m", ["1h"])).toBeNull();
		expect(
			confirm(votes(voteOf("5m", "long"), voteOf("1h", "long", false)), "5m", ["1h"]),
		).toBeNull();
	});

	it("should need at least one agreeing higher timeframe", () => {
		const primary = voteOf("5m", "long");
		expect(
			confirm(votes(primary, voteOf("1h", "none"), voteOf("4h", "none")), "5m", ["1h", "4h"]),
		).toBeNull();
		expect(
			confirm(votes(primary, voteOf("1h", "none"), voteOf("4h", "long")), "5m", ["1h", "4h"]),
		).toBe(primary);
	});
});
