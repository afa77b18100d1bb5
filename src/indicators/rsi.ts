import type { Divergence, Reading } from "../types";
import { RollingWindow } from "../utils/rollingWindow";
import { ready, warmingUp } from "./reading";

function rsiFrom(avgGain: number, avgLoss: number): number {
	if (avgLoss === 0) return 100;
	return 100 - 100 / (1 + avgGain / avgLoss);
}

/** Relative Strength Index with Wilder-smoothed average gain and loss. */
export class Rsi {
	private prevClose: number | undefined;
	private seedGain = 0;
	private seedLoss = 0;
	private changes = 0;
	private avgGain: number | undefined;
	private avgLoss = 0;

	constructor(readonly period: number) {}

	update(close: number): Reading<number> {
		const prevClose = this.prevClose;
		this.prevClose = close;
		if (prevClose === undefined) return warmingUp;

		const change = close - prevClose;
		const gain = Math.max(change, 0);
		const loss = Math.max(-change, 0);

		if (this.avgGain === undefined) {
			this.seedGain += gain;
			this.seedLoss += loss;
			this.changes += 1;
			if (this.changes < this.period) return warmingUp;
			this.avgGain = this.seedGain / this.period;
			this.avgLoss = this.seedLoss / this.period;
		} else {
			const p = this.period;
			this.avgGain = (this.avgGain * (p - 1) + gain) / p;
			this.avgLoss = (this.avgLoss * (p - 1) + loss) / p;
		}

		return ready(rsiFrom(this.avgGain, this.avgLoss));
	}
}

export type Pivot = { index: number; value: number };

/**
 * A pivot high is strictly above the `strength` values on each side; a pivot
 * low is strictly below them. The last `strength` values can never be pivots.
 */
export function findPivots(
	values: number[],
	strength: number,
	kind: "high" | "low",
): Pivot[] {
	const pivots: Pivot[] = [];
	for (let i = strength; i < values.length - strength; i++) {
		const value = values[i];
		let isPivot = true;
		for (let j = 1; j <= strength && isPivot; j++) {
			const left = values[i - j];
			const right = values[i + j];
			isPivot =
				kind === "high"
					? value > left && value > right
					: value < left && value < right;
		}
		if (isPivot) pivots.push({ index: i, value });
	}
	return pivots;
}

function lastTwo(pivots: Pivot[]): [Pivot, Pivot] | null {
	if (pivots.length < 2) return null;
	return [pivots[pivots.length - 2], pivots[pivots.length - 1]];
}

/**
 * Bearish: price prints a higher pivot high while RSI prints a lower one.
 * Bullish: price prints a lower pivot low while RSI prints a higher one.
 */
export function detectDivergence(
	highs: number[],
	lows: number[],
	rsi: number[],
	strength: number,
): Divergence {
	const priceHighs = lastTwo(findPivots(highs, strength, "high"));
	const rsiHighs = lastTwo(findPivots(rsi, strength, "high"));
	const priceLows = lastTwo(findPivots(lows, strength, "low"));
	const rsiLows = lastTwo(findPivots(rsi, strength, "low"));

	const bearish =
		priceHighs !== null &&
		rsiHighs !== null &&
		priceHighs[1].value > priceHighs[0].value &&
		rsiHighs[1].value < rsiHighs[0].value;
	const bullish =
		priceLows !== null &&
		rsiLows !== null &&
		priceLows[1].value < priceLows[0].value &&
		rsiLows[1].value > rsiLows[0].value;

	return { bullish, bearish };
}

type DivergencePoint = { high: number; low: number; rsi: number };

/** Scans a bounded window of candles that already carry an RSI reading. */
export class RsiDivergence {
	private readonly points: RollingWindow<DivergencePoint>;

	constructor(
		readonly strength: number,
		windowSize: number,
	) {
		this.points = new RollingWindow(Math.max(windowSize, strength * 2 + 1));
	}

	update(high: number, low: number, rsi: Reading<number>): Reading<Divergence> {
		if (!rsi.ready) return warmingUp;
		this.points.push({ high, low, rsi: rsi.value });

		const points = this.points.toArray();
		return ready(
			detectDivergence(
				points.map((p) => p.high),
				points.map((p) => p.low),
				points.map((p) => p.rsi),
				this.strength,
			),
		);
	}
}
