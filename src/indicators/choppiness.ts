import type { Reading } from "../types";
import { RollingWindow } from "../utils/rollingWindow";
import { trueRange } from "./atr";
import { ready, warmingUp } from "./reading";

type Bar = { high: number; low: number; tr: number };

/** Choppiness Index: 100 × log10(ΣTR / (HH − LL)) / log10(period). */
export class Choppiness {
	private readonly bars: RollingWindow<Bar>;
	private prevClose: number | undefined;

	constructor(readonly period: number) {
		this.bars = new RollingWindow(period);
	}

	update(high: number, low: number, close: number): Reading<number> {
		const prevClose = this.prevClose;
		this.prevClose = close;
		if (prevClose === undefined) return warmingUp;

		this.bars.push({ high, low, tr: trueRange(high, low, prevClose) });
		if (!this.bars.full) return warmingUp;

		const bars = this.bars.toArray();
		const trSum = bars.reduce((sum, bar) => sum + bar.tr, 0);
		const range =
			Math.max(...bars.map((bar) => bar.high)) -
			Math.min(...bars.map((bar) => bar.low));
		if (range <= 0 || trSum <= 0) return ready(50);

		return ready((100 * Math.log10(trSum / range)) / Math.log10(this.period));
	}
}
