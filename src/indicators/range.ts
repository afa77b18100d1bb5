import type { Reading } from "../types";
import { RollingWindow } from "../utils/rollingWindow";
import { ready, warmingUp } from "./reading";

/** Width of the rolling high-low range as a percentage of its midpoint. */
export class RangePercent {
	private readonly highs: RollingWindow<number>;
	private readonly lows: RollingWindow<number>;

	constructor(readonly period: number) {
		this.highs = new RollingWindow(period);
		this.lows = new RollingWindow(period);
	}

	update(high: number, low: number): Reading<number> {
		this.highs.push(high);
		this.lows.push(low);
		if (!this.highs.full) return warmingUp;

		const highest = Math.max(...this.highs.toArray());
		const lowest = Math.min(...this.lows.toArray());
		const midpoint = (highest + lowest) / 2;
		return ready(((highest - lowest) / midpoint) * 100);
	}
}
