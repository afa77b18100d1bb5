import type { Reading } from "../types";
import { ready, warmingUp } from "./reading";

/**
 * Exponential moving average with smoothing constant 2 / (period + 1),
 * seeded with the simple average of the first `period` values.
 */
export class Ema {
	private readonly k: number;
	private seedSum = 0;
	private seen = 0;
	private current: number | undefined;

	constructor(readonly period: number) {
		this.k = 2 / (period + 1);
	}

	update(value: number): Reading<number> {
		if (this.current === undefined) {
			this.seedSum += value;
			this.seen += 1;
			if (this.seen < this.period) return warmingUp;
			this.current = this.seedSum / this.period;
		} else {
			this.current = (value - this.current) * this.k + this.current;
		}
		return ready(this.current);
	}
}
