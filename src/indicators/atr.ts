import type { Reading } from "../types";
import { ready, warmingUp } from "./reading";

export function trueRange(high: number, low: number, prevClose: number): number {
	return Math.max(
		high - low,
		Math.abs(high - prevClose),
		Math.abs(low - prevClose),
	);
}

/**
 * Average True Range with Wilder smoothing. The first true range needs a
 * previous close, so the first reading arrives on candle `period + 1`.
 */
export class WilderAtr {
	private prevClose: number | undefined;
	private seedSum = 0;
	private seeded = 0;
	private current: number | undefined;

	constructor(readonly period: number) {}

	update(high: number, low: number, close: number): Reading<number> {
		const prevClose = this.prevClose;
		this.prevClose = close;
		if (prevClose === undefined) return warmingUp;

		const tr = trueRange(high, low, prevClose);
		if (this.current === undefined) {
			this.seedSum += tr;
			this.seeded += 1;
			if (this.seeded < this.period) return warmingUp;
			this.current = this.seedSum / this.period;
		} else {
			this.current = (this.current * (this.period - 1) + tr) / this.period;
		}
		return ready(this.current);
	}
}
