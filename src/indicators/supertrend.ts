import type { Reading, SupertrendValue, TrendDirection } from "../types";
import { WilderAtr } from "./atr";
import { ready, warmingUp } from "./reading";

type Bands = { upper: number; lower: number; close: number };

/**
 * Supertrend on `hl2 ± multiplier × ATR` with ratcheting final bands. The trend
 * starts upward and flips when a close crosses the active band.
 */
export class Supertrend {
	private readonly atr: WilderAtr;
	private prev: Bands | undefined;
	private direction: TrendDirection = "up";

	constructor(
		atrPeriod: number,
		readonly multiplier: number,
	) {
		this.atr = new WilderAtr(atrPeriod);
	}

	update(high: number, low: number, close: number): Reading<SupertrendValue> {
		const atr = this.atr.update(high, low, close);
		if (!atr.ready) return warmingUp;

		const hl2 = (high + low) / 2;
		const basicUpper = hl2 + this.multiplier * atr.value;
		const basicLower = hl2 - this.multiplier * atr.value;
		const prev = this.prev;

		let upper = basicUpper;
		let lower = basicLower;
		if (prev) {
			upper =
				basicUpper < prev.upper || prev.close > prev.upper
					? basicUpper
					: prev.upper;
			lower =
				basicLower > prev.lower || prev.close < prev.lower
					? basicLower
					: prev.lower;

			if (this.direction === "up" && close < prev.lower) {
				this.direction = "down";
			} else if (this.direction === "down" && close > prev.upper) {
				this.direction = "up";
			}
		}

		this.prev = { upper, lower, close };
		return ready({
			value: this.direction === "up" ? lower : upper,
			direction: this.direction,
		});
	}
}
