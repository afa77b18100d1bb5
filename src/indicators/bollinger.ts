import type { BollingerValue, Reading } from "../types";
import { RollingWindow } from "../utils/rollingWindow";
import { ready, warmingUp } from "./reading";

export function mean(values: number[]): number {
	return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Population standard deviation. */
export function stdDev(values: number[]): number {
	const avg = mean(values);
	return Math.sqrt(mean(values.map((v) => (v - avg) ** 2)));
}

export class Bollinger {
	private readonly closes: RollingWindow<number>;

	constructor(
		readonly period: number,
		readonly deviations: number,
	) {
		this.closes = new RollingWindow(period);
	}

	update(close: number): Reading<BollingerValue> {
		this.closes.push(close);
		if (!this.closes.full) return warmingUp;

		const values = this.closes.toArray();
		const basis = mean(values);
		const spread = this.deviations * stdDev(values);
		const upper = basis + spread;
		const lower = basis - spread;
		return ready({
			upper,
			basis,
			lower,
			widthPct: basis !== 0 ? ((upper - lower) / basis) * 100 : 0,
		});
	}
}
