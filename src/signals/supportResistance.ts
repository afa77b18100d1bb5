import type { Candle, SrProximity } from "../types";
import { RollingWindow } from "../utils/rollingWindow";

/**
 * Tracks the highest high and lowest low of the last `lookback` candles,
 * the current one included, and flags a close within `tolerancePct` of either.
 */
export class SupportResistance {
	private readonly highs: RollingWindow<number>;
	private readonly lows: RollingWindow<number>;

	constructor(
		lookback: number,
		private readonly tolerancePct: number,
	) {
		this.highs = new RollingWindow(lookback);
		this.lows = new RollingWindow(lookback);
	}

	update(candle: Pick<Candle, "high" | "low" | "close">): SrProximity {
		this.highs.push(candle.high);
		this.lows.push(candle.low);

		const resistance = Math.max(...this.highs.toArray());
		const support = Math.min(...this.lows.toArray());
		const distance = (level: number) =>
			(Math.abs(candle.close - level) / candle.close) * 100;

		return {
			nearResistance: distance(resistance) < this.tolerancePct,
			nearSupport: distance(support) < this.tolerancePct,
			support,
			resistance,
		};
	}

	clear(): void {
		this.highs.clear();
		this.lows.clear();
	}
}
