import type { MacdValue, Reading } from "../types";
import { Ema } from "./ema";
import { ready, warmingUp } from "./reading";

export class Macd {
	private readonly fast: Ema;
	private readonly slow: Ema;
	private readonly signal: Ema;

	constructor(fastPeriod: number, slowPeriod: number, signalPeriod: number) {
		this.fast = new Ema(fastPeriod);
		this.slow = new Ema(slowPeriod);
		this.signal = new Ema(signalPeriod);
	}

	update(close: number): Reading<MacdValue> {
		const fast = this.fast.update(close);
		const slow = this.slow.update(close);
		if (!fast.ready || !slow.ready) return warmingUp;

		const line = fast.value - slow.value;
		const signal = this.signal.update(line);
		if (!signal.ready) return warmingUp;

		return ready({
			line,
			signal: signal.value,
			histogram: line - signal.value,
		});
	}
}
