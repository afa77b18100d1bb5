import type { AdxValue, Reading } from "../types";
import { trueRange } from "./atr";
import { ready, warmingUp } from "./reading";

type Bar = { high: number; low: number; close: number };

/**
 * ADX with +DI/-DI. True range and directional movement are Wilder-smoothed
 * from candle `period + 1`; ADX is seeded with the mean of the first `period`
 * DX values, so the first reading lands on candle `2 * period`.
 */
export class Adx {
	private prev: Bar | undefined;
	private seeded = 0;
	private seedTr = 0;
	private seedPlusDm = 0;
	private seedMinusDm = 0;
	private smoothed: { tr: number; plusDm: number; minusDm: number } | undefined;
	private dxSum = 0;
	private dxCount = 0;
	private adx: number | undefined;

	constructor(readonly period: number) {}

	update(high: number, low: number, close: number): Reading<AdxValue> {
		const prev = this.prev;
		this.prev = { high, low, close };
		if (!prev) return warmingUp;

		const p = this.period;
		const tr = trueRange(high, low, prev.close);
		const upMove = high - prev.high;
		const downMove = prev.low - low;
		const plusDm = upMove > downMove && upMove > 0 ? upMove : 0;
		const minusDm = downMove > upMove && downMove > 0 ? downMove : 0;

		if (!this.smoothed) {
			this.seedTr += tr;
			this.seedPlusDm += plusDm;
			this.seedMinusDm += minusDm;
			this.seeded += 1;
			if (this.seeded < p) return warmingUp;
			this.smoothed = {
				tr: this.seedTr,
				plusDm: this.seedPlusDm,
				minusDm: this.seedMinusDm,
			};
		} else {
			const s = this.smoothed;
			this.smoothed = {
				tr: s.tr - s.tr / p + tr,
				plusDm: s.plusDm - s.plusDm / p + plusDm,
				minusDm: s.minusDm - s.minusDm / p + minusDm,
			};
		}

		const { tr: str, plusDm: spdm, minusDm: smdm } = this.smoothed;
		const plusDi = str > 0 ? (spdm / str) * 100 : 0;
		const minusDi = str > 0 ? (smdm / str) * 100 : 0;
		const diSum = plusDi + minusDi;
		const dx = diSum > 0 ? (Math.abs(plusDi - minusDi) / diSum) * 100 : 0;

		if (this.adx === undefined) {
			this.dxSum += dx;
			this.dxCount += 1;
			if (this.dxCount < p) return warmingUp;
			this.adx = this.dxSum / p;
		} else {
			this.adx = (this.adx * (p - 1) + dx) / p;
		}

		return ready({ adx: this.adx, plusDi, minusDi });
	}
}
