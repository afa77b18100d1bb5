import type { IndicatorSettings } from "../config";
import type {
	Candle,
	CandleRejection,
	IndicatorSnapshot,
	IndicatorUpdate,
	Reading,
	Timeframe,
} from "../types";
import { Adx } from "./adx";
import { WilderAtr } from "./atr";
import { Bollinger } from "./bollinger";
import { Choppiness } from "./choppiness";
import { Ema } from "./ema";
import { Macd } from "./macd";
import { RangePercent } from "./range";
import { warmingUp } from "./reading";
import { Rsi, RsiDivergence } from "./rsi";
import { Supertrend } from "./supertrend";
import { VolumeZScore } from "./volume";
import { requiredWarmup } from "./warmup";

class IndicatorSet {
	readonly emaFast: Ema;
	readonly emaSlow: Ema;
	readonly emaFilter: Ema;
	readonly emaTrend: Ema;
	readonly rsi: Rsi;
	readonly divergence: RsiDivergence;
	readonly macd: Macd;
	readonly adx: Adx;
	readonly supertrend: Supertrend;
	readonly bollinger: Bollinger;
	readonly choppiness: Choppiness;
	readonly volume: VolumeZScore;
	readonly atr: WilderAtr;
	readonly range: RangePercent;
	candlesSeen = 0;
	lastCloseTime: number | undefined;

	constructor(settings: IndicatorSettings) {
		this.emaFast = new Ema(settings.ema.fast);
		this.emaSlow = new Ema(settings.ema.slow);
		this.emaFilter = new Ema(settings.ema.filter);
		this.emaTrend = new Ema(settings.ema.trend);
		this.rsi = new Rsi(settings.rsi.period);
		this.divergence = new RsiDivergence(
			settings.rsi.divergenceLookback,
			settings.rsi.divergenceWindow,
		);
		this.macd = new Macd(
			settings.macd.fast,
			settings.macd.slow,
			settings.macd.signal,
		);
		this.adx = new Adx(settings.adx.period);
		this.supertrend = new Supertrend(
			settings.supertrend.atrPeriod,
			settings.supertrend.multiplier,
		);
		this.bollinger = new Bollinger(
			settings.bollinger.period,
			settings.bollinger.stdDev,
		);
		this.choppiness = new Choppiness(settings.choppiness.period);
		this.volume = new VolumeZScore(settings.volume.period);
		this.atr = new WilderAtr(settings.atr.period);
		this.range = new RangePercent(settings.sideways.period);
	}
}

function isValidCandle(candle: Candle): boolean {
	const values = [
		candle.open,
		candle.high,
		candle.low,
		candle.close,
		candle.volume,
		candle.openTime,
		candle.closeTime,
	];
	if (!values.every(Number.isFinite)) return false;
	if (candle.volume < 0 || candle.low <= 0) return false;
	if (candle.high < candle.low) return false;
	if (candle.high < Math.max(candle.open, candle.close)) return false;
	if (candle.low > Math.min(candle.open, candle.close)) return false;
	return candle.closeTime > candle.openTime;
}

/**
 * Incremental indicator state per (symbol, timeframe). Candles are validated
 * before anything is touched, so a rejected candle leaves the state as it was.
 */
export class IndicatorEngine {
	private readonly sets = new Map<string, IndicatorSet>();
	readonly warmupCandles: number;

	constructor(private readonly settings: IndicatorSettings) {
		this.warmupCandles = Math.max(
			requiredWarmup(settings),
			settings.warmupCandles ?? 0,
		);
	}

	private key(symbol: string, timeframe: Timeframe): string {
		return `${symbol}:${timeframe}`;
	}

	lastCloseTime(symbol: string, timeframe: Timeframe): number | undefined {
		return this.sets.get(this.key(symbol, timeframe))?.lastCloseTime;
	}

	reset(symbol: string, timeframe: Timeframe): void {
		this.sets.delete(this.key(symbol, timeframe));
	}

	private rejection(
		candle: Candle,
		set: IndicatorSet | undefined,
	): CandleRejection | null {
		if (!candle.closed) return "not_closed";
		if (!isValidCandle(candle)) return "invalid";
		const last = set?.lastCloseTime;
		if (last !== undefined) {
			if (candle.closeTime === last) return "duplicate";
			if (candle.closeTime < last) return "out_of_order";
		}
		return null;
	}

	update(candle: Candle): IndicatorUpdate {
		const key = this.key(candle.symbol, candle.timeframe);
		const existing = this.sets.get(key);
		const reason = this.rejection(candle, existing);
		if (reason) {
			return {
				accepted: false,
				reason,
				lastCloseTime: existing?.lastCloseTime,
			};
		}

		const set = existing ?? new IndicatorSet(this.settings);
		if (!existing) this.sets.set(key, set);

		const { high, low, close, volume } = candle;
		set.candlesSeen += 1;
		set.lastCloseTime = candle.closeTime;

		const rsi = set.rsi.update(close);
		const readings = {
			ema: {
				fast: set.emaFast.update(close),
				slow: set.emaSlow.update(close),
				filter: set.emaFilter.update(close),
				trend: set.emaTrend.update(close),
			},
			rsi,
			rsiDivergence: set.divergence.update(high, low, rsi),
			macd: set.macd.update(close),
			adx: set.adx.update(high, low, close),
			supertrend: set.supertrend.update(high, low, close),
			bollinger: set.bollinger.update(close),
			choppiness: set.choppiness.update(high, low, close),
			volumeZScore: set.volume.update(volume),
			atr: set.atr.update(high, low, close),
			rangePct: set.range.update(high, low),
		};

		const warm = set.candlesSeen >= this.warmupCandles;
		const gate = <T>(reading: Reading<T>): Reading<T> =>
			warm ? reading : warmingUp;

		const snapshot: IndicatorSnapshot = {
			symbol: candle.symbol,
			timeframe: candle.timeframe,
			closeTime: candle.closeTime,
			open: candle.open,
			high,
			low,
			close,
			volume,
			candlesSeen: set.candlesSeen,
			ready: false,
			ema: Object.freeze({
				fast: gate(readings.ema.fast),
				slow: gate(readings.ema.slow),
				filter: gate(readings.ema.filter),
				trend: gate(readings.ema.trend),
			}),
			rsi: gate(readings.rsi),
			rsiDivergence: gate(readings.rsiDivergence),
			macd: gate(readings.macd),
			adx: gate(readings.adx),
			supertrend: gate(readings.supertrend),
			bollinger: gate(readings.bollinger),
			choppiness: gate(readings.choppiness),
			volumeZScore: gate(readings.volumeZScore),
			atr: gate(readings.atr),
			rangePct: gate(readings.rangePct),
		};
		snapshot.ready =
			Object.values(snapshot.ema).every((r) => r.ready) &&
			[
				snapshot.rsi,
				snapshot.rsiDivergence,
				snapshot.macd,
				snapshot.adx,
				snapshot.supertrend,
				snapshot.bollinger,
				snapshot.choppiness,
				snapshot.volumeZScore,
				snapshot.atr,
				snapshot.rangePct,
			].every((r) => r.ready);

		return { accepted: true, snapshot: Object.freeze(snapshot) };
	}
}
