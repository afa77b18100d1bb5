import type { IndicatorSettings, SignalSettings } from "../config";
import type {
	FilterLean,
	FilterName,
	IndicatorSnapshot,
	Lean,
	PatternFlag,
	SignalVote,
	SrProximity,
	Veto,
	VoteDirection,
} from "../types";

export type FusionOptions = {
	/** Higher timeframes are fused without vetoes. */
	applyVetoes?: boolean;
};

export const FILTERS: readonly FilterName[] = [
	"emaTrend",
	"emaStack",
	"ema200",
	"rsi",
	"rsiDivergence",
	"macd",
	"adx",
	"supertrend",
	"bollinger",
	"choppiness",
	"volume",
];

const sideOf = (value: number): Lean =>
	value > 0 ? "long" : value < 0 ? "short" : "none";

const sign = (lean: Lean) => (lean === "long" ? 1 : lean === "short" ? -1 : 0);

/** Per-indicator leans; a reading that is not ready leans nowhere. */
export function indicatorLeans(
	s: IndicatorSnapshot,
	settings: IndicatorSettings,
): Record<FilterName, Lean> {
	const { fast, slow, filter, trend } = s.ema;

	let emaStack: Lean = "none";
	if (fast.ready && slow.ready && filter.ready) {
		const values = [s.close, fast.value, slow.value];
		if (values.every((v) => v > filter.value)) emaStack = "long";
		else if (values.every((v) => v < filter.value)) emaStack = "short";
	}

	let rsi: Lean = "none";
	if (s.rsi.ready) {
		const value = s.rsi.value;
		if (value > 50 && value < settings.rsi.overbought) rsi = "long";
		else if (value < 50 && value > settings.rsi.oversold) rsi = "short";
	}

	let rsiDivergence: Lean = "none";
	if (s.rsiDivergence.ready) {
		const { bullish, bearish } = s.rsiDivergence.value;
		if (bullish && !bearish) rsiDivergence = "long";
		else if (bearish && !bullish) rsiDivergence = "short";
	}

	let macd: Lean = "none";
	if (s.macd.ready) {
		const { line, signal, histogram } = s.macd.value;
		if (line > signal && histogram > 0) macd = "long";
		else if (line < signal && histogram < 0) macd = "short";
	}

	let adx: Lean = "none";
	if (s.adx.ready && s.adx.value.adx > settings.adx.threshold) {
		adx = sideOf(s.adx.value.plusDi - s.adx.value.minusDi);
	}

	const supertrend: Lean = s.supertrend.ready
		? s.supertrend.value.direction === "up"
			? "long"
			: "short"
		: "none";

	let bollinger: Lean = "none";
	if (
		s.bollinger.ready &&
		s.bollinger.value.widthPct > settings.bollinger.minWidthPct
	) {
		bollinger = sideOf(s.close - s.bollinger.value.basis);
	}

	const choppiness: Lean =
		s.choppiness.ready && s.choppiness.value < settings.choppiness.threshold
			? supertrend
			: "none";

	let volume: Lean = "none";
	if (s.volumeZScore.ready && s.volumeZScore.value >= settings.volume.zThreshold) {
		volume = sideOf(s.close - s.open);
	}

	return {
		emaTrend: fast.ready && slow.ready ? sideOf(fast.value - slow.value) : "none",
		emaStack,
		ema200: trend.ready ? sideOf(s.close - trend.value) : "none",
		rsi,
		rsiDivergence,
		macd,
		adx,
		supertrend,
		bollinger,
		choppiness,
		volume,
	};
}

export class SignalFusion {
	constructor(
		private readonly signals: SignalSettings,
		private readonly indicators: IndicatorSettings,
	) {}

	private vetoes(
		snapshot: IndicatorSnapshot,
		candidate: VoteDirection,
		sr: SrProximity | undefined,
		newsBlackout: boolean,
	): Veto[] {
		const vetoes: Veto[] = [];
		if (newsBlackout) vetoes.push("news_blackout");

		if (this.signals.supportResistance.enabled && sr) {
			if (candidate === "long" && sr.nearResistance) vetoes.push("near_resistance");
			if (candidate === "short" && sr.nearSupport) vetoes.push("near_support");
		}

		if (
			this.signals.vetoChoppy &&
			snapshot.choppiness.ready &&
			snapshot.choppiness.value > this.indicators.choppiness.threshold
		) {
			vetoes.push("choppy_market");
		}

		if (
			this.signals.vetoSideways &&
			snapshot.rangePct.ready &&
			snapshot.rangePct.value < this.indicators.sideways.thresholdPct
		) {
			vetoes.push("sideways_market");
		}

		const { volatility } = this.signals;
		if (volatility.enabled && snapshot.atr.ready && snapshot.close > 0) {
			const atrPct = (snapshot.atr.value / snapshot.close) * 100;
			if (atrPct < volatility.minAtrPct || atrPct > volatility.maxAtrPct) {
				vetoes.push("volatility_out_of_range");
			}
		}
		return vetoes;
	}

	fuse(
		snapshot: IndicatorSnapshot,
		patterns: PatternFlag[],
		sr: SrProximity | undefined,
		newsBlackout: boolean,
		options: FusionOptions = {},
	): SignalVote {
		const { weights, patternWeights, threshold } = this.signals;
		const byFilter = indicatorLeans(snapshot, this.indicators);

		const leans: FilterLean[] = [];
		let indicatorNet = 0;
		let totalWeight = 0;
		for (const filter of FILTERS) {
			const lean = byFilter[filter];
			const weight = weights[filter];
			totalWeight += weight;
			indicatorNet += sign(lean) * weight;
			leans.push({ filter, lean, weight });
		}

		let net = indicatorNet;
		for (const flag of patterns) {
			const weight = patternWeights[flag.pattern];
			net += sign(flag.bias) * weight;
			leans.push({ filter: flag.pattern, lean: flag.bias, weight });
		}

		let candidate: VoteDirection = "none";
		if (
			snapshot.ready &&
			net !== 0 &&
			Math.abs(net) >= threshold &&
			Math.sign(indicatorNet) === Math.sign(net)
		) {
			candidate = net > 0 ? "long" : "short";
		}

		const vetoes =
			options.applyVetoes === false
				? []
				: this.vetoes(snapshot, candidate, sr, newsBlackout);
		const direction: VoteDirection = vetoes.length ? "none" : candidate;

		return {
			symbol: snapshot.symbol,
			timeframe: snapshot.timeframe,
			closeTime: snapshot.closeTime,
			direction,
			confidence:
				totalWeight > 0 ? Math.min(1, Math.abs(net) / totalWeight) : 0,
			ready: snapshot.ready,
			net,
			contributing:
				direction === "none"
					? []
					: leans
							.filter((l) => l.lean === direction && l.weight > 0)
							.map((l) => l.filter),
			leans,
			vetoes,
		};
	}
}
