type LookbackSettings = {
	ema: { fast: number; slow: number; filter: number; trend: number };
	rsi: { period: number };
	macd: { slow: number; signal: number };
	adx: { period: number };
	supertrend: { atrPeriod: number };
	bollinger: { period: number };
	choppiness: { period: number };
	volume: { period: number };
	atr: { period: number };
	sideways: { period: number };
};

/** Candles each indicator needs before its first reading. */
export function indicatorLookbacks(settings: LookbackSettings) {
	return {
		ema: Math.max(
			settings.ema.fast,
			settings.ema.slow,
			settings.ema.filter,
			settings.ema.trend,
		),
		rsi: settings.rsi.period + 1,
		macd: settings.macd.slow + settings.macd.signal - 1,
		adx: settings.adx.period * 2,
		supertrend: settings.supertrend.atrPeriod + 1,
		bollinger: settings.bollinger.period,
		choppiness: settings.choppiness.period + 1,
		volume: settings.volume.period,
		atr: settings.atr.period + 1,
		sideways: settings.sideways.period,
	};
}

export function requiredWarmup(settings: LookbackSettings): number {
	return Math.max(...Object.values(indicatorLookbacks(settings)));
}
