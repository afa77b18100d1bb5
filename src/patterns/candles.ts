import type { Candle, Direction, PatternFlag, PatternType } from "../types";

type Ohlc = Pick<Candle, "open" | "high" | "low" | "close">;

const bodyOf = (c: Ohlc) => Math.abs(c.close - c.open);
const rangeOf = (c: Ohlc) => c.high - c.low;
const isBull = (c: Ohlc) => c.close > c.open;
const isBear = (c: Ohlc) => c.close < c.open;

const BIAS: Record<PatternType, Direction> = {
	bullish_engulfing: "long",
	bearish_engulfing: "short",
	hammer: "long",
	shooting_star: "short",
	morning_doji_star: "long",
	evening_doji_star: "short",
};

export function detectEngulfing(candles: Ohlc[]): PatternType | null {
	if (candles.length < 2) return null;
	const [prev, curr] = candles.slice(-2);

	const prevBodyTop = Math.max(prev.open, prev.close);
	const prevBodyBottom = Math.min(prev.open, prev.close);
	const currBodyTop = Math.max(curr.open, curr.close);
	const currBodyBottom = Math.min(curr.open, curr.close);

	const currEngulfsPrev =
		currBodyTop >= prevBodyTop && currBodyBottom <= prevBodyBottom;

	if (isBear(prev) && isBull(curr) && currEngulfsPrev) {
		return "bullish_engulfing";
	}
	if (isBull(prev) && isBear(curr) && currEngulfsPrev) {
		return "bearish_engulfing";
	}

	return null;
}

export function detectHammer(candles: Ohlc[]): PatternType | null {
	if (!candles.length) return null;
	const candle = candles[candles.length - 1];
	const range = rangeOf(candle);
	if (range <= 0) return null;

	const body = bodyOf(candle);
	const upperShadow = candle.high - Math.max(candle.open, candle.close);
	const lowerShadow = Math.min(candle.open, candle.close) - candle.low;

	const longTailMultiplier = 2;
	const shadowShareThreshold = 0.6;

	const hasBottomTail =
		lowerShadow >= longTailMultiplier * body &&
		lowerShadow / range >= shadowShareThreshold;
	const hasTopTail =
		upperShadow >= longTailMultiplier * body &&
		upperShadow / range >= shadowShareThreshold;

	if (hasBottomTail) return "hammer";
	if (hasTopTail) return "shooting_star";

	return null;
}

/** Body under a tenth of the range. */
export function isDoji(candle: Ohlc): boolean {
	const range = rangeOf(candle);
	return range > 0 && bodyOf(candle) < 0.1 * range;
}

/**
 * Three candles: a body one way, a doji, then a body the other way that closes
 * beyond the first candle's close.
 */
export function detectDojiStar(candles: Ohlc[]): PatternType | null {
	if (candles.length < 3) return null;
	const [first, star, third] = candles.slice(-3);
	if (!isDoji(star)) return null;

	if (isBear(first) && isBull(third) && third.close > first.close) {
		return "morning_doji_star";
	}
	if (isBull(first) && isBear(third) && third.close < first.close) {
		return "evening_doji_star";
	}
	return null;
}

/** Every pattern completed by the last candle of `candles`. */
export function detectPatterns(candles: Candle[]): PatternFlag[] {
	if (!candles.length) return [];
	const closeTime = candles[candles.length - 1].closeTime;
	return [detectEngulfing(candles), detectHammer(candles), detectDojiStar(candles)]
		.filter((pattern): pattern is PatternType => pattern !== null)
		.map((pattern) => ({ pattern, bias: BIAS[pattern], closeTime }));
}
