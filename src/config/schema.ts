import { z } from "zod";
import { requiredWarmup } from "../indicators/warmup";

export const timeframeSchema = z.enum([
	"1m",
	"3m",
	"5m",
	"15m",
	"30m",
	"1h",
	"2h",
	"4h",
	"6h",
	"12h",
	"1d",
]);

const positive = z.coerce.number().positive();
const nonNegative = z.coerce.number().min(0);
const period = z.coerce.number().int().min(1);

const emaSchema = z
	.object({
		fast: period.default(9),
		slow: period.default(21),
		filter: period.default(50),
		trend: period.default(200),
	})
	.default({});

export const indicatorSettingsSchema = z
	.object({
		ema: emaSchema,
		rsi: z
			.object({
				period: period.default(14),
				overbought: z.coerce.number().min(50).max(100).default(70),
				oversold: z.coerce.number().min(0).max(50).default(30),
				divergenceLookback: period.default(5),
				divergenceWindow: period.default(60),
			})
			.default({}),
		macd: z
			.object({
				fast: period.default(12),
				slow: period.default(26),
				signal: period.default(9),
			})
			.default({}),
		adx: z
			.object({
				period: period.default(14),
				threshold: nonNegative.default(25),
			})
			.default({}),
		supertrend: z
			.object({
				atrPeriod: period.default(10),
				multiplier: positive.default(3),
			})
			.default({}),
		bollinger: z
			.object({
				period: period.default(20),
				stdDev: positive.default(2),
				minWidthPct: nonNegative.default(2),
			})
			.default({}),
		choppiness: z
			.object({
				period: z.coerce.number().int().min(2).default(14),
				threshold: z.coerce.number().min(0).max(100).default(61.8),
			})
			.default({}),
		volume: z
			.object({
				period: z.coerce.number().int().min(2).default(20),
				zThreshold: positive.default(2),
			})
			.default({}),
		atr: z.object({ period: period.default(14) }).default({}),
		sideways: z
			.object({
				period: z.coerce.number().int().min(2).default(20),
				/** High-low range, as % of its midpoint, below which the market is sideways. */
				thresholdPct: positive.default(1.5),
			})
			.default({}),
		/** Defaults to the longest lookback; may only be raised. */
		warmupCandles: z.coerce.number().int().positive().optional(),
	})
	.default({});

const filterWeightsSchema = z
	.object({
		emaTrend: nonNegative.default(1),
		emaStack: nonNegative.default(1),
		ema200: nonNegative.default(1),
		rsi: nonNegative.default(1),
		rsiDivergence: nonNegative.default(1),
		macd: nonNegative.default(1),
		adx: nonNegative.default(1),
		supertrend: nonNegative.default(1),
		bollinger: nonNegative.default(1),
		choppiness: nonNegative.default(1),
		volume: nonNegative.default(1),
	})
	.default({});

const patternWeightsSchema = z
	.object({
		bullish_engulfing: nonNegative.default(1),
		bearish_engulfing: nonNegative.default(1),
		hammer: nonNegative.default(0.5),
		shooting_star: nonNegative.default(0.5),
		morning_doji_star: nonNegative.default(1),
		evening_doji_star: nonNegative.default(1),
	})
	.default({});

export const signalSettingsSchema = z
	.object({
		threshold: positive.default(4),
		weights: filterWeightsSchema,
		patternWeights: patternWeightsSchema,
		supportResistance: z
			.object({
				enabled: z.boolean().default(true),
				lookback: z.coerce.number().int().min(2).default(50),
				tolerancePct: nonNegative.default(0.5),
			})
			.default({}),
		vetoChoppy: z.boolean().default(true),
		vetoSideways: z.boolean().default(true),
		/** Minimum time between two entry attempts on one symbol. */
		cooldownSeconds: nonNegative.default(300),
		volatility: z
			.object({
				enabled: z.boolean().default(true),
				minAtrPct: nonNegative.default(0.1),
				maxAtrPct: positive.default(5),
			})
			.default({}),
	})
	.default({});

const newsEventSchema = z.object({
	name: z.string().min(1),
	month: z.coerce.number().int().min(1).max(12),
	day: z.coerce.number().int().min(1).max(31),
	hour: z.coerce.number().int().min(0).max(23),
	minute: z.coerce.number().int().min(0).max(59),
});

const newsWindowSchema = z.object({
	name: z.string().min(1),
	start: z.coerce.date(),
	end: z.coerce.date(),
});

export const newsSettingsSchema = z
	.object({
		enabled: z.boolean().default(true),
		bufferBeforeMinutes: nonNegative.default(30),
		bufferAfterMinutes: nonNegative.default(30),
		events: z.array(newsEventSchema).default([]),
		windows: z.array(newsWindowSchema).default([]),
	})
	.default({});

const partialLevelSchema = z.object({
	atr: positive,
	fraction: z.coerce.number().gt(0).lt(1),
});

export const riskSettingsSchema = z
	.object({
		stopLossAtr: positive.default(1.5),
		takeProfitAtr: positive.default(3),
		trailing: z
			.object({
				enabled: z.boolean().default(true),
				activationAtr: nonNegative.default(1),
				distanceAtr: positive.default(1.2),
				stepAtr: nonNegative.default(0.1),
			})
			.default({}),
		breakeven: z
			.object({
				enabled: z.boolean().default(true),
				triggerAtr: positive.default(1.5),
				bufferAtr: nonNegative.default(0),
			})
			.default({}),
		partialProfits: z
			.object({
				enabled: z.boolean().default(true),
				levels: z.array(partialLevelSchema).default([
					{ atr: 1.5, fraction: 0.5 },
					{ atr: 2.5, fraction: 0.25 },
				]),
			})
			.default({}),
		reversalExit: z.boolean().default(true),
		/** 0 disables the time-based exit. */
		maxHoldingHours: nonNegative.default(0),
		orderTimeoutMs: z.coerce.number().int().positive().default(15_000),
	})
	.default({});

export const sizingSettingsSchema = z
	.object({
		defaultMarginPercent: z.coerce.number().gt(0).max(100).default(5),
		marginStepPercent: nonNegative.default(1),
		minMarginPercent: z.coerce.number().gt(0).max(100).default(2),
		defaultLeverage: z.coerce.number().int().min(1).default(5),
		maxLeverage: z.coerce.number().int().min(1).max(125).default(20),
		minOrderValue: nonNegative.default(8),
		lossScope: z.enum(["symbol", "global"]).default("symbol"),
		historyLimit: z.coerce.number().int().min(1).default(50),
	})
	.default({});

export const agentConfigSchema = z
	.object({
		mode: z.enum(["simulate", "execute"]).default("simulate"),
		symbols: z.array(z.string().min(1)).min(1).default(["BTCUSDT"]),
		timeframes: z
			.object({
				primary: timeframeSchema.default("5m"),
				confirm: z.array(timeframeSchema).default(["1h"]),
			})
			.default({}),
		indicators: indicatorSettingsSchema,
		signals: signalSettingsSchema,
		news: newsSettingsSchema,
		risk: riskSettingsSchema,
		sizing: sizingSettingsSchema,
		simulation: z
			.object({
				startingBalance: positive.default(1000),
				slippageBps: nonNegative.default(0),
			})
			.default({}),
		binance: z
			.object({
				apiKey: z.string().default(""),
				apiSecret: z.string().default(""),
				useTestnet: z.boolean().default(true),
				quoteAsset: z.string().default("USDT"),
			})
			.default({}),
		telegram: z
			.object({
				botToken: z.string().default(""),
				chatIds: z.array(z.string()).default([]),
			})
			.default({}),
		scheduling: z
			.object({
				statusCron: z.string().default("*/5 * * * *"),
				timezone: z.string().default("UTC"),
			})
			.default({}),
	})
	.superRefine((cfg, ctx) => {
		const { sizing, risk, timeframes, indicators, signals } = cfg;

		if (sizing.defaultLeverage > sizing.maxLeverage) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["sizing", "defaultLeverage"],
				message: "Default leverage cannot exceed the maximum",
			});
		}
		if (sizing.minMarginPercent > sizing.defaultMarginPercent) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["sizing", "minMarginPercent"],
				message: "Minimum margin percent cannot exceed the default",
			});
		}

		const levels = risk.partialProfits.levels;
		const fractionSum = levels.reduce((sum, level) => sum + level.fraction, 0);
		if (risk.partialProfits.enabled && fractionSum >= 1) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["risk", "partialProfits", "levels"],
				message: "Partial-profit fractions must sum to less than 1",
			});
		}
		levels.forEach((level, index) => {
			const previous = levels[index - 1];
			if (previous && level.atr <= previous.atr) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["risk", "partialProfits", "levels", index],
					message: "Partial-profit levels must be strictly increasing",
				});
			}
			if (risk.partialProfits.enabled && level.atr >= risk.takeProfitAtr) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["risk", "partialProfits", "levels", index],
					message: "Partial-profit levels must lie before the take profit",
				});
			}
		});

		if (timeframes.confirm.includes(timeframes.primary)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["timeframes", "confirm"],
				message: "Confirmation timeframes must differ from the primary timeframe",
			});
		}

		const minimumWarmup = requiredWarmup(indicators);
		if (
			indicators.warmupCandles !== undefined &&
			indicators.warmupCandles < minimumWarmup
		) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["indicators", "warmupCandles"],
				message: `Warm-up must cover the longest indicator lookback (${minimumWarmup} candles)`,
			});
		}

		const { ema, macd } = indicators;
		if (ema.fast >= ema.slow) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["indicators", "ema", "fast"],
				message: "Fast EMA period must be shorter than the slow period",
			});
		}
		if (macd.fast >= macd.slow) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["indicators", "macd", "fast"],
				message: "MACD fast period must be shorter than the slow period",
			});
		}

		if (signals.volatility.minAtrPct >= signals.volatility.maxAtrPct) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["signals", "volatility"],
				message: "Volatility band minimum must be below its maximum",
			});
		}

		cfg.news.windows.forEach((window, index) => {
			if (window.end <= window.start) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["news", "windows", index],
					message: "News window must end after it starts",
				});
			}
		});

		if (
			cfg.mode === "execute" &&
			(!cfg.binance.apiKey || !cfg.binance.apiSecret)
		) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["binance", "apiKey"],
				message: "Binance API credentials are required in execute mode",
			});
		}
	});

export type AgentConfigInput = z.input<typeof agentConfigSchema>;
export type AgentConfig = z.infer<typeof agentConfigSchema>;
export type IndicatorSettings = AgentConfig["indicators"];
export type SignalSettings = AgentConfig["signals"];
export type NewsSettings = AgentConfig["news"];
export type RiskSettings = AgentConfig["risk"];
export type SizingSettings = AgentConfig["sizing"];
