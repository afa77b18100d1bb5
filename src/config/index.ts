import dotenv from "dotenv";
import type { ZodIssue } from "zod";
import { type AgentConfig, agentConfigSchema } from "./schema";

export * from "./schema";

export class ConfigError extends Error {
	constructor(readonly issues: string[]) {
		super(`Invalid configuration:\n${issues.join("\n")}`);
		this.name = "ConfigError";
	}
}

type Env = Record<string, string | undefined>;

function list(value: string | undefined): string[] | undefined {
	if (!value) return undefined;
	const items = value
		.split(",")
		.map((item) => item.trim())
		.filter(Boolean);
	return items.length ? items : undefined;
}

function flag(value: string | undefined): boolean | undefined {
	if (value === undefined || value === "") return undefined;
	return value.toLowerCase() === "true";
}

function json(name: string, value: string | undefined): unknown {
	if (!value) return undefined;
	try {
		return JSON.parse(value);
	} catch {
		throw new ConfigError([`${name}: must be valid JSON`]);
	}
}

function formatIssue(issue: ZodIssue): string {
	const where = issue.path.length ? issue.path.join(".") : "(root)";
	return `${where}: ${issue.message}`;
}

function withoutEmpty(env: Env): Env {
	return Object.fromEntries(
		Object.entries(env).filter(([, value]) => value !== ""),
	);
}

/** Maps environment variables onto the config shape; unset keys fall back to schema defaults. */
export function configFromEnv(source: Env): Record<string, unknown> {
	const env = withoutEmpty(source);
	return {
		mode: env.MODE || undefined,
		symbols: list(env.SYMBOLS)?.map((s) => s.toUpperCase()),
		timeframes: {
			primary: env.PRIMARY_TIMEFRAME,
			confirm:
				source.CONFIRM_TIMEFRAMES === "" ? [] : list(env.CONFIRM_TIMEFRAMES),
		},
		indicators: {
			warmupCandles: env.WARMUP_CANDLES,
			adx: { threshold: env.ADX_THRESHOLD },
			sideways: {
				period: env.SIDEWAYS_PERIOD,
				thresholdPct: env.SIDEWAYS_THRESHOLD,
			},
		},
		signals: {
			threshold: env.SIGNAL_THRESHOLD,
			weights: json("SIGNAL_WEIGHTS", env.SIGNAL_WEIGHTS),
			patternWeights: json("PATTERN_WEIGHTS", env.PATTERN_WEIGHTS),
			vetoChoppy: flag(env.VETO_CHOPPY),
			vetoSideways: flag(env.VETO_SIDEWAYS),
			cooldownSeconds: env.TRADE_COOLDOWN,
		},
		news: {
			enabled: flag(env.NEWS_FILTER_ENABLED),
			bufferBeforeMinutes: env.NEWS_BUFFER_BEFORE,
			bufferAfterMinutes: env.NEWS_BUFFER_AFTER,
			events: json("NEWS_EVENTS", env.NEWS_EVENTS),
			windows: json("NEWS_WINDOWS", env.NEWS_WINDOWS),
		},
		risk: {
			stopLossAtr: env.STOPLOSS_ATR,
			takeProfitAtr: env.TAKEPROFIT_ATR,
			trailing: {
				enabled: flag(env.TRAILING_ENABLED),
				activationAtr: env.TRAILING_ACTIVATION_ATR,
				distanceAtr: env.TRAILING_DISTANCE_ATR,
				stepAtr: env.TRAILING_STEP_ATR,
			},
			breakeven: {
				enabled: flag(env.BREAKEVEN_ENABLED),
				triggerAtr: env.BREAKEVEN_TRIGGER_ATR,
				bufferAtr: env.BREAKEVEN_BUFFER_ATR,
			},
			partialProfits: {
				enabled: flag(env.PARTIAL_PROFITS_ENABLED),
				levels: json("PARTIAL_LEVELS", env.PARTIAL_LEVELS),
			},
			reversalExit: flag(env.REVERSAL_EXIT_ENABLED),
			maxHoldingHours: env.MAX_HOLDING_HOURS,
			orderTimeoutMs: env.ORDER_TIMEOUT_MS,
		},
		sizing: {
			defaultMarginPercent: env.MARGIN_PERCENT,
			marginStepPercent: env.MARGIN_STEP_PERCENT,
			minMarginPercent: env.MIN_MARGIN_PERCENT,
			defaultLeverage: env.DEFAULT_LEVERAGE,
			maxLeverage: env.MAX_LEVERAGE,
			minOrderValue: env.MIN_ORDER_VALUE,
			lossScope: env.SIZING_LOSS_SCOPE || undefined,
		},
		simulation: {
			startingBalance: env.SIM_STARTING_BALANCE,
			slippageBps: env.SIM_SLIPPAGE_BPS,
		},
		binance: {
			apiKey: env.BINANCE_API_KEY,
			apiSecret: env.BINANCE_API_SECRET,
			useTestnet: flag(env.BINANCE_USE_TESTNET),
			quoteAsset: env.QUOTE_ASSET,
		},
		telegram: {
			botToken: env.TELEGRAM_BOT_TOKEN,
			chatIds: list(env.TELEGRAM_CHAT_ID),
		},
		scheduling: {
			statusCron: env.STATUS_CRON,
			timezone: env.TIMEZONE,
		},
	};
}

export function parseConfig(input: unknown): AgentConfig {
	const result = agentConfigSchema.safeParse(input);
	if (!result.success) {
		throw new ConfigError(result.error.issues.map(formatIssue));
	}
	return result.data;
}

/** Reads `.env` and the process environment. Throws ConfigError on any invalid value. */
export function loadConfig(env: Env = process.env): AgentConfig {
	dotenv.config();
	return parseConfig(configFromEnv(env));
}
