import { parseConfig } from "../../config";
import type { AgentConfig } from "../../config";
import { FILTERS } from "../../signals/fusion";
import type {
	Candle,
	ExecutionReport,
	FilterName,
	IndicatorSnapshot,
	OrderExecutor,
	OrderIntent,
	SignalVote,
	Timeframe,
	VoteDirection,
} from "../../types";

export const FIVE_MINUTES = 300_000;

type Bar = Pick<Candle, "open" | "high" | "low" | "close">;

export function candleAt(
	index: number,
	bar: Bar,
	overrides: Partial<Candle> = {},
): Candle {
	const openTime = index * FIVE_MINUTES;
	return {
		symbol: "BTCUSDT",
		timeframe: "5m",
		openTime,
		closeTime: openTime + FIVE_MINUTES - 1,
		volume: 10,
		closed: true,
		...bar,
		...overrides,
	};
}

/** close = start + i; open half a point lower; high half a point above the close. */
export function risingCandle(index: number, start = 100, overrides: Partial<Candle> = {}): Candle {
	const close = start + index;
	return candleAt(
		index,
		{ open: close - 0.5, high: close + 0.5, low: close - 1, close },
		overrides,
	);
}

export function risingSeries(count: number, start = 100, overrides: Partial<Candle> = {}): Candle[] {
	return Array.from({ length: count }, (_, i) => risingCandle(i, start, overrides));
}

export function testConfig(input: Record<string, unknown> = {}): AgentConfig {
	return parseConfig(input);
}

export function onlyWeights(
	weights: Partial<Record<FilterName, number>>,
): Record<FilterName, number> {
	const result: Partial<Record<FilterName, number>> = {};
	for (const filter of FILTERS) result[filter] = weights[filter] ?? 0;
	return parseConfig({ signals: { weights: result } }).signals.weights;
}

/** Every reading ready and leaning long. */
export function bullishSnapshot(overrides: Partial<IndicatorSnapshot> = {}): IndicatorSnapshot {
	return {
		symbol: "BTCUSDT",
		timeframe: "5m",
		closeTime: FIVE_MINUTES - 1,
		open: 104,
		high: 106.5,
		low: 103.5,
		close: 106,
		volume: 50,
		candlesSeen: 250,
		ready: true,
		ema: {
			fast: { ready: true, value: 105 },
			slow: { ready: true, value: 103 },
			filter: { ready: true, value: 101 },
			trend: { ready: true, value: 95 },
		},
		rsi: { ready: true, value: 60 },
		rsiDivergence: { ready: true, value: { bullish: true, bearish: false } },
		macd: { ready: true, value: { line: 1, signal: 0.5, histogram: 0.5 } },
		adx: { ready: true, value: { adx: 30, plusDi: 25, minusDi: 10 } },
		supertrend: { ready: true, value: { value: 100, direction: "up" } },
		bollinger: {
			ready: true,
			value: { upper: 110, basis: 102, lower: 94, widthPct: 15.7 },
		},
		choppiness: { ready: true, value: 40 },
		volumeZScore: { ready: true, value: 2.5 },
		atr: { ready: true, value: 1 },
		rangePct: { ready: true, value: 5 },
		...overrides,
	};
}

export function voteOf(
	timeframe: Timeframe,
	direction: VoteDirection,
	ready = true,
): SignalVote {
	return {
		symbol: "BTCUSDT",
		timeframe,
		closeTime: 0,
		direction,
		confidence: direction === "none" ? 0 : 1,
		ready,
		net: direction === "long" ? 5 : direction === "short" ? -5 : 0,
		contributing: [],
		leans: [],
		vetoes: [],
	};
}

export type Handler = (intent: OrderIntent) => ExecutionReport | Promise<ExecutionReport>;

/** Fills market intents at their reference price and acknowledges protection. */
export const fillEverything: Handler = (intent) => {
	if (intent.kind === "protection") {
		return { intentId: intent.intentId, status: "ACKNOWLEDGED" };
	}
	return {
		intentId: intent.intentId,
		status: "FILLED",
		price: intent.referencePrice,
		quantity: intent.quantity,
	};
};

export class FakeExecutor implements OrderExecutor {
	readonly submitted: OrderIntent[] = [];
	readonly cancelled: string[] = [];
	readonly lookedUp: string[] = [];
	/** What a lookup finds; by default the order is gone. */
	lookupReport: ((intentId: string) => ExecutionReport) | null = null;
	balance = 1000;
	balanceError: Error | null = null;

	constructor(public handler: Handler = fillEverything) {}

	async submit(intent: OrderIntent): Promise<ExecutionReport> {
		this.submitted.push(intent);
		return this.handler(intent);
	}

	async cancel(_symbol: string, intentId: string): Promise<void> {
		this.cancelled.push(intentId);
	}

	async lookup(_symbol: string, intentId: string): Promise<ExecutionReport> {
		this.lookedUp.push(intentId);
		if (this.lookupReport) return this.lookupReport(intentId);
		return { intentId, status: "REJECTED", reason: "CANCELED" };
	}

	async availableBalance(): Promise<number> {
		if (this.balanceError) throw this.balanceError;
		return this.balance;
	}

	ofKind<K extends OrderIntent["kind"]>(kind: K): Extract<OrderIntent, { kind: K }>[] {
		return this.submitted.filter(
			(intent): intent is Extract<OrderIntent, { kind: K }> => intent.kind === kind,
		);
	}
}

export function sequentialIds(prefix = "intent"): () => string {
	let next = 0;
	return () => `${prefix}-${++next}`;
}
