export type Timeframe =
	| "1m"
	| "3m"
	| "5m"
	| "15m"
	| "30m"
	| "1h"
	| "2h"
	| "4h"
	| "6h"
	| "12h"
	| "1d";

export type Candle = {
	symbol: string;
	timeframe: Timeframe;
	openTime: number;
	closeTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	closed: boolean;
};

/** An indicator value that is either computed or still warming up. */
export type Reading<T> = { ready: true; value: T } | { ready: false };

export type MacdValue = { line: number; signal: number; histogram: number };

export type AdxValue = { adx: number; plusDi: number; minusDi: number };

export type TrendDirection = "up" | "down";

export type SupertrendValue = { value: number; direction: TrendDirection };

export type BollingerValue = {
	upper: number;
	basis: number;
	lower: number;
	widthPct: number;
};

export type Divergence = { bullish: boolean; bearish: boolean };

export type IndicatorSnapshot = {
	symbol: string;
	timeframe: Timeframe;
	closeTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	candlesSeen: number;
	ready: boolean;
	ema: {
		fast: Reading<number>;
		slow: Reading<number>;
		filter: Reading<number>;
		trend: Reading<number>;
	};
	rsi: Reading<number>;
	rsiDivergence: Reading<Divergence>;
	macd: Reading<MacdValue>;
	adx: Reading<AdxValue>;
	supertrend: Reading<SupertrendValue>;
	bollinger: Reading<BollingerValue>;
	choppiness: Reading<number>;
	volumeZScore: Reading<number>;
	atr: Reading<number>;
	/** High-low range over the sideways period, as % of its midpoint. */
	rangePct: Reading<number>;
};

export type CandleRejection = "not_closed" | "duplicate" | "out_of_order" | "invalid";

export type IndicatorUpdate =
	| { accepted: true; snapshot: IndicatorSnapshot }
	| { accepted: false; reason: CandleRejection; lastCloseTime?: number };

export type PatternType =
	| "bullish_engulfing"
	| "bearish_engulfing"
	| "hammer"
	| "shooting_star"
	| "morning_doji_star"
	| "evening_doji_star";

export type Direction = "long" | "short";

export type VoteDirection = Direction | "none";

export type PatternFlag = {
	pattern: PatternType;
	bias: Direction;
	closeTime: number;
};

export type SrProximity = {
	nearSupport: boolean;
	nearResistance: boolean;
	support?: number;
	resistance?: number;
};

export type FilterName =
	| "emaTrend"
	| "emaStack"
	| "ema200"
	| "rsi"
	| "rsiDivergence"
	| "macd"
	| "adx"
	| "supertrend"
	| "bollinger"
	| "choppiness"
	| "volume";

export type Lean = VoteDirection;

export type FilterLean = {
	filter: FilterName | PatternType;
	lean: Lean;
	weight: number;
};

export type Veto =
	| "news_blackout"
	| "near_resistance"
	| "near_support"
	| "choppy_market"
	| "sideways_market"
	| "volatility_out_of_range";

export type SignalVote = {
	symbol: string;
	timeframe: Timeframe;
	closeTime: number;
	direction: VoteDirection;
	confidence: number;
	ready: boolean;
	net: number;
	contributing: string[];
	leans: FilterLean[];
	vetoes: Veto[];
};

export type TradeSide = "BUY" | "SELL";

export type PositionStatus =
	| "FLAT"
	| "ENTERING"
	| "OPEN"
	| "PARTIALLY_CLOSED"
	| "CLOSING";

export type PartialExit = {
	level: number;
	price: number;
	quantity: number;
	pnl: number;
	closedAt: number;
};

export type TrailingState = {
	active: boolean;
	bestPrice: number;
};

export type Position = {
	id: string;
	symbol: string;
	side: TradeSide;
	entryPrice: number;
	quantity: number;
	initialQuantity: number;
	leverage: number;
	marginPercent: number;
	atrAtEntry: number;
	stopPrice: number;
	takeProfitPrice: number;
	trailing: TrailingState;
	breakevenApplied: boolean;
	partialExits: PartialExit[];
	realizedPnl: number;
	openedAt: number;
	protectionSynced: boolean;
};

export type ExitReason =
	| "stop_loss"
	| "take_profit"
	| "partial_profit"
	| "time_exit"
	| "reversal_exit"
	| "venue_close";

export type TradeOutcome = {
	positionId: string;
	symbol: string;
	side: TradeSide;
	kind: "partial" | "final";
	quantity: number;
	entryPrice: number;
	exitPrice: number;
	pnl: number;
	/** Realized P&L of the whole position so far, partials included. */
	positionPnl: number;
	reason: ExitReason;
	closedAt: number;
};

export type SizingState = {
	consecutiveLosses: number;
	marginPercent: number;
	leverage: number;
};

export type SizingDecision =
	| {
			status: "ok";
			marginPercent: number;
			leverage: number;
			margin: number;
			notional: number;
	  }
	| {
			status: "insufficient";
			marginPercent: number;
			leverage: number;
			margin: number;
			notional: number;
	  };

export type EntryIntent = {
	kind: "entry";
	intentId: string;
	symbol: string;
	side: TradeSide;
	quantity: number;
	leverage: number;
	referencePrice: number;
};

export type ProtectionIntent = {
	kind: "protection";
	intentId: string;
	symbol: string;
	side: TradeSide;
	quantity: number;
	stopPrice: number;
	takeProfitPrice: number;
};

export type PartialCloseIntent = {
	kind: "partial_close";
	intentId: string;
	symbol: string;
	side: TradeSide;
	quantity: number;
	referencePrice: number;
};

export type CloseIntent = {
	kind: "close";
	intentId: string;
	symbol: string;
	side: TradeSide;
	quantity: number;
	referencePrice: number;
};

export type OrderIntent =
	| EntryIntent
	| ProtectionIntent
	| PartialCloseIntent
	| CloseIntent;

export type ExecutionReport =
	| { intentId: string; status: "FILLED"; price: number; quantity: number }
	| { intentId: string; status: "ACKNOWLEDGED" }
	| { intentId: string; status: "REJECTED"; reason: string };

/** Order-execution collaborator. Duplicate intent ids must be idempotent. */
export interface OrderExecutor {
	submit(intent: OrderIntent): Promise<ExecutionReport>;
	cancel(symbol: string, intentId: string): Promise<void>;
	/** Current venue state of an intent's order. */
	lookup(symbol: string, intentId: string): Promise<ExecutionReport>;
	availableBalance(): Promise<number>;
}

export type VenueCloseEvent = {
	type: "venue_close";
	symbol: string;
	price: number;
	quantity: number;
	at: number;
};

export type FeedEvent =
	| { type: "candle"; candle: Candle }
	| { type: "gap"; symbol: string; timeframe: Timeframe; at: number }
	| VenueCloseEvent;

export type TransitionRecord = {
	symbol: string;
	from: PositionStatus;
	to: PositionStatus;
	reason: string;
	at: number;
	positionId?: string;
	details?: Record<string, number | string | boolean>;
};

export type DiagnosticKind = "data" | "venue" | "sizing" | "internal";

export type Diagnostic = {
	symbol: string;
	kind: DiagnosticKind;
	message: string;
	at: number;
	details?: Record<string, number | string | boolean | undefined>;
};

export type DecisionRecord = {
	symbol: string;
	timeframe: Timeframe;
	closeTime: number;
	accepted: boolean;
	rejection?: CandleRejection;
	snapshotReady: boolean;
	patterns: PatternType[];
	srProximity?: SrProximity;
	newsBlackout: boolean;
	vote?: SignalVote;
	confirmed: VoteDirection;
	/** Set while new entries are held back by the cooldown after the last one. */
	cooldownUntil?: number;
	positionStatus: PositionStatus;
	transitions: string[];
};

export type AgentRecord =
	| { type: "decision"; record: DecisionRecord }
	| { type: "transition"; record: TransitionRecord }
	| { type: "outcome"; record: TradeOutcome }
	| { type: "diagnostic"; record: Diagnostic };

/** Trading rules of a futures symbol, taken from exchange info. */
export type SymbolMeta = {
	symbol: string;
	quoteAsset: string;
	status: string;
	stepSize?: number;
	tickSize?: number;
	minNotional?: number;
};
