import type { AgentConfig } from "../config";
import { IndicatorEngine } from "../indicators/engine";
import { detectPatterns } from "../patterns/candles";
import { PositionMachine } from "../risk/positionMachine";
import type { MachineStep } from "../risk/positionMachine";
import type { SizingController } from "../risk/sizing";
import { confirm } from "../signals/confirmation";
import { SignalFusion } from "../signals/fusion";
import { isNewsBlackout } from "../signals/newsFilter";
import { reversalTriggers } from "../signals/reversal";
import { SupportResistance } from "../signals/supportResistance";
import type {
	AgentRecord,
	Candle,
	DecisionRecord,
	Diagnostic,
	FeedEvent,
	IndicatorSnapshot,
	OrderExecutor,
	Position,
	PositionStatus,
	SignalVote,
	Timeframe,
	TransitionRecord,
	VoteDirection,
} from "../types";
import { RollingWindow } from "../utils/rollingWindow";

type TimeframeState = {
	candles: RollingWindow<Candle>;
	sr: SupportResistance;
};

export type PipelineStatus = {
	symbol: string;
	status: PositionStatus;
	position: Readonly<Position> | null;
	votes: SignalVote[];
	lastCloseTime: Partial<Record<Timeframe, number>>;
};

const describeTransition = (t: TransitionRecord) => `${t.from}->${t.to}:${t.reason}`;

const errorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

/**
 * Owns every piece of per-symbol state and turns one feed event into the
 * records it produced. Events must be delivered one at a time.
 */
export class SymbolPipeline {
	private readonly engine: IndicatorEngine;
	private readonly fusion: SignalFusion;
	private readonly machine: PositionMachine;
	private readonly frames = new Map<Timeframe, TimeframeState>();
	private readonly votes = new Map<Timeframe, SignalVote>();
	private lastEntryAt: number | undefined;

	constructor(
		readonly symbol: string,
		private readonly config: AgentConfig,
		private readonly executor: OrderExecutor,
		private readonly sizing: SizingController,
		newId?: () => string,
	) {
		this.engine = new IndicatorEngine(config.indicators);
		this.fusion = new SignalFusion(config.signals, config.indicators);
		this.machine = new PositionMachine(symbol, config.risk, executor, newId);
	}

	private get timeframes(): Timeframe[] {
		return [this.config.timeframes.primary, ...this.config.timeframes.confirm];
	}

	private frame(timeframe: Timeframe): TimeframeState {
		let state = this.frames.get(timeframe);
		if (!state) {
			const { lookback, tolerancePct } = this.config.signals.supportResistance;
			state = {
				candles: new RollingWindow(3),
				sr: new SupportResistance(lookback, tolerancePct),
			};
			this.frames.set(timeframe, state);
		}
		return state;
	}

	status(): PipelineStatus {
		const lastCloseTime: Partial<Record<Timeframe, number>> = {};
		for (const timeframe of this.timeframes) {
			const closeTime = this.engine.lastCloseTime(this.symbol, timeframe);
			if (closeTime !== undefined) lastCloseTime[timeframe] = closeTime;
		}
		return {
			symbol: this.symbol,
			status: this.machine.status(),
			position: this.machine.position(),
			votes: [...this.votes.values()],
			lastCloseTime,
		};
	}

	/** Never throws: unexpected failures come back as an internal diagnostic. */
	async process(event: FeedEvent): Promise<AgentRecord[]> {
		try {
			switch (event.type) {
				case "candle":
					return await this.onCandle(event.candle);
				case "gap":
					return this.onGap(event.timeframe, event.at);
				case "venue_close":
					return this.collect(await this.machine.onVenueClose(event));
			}
		} catch (error) {
			return [
				{
					type: "diagnostic",
					record: this.diagnostic("internal", errorMessage(error), Date.now()),
				},
			];
		}
	}

	private diagnostic(
		kind: Diagnostic["kind"],
		message: string,
		at: number,
		details?: Diagnostic["details"],
	): Diagnostic {
		return { symbol: this.symbol, kind, message, at, details };
	}

	/** Flattens machine steps into records and hands final outcomes to sizing. */
	private collect(...steps: MachineStep[]): AgentRecord[] {
		const records: AgentRecord[] = [];
		for (const step of steps) {
			for (const record of step.diagnostics) records.push({ type: "diagnostic", record });
			for (const record of step.transitions) records.push({ type: "transition", record });
			for (const record of step.outcomes) {
				records.push({ type: "outcome", record });
				this.sizing.recordOutcome(record);
			}
		}
		return records;
	}

	private onGap(timeframe: Timeframe, at: number): AgentRecord[] {
		this.engine.reset(this.symbol, timeframe);
		this.frames.delete(timeframe);
		this.votes.delete(timeframe);
		return [
			{
				type: "diagnostic",
				record: this.diagnostic("data", "Candle gap; indicators re-warming", at, {
					timeframe,
				}),
			},
		];
	}

	private baseDecision(candle: Candle): DecisionRecord {
		return {
			symbol: this.symbol,
			timeframe: candle.timeframe,
			closeTime: candle.closeTime,
			accepted: false,
			snapshotReady: false,
			patterns: [],
			newsBlackout: false,
			confirmed: "none",
			positionStatus: this.machine.status(),
			transitions: [],
		};
	}

	private async onCandle(candle: Candle): Promise<AgentRecord[]> {
		if (!this.timeframes.includes(candle.timeframe)) {
			return [
				{
					type: "diagnostic",
					record: this.diagnostic("data", "Candle for an unconfigured timeframe", candle.closeTime, {
						timeframe: candle.timeframe,
					}),
				},
			];
		}

		const update = this.engine.update(candle);
		if (!update.accepted) {
			return [
				{
					type: "diagnostic",
					record: this.diagnostic("data", `Candle rejected: ${update.reason}`, candle.closeTime, {
						timeframe: candle.timeframe,
						closeTime: candle.closeTime,
						lastCloseTime: update.lastCloseTime,
					}),
				},
				{
					type: "decision",
					record: { ...this.baseDecision(candle), rejection: update.reason },
				},
			];
		}

		const frame = this.frame(candle.timeframe);
		frame.candles.push(candle);
		const patterns = detectPatterns(frame.candles.toArray());
		const srProximity = this.config.signals.supportResistance.enabled
			? frame.sr.update(candle)
			: undefined;
		const { snapshot } = update;

		if (candle.timeframe !== this.config.timeframes.primary) {
			const vote = this.fusion.fuse(snapshot, patterns, undefined, false, {
				applyVetoes: false,
			});
			this.votes.set(candle.timeframe, vote);
			return [
				{
					type: "decision",
					record: {
						...this.baseDecision(candle),
						accepted: true,
						snapshotReady: snapshot.ready,
						patterns: patterns.map((p) => p.pattern),
						vote,
					},
				},
			];
		}

		const newsBlackout = isNewsBlackout(this.config.news, candle.closeTime);
		const vote = this.fusion.fuse(snapshot, patterns, srProximity, newsBlackout);
		const previousVote = this.votes.get(candle.timeframe);
		this.votes.set(candle.timeframe, vote);

		const held = this.machine.position()?.side;
		const reversal = held
			? reversalTriggers(held === "BUY" ? "long" : "short", vote, previousVote, srProximity)
			: [];
		const managed = await this.machine.onCandle(candle, { reversal });

		const confirmedVote = confirm(
			this.votes,
			this.config.timeframes.primary,
			this.config.timeframes.confirm,
		);
		const confirmed: VoteDirection = confirmedVote?.direction ?? "none";

		const closedThisCandle = managed.outcomes.some((o) => o.kind === "final");
		const cooldownUntil = this.cooldownUntil(candle.closeTime);
		const steps: MachineStep[] = [managed];
		const extra: Diagnostic[] = [];
		if (
			confirmedVote &&
			!closedThisCandle &&
			cooldownUntil === undefined &&
			this.machine.status() === "FLAT"
		) {
			const entry = await this.tryEnter(confirmedVote, snapshot, extra);
			if (entry) steps.push(entry);
		}

		const records = this.collect(...steps);
		for (const record of extra) records.push({ type: "diagnostic", record });
		records.push({
			type: "decision",
			record: {
				...this.baseDecision(candle),
				accepted: true,
				snapshotReady: snapshot.ready,
				patterns: patterns.map((p) => p.pattern),
				srProximity,
				newsBlackout,
				vote,
				confirmed,
				cooldownUntil,
				positionStatus: this.machine.status(),
				transitions: steps.flatMap((s) => s.transitions.map(describeTransition)),
			},
		});
		return records;
	}

	/** End of the entry cooldown when `at` still falls inside it. */
	private cooldownUntil(at: number): number | undefined {
		if (this.lastEntryAt === undefined) return undefined;
		const until = this.lastEntryAt + this.config.signals.cooldownSeconds * 1_000;
		return at < until ? until : undefined;
	}

	private async tryEnter(
		vote: SignalVote,
		snapshot: IndicatorSnapshot,
		diagnostics: Diagnostic[],
	): Promise<MachineStep | null> {
		const at = snapshot.closeTime;
		if (!snapshot.atr.ready || vote.direction === "none") return null;

		let balance: number;
		try {
			balance = await this.executor.availableBalance();
		} catch (error) {
			diagnostics.push(
				this.diagnostic("venue", `Balance query failed: ${errorMessage(error)}`, at),
			);
			return null;
		}

		const size = this.sizing.nextEntrySize(this.symbol, balance);
		if (size.status === "insufficient") {
			diagnostics.push(
				this.diagnostic("sizing", "Balance too small for the minimum order value", at, {
					balance,
					margin: size.margin,
					notional: size.notional,
					leverage: size.leverage,
				}),
			);
			return null;
		}

		this.lastEntryAt = at;
		return this.machine.enter({
			side: vote.direction === "long" ? "BUY" : "SELL",
			referencePrice: snapshot.close,
			atr: snapshot.atr.value,
			quantity: size.notional / snapshot.close,
			leverage: size.leverage,
			marginPercent: size.marginPercent,
			at,
		});
	}
}
