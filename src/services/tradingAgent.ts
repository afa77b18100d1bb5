import { type Observable, Subject, from } from "rxjs";
import { concatMap, groupBy, mergeMap, share, tap } from "rxjs/operators";
import type { AgentConfig } from "../config";
import { SizingController } from "../risk/sizing";
import type { SizingStats } from "../risk/sizing";
import type { AgentRecord, FeedEvent, OrderExecutor, SizingState } from "../types";
import { type PipelineStatus, SymbolPipeline } from "./symbolPipeline";

export type SymbolStatus = PipelineStatus & {
	sizing: SizingState;
	stats: SizingStats;
};

export type AgentOptions = {
	newId?: () => string;
};

const symbolOf = (event: FeedEvent) =>
	event.type === "candle" ? event.candle.symbol : event.symbol;

/**
 * Routes feed events to one pipeline per configured symbol. Events of a
 * symbol are handled strictly in order; symbols do not wait on each other.
 */
export class TradingAgent {
	readonly sizing: SizingController;
	private readonly pipelines = new Map<string, SymbolPipeline>();
	private readonly records = new Subject<AgentRecord>();
	readonly records$: Observable<AgentRecord> = this.records.asObservable();

	constructor(
		config: AgentConfig,
		executor: OrderExecutor,
		options: AgentOptions = {},
	) {
		this.sizing = new SizingController(config.sizing);
		for (const symbol of config.symbols) {
			this.pipelines.set(
				symbol,
				new SymbolPipeline(symbol, config, executor, this.sizing, options.newId),
			);
		}
	}

	get symbols(): string[] {
		return [...this.pipelines.keys()];
	}

	private unknownSymbol(event: FeedEvent): AgentRecord[] {
		return [
			{
				type: "diagnostic",
				record: {
					symbol: symbolOf(event),
					kind: "data",
					message: "Event for an unconfigured symbol",
					at: Date.now(),
				},
			},
		];
	}

	/** Processes `events$`; records are emitted here and on `records$`. */
	run(events$: Observable<FeedEvent>): Observable<AgentRecord> {
		return events$.pipe(
			groupBy(symbolOf),
			mergeMap((symbol$) => {
				const pipeline = this.pipelines.get(symbol$.key);
				return symbol$.pipe(
					concatMap((event) =>
						pipeline
							? from(pipeline.process(event))
							: from([this.unknownSymbol(event)]),
					),
				);
			}),
			mergeMap((records) => from(records)),
			tap((record) => this.records.next(record)),
			share(),
		);
	}

	status(): SymbolStatus[] {
		return [...this.pipelines.values()].map((pipeline) => ({
			...pipeline.status(),
			sizing: this.sizing.state(pipeline.symbol),
			stats: this.sizing.stats(pipeline.symbol),
		}));
	}

	stop(): void {
		this.records.complete();
	}
}
