import { EMPTY, type Observable, merge } from "rxjs";
import { mergeMap, tap } from "rxjs/operators";
import { createBinanceClients, fetchKlines } from "./clients/binance";
import { sendTelegramMessage } from "./clients/telegram";
import { type AgentConfig, ConfigError, loadConfig } from "./config";
import { requiredWarmup } from "./indicators/warmup";
import { binanceKlines$, marketFeed } from "./services/marketFeed";
import { notifyRecord } from "./services/notifier";
import { BinanceExecutor } from "./services/orderService";
import { SimulatedExecutor } from "./services/simulatedExecutor";
import { scheduleStatusReport } from "./services/statusReporter";
import { startTradeMonitor } from "./services/tradeMonitor";
import { TradingAgent } from "./services/tradingAgent";
import type { AgentRecord, VenueCloseEvent } from "./types";
import { logger } from "./utils/logger";

/** Binance serves at most this many klines per request. */
const MAX_KLINES = 1500;

function logRecord(record: AgentRecord): void {
	switch (record.type) {
		case "decision": {
			const { symbol, timeframe, closeTime, vote, confirmed, positionStatus } =
				record.record;
			logger.debug(
				{ symbol, timeframe, closeTime, direction: vote?.direction, confirmed, positionStatus },
				"Candle processed",
			);
			return;
		}
		case "transition":
			logger.info(record.record, "Position transition");
			return;
		case "outcome":
			logger.info(record.record, "Trade outcome");
			return;
		case "diagnostic":
			logger.warn(record.record, record.record.message);
			return;
	}
}

function readConfig(): AgentConfig {
	try {
		return loadConfig();
	} catch (error) {
		if (error instanceof ConfigError) {
			logger.fatal({ issues: error.issues }, "Invalid configuration");
		} else {
			logger.fatal({ error }, "Failed to load configuration");
		}
		process.exit(1);
	}
}

async function bootstrap() {
	const config = readConfig();
	logger.info(
		{ mode: config.mode, symbols: config.symbols, timeframes: config.timeframes },
		"Starting trend agent",
	);

	const { rest, ws } = createBinanceClients(config.binance);
	const timeframes = [config.timeframes.primary, ...config.timeframes.confirm];
	const warmup = Math.max(
		requiredWarmup(config.indicators),
		config.indicators.warmupCandles ?? 0,
	);

	let venueCloses$: Observable<VenueCloseEvent> = EMPTY;
	let executor: BinanceExecutor | SimulatedExecutor;
	if (config.mode === "execute") {
		const binance = new BinanceExecutor(rest, {
			quoteAsset: config.binance.quoteAsset,
		});
		venueCloses$ = await startTradeMonitor(ws, binance);
		executor = binance;
	} else {
		executor = new SimulatedExecutor(config.simulation);
	}

	const agent = new TradingAgent(config, executor);
	const feed$ = marketFeed({
		symbols: config.symbols,
		timeframes,
		historyLimit: Math.min(MAX_KLINES, warmup * 2),
		fetchKlines: (symbol, timeframe, range) =>
			fetchKlines(rest, symbol, timeframe, range),
		live$: binanceKlines$(ws, config.symbols, timeframes),
	});

	const send = (text: string) => sendTelegramMessage(config.telegram, text);
	const subscription = agent
		.run(merge(feed$, venueCloses$))
		.pipe(
			tap(logRecord),
			mergeMap((record) => notifyRecord(send, record)),
		)
		.subscribe({
			error: (error) => logger.error({ error }, "Agent stream errored"),
			complete: () => logger.info("Agent stream finished"),
		});

	const statusTask = scheduleStatusReport(agent, config.scheduling);

	const shutdown = (signal: string) => {
		logger.info({ signal }, "Shutting down");
		statusTask.stop();
		subscription.unsubscribe();
		agent.stop();
		ws.closeAll();
		process.exit(0);
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);
}

bootstrap().catch((err) => {
	logger.fatal({ err }, "Fatal error");
	process.exit(1);
});
