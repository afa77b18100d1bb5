import cron, { type ScheduledTask } from "node-cron";
import type { AgentConfig } from "../config";
import { logger } from "../utils/logger";
import type { SymbolStatus, TradingAgent } from "./tradingAgent";

export function summarize(status: SymbolStatus) {
	const { position } = status;
	return {
		symbol: status.symbol,
		state: status.status,
		side: position?.side,
		entryPrice: position?.entryPrice,
		quantity: position?.quantity,
		stopPrice: position?.stopPrice,
		takeProfitPrice: position?.takeProfitPrice,
		realizedPnl: position?.realizedPnl,
		votes: status.votes.map((v) => `${v.timeframe}:${v.direction}`).join(","),
		consecutiveLosses: status.sizing.consecutiveLosses,
		consecutiveWins: status.stats.consecutiveWins,
		marginPercent: status.sizing.marginPercent,
		trades: status.stats.trades,
		winRate: Number(status.stats.winRate.toFixed(1)),
		netPnl: status.stats.netPnl,
	};
}

export function reportStatus(agent: TradingAgent): void {
	for (const status of agent.status()) {
		logger.info(summarize(status), "Symbol status");
	}
}

export function scheduleStatusReport(
	agent: TradingAgent,
	scheduling: AgentConfig["scheduling"],
): ScheduledTask {
	return cron.schedule(scheduling.statusCron, () => reportStatus(agent), {
		timezone: scheduling.timezone,
	});
}
