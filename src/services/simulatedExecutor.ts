import type { AgentConfig } from "../config";
import { pnlOf } from "../risk/positionMachine";
import type {
	ExecutionReport,
	OrderExecutor,
	OrderIntent,
	TradeSide,
} from "../types";
import { BoundedMap } from "../utils/boundedMap";
import { logger } from "../utils/logger";

export type SimulationSettings = AgentConfig["simulation"];

type PaperPosition = { side: TradeSide; entryPrice: number; quantity: number };

/**
 * Paper executor: market intents fill at their reference price moved against
 * the trader by the configured slippage, and closes settle into a paper balance.
 */
export class SimulatedExecutor implements OrderExecutor {
	private balance: number;
	private readonly positions = new Map<string, PaperPosition>();
	private readonly reports = new BoundedMap<string, ExecutionReport>(1_000);

	constructor(private readonly settings: SimulationSettings) {
		this.balance = settings.startingBalance;
	}

	private fillPrice(reference: number, side: TradeSide): number {
		const slip = reference * (this.settings.slippageBps / 10_000);
		return side === "BUY" ? reference + slip : reference - slip;
	}

	async submit(intent: OrderIntent): Promise<ExecutionReport> {
		const existing = this.reports.get(intent.intentId);
		if (existing) return existing;
		const report = this.fill(intent);
		this.reports.set(intent.intentId, report);
		return report;
	}

	private fill(intent: OrderIntent): ExecutionReport {
		const { intentId, symbol } = intent;

		if (intent.kind === "protection") {
			return { intentId, status: "ACKNOWLEDGED" };
		}

		if (intent.kind === "entry") {
			if (this.positions.has(symbol)) {
				return { intentId, status: "REJECTED", reason: "position already open" };
			}
			const price = this.fillPrice(intent.referencePrice, intent.side);
			this.positions.set(symbol, {
				side: intent.side,
				entryPrice: price,
				quantity: intent.quantity,
			});
			logger.info({ symbol, side: intent.side, price, quantity: intent.quantity }, "Paper entry");
			return { intentId, status: "FILLED", price, quantity: intent.quantity };
		}

		const position = this.positions.get(symbol);
		if (!position) {
			return { intentId, status: "REJECTED", reason: "no open position" };
		}
		const exitSide: TradeSide = position.side === "BUY" ? "SELL" : "BUY";
		const price = this.fillPrice(intent.referencePrice, exitSide);
		const quantity =
			intent.kind === "close"
				? position.quantity
				: Math.min(intent.quantity, position.quantity);

		this.balance += pnlOf(position.side, position.entryPrice, price, quantity);
		position.quantity -= quantity;
		if (intent.kind === "close" || position.quantity <= 0) {
			this.positions.delete(symbol);
		}
		logger.info({ symbol, kind: intent.kind, price, quantity, balance: this.balance }, "Paper exit");
		return { intentId, status: "FILLED", price, quantity };
	}

	async cancel(symbol: string, intentId: string): Promise<void> {
		logger.debug({ symbol, intentId }, "Paper cancel");
	}

	async lookup(_symbol: string, intentId: string): Promise<ExecutionReport> {
		return (
			this.reports.get(intentId) ?? { intentId, status: "REJECTED", reason: "unknown order" }
		);
	}

	async availableBalance(): Promise<number> {
		return this.balance;
	}
}
