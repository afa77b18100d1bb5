import type { USDMClient } from "binance";
import { fetchTradingSymbols } from "../clients/binance";
import type {
	CloseIntent,
	EntryIntent,
	ExecutionReport,
	OrderExecutor,
	OrderIntent,
	PartialCloseIntent,
	ProtectionIntent,
	SymbolMeta,
	TradeSide,
} from "../types";
import { BoundedMap } from "../utils/boundedMap";
import { logger } from "../utils/logger";

export type BinanceExecutorOptions = {
	quoteAsset: string;
	pollIntervalMs?: number;
	pollAttempts?: number;
};

async function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

function oppositeSide(side: TradeSide): TradeSide {
	return side === "BUY" ? "SELL" : "BUY";
}

function ensureNumber(value: string | number | undefined): number {
	if (value === undefined) return 0;
	return typeof value === "number" ? value : Number(value);
}

export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message;
	if (error && typeof error === "object" && "message" in error) {
		return String(error.message);
	}
	return String(error);
}

export function applyStepSize(quantity: number, meta: SymbolMeta): number {
	if (!meta.stepSize) return quantity;
	const adjusted = Math.floor(quantity / meta.stepSize) * meta.stepSize;
	return Number(adjusted.toFixed(8));
}

export function applyTickSize(price: number, meta: SymbolMeta): number {
	if (!meta.tickSize) return price;
	const precision = Math.max(0, Math.ceil(Math.abs(Math.log10(meta.tickSize))));
	const adjusted = Math.round(price / meta.tickSize) * meta.tickSize;
	return Number(adjusted.toFixed(precision + 1));
}

export function ensureNotional(
	quantity: number,
	price: number,
	meta: SymbolMeta,
): void {
	const min = meta.minNotional;
	if (min && quantity * price < min) {
		throw new Error(`Notional too small. Minimum: ${min}`);
	}
}

type OrderState = {
	status: string;
	avgPrice?: string | number;
	price?: string | number;
	executedQty?: string | number;
};

/** Reports kept for repeated intents; older intents are forgotten. */
const REPORT_MEMORY = 1_000;

export function reportOf(intentId: string, order: OrderState): ExecutionReport {
	if (order.status === "FILLED") {
		return {
			intentId,
			status: "FILLED",
			price: ensureNumber(order.avgPrice || order.price),
			quantity: ensureNumber(order.executedQty),
		};
	}
	if (["CANCELED", "REJECTED", "EXPIRED"].includes(order.status)) {
		return { intentId, status: "REJECTED", reason: order.status };
	}
	return { intentId, status: "ACKNOWLEDGED" };
}

/** Binance client order ids are capped at 36 characters. */
const clientId = (intentId: string, suffix = "") =>
	suffix ? `${intentId.slice(0, 32)}-${suffix}` : intentId.slice(0, 36);

/**
 * Order executor for USDⓈ-M futures. Every intent id maps to one client order
 * id, and a repeated intent gets the first submission's report back.
 */
export class BinanceExecutor implements OrderExecutor {
	private readonly reports = new BoundedMap<string, Promise<ExecutionReport>>(REPORT_MEMORY);
	private readonly protective = new Map<string, string[]>();
	private readonly protectiveIds = new Set<string>();
	private readonly meta = new Map<string, SymbolMeta>();
	private readonly pollIntervalMs: number;
	private readonly pollAttempts: number;

	constructor(
		private readonly rest: USDMClient,
		private readonly options: BinanceExecutorOptions,
	) {
		this.pollIntervalMs = options.pollIntervalMs ?? 1_000;
		this.pollAttempts = options.pollAttempts ?? 10;
	}

	submit(intent: OrderIntent): Promise<ExecutionReport> {
		const existing = this.reports.get(intent.intentId);
		if (existing) return existing;

		const report = this.execute(intent).catch(
			(error): ExecutionReport => {
				const reason = describeError(error);
				logger.error(
					{ symbol: intent.symbol, kind: intent.kind, intentId: intent.intentId, reason },
					"Order rejected",
				);
				return { intentId: intent.intentId, status: "REJECTED", reason };
			},
		);
		this.reports.set(intent.intentId, report);
		return report;
	}

	async cancel(symbol: string, intentId: string): Promise<void> {
		await this.rest.cancelOrder({ symbol, origClientOrderId: clientId(intentId) });
	}

	async lookup(symbol: string, intentId: string): Promise<ExecutionReport> {
		const order = await this.rest.getOrder({
			symbol,
			origClientOrderId: clientId(intentId),
		});
		return reportOf(intentId, order);
	}

	async availableBalance(): Promise<number> {
		const balances = await this.rest.getBalanceV3();
		const match = balances.find((b) => b.asset === this.options.quoteAsset);
		if (!match) return 0;
		return ensureNumber(match.availableBalance);
	}

	/** Whether a client order id belongs to a stop or take-profit placed here. */
	isProtectiveOrder(clientOrderId: string): boolean {
		return this.protectiveIds.has(clientOrderId);
	}

	private async symbolMeta(symbol: string): Promise<SymbolMeta> {
		if (!this.meta.has(symbol)) {
			const symbols = await fetchTradingSymbols(this.rest, this.options.quoteAsset);
			for (const meta of symbols) this.meta.set(meta.symbol, meta);
		}
		const meta = this.meta.get(symbol);
		if (!meta) {
			throw new Error(`Symbol metadata not found for ${symbol}`);
		}
		return meta;
	}

	private execute(intent: OrderIntent): Promise<ExecutionReport> {
		switch (intent.kind) {
			case "entry":
				return this.enter(intent);
			case "protection":
				return this.protect(intent);
			case "partial_close":
			case "close":
				return this.reduce(intent);
		}
	}

	private async marketOrder(
		intentId: string,
		symbol: string,
		side: TradeSide,
		quantity: number,
		reduceOnly: boolean,
	): Promise<ExecutionReport> {
		const newClientOrderId = clientId(intentId);
		const order = await this.rest.submitNewOrder({
			symbol,
			side,
			type: "MARKET",
			quantity,
			newClientOrderId,
			reduceOnly: reduceOnly ? "true" : undefined,
		});
		logger.info(
			{ symbol, side, quantity, orderId: order.orderId, reduceOnly },
			"Placed market order",
		);

		for (let attempt = 0; attempt < this.pollAttempts; attempt++) {
			const report = reportOf(
				intentId,
				await this.rest.getOrder({ symbol, origClientOrderId: newClientOrderId }),
			);
			if (report.status !== "ACKNOWLEDGED") return report;
			await sleep(this.pollIntervalMs);
		}
		return { intentId, status: "ACKNOWLEDGED" };
	}

	private async enter(intent: EntryIntent): Promise<ExecutionReport> {
		const meta = await this.symbolMeta(intent.symbol);
		const quantity = applyStepSize(intent.quantity, meta);
		if (quantity <= 0) {
			throw new Error(`Calculated quantity is zero for ${intent.symbol}`);
		}
		ensureNotional(quantity, intent.referencePrice, meta);

		await this.rest.setLeverage({
			symbol: intent.symbol,
			leverage: intent.leverage,
		});
		return this.marketOrder(intent.intentId, intent.symbol, intent.side, quantity, false);
	}

	private async reduce(
		intent: PartialCloseIntent | CloseIntent,
	): Promise<ExecutionReport> {
		const meta = await this.symbolMeta(intent.symbol);
		const quantity = applyStepSize(intent.quantity, meta);
		if (quantity <= 0) {
			throw new Error(`Close quantity rounds to zero for ${intent.symbol}`);
		}
		const report = await this.marketOrder(
			intent.intentId,
			intent.symbol,
			oppositeSide(intent.side),
			quantity,
			true,
		);
		if (intent.kind === "close" && report.status === "FILLED") {
			await this.clearProtection(intent.symbol);
		}
		return report;
	}

	/** New stop and take-profit go in before the previous pair is cancelled. */
	private async protect(intent: ProtectionIntent): Promise<ExecutionReport> {
		const meta = await this.symbolMeta(intent.symbol);
		const side = oppositeSide(intent.side);
		const stopId = clientId(intent.intentId, "sl");
		const targetId = clientId(intent.intentId, "tp");

		await this.rest.submitNewOrder({
			symbol: intent.symbol,
			side,
			type: "STOP_MARKET",
			stopPrice: applyTickSize(intent.stopPrice, meta),
			closePosition: "true",
			workingType: "MARK_PRICE",
			newClientOrderId: stopId,
		});
		this.protectiveIds.add(stopId);

		await this.rest.submitNewOrder({
			symbol: intent.symbol,
			side,
			type: "TAKE_PROFIT_MARKET",
			stopPrice: applyTickSize(intent.takeProfitPrice, meta),
			closePosition: "true",
			workingType: "MARK_PRICE",
			newClientOrderId: targetId,
		});
		this.protectiveIds.add(targetId);

		await this.cancelProtective(intent.symbol, [stopId, targetId]);
		logger.info(
			{ symbol: intent.symbol, stopPrice: intent.stopPrice, takeProfitPrice: intent.takeProfitPrice },
			"Protective orders placed",
		);
		return { intentId: intent.intentId, status: "ACKNOWLEDGED" };
	}

	/** Cancels whatever stop and take-profit are still resting for `symbol`. */
	async clearProtection(symbol: string): Promise<void> {
		await this.cancelProtective(symbol, []);
	}

	private async cancelProtective(symbol: string, keep: string[]): Promise<void> {
		const previous = this.protective.get(symbol) ?? [];
		this.protective.set(symbol, keep);
		for (const id of previous) {
			await this.rest
				.cancelOrder({ symbol, origClientOrderId: id })
				.catch((err) => {
					logger.warn({ symbol, clientOrderId: id, err }, "Failed to cancel protective order");
				});
			this.protectiveIds.delete(id);
		}
	}
}
