import type { AgentRecord, TradeOutcome, TransitionRecord } from "../types";
import { logger } from "../utils/logger";

export type SendMessage = (text: string) => Promise<void>;

const fixed = (value: number | string | boolean | undefined, digits = 4) =>
	typeof value === "number" ? value.toFixed(digits) : String(value);

function formatTransition(t: TransitionRecord): string | null {
	const d = t.details ?? {};
	switch (t.reason) {
		case "entry_filled":
			return [
				`New trade ${t.symbol}`,
				`Entry: ${fixed(d.entryPrice)}`,
				`Qty: ${fixed(d.quantity, 6)}`,
				`SL: ${fixed(d.stopPrice)}`,
				`TP: ${fixed(d.takeProfitPrice)}`,
			].join("\n");
		case "breakeven":
			return `Breakeven ${t.symbol}\nSL: ${fixed(d.from)} -> ${fixed(d.to)}`;
		case "trailing_stop":
			return `Trailing stop ${t.symbol}\nSL: ${fixed(d.from)} -> ${fixed(d.to)}`;
		case "entry_failed":
		case "close_failed":
			return `${t.symbol}: ${t.reason.replace("_", " ")}`;
		default:
			return null;
	}
}

function formatOutcome(o: TradeOutcome): string {
	const direction = o.side === "BUY" ? "Close Long" : "Close Short";
	const title = o.kind === "partial" ? "Partial profit" : "Trade closed";
	return [
		`${title} ${o.symbol}`,
		direction,
		`Reason: ${o.reason}`,
		`Price: ${fixed(o.exitPrice)}`,
		`Qty: ${fixed(o.quantity, 6)}`,
		`PnL: ${fixed(o.pnl, 2)}`,
	].join("\n");
}

/** The Telegram text for a record, or null when it is not worth a message. */
export function formatRecord(record: AgentRecord): string | null {
	switch (record.type) {
		case "transition":
			return formatTransition(record.record);
		case "outcome":
			return formatOutcome(record.record);
		default:
			return null;
	}
}

/** Sends the message for `record`; delivery failures are logged, never thrown. */
export async function notifyRecord(
	send: SendMessage,
	record: AgentRecord,
): Promise<void> {
	const text = formatRecord(record);
	if (!text) return;
	try {
		await send(text);
	} catch (error) {
		logger.error({ error, type: record.type }, "Failed to send notification");
	}
}
