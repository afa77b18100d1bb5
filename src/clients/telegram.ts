import axios from "axios";
import type { AgentConfig } from "../config";
import { logger } from "../utils/logger";

export type TelegramSettings = AgentConfig["telegram"];

export async function sendTelegramMessage(
	settings: TelegramSettings,
	text: string,
): Promise<void> {
	if (!settings.botToken || !settings.chatIds.length) {
		logger.warn("Telegram bot token or chat id missing, skipping notification");
		return;
	}

	const url = `https://api.telegram.org/bot${settings.botToken}/sendMessage`;

	await Promise.all(
		settings.chatIds.map((chatId) =>
			axios.post(url, {
				chat_id: chatId,
				text,
				parse_mode: "Markdown",
			}),
		),
	);
}
