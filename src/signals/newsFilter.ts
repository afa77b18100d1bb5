import type { NewsSettings } from "../config";

const MINUTE = 60_000;

export type BlackoutMatch = { name: string; start: number; end: number };

/**
 * Recurring events repeat every year on their UTC month/day/time and are
 * widened by the configured buffers; absolute windows are taken as given.
 */
export function activeBlackout(
	settings: NewsSettings,
	at: number,
): BlackoutMatch | null {
	if (!settings.enabled) return null;

	const year = new Date(at).getUTCFullYear();
	const before = settings.bufferBeforeMinutes * MINUTE;
	const after = settings.bufferAfterMinutes * MINUTE;

	for (const event of settings.events) {
		// neighbouring years cover buffers that cross New Year
		for (const y of [year - 1, year, year + 1]) {
			const time = Date.UTC(y, event.month - 1, event.day, event.hour, event.minute);
			const start = time - before;
			const end = time + after;
			if (at >= start && at <= end) return { name: event.name, start, end };
		}
	}

	for (const window of settings.windows) {
		const start = window.start.getTime();
		const end = window.end.getTime();
		if (at >= start && at <= end) return { name: window.name, start, end };
	}

	return null;
}

export function isNewsBlackout(settings: NewsSettings, at: number): boolean {
	return activeBlackout(settings, at) !== null;
}
