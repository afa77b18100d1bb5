import pino from "pino";

function resolveLevel(): string {
	if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
	return process.env.NODE_ENV === "test" ? "silent" : "info";
}

export const logger = pino({
	name: "trend-agent",
	level: resolveLevel(),
	base: undefined,
	timestamp: pino.stdTimeFunctions.isoTime,
});
