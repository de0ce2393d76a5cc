import {pino, stdTimeFunctions, type Logger, type LoggerOptions} from "pino";

export type {Logger};

export const LOG_LEVELS = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const loggerOptions = (level: LogLevel): LoggerOptions => ({
	level,
	base: undefined,
	timestamp: stdTimeFunctions.isoTime,
});

export function createLogger(level: LogLevel = "info"): Logger {
	return pino(loggerOptions(level));
}
