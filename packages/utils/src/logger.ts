/**
 * Centralized file logger for stepform.
 *
 * Logs to ~/.stepform/logs/ with daily rotation. Each entry includes process.pid so
 * output from concurrent forms can be told apart. The transport is created on first
 * use; STEPFORM_LOG_LEVEL=silent disables it entirely.
 */
import * as fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import { APP_NAME, getLogsDir } from "./dirs";
import { $env } from "./env";

export type LogLevel = "error" | "warn" | "info" | "debug" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "silent"];

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(level => level === value);
}

/** Resolve the configured level; unknown values fall back to debug. */
export function getLogLevel(): LogLevel {
	const value = $env.STEPFORM_LOG_LEVEL?.trim().toLowerCase();
	return value && isLogLevel(value) ? value : "debug";
}

/** Custom format that includes pid and flattens metadata */
const logFormat = winston.format.combine(
	winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
	winston.format.printf(({ timestamp, level, message, ...meta }) => {
		const entry: Record<string, unknown> = {
			timestamp,
			level,
			pid: process.pid,
			message,
		};
		for (const [key, value] of Object.entries(meta)) {
			if (key !== "level" && key !== "timestamp" && key !== "message") {
				entry[key] = value;
			}
		}
		return JSON.stringify(entry);
	}),
);

let winstonLogger: winston.Logger | undefined;

function getWinstonLogger(): winston.Logger {
	if (winstonLogger) return winstonLogger;

	const level = getLogLevel();
	if (level === "silent") {
		winstonLogger = winston.createLogger({ silent: true });
		return winstonLogger;
	}

	const logsDir = getLogsDir();
	if (!fs.existsSync(logsDir)) {
		fs.mkdirSync(logsDir, { recursive: true });
	}

	winstonLogger = winston.createLogger({
		level,
		format: logFormat,
		transports: [
			new DailyRotateFile({
				dirname: logsDir,
				filename: `${APP_NAME}.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxSize: "10m",
				maxFiles: 5,
				zippedArchive: true,
			}),
		],
		// Don't exit on error - logging failures shouldn't crash the form
		exitOnError: false,
	});
	return winstonLogger;
}

function log(level: Exclude<LogLevel, "silent">, message: string, context?: Record<string, unknown>): void {
	try {
		getWinstonLogger().log(level, message, context);
	} catch {
		// Logging must never break rendering
	}
}

/**
 * Log an error message.
 * @param message - The message to log.
 * @param context - Structured fields merged into the entry.
 */
export function error(message: string, context?: Record<string, unknown>): void {
	log("error", message, context);
}

/**
 * Log a warning message.
 */
export function warn(message: string, context?: Record<string, unknown>): void {
	log("warn", message, context);
}

/**
 * Log an informational message.
 */
export function info(message: string, context?: Record<string, unknown>): void {
	log("info", message, context);
}

/**
 * Log a debug message.
 */
export function debug(message: string, context?: Record<string, unknown>): void {
	log("debug", message, context);
}

const LOGGED_TIMING_THRESHOLD_MS = 5;

function logTiming(op: string, duration: number): void {
	duration = Math.round(duration * 100) / 100;
	if (duration > LOGGED_TIMING_THRESHOLD_MS) {
		warn(`${op} done`, { duration, op });
	} else {
		debug(`${op} done`, { duration, op });
	}
}

/**
 * Time a synchronous operation and log the duration.
 * @param op - The operation name.
 * @param fn - The function to time.
 * @returns The result of the function.
 */
export function time<T, A extends unknown[]>(op: string, fn: (...args: A) => T, ...args: A): T {
	const start = performance.now();
	try {
		return fn(...args);
	} finally {
		logTiming(op, performance.now() - start);
	}
}
