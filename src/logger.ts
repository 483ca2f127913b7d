/**
 * Centralized logging with pino
 *
 * Design: Dual-output architecture
 * - Pino handles structured JSON logging for debugging/files
 * - UI module (ui.ts) handles user-facing CLI output
 *
 * Log levels:
 * - error: Operation failed
 * - warn: Recoverable issue (malformed record, rename collision)
 * - info: Key milestones (default)
 * - debug: Every planned or applied change (--verbose)
 */

import { existsSync, mkdirSync } from "node:fs"
import { dirname } from "node:path"
import pino from "pino"

const level =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

// Use pino-pretty for development, raw JSON for production/CI
const isDev = process.stdout.isTTY && !process.env["CI"] && level !== "silent"

export interface ConfigureLoggingOptions {
	/** When set, structured logs are written to this file instead of stdout. */
	logFilePath?: string
}

let currentLogFilePath: string | null = null

function ensureDirExists(path: string): void {
	const dir = dirname(path)
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
}

function createConsoleLogger() {
	return isDev
		? pino({
				level,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "{module}: {msg}",
					},
				},
			})
		: pino({
				level,
				base: { pid: undefined, hostname: undefined },
			})
}

function createFileLogger(path: string) {
	ensureDirExists(path)
	// The CLI may set process.exitCode right after a run; sync writes keep the tail.
	const destination = pino.destination({ dest: path, sync: true })
	const fileLevel =
		process.env["LOG_LEVEL_FILE"] ??
		(process.env["LOG_LEVEL"] || process.env["DEBUG"] ? level : "debug")
	return pino(
		{
			level: fileLevel,
			base: { pid: undefined, hostname: undefined },
		},
		destination,
	)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export let logger = createConsoleLogger()

/** Redirect structured logs to a file, or back to the console. */
export function configureLogging(options: ConfigureLoggingOptions): {
	logFilePath: string | null
} {
	if (options.logFilePath) {
		if (currentLogFilePath === options.logFilePath) {
			return { logFilePath: currentLogFilePath }
		}
		currentLogFilePath = options.logFilePath
		logger = createFileLogger(options.logFilePath)
		return { logFilePath: currentLogFilePath }
	}

	if (currentLogFilePath !== null) {
		currentLogFilePath = null
		logger = createConsoleLogger()
	}

	return { logFilePath: null }
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("reconcile")
 * log.debug({ platform, filename }, "duplicate removed")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

// Pre-created loggers for common modules (getters so they follow reconfiguration)
export const log = {
	get reconcile() {
		return createLogger("reconcile")
	},
	get images() {
		return createLogger("images")
	},
	get records() {
		return createLogger("records")
	},
	get covers() {
		return createLogger("covers")
	},
	get parallel() {
		return createLogger("parallel")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
