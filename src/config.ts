/**
 * Configuration management with Zod validation
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir } from "node:os"
import { join } from "node:path"
import { z } from "zod"
import { log } from "./logger.js"

const ConfigSchema = z.object({
	/** Card root used when none is given on the command line */
	root: z.string().min(1).optional(),
	coverWidth: z.number().int().min(16).max(2048).default(320),
	coverHeight: z.number().int().min(16).max(2048).default(240),
	/** Parallel cover downloads */
	jobs: z.number().int().min(1).max(16).default(4),
	retryCount: z.number().int().min(0).max(10).default(2),
	/** Minimum delay between thumbnail requests per job */
	thumbnailDelayMs: z.number().int().min(0).default(250),
})

export type Config = z.infer<typeof ConfigSchema>

const DEFAULT_CONFIG: Config = {
	coverWidth: 320,
	coverHeight: 240,
	jobs: 4,
	retryCount: 2,
	thumbnailDelayMs: 250,
}

export function configPaths(cwd = process.cwd(), home = homedir()): string[] {
	return [
		join(cwd, ".sdsyncrc"),
		join(cwd, ".sdsyncrc.json"),
		join(home, ".sdsyncrc"),
		join(home, ".sdsyncrc.json"),
	]
}

export function parseConfig(raw: unknown): Config {
	return ConfigSchema.parse(raw)
}

/**
 * Load configuration from .sdsyncrc (JSON format)
 * Checks current directory first, then home directory
 */
export function loadConfig(paths: string[] = configPaths()): Config {
	for (const path of paths) {
		if (!existsSync(path)) continue
		try {
			return parseConfig(JSON.parse(readFileSync(path, "utf-8")))
		} catch (err) {
			// Continue to next path if invalid
			log.cli.warn({ path, err }, "ignoring invalid config file")
		}
	}

	return DEFAULT_CONFIG
}

export { DEFAULT_CONFIG }
