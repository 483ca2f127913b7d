#!/usr/bin/env node
/**
 * sdsync CLI - keeps a handheld's SD card consistent with its ROM files
 */

import { existsSync } from "node:fs"
import { resolve } from "node:path"
import { Command, InvalidArgumentError } from "commander"
import { loadConfig, type Config } from "../config.js"
import {
	createThumbnailFetcher,
	fetchMissingCovers,
} from "../core/covers/index.js"
import { runSync } from "../core/sync.js"
import { passthroughNormalizer, sharpNormalizer } from "../images.js"
import { defaultRoot } from "../layout.js"
import { configureLogging, flushLogs } from "../logger.js"
import { findPlatform } from "../platforms.js"
import { collectStatus } from "../status.js"
import { ui } from "../ui.js"
import type { PlatformDef } from "../types.js"

const VERSION = "1.0.0"

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	try {
		await flushLogs()
	} catch (err) {
		console.error(err)
	}
	process.exitCode = code
}

function resolveRoot(argument: string | undefined, config: Config): string {
	return resolve(argument ?? config.root ?? defaultRoot())
}

function requireRoot(root: string): boolean {
	if (existsSync(root)) return true
	ui.error(`Root not found: ${root}`)
	return false
}

function parseJobs(value: string): number {
	const jobs = Number.parseInt(value, 10)
	if (!Number.isInteger(jobs) || jobs < 1 || jobs > 16) {
		throw new InvalidArgumentError("must be an integer between 1 and 16")
	}
	return jobs
}

// ─────────────────────────────────────────────────────────────────────────────
// CLI Definition
// ─────────────────────────────────────────────────────────────────────────────

const program = new Command()

program
	.name("sdsync")
	.version(VERSION)
	.description(
		"Reconcile a handheld's SD card: catalogs, master index, favorites and covers follow the ROM files",
	)
	.option("--log-file <path>", "Write structured logs to a file")
	.hook("preAction", command => {
		const { logFile } = command.opts<{ logFile?: string }>()
		if (logFile) configureLogging({ logFilePath: logFile })
	})

program
	.command("sync", { isDefault: true })
	.description("Rename, relocate, deduplicate, prune and rebuild catalogs")
	.argument("[root]", "Path to SD card root directory")
	.option("-x, --execute", "Apply changes (default is a simulation)", false)
	.option("--no-resize", "Store relocated covers without converting them")
	.option("--strict", "Exit with code 1 if any file operation fails", false)
	.option("-q, --quiet", "Only print errors", false)
	.option("-v, --verbose", "Print every planned change", false)
	.action(
		async (
			rootArg: string | undefined,
			options: {
				execute: boolean
				resize: boolean
				strict: boolean
				quiet: boolean
				verbose: boolean
			},
		) => {
			const config = loadConfig()
			const root = resolveRoot(rootArg, config)
			if (!requireRoot(root)) return exitWithCode(1)

			const dryRun = !options.execute
			if (!options.quiet) {
				ui.banner(VERSION, root, dryRun)
				if (dryRun) ui.dryRunBanner()
			}

			const result = await runSync({
				root,
				dryRun,
				normalizer: options.resize ? sharpNormalizer : passthroughNormalizer,
				coverSize: { width: config.coverWidth, height: config.coverHeight },
				quiet: options.quiet,
				verbose: options.verbose,
			})

			if (!options.quiet) {
				ui.info(
					`${result.pendingChanges} ${dryRun ? "pending" : "applied"} changes, ${result.errors} errors (${(result.elapsedMs / 1000).toFixed(1)}s)`,
				)
				ui.finalStatus(result.ok, dryRun)
			}

			if (!result.ok && options.strict) return exitWithCode(1)
		},
	)

program
	.command("status")
	.description("Show ROM, catalog and image counts per platform")
	.argument("[root]", "Path to SD card root directory")
	.action(async (rootArg: string | undefined) => {
		const root = resolveRoot(rootArg, loadConfig())
		if (!requireRoot(root)) return exitWithCode(1)

		ui.header("Status")
		const summaries = collectStatus(root)
		if (summaries.length === 0) ui.info("No platform folders found")
		for (const summary of summaries) {
			ui.statusLine(summary.platform, summary, summary.status)
		}
	})

program
	.command("covers")
	.description("Download box art for ROMs that have no cover")
	.argument("[root]", "Path to SD card root directory")
	.option("-p, --platform <id>", "Only this platform (GB, GBA, PS, ...)")
	.option("-x, --execute", "Download and store (default is a simulation)", false)
	.option("-j, --jobs <number>", "Parallel downloads", parseJobs)
	.option("-q, --quiet", "Only print errors", false)
	.option("-v, --verbose", "Print every ROM", false)
	.action(
		async (
			rootArg: string | undefined,
			options: {
				platform?: string
				execute: boolean
				jobs?: number
				quiet: boolean
				verbose: boolean
			},
		) => {
			const config = loadConfig()
			const root = resolveRoot(rootArg, config)
			if (!requireRoot(root)) return exitWithCode(1)

			let platform: PlatformDef | null = null
			if (options.platform) {
				platform = findPlatform(options.platform)
				if (!platform) {
					ui.error(`Unknown platform: ${options.platform}`)
					return exitWithCode(1)
				}
			}

			const jobs = options.jobs ?? config.jobs
			const result = await fetchMissingCovers({
				root,
				dryRun: !options.execute,
				fetcher: createThumbnailFetcher({
					delayMs: config.thumbnailDelayMs,
					lanes: jobs,
					retries: config.retryCount,
				}),
				...(platform ? { platform: platform.id } : {}),
				coverSize: { width: config.coverWidth, height: config.coverHeight },
				jobs,
				quiet: options.quiet,
				verbose: options.verbose,
			})

			if (!options.quiet) ui.finalStatus(result.ok, !options.execute)
			if (!result.ok) return exitWithCode(1)
		},
	)

await program.parseAsync(process.argv)
