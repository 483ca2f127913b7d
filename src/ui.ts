/**
 * Terminal output helpers with consistent styling
 *
 * Spinner-aware: when an ora spinner is active, all output goes through
 * spinnerSafeLog() to avoid conflicts (flickering, line overwrites).
 */

import chalk from "chalk"
import { spinnerSafeLog } from "./parallel.js"
import type { PlatformStatus } from "./types.js"

const STATUS_COLORS: Record<PlatformStatus, (text: string) => string> = {
	OK: chalk.green,
	EMPTY: chalk.dim,
	NO_ROMS: chalk.yellow,
	MISMATCH: chalk.red,
}

export const ui = {
	/** Section header with decorative border */
	header(text: string): void {
		spinnerSafeLog(chalk.cyan.bold(`\n═══ ${text} ═══\n`))
	},

	/** Error message with X mark */
	error(text: string): void {
		spinnerSafeLog(chalk.red("✗") + " " + text)
	},

	/** Warning message */
	warn(text: string): void {
		spinnerSafeLog(chalk.yellow("⚠") + " " + text)
	},

	/** Info message */
	info(text: string): void {
		spinnerSafeLog(chalk.blue("ℹ") + " " + text)
	},

	/** Debug message (only shown if verbose) */
	debug(text: string, verbose: boolean): void {
		if (verbose) {
			spinnerSafeLog(chalk.dim("  → " + text))
		}
	},

	/** Banner for startup */
	banner(version: string, root: string, dryRun: boolean): void {
		console.log(chalk.bold("SD Card Sync") + ` v${version}`)
		console.log(`Root: ${chalk.cyan(root)}`)
		console.log(
			`Mode: ${dryRun ? chalk.yellow("simulation") : chalk.green("execute")}`,
		)
		console.log()
	},

	/** Dry run warning banner */
	dryRunBanner(): void {
		console.log(chalk.yellow.bold("═══ DRY RUN MODE ═══"))
		console.log("No files will be changed. Showing what would happen.")
		console.log()
	},

	/** One row of the per-platform summary table */
	statusLine(
		platform: string,
		counts: { roms: number; catalog: number; images: number },
		status: PlatformStatus,
	): void {
		const colorFn = STATUS_COLORS[status]
		spinnerSafeLog(
			`  ${platform.padEnd(6)} ROMs=${counts.roms} CSV=${counts.catalog} Img=${counts.images} ${colorFn(`[${status}]`)}`,
		)
	},

	/** Final status line */
	finalStatus(allSuccess: boolean, dryRun: boolean): void {
		console.log()
		if (!allSuccess) {
			console.log(
				chalk.yellow.bold("⚠ Some operations failed. See above for details."),
			)
		} else if (dryRun) {
			console.log(
				chalk.yellow.bold("Simulation only. Re-run with --execute to apply."),
			)
		} else {
			console.log(chalk.green.bold("✓ All operations completed successfully!"))
		}
		console.log()
	},
}
