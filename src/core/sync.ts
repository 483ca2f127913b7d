/**
 * sync
 *
 * Runs the reconciliation engine and turns its events into terminal output,
 * structured logs, and a result the CLI can act on.
 *
 * Design:
 * - Simulation by default; the CLI passes dryRun: false only with --execute
 * - Best-effort: a failed file operation is reported and the run continues
 * - --strict turns any failure into a non-zero exit code (CLI side)
 */

import { log } from "../logger.js"
import { ui } from "../ui.js"
import type { PlatformSummary } from "../types.js"
import { reconcileCard } from "./reconcile.js"
import type { SyncEvent, SyncOptions } from "./types.js"

export interface RunSyncOptions extends SyncOptions {
	/** Suppress most output */
	quiet?: boolean
	/** Print every planned change, not only failures and totals */
	verbose?: boolean
}

export interface SyncResult {
	/** No file operation failed */
	ok: boolean
	dryRun: boolean
	/** Changes applied (execute) or that would be applied (simulation) */
	pendingChanges: number
	errors: number
	/** Renames skipped because the sanitized name was taken */
	conflicts: number
	/** Loose images left in place for lack of a matching ROM */
	unmatchedImages: number
	platforms: PlatformSummary[]
	elapsedMs: number
}

function verb(dryRun: boolean, planned: string, done: string): string {
	return dryRun ? planned : done
}

interface ReportOptions {
	quiet: boolean
	verbose: boolean
	dryRun: boolean
}

function reportEvent(event: SyncEvent, options: ReportOptions): void {
	const { quiet, verbose, dryRun } = options
	if ("error" in event && event.error !== undefined) {
		const subject = "platform" in event ? `${event.platform}: ` : ""
		ui.error(`${subject}${event.type}: ${event.error}`)
		return
	}
	if (quiet) return

	switch (event.type) {
		case "run:start": {
			if (verbose) {
				ui.info(`Platforms found: ${event.platforms.join(", ") || "none"}`)
			}
			break
		}
		case "rename": {
			const label = event.area === "roms" ? "ROM" : "IMG"
			ui.info(`[${event.platform}] ${label}: ${event.from} -> ${event.to}`)
			break
		}
		case "rename:collision": {
			ui.warn(
				`[${event.platform}] cannot rename ${event.from} -> ${event.to || "(empty)"}: ${event.reason}`,
			)
			break
		}
		case "platform:start": {
			ui.header(`${event.platform}: ${event.roms} ROMs`)
			break
		}
		case "images:dir": {
			ui.debug(`images/ ${verb(dryRun, "to create", "created")}`, verbose)
			break
		}
		case "image:matched": {
			ui.info(
				`${verb(dryRun, "[MOVE]", "[MOVED]")} ${event.image} -> images/${event.target} (score:${event.score})`,
			)
			break
		}
		case "image:unmatched": {
			ui.warn(`No ROM for: ${event.image}`)
			break
		}
		case "duplicate": {
			ui.info(
				`[DUPLICATE] ${event.filename} ${verb(dryRun, "to remove", "removed")} (kept ${event.archive})`,
			)
			break
		}
		case "orphan": {
			ui.debug(`orphan image: ${event.image}`, verbose)
			break
		}
		case "orphans:summary": {
			ui.info(
				`Images: ${event.kept} kept, ${event.removed} ${verb(dryRun, "to remove", "removed")}`,
			)
			break
		}
		case "catalog": {
			if (event.changed) {
				ui.info(
					`CSV: ${event.after} entries (before: ${event.before}, +${event.added}, -${event.removed})`,
				)
			} else if (verbose) {
				ui.debug(`CSV unchanged (${event.after} entries)`, verbose)
			}
			if (event.malformed > 0) {
				ui.warn(`CSV: ${event.malformed} malformed lines skipped`)
			}
			break
		}
		case "platform:complete": {
			ui.debug(`${event.platform} done in ${event.durationMs}ms`, verbose)
			break
		}
		case "index": {
			ui.header("Master index")
			ui.info(
				`allfiles.lst: ${event.after} entries (before: ${event.before}, +${event.added}, -${event.removed})${event.changed ? "" : " unchanged"}`,
			)
			if (event.malformed > 0) {
				ui.warn(`allfiles.lst: ${event.malformed} malformed lines skipped`)
			}
			break
		}
		case "index:skip": {
			ui.debug(`Master index skipped: ${event.reason}`, verbose)
			break
		}
		case "references": {
			ui.info(
				`${event.list}: ${event.kept} kept, ${event.removed} ${verb(dryRun, "to remove", "removed")}`,
			)
			break
		}
		case "summary": {
			ui.header("Summary")
			for (const summary of event.platforms) {
				ui.statusLine(summary.platform, summary, summary.status)
			}
			break
		}
		default:
			break
	}
}

export async function runSync(options: RunSyncOptions): Promise<SyncResult> {
	const quiet = Boolean(options.quiet)
	const verbose = Boolean(options.verbose)

	const result: SyncResult = {
		ok: true,
		dryRun: options.dryRun,
		pendingChanges: 0,
		errors: 0,
		conflicts: 0,
		unmatchedImages: 0,
		platforms: [],
		elapsedMs: 0,
	}

	for await (const event of reconcileCard(options)) {
		log.reconcile.debug(event, event.type)
		reportEvent(event, { quiet, verbose, dryRun: options.dryRun })

		switch (event.type) {
			case "rename:collision":
				result.conflicts += 1
				break
			case "image:unmatched":
				result.unmatchedImages += 1
				break
			case "summary":
				result.platforms = event.platforms
				break
			case "run:complete":
				result.pendingChanges = event.pendingChanges
				result.errors = event.errors
				result.elapsedMs = event.durationMs
				break
			default:
				break
		}
	}

	result.ok = result.errors === 0
	log.reconcile.info(
		{
			dryRun: result.dryRun,
			pendingChanges: result.pendingChanges,
			errors: result.errors,
			elapsedMs: result.elapsedMs,
		},
		"sync finished",
	)

	return result
}
