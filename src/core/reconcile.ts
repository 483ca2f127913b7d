/**
 * Reconciliation engine
 *
 * The ROM files on the card are the source of truth. One run:
 * 1. strips separator characters from ROM and image filenames
 * 2. per platform (sorted): relocates loose images, removes duplicates,
 *    re-resolves the ROM set, prunes orphan images, rewrites the catalog
 * 3. rewrites the master index from every platform's ROM set
 * 4. drops dead entries from favorites and recents
 *
 * Usage:
 * ```ts
 * for await (const event of reconcileCard({ root, dryRun: true })) {
 *   if (event.type === "duplicate") console.log(event.filename)
 * }
 * ```
 *
 * Steps run strictly in sequence: each one reads the folder state left by
 * the previous one.
 */

import { mergeCatalog, parseCatalog } from "../catalog.js"
import { findDuplicates } from "../dedupe.js"
import { DEFAULT_COVER_SIZE, isImageFile, sharpNormalizer } from "../images.js"
import {
	CATALOG_FILE,
	REFERENCE_LISTS,
	masterIndexPath,
	referenceListPath,
} from "../layout.js"
import { log } from "../logger.js"
import { indexKey, mergeMasterIndex } from "../master-index.js"
import { matchImages } from "../match.js"
import { findOrphanImages } from "../orphans.js"
import { PLATFORM_IDS, PLATFORMS } from "../platforms.js"
import type { MalformedLine } from "../records.js"
import { cleanReferenceList } from "../references.js"
import { isRomFile, resolveRoms } from "../roms.js"
import { planRenames } from "../sanitize.js"
import { summarizeFolder } from "../status.js"
import {
	PlatformFolder,
	readTextFile,
	writeTextFile,
	type FolderArea,
	type WorkspaceOptions,
} from "../workspace.js"
import type { FileOpResult, PlatformId, RomEntry } from "../types.js"
import type { MutationOutcome, SyncEvent, SyncOptions } from "./types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function outcome(result: FileOpResult, dryRun: boolean): MutationOutcome {
	return result.ok
		? { applied: !dryRun }
		: { applied: false, error: result.error }
}

const UNCHANGED: MutationOutcome = { applied: false }

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}

/** Whether an event stands for a change to the card (planned or applied) */
export function isChange(event: SyncEvent): boolean {
	switch (event.type) {
		case "rename":
		case "images:dir":
		case "image:matched":
		case "duplicate":
		case "orphan":
			return event.error === undefined
		case "catalog":
		case "index":
		case "references":
			return event.changed && event.error === undefined
		default:
			return false
	}
}

export function isFailure(event: SyncEvent): boolean {
	return "error" in event && event.error !== undefined
}

function warnMalformed(
	source: string,
	malformed: readonly MalformedLine[],
): void {
	for (const { lineNumber, line } of malformed) {
		log.records.warn({ source, lineNumber, line }, "malformed line skipped")
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Step 1: filename sanitizing
// ─────────────────────────────────────────────────────────────────────────────

function* sanitizeArea(
	folder: PlatformFolder,
	area: FolderArea,
	candidates: string[],
): Generator<SyncEvent> {
	const platform = folder.platform.id
	const plan = planRenames(candidates, folder.listAll(area))

	for (const { from, to, reason } of plan.collisions) {
		yield { type: "rename:collision", platform, area, from, to, reason }
	}
	for (const { from, to } of plan.renames) {
		const result = folder.rename(area, from, to)
		yield {
			type: "rename",
			platform,
			area,
			from,
			to,
			...outcome(result, folder.dryRun),
		}
	}
}

function* sanitizeFolder(folder: PlatformFolder): Generator<SyncEvent> {
	const def = folder.platform
	yield* sanitizeArea(
		folder,
		"roms",
		folder.list("roms").filter(n => isRomFile(n, def) || isImageFile(n)),
	)
	if (folder.hasImagesDir) {
		yield* sanitizeArea(folder, "images", folder.list("images"))
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Step 2: per-platform reconciliation
// ─────────────────────────────────────────────────────────────────────────────

async function* relocateLooseImages(
	folder: PlatformFolder,
	roms: readonly RomEntry[],
): AsyncGenerator<SyncEvent> {
	const platform = folder.platform.id
	const loose = folder.list("roms").filter(isImageFile)
	if (loose.length === 0) return

	const { assignments, unmatched } = matchImages(loose, roms)
	for (const assignment of assignments) {
		const result = await folder.storeImage(assignment.image, assignment.target)
		yield {
			type: "image:matched",
			platform,
			image: assignment.image,
			rom: assignment.rom.filename,
			target: assignment.target,
			score: assignment.score,
			...outcome(result, folder.dryRun),
		}
	}
	for (const image of unmatched) {
		yield { type: "image:unmatched", platform, image }
	}
}

/**
 * Remove uncompressed ROMs superseded by an archive, re-resolving after each
 * pass: deleting a cue sheet exposes its tracks, which may have a twin too.
 * Returns the retained ROMs.
 */
function* collapseDuplicates(
	folder: PlatformFolder,
	roms: readonly RomEntry[],
): Generator<SyncEvent, RomEntry[]> {
	const def = folder.platform
	const attempted = new Set<string>()
	let retained = [...roms]

	for (;;) {
		const duplicates = findDuplicates(retained, def).filter(
			d => !attempted.has(d.entry.filename),
		)
		if (duplicates.length === 0) return retained

		for (const { entry, archive } of duplicates) {
			attempted.add(entry.filename)
			const result = folder.remove("roms", entry.filename)
			yield {
				type: "duplicate",
				platform: def.id,
				filename: entry.filename,
				archive: archive.filename,
				...outcome(result, folder.dryRun),
			}
		}
		retained = resolveRoms(folder.list("roms"), def)
	}
}

function* pruneOrphans(
	folder: PlatformFolder,
	retained: readonly RomEntry[],
): Generator<SyncEvent> {
	if (!folder.hasImagesDir) return
	const platform = folder.platform.id

	// Without ROMs the whole directory goes, subdirectories included
	const candidates =
		retained.length > 0 ? folder.list("images") : folder.listAll("images")
	const valid = new Set(retained.map(rom => rom.baseName))

	let removed = 0
	for (const image of findOrphanImages(candidates, valid)) {
		const result = folder.remove("images", image)
		if (result.ok) removed += 1
		yield { type: "orphan", platform, image, ...outcome(result, folder.dryRun) }
	}

	yield {
		type: "orphans:summary",
		platform,
		kept: folder.list("images").length,
		removed,
	}
}

function syncCatalog(
	folder: PlatformFolder,
	retained: readonly RomEntry[],
): SyncEvent {
	const platform = folder.platform.id
	const prior = folder.readText(CATALOG_FILE)

	if (retained.length === 0) {
		// Cleared rather than deleted; a missing catalog stays missing
		const parsed = parseCatalog(prior ?? "")
		const changed = prior !== null && prior !== ""
		const result = changed ? folder.writeText(CATALOG_FILE, "") : null
		return {
			type: "catalog",
			platform,
			before: parsed.records.size,
			after: 0,
			added: 0,
			removed: parsed.records.size,
			malformed: parsed.malformed.length,
			changed,
			...(result ? outcome(result, folder.dryRun) : UNCHANGED),
		}
	}

	const merge = mergeCatalog(retained, prior)
	warnMalformed(`${platform}/${CATALOG_FILE}`, merge.malformed)

	const changed = merge.text !== prior
	const result = changed ? folder.writeText(CATALOG_FILE, merge.text) : null
	return {
		type: "catalog",
		platform,
		before: merge.before,
		after: merge.records.length,
		added: merge.added,
		removed: merge.removed.length,
		malformed: merge.malformed.length,
		changed,
		...(result ? outcome(result, folder.dryRun) : UNCHANGED),
	}
}

async function* reconcilePlatform(
	folder: PlatformFolder,
): AsyncGenerator<SyncEvent> {
	const def = folder.platform
	const platform = def.id
	const roms = resolveRoms(folder.list("roms"), def)

	yield { type: "platform:start", platform, roms: roms.length }

	if (roms.length > 0 && !folder.hasImagesDir) {
		const result = folder.ensureImagesDir()
		yield { type: "images:dir", platform, ...outcome(result, folder.dryRun) }
	}

	yield* relocateLooseImages(folder, roms)
	const retained = yield* collapseDuplicates(folder, roms)

	yield* pruneOrphans(folder, retained)
	yield syncCatalog(folder, retained)
}

// ─────────────────────────────────────────────────────────────────────────────
// Steps 3-4: global index and reference lists
// ─────────────────────────────────────────────────────────────────────────────

function syncMasterIndex(
	root: string,
	roms: readonly RomEntry[],
	dryRun: boolean,
): SyncEvent {
	const path = masterIndexPath(root)
	const prior = readTextFile(path)
	if (prior === null) {
		return { type: "index:skip", reason: `${path} not found` }
	}

	const merge = mergeMasterIndex(roms, prior)
	warnMalformed(path, merge.malformed)

	const changed = merge.text !== prior
	const result = changed ? writeTextFile(path, merge.text, dryRun) : null
	return {
		type: "index",
		before: merge.before,
		after: merge.entries.length,
		added: merge.added,
		removed: merge.removed.length,
		malformed: merge.malformed.length,
		changed,
		...(result ? outcome(result, dryRun) : UNCHANGED),
	}
}

function* cleanReferenceLists(
	root: string,
	validKeys: ReadonlySet<string>,
	dryRun: boolean,
): Generator<SyncEvent> {
	for (const list of REFERENCE_LISTS) {
		const path = referenceListPath(root, list)
		const text = readTextFile(path)
		if (text === null) continue

		const cleaned = cleanReferenceList(text, validKeys)
		const changed = cleaned.text !== text
		const result = changed ? writeTextFile(path, cleaned.text, dryRun) : null
		yield {
			type: "references",
			list,
			kept: cleaned.kept.length,
			removed: cleaned.removed.length,
			changed,
			...(result ? outcome(result, dryRun) : UNCHANGED),
		}
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Main Generator
// ═══════════════════════════════════════════════════════════════════════════════

export async function* reconcileCard(
	options: SyncOptions,
): AsyncGenerator<SyncEvent> {
	const start = Date.now()
	const { root, dryRun } = options
	const workspaceOptions: WorkspaceOptions = {
		dryRun,
		normalizer: options.normalizer ?? sharpNormalizer,
		coverSize: options.coverSize ?? DEFAULT_COVER_SIZE,
	}

	let pendingChanges = 0
	let errors = 0
	const track = (event: SyncEvent): SyncEvent => {
		if (isChange(event)) pendingChanges += 1
		if (isFailure(event)) errors += 1
		return event
	}

	const folders = new Map<PlatformId, PlatformFolder>()
	const loadErrors: SyncEvent[] = []
	for (const id of PLATFORM_IDS) {
		try {
			const folder = PlatformFolder.load(root, PLATFORMS[id], workspaceOptions)
			if (folder) folders.set(id, folder)
		} catch (err) {
			loadErrors.push({
				type: "platform:error",
				platform: id,
				error: errorMessage(err),
			})
		}
	}

	yield { type: "run:start", root, dryRun, platforms: [...folders.keys()] }
	for (const event of loadErrors) yield track(event)

	// Step 1
	for (const folder of folders.values()) {
		for (const event of sanitizeFolder(folder)) yield track(event)
	}

	// Step 2
	const retainedBy = new Map<PlatformId, RomEntry[]>()
	for (const [platform, folder] of folders) {
		const platformStart = Date.now()
		try {
			for await (const event of reconcilePlatform(folder)) yield track(event)
		} catch (err) {
			yield track({ type: "platform:error", platform, error: errorMessage(err) })
		}
		const retained = resolveRoms(folder.list("roms"), folder.platform)
		retainedBy.set(platform, retained)
		yield {
			type: "platform:complete",
			platform,
			roms: retained.length,
			durationMs: Date.now() - platformStart,
		}
	}

	const allRoms = PLATFORM_IDS.flatMap(id => retainedBy.get(id) ?? [])

	// Step 3
	try {
		yield track(syncMasterIndex(root, allRoms, dryRun))
	} catch (err) {
		log.reconcile.error({ err }, "master index sync failed")
		yield track({ type: "index:skip", reason: errorMessage(err) })
		errors += 1
	}

	// Step 4
	try {
		const validKeys = new Set(allRoms.map(indexKey))
		for (const event of cleanReferenceLists(root, validKeys, dryRun)) {
			yield track(event)
		}
	} catch (err) {
		log.reconcile.error({ err }, "reference list cleanup failed")
		errors += 1
	}

	yield {
		type: "summary",
		platforms: [...folders.values()].map(summarizeFolder),
	}

	yield {
		type: "run:complete",
		dryRun,
		pendingChanges,
		errors,
		durationMs: Date.now() - start,
	}
}
