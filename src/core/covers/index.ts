/**
 * Cover fetcher
 *
 * Fills the image directory for ROMs that have no cover yet. The fetcher is
 * injected; the default one reads libretro-thumbnails. Downloads for one
 * platform run in parallel, platforms one after another.
 */

import { DEFAULT_COVER_SIZE, sharpNormalizer } from "../../images.js"
import type { CoverSize, ImageNormalizer } from "../../images.js"
import { log } from "../../logger.js"
import { coverTargetFor } from "../../match.js"
import { runParallel } from "../../parallel.js"
import { PLATFORM_IDS, PLATFORMS } from "../../platforms.js"
import { baseNameOf, resolveRoms } from "../../roms.js"
import { ui } from "../../ui.js"
import { PlatformFolder } from "../../workspace.js"
import type { PlatformId, RomEntry } from "../../types.js"
import { candidateCoverNames, type CoverFetcher } from "./fetcher.js"

export interface CoverOptions {
	root: string
	dryRun: boolean
	fetcher: CoverFetcher
	/** Only this platform (default: all) */
	platform?: PlatformId
	normalizer?: ImageNormalizer
	coverSize?: CoverSize
	/** Parallel downloads per platform */
	jobs?: number
	quiet?: boolean
	verbose?: boolean
}

export interface PlatformCoverResult {
	platform: PlatformId
	/** ROMs without a cover before the run */
	missing: number
	stored: number
	notFound: number
	failed: number
}

export interface CoverResult {
	ok: boolean
	platforms: PlatformCoverResult[]
}

type CoverOutcome =
	| { rom: RomEntry; status: "stored"; name: string }
	| { rom: RomEntry; status: "not-found" }

async function fetchCover(
	folder: PlatformFolder,
	rom: RomEntry,
	fetcher: CoverFetcher,
	report: ((message: string) => void) | null,
): Promise<CoverOutcome> {
	for (const name of candidateCoverNames(rom.baseName)) {
		const bytes = await fetcher.fetch(folder.platform, name)
		if (!bytes) continue

		const result = await folder.writeCover(coverTargetFor(rom), bytes)
		if (!result.ok) throw new Error(result.error)
		report?.(`  ${rom.filename} <- ${name}`)
		return { rom, status: "stored", name }
	}
	report?.(`  no cover for ${rom.filename}`)
	return { rom, status: "not-found" }
}

export async function fetchMissingCovers(
	options: CoverOptions,
): Promise<CoverResult> {
	const quiet = Boolean(options.quiet)
	const verbose = Boolean(options.verbose)
	const platforms = options.platform ? [options.platform] : PLATFORM_IDS
	const results: PlatformCoverResult[] = []

	for (const id of platforms) {
		const folder = PlatformFolder.load(options.root, PLATFORMS[id], {
			dryRun: options.dryRun,
			normalizer: options.normalizer ?? sharpNormalizer,
			coverSize: options.coverSize ?? DEFAULT_COVER_SIZE,
		})
		if (!folder) continue

		const covered = new Set(folder.list("images").map(baseNameOf))
		const missing = resolveRoms(folder.list("roms"), folder.platform).filter(
			rom => !covered.has(rom.baseName),
		)
		const summary: PlatformCoverResult = {
			platform: id,
			missing: missing.length,
			stored: 0,
			notFound: 0,
			failed: 0,
		}
		results.push(summary)

		if (missing.length === 0) continue
		if (options.dryRun) {
			if (!quiet) ui.info(`${id}: ${missing.length} covers to fetch`)
			continue
		}

		const dir = folder.ensureImagesDir()
		if (!dir.ok) {
			summary.failed = missing.length
			ui.error(`${id}: ${dir.error}`)
			continue
		}

		const { success, failed } = await runParallel(
			missing,
			(rom, ctx) =>
				fetchCover(folder, rom, options.fetcher, verbose ? ctx.log : null),
			{ concurrency: options.jobs ?? 4, label: `${id} covers`, quiet },
		)

		for (const outcome of success) {
			if (outcome.status === "stored") summary.stored += 1
			else summary.notFound += 1
		}
		for (const failure of failed) {
			summary.failed += 1
			ui.warn(`${id}: ${failure.item.filename}: ${failure.error}`)
		}

		log.covers.info(summary, "covers fetched")
		if (!quiet) {
			ui.info(
				`${id}: ${summary.stored} stored, ${summary.notFound} not found, ${summary.failed} failed`,
			)
		}
	}

	return {
		ok: results.every(r => r.failed === 0),
		platforms: results,
	}
}

export {
	candidateCoverNames,
	createThumbnailFetcher,
	thumbnailName,
	thumbnailUrl,
	type CoverFetcher,
	type ThumbnailFetcherOptions,
} from "./fetcher.js"
