/**
 * Per-platform reconciliation status
 */

import { countCatalogLines } from "./catalog.js"
import { passthroughNormalizer, DEFAULT_COVER_SIZE } from "./images.js"
import { CATALOG_FILE } from "./layout.js"
import { PLATFORM_IDS, PLATFORMS } from "./platforms.js"
import { resolveRoms } from "./roms.js"
import { PlatformFolder } from "./workspace.js"
import type { PlatformStatus, PlatformSummary } from "./types.js"

export function platformStatus(counts: {
	roms: number
	catalog: number
	images: number
}): PlatformStatus {
	const { roms, catalog, images } = counts
	if (roms === 0 && images === 0) return "EMPTY"
	if (roms === 0) return "NO_ROMS"
	if (roms === catalog && catalog === images) return "OK"
	return "MISMATCH"
}

export function summarizeFolder(folder: PlatformFolder): PlatformSummary {
	const counts = {
		roms: resolveRoms(folder.list("roms"), folder.platform).length,
		catalog: countCatalogLines(folder.readText(CATALOG_FILE)),
		images: folder.list("images").length,
	}
	return {
		platform: folder.platform.id,
		...counts,
		status: platformStatus(counts),
	}
}

/** Status of every platform folder present on the card, as it is on disk */
export function collectStatus(root: string): PlatformSummary[] {
	const summaries: PlatformSummary[] = []
	for (const id of PLATFORM_IDS) {
		const folder = PlatformFolder.load(root, PLATFORMS[id], {
			dryRun: true,
			normalizer: passthroughNormalizer,
			coverSize: DEFAULT_COVER_SIZE,
		})
		if (folder) summaries.push(summarizeFolder(folder))
	}
	return summaries
}
