/**
 * Duplicate collapser
 *
 * An archive (.zip/.7z) is the preferred container: once one exists for a base
 * name, uncompressed files sharing that base name are redundant.
 */

import { isArchive } from "./roms.js"
import type { PlatformDef, RomEntry } from "./types.js"

export interface DuplicateRom {
	/** Uncompressed entry to remove */
	entry: RomEntry
	/** Archive that supersedes it */
	archive: RomEntry
}

export function findDuplicates(
	entries: readonly RomEntry[],
	platform: PlatformDef,
): DuplicateRom[] {
	const archives = new Map<string, RomEntry>()
	for (const entry of entries) {
		if (isArchive(entry, platform) && !archives.has(entry.baseName)) {
			archives.set(entry.baseName, entry)
		}
	}
	if (archives.size === 0) return []

	const duplicates: DuplicateRom[] = []
	for (const entry of entries) {
		if (isArchive(entry, platform)) continue
		const archive = archives.get(entry.baseName)
		if (archive) duplicates.push({ entry, archive })
	}
	return duplicates
}
