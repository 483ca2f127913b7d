/**
 * Platform ROM resolver
 *
 * Turns a folder listing into the authoritative, ordered list of ROM entries
 * for one platform. Everything here works on names only; callers supply the
 * listing.
 */

import type { PlatformDef, RomEntry } from "./types.js"

/** "(Track 2)" style suffix carried by the .bin files of a multi-track cue */
const TRACK_SUFFIX = /\s*\(Track\s*\d+\)$/i

/**
 * Split a filename into base name and lowercase extension.
 * A leading dot is part of the base name (".hidden" has no extension).
 */
export function splitFilename(filename: string): {
	baseName: string
	extension: string
} {
	const dot = filename.lastIndexOf(".")
	if (dot <= 0) return { baseName: filename, extension: "" }
	return {
		baseName: filename.slice(0, dot),
		extension: filename.slice(dot).toLowerCase(),
	}
}

export function baseNameOf(filename: string): string {
	return splitFilename(filename).baseName
}

/** Code-unit ordering, independent of locale and directory iteration order */
export function compareFilenames(a: string, b: string): number {
	if (a < b) return -1
	if (a > b) return 1
	return 0
}

export function isRomFile(filename: string, platform: PlatformDef): boolean {
	const { extension } = splitFilename(filename)
	return extension !== "" && platform.extensions.includes(extension)
}

export function isArchive(entry: RomEntry, platform: PlatformDef): boolean {
	return platform.archiveExtensions.includes(entry.extension)
}

export function toRomEntry(
	filename: string,
	platform: PlatformDef,
): RomEntry | null {
	if (!isRomFile(filename, platform)) return null
	const { baseName, extension } = splitFilename(filename)
	return { platform: platform.id, filename, baseName, extension }
}

export function stripTrackSuffix(baseName: string): string {
	return baseName.replace(TRACK_SUFFIX, "")
}

/**
 * Drop .bin entries that are tracks of a .cue sheet present in the list.
 *
 * `Title (Track 1).bin`, `Title (Track 2).bin` and a single-track `Title.bin`
 * all belong to `Title.cue`. A .bin with no matching sheet stays.
 */
export function collapseDiscTracks(entries: readonly RomEntry[]): RomEntry[] {
	const cueBases = new Set(
		entries.filter(e => e.extension === ".cue").map(e => e.baseName),
	)
	if (cueBases.size === 0) return [...entries]

	return entries.filter(
		e => e.extension !== ".bin" || !cueBases.has(stripTrackSuffix(e.baseName)),
	)
}

/**
 * Resolve the authoritative ROM list from a folder listing.
 * Sorted by filename; disc tracks collapsed on platforms that use cue sheets.
 */
export function resolveRoms(
	filenames: Iterable<string>,
	platform: PlatformDef,
): RomEntry[] {
	const entries: RomEntry[] = []
	for (const filename of filenames) {
		const entry = toRomEntry(filename, platform)
		if (entry) entries.push(entry)
	}
	entries.sort((a, b) => compareFilenames(a.filename, b.filename))

	return platform.discTracks ? collapseDiscTracks(entries) : entries
}
