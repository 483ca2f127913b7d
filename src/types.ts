/**
 * Shared type definitions for sdsync
 */

// ─────────────────────────────────────────────────────────────────────────────
// Platforms
// ─────────────────────────────────────────────────────────────────────────────

export type PlatformId =
	| "ATARI"
	| "FC"
	| "GB"
	| "GBA"
	| "GBC"
	| "GG"
	| "MAME"
	| "MD"
	| "NGPC"
	| "PCE"
	| "PS"
	| "SFC"

export interface PlatformDef {
	/** Folder name on the card (FC, GB, PS, ...) */
	id: PlatformId
	/** Human-readable label for display */
	label: string
	/** Accepted ROM extensions, lowercase with leading dot */
	extensions: readonly string[]
	/** Compressed containers preferred over their uncompressed variants */
	archiveExtensions: readonly string[]
	/** Whether .bin tracks of a .cue sheet collapse into the sheet */
	discTracks: boolean
	/** libretro-thumbnails repository holding box art for this platform */
	thumbnailRepo: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Entries & records
// ─────────────────────────────────────────────────────────────────────────────

/** One authoritative game file, recomputed from disk on every run */
export interface RomEntry {
	platform: PlatformId
	/** Exact on-disk filename */
	filename: string
	/** Filename without extension; joins ROMs to images and records */
	baseName: string
	/** Lowercase extension with leading dot */
	extension: string
}

/** Row of a platform's filelist.csv */
export interface CatalogRecord {
	filename: string
	displayName: string
	localizedName: string
	/** Every field after the filename, re-emitted verbatim */
	fields: readonly string[]
}

/** Row of the master index (allfiles.lst) */
export interface IndexEntry {
	/** PLATFORM/filename */
	key: string
	displayName: string
	upperName: string
	localizedName: string
	abbreviatedName: string
	fields: readonly string[]
}

export type RecordOrigin = "kept" | "added"

// ─────────────────────────────────────────────────────────────────────────────
// Status
// ─────────────────────────────────────────────────────────────────────────────

/**
 * - EMPTY: no ROMs and no images
 * - NO_ROMS: images left without any ROM
 * - OK: ROM, catalog and image counts agree
 * - MISMATCH: any other combination (informational)
 */
export type PlatformStatus = "EMPTY" | "NO_ROMS" | "OK" | "MISMATCH"

export interface PlatformSummary {
	platform: PlatformId
	roms: number
	catalog: number
	images: number
	status: PlatformStatus
}

// ─────────────────────────────────────────────────────────────────────────────
// File operations
// ─────────────────────────────────────────────────────────────────────────────

export type FileOpResult = { ok: true } | { ok: false; error: string }
