/**
 * Platform table
 *
 * Immutable: built once at module load and never mutated at runtime.
 */

import type { PlatformDef, PlatformId } from "./types.js"

const ARCHIVE_EXTENSIONS = [".zip", ".7z"] as const

interface PlatformSpec {
	id: PlatformId
	label: string
	/** Native ROM extensions; archive formats are appended to every platform */
	extensions: string[]
	thumbnailRepo: string
	discTracks?: boolean
}

function platform(spec: PlatformSpec): PlatformDef {
	const extensions = [...spec.extensions, ...ARCHIVE_EXTENSIONS]
	return Object.freeze({
		id: spec.id,
		label: spec.label,
		extensions: Object.freeze(extensions),
		archiveExtensions: Object.freeze([...ARCHIVE_EXTENSIONS]),
		discTracks: spec.discTracks ?? false,
		thumbnailRepo: spec.thumbnailRepo,
	})
}

export const PLATFORMS: Readonly<Record<PlatformId, PlatformDef>> =
	Object.freeze({
		ATARI: platform({
			id: "ATARI",
			label: "Atari 2600/7800",
			extensions: [".a26", ".a78", ".bin"],
			thumbnailRepo: "Atari_-_2600",
		}),
		FC: platform({
			id: "FC",
			label: "Famicom / NES",
			extensions: [".nes", ".fds"],
			thumbnailRepo: "Nintendo_-_Nintendo_Entertainment_System",
		}),
		GB: platform({
			id: "GB",
			label: "Game Boy",
			extensions: [".gb"],
			thumbnailRepo: "Nintendo_-_Game_Boy",
		}),
		GBA: platform({
			id: "GBA",
			label: "Game Boy Advance",
			extensions: [".gba"],
			thumbnailRepo: "Nintendo_-_Game_Boy_Advance",
		}),
		GBC: platform({
			id: "GBC",
			label: "Game Boy Color",
			extensions: [".gbc"],
			thumbnailRepo: "Nintendo_-_Game_Boy_Color",
		}),
		GG: platform({
			id: "GG",
			label: "Game Gear / Master System",
			extensions: [".gg", ".sms"],
			thumbnailRepo: "Sega_-_Game_Gear",
		}),
		MAME: platform({
			id: "MAME",
			label: "Arcade",
			extensions: [".fba"],
			thumbnailRepo: "MAME",
		}),
		MD: platform({
			id: "MD",
			label: "Mega Drive",
			extensions: [".md", ".gen", ".bin", ".smd"],
			thumbnailRepo: "Sega_-_Mega_Drive_-_Genesis",
		}),
		NGPC: platform({
			id: "NGPC",
			label: "Neo Geo Pocket Color",
			extensions: [".ngp", ".ngc"],
			thumbnailRepo: "SNK_-_Neo_Geo_Pocket_Color",
		}),
		PCE: platform({
			id: "PCE",
			label: "PC Engine",
			extensions: [".pce"],
			thumbnailRepo: "NEC_-_PC_Engine_-_TurboGrafx_16",
		}),
		PS: platform({
			id: "PS",
			label: "PlayStation",
			extensions: [".img", ".iso", ".bin", ".cue", ".pbp", ".chd"],
			thumbnailRepo: "Sony_-_PlayStation",
			discTracks: true,
		}),
		SFC: platform({
			id: "SFC",
			label: "Super Famicom / SNES",
			extensions: [".sfc", ".smc"],
			thumbnailRepo: "Nintendo_-_Super_Nintendo_Entertainment_System",
		}),
	})

/** Platform ids in the fixed processing order (sorted) */
export const PLATFORM_IDS: readonly PlatformId[] = Object.freeze([
	"ATARI",
	"FC",
	"GB",
	"GBA",
	"GBC",
	"GG",
	"MAME",
	"MD",
	"NGPC",
	"PCE",
	"PS",
	"SFC",
])

export function isPlatformId(value: string): value is PlatformId {
	return Object.hasOwn(PLATFORMS, value)
}

/** Case-insensitive lookup, as typed on the command line */
export function findPlatform(value: string): PlatformDef | null {
	const id = value.trim().toUpperCase()
	return isPlatformId(id) ? PLATFORMS[id] : null
}
