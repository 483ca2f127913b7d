/**
 * Fuzzy image matcher
 *
 * Associates loose cover images with ROMs by keyword overlap between their
 * base names. Pure: no filesystem access.
 */

import { COVER_EXTENSION } from "./layout.js"
import { baseNameOf, compareFilenames } from "./roms.js"
import type { RomEntry } from "./types.js"

/** Lowest score that still counts as a match */
export const MIN_MATCH_SCORE = 1

const TOKEN_PATTERN = /[a-z0-9]{2,}/g

export interface ImageAssignment {
	/** Loose image filename */
	image: string
	rom: RomEntry
	score: number
	/** Filename inside the image directory */
	target: string
}

export interface MatchResult {
	assignments: ImageAssignment[]
	unmatched: string[]
}

/** Lowercase alphanumeric runs of two or more characters */
export function tokenize(name: string): Set<string> {
	return new Set(name.toLowerCase().match(TOKEN_PATTERN) ?? [])
}

function tokensOverlap(a: string, b: string): boolean {
	return a === b || a.includes(b) || b.includes(a)
}

/**
 * Number of image tokens that equal, contain, or are contained in some ROM
 * token. Each image token counts at most once.
 */
export function scoreTokens(
	imageTokens: ReadonlySet<string>,
	romTokens: ReadonlySet<string>,
): number {
	let score = 0
	for (const imageToken of imageTokens) {
		for (const romToken of romTokens) {
			if (tokensOverlap(imageToken, romToken)) {
				score += 1
				break
			}
		}
	}
	return score
}

export function scoreNames(imageBaseName: string, romBaseName: string): number {
	return scoreTokens(tokenize(imageBaseName), tokenize(romBaseName))
}

export function coverTargetFor(rom: RomEntry): string {
	return `${rom.baseName}${COVER_EXTENSION}`
}

/**
 * Assign each loose image to its best-scoring ROM.
 *
 * Images are visited in filename order. The strictly highest score wins and
 * ties keep the earliest ROM of `roms`. A base name takes at most one image
 * per call, since ROMs sharing it share a cover file; later images skip
 * base names already assigned.
 */
export function matchImages(
	images: readonly string[],
	roms: readonly RomEntry[],
): MatchResult {
	const romTokens = roms.map(rom => tokenize(rom.baseName))
	const used = new Set<string>()
	const assignments: ImageAssignment[] = []
	const unmatched: string[] = []

	for (const image of [...images].sort(compareFilenames)) {
		const imageTokens = tokenize(baseNameOf(image))
		let best: RomEntry | null = null
		let bestScore = 0

		for (const [index, rom] of roms.entries()) {
			if (used.has(rom.baseName)) continue
			const score = scoreTokens(imageTokens, romTokens[index] ?? new Set())
			if (score > bestScore) {
				bestScore = score
				best = rom
			}
		}

		if (best && bestScore >= MIN_MATCH_SCORE) {
			used.add(best.baseName)
			assignments.push({
				image,
				rom: best,
				score: bestScore,
				target: coverTargetFor(best),
			})
		} else {
			unmatched.push(image)
		}
	}

	return { assignments, unmatched }
}
