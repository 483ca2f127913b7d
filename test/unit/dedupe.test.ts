import { describe, it, expect } from "vitest"
import { findDuplicates } from "../../src/dedupe.js"
import { PLATFORMS } from "../../src/platforms.js"
import { resolveRoms } from "../../src/roms.js"

describe("findDuplicates", () => {
	it("marks uncompressed files that have an archive twin", () => {
		const roms = resolveRoms(
			["Game.gb", "Game.zip", "Other.gb", "Solo.7z"],
			PLATFORMS.GB,
		)
		const duplicates = findDuplicates(roms, PLATFORMS.GB)

		expect(duplicates).toHaveLength(1)
		expect(duplicates[0]?.entry.filename).toBe("Game.gb")
		expect(duplicates[0]?.archive.filename).toBe("Game.zip")
	})

	it("never removes archives", () => {
		const roms = resolveRoms(["Game.7z", "Game.zip"], PLATFORMS.GB)
		expect(findDuplicates(roms, PLATFORMS.GB)).toEqual([])
	})

	it("treats 7z as an archive too", () => {
		const roms = resolveRoms(["Game.7z", "Game.sfc"], PLATFORMS.SFC)
		expect(
			findDuplicates(roms, PLATFORMS.SFC).map(d => d.entry.filename),
		).toEqual(["Game.sfc"])
	})
})
