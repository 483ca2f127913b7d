import { describe, it, expect } from "vitest"
import {
	indexKey,
	mergeMasterIndex,
	parseMasterIndex,
} from "../../src/master-index.js"
import { rom } from "../helpers/index.js"

describe("indexKey", () => {
	it("joins platform and filename", () => {
		expect(indexKey(rom("Title.cue", "PS"))).toBe("PS/Title.cue")
	})
})

describe("parseMasterIndex", () => {
	it("splits pipe-delimited fields", () => {
		const parsed = parseMasterIndex("GB/A.gb|A|A|Ah|A\nbroken line\n")
		expect(parsed.records.get("GB/A.gb")).toEqual(["A", "A", "Ah", "A"])
		expect(parsed.malformed).toEqual([{ lineNumber: 2, line: "broken line" }])
	})
})

describe("mergeMasterIndex", () => {
	it("synthesizes new entries with an uppercase name", () => {
		const merge = mergeMasterIndex([rom("Tetris Deluxe.gb")], "")
		expect(merge.text).toBe(
			"GB/Tetris Deluxe.gb|Tetris Deluxe|TETRIS DELUXE|Tetris Deluxe|Tetris Deluxe\n",
		)
		expect(merge.entries[0]).toMatchObject({
			key: "GB/Tetris Deluxe.gb",
			upperName: "TETRIS DELUXE",
			origin: "added",
		})
	})

	it("keeps existing entries verbatim and removes stale ones", () => {
		const merge = mergeMasterIndex(
			[rom("Mario.gb"), rom("Title.cue", "PS")],
			"GB/Deleted.gb|x|X|x|x\nGB/Mario.gb|Mario!|MARIO!|Mario JP|SML\n",
		)

		expect(merge.text).toBe(
			"GB/Mario.gb|Mario!|MARIO!|Mario JP|SML\nPS/Title.cue|Title|TITLE|Title|Title\n",
		)
		expect(merge.removed).toEqual(["GB/Deleted.gb"])
		expect(merge.kept).toBe(1)
		expect(merge.added).toBe(1)
		expect(merge.before).toBe(2)
	})
})
