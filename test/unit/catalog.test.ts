/**
 * Unit tests for catalog parsing and merging
 */

import { describe, it, expect } from "vitest"
import {
	countCatalogLines,
	mergeCatalog,
	parseCatalog,
} from "../../src/catalog.js"
import { rom } from "../helpers/index.js"

describe("parseCatalog", () => {
	it("keys records by the text before the first comma", () => {
		const parsed = parseCatalog("Game.gb,My Game,Mon Jeu\n")
		expect(parsed.records.get("Game.gb")).toEqual(["My Game", "Mon Jeu"])
		expect(parsed.malformed).toEqual([])
	})

	it("trims whitespace around the key", () => {
		const parsed = parseCatalog("  Game.gb ,A,B\r\n")
		expect([...parsed.records.keys()]).toEqual(["Game.gb"])
	})

	it("reports lines without a key", () => {
		const parsed = parseCatalog("NoComma\n\n,Empty,Key\nOk.gb,a,b\n")
		expect(parsed.malformed).toEqual([
			{ lineNumber: 1, line: "NoComma" },
			{ lineNumber: 3, line: ",Empty,Key" },
		])
		expect(parsed.records.size).toBe(1)
	})

	it("lets a later duplicate key win", () => {
		const parsed = parseCatalog("A.gb,first,1\nA.gb,second,2\n")
		expect(parsed.records.get("A.gb")).toEqual(["second", "2"])
	})
})

describe("mergeCatalog", () => {
	it("keeps user fields, adds new ROMs and drops removed ones", () => {
		const merge = mergeCatalog(
			[rom("Game.gb"), rom("New One.gb")],
			"Gone.gb,Gone,Gone\nGame.gb,My Game,Mon Jeu,extra\n",
		)

		expect(merge.text).toBe(
			"Game.gb,My Game,Mon Jeu,extra\nNew One.gb,New One,New One\n",
		)
		expect(merge.before).toBe(2)
		expect(merge.added).toBe(1)
		expect(merge.kept).toBe(1)
		expect(merge.removed).toEqual(["Gone.gb"])
		expect(merge.records[0]).toMatchObject({
			filename: "Game.gb",
			displayName: "My Game",
			localizedName: "Mon Jeu",
			origin: "kept",
		})
		expect(merge.records[1]?.origin).toBe("added")
	})

	it("builds a catalog from scratch", () => {
		const merge = mergeCatalog([rom("Tetris.gb")], null)
		expect(merge.text).toBe("Tetris.gb,Tetris,Tetris\n")
		expect(merge.before).toBe(0)
	})

	it("produces an empty file for no ROMs", () => {
		expect(mergeCatalog([], "Old.gb,Old,Old\n").text).toBe("")
	})

	it("is stable when merged with its own output", () => {
		const roms = [rom("A.gb"), rom("B.zip")]
		const first = mergeCatalog(roms, "B.zip,Bee,Bi\n")
		const second = mergeCatalog(roms, first.text)
		expect(second.text).toBe(first.text)
		expect(second.added).toBe(0)
	})
})

describe("countCatalogLines", () => {
	it("counts non-blank lines", () => {
		expect(countCatalogLines("a,b\n\n c,d \n")).toBe(2)
		expect(countCatalogLines(null)).toBe(0)
	})
})
