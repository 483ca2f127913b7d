/**
 * Unit tests for the fuzzy image matcher
 */

import { describe, it, expect } from "vitest"
import {
	matchImages,
	scoreNames,
	scoreTokens,
	tokenize,
} from "../../src/match.js"
import { rom } from "../helpers/index.js"

describe("tokenize", () => {
	it("splits on non-alphanumerics and lowercases", () => {
		expect([...tokenize("Super Mario Land")]).toEqual([
			"super",
			"mario",
			"land",
		])
	})

	it("drops single-character runs", () => {
		expect([...tokenize("a-b_cd 3D!")]).toEqual(["cd", "3d"])
	})

	it("deduplicates tokens", () => {
		expect(tokenize("Mario mario MARIO").size).toBe(1)
	})
})

describe("scoreTokens", () => {
	it("counts overlapping image tokens", () => {
		expect(
			scoreTokens(
				new Set(["mario", "land", "shot"]),
				new Set(["super", "mario", "land"]),
			),
		).toBe(2)
	})

	it("counts substring matches in either direction", () => {
		expect(scoreTokens(new Set(["zelda"]), new Set(["zeldadx"]))).toBe(1)
		expect(scoreTokens(new Set(["zeldadx"]), new Set(["zelda"]))).toBe(1)
	})

	it("counts an image token once even if several ROM tokens match", () => {
		expect(scoreTokens(new Set(["mario"]), new Set(["mario", "marios"]))).toBe(
			1,
		)
	})

	it("scores zero without overlap", () => {
		expect(scoreNames("unrelated_cover", "Super Mario Land")).toBe(0)
	})
})

describe("matchImages", () => {
	it("assigns an overlapping image and leaves an unrelated one", () => {
		const result = matchImages(
			["unrelated_cover.png", "mario_land_shot.png"],
			[rom("Super Mario Land.gb")],
		)

		expect(result.assignments).toHaveLength(1)
		expect(result.assignments[0]?.image).toBe("mario_land_shot.png")
		expect(result.assignments[0]?.rom.filename).toBe("Super Mario Land.gb")
		expect(result.assignments[0]?.score).toBe(2)
		expect(result.assignments[0]?.target).toBe("Super Mario Land.png")
		expect(result.unmatched).toEqual(["unrelated_cover.png"])
	})

	it("picks the strictly highest score", () => {
		const result = matchImages(
			["super_mario.png"],
			[rom("Mario Golf.gb"), rom("Super Mario Land.gb")],
		)
		expect(result.assignments[0]?.rom.filename).toBe("Super Mario Land.gb")
	})

	it("keeps the earliest ROM on a tie", () => {
		const result = matchImages(
			["tetris.png"],
			[rom("Tetris A.gb"), rom("Tetris B.gb")],
		)
		expect(result.assignments[0]?.rom.filename).toBe("Tetris A.gb")
		expect(result.assignments[0]?.score).toBe(1)
	})

	it("gives a ROM at most one image", () => {
		const result = matchImages(
			["tetris_box.jpg", "tetris.png"],
			[rom("Tetris.gb")],
		)
		expect(result.assignments.map(a => a.image)).toEqual(["tetris.png"])
		expect(result.unmatched).toEqual(["tetris_box.jpg"])
	})

	it("gives a base name at most one image across formats", () => {
		const result = matchImages(
			["game_a.png", "game_b.png"],
			[rom("Game.gb"), rom("Game.zip")],
		)
		expect(result.assignments).toHaveLength(1)
		expect(result.assignments[0]).toMatchObject({
			image: "game_a.png",
			target: "Game.png",
		})
		expect(result.unmatched).toEqual(["game_b.png"])
	})

	it("reports every image as unmatched when there are no ROMs", () => {
		const result = matchImages(["a_cover.png"], [])
		expect(result.assignments).toEqual([])
		expect(result.unmatched).toEqual(["a_cover.png"])
	})
})
