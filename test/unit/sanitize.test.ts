import { describe, it, expect } from "vitest"
import {
	needsSanitizing,
	planRenames,
	sanitizeFilename,
} from "../../src/sanitize.js"

describe("sanitizeFilename", () => {
	it("strips commas and pipes", () => {
		expect(sanitizeFilename("Mario, Land|X.gb")).toBe("Mario LandX.gb")
	})

	it("leaves clean names alone", () => {
		expect(needsSanitizing("Tetris (World).gb")).toBe(false)
	})
})

describe("planRenames", () => {
	it("renames and skips names that would collide", () => {
		const plan = planRenames(["c,d.gb", "ab.gb", "a,b.gb"])

		expect(plan.renames).toEqual([{ from: "c,d.gb", to: "cd.gb" }])
		expect(plan.collisions).toEqual([
			{ from: "a,b.gb", to: "ab.gb", reason: "target-exists" },
		])
	})

	it("detects two files sanitizing to the same name", () => {
		const plan = planRenames(["x|y.gb", "x,y.gb"])

		expect(plan.renames).toEqual([{ from: "x,y.gb", to: "xy.gb" }])
		expect(plan.collisions).toEqual([
			{ from: "x|y.gb", to: "xy.gb", reason: "target-exists" },
		])
	})

	it("checks against other files in the directory", () => {
		const plan = planRenames(["a,b.png"], ["a,b.png", "ab.png"])
		expect(plan.renames).toEqual([])
		expect(plan.collisions[0]?.reason).toBe("target-exists")
	})

	it("refuses names that would lose their base name", () => {
		const plan = planRenames([",.gb"])
		expect(plan.collisions).toEqual([
			{ from: ",.gb", to: ".gb", reason: "empty-name" },
		])
	})
})
