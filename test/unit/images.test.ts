import sharp from "sharp"
import { describe, it, expect } from "vitest"
import {
	DEFAULT_COVER_SIZE,
	isImageFile,
	passthroughNormalizer,
	sharpNormalizer,
} from "../../src/images.js"

describe("isImageFile", () => {
	it("accepts common image extensions in any case", () => {
		expect(isImageFile("shot.JPG")).toBe(true)
		expect(isImageFile("box.webp")).toBe(false)
		expect(isImageFile("Game.gb")).toBe(false)
	})
})

describe("sharpNormalizer", () => {
	it("fits an image onto the cover canvas as PNG", async () => {
		const input = await sharp({
			create: {
				width: 100,
				height: 200,
				channels: 3,
				background: { r: 255, g: 0, b: 0 },
			},
		})
			.jpeg()
			.toBuffer()

		const output = await sharpNormalizer.normalize(input, DEFAULT_COVER_SIZE)
		const meta = await sharp(output).metadata()

		expect(meta.format).toBe("png")
		expect(meta.width).toBe(320)
		expect(meta.height).toBe(240)
	})
})

describe("passthroughNormalizer", () => {
	it("returns the input bytes", async () => {
		const input = Buffer.from("not an image")
		expect(await passthroughNormalizer.normalize(input, DEFAULT_COVER_SIZE)).toBe(
			input,
		)
	})
})
