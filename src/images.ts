/**
 * Cover image handling
 *
 * Stored covers are PNGs normalized to the firmware's canvas. Normalization sits
 * behind ImageNormalizer so the reconciliation engine never decodes pixels.
 */

import sharp from "sharp"
import { splitFilename } from "./roms.js"

/** Formats accepted as cover candidates */
export const IMAGE_EXTENSIONS: readonly string[] = Object.freeze([
	".jpg",
	".jpeg",
	".png",
	".bmp",
	".gif",
])

export interface CoverSize {
	width: number
	height: number
}

export const DEFAULT_COVER_SIZE: CoverSize = { width: 320, height: 240 }

export interface ImageNormalizer {
	/** Return image bytes ready to be stored at `size` */
	normalize(input: Buffer, size: CoverSize): Promise<Buffer>
}

export function isImageFile(filename: string): boolean {
	return IMAGE_EXTENSIONS.includes(splitFilename(filename).extension)
}

/**
 * Resize onto a transparent canvas of exactly `size`, keeping aspect ratio,
 * and encode as PNG.
 */
export const sharpNormalizer: ImageNormalizer = {
	async normalize(input, size) {
		return sharp(input)
			.resize(size.width, size.height, {
				fit: "contain",
				background: { r: 0, g: 0, b: 0, alpha: 0 },
			})
			.png()
			.toBuffer()
	},
}

/** Store bytes unchanged (`--no-resize`) */
export const passthroughNormalizer: ImageNormalizer = {
	async normalize(input) {
		return input
	},
}
