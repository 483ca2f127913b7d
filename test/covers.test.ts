/**
 * Tests for the cover fetcher
 *
 * The network source is replaced by an in-memory CoverFetcher.
 */

import { describe, it, expect, vi } from "vitest"
import {
	candidateCoverNames,
	fetchMissingCovers,
	thumbnailName,
	thumbnailUrl,
	type CoverFetcher,
} from "../src/core/covers/index.js"
import { LaneRateLimiter } from "../src/core/covers/rate-limiter.js"
import { passthroughNormalizer } from "../src/images.js"
import { PLATFORMS } from "../src/platforms.js"
import {
	listCardDir,
	readCardFile,
	snapshotTree,
	withTempDir,
	writeCard,
} from "./helpers/index.js"

function fakeFetcher(covers: Record<string, string>): CoverFetcher & {
	calls: string[]
} {
	const calls: string[] = []
	return {
		calls,
		async fetch(platform, name) {
			calls.push(`${platform.id}/${name}`)
			const cover = covers[name]
			return cover === undefined ? null : Buffer.from(cover)
		},
	}
}

const CARD = {
	"GB/Tetris (World).gb": "rom",
	"GB/Zelda.gb": "rom",
	"GB/Known.gb": "rom",
	"GB/images/Known.png": "known",
}

// ─────────────────────────────────────────────────────────────────────────────
// Naming
// ─────────────────────────────────────────────────────────────────────────────

describe("candidateCoverNames", () => {
	it("tries the full name, then the bare title", () => {
		expect(candidateCoverNames("Tetris (World) (Rev 1)")).toEqual([
			"Tetris (World) (Rev 1)",
			"Tetris",
		])
	})

	it("has a single candidate for an untagged name", () => {
		expect(candidateCoverNames("Zelda")).toEqual(["Zelda"])
	})
})

describe("thumbnailUrl", () => {
	it("replaces reserved characters and encodes the name", () => {
		expect(thumbnailName("Tom & Jerry: Frantic")).toBe("Tom _ Jerry_ Frantic")
		expect(thumbnailUrl(PLATFORMS.GB, "Tom _ Jerry")).toBe(
			"https://raw.githubusercontent.com/libretro-thumbnails/Nintendo_-_Game_Boy/master/Named_Boxarts/Tom%20_%20Jerry.png",
		)
	})
})

describe("LaneRateLimiter", () => {
	it("does not delay the first request of each lane", async () => {
		const limiter = new LaneRateLimiter(2, 10_000)
		const start = Date.now()
		await limiter.wait()
		await limiter.wait()
		expect(Date.now() - start).toBeLessThan(1_000)
	})
})

// ─────────────────────────────────────────────────────────────────────────────
// fetchMissingCovers
// ─────────────────────────────────────────────────────────────────────────────

describe("fetchMissingCovers", () => {
	it("stores covers for ROMs that have none", async () => {
		await withTempDir(async root => {
			writeCard(root, CARD)
			const fetcher = fakeFetcher({ Tetris: "tetris-art" })

			const result = await fetchMissingCovers({
				root,
				dryRun: false,
				fetcher,
				normalizer: passthroughNormalizer,
				quiet: true,
			})

			expect(result).toEqual({
				ok: true,
				platforms: [
					{ platform: "GB", missing: 2, stored: 1, notFound: 1, failed: 0 },
				],
			})
			expect(listCardDir(root, "GB/images")).toEqual([
				"Known.png",
				"Tetris (World).png",
			])
			expect(readCardFile(root, "GB/images/Tetris (World).png")).toBe(
				"tetris-art",
			)
			expect([...fetcher.calls].sort()).toEqual([
				"GB/Tetris",
				"GB/Tetris (World)",
				"GB/Zelda",
			])
		})
	})

	it("prints each lookup when verbose", async () => {
		await withTempDir(async root => {
			writeCard(root, CARD)
			const print = vi.spyOn(console, "log").mockImplementation(() => {})

			try {
				await fetchMissingCovers({
					root,
					dryRun: false,
					fetcher: fakeFetcher({ Tetris: "tetris-art" }),
					normalizer: passthroughNormalizer,
					quiet: true,
					verbose: true,
				})
				expect(print.mock.calls.map(([line]) => String(line)).sort()).toEqual([
					"  Tetris (World).gb <- Tetris",
					"  no cover for Zelda.gb",
				])
			} finally {
				print.mockRestore()
			}
		})
	})

	it("only counts in dry-run", async () => {
		await withTempDir(async root => {
			writeCard(root, CARD)
			const before = snapshotTree(root)
			const fetcher = fakeFetcher({ Tetris: "tetris-art" })

			const result = await fetchMissingCovers({
				root,
				dryRun: true,
				fetcher,
				quiet: true,
			})

			expect(result.platforms[0]).toMatchObject({ missing: 2, stored: 0 })
			expect(fetcher.calls).toEqual([])
			expect(snapshotTree(root)).toEqual(before)
		})
	})

	it("reports failed downloads", async () => {
		await withTempDir(async root => {
			writeCard(root, { "GB/Zelda.gb": "rom" })
			const fetcher: CoverFetcher = {
				async fetch() {
					throw new Error("HTTP 503")
				},
			}

			const result = await fetchMissingCovers({
				root,
				dryRun: false,
				fetcher,
				quiet: true,
			})

			expect(result.ok).toBe(false)
			expect(result.platforms[0]).toMatchObject({ failed: 1, stored: 0 })
		})
	})

	it("limits the run to one platform", async () => {
		await withTempDir(async root => {
			writeCard(root, { "GB/A.gb": "rom", "GBA/B.gba": "rom" })
			const fetcher = fakeFetcher({})

			const result = await fetchMissingCovers({
				root,
				dryRun: false,
				fetcher,
				platform: "GBA",
				quiet: true,
			})

			expect(result.platforms.map(p => p.platform)).toEqual(["GBA"])
			expect(fetcher.calls).toEqual(["GBA/B"])
		})
	})
})
