/**
 * Box art source: libretro-thumbnails repositories on GitHub
 */

import { Agent, fetch as undiciFetch } from "undici"
import { log } from "../../logger.js"
import type { PlatformDef } from "../../types.js"
import { LaneRateLimiter } from "./rate-limiter.js"

const BASE_URL = "https://raw.githubusercontent.com/libretro-thumbnails"
const USER_AGENT = "sdsync/1.0.0"

const THUMBNAIL_AGENT = new Agent({
	keepAliveTimeout: 30_000,
	keepAliveMaxTimeout: 60_000,
	connections: 8,
	pipelining: 0,
})

/** Characters libretro-thumbnails replaces with "_" in file names */
const UNSAFE_THUMBNAIL_CHARS = /[&*/:`<>?\\|"]/g

/** Trailing "(USA)", "[!]" style tags */
const TRAILING_TAGS = /(\s*[([][^)\]]*[)\]])+$/

export interface CoverFetcher {
	/** Image bytes for `name` on `platform`, or null when there is none */
	fetch(platform: PlatformDef, name: string): Promise<Buffer | null>
}

export interface ThumbnailFetcherOptions {
	/** Minimum delay between requests per lane */
	delayMs: number
	lanes: number
	/** Extra attempts on 429/5xx and network errors */
	retries: number
}

export function thumbnailName(name: string): string {
	return name.replace(UNSAFE_THUMBNAIL_CHARS, "_")
}

/**
 * Identifiers to try for a ROM, most specific first: the full base name, then
 * the title without its trailing region/revision tags.
 */
export function candidateCoverNames(baseName: string): string[] {
	const names = [thumbnailName(baseName)]
	const title = baseName.replace(TRAILING_TAGS, "").trim()
	if (title && title !== baseName) names.push(thumbnailName(title))
	return names
}

export function thumbnailUrl(platform: PlatformDef, name: string): string {
	return `${BASE_URL}/${platform.thumbnailRepo}/master/Named_Boxarts/${encodeURIComponent(name)}.png`
}

export function createThumbnailFetcher(
	options: ThumbnailFetcherOptions,
): CoverFetcher {
	const limiter = new LaneRateLimiter(options.lanes, options.delayMs)

	return {
		async fetch(platform, name) {
			const url = thumbnailUrl(platform, name)
			let lastError = "unknown error"

			for (let attempt = 0; attempt <= options.retries; attempt++) {
				await limiter.wait()
				try {
					const response = await undiciFetch(url, {
						headers: { "User-Agent": USER_AGENT },
						dispatcher: THUMBNAIL_AGENT,
					})

					if (response.status === 404) {
						await response.body?.cancel()
						return null
					}
					if (response.ok) {
						return Buffer.from(await response.arrayBuffer())
					}

					await response.body?.cancel()
					lastError = `HTTP ${response.status}`
					const retryable = response.status === 429 || response.status >= 500
					if (!retryable) break
				} catch (err) {
					lastError = err instanceof Error ? err.message : String(err)
				}
				log.covers.debug({ url, attempt, error: lastError }, "retrying")
			}

			throw new Error(`${name}: ${lastError}`)
		},
	}
}
