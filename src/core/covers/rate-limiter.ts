/**
 * Lane-based rate limiter for thumbnail downloads
 *
 * Each "lane" enforces its own minimum delay between requests, so N parallel
 * workers each keep to the per-lane rate.
 */

export class LaneRateLimiter {
	private readonly laneNextAt: number[]
	private rr = 0

	/**
	 * @param lanes Number of concurrent lanes (workers)
	 * @param minDelayMs Minimum delay between requests per lane
	 */
	constructor(
		private readonly lanes: number,
		private readonly minDelayMs: number,
	) {
		this.laneNextAt = Array.from({ length: lanes }, () => 0)
	}

	/** Wait for the next available slot (round-robin over lanes) */
	async wait(): Promise<void> {
		const lane = this.rr++ % this.lanes
		const now = Date.now()
		const nextAt = this.laneNextAt[lane] ?? 0
		const waitMs = Math.max(0, nextAt - now)

		if (waitMs > 0) {
			await new Promise(resolve => setTimeout(resolve, waitMs))
		}

		this.laneNextAt[lane] = Date.now() + this.minDelayMs
	}
}
