/**
 * Core module exports
 *
 * Reconciliation engine (async generator of events) and the runners the CLI
 * builds on.
 */

// Reconciliation engine
export { reconcileCard, isChange, isFailure } from "./reconcile.js"
export { runSync } from "./sync.js"
export type { RunSyncOptions, SyncResult } from "./sync.js"

// Cover fetcher
export {
	fetchMissingCovers,
	candidateCoverNames,
	createThumbnailFetcher,
	thumbnailName,
	thumbnailUrl,
} from "./covers/index.js"
export type {
	CoverFetcher,
	CoverOptions,
	CoverResult,
	PlatformCoverResult,
	ThumbnailFetcherOptions,
} from "./covers/index.js"
export { LaneRateLimiter } from "./covers/rate-limiter.js"

// Shared types
export type {
	MutationOutcome,
	SyncEvent,
	SyncEventType,
	SyncOptions,
} from "./types.js"
