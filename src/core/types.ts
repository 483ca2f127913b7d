/**
 * Core types for the reconciliation engine
 *
 * The engine is an async generator of events; the CLI (and tests) consume
 * them to print, log, and count. Every mutating event carries `applied`
 * (false in dry-run) and an `error` when the filesystem refused.
 */

import type { CoverSize, ImageNormalizer } from "../images.js"
import type { ReferenceListName } from "../layout.js"
import type { FolderArea } from "../workspace.js"
import type { PlatformId, PlatformSummary } from "../types.js"

export interface SyncOptions {
	/** Path to SD card root directory */
	root: string
	/** Compute and report only; no file is touched */
	dryRun: boolean
	/** Image conversion for relocated covers (default: sharp) */
	normalizer?: ImageNormalizer
	coverSize?: CoverSize
}

export interface MutationOutcome {
	applied: boolean
	error?: string
}

export type SyncEvent =
	| { type: "run:start"; root: string; dryRun: boolean; platforms: PlatformId[] }
	| ({
			type: "rename"
			platform: PlatformId
			area: FolderArea
			from: string
			to: string
	  } & MutationOutcome)
	| {
			type: "rename:collision"
			platform: PlatformId
			area: FolderArea
			from: string
			to: string
			reason: "target-exists" | "empty-name"
	  }
	| { type: "platform:start"; platform: PlatformId; roms: number }
	| ({ type: "images:dir"; platform: PlatformId } & MutationOutcome)
	| ({
			type: "image:matched"
			platform: PlatformId
			image: string
			rom: string
			target: string
			score: number
	  } & MutationOutcome)
	| { type: "image:unmatched"; platform: PlatformId; image: string }
	| ({
			type: "duplicate"
			platform: PlatformId
			filename: string
			archive: string
	  } & MutationOutcome)
	| ({ type: "orphan"; platform: PlatformId; image: string } & MutationOutcome)
	| {
			type: "orphans:summary"
			platform: PlatformId
			kept: number
			removed: number
	  }
	| ({
			type: "catalog"
			platform: PlatformId
			before: number
			after: number
			added: number
			removed: number
			malformed: number
			changed: boolean
	  } & MutationOutcome)
	| {
			type: "platform:complete"
			platform: PlatformId
			roms: number
			durationMs: number
	  }
	| { type: "platform:error"; platform: PlatformId; error: string }
	| ({
			type: "index"
			before: number
			after: number
			added: number
			removed: number
			malformed: number
			changed: boolean
	  } & MutationOutcome)
	| { type: "index:skip"; reason: string }
	| ({
			type: "references"
			list: ReferenceListName
			kept: number
			removed: number
			changed: boolean
	  } & MutationOutcome)
	| { type: "summary"; platforms: PlatformSummary[] }
	| {
			type: "run:complete"
			dryRun: boolean
			pendingChanges: number
			errors: number
			durationMs: number
	  }

export type SyncEventType = SyncEvent["type"]
