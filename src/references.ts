/**
 * Reference lists (favorites.lst, recent.lst)
 *
 * Written by the firmware; this module only removes lines whose ROM is gone.
 */

import { INDEX_DELIMITER } from "./master-index.js"
import { joinLines, splitLines } from "./records.js"

export interface CleanedReferenceList {
	kept: string[]
	removed: string[]
	text: string
}

export function referenceKey(line: string): string {
	const at = line.indexOf(INDEX_DELIMITER)
	return at === -1 ? line : line.slice(0, at)
}

/** Keep a line iff its leading `PLATFORM/filename` key is in `validKeys`. */
export function cleanReferenceList(
	text: string,
	validKeys: ReadonlySet<string>,
): CleanedReferenceList {
	const kept: string[] = []
	const removed: string[] = []

	for (const line of splitLines(text)) {
		if (validKeys.has(referenceKey(line))) {
			kept.push(line)
		} else {
			removed.push(line)
		}
	}

	return { kept, removed, text: joinLines(kept) }
}
