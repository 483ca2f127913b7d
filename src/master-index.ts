/**
 * Master index (cubegm/allfiles.lst)
 *
 * One global record per ROM across all platforms:
 * `PLATFORM/filename|displayName|UPPERCASE|localizedName|abbreviatedName`
 */

import {
	formatRecord,
	joinLines,
	mergeRecords,
	parseRecords,
	type MalformedLine,
	type ParsedRecords,
} from "./records.js"
import type { IndexEntry, RecordOrigin, RomEntry } from "./types.js"

export const INDEX_DELIMITER = "|"

export interface IndexMerge {
	entries: Array<IndexEntry & { origin: RecordOrigin }>
	text: string
	before: number
	added: number
	kept: number
	removed: string[]
	malformed: MalformedLine[]
}

export function indexKey(rom: RomEntry): string {
	return `${rom.platform}/${rom.filename}`
}

export function parseMasterIndex(text: string): ParsedRecords {
	return parseRecords(text, { delimiter: INDEX_DELIMITER })
}

export function toIndexEntry(
	key: string,
	fields: readonly string[],
): IndexEntry {
	return {
		key,
		displayName: fields[0] ?? "",
		upperName: fields[1] ?? "",
		localizedName: fields[2] ?? "",
		abbreviatedName: fields[3] ?? "",
		fields,
	}
}

export function synthesizeIndexFields(rom: RomEntry): string[] {
	const name = rom.baseName
	return [name, name.toUpperCase(), name, name]
}

/**
 * Rebuild the master index. `roms` must already be in output order
 * (platforms sorted, filenames sorted within each platform).
 */
export function mergeMasterIndex(
	roms: readonly RomEntry[],
	priorText: string,
): IndexMerge {
	const prior = parseMasterIndex(priorText)
	const merged = mergeRecords(roms, prior.records, {
		keyOf: indexKey,
		synthesize: synthesizeIndexFields,
	})

	return {
		entries: merged.records.map(r => ({
			...toIndexEntry(r.key, r.fields),
			origin: r.origin,
		})),
		text: joinLines(
			merged.records.map(r => formatRecord(r.key, r.fields, INDEX_DELIMITER)),
		),
		before: prior.records.size,
		added: merged.added,
		kept: merged.kept,
		removed: merged.removed,
		malformed: prior.malformed,
	}
}
