/**
 * Per-platform catalog (filelist.csv)
 *
 * `filename,displayName,localizedName` per line. Display and localized names
 * are edited by the user and survive regeneration.
 */

import {
	formatRecord,
	joinLines,
	mergeRecords,
	parseRecords,
	splitLines,
	type MalformedLine,
	type ParsedRecords,
} from "./records.js"
import type { CatalogRecord, RecordOrigin, RomEntry } from "./types.js"

export const CATALOG_DELIMITER = ","

export interface CatalogMerge {
	records: Array<CatalogRecord & { origin: RecordOrigin }>
	/** Serialized catalog */
	text: string
	/** Records in the prior catalog */
	before: number
	added: number
	kept: number
	removed: string[]
	malformed: MalformedLine[]
}

export function parseCatalog(text: string): ParsedRecords {
	return parseRecords(text, { delimiter: CATALOG_DELIMITER, trimKey: true })
}

export function toCatalogRecord(
	filename: string,
	fields: readonly string[],
): CatalogRecord {
	return {
		filename,
		displayName: fields[0] ?? "",
		localizedName: fields[1] ?? "",
		fields,
	}
}

/** Placeholder names for a ROM the catalog has never seen */
export function synthesizeCatalogFields(rom: RomEntry): string[] {
	return [rom.baseName, rom.baseName]
}

/**
 * Rebuild a platform catalog for `roms` from the prior catalog text.
 * Known filenames keep every field verbatim.
 */
export function mergeCatalog(
	roms: readonly RomEntry[],
	priorText: string | null,
): CatalogMerge {
	const prior = parseCatalog(priorText ?? "")
	const merged = mergeRecords(roms, prior.records, {
		keyOf: rom => rom.filename,
		synthesize: synthesizeCatalogFields,
	})

	return {
		records: merged.records.map(r => ({
			...toCatalogRecord(r.key, r.fields),
			origin: r.origin,
		})),
		text: joinLines(
			merged.records.map(r =>
				formatRecord(r.key, r.fields, CATALOG_DELIMITER),
			),
		),
		before: prior.records.size,
		added: merged.added,
		kept: merged.kept,
		removed: merged.removed,
		malformed: prior.malformed,
	}
}

/** Number of non-blank lines, as the firmware counts entries */
export function countCatalogLines(text: string | null): number {
	return text === null ? 0 : splitLines(text).length
}
