/**
 * Keyed delimited records
 *
 * Shared engine behind the per-platform catalog and the master index: both are
 * one-record-per-line text files whose first field is a key and whose other
 * fields belong to the user (display names, translations). Merging keeps those
 * fields for keys that are still backed by a ROM, synthesizes them for new
 * keys, and drops everything else.
 */

import type { RecordOrigin } from "./types.js"

export interface MalformedLine {
	/** 1-based line number in the source text */
	lineNumber: number
	line: string
}

export interface ParsedRecords {
	/** Key → fields after the key; a later duplicate key wins */
	records: Map<string, string[]>
	malformed: MalformedLine[]
}

export interface ParseOptions {
	delimiter: string
	/** Trim whitespace around the key */
	trimKey?: boolean
}

export interface MergedRecord<T> {
	key: string
	fields: readonly string[]
	item: T
	origin: RecordOrigin
}

export interface MergeResult<T> {
	records: MergedRecord<T>[]
	added: number
	kept: number
	/** Prior keys with no backing item, in their original order */
	removed: string[]
}

export interface MergeOptions<T> {
	keyOf: (item: T) => string
	synthesize: (item: T) => string[]
}

export function splitLines(text: string): string[] {
	return text
		.split(/\r?\n/)
		.map(line => line.trim())
		.filter(line => line.length > 0)
}

/**
 * Parse keyed lines. A line without the delimiter, or with an empty key, is
 * malformed: it is reported and left out of the map.
 */
export function parseRecords(
	text: string,
	options: ParseOptions,
): ParsedRecords {
	const { delimiter, trimKey = false } = options
	const records = new Map<string, string[]>()
	const malformed: MalformedLine[] = []

	text.split(/\r?\n/).forEach((raw, index) => {
		const line = raw.trim()
		if (!line) return

		const at = line.indexOf(delimiter)
		const key = at > 0 ? line.slice(0, at) : ""
		const cleanKey = trimKey ? key.trim() : key
		if (!cleanKey) {
			malformed.push({ lineNumber: index + 1, line })
			return
		}

		records.set(cleanKey, line.slice(at + delimiter.length).split(delimiter))
	})

	return { records, malformed }
}

/**
 * Merge current items with prior records. Output follows `items` order.
 */
export function mergeRecords<T>(
	items: readonly T[],
	prior: ReadonlyMap<string, readonly string[]>,
	options: MergeOptions<T>,
): MergeResult<T> {
	const records: MergedRecord<T>[] = []
	const seen = new Set<string>()
	let added = 0
	let kept = 0

	for (const item of items) {
		const key = options.keyOf(item)
		seen.add(key)
		const existing = prior.get(key)
		if (existing) {
			kept += 1
			records.push({ key, fields: existing, item, origin: "kept" })
		} else {
			added += 1
			records.push({
				key,
				fields: options.synthesize(item),
				item,
				origin: "added",
			})
		}
	}

	const removed = [...prior.keys()].filter(key => !seen.has(key))

	return { records, added, kept, removed }
}

export function formatRecord(
	key: string,
	fields: readonly string[],
	delimiter: string,
): string {
	return [key, ...fields].join(delimiter)
}

/** Lines joined with a trailing newline; no records gives an empty file */
export function joinLines(lines: readonly string[]): string {
	return lines.length > 0 ? lines.join("\n") + "\n" : ""
}
