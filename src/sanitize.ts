/**
 * Filename sanitizer
 *
 * The catalog is comma-delimited and the master index pipe-delimited, and
 * neither format quotes fields. A filename carrying either character would
 * split its record, so those characters are stripped on disk before anything
 * else reads the folder.
 */

export const FORBIDDEN_FILENAME_CHARS = [",", "|"] as const

const FORBIDDEN_PATTERN = /[,|]/g

export interface PlannedRename {
	from: string
	to: string
}

export interface RenameCollision extends PlannedRename {
	reason: "target-exists" | "empty-name"
}

export interface RenamePlan {
	renames: PlannedRename[]
	collisions: RenameCollision[]
}

export function sanitizeFilename(name: string): string {
	return name.replace(FORBIDDEN_PATTERN, "")
}

export function needsSanitizing(name: string): boolean {
	return sanitizeFilename(name) !== name
}

/**
 * Plan renames for `names`, in sorted order.
 *
 * `existing` is every name already present in the directory (defaults to
 * `names`). A rename onto a taken name, including one produced by an earlier
 * rename of the same batch, is reported as a collision and left out.
 */
export function planRenames(
	names: readonly string[],
	existing: Iterable<string> = names,
): RenamePlan {
	const taken = new Set(existing)
	const renames: PlannedRename[] = []
	const collisions: RenameCollision[] = []

	for (const from of [...names].sort()) {
		const to = sanitizeFilename(from)
		if (to === from) continue

		if (to === "" || to.startsWith(".")) {
			collisions.push({ from, to, reason: "empty-name" })
			continue
		}
		if (taken.has(to)) {
			collisions.push({ from, to, reason: "target-exists" })
			continue
		}

		taken.delete(from)
		taken.add(to)
		renames.push({ from, to })
	}

	return { renames, collisions }
}
