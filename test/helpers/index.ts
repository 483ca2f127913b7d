/**
 * Test utilities for sdsync
 */

import {
	mkdirSync,
	readdirSync,
	readFileSync,
	statSync,
	writeFileSync,
} from "node:fs"
import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { dirname, join, relative } from "node:path"
import { PLATFORMS } from "../../src/platforms.js"
import { toRomEntry } from "../../src/roms.js"
import type { PlatformId, RomEntry } from "../../src/types.js"

/**
 * Create a temporary directory for test isolation.
 * Removed once `fn` settles.
 */
export async function withTempDir<T>(
	fn: (dir: string) => Promise<T>,
): Promise<T> {
	const dir = await mkdtemp(join(tmpdir(), "sdsync-test-"))
	try {
		return await fn(dir)
	} finally {
		await rm(dir, { recursive: true, force: true })
	}
}

/**
 * Write a card layout: relative path → file content. A path ending in "/"
 * creates an empty directory.
 */
export function writeCard(root: string, files: Record<string, string>): void {
	for (const [path, content] of Object.entries(files)) {
		const full = join(root, path)
		if (path.endsWith("/")) {
			mkdirSync(full, { recursive: true })
			continue
		}
		mkdirSync(dirname(full), { recursive: true })
		writeFileSync(full, content, "utf-8")
	}
}

export function readCardFile(root: string, path: string): string {
	return readFileSync(join(root, path), "utf-8")
}

/** Sorted names in a card directory */
export function listCardDir(root: string, path: string): string[] {
	return readdirSync(join(root, path)).sort()
}

/** Every file under `root` with its content and mtime */
export function snapshotTree(
	root: string,
): Map<string, { content: string; mtimeMs: number }> {
	const snapshot = new Map<string, { content: string; mtimeMs: number }>()
	const walk = (dir: string): void => {
		for (const entry of readdirSync(dir, { withFileTypes: true })) {
			const full = join(dir, entry.name)
			if (entry.isDirectory()) {
				walk(full)
			} else {
				snapshot.set(relative(root, full), {
					content: readFileSync(full, "utf-8"),
					mtimeMs: statSync(full).mtimeMs,
				})
			}
		}
	}
	walk(root)
	return snapshot
}

export function rom(filename: string, platform: PlatformId = "GB"): RomEntry {
	const entry = toRomEntry(filename, PLATFORMS[platform])
	if (!entry) throw new Error(`${filename} is not a ${platform} ROM`)
	return entry
}

export async function collect<T>(events: AsyncIterable<T>): Promise<T[]> {
	const out: T[] = []
	for await (const event of events) out.push(event)
	return out
}
