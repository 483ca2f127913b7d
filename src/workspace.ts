/**
 * Platform folder workspace
 *
 * Holds the listing of one platform folder and its image directory, and routes
 * every mutation through a single place:
 * - the in-memory listing is updated for each successful (or simulated) change
 * - the disk is only touched when not in dry-run mode
 * - failures are returned, never thrown, and leave the listing untouched
 *
 * Later steps read the listing rather than re-scanning, so a dry-run sees the
 * same state a commit would produce.
 */

import {
	existsSync,
	mkdirSync,
	readdirSync,
	readFileSync,
	renameSync,
	rmSync,
	unlinkSync,
	writeFileSync,
} from "node:fs"
import { readFile, unlink, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"
import { IMAGES_DIR } from "./layout.js"
import { log } from "./logger.js"
import { compareFilenames } from "./roms.js"
import type { CoverSize, ImageNormalizer } from "./images.js"
import type { FileOpResult, PlatformDef } from "./types.js"

export type FolderArea = "roms" | "images"

export interface WorkspaceOptions {
	dryRun: boolean
	normalizer: ImageNormalizer
	coverSize: CoverSize
}

type EntryKind = "file" | "dir"

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}

function attempt(fn: () => void): FileOpResult {
	try {
		fn()
		return { ok: true }
	} catch (err) {
		return { ok: false, error: errorMessage(err) }
	}
}

function listDir(dir: string): Map<string, EntryKind> {
	const entries = new Map<string, EntryKind>()
	for (const dirent of readdirSync(dir, { withFileTypes: true })) {
		if (dirent.isFile()) entries.set(dirent.name, "file")
		else if (dirent.isDirectory()) entries.set(dirent.name, "dir")
	}
	return entries
}

/** Read a UTF-8 text file; null when it does not exist. */
export function readTextFile(path: string): string | null {
	if (!existsSync(path)) return null
	return readFileSync(path, "utf-8")
}

export function writeTextFile(
	path: string,
	content: string,
	dryRun: boolean,
): FileOpResult {
	if (dryRun) return { ok: true }
	return attempt(() => {
		mkdirSync(dirname(path), { recursive: true })
		writeFileSync(path, content, "utf-8")
	})
}

export class PlatformFolder {
	readonly dir: string
	readonly imagesDir: string

	private readonly entries: Map<string, EntryKind>
	private images: Map<string, EntryKind>
	private imagesDirPresent: boolean
	/** Text written during a dry-run, visible to later reads */
	private readonly pendingText = new Map<string, string>()

	private constructor(
		readonly platform: PlatformDef,
		root: string,
		private readonly options: WorkspaceOptions,
	) {
		this.dir = join(root, platform.id)
		this.imagesDir = join(this.dir, IMAGES_DIR)
		this.entries = listDir(this.dir)
		this.imagesDirPresent = this.entries.get(IMAGES_DIR) === "dir"
		this.images = this.imagesDirPresent ? listDir(this.imagesDir) : new Map()
	}

	/** Load a platform folder; null when the folder does not exist. */
	static load(
		root: string,
		platform: PlatformDef,
		options: WorkspaceOptions,
	): PlatformFolder | null {
		if (!existsSync(join(root, platform.id))) return null
		return new PlatformFolder(platform, root, options)
	}

	get dryRun(): boolean {
		return this.options.dryRun
	}

	get hasImagesDir(): boolean {
		return this.imagesDirPresent
	}

	/** Sorted file names of an area (directories excluded) */
	list(area: FolderArea): string[] {
		return this.names(area, kind => kind === "file")
	}

	/** Sorted names of every entry of an area, directories included */
	listAll(area: FolderArea): string[] {
		return this.names(area, () => true)
	}

	rename(area: FolderArea, from: string, to: string): FileOpResult {
		const entries = this.area(area)
		const kind = entries.get(from)
		if (!kind) return { ok: false, error: `${from}: not found` }
		if (entries.has(to)) return { ok: false, error: `${to}: already exists` }

		const result = this.mutate(() =>
			renameSync(this.pathOf(area, from), this.pathOf(area, to)),
		)
		if (result.ok) {
			entries.delete(from)
			entries.set(to, kind)
		}
		return result
	}

	remove(area: FolderArea, name: string): FileOpResult {
		const entries = this.area(area)
		const kind = entries.get(name)
		if (!kind) return { ok: false, error: `${name}: not found` }

		const path = this.pathOf(area, name)
		const result = this.mutate(() =>
			kind === "dir" ? rmSync(path, { recursive: true }) : unlinkSync(path),
		)
		if (result.ok) entries.delete(name)
		return result
	}

	/** Create the image directory if missing; `created` is false when present. */
	ensureImagesDir(): FileOpResult & { created: boolean } {
		if (this.imagesDirPresent) return { ok: true, created: false }
		const result = this.mutate(() =>
			mkdirSync(this.imagesDir, { recursive: true }),
		)
		if (result.ok) {
			this.imagesDirPresent = true
			this.images = new Map()
			this.entries.set(IMAGES_DIR, "dir")
		}
		return { ...result, created: result.ok }
	}

	/**
	 * Normalize a loose image from the platform folder into the image
	 * directory, then delete the loose file.
	 */
	async storeImage(source: string, target: string): Promise<FileOpResult> {
		if (this.entries.get(source) !== "file") {
			return { ok: false, error: `${source}: not found` }
		}
		if (!this.imagesDirPresent) {
			return { ok: false, error: `${this.imagesDir}: missing` }
		}

		if (!this.dryRun) {
			try {
				const bytes = await readFile(this.pathOf("roms", source))
				const normalized = await this.options.normalizer.normalize(
					bytes,
					this.options.coverSize,
				)
				await writeFile(this.pathOf("images", target), normalized)
				log.images.debug(
					{
						platform: this.platform.id,
						source,
						target,
						bytes: normalized.length,
					},
					"cover stored",
				)
			} catch (err) {
				return { ok: false, error: errorMessage(err) }
			}
			this.images.set(target, "file")
			try {
				await unlink(this.pathOf("roms", source))
			} catch (err) {
				return { ok: false, error: errorMessage(err) }
			}
		}

		this.images.set(target, "file")
		this.entries.delete(source)
		return { ok: true }
	}

	/** Normalize downloaded bytes and store them as `target` in the image directory. */
	async writeCover(target: string, bytes: Buffer): Promise<FileOpResult> {
		if (!this.imagesDirPresent) {
			return { ok: false, error: `${this.imagesDir}: missing` }
		}
		if (!this.dryRun) {
			try {
				const normalized = await this.options.normalizer.normalize(
					bytes,
					this.options.coverSize,
				)
				await writeFile(this.pathOf("images", target), normalized)
			} catch (err) {
				return { ok: false, error: errorMessage(err) }
			}
		}
		this.images.set(target, "file")
		return { ok: true }
	}

	/** Read a text file from the platform folder (dry-run writes included). */
	readText(name: string): string | null {
		const pending = this.pendingText.get(name)
		if (pending !== undefined) return pending
		if (this.entries.get(name) !== "file") return null
		return readFileSync(this.pathOf("roms", name), "utf-8")
	}

	writeText(name: string, content: string): FileOpResult {
		const result = writeTextFile(this.pathOf("roms", name), content, this.dryRun)
		if (result.ok) {
			this.entries.set(name, "file")
			if (this.dryRun) this.pendingText.set(name, content)
		}
		return result
	}

	private mutate(fn: () => void): FileOpResult {
		return this.dryRun ? { ok: true } : attempt(fn)
	}

	private area(area: FolderArea): Map<string, EntryKind> {
		return area === "roms" ? this.entries : this.images
	}

	private pathOf(area: FolderArea, name: string): string {
		return join(area === "roms" ? this.dir : this.imagesDir, name)
	}

	private names(
		area: FolderArea,
		predicate: (kind: EntryKind) => boolean,
	): string[] {
		return [...this.area(area)]
			.filter(([, kind]) => predicate(kind))
			.map(([name]) => name)
			.sort(compareFilenames)
	}
}
