/**
 * On-card layout of the handheld firmware
 */

import { join } from "node:path"

export const IMAGES_DIR = "images"
export const CATALOG_FILE = "filelist.csv"
export const SYSTEM_DIR = "cubegm"
export const MASTER_INDEX_FILE = "allfiles.lst"
export const REFERENCE_LISTS = ["favorites.lst", "recent.lst"] as const

export type ReferenceListName = (typeof REFERENCE_LISTS)[number]

/** Extension every stored cover is written with */
export const COVER_EXTENSION = ".png"

export function masterIndexPath(root: string): string {
	return join(root, SYSTEM_DIR, MASTER_INDEX_FILE)
}

export function referenceListPath(
	root: string,
	name: ReferenceListName,
): string {
	return join(root, SYSTEM_DIR, name)
}

/** Default card root for the host OS */
export function defaultRoot(): string {
	if (process.platform === "win32") return "H:\\"
	if (process.platform === "darwin") return "/Volumes/SDCARD"
	return "/media/sdcard"
}
