import { baseNameOf, compareFilenames } from "./roms.js"

/**
 * Images in the image directory whose base name matches no retained ROM.
 * With an empty `validBaseNames` every entry is an orphan.
 */
export function findOrphanImages(
	imageNames: readonly string[],
	validBaseNames: ReadonlySet<string>,
): string[] {
	return imageNames
		.filter(name => !validBaseNames.has(baseNameOf(name)))
		.sort(compareFilenames)
}
