import { USTAR } from "./constants";
import type { TarHeader } from "./types";
import { byteLength } from "./utils";

/**
 * Splits a long path into a USTAR name and prefix.
 *
 * Packing never splits names on its own. Callers with paths longer than 100 bytes
 * use this to fill in `name` and `prefix` before packing.
 *
 * @returns The split, or `null` if the path already fits or no `/` gives a valid split.
 * @example
 * ```typescript
 * const split = splitUstarPath(longPath);
 * const header = split ? { ...base, ...split } : { ...base, name: longPath };
 * ```
 */
export function splitUstarPath(
	path: string,
): { name: string; prefix: string } | null {
	// No split needed if the path already fits in the name field.
	if (byteLength(path) <= USTAR.name.size) {
		return null;
	}

	// Walk left from the last slash until the prefix fits.
	let slashIndex = path.lastIndexOf("/");

	while (slashIndex > 0) {
		const prefix = path.slice(0, slashIndex);
		const name = path.slice(slashIndex + 1);

		if (byteLength(name) > USTAR.name.size) {
			// Moving left only makes the name longer.
			return null;
		}

		if (name.length > 0 && byteLength(prefix) <= USTAR.prefix.size) {
			return { prefix, name };
		}

		slashIndex = path.lastIndexOf("/", slashIndex - 1);
	}

	return null; // No valid split point found.
}

/**
 * Rebuilds the full path of an entry from its `prefix` and `name`.
 */
export function joinUstarPath(header: Pick<TarHeader, "name" | "prefix">): string {
	return header.prefix ? `${header.prefix}/${header.name}` : header.name;
}
