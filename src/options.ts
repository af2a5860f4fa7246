import type { ParsedTarEntry, UnpackOptions } from "./types";

/**
 * Applies the `strip`, `filter` and `map` options of {@link UnpackOptions} to one entry.
 *
 * @returns The transformed entry, or `null` if the entry should be skipped.
 *
 * @example
 * ```typescript
 * const entry = applyEntryOptions(parsed, {
 *   strip: 1,
 *   filter: (header) => header.name.endsWith(".txt"),
 *   map: (header) => ({ ...header, uid: 0 }),
 * });
 * ```
 */
export function applyEntryOptions(
	entry: ParsedTarEntry,
	options: UnpackOptions = {},
): ParsedTarEntry | null {
	let header = entry.header;

	// Apply strip option
	const stripCount = options.strip;
	if (stripCount && stripCount > 0) {
		const newName = stripPathComponents(header.name, stripCount);

		// If the entry's name is completely stripped, skip it.
		if (newName === null) return null;

		let newLinkname = header.linkname;

		// If it's an absolute symlink/hardlink, strip its target path too.
		if (newLinkname?.startsWith("/")) {
			const strippedLinkTarget = stripPathComponents(newLinkname, stripCount);

			// If the target is stripped, it should point to the new root '/'.
			newLinkname =
				strippedLinkTarget === null ? "/" : `/${strippedLinkTarget}`;
		}

		header = {
			...header,
			name:
				header.type === "directory" && !newName.endsWith("/")
					? `${newName}/`
					: newName,
			linkname: newLinkname,
		};
	}

	// Apply filter option
	if (options.filter && options.filter(header) === false) {
		return null;
	}

	// Apply map option
	if (options.map) {
		header = options.map(header);
	}

	return { header, data: entry.data };
}

/**
 * Strips the specified number of leading path components from a given path.
 */
function stripPathComponents(path: string, stripCount: number): string | null {
	const components = path.split("/").filter((c) => c.length > 0);
	if (stripCount >= components.length) {
		return null; // The path is fully stripped.
	}

	return components.slice(stripCount).join("/");
}
