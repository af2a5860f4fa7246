import { padBytes } from "./block";
import { TERMINATOR_SIZE } from "./constants";
import { createTarHeader } from "./header";
import type { PackOptions, TarEntry, TarEntryData } from "./types";
import { encoder } from "./utils";

/**
 * Packs an array of tar entries into a single `Uint8Array` buffer.
 *
 * Entries are written in the order given. Each header's `size` is taken from the
 * body, whatever the caller declared and whatever the entry type. The archive
 * ends with two empty blocks.
 *
 * @param entries - Array of tar entries with headers and optional bodies
 * @param options - Optional packing configuration
 * @returns The complete tar archive
 * @throws {FieldOverflowError} If a numeric header field does not fit.
 * @example
 * ```typescript
 * import { packTar } from 'tarblock';
 *
 * const tarBuffer = packTar([
 *   { header: { name: "hello.txt", size: 0 }, body: "hello" },
 *   { header: { name: "logo.bin", size: 0 }, body: new Uint8Array([137, 80, 78, 71]) },
 *   { header: { name: "folder/", type: "directory", size: 0 } },
 * ]);
 * ```
 */
export function packTar(
	entries: readonly TarEntry[],
	options: PackOptions = {},
): Uint8Array {
	const parts: Uint8Array[] = [];
	let totalLength = 0;

	for (const entry of entries) {
		const content = toBytes(entry.body);

		const header = createTarHeader(
			{ ...entry.header, size: content.length },
			options,
		);
		const body = padBytes(content);

		parts.push(header, body);
		totalLength += header.length + body.length;
	}

	// Pre-allocate the final buffer; the trailing terminator is already zero-filled.
	const archive = new Uint8Array(totalLength + TERMINATOR_SIZE);
	let offset = 0;

	for (const part of parts) {
		archive.set(part, offset);
		offset += part.length;
	}

	return archive;
}

/**
 * Normalizes entry body data to bytes. Text is encoded as UTF-8.
 */
export function toBytes(body: TarEntryData): Uint8Array {
	if (body === null || body === undefined) return new Uint8Array(0);
	if (typeof body === "string") return encoder.encode(body);
	if (body instanceof Uint8Array) return body;
	return new Uint8Array(body);
}
