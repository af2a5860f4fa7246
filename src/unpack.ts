import { paddedLength, unpad } from "./block";
import { BLOCK_SIZE } from "./constants";
import { MalformedHeaderError, TruncatedArchiveError } from "./errors";
import { isTarHeader, parseTarHeader } from "./header";
import { applyEntryOptions } from "./options";
import type { ParsedTarEntry, UnpackOptions } from "./types";
import { isZeroBlock } from "./utils";

/**
 * Extracts all entries and their data from a complete tar archive buffer.
 *
 * Extraction stops at the first block that is not a USTAR header, which is normally
 * the end-of-archive marker. By default anything unexpected is tolerated: a corrupt
 * block also just ends extraction, undecodable fields take default values and a
 * truncated body yields the bytes that are present. Pass `strict: true` to throw
 * instead.
 *
 * @param archive - The complete tar archive as `ArrayBuffer` or `Uint8Array`
 * @param options - Optional extraction configuration
 * @returns The entries in archive order, each with its own copy of the content
 * @throws {MalformedHeaderError} In strict mode, for a corrupt block or a bad or missing end-of-archive marker.
 * @throws {ChecksumError} In strict mode, for a header whose checksum does not match.
 * @throws {TruncatedArchiveError} In strict mode, if the archive ends inside an entry's body.
 * @example
 * ```typescript
 * import { unpackTar } from 'tarblock';
 *
 * const entries = unpackTar(tarBuffer, {
 *   strip: 1,
 *   filter: (header) => header.name.endsWith('.txt'),
 * });
 *
 * for (const entry of entries) {
 *   console.log(entry.header.name, new TextDecoder().decode(entry.data));
 * }
 * ```
 */
export function unpackTar(
	archive: ArrayBuffer | Uint8Array,
	options: UnpackOptions = {},
): ParsedTarEntry[] {
	const strict = options.strict ?? false;
	const view = archive instanceof Uint8Array ? archive : new Uint8Array(archive);

	const results: ParsedTarEntry[] = [];
	let offset = 0;
	let terminated = false;

	while (offset + BLOCK_SIZE <= view.length) {
		const block = view.subarray(offset, offset + BLOCK_SIZE);

		if (!isTarHeader(block)) {
			if (strict) assertTerminator(view, offset);
			terminated = true;
			break;
		}

		const header = parseTarHeader(block, { strict });
		offset += BLOCK_SIZE;

		const available = Math.min(header.size, view.length - offset);
		if (strict && available < header.size) {
			throw new TruncatedArchiveError(header.name, header.size, available);
		}

		const blocks = paddedLength(header.size);
		const data = unpad(view.subarray(offset, offset + blocks), header.size);
		offset += blocks;

		const entry = applyEntryOptions({ header, data }, options);
		if (entry) results.push(entry);
	}

	if (strict && !terminated) {
		// Any leftover data short of a full block must be zeroes (padding).
		if (offset < view.length && !isZeroBlock(view.subarray(offset))) {
			throw new MalformedHeaderError("Invalid EOF.", offset);
		}

		throw new MalformedHeaderError(
			`Missing end-of-archive marker at offset ${offset}.`,
			offset,
		);
	}

	return results;
}

// A block that is not a header must open the two-block end-of-archive marker.
function assertTerminator(view: Uint8Array, offset: number): void {
	if (!isZeroBlock(view.subarray(offset, offset + BLOCK_SIZE))) {
		throw new MalformedHeaderError(
			`Expected a tar header or end-of-archive marker at offset ${offset}.`,
			offset,
		);
	}

	const next = offset + BLOCK_SIZE;
	if (
		next + BLOCK_SIZE > view.length ||
		!isZeroBlock(view.subarray(next, next + BLOCK_SIZE))
	) {
		throw new MalformedHeaderError(
			`Incomplete end-of-archive marker at offset ${offset}.`,
			offset,
		);
	}
}
