import {
	checksumPlaceholder,
	computeChecksum,
	readStoredChecksum,
	validateChecksum,
	writeChecksum,
} from "./checksum";
import {
	BLOCK_SIZE,
	FLAGTYPE,
	ID_DIGITS,
	SIZE_DIGITS,
	SPACE,
	TYPEFLAG,
	UNKNOWN_FILE_NAME,
	USTAR,
	USTAR_MAGIC,
	USTAR_VERSION,
} from "./constants";
import { ChecksumError, MalformedHeaderError } from "./errors";
import {
	DEFAULT_DIR_MODE,
	DEFAULT_FILE_MODE,
	encodeMode,
	modeFromNumber,
} from "./mode";
import { readOctal, writeOctal } from "./octal";
import { readString, writeString } from "./string";
import type {
	FieldResult,
	HeaderOptions,
	PackOptions,
	TarEntryType,
	TarHeader,
} from "./types";
import { encoder } from "./utils";

const MAGIC_BYTES = encoder.encode(USTAR_MAGIC);

type HeaderField = (typeof USTAR)[keyof typeof USTAR];

/**
 * Creates a 512-byte USTAR header block from a TarHeader object.
 *
 * Names longer than their fields are truncated, never split; use {@link splitUstarPath}
 * to fill in `prefix` first.
 *
 * @throws {FieldOverflowError} If uid, gid, size or mtime does not fit its field.
 * @throws {InvalidFieldValueError} If uid, gid, size or mtime is negative or not an integer.
 */
export function createTarHeader(
	header: TarHeader,
	options: PackOptions = {},
): Uint8Array {
	const view = new Uint8Array(BLOCK_SIZE);
	const type = header.type ?? "file";

	writeString(view, USTAR.name.offset, USTAR.name.size, header.name);
	writeString(
		view,
		USTAR.mode.offset,
		USTAR.mode.size,
		encodeMode(
			header.mode ??
				(type === "directory" ? DEFAULT_DIR_MODE : DEFAULT_FILE_MODE),
		),
	);
	writeTerminatedOctal(view, USTAR.uid, ID_DIGITS, header.uid ?? 0, "uid");
	writeTerminatedOctal(view, USTAR.gid, ID_DIGITS, header.gid ?? 0, "gid");
	writeTerminatedOctal(view, USTAR.size, SIZE_DIGITS, header.size, "size");
	writeTerminatedOctal(
		view,
		USTAR.mtime,
		SIZE_DIGITS,
		Math.floor((header.mtime?.getTime() ?? Date.now()) / 1000),
		"mtime",
	);
	writeString(
		view,
		USTAR.typeflag.offset,
		USTAR.typeflag.size,
		TYPEFLAG[type],
	);
	writeString(
		view,
		USTAR.linkname.offset,
		USTAR.linkname.size,
		header.linkname,
	);

	writeString(view, USTAR.magic.offset, USTAR.magic.size, `${USTAR_MAGIC}\0`);
	writeString(view, USTAR.version.offset, USTAR.version.size, USTAR_VERSION);
	writeString(view, USTAR.uname.offset, USTAR.uname.size, header.uname);
	writeString(view, USTAR.gname.offset, USTAR.gname.size, header.gname);

	// Device numbers only matter for character and block devices.
	// devminor opens with a NUL: its digits and space sit one byte later.
	writeTerminatedOctal(view, USTAR.devmajor, ID_DIGITS, 0, "devmajor");
	writeOctal(view, USTAR.devminor.offset + 1, ID_DIGITS, 0, "devminor");
	view[USTAR.devminor.offset + 1 + ID_DIGITS] = SPACE;

	writeString(view, USTAR.prefix.offset, USTAR.prefix.size, header.prefix);

	// Calculate and write the checksum.
	writeChecksum(view, checksumPlaceholder(options.checksum));

	return view;
}

/**
 * Parses a 512-byte block into a TarHeader.
 *
 * Fields that cannot be decoded fall back to defaults (0 for numbers,
 * `"unknownFileName"` for an empty name, `"file"` for an unknown type flag).
 * With `strict: true` they throw instead, and the magic and checksum are verified.
 *
 * @throws {MalformedHeaderError} In strict mode, for a missing magic or an undecodable field.
 * @throws {ChecksumError} In strict mode, if the stored checksum does not match.
 */
export function parseTarHeader(
	block: Uint8Array,
	options: HeaderOptions = {},
): TarHeader {
	const strict = options.strict ?? false;

	function field<T>(name: string, result: FieldResult<T>): T {
		if (!result.ok && strict) {
			throw new MalformedHeaderError(
				`Invalid "${name}" field: ${result.reason}.`,
			);
		}

		return result.value;
	}

	if (strict) {
		if (!isTarHeader(block)) {
			const magic = readString(block, USTAR.magic.offset, USTAR.magic.size);
			throw new MalformedHeaderError(
				`Invalid USTAR magic literal. Got "${magic}".`,
			);
		}

		if (!validateChecksum(block)) {
			throw new ChecksumError(
				readString(block, USTAR.name.offset, USTAR.name.size),
				readStoredChecksum(block),
				computeChecksum(block),
			);
		}
	}

	const mode = field("mode", readNumericField(block, USTAR.mode));
	const mtime = field("mtime", readNumericField(block, USTAR.mtime));

	return {
		name: field("name", readNameField(block)),
		mode: modeFromNumber(mode & 0o7777),
		uid: field("uid", readNumericField(block, USTAR.uid)),
		gid: field("gid", readNumericField(block, USTAR.gid)),
		size: field("size", readSizeField(block)),
		mtime: new Date(mtime * 1000),
		type: field("typeflag", readTypeField(block)),
		linkname: readString(block, USTAR.linkname.offset, USTAR.linkname.size),
		uname: readString(block, USTAR.uname.offset, USTAR.uname.size),
		gname: readString(block, USTAR.gname.offset, USTAR.gname.size),
		prefix: readString(block, USTAR.prefix.offset, USTAR.prefix.size),
	};
}

/**
 * Checks whether a block is a USTAR header.
 *
 * Only the magic literal is examined; an all-zero terminator block is not a header.
 */
export function isTarHeader(block: Uint8Array): boolean {
	if (block.length < USTAR.magic.offset + MAGIC_BYTES.length) return false;

	for (let i = 0; i < MAGIC_BYTES.length; i++) {
		if (block[USTAR.magic.offset + i] !== MAGIC_BYTES[i]) return false;
	}

	return true;
}

/**
 * Reads the entry name, falling back to `"unknownFileName"` when it is empty.
 */
export function readNameField(block: Uint8Array): FieldResult<string> {
	const name = readString(block, USTAR.name.offset, USTAR.name.size);
	if (name.length > 0) return { ok: true, value: name };

	return { ok: false, value: UNKNOWN_FILE_NAME, reason: "empty name" };
}

/**
 * Reads the content length, falling back to 0 when the field is not a number.
 */
export function readSizeField(block: Uint8Array): FieldResult<number> {
	return readNumericField(block, USTAR.size);
}

/**
 * Reads the type flag, falling back to `"file"` for flags this codec does not model.
 */
export function readTypeField(block: Uint8Array): FieldResult<TarEntryType> {
	const flag = readString(block, USTAR.typeflag.offset, USTAR.typeflag.size);
	const type = FLAGTYPE[flag];
	if (type) return { ok: true, value: type };

	return {
		ok: false,
		value: "file",
		reason: `unsupported type flag "${flag}"`,
	};
}

function readNumericField(
	block: Uint8Array,
	field: HeaderField,
): FieldResult<number> {
	return readOctal(block, field.offset, field.size);
}

// Writes the digits followed by a space. The byte after that (if any) stays NUL.
function writeTerminatedOctal(
	view: Uint8Array,
	field: HeaderField,
	digits: number,
	value: number,
	name: string,
): void {
	writeOctal(view, field.offset, digits, value, name);
	view[field.offset + digits] = SPACE;
}
