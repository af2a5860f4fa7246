import type { TarEntryType } from "./types";

/** Size of a TAR block in bytes. */
export const BLOCK_SIZE = 512;

/** Size of the end-of-archive marker (two empty blocks). */
export const TERMINATOR_SIZE = BLOCK_SIZE * 2;

/** Offsets and sizes of fields in a USTAR header block.
 *
 * @see https://www.gnu.org/software/tar/manual/html_node/Standard.html
 */
export const USTAR = {
	name: { offset: 0, size: 100 },
	mode: { offset: 100, size: 8 },
	uid: { offset: 108, size: 8 },
	gid: { offset: 116, size: 8 },
	size: { offset: 124, size: 12 },
	mtime: { offset: 136, size: 12 },
	checksum: { offset: 148, size: 8 },
	typeflag: { offset: 156, size: 1 },
	linkname: { offset: 157, size: 100 },
	magic: { offset: 257, size: 6 },
	version: { offset: 263, size: 2 },
	uname: { offset: 265, size: 32 },
	gname: { offset: 297, size: 32 },
	devmajor: { offset: 329, size: 8 },
	devminor: { offset: 337, size: 8 },
	prefix: { offset: 345, size: 155 },
} as const;

/** The literal that marks a block as a USTAR header. */
export const USTAR_MAGIC = "ustar";

/** USTAR version ("00"). */
export const USTAR_VERSION = "00";

/** Octal digits available to uid/gid, and to size/mtime. */
export const ID_DIGITS = 6;
export const SIZE_DIGITS = 11;

/** Largest value each numeric field can hold. */
export const USTAR_MAX_UID_GID = 0o777777;
export const USTAR_MAX_SIZE = 0o77777777777;

/** Name given to entries whose name field is empty. */
export const UNKNOWN_FILE_NAME = "unknownFileName";

/** Type flag constants for entry types. */
export const TYPEFLAG = {
	file: "0",
	link: "1",
	symlink: "2",
	directory: "5",
} as const;

/** Reverse mapping from flag characters to type names. */
export const FLAGTYPE: Readonly<Record<string, TarEntryType | undefined>> = {
	"0": "file",
	// Pre-POSIX archives write a NUL for regular files.
	"": "file",
	"1": "link",
	"2": "symlink",
	"5": "directory",
};

// ASCII codes used while writing fields.
export const NUL = 0;
export const SPACE = 32;
export const ZERO = 48;
