/** Read/write/execute bits for one class of user. */
export interface Permissions {
	read?: boolean;
	write?: boolean;
	execute?: boolean;
}

/** Set-user-ID, set-group-ID and sticky bits. */
export interface SpecialBits {
	setuid?: boolean;
	setgid?: boolean;
	sticky?: boolean;
}

/**
 * Unix permissions of an entry, as the three permission triples plus the optional special bits.
 *
 * Use {@link modeFromNumber} to build one from an octal literal such as `0o644`.
 */
export interface FileMode {
	owner: Permissions;
	group: Permissions;
	other: Permissions;
	special?: SpecialBits;
}

/** Entry types a USTAR header can describe. */
export type TarEntryType = "file" | "link" | "symlink" | "directory";

/**
 * Header information for a tar entry in USTAR format.
 */
export interface TarHeader {
	/** Entry name. At most 100 bytes are stored; longer names are truncated. */
	name: string;
	/** Size of the entry data in bytes. Recomputed from the body by {@link packTar}. */
	size: number;
	/** Modification time. Stored with one-second precision. Defaults to the current time when packing. */
	mtime?: Date;
	/** Unix permissions. Defaults to rw-r--r-- for files and rwxr-xr-x for directories. */
	mode?: FileMode;
	/** Entry type. Defaults to "file" if not specified. */
	type?: TarEntryType;
	/** User ID of the entry owner. */
	uid?: number;
	/** Group ID of the entry owner. */
	gid?: number;
	/** User name of the entry owner (at most 32 bytes). */
	uname?: string;
	/** Group name of the entry owner (at most 32 bytes). */
	gname?: string;
	/** Target path for symlinks and hard links. */
	linkname?: string;
	/**
	 * Directory part of a path longer than 100 bytes (at most 155 bytes).
	 *
	 * Never filled in automatically when packing; see {@link splitUstarPath}.
	 */
	prefix?: string;
}

/**
 * Body data that can be packed into a tar archive.
 *
 * - `string` - Text content (encoded as UTF-8)
 * - `Uint8Array` - Binary data
 * - `ArrayBuffer` - Binary data
 * - `null` / `undefined` - No content (for directories, links, etc.)
 */
export type TarEntryData = string | Uint8Array | ArrayBuffer | null | undefined;

/**
 * Represents a complete entry to be packed into a tar archive.
 */
export interface TarEntry {
	header: TarHeader;
	body?: TarEntryData;
}

/**
 * Represents an entry extracted from a tar archive, with its content copied out of the archive.
 */
export interface ParsedTarEntry {
	header: TarHeader;
	data: Uint8Array;
}

/**
 * Outcome of decoding a single header field.
 *
 * A field that cannot be decoded still carries a usable `value` (the lenient default),
 * so callers choose between falling back and failing.
 */
export type FieldResult<T> =
	| { ok: true; value: T }
	| { ok: false; value: T; reason: string };

/** Options for reading a single header block. */
export interface HeaderOptions {
	/** Throw on undecodable fields instead of substituting defaults. Defaults to `false`. */
	strict?: boolean;
}

/** Which placeholder the checksum field holds while the header is summed. */
export type ChecksumConvention = "nul" | "posix";

/** Options for {@link packTar}. */
export interface PackOptions {
	/**
	 * `"nul"` sums the checksum field as six spaces, a NUL and a space.
	 * `"posix"` sums it as eight spaces, which other tar implementations expect.
	 *
	 * Defaults to `"nul"`.
	 */
	checksum?: ChecksumConvention;
}

/**
 * Configuration options for extracting tar archives.
 */
export interface UnpackOptions extends HeaderOptions {
	/** Number of leading path components to strip from entry names (e.g., strip: 1 removes first directory) */
	strip?: number;
	/** Filter function to include/exclude entries (return false to skip) */
	filter?: (header: TarHeader) => boolean;
	/** Transform function to modify tar headers before they are returned */
	map?: (header: TarHeader) => TarHeader;
}
