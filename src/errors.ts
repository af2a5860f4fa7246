export type TarErrorCode =
	| "EOVERFLOW"
	| "EINVAL"
	| "EHEADER"
	| "ECHECKSUM"
	| "ETRUNCATED";

/**
 * Base class for every error thrown while packing or unpacking.
 *
 * Every error carries a `code` naming what went wrong.
 */
export class TarError extends Error {
	readonly code: TarErrorCode;

	constructor(code: TarErrorCode, message: string) {
		super(message);
		this.name = "TarError";
		this.code = code;

		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/** A number needs more octal digits than its header field holds. */
export class FieldOverflowError extends TarError {
	readonly field: string;
	readonly value: number;
	readonly width: number;

	constructor(field: string, value: number, width: number) {
		super(
			"EOVERFLOW",
			`Value ${value} does not fit in the ${width}-digit "${field}" field.`,
		);
		this.name = "FieldOverflowError";
		this.field = field;
		this.value = value;
		this.width = width;
	}
}

/** A number cannot be written as an unsigned octal field at all. */
export class InvalidFieldValueError extends TarError {
	readonly field: string;

	constructor(field: string, value: number) {
		super(
			"EINVAL",
			`"${field}" must be a non-negative integer, got ${value}.`,
		);
		this.name = "InvalidFieldValueError";
		this.field = field;
	}
}

export class MalformedHeaderError extends TarError {
	/** Byte offset of the offending block within the archive, when known. */
	readonly offset?: number;

	constructor(message: string, offset?: number) {
		super("EHEADER", message);
		this.name = "MalformedHeaderError";
		this.offset = offset;
	}
}

export class ChecksumError extends TarError {
	/** Checksum recorded in the header, or `null` if the field is not a number. */
	readonly stored: number | null;
	readonly computed: number;

	constructor(name: string, stored: number | null, computed: number) {
		super(
			"ECHECKSUM",
			`Invalid tar header checksum for "${name}": stored ${stored ?? "nothing"}, computed ${computed}.`,
		);
		this.name = "ChecksumError";
		this.stored = stored;
		this.computed = computed;
	}
}

export class TruncatedArchiveError extends TarError {
	constructor(name: string, declared: number, available: number) {
		super(
			"ETRUNCATED",
			`Tar archive is truncated: "${name}" declares ${declared} bytes but only ${available} remain.`,
		);
		this.name = "TruncatedArchiveError";
	}
}
