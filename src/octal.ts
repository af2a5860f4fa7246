import { NUL, SPACE, ZERO } from "./constants";
import { FieldOverflowError, InvalidFieldValueError } from "./errors";
import type { FieldResult } from "./types";
import { encoder } from "./utils";

// Highest ASCII code that is still an octal digit ('7').
const SEVEN = ZERO + 7;

/**
 * Formats a number as exactly `width` octal digits, zero-padded on the left.
 *
 * The field terminator (space or NUL) is not included; the header layout adds it.
 *
 * @throws {InvalidFieldValueError} If `value` is negative, fractional or not finite.
 * @throws {FieldOverflowError} If `value` needs more than `width` digits.
 */
export function encodeOctal(width: number, value: number, field = "numeric"): string {
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new InvalidFieldValueError(field, value);
	}

	const digits = value.toString(8);
	if (digits.length > width) {
		throw new FieldOverflowError(field, value, width);
	}

	return digits.padStart(width, "0");
}

/**
 * Writes a number as `width` zero-padded octal digits at `offset`.
 */
export function writeOctal(
	view: Uint8Array,
	offset: number,
	width: number,
	value: number,
	field?: string,
): void {
	encoder.encodeInto(
		encodeOctal(width, value, field),
		view.subarray(offset, offset + width),
	);
}

/**
 * Parses an octal field leniently.
 *
 * One leading pad `'0'` is dropped, then surrounding whitespace and NUL bytes, and the
 * leading run of octal digits is read. A field with no digits at all yields a
 * failed result whose value is `0`.
 */
export function decodeOctal(bytes: Uint8Array): FieldResult<number> {
	let start = 0;
	let end = bytes.length;

	const padded = bytes[start] === ZERO;
	if (padded) start++;

	while (start < end && isBlank(bytes[start])) start++;
	while (end > start && isBlank(bytes[end - 1])) end--;

	let value = 0;
	let digits = 0;

	for (let i = start; i < end; i++) {
		const charCode = bytes[i];
		if (charCode < ZERO || charCode > SEVEN) break;

		// Multiply rather than shift: sizes exceed 32 bits.
		value = value * 8 + (charCode - ZERO);
		digits++;
	}

	if (digits > 0) return { ok: true, value };

	// A lone "0" is a valid zero once its pad digit is gone.
	if (padded && start === end) return { ok: true, value: 0 };

	return {
		ok: false,
		value: 0,
		reason: start === end ? "empty octal field" : "no octal digits in field",
	};
}

/**
 * Reads an octal field from a header block.
 */
export function readOctal(
	view: Uint8Array,
	offset: number,
	size: number,
): FieldResult<number> {
	return decodeOctal(view.subarray(offset, offset + size));
}

function isBlank(charCode: number): boolean {
	return (
		charCode === NUL ||
		charCode === SPACE ||
		// \t \n \v \f \r
		(charCode >= 9 && charCode <= 13)
	);
}
