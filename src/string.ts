import { NUL } from "./constants";
import { decoder, encoder } from "./utils";

/**
 * Encodes `text` into exactly `width` bytes.
 *
 * The text is cut to at most `width` UTF-8 bytes, without splitting a character,
 * and the rest of the field is NUL-filled.
 */
export function normalizeString(width: number, text: string): Uint8Array {
	const bytes = new Uint8Array(width);
	encoder.encodeInto(text, bytes);
	return bytes;
}

/**
 * Decodes a NUL-padded field.
 *
 * Every NUL byte is dropped, not only the trailing padding.
 */
export function denormalizeString(bytes: Uint8Array): string {
	return decoder.decode(bytes.filter((byte) => byte !== NUL));
}

/**
 * Writes a string to the view, truncating if necessary.
 * Assumes the view is zero-filled, so any remaining space is null-padded.
 */
export function writeString(
	view: Uint8Array,
	offset: number,
	size: number,
	value?: string,
): void {
	if (value) {
		encoder.encodeInto(value, view.subarray(offset, offset + size));
	}
}

/**
 * Reads a NUL-padded string field from the view.
 */
export function readString(
	view: Uint8Array,
	offset: number,
	size: number,
): string {
	return denormalizeString(view.subarray(offset, offset + size));
}
