import { BLOCK_SIZE } from "./constants";

/**
 * Rounds a byte length up to the next multiple of the block size.
 */
export function paddedLength(length: number): number {
	const remainder = length % BLOCK_SIZE;
	return remainder === 0 ? length : length + (BLOCK_SIZE - remainder);
}

/**
 * Number of zero bytes needed after `length` bytes of content.
 */
export function paddingLength(length: number): number {
	return paddedLength(length) - length;
}

/**
 * Copies `content` into a new buffer that ends on a block boundary.
 */
export function padBytes(content: Uint8Array): Uint8Array {
	const padded = new Uint8Array(paddedLength(content.length));
	padded.set(content);
	return padded;
}

/**
 * Returns the meaningful part of a block-aligned buffer, discarding the padding.
 *
 * The result is a copy; a buffer shorter than `declaredLength` is returned whole.
 */
export function unpad(bytes: Uint8Array, declaredLength: number): Uint8Array {
	return bytes.slice(0, declaredLength);
}
