export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

/** Number of bytes `value` occupies once UTF-8 encoded. */
export function byteLength(value: string): number {
	return encoder.encode(value).length;
}

/**
 * Returns true if every byte in the view is zero.
 */
export function isZeroBlock(view: Uint8Array): boolean {
	for (let i = 0; i < view.length; i++) {
		if (view[i] !== 0) return false;
	}

	return true;
}
