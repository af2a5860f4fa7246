/** Reads a byte range as one character per byte, so NULs and spaces stay visible. */
export function ascii(view: Uint8Array, start: number, end: number): string {
	return String.fromCharCode(...view.subarray(start, end));
}

/** Overwrites bytes of a block with the character codes of `text`. */
export function poke(view: Uint8Array, offset: number, text: string): void {
	for (let i = 0; i < text.length; i++) {
		view[offset + i] = text.charCodeAt(i);
	}
}

export function concat(...parts: Uint8Array[]): Uint8Array {
	const result = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
	let offset = 0;

	for (const part of parts) {
		result.set(part, offset);
		offset += part.length;
	}

	return result;
}
