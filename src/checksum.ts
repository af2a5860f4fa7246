import { NUL, SPACE, USTAR } from "./constants";
import { encodeOctal, readOctal } from "./octal";
import type { ChecksumConvention } from "./types";
import { encoder } from "./utils";

const CHECKSUM_END = USTAR.checksum.offset + USTAR.checksum.size;

/** Six spaces, a NUL and a space: what the checksum field holds while it is summed. */
export const CHECKSUM_PLACEHOLDER: readonly number[] = [
	SPACE,
	SPACE,
	SPACE,
	SPACE,
	SPACE,
	SPACE,
	NUL,
	SPACE,
];

/** Eight spaces, as POSIX and GNU tar sum the checksum field. */
export const POSIX_CHECKSUM_PLACEHOLDER: readonly number[] = new Array<number>(
	USTAR.checksum.size,
).fill(SPACE);

export function checksumPlaceholder(
	convention: ChecksumConvention = "nul",
): readonly number[] {
	return convention === "posix"
		? POSIX_CHECKSUM_PLACEHOLDER
		: CHECKSUM_PLACEHOLDER;
}

/**
 * Computes the unsigned checksum of a header block.
 *
 * The stored checksum field is ignored and `placeholder` is summed in its place,
 * so the block is never modified.
 */
export function computeChecksum(
	block: Uint8Array,
	placeholder: readonly number[] = CHECKSUM_PLACEHOLDER,
): number {
	let unsignedSum = 0;

	// Sum the bytes BEFORE the checksum field.
	for (let i = 0; i < USTAR.checksum.offset; i++) {
		unsignedSum += block[i];
	}

	for (const byte of placeholder) {
		unsignedSum += byte;
	}

	// Sum the bytes AFTER the checksum field.
	for (let i = CHECKSUM_END; i < block.length; i++) {
		unsignedSum += block[i];
	}

	return unsignedSum;
}

/**
 * Calculates and writes the checksum to a tar header block.
 */
export function writeChecksum(
	block: Uint8Array,
	placeholder: readonly number[] = CHECKSUM_PLACEHOLDER,
): void {
	const checksum = computeChecksum(block, placeholder);

	// Format as a 6-digit octal string, NUL-terminated, and space-padded.
	const checksumString = `${encodeOctal(6, checksum, "checksum")}\0 `;
	block.set(encoder.encode(checksumString), USTAR.checksum.offset);
}

/**
 * Validates the checksum of a tar header block.
 *
 * Either placeholder convention is accepted, so headers from other tar writers pass.
 */
export function validateChecksum(block: Uint8Array): boolean {
	const stored = readStoredChecksum(block);
	if (stored === null) return false;

	return (
		stored === computeChecksum(block, CHECKSUM_PLACEHOLDER) ||
		stored === computeChecksum(block, POSIX_CHECKSUM_PLACEHOLDER)
	);
}

/** Reads the checksum recorded in the header, or `null` if the field is not a number. */
export function readStoredChecksum(block: Uint8Array): number | null {
	const stored = readOctal(block, USTAR.checksum.offset, USTAR.checksum.size);
	return stored.ok ? stored.value : null;
}
