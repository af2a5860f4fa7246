import { describe, expect, it } from "vitest";
import {
	CHECKSUM_PLACEHOLDER,
	computeChecksum,
	POSIX_CHECKSUM_PLACEHOLDER,
	validateChecksum,
	writeChecksum,
} from "../src/checksum";
import { USTAR } from "../src/constants";
import { ChecksumError } from "../src/errors";
import { createTarHeader } from "../src/header";
import { packTar } from "../src/pack";
import { unpackTar } from "../src/unpack";
import { ascii } from "./helpers";

const A_TXT = { name: "a.txt", size: 14, mtime: new Date(0) };

describe("computeChecksum", () => {
	it("sums the placeholder in place of the checksum field", () => {
		const block = new Uint8Array(512);
		// Six spaces, a NUL and a space.
		expect(computeChecksum(block)).toBe(224);
		expect(computeChecksum(block, POSIX_CHECKSUM_PLACEHOLDER)).toBe(256);
	});

	it("ignores whatever the checksum field holds", () => {
		const block = new Uint8Array(512);
		block.fill(0xff, USTAR.checksum.offset, USTAR.checksum.offset + 8);
		expect(computeChecksum(block)).toBe(224);
	});

	it("does not modify the block", () => {
		const block = createTarHeader(A_TXT);
		const copy = block.slice();
		computeChecksum(block);
		expect(block).toEqual(copy);
	});

	it("is deterministic", () => {
		const block = createTarHeader(A_TXT);
		expect(computeChecksum(block)).toBe(computeChecksum(block));
	});

	it("changes when any byte outside the checksum field changes", () => {
		const block = createTarHeader(A_TXT);
		const original = computeChecksum(block);

		for (const offset of [0, 99, 124, 156, 257, 345, 511]) {
			const changed = block.slice();
			changed[offset] = (changed[offset] + 1) % 256;
			expect(computeChecksum(changed)).not.toBe(original);
		}
	});

	it("exposes the placeholder bytes", () => {
		expect(CHECKSUM_PLACEHOLDER).toEqual([32, 32, 32, 32, 32, 32, 0, 32]);
		expect(POSIX_CHECKSUM_PLACEHOLDER).toEqual([32, 32, 32, 32, 32, 32, 32, 32]);
	});
});

describe("writeChecksum", () => {
	it("writes six octal digits, a NUL and a space", () => {
		const block = new Uint8Array(512);
		writeChecksum(block);
		expect(ascii(block, 148, 156)).toBe("000340\0 ");
	});

	it("uses the POSIX placeholder when asked", () => {
		const block = new Uint8Array(512);
		writeChecksum(block, POSIX_CHECKSUM_PLACEHOLDER);
		expect(ascii(block, 148, 156)).toBe("000400\0 ");
	});

	it("matches the checksum of a known header", () => {
		expect(ascii(createTarHeader(A_TXT), 148, 156)).toBe("010103\0 ");
		expect(ascii(createTarHeader(A_TXT, { checksum: "posix" }), 148, 156)).toBe(
			"010143\0 ",
		);
	});
});

describe("validateChecksum", () => {
	it("accepts headers written with either convention", () => {
		expect(validateChecksum(createTarHeader(A_TXT))).toBe(true);
		expect(validateChecksum(createTarHeader(A_TXT, { checksum: "posix" }))).toBe(
			true,
		);
	});

	it("rejects a block whose checksum field is empty", () => {
		expect(validateChecksum(new Uint8Array(512))).toBe(false);
	});

	it("rejects a header changed after the checksum was written", () => {
		const block = createTarHeader(A_TXT);
		block[0] = "b".charCodeAt(0);
		expect(validateChecksum(block)).toBe(false);
	});
});

describe("checksum validation during extraction", () => {
	function singleFileArchive(name: string, body: string): Uint8Array {
		return packTar([{ header: { name, size: 0 }, body }]);
	}

	it("rejects corrupted checksums in strict mode", () => {
		const archive = singleFileArchive("corrupt.txt", "test");
		archive[USTAR.checksum.offset] = archive[USTAR.checksum.offset] + 1;

		expect(() => unpackTar(archive, { strict: true })).toThrow(ChecksumError);
	});

	it("rejects a zeroed checksum in strict mode", () => {
		const archive = singleFileArchive("zero-checksum.txt", "foobar");
		archive.fill(0, USTAR.checksum.offset, USTAR.checksum.offset + 8);

		expect(() => unpackTar(archive, { strict: true })).toThrow(
			/^Invalid tar header checksum for "zero-checksum.txt": stored nothing/,
		);
	});

	it("rejects a corrupted filename in strict mode", () => {
		const archive = singleFileArchive("filename.txt", "content");
		archive[USTAR.name.offset] = archive[USTAR.name.offset] + 1;

		expect(() => unpackTar(archive, { strict: true })).toThrow(ChecksumError);
	});

	it("rejects a corrupted size field in strict mode", () => {
		const archive = singleFileArchive("sizetest.txt", "sizebyte");
		archive[USTAR.size.offset] = archive[USTAR.size.offset] + 1;

		expect(() => unpackTar(archive, { strict: true })).toThrow(ChecksumError);
	});

	it("fails on the first corrupted entry of several", () => {
		const archive = packTar([
			{ header: { name: "valid.txt", size: 0 }, body: "valid" },
			{ header: { name: "corrupt.txt", size: 0 }, body: "corrupt" },
		]);

		// Skip first header + content + padding.
		const secondChecksumOffset = 512 + 512 + USTAR.checksum.offset;
		archive[secondChecksumOffset] = archive[secondChecksumOffset] + 1;

		expect(() => unpackTar(archive, { strict: true })).toThrow(ChecksumError);
	});

	it("does not check checksums by default", () => {
		const archive = singleFileArchive("corrupt.txt", "test");
		archive[USTAR.checksum.offset] = archive[USTAR.checksum.offset] + 1;

		const entries = unpackTar(archive);
		expect(entries).toHaveLength(1);
		expect(entries[0].header.name).toBe("corrupt.txt");
	});

	it("accepts POSIX checksums in strict mode", () => {
		const archive = packTar(
			[{ header: { name: "posix.txt", size: 0 }, body: "posix" }],
			{ checksum: "posix" },
		);

		expect(unpackTar(archive, { strict: true })).toHaveLength(1);
	});
});
