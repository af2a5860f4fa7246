import type { TarEntry } from "../../src/index";

const SMALL_FILE_COUNT = 2500;
const SMALL_FILE_SIZE = 1024; // 1 KB
const LARGE_FILE_COUNT = 5;
const LARGE_FILE_SIZE = 20 * 1024 * 1024; // 20 MB
const NESTED_FILE_COUNT = 2500;

export interface BenchmarkCase {
	name: string;
	entries: TarEntry[];
}

// Entries live in memory only; the codec never touches the file system.
export function generateFixtures(): BenchmarkCase[] {
	console.log("Generating fixtures...");

	const smallFileContent = new Uint8Array(SMALL_FILE_SIZE).fill(0x61);
	const small: TarEntry[] = [];
	for (let i = 0; i < SMALL_FILE_COUNT; i++) {
		small.push({
			header: { name: `small-files/file-${i}.txt`, size: SMALL_FILE_SIZE },
			body: smallFileContent,
		});
	}

	const largeFileContent = new Uint8Array(LARGE_FILE_SIZE).fill(0x62);
	const large: TarEntry[] = [];
	for (let i = 0; i < LARGE_FILE_COUNT; i++) {
		large.push({
			header: { name: `large-files/large-file-${i}.bin`, size: LARGE_FILE_SIZE },
			body: largeFileContent,
		});
	}

	// Text bodies exercise the UTF-8 encoding path.
	const nested: TarEntry[] = [];
	for (let i = 0; i < NESTED_FILE_COUNT; i++) {
		nested.push({
			header: {
				name: `nested-files/level-${i % 10}/level-${i % 7}/file-${i}.txt`,
				size: 0,
			},
			body: `nested file ${i}\n`.repeat(64),
		});
	}

	return [
		{ name: "Many Small Files (2500 x 1KB)", entries: small },
		{ name: "Many Small Nested Text Files (2500)", entries: nested },
		{ name: "Few Large Files (5 x 20MB)", entries: large },
	];
}
