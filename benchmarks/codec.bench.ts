import { Bench } from "tinybench";
import { packTar, unpackTar } from "../src/index";
import type { BenchmarkCase } from "./fixtures/generate";

export async function runCodecBenchmarks(cases: BenchmarkCase[]) {
	console.log("\nCodec benchmarks...");

	for (const testCase of cases) {
		const bench = new Bench({
			time: 5000,
			iterations: 30,
			warmupTime: 1000,
			warmupIterations: 10,
		});

		const archive = packTar(testCase.entries);

		bench
			.add(`tarblock: Pack ${testCase.name}`, () => {
				packTar(testCase.entries);
			})
			.add(`tarblock: Unpack ${testCase.name}`, () => {
				unpackTar(archive);
			})
			.add(`tarblock: Unpack (strict) ${testCase.name}`, () => {
				unpackTar(archive, { strict: true });
			});

		await bench.run();
		console.log(`\n--- ${testCase.name} ---`);
		console.table(bench.table());
	}
}
