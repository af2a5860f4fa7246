import { runCodecBenchmarks } from "./codec.bench";
import { generateFixtures } from "./fixtures/generate";

async function main() {
	console.log("Starting benchmark run...");

	await runCodecBenchmarks(generateFixtures());

	console.log("Benchmark run complete.");
}

main().catch((err) => {
	console.error("Benchmark failed:", err);
	process.exit(1);
});
