/**
 * ─────────────────────────────────────────────────────────
 * AUTOCANNON — quick terminal benchmarks
 *
 * Run:
 *   npm run benchmark
 *   ENDPOINT=compute CONNECTIONS=100 npm run benchmark
 * ─────────────────────────────────────────────────────────
 */

import "dotenv/config";
import { planBenchmarks, printResults, runBenchmark } from "../src/benchmark";
import { loadHarnessConfig } from "../src/config";

async function main() {
  const { baseUrl, benchmark } = loadHarnessConfig();

  console.log(`\n🔥 Autocannon Benchmark`);
  console.log(`   Target:      ${baseUrl}`);
  console.log(`   Connections: ${benchmark.connections} concurrent`);
  console.log(`   Duration:    ${benchmark.durationS}s per test\n`);

  const plans = planBenchmarks(
    { baseUrl, connections: benchmark.connections, durationS: benchmark.durationS },
    benchmark.endpoint,
  );

  // Sequential; runs must not overlap
  for (const plan of plans) {
    console.log(`\n🧪 ${plan.label}`);
    printResults(plan.label, await runBenchmark(plan.options));
  }

  console.log("\n✅ Benchmarks complete!\n");
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
