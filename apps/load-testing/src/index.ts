export { ApiClient, RequestFailedError, postFixture, userFixture, type LoadTarget } from "./client";
export {
  DEFAULT_OPTIONS,
  runLoadScript,
  settle,
  type LoadScriptOptions,
  type PhaseReport,
  type ScriptReport,
  type Tally,
} from "./orchestrator";
export { buildMixedRequests, planBenchmarks, runBenchmark, type BenchmarkPlan } from "./benchmark";
export { loadHarnessConfig, type HarnessConfig } from "./config";
