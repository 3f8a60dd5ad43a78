/**
 * Autocannon throughput benchmarks.
 *
 * The phased load script (orchestrator.ts) produces a realistic traffic
 * shape for profiling; these runs answer "how many req/s, at what latency"
 * for one endpoint or a fixed mix.
 */

import autocannon from "autocannon";
import { userFixture } from "./client";

export type BenchmarkName = "list" | "users" | "post" | "compute" | "mixed";

export interface BenchmarkPlan {
  name: BenchmarkName;
  label: string;
  options: autocannon.Options;
}

export interface BenchmarkSettings {
  baseUrl: string;
  connections: number;
  durationS: number;
}

// ─── Sample POST body ─────────────────────────────────────
export function makeUserBody(random: () => number = Math.random): string {
  const seq = Math.floor(random() * 1e12);
  return JSON.stringify(userFixture(seq));
}

// Shuffled 80/20 mix of single-user reads and user creations
export function buildMixedRequests(random: () => number = Math.random, total = 1000): autocannon.Request[] {
  const reads = Math.round(total * 0.8);
  const requests: autocannon.Request[] = [];

  for (let i = 0; i < reads; i++) {
    const id = Math.floor(random() * 10_000) + 1;
    requests.push({ method: "GET", path: `/users/${id}` });
  }
  for (let i = reads; i < total; i++) {
    requests.push({
      method: "POST",
      path: "/users/",
      headers: { "content-type": "application/json" },
      body: makeUserBody(random),
    });
  }

  for (let i = requests.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [requests[i], requests[j]] = [requests[j], requests[i]];
  }
  return requests;
}

export function planBenchmarks(
  settings: BenchmarkSettings,
  only: BenchmarkName | "all",
  random: () => number = Math.random,
): BenchmarkPlan[] {
  const common = {
    url: settings.baseUrl,
    connections: settings.connections,
    duration: settings.durationS,
    pipelining: 1,
    timeout: 10, // seconds
  };

  const plans: BenchmarkPlan[] = [
    {
      name: "list",
      label: "GET /users/?limit=20",
      options: { ...common, url: `${settings.baseUrl}/users/?limit=20` },
    },
    {
      name: "users",
      label: "GET /users/1",
      options: { ...common, url: `${settings.baseUrl}/users/1` },
    },
    {
      // Varying bodies keep most requests clear of the duplicate-email 400
      name: "post",
      label: "POST /users/",
      options: {
        ...common,
        method: "POST",
        requests: Array.from({ length: 1000 }, () => ({
          method: "POST" as const,
          path: "/users/",
          headers: { "content-type": "application/json" },
          body: makeUserBody(random),
        })),
      },
    },
    {
      name: "compute",
      label: "GET /compute/fibonacci/25",
      options: { ...common, url: `${settings.baseUrl}/compute/fibonacci/25` },
    },
    {
      name: "mixed",
      label: "Mixed workload (80/20 GET/POST)",
      options: { ...common, requests: buildMixedRequests(random) },
    },
  ];

  return only === "all" ? plans : plans.filter((p) => p.name === only);
}

export function runBenchmark(options: autocannon.Options): Promise<autocannon.Result> {
  return new Promise((resolve, reject) => {
    const instance = autocannon(options, (err, result) => {
      if (err) reject(err);
      else resolve(result);
    });
    autocannon.track(instance, { renderProgressBar: true });
  });
}

export interface Verdict {
  p99Ok: boolean;
  errorsOk: boolean;
  rpsOk: boolean;
}

export interface RunSummary {
  latency: { p99: number };
  errors: number;
  requests: { mean: number };
}

export function judge(result: RunSummary): Verdict {
  return {
    p99Ok: result.latency.p99 < 500,
    errorsOk: result.errors === 0,
    rpsOk: result.requests.mean > 100,
  };
}

export function printResults(label: string, result: autocannon.Result): void {
  const verdict = judge(result);
  const mark = (ok: boolean) => (ok ? "✅" : "❌");

  console.log(`\n${"─".repeat(60)}`);
  console.log(`  📊 ${label}`);
  console.log(`${"─".repeat(60)}`);
  console.log(`  Connections:    ${result.connections}`);
  console.log(`  Duration:       ${result.duration}s`);
  console.log(`  Total requests: ${result.requests.total.toLocaleString()}`);
  console.log(`  Req/sec:        ${result.requests.mean.toFixed(0)} avg`);
  console.log(`                  ${result.requests.max.toFixed(0)} max`);
  console.log(`\n  Latency:`);
  console.log(`    p50  = ${result.latency.p50}ms`);
  console.log(`    p90  = ${result.latency.p90}ms`);
  console.log(`    p99  = ${result.latency.p99}ms`);
  console.log(`    max  = ${result.latency.max}ms`);
  console.log(`\n  Errors: ${result.errors}  Non-2xx: ${result.non2xx}  Timeouts: ${result.timeouts}`);
  console.log(`${"─".repeat(60)}`);

  console.log(`\n  ${mark(verdict.p99Ok)} p99 < 500ms   (actual: ${result.latency.p99}ms)`);
  console.log(`  ${mark(verdict.errorsOk)} Zero errors    (actual: ${result.errors})`);
  console.log(`  ${mark(verdict.rpsOk)} > 100 req/s    (actual: ${result.requests.mean.toFixed(0)})`);
}
