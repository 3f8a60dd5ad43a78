import { describe, expect, it } from "vitest";
import { buildMixedRequests, judge, makeUserBody, planBenchmarks } from "./benchmark";

// mulberry32, so shuffles are repeatable
function seeded(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const settings = { baseUrl: "http://api.test", connections: 10, durationS: 5 };

describe("buildMixedRequests", () => {
  it("mixes 80% single-user reads with 20% creations", () => {
    const requests = buildMixedRequests(seeded(1));

    const reads = requests.filter((r) => r.method === "GET");
    const writes = requests.filter((r) => r.method === "POST");
    expect(requests).toHaveLength(1000);
    expect(reads).toHaveLength(800);
    expect(writes).toHaveLength(200);
    expect(reads.every((r) => /^\/users\/\d+$/.test(r.path ?? ""))).toBe(true);
    expect(writes.every((r) => r.path === "/users/")).toBe(true);
  });

  it("shuffles reads and writes together", () => {
    const requests = buildMixedRequests(seeded(7), 100);

    expect(requests.slice(0, 80).some((r) => r.method === "POST")).toBe(true);
  });
});

describe("makeUserBody", () => {
  it("produces a user payload", () => {
    expect(JSON.parse(makeUserBody(() => 0.5))).toEqual({
      email: "user500000000000@example.com",
      full_name: "User 500000000000",
      is_active: true,
    });
  });
});

describe("planBenchmarks", () => {
  it("plans every workload by default", () => {
    expect(planBenchmarks(settings, "all").map((p) => p.name)).toEqual([
      "list",
      "users",
      "post",
      "compute",
      "mixed",
    ]);
  });

  it("narrows to one workload", () => {
    const [plan] = planBenchmarks(settings, "compute");

    expect(plan.options.url).toBe("http://api.test/compute/fibonacci/25");
    expect(plan.options).toMatchObject({ connections: 10, duration: 5 });
  });
});

describe("judge", () => {
  it("passes fast error-free runs and fails slow ones", () => {
    const fast = { latency: { p99: 18 }, errors: 0, requests: { mean: 8200 } };
    const slow = { latency: { p99: 900 }, errors: 3, requests: { mean: 40 } };

    expect(judge(fast)).toEqual({ p99Ok: true, errorsOk: true, rpsOk: true });
    expect(judge(slow)).toEqual({ p99Ok: false, errorsOk: false, rpsOk: false });
  });
});
