import type { Logger } from "pino";
import type { LoadTarget } from "./client";
import { logger as defaultLogger } from "./logger";

// ─── Script shape ─────────────────────────────────────────
// probe → bulk-create → dependent-create → burst-compute → mixed-load.
// Each phase issues all of its calls, then waits for every one to settle.
// A failed call is counted, never retried, and never cancels its siblings.
export type PhaseName = "probe" | "bulk-create" | "dependent-create" | "burst-compute" | "mixed-load";

export interface Tally {
  issued: number;
  succeeded: number;
  failed: number;
}

export interface PhaseReport extends Tally {
  phase: PhaseName;
  durationMs: number;
}

export interface ScriptReport {
  completed: PhaseReport[];
  aborted: boolean;
  abortReason?: string;
  /** Iterations of the mixed-load loop that ran to completion. */
  iterations: number;
}

export interface LoadScriptOptions {
  users: number;
  posts: number;
  /** Posts are assigned to owner ids 1..ownerPool in turn. */
  ownerPool: number;
  cpuOps: number;
  durationMs: number;
  intervalMs: number;
}

export const DEFAULT_OPTIONS: LoadScriptOptions = {
  users: 10,
  posts: 20,
  ownerPool: 5,
  cpuOps: 20,
  durationMs: 60_000,
  intervalMs: 100,
};

// Parameter ranges for randomized compute calls, inclusive
export const BURST_FIBONACCI_RANGE = [30, 35] as const;
export const BURST_SUM_RANGE = [1_000_000, 5_000_000] as const;
export const MIXED_FIBONACCI_RANGE = [25, 30] as const;
export const MIXED_LIST_LIMIT = 20;

export interface ScriptDeps {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
  random: () => number;
  logger: Pick<Logger, "info" | "warn">;
}

const defaultDeps: ScriptDeps = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  random: Math.random,
  logger: defaultLogger,
};

export function randomInt(random: () => number, [min, max]: readonly [number, number]): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Starts every call before awaiting any of them, then waits for all to
 * settle. Never rejects.
 */
export async function settle(calls: Array<() => Promise<unknown>>): Promise<Tally> {
  const inFlight = calls.map((call) => call());
  const results = await Promise.allSettled(inFlight);
  const succeeded = results.filter((r) => r.status === "fulfilled").length;
  return { issued: results.length, succeeded, failed: results.length - succeeded };
}

function addTally(a: Tally, b: Tally): Tally {
  return {
    issued: a.issued + b.issued,
    succeeded: a.succeeded + b.succeeded,
    failed: a.failed + b.failed,
  };
}

export async function runLoadScript(
  target: LoadTarget,
  options: Partial<LoadScriptOptions> = {},
  deps: Partial<ScriptDeps> = {},
): Promise<ScriptReport> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const { now, sleep, random, logger } = { ...defaultDeps, ...deps };
  const report: ScriptReport = { completed: [], aborted: false, iterations: 0 };

  const phase = async (name: PhaseName, body: () => Promise<Tally>): Promise<PhaseReport> => {
    const start = now();
    const tally = await body();
    const result: PhaseReport = { phase: name, ...tally, durationMs: now() - start };
    if (result.failed > 0) logger.warn(result, `Phase ${name} complete with failures`);
    else logger.info(result, `Phase ${name} complete`);
    return result;
  };

  // 1. Probe: later phases assume a reachable service
  const probe = await phase("probe", () => settle([() => target.health()]));
  if (probe.failed > 0) {
    report.aborted = true;
    report.abortReason = "health probe failed";
    logger.warn({ phase: "probe" }, "Service unreachable, aborting load script");
    return report;
  }
  report.completed.push(probe);

  // 2. Bulk create
  report.completed.push(
    await phase("bulk-create", () =>
      settle(Array.from({ length: opts.users }, (_, seq) => () => target.createUser(seq))),
    ),
  );

  // 3. Dependent create, owners assigned round-robin
  report.completed.push(
    await phase("dependent-create", () =>
      settle(
        Array.from({ length: opts.posts }, (_, seq) => {
          const ownerId = (seq % opts.ownerPool) + 1;
          return () => target.createPost(ownerId, seq);
        }),
      ),
    ),
  );

  // 4. Burst compute
  report.completed.push(
    await phase("burst-compute", () => {
      const calls: Array<() => Promise<unknown>> = [];
      for (let i = 0; i < opts.cpuOps; i++) {
        const fibN = randomInt(random, BURST_FIBONACCI_RANGE);
        calls.push(() => target.fibonacci(fibN));
        if (i % 2 === 0) {
          const sumN = randomInt(random, BURST_SUM_RANGE);
          calls.push(() => target.sum(sumN));
        }
      }
      return settle(calls);
    }),
  );

  // 5. Mixed load until the deadline; the last iteration always finishes
  report.completed.push(
    await phase("mixed-load", async () => {
      const start = now();
      let total: Tally = { issued: 0, succeeded: 0, failed: 0 };
      while (now() - start < opts.durationMs) {
        const iteration = report.iterations;
        const calls: Array<() => Promise<unknown>> = [() => target.health()];
        if (iteration % 3 === 0) calls.push(() => target.listUsers(0, MIXED_LIST_LIMIT));
        if (iteration % 5 === 0) {
          const n = randomInt(random, MIXED_FIBONACCI_RANGE);
          calls.push(() => target.fibonacci(n));
        }
        total = addTally(total, await settle(calls));
        report.iterations++;
        await sleep(opts.intervalMs);
      }
      return total;
    }),
  );

  logger.info({ iterations: report.iterations }, "Mixed load finished");
  return report;
}
