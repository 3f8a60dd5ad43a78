import { z } from "zod";
import type { LoadScriptOptions } from "./orchestrator";

// ─── Config ───────────────────────────────────────────────
const EnvSchema = z.object({
  BASE_URL: z.string().url().default("http://localhost:8000"),
  LOAD_USERS: z.coerce.number().int().min(0).default(10),
  LOAD_POSTS: z.coerce.number().int().min(0).default(20),
  LOAD_OWNER_POOL: z.coerce.number().int().positive().default(5),
  LOAD_CPU_OPS: z.coerce.number().int().min(0).default(20),
  LOAD_DURATION_S: z.coerce.number().positive().default(60),
  LOAD_INTERVAL_MS: z.coerce.number().int().min(0).default(100),
  CONNECTIONS: z.coerce.number().int().positive().default(50), // concurrent connections
  DURATION: z.coerce.number().int().positive().default(30), // seconds per benchmark
  ENDPOINT: z.enum(["all", "list", "users", "post", "compute", "mixed"]).default("all"),
});

export interface HarnessConfig {
  baseUrl: string;
  script: LoadScriptOptions;
  benchmark: {
    connections: number;
    durationS: number;
    endpoint: z.infer<typeof EnvSchema>["ENDPOINT"];
  };
}

export function loadHarnessConfig(source: NodeJS.ProcessEnv = process.env): HarnessConfig {
  const env = EnvSchema.parse(source);
  return {
    baseUrl: env.BASE_URL.replace(/\/+$/, ""),
    script: {
      users: env.LOAD_USERS,
      posts: env.LOAD_POSTS,
      ownerPool: env.LOAD_OWNER_POOL,
      cpuOps: env.LOAD_CPU_OPS,
      durationMs: env.LOAD_DURATION_S * 1000,
      intervalMs: env.LOAD_INTERVAL_MS,
    },
    benchmark: {
      connections: env.CONNECTIONS,
      durationS: env.DURATION,
      endpoint: env.ENDPOINT,
    },
  };
}
