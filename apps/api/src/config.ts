import { z } from "zod";

// ─── Config ───────────────────────────────────────────────
// Everything comes from the environment. server.ts loads .env first;
// tests import this with whatever vitest leaves in process.env.
const optionalInt = z.preprocess(
  (v) => (v === undefined || v === "" ? undefined : v),
  z.coerce.number().int().positive().optional(),
);

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.string().optional(),
  PORT: z.coerce.number().int().default(8000),

  DB_HOST: z.string().default("localhost"),
  DB_PORT: z.coerce.number().int().default(5432),
  DB_NAME: z.string().default("postgres"),
  DB_USER: z.string().default("postgres"),
  DB_PASSWORD: z.string().default("postgres"),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_IDLE_TIMEOUT_MS: z.coerce.number().int().default(30_000),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().default(3_000),

  // Unset means callers get whatever `limit` they ask for
  MAX_PAGE_SIZE: optionalInt,
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(5_000),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

export interface Config {
  env: string;
  logLevel: string;
  prettyLogs: boolean;
  port: number;
  db: DbConfig;
  maxPageSize?: number;
  rateLimit: { windowMs: number; max: number };
  shutdownTimeoutMs: number;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const env = EnvSchema.parse(source);
  const isTest = env.NODE_ENV === "test";

  return {
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL ?? (isTest ? "silent" : "info"),
    prettyLogs: env.NODE_ENV !== "production" && !isTest,
    port: env.PORT,
    db: {
      host: env.DB_HOST,
      port: env.DB_PORT,
      database: env.DB_NAME,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      max: env.DB_POOL_MAX,
      idleTimeoutMillis: env.DB_IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: env.DB_CONNECT_TIMEOUT_MS,
    },
    maxPageSize: env.MAX_PAGE_SIZE,
    rateLimit: { windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX },
    shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
  };
}

export const config = loadConfig();
