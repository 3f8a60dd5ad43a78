/**
 * ─────────────────────────────────────────────────────────
 *  loadlab API
 *  Stack: Node.js + TypeScript + Express + PostgreSQL (pg)
 *  Users, their posts, and two CPU-bound compute endpoints
 *  that exist to give profilers something to look at.
 * ─────────────────────────────────────────────────────────
 *
 *  Tables are not created here. Run `npm run db:setup` once
 *  against a fresh database first.
 */

import "dotenv/config";
import { createApp } from "./app";
import { config } from "./config";
import { createPool } from "./db";
import { logger } from "./logger";

const pool = createPool(config.db);

const app = createApp({
  sessions: pool,
  maxPageSize: config.maxPageSize,
  rateLimit: config.rateLimit,
});

const server = app.listen(config.port, () => {
  logger.info(`API ${process.pid} listening on :${config.port}`);
});

// ─── Graceful Shutdown ────────────────────────────────────
const shutdown = (signal: string) => {
  logger.info(`${signal} — shutting down`);
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error({ err }, "Pool shutdown failed");
        process.exit(1);
      });
  });
  setTimeout(() => process.exit(1), config.shutdownTimeoutMs).unref();
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
