/**
 * Applies db/schema.sql to the configured database.
 *
 * Usage:
 *   npm run db:setup
 */

import "dotenv/config";
import { readFileSync } from "fs";
import path from "path";
import { config } from "../config";
import type { Pool } from "pg";
import { createPool, withSession } from "../db";
import { logger } from "../logger";

const SCHEMA_PATH = path.join(__dirname, "../../db/schema.sql");

async function waitForDatabase(
  pool: Pool,
  maxAttempts = 10,
  delayMs = 2000,
): Promise<void> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      await pool.query("SELECT 1");
      logger.info("Database is ready");
      return;
    } catch (err) {
      logger.warn({ err, attempt, maxAttempts }, "Database not reachable yet");
      if (attempt === maxAttempts) throw err;
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }
}

async function setup() {
  const pool = createPool(config.db);
  try {
    await waitForDatabase(pool);
    const schemaSql = readFileSync(SCHEMA_PATH, "utf8");
    await withSession(pool, (session) => session.query(schemaSql));

    const { rows } = await pool.query<{ users: string; posts: string }>(
      "SELECT (SELECT COUNT(*) FROM users) AS users, (SELECT COUNT(*) FROM posts) AS posts",
    );
    logger.info({ users: Number(rows[0].users), posts: Number(rows[0].posts) }, "Schema applied");
  } finally {
    await pool.end();
  }
}

setup().catch((err) => {
  logger.error({ err }, "Schema setup failed");
  process.exitCode = 1;
});
