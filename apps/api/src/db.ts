import { Pool, type QueryResult, type QueryResultRow } from "pg";
import type { DbConfig } from "./config";
import { StoreUnavailableError } from "./errors";
import { logger } from "./logger";

// ─── Session handles ──────────────────────────────────────
// pg.PoolClient satisfies Session and pg.Pool satisfies SessionSource;
// tests plug in pg-mem or a hand-written fake.
export interface Session {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
  release(err?: Error | boolean): void;
}

export interface SessionSource {
  connect(): Promise<Session>;
}

// ─── DB Pool ──────────────────────────────────────────────
export function createPool(db: DbConfig): Pool {
  const pool = new Pool(db);
  pool.on("error", (err) => logger.error({ err }, "Idle pool client error"));
  return pool;
}

/**
 * Runs `work` as one unit of work on its own handle.
 *
 * The handle is wrapped in BEGIN/COMMIT, rolled back when `work` throws, and
 * released exactly once whichever way the call exits. A handle whose
 * rollback failed is released with that error so the pool discards it.
 * A failure to obtain the handle at all is reported as
 * {@link StoreUnavailableError}.
 */
export async function withSession<T>(
  source: SessionSource,
  work: (session: Session) => Promise<T>,
): Promise<T> {
  let session: Session;
  try {
    session = await source.connect();
  } catch (err) {
    throw new StoreUnavailableError(err);
  }

  let releaseError: Error | undefined;
  try {
    await session.query("BEGIN");
    const result = await work(session);
    await session.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await session.query("ROLLBACK");
    } catch (rollbackErr) {
      logger.warn({ err: rollbackErr }, "Rollback failed");
      // Transaction state unknown: pg destroys a client released with an error
      releaseError = rollbackErr instanceof Error ? rollbackErr : new Error("Rollback failed");
    }
    throw err;
  } finally {
    session.release(releaseError);
  }
}
