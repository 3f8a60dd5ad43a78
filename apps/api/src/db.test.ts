import { describe, expect, it } from "vitest";
import { withSession } from "./db";
import { StoreUnavailableError } from "./errors";
import { RecordingSession, sourceOf, unreachableStore } from "./testing/memory-db";

describe("withSession", () => {
  it("wraps the work in a transaction and releases the handle once", async () => {
    const session = new RecordingSession();

    const result = await withSession(sourceOf(session), async (s) => {
      await s.query("SELECT 1");
      return "done";
    });

    expect(result).toBe("done");
    expect(session.statements).toEqual(["BEGIN", "SELECT 1", "COMMIT"]);
    expect(session.releases).toBe(1);
  });

  it("rolls back, rethrows and releases when the work fails", async () => {
    const session = new RecordingSession(/^UPDATE users$/);

    await expect(
      withSession(sourceOf(session), (s) => s.query("UPDATE users")),
    ).rejects.toThrow("failed: UPDATE users");

    expect(session.statements).toEqual(["BEGIN", "UPDATE users", "ROLLBACK"]);
    expect(session.releaseArgs).toEqual([undefined]);
  });

  it("rolls back when the commit itself fails", async () => {
    const session = new RecordingSession(/^COMMIT$/);

    await expect(
      withSession(sourceOf(session), (s) => s.query("SELECT 1")),
    ).rejects.toThrow("failed: COMMIT");

    expect(session.statements).toEqual(["BEGIN", "SELECT 1", "COMMIT", "ROLLBACK"]);
    expect(session.releases).toBe(1);
  });

  it("keeps the original error when the rollback also fails", async () => {
    const session = new RecordingSession(/^(DELETE FROM users|ROLLBACK)$/);

    await expect(
      withSession(sourceOf(session), (s) => s.query("DELETE FROM users")),
    ).rejects.toThrow("failed: DELETE FROM users");

    expect(session.releaseArgs).toHaveLength(1);
    expect(session.releaseArgs[0]).toBeInstanceOf(Error);
    expect(session.releaseArgs[0]).toHaveProperty("message", "failed: ROLLBACK");
  });

  it("releases on an early return without touching the store", async () => {
    const session = new RecordingSession();

    const result = await withSession(sourceOf(session), async () => null);

    expect(result).toBeNull();
    expect(session.statements).toEqual(["BEGIN", "COMMIT"]);
    expect(session.releases).toBe(1);
  });

  it("reports a failed connect as store unavailable", async () => {
    const work = async () => "never";

    const error = await withSession(unreachableStore, work).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error).toMatchObject({ status: 503 });
    expect(error).toHaveProperty("message", "Database connection failed");
  });
});
