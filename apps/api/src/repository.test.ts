import { beforeEach, describe, expect, it } from "vitest";
import { ConflictError, NotFoundError } from "./errors";
import { Repository } from "./repository";
import { RecordingSession, createMemoryPool, sourceOf } from "./testing/memory-db";

describe("Repository", () => {
  let repo: Repository;

  beforeEach(() => {
    repo = new Repository(createMemoryPool());
  });

  const addUser = (n: number) =>
    repo.createUser({ email: `user${n}@example.com`, full_name: `User ${n}`, is_active: true });

  describe("users", () => {
    it("returns the fully populated entity on create", async () => {
      const user = await repo.createUser({ email: "a@x.com", full_name: "A", is_active: false });

      expect(user).toMatchObject({ id: 1, email: "a@x.com", full_name: "A", is_active: false });
      expect(user.created_at).toBeInstanceOf(Date);
    });

    it("looks users up by id and by email", async () => {
      const created = await addUser(1);

      expect(await repo.getUser(created.id)).toMatchObject({ email: "user1@example.com" });
      expect(await repo.getUserByEmail("user1@example.com")).toMatchObject({ id: created.id });
      expect(await repo.getUser(999)).toBeNull();
      expect(await repo.getUserByEmail("nobody@example.com")).toBeNull();
    });

    it("pages through users in insertion order without overlap or gap", async () => {
      for (let n = 1; n <= 5; n++) await addUser(n);

      const first = await repo.listUsers(0, 2);
      const second = await repo.listUsers(2, 2);
      const third = await repo.listUsers(4, 2);
      const all = await repo.listUsers(0, 100);

      expect(first.map((u) => u.id)).toEqual([1, 2]);
      expect(second.map((u) => u.id)).toEqual([3, 4]);
      expect(third.map((u) => u.id)).toEqual([5]);
      expect([...first, ...second, ...third]).toEqual(all);
    });

    it("returns an empty page past the end", async () => {
      await addUser(1);

      expect(await repo.listUsers(10, 5)).toEqual([]);
    });
  });

  describe("deleteUser", () => {
    it("removes the user and every post it owns", async () => {
      const alice = await addUser(1);
      const bob = await addUser(2);
      await repo.createPost({ title: "a1", content: "x", is_published: true }, alice.id);
      await repo.createPost({ title: "b1", content: "y", is_published: true }, bob.id);
      await repo.createPost({ title: "a2", content: "z", is_published: false }, alice.id);

      expect(await repo.deleteUser(alice.id)).toBe(true);

      const posts = await repo.listPosts(0, 100);
      expect(posts.map((p) => p.title)).toEqual(["b1"]);
      expect(posts.every((p) => p.owner_id === bob.id)).toBe(true);
      expect(await repo.getUser(alice.id)).toBeNull();
    });

    it("reports false when there is nothing to delete", async () => {
      expect(await repo.deleteUser(42)).toBe(false);
    });
  });

  describe("posts", () => {
    it("binds a new post to its owner", async () => {
      const owner = await addUser(1);

      const post = await repo.createPost({ title: "T", content: "C", is_published: true }, owner.id);

      expect(post).toMatchObject({ id: 1, title: "T", content: "C", is_published: true, owner_id: owner.id });
      expect(post.created_at).toBeInstanceOf(Date);
    });

    it("lists posts with their owner attached", async () => {
      const owner = await addUser(7);
      await repo.createPost({ title: "T", content: "C", is_published: true }, owner.id);

      const [post] = await repo.listPosts(0, 10);

      expect(post.owner).toMatchObject({
        id: owner.id,
        email: "user7@example.com",
        full_name: "User 7",
        is_active: true,
      });
    });

    it("pages posts the same way as users", async () => {
      const owner = await addUser(1);
      for (let n = 1; n <= 3; n++) {
        await repo.createPost({ title: `P${n}`, content: "c", is_published: true }, owner.id);
      }

      expect((await repo.listPosts(1, 1)).map((p) => p.title)).toEqual(["P2"]);
      expect((await repo.listPosts(2, 5)).map((p) => p.title)).toEqual(["P3"]);
    });
  });

  it("answers a ping", async () => {
    await expect(repo.ping()).resolves.toBeUndefined();
  });
});

// The router pre-checks e-mail and owner; these cover a concurrent writer winning in between
describe("Repository constraint translation", () => {
  const pgError = (code: string) => () => Object.assign(new Error(`constraint ${code}`), { code });

  it("reports a unique violation on insert as a conflict", async () => {
    const session = new RecordingSession(/^INSERT INTO users/, pgError("23505"));
    const repo = new Repository(sourceOf(session));

    const created = repo.createUser({ email: "a@x.com", full_name: "A", is_active: true });

    await expect(created).rejects.toBeInstanceOf(ConflictError);
    await expect(created).rejects.toHaveProperty("message", "Email already registered");
    expect(session.statements.at(-1)).toBe("ROLLBACK");
    expect(session.releaseArgs).toEqual([undefined]);
  });

  it("reports a foreign-key violation on insert as a missing owner", async () => {
    const session = new RecordingSession(/^INSERT INTO posts/, pgError("23503"));
    const repo = new Repository(sourceOf(session));

    const created = repo.createPost({ title: "T", content: "C", is_published: true }, 7);

    await expect(created).rejects.toBeInstanceOf(NotFoundError);
    await expect(created).rejects.toHaveProperty("message", "User not found");
    expect(session.statements.at(-1)).toBe("ROLLBACK");
    expect(session.releaseArgs).toEqual([undefined]);
  });

  it("passes other store errors through untouched", async () => {
    const session = new RecordingSession(/^INSERT INTO posts/, pgError("23505"));
    const repo = new Repository(sourceOf(session));

    await expect(
      repo.createPost({ title: "T", content: "C", is_published: true }, 7),
    ).rejects.toHaveProperty("code", "23505");
  });
});
