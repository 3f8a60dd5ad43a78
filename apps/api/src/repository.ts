import type { Post, PostCreate, PostWithOwner, User, UserCreate } from "@loadlab/types";
import { type Session, type SessionSource, withSession } from "./db";
import {
  ConflictError,
  NotFoundError,
  PG_FOREIGN_KEY_VIOLATION,
  PG_UNIQUE_VIOLATION,
  pgErrorCode,
} from "./errors";

// ─── Row shapes ───────────────────────────────────────────
// pg hands TIMESTAMPTZ back as Date; res.json turns it into the wire string
export type UserRow = User<Date>;
export type PostRow = Post<Date>;
export type PostWithOwnerRow = PostWithOwner<Date>;

interface JoinedPostRow extends PostRow {
  owner_email: string;
  owner_full_name: string;
  owner_is_active: boolean;
  owner_created_at: Date;
}

const USER_COLUMNS = "id, email, full_name, is_active, created_at";
const POST_COLUMNS = "id, title, content, is_published, created_at, owner_id";

/**
 * Typed CRUD over users and posts. Every method is a single unit of work
 * on its own session; creates and deletes commit before returning.
 */
export class Repository {
  constructor(private readonly sessions: SessionSource) {}

  private run<T>(work: (session: Session) => Promise<T>): Promise<T> {
    return withSession(this.sessions, work);
  }

  async ping(): Promise<void> {
    await this.run((s) => s.query("SELECT 1"));
  }

  getUser(id: number): Promise<UserRow | null> {
    return this.run(async (s) => {
      const { rows } = await s.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
        [id],
      );
      return rows[0] ?? null;
    });
  }

  getUserByEmail(email: string): Promise<UserRow | null> {
    return this.run(async (s) => {
      const { rows } = await s.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
        [email],
      );
      return rows[0] ?? null;
    });
  }

  listUsers(skip: number, limit: number): Promise<UserRow[]> {
    return this.run(async (s) => {
      const { rows } = await s.query<UserRow>(
        `SELECT ${USER_COLUMNS}
         FROM users
         ORDER BY id ASC
         LIMIT $1 OFFSET $2`,
        [limit, skip],
      );
      return rows;
    });
  }

  // Uniqueness is pre-checked by the caller; 23505 here means a concurrent duplicate won
  createUser(fields: Required<UserCreate>): Promise<UserRow> {
    return this.run(async (s) => {
      try {
        const { rows } = await s.query<UserRow>(
          `INSERT INTO users (email, full_name, is_active)
           VALUES ($1, $2, $3)
           RETURNING ${USER_COLUMNS}`,
          [fields.email, fields.full_name, fields.is_active],
        );
        return rows[0];
      } catch (err) {
        if (pgErrorCode(err) === PG_UNIQUE_VIOLATION) {
          throw new ConflictError("Email already registered");
        }
        throw err;
      }
    });
  }

  // Posts go first so the foreign key never sees an orphan, all in one transaction
  deleteUser(id: number): Promise<boolean> {
    return this.run(async (s) => {
      await s.query("DELETE FROM posts WHERE owner_id = $1 RETURNING id", [id]);
      const { rows } = await s.query<{ id: number }>(
        "DELETE FROM users WHERE id = $1 RETURNING id",
        [id],
      );
      return rows.length > 0;
    });
  }

  listPosts(skip: number, limit: number): Promise<PostWithOwnerRow[]> {
    return this.run(async (s) => {
      const { rows } = await s.query<JoinedPostRow>(
        `SELECT p.id, p.title, p.content, p.is_published, p.created_at, p.owner_id,
                u.email AS owner_email, u.full_name AS owner_full_name,
                u.is_active AS owner_is_active, u.created_at AS owner_created_at
         FROM posts p
         JOIN users u ON u.id = p.owner_id
         ORDER BY p.id ASC
         LIMIT $1 OFFSET $2`,
        [limit, skip],
      );
      return rows.map(toPostWithOwner);
    });
  }

  // The owner was checked by the caller; the FK still rejects a user deleted in between
  createPost(fields: Required<PostCreate>, ownerId: number): Promise<PostRow> {
    return this.run(async (s) => {
      try {
        const { rows } = await s.query<PostRow>(
          `INSERT INTO posts (title, content, is_published, owner_id)
           VALUES ($1, $2, $3, $4)
           RETURNING ${POST_COLUMNS}`,
          [fields.title, fields.content, fields.is_published, ownerId],
        );
        return rows[0];
      } catch (err) {
        if (pgErrorCode(err) === PG_FOREIGN_KEY_VIOLATION) {
          throw new NotFoundError("User not found");
        }
        throw err;
      }
    });
  }
}

function toPostWithOwner(row: JoinedPostRow): PostWithOwnerRow {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    is_published: row.is_published,
    created_at: row.created_at,
    owner_id: row.owner_id,
    owner: {
      id: row.owner_id,
      email: row.owner_email,
      full_name: row.owner_full_name,
      is_active: row.owner_is_active,
      created_at: row.owner_created_at,
    },
  };
}
