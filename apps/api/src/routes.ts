import { Router } from "express";
import type { ApiError, ApiResponse, FibonacciResult, HealthStatus, ServiceDescriptor, SumResult } from "@loadlab/types";
import { FIBONACCI_MAX, SUM_MAX, boundedSum, fibonacci, runAdmitted } from "./compute";
import { ConflictError, NotFoundError } from "./errors";
import { logger } from "./logger";
import type { PostRow, PostWithOwnerRow, Repository, UserRow } from "./repository";
import {
  ComputeParamSchema,
  IdParamSchema,
  PageQuerySchema,
  PostCreateSchema,
  UserCreateSchema,
  effectiveLimit,
  isStoredId,
  parse,
} from "./schemas";

export interface RouterDeps {
  repo: Repository;
  maxPageSize?: number;
}

export const SERVICE_NAME = "loadlab-api";
export const SERVICE_VERSION = "1.0.0";

// A well-formed id the store cannot hold is a missing user, not a store error
function userIdFrom(params: unknown): number {
  const { id } = parse(IdParamSchema, params);
  if (!isStoredId(id)) throw new NotFoundError("User not found");
  return id;
}

export function createRouter({ repo, maxPageSize }: RouterDeps): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({
      data: {
        name: SERVICE_NAME,
        version: SERVICE_VERSION,
        endpoints: {
          health: "/health",
          users: "/users/",
          posts: "/posts/",
          fibonacci: "/compute/fibonacci/{n}",
          sum: "/compute/sum/{n}",
        },
      },
    } satisfies ApiResponse<ServiceDescriptor>);
  });

  // Any failure to reach the store is a 503 here, not only connect errors
  router.get("/health", async (_req, res) => {
    try {
      await repo.ping();
      res.json({ data: { status: "healthy", database: "connected" } } satisfies ApiResponse<HealthStatus>);
    } catch (err) {
      logger.warn({ err }, "Health check failed");
      res.status(503).json({ error: "Database connection failed" } satisfies ApiError);
    }
  });

  // ─── Users ────────────────────────────────────────────────
  router.post("/users", async (req, res, next) => {
    try {
      const fields = parse(UserCreateSchema, req.body);
      if (await repo.getUserByEmail(fields.email)) {
        throw new ConflictError("Email already registered");
      }
      const user = await repo.createUser(fields);
      res.status(201).json({ data: user } satisfies ApiResponse<UserRow>);
    } catch (err) {
      next(err);
    }
  });

  router.get("/users", async (req, res, next) => {
    try {
      const { skip, limit } = parse(PageQuerySchema, req.query);
      const users = await repo.listUsers(skip, effectiveLimit(limit, maxPageSize));
      res.json({ data: users } satisfies ApiResponse<UserRow[]>);
    } catch (err) {
      next(err);
    }
  });

  router.get("/users/:id", async (req, res, next) => {
    try {
      const id = userIdFrom(req.params);
      const user = await repo.getUser(id);
      if (!user) throw new NotFoundError("User not found");
      res.json({ data: user } satisfies ApiResponse<UserRow>);
    } catch (err) {
      next(err);
    }
  });

  // Posts owned by the user go with it, see Repository.deleteUser
  router.delete("/users/:id", async (req, res, next) => {
    try {
      const id = userIdFrom(req.params);
      if (!(await repo.deleteUser(id))) throw new NotFoundError("User not found");
      res.json({ data: { id, deleted: true } });
    } catch (err) {
      next(err);
    }
  });

  router.post("/users/:id/posts", async (req, res, next) => {
    try {
      const id = userIdFrom(req.params);
      const fields = parse(PostCreateSchema, req.body);
      if (!(await repo.getUser(id))) throw new NotFoundError("User not found");
      const post = await repo.createPost(fields, id);
      res.status(201).json({ data: post } satisfies ApiResponse<PostRow>);
    } catch (err) {
      next(err);
    }
  });

  // ─── Posts ────────────────────────────────────────────────
  router.get("/posts", async (req, res, next) => {
    try {
      const { skip, limit } = parse(PageQuerySchema, req.query);
      const posts = await repo.listPosts(skip, effectiveLimit(limit, maxPageSize));
      res.json({ data: posts } satisfies ApiResponse<PostWithOwnerRow[]>);
    } catch (err) {
      next(err);
    }
  });

  // ─── Compute ──────────────────────────────────────────────
  // Runs on the event loop thread and blocks every other request until it returns
  router.get("/compute/fibonacci/:n", (req, res, next) => {
    try {
      const { n } = parse(ComputeParamSchema, req.params);
      const result = runAdmitted(n, FIBONACCI_MAX, fibonacci);
      res.json({ data: { n, fibonacci: result } } satisfies ApiResponse<FibonacciResult>);
    } catch (err) {
      next(err);
    }
  });

  router.get("/compute/sum/:n", (req, res, next) => {
    try {
      const { n } = parse(ComputeParamSchema, req.params);
      const result = runAdmitted(n, SUM_MAX, boundedSum);
      res.json({ data: { n, sum: result } } satisfies ApiResponse<SumResult>);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
