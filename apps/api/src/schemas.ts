import { z } from "zod";
import { ValidationError } from "./errors";

// ─── Request schemas ──────────────────────────────────────
// Parsing yields fully populated values; defaults are applied here, not in SQL.
export const UserCreateSchema = z.object({
  email: z.string().email("Invalid email address"),
  full_name: z.string().min(1, "full_name is required"),
  is_active: z.boolean().default(true),
});

export const PostCreateSchema = z.object({
  title: z.string(),
  content: z.string(),
  is_published: z.boolean().default(true),
});

// Primary keys are SERIAL (int4); anything outside 1..PG_INT_MAX names no row
export const PG_INT_MAX = 2_147_483_647;

export const PageQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
  limit: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(100),
});

export const IdParamSchema = z.object({
  id: z.coerce.number().int(),
});

export function isStoredId(id: number): boolean {
  return id >= 1 && id <= PG_INT_MAX;
}

export const ComputeParamSchema = z.object({
  n: z.coerce.number().int("n must be an integer"),
});

export type UserCreateInput = z.infer<typeof UserCreateSchema>;
export type PostCreateInput = z.infer<typeof PostCreateSchema>;
export type PageQuery = z.infer<typeof PageQuerySchema>;

export function parse<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join(".");
    throw new ValidationError(field ? `${field}: ${issue.message}` : issue.message);
  }
  return result.data;
}

/** Applies the optional page-size cap; without one the requested limit stands. */
export function effectiveLimit(limit: number, maxPageSize?: number): number {
  return maxPageSize === undefined ? limit : Math.min(limit, maxPageSize);
}
