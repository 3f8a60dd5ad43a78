import { ValidationError } from "./errors";

// ─── Admission-controlled compute ─────────────────────────
// Both operations exist to burn CPU for profilers. The bounds below are the
// only thing standing between a caller and an unbounded computation.
export const FIBONACCI_MAX = 40;
export const SUM_MAX = 10_000_000;

export function admit(n: number, max: number): void {
  if (!Number.isInteger(n)) throw new ValidationError("n must be an integer");
  if (n < 0) throw new ValidationError("n must be non-negative");
  if (n > max) throw new ValidationError(`n must be <= ${max}`);
}

export function runAdmitted<T>(n: number, max: number, work: (n: number) => T): T {
  admit(n, max);
  return work(n);
}

// Exponential on purpose
export function fibonacci(n: number): number {
  if (n <= 1) return n;
  return fibonacci(n - 1) + fibonacci(n - 2);
}

export function boundedSum(n: number): number {
  let total = 0;
  for (let i = 0; i <= n; i++) total += i;
  return total;
}
