import pino from "pino";
import { config } from "./config";

// ─── Logger ───────────────────────────────────────────────
// JSON in production for log aggregators, pretty in dev, silent under tests
export const logger = pino({
  level: config.logLevel,
  transport: config.prettyLogs ? { target: "pino-pretty" } : undefined,
});
