import express, { type Express, type NextFunction, type Request, type Response } from "express";
import compression from "compression";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import { randomUUID } from "crypto";
import type { ApiError } from "@loadlab/types";
import { AppError } from "./errors";
import { logger } from "./logger";
import type { SessionSource } from "./db";
import { Repository } from "./repository";
import { createRouter } from "./routes";

export interface AppDeps {
  sessions: SessionSource;
  maxPageSize?: number;
  rateLimit?: { windowMs: number; max: number };
}

// body-parser errors carry their own status and a `type` tag
function isBodyParserError(err: unknown): err is { status: number; type: string } {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    typeof err.type === "string" &&
    err.type.startsWith("entity.") &&
    "status" in err &&
    typeof err.status === "number"
  );
}

export function createApp({ sessions, maxPageSize, rateLimit: limits }: AppDeps): Express {
  const app = express();

  app.use(helmet());
  app.use(compression());
  app.use(express.json({ limit: "100kb" }));

  if (limits) {
    app.use(
      rateLimit({
        windowMs: limits.windowMs,
        max: limits.max,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  // Request ID + access log
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header("x-request-id") || randomUUID();
    const start = process.hrtime.bigint();
    res.setHeader("x-request-id", requestId);
    res.on("finish", () => {
      logger.info({
        requestId,
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        durationMs: Number(process.hrtime.bigint() - start) / 1_000_000,
      });
    });
    next();
  });

  app.use(createRouter({ repo: new Repository(sessions), maxPageSize }));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" } satisfies ApiError);
  });

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      logger.debug({ err }, "Request rejected");
      res.status(err.status).json({ error: err.message } satisfies ApiError);
      return;
    }
    if (isBodyParserError(err)) {
      const error = err.type === "entity.too.large" ? "Request body too large" : "Malformed request body";
      res.status(err.status).json({ error } satisfies ApiError);
      return;
    }
    logger.error({ err }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" } satisfies ApiError);
  });

  return app;
}
