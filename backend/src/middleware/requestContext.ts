//backend/src/middleware/requestContext.ts

import type { NextFunction, Request, Response } from "express";
import crypto from "node:crypto";
import { logEvent } from "../utils/logger";

function normalizeIncomingRequestId(v: unknown): string | null {
  if (typeof v !== "string") return null;
  const t = v.trim();
  if (!t || t.length > 64) return null;
  if (!/^[A-Za-z0-9_-]+$/.test(t)) return null;
  return t;
}

export function requestContext(req: Request, res: Response, next: NextFunction) {
  const incoming = normalizeIncomingRequestId(req.get("x-request-id"));
  const requestId = incoming ?? crypto.randomUUID();

  res.locals.requestId = requestId;
  res.setHeader("x-request-id", requestId);

  const start = process.hrtime.bigint();

  res.on("finish", () => {
    const latencyMs = Number(process.hrtime.bigint() - start) / 1_000_000;

    // Route template, not the raw URL: unit ids are fine, bodies never logged.
    const routePath: unknown = req.route?.path;
    const path = (req.baseUrl || "") + (typeof routePath === "string" ? routePath : req.path);

    logEvent("info", "request", {
      requestId,
      method: req.method,
      path,
      status: res.statusCode,
      latencyMs: Math.round(latencyMs * 10) / 10,
    });
  });

  next();
}
