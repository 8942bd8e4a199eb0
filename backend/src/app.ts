// src/app.ts

import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { getAllowedOrigins, getAppVersion } from "./config/appConfig";
import { getRequestId, sendError } from "./http/sendError";
import { createAuth } from "./middleware/auth";
import { createRateLimit } from "./middleware/rateLimit";
import { requestContext } from "./middleware/requestContext";
import { createRoleplayRouter } from "./routes/roleplay";
import { createUnitsRouter } from "./routes/units";
import type { RoleplayService } from "./services/roleplayService";
import type { UnitCatalog } from "./state/unitCatalog";
import { logEvent } from "./utils/logger";

// body-parser errors (bad JSON, oversized body) carry a 4xx status.
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const status = err.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export type AppDeps = {
  catalog: UnitCatalog;
  roleplay: RoleplayService;
};

export function createApp(deps: AppDeps) {
  const app = express();

  const origins = getAllowedOrigins();
  app.use(
    cors({
      origin: origins.length > 0 ? origins : "*",
      methods: ["GET", "POST"],
    })
  );

  app.use(requestContext);

  //body size limit
  app.use(express.json({ limit: "1mb" }));

  //basic rate limit (no PII)
  app.use(createRateLimit());

  // uptime checks stay open; nothing below them runs without the token
  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", time: new Date().toISOString() });
  });
  app.get("/version", (_req, res) => {
    res.status(200).json({ version: getAppVersion() });
  });

  app.use(createAuth());

  app.use("/units", createUnitsRouter(deps.catalog));
  // generation is the expensive path, so it gets a tighter budget
  app.use("/roleplay", createRateLimit({ max: 40 }), createRoleplayRouter(deps.roleplay));

  //404
  app.use((_req, res) => {
    sendError(res, 404, "Not Found", "NOT_FOUND");
  });

  //error handler
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null && !res.headersSent) {
      return sendError(res, clientStatus, "Invalid request body", "INVALID_REQUEST");
    }

    logEvent("error", "unhandled_error", {
      requestId: getRequestId(res),
      error: err instanceof Error ? err.message : String(err),
    });
    if (res.headersSent) return next(err);
    sendError(res, 500, "Server error", "SERVER_ERROR");
  });

  return app;
}
