// backend/src/http/respondWithError.ts

import type { Response } from "express";
import { isAppError } from "../utils/errors";
import { logServerError } from "../utils/logger";
import { getRequestId, sendError } from "./sendError";

/**
 * Map a thrown error to the JSON envelope. Domain errors keep their status and
 * code; anything else is logged and reported as a plain 500.
 */
export function respondWithError(res: Response, err: unknown, context: string): Response {
  if (isAppError(err)) {
    if (err.status >= 500) logServerError(context, err.cause ?? err, getRequestId(res));
    return sendError(res, err.status, err.message, err.code);
  }
  logServerError(context, err, getRequestId(res));
  return sendError(res, 500, "Server error", "SERVER_ERROR");
}
