// backend/src/middleware/auth.ts

import type { NextFunction, Request, Response } from "express";
import crypto from "node:crypto";
import { getAuthToken } from "../config/appConfig";
import { sendError } from "../http/sendError";

export function presentedToken(req: Request): string | null {
  const bearer = /^Bearer\s+(\S+)\s*$/i.exec(req.get("authorization") ?? "");
  if (bearer?.[1]) return bearer[1];
  const header = (req.get("x-auth-token") ?? "").trim();
  return header || null;
}

function matches(presented: string, expected: string): boolean {
  const digest = (v: string) => crypto.createHash("sha256").update(v).digest();
  return crypto.timingSafeEqual(digest(presented), digest(expected));
}

/**
 * Guards the unit and role-play routes, which carry learner transcripts.
 * AUTH_TOKEN is read on every request; CORS preflights pass untouched.
 */
export function createAuth(readToken: () => string = getAuthToken) {
  return function auth(req: Request, res: Response, next: NextFunction) {
    if (req.method === "OPTIONS") return next();

    const expected = readToken();
    if (!expected) return next();

    const presented = presentedToken(req);
    if (!presented || !matches(presented, expected)) {
      return sendError(res, 401, "Unauthorized", "UNAUTHORIZED");
    }
    return next();
  };
}
