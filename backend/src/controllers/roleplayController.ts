// backend/src/controllers/roleplayController.ts

import type { Request, Response } from "express";
import { getMaxTurnChars } from "../config/appConfig";
import { respondWithError } from "../http/respondWithError";
import { sendError } from "../http/sendError";
import type { RoleplayService } from "../services/roleplayService";

function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return body && typeof body === "object" && !Array.isArray(body) ? { ...body } : {};
}

function readTrimmed(body: Record<string, unknown>, key: string): string {
  const v = body[key];
  return typeof v === "string" ? v.trim() : "";
}

export function createRoleplayController(service: RoleplayService) {
  function start(req: Request, res: Response) {
    const unitId = readTrimmed(readBody(req), "unitId");
    if (!unitId) return sendError(res, 400, "unitId is required", "INVALID_REQUEST");

    try {
      return res.status(200).json(service.startRoleplay(unitId));
    } catch (err) {
      return respondWithError(res, err, "roleplay.start");
    }
  }

  function directive(req: Request, res: Response) {
    const body = readBody(req);
    const unitId = readTrimmed(body, "unitId");
    if (!unitId) return sendError(res, 400, "unitId is required", "INVALID_REQUEST");

    try {
      return res.status(200).json(service.previewDirective(unitId, body.history));
    } catch (err) {
      return respondWithError(res, err, "roleplay.directive");
    }
  }

  async function turn(req: Request, res: Response) {
    const body = readBody(req);
    const unitId = readTrimmed(body, "unitId");
    const message = readTrimmed(body, "message");

    if (!unitId) return sendError(res, 400, "unitId is required", "INVALID_REQUEST");
    if (!message) return sendError(res, 400, "message is required", "INVALID_REQUEST");

    const maxChars = getMaxTurnChars();
    if (message.length > maxChars) {
      return sendError(res, 400, `Message too long (max ${maxChars} characters)`, "MESSAGE_TOO_LONG");
    }

    try {
      const result = await service.takeTurn(unitId, message, body.history);
      return res.status(200).json({ reply: result.reply, directive: result.directive });
    } catch (err) {
      return respondWithError(res, err, "roleplay.turn");
    }
  }

  async function translate(req: Request, res: Response) {
    const text = readTrimmed(readBody(req), "text");
    if (!text) return sendError(res, 400, "text is required", "INVALID_REQUEST");

    const maxChars = getMaxTurnChars();
    if (text.length > maxChars) {
      return sendError(res, 400, `Text too long (max ${maxChars} characters)`, "MESSAGE_TOO_LONG");
    }

    try {
      return res.status(200).json(await service.translate(text));
    } catch (err) {
      return respondWithError(res, err, "roleplay.translate");
    }
  }

  async function feedback(req: Request, res: Response) {
    const body = readBody(req);
    const unitId = readTrimmed(body, "unitId");
    if (!unitId) return sendError(res, 400, "unitId is required", "INVALID_REQUEST");

    try {
      return res.status(200).json(await service.feedback(unitId, body.history));
    } catch (err) {
      return respondWithError(res, err, "roleplay.feedback");
    }
  }

  return { start, directive, turn, translate, feedback };
}
