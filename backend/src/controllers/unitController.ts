// backend/src/controllers/unitController.ts

import type { Request, Response } from "express";
import { respondWithError } from "../http/respondWithError";
import type { UnitCatalog } from "../state/unitCatalog";

export function createUnitController(catalog: UnitCatalog) {
  function listUnits(_req: Request, res: Response) {
    return res.status(200).json({ units: catalog.listUnits() });
  }

  function getUnitQuestions(req: Request, res: Response) {
    const unitId = typeof req.params.unitId === "string" ? req.params.unitId.trim() : "";
    try {
      const questions = catalog.getQuestions(unitId);
      return res.status(200).json({ unitId, questions });
    } catch (err) {
      return respondWithError(res, err, "units.questions");
    }
  }

  return { listUnits, getUnitQuestions };
}
