// src/routes/units.ts

import { Router } from "express";
import { createUnitController } from "../controllers/unitController";
import type { UnitCatalog } from "../state/unitCatalog";

export function createUnitsRouter(catalog: UnitCatalog): Router {
    const router = Router();
    const controller = createUnitController(catalog);

    // GET /units
    router.get("/", controller.listUnits);

    // GET /units/:unitId/questions
    router.get("/:unitId/questions", controller.getUnitQuestions);

    return router;
}
