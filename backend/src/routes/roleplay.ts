//  src/routes/roleplay.ts

import { Router } from "express";
import { createRoleplayController } from "../controllers/roleplayController";
import type { RoleplayService } from "../services/roleplayService";

export function createRoleplayRouter(service: RoleplayService): Router {
    const router = Router();
    const controller = createRoleplayController(service);

    // POST /roleplay/start
    router.post("/start", controller.start);

    // POST /roleplay/directive (inspect what the partner is allowed to ask)
    router.post("/directive", controller.directive);

    // POST /roleplay/turn
    router.post("/turn", controller.turn);

    // POST /roleplay/translate
    router.post("/translate", controller.translate);

    // POST /roleplay/feedback
    router.post("/feedback", controller.feedback);

    return router;
}
