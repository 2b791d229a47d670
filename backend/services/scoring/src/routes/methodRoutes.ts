// backend/services/scoring/src/routes/methodRoutes.ts
import { Router } from "express";
import type { IStore } from "../../../shared/src/store/IStore";
import { makeMethodController } from "../controllers/method.controller";

export function methodRoutes(store: IStore): Router {
  const router = Router();

  // one-liners only, no logic here
  router.post("/method", makeMethodController(store));

  return router;
}
