/**
 * Skill Catalogue Routes
 * Lists and creates the skills jobs and users refer to
 */

import { Router, Request, Response } from "express";
import { insertSkillSchema } from "@shared/schema";
import { validateRequest } from "../middleware/validation";
import { createCatalogService } from "../services/catalog-service";
import { getStorage } from "../storage";
import {
  handleRouteError,
  handleRouteResult,
  sendSuccessResponse,
} from "../lib/route-error-handler";

const router = Router();

router.get("/", async (_req: Request, res: Response) => {
  try {
    const result = await createCatalogService(getStorage()).listSkills();
    handleRouteResult(result, res, (skills) => {
      sendSuccessResponse(res, { skills, total: skills.length });
    });
  } catch (error) {
    handleRouteError(error, res);
  }
});

router.post("/", async (req: Request, res: Response) => {
  try {
    const input = validateRequest(insertSkillSchema, req.body);
    const result = await createCatalogService(getStorage()).createSkill(input);
    handleRouteResult(result, res, (skill) => {
      sendSuccessResponse(res, { skill }, 201);
    });
  } catch (error) {
    handleRouteError(error, res);
  }
});

export default router;
