/**
 * User Profile Routes
 * Profile lookup, skill updates and peer-based skill recommendations
 */

import { Router, Request, Response } from "express";
import { z } from "zod";
import { updateUserSkillsSchema } from "@shared/schema";
import { parseIdParam, validateRequest } from "../middleware/validation";
import { createCatalogService } from "../services/catalog-service";
import { createRecommendationService } from "../services/recommendation-service";
import { getStorage } from "../storage";
import { config } from "../config/unified-config";
import {
  handleRouteError,
  handleRouteResult,
  sendSuccessResponse,
} from "../lib/route-error-handler";

const router = Router();

const peerQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

router.get("/:id", async (req: Request, res: Response) => {
  try {
    const userId = parseIdParam(req.params.id, "id");
    const result = await createCatalogService(getStorage()).getUser(userId);
    handleRouteResult(result, res, (user) => {
      sendSuccessResponse(res, { user });
    });
  } catch (error) {
    handleRouteError(error, res);
  }
});

router.put("/:id/skills", async (req: Request, res: Response) => {
  try {
    const userId = parseIdParam(req.params.id, "id");
    const { skillIds } = validateRequest(updateUserSkillsSchema, req.body);
    const result = await createCatalogService(getStorage()).setUserSkills(userId, skillIds);
    handleRouteResult(result, res, (user) => {
      sendSuccessResponse(res, { user });
    });
  } catch (error) {
    handleRouteError(error, res);
  }
});

// Skills held by the most similar users that this user lacks
router.get("/:id/skill-recommendations", async (req: Request, res: Response) => {
  try {
    const userId = parseIdParam(req.params.id, "id");
    const { limit } = validateRequest(peerQuerySchema, req.query);
    const service = createRecommendationService(getStorage(), config.recommender);
    const result = await service.recommendSkillsForUser(userId, limit);
    handleRouteResult(result, res, (data) => {
      sendSuccessResponse(res, data);
    });
  } catch (error) {
    handleRouteError(error, res);
  }
});

export default router;
