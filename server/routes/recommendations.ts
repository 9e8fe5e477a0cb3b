/**
 * Job Recommendation Routes
 *
 * Every endpoint takes the same body: the user as `userId` or as explicit
 * `skillIds`, optional `weights` and an optional `limit` on the number of
 * ranked jobs returned.
 */

import { Router, Request, Response } from "express";
import { recommendationRequestSchema, type RecommendationRequest } from "@shared/schema";
import { parseIdParam, validateRequest } from "../middleware/validation";
import {
  createRecommendationService,
  type RecommendationOptions,
} from "../services/recommendation-service";
import { getStorage } from "../storage";
import { config } from "../config/unified-config";
import { handleRouteError, handleSimpleResult } from "../lib/route-error-handler";

const router = Router();

function toRecommendationOptions(body: RecommendationRequest): RecommendationOptions {
  const common = { weights: body.weights, limit: body.limit };
  if (body.userId !== undefined) {
    return { ...common, userId: body.userId };
  }
  return { ...common, skillIds: body.skillIds ?? [] };
}

function service() {
  return createRecommendationService(getStorage(), config.recommender);
}

router.post("/cosine", async (req: Request, res: Response) => {
  try {
    const options = toRecommendationOptions(validateRequest(recommendationRequestSchema, req.body));
    const result = await service().recommendByCosine(options);
    handleSimpleResult(result, res);
  } catch (error) {
    handleRouteError(error, res);
  }
});

router.post("/llr", async (req: Request, res: Response) => {
  try {
    const options = toRecommendationOptions(validateRequest(recommendationRequestSchema, req.body));
    const result = await service().recommendByLlr(options);
    handleSimpleResult(result, res);
  } catch (error) {
    handleRouteError(error, res);
  }
});

router.post("/combined", async (req: Request, res: Response) => {
  try {
    const options = toRecommendationOptions(validateRequest(recommendationRequestSchema, req.body));
    const result = await service().recommendCombined(options);
    handleSimpleResult(result, res);
  } catch (error) {
    handleRouteError(error, res);
  }
});

router.post("/jobs/:jobId/skills-analysis", async (req: Request, res: Response) => {
  try {
    const jobId = parseIdParam(req.params.jobId, "jobId");
    const options = toRecommendationOptions(validateRequest(recommendationRequestSchema, req.body));
    const result = await service().analyzeJobSkills(jobId, options);
    handleSimpleResult(result, res);
  } catch (error) {
    handleRouteError(error, res);
  }
});

export default router;
