/**
 * Job Corpus Routes
 * Handles job creation and retrieval
 */

import { Router, Request, Response } from "express";
import { insertJobSchema } from "@shared/schema";
import { parseIdParam, validateRequest } from "../middleware/validation";
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
    const result = await createCatalogService(getStorage()).listJobs();
    handleRouteResult(result, res, (jobs) => {
      sendSuccessResponse(res, { jobs, total: jobs.length });
    });
  } catch (error) {
    handleRouteError(error, res);
  }
});

router.post("/", async (req: Request, res: Response) => {
  try {
    const input = validateRequest(insertJobSchema, req.body);
    const result = await createCatalogService(getStorage()).createJob(input);
    handleRouteResult(result, res, (job) => {
      sendSuccessResponse(res, { job }, 201);
    });
  } catch (error) {
    handleRouteError(error, res);
  }
});

router.get("/:id", async (req: Request, res: Response) => {
  try {
    const jobId = parseIdParam(req.params.id, "id");
    const result = await createCatalogService(getStorage()).getJob(jobId);
    handleRouteResult(result, res, (job) => {
      sendSuccessResponse(res, { job });
    });
  } catch (error) {
    handleRouteError(error, res);
  }
});

export default router;
