/**
 * Health Routes
 * Liveness information for load balancers and operators
 */

import { Router, Request, Response } from "express";
import { sendSuccessResponse } from "../lib/route-error-handler";
import { config } from "../config/unified-config";

const router = Router();

const startedAt = new Date();

// Basic health check endpoint - Fast response for load balancers
router.get("/health", (_req: Request, res: Response) => {
  sendSuccessResponse(res, {
    status: "healthy",
    environment: config.env,
    startedAt: startedAt.toISOString(),
    uptime: Math.round(process.uptime()),
  });
});

export default router;
