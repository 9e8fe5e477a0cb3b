/**
 * Modular Routes Index
 * Consolidates all route modules into a single registration system
 */

import { Express } from "express";
import { API_BASE } from "@shared/api-contracts";
import healthRoutes from "./health";
import skillRoutes from "./skills";
import jobRoutes from "./jobs";
import userRoutes from "./user";
import recommendationRoutes from "./recommendations";

/**
 * Register v1 API routes
 */
export function registerV1Routes(app: Express): void {
  // Health and system monitoring routes
  app.use(API_BASE, healthRoutes);

  // Catalogue routes
  app.use(`${API_BASE}/skills`, skillRoutes);
  app.use(`${API_BASE}/jobs`, jobRoutes);
  app.use(`${API_BASE}/users`, userRoutes);

  // Recommendation routes
  app.use(`${API_BASE}/recommendations`, recommendationRoutes);
}
