/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";
import { isInitialized } from "../config/init.js";

export const healthRouter = Router();

/** Simple health check endpoint. */
healthRouter.get("/health", (_req, res) => {
  res.json({ ok: true });
});

/** Readiness check: true once startup checks have run. */
healthRouter.get("/ready", (_req, res) => {
  res.json({ ready: isInitialized() });
});
