/**
 * Route Aggregator
 * Combines all routers into a single exported router.
 */

import { Router } from "express";
import { healthRouter } from "./health.js";
import { downloadsRouter } from "./downloads.js";

export const router = Router();

/** Register all route modules */
router.use(healthRouter);
router.use("/downloads", downloadsRouter);
