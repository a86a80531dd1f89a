/**
 * Download Routes
 * Start a download, read its state, follow it over SSE.
 */

import { Router } from "express";
import {
  getStatus,
  listQualities,
  startDownload,
  streamStatus,
} from "../controllers/downloadController.js";
import { validateBody } from "../middlewares/validation.js";
import { startDownloadSchema } from "../middlewares/schemas/downloadSchema.js";
import { strictLimiter } from "../middlewares/rateLimiting.js";

export const downloadsRouter = Router();

/** Quality presets */
downloadsRouter.get("/qualities", listQualities);

/** Current run state */
downloadsRouter.get("/status", getStatus);

/** Run state as Server-Sent Events */
downloadsRouter.get("/stream", streamStatus);

/** Start a download */
downloadsRouter.post("/", strictLimiter, validateBody(startDownloadSchema), startDownload);
