/**
 * Download Controller
 * Handles HTTP requests for starting a download and observing its progress.
 */

import type { Request, Response, NextFunction } from "express";
import { QUALITY_SELECTORS, qualityPresets } from "../config/qualities.js";
import type { StartDownloadBody } from "../middlewares/schemas/downloadSchema.js";
import { downloadSupervisor } from "../services/business/downloadService.js";
import { streamRunState } from "../services/business/progressStreamService.js";
import { runState } from "../services/business/runStateStore.js";

/**
 * GET /downloads/qualities
 * Lists the selectable quality presets.
 */
export function listQualities(_req: Request, res: Response): void {
  res.status(200).json({
    qualities: QUALITY_SELECTORS.map((id) => ({ id, ...qualityPresets[id] })),
  });
}

/**
 * GET /downloads/status
 * Current run state snapshot.
 */
export function getStatus(_req: Request, res: Response): void {
  res.status(200).json(runState.snapshot());
}

/**
 * POST /downloads
 * Starts a download in the background and answers immediately.
 */
export function startDownload(
  req: Request<Record<string, string>, unknown, StartDownloadBody>,
  res: Response,
  next: NextFunction
): void {
  try {
    const { url, quality } = req.body;
    const { state } = downloadSupervisor.startDownload({ url, quality });

    res.status(202).json({
      message: "Download started",
      state,
    });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /downloads/stream
 * SSE stream of run state changes until the current run finishes.
 */
export async function streamStatus(_req: Request, res: Response): Promise<void> {
  console.log("[sse] Client connected");

  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no"); // Disable nginx buffering
  res.flushHeaders();

  const ac = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      console.log("[sse] Client disconnected");
    }
    ac.abort();
  });

  try {
    await streamRunState(runState, res, ac.signal);
  } catch (error) {
    console.error("[sse] Error streaming run state:", error);
    res.write(`data: ${JSON.stringify({ type: "error", message: "Stream error" })}\n\n`);
    res.end();
  }
}
