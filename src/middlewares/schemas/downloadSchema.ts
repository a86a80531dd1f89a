/**
 * Download Validation Schema
 * Zod schema for validating download requests.
 */

import { z } from "zod";
import { QUALITY_SELECTORS } from "../../config/qualities.js";

/**
 * Schema for starting a download.
 * An empty URL passes validation on purpose: the supervisor reports it
 * through the run status the same way the window did.
 */
export const startDownloadSchema = z.object({
  url: z.string().trim().max(2048),
  quality: z.enum(QUALITY_SELECTORS).default("best"),
});

export type StartDownloadBody = z.infer<typeof startDownloadSchema>;
