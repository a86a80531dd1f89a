/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if a variable holds an unusable value.
 */

import path from "path";

/** Containers the remuxer is asked to produce. */
export const OUTPUT_CONTAINERS = ["mp4", "mkv", "webm", "mov"] as const;
export type OutputContainer = (typeof OUTPUT_CONTAINERS)[number];

/** Server configuration */
export const PORT = parsePort(process.env.PORT || "3000");
export const NODE_ENV = process.env.NODE_ENV || "development";

/** External executables (absolute paths or names resolved through PATH) */
export const DOWNLOADER_PATH = process.env.DOWNLOADER_PATH || "yt-dlp";
export const JS_RUNTIME_PATH = process.env.JS_RUNTIME_PATH || "deno";
export const JS_RUNTIME_NAME = process.env.JS_RUNTIME_NAME || "deno";
export const REMUXER_PATH = process.env.REMUXER_PATH || "ffmpeg";

/** Output configuration */
export const DOWNLOAD_DIR = path.resolve(process.env.DOWNLOAD_DIR || process.cwd());
export const OUTPUT_CONTAINER = parseContainer(process.env.OUTPUT_CONTAINER || "mp4");

function parsePort(raw: string): number {
  const port = parseInt(raw, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid environment variable PORT: ${raw}`);
  }
  return port;
}

function parseContainer(raw: string): OutputContainer {
  const container = OUTPUT_CONTAINERS.find((c) => c === raw.toLowerCase());
  if (!container) {
    throw new Error(
      `Invalid environment variable OUTPUT_CONTAINER: ${raw} (expected one of ${OUTPUT_CONTAINERS.join(", ")})`
    );
  }
  return container;
}
