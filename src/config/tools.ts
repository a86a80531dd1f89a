/**
 * External Tool Configuration
 * Paths of the three executables a download run depends on.
 */

import { access, constants } from "fs/promises";
import path from "path";
import {
  DOWNLOADER_PATH,
  JS_RUNTIME_NAME,
  JS_RUNTIME_PATH,
  REMUXER_PATH,
} from "./env.js";

export interface ToolPaths {
  /** yt-dlp compatible downloader */
  downloader: string;
  /** Script runtime the downloader uses for site challenges */
  jsRuntime: string;
  /** Runtime identifier passed alongside its path (e.g. "deno") */
  jsRuntimeName: string;
  /** ffmpeg compatible remuxer */
  remuxer: string;
}

export const toolPaths: ToolPaths = {
  downloader: DOWNLOADER_PATH,
  jsRuntime: JS_RUNTIME_PATH,
  jsRuntimeName: JS_RUNTIME_NAME,
  remuxer: REMUXER_PATH,
};

export type ToolCheck =
  | { label: string; path: string; state: "ok" }
  | { label: string; path: string; state: "on-path" }
  | { label: string; path: string; state: "missing"; reason: string };

/**
 * Checks that every configured executable exists and may be executed.
 * Bare command names are left to PATH lookup at spawn time.
 */
export async function checkTools(tools: ToolPaths = toolPaths): Promise<ToolCheck[]> {
  const entries: Array<[string, string]> = [
    ["downloader", tools.downloader],
    ["js runtime", tools.jsRuntime],
    ["remuxer", tools.remuxer],
  ];

  return Promise.all(
    entries.map(async ([label, toolPath]): Promise<ToolCheck> => {
      if (!toolPath.includes(path.sep) && !toolPath.includes("/")) {
        return { label, path: toolPath, state: "on-path" };
      }

      try {
        await access(toolPath, constants.X_OK);
        return { label, path: toolPath, state: "ok" };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return { label, path: toolPath, state: "missing", reason };
      }
    })
  );
}
