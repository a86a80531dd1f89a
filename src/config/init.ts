/**
 * Application Initialization
 * Checks that the external executables are in place on startup.
 *
 * A missing tool is only a warning here: the download run reports the
 * launch failure itself, and the tool may appear before the first run.
 */

import { checkTools, toolPaths, type ToolPaths } from "./tools.js";

let initialized = false;

export function isInitialized(): boolean {
  return initialized;
}

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(tools: ToolPaths = toolPaths): Promise<void> {
  console.log("[init] Initializing application...");

  const checks = await checkTools(tools);

  for (const check of checks) {
    switch (check.state) {
      case "ok":
        console.log(`[init] ✓ ${check.label}: ${check.path}`);
        break;
      case "on-path":
        console.log(`[init] ${check.label}: ${check.path} (resolved through PATH)`);
        break;
      case "missing":
        console.warn(`[init] ⚠️  ${check.label} not usable at ${check.path}: ${check.reason}`);
        break;
    }
  }

  initialized = true;
  console.log("[init] ✓ Application initialized\n");
}
