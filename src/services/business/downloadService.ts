/**
 * Download Service
 * Supervises one downloader process at a time: spawns it, drains both of its
 * output streams, and turns what it printed plus its exit status into the
 * shared run state.
 */

import { mkdir } from "fs/promises";
import readline from "readline";
import type { Readable } from "stream";
import { DOWNLOAD_DIR, OUTPUT_CONTAINER } from "../../config/env.js";
import { toolPaths, type ToolPaths } from "../../config/tools.js";
import { BadRequestError, ConflictError } from "../../utils/errors.js";
import { matchStatusPhrase, parseProgress } from "../../utils/progressParser.js";
import {
  buildDownloaderArgs,
  execaLauncher,
  type DownloadRequest,
  type DownloaderProcess,
  type ProcessExit,
  type ProcessLauncher,
} from "../external/ytdlp.js";
import { runState, type RunState, type RunStateSnapshot, type RunStateStore } from "./runStateStore.js";

/** Substring the downloader puts on stderr lines describing a fatal error. */
export const FATAL_MARKER = "ERROR";

export const STATUS = {
  missingUrl: "Please enter a URL",
  starting: "Starting…",
  downloading: "Downloading…",
  complete: "Download complete!",
  completeWithWarnings: "Download completed with warnings",
} as const;

export interface DownloadSupervisorOptions {
  store: RunStateStore;
  launcher: ProcessLauncher;
  tools: ToolPaths;
  /** Container forced on the output file (mp4, mkv...) */
  container: string;
  /** Working directory of the downloader; created on demand */
  downloadDir?: string;
}

export interface StartedDownload {
  state: RunStateSnapshot;
  /** Settles with the terminal state. Never rejects. */
  completion: Promise<RunStateSnapshot>;
}

export class DownloadSupervisor {
  constructor(private readonly options: DownloadSupervisorOptions) {}

  /**
   * Validates the request, resets run state and starts the run in the
   * background. Only one run may be in flight; a second request is rejected
   * and leaves the live state untouched.
   */
  startDownload(request: DownloadRequest): StartedDownload {
    const { store } = this.options;

    if (store.snapshot().inProgress) {
      throw new ConflictError("A download is already in progress");
    }

    if (request.url.length === 0) {
      store.announce(STATUS.missingUrl);
      throw new BadRequestError(STATUS.missingUrl);
    }

    const frozen: DownloadRequest = Object.freeze({ url: request.url, quality: request.quality });
    const state = store.reset(STATUS.starting);

    return { state, completion: this.runDownload(frozen) };
  }

  /**
   * Runs one download to completion. Every path ends in exactly one
   * terminal state with in-progress cleared.
   */
  private async runDownload(request: DownloadRequest): Promise<RunStateSnapshot> {
    const { store, launcher, tools, container, downloadDir } = this.options;
    const args = buildDownloaderArgs(request, tools, container);

    console.log(`[downloader] Starting ${tools.downloader} for ${request.url} (${request.quality})`);

    let child: DownloaderProcess;
    try {
      if (downloadDir) {
        await mkdir(downloadDir, { recursive: true });
      }
      child = await launcher.launch(tools.downloader, args, { cwd: downloadDir });
    } catch (error) {
      const message = describe(error);
      console.error(`[downloader] Failed to start ${tools.downloader}: ${message}`);
      store.finish(`Failed to start downloader: ${message}`);
      return store.snapshot();
    }

    store.update({ status: STATUS.downloading });

    let fatalLine: string | undefined;

    // A failing reader ends the run on the spot; the other reader and the
    // child are still awaited, and their late output no longer reaches the store.
    const failRun = (error: unknown) => {
      const message = describe(error);
      console.error(`[downloader] Process error: ${message}`);
      store.finish(`Process error: ${message}`);
    };

    await Promise.allSettled([
      drainLines(child.stdout, (line) => this.handleOutputLine(line)).catch(failRun),
      drainLines(child.stderr, (line) => {
        console.warn(`[downloader] ${line}`);
        if (line.includes(FATAL_MARKER)) {
          fatalLine = line;
        }
      }).catch(failRun),
    ]);

    try {
      const exit = await child.wait();
      if (store.snapshot().inProgress) {
        this.settle(exit, fatalLine);
      }
    } catch (error) {
      failRun(error);
    }

    return store.snapshot();
  }

  private handleOutputLine(line: string): void {
    const patch: Partial<Pick<RunState, "status" | "progress">> = {};

    const percent = parseProgress(line);
    if (percent !== undefined) {
      patch.progress = percent;
    }

    const status = matchStatusPhrase(line, this.options.container);
    if (status !== undefined) {
      patch.status = status;
    }

    if (patch.progress !== undefined || patch.status !== undefined) {
      this.options.store.update(patch);
    }
  }

  private settle(exit: ProcessExit, fatalLine: string | undefined): void {
    const { store } = this.options;

    if (exit.code === 0) {
      console.log("[downloader] ✓ Download complete");
      store.finish(STATUS.complete, 100);
      return;
    }

    if (fatalLine !== undefined) {
      console.error(`[downloader] ✗ Download failed (exit ${describeExit(exit)}): ${fatalLine}`);
      store.finish(`Download failed: ${fatalLine}`);
      return;
    }

    // Post-processing steps sometimes exit non-zero after a usable file was
    // written. Without an ERROR line the run is reported as a soft success.
    console.warn(`[downloader] Exited with ${describeExit(exit)} but reported no error`);
    store.finish(STATUS.completeWithWarnings, 100);
  }
}

/**
 * Reads a stream line by line until it closes.
 * Blank lines are skipped; surrounding whitespace is trimmed.
 */
export async function drainLines(stream: Readable, onLine: (line: string) => void): Promise<void> {
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });

  try {
    for await (const raw of lines) {
      const line = raw.trim();
      if (line) {
        onLine(line);
      }
    }
  } finally {
    lines.close();
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeExit(exit: ProcessExit): string {
  return exit.code !== null ? `code ${exit.code}` : `signal ${exit.signal}`;
}

/** Supervisor wired to the configured executables and the shared store. */
export const downloadSupervisor = new DownloadSupervisor({
  store: runState,
  launcher: execaLauncher,
  tools: toolPaths,
  container: OUTPUT_CONTAINER,
  downloadDir: DOWNLOAD_DIR,
});
