/**
 * yt-dlp Adapter
 * Builds the downloader command line and spawns it through execa.
 *
 * The downloader is treated as a black box: we hand it a URL and flags,
 * then read its stdout/stderr line by line. Anything that can play back
 * lines and an exit code can stand in for it (see ProcessLauncher).
 */

import { once } from "events";
import type { Readable } from "stream";
import { execa } from "execa";
import { formatExpression, type QualitySelector } from "../../config/qualities.js";
import type { ToolPaths } from "../../config/tools.js";
import { ProcessLaunchError } from "../../utils/errors.js";

/** Output filename template, expanded by the downloader. */
export const OUTPUT_TEMPLATE = "%(title)s.%(ext)s";

export interface DownloadRequest {
  readonly url: string;
  readonly quality: QualitySelector;
}

export interface ProcessExit {
  code: number | null;
  signal: string | null;
}

/** A running downloader: two output streams and a way to wait for exit. */
export interface DownloaderProcess {
  pid?: number;
  stdout: Readable;
  stderr: Readable;
  wait(): Promise<ProcessExit>;
}

export interface LaunchOptions {
  cwd?: string;
}

/**
 * Spawns an executable. Resolves once the OS has started it,
 * rejects with ProcessLaunchError when it could not.
 */
export interface ProcessLauncher {
  launch(command: string, args: readonly string[], options?: LaunchOptions): Promise<DownloaderProcess>;
}

/**
 * Builds the downloader argument list for a request.
 *
 * Forces the chosen container both when merging separate streams and when
 * the fetched file already is a single stream in another container.
 */
export function buildDownloaderArgs(
  request: DownloadRequest,
  tools: ToolPaths,
  container: string
): string[] {
  return [
    request.url,
    "-f", formatExpression(request.quality),
    "-o", OUTPUT_TEMPLATE,
    "--merge-output-format", container,
    "--remux-video", container,
    "--js-runtimes", `${tools.jsRuntimeName}:${tools.jsRuntime}`,
    "--ffmpeg-location", tools.remuxer,
    "--newline",
    "--progress",
    "--no-warnings",
  ];
}

/**
 * Launcher backed by execa.
 * Output is streamed, never buffered, and a non-zero exit is reported
 * through wait() instead of a rejection.
 */
export const execaLauncher: ProcessLauncher = {
  async launch(command, args, options = {}) {
    const subprocess = execa(command, [...args], {
      cwd: options.cwd,
      reject: false,
      buffer: false,
      stdin: "ignore",
      windowsHide: true,
    });

    try {
      // execa hands back a process that never emits "spawn" when the
      // arguments are rejected synchronously; its promise settles instead.
      await Promise.race([
        once(subprocess, "spawn"),
        subprocess.then((result) => {
          throw new Error(`${result.command} ended before it started`);
        }),
      ]);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProcessLaunchError(command, message, errorCode(error));
    }

    const { stdout, stderr } = subprocess;
    if (!stdout || !stderr) {
      subprocess.kill();
      await subprocess;
      throw new ProcessLaunchError(command, `${command} started without output pipes`);
    }

    return {
      pid: subprocess.pid,
      stdout,
      stderr,
      async wait() {
        const result = await subprocess;
        const code = typeof result.exitCode === "number" ? result.exitCode : null;
        const signal = result.signal ?? null;
        if (code === null && signal === null) {
          throw new Error(`${result.command} ended without an exit status`);
        }
        return { code, signal };
      },
    };
  },
};

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
