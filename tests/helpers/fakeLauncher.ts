/**
 * In-process stand-in for the downloader executable.
 * Plays back scripted stdout/stderr lines and an exit status.
 */

import { PassThrough } from "stream";
import type {
  DownloaderProcess,
  LaunchOptions,
  ProcessExit,
  ProcessLauncher,
} from "../../src/services/external/ytdlp.js";

export interface ScriptedRun {
  stdout?: string[];
  stderr?: string[];
  exit?: Partial<ProcessExit>;
  /** Rejects launch() with this error */
  launchError?: Error;
  /** Rejects wait() with this error */
  waitError?: Error;
  /** Keeps both streams open until release() is called */
  hold?: boolean;
}

export interface LaunchCall {
  command: string;
  args: string[];
  options?: LaunchOptions;
}

export interface FakeStreams {
  stdout: PassThrough;
  stderr: PassThrough;
}

export class FakeLauncher implements ProcessLauncher {
  readonly calls: LaunchCall[] = [];
  /** Output streams of every launched run, in launch order */
  readonly streams: FakeStreams[] = [];
  /** Number of wait() calls across all runs */
  waits = 0;
  private pending: Array<() => void> = [];

  constructor(private readonly script: ScriptedRun = {}) {}

  async launch(command: string, args: readonly string[], options?: LaunchOptions): Promise<DownloaderProcess> {
    this.calls.push({ command, args: [...args], options });

    if (this.script.launchError) {
      throw this.script.launchError;
    }

    const stdout = new PassThrough();
    const stderr = new PassThrough();
    this.streams.push({ stdout, stderr });
    const play = () => {
      endWith(stdout, this.script.stdout ?? []);
      endWith(stderr, this.script.stderr ?? []);
    };

    if (this.script.hold) {
      this.pending.push(play);
    } else {
      play();
    }

    const { waitError } = this.script;
    const recordWait = () => {
      this.waits += 1;
    };
    const exit: ProcessExit = {
      code: this.script.exit?.code === undefined ? 0 : this.script.exit.code,
      signal: this.script.exit?.signal ?? null,
    };

    return {
      pid: 4242,
      stdout,
      stderr,
      async wait() {
        recordWait();
        if (waitError) {
          throw waitError;
        }
        return exit;
      },
    };
  }

  /** Flushes and closes the streams of held runs. */
  release(): void {
    const pending = this.pending;
    this.pending = [];
    for (const play of pending) {
      play();
    }
  }
}

function endWith(stream: PassThrough, lines: string[]): void {
  if (lines.length === 0) {
    stream.end();
    return;
  }
  stream.end(lines.map((line) => `${line}\n`).join(""));
}
