import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ToolPaths } from "../../src/config/tools.js";
import { DownloadSupervisor } from "../../src/services/business/downloadService.js";
import { RunStateStore, type RunStateSnapshot } from "../../src/services/business/runStateStore.js";
import { BadRequestError, ConflictError, ProcessLaunchError } from "../../src/utils/errors.js";
import { FakeLauncher, type ScriptedRun } from "../helpers/fakeLauncher.js";

const tools: ToolPaths = {
  downloader: "/opt/tools/yt-dlp",
  jsRuntime: "/opt/tools/deno",
  jsRuntimeName: "deno",
  remuxer: "/opt/tools/ffmpeg",
};

const URL = "https://video.example.com/watch?v=abc123";

function setup(script: ScriptedRun = {}) {
  const store = new RunStateStore();
  const launcher = new FakeLauncher(script);
  const supervisor = new DownloadSupervisor({ store, launcher, tools, container: "mp4" });
  const history: RunStateSnapshot[] = [];
  store.onChange((state) => history.push(state));
  return { store, launcher, supervisor, history };
}

describe("DownloadSupervisor", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("refuses an empty URL without starting a run", () => {
    const { store, launcher, supervisor } = setup();

    expect(() => supervisor.startDownload({ url: "", quality: "best" })).toThrow(BadRequestError);
    expect(store.snapshot()).toEqual({ status: "Please enter a URL", progress: 0, inProgress: false });
    expect(launcher.calls).toHaveLength(0);
  });

  it("resets state to starting when a run begins", async () => {
    const { supervisor } = setup({ stdout: [] });

    const { state, completion } = supervisor.startDownload({ url: URL, quality: "best" });

    expect(state).toEqual({ status: "Starting…", progress: 0, inProgress: true });
    await completion;
  });

  it("launches the downloader with the built argument list", async () => {
    const { launcher, supervisor } = setup();

    await supervisor.startDownload({ url: URL, quality: "audioOnly" }).completion;

    expect(launcher.calls).toEqual([
      {
        command: "/opt/tools/yt-dlp",
        args: [
          URL,
          "-f", "bestaudio/best",
          "-o", "%(title)s.%(ext)s",
          "--merge-output-format", "mp4",
          "--remux-video", "mp4",
          "--js-runtimes", "deno:/opt/tools/deno",
          "--ffmpeg-location", "/opt/tools/ffmpeg",
          "--newline",
          "--progress",
          "--no-warnings",
        ],
        options: { cwd: undefined },
      },
    ]);
  });

  it("forces 100% on a successful exit regardless of the last reading", async () => {
    const { supervisor, history } = setup({
      stdout: ["[download]  50.0% of 10.00MiB at 2.00MiB/s ETA 00:02"],
      exit: { code: 0 },
    });

    const final = await supervisor.startDownload({ url: URL, quality: "best" }).completion;

    expect(history.map((s) => s.progress)).toContain(50);
    expect(final).toEqual({ status: "Download complete!", progress: 100, inProgress: false });
  });

  it("reports the captured ERROR line when the downloader fails", async () => {
    const { supervisor } = setup({
      stdout: ["[download]  12.5% of 10.00MiB at 2.00MiB/s ETA 00:04"],
      stderr: ["ERROR: network unreachable"],
      exit: { code: 1 },
    });

    const final = await supervisor.startDownload({ url: URL, quality: "best" }).completion;

    expect(final).toEqual({
      status: "Download failed: ERROR: network unreachable",
      progress: 12.5,
      inProgress: false,
    });
  });

  it("keeps only the last ERROR line", async () => {
    const { supervisor } = setup({
      stderr: ["ERROR: first problem", "WARNING: something odd", "ERROR: second problem"],
      exit: { code: 2 },
    });

    const final = await supervisor.startDownload({ url: URL, quality: "best" }).completion;

    expect(final.status).toBe("Download failed: ERROR: second problem");
  });

  it("treats a non-zero exit without an ERROR line as completed with warnings", async () => {
    const { supervisor } = setup({
      stdout: ["[download]  80.0% of 10.00MiB"],
      stderr: ["error: lowercase does not count"],
      exit: { code: 1 },
    });

    const final = await supervisor.startDownload({ url: URL, quality: "best" }).completion;

    expect(final).toEqual({ status: "Download completed with warnings", progress: 100, inProgress: false });
  });

  it("treats a signal exit without an ERROR line as completed with warnings", async () => {
    const { supervisor } = setup({ exit: { code: null, signal: "SIGTERM" } });

    const final = await supervisor.startDownload({ url: URL, quality: "best" }).completion;

    expect(final.status).toBe("Download completed with warnings");
  });

  it("reports a launch failure and clears the in-progress flag", async () => {
    const { supervisor, history } = setup({
      launchError: new ProcessLaunchError("/opt/tools/yt-dlp", "spawn /opt/tools/yt-dlp ENOENT", "ENOENT"),
    });

    const final = await supervisor.startDownload({ url: URL, quality: "best" }).completion;

    expect(final).toEqual({
      status: "Failed to start downloader: spawn /opt/tools/yt-dlp ENOENT",
      progress: 0,
      inProgress: false,
    });
    expect(history.filter((s) => !s.inProgress)).toHaveLength(1);
  });

  it("reports a wait failure as a process error", async () => {
    const { supervisor } = setup({
      stdout: ["[download]  20.0% of 1.00MiB"],
      waitError: new Error("wait failed"),
    });

    const final = await supervisor.startDownload({ url: URL, quality: "best" }).completion;

    expect(final).toEqual({ status: "Process error: wait failed", progress: 20, inProgress: false });
  });

  it("ends the run when an output stream fails and ignores the other stream afterwards", async () => {
    const { store, launcher, supervisor, history } = setup({ hold: true });

    const { completion } = supervisor.startDownload({ url: URL, quality: "best" });
    await vi.waitFor(() => expect(launcher.streams).toHaveLength(1));
    const [streams] = launcher.streams;
    if (!streams) throw new Error("downloader was not launched");

    streams.stderr.destroy(new Error("EPIPE stderr"));
    await vi.waitFor(() => expect(store.snapshot().inProgress).toBe(false));

    streams.stdout.end('[Merger] Merging formats into "x.mp4"\n');
    const final = await completion;

    expect(final).toEqual({ status: "Process error: EPIPE stderr", progress: 0, inProgress: false });
    expect(history.at(-1)).toEqual(final);
    expect(history.filter((s) => !s.inProgress)).toHaveLength(1);
    expect(launcher.waits).toBe(1);
  });

  it("publishes phase transitions in the order the downloader printed them", async () => {
    const { supervisor, history } = setup({
      stdout: [
        "[download]  42.0% of 5.00MiB at 1.00MiB/s ETA 00:03",
        "[youtube] abc123: Downloading m3u8 information",
        '[Merger] Merging formats into "clip.mp4"',
        "[ffmpeg] Converting video from webm to mp4",
      ],
      stderr: ["ERROR: Postprocessing: Conversion failed!"],
      exit: { code: 1 },
    });

    await supervisor.startDownload({ url: URL, quality: "high1080p" }).completion;

    expect(history.map((s) => [s.status, s.progress])).toEqual([
      ["Starting…", 0],
      ["Downloading…", 0],
      ["Downloading…", 42],
      ["Merging audio and video…", 99],
      ["Converting to mp4…", 99.5],
      ["Download failed: ERROR: Postprocessing: Conversion failed!", 99.5],
    ]);
  });

  it("sets the extraction status for audio post-processing", async () => {
    const { supervisor, history } = setup({
      stdout: ["[ExtractAudio] Destination: song.m4a"],
      exit: { code: 0 },
    });

    await supervisor.startDownload({ url: URL, quality: "audioOnly" }).completion;

    expect(history.map((s) => s.status)).toContain("Extracting audio…");
  });

  it("rejects a second request while a run is in flight", async () => {
    const { store, launcher, supervisor } = setup({
      stdout: ["[download]  10.0% of 1.00MiB"],
      hold: true,
    });

    const first = supervisor.startDownload({ url: URL, quality: "best" });

    expect(() => supervisor.startDownload({ url: "https://video.example.com/other", quality: "low480p" })).toThrow(
      ConflictError
    );
    expect(store.snapshot().inProgress).toBe(true);

    await vi.waitFor(() => expect(launcher.calls).toHaveLength(1));
    launcher.release();
    const final = await first.completion;

    expect(final).toEqual({ status: "Download complete!", progress: 100, inProgress: false });
    expect(launcher.calls).toHaveLength(1);
  });

  it("accepts a new run once the previous one finished", async () => {
    const { launcher, supervisor } = setup({ exit: { code: 0 } });

    await supervisor.startDownload({ url: URL, quality: "best" }).completion;
    await supervisor.startDownload({ url: URL, quality: "medium720p" }).completion;

    expect(launcher.calls).toHaveLength(2);
    expect(launcher.calls[1]?.args.slice(1, 3)).toEqual([
      "-f",
      "bestvideo[height<=720]+bestaudio/best[height<=720]",
    ]);
  });
});
