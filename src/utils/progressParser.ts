/**
 * Progress Parser
 * Reads yt-dlp style output lines and turns them into progress percentages
 * and phase status messages. Every function here is pure: the same line
 * always yields the same answer.
 *
 * Typical lines:
 *   [download]  45.2% of 123.45MiB at 1.23MiB/s ETA 00:15
 *   [Merger] Merging formats into "clip.mp4"
 *   [ffmpeg] Converting video from webm to mp4
 */

/** Reported while streams are being merged. */
export const MERGE_PROGRESS = 99.0;
/** Reported during post-processing, further along than the merge. */
export const POST_PROCESS_PROGRESS = 99.5;

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Extracts a completion percentage from one line of downloader output.
 * Returns undefined when the line carries no usable percentage, in which
 * case the caller keeps whatever value it had.
 */
export function parseProgress(line: string): number | undefined {
  if (line.includes("[Merger]") || line.includes("Merging formats into")) {
    return MERGE_PROGRESS;
  }

  if (line.includes("[ffmpeg]")) {
    return POST_PROCESS_PROGRESS;
  }

  if (line.includes("[download]") && line.includes("%")) {
    for (const token of line.split(/\s+/)) {
      if (!token.endsWith("%")) continue;

      const percent = parsePercentToken(token);
      if (percent !== undefined) {
        return percent;
      }
    }
  }

  return undefined;
}

/**
 * Maps post-processing phase tags to a status message.
 * Numeric progress is handled separately by {@link parseProgress}.
 */
export function matchStatusPhrase(line: string, container: string): string | undefined {
  if (line.includes("[Merger]")) {
    return "Merging audio and video…";
  }
  if (line.includes("[ExtractAudio]")) {
    return "Extracting audio…";
  }
  if (line.includes("[ffmpeg]")) {
    if (line.includes("Merging")) {
      return "Merging streams…";
    }
    if (line.includes("Converting")) {
      return `Converting to ${container}…`;
    }
  }
  return undefined;
}

function parsePercentToken(token: string): number | undefined {
  const numeric = token.slice(0, -1);
  if (!DECIMAL.test(numeric)) {
    return undefined;
  }

  const value = Number(numeric);
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    return undefined;
  }
  return value;
}
