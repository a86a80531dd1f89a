/**
 * Progress Stream Service
 *
 * Server-Sent Events view of the run state store.
 *
 * ## SSE Protocol Format
 *
 * Messages are sent as `data: {JSON}\n\n`:
 * ```
 * data: {"type":"connected"}
 * data: {"type":"state","status":"Downloading…","progress":45.2,"inProgress":true}
 * data: {"type":"complete"}
 * ```
 *
 * ## Connection Lifecycle
 *
 * 1. Subscribe to store changes (before reading, so nothing is missed)
 * 2. Send `connected` and the current snapshot
 * 3. If no run is in progress, send `complete` and close
 * 4. Otherwise send one `state` per change, in order, until in-progress clears
 * 5. Send `complete`, close, unsubscribe
 *
 * A client disconnect aborts the subscription through the signal.
 */

import { on } from "events";
import { isRunStateSnapshot, type RunStateSnapshot, type RunStateStore } from "./runStateStore.js";

/** The part of an HTTP response the stream writes to. */
export interface SseSink {
  write(chunk: string): unknown;
  end(): unknown;
}

export type StreamMessage =
  | { type: "connected" }
  | ({ type: "state" } & RunStateSnapshot)
  | { type: "complete" };

export function formatSseMessage(message: StreamMessage): string {
  return `data: ${JSON.stringify(message)}\n\n`;
}

/**
 * Streams run state to an SSE response until the current run finishes
 * or the signal aborts.
 */
export async function streamRunState(
  store: RunStateStore,
  res: SseSink,
  signal: AbortSignal
): Promise<void> {
  const ac = new AbortController();
  const stop = () => ac.abort();
  signal.addEventListener("abort", stop, { once: true });

  // events.on() attaches its listener immediately and buffers changes
  // that arrive while a previous message is being written.
  const changes = on(store, "change", { signal: ac.signal });

  try {
    res.write(formatSseMessage({ type: "connected" }));

    let state = store.snapshot();
    res.write(formatSseMessage({ type: "state", ...state }));

    if (state.inProgress) {
      for await (const [payload] of changes) {
        if (!isRunStateSnapshot(payload)) continue;
        state = payload;
        res.write(formatSseMessage({ type: "state", ...state }));
        if (!state.inProgress) {
          break;
        }
      }
    }

    res.write(formatSseMessage({ type: "complete" }));
    res.end();
    console.log(`[sse] Run finished with "${state.status}", closing stream`);
  } catch (error) {
    if (!isAbortError(error)) throw error;
    // client disconnected
  } finally {
    ac.abort();
    signal.removeEventListener("abort", stop);
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || ("code" in error && error.code === "ABORT_ERR"));
}
