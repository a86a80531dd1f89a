/**
 * Run State Store
 *
 * Single owner of the status/progress/in-progress triple shared between the
 * download worker, its two stream readers and every observer (status
 * endpoint, SSE streams).
 *
 * All writes go through the methods below. Each call runs to completion on
 * one event-loop turn, so readers never see a half-applied update, and
 * observers only ever receive frozen snapshots.
 *
 * ## Lifecycle
 *
 * ```
 * { "Ready", 0, false }
 *   → reset("Starting…")        { "Starting…", 0, true }
 *   → update({ progress: 45 })  { "Downloading…", 45, true }
 *   → finish("Download complete!", 100)
 *                               { "Download complete!", 100, false }
 * ```
 *
 * `finish` is a no-op once in-progress is already clear, which makes the
 * terminal transition happen exactly once per run.
 */

import { EventEmitter } from "events";

export interface RunState {
  status: string;
  progress: number;
  inProgress: boolean;
}

export type RunStateSnapshot = Readonly<RunState>;

export const INITIAL_STATUS = "Ready";

export function isRunStateSnapshot(value: unknown): value is RunStateSnapshot {
  return (
    typeof value === "object" &&
    value !== null &&
    "status" in value &&
    typeof value.status === "string" &&
    "progress" in value &&
    typeof value.progress === "number" &&
    "inProgress" in value &&
    typeof value.inProgress === "boolean"
  );
}

export class RunStateStore extends EventEmitter {
  private state: RunStateSnapshot = freeze({ status: INITIAL_STATUS, progress: 0, inProgress: false });

  /** Registers a listener for every committed change. Returns an unsubscribe function. */
  onChange(listener: (state: RunStateSnapshot) => void): () => void {
    this.on("change", listener);
    return () => {
      this.off("change", listener);
    };
  }

  /** Current state as an immutable copy. */
  snapshot(): RunStateSnapshot {
    return this.state;
  }

  /** Starts a new run: progress back to 0, in-progress set. */
  reset(status: string): RunStateSnapshot {
    return this.commit({ status, progress: 0, inProgress: true });
  }

  /**
   * Applies an intermediate update to the run in progress.
   * Ignored once the run has finished, so a terminal state is never overwritten.
   */
  update(patch: Partial<Pick<RunState, "status" | "progress">>): RunStateSnapshot {
    if (!this.state.inProgress) {
      return this.state;
    }
    return this.commit({ ...this.state, ...patch });
  }

  /** Sets a status without starting or finishing a run (e.g. rejected input). */
  announce(status: string): RunStateSnapshot {
    return this.commit({ ...this.state, status });
  }

  /**
   * Terminal transition. Returns false when the run was already finished.
   * Progress is left at its last value when omitted.
   */
  finish(status: string, progress?: number): boolean {
    if (!this.state.inProgress) {
      return false;
    }
    this.commit({
      status,
      progress: progress ?? this.state.progress,
      inProgress: false,
    });
    return true;
  }

  private commit(next: RunState): RunStateSnapshot {
    this.state = freeze({ ...next, progress: clampProgress(next.progress) });
    this.emit("change", this.state);
    return this.state;
  }
}

function clampProgress(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

function freeze(state: RunState): RunStateSnapshot {
  return Object.freeze({ ...state });
}

/** Process-wide store read by the HTTP layer. */
export const runState = new RunStateStore();
