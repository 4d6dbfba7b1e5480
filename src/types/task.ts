/**
 * Async executor types.
 */

import type { EventPriority } from "./events.js";

export type TaskState = "pending" | "running" | "completed" | "failed" | "cancelled";

/** Fraction complete in [0, 1], or indeterminate when the work cannot tell. */
export type TaskProgress = number | "indeterminate";

export type BackpressurePolicy = "block" | "reject";

export interface ITaskContext {
  readonly taskId: string;
  /** Aborted when cancellation is requested. */
  readonly signal: AbortSignal;
  isCancelled(): boolean;
  /** Throws TaskCancelledError when cancellation has been requested. */
  throwIfCancelled(): void;
  reportProgress(progress: TaskProgress): void;
}

export type TaskWork<T> = (context: ITaskContext) => T | Promise<T>;

export interface ISubmitOptions {
  readonly priority?: EventPriority | undefined;
  readonly name?: string | undefined;
}

export type TaskResult<T> =
  | { readonly status: "completed"; readonly value: T }
  | { readonly status: "failed"; readonly error: Error }
  | { readonly status: "cancelled" };

export interface IExecutorOptions {
  readonly workers: number;
  readonly queueDepth: number;
  readonly backpressure: BackpressurePolicy;
  /** How long settled, uncollected handles are retained. */
  readonly retentionMs: number;
}

export interface IExecutorStats {
  readonly queued: number;
  readonly running: number;
  readonly workers: number;
  readonly capacity: number;
  readonly retained: number;
}

export interface IDrainReport {
  readonly completed: number;
  readonly failed: number;
  readonly cancelled: number;
  /** False when the grace period ran out and remaining work was force-cancelled. */
  readonly withinGrace: boolean;
}
