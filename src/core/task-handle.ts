/**
 * Handle for one unit of asynchronous work. Callers read state and progress
 * from it; only the executor drives its transitions.
 */

import { randomUUID } from "node:crypto";
import type { EventPriority } from "../types/events.js";
import type { TaskProgress, TaskResult, TaskState } from "../types/task.js";

export class TaskHandle<T = unknown> {
  readonly id: string;
  readonly name: string;
  readonly priority: EventPriority;
  readonly createdAt: Date;

  private currentState: TaskState = "pending";
  private currentProgress: TaskProgress = 0;
  private outcome: TaskResult<T> | undefined;
  private settledTime: Date | undefined;
  private readonly controller = new AbortController();
  private readonly settled: Promise<TaskResult<T>>;
  private readonly resolver: { resolve(result: TaskResult<T>): void };

  constructor(name: string, priority: EventPriority) {
    this.id = randomUUID();
    this.name = name;
    this.priority = priority;
    this.createdAt = new Date();
    let resolveSettled: (result: TaskResult<T>) => void = () => undefined;
    this.settled = new Promise<TaskResult<T>>((resolve) => {
      resolveSettled = resolve;
    });
    this.resolver = { resolve: resolveSettled };
  }

  get state(): TaskState {
    return this.currentState;
  }

  get progress(): TaskProgress {
    return this.currentProgress;
  }

  get cancelRequested(): boolean {
    return this.controller.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isSettled(): boolean {
    return this.outcome !== undefined;
  }

  /** The outcome once settled, otherwise undefined. */
  get result(): TaskResult<T> | undefined {
    return this.outcome;
  }

  get settledAt(): Date | undefined {
    return this.settledTime;
  }

  /** Resolves with the outcome; never rejects. */
  wait(): Promise<TaskResult<T>> {
    return this.settled;
  }

  // ── Executor-side transitions ───────────────────────────────────────

  markRunning(): void {
    this.currentState = "running";
  }

  updateProgress(progress: TaskProgress): void {
    this.currentProgress = progress;
  }

  requestCancel(): void {
    this.controller.abort();
  }

  /** First settlement wins; later calls are ignored. Returns whether it applied. */
  settle(result: TaskResult<T>): boolean {
    if (this.outcome !== undefined) {
      return false;
    }
    this.outcome = result;
    this.settledTime = new Date();
    this.currentState = result.status;
    if (result.status === "completed") {
      this.currentProgress = 1;
    }
    this.resolver.resolve(result);
    return true;
  }
}
