/**
 * Bounded worker pool over a priority-ordered queue.
 *
 * Workers pull High before Normal before Low, FIFO within a priority. A full
 * queue either rejects the submission or (for submitAsync under the "block"
 * policy) parks the caller until a slot frees up. Cancellation is cooperative:
 * running work sees the flag through its context and the handle settles as
 * cancelled; work that never looks runs to completion and its result is
 * discarded. Every transition is published on the event bus.
 */

import { createLogger } from "../utils/logger.js";
import { withTimeout } from "../utils/timing.js";
import {
  ExecutorClosedError,
  TaskBackpressureError,
  TaskCancelledError,
  TaskExecutionError,
  TaskTimeoutError,
} from "../types/errors.js";
import { EventPriority } from "../types/events.js";
import type { ITaskEventPayload } from "../types/events.js";
import type {
  IDrainReport,
  IExecutorOptions,
  IExecutorStats,
  ISubmitOptions,
  ITaskContext,
  TaskProgress,
  TaskResult,
  TaskWork,
} from "../types/task.js";
import type { IConfigReader, IEventAccess, ITaskAccess } from "../types/plugin.js";
import type { IAsyncDispatcher } from "./event-bus.js";
import { TaskHandle } from "./task-handle.js";

const log = createLogger("executor");

export const DEFAULT_EXECUTOR_OPTIONS: IExecutorOptions = {
  workers: 4,
  queueDepth: 64,
  backpressure: "reject",
  retentionMs: 60_000,
};

type TaskEventSink = Pick<IEventAccess, "publish">;

interface IQueuedTask {
  readonly handle: TaskHandle<unknown>;
  readonly work: TaskWork<unknown>;
  /** Internal deliveries (event handlers) publish no lifecycle events. */
  readonly silent: boolean;
}

export class AsyncExecutor implements ITaskAccess, IAsyncDispatcher {
  private readonly options: IExecutorOptions;
  private readonly queue: IQueuedTask[] = [];
  private readonly running = new Map<string, IQueuedTask>();
  private readonly retained = new Map<string, TaskHandle<unknown>>();
  private readonly retentionTimers = new Map<string, NodeJS.Timeout>();
  private spaceWaiters: Array<() => void> = [];
  private pumpScheduled = false;
  private closed = false;

  constructor(
    private readonly bus: TaskEventSink | undefined,
    options?: Partial<IExecutorOptions>,
  ) {
    this.options = { ...DEFAULT_EXECUTOR_OPTIONS, ...options };
    if (this.options.workers < 1 || this.options.queueDepth < 1) {
      throw new RangeError("Executor needs at least one worker and a queue depth of at least one");
    }
  }

  /** Build an executor from the `executor.*` configuration keys. */
  static fromConfig(config: IConfigReader, bus: TaskEventSink | undefined): AsyncExecutor {
    const backpressure = config.getOptional("executor.backpressure", "string", DEFAULT_EXECUTOR_OPTIONS.backpressure);
    return new AsyncExecutor(bus, {
      workers: config.getOptional("executor.workers", "number", DEFAULT_EXECUTOR_OPTIONS.workers),
      queueDepth: config.getOptional("executor.queue_depth", "number", DEFAULT_EXECUTOR_OPTIONS.queueDepth),
      backpressure: backpressure === "block" ? "block" : "reject",
      retentionMs: config.getOptional("executor.retention_ms", "number", DEFAULT_EXECUTOR_OPTIONS.retentionMs),
    });
  }

  get policy(): IExecutorOptions["backpressure"] {
    return this.options.backpressure;
  }

  /**
   * Queue work and return its handle. Throws TaskBackpressureError when the
   * queue is full: a synchronous caller cannot be parked, so use
   * submitAsync() to wait under the "block" policy.
   */
  submit<T>(work: TaskWork<T>, options?: ISubmitOptions): TaskHandle<T> {
    return this.enqueue(work, options, false);
  }

  /** Like submit(), but waits for a queue slot when the policy is "block". */
  async submitAsync<T>(work: TaskWork<T>, options?: ISubmitOptions): Promise<TaskHandle<T>> {
    while (this.isFull() && this.options.backpressure === "block" && !this.closed) {
      log.debug({ queued: this.queue.length }, "Queue full, waiting for a slot");
      await new Promise<void>((resolve) => {
        this.spaceWaiters.push(resolve);
      });
    }
    return this.enqueue(work, options, false);
  }

  detach(work: () => Promise<void>, priority: EventPriority, name: string): Promise<void> {
    const handle = this.enqueue(() => work(), { priority, name }, true);
    return handle.wait().then(() => {
      this.release(handle);
    });
  }

  cancel(handle: TaskHandle): boolean {
    if (handle.isSettled) {
      return false;
    }

    const index = this.queue.findIndex((task) => task.handle.id === handle.id);
    if (index !== -1) {
      const [task] = this.queue.splice(index, 1);
      handle.requestCancel();
      if (task) this.finish(task, { status: "cancelled" });
      this.notifySpace();
      return true;
    }

    if (this.running.has(handle.id) && !handle.cancelRequested) {
      handle.requestCancel();
      log.debug({ taskId: handle.id }, "Cancellation requested for running task");
      return true;
    }
    return false;
  }

  progress(handle: TaskHandle): TaskProgress {
    return handle.progress;
  }

  /**
   * Wait for the outcome. Rejects with TaskTimeoutError if it does not settle
   * in time; the work itself keeps running. Collecting an outcome releases
   * the handle from retention.
   */
  async await<T>(handle: TaskHandle<T>, timeoutMs?: number): Promise<TaskResult<T>> {
    const result = timeoutMs === undefined
      ? await handle.wait()
      : await this.raceTimeout(handle, timeoutMs);
    this.release(handle);
    return result;
  }

  /** A retained handle by id, until it is collected or its retention lapses. */
  get(taskId: string): TaskHandle | undefined {
    return this.retained.get(taskId);
  }

  stats(): IExecutorStats {
    return {
      queued: this.queue.length,
      running: this.running.size,
      workers: this.options.workers,
      capacity: this.options.queueDepth,
      retained: this.retained.size,
    };
  }

  /**
   * Stop accepting work and wait for queued and running tasks for up to
   * graceMs, then force-cancel whatever is left.
   */
  async drain(graceMs: number): Promise<IDrainReport> {
    this.closed = true;
    this.notifySpace();

    const outstanding = [
      ...[...this.running.values()].map((task) => task.handle),
      ...this.queue.map((task) => task.handle),
    ];
    log.info({ outstanding: outstanding.length, graceMs }, "Draining executor");

    let withinGrace = true;
    if (outstanding.length > 0) {
      const settledAll = Promise.all(outstanding.map((handle) => handle.wait())).then(() => true);
      withinGrace = await withTimeout(settledAll, graceMs, () => false);
    }

    if (!withinGrace) {
      const forced = outstanding.filter((handle) => this.cancel(handle)).length;
      log.warn({ forced }, "Grace period elapsed, remaining tasks cancelled");
    }

    return {
      completed: outstanding.filter((handle) => handle.state === "completed").length,
      failed: outstanding.filter((handle) => handle.state === "failed").length,
      cancelled: outstanding.filter((handle) => handle.state === "cancelled" || !handle.isSettled).length,
      withinGrace,
    };
  }

  /** Release retention timers. Call after drain() on shutdown. */
  dispose(): void {
    this.closed = true;
    for (const timer of this.retentionTimers.values()) {
      clearTimeout(timer);
    }
    this.retentionTimers.clear();
    this.retained.clear();
  }

  // ── Private Scheduling ──────────────────────────────────────────────

  private enqueue<T>(work: TaskWork<T>, options: ISubmitOptions | undefined, silent: boolean): TaskHandle<T> {
    if (this.closed) {
      throw new ExecutorClosedError();
    }
    if (this.isFull()) {
      throw new TaskBackpressureError(this.options.queueDepth);
    }

    const priority = options?.priority ?? EventPriority.Normal;
    const handle = new TaskHandle<T>(options?.name ?? "task", priority);
    const task: IQueuedTask = { handle, work, silent };

    // Insert after every task of equal or higher priority.
    const index = this.queue.findIndex((queued) => queued.handle.priority < priority);
    if (index === -1) {
      this.queue.push(task);
    } else {
      this.queue.splice(index, 0, task);
    }

    if (!silent) {
      this.retained.set(handle.id, handle);
      this.emit("task.submitted", task);
    }
    this.schedulePump();
    return handle;
  }

  private isFull(): boolean {
    return this.queue.length >= this.options.queueDepth;
  }

  /** Workers pick up queued work on the next microtask, so a burst of submits is ordered by priority. */
  private schedulePump(): void {
    if (this.pumpScheduled) return;
    this.pumpScheduled = true;
    queueMicrotask(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    while (this.running.size < this.options.workers) {
      const task = this.queue.shift();
      if (!task) break;
      this.start(task);
    }
    this.notifySpace();
  }

  private start(task: IQueuedTask): void {
    const { handle } = task;
    this.running.set(handle.id, task);
    handle.markRunning();
    this.emit("task.started", task);
    void this.execute(task);
  }

  private async execute(task: IQueuedTask): Promise<void> {
    const { handle } = task;
    let result: TaskResult<unknown>;
    try {
      const value = await task.work(this.createContext(task));
      result = handle.cancelRequested ? { status: "cancelled" } : { status: "completed", value };
    } catch (error: unknown) {
      if (error instanceof TaskCancelledError || handle.cancelRequested) {
        result = { status: "cancelled" };
      } else {
        result = { status: "failed", error: new TaskExecutionError(handle.id, error) };
      }
    }

    this.running.delete(handle.id);
    this.finish(task, result);
    this.schedulePump();
  }

  private createContext(task: IQueuedTask): ITaskContext {
    const { handle } = task;
    return {
      taskId: handle.id,
      signal: handle.signal,
      isCancelled: () => handle.cancelRequested,
      throwIfCancelled: () => {
        if (handle.cancelRequested) {
          throw new TaskCancelledError(handle.id);
        }
      },
      reportProgress: (progress: TaskProgress) => {
        if (handle.isSettled) return;
        const value = progress === "indeterminate" ? progress : Math.min(1, Math.max(0, progress));
        handle.updateProgress(value);
        if (!task.silent) {
          this.publish("task.progress", { taskId: handle.id, name: handle.name, progress: value });
        }
      },
    };
  }

  private finish(task: IQueuedTask, result: TaskResult<unknown>): void {
    const { handle } = task;
    if (!handle.settle(result)) {
      return;
    }

    if (result.status === "failed") {
      log.warn({ taskId: handle.id, name: handle.name, error: result.error.message }, "Task failed");
    } else {
      log.debug({ taskId: handle.id, name: handle.name, status: result.status }, "Task settled");
    }

    if (task.silent) return;

    switch (result.status) {
      case "completed":
        this.emit("task.completed", task);
        break;
      case "failed":
        this.publish("task.failed", { taskId: handle.id, name: handle.name, error: result.error.message });
        break;
      case "cancelled":
        this.emit("task.cancelled", task);
        break;
    }
    this.scheduleRetention(handle);
  }

  private scheduleRetention(handle: TaskHandle<unknown>): void {
    if (!this.retained.has(handle.id)) return;
    const timer = setTimeout(() => {
      this.retentionTimers.delete(handle.id);
      this.retained.delete(handle.id);
    }, this.options.retentionMs);
    timer.unref();
    this.retentionTimers.set(handle.id, timer);
  }

  private release(handle: TaskHandle<unknown>): void {
    const timer = this.retentionTimers.get(handle.id);
    if (timer) {
      clearTimeout(timer);
      this.retentionTimers.delete(handle.id);
    }
    this.retained.delete(handle.id);
  }

  private notifySpace(): void {
    const waiters = this.spaceWaiters;
    this.spaceWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private async raceTimeout<T>(handle: TaskHandle<T>, timeoutMs: number): Promise<TaskResult<T>> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TaskTimeoutError(handle.id, timeoutMs));
      }, timeoutMs);
    });
    try {
      return await Promise.race([handle.wait(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private emit(
    topic: "task.submitted" | "task.started" | "task.completed" | "task.cancelled",
    task: IQueuedTask,
  ): void {
    if (task.silent) return;
    this.publish(topic, { taskId: task.handle.id, name: task.handle.name });
  }

  private publish<T extends ITaskEventPayload>(topic: string, payload: T): void {
    if (!this.bus) return;
    try {
      this.bus.publish(topic, payload, { priority: EventPriority.Low });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      log.debug({ topic, error: message }, "Could not publish task event");
    }
  }
}
