/**
 * Strata typed error hierarchy.
 * Every error carries a stable code, a user-facing message, and optional
 * diagnostic / recovery hints for the startup report.
 */

export interface IErrorContext {
  readonly code: string;
  readonly userMessage: string;
  readonly diagnosticMessage?: string | undefined;
  readonly suggestedRecovery?: string | undefined;
}

export abstract class StrataError extends Error {
  abstract readonly code: string;
  abstract readonly userMessage: string;
  diagnosticMessage?: string | undefined;
  suggestedRecovery?: string | undefined;

  constructor(message: string, context?: Partial<IErrorContext>) {
    super(message);
    this.name = this.constructor.name;
    this.diagnosticMessage = context?.diagnosticMessage;
    this.suggestedRecovery = context?.suggestedRecovery;
  }
}

// ── Config Errors ────────────────────────────────────────────────────────

export class MissingConfigKeyError extends StrataError {
  readonly code = "STRATA_CONFIG_MISS_001" as const;
  readonly kind = "MissingKey" as const;
  readonly userMessage: string;
  readonly key: string;

  constructor(key: string) {
    super(`Missing configuration: ${key}`);
    this.key = key;
    this.userMessage = `Missing required configuration "${key}".`;
    this.suggestedRecovery = `Set "${key}" in a config file, an APP_ environment variable, or with --set.`;
  }
}

export class ConfigTypeMismatchError extends StrataError {
  readonly code = "STRATA_CONFIG_TYPE_001" as const;
  readonly kind = "TypeMismatch" as const;
  readonly userMessage: string;
  readonly key: string;
  readonly expected: string;
  readonly actual: string;

  constructor(key: string, expected: string, actual: string) {
    super(`Configuration ${key} expected ${expected} but found ${actual}`);
    this.key = key;
    this.expected = expected;
    this.actual = actual;
    this.userMessage = `Invalid configuration "${key}": expected ${expected}, got ${actual}.`;
  }
}

export class ConfigSourceError extends StrataError {
  readonly code = "STRATA_CONFIG_SOURCE_001" as const;
  readonly kind = "SourceUnreadable" as const;
  readonly userMessage: string;
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`Cannot read configuration source ${source}: ${reason}`);
    this.source = source;
    this.userMessage = `Configuration source "${source}" could not be read: ${reason}`;
  }
}

export type AnyConfigError =
  | MissingConfigKeyError
  | ConfigTypeMismatchError
  | ConfigSourceError;

/** Aggregate raised by load/reload when any layer or key fails validation. */
export class ConfigLoadError extends StrataError {
  readonly code = "STRATA_CONFIG_LOAD_001" as const;
  readonly userMessage: string;
  readonly errors: readonly AnyConfigError[];

  constructor(errors: readonly AnyConfigError[]) {
    super(`Configuration failed to load: ${errors.map((e) => e.message).join("; ")}`);
    this.errors = errors;
    this.userMessage = `Configuration is invalid (${errors.length} problem${errors.length === 1 ? "" : "s"}).`;
  }
}

// ── Plugin Errors ────────────────────────────────────────────────────────

export type PluginLoadReason =
  | "CyclicDependency"
  | "MissingDependency"
  | "VersionMismatch"
  | "InitializationFailed"
  | "InvalidManifest"
  | "DuplicatePlugin";

export class PluginLoadError extends StrataError {
  readonly code = "STRATA_PLUGIN_LOAD_001" as const;
  readonly userMessage: string;
  readonly pluginId: string;
  readonly reason: PluginLoadReason;
  /** Offending dependency chain, starting at the affected plugin. */
  readonly chain: readonly string[];

  constructor(
    pluginId: string,
    reason: PluginLoadReason,
    chain: readonly string[],
    detail: string,
  ) {
    super(`Plugin ${pluginId} failed (${reason}): ${detail}`);
    this.pluginId = pluginId;
    this.reason = reason;
    this.chain = chain;
    this.userMessage = `Plugin "${pluginId}" was not loaded: ${detail}`;
  }
}

// ── Event Errors ─────────────────────────────────────────────────────────

export class EventDispatchError extends StrataError {
  readonly code = "STRATA_EVENT_DISPATCH_001" as const;
  readonly userMessage: string;
  readonly topic: string;
  readonly subscriptionId: string;

  constructor(topic: string, subscriptionId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Handler ${subscriptionId} failed on ${topic}: ${reason}`);
    this.topic = topic;
    this.subscriptionId = subscriptionId;
    this.userMessage = `An event handler for "${topic}" failed: ${reason}`;
  }
}

export class BusClosedError extends StrataError {
  readonly code = "STRATA_EVENT_CLOSED_001" as const;
  readonly userMessage: string;

  constructor(topic: string) {
    super(`Event bus is closed, cannot publish ${topic}`);
    this.userMessage = "The event bus has been shut down.";
  }
}

// ── Task Errors ──────────────────────────────────────────────────────────

export class TaskBackpressureError extends StrataError {
  readonly code = "STRATA_TASK_BACKPRESSURE_001" as const;
  readonly kind = "Backpressure" as const;
  readonly userMessage: string;

  constructor(capacity: number) {
    super(`Task queue is full (capacity ${capacity})`);
    this.userMessage = "Too much background work is queued. Try again shortly.";
  }
}

export class TaskCancelledError extends StrataError {
  readonly code = "STRATA_TASK_CANCELLED_001" as const;
  readonly kind = "Cancelled" as const;
  readonly userMessage: string;

  constructor(taskId: string) {
    super(`Task ${taskId} was cancelled`);
    this.userMessage = "The operation was cancelled.";
  }
}

export class TaskExecutionError extends StrataError {
  readonly code = "STRATA_TASK_EXEC_001" as const;
  readonly kind = "ExecutionFailed" as const;
  readonly userMessage: string;
  readonly taskId: string;

  constructor(taskId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Task ${taskId} failed: ${reason}`, { diagnosticMessage: cause instanceof Error ? cause.stack : undefined });
    this.taskId = taskId;
    this.userMessage = `Background task failed: ${reason}`;
  }
}

export class TaskTimeoutError extends StrataError {
  readonly code = "STRATA_TASK_TIMEOUT_001" as const;
  readonly kind = "Timeout" as const;
  readonly userMessage: string;

  constructor(taskId: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for task ${taskId}`);
    this.userMessage = `Operation did not finish within ${Math.ceil(timeoutMs / 1000)}s.`;
  }
}

export class ExecutorClosedError extends StrataError {
  readonly code = "STRATA_TASK_CLOSED_001" as const;
  readonly userMessage: string;

  constructor() {
    super("Executor is shut down and no longer accepts work");
    this.userMessage = "The application is shutting down; no new work can be started.";
  }
}

export type AnyTaskError =
  | ExecutorClosedError
  | TaskBackpressureError
  | TaskCancelledError
  | TaskExecutionError
  | TaskTimeoutError;

// ── Service Errors ───────────────────────────────────────────────────────

export class ServiceNotFoundError extends StrataError {
  readonly code = "STRATA_SERVICE_MISS_001" as const;
  readonly userMessage: string;

  constructor(name: string) {
    super(`Service not found: ${name}`);
    this.userMessage = `No active plugin provides "${name}".`;
  }
}

export class ServiceConflictError extends StrataError {
  readonly code = "STRATA_SERVICE_DUP_001" as const;
  readonly userMessage: string;

  constructor(name: string, existingOwner: string) {
    super(`Service ${name} is already registered by ${existingOwner}`);
    this.userMessage = `Service "${name}" is already provided by "${existingOwner}".`;
  }
}

// ── Runtime Errors ───────────────────────────────────────────────────────

export class RuntimeNotStartedError extends StrataError {
  readonly code = "STRATA_RUNTIME_STATE_001" as const;
  readonly userMessage: string;

  constructor(component: string) {
    super(`${component} is not available before start()`);
    this.userMessage = "The runtime has not been started.";
  }
}

// ── Discriminated Error Union ────────────────────────────────────────────

export type AnyStrataError =
  | AnyConfigError
  | ConfigLoadError
  | PluginLoadError
  | EventDispatchError
  | BusClosedError
  | AnyTaskError
  | ServiceNotFoundError
  | ServiceConflictError
  | RuntimeNotStartedError;

/** Best-effort human message for any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof StrataError) {
    return error.userMessage;
  }
  return error instanceof Error ? error.message : String(error);
}
