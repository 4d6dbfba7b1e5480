/**
 * Event fabric types: envelopes, subscriptions, and the payloads of the
 * topics the runtime itself publishes.
 */

import type { IConfigChangedEvent } from "./config.js";
import type { PluginState } from "./plugin.js";
import type { TaskProgress } from "./task.js";

// ── Priority ─────────────────────────────────────────────────────────────

export const EventPriority = {
  Low: 0,
  Normal: 1,
  High: 2,
} as const;

export type EventPriority = (typeof EventPriority)[keyof typeof EventPriority];

export function priorityName(priority: EventPriority): "Low" | "Normal" | "High" {
  switch (priority) {
    case EventPriority.Low:
      return "Low";
    case EventPriority.Normal:
      return "Normal";
    case EventPriority.High:
      return "High";
  }
}

// ── Envelope ─────────────────────────────────────────────────────────────

export interface IEventEnvelope<T = unknown> {
  readonly id: string;
  readonly topic: string;
  readonly payload: T;
  readonly priority: EventPriority;
  readonly timestamp: Date;
  readonly correlationId: string;
  /** Owner id of the publisher ("core" for the runtime itself). */
  readonly source: string;
}

export interface IPublishOptions {
  readonly priority?: EventPriority | undefined;
  readonly correlationId?: string | undefined;
  readonly source?: string | undefined;
}

// ── Subscriptions ────────────────────────────────────────────────────────

export type SubscriptionMode = "sync" | "async";

export type EventHandler<T = unknown> = (envelope: IEventEnvelope<T>) => void | Promise<void>;

export interface ISubscribeOptions {
  readonly mode?: SubscriptionMode | undefined;
  /** Dispatch priority of this subscriber (higher runs first). */
  readonly priority?: EventPriority | undefined;
  /** Only envelopes at or above this priority are delivered. */
  readonly minPriority?: EventPriority | undefined;
  readonly ownerId?: string | undefined;
}

export interface ISubscription {
  readonly id: string;
  readonly topicPattern: string;
  readonly mode: SubscriptionMode;
  readonly priority: EventPriority;
  readonly minPriority: EventPriority | undefined;
  readonly ownerId: string;
  /** Registration order, used as the tie-break within a priority. */
  readonly sequence: number;
}

// ── Runtime topics ───────────────────────────────────────────────────────

export interface ITaskEventPayload {
  readonly taskId: string;
  readonly name: string;
}

export interface IRuntimeEventMap {
  "config.changed": IConfigChangedEvent;
  "bus.handler_failed": { readonly topic: string; readonly subscriptionId: string; readonly error: string };
  "task.submitted": ITaskEventPayload;
  "task.started": ITaskEventPayload;
  "task.progress": ITaskEventPayload & { readonly progress: TaskProgress };
  "task.completed": ITaskEventPayload;
  "task.failed": ITaskEventPayload & { readonly error: string };
  "task.cancelled": ITaskEventPayload;
  "plugin.activated": { readonly pluginId: string; readonly version: string };
  "plugin.failed": {
    readonly pluginId: string;
    readonly state: PluginState;
    readonly reason: string;
    readonly error: string;
  };
  "plugin.stopped": { readonly pluginId: string };
  "app.started": { readonly activePlugins: readonly string[]; readonly failedPlugins: readonly string[] };
  "app.stopping": Record<string, never>;
}

export type RuntimeTopic = keyof IRuntimeEventMap;
