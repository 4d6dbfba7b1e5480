/**
 * Topic-based publish/subscribe bus.
 * Core IPC backbone between the runtime, plugins, and UI/CLI callers.
 *
 * Dispatch takes a snapshot of matching subscriptions at publish time, ordered
 * by descending priority then registration order. Sync handlers run inline on
 * the publisher's call; async handlers are handed to the executor and the
 * publisher does not wait for them. A failing handler never stops the others
 * and never reaches the publisher.
 */

import { randomUUID } from "node:crypto";
import { createLogger } from "../utils/logger.js";
import { BusClosedError, EventDispatchError } from "../types/errors.js";
import { EventPriority } from "../types/events.js";
import type {
  EventHandler,
  IEventEnvelope,
  IPublishOptions,
  IRuntimeEventMap,
  ISubscribeOptions,
  ISubscription,
  RuntimeTopic,
} from "../types/events.js";
import type { IEventAccess } from "../types/plugin.js";

const log = createLogger("event-bus");

/** Topic pattern that matches every event. */
export const WILDCARD = "*";

const CORE_OWNER = "core";
const DEFAULT_ASYNC_QUEUE_DEPTH = 256;

// ── Public Types ──────────────────────────────────────────────────────

/** Runs detached async work; implemented by the AsyncExecutor. */
export interface IAsyncDispatcher {
  detach(work: () => Promise<void>, priority: EventPriority, name: string): Promise<void>;
}

export type DispatchErrorListener = (error: EventDispatchError, envelope: IEventEnvelope) => void;

export interface IEventBusOptions {
  /** Maximum async deliveries in flight; the rest wait in FIFO order. */
  readonly asyncQueueDepth?: number | undefined;
  readonly dispatcher?: IAsyncDispatcher | undefined;
}

interface IRegisteredSubscription extends ISubscription {
  readonly handler: EventHandler;
}

interface IPendingDelivery {
  readonly subscription: IRegisteredSubscription;
  readonly envelope: IEventEnvelope;
}

/**
 * Topic matching:
 * - "*" matches everything
 * - "export.*" matches "export.csv" and "export.csv.completed"
 * - anything else matches exactly
 */
export function topicMatches(pattern: string, topic: string): boolean {
  if (pattern === WILDCARD || pattern === topic) return true;
  if (pattern.endsWith(".*")) {
    const prefix = pattern.slice(0, -1);
    return topic.startsWith(prefix);
  }
  return false;
}

export function createEnvelope<T>(topic: string, payload: T, options?: IPublishOptions): IEventEnvelope<T> {
  return Object.freeze({
    id: randomUUID(),
    topic,
    payload,
    priority: options?.priority ?? EventPriority.Normal,
    timestamp: new Date(),
    correlationId: options?.correlationId ?? randomUUID(),
    source: options?.source ?? CORE_OWNER,
  });
}

// ── EventBus ──────────────────────────────────────────────────────────

export class EventBus implements IEventAccess {
  private subscriptions: IRegisteredSubscription[] = [];
  private readonly errorListeners = new Set<DispatchErrorListener>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly backlog: IPendingDelivery[] = [];
  private readonly asyncQueueDepth: number;
  private dispatcher: IAsyncDispatcher | undefined;
  private sequence = 0;
  private failures = 0;
  private closed = false;

  constructor(options?: IEventBusOptions) {
    this.asyncQueueDepth = Math.max(1, options?.asyncQueueDepth ?? DEFAULT_ASYNC_QUEUE_DEPTH);
    this.dispatcher = options?.dispatcher;
  }

  /** Hand async deliveries to an executor instead of the microtask queue. */
  attachDispatcher(dispatcher: IAsyncDispatcher | undefined): void {
    this.dispatcher = dispatcher;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of handler failures caught since construction. */
  get failureCount(): number {
    return this.failures;
  }

  publish<T>(topic: string, payload: T, options?: IPublishOptions): IEventEnvelope<T> {
    const envelope = createEnvelope(topic, payload, options);
    this.publishEnvelope(envelope);
    return envelope;
  }

  publishEnvelope(envelope: IEventEnvelope): void {
    if (this.closed) {
      throw new BusClosedError(envelope.topic);
    }

    const selected = this.subscriptions
      .filter(
        (sub) =>
          topicMatches(sub.topicPattern, envelope.topic) &&
          (sub.minPriority === undefined || envelope.priority >= sub.minPriority),
      )
      .sort((a, b) => b.priority - a.priority || a.sequence - b.sequence);

    log.debug(
      { topic: envelope.topic, subscribers: selected.length, correlationId: envelope.correlationId },
      "Dispatching event",
    );

    for (const subscription of selected) {
      if (subscription.mode === "sync") {
        this.invokeSync(subscription, envelope);
      } else {
        this.scheduleAsync(subscription, envelope);
      }
    }
  }

  subscribe<T>(topicPattern: string, handler: EventHandler<T>, options?: ISubscribeOptions): ISubscription {
    if (this.closed) {
      throw new BusClosedError(topicPattern);
    }

    const subscription: IRegisteredSubscription = {
      id: randomUUID(),
      topicPattern,
      mode: options?.mode ?? "sync",
      priority: options?.priority ?? EventPriority.Normal,
      minPriority: options?.minPriority,
      ownerId: options?.ownerId ?? CORE_OWNER,
      sequence: ++this.sequence,
      handler: handler as EventHandler,
    };
    this.subscriptions.push(subscription);

    log.debug(
      { topicPattern, subscriptionId: subscription.id, ownerId: subscription.ownerId, mode: subscription.mode },
      "Subscribed",
    );
    return this.publicView(subscription);
  }

  /** Typed subscription to a topic the runtime itself publishes. */
  on<K extends RuntimeTopic>(
    topic: K,
    handler: EventHandler<IRuntimeEventMap[K]>,
    options?: ISubscribeOptions,
  ): ISubscription {
    return this.subscribe(topic, handler, options);
  }

  /** Subscribe for a single delivery. */
  once<T>(topicPattern: string, handler: EventHandler<T>, options?: ISubscribeOptions): ISubscription {
    const subscription = this.subscribe<T>(
      topicPattern,
      (envelope) => {
        this.unsubscribe(subscription);
        return handler(envelope);
      },
      options,
    );
    return subscription;
  }

  unsubscribe(subscription: ISubscription): boolean {
    const index = this.subscriptions.findIndex((sub) => sub.id === subscription.id);
    if (index === -1) {
      return false;
    }
    this.subscriptions.splice(index, 1);
    log.debug({ subscriptionId: subscription.id }, "Unsubscribed");
    return true;
  }

  /** Remove every subscription owned by a plugin. Returns how many were removed. */
  unsubscribeOwner(ownerId: string): number {
    const remaining: IRegisteredSubscription[] = [];
    let removed = 0;
    for (const sub of this.subscriptions) {
      if (sub.ownerId === ownerId) {
        removed++;
      } else {
        remaining.push(sub);
      }
    }
    this.subscriptions = remaining;
    if (removed > 0) {
      log.debug({ ownerId, removed }, "Removed owner subscriptions");
    }
    return removed;
  }

  countByOwner(ownerId: string): number {
    return this.subscriptions.filter((sub) => sub.ownerId === ownerId).length;
  }

  listenerCount(topic?: string): number {
    if (topic === undefined) return this.subscriptions.length;
    return this.subscriptions.filter((sub) => topicMatches(sub.topicPattern, topic)).length;
  }

  listSubscriptions(): readonly ISubscription[] {
    return this.subscriptions.map((sub) => this.publicView(sub));
  }

  onDispatchError(listener: DispatchErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => {
      this.errorListeners.delete(listener);
    };
  }

  /**
   * A view of the bus bound to one owner: subscriptions are tagged with the
   * owner id and published envelopes carry it as their source.
   */
  scoped(ownerId: string): IEventAccess {
    return {
      publish: <T>(topic: string, payload: T, options?: IPublishOptions) =>
        this.publish(topic, payload, { ...options, source: ownerId }),
      subscribe: <T>(topicPattern: string, handler: EventHandler<T>, options?: ISubscribeOptions) =>
        this.subscribe(topicPattern, handler, { ...options, ownerId }),
      unsubscribe: (subscription: ISubscription) =>
        subscription.ownerId === ownerId ? this.unsubscribe(subscription) : false,
    };
  }

  /** Resolve once every async delivery scheduled so far has finished. */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0 || this.backlog.length > 0) {
      this.pumpBacklog();
      await Promise.all([...this.inFlight]);
    }
  }

  /** Stop accepting publishes. Pending async deliveries still run. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.subscriptions = [];
    log.info({ failures: this.failures }, "Event bus closed");
  }

  // ── Private Dispatch ────────────────────────────────────────────────

  private invokeSync(subscription: IRegisteredSubscription, envelope: IEventEnvelope): void {
    try {
      const result = subscription.handler(envelope);
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          this.handleFailure(subscription, envelope, error);
        });
      }
    } catch (error: unknown) {
      this.handleFailure(subscription, envelope, error);
    }
  }

  private scheduleAsync(subscription: IRegisteredSubscription, envelope: IEventEnvelope): void {
    if (this.inFlight.size >= this.asyncQueueDepth) {
      this.backlog.push({ subscription, envelope });
      return;
    }
    this.startAsync(subscription, envelope);
  }

  private startAsync(subscription: IRegisteredSubscription, envelope: IEventEnvelope): void {
    const run = async (): Promise<void> => {
      try {
        await subscription.handler(envelope);
      } catch (error: unknown) {
        this.handleFailure(subscription, envelope, error);
      }
    };

    let delivery: Promise<void>;
    if (this.dispatcher) {
      try {
        delivery = this.dispatcher.detach(run, envelope.priority, `event:${envelope.topic}`);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        log.warn({ topic: envelope.topic, error: message }, "Executor refused async delivery, running inline");
        delivery = Promise.resolve().then(run);
      }
    } else {
      delivery = Promise.resolve().then(run);
    }

    this.inFlight.add(delivery);
    void delivery.then(() => {
      this.inFlight.delete(delivery);
      this.pumpBacklog();
    });
  }

  private pumpBacklog(): void {
    while (this.inFlight.size < this.asyncQueueDepth) {
      const next = this.backlog.shift();
      if (!next) return;
      this.startAsync(next.subscription, next.envelope);
    }
  }

  private handleFailure(subscription: ISubscription, envelope: IEventEnvelope, error: unknown): void {
    this.failures++;
    const dispatchError = new EventDispatchError(envelope.topic, subscription.id, error);
    log.error(
      {
        topic: envelope.topic,
        subscriptionId: subscription.id,
        ownerId: subscription.ownerId,
        error: dispatchError.message,
      },
      "Event handler failed",
    );

    for (const listener of this.errorListeners) {
      try {
        listener(dispatchError, envelope);
      } catch (listenerError: unknown) {
        const message = listenerError instanceof Error ? listenerError.message : String(listenerError);
        log.error({ error: message }, "Dispatch error listener threw");
      }
    }

    // Failures of bus.* handlers are not re-announced, which bounds recursion.
    if (!this.closed && !envelope.topic.startsWith("bus.")) {
      this.publish(
        "bus.handler_failed",
        {
          topic: envelope.topic,
          subscriptionId: subscription.id,
          error: error instanceof Error ? error.message : String(error),
        },
        { correlationId: envelope.correlationId },
      );
    }
  }

  private publicView(subscription: IRegisteredSubscription): ISubscription {
    return Object.freeze({
      id: subscription.id,
      topicPattern: subscription.topicPattern,
      mode: subscription.mode,
      priority: subscription.priority,
      minPriority: subscription.minPriority,
      ownerId: subscription.ownerId,
      sequence: subscription.sequence,
    });
  }
}
