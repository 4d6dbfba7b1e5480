/**
 * Building blocks for plugin domain models.
 *
 * Entities have identity, value objects are compared by content, and an
 * aggregate root is an entity that collects domain events until they are
 * published. All three are plain frozen data with a `kind` tag; behaviour
 * lives in the functions below rather than in a class hierarchy.
 */

import { randomUUID } from "node:crypto";
import { isDeepStrictEqual } from "node:util";
import type { IEventAccess, IEventEnvelope } from "../types/index.js";

export interface IEntity<TProps> {
  readonly kind: "entity";
  readonly type: string;
  readonly id: string;
  readonly props: Readonly<TProps>;
}

export interface IValueObject<TProps> {
  readonly kind: "value";
  readonly type: string;
  readonly props: Readonly<TProps>;
}

export interface IDomainEvent<T = unknown> {
  readonly topic: string;
  readonly payload: T;
  readonly occurredAt: Date;
}

export interface IAggregateRoot<TProps> {
  readonly kind: "aggregate";
  readonly type: string;
  readonly id: string;
  readonly props: Readonly<TProps>;
  /** Incremented by every recorded event. */
  readonly version: number;
  readonly pendingEvents: readonly IDomainEvent[];
}

export type DomainObject<TProps> = IEntity<TProps> | IValueObject<TProps> | IAggregateRoot<TProps>;

type Identified = IEntity<unknown> | IAggregateRoot<unknown>;

export function createEntity<TProps>(type: string, props: TProps, id: string = randomUUID()): IEntity<TProps> {
  return Object.freeze({ kind: "entity", type, id, props: Object.freeze({ ...props }) });
}

export function createValueObject<TProps>(type: string, props: TProps): IValueObject<TProps> {
  return Object.freeze({ kind: "value", type, props: Object.freeze({ ...props }) });
}

export function createAggregate<TProps>(type: string, props: TProps, id: string = randomUUID()): IAggregateRoot<TProps> {
  return Object.freeze({
    kind: "aggregate",
    type,
    id,
    props: Object.freeze({ ...props }),
    version: 0,
    pendingEvents: Object.freeze([]),
  });
}

/** Same type and id. Props are not compared. */
export function sameIdentity(a: Identified, b: Identified): boolean {
  return a.type === b.type && a.id === b.id;
}

export function valueEquals<TProps>(a: IValueObject<TProps>, b: IValueObject<TProps>): boolean {
  return a.type === b.type && isDeepStrictEqual(a.props, b.props);
}

/** Returns a new aggregate with updated props and the event appended. */
export function recordEvent<TProps, TPayload>(
  aggregate: IAggregateRoot<TProps>,
  topic: string,
  payload: TPayload,
  changes?: Partial<TProps>,
): IAggregateRoot<TProps> {
  const event: IDomainEvent<TPayload> = Object.freeze({ topic, payload, occurredAt: new Date() });
  return Object.freeze({
    ...aggregate,
    props: Object.freeze({ ...aggregate.props, ...changes }),
    version: aggregate.version + 1,
    pendingEvents: Object.freeze([...aggregate.pendingEvents, event]),
  });
}

/** Split recorded events from the aggregate: [events, aggregate without them]. */
export function pullEvents<TProps>(
  aggregate: IAggregateRoot<TProps>,
): [readonly IDomainEvent[], IAggregateRoot<TProps>] {
  return [aggregate.pendingEvents, Object.freeze({ ...aggregate, pendingEvents: Object.freeze([]) })];
}

/**
 * Publish every pending event in the order recorded. Envelopes share the
 * aggregate id as correlation id. Returns the cleared aggregate and the
 * published envelopes.
 */
export function publishDomainEvents<TProps>(
  bus: Pick<IEventAccess, "publish">,
  aggregate: IAggregateRoot<TProps>,
): { aggregate: IAggregateRoot<TProps>; envelopes: IEventEnvelope[] } {
  const [events, cleared] = pullEvents(aggregate);
  const envelopes = events.map((event) => bus.publish(event.topic, event.payload, { correlationId: aggregate.id }));
  return { aggregate: cleared, envelopes };
}
