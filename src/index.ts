/**
 * Strata — public API surface for embedding the runtime
 */

export * from "./types/index.js";
export * from "./core/index.js";
export {
  createEntity,
  createValueObject,
  createAggregate,
  sameIdentity,
  valueEquals,
  recordEvent,
  pullEvents,
  publishDomainEvents,
} from "./domain/model.js";
export type {
  IEntity,
  IValueObject,
  IAggregateRoot,
  IDomainEvent,
  DomainObject,
} from "./domain/model.js";
export { createLogger, setLogLevel, logger } from "./utils/logger.js";
export type { CliLogLevel, Logger } from "./utils/logger.js";
