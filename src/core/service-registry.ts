/**
 * Name → instance lookup for services that plugins advertise. Each entry is
 * tagged with its owning plugin so a stopped plugin's services can be removed
 * in one call.
 */

import { createLogger } from "../utils/logger.js";
import { ServiceConflictError, ServiceNotFoundError } from "../types/errors.js";

const log = createLogger("services");

export interface IServiceEntry<T = unknown> {
  readonly name: string;
  readonly ownerId: string;
  readonly capability: string;
  readonly instance: T;
  readonly registeredAt: Date;
}

export interface IServiceOwnership {
  readonly ownerId: string;
  readonly capability: string;
}

export class ServiceRegistry {
  private readonly entries = new Map<string, IServiceEntry>();

  register<T>(name: string, instance: T, ownership: IServiceOwnership): IServiceEntry<T> {
    const existing = this.entries.get(name);
    if (existing) {
      throw new ServiceConflictError(name, existing.ownerId);
    }

    const entry: IServiceEntry<T> = Object.freeze({
      name,
      ownerId: ownership.ownerId,
      capability: ownership.capability,
      instance,
      registeredAt: new Date(),
    });
    this.entries.set(name, entry);
    log.debug({ name, ownerId: ownership.ownerId, capability: ownership.capability }, "Service registered");
    return entry;
  }

  /** Throws ServiceNotFoundError when nothing is registered under `name`. */
  resolve(name: string): unknown {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new ServiceNotFoundError(name);
    }
    return entry.instance;
  }

  tryResolve(name: string): unknown {
    return this.entries.get(name)?.instance;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  listByCapability(capability: string): readonly IServiceEntry[] {
    return [...this.entries.values()].filter((entry) => entry.capability === capability);
  }

  unregister(name: string): boolean {
    return this.entries.delete(name);
  }

  unregisterOwner(ownerId: string): number {
    let removed = 0;
    for (const [name, entry] of this.entries) {
      if (entry.ownerId === ownerId) {
        this.entries.delete(name);
        removed++;
      }
    }
    if (removed > 0) {
      log.debug({ ownerId, removed }, "Removed owner services");
    }
    return removed;
  }

  countByOwner(ownerId: string): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.ownerId === ownerId) count++;
    }
    return count;
  }

  list(): readonly IServiceEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}
