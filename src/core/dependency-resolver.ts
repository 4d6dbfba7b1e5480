/**
 * Plugin dependency resolution.
 *
 * Builds the graph over descriptor ids, fails plugins whose dependencies are
 * missing, out of range or cyclic, fails everything that (transitively)
 * depends on a failed plugin, and orders the rest topologically. Plugins
 * unrelated to a failure are unaffected.
 */

import * as semver from "semver";
import { createLogger } from "../utils/logger.js";
import { PluginLoadError } from "../types/errors.js";
import type { IPluginDescriptor } from "../types/plugin.js";

const log = createLogger("resolver");

export interface IResolution {
  /** Initialization order: every plugin comes after its dependencies. */
  readonly order: readonly IPluginDescriptor[];
  readonly failures: readonly PluginLoadError[];
}

/**
 * Resolve load order. Ties between independent plugins keep the order in
 * which they were discovered.
 */
export function resolveDependencies(descriptors: readonly IPluginDescriptor[]): IResolution {
  const byId = new Map<string, IPluginDescriptor>();
  for (const descriptor of descriptors) {
    if (!byId.has(descriptor.id)) byId.set(descriptor.id, descriptor);
  }
  const candidates = [...byId.values()];
  const failures = new Map<string, PluginLoadError>();

  for (const cycle of findCycles(candidates, byId)) {
    for (const member of new Set(cycle)) {
      if (failures.has(member)) continue;
      const chain = rotateCycle(cycle, member);
      failures.set(
        member,
        new PluginLoadError(member, "CyclicDependency", chain, `dependency cycle ${chain.join(" -> ")}`),
      );
    }
  }

  for (const descriptor of candidates) {
    if (failures.has(descriptor.id)) continue;
    const problem = checkDirectDependencies(descriptor, byId);
    if (problem) failures.set(descriptor.id, problem);
  }

  propagateFailures(candidates, failures);

  const order = topologicalOrder(candidates.filter((descriptor) => !failures.has(descriptor.id)));
  const failureList = candidates.flatMap((descriptor) => {
    const failure = failures.get(descriptor.id);
    return failure ? [failure] : [];
  });

  log.debug(
    { order: order.map((descriptor) => descriptor.id), failed: failureList.map((failure) => failure.pluginId) },
    "Dependencies resolved",
  );
  return { order, failures: failureList };
}

function checkDirectDependencies(
  descriptor: IPluginDescriptor,
  byId: ReadonlyMap<string, IPluginDescriptor>,
): PluginLoadError | undefined {
  for (const dependency of descriptor.dependencies) {
    const target = byId.get(dependency.id);
    const chain = [descriptor.id, dependency.id];
    if (!target) {
      return new PluginLoadError(descriptor.id, "MissingDependency", chain, `requires "${dependency.id}", which is not installed`);
    }
    if (semver.validRange(dependency.range) === null) {
      return new PluginLoadError(descriptor.id, "VersionMismatch", chain, `invalid version range "${dependency.range}" for "${dependency.id}"`);
    }
    if (!semver.satisfies(target.version, dependency.range)) {
      return new PluginLoadError(
        descriptor.id,
        "VersionMismatch",
        chain,
        `requires "${dependency.id}" ${dependency.range}, found ${target.version}`,
      );
    }
  }
  return undefined;
}

/** Fail every plugin that depends, directly or not, on a failed one. */
function propagateFailures(candidates: readonly IPluginDescriptor[], failures: Map<string, PluginLoadError>): void {
  let changed = true;
  while (changed) {
    changed = false;
    for (const descriptor of candidates) {
      if (failures.has(descriptor.id)) continue;
      for (const dependency of descriptor.dependencies) {
        const upstream = failures.get(dependency.id);
        if (!upstream) continue;
        failures.set(
          descriptor.id,
          new PluginLoadError(
            descriptor.id,
            upstream.reason,
            [descriptor.id, ...upstream.chain],
            `depends on "${dependency.id}", which failed to load`,
          ),
        );
        changed = true;
        break;
      }
    }
  }
}

/**
 * Kahn-style ordering over an acyclic set whose dependencies are all present.
 * Each step takes the earliest-discovered plugin whose dependencies are placed.
 */
function topologicalOrder(candidates: readonly IPluginDescriptor[]): IPluginDescriptor[] {
  const remaining = [...candidates];
  const placed = new Set<string>();
  const order: IPluginDescriptor[] = [];

  while (remaining.length > 0) {
    const index = remaining.findIndex((descriptor) =>
      descriptor.dependencies.every((dependency) => placed.has(dependency.id)),
    );
    if (index === -1) break;
    const [next] = remaining.splice(index, 1);
    if (!next) break;
    placed.add(next.id);
    order.push(next);
  }
  return order;
}

/** Every distinct cycle reachable by depth-first search, as [a, b, ..., a]. */
function findCycles(
  candidates: readonly IPluginDescriptor[],
  byId: ReadonlyMap<string, IPluginDescriptor>,
): string[][] {
  const visiting = new Set<string>();
  const done = new Set<string>();
  const stack: string[] = [];
  const cycles: string[][] = [];

  const visit = (id: string): void => {
    visiting.add(id);
    stack.push(id);
    const descriptor = byId.get(id);
    for (const dependency of descriptor?.dependencies ?? []) {
      if (!byId.has(dependency.id) || done.has(dependency.id)) continue;
      if (visiting.has(dependency.id)) {
        cycles.push([...stack.slice(stack.indexOf(dependency.id)), dependency.id]);
        continue;
      }
      visit(dependency.id);
    }
    stack.pop();
    visiting.delete(id);
    done.add(id);
  };

  for (const descriptor of candidates) {
    if (!done.has(descriptor.id)) visit(descriptor.id);
  }
  return cycles;
}

/** Re-start a closed cycle [a, b, c, a] at `member`: [b, c, a, b]. */
function rotateCycle(cycle: readonly string[], member: string): string[] {
  const open = cycle.slice(0, -1);
  const start = open.indexOf(member);
  const rotated = [...open.slice(start), ...open.slice(0, start)];
  return [...rotated, member];
}
