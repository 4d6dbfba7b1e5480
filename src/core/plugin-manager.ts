/**
 * PluginManager — owns plugin lifecycle from discovery to shutdown.
 *
 * Lifecycle:
 *   discovered → resolved → initializing → active → shutting_down → stopped
 *   failed from resolved, initializing or active
 *
 * A plugin only ever sees its capability handle. Everything it registers
 * through that handle is tagged with its id, so a failed or stopped plugin is
 * removed from the bus and the service registry in one sweep.
 */

import { createLogger } from "../utils/logger.js";
import { PluginLoadError, describeError } from "../types/errors.js";
import type { PluginLoadReason } from "../types/errors.js";
import type { ConfigValueType, IConfigTypeMap } from "../types/config.js";
import type { IRuntimeEventMap, RuntimeTopic } from "../types/events.js";
import type {
  IConfigReader,
  IPlugin,
  IPluginCapabilities,
  IPluginDescriptor,
  IServiceRegistration,
  ITaskAccess,
  PluginSource,
  PluginState,
} from "../types/plugin.js";
import type { ISubmitOptions, TaskWork } from "../types/task.js";
import type { TaskHandle } from "./task-handle.js";
import type { EventBus } from "./event-bus.js";
import type { ServiceRegistry } from "./service-registry.js";
import { resolveDependencies } from "./dependency-resolver.js";
import type { IResolution } from "./dependency-resolver.js";
import { discoverPlugins } from "./plugin-discovery.js";
import type { IDiscoveredPlugin, IDiscoveryFilter, IDiscoveryResult } from "./plugin-discovery.js";

const log = createLogger("plugins");

/** Capability names under which plugin contributions are registered. */
export const UI_CAPABILITY = "ui";
export const EXPORT_SOURCE_CAPABILITY = "export-source";

// ── Types ───────────────────────────────────────────────────────────────

export interface IPluginManagerDeps {
  readonly config: IConfigReader;
  readonly bus: EventBus;
  readonly executor: ITaskAccess;
  readonly services: ServiceRegistry;
  readonly headless?: boolean | undefined;
}

interface IPluginRecord {
  readonly discovered: IDiscoveredPlugin;
  state: PluginState;
  plugin: IPlugin | undefined;
  error: PluginLoadError | undefined;
}

export interface IPluginStatus {
  readonly pluginId: string;
  readonly name: string;
  readonly version: string;
  readonly state: PluginState;
  readonly origin: string;
  readonly reason?: PluginLoadReason | undefined;
  readonly chain?: readonly string[] | undefined;
  readonly error?: string | undefined;
}

// ── PluginManager ───────────────────────────────────────────────────────

export class PluginManager {
  private readonly records = new Map<string, IPluginRecord>();
  private readonly problems: PluginLoadError[] = [];
  private resolvedOrder: string[] = [];
  /** Ids in the order they became active. */
  private initOrder: string[] = [];
  private readonly headless: boolean;

  constructor(private readonly deps: IPluginManagerDeps) {
    this.headless = deps.headless ?? false;
  }

  /** Read plugin sources. Manifest problems and duplicates are reported, not thrown. */
  async discover(sources: readonly PluginSource[], filter?: IDiscoveryFilter): Promise<IDiscoveryResult> {
    const result = await discoverPlugins(sources, filter);
    const accepted: IDiscoveredPlugin[] = [];
    const problems = [...result.problems];

    for (const discovered of result.plugins) {
      const { id } = discovered.descriptor;
      const existing = this.records.get(id);
      if (existing) {
        problems.push(
          new PluginLoadError(id, "DuplicatePlugin", [id], `already provided by ${existing.discovered.origin}, ignoring ${discovered.origin}`),
        );
        continue;
      }
      this.records.set(id, { discovered, state: "discovered", plugin: undefined, error: undefined });
      accepted.push(discovered);
    }

    for (const problem of problems) {
      log.warn({ pluginId: problem.pluginId, reason: problem.reason }, problem.message);
    }
    this.problems.push(...problems);
    return { plugins: accepted, problems };
  }

  /** Order discovered plugins; unresolvable ones (and their dependents) fail here. */
  resolve(): IResolution {
    const candidates = [...this.records.values()]
      .filter((record) => record.state !== "failed" && record.state !== "stopped")
      .map((record) => record.discovered.descriptor);
    const resolution = resolveDependencies(candidates);

    for (const failure of resolution.failures) {
      const record = this.records.get(failure.pluginId);
      if (record && record.state === "discovered") {
        this.fail(record, failure);
      }
    }

    this.resolvedOrder = [];
    for (const descriptor of resolution.order) {
      const record = this.records.get(descriptor.id);
      if (!record) continue;
      if (record.state === "discovered") record.state = "resolved";
      this.resolvedOrder.push(descriptor.id);
    }

    log.info({ order: this.resolvedOrder, failed: resolution.failures.length }, "Plugin load order resolved");
    return resolution;
  }

  /** Initialize every resolved plugin in dependency order. */
  async initializeAll(): Promise<readonly IPluginStatus[]> {
    const outcomes: IPluginStatus[] = [];
    for (const id of this.resolvedOrder) {
      const record = this.records.get(id);
      if (!record || record.state !== "resolved") continue;
      await this.initialize(record);
      outcomes.push(this.status(record));
    }
    return outcomes;
  }

  /** Stop every active plugin in reverse initialization order. */
  async shutdownAll(): Promise<void> {
    const order = [...this.initOrder].reverse();
    log.info({ plugins: order }, "Shutting down plugins");
    for (const id of order) {
      const record = this.records.get(id);
      if (record?.state === "active") {
        await this.shutdown(record);
      }
    }
  }

  /**
   * Stop one active plugin, stopping any active plugins that depend on it
   * first. Returns the ids that were stopped, in order.
   */
  async stopPlugin(id: string): Promise<readonly string[]> {
    const record = this.records.get(id);
    if (record?.state !== "active") {
      return [];
    }

    const affected = new Set<string>([id]);
    let grew = true;
    while (grew) {
      grew = false;
      for (const activeId of this.initOrder) {
        if (affected.has(activeId)) continue;
        const descriptor = this.records.get(activeId)?.discovered.descriptor;
        if (descriptor?.dependencies.some((dependency) => affected.has(dependency.id))) {
          affected.add(activeId);
          grew = true;
        }
      }
    }

    const stopped: string[] = [];
    for (const activeId of [...this.initOrder].reverse()) {
      const target = this.records.get(activeId);
      if (!affected.has(activeId) || target?.state !== "active") continue;
      await this.shutdown(target);
      stopped.push(activeId);
    }
    return stopped;
  }

  getState(id: string): PluginState | undefined {
    return this.records.get(id)?.state;
  }

  getDescriptor(id: string): IPluginDescriptor | undefined {
    return this.records.get(id)?.discovered.descriptor;
  }

  /** Every known plugin in discovery order. */
  list(): readonly IPluginStatus[] {
    return [...this.records.values()].map((record) => this.status(record));
  }

  activeIds(): readonly string[] {
    return this.initOrder.filter((id) => this.records.get(id)?.state === "active");
  }

  discoveryProblems(): readonly PluginLoadError[] {
    return [...this.problems];
  }

  // ── Internal Lifecycle ──────────────────────────────────────────────

  private async initialize(record: IPluginRecord): Promise<void> {
    const { descriptor } = record.discovered;
    const { id } = descriptor;

    const failedDependency = descriptor.dependencies.find(
      (dependency) => this.records.get(dependency.id)?.state !== "active",
    );
    if (failedDependency) {
      this.fail(
        record,
        new PluginLoadError(id, "InitializationFailed", [id, failedDependency.id], `dependency "${failedDependency.id}" is not active`),
      );
      return;
    }

    record.state = "initializing";
    log.debug({ pluginId: id }, "Initializing plugin");

    try {
      const factory = await record.discovered.loadFactory();
      const plugin: unknown = await factory();
      if (!isPlugin(plugin)) {
        throw new PluginLoadError(id, "InvalidManifest", [id], "factory did not return a plugin");
      }
      const reported = plugin.descriptor().id;
      if (reported !== id) {
        throw new PluginLoadError(id, "InvalidManifest", [id], `plugin reports id "${reported}"`);
      }
      record.plugin = plugin;

      const outcome = await plugin.initialize(this.createCapabilities(id));
      const refusal = refusalMessage(outcome);
      if (refusal !== undefined) {
        throw new PluginLoadError(id, "InitializationFailed", [id], refusal);
      }
      this.registerContributions(id, plugin);
    } catch (error: unknown) {
      const failure = error instanceof PluginLoadError
        ? error
        : new PluginLoadError(id, "InitializationFailed", [id], describeError(error));
      this.fail(record, failure);
      return;
    }

    record.state = "active";
    this.initOrder.push(id);
    log.info({ pluginId: id, version: descriptor.version }, "Plugin activated");
    this.announce("plugin.activated", { pluginId: id, version: descriptor.version });
  }

  private async shutdown(record: IPluginRecord): Promise<void> {
    const { id } = record.discovered.descriptor;
    record.state = "shutting_down";

    let failure: PluginLoadError | undefined;
    try {
      const outcome = record.plugin ? await record.plugin.shutdown() : undefined;
      const refusal = refusalMessage(outcome);
      if (refusal !== undefined) {
        failure = new PluginLoadError(id, "InitializationFailed", [id], `shutdown reported failure: ${refusal}`);
      }
    } catch (error: unknown) {
      failure = new PluginLoadError(id, "InitializationFailed", [id], `shutdown threw: ${describeError(error)}`);
    }

    this.initOrder = this.initOrder.filter((activeId) => activeId !== id);

    if (failure) {
      this.fail(record, failure);
      return;
    }

    this.rollback(id);
    record.state = "stopped";
    log.info({ pluginId: id }, "Plugin stopped");
    this.announce("plugin.stopped", { pluginId: id });
  }

  private fail(record: IPluginRecord, error: PluginLoadError): void {
    const previous = record.state;
    const { id } = record.discovered.descriptor;
    record.state = "failed";
    record.error = error;
    this.rollback(id);

    log.error({ pluginId: id, reason: error.reason, chain: error.chain, from: previous }, error.message);
    this.announce("plugin.failed", {
      pluginId: id,
      state: previous,
      reason: error.reason,
      error: error.message,
    });
  }

  /** Remove everything a plugin registered through its capability handle. */
  private rollback(id: string): void {
    const subscriptions = this.deps.bus.unsubscribeOwner(id);
    const services = this.deps.services.unregisterOwner(id);
    if (subscriptions > 0 || services > 0) {
      log.debug({ pluginId: id, subscriptions, services }, "Released plugin registrations");
    }
  }

  private registerContributions(id: string, plugin: IPlugin): void {
    if (!this.headless) {
      for (const component of plugin.uiComponents?.() ?? []) {
        this.deps.services.register(`${id}.ui.${component.name}`, component, { ownerId: id, capability: UI_CAPABILITY });
      }
    }
    (plugin.exportSources?.() ?? []).forEach((source, index) => {
      this.deps.services.register(`${id}.export.${index}`, source, { ownerId: id, capability: EXPORT_SOURCE_CAPABILITY });
    });
  }

  private createCapabilities(pluginId: string): IPluginCapabilities {
    const { config, bus, executor, services } = this.deps;
    return {
      pluginId,
      config: {
        get: <K extends ConfigValueType>(key: string, type: K) => config.get(key, type),
        getOptional: <K extends ConfigValueType>(key: string, type: K, fallback: IConfigTypeMap[K]) =>
          config.getOptional(key, type, fallback),
        snapshot: () => config.snapshot(),
      },
      events: bus.scoped(pluginId),
      tasks: {
        submit: <T>(work: TaskWork<T>, options?: ISubmitOptions) =>
          executor.submit(work, { ...options, name: options?.name ?? pluginId }),
        cancel: (handle: TaskHandle) => executor.cancel(handle),
        progress: (handle: TaskHandle) => executor.progress(handle),
        await: <T>(handle: TaskHandle<T>, timeoutMs?: number) => executor.await(handle, timeoutMs),
      },
      log: createLogger(`plugin:${pluginId}`),
      headless: this.headless,
      registerService: <T>(name: string, instance: T, registration: IServiceRegistration) => {
        services.register(name, instance, { ownerId: pluginId, capability: registration.capability });
      },
    };
  }

  private announce<K extends RuntimeTopic>(topic: K, payload: IRuntimeEventMap[K]): void {
    if (this.deps.bus.isClosed) return;
    this.deps.bus.publish(topic, payload);
  }

  private status(record: IPluginRecord): IPluginStatus {
    const { descriptor, origin } = record.discovered;
    return {
      pluginId: descriptor.id,
      name: descriptor.name,
      version: descriptor.version,
      state: record.state,
      origin,
      ...(record.error
        ? { reason: record.error.reason, chain: record.error.chain, error: record.error.message }
        : {}),
    };
  }
}

function isPlugin(value: unknown): value is IPlugin {
  if (typeof value !== "object" || value === null) return false;
  return (
    "descriptor" in value && typeof value.descriptor === "function" &&
    "initialize" in value && typeof value.initialize === "function" &&
    "shutdown" in value && typeof value.shutdown === "function"
  );
}

/** The failure message of an explicit `{ ok: false }` result, otherwise undefined. */
function refusalMessage(outcome: unknown): string | undefined {
  if (typeof outcome !== "object" || outcome === null || !("ok" in outcome) || outcome.ok !== false) {
    return undefined;
  }
  return "message" in outcome && typeof outcome.message === "string" ? outcome.message : "plugin reported failure";
}
