/**
 * Orchestrator: composition root for the runtime.
 *
 * Boot order is config → event bus → executor → plugins. A UI shell and the
 * headless CLI drive the runtime through this one facade. Per-unit failures
 * (a bad config file, a plugin that will not load) end up in the startup
 * report; only an invalid configuration makes startup fail.
 */

import { createLogger, isCliLogLevel, setLogLevel } from "../utils/logger.js";
import { expandHome, getConfigPath } from "../utils/pathResolver.js";
import { DEFAULT_CONFIG, ENV_PREFIX } from "../types/config.js";
import type { ConfigSource, ConfigValue, IConfigSchema } from "../types/config.js";
import { ConfigLoadError, RuntimeNotStartedError } from "../types/errors.js";
import type { AnyConfigError, PluginLoadReason } from "../types/errors.js";
import { EventPriority } from "../types/events.js";
import type { IEventEnvelope, IPublishOptions } from "../types/events.js";
import type { IConfigReader, IPluginModule, PluginSource } from "../types/plugin.js";
import type { IDrainReport } from "../types/task.js";
import { AsyncExecutor } from "./async-executor.js";
import { ConfigurationManager } from "./config-manager.js";
import { EventBus } from "./event-bus.js";
import { PluginManager } from "./plugin-manager.js";
import type { IPluginStatus } from "./plugin-manager.js";
import type { IDiscoveryFilter } from "./plugin-discovery.js";
import { ServiceRegistry } from "./service-registry.js";

const log = createLogger("orchestrator");

const COMMAND_PREFIX = "command.";

// ── Types ───────────────────────────────────────────────────────────────

export interface IStartOptions {
  /** File layers in increasing precedence. Defaults to $STRATA_HOME/config.json when present. */
  readonly configFiles?: readonly string[] | undefined;
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
  readonly overrides?: Readonly<Record<string, ConfigValue>> | undefined;
  /** Scanned in addition to `plugins.paths`. */
  readonly pluginDirectories?: readonly string[] | undefined;
  readonly inlinePlugins?: readonly IPluginModule[] | undefined;
  readonly headless?: boolean | undefined;
  /** Poll config files and hot-reload on change. */
  readonly watchConfig?: boolean | undefined;
}

export interface IConfigIssue {
  readonly kind: AnyConfigError["kind"];
  /** The key, or the source for an unreadable layer. */
  readonly subject: string;
  readonly message: string;
}

export interface IPluginProblem {
  readonly pluginId: string;
  readonly reason: PluginLoadReason;
  readonly message: string;
}

export interface IStartupReport {
  /** False only when the configuration is invalid. */
  readonly ok: boolean;
  readonly configVersion: number;
  readonly configIssues: readonly IConfigIssue[];
  readonly plugins: readonly IPluginStatus[];
  readonly discoveryProblems: readonly IPluginProblem[];
  readonly elapsedMs: number;
}

export interface IShutdownReport {
  readonly stoppedPlugins: readonly string[];
  readonly failedPlugins: readonly string[];
  readonly drain: IDrainReport;
  readonly elapsedMs: number;
}

const EMPTY_DRAIN: IDrainReport = { completed: 0, failed: 0, cancelled: 0, withinGrace: true };

// ── Orchestrator ────────────────────────────────────────────────────────

export class Orchestrator {
  private readonly configManager: ConfigurationManager;
  private readonly registry = new ServiceRegistry();
  private bus: EventBus | undefined;
  private taskExecutor: AsyncExecutor | undefined;
  private pluginManager: PluginManager | undefined;
  private shutdownPromise: Promise<IShutdownReport> | undefined;

  constructor(options?: { readonly schema?: IConfigSchema | undefined }) {
    this.configManager = new ConfigurationManager({ schema: options?.schema });
  }

  get config(): ConfigurationManager {
    return this.configManager;
  }

  get services(): ServiceRegistry {
    return this.registry;
  }

  get events(): EventBus {
    return this.started(this.bus, "Event bus");
  }

  get executor(): AsyncExecutor {
    return this.started(this.taskExecutor, "Executor");
  }

  get plugins(): PluginManager {
    return this.started(this.pluginManager, "Plugin manager");
  }

  get isRunning(): boolean {
    return this.bus !== undefined && !this.bus.isClosed;
  }

  async start(options: IStartOptions = {}): Promise<IStartupReport> {
    const startedAt = Date.now();
    const elapsed = (): number => Date.now() - startedAt;

    try {
      this.configManager.load(buildConfigSources(options));
    } catch (error: unknown) {
      if (!(error instanceof ConfigLoadError)) throw error;
      log.error({ problems: error.errors.length }, error.message);
      return {
        ok: false,
        configVersion: this.configManager.snapshot().version,
        configIssues: error.errors.map(toConfigIssue),
        plugins: [],
        discoveryProblems: [],
        elapsedMs: elapsed(),
      };
    }

    const config = this.configManager;
    const level = config.getOptional("app.log_level", "string", "INFO").toUpperCase();
    if (isCliLogLevel(level)) setLogLevel(level);

    const bus = new EventBus({ asyncQueueDepth: config.get("bus.async_queue_depth", "number") });
    config.attachEventBus(bus);
    const executor = AsyncExecutor.fromConfig(config, bus);
    bus.attachDispatcher(executor);
    const plugins = new PluginManager({
      config,
      bus,
      executor,
      services: this.registry,
      headless: options.headless,
    });
    this.bus = bus;
    this.taskExecutor = executor;
    this.pluginManager = plugins;

    await plugins.discover(buildPluginSources(config, options), buildDiscoveryFilter(config));
    plugins.resolve();
    await plugins.initializeAll();

    if (options.watchConfig) {
      config.watchFiles();
    }

    const statuses = plugins.list();
    const activePlugins = statuses.filter((status) => status.state === "active").map((status) => status.pluginId);
    const failedPlugins = statuses.filter((status) => status.state === "failed").map((status) => status.pluginId);
    bus.publish("app.started", { activePlugins, failedPlugins });
    log.info({ active: activePlugins.length, failed: failedPlugins.length, elapsedMs: elapsed() }, "Runtime started");

    return {
      ok: true,
      configVersion: config.snapshot().version,
      configIssues: config.problems().map(toConfigIssue),
      plugins: statuses,
      discoveryProblems: plugins.discoveryProblems().map((problem) => ({
        pluginId: problem.pluginId,
        reason: problem.reason,
        message: problem.message,
      })),
      elapsedMs: elapsed(),
    };
  }

  /** Tear everything down. Safe to call more than once. */
  shutdown(): Promise<IShutdownReport> {
    this.shutdownPromise ??= this.performShutdown();
    return this.shutdownPromise;
  }

  /** Throws ServiceNotFoundError when no active plugin provides `name`. */
  resolveService(name: string): unknown {
    return this.registry.resolve(name);
  }

  tryResolveService(name: string): unknown {
    return this.registry.tryResolve(name);
  }

  /** Publish a user action as `command.<name>`, at High priority unless told otherwise. */
  dispatchCommand<T>(name: string, payload: T, options?: IPublishOptions): IEventEnvelope<T> {
    const topic = name.startsWith(COMMAND_PREFIX) ? name : `${COMMAND_PREFIX}${name}`;
    return this.events.publish(topic, payload, { priority: EventPriority.High, ...options });
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private async performShutdown(): Promise<IShutdownReport> {
    const startedAt = Date.now();
    const bus = this.bus;
    const executor = this.taskExecutor;
    const plugins = this.pluginManager;
    this.configManager.stopWatching();

    if (!bus || !executor || !plugins) {
      return { stoppedPlugins: [], failedPlugins: [], drain: EMPTY_DRAIN, elapsedMs: 0 };
    }

    log.info("Shutting down runtime");
    bus.publish("app.stopping", {}, { priority: EventPriority.High });

    const wasActive = plugins.activeIds();
    await plugins.shutdownAll();
    const stoppedPlugins = wasActive.filter((id) => plugins.getState(id) === "stopped");
    const failedPlugins = wasActive.filter((id) => plugins.getState(id) === "failed");

    const graceMs = this.configManager.getOptional("orchestrator.shutdown_grace_ms", "number", 5_000);
    const drain = await executor.drain(graceMs);
    await bus.flush();
    executor.dispose();
    bus.close();
    this.configManager.attachEventBus(undefined);

    const elapsedMs = Date.now() - startedAt;
    log.info({ stopped: stoppedPlugins.length, ...drain, elapsedMs }, "Runtime stopped");
    return { stoppedPlugins, failedPlugins, drain, elapsedMs };
  }

  private started<T>(component: T | undefined, name: string): T {
    if (component === undefined) {
      throw new RuntimeNotStartedError(name);
    }
    return component;
  }
}

/**
 * Layers for a start: defaults, the config files (or the optional
 * $STRATA_HOME/config.json), APP_ environment variables, then overrides.
 */
export function buildConfigSources(options: IStartOptions): ConfigSource[] {
  const files: ConfigSource[] = options.configFiles && options.configFiles.length > 0
    ? options.configFiles.map((path): ConfigSource => ({ kind: "file", path: expandHome(path) }))
    : [{ kind: "file", path: getConfigPath(), optional: true }];

  return [
    { kind: "defaults", values: DEFAULT_CONFIG },
    ...files,
    { kind: "env", prefix: ENV_PREFIX, env: options.env ?? process.env },
    { kind: "overrides", values: options.overrides ?? {} },
  ];
}

/** Inline modules first, then `plugins.paths`, then extra directories. */
export function buildPluginSources(config: IConfigReader, options: IStartOptions): PluginSource[] {
  const sources: PluginSource[] = [];
  if (options.inlinePlugins && options.inlinePlugins.length > 0) {
    sources.push({ kind: "inline", modules: options.inlinePlugins });
  }
  const configured = stringList(config.getOptional("plugins.paths", "array", []));
  for (const path of [...configured, ...(options.pluginDirectories ?? [])]) {
    sources.push({ kind: "directory", path: expandHome(path) });
  }
  return sources;
}

export function buildDiscoveryFilter(config: IConfigReader): IDiscoveryFilter {
  return {
    enabled: stringList(config.getOptional("plugins.enabled", "array", [])),
    disabled: stringList(config.getOptional("plugins.disabled", "array", [])),
  };
}

function stringList(values: readonly ConfigValue[]): string[] {
  return values.filter((value): value is string => typeof value === "string" && value.length > 0);
}

function toConfigIssue(error: AnyConfigError): IConfigIssue {
  const subject = error.kind === "SourceUnreadable" ? error.source : error.key;
  return { kind: error.kind, subject, message: error.userMessage };
}
