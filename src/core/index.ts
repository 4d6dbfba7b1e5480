/**
 * Core runtime barrel export
 */

export {
  ConfigurationManager,
  coerceEnvValue,
  describeType,
  diffConfig,
  envVarToKey,
  flattenConfig,
  unflattenConfig,
} from "./config-manager.js";
export type { ConfigChangeCallback, IConfigManagerOptions } from "./config-manager.js";

export { EventBus, WILDCARD, createEnvelope, topicMatches } from "./event-bus.js";
export type { DispatchErrorListener, IAsyncDispatcher, IEventBusOptions } from "./event-bus.js";

export { AsyncExecutor, DEFAULT_EXECUTOR_OPTIONS } from "./async-executor.js";
export { TaskHandle } from "./task-handle.js";

export { ServiceRegistry } from "./service-registry.js";
export type { IServiceEntry, IServiceOwnership } from "./service-registry.js";

export { resolveDependencies } from "./dependency-resolver.js";
export type { IResolution } from "./dependency-resolver.js";

export { MANIFEST_FILE, discoverPlugins } from "./plugin-discovery.js";
export type { IDiscoveredPlugin, IDiscoveryFilter, IDiscoveryResult, PluginManifest } from "./plugin-discovery.js";

export { EXPORT_SOURCE_CAPABILITY, PluginManager, UI_CAPABILITY } from "./plugin-manager.js";
export type { IPluginManagerDeps, IPluginStatus } from "./plugin-manager.js";

export {
  Orchestrator,
  buildConfigSources,
  buildDiscoveryFilter,
  buildPluginSources,
} from "./orchestrator.js";
export type {
  IConfigIssue,
  IPluginProblem,
  IShutdownReport,
  IStartOptions,
  IStartupReport,
} from "./orchestrator.js";
