/**
 * Shared type barrel export
 */

export type {
  ConfigValue,
  ConfigValueType,
  IConfigTypeMap,
  ConfigSourceKind,
  ConfigSource,
  ConfigSourceTag,
  IConfigLayer,
  IEffectiveConfig,
  IConfigDiff,
  IConfigChangedEvent,
  IConfigKeySpec,
  IConfigSchema,
} from "./config.js";
export { DEFAULT_CONFIG, CORE_CONFIG_SCHEMA, ENV_PREFIX } from "./config.js";

export type {
  IEventEnvelope,
  IPublishOptions,
  SubscriptionMode,
  EventHandler,
  ISubscribeOptions,
  ISubscription,
  ITaskEventPayload,
  IRuntimeEventMap,
  RuntimeTopic,
} from "./events.js";
export { EventPriority, priorityName } from "./events.js";

export type {
  TaskState,
  TaskProgress,
  BackpressurePolicy,
  ITaskContext,
  TaskWork,
  ISubmitOptions,
  TaskResult,
  IExecutorOptions,
  IExecutorStats,
  IDrainReport,
} from "./task.js";

export type {
  IPluginDependency,
  IPluginDescriptor,
  PluginState,
  ExportRow,
  IExportableSource,
  IUIComponent,
  ILifecycleResult,
  LifecycleOutcome,
  IPlugin,
  PluginFactory,
  IPluginModule,
  PluginSource,
  IConfigReader,
  IEventAccess,
  ITaskAccess,
  IServiceRegistration,
  IPluginCapabilities,
} from "./plugin.js";

export type { IErrorContext, PluginLoadReason, AnyConfigError, AnyTaskError, AnyStrataError } from "./errors.js";
export {
  StrataError,
  MissingConfigKeyError,
  ConfigTypeMismatchError,
  ConfigSourceError,
  ConfigLoadError,
  PluginLoadError,
  EventDispatchError,
  BusClosedError,
  ExecutorClosedError,
  TaskBackpressureError,
  TaskCancelledError,
  TaskExecutionError,
  TaskTimeoutError,
  ServiceNotFoundError,
  ServiceConflictError,
  RuntimeNotStartedError,
  describeError,
} from "./errors.js";
