/**
 * Plugin contract, descriptors, and the capability handle a plugin receives
 * at initialization. A plugin only ever sees this handle, never another
 * plugin's internals.
 */

import type { Logger } from "pino";
import type {
  ConfigValue,
  ConfigValueType,
  IConfigTypeMap,
  IEffectiveConfig,
} from "./config.js";
import type {
  EventHandler,
  IEventEnvelope,
  IPublishOptions,
  ISubscribeOptions,
  ISubscription,
} from "./events.js";
import type { ISubmitOptions, TaskProgress, TaskResult, TaskWork } from "./task.js";
import type { TaskHandle } from "../core/task-handle.js";

// ── Descriptor ───────────────────────────────────────────────────────────

export interface IPluginDependency {
  readonly id: string;
  /** semver range, e.g. "^1.2.0" */
  readonly range: string;
}

export interface IPluginDescriptor {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly dependencies: readonly IPluginDependency[];
  readonly capabilities: readonly string[];
}

export type PluginState =
  | "discovered"
  | "resolved"
  | "initializing"
  | "active"
  | "shutting_down"
  | "stopped"
  | "failed";

// ── Collaborator contracts ───────────────────────────────────────────────

export type ExportRow = Readonly<Record<string, ConfigValue | Date | undefined>>;

/** Data a domain plugin offers to the export collaborator. */
export interface IExportableSource {
  rows(): Iterable<ExportRow>;
  fieldNames(): readonly string[];
  suggestedFileName(): string;
}

/** Opaque UI contribution; the core registers it but never renders it. */
export interface IUIComponent {
  readonly name: string;
  readonly title: string;
  readonly placement?: "main" | "sidebar" | "dialog" | undefined;
  readonly component: unknown;
}

// ── Lifecycle ────────────────────────────────────────────────────────────

export interface ILifecycleResult {
  readonly ok: boolean;
  readonly message?: string | undefined;
}

/** Hooks return nothing on success, or an explicit result. Throwing fails. */
export type LifecycleOutcome = void | ILifecycleResult;

export interface IPlugin {
  descriptor(): IPluginDescriptor;
  initialize(capabilities: IPluginCapabilities): LifecycleOutcome | Promise<LifecycleOutcome>;
  shutdown(): LifecycleOutcome | Promise<LifecycleOutcome>;
  uiComponents?(): readonly IUIComponent[];
  exportSources?(): readonly IExportableSource[];
}

export type PluginFactory = () => IPlugin | Promise<IPlugin>;

/** A discovered plugin that has not been instantiated yet. */
export interface IPluginModule {
  readonly descriptor: IPluginDescriptor;
  readonly factory: PluginFactory;
}

export type PluginSource =
  | { readonly kind: "inline"; readonly modules: readonly IPluginModule[] }
  | { readonly kind: "directory"; readonly path: string };

// ── Capability handle ────────────────────────────────────────────────────

export interface IConfigReader {
  get<K extends ConfigValueType>(key: string, type: K): IConfigTypeMap[K];
  getOptional<K extends ConfigValueType>(
    key: string,
    type: K,
    fallback: IConfigTypeMap[K],
  ): IConfigTypeMap[K];
  snapshot(): IEffectiveConfig;
}

export interface IEventAccess {
  publish<T>(topic: string, payload: T, options?: IPublishOptions): IEventEnvelope<T>;
  subscribe<T>(topicPattern: string, handler: EventHandler<T>, options?: ISubscribeOptions): ISubscription;
  unsubscribe(subscription: ISubscription): boolean;
}

export interface ITaskAccess {
  submit<T>(work: TaskWork<T>, options?: ISubmitOptions): TaskHandle<T>;
  cancel(handle: TaskHandle): boolean;
  progress(handle: TaskHandle): TaskProgress;
  await<T>(handle: TaskHandle<T>, timeoutMs?: number): Promise<TaskResult<T>>;
}

export interface IServiceRegistration {
  readonly capability: string;
}

export interface IPluginCapabilities {
  readonly pluginId: string;
  readonly config: IConfigReader;
  readonly events: IEventAccess;
  readonly tasks: ITaskAccess;
  readonly log: Logger;
  readonly headless: boolean;
  registerService<T>(name: string, instance: T, registration: IServiceRegistration): void;
}
