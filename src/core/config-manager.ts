/**
 * Configuration manager.
 * Loads ordered layers (defaults, files, environment, overrides), merges them
 * key-by-key into an immutable snapshot, validates against a key schema, and
 * hot-reloads on demand or when a watched file changes.
 */

import { existsSync, mkdirSync, readFileSync, unwatchFile, watchFile, writeFileSync } from "node:fs";
import { dirname, extname } from "node:path";
import { parse as parseYaml } from "yaml";
import { createLogger } from "../utils/logger.js";
import {
  ConfigLoadError,
  ConfigSourceError,
  ConfigTypeMismatchError,
  MissingConfigKeyError,
} from "../types/errors.js";
import type { AnyConfigError } from "../types/errors.js";
import { CORE_CONFIG_SCHEMA } from "../types/config.js";
import type {
  ConfigSource,
  ConfigSourceKind,
  ConfigSourceTag,
  ConfigValue,
  ConfigValueType,
  IConfigChangedEvent,
  IConfigDiff,
  IConfigLayer,
  IConfigSchema,
  IConfigTypeMap,
  IEffectiveConfig,
} from "../types/config.js";
import type { IConfigReader, IEventAccess } from "../types/plugin.js";

const log = createLogger("config");

const KIND_RANK: Readonly<Record<ConfigSourceKind, number>> = {
  defaults: 0,
  file: 1,
  env: 2,
  overrides: 3,
};

const DEFAULT_WATCH_INTERVAL_MS = 2_000;

export type ConfigChangeCallback = (config: IEffectiveConfig, diff: IConfigDiff) => void;

export type ConfigEventSink = Pick<IEventAccess, "publish">;

export interface IConfigManagerOptions {
  readonly schema?: IConfigSchema | undefined;
}

// ── Value helpers ───────────────────────────────────────────────────────

export function describeType(value: ConfigValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function matchesType<K extends ConfigValueType>(
  value: ConfigValue,
  type: K,
): value is IConfigTypeMap[K] {
  return describeType(value) === type;
}

function isPlainObject(value: unknown): value is Record<string, ConfigValue> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toConfigValue(raw: unknown): ConfigValue | undefined {
  if (raw === null || typeof raw === "string" || typeof raw === "boolean") {
    return raw;
  }
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : undefined;
  }
  if (raw instanceof Date) {
    return raw.toISOString();
  }
  if (Array.isArray(raw)) {
    const items: ConfigValue[] = [];
    for (const item of raw) {
      const converted = toConfigValue(item);
      if (converted !== undefined) items.push(converted);
    }
    return items;
  }
  if (typeof raw === "object") {
    const result: Record<string, ConfigValue> = {};
    for (const [key, item] of Object.entries(raw)) {
      const converted = toConfigValue(item);
      if (converted !== undefined) result[key] = converted;
    }
    return result;
  }
  return undefined;
}

/** Flatten nested objects into dotted keys. Arrays are leaf values. */
export function flattenConfig(
  input: Readonly<Record<string, unknown>>,
  prefix = "",
  into: Map<string, ConfigValue> = new Map(),
): Map<string, ConfigValue> {
  for (const [key, raw] of Object.entries(input)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(raw) && !(raw instanceof Date)) {
      flattenConfig(raw, path, into);
      continue;
    }
    const value = toConfigValue(raw);
    if (value !== undefined) {
      into.set(path, value);
    }
  }
  return into;
}

/** Rebuild a nested object from dotted keys. */
export function unflattenConfig(values: ReadonlyMap<string, ConfigValue>): Record<string, ConfigValue> {
  const root: Record<string, ConfigValue> = {};
  for (const [key, value] of values) {
    const parts = key.split(".");
    let cursor: Record<string, ConfigValue> = root;
    for (let i = 0; i < parts.length - 1; i++) {
      const part = parts[i] ?? "";
      const next = cursor[part];
      if (isPlainObject(next)) {
        cursor = next;
      } else {
        const created: Record<string, ConfigValue> = {};
        cursor[part] = created;
        cursor = created;
      }
    }
    cursor[parts[parts.length - 1] ?? key] = value;
  }
  return root;
}

/** Coerce an environment string: booleans, then numbers, then the raw string. */
export function coerceEnvValue(raw: string): ConfigValue {
  const lowered = raw.trim().toLowerCase();
  if (lowered === "true" || lowered === "yes") return true;
  if (lowered === "false" || lowered === "no") return false;
  if (raw.trim() !== "" && !Number.isNaN(Number(raw))) return Number(raw);
  return raw;
}

/** Map `PREFIX_SECTION_KEY` to `section.key`. Returns undefined for unrelated variables. */
export function envVarToKey(name: string, prefix: string): string | undefined {
  if (!name.startsWith(prefix)) return undefined;
  const parts = name.slice(prefix.length).toLowerCase().split("_");
  if (parts.length < 2 || parts.some((part) => part.length === 0)) return undefined;
  const [section, ...rest] = parts;
  return `${section}.${rest.join("_")}`;
}

function valuesEqual(a: ConfigValue | undefined, b: ConfigValue | undefined): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

export function diffConfig(
  previous: ReadonlyMap<string, ConfigValue>,
  next: ReadonlyMap<string, ConfigValue>,
): IConfigDiff {
  const added: string[] = [];
  const removed: string[] = [];
  const changed: string[] = [];

  for (const [key, value] of next) {
    if (!previous.has(key)) {
      added.push(key);
    } else if (!valuesEqual(previous.get(key), value)) {
      changed.push(key);
    }
  }
  for (const key of previous.keys()) {
    if (!next.has(key)) removed.push(key);
  }

  return { added: added.sort(), removed: removed.sort(), changed: changed.sort() };
}

function isEmptyDiff(diff: IConfigDiff): boolean {
  return diff.added.length === 0 && diff.removed.length === 0 && diff.changed.length === 0;
}

function coerceToSchemaType(value: ConfigValue, type: ConfigValueType): ConfigValue {
  if (typeof value !== "string") {
    if (type === "string" && (typeof value === "number" || typeof value === "boolean")) {
      return String(value);
    }
    return value;
  }
  switch (type) {
    case "number": {
      const parsed = Number(value);
      return value.trim() !== "" && !Number.isNaN(parsed) ? parsed : value;
    }
    case "boolean": {
      const lowered = value.toLowerCase();
      if (lowered === "true" || lowered === "yes" || lowered === "1") return true;
      if (lowered === "false" || lowered === "no" || lowered === "0") return false;
      return value;
    }
    case "array":
      return value.split(",").map((item) => item.trim()).filter((item) => item.length > 0);
    default:
      return value;
  }
}

const EMPTY_SNAPSHOT: IEffectiveConfig = Object.freeze({
  version: 0,
  values: new Map<string, ConfigValue>(),
  origins: new Map<string, ConfigSourceTag>(),
  loadedAt: new Date(0),
});

// ── ConfigurationManager ────────────────────────────────────────────────

export class ConfigurationManager implements IConfigReader {
  private readonly schema: IConfigSchema;
  private sources: readonly ConfigSource[] = [];
  private current: IEffectiveConfig = EMPTY_SNAPSHOT;
  private readonly runtimeOverrides = new Map<string, ConfigValue>();
  private readonly listeners = new Set<ConfigChangeCallback>();
  private sourceProblems: readonly ConfigSourceError[] = [];
  private watchedPaths: string[] = [];
  private bus: ConfigEventSink | undefined;

  constructor(options?: IConfigManagerOptions) {
    this.schema = options?.schema ?? CORE_CONFIG_SCHEMA;
  }

  /**
   * Load the given ordered sources and replace the effective snapshot.
   * Throws ConfigLoadError when a required key is missing or a value has the
   * wrong type. Unreadable file layers are skipped and listed in problems().
   */
  load(sources: readonly ConfigSource[]): IEffectiveConfig {
    this.sources = [...sources];
    const { values, origins } = this.build();
    this.current = this.freezeSnapshot(values, origins, this.current.version + 1);
    log.info(
      { version: this.current.version, keys: values.size, layers: sources.length },
      "Configuration loaded",
    );
    return this.current;
  }

  /**
   * Re-read every source. When the merged values changed, the version is
   * bumped, `config.changed` is published and watchers are notified.
   */
  reload(): IEffectiveConfig {
    const { values, origins } = this.build();
    const diff = diffConfig(this.current.values, values);

    if (isEmptyDiff(diff)) {
      log.debug({ version: this.current.version }, "Configuration reload produced no changes");
      return this.current;
    }

    const previousVersion = this.current.version;
    this.current = this.freezeSnapshot(values, origins, previousVersion + 1);
    log.info(
      { version: this.current.version, ...diff },
      "Configuration reloaded",
    );

    this.announce({ version: this.current.version, previousVersion, ...diff });
    for (const listener of [...this.listeners]) {
      try {
        listener(this.current, diff);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ error: message }, "Config change callback failed");
      }
    }
    return this.current;
  }

  /** Register a listener for changed reloads. Returns an unsubscribe function. */
  watch(callback: ConfigChangeCallback): () => void {
    this.listeners.add(callback);
    return () => {
      this.listeners.delete(callback);
    };
  }

  attachEventBus(bus: ConfigEventSink | undefined): void {
    this.bus = bus;
  }

  get<K extends ConfigValueType>(key: string, type: K): IConfigTypeMap[K] {
    const value = this.lookup(key);
    if (value === undefined) {
      throw new MissingConfigKeyError(key);
    }
    if (!matchesType(value, type)) {
      throw new ConfigTypeMismatchError(key, type, describeType(value));
    }
    return value;
  }

  getOptional<K extends ConfigValueType>(
    key: string,
    type: K,
    fallback: IConfigTypeMap[K],
  ): IConfigTypeMap[K] {
    const value = this.lookup(key);
    if (value === undefined) {
      return fallback;
    }
    if (!matchesType(value, type)) {
      throw new ConfigTypeMismatchError(key, type, describeType(value));
    }
    return value;
  }

  has(key: string): boolean {
    return this.lookup(key) !== undefined;
  }

  snapshot(): IEffectiveConfig {
    return this.current;
  }

  /** True when a newer snapshot has replaced the one the caller holds. */
  isStale(snapshot: IEffectiveConfig): boolean {
    return snapshot.version < this.current.version;
  }

  /** Non-fatal problems from the last load/reload (unreadable file layers). */
  problems(): readonly ConfigSourceError[] {
    return this.sourceProblems;
  }

  /** Runtime override (e.g. a CLI flag). Takes effect on the next reload. */
  setOverride(key: string, value: ConfigValue): void {
    this.runtimeOverrides.set(key, value);
  }

  clearOverride(key: string): void {
    this.runtimeOverrides.delete(key);
  }

  /** Write the effective configuration as nested JSON. */
  save(filePath: string): void {
    mkdirSync(dirname(filePath), { recursive: true });
    const json = JSON.stringify(unflattenConfig(this.current.values), null, 2);
    writeFileSync(filePath, `${json}\n`, { encoding: "utf-8", mode: 0o600 });
    log.info({ path: filePath }, "Configuration saved");
  }

  /** Poll file layers and reload when one changes. */
  watchFiles(intervalMs: number = DEFAULT_WATCH_INTERVAL_MS): void {
    this.stopWatching();
    for (const source of this.sources) {
      if (source.kind !== "file" || !existsSync(source.path)) continue;

      const filePath = source.path;
      this.watchedPaths.push(filePath);
      watchFile(filePath, { interval: intervalMs }, () => {
        log.info({ path: filePath }, "Config file changed, reloading");
        try {
          this.reload();
        } catch (error: unknown) {
          const message = error instanceof Error ? error.message : String(error);
          log.error({ path: filePath, error: message }, "Failed to reload config");
        }
      });
    }
  }

  stopWatching(): void {
    for (const filePath of this.watchedPaths) {
      unwatchFile(filePath);
    }
    this.watchedPaths = [];
  }

  // ── Private Helpers ──────────────────────────────────────────────────

  private lookup(key: string): ConfigValue | undefined {
    const direct = this.current.values.get(key);
    if (direct !== undefined) {
      return direct;
    }

    // A section key ("ui") resolves to the object of its children.
    const prefix = `${key}.`;
    const children = new Map<string, ConfigValue>();
    for (const [candidate, value] of this.current.values) {
      if (candidate.startsWith(prefix)) {
        children.set(candidate.slice(prefix.length), value);
      }
    }
    return children.size > 0 ? unflattenConfig(children) : undefined;
  }

  private build(): { values: Map<string, ConfigValue>; origins: Map<string, ConfigSourceTag> } {
    const problems: ConfigSourceError[] = [];
    const layers: IConfigLayer[] = [];

    for (const source of this.sources) {
      const layer = this.readLayer(source, problems);
      if (layer) layers.push(layer);
    }
    if (this.runtimeOverrides.size > 0) {
      layers.push({ source: "overrides", kind: "overrides", values: new Map(this.runtimeOverrides) });
    }

    // Stable sort: precedence is fixed by kind, list order breaks ties.
    const ordered = layers
      .map((layer, index) => ({ layer, index }))
      .sort((a, b) => KIND_RANK[a.layer.kind] - KIND_RANK[b.layer.kind] || a.index - b.index)
      .map(({ layer }) => layer);

    const values = new Map<string, ConfigValue>();
    const origins = new Map<string, ConfigSourceTag>();
    for (const layer of ordered) {
      for (const [key, value] of layer.values) {
        values.set(key, value);
        origins.set(key, layer.source);
      }
    }

    const errors: AnyConfigError[] = this.validate(values);
    this.sourceProblems = problems;
    for (const problem of problems) {
      log.warn({ source: problem.source, error: problem.message }, "Skipping unreadable config source");
    }
    if (errors.length > 0) {
      throw new ConfigLoadError([...errors, ...problems]);
    }
    return { values, origins };
  }

  private readLayer(source: ConfigSource, problems: ConfigSourceError[]): IConfigLayer | undefined {
    switch (source.kind) {
      case "defaults":
        return { source: "defaults", kind: "defaults", values: flattenConfig(source.values) };
      case "overrides":
        return { source: "overrides", kind: "overrides", values: flattenConfig(source.values) };
      case "env": {
        const env = source.env ?? process.env;
        const values = new Map<string, ConfigValue>();
        for (const name of Object.keys(env).sort()) {
          const raw = env[name];
          const key = envVarToKey(name, source.prefix);
          if (key === undefined || raw === undefined) continue;
          values.set(key, coerceEnvValue(raw));
          log.debug({ variable: name, key }, "Loaded config from environment");
        }
        return { source: "env", kind: "env", values };
      }
      case "file":
        return this.readFileLayer(source.path, source.optional === true, problems);
    }
  }

  private readFileLayer(
    filePath: string,
    optional: boolean,
    problems: ConfigSourceError[],
  ): IConfigLayer | undefined {
    const tag: ConfigSourceTag = `file:${filePath}`;
    if (!existsSync(filePath)) {
      if (optional) {
        log.debug({ path: filePath }, "Optional config file not found");
        return undefined;
      }
      problems.push(new ConfigSourceError(tag, "file not found"));
      return undefined;
    }

    let parsed: unknown;
    try {
      const raw = readFileSync(filePath, "utf-8");
      const extension = extname(filePath).toLowerCase();
      parsed = extension === ".yaml" || extension === ".yml" ? parseYaml(raw) : JSON.parse(raw);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      problems.push(new ConfigSourceError(tag, message));
      return undefined;
    }

    if (parsed === null || parsed === undefined) {
      return { source: tag, kind: "file", values: new Map() };
    }
    if (!isPlainObject(parsed)) {
      problems.push(new ConfigSourceError(tag, "top-level value must be an object"));
      return undefined;
    }
    return { source: tag, kind: "file", values: flattenConfig(parsed) };
  }

  private validate(values: Map<string, ConfigValue>): AnyConfigError[] {
    const errors: AnyConfigError[] = [];
    for (const [key, spec] of Object.entries(this.schema)) {
      const value = values.get(key);
      if (value === undefined) {
        if (spec.required) errors.push(new MissingConfigKeyError(key));
        continue;
      }
      const coerced = coerceToSchemaType(value, spec.type);
      if (!matchesType(coerced, spec.type)) {
        errors.push(new ConfigTypeMismatchError(key, spec.type, describeType(value)));
        continue;
      }
      values.set(key, coerced);
    }
    return errors;
  }

  private freezeSnapshot(
    values: Map<string, ConfigValue>,
    origins: Map<string, ConfigSourceTag>,
    version: number,
  ): IEffectiveConfig {
    return Object.freeze({ version, values, origins, loadedAt: new Date() });
  }

  private announce(event: IConfigChangedEvent): void {
    if (!this.bus) return;
    try {
      this.bus.publish("config.changed", event);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn({ error: message }, "Could not publish config.changed");
    }
  }
}
