/**
 * Configuration types: layers, the effective snapshot, and the key schema.
 */

import { homedir } from "node:os";
import { join } from "node:path";

// ── Values ───────────────────────────────────────────────────────────────

export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | readonly ConfigValue[]
  | { readonly [key: string]: ConfigValue };

export type ConfigValueType = "string" | "number" | "boolean" | "array" | "object";

export interface IConfigTypeMap {
  string: string;
  number: number;
  boolean: boolean;
  array: readonly ConfigValue[];
  object: { readonly [key: string]: ConfigValue };
}

// ── Sources ──────────────────────────────────────────────────────────────

export type ConfigSourceKind = "defaults" | "file" | "env" | "overrides";

export type ConfigSource =
  | { readonly kind: "defaults"; readonly values: Readonly<Record<string, ConfigValue>> }
  | { readonly kind: "file"; readonly path: string; readonly optional?: boolean | undefined }
  | {
      readonly kind: "env";
      readonly prefix: string;
      readonly env?: Readonly<Record<string, string | undefined>> | undefined;
    }
  | { readonly kind: "overrides"; readonly values: Readonly<Record<string, ConfigValue>> };

/** Tag recorded against each key so callers can tell where a value came from. */
export type ConfigSourceTag = "defaults" | "env" | "overrides" | `file:${string}`;

/** One configuration layer (a flattened, ordered key → value mapping). */
export interface IConfigLayer {
  readonly source: ConfigSourceTag;
  readonly kind: ConfigSourceKind;
  readonly values: ReadonlyMap<string, ConfigValue>;
}

/** Merged, read-only configuration in effect at a point in time. */
export interface IEffectiveConfig {
  readonly version: number;
  readonly values: ReadonlyMap<string, ConfigValue>;
  readonly origins: ReadonlyMap<string, ConfigSourceTag>;
  readonly loadedAt: Date;
}

export interface IConfigDiff {
  readonly added: readonly string[];
  readonly removed: readonly string[];
  readonly changed: readonly string[];
}

export interface IConfigChangedEvent extends IConfigDiff {
  readonly version: number;
  readonly previousVersion: number;
}

// ── Schema ───────────────────────────────────────────────────────────────

export interface IConfigKeySpec {
  readonly type: ConfigValueType;
  readonly required: boolean;
}

export type IConfigSchema = Readonly<Record<string, IConfigKeySpec>>;

// ── Defaults ─────────────────────────────────────────────────────────────

export const ENV_PREFIX = "APP_";

export const DEFAULT_CONFIG: Readonly<Record<string, ConfigValue>> = {
  app: {
    name: "Strata",
    version: "0.1.0",
    log_level: "INFO",
  },
  plugins: {
    paths: [],
    enabled: [],
    disabled: [],
  },
  ui: {
    theme: "light",
    window_width: 1200,
    window_height: 800,
  },
  export: {
    default_format: "csv",
    default_path: join(homedir(), "Documents", "Strata", "exports"),
  },
  bus: {
    async_queue_depth: 256,
  },
  executor: {
    workers: 4,
    queue_depth: 64,
    backpressure: "reject",
    retention_ms: 60_000,
  },
  orchestrator: {
    shutdown_grace_ms: 5_000,
  },
};

export const CORE_CONFIG_SCHEMA: IConfigSchema = {
  "app.name": { type: "string", required: true },
  "app.version": { type: "string", required: true },
  "app.log_level": { type: "string", required: false },
  "plugins.paths": { type: "array", required: true },
  "plugins.enabled": { type: "array", required: false },
  "plugins.disabled": { type: "array", required: false },
  "ui.theme": { type: "string", required: false },
  "ui.window_width": { type: "number", required: false },
  "ui.window_height": { type: "number", required: false },
  "export.default_format": { type: "string", required: false },
  "export.default_path": { type: "string", required: false },
  "bus.async_queue_depth": { type: "number", required: true },
  "executor.workers": { type: "number", required: true },
  "executor.queue_depth": { type: "number", required: true },
  "executor.backpressure": { type: "string", required: true },
  "executor.retention_ms": { type: "number", required: true },
  "orchestrator.shutdown_grace_ms": { type: "number", required: true },
};
