/**
 * PluginDiscovery: turns plugin sources into descriptors.
 *
 * Directory sources hold one sub-directory per plugin with a `plugin.yaml`
 * manifest validated by zod. Discovery reads manifests only; the entry module
 * is imported later through `loadFactory()`, once resolution has accepted the
 * plugin.
 */

import { readdir, readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import * as semver from "semver";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { createLogger } from "../utils/logger.js";
import { PluginLoadError } from "../types/errors.js";
import type { IPluginDescriptor, IPluginModule, PluginFactory, PluginSource } from "../types/plugin.js";

const log = createLogger("discovery");

export const MANIFEST_FILE = "plugin.yaml";
const DEFAULT_ENTRY = "index.js";

// ── Zod Schema ──────────────────────────────────────────────────────────

const pluginIdSchema = z
  .string()
  .regex(/^[a-z0-9][a-z0-9._-]*$/i, "Plugin id may only contain letters, digits, '.', '_' and '-'");

const versionSchema = z.string().refine((value) => semver.valid(value) !== null, "Version must be semver (e.g. 1.0.0)");

const manifestSchema = z.object({
  id: pluginIdSchema,
  name: z.string().min(1, "Plugin name is required"),
  version: versionSchema,
  description: z.string().optional(),
  entry: z.string().min(1).default(DEFAULT_ENTRY),
  dependencies: z.record(pluginIdSchema, z.string().min(1)).default({}),
  capabilities: z.array(z.string().min(1)).default([]),
});

const descriptorSchema = z.object({
  id: pluginIdSchema,
  name: z.string().min(1),
  version: versionSchema,
  description: z.string().optional(),
  dependencies: z.array(z.object({ id: pluginIdSchema, range: z.string().min(1) })),
  capabilities: z.array(z.string()),
});

export type PluginManifest = z.infer<typeof manifestSchema>;

// ── Types ───────────────────────────────────────────────────────────────

export interface IDiscoveredPlugin {
  readonly descriptor: IPluginDescriptor;
  /** "inline" or the plugin's directory. */
  readonly origin: string;
  loadFactory(): Promise<PluginFactory>;
}

export interface IDiscoveryResult {
  readonly plugins: readonly IDiscoveredPlugin[];
  readonly problems: readonly PluginLoadError[];
}

export interface IDiscoveryFilter {
  /** When non-empty, only these ids are kept. */
  readonly enabled?: readonly string[] | undefined;
  readonly disabled?: readonly string[] | undefined;
}

// ── Discovery ───────────────────────────────────────────────────────────

export async function discoverPlugins(
  sources: readonly PluginSource[],
  filter?: IDiscoveryFilter,
): Promise<IDiscoveryResult> {
  const plugins: IDiscoveredPlugin[] = [];
  const problems: PluginLoadError[] = [];
  const seen = new Map<string, string>();

  const accept = (candidate: IDiscoveredPlugin): void => {
    const { id } = candidate.descriptor;
    if (!isAllowed(id, filter)) {
      log.info({ pluginId: id }, "Plugin skipped by plugins.enabled/plugins.disabled");
      return;
    }
    const firstOrigin = seen.get(id);
    if (firstOrigin !== undefined) {
      problems.push(
        new PluginLoadError(id, "DuplicatePlugin", [id], `already provided by ${firstOrigin}, ignoring ${candidate.origin}`),
      );
      return;
    }
    seen.set(id, candidate.origin);
    plugins.push(candidate);
  };

  for (const source of sources) {
    switch (source.kind) {
      case "inline":
        for (const pluginModule of source.modules) {
          const inline = fromModule(pluginModule);
          if (inline instanceof PluginLoadError) problems.push(inline);
          else accept(inline);
        }
        break;
      case "directory": {
        const scanned = await scanDirectory(source.path);
        problems.push(...scanned.problems);
        scanned.plugins.forEach(accept);
        break;
      }
    }
  }

  log.debug({ discovered: plugins.length, problems: problems.length }, "Plugin discovery complete");
  return { plugins, problems };
}

function isAllowed(id: string, filter: IDiscoveryFilter | undefined): boolean {
  const enabled = filter?.enabled ?? [];
  if (enabled.length > 0 && !enabled.includes(id)) return false;
  return !(filter?.disabled ?? []).includes(id);
}

function fromModule(pluginModule: IPluginModule): IDiscoveredPlugin | PluginLoadError {
  const result = descriptorSchema.safeParse(pluginModule.descriptor);
  if (!result.success) {
    const id = pluginModule.descriptor.id;
    return new PluginLoadError(id, "InvalidManifest", [id], formatIssues(result.error));
  }
  const descriptor = freezeDescriptor(pluginModule.descriptor);
  return {
    descriptor,
    origin: "inline",
    loadFactory: () => Promise.resolve(pluginModule.factory),
  };
}

async function scanDirectory(path: string): Promise<IDiscoveryResult> {
  const root = resolve(path);
  let names: string[];
  try {
    const entries = await readdir(root, { withFileTypes: true });
    names = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort();
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn({ path: root, error: message }, "Plugin directory not readable");
    return { plugins: [], problems: [] };
  }

  const plugins: IDiscoveredPlugin[] = [];
  const problems: PluginLoadError[] = [];
  for (const name of names) {
    const pluginDir = join(root, name);
    const loaded = await readManifest(pluginDir);
    if (loaded === undefined) continue;
    if (loaded instanceof PluginLoadError) {
      problems.push(loaded);
      continue;
    }
    plugins.push(fromManifest(loaded, pluginDir));
  }
  return { plugins, problems };
}

/** undefined when the directory has no manifest at all. */
async function readManifest(pluginDir: string): Promise<PluginManifest | PluginLoadError | undefined> {
  const manifestPath = join(pluginDir, MANIFEST_FILE);
  let raw: string;
  try {
    raw = await readFile(manifestPath, "utf-8");
  } catch {
    log.debug({ pluginDir }, "No plugin manifest, skipping directory");
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn({ manifestPath, error: message }, "Failed to parse plugin manifest");
    return new PluginLoadError(pluginDir, "InvalidManifest", [pluginDir], `malformed YAML: ${message}`);
  }

  const result = manifestSchema.safeParse(parsed);
  if (!result.success) {
    log.warn({ manifestPath, errors: result.error.flatten().fieldErrors }, "Plugin manifest validation failed");
    return new PluginLoadError(pluginDir, "InvalidManifest", [pluginDir], formatIssues(result.error));
  }
  return result.data;
}

function fromManifest(manifest: PluginManifest, pluginDir: string): IDiscoveredPlugin {
  const descriptor = freezeDescriptor({
    id: manifest.id,
    name: manifest.name,
    version: manifest.version,
    description: manifest.description,
    dependencies: Object.entries(manifest.dependencies).map(([id, range]) => ({ id, range })),
    capabilities: manifest.capabilities,
  });
  const entryPath = join(pluginDir, manifest.entry);

  return {
    descriptor,
    origin: pluginDir,
    loadFactory: () => importFactory(manifest.id, entryPath),
  };
}

async function importFactory(pluginId: string, entryPath: string): Promise<PluginFactory> {
  let loaded: unknown;
  try {
    loaded = await import(pathToFileURL(entryPath).href);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PluginLoadError(pluginId, "InitializationFailed", [pluginId], `cannot import ${entryPath}: ${message}`);
  }

  const factory = isModuleRecord(loaded) ? loaded["default"] : undefined;
  if (!isPluginFactory(factory)) {
    throw new PluginLoadError(pluginId, "InvalidManifest", [pluginId], `${entryPath} has no default-exported plugin factory`);
  }
  return factory;
}

function isModuleRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isPluginFactory(value: unknown): value is PluginFactory {
  return typeof value === "function";
}

function freezeDescriptor(descriptor: IPluginDescriptor): IPluginDescriptor {
  return Object.freeze({
    ...descriptor,
    dependencies: Object.freeze(descriptor.dependencies.map((dependency) => Object.freeze({ ...dependency }))),
    capabilities: Object.freeze([...descriptor.capabilities]),
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
