/**
 * Global CLI flag definitions and their translation into start options.
 */

import { z } from "zod";
import { CLI_LOG_LEVELS } from "../utils/logger.js";
import type { CliLogLevel } from "../utils/logger.js";
import { coerceEnvValue } from "../core/config-manager.js";
import { StrataError } from "../types/index.js";
import type { ConfigValue } from "../types/index.js";
import type { IStartOptions } from "../core/orchestrator.js";

export interface IGlobalFlags {
  readonly config: readonly string[];
  readonly headless: boolean;
  readonly logLevel?: CliLogLevel | undefined;
  readonly plugins: readonly string[];
  readonly set: readonly string[];
}

/** Commander's raw option bag, validated before use. */
const rawFlagsSchema = z.object({
  config: z.array(z.string()).default([]),
  headless: z.boolean().default(false),
  logLevel: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(CLI_LOG_LEVELS))
    .optional(),
  plugins: z.array(z.string()).default([]),
  set: z.array(z.string()).default([]),
});

export class FlagError extends StrataError {
  readonly code = "STRATA_CLI_FLAG_001" as const;
  readonly userMessage: string;

  constructor(message: string) {
    super(message);
    this.userMessage = message;
  }
}

/** Accumulator for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parseGlobalFlags(raw: unknown): IGlobalFlags {
  const result = rawFlagsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".") ?? "flags";
    throw new FlagError(
      field === "logLevel"
        ? `--log-level must be one of ${CLI_LOG_LEVELS.join(", ")}`
        : `Invalid --${field}: ${issue?.message ?? "unrecognised value"}`,
    );
  }
  return result.data;
}

/** `key=value` → [key, value]; values are coerced like environment variables. */
export function parseSetFlag(raw: string): [string, ConfigValue] {
  const separator = raw.indexOf("=");
  const key = separator === -1 ? "" : raw.slice(0, separator).trim();
  if (key.length === 0) {
    throw new FlagError(`--set expects key=value, got "${raw}"`);
  }
  return [key, coerceEnvValue(raw.slice(separator + 1))];
}

export function toStartOptions(flags: IGlobalFlags): IStartOptions {
  const overrides: Record<string, ConfigValue> = {};
  for (const entry of flags.set) {
    const [key, value] = parseSetFlag(entry);
    overrides[key] = value;
  }
  if (flags.logLevel !== undefined) {
    overrides["app.log_level"] = flags.logLevel;
  }

  return {
    configFiles: flags.config,
    overrides,
    pluginDirectories: flags.plugins,
    headless: flags.headless,
  };
}
