/**
 * `strata config get [key]`: print effective configuration values.
 */

import { Command } from "commander";
import { ConfigurationManager, unflattenConfig } from "../../core/config-manager.js";
import { buildConfigSources } from "../../core/orchestrator.js";
import { describeError } from "../../types/errors.js";
import { parseGlobalFlags, toStartOptions } from "../flags.js";
import type { ICliContext } from "../program.js";

export function createConfigCommand(context: ICliContext): Command {
  const config = new Command("config")
    .description("Inspect the effective configuration");

  config
    .command("get [key]")
    .description("Print one configuration value, or all of them when no key is given")
    .option("--origin", "Also show which layer each value came from")
    .action((key: string | undefined, options: { origin?: boolean }, command: Command) => {
      try {
        const flags = parseGlobalFlags(command.optsWithGlobals());
        const manager = new ConfigurationManager();
        const snapshot = manager.load(buildConfigSources({ ...toStartOptions(flags), env: context.env }));

        if (key === undefined) {
          context.out(JSON.stringify(unflattenConfig(snapshot.values), null, 2));
          return;
        }
        if (!manager.has(key)) {
          context.err(context.colors.red(`Configuration key not found: ${key}`));
          context.setExitCode(1);
          return;
        }
        const leaf = snapshot.values.get(key);
        const shown = leaf !== undefined ? leaf : manager.get(key, "object");
        const origin = options.origin ? ` (${snapshot.origins.get(key) ?? "section"})` : "";
        context.out(`${key} = ${JSON.stringify(shown)}${origin}`);
      } catch (error: unknown) {
        context.err(context.colors.red(`Failed to read config: ${describeError(error)}`));
        context.setExitCode(1);
      }
    });

  return config;
}
