/**
 * `strata plugins list`: discover and resolve plugins without running them.
 */

import { Command } from "commander";
import { ConfigurationManager } from "../../core/config-manager.js";
import { resolveDependencies } from "../../core/dependency-resolver.js";
import { buildConfigSources, buildDiscoveryFilter, buildPluginSources } from "../../core/orchestrator.js";
import { discoverPlugins } from "../../core/plugin-discovery.js";
import { describeError } from "../../types/errors.js";
import { parseGlobalFlags, toStartOptions } from "../flags.js";
import type { ICliContext } from "../program.js";
import { formatResolution } from "../report.js";

export function createPluginsCommand(context: ICliContext): Command {
  const plugins = new Command("plugins")
    .description("Inspect installed plugins");

  plugins
    .command("list")
    .description("Show the resolved load order and any plugins that cannot load")
    .action(async (_options: unknown, command: Command) => {
      try {
        const flags = parseGlobalFlags(command.optsWithGlobals());
        const startOptions = { ...toStartOptions(flags), env: context.env };
        const config = new ConfigurationManager();
        config.load(buildConfigSources(startOptions));

        const discovery = await discoverPlugins(
          buildPluginSources(config, startOptions),
          buildDiscoveryFilter(config),
        );
        const resolution = resolveDependencies(discovery.plugins.map((plugin) => plugin.descriptor));
        context.out(formatResolution(resolution, discovery.problems, context.colors));
      } catch (error: unknown) {
        context.err(context.colors.red(`Failed to list plugins: ${describeError(error)}`));
        context.setExitCode(1);
      }
    });

  return plugins;
}
