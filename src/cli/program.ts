/**
 * Commander program for the `strata` binary.
 *
 * The default action starts the runtime and prints the startup report. In
 * headless mode it shuts down straight away; otherwise it stays up until
 * SIGINT/SIGTERM. Exit code 0 on a clean shutdown, 1 on a fatal startup
 * failure or a bad flag.
 */

import { Command, CommanderError } from "commander";
import pc from "picocolors";
import { Orchestrator } from "../core/orchestrator.js";
import { describeError } from "../types/errors.js";
import { CLI_LOG_LEVELS, createLogger, setLogLevel } from "../utils/logger.js";
import { collect, parseGlobalFlags, toStartOptions } from "./flags.js";
import { createConfigCommand } from "./commands/config.js";
import { createPluginsCommand } from "./commands/plugins.js";
import { formatShutdownReport, formatStartupReport } from "./report.js";
import type { Colors } from "./report.js";

const log = createLogger("cli");

export const VERSION = "0.1.0";

export interface ICliContext {
  out(text: string): void;
  err(text: string): void;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly colors: Colors;
  setExitCode(code: number): void;
  /** Resolves when the process is asked to stop. */
  waitForStop(): Promise<void>;
}

export function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    const stop = (): void => {
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
      resolve();
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
  });
}

export function createProcessContext(): ICliContext {
  return {
    out: (text) => process.stdout.write(`${text}\n`),
    err: (text) => process.stderr.write(`${text}\n`),
    env: process.env,
    colors: pc,
    setExitCode: (code) => {
      process.exitCode = code;
    },
    waitForStop: waitForSignal,
  };
}

export function createProgram(context: ICliContext): Command {
  const program = new Command()
    .name("strata")
    .description("Plugin runtime: loads plugins, wires them to the event bus and runs their background work")
    .version(VERSION, "-v, --version")
    .option("--config <path>", "Add a configuration file layer (repeatable; later files win)", collect, [])
    .option("--headless", "Run without UI contributions and exit after startup")
    .option("--log-level <level>", `Log level (${CLI_LOG_LEVELS.join(", ")})`)
    .option("--plugins <dir>", "Also load plugins from this directory (repeatable)", collect, [])
    .option("--set <key=value>", "Override a configuration key (repeatable)", collect, [])
    .exitOverride()
    .configureOutput({
      writeOut: (text) => context.out(text.trimEnd()),
      writeErr: (text) => context.err(text.trimEnd()),
    });

  program.addCommand(createConfigCommand(context));
  program.addCommand(createPluginsCommand(context));
  for (const command of program.commands) {
    inheritSettings(command, program);
  }

  program.action(async (rawOptions: unknown) => {
    context.setExitCode(await runRuntime(rawOptions, context));
  });

  return program;
}

/** Subcommands added with addCommand() do not pick up exitOverride/configureOutput on their own. */
function inheritSettings(command: Command, parent: Command): void {
  command.copyInheritedSettings(parent);
  for (const child of command.commands) {
    inheritSettings(child, command);
  }
}

async function runRuntime(rawOptions: unknown, context: ICliContext): Promise<number> {
  let orchestrator: Orchestrator | undefined;
  try {
    const flags = parseGlobalFlags(rawOptions);
    if (flags.logLevel !== undefined) {
      setLogLevel(flags.logLevel);
    }

    orchestrator = new Orchestrator();
    const report = await orchestrator.start({ ...toStartOptions(flags), env: context.env });
    context.out(formatStartupReport(report, context.colors));
    if (!report.ok) {
      return 1;
    }

    if (!flags.headless) {
      log.info("Running; press Ctrl+C to stop");
      await context.waitForStop();
    }

    const shutdown = await orchestrator.shutdown();
    context.out(formatShutdownReport(shutdown, context.colors));
    return 0;
  } catch (error: unknown) {
    log.error({ error: error instanceof Error ? error.message : String(error) }, "Runtime failed");
    context.err(context.colors.red(`Error: ${describeError(error)}`));
    if (orchestrator) {
      await orchestrator.shutdown();
    }
    return 1;
  }
}

/** Parse argv (including the node and script entries) and return the exit code. */
export async function runCli(argv: readonly string[], context: ICliContext): Promise<number> {
  let exitCode = 0;
  const tracked: ICliContext = {
    ...context,
    setExitCode: (code) => {
      exitCode = code;
    },
  };

  try {
    await createProgram(tracked).parseAsync([...argv]);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    context.err(context.colors.red(`Error: ${describeError(error)}`));
    return 1;
  }
  return exitCode;
}
