/**
 * Plain-text rendering of runtime reports for the terminal.
 */

import pc from "picocolors";
import type { IShutdownReport, IStartupReport } from "../core/orchestrator.js";
import type { IPluginStatus } from "../core/plugin-manager.js";
import type { IResolution } from "../core/dependency-resolver.js";
import type { PluginLoadError } from "../types/errors.js";

export type Colors = ReturnType<typeof pc.createColors>;

function statusLine(status: IPluginStatus, colors: Colors): string {
  const label = `${status.pluginId}@${status.version}`;
  if (status.state === "failed") {
    const chain = status.chain && status.chain.length > 1 ? ` [${status.chain.join(" -> ")}]` : "";
    return `  ${colors.red("✗")} ${label} ${colors.red(status.reason ?? "failed")}${chain}: ${status.error ?? ""}`;
  }
  const mark = status.state === "active" ? colors.green("✓") : colors.yellow("•");
  return `  ${mark} ${label} ${colors.dim(status.state)}`;
}

export function formatStartupReport(report: IStartupReport, colors: Colors = pc): string {
  const lines: string[] = [];
  lines.push(
    report.ok
      ? colors.bold(`Runtime started in ${report.elapsedMs}ms (config v${report.configVersion})`)
      : colors.red(colors.bold("Startup failed: configuration is invalid")),
  );

  if (report.configIssues.length > 0) {
    lines.push("Configuration:");
    for (const issue of report.configIssues) {
      lines.push(`  ${colors.yellow(issue.kind)} ${issue.subject}: ${issue.message}`);
    }
  }

  if (report.plugins.length > 0) {
    lines.push("Plugins:");
    lines.push(...report.plugins.map((status) => statusLine(status, colors)));
  }

  if (report.discoveryProblems.length > 0) {
    lines.push("Discovery problems:");
    for (const problem of report.discoveryProblems) {
      lines.push(`  ${colors.yellow(problem.reason)} ${problem.pluginId}: ${problem.message}`);
    }
  }
  return lines.join("\n");
}

export function formatShutdownReport(report: IShutdownReport, colors: Colors = pc): string {
  const { drain } = report;
  const lines = [
    colors.bold(`Runtime stopped in ${report.elapsedMs}ms`),
    `  plugins: ${report.stoppedPlugins.length} stopped, ${report.failedPlugins.length} failed`,
    `  tasks: ${drain.completed} completed, ${drain.failed} failed, ${drain.cancelled} cancelled`,
  ];
  if (!drain.withinGrace) {
    lines.push(colors.yellow("  grace period elapsed; remaining tasks were cancelled"));
  }
  return lines.join("\n");
}

/** Output of `plugins list`: the load order, then every failure with its chain. */
export function formatResolution(
  resolution: IResolution,
  problems: readonly PluginLoadError[],
  colors: Colors = pc,
): string {
  const lines: string[] = [];
  if (resolution.order.length === 0) {
    lines.push(colors.dim("No loadable plugins."));
  } else {
    lines.push("Load order:");
    resolution.order.forEach((descriptor, index) => {
      lines.push(`  ${index + 1}. ${descriptor.id}@${descriptor.version}`);
    });
  }

  const failures = [...problems, ...resolution.failures];
  if (failures.length > 0) {
    lines.push("Not loadable:");
    for (const failure of failures) {
      lines.push(`  ${colors.red(failure.reason)} ${failure.pluginId} [${failure.chain.join(" -> ")}]: ${failure.userMessage}`);
    }
  }
  return lines.join("\n");
}
