import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { Orchestrator, buildConfigSources, buildPluginSources } from "../src/core/orchestrator.js";
import type { IStartOptions } from "../src/core/orchestrator.js";
import { ConfigurationManager } from "../src/core/config-manager.js";
import { EventPriority } from "../src/types/events.js";
import type { IEventEnvelope } from "../src/types/events.js";
import { RuntimeNotStartedError, ServiceNotFoundError } from "../src/types/errors.js";
import { DEFAULT_CONFIG } from "../src/types/config.js";
import type { IConfigDiff } from "../src/types/config.js";
import type { IPluginCapabilities, IPluginDescriptor, IPluginModule } from "../src/types/plugin.js";

const FIXTURES = fileURLToPath(new URL("./fixtures/plugins", import.meta.url));

function inlinePlugin(id: string, onInit: (capabilities: IPluginCapabilities) => void): IPluginModule {
  const descriptor: IPluginDescriptor = { id, name: id, version: "1.0.0", dependencies: [], capabilities: [] };
  return {
    descriptor,
    factory: () => ({
      descriptor: () => descriptor,
      initialize: onInit,
      shutdown: () => undefined,
    }),
  };
}

describe("Orchestrator", () => {
  let dir: string;
  let configFile: string;
  let orchestrator: Orchestrator;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "strata-orchestrator-"));
    configFile = join(dir, "config.json");
    writeFileSync(configFile, JSON.stringify({ app: { name: "Strata test" } }));
    orchestrator = new Orchestrator();
  });

  afterEach(async () => {
    await orchestrator.shutdown();
    rmSync(dir, { recursive: true, force: true });
  });

  function options(extra: IStartOptions = {}): IStartOptions {
    return { configFiles: [configFile], env: {}, headless: true, ...extra };
  }

  describe("start", () => {
    it("loads config, discovers plugins and reports their state", async () => {
      const report = await orchestrator.start(options({
        pluginDirectories: [FIXTURES],
        inlinePlugins: [inlinePlugin("clock", () => undefined)],
      }));

      expect(report.ok).toBe(true);
      expect(report.configVersion).toBe(1);
      expect(report.configIssues).toEqual([]);
      expect(report.plugins.map((status) => [status.pluginId, status.state])).toEqual([
        ["clock", "active"],
        ["ledger", "active"],
        ["sales", "active"],
      ]);
      expect(report.discoveryProblems.map((problem) => problem.reason)).toEqual(["InvalidManifest"]);
      expect(orchestrator.config.get("app.name", "string")).toBe("Strata test");
      expect(orchestrator.isRunning).toBe(true);
    });

    it("fails startup on invalid configuration without starting anything", async () => {
      const report = await orchestrator.start(options({ overrides: { executor: { workers: "many" } } }));

      expect(report.ok).toBe(false);
      expect(report.plugins).toEqual([]);
      expect(report.configIssues).toEqual([
        {
          kind: "TypeMismatch",
          subject: "executor.workers",
          message: 'Invalid configuration "executor.workers": expected number, got string.',
        },
      ]);
      expect(() => orchestrator.events).toThrow(RuntimeNotStartedError);
      expect(orchestrator.isRunning).toBe(false);
    });

    it("reports an unreadable config file but still starts", async () => {
      const broken = join(dir, "broken.json");
      writeFileSync(broken, "{");
      const report = await orchestrator.start(options({ configFiles: [configFile, broken] }));

      expect(report.ok).toBe(true);
      expect(report.configIssues.map((issue) => [issue.kind, issue.subject])).toEqual([
        ["SourceUnreadable", `file:${broken}`],
      ]);
    });

    it("registers UI contributions only when not headless", async () => {
      await orchestrator.start(options({ pluginDirectories: [FIXTURES], headless: false }));
      expect(orchestrator.services.has("sales.ui.dashboard")).toBe(true);
    });
  });

  describe("running", () => {
    it("routes a dispatched command through plugins to a registered service", async () => {
      await orchestrator.start(options({ pluginDirectories: [FIXTURES] }));

      orchestrator.dispatchCommand("record-sale", { amount: 5 });
      expect(orchestrator.resolveService("ledger.store")).toEqual({ entries: [{ amount: 5 }] });
    });

    it("publishes commands at High priority without doubling the prefix", async () => {
      await orchestrator.start(options());
      const seen: IEventEnvelope[] = [];
      orchestrator.events.subscribe("command.*", (envelope) => {
        seen.push(envelope);
      });

      orchestrator.dispatchCommand("refresh", null);
      orchestrator.dispatchCommand("command.export", null, { priority: EventPriority.Low });

      expect(seen.map((envelope) => [envelope.topic, envelope.priority])).toEqual([
        ["command.refresh", EventPriority.High],
        ["command.export", EventPriority.Low],
      ]);
    });

    it("throws for a service nobody provides", async () => {
      await orchestrator.start(options());
      expect(() => orchestrator.resolveService("missing")).toThrow(ServiceNotFoundError);
      expect(orchestrator.tryResolveService("missing")).toBeUndefined();
    });

    it("delivers config.changed to plugins after a reload", async () => {
      const diffs: IConfigDiff[] = [];
      await orchestrator.start(options({
        inlinePlugins: [
          inlinePlugin("watcher", (capabilities) => {
            capabilities.events.subscribe<IConfigDiff>("config.changed", (envelope) => {
              diffs.push(envelope.payload);
            });
          }),
        ],
      }));

      orchestrator.config.setOverride("ui.theme", "dark");
      orchestrator.config.reload();

      expect(diffs).toHaveLength(1);
      expect(diffs[0]?.changed).toEqual(["ui.theme"]);
    });
  });

  describe("shutdown", () => {
    it("stops every active plugin and closes the bus", async () => {
      await orchestrator.start(options({ pluginDirectories: [FIXTURES] }));

      const first = orchestrator.shutdown();
      const second = orchestrator.shutdown();
      expect(second).toBe(first);

      const report = await first;
      expect(report.stoppedPlugins).toEqual(["ledger", "sales"]);
      expect(report.failedPlugins).toEqual([]);
      expect(report.drain.withinGrace).toBe(true);
      expect(orchestrator.isRunning).toBe(false);
      expect(orchestrator.services.size).toBe(0);
    });

    it("cancels background work still running after the grace period", async () => {
      await orchestrator.start(options({
        overrides: { orchestrator: { shutdown_grace_ms: 20 } },
        inlinePlugins: [
          inlinePlugin("poller", (capabilities) => {
            capabilities.tasks.submit(
              (context) =>
                new Promise<void>((resolve) => {
                  context.signal.addEventListener("abort", () => resolve());
                }),
            );
          }),
        ],
      }));

      const report = await orchestrator.shutdown();
      expect(report.drain).toEqual({ completed: 0, failed: 0, cancelled: 1, withinGrace: false });
    });

    it("returns an empty report when never started", async () => {
      const report = await orchestrator.shutdown();
      expect(report).toEqual({
        stoppedPlugins: [],
        failedPlugins: [],
        drain: { completed: 0, failed: 0, cancelled: 0, withinGrace: true },
        elapsedMs: 0,
      });
    });
  });
});

describe("start option helpers", () => {
  it("layers defaults, files, env and overrides in that order", () => {
    const sources = buildConfigSources({
      configFiles: ["/etc/strata/a.json", "/etc/strata/b.yaml"],
      env: { APP_UI_THEME: "dark" },
      overrides: { ui: { theme: "light" } },
    });

    expect(sources.map((source) => source.kind)).toEqual(["defaults", "file", "file", "env", "overrides"]);
    expect(sources[1]).toEqual({ kind: "file", path: "/etc/strata/a.json" });
  });

  it("falls back to an optional user config file", () => {
    const [, file] = buildConfigSources({ env: {} });
    expect(file).toMatchObject({ kind: "file", optional: true });
  });

  it("lists inline plugins before configured and extra directories", () => {
    const config = new ConfigurationManager();
    config.load([
      { kind: "defaults", values: DEFAULT_CONFIG },
      { kind: "overrides", values: { plugins: { paths: ["/opt/strata/plugins"] } } },
    ]);
    const clock = inlinePlugin("clock", () => undefined);

    expect(buildPluginSources(config, { inlinePlugins: [clock], pluginDirectories: ["/srv/plugins"] })).toEqual([
      { kind: "inline", modules: [clock] },
      { kind: "directory", path: "/opt/strata/plugins" },
      { kind: "directory", path: "/srv/plugins" },
    ]);
  });
});
