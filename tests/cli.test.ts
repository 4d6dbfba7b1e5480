import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import pc from "picocolors";
import { FlagError, parseGlobalFlags, parseSetFlag, toStartOptions } from "../src/cli/flags.js";
import { runCli, VERSION } from "../src/cli/program.js";
import type { ICliContext } from "../src/cli/program.js";
import { formatResolution, formatShutdownReport, formatStartupReport } from "../src/cli/report.js";
import type { IStartupReport } from "../src/core/orchestrator.js";
import { PluginLoadError } from "../src/types/errors.js";

const FIXTURES = fileURLToPath(new URL("./fixtures/plugins", import.meta.url));
const plain = pc.createColors(false);

interface ITestContext {
  readonly context: ICliContext;
  readonly out: string[];
  readonly err: string[];
  stops(): number;
}

function createTestContext(): ITestContext {
  const out: string[] = [];
  const err: string[] = [];
  let stops = 0;
  return {
    out,
    err,
    stops: () => stops,
    context: {
      out: (text) => out.push(text),
      err: (text) => err.push(text),
      env: {},
      colors: plain,
      setExitCode: () => undefined,
      waitForStop: () => {
        stops++;
        return Promise.resolve();
      },
    },
  };
}

describe("flags", () => {
  it("applies defaults and normalises the log level", () => {
    expect(parseGlobalFlags({ logLevel: "debug" })).toEqual({
      config: [],
      headless: false,
      logLevel: "DEBUG",
      plugins: [],
      set: [],
    });
  });

  it("rejects an unknown log level", () => {
    expect(() => parseGlobalFlags({ logLevel: "loud" })).toThrow(
      "--log-level must be one of DEBUG, INFO, WARNING, ERROR, CRITICAL",
    );
  });

  it("parses --set entries with environment-style coercion", () => {
    expect(parseSetFlag("ui.window_width=1600")).toEqual(["ui.window_width", 1600]);
    expect(parseSetFlag("ui.theme=dark")).toEqual(["ui.theme", "dark"]);
    expect(parseSetFlag("export.default_path=a=b")).toEqual(["export.default_path", "a=b"]);
    expect(() => parseSetFlag("=dark")).toThrow(FlagError);
    expect(() => parseSetFlag("theme")).toThrow('--set expects key=value, got "theme"');
  });

  it("turns flags into start options", () => {
    expect(
      toStartOptions({
        config: ["a.json"],
        headless: true,
        logLevel: "ERROR",
        plugins: ["/srv/plugins"],
        set: ["ui.theme=dark"],
      }),
    ).toEqual({
      configFiles: ["a.json"],
      overrides: { "ui.theme": "dark", "app.log_level": "ERROR" },
      pluginDirectories: ["/srv/plugins"],
      headless: true,
    });
  });
});

describe("report formatting", () => {
  it("renders the startup report", () => {
    const report: IStartupReport = {
      ok: true,
      configVersion: 2,
      configIssues: [{ kind: "SourceUnreadable", subject: "file:/tmp/a.json", message: "could not be read" }],
      plugins: [
        { pluginId: "ledger", name: "Ledger", version: "1.2.0", state: "active", origin: "inline" },
        {
          pluginId: "reports",
          name: "Reports",
          version: "1.0.0",
          state: "failed",
          origin: "inline",
          reason: "MissingDependency",
          chain: ["reports", "sales"],
          error: "requires sales",
        },
      ],
      discoveryProblems: [],
      elapsedMs: 12,
    };

    expect(formatStartupReport(report, plain).split("\n")).toEqual([
      "Runtime started in 12ms (config v2)",
      "Configuration:",
      "  SourceUnreadable file:/tmp/a.json: could not be read",
      "Plugins:",
      "  ✓ ledger@1.2.0 active",
      "  ✗ reports@1.0.0 MissingDependency [reports -> sales]: requires sales",
    ]);
  });

  it("renders the shutdown report with a grace warning", () => {
    const text = formatShutdownReport(
      {
        stoppedPlugins: ["ledger", "sales"],
        failedPlugins: [],
        drain: { completed: 3, failed: 1, cancelled: 0, withinGrace: false },
        elapsedMs: 7,
      },
      plain,
    );

    expect(text.split("\n")).toEqual([
      "Runtime stopped in 7ms",
      "  plugins: 2 stopped, 0 failed",
      "  tasks: 3 completed, 1 failed, 0 cancelled",
      "  grace period elapsed; remaining tasks were cancelled",
    ]);
  });

  it("renders the load order and unloadable plugins", () => {
    const descriptor = { id: "ledger", name: "Ledger", version: "1.2.0", dependencies: [], capabilities: [] };
    const failure = new PluginLoadError("reports", "MissingDependency", ["reports", "sales"], "requires sales");

    expect(formatResolution({ order: [descriptor], failures: [failure] }, [], plain).split("\n")).toEqual([
      "Load order:",
      "  1. ledger@1.2.0",
      "Not loadable:",
      '  MissingDependency reports [reports -> sales]: Plugin "reports" was not loaded: requires sales',
    ]);
    expect(formatResolution({ order: [], failures: [] }, [], plain)).toBe("No loadable plugins.");
  });
});

describe("runCli", () => {
  let dir: string;
  let configFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "strata-cli-"));
    configFile = join(dir, "config.json");
    writeFileSync(configFile, JSON.stringify({ ui: { theme: "dark" } }));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("prints the version", async () => {
    const { context, out } = createTestContext();
    expect(await runCli(["node", "strata", "--version"], context)).toBe(0);
    expect(out).toEqual([VERSION]);
  });

  it("exits 1 on an unknown option", async () => {
    const { context, err } = createTestContext();
    expect(await runCli(["node", "strata", "--bogus"], context)).toBe(1);
    expect(err[0]).toMatch(/^error: unknown option '--bogus'/);
  });

  describe("runtime", () => {
    it("starts and stops headless with exit code 0", async () => {
      const { context, out, stops } = createTestContext();
      const code = await runCli(
        ["node", "strata", "--headless", "--config", configFile, "--plugins", FIXTURES],
        context,
      );

      expect(code).toBe(0);
      expect(stops()).toBe(0);
      const startup = out[0]?.split("\n") ?? [];
      expect(startup[0]).toMatch(/^Runtime started in \d+ms \(config v1\)$/);
      expect(startup).toContain("  ✓ ledger@1.2.0 active");
      expect(startup).toContain("  ✓ sales@0.3.0 active");
      expect(out[1]?.split("\n")[1]).toBe("  plugins: 2 stopped, 0 failed");
    });

    it("waits for a stop request when not headless", async () => {
      const { context, stops } = createTestContext();
      expect(await runCli(["node", "strata", "--config", configFile], context)).toBe(0);
      expect(stops()).toBe(1);
    });

    it("exits 1 when the configuration is invalid", async () => {
      const { context, out } = createTestContext();
      const code = await runCli(
        ["node", "strata", "--headless", "--config", configFile, "--set", "executor.workers=many"],
        context,
      );

      expect(code).toBe(1);
      expect(out[0]?.split("\n")).toEqual([
        "Startup failed: configuration is invalid",
        "Configuration:",
        '  TypeMismatch executor.workers: Invalid configuration "executor.workers": expected number, got string.',
      ]);
    });

    it("exits 1 on a bad log level", async () => {
      const { context, err } = createTestContext();
      expect(await runCli(["node", "strata", "--headless", "--log-level", "loud"], context)).toBe(1);
      expect(err).toEqual(["Error: --log-level must be one of DEBUG, INFO, WARNING, ERROR, CRITICAL"]);
    });
  });

  describe("config get", () => {
    it("prints a value and its origin", async () => {
      const { context, out } = createTestContext();
      const code = await runCli(
        ["node", "strata", "--config", configFile, "config", "get", "ui.theme", "--origin"],
        context,
      );

      expect(code).toBe(0);
      expect(out).toEqual([`ui.theme = "dark" (file:${configFile})`]);
    });

    it("prints a whole section", async () => {
      const { context, out } = createTestContext();
      await runCli(["node", "strata", "--config", configFile, "--set", "ui.window_width=900", "config", "get", "ui"], context);
      expect(out).toEqual(['ui = {"theme":"dark","window_width":900,"window_height":800}']);
    });

    it("exits 1 for an unknown key", async () => {
      const { context, err } = createTestContext();
      const code = await runCli(["node", "strata", "--config", configFile, "config", "get", "ui.nope"], context);

      expect(code).toBe(1);
      expect(err).toEqual(["Configuration key not found: ui.nope"]);
    });
  });

  describe("plugins list", () => {
    it("prints the load order and the plugins that cannot load", async () => {
      const { context, out } = createTestContext();
      const code = await runCli(
        ["node", "strata", "--config", configFile, "--plugins", FIXTURES, "plugins", "list"],
        context,
      );

      expect(code).toBe(0);
      const lines = out[0]?.split("\n") ?? [];
      expect(lines.slice(0, 4)).toEqual(["Load order:", "  1. ledger@1.2.0", "  2. sales@0.3.0", "Not loadable:"]);
      expect(lines[4]).toMatch(/^ {2}InvalidManifest .*broken-manifest/);
    });
  });
});
