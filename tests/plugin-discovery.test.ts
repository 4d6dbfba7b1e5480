import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { discoverPlugins } from "../src/core/plugin-discovery.js";
import { PluginLoadError } from "../src/types/errors.js";
import type { IPlugin, IPluginModule } from "../src/types/plugin.js";

const FIXTURES = fileURLToPath(new URL("./fixtures/plugins", import.meta.url));
const EXTRA_FIXTURES = fileURLToPath(new URL("./fixtures/plugins-extra", import.meta.url));

function inlineModule(id: string, version = "1.0.0"): IPluginModule {
  const descriptor = { id, name: id, version, dependencies: [], capabilities: [] };
  const plugin: IPlugin = {
    descriptor: () => descriptor,
    initialize: () => undefined,
    shutdown: () => undefined,
  };
  return { descriptor, factory: () => plugin };
}

describe("discoverPlugins", () => {
  describe("directory sources", () => {
    it("reads manifests from sub-directories in name order", async () => {
      const { plugins } = await discoverPlugins([{ kind: "directory", path: FIXTURES }]);

      expect(plugins.map((plugin) => plugin.descriptor.id)).toEqual(["ledger", "sales"]);
      expect(plugins.map((plugin) => plugin.origin)).toEqual([join(FIXTURES, "ledger"), join(FIXTURES, "sales")]);
    });

    it("builds descriptors from the manifest", async () => {
      const { plugins } = await discoverPlugins([{ kind: "directory", path: FIXTURES }]);
      const sales = plugins.find((plugin) => plugin.descriptor.id === "sales");

      expect(sales?.descriptor).toEqual({
        id: "sales",
        name: "Sales",
        version: "0.3.0",
        description: undefined,
        dependencies: [{ id: "ledger", range: "^1.0.0" }],
        capabilities: ["ui"],
      });
      expect(Object.isFrozen(sales?.descriptor)).toBe(true);
    });

    it("reports an invalid manifest without stopping the scan", async () => {
      const { problems } = await discoverPlugins([{ kind: "directory", path: FIXTURES }]);
      const brokenDir = join(FIXTURES, "broken-manifest");

      expect(problems).toHaveLength(1);
      expect(problems[0]?.reason).toBe("InvalidManifest");
      expect(problems[0]?.pluginId).toBe(brokenDir);
      expect(problems[0]?.userMessage).toBe(
        `Plugin "${brokenDir}" was not loaded: version: Version must be semver (e.g. 1.0.0)`,
      );
    });

    it("imports the entry module only through loadFactory", async () => {
      const { plugins } = await discoverPlugins([{ kind: "directory", path: FIXTURES }]);
      const ledger = plugins.find((plugin) => plugin.descriptor.id === "ledger");
      expect(ledger).toBeDefined();
      if (!ledger) return;

      const factory = await ledger.loadFactory();
      const plugin = await factory();
      expect(plugin.descriptor().id).toBe("ledger");
    });

    it("rejects an entry module without a default-exported factory", async () => {
      const { plugins } = await discoverPlugins([{ kind: "directory", path: EXTRA_FIXTURES }]);
      const noFactory = plugins.find((plugin) => plugin.descriptor.id === "no-factory");
      expect(noFactory).toBeDefined();
      if (!noFactory) return;

      await expect(noFactory.loadFactory()).rejects.toBeInstanceOf(PluginLoadError);
      await expect(noFactory.loadFactory()).rejects.toMatchObject({ reason: "InvalidManifest" });
    });

    it("keeps the first plugin when two directories provide the same id", async () => {
      const { plugins, problems } = await discoverPlugins([
        { kind: "directory", path: FIXTURES },
        { kind: "directory", path: EXTRA_FIXTURES },
      ]);

      expect(plugins.map((plugin) => plugin.descriptor.id)).toEqual(["ledger", "sales", "no-factory"]);
      const duplicate = problems.find((problem) => problem.reason === "DuplicatePlugin");
      expect(duplicate?.pluginId).toBe("ledger");
      expect(duplicate?.message).toBe(
        `Plugin ledger failed (DuplicatePlugin): already provided by ${join(FIXTURES, "ledger")}, ignoring ${join(EXTRA_FIXTURES, "ledger-copy")}`,
      );
    });

    it("treats a missing directory as empty", async () => {
      const result = await discoverPlugins([{ kind: "directory", path: join(FIXTURES, "does-not-exist") }]);
      expect(result).toEqual({ plugins: [], problems: [] });
    });
  });

  describe("filters", () => {
    it("keeps only enabled plugins when an allow-list is given", async () => {
      const { plugins } = await discoverPlugins([{ kind: "directory", path: FIXTURES }], { enabled: ["sales"] });
      expect(plugins.map((plugin) => plugin.descriptor.id)).toEqual(["sales"]);
    });

    it("drops disabled plugins", async () => {
      const { plugins } = await discoverPlugins([{ kind: "directory", path: FIXTURES }], { disabled: ["sales"] });
      expect(plugins.map((plugin) => plugin.descriptor.id)).toEqual(["ledger"]);
    });
  });

  describe("inline sources", () => {
    it("accepts modules supplied in code", async () => {
      const clock = inlineModule("clock");
      const { plugins } = await discoverPlugins([{ kind: "inline", modules: [clock] }]);

      expect(plugins).toHaveLength(1);
      expect(plugins[0]?.origin).toBe("inline");
      expect(await plugins[0]?.loadFactory()).toBe(clock.factory);
    });

    it("rejects an inline descriptor that fails validation", async () => {
      const { plugins, problems } = await discoverPlugins([
        { kind: "inline", modules: [inlineModule("clock", "latest"), inlineModule("timer")] },
      ]);

      expect(plugins.map((plugin) => plugin.descriptor.id)).toEqual(["timer"]);
      expect(problems.map((problem) => [problem.pluginId, problem.reason])).toEqual([["clock", "InvalidManifest"]]);
    });
  });
});
