import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Config } from "./config";
import { ConfigError } from "./errors";
import { defaultConfig } from "./defaults";

describe("Config", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "toolbench-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeJson(name: string, value: unknown): Promise<string> {
    const p = path.join(dir, name);
    await writeFile(p, JSON.stringify(value, null, 2), "utf8");
    return p;
  }

  describe("load", () => {
    it("creates the default document when the file is missing", async () => {
      const p = path.join(dir, "nested", "toolbench.config.json");
      const cfg = await Config.load(p);
      expect(cfg.get("llm.providers.openai.model")).toBe("gpt-4");
      expect(cfg.get("security.apiKeyEnvPrefix")).toBe("SEA_");
      expect(existsSync(p)).toBe(true);
      expect(JSON.parse(await readFile(p, "utf8"))).toEqual(defaultConfig());
    });

    it("keeps defaults in memory when createIfMissing is false", async () => {
      const p = path.join(dir, "absent.json");
      const cfg = await Config.load(p, { createIfMissing: false });
      expect(cfg.get("tools.simulation.defaultEngine")).toBe("numpy");
      expect(existsSync(p)).toBe(false);
    });

    it("fails on malformed JSON", async () => {
      const p = path.join(dir, "broken.json");
      await writeFile(p, "{ llm: ", "utf8");
      const loading = Config.load(p);
      await expect(loading).rejects.toBeInstanceOf(ConfigError);
      await expect(loading).rejects.toThrow(`Failed to read configuration ${p}`);
    });

    it("fails on a document that does not match the schema", async () => {
      const p = await writeJson("bad.json", { llm: { providers: { openai: { temperature: "hot" } } } });
      const error = await Config.load(p).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.filePath).toBe(p);
        expect(error.issues).toEqual(["llm.providers.openai.temperature: Expected number, received string"]);
      }
    });

    it("rejects a top-level array", () => {
      expect(() => Config.fromObject([1, 2])).toThrow("expected a JSON object at the top level");
    });

    it("normalizes the log level", async () => {
      const p = await writeJson("levels.json", { logging: { level: "INFO" } });
      const cfg = await Config.load(p);
      expect(cfg.get("logging.level")).toBe("info");
    });

    it("rejects unknown log levels", () => {
      expect(() => Config.fromObject({ logging: { level: "loud" } })).toThrow(
        'logging.level: Unknown log level "loud"'
      );
    });
  });

  describe("get", () => {
    const cfg = Config.fromObject({
      llm: { defaultProvider: "openai" },
      tools: { code_analysis: { defaultLanguage: "python", baseline: null } },
      extra: { enabled: false },
    });

    it("reads dotted paths", () => {
      expect(cfg.get("llm.defaultProvider")).toBe("openai");
      expect(cfg.get("tools.code_analysis")).toEqual({ defaultLanguage: "python", baseline: null });
    });

    it("keeps unknown sections", () => {
      expect(cfg.get("extra.enabled")).toBe(false);
    });

    it("returns undefined or the default for missing keys", () => {
      expect(cfg.get("llm.providers")).toBeUndefined();
      expect(cfg.get("llm.providers", {})).toEqual({});
      expect(cfg.get("llm.defaultProvider.name", "n/a")).toBe("n/a");
    });

    it("treats stored null as absent", () => {
      expect(cfg.get("tools.code_analysis.baseline", "none")).toBe("none");
      expect(cfg.has("tools.code_analysis.baseline")).toBe(false);
    });
  });

  describe("environment expansion", () => {
    it("expands variables with defaults", () => {
      const cfg = Config.fromObject(
        { llm: { providers: { openai: { model: "${TB_MODEL:-gpt-4o}", apiKey: "${TB_KEY}" } } } },
        { env: { TB_KEY: "test-secret" } }
      );
      expect(cfg.get("llm.providers.openai.model")).toBe("gpt-4o");
      expect(cfg.get("llm.providers.openai.apiKey")).toBe("test-secret");
    });

    it("leaves unknown variables untouched", () => {
      const cfg = Config.fromObject({ llm: { defaultProvider: "${TB_UNSET}" } }, { env: {} });
      expect(cfg.get("llm.defaultProvider")).toBe("${TB_UNSET}");
    });

    it("fails when a required variable is missing", () => {
      expect(() =>
        Config.fromObject({ llm: { providers: { openai: { apiKey: "${TB_KEY:?TB_KEY is required}" } } } }, { env: {} })
      ).toThrow(ConfigError);
    });
  });

  describe("set", () => {
    it("persists and re-validates", async () => {
      const p = await writeJson("cfg.json", { logging: { level: "info" } });
      const cfg = await Config.load(p);
      await cfg.set("tools.code_analysis.lintingRules", "relaxed");
      expect(cfg.get("tools.code_analysis.lintingRules")).toBe("relaxed");

      const reloaded = await Config.load(p);
      expect(reloaded.get("tools.code_analysis.lintingRules")).toBe("relaxed");
    });

    it("leaves the document unchanged when the result is invalid", async () => {
      const p = await writeJson("cfg.json", { llm: { providers: { openai: { temperature: 0.7 } } } });
      const cfg = await Config.load(p);
      await expect(cfg.set("llm.providers.openai.temperature", 5)).rejects.toBeInstanceOf(ConfigError);
      expect(cfg.get("llm.providers.openai.temperature")).toBe(0.7);
      expect(JSON.parse(await readFile(p, "utf8"))).toEqual({ llm: { providers: { openai: { temperature: 0.7 } } } });
    });

    it("writes the unexpanded document", async () => {
      const p = await writeJson("cfg.json", { llm: { defaultProvider: "${TB_PROVIDER:-openai}" } });
      const cfg = await Config.load(p, { env: {} });
      await cfg.set("logging.enabled", false);
      expect(cfg.get("llm.defaultProvider")).toBe("openai");
      expect(JSON.parse(await readFile(p, "utf8"))).toEqual({
        llm: { defaultProvider: "${TB_PROVIDER:-openai}" },
        logging: { enabled: false },
      });
    });

    it("refuses paths that reach the object prototype", async () => {
      const cfg = Config.fromObject({});
      await expect(cfg.set("__proto__.polluted", "yes")).rejects.toBeInstanceOf(ConfigError);
      await expect(cfg.set("tools.constructor.polluted", "yes")).rejects.toThrow(
        'Invalid path: "tools.constructor.polluted" (segment "constructor" is not allowed)'
      );
      const fresh: Record<string, unknown> = {};
      expect(fresh.polluted).toBeUndefined();
      expect(cfg.get("tools")).toBeUndefined();
    });

    it("keeps in-memory configs in memory", async () => {
      const cfg = Config.fromObject({});
      await cfg.set("security.encryptionEnabled", true);
      expect(cfg.filePath).toBeUndefined();
      expect(cfg.get("security.encryptionEnabled")).toBe(true);
    });
  });

  it("toJSON returns a copy", () => {
    const cfg = Config.fromObject({ tools: { simulation: { precision: "double" } } });
    const copy = cfg.toJSON();
    copy.tools = {};
    expect(cfg.get("tools.simulation.precision")).toBe("double");
  });
});
