import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { DEFAULT_DISPATCH, DEFAULT_WORKFLOW } from "../config/defaults.js";
import { loadConfig, resolveConfig } from "../config/resolve-config.js";
import { ConfigError } from "../engine/errors.js";
import { getAssetRoot } from "../utils/asset-root.js";
import { sha256Hex } from "../utils/hash.js";

const baseConfig = (overrides: { workflow?: unknown; prompts?: unknown } = {}) => ({
  ...overrides,
  providers: {
    openai: { type: "openai_compatible", api_key_env: "OPENAI_API_KEY" },
    local: { type: "ollama" }
  },
  roles: {
    analyzer: { provider: "openai", model: "gpt-test", temperature: 0 },
    corrector: { provider: "openai", model: "gpt-test" },
    writer: { provider: "local", model: "llama-test" }
  }
});

const tempDirs: string[] = [];

const makeTempDir = (): string => {
  const dir = mkdtempSync(join(tmpdir(), "reqloop-config-"));
  tempDirs.push(dir);
  return dir;
};

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe("resolveConfig", () => {
  it("fills defaults and reads the key from the environment", () => {
    const config = resolveConfig(baseConfig(), { env: { OPENAI_API_KEY: " test-secret " } });

    expect(config.providers.openai).toMatchObject({
      id: "openai",
      baseUrl: "https://api.openai.com/v1",
      apiKey: "test-secret",
      timeoutMs: 120_000,
      rateLimits: { requests_per_minute: 60, input_tokens_per_minute: 100_000, output_tokens_per_minute: 50_000 },
      pricing: null
    });
    expect(config.providers.local?.apiKey).toBeNull();
    expect(config.providers.local?.baseUrl).toBe("http://127.0.0.1:11434");
    expect(config.roles.analyzer).toEqual({ role: "analyzer", provider: "openai", model: "gpt-test", temperature: 0 });
    expect(config.workflow).toEqual(DEFAULT_WORKFLOW);
    expect(config.dispatch).toEqual(DEFAULT_DISPATCH);
    expect(config.prompts.writer.sha256).toBe(sha256Hex(Buffer.from(config.prompts.writer.text, "utf8")));
    expect(config.prompts.writer.path.endsWith(join("prompts", "writer.md"))).toBe(true);
  });

  it("applies workflow overrides over the file values", () => {
    const config = resolveConfig(baseConfig({ workflow: { max_iterations: 2, include_history: false } }), {
      env: { OPENAI_API_KEY: "test-secret" },
      workflowOverrides: { max_iterations: 7 }
    });

    expect(config.workflow).toEqual({ ...DEFAULT_WORKFLOW, max_iterations: 7, include_history: false });
  });

  it("refuses a keyed provider whose key variable is unset", () => {
    expect(() => resolveConfig(baseConfig(), { env: {} })).toThrow(
      "Provider openai (openai_compatible) requires an API key: environment variable OPENAI_API_KEY is not set"
    );
  });

  it("refuses a role that names an unknown provider", () => {
    const raw = baseConfig();
    const roles = { ...raw.roles, writer: { provider: "missing", model: "x" } };

    expect(() => resolveConfig({ ...raw, roles }, { env: { OPENAI_API_KEY: "test-secret" } })).toThrow(
      "Role writer references unknown provider missing"
    );
  });

  it("reports schema errors with their instance path", () => {
    const raw = baseConfig();
    const roles = { ...raw.roles, analyzer: { provider: "openai", model: "gpt-test", temperature: 1.5 } };

    const attempt = () => resolveConfig({ ...raw, roles }, { env: { OPENAI_API_KEY: "test-secret" } });
    expect(attempt).toThrow(ConfigError);
    expect(attempt).toThrow("config/roles/analyzer/temperature: must be <= 1");
  });

  it("resolves prompt overrides against the base directory", () => {
    const dir = makeTempDir();
    writeFileSync(join(dir, "custom-analyzer.md"), "Analyze carefully.", "utf8");

    const config = resolveConfig(baseConfig({ prompts: { analyzer: "custom-analyzer.md" } }), {
      baseDir: dir,
      env: { OPENAI_API_KEY: "test-secret" }
    });

    expect(config.prompts.analyzer.path).toBe(join(dir, "custom-analyzer.md"));
    expect(config.prompts.analyzer.text).toBe("Analyze carefully.");
    expect(config.prompts.analyzer.sha256).toBe(sha256Hex(Buffer.from("Analyze carefully.", "utf8")));
  });

  it("fails when a prompt override does not exist", () => {
    const dir = makeTempDir();

    expect(() =>
      resolveConfig(baseConfig({ prompts: { corrector: "nope.md" } }), {
        baseDir: dir,
        env: { OPENAI_API_KEY: "test-secret" }
      })
    ).toThrow(`Prompt template for corrector not found: ${join(dir, "nope.md")}`);
  });
});

describe("loadConfig", () => {
  it("fails on a missing file", () => {
    const dir = makeTempDir();
    const path = join(dir, "reqloop.config.json");

    expect(() => loadConfig(path)).toThrow(`Config file not found: ${path}`);
  });

  it("fails on invalid JSON", () => {
    const dir = makeTempDir();
    const path = join(dir, "reqloop.config.json");
    writeFileSync(path, "{ not json", "utf8");

    expect(() => loadConfig(path)).toThrow(`Config ${path} is not valid JSON`);
  });

  it("loads a file with an inline key", () => {
    const dir = makeTempDir();
    const path = join(dir, "reqloop.config.json");
    const raw = baseConfig();
    writeFileSync(
      path,
      JSON.stringify({ ...raw, providers: { ...raw.providers, openai: { type: "openai_compatible", api_key: "test-secret" } } }),
      "utf8"
    );

    const config = loadConfig(path, { env: {} });

    expect(config.providers.openai?.apiKey).toBe("test-secret");
  });
});

describe("bundled starter config", () => {
  it("validates once both keys are present", () => {
    const config = loadConfig(join(getAssetRoot(), "templates", "default.config.json"), {
      env: { OPENAI_API_KEY: "test-secret", ANTHROPIC_API_KEY: "test-secret" }
    });

    expect(config.roles.corrector.provider).toBe("anthropic");
    expect(config.providers.anthropic?.baseUrl).toBe("https://api.anthropic.com/v1");
  });
});
