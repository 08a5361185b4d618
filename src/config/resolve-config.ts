import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { DEFAULT_BASE_URLS, KEYED_PROVIDER_TYPES } from "../providers/factory.js";
import { getAssetRoot } from "../utils/asset-root.js";
import { sha256Hex } from "../utils/hash.js";
import { ConfigError } from "../engine/errors.js";
import {
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_DISPATCH,
  DEFAULT_PROVIDER_TIMEOUT_MS,
  DEFAULT_RATE_LIMITS,
  DEFAULT_WORKFLOW
} from "./defaults.js";
import { formatAjvErrors, validateConfig } from "./schema-validation.js";
import type {
  ProviderConfig,
  ReqloopConfig,
  ResolvedConfig,
  ResolvedPrompt,
  ResolvedProvider,
  ResolvedRole,
  RoleName,
  WorkflowConfig
} from "./types.js";

export interface ResolveConfigOptions {
  /** Directory that relative prompt paths are resolved against. */
  baseDir?: string;
  env?: Record<string, string | undefined>;
  workflowOverrides?: WorkflowConfig;
}

const readJsonFile = (path: string): unknown => {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Unable to read config ${path}: ${message}`);
  }
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config ${path} is not valid JSON: ${message}`);
  }
};

const resolveApiKey = (
  id: string,
  provider: ProviderConfig,
  env: Record<string, string | undefined>
): string | null => {
  if (provider.api_key) {
    return provider.api_key;
  }
  if (provider.api_key_env) {
    const fromEnv = env[provider.api_key_env]?.trim();
    if (fromEnv) {
      return fromEnv;
    }
  }
  if (KEYED_PROVIDER_TYPES.has(provider.type)) {
    const source = provider.api_key_env
      ? `environment variable ${provider.api_key_env} is not set`
      : "set api_key or api_key_env";
    throw new ConfigError(`Provider ${id} (${provider.type}) requires an API key: ${source}`);
  }
  return null;
};

const resolveProvider = (
  id: string,
  provider: ProviderConfig,
  env: Record<string, string | undefined>
): ResolvedProvider => ({
  id,
  type: provider.type,
  baseUrl: provider.base_url ?? DEFAULT_BASE_URLS[provider.type],
  apiKey: resolveApiKey(id, provider, env),
  timeoutMs: provider.timeout_ms ?? DEFAULT_PROVIDER_TIMEOUT_MS,
  rateLimits: {
    requests_per_minute: provider.rate_limits?.requests_per_minute ?? DEFAULT_RATE_LIMITS.requests_per_minute,
    input_tokens_per_minute:
      provider.rate_limits?.input_tokens_per_minute ?? DEFAULT_RATE_LIMITS.input_tokens_per_minute,
    output_tokens_per_minute:
      provider.rate_limits?.output_tokens_per_minute ?? DEFAULT_RATE_LIMITS.output_tokens_per_minute
  },
  pricing: provider.pricing ?? null,
  responses: provider.responses ?? [],
  headers: provider.headers ?? {}
});

const resolvePrompt = (role: RoleName, override: string | undefined, baseDir: string): ResolvedPrompt => {
  const path = override ? resolve(baseDir, override) : resolve(getAssetRoot(), "prompts", `${role}.md`);
  if (!existsSync(path)) {
    throw new ConfigError(`Prompt template for ${role} not found: ${path}`);
  }
  const buffer = readFileSync(path);
  return { role, path, sha256: sha256Hex(buffer), text: buffer.toString("utf8") };
};

/**
 * Validates a parsed config document and fills every default. Fails before any provider
 * is contacted when a keyed provider has no key or a role names an unknown provider.
 */
export const resolveConfig = (raw: unknown, options: ResolveConfigOptions = {}): ResolvedConfig => {
  if (!validateConfig(raw)) {
    const formatted = formatAjvErrors("config", validateConfig.errors);
    throw new ConfigError(formatted.length > 0 ? formatted.join("\n") : "config is invalid");
  }
  const config: ReqloopConfig = raw;
  const env = options.env ?? process.env;
  const baseDir = options.baseDir ?? process.cwd();

  const providers: Record<string, ResolvedProvider> = {};
  for (const [id, provider] of Object.entries(config.providers)) {
    providers[id] = resolveProvider(id, provider, env);
  }

  const resolveRole = (role: RoleName): ResolvedRole => {
    const entry = config.roles[role];
    if (!providers[entry.provider]) {
      throw new ConfigError(`Role ${role} references unknown provider ${entry.provider}`);
    }
    return { role, ...entry };
  };

  return {
    providers,
    roles: {
      analyzer: resolveRole("analyzer"),
      corrector: resolveRole("corrector"),
      writer: resolveRole("writer")
    },
    workflow: { ...DEFAULT_WORKFLOW, ...config.workflow, ...options.workflowOverrides },
    dispatch: { ...DEFAULT_DISPATCH, ...config.dispatch },
    prompts: {
      analyzer: resolvePrompt("analyzer", config.prompts?.analyzer, baseDir),
      corrector: resolvePrompt("corrector", config.prompts?.corrector, baseDir),
      writer: resolvePrompt("writer", config.prompts?.writer, baseDir)
    }
  };
};

export const loadConfig = (
  configPath: string = DEFAULT_CONFIG_FILENAME,
  options: Omit<ResolveConfigOptions, "baseDir"> = {}
): ResolvedConfig => {
  const absolute = resolve(configPath);
  if (!existsSync(absolute)) {
    throw new ConfigError(`Config file not found: ${absolute}`);
  }
  return resolveConfig(readJsonFile(absolute), { ...options, baseDir: dirname(absolute) });
};
