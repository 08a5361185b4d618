import type { ResolvedProvider } from "../config/types.js";
import { AnthropicAdapter } from "./anthropic.js";
import { ScriptedAdapter } from "./mock.js";
import { OllamaAdapter } from "./ollama.js";
import { OpenAICompatibleAdapter } from "./openai-compatible.js";
import type { ProviderAdapter, ProviderType } from "./types.js";

const requireKey = (provider: ResolvedProvider): string => {
  if (!provider.apiKey) {
    throw new Error(`Provider ${provider.id} (${provider.type}) requires an API key`);
  }
  return provider.apiKey;
};

type AdapterBuilder = (provider: ResolvedProvider, model: string) => ProviderAdapter;

const BUILDERS: Record<ProviderType, AdapterBuilder> = {
  openai_compatible: (provider, model) =>
    new OpenAICompatibleAdapter({
      id: provider.id,
      model,
      baseUrl: provider.baseUrl,
      apiKey: requireKey(provider),
      timeoutMs: provider.timeoutMs,
      extraHeaders: provider.headers
    }),
  anthropic: (provider, model) =>
    new AnthropicAdapter({
      id: provider.id,
      model,
      baseUrl: provider.baseUrl,
      apiKey: requireKey(provider),
      timeoutMs: provider.timeoutMs
    }),
  ollama: (provider, model) =>
    new OllamaAdapter({
      id: provider.id,
      model,
      baseUrl: provider.baseUrl,
      timeoutMs: provider.timeoutMs
    }),
  mock: (provider, model) => new ScriptedAdapter(provider.id, provider.responses, model)
};

/** Provider types that cannot be used without credentials. */
export const KEYED_PROVIDER_TYPES: ReadonlySet<ProviderType> = new Set<ProviderType>([
  "openai_compatible",
  "anthropic"
]);

export const DEFAULT_BASE_URLS: Record<ProviderType, string> = {
  openai_compatible: "https://api.openai.com/v1",
  anthropic: "https://api.anthropic.com/v1",
  ollama: "http://127.0.0.1:11434",
  mock: "mock://local"
};

export const createProviderAdapter = (provider: ResolvedProvider, model: string): ProviderAdapter =>
  BUILDERS[provider.type](provider, model);
