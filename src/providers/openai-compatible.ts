import { asRecord, buildUsage, invalidResponse, postJson } from "./http.js";
import {
  toMessages,
  type GenerateOptions,
  type GenerateResult,
  type Prompt,
  type ProviderAdapter,
  type SamplingParams
} from "./types.js";

export type OpenAICompatibleOptions = {
  id: string;
  model: string;
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  extraHeaders?: Record<string, string>;
};

export const extractAssistantText = (responseBody: unknown): string | null => {
  const body = asRecord(responseBody);
  const choices = body?.choices;
  if (!Array.isArray(choices) || choices.length === 0) {
    return null;
  }
  const message = asRecord(asRecord(choices[0])?.message);
  const content = message?.content;
  if (typeof content === "string") {
    return content;
  }
  if (Array.isArray(content)) {
    return content
      .map((part) => {
        const text = asRecord(part)?.text;
        return typeof text === "string" ? text : "";
      })
      .join("");
  }
  return null;
};

/**
 * Chat-completions backends: OpenAI, OpenRouter, DeepSeek, Qwen and Gemini's
 * OpenAI-compatible endpoint all accept this payload.
 */
export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly type = "openai_compatible" as const;
  readonly id: string;
  readonly model: string;
  private readonly options: OpenAICompatibleOptions;

  constructor(options: OpenAICompatibleOptions) {
    this.id = options.id;
    this.model = options.model;
    this.options = options;
  }

  async generate(
    prompt: Prompt,
    params: SamplingParams,
    options: GenerateOptions = {}
  ): Promise<GenerateResult> {
    const payload: Record<string, unknown> = {
      model: this.model,
      messages: toMessages(prompt)
    };
    if (params.temperature !== undefined) payload.temperature = params.temperature;
    if (params.max_output_tokens !== undefined) payload.max_tokens = params.max_output_tokens;

    const response = await postJson("/chat/completions", payload, {
      provider: this.id,
      baseUrl: this.options.baseUrl,
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        ...(this.options.extraHeaders ?? {})
      },
      timeoutMs: this.options.timeoutMs,
      signal: options.signal
    });

    const text = extractAssistantText(response.responseBody);
    if (text === null) {
      throw invalidResponse(this.id, `${this.id} response has no assistant message`, response);
    }
    const body = asRecord(response.responseBody);
    const usage = asRecord(body?.usage);
    const model = body?.model;
    return {
      text,
      model: typeof model === "string" ? model : null,
      usage: usage ? buildUsage(usage.prompt_tokens, usage.completion_tokens, usage.total_tokens) : null,
      latencyMs: response.latencyMs
    };
  }
}
