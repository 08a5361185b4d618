import { asRecord, buildUsage, invalidResponse, postJson, stringOrNull } from "./http.js";
import type {
  GenerateOptions,
  GenerateResult,
  Prompt,
  ProviderAdapter,
  SamplingParams
} from "./types.js";

const ANTHROPIC_VERSION = "2023-06-01";
const DEFAULT_MAX_TOKENS = 4096;

export type AnthropicOptions = {
  id: string;
  model: string;
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
};

export class AnthropicAdapter implements ProviderAdapter {
  readonly type = "anthropic" as const;
  readonly id: string;
  readonly model: string;
  private readonly options: AnthropicOptions;

  constructor(options: AnthropicOptions) {
    this.id = options.id;
    this.model = options.model;
    this.options = options;
  }

  async generate(
    prompt: Prompt,
    params: SamplingParams,
    options: GenerateOptions = {}
  ): Promise<GenerateResult> {
    // The messages API requires max_tokens on every request.
    const payload: Record<string, unknown> = {
      model: this.model,
      max_tokens: params.max_output_tokens ?? DEFAULT_MAX_TOKENS,
      messages: [{ role: "user", content: prompt.user }]
    };
    if (prompt.system.trim().length > 0) payload.system = prompt.system;
    if (params.temperature !== undefined) payload.temperature = params.temperature;

    const response = await postJson("/messages", payload, {
      provider: this.id,
      baseUrl: this.options.baseUrl,
      headers: {
        "x-api-key": this.options.apiKey,
        "anthropic-version": ANTHROPIC_VERSION
      },
      timeoutMs: this.options.timeoutMs,
      signal: options.signal
    });

    const body = asRecord(response.responseBody);
    const content = body?.content;
    if (!Array.isArray(content)) {
      throw invalidResponse(this.id, `${this.id} response has no content blocks`, response);
    }
    const text = content
      .map((block) => {
        const record = asRecord(block);
        const text = record?.text;
        return record?.type === "text" && typeof text === "string" ? text : "";
      })
      .join("");
    const usage = asRecord(body?.usage);

    return {
      text,
      model: stringOrNull(body?.model),
      usage: usage ? buildUsage(usage.input_tokens, usage.output_tokens) : null,
      latencyMs: response.latencyMs
    };
  }
}
