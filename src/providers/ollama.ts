import { asRecord, buildUsage, invalidResponse, postJson, stringOrNull } from "./http.js";
import {
  toMessages,
  type GenerateOptions,
  type GenerateResult,
  type Prompt,
  type ProviderAdapter,
  type SamplingParams
} from "./types.js";

export type OllamaOptions = {
  id: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
};

/** Local inference through an Ollama daemon; no credentials. */
export class OllamaAdapter implements ProviderAdapter {
  readonly type = "ollama" as const;
  readonly id: string;
  readonly model: string;
  private readonly options: OllamaOptions;

  constructor(options: OllamaOptions) {
    this.id = options.id;
    this.model = options.model;
    this.options = options;
  }

  async generate(
    prompt: Prompt,
    params: SamplingParams,
    options: GenerateOptions = {}
  ): Promise<GenerateResult> {
    const modelOptions: Record<string, number> = {};
    if (params.temperature !== undefined) modelOptions.temperature = params.temperature;
    if (params.max_output_tokens !== undefined) modelOptions.num_predict = params.max_output_tokens;
    if (params.max_input_tokens !== undefined) modelOptions.num_ctx = params.max_input_tokens;

    const response = await postJson(
      "/api/chat",
      {
        model: this.model,
        messages: toMessages(prompt),
        stream: false,
        options: modelOptions
      },
      {
        provider: this.id,
        baseUrl: this.options.baseUrl,
        headers: {},
        timeoutMs: this.options.timeoutMs,
        signal: options.signal
      }
    );

    const body = asRecord(response.responseBody);
    const content = asRecord(body?.message)?.content;
    if (typeof content !== "string") {
      throw invalidResponse(this.id, `${this.id} response has no message content`, response);
    }
    return {
      text: content,
      model: stringOrNull(body?.model),
      usage: buildUsage(body?.prompt_eval_count, body?.eval_count),
      latencyMs: response.latencyMs
    };
  }
}
