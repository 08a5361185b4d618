import {
  ProviderError,
  type GenerateResult,
  type Prompt,
  type ProviderAdapter,
  type SamplingParams
} from "./types.js";

export type ScriptedReply = string | ProviderError | ((prompt: Prompt) => string);

/**
 * Replays a fixed script of replies in order. Errors in the script are thrown as-is,
 * so transient and fatal paths can be exercised offline.
 */
export class ScriptedAdapter implements ProviderAdapter {
  readonly type = "mock" as const;
  readonly id: string;
  readonly model: string;
  readonly prompts: Prompt[] = [];
  readonly params: SamplingParams[] = [];
  private readonly script: ScriptedReply[];
  private readonly fallback?: (prompt: Prompt) => string;
  private cursor = 0;

  /** `fallback` answers every call made after the script runs out. */
  constructor(
    id: string,
    script: ScriptedReply[],
    model = "scripted",
    fallback?: (prompt: Prompt) => string
  ) {
    this.id = id;
    this.model = model;
    this.script = [...script];
    this.fallback = fallback;
  }

  get calls(): number {
    return this.prompts.length;
  }

  get remaining(): number {
    return this.script.length - this.cursor;
  }

  async generate(prompt: Prompt, params: SamplingParams): Promise<GenerateResult> {
    this.prompts.push(prompt);
    this.params.push(params);
    const next = this.script[this.cursor];
    if (next === undefined && this.fallback) {
      return { text: this.fallback(prompt), model: this.model, usage: null, latencyMs: 0 };
    }
    if (next === undefined) {
      throw new ProviderError(`${this.id} script exhausted after ${this.cursor} replies`, {
        kind: "fatal",
        provider: this.id,
        code: "script_exhausted"
      });
    }
    this.cursor += 1;
    if (next instanceof ProviderError) {
      throw next;
    }
    const text = typeof next === "function" ? next(prompt) : next;
    return { text, model: this.model, usage: null, latencyMs: 0 };
  }
}
