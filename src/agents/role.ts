import type { ValidateFunction } from "ajv";

import { formatAjvErrors } from "../config/schema-validation.js";
import type { ResolvedRole } from "../config/types.js";
import { collectJsonCandidates } from "../core/json-extraction.js";
import type { Dispatcher } from "../dispatch/dispatcher.js";
import { withRetry } from "../dispatch/retry.js";
import { MalformedResponseError, RoleFailedError, type AgentRole } from "../engine/errors.js";
import type { EventBus } from "../events/event-bus.js";
import { isTransientProviderError, type Prompt } from "../providers/types.js";
import type { ParseOutcome, RoleReply } from "./types.js";

export type RoleContext = {
  dispatcher: Dispatcher;
  config: ResolvedRole;
  /** Total parse attempts, including the first call. */
  maxParseAttempts: number;
  template: string;
  bus?: EventBus;
  workflowId?: string;
};

/**
 * Validates every JSON candidate in the reply against the role schema and hands the first
 * valid one to `normalize`. Reasons from the first rejected candidate are reported.
 */
export const parseReply = <Raw, T>(
  raw: string,
  schemaName: string,
  validate: ValidateFunction<Raw>,
  normalize: (reply: Raw) => ParseOutcome<T>
): ParseOutcome<T> => {
  const candidates = collectJsonCandidates(raw);
  if (candidates.length === 0) {
    return { ok: false, reasons: ["no JSON object found in reply"] };
  }

  let firstReasons: string[] | null = null;
  for (const candidate of candidates) {
    const outcome: ParseOutcome<T> = validate(candidate)
      ? normalize(candidate)
      : { ok: false, reasons: formatAjvErrors(schemaName, validate.errors) };
    if (outcome.ok) {
      return outcome;
    }
    firstReasons ??= outcome.reasons;
  }
  return { ok: false, reasons: firstReasons ?? [`${schemaName} is invalid`] };
};

/**
 * Calls the model through the dispatcher and parses the reply. A malformed reply is
 * published as `role.rejected` and the same prompt is sent again, up to
 * `maxParseAttempts` calls in total; exhausting them, or exhausting dispatcher retries on
 * a transient failure, raises RoleFailedError. Fatal provider errors propagate as-is.
 */
export const runRole = async <T>(
  role: AgentRole,
  context: RoleContext,
  prompt: Prompt,
  parse: (raw: string) => ParseOutcome<T>
): Promise<RoleReply<T>> => {
  const maxAttempts = Math.max(1, Math.floor(context.maxParseAttempts));
  let attempts = 0;

  try {
    return await withRetry({
      maxAttempts,
      isRetriable: (error) => error instanceof MalformedResponseError,
      operation: async (attempt) => {
        attempts = attempt;
        const result = await context.dispatcher.call({
          provider: context.config.provider,
          model: context.config.model,
          prompt,
          params: {
            temperature: context.config.temperature,
            max_output_tokens: context.config.max_output_tokens,
            max_input_tokens: context.config.max_input_tokens
          },
          role,
          workflowId: context.workflowId
        });

        const outcome = parse(result.text);
        if (!outcome.ok) {
          context.bus?.emit({
            type: "role.rejected",
            payload: {
              workflow_id: context.workflowId,
              role,
              attempt,
              max_attempts: maxAttempts,
              raw_text: result.text,
              reasons: outcome.reasons
            }
          });
          throw new MalformedResponseError(role, result.text, outcome.reasons);
        }

        return {
          value: outcome.value,
          record: {
            attempts: attempt,
            raw_text: result.text,
            provider: result.provider,
            model: result.model
          }
        };
      }
    });
  } catch (error) {
    if (error instanceof MalformedResponseError || isTransientProviderError(error)) {
      throw new RoleFailedError(role, attempts, error);
    }
    throw error;
  }
};
