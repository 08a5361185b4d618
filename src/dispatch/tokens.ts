import { toMessages, type Prompt } from "../providers/types.js";

/** Projected reply size when a role sets no max_output_tokens. */
export const DEFAULT_OUTPUT_TOKEN_ESTIMATE = 1000;

const PER_MESSAGE_OVERHEAD = 4;
const PER_REQUEST_OVERHEAD = 3;
const TOKENS_PER_WORD = 1.3;

export const estimateTextTokens = (text: string): number => {
  const words = text.split(/\s+/).filter((word) => word.length > 0).length;
  return Math.ceil(words * TOKENS_PER_WORD);
};

export const estimatePromptTokens = (prompt: Prompt): number => {
  const messages = toMessages(prompt);
  const content = messages.reduce((sum, message) => sum + estimateTextTokens(message.content), 0);
  return content + PER_MESSAGE_OVERHEAD * messages.length + PER_REQUEST_OVERHEAD;
};
