/**
 * Shared token estimation utility.
 *
 * A flat 4 characters per token. Only monotonicity in text length matters to
 * callers; budgets are compared against this estimate, never a real tokenizer.
 */

export const CHARS_PER_TOKEN = 4;

/**
 * Estimate token count from a string.
 */
export function estimateTokenCount(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Character budget that corresponds to a token target.
 */
export function tokensToChars(tokens: number): number {
  return tokens * CHARS_PER_TOKEN;
}
