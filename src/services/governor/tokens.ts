/**
 * Token estimation for billed LLM calls
 *
 * Uses the gpt-tokenizer encoder as a proxy for the provider's tokenizer.
 * The buffer ratio absorbs the difference between tokenizers.
 *
 * @module governor/tokens
 */

import { encode } from 'gpt-tokenizer';

/**
 * Count tokens in a string
 */
export function countTokens(text: string): number {
  if (!text) return 0;
  return encode(text).length;
}

/**
 * Estimate the tokens a round will bill: the prompt, the page text, and an
 * output about as long as the text again, plus a safety buffer.
 *
 * estimate = ceil((tokens(prompt) + 2 * tokens(text)) * (1 + bufferRatio))
 */
export function estimateTokens(prompt: string, text: string, bufferRatio: number): number {
  return Math.ceil((countTokens(prompt) + 2 * countTokens(text)) * (1 + bufferRatio));
}
