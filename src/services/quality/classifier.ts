/**
 * Remote binary quality classifier
 *
 * Asks the LLM whether a page's OCR is usable. Only an exact ACCEPTABLE
 * answer passes; an ambiguous answer, an error, a timeout or an open
 * circuit all count as a failure. Rate limits are handed to the governor
 * and defer the page instead.
 *
 * @module quality/classifier
 */

import type { LlmCompletion } from '../llm/client.js';
import { RateLimitError } from '../llm/errors.js';
import type { CostGovernor } from '../governor/governor.js';

export type ClassifierRejection = 'CLASSIFIER_REJECTED' | 'CLASSIFIER_UNAVAILABLE';

export type DeferReason = 'daily_limit' | 'budget_exceeded' | 'rate_limited';

export type ClassifierOutcome =
  | { kind: 'acceptable' }
  | { kind: 'rejected'; reason: ClassifierRejection }
  | { kind: 'deferred'; reason: DeferReason };

export function buildClassifierPrompt(documentType: string): string {
  return [
    `You are checking OCR output extracted from one scanned page of a ${documentType}.`,
    'Decide whether the text is a usable reading of the page or a catastrophic OCR failure',
    '(gibberish, symbols, repeated characters, image noise, or text unrelated to a document).',
    'Minor typos and spacing errors are still ACCEPTABLE.',
    'Answer with exactly one word: ACCEPTABLE or CATASTROPHIC_FAILURE.',
  ].join('\n');
}

/**
 * Reduce an answer to its bare label; anything else is ambiguous
 */
export function parseClassifierAnswer(answer: string): 'ACCEPTABLE' | 'CATASTROPHIC_FAILURE' | null {
  const label = answer
    .trim()
    .replace(/^["'`*\s]+|["'`*.!\s]+$/g, '')
    .toUpperCase()
    .replace(/\s+/g, '_');
  if (label === 'ACCEPTABLE' || label === 'CATASTROPHIC_FAILURE') {
    return label;
  }
  return null;
}

export class RemoteClassifier {
  private readonly prompt: string;

  constructor(
    private readonly llm: LlmCompletion,
    private readonly governor: CostGovernor,
    documentType: string
  ) {
    this.prompt = buildClassifierPrompt(documentType);
  }

  async classify(pageId: string, text: string): Promise<ClassifierOutcome> {
    const preflight = this.governor.preflight(this.prompt, text, pageId);
    if (!preflight.ok) {
      return { kind: 'deferred', reason: this.governor.signal.reason ?? 'budget_exceeded' };
    }

    let answer: string;
    try {
      const result = await this.llm.complete({
        messages: [
          { role: 'system', content: this.prompt },
          { role: 'user', content: text },
        ],
        temperature: 0,
        maxTokens: 10,
        estimatedTokens: preflight.estimatedTokens,
      });
      this.governor.recordCall(pageId, 'classify', result, preflight.estimatedTokens);
      answer = result.text;
    } catch (error) {
      if (error instanceof RateLimitError) {
        const action = this.governor.handleRateLimit(error, { pageId });
        return { kind: 'deferred', reason: action === 'stop_all' ? 'daily_limit' : 'rate_limited' };
      }
      console.error(
        `[Assessor] Classifier unavailable for page ${pageId}, treating as failure: ${error instanceof Error ? error.message : String(error)}`
      );
      return { kind: 'rejected', reason: 'CLASSIFIER_UNAVAILABLE' };
    }

    const label = parseClassifierAnswer(answer);
    if (label === 'ACCEPTABLE') {
      return { kind: 'acceptable' };
    }
    if (label === null) {
      console.error(
        `[Assessor] Ambiguous classifier answer for page ${pageId}: ${JSON.stringify(answer.slice(0, 80))}`
      );
    }
    return { kind: 'rejected', reason: 'CLASSIFIER_REJECTED' };
  }
}
