/**
 * Lenient parser for the Round-2 assessment
 *
 * Models wrap JSON in fences, prepend reasoning or slip on syntax. Recovery
 * goes strict parse, then fence strip and first balanced object, then
 * jsonrepair. Whatever comes out must still pass the schema; an answer that
 * does not is a failure, never a zero-score success.
 *
 * @module correction/assessment-parser
 */

import { z } from 'zod';
import { jsonrepair } from 'jsonrepair';
import type { CorrectionAssessment } from '../../models/correction.js';

const lowercased = (value: unknown): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

export const CorrectionAssessmentSchema = z.object({
  quality_score: z.number().min(1).max(100).transform((n) => Math.round(n)),
  improvement_level: z.preprocess(
    lowercased,
    z.enum(['minimal', 'moderate', 'significant', 'substantial'])
  ),
  major_corrections: z.array(z.string()).default([]),
  confidence: z.preprocess(lowercased, z.enum(['low', 'medium', 'high'])),
  needs_review: z.boolean(),
});

export type AssessmentParseResult =
  | { ok: true; value: CorrectionAssessment; raw: string }
  | { ok: false; error: string; raw: string };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Slice the first `{...}` whose braces balance, ignoring braces inside
 * double-quoted strings. Null when the object never closes.
 */
function firstBalancedObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * Recover a JSON value from near-valid model output
 */
export function recoverJson(raw: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    // fall through to recovery
  }

  const clean = raw.replace(/```(?:json)?\s*\n?|\n?```/gi, '').trim();
  const firstBrace = clean.indexOf('{');
  const candidate = firstBalancedObject(clean) ?? (firstBrace !== -1 ? clean.slice(firstBrace) : clean);

  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch {
    // fall through to repair
  }

  try {
    return { ok: true, value: JSON.parse(jsonrepair(candidate)) };
  } catch (error) {
    return { ok: false, error: `unrecoverable JSON: ${errorMessage(error)}` };
  }
}

export function parseAssessment(raw: string): AssessmentParseResult {
  if (raw.trim().length === 0) {
    return { ok: false, error: 'empty assessment response', raw };
  }

  const recovered = recoverJson(raw);
  if (!recovered.ok) {
    return { ok: false, error: recovered.error, raw };
  }

  const parsed = CorrectionAssessmentSchema.safeParse(recovered.value);
  if (!parsed.success) {
    const detail = parsed.error.errors
      .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('; ');
    return { ok: false, error: `assessment failed validation: ${detail}`, raw };
  }
  return { ok: true, value: parsed.data, raw };
}
