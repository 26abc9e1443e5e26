/**
 * Local OCR quality detector
 *
 * Deterministic and free: runs before any paid remote call. Hard signals
 * mean the text is unusable and force a rescan; soft signals only mark an
 * otherwise readable page as a correction candidate.
 *
 * @module quality/detector
 */

export type HardSignal =
  | 'EMPTY_TEXT'
  | 'TOO_SHORT'
  | 'DEGENERATE_PATTERN'
  | 'ZERO_DOMINATED'
  | 'CORRUPT_CHARACTERS'
  | 'INSUFFICIENT_CONTENT'
  | 'LOW_ALPHA_RATIO'
  | 'REPEATED_CHARACTER'
  | 'KEYBOARD_MASH'
  | 'SHORT_WORDS';

export type SoftSignal = 'ARTIFACT_CHARACTERS' | 'EXCESSIVE_SPECIAL_CHARACTERS';

export interface DetectorOptions {
  /** Trimmed texts shorter than this are unusable (default 10) */
  minTextLength: number;
}

export interface LocalCheck {
  hard: HardSignal[];
  soft: SoftSignal[];
  passed: boolean;
  /** How sure the detector is that a failing text is unusable, 0-1 */
  confidence: number;
}

/** Confidence that each hard signal means an OCR failure */
const SIGNAL_CONFIDENCE: Record<HardSignal, number> = {
  EMPTY_TEXT: 1.0,
  TOO_SHORT: 1.0,
  DEGENERATE_PATTERN: 1.0,
  ZERO_DOMINATED: 0.9,
  CORRUPT_CHARACTERS: 0.9,
  INSUFFICIENT_CONTENT: 1.0,
  LOW_ALPHA_RATIO: 0.8,
  REPEATED_CHARACTER: 0.7,
  KEYBOARD_MASH: 0.9,
  SHORT_WORDS: 0.6,
};

/** Confidence reported for a text that passes every hard check */
const PASS_CONFIDENCE = 0.8;

const ARTIFACT_CHARACTERS = new Set(['\\', '{', '}', '|', '~', '`', '^', '[', ']', '␦']);
const ARTIFACT_TOKEN = 'JFIF';

// Stuck keys and keyboard rows
const MASH_PATTERNS = ['qqqq', 'wwww', 'eeee', 'rrrr', 'tttt', 'yyyy', 'asdf', 'qwer', 'zxcv'];

const LETTER = /\p{L}/u;
const ALPHANUMERIC = /[\p{L}\p{N}]/u;
const WHITESPACE = /\s/;

const CORRUPT_RATIO = 0.1;
const MIN_ALPHANUMERIC = 10;
const MIN_ALPHA_RATIO = 0.3;
const REPEATED_RATIO = 0.4;
const REPEATED_MIN_CHARS = 10;
const ZERO_WORD_RATIO = 0.7;
const MIN_AVG_WORD_LENGTH = 2;
const SHORT_WORDS_MIN_WORDS = 5;
const SPECIAL_RATIO = 0.2;

export const DEFAULT_DETECTOR_OPTIONS: DetectorOptions = { minTextLength: 10 };

function countArtifacts(text: string): number {
  let count = 0;
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    const isControl = code < 32 && ch !== '\n' && ch !== '\r' && ch !== '\t';
    if (isControl || ARTIFACT_CHARACTERS.has(ch)) {
      count++;
    }
  }
  return count + text.split(ARTIFACT_TOKEN).length - 1;
}

/**
 * Run every local check against a raw OCR text
 */
export function detectLocalSignals(
  rawText: string,
  options: DetectorOptions = DEFAULT_DETECTOR_OPTIONS
): LocalCheck {
  const text = rawText.trim();
  if (text === '') {
    return { hard: ['EMPTY_TEXT'], soft: [], passed: false, confidence: 1.0 };
  }

  const hard: HardSignal[] = [];
  const soft: SoftSignal[] = [];
  const chars = Array.from(text);
  const words = text.split(/\s+/);

  if (chars.length < options.minTextLength) {
    hard.push('TOO_SHORT');
  }

  if (!LETTER.test(text)) {
    hard.push('DEGENERATE_PATTERN');
  }

  if (words.length > 3) {
    const zeroWords = words.filter((w) => /^0+$/.test(w)).length;
    if (zeroWords / words.length > ZERO_WORD_RATIO) {
      hard.push('ZERO_DOMINATED');
    }
  }

  const artifacts = countArtifacts(text);
  if (artifacts > chars.length * CORRUPT_RATIO) {
    hard.push('CORRUPT_CHARACTERS');
  } else if (artifacts > 0) {
    soft.push('ARTIFACT_CHARACTERS');
  }

  const alphanumeric = chars.filter((c) => ALPHANUMERIC.test(c)).length;
  if (alphanumeric < MIN_ALPHANUMERIC) {
    hard.push('INSUFFICIENT_CONTENT');
  }

  const nonSpace = chars.filter((c) => !WHITESPACE.test(c));
  const letters = nonSpace.filter((c) => LETTER.test(c)).length;
  if (nonSpace.length > 0 && letters / nonSpace.length < MIN_ALPHA_RATIO) {
    hard.push('LOW_ALPHA_RATIO');
  }

  if (nonSpace.length >= REPEATED_MIN_CHARS) {
    const counts = new Map<string, number>();
    for (const c of nonSpace) {
      counts.set(c, (counts.get(c) ?? 0) + 1);
    }
    const maxCount = Math.max(...counts.values());
    if (maxCount / nonSpace.length > REPEATED_RATIO) {
      hard.push('REPEATED_CHARACTER');
    }
  }

  const lower = text.toLowerCase();
  if (MASH_PATTERNS.some((p) => lower.includes(p))) {
    hard.push('KEYBOARD_MASH');
  }

  if (words.length >= SHORT_WORDS_MIN_WORDS) {
    const avg = words.reduce((sum, w) => sum + Array.from(w).length, 0) / words.length;
    if (avg < MIN_AVG_WORD_LENGTH) {
      hard.push('SHORT_WORDS');
    }
  }

  const special = chars.filter((c) => !ALPHANUMERIC.test(c) && !WHITESPACE.test(c)).length;
  if (special / chars.length > SPECIAL_RATIO) {
    soft.push('EXCESSIVE_SPECIAL_CHARACTERS');
  }

  const passed = hard.length === 0;
  return {
    hard,
    soft: passed ? soft : [],
    passed,
    confidence: passed ? PASS_CONFIDENCE : Math.max(...hard.map((s) => SIGNAL_CONFIDENCE[s])),
  };
}
