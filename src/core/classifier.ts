/**
 * Classifier: matches message text against a pattern snapshot.
 *
 * Pure and synchronous: same text + same snapshot → same result.
 * Well-formed text never fails; it falls back to a plain statement.
 */

import type { ActivePatternSet, Classification, CompiledPattern, EngineConfig, Sentiment } from '../types/index.js';
import { InvalidInputError, ok, err, type Result } from './errors.js';

export type ClassifierOptions = Pick<
  EngineConfig,
  'confidenceFloor' | 'keywordBonus' | 'maxMessageLength' | 'urgencyWords' | 'positiveWords' | 'negativeWords'
>;

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;
const EXCLAMATION_RUN = /!{2,}/;
/** Two or more all-caps words in a row, ending in '!' ("HELP NOW!", not "HI!") */
const SHOUTED_PHRASE = /(?<![\p{L}\p{N}])\p{Lu}{2,}(?:\s+\p{Lu}{2,})+!/u;
const MENTION = /@\w|\bcc:/i;

const decoder = new TextDecoder('utf-8', { fatal: true });

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word, case-insensitive matcher for a keyword or lexicon entry */
export function wordMatcher(word: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(word)}(?![\\p{L}\\p{N}_])`, 'iu');
}

// Lexicon words from config only; pattern keywords carry their own matchers
const matcherCache = new Map<string, RegExp>();

function containsWord(text: string, word: string): boolean {
  let matcher = matcherCache.get(word);
  if (!matcher) {
    matcher = wordMatcher(word);
    matcherCache.set(word, matcher);
  }
  return matcher.test(text);
}

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Turn raw input into text, or explain why it is not text.
 * Nothing is trimmed or truncated.
 */
export function normaliseInput(input: unknown, maxLength: number): Result<string, InvalidInputError> {
  let text: string;

  if (typeof input === 'string') {
    text = input;
  } else if (input instanceof Uint8Array) {
    try {
      text = decoder.decode(input);
    } catch {
      return err(new InvalidInputError('Message bytes are not valid UTF-8'));
    }
  } else {
    return err(new InvalidInputError('Message must be text', { received: input === null ? 'null' : typeof input }));
  }

  if (text.trim().length === 0) {
    return err(new InvalidInputError('Message is empty'));
  }
  if (text.length > maxLength) {
    return err(new InvalidInputError(`Message exceeds ${maxLength} characters`, { length: text.length, maxLength }));
  }
  if (LONE_SURROGATE.test(text)) {
    return err(new InvalidInputError('Message contains malformed characters'));
  }

  return ok(text);
}

/**
 * Confidence of one pattern against the text, or null if the trigger
 * does not match. Each keyword found adds the bonus; capped at 1.
 */
export function scorePattern(
  text: string,
  pattern: CompiledPattern,
  keywordBonus: number
): { confidence: number; keywords: string[] } | null {
  if (!pattern.regex.test(text)) return null;

  const keywords = pattern.keywordMatchers
    .filter(({ regex }) => regex.test(text))
    .map(({ keyword }) => keyword);
  const confidence = Math.min(1, pattern.baseConfidence + keywords.length * keywordBonus);

  return { confidence: round(confidence), keywords };
}

export function detectUrgency(text: string, urgencyWords: readonly string[]): boolean {
  if (EXCLAMATION_RUN.test(text) || SHOUTED_PHRASE.test(text)) return true;
  return urgencyWords.some(word => containsWord(text, word));
}

/** Lexicon count; a tie (including 0-0) is neutral */
export function detectSentiment(
  text: string,
  positiveWords: readonly string[],
  negativeWords: readonly string[]
): Sentiment {
  const positive = positiveWords.filter(word => containsWord(text, word)).length;
  const negative = negativeWords.filter(word => containsWord(text, word)).length;

  if (positive > negative) return 'positive';
  if (negative > positive) return 'negative';
  return 'neutral';
}

export function classify(
  input: unknown,
  snapshot: ActivePatternSet,
  options: ClassifierOptions
): Result<Classification, InvalidInputError> {
  const normalised = normaliseInput(input, options.maxMessageLength);
  if (!normalised.ok) return normalised;
  const text = normalised.value;

  let best: { pattern: CompiledPattern; confidence: number; keywords: string[] } | null = null;

  // Snapshot order decides ties: strictly greater replaces
  for (const pattern of snapshot.patterns) {
    if (!pattern.enabled) continue;

    const score = scorePattern(text, pattern, options.keywordBonus);
    if (score && (!best || score.confidence > best.confidence)) {
      best = { pattern, ...score };
    }
  }

  const base = {
    rawText: text,
    hasUrgencyMarkers: detectUrgency(text, options.urgencyWords),
    hasMentions: MENTION.test(text),
    sentiment: detectSentiment(text, options.positiveWords, options.negativeWords),
    snapshotVersion: snapshot.version,
  };

  if (!best || best.confidence < options.confidenceFloor) {
    const unmatched: Classification = {
      ...base,
      detectedType: 'statement',
      confidence: options.confidenceFloor,
      matchedKeywords: [],
    };
    return ok(unmatched);
  }

  const matched: Classification = {
    ...base,
    detectedType: best.pattern.messageType,
    confidence: best.confidence,
    matchedPatternId: best.pattern.id,
    matchedKeywords: best.keywords,
  };
  return ok(matched);
}
