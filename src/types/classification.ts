/**
 * Classification and decision types.
 *
 * A Classification is derived once per inbound message.
 * The decision engine turns it into a DecisionResult:
 * answer now, or defer to the external generator.
 */

import type { MessageType, Priority } from './pattern.js';

export type Sentiment = 'positive' | 'neutral' | 'negative';

export interface Classification {
  rawText: string;
  detectedType: MessageType;
  /** 0-1 */
  confidence: number;
  matchedPatternId?: string;
  hasUrgencyMarkers: boolean;
  /** `@someone` or `cc:` in the text */
  hasMentions: boolean;
  sentiment: Sentiment;
  /** Keywords of the matched pattern that appear in the text */
  matchedKeywords: readonly string[];
  /** Snapshot the classification was computed against */
  snapshotVersion: number;
}

/** Who produced a message in a conversation */
export type MessageOrigin = 'user' | 'automatic' | 'external';

export type DecisionReason =
  | 'pattern_matched'
  | 'urgent_acknowledgment'
  | 'low_confidence'
  | 'rate_limited'
  | 'loop_detected'
  | 'guard_unavailable'
  | 'template_unavailable';

export const DECISION_REASONS = [
  'pattern_matched',
  'urgent_acknowledgment',
  'low_confidence',
  'rate_limited',
  'loop_detected',
  'guard_unavailable',
  'template_unavailable',
] as const satisfies readonly DecisionReason[];

export interface DecisionResult {
  shouldRespond: boolean;
  priority: Priority;
  reason: DecisionReason;
  matchedPatternId?: string;
}
