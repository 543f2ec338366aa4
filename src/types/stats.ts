/**
 * Outcome records, one per decision, sent or not.
 *
 * Records are append-only. The only later change is feedback:
 * whether the user accepted the automatic response, attached once.
 */

import type { DecisionReason } from './classification.js';

export interface StatRecord {
  id: string;
  /** Absent when nothing matched */
  patternId?: string;
  userId: string;
  conversationId?: string;
  /** ISO 8601 */
  timestamp: string;
  wasSent: boolean;
  reason: DecisionReason;
  userAccepted?: boolean;
  feedback?: string;
}

export interface PatternCounts {
  count: number;
  accepted: number;
}

export interface StatsSummary {
  periodMs: number;
  total: number;
  sent: number;
  accepted: number;
  rejected: number;
  /** Sent, no feedback yet */
  pending: number;
  /** accepted / records with feedback; undefined without feedback */
  acceptanceRate: number | undefined;
  patterns: Record<string, PatternCounts>;
}

export interface PatternStats extends StatsSummary {
  patternId: string;
  recent: StatRecord[];
}
