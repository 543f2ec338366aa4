/**
 * Decision engine: answer now, or defer?
 *
 * Order of checks:
 *   1. No match, or a match below its minConfidence, and not urgent → low_confidence
 *   2. Conversation already on an automatic streak → loop_detected
 *   3. Rate window full (urgent messages skip this) → rate_limited
 *   4. Urgent with no trusted match → urgency acknowledgment
 *   5. Otherwise answer with the pattern's priority
 *
 * If the guard store cannot be reached at any step, the answer is
 * guard_unavailable. Stateless across calls; the only state it touches
 * is the guard's, and only commit() writes it.
 */

import type {
  ActivePatternSet,
  Classification,
  CompiledPattern,
  DecisionResult,
  MessageOrigin,
  UserContext,
} from '../types/index.js';
import { GuardUnavailableError } from './errors.js';
import type { RateLoopGuard } from './guard.js';

export function findPattern(snapshot: ActivePatternSet, id: string | undefined): CompiledPattern | undefined {
  if (id === undefined) return undefined;
  return snapshot.patterns.find(p => p.id === id);
}

export class DecisionEngine {
  constructor(private readonly guard: RateLoopGuard) {}

  decide(
    classification: Classification,
    snapshot: ActivePatternSet,
    user: UserContext,
    history: readonly MessageOrigin[],
    now: number
  ): DecisionResult {
    try {
      return this.evaluate(classification, snapshot, user, history, now);
    } catch (error) {
      if (error instanceof GuardUnavailableError) {
        console.warn(`[tact] ${error.message}; deferring for user ${user.userId}`);
        return {
          shouldRespond: false,
          priority: 'medium',
          reason: 'guard_unavailable',
          matchedPatternId: classification.matchedPatternId,
        };
      }
      throw error;
    }
  }

  /**
   * Record that an automatic response went out.
   * Call only after it was actually produced, never on mere consideration.
   */
  commit(decision: DecisionResult, user: UserContext, conversationId: string | undefined, now: number): void {
    if (!decision.shouldRespond) return;
    this.guard.recordResponse(user.userId, now);
    if (conversationId) this.guard.recordOrigin(conversationId, 'automatic');
  }

  private evaluate(
    classification: Classification,
    snapshot: ActivePatternSet,
    user: UserContext,
    history: readonly MessageOrigin[],
    now: number
  ): DecisionResult {
    const pattern = findPattern(snapshot, classification.matchedPatternId);
    const trusted = pattern !== undefined && classification.confidence >= pattern.minConfidence;
    const urgent = classification.hasUrgencyMarkers;

    if (!trusted && !urgent) {
      return {
        shouldRespond: false,
        priority: pattern?.priority ?? 'medium',
        reason: 'low_confidence',
        matchedPatternId: classification.matchedPatternId,
      };
    }

    if (this.guard.isLooping(history)) {
      return {
        shouldRespond: false,
        priority: urgent ? 'immediate' : pattern?.priority ?? 'medium',
        reason: 'loop_detected',
        matchedPatternId: classification.matchedPatternId,
      };
    }

    // Urgent messages always get at least an acknowledgment
    if (!urgent && !this.guard.mayRespond(user.userId, user.isPremium, now, user.recentAutoResponseTimestamps)) {
      return {
        shouldRespond: false,
        priority: pattern?.priority ?? 'medium',
        reason: 'rate_limited',
        matchedPatternId: classification.matchedPatternId,
      };
    }

    if (!trusted) {
      return {
        shouldRespond: true,
        priority: 'immediate',
        reason: 'urgent_acknowledgment',
      };
    }

    return {
      shouldRespond: true,
      priority: urgent ? 'immediate' : pattern.priority,
      reason: 'pattern_matched',
      matchedPatternId: pattern.id,
    };
  }
}
