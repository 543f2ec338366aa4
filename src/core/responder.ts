/**
 * The responder, the brain of tact.
 *
 * Takes one inbound message and either produces an automatic
 * response or tells the caller to defer to the external generator.
 *
 * Flow:
 *   1. Take the current pattern snapshot (used for the whole message)
 *   2. Classify → Classification
 *   3. Read conversation history, then note the inbound user turn
 *   4. Decide → DecisionResult
 *   5. Generate the response (or defer if the template cannot render)
 *   6. Commit to the guard if something is sent
 *   7. Record the outcome
 *
 * Nothing here throws at the caller: unexpected failures come back
 * as a deferral.
 */

import type {
  Classification,
  DecisionResult,
  MessageOrigin,
  StatRecord,
  TactConfig,
  UserContext,
} from '../types/index.js';
import { classify } from './classifier.js';
import { DecisionEngine, findPattern } from './decision.js';
import { describeError, ok, type InvalidInputError, type Result } from './errors.js';
import type { RateLoopGuard } from './guard.js';
import type { PatternRegistry } from './registry.js';
import type { StatsRecorder } from './stats.js';
import { generate } from './templates.js';

/** Supplies the recent origins of a conversation (oldest first) */
export interface HistoryProvider {
  history(conversationId: string): MessageOrigin[];
}

export interface InboundMessage {
  /** string or UTF-8 bytes; validated by the classifier */
  text: unknown;
  user: UserContext;
  conversationId?: string;
  /** Caller's own view of the conversation; wins over the provider */
  history?: readonly MessageOrigin[];
}

interface ReplyBase {
  classification: Classification;
  decision: DecisionResult;
  stat: StatRecord;
}

export interface RespondedReply extends ReplyBase {
  status: 'responded';
  content: string;
}

export interface DeferredReply extends ReplyBase {
  status: 'deferred';
}

export type Reply = RespondedReply | DeferredReply;

export interface ResponderConfig {
  config: TactConfig;
  registry: PatternRegistry;
  guard: RateLoopGuard;
  stats: StatsRecorder;
  history?: HistoryProvider;
}

export function createResponder({ config, registry, guard, stats, history }: ResponderConfig) {
  const engine = new DecisionEngine(guard);
  const historyProvider: HistoryProvider = history ?? guard;

  function defer(
    classification: Classification,
    decision: DecisionResult,
    message: InboundMessage,
    now: number
  ): DeferredReply {
    const stat = stats.record({
      patternId: decision.matchedPatternId,
      userId: message.user.userId,
      conversationId: message.conversationId,
      timestamp: new Date(now).toISOString(),
      wasSent: false,
      reason: decision.reason,
    });
    return { status: 'deferred', classification, decision, stat };
  }

  return {
    get registry() {
      return registry;
    },

    get stats() {
      return stats;
    },

    /** Classification only, against the current snapshot */
    classify(text: unknown): Result<Classification, InvalidInputError> {
      return classify(text, registry.currentSnapshot(), config.engine);
    },

    handle(message: InboundMessage, now = Date.now()): Result<Reply, InvalidInputError> {
      const snapshot = registry.currentSnapshot();
      const classified = classify(message.text, snapshot, config.engine);
      if (!classified.ok) return classified;
      const classification = classified.value;

      const { conversationId, user } = message;
      const recent = message.history ?? (conversationId ? historyProvider.history(conversationId) : []);
      if (conversationId) guard.recordOrigin(conversationId, 'user');

      let decision: DecisionResult;
      try {
        decision = engine.decide(classification, snapshot, user, recent, now);
      } catch (error) {
        console.error(`[tact] Decision failed for user ${user.userId}: ${describeError(error)}`);
        return ok(defer(classification, {
          shouldRespond: false,
          priority: 'medium',
          reason: 'guard_unavailable',
          matchedPatternId: classification.matchedPatternId,
        }, message, now));
      }

      if (!decision.shouldRespond) {
        return ok(defer(classification, decision, message, now));
      }

      const pattern = decision.reason === 'pattern_matched'
        ? findPattern(snapshot, decision.matchedPatternId)
        : undefined;
      const rendered = generate(classification, user, pattern, now, config.engine);

      if (!rendered.ok) {
        return ok(defer(classification, {
          ...decision,
          shouldRespond: false,
          reason: 'template_unavailable',
        }, message, now));
      }

      try {
        engine.commit(decision, user, conversationId, now);
      } catch (error) {
        // Could not count the response, so do not send it
        console.error(`[tact] Guard commit failed for user ${user.userId}: ${describeError(error)}`);
        return ok(defer(classification, {
          ...decision,
          shouldRespond: false,
          reason: 'guard_unavailable',
        }, message, now));
      }

      const stat = stats.record({
        patternId: decision.matchedPatternId,
        userId: user.userId,
        conversationId,
        timestamp: new Date(now).toISOString(),
        wasSent: true,
        reason: decision.reason,
      });

      const reply: RespondedReply = {
        status: 'responded',
        content: rendered.value,
        classification,
        decision,
        stat,
      };
      return ok(reply);
    },

    /** The caller answered through the external generator */
    recordExternalReply(conversationId: string): void {
      guard.recordOrigin(conversationId, 'external');
    },
  };
}

export type Responder = ReturnType<typeof createResponder>;
