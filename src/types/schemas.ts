/**
 * Zod schemas for everything that enters tact from outside:
 * patterns (YAML seed, admin API, pattern store), config.yaml
 * and the stats log.
 *
 * Usage:
 *   const result = PatternSchema.safeParse(body)
 *   if (!result.success) return validationError(result.error)
 *   registry.upsert(result.data)
 */

import { z } from 'zod';
import { MESSAGE_TYPES, PRIORITIES } from './pattern.js';
import { DECISION_REASONS } from './classification.js';

const unit = z.number().min(0).max(1);

// ═══════════════════════════════════════════════════════════════════════════
// PATTERNS
// ═══════════════════════════════════════════════════════════════════════════

export const PatternSchema = z
  .object({
    id: z.string().trim().min(1).max(100),
    trigger: z.string().min(1).max(500),
    messageType: z.enum(MESSAGE_TYPES),
    template: z.string().min(1),
    priority: z.enum(PRIORITIES).default('medium'),
    keywords: z
      .array(z.string().trim().min(1))
      .default([])
      .transform(keywords => [...new Set(keywords.map(k => k.toLowerCase()))]),
    baseConfidence: unit.default(0.8),
    minConfidence: unit.default(0.7),
    requiresContext: z.boolean().default(false),
    contextKeys: z.array(z.string().min(1)).default([]),
    enabled: z.boolean().default(true),
    description: z.string().optional(),
  })
  .superRefine((pattern, ctx) => {
    try {
      new RegExp(pattern.trigger, 'i');
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['trigger'],
        message: `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  });

export type PatternInput = z.input<typeof PatternSchema>;

/** Shape of data/patterns.yaml; each entry is validated on its own */
export const PatternFileSchema = z.object({
  patterns: z.array(z.unknown()).default([]),
});

// ═══════════════════════════════════════════════════════════════════════════
// CONFIG (data/config.yaml)
// ═══════════════════════════════════════════════════════════════════════════

export const EngineConfigSchema = z.object({
  /** Below this, nothing is trusted and the message is a plain statement */
  confidenceFloor: unit.default(0.5),
  /** Added per matched keyword */
  keywordBonus: unit.default(0.05),
  maxMessageLength: z.number().int().positive().default(4096),
  urgencyWords: z.array(z.string().min(1)).default(['asap', 'urgent', 'emergency', 'critical']),
  positiveWords: z
    .array(z.string().min(1))
    .default(['thanks', 'thank', 'awesome', 'great', 'love', 'nice', 'perfect', '😊', '🎉', '😍']),
  negativeWords: z
    .array(z.string().min(1))
    .default(['bad', 'terrible', 'hate', 'awful', 'broken', 'useless', 'worst', '😔', '😠', '😤']),
  premiumPrefix: z.string().default('✨ '),
  urgencyPrefix: z.string().default('🚨 '),
  urgentAcknowledgment: z.string().default('⚠️ I see this is urgent! Prioritizing...'),
});

export const RateLimitConfigSchema = z.object({
  maxResponses: z.number().int().positive().default(3),
  windowSeconds: z.number().int().positive().default(3600),
});

export const LoopConfigSchema = z.object({
  /** Consecutive automatic/external turns that stop automatic replies */
  threshold: z.number().int().positive().default(2),
  /** How many recent origins each conversation keeps */
  historySize: z.number().int().positive().default(5),
});

export const StatsConfigSchema = z.object({
  flushIntervalMs: z.number().int().positive().default(2000),
  maxBuffered: z.number().int().positive().default(1000),
  retention: z.number().int().positive().default(10_000),
});

export const TactConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().positive().default(3000),
      host: z.string().default('0.0.0.0'),
    })
    .default({}),
  admin: z
    .object({
      token: z.string().default(''),
    })
    .default({}),
  engine: EngineConfigSchema.default({}),
  rateLimit: RateLimitConfigSchema.default({}),
  loop: LoopConfigSchema.default({}),
  stats: StatsConfigSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;
export type LoopConfig = z.infer<typeof LoopConfigSchema>;
export type StatsConfig = z.infer<typeof StatsConfigSchema>;
export type TactConfig = z.infer<typeof TactConfigSchema>;

/** Fully defaulted config, for tests and embedding */
export function defaultConfig(): TactConfig {
  return TactConfigSchema.parse({});
}

// ═══════════════════════════════════════════════════════════════════════════
// API BODIES
// ═══════════════════════════════════════════════════════════════════════════

export const MessageOriginSchema = z.enum(['user', 'automatic', 'external']);

export const UserContextSchema = z.object({
  userId: z.string().min(1),
  isPremium: z.boolean().default(false),
  totalMessageCount: z.number().int().nonnegative().default(0),
  recentAutoResponseTimestamps: z.array(z.number()).default([]),
  firstName: z.string().optional(),
  username: z.string().optional(),
  attributes: z.record(z.string()).optional(),
});

export const InboundMessageSchema = z.object({
  text: z.unknown(),
  user: UserContextSchema,
  conversationId: z.string().min(1).optional(),
  history: z.array(MessageOriginSchema).optional(),
});

export const FeedbackSchema = z.object({
  accepted: z.boolean(),
  note: z.string().max(500).optional(),
});

// ═══════════════════════════════════════════════════════════════════════════
// STATS LOG (one JSON object per line)
// ═══════════════════════════════════════════════════════════════════════════

export const StatRecordSchema = z.object({
  id: z.string().min(1),
  patternId: z.string().optional(),
  userId: z.string(),
  conversationId: z.string().optional(),
  timestamp: z.string().datetime(),
  wasSent: z.boolean(),
  reason: z.enum(DECISION_REASONS),
  userAccepted: z.boolean().optional(),
  feedback: z.string().optional(),
});

export const StatLogEntrySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('record'), record: StatRecordSchema }),
  z.object({
    kind: z.literal('feedback'),
    id: z.string().min(1),
    accepted: z.boolean(),
    note: z.string().optional(),
  }),
]);

export type StatLogEntry = z.infer<typeof StatLogEntrySchema>;
