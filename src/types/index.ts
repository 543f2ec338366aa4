export type {
  MessageType,
  Priority,
  Pattern,
  CompiledPattern,
  ActivePatternSet,
} from './pattern.js';

export { MESSAGE_TYPES, PRIORITIES, PRIORITY_RANK } from './pattern.js';
export { DECISION_REASONS } from './classification.js';

export type {
  Sentiment,
  Classification,
  MessageOrigin,
  DecisionReason,
  DecisionResult,
} from './classification.js';

export type { UserContext } from './context.js';

export type {
  StatRecord,
  PatternCounts,
  StatsSummary,
  PatternStats,
} from './stats.js';

export type {
  PatternInput,
  EngineConfig,
  RateLimitConfig,
  LoopConfig,
  StatsConfig,
  TactConfig,
  StatLogEntry,
} from './schemas.js';

export {
  PatternSchema,
  PatternFileSchema,
  TactConfigSchema,
  UserContextSchema,
  InboundMessageSchema,
  FeedbackSchema,
  StatLogEntrySchema,
  defaultConfig,
} from './schemas.js';
