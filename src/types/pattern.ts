/**
 * Response patterns: the canned answers tact can send without
 * calling the external generator.
 *
 * A pattern pairs a trigger (regex) with a response template.
 * Patterns live in the pattern store (store/patterns.yaml) and are seeded from
 * data/patterns.yaml the first time tact starts.
 */

/** Every classified message maps to exactly one of these */
export type MessageType =
  | 'greeting'
  | 'question'
  | 'command'
  | 'statement'
  | 'request'
  | 'feedback'
  | 'small_talk'
  | 'urgent';

export const MESSAGE_TYPES = [
  'greeting',
  'question',
  'command',
  'statement',
  'request',
  'feedback',
  'small_talk',
  'urgent',
] as const satisfies readonly MessageType[];

export type Priority = 'immediate' | 'high' | 'medium' | 'low';

export const PRIORITIES = ['immediate', 'high', 'medium', 'low'] as const satisfies readonly Priority[];

/** Lower rank sorts first */
export const PRIORITY_RANK: Record<Priority, number> = {
  immediate: 0,
  high: 1,
  medium: 2,
  low: 3,
};

export interface Pattern {
  /** Unique identifier */
  id: string;

  /** Regex source, always matched case-insensitively */
  trigger: string;

  messageType: MessageType;

  /**
   * Response text. Placeholders are `{name}` or `{name|default}`.
   * See core/templates.ts for the available names.
   */
  template: string;

  priority: Priority;

  /** Each keyword found in the message raises confidence */
  keywords: string[];

  /** Confidence a bare trigger match is worth (0-1) */
  baseConfidence: number;

  /** Below this, the match is not trusted enough to answer (0-1) */
  minConfidence: number;

  /** Template needs user context that defaults cannot stand in for */
  requiresContext: boolean;

  /**
   * Attribute names that must be present when requiresContext is set.
   * Empty means "every placeholder in the template".
   */
  contextKeys: string[];

  enabled: boolean;

  /** Shown in the admin surface */
  description?: string;
}

/** A pattern whose trigger has been compiled once, at registration */
export interface CompiledPattern extends Pattern {
  readonly regex: RegExp;
  /** One whole-word matcher per keyword, in keyword order */
  readonly keywordMatchers: readonly { keyword: string; regex: RegExp }[];
}

/**
 * Immutable view of the pattern set.
 * Classification always runs against exactly one snapshot.
 */
export interface ActivePatternSet {
  readonly version: number;
  readonly loadedAt: string;
  /** Sorted by priority (immediate first), then id */
  readonly patterns: readonly CompiledPattern[];
}
