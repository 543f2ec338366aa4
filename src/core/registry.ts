/**
 * Pattern registry: owns the active pattern set.
 *
 * The set is an immutable snapshot behind a single reference.
 * Every change (load, upsert, remove, reload) validates first,
 * builds a complete new snapshot, then swaps the reference.
 * A classification that already took a snapshot keeps using it.
 */

import { PatternSchema } from '../types/index.js';
import type { ActivePatternSet, CompiledPattern, Pattern } from '../types/index.js';
import { PRIORITY_RANK } from '../types/index.js';
import { wordMatcher } from './classifier.js';
import { StoreUnavailableError, ValidationError, describeError, ok, err, type Result } from './errors.js';

/** Where patterns are persisted. See store/index.ts for the YAML file one. */
export interface PatternStore {
  loadAll(): Pattern[];
  save(pattern: Pattern): void;
  delete(id: string): void;
}

export interface PatternSummary {
  total: number;
  active: number;
  inactive: number;
  patterns: Record<string, { description: string | null; enabled: boolean; priority: Pattern['priority'] }>;
}

/**
 * Validate raw input into a Pattern.
 * Rejects bad regexes and out-of-range confidences.
 */
export function validatePattern(input: unknown): Result<Pattern, ValidationError> {
  const parsed = PatternSchema.safeParse(input);
  if (!parsed.success) {
    return err(ValidationError.fromZod(parsed.error, 'Invalid pattern'));
  }
  const pattern: Pattern = parsed.data;
  return ok(pattern);
}

function compile(pattern: Pattern): CompiledPattern {
  // No 'g' flag: test() must not carry lastIndex between calls
  return Object.freeze({
    ...pattern,
    keywords: [...pattern.keywords],
    contextKeys: [...pattern.contextKeys],
    regex: new RegExp(pattern.trigger, 'i'),
    keywordMatchers: pattern.keywords.map(keyword => ({ keyword, regex: wordMatcher(keyword) })),
  });
}

function byPriorityThenId(a: Pattern, b: Pattern): number {
  const rank = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
  if (rank !== 0) return rank;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function toPattern(compiled: CompiledPattern): Pattern {
  const { regex: _regex, keywordMatchers: _matchers, ...pattern } = compiled;
  return { ...pattern, keywords: [...pattern.keywords], contextKeys: [...pattern.contextKeys] };
}

export class PatternRegistry {
  private active: ActivePatternSet;
  private version = 0;

  constructor(private readonly store?: PatternStore) {
    this.active = this.buildSnapshot([]);
  }

  /** The snapshot to classify against. Never changes under the caller. */
  currentSnapshot(): ActivePatternSet {
    return this.active;
  }

  /**
   * Replace the whole set. One invalid pattern rejects the load
   * and leaves the current snapshot in place.
   */
  load(inputs: readonly unknown[]): Result<ActivePatternSet, ValidationError> {
    const patterns = new Map<string, Pattern>();

    for (const [index, input] of inputs.entries()) {
      const result = validatePattern(input);
      if (!result.ok) {
        return err(new ValidationError(`Pattern #${index} is invalid: ${result.error.message}`, {
          index,
          ...result.error.details,
        }));
      }
      patterns.set(result.value.id, result.value);
    }

    this.active = this.buildSnapshot([...patterns.values()]);
    return ok(this.active);
  }

  /** Re-read every pattern from the store */
  reload(): Result<ActivePatternSet, ValidationError | StoreUnavailableError> {
    if (!this.store) {
      return err(new ValidationError('No pattern store attached'));
    }
    const store = this.store;
    const stored = this.fromStore('read', () => store.loadAll());
    if (!stored.ok) return stored;

    const result = this.load(stored.value);
    if (result.ok) {
      console.log(`[tact] Reloaded ${result.value.patterns.length} pattern(s), snapshot v${result.value.version}`);
    }
    return result;
  }

  /** Add or replace a pattern by id */
  upsert(input: unknown): Result<Pattern, ValidationError | StoreUnavailableError> {
    const result = validatePattern(input);
    if (!result.ok) return result;

    const pattern = result.value;
    const next = this.active.patterns
      .filter(p => p.id !== pattern.id)
      .map(toPattern);
    next.push(pattern);

    // Persist before swapping so the store never lags the snapshot
    const saved = this.fromStore('write', () => this.store?.save(pattern));
    if (!saved.ok) return saved;

    this.active = this.buildSnapshot(next);
    return ok(pattern);
  }

  /** false when no such pattern exists */
  remove(id: string): Result<boolean, StoreUnavailableError> {
    if (!this.active.patterns.some(p => p.id === id)) return ok(false);

    const deleted = this.fromStore('delete', () => this.store?.delete(id));
    if (!deleted.ok) return deleted;

    this.active = this.buildSnapshot(
      this.active.patterns.filter(p => p.id !== id).map(toPattern)
    );
    return ok(true);
  }

  list(opts: { enabledOnly?: boolean } = {}): Pattern[] {
    return this.active.patterns
      .filter(p => !opts.enabledOnly || p.enabled)
      .map(toPattern);
  }

  get(id: string): Pattern | null {
    const found = this.active.patterns.find(p => p.id === id);
    return found ? toPattern(found) : null;
  }

  summary(): PatternSummary {
    const patterns = this.active.patterns;
    const active = patterns.filter(p => p.enabled).length;

    return {
      total: patterns.length,
      active,
      inactive: patterns.length - active,
      patterns: Object.fromEntries(patterns.map(p => [p.id, {
        description: p.description ?? null,
        enabled: p.enabled,
        priority: p.priority,
      }])),
    };
  }

  private fromStore<T>(action: string, fn: () => T): Result<T, StoreUnavailableError> {
    try {
      return ok(fn());
    } catch (error) {
      console.error(`[tact] Pattern store ${action} failed: ${describeError(error)}`);
      return err(new StoreUnavailableError(`Pattern store ${action} failed: ${describeError(error)}`, error));
    }
  }

  private buildSnapshot(patterns: Pattern[]): ActivePatternSet {
    this.version += 1;
    return Object.freeze({
      version: this.version,
      loadedAt: new Date().toISOString(),
      patterns: Object.freeze([...patterns].sort(byPriorityThenId).map(compile)),
    });
  }
}
