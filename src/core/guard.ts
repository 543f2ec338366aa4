/**
 * Rate/loop guard: decides whether another automatic response
 * is allowed right now.
 *
 * Two kinds of state:
 *   - per user: timestamps of recent automatic responses (sliding window)
 *   - per conversation: a ring buffer of the last K message origins
 *
 * Every operation is synchronous, so one user's check-and-record never
 * interleaves with another call. State is keyed by user id; users never
 * share an entry.
 */

import type { LoopConfig, MessageOrigin, RateLimitConfig } from '../types/index.js';
import { GuardUnavailableError, describeError } from './errors.js';

/** Conversations tracked at once; the least recently touched goes first */
const MAX_CONVERSATIONS = 10_000;

/** Fixed-capacity buffer; the oldest entry falls off when full */
export class RingBuffer<T> {
  private readonly items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) this.items.shift();
  }

  /** Oldest first */
  toArray(): T[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }
}

/**
 * Backing store for per-user windows.
 * The in-memory one never fails; a remote one throws when unreachable.
 */
export interface GuardStore {
  /** Timestamps (epoch ms) of automatic responses, any order */
  timestamps(userId: string): number[];
  setTimestamps(userId: string, timestamps: number[]): void;
  users(): string[];
}

export function createMemoryGuardStore(): GuardStore {
  const windows = new Map<string, number[]>();

  return {
    timestamps(userId) {
      return windows.get(userId) ?? [];
    },
    setTimestamps(userId, timestamps) {
      if (timestamps.length === 0) {
        windows.delete(userId);
      } else {
        windows.set(userId, timestamps);
      }
    },
    users() {
      return [...windows.keys()];
    },
  };
}

export interface GuardOptions {
  rateLimit: RateLimitConfig;
  loop: LoopConfig;
  store?: GuardStore;
}

export class RateLoopGuard {
  private readonly store: GuardStore;
  private readonly conversations = new Map<string, RingBuffer<MessageOrigin>>();
  private readonly windowMs: number;

  constructor(private readonly options: GuardOptions) {
    this.store = options.store ?? createMemoryGuardStore();
    this.windowMs = options.rateLimit.windowSeconds * 1000;
  }

  /**
   * Premium users are never limited. Everyone else gets
   * rateLimit.maxResponses automatic responses per window.
   *
   * `knownTimestamps` are the caller's view (UserContext); the larger
   * of the two counts wins, so neither side can under-report.
   *
   * @throws GuardUnavailableError when the store fails
   */
  mayRespond(userId: string, isPremium: boolean, now: number, knownTimestamps: readonly number[] = []): boolean {
    if (isPremium) return true;

    const tracked = this.prune(userId, now).length;
    const supplied = knownTimestamps.filter(ts => this.inWindow(ts, now)).length;

    return Math.max(tracked, supplied) < this.options.rateLimit.maxResponses;
  }

  /**
   * Call exactly once per automatic response actually sent.
   * @throws GuardUnavailableError when the store fails
   */
  recordResponse(userId: string, now: number): void {
    const window = this.prune(userId, now);
    this.write(userId, [...window, now]);
  }

  /** Consecutive automatic/external entries at the tail of the last K */
  recentAutoTypeStreak(history: readonly MessageOrigin[]): number {
    const recent = history.slice(-this.options.loop.historySize);
    let streak = 0;
    for (let i = recent.length - 1; i >= 0; i--) {
      if (recent[i] === 'user') break;
      streak++;
    }
    return streak;
  }

  isLooping(history: readonly MessageOrigin[]): boolean {
    return this.recentAutoTypeStreak(history) >= this.options.loop.threshold;
  }

  recordOrigin(conversationId: string, origin: MessageOrigin): void {
    const buffer = this.conversations.get(conversationId) ?? new RingBuffer<MessageOrigin>(this.options.loop.historySize);
    buffer.push(origin);

    // Re-insert so Map order tracks recency
    this.conversations.delete(conversationId);
    this.conversations.set(conversationId, buffer);
    if (this.conversations.size > MAX_CONVERSATIONS) {
      const oldest = this.conversations.keys().next();
      if (!oldest.done) this.conversations.delete(oldest.value);
    }
  }

  /** Last K origins of a conversation, oldest first */
  history(conversationId: string): MessageOrigin[] {
    return this.conversations.get(conversationId)?.toArray() ?? [];
  }

  /** Drop users whose window has fully expired. Returns how many. */
  sweep(now: number): number {
    let dropped = 0;
    for (const userId of this.read(() => this.store.users())) {
      if (this.prune(userId, now).length === 0) dropped++;
    }
    return dropped;
  }

  /** Timestamps still in the window; expired ones are written back out */
  private prune(userId: string, now: number): number[] {
    const all = this.read(() => this.store.timestamps(userId));
    const live = all.filter(ts => this.inWindow(ts, now));
    if (live.length !== all.length) this.write(userId, live);
    return live;
  }

  private inWindow(timestamp: number, now: number): boolean {
    return timestamp <= now && now - timestamp < this.windowMs;
  }

  private read<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new GuardUnavailableError(`Guard store read failed: ${describeError(error)}`, error);
    }
  }

  private write(userId: string, timestamps: number[]): void {
    try {
      this.store.setTimestamps(userId, timestamps);
    } catch (error) {
      throw new GuardUnavailableError(`Guard store write failed: ${describeError(error)}`, error);
    }
  }
}
