/**
 * Stats recorder: one outcome per decision, feedback attached later.
 *
 * record() is synchronous and never touches the sink: it appends to
 * memory and queues the record. flush() drains the queue into the sink
 * in the background. If the sink is down, records stay queued (bounded;
 * the oldest are dropped first) and the decision path never notices.
 */

import { randomUUID } from 'node:crypto';
import type { PatternStats, StatRecord, StatsConfig, StatsSummary } from '../types/index.js';
import {
  NotFoundError,
  SinkUnavailableError,
  ValidationError,
  describeError,
  ok,
  err,
  type Result,
} from './errors.js';

/** Where records end up. See store/index.ts for the append-only log. */
export interface StatsSink {
  write(records: StatRecord[]): Promise<void>;
  attachFeedback(id: string, accepted: boolean, note: string | undefined): Promise<void>;
}

export type NewStatRecord = Omit<StatRecord, 'id' | 'timestamp' | 'userAccepted' | 'feedback'> & {
  timestamp?: string;
};

type PendingWrite =
  | { kind: 'record'; record: StatRecord }
  | { kind: 'feedback'; id: string; accepted: boolean; note: string | undefined };

export class StatsRecorder {
  private readonly records: StatRecord[] = [];
  private readonly byId = new Map<string, StatRecord>();
  private queue: PendingWrite[] = [];
  private timer: NodeJS.Timeout | null = null;
  private flushing: Promise<void> | null = null;

  /** Queued writes dropped because the buffer was full */
  dropped = 0;

  constructor(
    private readonly config: StatsConfig,
    private readonly sink?: StatsSink
  ) {}

  record(outcome: NewStatRecord): StatRecord {
    const record: StatRecord = {
      ...outcome,
      id: randomUUID(),
      timestamp: outcome.timestamp ?? new Date().toISOString(),
    };

    this.retain(record);
    this.enqueue({ kind: 'record', record: { ...record } });
    return { ...record };
  }

  /**
   * Feedback goes on a record once; a second attempt is rejected.
   * Only retained records take feedback: one evicted past `retention`
   * is NotFound here even though the sink still has it.
   */
  attachFeedback(
    id: string,
    accepted: boolean,
    note?: string
  ): Result<StatRecord, NotFoundError | ValidationError> {
    const record = this.byId.get(id);
    if (!record) {
      return err(new NotFoundError(`Stat record ${id} not found`, { id }));
    }
    if (record.userAccepted !== undefined) {
      return err(new ValidationError(`Feedback already attached to ${id}`, { id }));
    }

    record.userAccepted = accepted;
    if (note !== undefined) record.feedback = note;

    this.enqueue({ kind: 'feedback', id, accepted, note });
    return ok({ ...record });
  }

  get(id: string): StatRecord | undefined {
    const record = this.byId.get(id);
    return record ? { ...record } : undefined;
  }

  /**
   * Accepted / records with feedback, for one pattern within the window.
   * No feedback at all → undefined, not zero.
   */
  acceptanceRate(patternId: string, windowMs: number, now = Date.now()): number | undefined {
    const rated = this.inWindow(windowMs, now)
      .filter(r => r.patternId === patternId && r.userAccepted !== undefined);
    if (rated.length === 0) return undefined;
    return rated.filter(r => r.userAccepted === true).length / rated.length;
  }

  summary(windowMs: number, now = Date.now()): StatsSummary {
    return summarise(this.inWindow(windowMs, now), windowMs);
  }

  patternStats(patternId: string, windowMs: number, now = Date.now()): PatternStats {
    const records = this.inWindow(windowMs, now).filter(r => r.patternId === patternId);
    return {
      ...summarise(records, windowMs),
      patternId,
      recent: records.slice(-5).map(r => ({ ...r })),
    };
  }

  /** Seed memory with records already persisted (oldest first). Not re-queued. */
  hydrate(records: readonly StatRecord[]): void {
    for (const record of records) {
      if (!this.byId.has(record.id)) this.retain({ ...record });
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Write everything queued to the sink. Concurrent calls share one run.
   * A sink failure is logged and the batch goes back to the queue.
   */
  flush(): Promise<void> {
    if (!this.flushing) {
      this.flushing = this.drain().finally(() => {
        this.flushing = null;
      });
    }
    return this.flushing;
  }

  start(): void {
    if (this.timer || !this.sink) return;
    this.timer = setInterval(() => {
      void this.flush();
    }, this.config.flushIntervalMs);
    this.timer.unref();
  }

  /** Stop the timer and make one last attempt to flush */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.flush();
  }

  private async drain(): Promise<void> {
    if (!this.sink || this.queue.length === 0) return;

    const batch = this.queue;
    this.queue = [];

    try {
      const records = batch.flatMap(w => (w.kind === 'record' ? [w.record] : []));
      if (records.length > 0) await this.sink.write(records);

      for (const write of batch) {
        if (write.kind === 'feedback') {
          await this.sink.attachFeedback(write.id, write.accepted, write.note);
        }
      }
    } catch (error) {
      const failure = new SinkUnavailableError(`Stats sink write failed: ${describeError(error)}`, error);
      console.error(`[tact] ${failure.message} (${batch.length} write(s) re-queued)`);
      // Records first; the sink treats re-written ids as no-ops
      this.queue = [...batch, ...this.queue];
      this.trim();
    }
  }

  private enqueue(write: PendingWrite): void {
    if (!this.sink) return;
    this.queue.push(write);
    this.trim();
  }

  private trim(): void {
    const overflow = this.queue.length - this.config.maxBuffered;
    if (overflow > 0) {
      this.queue.splice(0, overflow);
      this.dropped += overflow;
      console.warn(`[tact] Stats buffer full, dropped ${overflow} write(s) (${this.dropped} total)`);
    }
  }

  private retain(record: StatRecord): void {
    this.records.push(record);
    this.byId.set(record.id, record);

    while (this.records.length > this.config.retention) {
      const evicted = this.records.shift();
      if (evicted) this.byId.delete(evicted.id);
    }
  }

  private inWindow(windowMs: number, now: number): StatRecord[] {
    const since = now - windowMs;
    return this.records.filter(r => {
      const at = Date.parse(r.timestamp);
      return at > since && at <= now;
    });
  }
}

function summarise(records: readonly StatRecord[], periodMs: number): StatsSummary {
  const accepted = records.filter(r => r.userAccepted === true).length;
  const rejected = records.filter(r => r.userAccepted === false).length;
  const patterns: StatsSummary['patterns'] = {};

  for (const record of records) {
    if (!record.patternId) continue;
    const entry = patterns[record.patternId] ?? { count: 0, accepted: 0 };
    entry.count += 1;
    if (record.userAccepted === true) entry.accepted += 1;
    patterns[record.patternId] = entry;
  }

  return {
    periodMs,
    total: records.length,
    sent: records.filter(r => r.wasSent).length,
    accepted,
    rejected,
    pending: records.filter(r => r.wasSent && r.userAccepted === undefined).length,
    acceptanceRate: accepted + rejected > 0 ? accepted / (accepted + rejected) : undefined,
    patterns,
  };
}
