/**
 * File-backed store for tact.
 *
 *   store/
 *     patterns.yaml   ← the live pattern set, rewritten on every change
 *     stats.jsonl     ← append-only outcome log, one JSON object per line
 *
 * Pattern writes go to a temp file first and are renamed into place,
 * so a crash never leaves half a file behind.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import YAML from 'yaml';
import { PatternFileSchema, StatLogEntrySchema } from '../types/index.js';
import type { Pattern, StatLogEntry, StatRecord } from '../types/index.js';
import { validatePattern, type PatternStore } from '../core/registry.js';
import type { StatsSink } from '../core/stats.js';
import { describeError } from '../core/errors.js';

export interface StorePaths {
  dir: string;
  patterns: string;
  stats: string;
}

interface StoreState {
  paths: StorePaths;
  /** Ids already in the log; a second write of the same id is ignored */
  statIds: Set<string>;
  feedbackIds: Set<string>;
}

let store: StoreState | undefined;

export function initStore(dir: string = 'store'): StorePaths {
  mkdirSync(dir, { recursive: true });
  const paths: StorePaths = {
    dir,
    patterns: join(dir, 'patterns.yaml'),
    stats: join(dir, 'stats.jsonl'),
  };

  const statIds = new Set<string>();
  const feedbackIds = new Set<string>();
  for (const entry of readLog(paths.stats)) {
    if (entry.kind === 'record') statIds.add(entry.record.id);
    else feedbackIds.add(entry.id);
  }

  store = { paths, statIds, feedbackIds };
  return paths;
}

export function getStore(): StoreState {
  if (!store) throw new Error('Store not initialized. Call initStore() first.');
  return store;
}

export function closeStore(): void {
  store = undefined;
}

// ── Patterns ───────────────────────────────────────────────

function readPatternEntries(): unknown[] {
  const path = getStore().paths.patterns;
  if (!existsSync(path)) return [];

  const file = PatternFileSchema.safeParse(YAML.parse(readFileSync(path, 'utf-8')) ?? {});
  if (!file.success) {
    throw new Error(`Pattern store ${path} is not a pattern file: ${file.error.message}`);
  }
  return file.data.patterns;
}

function writePatternEntries(entries: unknown[]): void {
  const path = getStore().paths.patterns;
  const tmp = `${path}.tmp`;
  writeFileSync(tmp, YAML.stringify({ patterns: entries }), 'utf-8');
  renameSync(tmp, path);
}

function entryId(entry: unknown): unknown {
  return entry !== null && typeof entry === 'object' && 'id' in entry ? entry.id : undefined;
}

export function loadPatterns(): Pattern[] {
  const patterns: Pattern[] = [];
  for (const entry of readPatternEntries()) {
    const result = validatePattern(entry);
    if (result.ok) {
      patterns.push(result.value);
    } else {
      console.warn(`[tact] Skipping invalid stored pattern ${String(entryId(entry))}: ${result.error.message}`);
    }
  }
  return patterns.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

export function countPatterns(): number {
  return readPatternEntries().length;
}

/** Insert or replace by id */
export function savePattern(pattern: Pattern): void {
  const others = readPatternEntries().filter(entry => entryId(entry) !== pattern.id);
  writePatternEntries([...others, pattern]);
}

export function deletePattern(id: string): void {
  const entries = readPatternEntries();
  const kept = entries.filter(entry => entryId(entry) !== id);
  if (kept.length !== entries.length) writePatternEntries(kept);
}

export function createPatternStore(): PatternStore {
  return {
    loadAll: loadPatterns,
    save: savePattern,
    delete: deletePattern,
  };
}

// ── Stats ──────────────────────────────────────────────────

function readLog(path: string): StatLogEntry[] {
  if (!existsSync(path)) return [];

  const entries: StatLogEntry[] = [];
  const lines = readFileSync(path, 'utf-8').split('\n');

  lines.forEach((line, index) => {
    if (line.trim() === '') return;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      console.warn(`[tact] Skipping unreadable stats line ${index + 1}: ${describeError(error)}`);
      return;
    }

    const entry = StatLogEntrySchema.safeParse(json);
    if (entry.success) {
      entries.push(entry.data);
    } else {
      console.warn(`[tact] Skipping invalid stats line ${index + 1}`);
    }
  });

  return entries;
}

function append(entries: StatLogEntry[]): void {
  if (entries.length === 0) return;
  appendFileSync(getStore().paths.stats, entries.map(e => JSON.stringify(e) + '\n').join(''), 'utf-8');
}

/** Records whose id is already logged are skipped */
export function insertStats(records: readonly StatRecord[]): void {
  const { statIds } = getStore();
  const fresh: StatLogEntry[] = [];

  for (const record of records) {
    if (statIds.has(record.id)) continue;
    statIds.add(record.id);
    fresh.push({ kind: 'record', record });
  }

  append(fresh);
}

/** First feedback wins; unknown ids are ignored */
export function updateStatFeedback(id: string, accepted: boolean, note: string | undefined): void {
  const { statIds, feedbackIds } = getStore();
  if (!statIds.has(id) || feedbackIds.has(id)) return;

  append([{ kind: 'feedback', id, accepted, note }]);
  feedbackIds.add(id);
}

/** The newest `limit` records at or after `since`, oldest first */
export function loadStatsSince(since: string, limit = 10_000): StatRecord[] {
  const records = new Map<string, StatRecord>();

  for (const entry of readLog(getStore().paths.stats)) {
    if (entry.kind === 'record') {
      if (!records.has(entry.record.id)) records.set(entry.record.id, { ...entry.record });
      continue;
    }
    const record = records.get(entry.id);
    if (record && record.userAccepted === undefined) {
      record.userAccepted = entry.accepted;
      if (entry.note !== undefined) record.feedback = entry.note;
    }
  }

  return [...records.values()]
    .filter(r => r.timestamp >= since)
    .sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0))
    .slice(-limit);
}

export function createStatsSink(): StatsSink {
  return {
    async write(records) {
      insertStats(records);
    },
    async attachFeedback(id, accepted, note) {
      updateStatFeedback(id, accepted, note);
    },
  };
}
