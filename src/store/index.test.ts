import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { appendFileSync, existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as store from './index.js';
import { PatternRegistry, validatePattern } from '../core/registry.js';
import type { Pattern, StatRecord } from '../types/index.js';

function pattern(overrides: Record<string, unknown> = {}): Pattern {
  const result = validatePattern({
    id: 'greeting_hello',
    trigger: '^(hello|hi)\\b',
    messageType: 'greeting',
    template: '👋 {greeting}, {firstName|there}!',
    priority: 'immediate',
    keywords: ['hello', 'hi'],
    ...overrides,
  });
  if (!result.ok) throw result.error;
  return result.value;
}

function stat(overrides: Partial<StatRecord> = {}): StatRecord {
  return {
    id: 'stat-1',
    patternId: 'greeting_hello',
    userId: 'u1',
    conversationId: 'c1',
    timestamp: '2026-01-15T09:00:00.000Z',
    wasSent: true,
    reason: 'pattern_matched',
    ...overrides,
  };
}

let dir: string;
let paths: store.StorePaths;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'tact-'));
  paths = store.initStore(dir);
});

afterEach(() => {
  store.closeStore();
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('initStore', () => {
  it('creates the directory and nothing else', () => {
    const nested = join(dir, 'a', 'b');
    const created = store.initStore(nested);

    expect(existsSync(nested)).toBe(true);
    expect(created.patterns).toBe(join(nested, 'patterns.yaml'));
    expect(store.countPatterns()).toBe(0);
    expect(store.loadStatsSince('2000-01-01T00:00:00.000Z')).toEqual([]);
  });

  it('refuses to work before init', () => {
    store.closeStore();
    expect(() => store.countPatterns()).toThrow('Store not initialized. Call initStore() first.');
  });
});

describe('patterns', () => {
  it('round-trips a pattern', () => {
    const saved = pattern({ description: 'Greets', requiresContext: true, contextKeys: ['firstName'] });
    store.savePattern(saved);

    expect(store.countPatterns()).toBe(1);
    expect(store.loadPatterns()).toEqual([saved]);
  });

  it('upserts by id', () => {
    store.savePattern(pattern());
    store.savePattern(pattern({ template: 'Hi!', enabled: false }));

    const [stored] = store.loadPatterns();
    expect(store.countPatterns()).toBe(1);
    expect(stored.template).toBe('Hi!');
    expect(stored.enabled).toBe(false);
  });

  it('writes YAML and leaves no temp file behind', () => {
    store.savePattern(pattern());

    expect(readFileSync(paths.patterns, 'utf-8')).toContain('id: greeting_hello');
    expect(existsSync(`${paths.patterns}.tmp`)).toBe(false);
  });

  it('loads patterns ordered by id', () => {
    store.savePattern(pattern({ id: 'zeta' }));
    store.savePattern(pattern({ id: 'alpha' }));

    expect(store.loadPatterns().map(p => p.id)).toEqual(['alpha', 'zeta']);
  });

  it('skips entries that no longer validate', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    writeFileSync(paths.patterns, [
      'patterns:',
      '  - id: broken',
      "    trigger: '('",
      '    messageType: greeting',
      '    template: x',
      '  - id: command_help',
      "    trigger: '^/help'",
      '    messageType: command',
      '    template: Here is what I can do.',
      '',
    ].join('\n'));

    expect(store.loadPatterns().map(p => p.id)).toEqual(['command_help']);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('throws on a file that is not a pattern file', () => {
    writeFileSync(paths.patterns, 'patterns: nope\n');
    expect(() => store.loadPatterns()).toThrow(/is not a pattern file/);
  });

  it('backs a registry', () => {
    const registry = new PatternRegistry(store.createPatternStore());
    registry.upsert(pattern());
    registry.upsert(pattern({ id: 'command_help', trigger: '^/help', messageType: 'command' }));
    registry.remove('greeting_hello');

    expect(store.loadPatterns().map(p => p.id)).toEqual(['command_help']);

    const fresh = new PatternRegistry(store.createPatternStore());
    expect(fresh.reload().ok).toBe(true);
    expect(fresh.currentSnapshot().patterns.map(p => p.id)).toEqual(['command_help']);
  });

  it('surfaces a broken file as an unavailable store', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const registry = new PatternRegistry(store.createPatternStore());
    writeFileSync(paths.patterns, 'patterns: nope\n');

    const result = registry.upsert(pattern());
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('STORE_UNAVAILABLE');
  });
});

describe('stats', () => {
  const SINCE = '2026-01-01T00:00:00.000Z';

  it('round-trips records, leaving absent fields absent', () => {
    const record = stat({ patternId: undefined, conversationId: undefined, wasSent: false, reason: 'low_confidence' });
    store.insertStats([record]);

    expect(store.loadStatsSince(SINCE)).toEqual([
      { id: 'stat-1', userId: 'u1', timestamp: '2026-01-15T09:00:00.000Z', wasSent: false, reason: 'low_confidence' },
    ]);
  });

  it('appends one line per entry', () => {
    store.insertStats([stat({ id: 'a' }), stat({ id: 'b' })]);
    store.updateStatFeedback('a', true, undefined);

    const lines = readFileSync(paths.stats, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(JSON.parse(lines[2])).toEqual({ kind: 'feedback', id: 'a', accepted: true });
  });

  it('ignores a record written twice', () => {
    store.insertStats([stat()]);
    store.insertStats([stat({ reason: 'rate_limited' })]);

    const records = store.loadStatsSince(SINCE);
    expect(records).toHaveLength(1);
    expect(records[0].reason).toBe('pattern_matched');
  });

  it('attaches feedback only once, and only to known records', () => {
    store.insertStats([stat()]);
    store.updateStatFeedback('stat-1', true, 'thanks');
    store.updateStatFeedback('stat-1', false, undefined);
    store.updateStatFeedback('unknown', false, undefined);

    expect(store.loadStatsSince(SINCE)).toEqual([stat({ userAccepted: true, feedback: 'thanks' })]);
    expect(readFileSync(paths.stats, 'utf-8').trimEnd().split('\n')).toHaveLength(2);
  });

  it('remembers logged ids across a restart', () => {
    store.insertStats([stat()]);
    store.updateStatFeedback('stat-1', true, undefined);
    store.closeStore();
    store.initStore(dir);

    store.insertStats([stat({ reason: 'rate_limited' })]);
    store.updateStatFeedback('stat-1', false, undefined);

    expect(store.loadStatsSince(SINCE)).toEqual([stat({ userAccepted: true })]);
  });

  it('loads the newest records since a date, oldest first', () => {
    store.insertStats([
      stat({ id: 'd', timestamp: '2026-01-14T00:00:00.000Z' }),
      stat({ id: 'a', timestamp: '2026-01-10T00:00:00.000Z' }),
      stat({ id: 'c', timestamp: '2026-01-13T00:00:00.000Z' }),
      stat({ id: 'b', timestamp: '2026-01-12T00:00:00.000Z' }),
    ]);

    expect(store.loadStatsSince('2026-01-11T00:00:00.000Z').map(r => r.id)).toEqual(['b', 'c', 'd']);
    expect(store.loadStatsSince('2026-01-11T00:00:00.000Z', 2).map(r => r.id)).toEqual(['c', 'd']);
  });

  it('skips lines it cannot read', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    store.insertStats([stat()]);
    appendFileSync(paths.stats, '{"kind":"record"\n{"kind":"other"}\n');

    expect(store.loadStatsSince(SINCE).map(r => r.id)).toEqual(['stat-1']);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenLastCalledWith('[tact] Skipping invalid stats line 3');
  });

  it('serves as the stats sink', async () => {
    const sink = store.createStatsSink();
    await sink.write([stat()]);
    await sink.attachFeedback('stat-1', false, undefined);

    expect(store.loadStatsSince(SINCE)[0].userAccepted).toBe(false);
  });
});
