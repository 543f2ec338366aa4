import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PatternRegistry, validatePattern, type PatternStore } from './registry.js';
import type { Pattern } from '../types/index.js';

function input(overrides: Record<string, unknown> = {}) {
  return {
    id: 'greeting_hello',
    trigger: '^(hello|hi)',
    messageType: 'greeting',
    template: 'Hello!',
    priority: 'immediate',
    keywords: ['hello'],
    ...overrides,
  };
}

function createMockStore(initial: unknown[] = []) {
  let rows = [...initial];
  return {
    loadAll: vi.fn(() => rows as Pattern[]),
    save: vi.fn((pattern: Pattern) => {
      rows = [...rows.filter(r => (r as Pattern).id !== pattern.id), pattern];
    }),
    delete: vi.fn((id: string) => {
      rows = rows.filter(r => (r as Pattern).id !== id);
    }),
    setRows(next: unknown[]) {
      rows = next;
    },
  } satisfies PatternStore & { setRows(next: unknown[]): void };
}

describe('validatePattern', () => {
  it('fills defaults', () => {
    const result = validatePattern(input({ priority: undefined, keywords: undefined }));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      id: 'greeting_hello',
      trigger: '^(hello|hi)',
      messageType: 'greeting',
      template: 'Hello!',
      priority: 'medium',
      keywords: [],
      baseConfidence: 0.8,
      minConfidence: 0.7,
      requiresContext: false,
      contextKeys: [],
      enabled: true,
    });
  });

  it('collapses duplicate keywords case-insensitively', () => {
    const result = validatePattern(input({ keywords: ['Hello', 'hello', 'hi'] }));
    expect(result.ok && result.value.keywords).toEqual(['hello', 'hi']);
  });

  it('rejects a trigger that is not a valid regex', () => {
    const result = validatePattern(input({ trigger: '(unclosed' }));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('VALIDATION_ERROR');
    expect(result.error.details.issues).toEqual([
      expect.objectContaining({ path: 'trigger' }),
    ]);
  });

  it('rejects minConfidence outside [0, 1]', () => {
    expect(validatePattern(input({ minConfidence: 1.2 })).ok).toBe(false);
    expect(validatePattern(input({ minConfidence: -0.1 })).ok).toBe(false);
  });

  it('rejects an unknown message type', () => {
    expect(validatePattern(input({ messageType: 'rant' })).ok).toBe(false);
  });
});

describe('PatternRegistry', () => {
  it('orders the snapshot by priority, then id', () => {
    const registry = new PatternRegistry();
    registry.load([
      input({ id: 'b_low', priority: 'low' }),
      input({ id: 'z_immediate', priority: 'immediate' }),
      input({ id: 'a_low', priority: 'low' }),
      input({ id: 'm_high', priority: 'high' }),
    ]);

    expect(registry.currentSnapshot().patterns.map(p => p.id)).toEqual([
      'z_immediate',
      'm_high',
      'a_low',
      'b_low',
    ]);
  });

  it('rejects an invalid upsert and leaves the snapshot unchanged', () => {
    const store = createMockStore();
    const registry = new PatternRegistry(store);
    registry.load([input()]);
    const before = registry.currentSnapshot();

    const result = registry.upsert(input({ id: 'broken', trigger: '[a-' }));

    expect(result.ok).toBe(false);
    expect(registry.currentSnapshot()).toBe(before);
    expect(store.save).not.toHaveBeenCalled();
  });

  it('upsert replaces by id, persists, and bumps the version', () => {
    const store = createMockStore();
    const registry = new PatternRegistry(store);
    registry.load([input()]);
    const before = registry.currentSnapshot();

    const result = registry.upsert(input({ template: 'Hi there!' }));

    expect(result.ok).toBe(true);
    const after = registry.currentSnapshot();
    expect(after.version).toBe(before.version + 1);
    expect(after.patterns).toHaveLength(1);
    expect(after.patterns[0].template).toBe('Hi there!');
    expect(store.save).toHaveBeenCalledTimes(1);
  });

  it('compiles keyword matchers with the pattern', () => {
    const registry = new PatternRegistry();
    registry.load([input({ keywords: ['hello', 'good day'] })]);

    const [compiled] = registry.currentSnapshot().patterns;
    expect(compiled.keywordMatchers.map(m => m.keyword)).toEqual(['hello', 'good day']);
    expect(compiled.keywordMatchers.map(m => m.regex.test('well, GOOD DAY'))).toEqual([false, true]);
  });

  it('a snapshot taken before a change never sees the change', () => {
    const registry = new PatternRegistry();
    registry.load([input({ id: 'one' }), input({ id: 'two' })]);
    const held = registry.currentSnapshot();

    registry.upsert(input({ id: 'three' }));
    registry.remove('one');

    expect(held.patterns.map(p => p.id)).toEqual(['one', 'two']);
    expect(registry.currentSnapshot().patterns.map(p => p.id)).toEqual(['three', 'two']);
    expect(Object.isFrozen(held.patterns)).toBe(true);
  });

  it('a load with one invalid pattern keeps the old set entirely', () => {
    const registry = new PatternRegistry();
    registry.load([input({ id: 'old' })]);

    const result = registry.load([input({ id: 'new_a' }), input({ id: 'new_b', minConfidence: 3 })]);

    expect(result.ok).toBe(false);
    expect(registry.currentSnapshot().patterns.map(p => p.id)).toEqual(['old']);
  });

  it('reload swaps in the whole store contents at once', () => {
    const store = createMockStore([input({ id: 'old_a' }), input({ id: 'old_b' })]);
    const registry = new PatternRegistry(store);
    registry.reload();
    const seen: string[][] = [];

    store.setRows([input({ id: 'new_a' }), input({ id: 'new_b' }), input({ id: 'new_c' })]);
    seen.push(registry.currentSnapshot().patterns.map(p => p.id));
    registry.reload();
    seen.push(registry.currentSnapshot().patterns.map(p => p.id));

    expect(seen).toEqual([
      ['old_a', 'old_b'],
      ['new_a', 'new_b', 'new_c'],
    ]);
  });

  it('reload without a store is a validation error', () => {
    const result = new PatternRegistry().reload();
    expect(result.ok).toBe(false);
  });

  it('remove returns false for unknown ids and deletes from the store', () => {
    const store = createMockStore();
    const registry = new PatternRegistry(store);
    registry.load([input()]);

    expect(registry.remove('missing')).toEqual({ ok: true, value: false });
    expect(registry.remove('greeting_hello')).toEqual({ ok: true, value: true });
    expect(store.delete).toHaveBeenCalledWith('greeting_hello');
    expect(registry.get('greeting_hello')).toBeNull();
  });

  describe('when the store fails', () => {
    function brokenStore(): PatternStore {
      return {
        loadAll: () => {
          throw new Error('EACCES');
        },
        save: () => {
          throw new Error('ENOSPC');
        },
        delete: () => {
          throw new Error('ENOSPC');
        },
      };
    }

    beforeEach(() => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('upsert returns an error and keeps the snapshot', () => {
      const registry = new PatternRegistry(brokenStore());
      registry.load([input()]);
      const before = registry.currentSnapshot();

      const result = registry.upsert(input({ id: 'new_one' }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('STORE_UNAVAILABLE');
      expect(result.error.message).toBe('Pattern store write failed: ENOSPC');
      expect(registry.currentSnapshot()).toBe(before);
    });

    it('remove returns an error and keeps the pattern', () => {
      const registry = new PatternRegistry(brokenStore());
      registry.load([input()]);

      const result = registry.remove('greeting_hello');

      expect(result.ok).toBe(false);
      expect(registry.get('greeting_hello')).not.toBeNull();
    });

    it('reload returns an error and keeps the snapshot', () => {
      const registry = new PatternRegistry(brokenStore());
      registry.load([input()]);
      const before = registry.currentSnapshot();

      const result = registry.reload();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('STORE_UNAVAILABLE');
      expect(registry.currentSnapshot()).toBe(before);
    });
  });

  it('list can filter to enabled patterns, and get returns plain copies', () => {
    const registry = new PatternRegistry();
    registry.load([input({ id: 'on' }), input({ id: 'off', enabled: false })]);

    expect(registry.list().map(p => p.id)).toEqual(['off', 'on']);
    expect(registry.list({ enabledOnly: true }).map(p => p.id)).toEqual(['on']);

    const got = registry.get('on');
    expect(got).not.toHaveProperty('regex');
    expect(got).not.toHaveProperty('keywordMatchers');
    got?.keywords.push('mutated');
    expect(registry.get('on')?.keywords).toEqual(['hello']);
  });

  it('summarises active and inactive patterns', () => {
    const registry = new PatternRegistry();
    registry.load([
      input({ id: 'on', description: 'Greets' }),
      input({ id: 'off', enabled: false, priority: 'low' }),
    ]);

    expect(registry.summary()).toEqual({
      total: 2,
      active: 1,
      inactive: 1,
      patterns: {
        on: { description: 'Greets', enabled: true, priority: 'immediate' },
        off: { description: null, enabled: false, priority: 'low' },
      },
    });
  });
});
