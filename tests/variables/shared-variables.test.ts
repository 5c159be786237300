import { describe, it, expect, vi } from 'vitest';
import {
  SharedVariables,
  loadSharedVariables,
  persistSharedSetting,
  saveSharedVariables,
  splitLines,
} from '../../src/variables/shared-variables.js';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileSettingsStore, MemorySettingsStore } from '../../src/storage/settings-store.js';
import { createEngineLogger } from '../../src/logging/logger.js';

describe('SharedVariables', () => {
  it('reads missing keys as an empty string', () => {
    const shared = new SharedVariables({ a: 'x' });
    expect(shared.get('a')).toBe('x');
    expect(shared.get('b')).toBe('');
    expect(shared.has('b')).toBe(false);
  });

  it('returns copies of list values', () => {
    const shared = new SharedVariables({ pool: ['1', '2'] });
    const snapshot = shared.all();
    const pool = snapshot.pool;
    if (Array.isArray(pool)) pool.push('3');
    expect(shared.get('pool')).toEqual(['1', '2']);
  });

  it('applies update atomically and returns the callback result', () => {
    const shared = new SharedVariables({ pool: ['first', 'second'] });
    const popped = shared.update('pool', (current) => {
      const items = Array.isArray(current) ? current : [];
      return { value: items.slice(1), result: items[0] };
    });
    expect(popped).toBe('first');
    expect(shared.get('pool')).toEqual(['second']);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const shared = new SharedVariables();
    const listener = vi.fn();
    const unsubscribe = shared.subscribe(listener);
    shared.set('k', 'v');
    expect(listener).toHaveBeenCalledWith({ k: 'v' });
    unsubscribe();
    shared.replaceAll({ other: 'x' });
    expect(listener).toHaveBeenCalledTimes(1);
    expect(shared.all()).toEqual({ other: 'x' });
  });

  it('keeps notifying after a listener throws', () => {
    const logger = createEngineLogger({ silent: true });
    const warn = vi.spyOn(logger, 'warn');
    const shared = new SharedVariables({}, logger);
    const good = vi.fn();
    shared.subscribe(() => {
      throw new Error('boom');
    });
    shared.subscribe(good);
    shared.set('k', 'v');
    expect(good).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Shared variable listener failed: boom');
  });
});

describe('splitLines', () => {
  it('drops blank lines and trims', () => {
    expect(splitLines(' a \r\n\r\nb\n  \n')).toEqual(['a', 'b']);
  });
});

describe('settings round trip', () => {
  it('loads list and string definitions', async () => {
    const settings = new MemorySettingsStore({
      shared_variables: {
        pool: { type: 'list', value: 'one\ntwo\n' },
        token: { type: 'string', value: ['a', 'b'] },
        broken: { type: 'weird', value: 5 },
      },
    });
    expect(await loadSharedVariables(settings)).toEqual({ pool: ['one', 'two'], token: 'a\nb', broken: '' });
  });

  it('loads nothing from a missing or malformed setting', async () => {
    expect(await loadSharedVariables(new MemorySettingsStore())).toEqual({});
    expect(await loadSharedVariables(new MemorySettingsStore({ shared_variables: 'oops' }))).toEqual({});
  });

  it('persists one key keeping its declared type', async () => {
    const settings = new MemorySettingsStore({ shared_variables: { pool: { type: 'list', value: ['a', 'b'] } } });
    await persistSharedSetting(settings, 'pool', 'b\nc');
    await persistSharedSetting(settings, 'fresh', ['x', 'y']);
    expect(await settings.get('shared_variables')).toEqual({
      pool: { type: 'list', value: ['b', 'c'] },
      fresh: { type: 'string', value: 'x\ny' },
    });
  });

  it('saves every shared value, inferring list type for new arrays', async () => {
    const settings = new MemorySettingsStore({ shared_variables: { note: { type: 'string', value: 'old' } } });
    const shared = new SharedVariables({ note: 'new', pool: ['1'] });
    await saveSharedVariables(settings, shared);
    expect(await settings.get('shared_variables')).toEqual({
      note: { type: 'string', value: 'new' },
      pool: { type: 'list', value: ['1'] },
    });
  });
});

describe('persistSharedSetting on a settings file', () => {
  it('keeps both keys when two accounts write back at once', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'shared-settings-'));
    try {
      const settings = new FileSettingsStore(dir);
      await Promise.all([
        persistSharedSetting(settings, 'emails', 'b@test\nc@test'),
        persistSharedSetting(settings, 'phones', '555-0101'),
      ]);
      expect(await settings.get('shared_variables')).toEqual({
        emails: { type: 'string', value: 'b@test\nc@test' },
        phones: { type: 'string', value: '555-0101' },
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
