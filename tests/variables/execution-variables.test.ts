import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ExecutionVariables, dedupeCookies, formatTimestamp } from '../../src/variables/execution-variables.js';
import { createEngineLogger } from '../../src/logging/logger.js';
import { createFakeDriver } from '../support/fake-driver.js';

const logger = createEngineLogger({ silent: true });

describe('ExecutionVariables', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'exec-vars-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('seeds from account fields, flattened extra fields and shared values', () => {
    const vars = new ExecutionVariables({
      account: { name: 'alice', stage: null, proxy_port: 8080, extra_fields: { city: 'Oslo' } },
      shared: { city: 'Bergen', pool: ['a', 'b'] },
      persistPath: null,
      logger,
    });
    expect(vars.get('name')).toBe('alice');
    expect(vars.get('stage')).toBe('');
    expect(vars.get('proxy_port')).toBe('8080');
    expect(vars.get('city')).toBe('Bergen');
    expect(vars.get('pool')).toBe('a\nb');
    expect(vars.get('cookies')).toBe('[]');
    expect(vars.get('timestamp')).toBe('');
    expect(vars.has('extra_fields')).toBe(false);
  });

  it('refreshes cookies only when a step mentions them', async () => {
    const driver = createFakeDriver();
    driver.cookies.mockResolvedValue([
      { name: 'sid', value: '1', domain: 'example.test', path: '/' },
      { name: 'sid', value: '2', domain: 'example.test', path: '' },
    ]);
    const vars = new ExecutionVariables({ account: { name: 'alice' }, persistPath: null, logger });

    await vars.refreshVolatile({ action: 'log', value: 'plain' }, driver);
    expect(driver.cookies).not.toHaveBeenCalled();

    await vars.refreshVolatile({ action: 'log', value: '{{cookies}}' }, driver);
    expect(JSON.parse(vars.get('cookies'))).toEqual([{ name: 'sid', value: '1', domain: 'example.test', path: '/' }]);
  });

  it('falls back to an empty cookie list when the driver fails', async () => {
    const driver = createFakeDriver();
    driver.cookies.mockRejectedValue(new Error('context closed'));
    const vars = new ExecutionVariables({ account: { name: 'alice' }, persistPath: null, logger });
    vars.set('cookies', 'stale');
    await vars.refreshVolatile({ action: 'http_request', headers: { Cookie: '{{ cookies }}' } }, driver);
    expect(vars.get('cookies')).toBe('[]');
  });

  it('sets a timestamp when referenced', async () => {
    const vars = new ExecutionVariables({ account: { name: 'alice' }, persistPath: null, logger });
    await vars.refreshVolatile({ action: 'write_file', value: 'at {{timestamp}}' }, null);
    expect(vars.get('timestamp')).toMatch(/^\d{4}-\d{2}-\d{2}-\d{2}-\d{2}-\d{2}$/);
  });

  it('persists the whole map as JSON', async () => {
    const path = join(dir, 'profile', 'scenario_vars.json');
    const vars = new ExecutionVariables({ account: { name: 'alice' }, persistPath: path, logger });
    vars.set('token', 'abc');
    await vars.persist();
    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual({ name: 'alice', cookies: '[]', timestamp: '', token: 'abc' });
  });

  it('logs instead of throwing when persisting fails', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const blocker = join(dir, 'file');
    const vars = new ExecutionVariables({ account: { name: 'a' }, persistPath: blocker, logger });
    await vars.persist();
    const nested = new ExecutionVariables({ account: { name: 'a' }, persistPath: join(blocker, 'x.json'), logger });
    await nested.persist();
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});

describe('formatTimestamp', () => {
  it('formats local time with dashes', () => {
    expect(formatTimestamp(new Date(2026, 0, 5, 7, 8, 9))).toBe('2026-01-05-07-08-09');
  });
});

describe('dedupeCookies', () => {
  it('drops cookies without domain or name', () => {
    expect(
      dedupeCookies([
        { name: '', value: 'x', domain: 'a', path: '/' },
        { name: 'n', value: 'x', domain: '', path: '/' },
        { name: 'n', value: 'x', domain: 'a', path: '/p' },
        { name: 'n', value: 'y', domain: 'a', path: '/' },
      ]),
    ).toHaveLength(2);
  });
});
