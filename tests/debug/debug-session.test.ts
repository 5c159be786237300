import { describe, it, expect, vi } from 'vitest';
import { DebugSession } from '../../src/debug/debug-session.js';
import type { StepSnapshot } from '../../src/debug/debug-session.js';
import type { DebugDecision } from '../../src/types/index.js';
import { createEngineLogger } from '../../src/logging/logger.js';

const snapshot: StepSnapshot = {
  scenario: 'login',
  account: 'alice',
  stepIndex: 0,
  totalSteps: 3,
  action: 'click',
  description: 'Press login',
  tag: 'Step1',
};

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function track(promise: Promise<DebugDecision>): { decision: DebugDecision | null } {
  const state: { decision: DebugDecision | null } = { decision: null };
  void promise.then((decision) => {
    state.decision = decision;
  });
  return state;
}

describe('DebugSession.beforeStep', () => {
  it('publishes the step and proceeds while running', async () => {
    const session = new DebugSession();
    expect(await session.beforeStep(snapshot)).toEqual({ kind: 'proceed' });
    expect(session.account).toBe('alice');
    expect(session.events.drain()).toEqual([{ type: 'step', update: { ...snapshot, reloadedAt: null } }]);
  });

  it('waits while paused and proceeds on resume', async () => {
    const session = new DebugSession();
    session.pause();
    expect(session.paused).toBe(true);

    const state = track(session.beforeStep(snapshot));
    await flush();
    expect(state.decision).toBeNull();

    session.resume();
    await flush();
    expect(state.decision).toEqual({ kind: 'proceed' });
  });

  it('returns a pending jump once', async () => {
    const session = new DebugSession();
    session.pause();
    const state = track(session.beforeStep(snapshot));
    session.requestJumpToStep(2.9);
    await flush();
    expect(state.decision).toEqual({ kind: 'jump_index', index: 2 });
    expect(session.consumeJump()).toEqual({ kind: 'proceed' });
  });

  it('clamps jump indices and ignores blank tags', () => {
    const session = new DebugSession();
    session.requestJumpToStep(-3.7);
    expect(session.consumeJump()).toEqual({ kind: 'jump_index', index: 0 });
    session.requestJumpToTag('   ');
    expect(session.consumeJump()).toEqual({ kind: 'proceed' });
    session.requestJumpToTag(' checkout ');
    expect(session.consumeJump()).toEqual({ kind: 'jump_tag', tag: 'checkout' });
  });

  it('stops a waiting step', async () => {
    const session = new DebugSession();
    session.pause();
    const state = track(session.beforeStep(snapshot));
    session.requestStop();
    await flush();
    expect(state.decision).toEqual({ kind: 'stop' });
    expect(await session.beforeStep(snapshot)).toEqual({ kind: 'stop' });
  });

  it('proceeds silently once disabled', async () => {
    const session = new DebugSession();
    session.disable();
    session.pause();
    expect(session.paused).toBe(false);
    expect(await session.beforeStep(snapshot)).toEqual({ kind: 'proceed' });
    expect(session.events.size).toBe(0);
  });

  it('carries the last reload time in later updates', async () => {
    const session = new DebugSession();
    vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
    session.notifyReload();
    vi.restoreAllMocks();
    await session.beforeStep(snapshot);
    expect(session.lastReloadAt).toBe(1_700_000_000_000);
    expect(session.events.drain()).toEqual([
      { type: 'reloaded', at: 1_700_000_000_000 },
      { type: 'step', update: { ...snapshot, reloadedAt: 1_700_000_000_000 } },
    ]);
  });
});

describe('DebugSession.waitForCommand', () => {
  it('re-pauses on a bare resume and returns the next jump', async () => {
    const session = new DebugSession();
    session.pause();
    const state = track(session.waitForCommand());

    session.resume();
    await flush();
    expect(state.decision).toBeNull();
    expect(session.paused).toBe(true);

    session.requestJumpToTag('Step2');
    await flush();
    expect(state.decision).toEqual({ kind: 'jump_tag', tag: 'Step2' });
  });

  it('returns stop for a stopped or disabled session', async () => {
    const stopped = new DebugSession();
    stopped.requestStop();
    expect(await stopped.waitForCommand()).toEqual({ kind: 'stop' });

    const disabled = new DebugSession();
    disabled.disable();
    expect(await disabled.waitForCommand()).toEqual({ kind: 'stop' });
  });
});

describe('DebugSession notifications', () => {
  it('ignores browser closures of other accounts', async () => {
    const session = new DebugSession();
    await session.beforeStep(snapshot);
    session.events.drain();

    session.notifyBrowserClosedFor('bob');
    expect(session.stopRequested).toBe(false);

    session.notifyBrowserClosedFor('alice');
    expect(session.stopRequested).toBe(true);
    expect(session.events.drain()).toEqual([{ type: 'browser_closed' }]);
  });

  it('publishes finished events', () => {
    const session = new DebugSession();
    session.notifyFinished(false, 'Element not found for click');
    expect(session.events.drain()).toEqual([{ type: 'finished', ok: false, reason: 'Element not found for click' }]);
  });

  it('keeps the initial step until consumed', () => {
    const session = new DebugSession();
    session.setInitialStep(4);
    expect(session.consumeInitialStep()).toBe(4);
    expect(session.consumeInitialStep()).toBeNull();
  });

  it('logs instead of throwing once the queue is closed', () => {
    const logger = createEngineLogger({ silent: true });
    const warn = vi.spyOn(logger, 'warn');
    const session = new DebugSession({ logger });
    session.events.close();
    session.notifyFinished(true, null);
    expect(warn).toHaveBeenCalledWith('Dropping debug event finished: Event queue is closed');
  });
});
