import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, utimes, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ScenarioExecutor } from '../../src/runner/scenario-executor.js';
import type { ScenarioExecutorOptions } from '../../src/runner/scenario-executor.js';
import { ActionRegistry } from '../../src/actions/action-registry.js';
import { DebugSession } from '../../src/debug/debug-session.js';
import { RunLogger } from '../../src/logging/run-logger.js';
import { MemorySettingsStore } from '../../src/storage/settings-store.js';
import { SharedVariables } from '../../src/variables/shared-variables.js';
import { StepResult } from '../../src/types/index.js';
import type { DebugEvent, ScenarioDefinition, StepDefinition } from '../../src/types/index.js';
import { createFakeDriver } from '../support/fake-driver.js';
import { MemoryAccountStore, MemoryScenarioStore } from '../support/stores.js';
import { silentLogger } from '../support/action-context.js';

function scenario(steps: StepDefinition[], name = 'main'): ScenarioDefinition {
  return { name, description: null, steps };
}

function createExecutor(
  definition: ScenarioDefinition,
  overrides: Partial<ScenarioExecutorOptions> = {},
): ScenarioExecutor {
  return new ScenarioExecutor({
    scenario: definition,
    account: { name: 'alice' },
    driver: createFakeDriver(),
    shared: new SharedVariables(),
    accounts: new MemoryAccountStore([{ name: 'alice' }]),
    settings: new MemorySettingsStore(),
    scenarios: new MemoryScenarioStore(),
    outputsDir: tmpdir(),
    logger: silentLogger,
    ...overrides,
  });
}

async function nextEvent(session: DebugSession): Promise<DebugEvent> {
  const event = await session.events.next();
  if (!event) throw new Error('Debug queue closed');
  return event;
}

describe('ScenarioExecutor', () => {
  it('runs steps in order and completes', async () => {
    const executor = createExecutor(
      scenario([
        { action: 'start' },
        { action: 'set_var', name: 'greeting', value: 'hello' },
        { action: 'set_var', name: 'echo', value: '{{greeting}} {{name}}' },
      ]),
    );
    expect(await executor.run()).toEqual({ ok: true, reason: null, state: 'completed' });
    expect(executor.variables.get('echo')).toBe('hello alice');
    expect(executor.state).toBe('completed');
  });

  it('refuses a structurally invalid scenario', async () => {
    const executor = createExecutor(scenario([{ action: 'fly' }]));
    expect(await executor.run()).toEqual({
      ok: false,
      reason: 'Scenario main is invalid: Step 1 (Step1): unknown action "fly"',
      state: 'stopped',
    });
  });

  it('follows compare branches', async () => {
    const executor = createExecutor(
      scenario([
        { action: 'set_var', name: 'status', value: 'ok' },
        { action: 'compare', left_var: 'status', op: 'equals', right: 'OK', true_step: 'good', false_step: 'bad' },
        { tag: 'bad', action: 'set_var', name: 'branch', value: 'bad', next_success_step: 'done' },
        { tag: 'good', action: 'set_var', name: 'branch', value: 'good' },
        { tag: 'done', action: 'log', value: 'branch {{branch}}' },
      ]),
    );
    expect((await executor.run()).state).toBe('completed');
    expect(executor.variables.get('branch')).toBe('good');
  });

  it('skips ahead on next_success_step', async () => {
    const executor = createExecutor(
      scenario([
        { action: 'set_var', name: 'a', value: '1', next_success_step: 'Step3' },
        { action: 'set_var', name: 'b', value: '1' },
        { action: 'set_var', name: 'c', value: '1' },
      ]),
    );
    await executor.run();
    expect(executor.variables.has('b')).toBe(false);
    expect(executor.variables.get('c')).toBe('1');
  });

  it('completes after a step without default links', async () => {
    const executor = createExecutor(
      scenario([
        { action: 'set_var', name: 'a', value: '1', _no_default_links: true },
        { action: 'set_var', name: 'b', value: '1' },
      ]),
    );
    expect((await executor.run()).state).toBe('completed');
    expect(executor.variables.has('b')).toBe(false);
  });

  it('stops with the step reason when no error step is set', async () => {
    const driver = createFakeDriver({ missing: ['#gone'] });
    const executor = createExecutor(scenario([{ action: 'click', selector: '#gone' }, { action: 'log' }]), { driver });
    expect(await executor.run()).toEqual({ ok: false, reason: 'Element not found for click', state: 'stopped' });
  });

  it('jumps to the error step on failure', async () => {
    const driver = createFakeDriver({ missing: ['#gone'] });
    const executor = createExecutor(
      scenario([
        { action: 'click', selector: '#gone', next_error_step: 'recover' },
        { action: 'set_var', name: 'skipped', value: '1' },
        { tag: 'recover', action: 'set_var', name: 'recovered', value: 'yes' },
      ]),
      { driver },
    );
    expect((await executor.run()).ok).toBe(true);
    expect(executor.variables.has('skipped')).toBe(false);
    expect(executor.variables.get('recovered')).toBe('yes');
  });

  it('ends on an end step and force-closes the browser', async () => {
    const driver = createFakeDriver();
    const executor = createExecutor(
      scenario([{ action: 'start' }, { action: 'end' }, { action: 'set_var', name: 'after', value: '1' }]),
      { driver },
    );
    expect(await executor.run()).toEqual({ ok: true, reason: null, state: 'ended' });
    expect(driver.close).toHaveBeenCalledWith({ force: true });
    expect(executor.variables.has('after')).toBe(false);
  });

  describe('nested scenarios', () => {
    it('shares variables with the nested run', async () => {
      const scenarios = new MemoryScenarioStore([
        scenario([{ action: 'set_var', name: 'from_child', value: 'yes' }], 'child'),
      ]);
      const executor = createExecutor(
        scenario([
          { action: 'run_scenario', scenario: 'child' },
          { action: 'set_var', name: 'after', value: '{{from_child}}' },
        ]),
        { scenarios },
      );
      expect((await executor.run()).state).toBe('completed');
      expect(executor.variables.get('after')).toBe('yes');
    });

    it('stops on recursion', async () => {
      const main = scenario([{ action: 'run_scenario', scenario: 'main' }]);
      const executor = createExecutor(main, { scenarios: new MemoryScenarioStore([main]) });
      expect(await executor.run()).toEqual({
        ok: false,
        reason: 'Recursive scenario call detected for main',
        state: 'stopped',
      });
    });

    it('reports a failed nested scenario', async () => {
      const scenarios = new MemoryScenarioStore([
        scenario([{ action: 'compare', left: 'a', right: 'b', true_step: 'x' }, { tag: 'x', action: 'log' }], 'child'),
      ]);
      const executor = createExecutor(scenario([{ action: 'run_scenario', scenario: 'child' }]), { scenarios });
      expect((await executor.run()).reason).toBe(
        'Nested scenario child failed: Compare is false but false branch is not configured',
      );
    });
  });

  describe('with files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'scenario-exec-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('writes a trace line per executed step', async () => {
      const runLogger = new RunLogger(join(dir, 'run-1'));
      const driver = createFakeDriver({ missing: ['#gone'] });
      const executor = createExecutor(scenario([{ action: 'start' }, { action: 'click', selector: '#gone' }]), {
        driver,
        runLogger,
      });
      await executor.run();

      const lines = (await readFile(runLogger.getLogPath(), 'utf-8')).trim().split('\n');
      const entries: unknown[] = lines.map((line) => JSON.parse(line));
      expect(entries).toHaveLength(2);
      expect(entries[0]).toMatchObject({
        scenario: 'main',
        account: 'alice',
        stepIndex: 0,
        tag: 'Step1',
        action: 'start',
        result: 'next',
      });
      expect(entries[1]).toMatchObject({
        stepIndex: 1,
        tag: 'Step2',
        action: 'click',
        result: 'stop',
        reason: 'Element not found for click',
      });
    });

    it('picks up edits to the scenario file between steps', async () => {
      const path = join(dir, 'hot.json');
      const original = scenario([{ action: 'start' }, { action: 'set_var', name: 'reloaded', value: 'no' }], 'hot');
      await writeFile(path, JSON.stringify(original));

      const registry = new ActionRegistry();
      registry.register({
        kind: 'start',
        description: 'rewrites the scenario file',
        handler: async () => {
          const edited = scenario([{ action: 'start' }, { action: 'set_var', name: 'reloaded', value: 'yes' }], 'hot');
          await writeFile(path, JSON.stringify(edited));
          const later = Date.now() / 1000 + 60;
          await utimes(path, later, later);
          return StepResult.next();
        },
      });
      registry.registerBuiltins();

      const executor = createExecutor(original, { scenarioPath: path, registry, hotReload: true });
      expect((await executor.run()).state).toBe('completed');
      expect(executor.variables.get('reloaded')).toBe('yes');
    });

    it('clamps the position when a reload shortens the scenario', async () => {
      const path = join(dir, 'shrink.json');
      const original = scenario(
        [
          { action: 'set_var', name: 'a', value: '1' },
          { action: 'set_var', name: 'b', value: '1' },
          { action: 'start' },
          { action: 'set_var', name: 'c', value: '1' },
        ],
        'shrink',
      );
      await writeFile(path, JSON.stringify(original));

      const registry = new ActionRegistry();
      registry.register({
        kind: 'start',
        description: 'shortens the scenario file',
        handler: async () => {
          const shortened = scenario([{ action: 'log' }, { action: 'set_var', name: 'last', value: 'yes' }], 'shrink');
          await writeFile(path, JSON.stringify(shortened));
          const later = Date.now() / 1000 + 60;
          await utimes(path, later, later);
          return StepResult.next();
        },
      });
      registry.registerBuiltins();

      const executor = createExecutor(original, { scenarioPath: path, registry, hotReload: true });
      expect(await executor.run()).toEqual({ ok: true, reason: null, state: 'completed' });
      expect(executor.variables.has('c')).toBe(false);
      expect(executor.variables.get('last')).toBe('yes');
    });
  });

  describe('under a debug session', () => {
    const steps: StepDefinition[] = [
      { action: 'set_var', name: 'a', value: '1' },
      { action: 'set_var', name: 'b', value: '1' },
      { action: 'set_var', name: 'c', value: '1' },
    ];

    it('stops a paused run on request', async () => {
      const debug = new DebugSession();
      debug.pause();
      const executor = createExecutor(scenario(steps), { debug });
      const run = executor.run();

      expect(await nextEvent(debug)).toMatchObject({ type: 'step', update: { stepIndex: 0, tag: 'Step1' } });
      debug.requestStop();
      expect(await run).toEqual({ ok: false, reason: 'Stopped by debugger', state: 'stopped' });
      expect(executor.variables.has('a')).toBe(false);
    });

    it('jumps to a step and waits for a command after finishing', async () => {
      const debug = new DebugSession();
      debug.pause();
      const executor = createExecutor(scenario(steps), { debug });
      const run = executor.run();

      await nextEvent(debug);
      debug.requestJumpToStep(2);
      expect(await nextEvent(debug)).toMatchObject({ type: 'step', update: { stepIndex: 2 } });
      expect(await nextEvent(debug)).toEqual({ type: 'finished', ok: true, reason: null });
      expect(executor.state).toBe('awaiting_debug_command');

      debug.requestStop();
      expect(await run).toEqual({ ok: true, reason: null, state: 'completed' });
      expect(executor.variables.has('a')).toBe(false);
      expect(executor.variables.get('c')).toBe('1');
    });

    it('stops on a jump past the last step', async () => {
      const debug = new DebugSession();
      debug.pause();
      const executor = createExecutor(scenario(steps), { debug });
      const run = executor.run();

      await nextEvent(debug);
      debug.requestJumpToStep(10);
      expect(await nextEvent(debug)).toEqual({
        type: 'finished',
        ok: false,
        reason: 'Jump target step 11 not found in scenario main',
      });
      debug.requestStop();
      expect((await run).reason).toBe('Jump target step 11 not found in scenario main');
    });

    it('restarts from a tag after the run finishes', async () => {
      const debug = new DebugSession();
      const executor = createExecutor(scenario(steps), { debug });
      const run = executor.run();

      const firstPass = [await nextEvent(debug), await nextEvent(debug), await nextEvent(debug)];
      expect(firstPass.map((event) => event.type)).toEqual(['step', 'step', 'step']);
      expect(await nextEvent(debug)).toEqual({ type: 'finished', ok: true, reason: null });

      debug.requestJumpToTag('Step2');
      expect(await nextEvent(debug)).toMatchObject({ type: 'step', update: { stepIndex: 1, tag: 'Step2' } });
      expect(await nextEvent(debug)).toMatchObject({ type: 'step', update: { stepIndex: 2 } });
      expect(await nextEvent(debug)).toEqual({ type: 'finished', ok: true, reason: null });

      debug.requestStop();
      expect((await run).state).toBe('completed');
    });
  });
});
