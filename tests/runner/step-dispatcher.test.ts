import { describe, it, expect } from 'vitest';
import { StepDispatcher } from '../../src/runner/step-dispatcher.js';
import { ActionRegistry, createDefaultRegistry } from '../../src/actions/action-registry.js';
import { DriverError, DriverTimeoutError } from '../../src/exception/errors.js';
import { compileStep, createTestContext } from '../support/action-context.js';

describe('StepDispatcher', () => {
  const dispatcher = new StepDispatcher(createDefaultRegistry());

  it('runs the registered handler', async () => {
    const ctx = createTestContext();
    const result = await dispatcher.dispatch(compileStep({ action: 'set_var', name: 'greeting', value: 'hi' }), ctx);
    expect(result).toEqual({ kind: 'next' });
    expect(ctx.variables.get('greeting')).toBe('hi');
  });

  it('stops on an unknown action', async () => {
    const result = await dispatcher.dispatch(compileStep({ action: 'fly' }), createTestContext());
    expect(result).toEqual({ kind: 'stop', reason: 'Unknown action fly' });
  });

  it('stops on a kind the registry lacks', async () => {
    const empty = new StepDispatcher(new ActionRegistry());
    const result = await empty.dispatch(compileStep({ action: 'log', value: 'x' }), createTestContext());
    expect(result).toEqual({ kind: 'stop', reason: 'Unknown action log' });
  });

  it('turns driver timeouts into a stop', async () => {
    const ctx = createTestContext();
    ctx.driver.click.mockRejectedValue(new DriverTimeoutError('Timeout 500ms exceeded', 'click'));
    const result = await dispatcher.dispatch(compileStep({ action: 'click', selector: '#go' }), ctx);
    expect(result).toEqual({ kind: 'stop', reason: 'Timeout in action click: Timeout 500ms exceeded' });
  });

  it('turns driver failures into a stop', async () => {
    const ctx = createTestContext();
    ctx.driver.open.mockRejectedValue(new DriverError('net::ERR_CONNECTION_REFUSED', 'open'));
    const result = await dispatcher.dispatch(compileStep({ action: 'goto', value: 'http://localhost:1' }), ctx);
    expect(result).toEqual({ kind: 'stop', reason: 'Driver error in goto: net::ERR_CONNECTION_REFUSED' });
  });

  it('refreshes cookies before a step that mentions them', async () => {
    const ctx = createTestContext();
    await dispatcher.dispatch(compileStep({ action: 'log', value: '{{cookies}}' }), ctx);
    expect(ctx.driver.cookies).toHaveBeenCalledTimes(1);
    expect(ctx.variables.get('cookies')).toBe('[]');
  });
});
