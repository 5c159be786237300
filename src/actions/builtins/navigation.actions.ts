import { setTimeout as sleep } from 'node:timers/promises';
import { StepResult } from '../../types/index.js';
import type { ActionDefinition } from '../action-types.js';
import { toLoadState } from '../../engines/page-driver.js';
import { integerOrNull, numberOrNull, pickDefined, pickField, templateField, textField } from '../step-fields.js';

export const startAction: ActionDefinition = {
  kind: 'start',
  description: 'Entry marker; does nothing.',
  handler: async () => StepResult.next(),
};

export const gotoAction: ActionDefinition = {
  kind: 'goto',
  description: 'Open a URL in the current tab.',
  handler: async ({ definition }, ctx) => {
    const url = templateField(definition, ctx.variables, 'value', 'url');
    await ctx.driver.open(url, {
      waitUntil: toLoadState(definition.wait_until),
      timeoutMs: numberOrNull(definition.timeout_ms),
    });
    return StepResult.next();
  },
};

export const waitForLoadStateAction: ActionDefinition = {
  kind: 'wait_for_load_state',
  description: 'Wait until the page reaches a load state.',
  handler: async ({ definition }, ctx) => {
    const state = toLoadState(pickField(definition, 'state', 'wait_until'));
    await ctx.driver.waitForLoadState(state, numberOrNull(definition.timeout_ms));
    return StepResult.next();
  },
};

export function sleepSeconds(seconds: unknown, timeoutMs: unknown): number {
  const raw = seconds ?? (numberOrNull(timeoutMs) ?? 0) / 1000;
  const parsed = numberOrNull(raw);
  return parsed === null ? 0 : Math.max(0, parsed);
}

export const sleepAction: ActionDefinition = {
  kind: 'sleep',
  description: 'Pause for `seconds` (or `timeout_ms`).',
  handler: async ({ definition }) => {
    await sleep(sleepSeconds(definition.seconds, definition.timeout_ms) * 1000);
    return StepResult.next();
  },
};

export const newTabAction: ActionDefinition = {
  kind: 'new_tab',
  description: 'Open a new tab, optionally navigating it.',
  handler: async ({ definition }, ctx) => {
    const url = templateField(definition, ctx.variables, 'value', 'url');
    await ctx.driver.newTab(url || null, {
      waitUntil: toLoadState(definition.wait_until),
      timeoutMs: numberOrNull(definition.timeout_ms),
    });
    return StepResult.next();
  },
};

export const switchTabAction: ActionDefinition = {
  kind: 'switch_tab',
  description: 'Make the tab at `index` current.',
  handler: async ({ definition }, ctx) => {
    let index = integerOrNull(pickDefined(definition, 'index', 'tab_index'));
    if (index === null) {
      const fromVar = textField(definition, 'from_var');
      index = fromVar ? integerOrNull(ctx.variables.get(fromVar)) ?? 0 : 0;
    }
    if (await ctx.driver.switchTab(index)) return StepResult.next();
    return StepResult.stop(`Tab index ${index} is out of range`);
  },
};

export const closeTabAction: ActionDefinition = {
  kind: 'close_tab',
  description: 'Close the tab at `index`, or the current one.',
  handler: async ({ definition }, ctx) => {
    await ctx.driver.closeTab(integerOrNull(pickDefined(definition, 'index', 'tab_index')));
    return StepResult.next();
  },
};

export const navigationActions: ActionDefinition[] = [
  startAction,
  gotoAction,
  waitForLoadStateAction,
  sleepAction,
  newTabAction,
  switchTabAction,
  closeTabAction,
];
