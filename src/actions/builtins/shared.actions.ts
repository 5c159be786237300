import { StepResult } from '../../types/index.js';
import type { ActionDefinition } from '../action-types.js';
import type { SharedValue } from '../../variables/shared-variables.js';
import { persistSharedSetting, splitLines } from '../../variables/shared-variables.js';
import { applyTargets, NO_PLACEHOLDERS_REASON, saveAccountFields } from '../targets.js';
import { templateField, textField } from '../step-fields.js';
import { extractMessage } from '../../exception/classifier.js';

export function splitPool(value: SharedValue): string[] {
  if (Array.isArray(value)) {
    return value.map((item) => item.trim()).filter((item) => item.length > 0);
  }
  return splitLines(value);
}

export const popSharedAction: ActionDefinition = {
  kind: 'pop_shared',
  description: 'Take the first item of a shared pool and split it into variables.',
  handler: async ({ definition }, ctx) => {
    const key = templateField(definition, ctx.variables, 'value').trim();
    if (!key) return StepResult.stop('Shared key (value) is required for pop_shared');

    if (splitPool(ctx.shared.get(key)).length === 0) {
      return StepResult.stop(`No items in shared var ${key}`);
    }
    const { item, remaining } = ctx.shared.update(key, (current) => {
      const [first = '', ...rest] = splitPool(current);
      const left = rest.join('\n');
      return { value: left, result: { item: first, remaining: left } };
    });
    ctx.variables.set(key, remaining);
    try {
      await persistSharedSetting(ctx.settings, key, remaining);
    } catch (error) {
      ctx.logger.warn(`Failed to persist shared var ${key}: ${extractMessage(error)}`);
    }

    const pattern = textField(definition, 'pattern', 'targets_string').trim();
    if (!pattern) return StepResult.stop('Pattern (targets_string) is required for pop_shared');
    const outcome = applyTargets(pattern, item);
    if (outcome.kind === 'no_placeholders') return StepResult.stop(NO_PLACEHOLDERS_REASON);
    if (outcome.kind === 'no_match') return StepResult.stop(`Pattern did not match shared value for ${key}`);

    for (const [name, value] of Object.entries(outcome.values)) {
      ctx.variables.set(name, value);
    }
    ctx.logger.info(`Popped from shared ${key} -> ${item}`);
    await saveAccountFields(ctx, outcome.values);
    await ctx.variables.persist();
    return StepResult.next();
  },
};

export const sharedActions: ActionDefinition[] = [popSharedAction];
