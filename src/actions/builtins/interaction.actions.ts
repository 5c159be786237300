import { StepResult } from '../../types/index.js';
import type { StepDefinition } from '../../types/index.js';
import type { PageElement } from '../../engines/page-driver.js';
import type { ActionContext, ActionDefinition } from '../action-types.js';
import { buildElementTarget, locateOptions } from '../element-target.js';
import { booleanField, integerOrNull, pickField, templateField, textField } from '../step-fields.js';
import { extractMessage } from '../../exception/classifier.js';
import { resolveTemplate, stringifyVariable } from '../../scenario/template.js';

async function locate(step: StepDefinition, ctx: ActionContext): Promise<PageElement | null> {
  const target = await buildElementTarget(step, ctx.variables, ctx.settings);
  if (!target) return null;
  return ctx.driver.locate(target, locateOptions(step));
}

export const waitElementAction: ActionDefinition = {
  kind: 'wait_element',
  description: 'Wait until an element reaches `state`.',
  handler: async ({ definition }, ctx) => {
    const target = await buildElementTarget(definition, ctx.variables, ctx.settings);
    if (!target) return StepResult.stop('Selector is empty for wait_element');
    const element = await ctx.driver.locate(target, locateOptions(definition));
    if (!element) return StepResult.stop(`Selector ${target.selector} not found`);
    return StepResult.next();
  },
};

export const clickAction: ActionDefinition = {
  kind: 'click',
  description: 'Click an element.',
  handler: async ({ definition }, ctx) => {
    const element = await locate(definition, ctx);
    if (!element) return StepResult.stop('Element not found for click');
    const button = textField(definition, 'button');
    await ctx.driver.click(element, {
      button: button || null,
      delayMs: integerOrNull(definition.click_delay_ms),
    });
    return StepResult.next();
  },
};

export const typeAction: ActionDefinition = {
  kind: 'type',
  description: 'Focus an element and type text one character at a time.',
  handler: async ({ definition }, ctx) => {
    const element = await locate(definition, ctx);
    if (!element) return StepResult.stop('Element not found for typing');
    const text = templateField(definition, ctx.variables, 'value', 'text');
    try {
      await ctx.driver.click(element, { button: null, delayMs: null });
    } catch (error) {
      ctx.logger.debug(`Focus click before typing failed: ${extractMessage(error)}`);
    }
    await ctx.driver.type(element, text, { clear: booleanField(definition.clear, true) });
    return StepResult.next();
  },
};

export const extractAction: ActionDefinition = {
  kind: 'extract',
  description: 'Read an attribute or the text of an element into a variable.',
  handler: async ({ definition }, ctx) => {
    const element = await locate(definition, ctx);
    if (!element) return StepResult.stop('Element not found for extract_text');

    const attribute = resolveTemplate(stringifyVariable(pickField(definition, 'attribute')), ctx.variables);
    const raw = attribute
      ? await ctx.driver.getAttribute(element, attribute)
      : await ctx.driver.getText(element);
    let content = raw ?? '';
    if (booleanField(definition.strip, true)) content = content.trim();

    const target = textField(definition, 'to_var', 'var', 'name') || 'last_value';
    ctx.variables.set(target, content);
    ctx.logger.info(`Saved content to var ${target}: ${content}`);
    return StepResult.next();
  },
};

export const interactionActions: ActionDefinition[] = [waitElementAction, clickAction, typeAction, extractAction];

