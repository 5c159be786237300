import { StepResult } from '../../types/index.js';
import type { ActionDefinition, NestedRunResult } from '../action-types.js';
import { compileScenario } from '../../scenario/graph.js';
import { templateField } from '../step-fields.js';
import { extractMessage } from '../../exception/classifier.js';

function onStack(stack: string[], name: string): boolean {
  const lowered = name.toLowerCase();
  return stack.some((entry) => entry.toLowerCase() === lowered);
}

export const runScenarioAction: ActionDefinition = {
  kind: 'run_scenario',
  description: 'Run another scenario inline, sharing variables and the debug session.',
  handler: async ({ definition }, ctx) => {
    const name = templateField(definition, ctx.variables, 'scenario', 'scenario_name', 'name', 'value').trim();
    if (!name) return StepResult.stop('Scenario name is empty for run_scenario action');
    if (onStack(ctx.callStack, name)) {
      return StepResult.stop(`Recursive scenario call detected for ${name}`);
    }

    const nested = await ctx.scenarios.load(name);
    if (!nested) return StepResult.stop(`Scenario ${name} not found`);
    const displayName = nested.name || name;
    if (onStack(ctx.callStack, displayName)) {
      return StepResult.stop(`Recursive scenario call detected for ${displayName}`);
    }

    const graph = compileScenario({ ...nested, name: displayName });
    if (graph.problems.length > 0) {
      return StepResult.stop(`Scenario ${displayName} is invalid: ${graph.problems.join('; ')}`);
    }

    const scenarioPath = await ctx.scenarios.pathFor(name);
    ctx.callStack.push(displayName);
    let outcome: NestedRunResult;
    try {
      outcome = await ctx.runNested(graph, scenarioPath);
    } finally {
      ctx.callStack.pop();
    }
    if (!outcome.ok) {
      return StepResult.stop(`Nested scenario ${displayName} failed: ${outcome.reason ?? 'unknown reason'}`);
    }
    return StepResult.next();
  },
};

export const setTagAction: ActionDefinition = {
  kind: 'set_tag',
  description: 'Record a stage label on the account.',
  handler: async ({ definition }, ctx) => {
    const stage = templateField(definition, ctx.variables, 'value', 'tag', 'stage').trim();
    await ctx.accounts.updateStage(ctx.account.name, stage || null);
    ctx.account.stage = stage;
    ctx.logger.info(`Tag for ${ctx.account.name} -> ${stage || 'None'}`);
    return StepResult.next();
  },
};

export const endAction: ActionDefinition = {
  kind: 'end',
  description: 'Close the browser and finish the run.',
  handler: async (_step, ctx) => {
    ctx.logger.info(`End step triggered; closing browser for ${ctx.account.name}`);
    try {
      await ctx.driver.close({ force: true });
    } catch (error) {
      ctx.logger.warn(`Failed to close browser on end step: ${extractMessage(error)}`);
    }
    return StepResult.end();
  },
};

export const flowActions: ActionDefinition[] = [runScenarioAction, setTagAction, endAction];
