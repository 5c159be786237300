import type { CompiledStep } from '../types/index.js';
import { StepResult } from '../types/index.js';
import type { ActionContext } from '../actions/action-types.js';
import type { ActionRegistry } from '../actions/action-registry.js';
import { describeStepFailure } from '../exception/classifier.js';

/**
 * Runs exactly one step and turns every outcome, thrown errors included,
 * into a StepResult.
 */
export class StepDispatcher {
  constructor(private registry: ActionRegistry) {}

  async dispatch(step: CompiledStep, ctx: ActionContext): Promise<StepResult> {
    try {
      await ctx.variables.refreshVolatile(step.definition, ctx.driver);
      const action = step.kind === 'unknown' ? undefined : this.registry.get(step.kind);
      if (!action) return StepResult.stop(`Unknown action ${step.action}`);
      return await action.handler(step, ctx);
    } catch (error) {
      return StepResult.stop(describeStepFailure(error, step.action));
    }
  }
}
