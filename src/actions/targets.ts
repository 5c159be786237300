import type { ActionContext } from './action-types.js';
import { compileTargetsPattern, matchTargets } from '../scenario/pattern.js';
import { extractMessage } from '../exception/classifier.js';

export type TargetsOutcome =
  | { kind: 'match'; values: Record<string, string> }
  | { kind: 'no_placeholders' }
  | { kind: 'no_match' };

export const NO_PLACEHOLDERS_REASON = 'Pattern must contain placeholders like {{name}}';

export function applyTargets(pattern: string, source: string): TargetsOutcome {
  const compiled = compileTargetsPattern(pattern);
  if (!compiled) return { kind: 'no_placeholders' };
  const values = matchTargets(compiled, source);
  return values ? { kind: 'match', values } : { kind: 'no_match' };
}

/** Store extracted fields on the account record; failures are logged. */
export async function saveAccountFields(ctx: ActionContext, updates: Record<string, string>): Promise<void> {
  if (Object.keys(updates).length === 0) return;
  try {
    await ctx.accounts.update(ctx.account.name, updates);
    Object.assign(ctx.account, updates);
  } catch (error) {
    ctx.logger.warn(`Failed to save account data for ${ctx.account.name}: ${extractMessage(error)}`);
  }
}
