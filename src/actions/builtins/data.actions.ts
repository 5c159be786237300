import { appendFile, mkdir, open, stat } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve } from 'node:path';
import { StepResult } from '../../types/index.js';
import type { ActionDefinition } from '../action-types.js';
import { evaluateComparison, resolveOperator } from '../compare.js';
import { applyTargets, NO_PLACEHOLDERS_REASON, saveAccountFields } from '../targets.js';
import { booleanField, templateField, textField } from '../step-fields.js';
import { extractMessage } from '../../exception/classifier.js';

export const setVarAction: ActionDefinition = {
  kind: 'set_var',
  description: 'Set an execution variable, a shared variable, or both.',
  handler: async ({ definition }, ctx) => {
    const name = textField(definition, 'name', 'variable', 'var');
    if (!name) return StepResult.next();

    const value = templateField(definition, ctx.variables, 'value', 'text');
    const scope = (textField(definition, 'scope') || 'profile').toLowerCase();
    ctx.variables.set(name, value);
    if (scope === 'shared' || scope === 'both') {
      ctx.shared.set(name, value);
      ctx.logger.info(`Shared variable ${name} set to ${value}`);
    } else {
      ctx.logger.info(`Scenario variable ${name} set to ${value}`);
    }
    await ctx.variables.persist();
    return StepResult.next();
  },
};

export const parseVarAction: ActionDefinition = {
  kind: 'parse_var',
  description: 'Split a value into variables using a `{{a}};{{b}}` pattern.',
  handler: async ({ definition }, ctx) => {
    const fromVar = textField(definition, 'from_var', 'var', 'name').trim();
    const source = fromVar
      ? ctx.variables.get(fromVar)
      : templateField(definition, ctx.variables, 'value', 'text');

    const pattern = textField(definition, 'pattern', 'targets_string').trim();
    if (!pattern) return StepResult.stop('Pattern is required for parse_var');

    const outcome = applyTargets(pattern, source);
    if (outcome.kind === 'no_placeholders') return StepResult.stop(NO_PLACEHOLDERS_REASON);
    if (outcome.kind === 'no_match') return StepResult.stop('Pattern did not match source for parse_var');

    for (const [key, value] of Object.entries(outcome.values)) {
      ctx.variables.set(key, value);
    }
    if (booleanField(definition.update_account, true)) {
      await saveAccountFields(ctx, outcome.values);
    }
    await ctx.variables.persist();
    ctx.logger.info(`Parsed ${fromVar || 'value'} -> ${Object.keys(outcome.values).sort().join(', ')}`);
    return StepResult.next();
  },
};

export const compareAction: ActionDefinition = {
  kind: 'compare',
  description: 'Compare two values and branch on the result.',
  handler: async ({ definition }, ctx) => {
    const rawOp = (textField(definition, 'op', 'operator') || 'equals').trim().toLowerCase();
    const op = resolveOperator(rawOp);
    if (!op) return StepResult.stop(`Unknown compare operator ${rawOp}`);
    const caseSensitive = booleanField(definition.case_sensitive, false);

    const leftVar = textField(definition, 'left_var', 'from_var', 'var', 'name').trim();
    const left = leftVar ? ctx.variables.get(leftVar) : templateField(definition, ctx.variables, 'left', 'a');
    const rightVar = textField(definition, 'right_var', 'b_var').trim();
    const right = rightVar ? ctx.variables.get(rightVar) : templateField(definition, ctx.variables, 'right', 'b', 'value');

    let result: boolean;
    try {
      result = evaluateComparison(op, left, right, caseSensitive);
    } catch (error) {
      return StepResult.stop(`Compare failed: ${extractMessage(error)}`);
    }

    const outVar = textField(definition, 'result_var', 'to_var').trim();
    if (outVar) {
      ctx.variables.set(outVar, result ? 'true' : 'false');
      await ctx.variables.persist();
    }

    const trueTarget = textField(definition, 'true_step', 'next_success_step');
    const falseTarget = textField(definition, 'false_step', 'next_error_step');
    if (result) {
      return trueTarget ? StepResult.jump(trueTarget) : StepResult.next();
    }
    if (falseTarget) return StepResult.jump(falseTarget);
    if (trueTarget) return StepResult.stop('Compare is false but false branch is not configured');
    return StepResult.next();
  },
};

export const logAction: ActionDefinition = {
  kind: 'log',
  description: 'Write a templated message to the log.',
  handler: async ({ definition }, ctx) => {
    const message = templateField(definition, ctx.variables, 'value', 'message', 'text');
    ctx.logger.info(`SCENARIO LOG: ${message}`);
    return StepResult.next();
  },
};

async function endsWithNewline(path: string): Promise<boolean> {
  const handle = await open(path, 'r');
  try {
    const { size } = await handle.stat();
    if (size === 0) return true;
    const buffer = Buffer.alloc(1);
    await handle.read(buffer, 0, 1, size - 1);
    return buffer[0] === 0x0a || buffer[0] === 0x0d;
  } finally {
    await handle.close();
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export const writeFileAction: ActionDefinition = {
  kind: 'write_file',
  description: 'Append a line to a file under the outputs directory.',
  handler: async ({ definition }, ctx) => {
    const filename = templateField(definition, ctx.variables, 'filename', 'file').trim();
    const content = templateField(definition, ctx.variables, 'value', 'text', 'message');
    if (!filename) return StepResult.stop('File name is required for write_file action');
    if (isAbsolute(filename)) return StepResult.stop('Absolute file paths are not allowed for write_file action');

    const filePath = resolve(ctx.outputsDir, filename);
    const fromRoot = relative(resolve(ctx.outputsDir), filePath);
    if (fromRoot.startsWith('..') || isAbsolute(fromRoot)) {
      return StepResult.stop(`File ${filename} is outside the outputs directory`);
    }

    try {
      await mkdir(dirname(filePath), { recursive: true });
    } catch (error) {
      return StepResult.stop(`Cannot create folder for file ${filePath}: ${extractMessage(error)}`);
    }

    try {
      const prefix = (await fileExists(filePath)) && !(await endsWithNewline(filePath)) ? '\n' : '';
      await appendFile(filePath, `${prefix}${content}\n`, 'utf-8');
    } catch (error) {
      return StepResult.stop(`Failed to write file ${filePath}: ${extractMessage(error)}`);
    }
    return StepResult.next();
  },
};

export const dataActions: ActionDefinition[] = [setVarAction, parseVarAction, compareAction, logAction, writeFileAction];
