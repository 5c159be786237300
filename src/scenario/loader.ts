import { basename, extname } from 'node:path';
import { readFile } from 'node:fs/promises';
import type { ScenarioDefinition } from '../types/index.js';
import { ScenarioFileSchema } from '../schemas/index.js';
import { ScenarioLoadError } from '../exception/errors.js';

export function parseScenario(data: unknown, source: string, fallbackName: string): ScenarioDefinition {
  const result = ScenarioFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ScenarioLoadError(`Invalid scenario file ${source}${where}: ${issue.message}`, source);
  }
  const parsed = result.data;
  return {
    name: parsed.name || fallbackName,
    description: parsed.description ?? null,
    steps: parsed.steps ?? [],
  };
}

export async function loadScenarioFile(path: string): Promise<ScenarioDefinition> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ScenarioLoadError(`Cannot read scenario file ${path}`, path, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ScenarioLoadError(`Scenario file ${path} is not valid JSON`, path, { cause: error });
  }

  return parseScenario(data, path, basename(path, extname(path)));
}
