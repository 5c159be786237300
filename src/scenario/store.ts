import { readdir, rm, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ScenarioDefinition, StepDefinition } from '../types/index.js';
import { loadScenarioFile } from './loader.js';
import { pathExists, readJsonFile, safeFileName } from '../storage/json-file.js';
import { isPlainObject } from './template.js';

export interface ScenarioStore {
  list(): Promise<ScenarioDefinition[]>;
  /** Null when no file exists for the name; throws ScenarioLoadError for a broken file. */
  load(name: string): Promise<ScenarioDefinition | null>;
  /** Backing file used for hot reload, or null for stores without files. */
  pathFor(name: string): Promise<string | null>;
  save(name: string, steps: StepDefinition[], description?: string | null): Promise<void>;
  delete(name: string): Promise<void>;
}

/**
 * One JSON file per scenario. File names are derived from the scenario name,
 * but a file whose `name` field matches is found even if it was renamed.
 */
export class FileScenarioStore implements ScenarioStore {
  constructor(private dir: string) {}

  private directPath(name: string): string {
    return join(this.dir, `${safeFileName(name, 'scenario', 120)}.json`);
  }

  private async jsonFiles(): Promise<string[]> {
    try {
      const files = await readdir(this.dir);
      return files.filter((f) => f.endsWith('.json')).sort().map((f) => join(this.dir, f));
    } catch {
      return [];
    }
  }

  private async fileFor(name: string): Promise<string> {
    const direct = this.directPath(name);
    if (await pathExists(direct)) return direct;

    for (const path of await this.jsonFiles()) {
      try {
        const data = await readJsonFile(path);
        if (isPlainObject(data) && data.name === name) return path;
      } catch {
        continue;
      }
    }
    return direct;
  }

  async list(): Promise<ScenarioDefinition[]> {
    const scenarios: ScenarioDefinition[] = [];
    for (const path of await this.jsonFiles()) {
      try {
        scenarios.push(await loadScenarioFile(path));
      } catch {
        continue;
      }
    }
    return scenarios.sort((a, b) => a.name.localeCompare(b.name));
  }

  async load(name: string): Promise<ScenarioDefinition | null> {
    const path = await this.fileFor(name);
    if (!(await pathExists(path))) return null;
    return loadScenarioFile(path);
  }

  async pathFor(name: string): Promise<string | null> {
    return this.fileFor(name);
  }

  async save(name: string, steps: StepDefinition[], description: string | null = null): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const path = await this.fileFor(name);
    const payload = { name, description, steps };
    await writeFile(path, JSON.stringify(payload, null, 2), 'utf-8');
  }

  async delete(name: string): Promise<void> {
    await rm(await this.fileFor(name), { force: true });
  }
}
