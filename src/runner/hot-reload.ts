import { stat } from 'node:fs/promises';
import type { Logger } from 'winston';
import type { ScenarioDefinition } from '../types/index.js';
import { loadScenarioFile } from '../scenario/loader.js';
import { extractMessage } from '../exception/classifier.js';

async function modifiedAt(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs;
  } catch {
    return null;
  }
}

/**
 * Tracks scenario files by modification time. The first check of a path only
 * records a baseline; later checks reload when the time has advanced.
 */
export class ScenarioWatcher {
  private seen = new Map<string, number>();

  constructor(private logger: Logger) {}

  /** The reloaded scenario, or null when the file is unchanged or unreadable. */
  async check(path: string): Promise<ScenarioDefinition | null> {
    const mtime = await modifiedAt(path);
    if (mtime === null) return null;

    const last = this.seen.get(path);
    if (last === undefined) {
      this.seen.set(path, mtime);
      return null;
    }
    if (mtime <= last) return null;

    try {
      const scenario = await loadScenarioFile(path);
      this.seen.set(path, mtime);
      return scenario;
    } catch (error) {
      this.logger.warn(`Hot reload of ${path} skipped: ${extractMessage(error)}`);
      return null;
    }
  }

  /** Record the current modification time, e.g. after an out-of-band reload. */
  async remember(path: string): Promise<void> {
    const mtime = await modifiedAt(path);
    if (mtime !== null) this.seen.set(path, mtime);
  }
}
