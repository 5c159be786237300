import { join } from 'node:path';
import { SelectorIndicesSchema, SettingsSchema } from '../schemas/index.js';
import { pathExists, readJsonFile, withFileLock, writeJsonAtomic } from './json-file.js';

export interface SettingsStore {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown): Promise<void>;
  /** Replace `key` with `updater(current)` without another write landing in between. */
  update(key: string, updater: (current: unknown) => unknown): Promise<void>;
  /** Saved ordinal override for a selector, or null. */
  selectorIndex(selector: string): Promise<number | null>;
}

/**
 * Values written by older tools were JSON-encoded strings; decode those so
 * callers always see structured data.
 */
function decodeSetting(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) return value;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return parsed;
  } catch {
    return value;
  }
}

/** Settings kept as one JSON object in `<settingsDir>/settings.json`. */
export class FileSettingsStore implements SettingsStore {
  readonly filePath: string;

  constructor(settingsDir: string) {
    this.filePath = join(settingsDir, 'settings.json');
  }

  private async readAll(): Promise<Record<string, unknown>> {
    if (!(await pathExists(this.filePath))) return {};
    return SettingsSchema.parse(await readJsonFile(this.filePath));
  }

  async get(key: string): Promise<unknown> {
    const all = await this.readAll();
    return decodeSetting(all[key]);
  }

  async set(key: string, value: unknown): Promise<void> {
    await this.update(key, () => value);
  }

  async update(key: string, updater: (current: unknown) => unknown): Promise<void> {
    await withFileLock(this.filePath, async () => {
      const all = await this.readAll();
      all[key] = updater(decodeSetting(all[key]));
      await writeJsonAtomic(this.filePath, all);
    });
  }

  async selectorIndex(selector: string): Promise<number | null> {
    const parsed = SelectorIndicesSchema.safeParse(await this.get('selector_indices'));
    if (!parsed.success) return null;
    return parsed.data[selector] ?? null;
  }
}

/** In-memory settings, for embedding and tests. */
export class MemorySettingsStore implements SettingsStore {
  private values = new Map<string, unknown>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [key, value] of Object.entries(initial)) this.values.set(key, value);
  }

  async get(key: string): Promise<unknown> {
    return decodeSetting(this.values.get(key));
  }

  async set(key: string, value: unknown): Promise<void> {
    this.values.set(key, value);
  }

  async update(key: string, updater: (current: unknown) => unknown): Promise<void> {
    this.values.set(key, updater(decodeSetting(this.values.get(key))));
  }

  async selectorIndex(selector: string): Promise<number | null> {
    const parsed = SelectorIndicesSchema.safeParse(await this.get('selector_indices'));
    if (!parsed.success) return null;
    return parsed.data[selector] ?? null;
  }
}
