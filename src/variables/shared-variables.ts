import type { Logger } from 'winston';
import type { SharedVariableDefinitions } from '../types/index.js';
import { SharedVariableDefinitionsSchema } from '../schemas/index.js';
import type { SettingsStore } from '../storage/settings-store.js';
import { extractMessage } from '../exception/classifier.js';

export type SharedValue = string | string[];
export type SharedSnapshot = Record<string, SharedValue>;
export type SharedListener = (snapshot: SharedSnapshot) => void;

export const SHARED_VARIABLES_SETTING = 'shared_variables';

/**
 * Process-wide variables shared by every executor of a batch. All mutations
 * are synchronous, so a read-modify-write through `update` cannot interleave
 * with another executor on the event loop.
 */
export class SharedVariables {
  private values = new Map<string, SharedValue>();
  private listeners = new Set<SharedListener>();

  constructor(
    initial: SharedSnapshot = {},
    private logger?: Logger,
  ) {
    for (const [key, value] of Object.entries(initial)) this.values.set(key, value);
  }

  /** Missing keys read as an empty string. */
  get(name: string): SharedValue {
    return this.values.get(name) ?? '';
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  all(): SharedSnapshot {
    const snapshot: SharedSnapshot = {};
    for (const [key, value] of this.values) {
      snapshot[key] = Array.isArray(value) ? [...value] : value;
    }
    return snapshot;
  }

  set(name: string, value: SharedValue): void {
    this.values.set(name, value);
    this.notify();
  }

  replaceAll(values: SharedSnapshot): void {
    this.values = new Map(Object.entries(values));
    this.notify();
  }

  update<T>(name: string, fn: (current: SharedValue) => { value: SharedValue; result: T }): T {
    const { value, result } = fn(this.get(name));
    this.values.set(name, value);
    this.notify();
    return result;
  }

  subscribe(listener: SharedListener): () => void {
    this.listeners.add(listener);
    return () => this.unsubscribe(listener);
  }

  unsubscribe(listener: SharedListener): void {
    this.listeners.delete(listener);
  }

  private notify(): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(this.all());
      } catch (error) {
        this.logger?.warn(`Shared variable listener failed: ${extractMessage(error)}`);
      }
    }
  }
}

export function splitLines(value: string): string[] {
  return value
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function toDefinitions(value: unknown): SharedVariableDefinitions {
  const parsed = SharedVariableDefinitionsSchema.safeParse(value);
  return parsed.success ? parsed.data : {};
}

export async function readSharedDefinitions(settings: SettingsStore): Promise<SharedVariableDefinitions> {
  return toDefinitions(await settings.get(SHARED_VARIABLES_SETTING));
}

/** Build the runtime map from the `shared_variables` setting. */
export async function loadSharedVariables(settings: SettingsStore): Promise<SharedSnapshot> {
  const definitions = await readSharedDefinitions(settings);
  const values: SharedSnapshot = {};
  for (const [key, definition] of Object.entries(definitions)) {
    if (definition.type === 'list') {
      values[key] = Array.isArray(definition.value) ? [...definition.value] : splitLines(definition.value);
    } else {
      values[key] = Array.isArray(definition.value) ? definition.value.join('\n') : definition.value;
    }
  }
  return values;
}

function toDefinitionValue(type: 'string' | 'list', value: SharedValue): SharedValue {
  if (type === 'list') return Array.isArray(value) ? value : splitLines(value);
  return Array.isArray(value) ? value.join('\n') : value.replace(/\r\n/g, '\n');
}

/** Write one key back, keeping the declared type of an existing entry. */
export async function persistSharedSetting(settings: SettingsStore, key: string, value: SharedValue): Promise<void> {
  await settings.update(SHARED_VARIABLES_SETTING, (current) => {
    const definitions = toDefinitions(current);
    const type = definitions[key]?.type ?? 'string';
    definitions[key] = { type, value: toDefinitionValue(type, value) };
    return definitions;
  });
}

/** Write every shared value back to settings at the end of a batch. */
export async function saveSharedVariables(settings: SettingsStore, shared: SharedVariables): Promise<void> {
  const values = shared.all();
  await settings.update(SHARED_VARIABLES_SETTING, (current) => {
    const definitions = toDefinitions(current);
    for (const [key, value] of Object.entries(values)) {
      const type = definitions[key]?.type ?? (Array.isArray(value) ? 'list' : 'string');
      definitions[key] = { type, value: toDefinitionValue(type, value) };
    }
    return definitions;
  });
}
