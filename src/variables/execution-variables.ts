import type { Logger } from 'winston';
import type { AccountRecord, StepDefinition } from '../types/index.js';
import type { BrowserCookie, PageDriver } from '../engines/page-driver.js';
import type { SharedSnapshot } from './shared-variables.js';
import { mentionsVariable, stringifyVariable } from '../scenario/template.js';
import { writeJsonAtomic } from '../storage/json-file.js';
import { extractMessage } from '../exception/classifier.js';

export interface ExecutionVariablesOptions {
  account: AccountRecord;
  shared?: SharedSnapshot;
  /** `scenario_vars.json` of the profile; null disables persistence. */
  persistPath: string | null;
  logger: Logger;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD-HH-MM-SS`. */
export function formatTimestamp(date: Date = new Date()): string {
  return [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join('-');
}

export function dedupeCookies(cookies: BrowserCookie[]): BrowserCookie[] {
  const seen = new Set<string>();
  const unique: BrowserCookie[] = [];
  for (const cookie of cookies) {
    if (!cookie.domain || !cookie.name) continue;
    const key = `${cookie.domain}\u0000${cookie.name}\u0000${cookie.path || '/'}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(cookie);
  }
  return unique;
}

/** Variables local to one executor run; every value is a string. */
export class ExecutionVariables {
  private values = new Map<string, string>();
  private persistPath: string | null;
  private logger: Logger;

  constructor(options: ExecutionVariablesOptions) {
    this.persistPath = options.persistPath;
    this.logger = options.logger;

    for (const [key, value] of Object.entries(options.account)) {
      if (key === 'extra_fields' && value !== null && typeof value === 'object' && !Array.isArray(value)) {
        for (const [extraKey, extraValue] of Object.entries(value)) {
          this.values.set(extraKey, stringifyVariable(extraValue));
        }
      } else {
        this.values.set(key, stringifyVariable(value));
      }
    }
    for (const [key, value] of Object.entries(options.shared ?? {})) {
      this.values.set(key, stringifyVariable(value));
    }
    if (!this.values.has('cookies')) this.values.set('cookies', '[]');
    if (!this.values.has('timestamp')) this.values.set('timestamp', '');
  }

  get(name: string): string {
    return this.values.get(name) ?? '';
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  set(name: string, value: string): void {
    this.values.set(name, value);
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  /** Refresh `cookies` and `timestamp` when the step's fields reference them. */
  async refreshVolatile(step: StepDefinition, driver: PageDriver | null): Promise<void> {
    if (mentionsVariable(step, 'cookies')) {
      await this.refreshCookies(driver);
    }
    if (mentionsVariable(step, 'timestamp')) {
      this.values.set('timestamp', formatTimestamp());
    }
  }

  private async refreshCookies(driver: PageDriver | null): Promise<void> {
    if (!driver) {
      this.values.set('cookies', '[]');
      return;
    }
    try {
      const cookies = dedupeCookies(await driver.cookies());
      this.values.set('cookies', JSON.stringify(cookies));
    } catch (error) {
      this.logger.debug(`Failed to read cookies: ${extractMessage(error)}`);
      this.values.set('cookies', '[]');
    }
  }

  /** Write the full map to the profile file. Failures are logged. */
  async persist(): Promise<void> {
    if (!this.persistPath) return;
    try {
      await writeJsonAtomic(this.persistPath, this.snapshot());
    } catch (error) {
      this.logger.warn(`Failed to persist scenario variables to ${this.persistPath}: ${extractMessage(error)}`);
    }
  }
}
