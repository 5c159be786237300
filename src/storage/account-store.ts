import { join } from 'node:path';
import type { AccountRecord } from '../types/index.js';
import { AccountListSchema } from '../schemas/index.js';
import { AccountNotFoundError } from '../exception/errors.js';
import { pathExists, readJsonFile, withFileLock, writeJsonAtomic } from './json-file.js';

export interface AccountStore {
  list(): Promise<AccountRecord[]>;
  get(name: string): Promise<AccountRecord | null>;
  /** Merge `updates` into the account. Throws AccountNotFoundError for unknown names. */
  update(name: string, updates: Record<string, unknown>): Promise<AccountRecord>;
  updateStage(name: string, stage: string | null): Promise<void>;
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/** Accounts kept as a JSON array in `<settingsDir>/accounts.json`. */
export class FileAccountStore implements AccountStore {
  readonly filePath: string;

  constructor(settingsDir: string) {
    this.filePath = join(settingsDir, 'accounts.json');
  }

  async list(): Promise<AccountRecord[]> {
    if (!(await pathExists(this.filePath))) return [];
    return AccountListSchema.parse(await readJsonFile(this.filePath));
  }

  async get(name: string): Promise<AccountRecord | null> {
    const accounts = await this.list();
    return accounts.find((a) => sameName(a.name, name)) ?? null;
  }

  async update(name: string, updates: Record<string, unknown>): Promise<AccountRecord> {
    return withFileLock(this.filePath, () => this.applyUpdate(name, updates));
  }

  async updateStage(name: string, stage: string | null): Promise<void> {
    await withFileLock(this.filePath, () => this.applyStage(name, stage));
  }

  private async applyUpdate(name: string, updates: Record<string, unknown>): Promise<AccountRecord> {
    const accounts = await this.list();
    const idx = accounts.findIndex((a) => sameName(a.name, name));
    if (idx < 0) throw new AccountNotFoundError(name);

    const merged: AccountRecord = { ...accounts[idx], ...updates, name: accounts[idx].name };
    if (typeof updates.name === 'string' && updates.name.trim()) {
      merged.name = updates.name.trim();
    }
    accounts[idx] = merged;
    await writeJsonAtomic(this.filePath, accounts);
    return merged;
  }

  private async applyStage(name: string, stage: string | null): Promise<void> {
    const accounts = await this.list();
    let changed = false;
    for (const account of accounts) {
      if (sameName(account.name, name)) {
        account.stage = stage;
        changed = true;
      }
    }
    if (changed) await writeJsonAtomic(this.filePath, accounts);
  }
}
