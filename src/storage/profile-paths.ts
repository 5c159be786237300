import { join } from 'node:path';
import { safeFileName } from './json-file.js';

export function profileDir(profilesDir: string, accountName: string): string {
  return join(profilesDir, safeFileName(accountName, 'profile'));
}

export function profileVariablesPath(profilesDir: string, accountName: string): string {
  return join(profileDir(profilesDir, accountName), 'scenario_vars.json');
}
