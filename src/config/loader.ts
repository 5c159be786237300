import { readFile } from 'node:fs/promises';
import { isAbsolute, join, resolve } from 'node:path';
import { EngineConfigFileSchema, LogLevelSchema } from '../schemas/index.js';
import type { EngineConfigFile } from '../schemas/index.js';
import { BROWSER, CONFIG_FILE_NAME, DIRECTORIES, LIMITS } from './defaults.js';
import { pathExists } from '../storage/json-file.js';

export interface EngineConfig {
  dataDir: string;
  scenariosDir: string;
  settingsDir: string;
  profilesDir: string;
  outputsDir: string;
  runsDir: string;
  headless: boolean;
  keepBrowserOpen: boolean;
  browserChannel: string | null;
  executablePath: string | null;
  defaultTimeoutMs: number;
  maxAccounts: number;
  concurrency: number;
  debugQueueCapacity: number;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
}

/**
 * Load and validate a JSON config file. Throws a descriptive error if the
 * file is unreadable or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<EngineConfigFile> {
  const raw = await readFile(configPath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return EngineConfigFileSchema.parse(parsed);
}

function under(base: string, value: string | undefined, fallback: string): string {
  const dir = value ?? fallback;
  return isAbsolute(dir) ? dir : join(base, dir);
}

/** Fill defaults and derive data directories from `dataDir`. */
export function resolveConfig(
  file: EngineConfigFile,
  options: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): EngineConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const dataDir = resolve(cwd, file.dataDir ?? DIRECTORIES.DATA_DIR);
  const envLevel = LogLevelSchema.safeParse(env.LOG_LEVEL?.trim().toLowerCase());

  return {
    dataDir,
    scenariosDir: under(dataDir, file.scenariosDir, DIRECTORIES.SCENARIOS),
    settingsDir: under(dataDir, file.settingsDir, DIRECTORIES.SETTINGS),
    profilesDir: under(dataDir, file.profilesDir, DIRECTORIES.PROFILES),
    outputsDir: under(dataDir, file.outputsDir, DIRECTORIES.OUTPUTS),
    runsDir: under(dataDir, file.runsDir, DIRECTORIES.RUNS),
    headless: file.headless ?? BROWSER.HEADLESS,
    keepBrowserOpen: file.keepBrowserOpen ?? BROWSER.KEEP_OPEN,
    browserChannel: file.browserChannel ?? null,
    executablePath: file.executablePath ? resolve(cwd, file.executablePath) : null,
    defaultTimeoutMs: file.defaultTimeoutMs ?? BROWSER.DEFAULT_TIMEOUT_MS,
    maxAccounts: file.maxAccounts ?? LIMITS.MAX_ACCOUNTS,
    concurrency: file.concurrency ?? LIMITS.CONCURRENCY,
    debugQueueCapacity: file.debugQueueCapacity ?? LIMITS.DEBUG_QUEUE_CAPACITY,
    logLevel: envLevel.success ? envLevel.data : file.logLevel ?? 'info',
  };
}

/**
 * Resolve the effective configuration. Without an explicit path, a
 * `scenario-runtime.config.json` in the working directory is used when present.
 */
export async function loadConfig(
  configPath?: string,
  options: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<EngineConfig> {
  const cwd = options.cwd ?? process.cwd();
  const candidate = configPath ? resolve(cwd, configPath) : join(cwd, CONFIG_FILE_NAME);
  const explicit = configPath !== undefined;

  let file: EngineConfigFile = {};
  if (explicit || (await pathExists(candidate))) {
    file = await loadConfigFile(candidate);
  }
  return resolveConfig(file, { cwd, env: options.env });
}
