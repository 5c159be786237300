import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import type { Logger } from 'winston';
import type { AccountRecord, ScenarioDefinition } from '../types/index.js';
import type { PageDriver } from '../engines/page-driver.js';
import type { AccountStore } from '../storage/account-store.js';
import type { SettingsStore } from '../storage/settings-store.js';
import type { ScenarioStore } from '../scenario/store.js';
import type { DebugSession } from '../debug/debug-session.js';
import type { ActionRegistry } from '../actions/action-registry.js';
import type { AccountReport } from '../logging/summary-writer.js';
import { SharedVariables, loadSharedVariables, saveSharedVariables } from '../variables/shared-variables.js';
import { RunLogger } from '../logging/run-logger.js';
import { writeSummary } from '../logging/summary-writer.js';
import { profileLogger } from '../logging/logger.js';
import { extractMessage } from '../exception/classifier.js';
import { ScenarioExecutor } from './scenario-executor.js';

export type DriverFactory = (account: AccountRecord) => PageDriver;

export interface RunScenarioOptions {
  scenario: ScenarioDefinition;
  scenarioPath?: string | null;
  accounts: AccountRecord[];
  driverFactory: DriverFactory;
  accountStore: AccountStore;
  settings: SettingsStore;
  scenarios: ScenarioStore;
  outputsDir: string;
  profilesDir?: string | null;
  /** Parent of per-run folders holding `logs.jsonl` and `summary.md`. */
  runsDir?: string | null;
  logger: Logger;
  maxAccounts?: number;
  concurrency?: number;
  debug?: DebugSession | null;
  hotReload?: boolean;
  /** Defaults to the `shared_variables` setting. */
  shared?: SharedVariables;
  registry?: ActionRegistry;
  runId?: string;
}

export interface BatchResult {
  runId: string;
  runDir: string | null;
  /** Accounts whose run finished ok, in input order. */
  processed: AccountRecord[];
  reports: AccountReport[];
}

/**
 * Run a scenario for a batch of accounts. A debug session limits the batch to
 * the first account. Failures are reported per account and never abort the
 * rest of the batch.
 */
export async function runScenario(options: RunScenarioOptions): Promise<BatchResult> {
  const { logger, debug } = options;
  const runId = options.runId ?? randomUUID();
  const runDir = options.runsDir ? join(options.runsDir, runId) : null;
  const runLogger = runDir ? new RunLogger(runDir) : null;
  const startedAt = new Date().toISOString();

  const limit = debug ? 1 : options.maxAccounts ?? options.accounts.length;
  const toRun = options.accounts.slice(0, Math.max(0, limit));
  const shared = options.shared ?? new SharedVariables(await loadSharedVariables(options.settings), logger);

  const runForAccount = async (account: AccountRecord): Promise<AccountReport> => {
    const log = profileLogger(logger, account.name);
    const started = Date.now();
    let driver: PageDriver | null = null;
    try {
      driver = options.driverFactory(account);
      driver.onClosed(() => log.info(`Browser closed for ${account.name}`));
      if (debug) {
        driver.onProcessExit(() => debug.notifyBrowserClosedFor(account.name));
      }
      await driver.start();
      const executor = new ScenarioExecutor({
        scenario: options.scenario,
        scenarioPath: options.scenarioPath ?? null,
        account,
        driver,
        shared,
        accounts: options.accountStore,
        settings: options.settings,
        scenarios: options.scenarios,
        outputsDir: options.outputsDir,
        profilesDir: options.profilesDir ?? null,
        logger: log,
        registry: options.registry,
        debug: debug ?? null,
        hotReload: options.hotReload,
        runLogger,
      });
      const outcome = await executor.run();
      log.info(`Scenario ${options.scenario.name} for ${account.name}: ${outcome.state}${outcome.reason ? ` (${outcome.reason})` : ''}`);
      return { account: account.name, ...outcome, durationMs: Date.now() - started };
    } catch (error) {
      const reason = extractMessage(error);
      log.error(`Scenario failed for ${account.name}: ${reason}`);
      return { account: account.name, ok: false, reason, state: 'stopped', durationMs: Date.now() - started };
    } finally {
      if (driver) {
        try {
          await driver.close();
        } catch (error) {
          log.warn(`Failed to release browser for ${account.name}: ${extractMessage(error)}`);
        }
      }
    }
  };

  const reports = new Array<AccountReport | undefined>(toRun.length).fill(undefined);
  let cursor = 0;
  const worker = async (): Promise<void> => {
    while (cursor < toRun.length) {
      if (debug?.stopRequested) return;
      const idx = cursor++;
      reports[idx] = await runForAccount(toRun[idx]);
    }
  };
  const workers = Math.max(1, Math.min(options.concurrency ?? 1, toRun.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));

  const finished: AccountReport[] = [];
  const processed: AccountRecord[] = [];
  reports.forEach((report, idx) => {
    if (!report) return;
    finished.push(report);
    if (report.ok) processed.push(toRun[idx]);
  });

  try {
    await saveSharedVariables(options.settings, shared);
  } catch (error) {
    logger.warn(`Failed to save shared variables: ${extractMessage(error)}`);
  }

  if (runDir) {
    try {
      await writeSummary({ runDir, runId, scenario: options.scenario.name, startedAt, reports: finished });
    } catch (error) {
      logger.warn(`Failed to write run summary: ${extractMessage(error)}`);
    }
  }

  return { runId, runDir, processed, reports: finished };
}
