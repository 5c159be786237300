import { resolve } from 'node:path';

import type { Command } from 'commander';

import type { AccountRecord, DebugEvent, ScenarioDefinition } from '../types/index.js';
import type { BatchResult } from '../runner/scenario-runner.js';
import { runScenario } from '../runner/scenario-runner.js';
import { loadConfig } from '../config/loader.js';
import type { EngineConfig } from '../config/loader.js';
import { createEngineLogger, profileLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { FileScenarioStore } from '../scenario/store.js';
import { loadScenarioFile } from '../scenario/loader.js';
import { FileAccountStore } from '../storage/account-store.js';
import { FileSettingsStore } from '../storage/settings-store.js';
import { profileDir } from '../storage/profile-paths.js';
import { pathExists } from '../storage/json-file.js';
import { PlaywrightPageDriver, proxyFromAccount } from '../engines/playwright-driver.js';
import { DebugSession } from '../debug/debug-session.js';
import { ScenarioNotFoundError } from '../exception/errors.js';
import { extractMessage } from '../exception/classifier.js';
import { formatDuration } from '../logging/summary-writer.js';
import { attachDebugConsole, DEBUG_HELP, formatDebugEvent, pumpDebugEvents } from './debug-console.js';

// ── helpers ──────────────────────────────────────────────────

function emit(event: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

/** A path to an existing `.json` file, else a scenario name in the store. */
async function resolveScenario(
  arg: string,
  store: FileScenarioStore,
): Promise<{ scenario: ScenarioDefinition; path: string | null }> {
  if (arg.toLowerCase().endsWith('.json') && (await pathExists(arg))) {
    const path = resolve(arg);
    return { scenario: await loadScenarioFile(path), path };
  }
  const scenario = await store.load(arg);
  if (!scenario) throw new ScenarioNotFoundError(arg);
  return { scenario, path: await store.pathFor(arg) };
}

function selectAccounts(all: AccountRecord[], names: string[] | undefined): AccountRecord[] {
  if (!names || names.length === 0) return all;
  const wanted = new Set(names.map((n) => n.trim().toLowerCase()));
  return all.filter((account) => wanted.has(account.name.trim().toLowerCase()));
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(scenario: string, result: BatchResult): void {
  const ok = result.reports.filter((r) => r.ok).length;
  const totalMs = result.reports.reduce((sum, r) => sum + r.durationMs, 0);

  process.stderr.write(`\n--- Scenario Result ---\n`);
  process.stderr.write(`Scenario: ${scenario}\n`);
  process.stderr.write(`Accounts: ${String(ok)}/${String(result.reports.length)} succeeded\n`);
  for (const report of result.reports) {
    const reason = report.reason ? ` - ${report.reason}` : '';
    process.stderr.write(`  ${report.account}: ${report.state}${reason}\n`);
  }
  process.stderr.write(`Time:     ${formatDuration(totalMs)}\n`);
  if (result.runDir) process.stderr.write(`Run dir:  ${result.runDir}\n`);
  process.stderr.write(`Run ID:   ${result.runId}\n\n`);
}

// ── Debug console ────────────────────────────────────────────

interface DebugWiring {
  session: DebugSession;
  finish(): Promise<void>;
}

function startDebugConsole(config: EngineConfig, logger: Logger): DebugWiring {
  const session = new DebugSession({ queueCapacity: config.debugQueueCapacity, logger });
  session.pause();
  const detach = attachDebugConsole(session, process.stdin, process.stderr);
  const pump = pumpDebugEvents(session, (event: DebugEvent) => {
    emit({ type: 'debug', event });
    process.stderr.write(`${formatDebugEvent(event)}\n`);
  });
  process.stderr.write(`Debugger attached, paused before the first step. ${DEBUG_HELP}\n`);

  return {
    session,
    async finish() {
      session.disable();
      session.events.close();
      detach();
      await pump;
    },
  };
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a scenario for the configured accounts')
    .argument('<scenario>', 'Scenario name, or path to a scenario JSON file')
    .option('--config <path>', 'Path to config file')
    .option('--account <name...>', 'Only run these accounts')
    .option('--max-accounts <n>', 'Run at most this many accounts')
    .option('--concurrency <n>', 'Accounts run in parallel')
    .option('--debug', 'Step through the first account, reading commands from stdin')
    .option('--headless', 'Run browsers headless')
    .option('--no-hot-reload', 'Ignore scenario file edits while running')
    .option('--run-id <id>', 'Name of the run folder')
    .action(
      async (
        scenarioArg: string,
        opts: {
          config?: string;
          account?: string[];
          maxAccounts?: string;
          concurrency?: string;
          debug?: true;
          headless?: true;
          hotReload: boolean;
          runId?: string;
        },
      ) => {
        let debug: DebugWiring | null = null;
        try {
          // 1. Config and logging
          const config = await loadConfig(opts.config);
          const logger = createEngineLogger({ level: config.logLevel });

          // 2. Stores and scenario
          const scenarios = new FileScenarioStore(config.scenariosDir);
          const accountStore = new FileAccountStore(config.settingsDir);
          const settings = new FileSettingsStore(config.settingsDir);
          const { scenario, path } = await resolveScenario(scenarioArg, scenarios);

          const accounts = selectAccounts(await accountStore.list(), opts.account);
          if (accounts.length === 0) {
            throw new Error('No accounts to run');
          }

          // 3. Debugger
          if (opts.debug) debug = startDebugConsole(config, logger);

          emit({ type: 'run_start', scenario: scenario.name, accounts: accounts.length, debug: debug !== null });

          // 4. Run
          const result = await runScenario({
            scenario,
            scenarioPath: path,
            accounts,
            driverFactory: (account) =>
              new PlaywrightPageDriver({
                profileName: account.name,
                userDataDir: profileDir(config.profilesDir, account.name),
                logger: profileLogger(logger, account.name),
                headless: opts.headless ?? config.headless,
                keepOpen: config.keepBrowserOpen,
                proxy: proxyFromAccount(account),
                channel: config.browserChannel,
                executablePath: config.executablePath,
                defaultTimeoutMs: config.defaultTimeoutMs,
              }),
            accountStore,
            settings,
            scenarios,
            outputsDir: config.outputsDir,
            profilesDir: config.profilesDir,
            runsDir: config.runsDir,
            logger,
            maxAccounts: positiveInt(opts.maxAccounts, config.maxAccounts),
            concurrency: positiveInt(opts.concurrency, config.concurrency),
            debug: debug?.session ?? null,
            hotReload: opts.hotReload,
            ...(opts.runId ? { runId: opts.runId } : {}),
          });

          // 5. Results
          for (const report of result.reports) {
            emit({ type: 'account_end', ...report });
          }
          const ok = result.reports.every((r) => r.ok);
          emit({ type: 'run_complete', ok, runId: result.runId, processed: result.processed.map((a) => a.name) });
          printSummary(scenario.name, result);
          process.exitCode = ok ? 0 : 1;
        } catch (err) {
          const message = extractMessage(err);
          emit({ type: 'run_error', error: message });
          process.stderr.write(`Error: ${message}\n`);
          process.exitCode = 2;
        } finally {
          if (debug) await debug.finish();
        }
      },
    );
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List scenarios in the scenarios directory')
    .option('--config <path>', 'Path to config file')
    .action(async (opts: { config?: string }) => {
      try {
        const config = await loadConfig(opts.config);
        const store = new FileScenarioStore(config.scenariosDir);
        for (const scenario of await store.list()) {
          const description = scenario.description ? `\t${scenario.description}` : '';
          process.stdout.write(`${scenario.name}\t${String(scenario.steps.length)} steps${description}\n`);
        }
      } catch (err) {
        process.stderr.write(`Error: ${extractMessage(err)}\n`);
        process.exitCode = 2;
      }
    });
}
