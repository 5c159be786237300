import type { Logger } from 'winston';
import type {
  AccountRecord,
  CompiledStep,
  ExecutorState,
  RunOutcome,
  ScenarioDefinition,
  StepGraph,
  StepResult,
} from '../types/index.js';
import type { PageDriver } from '../engines/page-driver.js';
import type { ActionContext } from '../actions/action-types.js';
import type { AccountStore } from '../storage/account-store.js';
import type { SettingsStore } from '../storage/settings-store.js';
import type { ScenarioStore } from '../scenario/store.js';
import type { DebugSession } from '../debug/debug-session.js';
import type { RunLogger } from '../logging/run-logger.js';
import type { SharedVariables } from '../variables/shared-variables.js';
import type { ActionRegistry } from '../actions/action-registry.js';
import { createDefaultRegistry } from '../actions/action-registry.js';
import { ExecutionVariables } from '../variables/execution-variables.js';
import { compileScenario } from '../scenario/graph.js';
import { loadScenarioFile } from '../scenario/loader.js';
import { profileVariablesPath } from '../storage/profile-paths.js';
import { extractMessage } from '../exception/classifier.js';
import { StepDispatcher } from './step-dispatcher.js';
import { ScenarioWatcher } from './hot-reload.js';

export interface ScenarioExecutorOptions {
  scenario: ScenarioDefinition;
  /** Backing file, used for hot reload and debug restarts. */
  scenarioPath?: string | null;
  account: AccountRecord;
  driver: PageDriver;
  shared: SharedVariables;
  accounts: AccountStore;
  settings: SettingsStore;
  scenarios: ScenarioStore;
  outputsDir: string;
  /** Root of per-profile folders; null keeps variables in memory only. */
  profilesDir?: string | null;
  logger: Logger;
  registry?: ActionRegistry;
  debug?: DebugSession | null;
  /** Defaults to on when a debug session is attached. */
  hotReload?: boolean;
  runLogger?: RunLogger | null;
}

const COMPLETED: RunOutcome = { ok: true, reason: null, state: 'completed' };
const ENDED: RunOutcome = { ok: true, reason: null, state: 'ended' };

function stopped(reason: string): RunOutcome {
  return { ok: false, reason, state: 'stopped' };
}

/**
 * Walks a compiled step graph for one account. `run()` never throws; every
 * failure ends in a `stopped` outcome with a reason.
 */
export class ScenarioExecutor {
  readonly variables: ExecutionVariables;
  private currentState: ExecutorState = 'running';
  private dispatcher: StepDispatcher;
  private watcher: ScenarioWatcher;
  private context: ActionContext;
  private debug: DebugSession | null;
  private hotReload: boolean;
  private logger: Logger;

  constructor(private options: ScenarioExecutorOptions) {
    this.logger = options.logger;
    this.debug = options.debug ?? null;
    this.hotReload = options.hotReload ?? this.debug !== null;
    this.dispatcher = new StepDispatcher(options.registry ?? createDefaultRegistry());
    this.watcher = new ScenarioWatcher(this.logger);
    this.variables = new ExecutionVariables({
      account: options.account,
      shared: options.shared.all(),
      persistPath: options.profilesDir ? profileVariablesPath(options.profilesDir, options.account.name) : null,
      logger: this.logger,
    });
    this.context = {
      driver: options.driver,
      variables: this.variables,
      shared: options.shared,
      account: options.account,
      accounts: options.accounts,
      settings: options.settings,
      scenarios: options.scenarios,
      outputsDir: options.outputsDir,
      logger: this.logger,
      callStack: options.scenario.name ? [options.scenario.name] : [],
      runNested: (graph, scenarioPath) => this.executeGraph(graph, scenarioPath ?? null, false),
    };
  }

  get state(): ExecutorState {
    return this.currentState;
  }

  private get debugActive(): boolean {
    return this.debug !== null && this.debug.enabled;
  }

  async run(): Promise<RunOutcome> {
    let outcome: RunOutcome;
    try {
      const graph = compileScenario(this.options.scenario);
      if (graph.problems.length > 0) {
        outcome = stopped(`Scenario ${graph.name} is invalid: ${graph.problems.join('; ')}`);
        this.logger.error(outcome.reason ?? '');
      } else if (this.debugActive) {
        outcome = await this.runDebugLoop(graph);
      } else {
        outcome = await this.executeGraph(graph, this.options.scenarioPath ?? null, true);
      }
    } catch (error) {
      outcome = stopped(extractMessage(error));
      this.logger.error(`Scenario ${this.options.scenario.name} aborted: ${outcome.reason}`);
    }
    await this.variables.persist();
    this.currentState = outcome.state;
    return outcome;
  }

  private async runDebugLoop(initial: StepGraph): Promise<RunOutcome> {
    let graph = initial;
    while (true) {
      const outcome = await this.executeGraph(graph, this.options.scenarioPath ?? null, true);
      const session = this.debug;
      if (!session || !session.enabled || session.stopRequested) return outcome;

      session.pause();
      session.notifyFinished(outcome.ok, outcome.reason);
      this.currentState = 'awaiting_debug_command';
      const decision = await session.waitForCommand();
      if (decision.kind === 'stop' || decision.kind === 'proceed' || session.stopRequested) return outcome;

      graph = await this.reloadForRestart(graph);
      if (decision.kind === 'jump_index') {
        session.setInitialStep(decision.index);
      } else {
        session.setInitialStep(graph.tagIndex.get(decision.tag) ?? 0);
      }
    }
  }

  private async reloadForRestart(graph: StepGraph): Promise<StepGraph> {
    const path = this.options.scenarioPath;
    if (!path) return graph;
    try {
      const reloaded = compileScenario(await loadScenarioFile(path));
      await this.watcher.remember(path);
      this.reportProblems(reloaded);
      return reloaded;
    } catch (error) {
      this.logger.warn(`Keeping previous steps; reload of ${path} failed: ${extractMessage(error)}`);
      return graph;
    }
  }

  private reportProblems(graph: StepGraph): void {
    for (const problem of graph.problems) {
      this.logger.warn(`Scenario ${graph.name}: ${problem}`);
    }
  }

  /**
   * Run one graph until it completes, ends or stops. Nested scenarios call
   * back in here with `topLevel` false, so only the outer run consumes the
   * debugger's initial step.
   */
  private async executeGraph(initial: StepGraph, scenarioPath: string | null, topLevel: boolean): Promise<RunOutcome> {
    let graph = initial;
    let idx = 0;
    if (topLevel && this.debug && this.debugActive) {
      const start = this.debug.consumeInitialStep();
      if (start !== null && start < graph.steps.length) idx = start;
    }

    while (idx < graph.steps.length) {
      this.currentState = 'running';
      const step = graph.steps[idx];

      if (this.debug && this.debugActive) {
        const decision = await this.debug.beforeStep({
          scenario: graph.name,
          account: this.options.account.name,
          stepIndex: idx,
          totalSteps: graph.steps.length,
          action: step.action,
          description: step.label,
          tag: step.tag,
        });
        if (decision.kind === 'stop') return stopped('Stopped by debugger');
        if (decision.kind === 'jump_index') {
          if (decision.index >= graph.steps.length) {
            return this.fail(`Jump target step ${decision.index + 1} not found in scenario ${graph.name}`);
          }
          idx = decision.index;
          continue;
        }
        if (decision.kind === 'jump_tag') {
          const target = graph.tagIndex.get(decision.tag);
          if (target === undefined) {
            return this.fail(`Jump target ${decision.tag} not found in scenario ${graph.name}`);
          }
          idx = target;
          continue;
        }
      }

      if (this.hotReload && scenarioPath) {
        const reloaded = await this.watcher.check(scenarioPath);
        if (reloaded) {
          graph = compileScenario(reloaded);
          this.reportProblems(graph);
          this.logger.info(`Reloaded scenario ${graph.name} from ${scenarioPath}`);
          this.debug?.notifyReload();
          if (idx >= graph.steps.length) idx = Math.max(0, graph.steps.length - 1);
          continue;
        }
      }

      this.logger.info(`Running step: ${step.label}`);
      const started = Date.now();
      const result = await this.dispatcher.dispatch(step, this.context);
      await this.trace(graph, step, result, Date.now() - started);

      switch (result.kind) {
        case 'end':
          this.logger.info(`Scenario ${graph.name} ended at step ${idx + 1}`);
          return ENDED;
        case 'jump': {
          const target = graph.tagIndex.get(result.target);
          if (target === undefined) {
            return this.fail(`Jump target ${result.target} not found in scenario ${graph.name}`);
          }
          idx = target;
          break;
        }
        case 'stop': {
          if (step.errorTarget === null) {
            this.logger.error(`Scenario ${graph.name} stopped at step ${idx + 1}: ${result.reason}`);
            return stopped(result.reason);
          }
          if (step.onError === null) {
            return this.fail(`Error step ${step.errorTarget} not found in scenario ${graph.name}`);
          }
          this.logger.warn(
            `Scenario ${graph.name} error at step ${idx + 1}: ${result.reason} (jump -> ${step.errorTarget})`,
          );
          idx = step.onError;
          break;
        }
        case 'next':
          if (step.onSuccess !== null) {
            idx = step.onSuccess;
          } else if (step.noDefaultLinks) {
            return COMPLETED;
          } else {
            idx += 1;
          }
          break;
      }
    }
    return COMPLETED;
  }

  private fail(reason: string): RunOutcome {
    this.logger.error(reason);
    return stopped(reason);
  }

  private async trace(graph: StepGraph, step: CompiledStep, result: StepResult, durationMs: number): Promise<void> {
    const runLogger = this.options.runLogger;
    if (!runLogger) return;
    try {
      await runLogger.logStep({
        scenario: graph.name,
        account: this.options.account.name,
        stepIndex: step.id,
        tag: step.tag,
        action: step.action,
        result: result.kind,
        ...(result.kind === 'stop' ? { reason: result.reason } : {}),
        ...(result.kind === 'jump' ? { target: result.target } : {}),
        durationMs,
      });
    } catch (error) {
      this.logger.warn(`Failed to write step trace: ${extractMessage(error)}`);
    }
  }
}
