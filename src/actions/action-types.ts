import type { Logger } from 'winston';
import type { AccountRecord, ActionKind, CompiledStep, StepGraph, StepResult } from '../types/index.js';
import type { PageDriver } from '../engines/page-driver.js';
import type { ExecutionVariables } from '../variables/execution-variables.js';
import type { SharedVariables } from '../variables/shared-variables.js';
import type { AccountStore } from '../storage/account-store.js';
import type { SettingsStore } from '../storage/settings-store.js';
import type { ScenarioStore } from '../scenario/store.js';

export interface NestedRunResult {
  ok: boolean;
  reason: string | null;
}

/** Everything a handler may touch while running one step. */
export interface ActionContext {
  driver: PageDriver;
  variables: ExecutionVariables;
  shared: SharedVariables;
  /** Live account payload; handlers that update the store mirror the change here. */
  account: AccountRecord;
  accounts: AccountStore;
  settings: SettingsStore;
  scenarios: ScenarioStore;
  outputsDir: string;
  logger: Logger;
  /** Display names of the scenarios currently executing, outermost first. */
  callStack: string[];
  /** Run a nested graph through the executor loop that owns this context. */
  runNested(graph: StepGraph, scenarioPath: string | null): Promise<NestedRunResult>;
}

export type ActionHandler = (step: CompiledStep, ctx: ActionContext) => Promise<StepResult>;

export interface ActionDefinition {
  kind: ActionKind;
  description: string;
  handler: ActionHandler;
}
