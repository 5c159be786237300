export * from './types/index.js';
export * from './schemas/index.js';
export * from './exception/errors.js';
export { classifyFailure, describeStepFailure } from './exception/classifier.js';

export { loadConfig, loadConfigFile, resolveConfig } from './config/loader.js';
export type { EngineConfig } from './config/loader.js';
export { createEngineLogger, profileLogger } from './logging/logger.js';
export type { EngineLoggerOptions, Logger } from './logging/logger.js';
export { RunLogger } from './logging/run-logger.js';
export { writeSummary, buildSummaryMarkdown } from './logging/summary-writer.js';
export type { AccountReport, SummaryOptions } from './logging/summary-writer.js';

export { compileScenario, resolveActionKind } from './scenario/graph.js';
export { parseScenario, loadScenarioFile } from './scenario/loader.js';
export { FileScenarioStore } from './scenario/store.js';
export type { ScenarioStore } from './scenario/store.js';
export { resolveTemplate, resolveValue, stringifyVariable } from './scenario/template.js';
export type { VariableSource } from './scenario/template.js';
export { compileTargetsPattern, matchTargets } from './scenario/pattern.js';
export { jsonPathGet } from './scenario/json-path.js';

export { FileAccountStore } from './storage/account-store.js';
export type { AccountStore } from './storage/account-store.js';
export { FileSettingsStore, MemorySettingsStore } from './storage/settings-store.js';
export type { SettingsStore } from './storage/settings-store.js';

export { SharedVariables, loadSharedVariables, saveSharedVariables } from './variables/shared-variables.js';
export { ExecutionVariables } from './variables/execution-variables.js';

export type * from './engines/page-driver.js';
export { toLoadState } from './engines/page-driver.js';
export { PlaywrightPageDriver, proxyFromAccount } from './engines/playwright-driver.js';
export type { PlaywrightDriverOptions, ProxySettings } from './engines/playwright-driver.js';

export { ActionRegistry, createDefaultRegistry, BUILTIN_ACTIONS } from './actions/action-registry.js';
export type { ActionContext, ActionDefinition, ActionHandler } from './actions/action-types.js';

export { Latch } from './debug/latch.js';
export { BoundedEventQueue } from './debug/event-queue.js';
export { DebugSession } from './debug/debug-session.js';
export type { DebugSessionOptions, StepSnapshot } from './debug/debug-session.js';

export { StepDispatcher } from './runner/step-dispatcher.js';
export { ScenarioExecutor } from './runner/scenario-executor.js';
export type { ScenarioExecutorOptions } from './runner/scenario-executor.js';
export { ScenarioWatcher } from './runner/hot-reload.js';
export { runScenario } from './runner/scenario-runner.js';
export type { BatchResult, DriverFactory, RunScenarioOptions } from './runner/scenario-runner.js';
