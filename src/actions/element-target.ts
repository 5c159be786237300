import type { StepDefinition } from '../types/index.js';
import type { ElementState, ElementTarget, LocateOptions, SelectorKind } from '../engines/page-driver.js';
import type { SettingsStore } from '../storage/settings-store.js';
import type { VariableSource } from '../scenario/template.js';
import { resolveTemplate, stringifyVariable } from '../scenario/template.js';
import { booleanField, integerOrNull, numberOrNull, pickField } from './step-fields.js';

const SELECTOR_KIND_ALIASES: Record<string, SelectorKind> = {
  css: 'css',
  text: 'text',
  get_by_text: 'text',
  by_text: 'text',
  xpath: 'xpath',
  xp: 'xpath',
  id: 'id',
  '#': 'id',
  name: 'name',
  test_id: 'test_id',
  testid: 'test_id',
  'data-testid': 'test_id',
  data_testid: 'test_id',
};

const ELEMENT_STATES: ReadonlySet<string> = new Set(['attached', 'detached', 'visible', 'hidden']);

const DEFAULT_FRAME_TIMEOUT_MS = 10_000;

export function toSelectorKind(raw: string): SelectorKind {
  return SELECTOR_KIND_ALIASES[raw] ?? 'css';
}

function isElementState(value: string): value is ElementState {
  return ELEMENT_STATES.has(value);
}

export function elementState(step: StepDefinition): ElementState {
  const raw = stringifyVariable(step.state).toLowerCase();
  return isElementState(raw) ? raw : 'visible';
}

export function frameChain(step: StepDefinition, vars: VariableSource): string[] {
  const raw = step.frame_selector;
  if (Array.isArray(raw)) {
    return raw
      .map((item) => resolveTemplate(stringifyVariable(item), vars).trim())
      .filter((item) => item.length > 0);
  }
  const rendered = resolveTemplate(stringifyVariable(raw), vars).trim();
  if (!rendered) return [];
  return rendered
    .split('>>')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Resolve the element fields of a step. Returns null when the selector is
 * empty after templating.
 */
export async function buildElementTarget(
  step: StepDefinition,
  vars: VariableSource,
  settings: SettingsStore,
): Promise<ElementTarget | null> {
  const selector = resolveTemplate(stringifyVariable(step.selector), vars);
  if (!selector) return null;

  const kindName = stringifyVariable(pickField(step, 'selector_type', 'selector_kind') ?? 'css').toLowerCase();
  let ordinal = integerOrNull(step.selector_index);
  if (ordinal === null) {
    ordinal = (await settings.selectorIndex(selector)) ?? (await settings.selectorIndex(`${kindName}:${selector}`));
  }

  return {
    selector,
    kind: toSelectorKind(kindName),
    exact: booleanField(step.exact, false),
    ordinal,
    frames: frameChain(step, vars),
    frameTimeoutMs: numberOrNull(pickField(step, 'frame_timeout_ms', 'timeout_ms')) ?? DEFAULT_FRAME_TIMEOUT_MS,
  };
}

export function locateOptions(step: StepDefinition): LocateOptions {
  return {
    state: elementState(step),
    timeoutMs: numberOrNull(step.timeout_ms),
    wait: true,
  };
}
