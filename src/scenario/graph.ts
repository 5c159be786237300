import { ACTION_KINDS } from '../types/index.js';
import type { ActionKind, CompiledStep, ScenarioDefinition, StepDefinition, StepGraph } from '../types/index.js';

const ACTION_ALIASES: Record<string, ActionKind> = {
  extract_text: 'extract',
  parse_vars: 'parse_var',
  parse_variable: 'parse_var',
  if: 'compare',
  http: 'http_request',
  pop: 'pop_shared',
  set_stage: 'set_tag',
};

const KNOWN_KINDS: ReadonlySet<string> = new Set(ACTION_KINDS);

function isActionKind(name: string): name is ActionKind {
  return KNOWN_KINDS.has(name);
}

export function resolveActionKind(action: string): ActionKind | 'unknown' {
  const name = action.trim().toLowerCase();
  if (isActionKind(name)) return name;
  return ACTION_ALIASES[name] ?? 'unknown';
}

/** Older editors stored the main argument under url/text/message. */
export function normalizeStepDefinition(step: StepDefinition): StepDefinition {
  if (step.value) return step;
  for (const legacyKey of ['url', 'text', 'message']) {
    if (step[legacyKey]) {
      return { ...step, value: step[legacyKey] };
    }
  }
  return step;
}

function optionalTag(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function highestStepNumber(steps: StepDefinition[]): number {
  let max = 0;
  for (const step of steps) {
    const match = /^Step(\d+)$/.exec(String(step.tag ?? '').trim());
    if (match) max = Math.max(max, Number(match[1]));
  }
  return max;
}

/**
 * Build the step arena for a scenario: assign missing tags, resolve action
 * kinds and branch edges, and collect structural problems instead of throwing
 * so callers can decide whether a malformed graph is fatal.
 */
export function compileScenario(scenario: ScenarioDefinition): StepGraph {
  const problems: string[] = [];
  const tagIndex = new Map<string, number>();
  const taken = new Set(scenario.steps.map((s) => String(s.tag ?? '').trim()).filter(Boolean));
  let counter = highestStepNumber(scenario.steps);

  const steps: CompiledStep[] = scenario.steps.map((raw, id) => {
    const definition = normalizeStepDefinition(raw);
    const action = String(definition.action ?? '').trim().toLowerCase();
    const kind = resolveActionKind(action);

    let tag = String(definition.tag ?? '').trim();
    if (!tag) {
      do {
        counter += 1;
        tag = `Step${counter}`;
      } while (taken.has(tag));
      taken.add(tag);
    }

    if (tagIndex.has(tag)) {
      problems.push(`Step ${id + 1}: duplicate tag "${tag}"`);
    } else {
      tagIndex.set(tag, id);
    }

    if (kind === 'unknown') {
      problems.push(`Step ${id + 1} (${tag}): unknown action "${action}"`);
    }

    const label = String(definition.description || definition.tag || definition.label || action || '');

    return {
      id,
      kind,
      action,
      tag,
      label,
      successTarget: optionalTag(definition.next_success_step),
      errorTarget: optionalTag(definition.next_error_step),
      onSuccess: null,
      onError: null,
      noDefaultLinks: definition._no_default_links === true,
      definition: { ...definition, tag },
    };
  });

  for (const step of steps) {
    step.onSuccess = step.successTarget !== null ? tagIndex.get(step.successTarget) ?? null : null;
    step.onError = step.errorTarget !== null ? tagIndex.get(step.errorTarget) ?? null : null;

    const references: Array<[string, string | null]> = [
      ['next_success_step', step.successTarget],
      ['next_error_step', step.errorTarget],
    ];
    if (step.kind === 'compare') {
      references.push(['true_step', optionalTag(step.definition.true_step)]);
      references.push(['false_step', optionalTag(step.definition.false_step)]);
    }
    for (const [field, target] of references) {
      if (target !== null && !tagIndex.has(target)) {
        problems.push(`Step ${step.id + 1} (${step.tag}): ${field} points to missing tag "${target}"`);
      }
    }
  }

  return {
    name: scenario.name,
    description: scenario.description ?? null,
    steps,
    tagIndex,
    problems,
  };
}
