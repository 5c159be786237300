export const ACTION_KINDS = [
  'start',
  'goto',
  'wait_for_load_state',
  'wait_element',
  'sleep',
  'click',
  'type',
  'set_var',
  'extract',
  'parse_var',
  'compare',
  'new_tab',
  'switch_tab',
  'close_tab',
  'log',
  'http_request',
  'pop_shared',
  'run_scenario',
  'set_tag',
  'write_file',
  'end',
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

/**
 * One step as authored in a scenario file. Fields not listed here are kept
 * as-is and read by the handler of the step's action.
 */
export interface StepDefinition {
  action: string;
  tag?: string;
  description?: string;
  label?: string;
  next_success_step?: string | null;
  next_error_step?: string | null;
  _no_default_links?: boolean;
  [field: string]: unknown;
}

export interface ScenarioDefinition {
  name: string;
  description?: string | null;
  steps: StepDefinition[];
}

export interface CompiledStep {
  /** Position in the arena; stable until the next reload. */
  id: number;
  kind: ActionKind | 'unknown';
  /** Lower-cased action name as written in the file. */
  action: string;
  tag: string;
  label: string;
  successTarget: string | null;
  errorTarget: string | null;
  onSuccess: number | null;
  onError: number | null;
  noDefaultLinks: boolean;
  definition: StepDefinition;
}

export interface StepGraph {
  name: string;
  description: string | null;
  steps: CompiledStep[];
  tagIndex: Map<string, number>;
  problems: string[];
}
