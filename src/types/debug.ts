export interface DebugUpdate {
  readonly scenario: string;
  readonly account: string;
  readonly stepIndex: number;
  readonly totalSteps: number;
  readonly action: string;
  readonly description: string;
  readonly tag: string;
  readonly reloadedAt: number | null;
}

export type DebugDecision =
  | { kind: 'proceed' }
  | { kind: 'stop' }
  | { kind: 'jump_index'; index: number }
  | { kind: 'jump_tag'; tag: string };

export type DebugEvent =
  | { type: 'step'; update: DebugUpdate }
  | { type: 'finished'; ok: boolean; reason: string | null }
  | { type: 'browser_closed' }
  | { type: 'reloaded'; at: number };
