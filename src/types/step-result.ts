export type StepResult =
  | { kind: 'next' }
  | { kind: 'jump'; target: string }
  | { kind: 'stop'; reason: string }
  | { kind: 'end' };

export const StepResult = {
  next(): StepResult {
    return { kind: 'next' };
  },
  jump(target: string): StepResult {
    return { kind: 'jump', target };
  },
  stop(reason: string): StepResult {
    return { kind: 'stop', reason };
  },
  end(): StepResult {
    return { kind: 'end' };
  },
};

export type ExecutorState = 'running' | 'awaiting_debug_command' | 'stopped' | 'ended' | 'completed';

export type TerminalState = 'completed' | 'ended' | 'stopped';

export interface RunOutcome {
  ok: boolean;
  reason: string | null;
  state: TerminalState;
}

export interface StepTrace {
  scenario: string;
  account: string;
  stepIndex: number;
  tag: string;
  action: string;
  result: StepResult['kind'];
  reason?: string;
  target?: string;
  durationMs: number;
}
