import { createInterface } from 'node:readline';
import type { DebugEvent } from '../types/index.js';
import type { DebugSession } from '../debug/debug-session.js';

export type DebugCommand =
  | { kind: 'pause' }
  | { kind: 'resume' }
  | { kind: 'stop' }
  /** One-based step number as typed by the operator. */
  | { kind: 'jump'; step: number }
  | { kind: 'tag'; tag: string };

export interface InvalidCommand {
  kind: 'invalid';
  message: string;
}

export const DEBUG_HELP = 'Commands: pause | resume | stop | jump <step number> | tag <tag>';

/** Parse one console line. Blank lines yield null. */
export function parseDebugCommand(line: string): DebugCommand | InvalidCommand | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  const [head, ...rest] = trimmed.split(/\s+/);
  const arg = rest.join(' ');

  switch (head.toLowerCase()) {
    case 'p':
    case 'pause':
      return { kind: 'pause' };
    case 'r':
    case 'c':
    case 'resume':
    case 'continue':
      return { kind: 'resume' };
    case 'q':
    case 'stop':
    case 'quit':
      return { kind: 'stop' };
    case 'j':
    case 'jump': {
      const step = Number(arg);
      if (!arg || !Number.isInteger(step) || step < 1) {
        return { kind: 'invalid', message: 'Step number must be a positive integer' };
      }
      return { kind: 'jump', step };
    }
    case 't':
    case 'tag':
      if (!arg) return { kind: 'invalid', message: 'Tag is required' };
      return { kind: 'tag', tag: arg };
    default:
      return { kind: 'invalid', message: `Unknown command ${head}. ${DEBUG_HELP}` };
  }
}

export function applyDebugCommand(session: DebugSession, command: DebugCommand): void {
  switch (command.kind) {
    case 'pause':
      session.pause();
      break;
    case 'resume':
      session.resume();
      break;
    case 'stop':
      session.requestStop();
      break;
    case 'jump':
      session.requestJumpToStep(command.step - 1);
      break;
    case 'tag':
      session.requestJumpToTag(command.tag);
      break;
  }
}

export function formatDebugEvent(event: DebugEvent): string {
  switch (event.type) {
    case 'step': {
      const { update } = event;
      const description = update.description ? `: ${update.description}` : '';
      return `[${update.stepIndex + 1}/${update.totalSteps}] ${update.tag} (${update.action})${description}`;
    }
    case 'finished':
      return `Scenario finished ${event.ok ? 'ok' : 'with failure'}${event.reason ? ` (${event.reason})` : ''}; jump or stop`;
    case 'browser_closed':
      return 'Browser closed';
    case 'reloaded':
      return `Scenario reloaded at ${new Date(event.at).toISOString()}`;
  }
}

/**
 * Read debug commands line by line from `input`. Problems are written to
 * `output`. Returns a function that detaches the console.
 */
export function attachDebugConsole(
  session: DebugSession,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): () => void {
  const rl = createInterface({ input, terminal: false });
  rl.on('line', (line) => {
    const command = parseDebugCommand(line);
    if (!command) return;
    if (command.kind === 'invalid') {
      output.write(`${command.message}\n`);
      return;
    }
    applyDebugCommand(session, command);
  });
  return () => rl.close();
}

/** Forward queued events to `sink` until the queue is closed. */
export async function pumpDebugEvents(session: DebugSession, sink: (event: DebugEvent) => void): Promise<void> {
  for await (const event of session.events) {
    sink(event);
  }
}
