/**
 * CLI module: argument parsing and console wiring over the runner.
 */

export { registerRunCommand, registerListCommand } from './run.js';
export {
  parseDebugCommand,
  applyDebugCommand,
  attachDebugConsole,
  formatDebugEvent,
  pumpDebugEvents,
} from './debug-console.js';
export type { DebugCommand, InvalidCommand } from './debug-console.js';
