import type { ActionKind } from '../types/index.js';
import type { ActionDefinition } from './action-types.js';
import { navigationActions } from './builtins/navigation.actions.js';
import { interactionActions } from './builtins/interaction.actions.js';
import { dataActions } from './builtins/data.actions.js';
import { httpActions } from './builtins/http.actions.js';
import { sharedActions } from './builtins/shared.actions.js';
import { flowActions } from './builtins/flow.actions.js';

export const BUILTIN_ACTIONS: ActionDefinition[] = [
  ...navigationActions,
  ...interactionActions,
  ...dataActions,
  ...httpActions,
  ...sharedActions,
  ...flowActions,
];

/**
 * Dispatch table from action kind to handler.
 */
export class ActionRegistry {
  private actions = new Map<ActionKind, ActionDefinition>();

  /**
   * Register an action. Throws if the kind already has a handler.
   */
  register(action: ActionDefinition): void {
    if (this.actions.has(action.kind)) {
      throw new Error(`Action "${action.kind}" is already registered`);
    }
    this.actions.set(action.kind, action);
  }

  get(kind: ActionKind): ActionDefinition | undefined {
    return this.actions.get(kind);
  }

  has(kind: ActionKind): boolean {
    return this.actions.has(kind);
  }

  list(): ActionDefinition[] {
    return Array.from(this.actions.values());
  }

  /**
   * Register every built-in action whose kind is still free, so callers can
   * install overrides first.
   */
  registerBuiltins(): this {
    for (const action of BUILTIN_ACTIONS) {
      if (!this.actions.has(action.kind)) {
        this.actions.set(action.kind, action);
      }
    }
    return this;
  }
}

export function createDefaultRegistry(): ActionRegistry {
  return new ActionRegistry().registerBuiltins();
}
