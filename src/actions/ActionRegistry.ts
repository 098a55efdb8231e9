/**
 * ActionRegistry - catalog of named actions.
 *
 * Constructed once at startup and passed to whatever needs lookups; there
 * is no module-level instance. Registering a name that already exists
 * replaces the earlier action, which is how discovered tools or host
 * specific variants override the defaults.
 *
 * Usage:
 *   const registry = new ActionRegistry();
 *   registerDefaultActions(registry, deps);
 *   registry.list('web');
 */

import { Logger } from '../utils/Logger';
import { isApplicable, type Action, type ActionContext } from './Action';

const log = new Logger('ActionRegistry');

export class ActionRegistry {
  /** Actions stored in registration order. */
  private actions: Map<string, Action> = new Map();

  register(action: Action): void {
    if (this.actions.has(action.name)) {
      log.debug(`Replacing action "${action.name}"`);
    }
    this.actions.set(action.name, action);
  }

  /**
   * Remove a previously registered action by name.
   * Returns true if the action was found and removed, false otherwise.
   */
  unregister(name: string): boolean {
    return this.actions.delete(name);
  }

  /** Look up an action by its unique name. */
  get(name: string): Action | undefined {
    return this.actions.get(name);
  }

  has(name: string): boolean {
    return this.actions.has(name);
  }

  /** Every action usable in `context`, or every action when no context is given. */
  list(context?: ActionContext): Action[] {
    const all = [...this.actions.values()];
    return context ? all.filter((a) => isApplicable(a, context)) : all;
  }

  /** Return the names of all registered actions. */
  names(): string[] {
    return [...this.actions.keys()];
  }

  /** Return the number of registered actions. */
  get size(): number {
    return this.actions.size;
  }

  clear(): void {
    this.actions.clear();
  }
}
