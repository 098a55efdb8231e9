/**
 * BindingResolver - turns a layered binding table into `token -> action`.
 *
 * The `common` layer is applied first and the context layer on top of it,
 * so a token bound in both resolves to the context's action. Tables list
 * tokens per action: `{ navigate_next: ['Right', 'PageDown'] }`.
 */

import type { ActionContext } from '../../actions/Action';
import { Logger } from '../Logger';

const log = new Logger('BindingResolver');

export type BindingLayer = Readonly<Record<string, string | readonly string[]>>;

export type BindingTable = Readonly<Partial<Record<'common' | ActionContext, BindingLayer>>>;

/** Maps one configured token to its canonical form, or null when it is malformed. */
export type TokenNormalizer = (token: string) => string | null;

export class BindingResolver {
  private map = new Map<string, string>();

  constructor(
    readonly context: ActionContext,
    private readonly normalize: TokenNormalizer,
    table: BindingTable = {}
  ) {
    this.load(table);
  }

  /** Replace all bindings with those of `table`. */
  load(table: BindingTable): void {
    this.map.clear();
    for (const layer of [table.common, table[this.context]]) {
      if (!layer) continue;
      for (const [action, tokens] of Object.entries(layer)) {
        const list: readonly string[] = typeof tokens === 'string' ? [tokens] : tokens;
        for (const token of list) {
          this.bind(token, action);
        }
      }
    }
  }

  /** Action bound to an already canonical token. */
  lookup(canonical: string): string | null {
    return this.map.get(canonical) ?? null;
  }

  setBinding(token: string, action: string): boolean {
    return this.bind(token, action);
  }

  removeBinding(token: string): boolean {
    const canonical = this.normalize(token);
    return canonical !== null && this.map.delete(canonical);
  }

  tokensForAction(action: string): string[] {
    return [...this.map.entries()].filter(([, a]) => a === action).map(([t]) => t);
  }

  mappings(): Record<string, string> {
    return Object.fromEntries(this.map);
  }

  get size(): number {
    return this.map.size;
  }

  private bind(token: string, action: string): boolean {
    const canonical = this.normalize(token);
    if (canonical === null) {
      log.warn(`Ignoring malformed binding "${token}" for ${action}`);
      return false;
    }
    this.map.set(canonical, action);
    return true;
  }
}
