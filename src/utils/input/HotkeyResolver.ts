/**
 * HotkeyResolver - keyboard bindings for one context.
 *
 * A press is looked up by its modifier-qualified token first and then by
 * the bare key, so `Shift+Right` falls back to a `Right` binding unless
 * `shift+right` is bound on its own.
 */

import type { ActionContext } from '../../actions/Action';
import { EXTERNAL_TOOL_PREFIX } from '../../actions/builtin/externalTool';
import { BindingResolver, type BindingTable } from './BindingResolver';
import { comboToken, isModifierKey, normalizeKey, parseKeyBinding } from './KeyTokens';

/** Anything that can describe an action by name; the action registry fits. */
export interface ActionDescriber {
  get(name: string): { description: string } | undefined;
}

const HELP_CATEGORIES: ReadonlyArray<[string, readonly string[]]> = [
  ['Navigation', ['navigate_next', 'navigate_previous', 'go_to']],
  ['Playback', ['toggle_pause', 'toggle_repeat', 'toggle_shuffle']],
  ['Display', ['toggle_fullscreen', 'toggle_always_on_top', 'toggle_gallery_mode']],
  ['Speed', ['increase_speed', 'decrease_speed']],
  ['File Operations', ['remember', 'note', 'trash_current']],
  ['History', ['undo', 'redo']],
];

export class HotkeyResolver {
  private readonly bindings: BindingResolver;

  constructor(context: ActionContext, table: BindingTable = {}) {
    this.bindings = new BindingResolver(context, parseKeyBinding, table);
  }

  get context(): ActionContext {
    return this.bindings.context;
  }

  /** Action bound to the press, or null. A lone modifier never resolves. */
  resolve(key: string, modifiers: Iterable<string> = []): string | null {
    if (isModifierKey(key)) return null;
    const qualified = comboToken(key, modifiers);
    if (qualified === null) return null;
    const direct = this.bindings.lookup(qualified);
    if (direct !== null) return direct;

    const bare = normalizeKey(key);
    return bare === null || bare === qualified ? null : this.bindings.lookup(bare);
  }

  keysForAction(action: string): string[] {
    return this.bindings.tokensForAction(action);
  }

  /** Bind `binding` (e.g. `ctrl+s`) to `action`; false when the binding is malformed. */
  setBinding(binding: string, action: string): boolean {
    return this.bindings.setBinding(binding, action);
  }

  removeBinding(binding: string): boolean {
    return this.bindings.removeBinding(binding);
  }

  load(table: BindingTable): void {
    this.bindings.load(table);
  }

  mappings(): Record<string, string> {
    return this.bindings.mappings();
  }

  /**
   * Bindings grouped by category, one line per action that has keys and a
   * description. External tools go under "Tools", the rest under "Other".
   */
  helpText(describer: ActionDescriber): string {
    const categories = HELP_CATEGORIES.map(([title, names]): [string, string[]] => [title, [...names]]);
    const known = new Set(categories.flatMap(([, names]) => names));
    const tools: string[] = [];
    const other: string[] = [];
    for (const action of new Set(Object.values(this.mappings()))) {
      if (known.has(action)) continue;
      (action.startsWith(EXTERNAL_TOOL_PREFIX) ? tools : other).push(action);
    }
    categories.push(['Tools', tools.sort()], ['Other', other]);

    const lines: string[] = [];
    for (const [title, names] of categories) {
      const entries: string[] = [];
      for (const name of names) {
        const keys = this.keysForAction(name);
        const action = describer.get(name);
        if (keys.length === 0 || !action) continue;
        entries.push(`  ${keys.join(', ').padEnd(20)} ${action.description}`);
      }
      if (entries.length === 0) continue;
      if (lines.length > 0) lines.push('');
      lines.push(`${title}:`, ...entries);
    }
    return lines.join('\n');
  }
}
