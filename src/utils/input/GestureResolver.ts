/**
 * GestureResolver - gesture bindings for one context, the touch-side
 * counterpart of HotkeyResolver.
 */

import type { ActionContext } from '../../actions/Action';
import { BindingResolver, type BindingTable } from './BindingResolver';
import type { ActionDescriber } from './HotkeyResolver';
import { normalizeGesture } from './KeyTokens';

const GESTURE_LABELS: Readonly<Record<string, string>> = {
  'swipe-left': 'Swipe left',
  'swipe-right': 'Swipe right',
  'swipe-up': 'Swipe up',
  'swipe-down': 'Swipe down',
  'double-tap': 'Double tap',
  'long-press': 'Long press',
  'pinch-in': 'Pinch in',
  'pinch-out': 'Pinch out',
  'two-finger-swipe-left': 'Two-finger swipe left',
  'two-finger-swipe-right': 'Two-finger swipe right',
  'two-finger-swipe-up': 'Two-finger swipe up',
  'two-finger-swipe-down': 'Two-finger swipe down',
  'three-finger-tap': 'Three-finger tap',
};

export class GestureResolver {
  private readonly bindings: BindingResolver;

  constructor(context: ActionContext, table: BindingTable = {}) {
    this.bindings = new BindingResolver(context, normalizeGesture, table);
  }

  resolve(gesture: string): string | null {
    const token = normalizeGesture(gesture);
    return token === null ? null : this.bindings.lookup(token);
  }

  gesturesForAction(action: string): string[] {
    return this.bindings.tokensForAction(action);
  }

  setBinding(gesture: string, action: string): boolean {
    return this.bindings.setBinding(gesture, action);
  }

  removeBinding(gesture: string): boolean {
    return this.bindings.removeBinding(gesture);
  }

  load(table: BindingTable): void {
    this.bindings.load(table);
  }

  mappings(): Record<string, string> {
    return this.bindings.mappings();
  }

  helpText(describer: ActionDescriber): string {
    const lines = ['Touch Gestures:'];
    for (const [gesture, name] of Object.entries(this.mappings())) {
      const action = describer.get(name);
      if (!action) continue;
      lines.push(`  ${(GESTURE_LABELS[gesture] ?? gesture).padEnd(30)} ${action.description}`);
    }
    return lines.join('\n');
  }
}
