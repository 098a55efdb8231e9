/**
 * KeyTokens - canonical names for keys and key combinations.
 *
 * Binding tables, browser keyboard events and terminal keypresses all name
 * keys differently ("Return", "Enter", "ArrowLeft", "Left", " "). Every
 * name goes through `normalizeKey` so a binding matches whichever source
 * produced the event.
 */

export type Modifier = 'alt' | 'ctrl' | 'meta' | 'shift';

const MODIFIER_ALIASES: Readonly<Record<string, Modifier>> = {
  alt: 'alt',
  option: 'alt',
  opt: 'alt',
  ctrl: 'ctrl',
  control: 'ctrl',
  shift: 'shift',
  meta: 'meta',
  cmd: 'meta',
  command: 'meta',
  super: 'meta',
  win: 'meta',
};

const KEY_ALIASES: Readonly<Record<string, string>> = {
  space: 'space',
  spacebar: 'space',
  enter: 'enter',
  return: 'enter',
  esc: 'escape',
  escape: 'escape',
  plus: '+',
  minus: '-',
  equal: '=',
  equals: '=',
  left: 'left',
  arrowleft: 'left',
  right: 'right',
  arrowright: 'right',
  up: 'up',
  arrowup: 'up',
  down: 'down',
  arrowdown: 'down',
  page_up: 'pageup',
  pageup: 'pageup',
  prior: 'pageup',
  page_down: 'pagedown',
  pagedown: 'pagedown',
  next: 'pagedown',
  del: 'delete',
  delete: 'delete',
  backspace: 'backspace',
  tab: 'tab',
  home: 'home',
  end: 'end',
};

export function parseModifier(name: string): Modifier | null {
  return MODIFIER_ALIASES[name.trim().toLowerCase()] ?? null;
}

/**
 * Canonical token for a bare key. Single characters keep their case (`O`
 * and `o` are different keys); longer names are matched case-insensitively.
 * Returns null for an empty name.
 */
export function normalizeKey(name: string): string | null {
  if (name === ' ') return 'space';
  const trimmed = name.trim();
  if (!trimmed) return null;
  if (trimmed.length === 1) return trimmed;
  const lower = trimmed.toLowerCase();
  return KEY_ALIASES[lower] ?? lower;
}

/** True when the key itself is a modifier (a lone Shift press, for example). */
export function isModifierKey(name: string): boolean {
  return parseModifier(name) !== null;
}

/**
 * Join modifiers and key into one token: modifiers deduplicated and sorted,
 * so `ctrl+shift+s` and `shift+ctrl+s` are the same token. With any modifier
 * held a letter is lower-cased (`Ctrl+S` is `ctrl+s`, Caps Lock or not);
 * only a bare letter keeps its case.
 */
export function comboToken(key: string, modifiers: Iterable<string> = []): string | null {
  const base = normalizeKey(key);
  if (base === null) return null;

  const mods = new Set<Modifier>();
  for (const m of modifiers) {
    const parsed = parseModifier(m);
    if (parsed) mods.add(parsed);
  }
  if (mods.size === 0) return base;

  const sorted = [...mods].sort();
  const keyPart = /^[A-Za-z]$/.test(base) ? base.toLowerCase() : base;
  return [...sorted, keyPart].join('+');
}

/**
 * Parse a binding written as text: `s`, `Ctrl+Shift+S`, `ctrl++`, `plus`.
 * Returns null when a prefix is not a known modifier.
 */
export function parseKeyBinding(binding: string): string | null {
  if (binding === '+' || binding === ' ') return normalizeKey(binding);
  let text = binding.trim();
  let trailingPlus = false;
  if (text.endsWith('++')) {
    trailingPlus = true;
    text = text.slice(0, -2);
  }
  const parts = text.split('+');
  const key = trailingPlus ? '+' : parts.pop();
  if (key === undefined) return null;
  const modifiers: string[] = [];
  for (const part of parts) {
    if (!part && trailingPlus) continue;
    if (parseModifier(part) === null) return null;
    modifiers.push(part);
  }
  return comboToken(key, modifiers);
}

export interface KeyPress {
  key: string;
  modifiers: Modifier[];
}

/**
 * Adapt a browser keyboard payload (`{ key, ctrlKey, altKey, shiftKey,
 * metaKey }`). Returns null when `key` is missing or not a string.
 */
export function parseKeyPayload(payload: unknown): KeyPress | null {
  if (typeof payload !== 'object' || payload === null) return null;
  if (!('key' in payload) || typeof payload.key !== 'string' || payload.key === '') return null;

  const flags: ReadonlyArray<[string, Modifier]> = [
    ['altKey', 'alt'],
    ['ctrlKey', 'ctrl'],
    ['metaKey', 'meta'],
    ['shiftKey', 'shift'],
  ];
  const modifiers: Modifier[] = [];
  for (const [field, modifier] of flags) {
    if (field in payload && Reflect.get(payload, field) === true) modifiers.push(modifier);
  }
  return { key: payload.key, modifiers };
}

/** Gesture tokens compare lower-case with `-` separators, so `swipe_left` equals `swipe-left`. */
export function normalizeGesture(name: string): string | null {
  const token = name.trim().toLowerCase().replace(/[_\s]+/g, '-');
  return /^[a-z0-9]+(-[a-z0-9]+)*$/.test(token) ? token : null;
}
