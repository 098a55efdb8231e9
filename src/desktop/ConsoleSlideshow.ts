/**
 * ConsoleSlideshow - the single-user desktop client, run in a terminal.
 *
 * Keypresses come from `node:readline` and are resolved through the
 * desktop hotkey table; every change is reported as one status line.
 * The client owns the auto-advance timer and stops on `quit` or Ctrl+C.
 */

import * as readline from 'node:readline';
import type { ManagerBase } from '../core/ManagerBase';
import type { SessionManager } from '../core/session/SessionManager';
import type { SessionState } from '../core/session/SessionState';
import { formatStatus } from '../core/session/TemplateVariables';
import type { ActionDispatcher, DispatchResult } from '../services/ActionDispatcher';
import { EventEmitter, type EventMap } from '../utils/EventEmitter';
import type { ActionDescriber, HotkeyResolver } from '../utils/input/HotkeyResolver';
import type { KeyPress, Modifier } from '../utils/input/KeyTokens';
import { Logger } from '../utils/Logger';
import { PlaybackTimer } from './PlaybackTimer';

const log = new Logger('ConsoleSlideshow');

/** Key object readline attaches to a `keypress` event. */
export interface TerminalKey {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export type KeySource = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export interface ConsoleSlideshowEvents extends EventMap {
  action: DispatchResult;
  stopped: void;
}

export interface ConsoleSlideshowDeps {
  sessionId: string;
  sessions: SessionManager;
  dispatcher: ActionDispatcher;
  /** Used for the key list printed on start. */
  hotkeys?: HotkeyResolver;
  describer?: ActionDescriber;
  input?: KeySource;
  output?: NodeJS.WritableStream;
  autoAdvance?: boolean;
}

/**
 * Translate a readline keypress. Printable characters are taken as typed
 * (`A`, `+`); everything else by readline's key name (`right`, `f11`).
 * Terminals report Alt as meta.
 */
export function toKeyPress(str: string | undefined, key: TerminalKey | undefined): KeyPress | null {
  const modifiers: Modifier[] = [];
  if (key?.ctrl) modifiers.push('ctrl');
  if (key?.meta) modifiers.push('alt');
  if (key?.shift) modifiers.push('shift');

  const printable = str !== undefined && str.length === 1 && str >= ' ' && str !== '\x7f';
  const name = printable && !key?.ctrl && !key?.meta ? str : key?.name;
  if (!name) return null;
  return { key: name, modifiers };
}

/** `3/10 holiday.jpg [PAUSED] [REPEAT]`, used when no status format is set. */
export function defaultStatusLine(session: SessionState): string {
  const item = session.currentItem();
  if (!item) return 'No images';
  const flags = [session.paused ? 'PAUSED' : '', session.repeat ? 'REPEAT' : '', session.shuffle ? 'SHUFFLE' : '']
    .filter(Boolean)
    .map((f) => ` [${f}]`)
    .join('');
  return `${session.currentIndex + 1}/${session.order.length} ${item.path}${flags}`;
}

export class ConsoleSlideshow extends EventEmitter<ConsoleSlideshowEvents> implements ManagerBase {
  private readonly timer: PlaybackTimer;
  private readonly input: KeySource;
  private readonly output: NodeJS.WritableStream;
  private running = false;
  private settle: { resolve: () => void; reject: (err: unknown) => void } | null = null;
  private readonly onKeypress = (str: string | undefined, key: TerminalKey | undefined): void => {
    this.handleKeypress(str, key).catch((err: unknown) => this.fail(err));
  };

  constructor(private readonly deps: ConsoleSlideshowDeps) {
    super();
    this.input = deps.input ?? process.stdin;
    this.output = deps.output ?? process.stdout;
    this.timer = new PlaybackTimer({
      sessionId: deps.sessionId,
      sessions: deps.sessions,
      dispatcher: deps.dispatcher,
    });
    this.timer.on('advanced', (result) => this.report(result));
    this.timer.on('failed', (err) => this.fail(err));
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Start reading keys. Resolves once the client stops. */
  start(): Promise<void> {
    if (this.running) return Promise.reject(new Error('Console slideshow is already running'));
    this.running = true;

    readline.emitKeypressEvents(this.input);
    if (this.input.isTTY) this.input.setRawMode?.(true);
    this.input.on('keypress', this.onKeypress);
    this.input.resume();

    if (this.deps.hotkeys && this.deps.describer) {
      this.write(this.deps.hotkeys.helpText(this.deps.describer));
    }
    this.printStatus();
    if (this.deps.autoAdvance ?? true) this.timer.start();

    return new Promise((resolve, reject) => {
      this.settle = { resolve, reject };
    });
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.timer.stop();
    this.input.off('keypress', this.onKeypress);
    if (this.input.isTTY) this.input.setRawMode?.(false);
    this.input.pause();
    this.emit('stopped', undefined);
    const settle = this.settle;
    this.settle = null;
    settle?.resolve();
  }

  dispose(): void {
    this.stop();
    this.timer.dispose();
    this.removeAllListeners();
  }

  async handleKeypress(str: string | undefined, key: TerminalKey | undefined): Promise<void> {
    if (key?.ctrl && key.name === 'c') {
      this.stop();
      return;
    }
    const press = toKeyPress(str, key);
    if (!press) return;
    const result = await this.deps.dispatcher.handleKey(this.deps.sessionId, press.key, press.modifiers);
    if (result.status === 'ok') this.timer.reset();
    this.report(result);
  }

  /** Current status line: the session's format, or the default line. */
  statusLine(): string {
    const session = this.deps.sessions.get(this.deps.sessionId);
    if (!session) return 'No session';
    return session.statusFormat ? formatStatus(session) : defaultStatusLine(session);
  }

  private report(result: DispatchResult): void {
    this.emit('action', result);
    switch (result.status) {
      case 'ok':
        if (result.action === 'quit') {
          this.stop();
          return;
        }
        this.printStatus();
        break;
      case 'error':
        this.write(`Error: ${result.error}`);
        break;
      case 'no-action':
        log.debug(result.reason);
        break;
    }
  }

  private printStatus(): void {
    this.write(this.statusLine());
  }

  private write(text: string): void {
    this.output.write(`${text}\n`);
  }

  private fail(err: unknown): void {
    log.error('Console slideshow failed:', err);
    const settle = this.settle;
    this.settle = null;
    this.stop();
    settle?.reject(err);
  }
}
