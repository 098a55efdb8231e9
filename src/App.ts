/**
 * App - composition root.
 *
 * Turns validated settings and a discovered item sequence into the running
 * pieces: the action registry, the session manager, both input resolvers
 * and the dispatcher for one context. Front ends (the console client, the
 * web server) only talk to what is built here.
 */

import * as path from 'node:path';
import type { ActionContext } from './actions/Action';
import { ActionRegistry } from './actions/ActionRegistry';
import { registerDefaultActions } from './actions/defaultActions';
import { ExternalToolManager } from './actions/ExternalToolManager';
import { FileRecordLog } from './collaborators/FileRecordLog';
import { FileTrash } from './collaborators/FileTrash';
import { ProcessToolRunner } from './collaborators/ProcessToolRunner';
import { SystemFileManager } from './collaborators/SystemFileManager';
import type { FileManager, RecordLog, ToolRunner, TrashService } from './collaborators/types';
import type { AppSettings } from './config/settings';
import type { ManagerBase } from './core/ManagerBase';
import type { ItemSequence } from './core/sequence/ItemSequence';
import { SessionManager } from './core/session/SessionManager';
import type { SessionInit } from './core/session/SessionState';
import { createRequestHandler } from './network/requestHandler';
import type { RequestHandler } from './network/types';
import { ActionDispatcher } from './services/ActionDispatcher';
import { GestureResolver } from './utils/input/GestureResolver';
import { HotkeyResolver } from './utils/input/HotkeyResolver';
import { Logger } from './utils/Logger';
import { defaultRandom, seededRandom, type RandomSource } from './utils/shuffle';

const log = new Logger('App');

export interface AppOptions {
  settings: AppSettings;
  items: ItemSequence;
  context: ActionContext;
  /** Base for relative file settings. Defaults to the process cwd. */
  cwd?: string;
  /** Overrides the seed from the settings. */
  random?: RandomSource;
  toolRunner?: ToolRunner;
  rememberLog?: RecordLog;
  notesLog?: RecordLog;
  trash?: TrashService;
  fileManager?: FileManager;
}

/** Initial state every new session starts from. */
export function sessionDefaults(settings: AppSettings): SessionInit {
  const { slideshow, fileOperations } = settings;
  return {
    speed: slideshow.speed,
    repeat: slideshow.repeat,
    repeatMode: slideshow.repeatMode,
    shuffle: slideshow.shuffle || slideshow.repeatMode !== 'fixed',
    alwaysOnTop: slideshow.alwaysOnTop,
    paused: slideshow.pausedOnStart,
    statusFormat: slideshow.statusFormat,
    historyCapacity: fileOperations.maxUndoHistory,
  };
}

export class App implements ManagerBase {
  readonly registry: ActionRegistry;
  readonly sessions: SessionManager;
  readonly hotkeys: HotkeyResolver;
  readonly gestures: GestureResolver;
  readonly dispatcher: ActionDispatcher;

  private constructor(
    readonly settings: AppSettings,
    readonly context: ActionContext,
    registry: ActionRegistry,
    sessions: SessionManager
  ) {
    this.registry = registry;
    this.sessions = sessions;
    this.hotkeys = new HotkeyResolver(context, settings.hotkeys);
    this.gestures = new GestureResolver(context, settings.gestures);
    this.dispatcher = new ActionDispatcher({
      context,
      registry,
      sessions,
      hotkeys: this.hotkeys,
      gestures: this.gestures,
      undoEnabled: settings.fileOperations.enableUndo,
    });
  }

  /** Build the app. Scans for external tools when a tool base name is set. */
  static async create(options: AppOptions): Promise<App> {
    const { settings, items, context } = options;
    const cwd = options.cwd ?? process.cwd();
    const random = options.random ?? (settings.slideshow.seed === null ? defaultRandom : seededRandom(settings.slideshow.seed));

    const registry = new ActionRegistry();
    registerDefaultActions(registry, {
      rememberLog: options.rememberLog ?? new FileRecordLog(path.resolve(cwd, settings.slideshow.rememberFile)),
      notesLog: options.notesLog ?? new FileRecordLog(path.resolve(cwd, settings.slideshow.notesFile)),
      trash:
        options.trash ??
        (settings.fileOperations.enableTrash ? new FileTrash(path.resolve(cwd, settings.fileOperations.trashDir)) : undefined),
      fileManager: options.fileManager ?? new SystemFileManager(),
      galleryEnabled: settings.gallery.enabled,
      random,
    });

    const { baseName, searchDir } = settings.externalTools;
    if (baseName !== null) {
      const tools = new ExternalToolManager(baseName, path.resolve(cwd, searchDir));
      await tools.discover();
      tools.registerActions(registry, options.toolRunner ?? new ProcessToolRunner({ cwd }));
    }

    const sessions = new SessionManager(items, {
      defaults: sessionDefaults(settings),
      gestureThresholds: settings.gestureDetection,
      random,
    });
    log.info(`${registry.size} actions registered for ${context} mode over ${items.length} item(s)`);
    return new App(settings, context, registry, sessions);
  }

  /** HTTP handler for the web front end. */
  createRequestHandler(): RequestHandler {
    return createRequestHandler({
      dispatcher: this.dispatcher,
      sessions: this.sessions,
      registry: this.registry,
      galleryEnabled: this.settings.gallery.enabled,
    });
  }

  dispose(): void {
    this.sessions.dispose();
  }
}
