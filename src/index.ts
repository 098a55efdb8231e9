/**
 * Public API.
 *
 *   const app = await App.create({ settings, items, context: 'web' });
 *   const server = new SlideshowServer(app.createRequestHandler());
 *   await server.listen(8000, '127.0.0.1');
 */

export { App, sessionDefaults, type AppOptions } from './App';

export * from './actions';
export * from './config';
export * from './core/errors';
export type { Disposable, ManagerBase } from './core/ManagerBase';

export { createItem, createItemSequence, sequenceFromPaths, type Item, type ItemInit, type ItemSequence } from './core/sequence/ItemSequence';
export { discoverItems, collectImagePaths, parseResponseFileContent, type DiscoveryOptions } from './core/sequence/ItemDiscovery';
export {
  SessionState,
  type RepeatMode,
  type SessionChanges,
  type SessionInit,
  type SessionSnapshot,
} from './core/session/SessionState';
export { ActionHistory, type HistoryEntry, type HistoryInfo } from './core/session/ActionHistory';
export {
  SessionManager,
  type EvictionReason,
  type SessionHandle,
  type SessionManagerOptions,
} from './core/session/SessionManager';
export { computeTemplateVariables, formatStatus, formatTemplate, type TemplateVariables } from './core/session/TemplateVariables';

export { FileRecordLog, MemoryRecordLog } from './collaborators/FileRecordLog';
export { FileTrash } from './collaborators/FileTrash';
export { ProcessToolRunner } from './collaborators/ProcessToolRunner';
export { SystemFileManager, spawnDetached, type Launcher } from './collaborators/SystemFileManager';
export type { FileManager, RecordLog, ToolRunner, ToolRunResult, TrashReceipt, TrashService } from './collaborators/types';

export { ActionDispatcher, type DispatchResult, type DispatchOptions } from './services/ActionDispatcher';

export { HotkeyResolver, type ActionDescriber } from './utils/input/HotkeyResolver';
export { GestureResolver } from './utils/input/GestureResolver';
export { GestureDetector, parseGestureSample, type GestureName, type GestureSample } from './utils/input/GestureDetector';
export { comboToken, parseKeyBinding, parseKeyPayload, type KeyPress } from './utils/input/KeyTokens';
export type { BindingLayer, BindingTable } from './utils/input/BindingResolver';
export { Logger, LogLevel } from './utils/Logger';
export { EventEmitter, type EventMap } from './utils/EventEmitter';
export { seededRandom, shuffled, type RandomSource } from './utils/shuffle';

export { createRequestHandler, type RequestHandlerDeps } from './network/requestHandler';
export { SlideshowServer } from './network/SlideshowServer';
export type { HttpRequest, HttpResponse, RequestHandler } from './network/types';
export { ConsoleSlideshow } from './desktop/ConsoleSlideshow';
export { PlaybackTimer } from './desktop/PlaybackTimer';
