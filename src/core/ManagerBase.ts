/**
 * Lifetime contract for objects that own timers, listeners or sockets.
 */

export interface Disposable {
  /** Release everything this object holds. Safe to call more than once. */
  dispose(): void;
}

/** Sessions, histories, the playback timer, the console client and the server. */
export type ManagerBase = Disposable;
