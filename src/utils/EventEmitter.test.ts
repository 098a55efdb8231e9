/**
 * EventEmitter Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter, type EventMap } from './EventEmitter';

interface TestEvents extends EventMap {
  advanced: { index: number };
  paused: boolean;
  stopped: void;
}

describe('EventEmitter', () => {
  let emitter: EventEmitter<TestEvents>;

  beforeEach(() => {
    emitter = new EventEmitter<TestEvents>();
  });

  it('EVT-001: delivers the payload to every listener of the event', () => {
    const first = vi.fn();
    const second = vi.fn();
    const other = vi.fn();
    emitter.on('advanced', first);
    emitter.on('advanced', second);
    emitter.on('paused', other);

    emitter.emit('advanced', { index: 2 });

    expect(first).toHaveBeenCalledWith({ index: 2 });
    expect(second).toHaveBeenCalledWith({ index: 2 });
    expect(other).not.toHaveBeenCalled();
  });

  it('EVT-002: on returns an unsubscribe function', () => {
    const listener = vi.fn();
    const unsubscribe = emitter.on('paused', listener);
    emitter.emit('paused', true);
    unsubscribe();
    emitter.emit('paused', false);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(emitter.listenerCount('paused')).toBe(0);
  });

  it('EVT-003: off removes only the given listener', () => {
    const kept = vi.fn();
    const removed = vi.fn();
    emitter.on('paused', kept);
    emitter.on('paused', removed);
    emitter.off('paused', removed);
    emitter.emit('paused', true);
    expect(kept).toHaveBeenCalledWith(true);
    expect(removed).not.toHaveBeenCalled();
    expect(() => emitter.off('stopped', removed)).not.toThrow();
  });

  it('EVT-004: once fires a single time', () => {
    const listener = vi.fn();
    emitter.once('stopped', listener);
    emitter.emit('stopped', undefined);
    emitter.emit('stopped', undefined);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('EVT-005: a throwing listener does not stop the others', () => {
    const after = vi.fn();
    emitter.on('paused', () => {
      throw new Error('listener failed');
    });
    emitter.on('paused', after);
    expect(() => emitter.emit('paused', true)).not.toThrow();
    expect(after).toHaveBeenCalledWith(true);
  });

  it('EVT-006: a listener added during delivery waits for the next event', () => {
    const late = vi.fn();
    emitter.on('advanced', () => {
      emitter.on('advanced', late);
    });
    emitter.emit('advanced', { index: 1 });
    expect(late).not.toHaveBeenCalled();
    emitter.emit('advanced', { index: 2 });
    expect(late).toHaveBeenCalledWith({ index: 2 });
  });

  it('EVT-007: removeAllListeners clears one event or all of them', () => {
    const advanced = vi.fn();
    const paused = vi.fn();
    emitter.on('advanced', advanced);
    emitter.on('paused', paused);

    emitter.removeAllListeners('advanced');
    expect(emitter.listenerCount('advanced')).toBe(0);
    expect(emitter.listenerCount('paused')).toBe(1);

    emitter.removeAllListeners();
    emitter.emit('paused', true);
    expect(paused).not.toHaveBeenCalled();
  });
});
