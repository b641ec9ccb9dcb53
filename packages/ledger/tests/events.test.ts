// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, expect, it, vi } from 'vitest';
import { TypedEventEmitter } from '../src/events.js';

interface TestEvents {
  ping: { seq: number };
  pong: { reply: string };
}

describe('TypedEventEmitter', () => {
  it('delivers payloads to listeners in registration order', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const order: string[] = [];
    emitter.on('ping', (p) => order.push(`a${p.seq}`)).on('ping', (p) => order.push(`b${p.seq}`));

    expect(emitter.emit('ping', { seq: 1 })).toBe(true);
    expect(order).toEqual(['a1', 'b1']);
  });

  it('returns false when nobody listens', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    expect(emitter.emit('pong', { reply: 'x' })).toBe(false);
  });

  it('fires once-listeners a single time even when re-emitted from a listener', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const once = vi.fn();
    emitter.once('ping', once);
    emitter.on('ping', (p) => {
      if (p.seq === 1) emitter.emit('ping', { seq: 2 });
    });

    emitter.emit('ping', { seq: 1 });
    expect(once).toHaveBeenCalledTimes(1);
    expect(once).toHaveBeenCalledWith({ seq: 1 });
  });

  it('off() removes one registration', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.on('ping', listener).on('ping', listener);
    emitter.off('ping', listener);

    expect(emitter.listenerCount('ping')).toBe(1);
    emitter.off('ping', listener);
    expect(emitter.listenerCount('ping')).toBe(0);
  });

  it('removeAllListeners() clears one event or all of them', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    emitter.on('ping', vi.fn()).on('pong', vi.fn());

    emitter.removeAllListeners('ping');
    expect(emitter.listenerCount('ping')).toBe(0);
    expect(emitter.listenerCount('pong')).toBe(1);

    emitter.removeAllListeners();
    expect(emitter.listenerCount('pong')).toBe(0);
  });
});
