import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventBus, startTickSource } from './event-bus.js';
import type { KeyInput } from '../types/index.js';

const SPACE: KeyInput = { name: 'space', ctrl: false, shift: false };

describe('EventBus', () => {
  it('should deliver events in arrival order', async () => {
    const bus = new EventBus();
    bus.push({ type: 'key', key: SPACE });
    bus.push({ type: 'resize', columns: 80, rows: 24 });

    expect(await bus.next()).toEqual({ type: 'key', key: SPACE });
    expect(await bus.next()).toEqual({ type: 'resize', columns: 80, rows: 24 });
  });

  it('should coalesce consecutive queued ticks', async () => {
    const bus = new EventBus();
    bus.push({ type: 'tick', count: 1 });
    bus.push({ type: 'tick', count: 1 });
    bus.push({ type: 'tick', count: 1 });
    bus.push({ type: 'key', key: SPACE });
    bus.push({ type: 'tick', count: 1 });

    expect(bus.pending).toBe(3);
    expect(await bus.next()).toEqual({ type: 'tick', count: 3 });
    expect(await bus.next()).toEqual({ type: 'key', key: SPACE });
    expect(await bus.next()).toEqual({ type: 'tick', count: 1 });
  });

  it('should hand a pushed event to a waiting reader', async () => {
    const bus = new EventBus();
    const read = bus.next();
    bus.push({ type: 'tick', count: 1 });

    expect(await read).toEqual({ type: 'tick', count: 1 });
    expect(bus.pending).toBe(0);
  });

  it('should resolve pending and later reads with null once closed', async () => {
    const bus = new EventBus();
    const read = bus.next();
    bus.close();
    bus.push({ type: 'tick', count: 1 });

    expect(await read).toBeNull();
    expect(await bus.next()).toBeNull();
    expect(bus.isClosed).toBe(true);
  });

  it('should stop registered producers on close', () => {
    const bus = new EventBus();
    const stop = vi.fn();
    bus.onClose(stop);

    bus.close();
    bus.close();

    expect(stop).toHaveBeenCalledTimes(1);
  });
});

describe('startTickSource', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should push one tick per interval', async () => {
    const bus = new EventBus();
    startTickSource(bus, 100, () => Date.now());

    vi.advanceTimersByTime(350);

    expect(await bus.next()).toEqual({ type: 'tick', count: 3 });
    bus.close();
  });

  it('should count the intervals missed while the loop was blocked', async () => {
    const bus = new EventBus();
    startTickSource(bus, 100, () => Date.now());

    // Wall time moves on by a full second without any timer firing
    vi.setSystemTime(Date.now() + 1000);
    vi.advanceTimersByTime(100);

    expect(await bus.next()).toEqual({ type: 'tick', count: 11 });
    bus.close();
  });

  it('should carry the part of an interval that has not elapsed yet', async () => {
    let now = 0;
    const bus = new EventBus();
    startTickSource(bus, 100, () => now);

    now = 250;
    vi.advanceTimersByTime(100);
    expect(await bus.next()).toEqual({ type: 'tick', count: 2 });

    now = 300;
    vi.advanceTimersByTime(100);
    expect(await bus.next()).toEqual({ type: 'tick', count: 1 });
    bus.close();
  });

  it('should stop ticking when the bus closes', () => {
    const bus = new EventBus();
    startTickSource(bus, 100, () => Date.now());
    bus.close();

    vi.advanceTimersByTime(500);

    expect(bus.pending).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });
});
