/**
 * Unit Tests for SnapshotStore
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EMPTY_SNAPSHOT, SnapshotStore, linesEqual } from './snapshot-store.js';
import type { MetricLine, Snapshot } from '../types/index.js';

const lines: MetricLine[] = [
  { metric: 'ipv4', text: 'IPv4: 10.0.0.7', available: true },
  { metric: 'cpuLoad', text: 'CPU Load: 3.0%', available: true },
];

describe('SnapshotStore', () => {
  let store: SnapshotStore;

  beforeEach(() => {
    store = new SnapshotStore();
  });

  it('should return the empty snapshot before the first publish', () => {
    expect(store.current()).toBe(EMPTY_SNAPSHOT);
    expect(store.current().lines).toHaveLength(0);
    expect(store.current().sampledAt).toBeNull();
    expect(store.version()).toBe(0);
  });

  it('should return the published lines', () => {
    const snapshot: Snapshot = { lines, sampledAt: new Date(2024, 2, 12, 10, 0, 0) };
    store.publish(snapshot);

    expect(store.current().lines).toEqual(lines);
    expect(store.current().sampledAt).toEqual(snapshot.sampledAt);
    expect(store.version()).toBe(1);
  });

  it('should freeze the stored snapshot and detach it from the caller', () => {
    const mutable: MetricLine[] = [...lines];
    store.publish({ lines: mutable, sampledAt: null });

    mutable.push({ metric: 'mac', text: 'MAC: late', available: true });

    const current = store.current();
    expect(current.lines).toHaveLength(2);
    expect(Object.isFrozen(current)).toBe(true);
    expect(Object.isFrozen(current.lines)).toBe(true);
    expect(Object.isFrozen(current.lines[0])).toBe(true);
  });

  it('should keep the current snapshot when identical lines are republished', () => {
    const listener = vi.fn();
    store.on('snapshotPublished', listener);

    store.publish({ lines, sampledAt: new Date(1000) });
    const first = store.current();
    store.publish({ lines: lines.map(line => ({ ...line })), sampledAt: new Date(2000) });

    expect(store.current()).toBe(first);
    expect(store.version()).toBe(1);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ version: 1, lineCount: 2 });
  });

  it('should replace the snapshot as a whole when lines change', () => {
    store.publish({ lines, sampledAt: null });
    const first = store.current();

    const changed: MetricLine[] = [lines[0], { metric: 'cpuLoad', text: 'CPU Load: 4.0%', available: true }];
    store.publish({ lines: changed, sampledAt: null });

    expect(store.version()).toBe(2);
    expect(store.current().lines[1].text).toBe('CPU Load: 4.0%');
    expect(first.lines[1].text).toBe('CPU Load: 3.0%');
  });

  it('should publish even when a listener throws', () => {
    store.on('snapshotPublished', () => {
      throw new Error('listener failure');
    });

    expect(() => store.publish({ lines, sampledAt: null })).not.toThrow();
    expect(store.version()).toBe(1);
    expect(store.current().lines).toEqual(lines);
  });

  it('should accept an empty snapshot as the first publish', () => {
    store.publish({ lines: [], sampledAt: new Date(0) });

    expect(store.version()).toBe(1);
    expect(store.current().lines).toEqual([]);
  });
});

describe('linesEqual', () => {
  it('should compare metric, text and availability in order', () => {
    const reversed = [...lines].reverse();
    const degraded = lines.map(line => ({ ...line, available: false }));

    expect(linesEqual(lines, lines.map(line => ({ ...line })))).toBe(true);
    expect(linesEqual(lines, reversed)).toBe(false);
    expect(linesEqual(lines, degraded)).toBe(false);
    expect(linesEqual(lines, lines.slice(1))).toBe(false);
  });
});
