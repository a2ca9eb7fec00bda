/**
 * Snapshot Store
 *
 * Hands the latest Snapshot from the sampler to the renderer. A published
 * snapshot is frozen and replaced by reference, so a reader always holds a
 * complete pass and never waits on the writer.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import type { MetricLine, Snapshot } from '../types/index.js';

export const EMPTY_SNAPSHOT: Snapshot = Object.freeze({
  lines: Object.freeze([]),
  sampledAt: null,
});

export interface SnapshotPublishedEvent {
  version: number;
  lineCount: number;
}

export function linesEqual(a: readonly MetricLine[], b: readonly MetricLine[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((line, index) => {
    const other = b[index];
    return other !== undefined
      && line.metric === other.metric
      && line.text === other.text
      && line.available === other.available;
  });
}

function freezeSnapshot(snapshot: Snapshot): Snapshot {
  return Object.freeze({
    lines: Object.freeze(snapshot.lines.map(line => Object.freeze({ ...line }))),
    sampledAt: snapshot.sampledAt,
  });
}

export class SnapshotStore extends EventEmitter {
  private readonly logger = createSubsystemLogger('display/snapshot-store');
  private latest: Snapshot = EMPTY_SNAPSHOT;
  private publishCount = 0;

  /**
   * Replaces the current snapshot. Re-publishing lines equal to the current
   * ones keeps the existing snapshot and version. A throwing listener is
   * logged and does not undo the swap.
   */
  publish(snapshot: Snapshot): void {
    if (this.publishCount > 0 && linesEqual(this.latest.lines, snapshot.lines)) {
      return;
    }

    this.latest = freezeSnapshot(snapshot);
    this.publishCount++;

    const event: SnapshotPublishedEvent = {
      version: this.publishCount,
      lineCount: this.latest.lines.length,
    };
    try {
      this.emit('snapshotPublished', event);
    } catch (error) {
      this.logger.warn('snapshotPublished listener failed', {
        version: event.version,
        error: describeError(error),
      });
    }
  }

  current(): Snapshot {
    return this.latest;
  }

  version(): number {
    return this.publishCount;
  }
}
