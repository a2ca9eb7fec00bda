/**
 * Sampler
 *
 * Collects one Snapshot per period and publishes it to the SnapshotStore.
 * Every metric is gathered independently: a failing source turns into a
 * sentinel on its own line and never stops the rest of the pass, nor the loop.
 */

import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import { setTimeout as sleep } from 'node:timers/promises';
import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import type { SnapshotStore } from '../snapshot-store/snapshot-store.js';
import type { MetricId, MetricSource, Snapshot } from '../types/index.js';
import {
  LOOPBACK_IPV4,
  cpuLoadLine,
  dateTimeLine,
  ipv4Line,
  macLine,
  memoryLine,
  temperatureLine,
} from './metric-lines.js';

export interface SamplerOptions {
  /** Target period between the start of two passes */
  intervalMs: number;
  thermalZones: {
    cpu: string;
    hotspot: string;
  };
  /** Wall clock used for the date/time line */
  now?: () => Date;
}

export interface SampleCompletedEvent {
  durationMs: number;
  unavailable: MetricId[];
}

export class Sampler extends EventEmitter {
  private readonly logger = createSubsystemLogger('display/sampler');
  private store: SnapshotStore;
  private source: MetricSource;
  private options: SamplerOptions;
  private now: () => Date;
  private inFlight?: Promise<Snapshot>;
  private loop?: Promise<void>;
  private abortController?: AbortController;
  private passCount = 0;

  constructor(store: SnapshotStore, source: MetricSource, options: SamplerOptions) {
    super();
    this.store = store;
    this.source = source;
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Runs a single sampling pass and publishes its snapshot. A call made while
   * a pass is running joins that pass instead of starting a second one.
   */
  sampleOnce(): Promise<Snapshot> {
    if (!this.inFlight) {
      this.inFlight = this.collect().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async collect(): Promise<Snapshot> {
    const startedAt = performance.now();
    const unavailable: MetricId[] = [];
    const { thermalZones } = this.options;

    const [ip, mac, cpuTemp, hotspotTemp, cpuLoad, memory] = await Promise.all([
      this.guard('ipv4', () => this.source.localIPv4(), unavailable),
      this.guard('mac', () => this.source.hardwareMACAddress(), unavailable),
      this.guard('temperature', () => this.source.readThermalZone(thermalZones.cpu), unavailable),
      this.guard('temperature', () => this.source.readThermalZone(thermalZones.hotspot), unavailable),
      this.guard('cpuLoad', () => this.source.cpuLoadPercent(), unavailable),
      this.guard('memory', () => this.source.memoryUsage(), unavailable),
    ]);

    if ((cpuTemp === undefined || hotspotTemp === undefined) && !unavailable.includes('temperature')) {
      unavailable.push('temperature');
      this.logger.debug('Thermal zone unavailable', {
        cpu: cpuTemp === undefined ? thermalZones.cpu : undefined,
        hotspot: hotspotTemp === undefined ? thermalZones.hotspot : undefined,
      });
    }

    const sampledAt = this.now();
    const snapshot: Snapshot = {
      lines: [
        ip === undefined ? ipv4Line(LOOPBACK_IPV4, false) : ipv4Line(ip),
        macLine(mac),
        dateTimeLine(sampledAt),
        temperatureLine(cpuTemp, hotspotTemp),
        cpuLoadLine(cpuLoad),
        memoryLine(memory),
      ],
      sampledAt,
    };

    this.store.publish(snapshot);
    this.passCount++;

    const event: SampleCompletedEvent = {
      durationMs: performance.now() - startedAt,
      unavailable: [...new Set(unavailable)],
    };
    try {
      this.emit('sampleCompleted', event);
    } catch (error) {
      this.logger.warn('sampleCompleted listener failed', { error: describeError(error) });
    }

    return snapshot;
  }

  private async guard<T>(
    metric: MetricId,
    read: () => Promise<T>,
    unavailable: MetricId[],
  ): Promise<T | undefined> {
    try {
      return await read();
    } catch (error) {
      unavailable.push(metric);
      this.logger.warn('Metric unavailable, using fallback', {
        metric,
        error: describeError(error),
      });
      return undefined;
    }
  }

  /**
   * Starts the periodic sampling loop
   */
  start(): void {
    if (this.loop) {
      return;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.loop = this.run(controller.signal).catch((error: unknown) => {
      this.logger.error('Sampling loop terminated unexpectedly', { error: describeError(error) });
      this.emit('samplingError', error);
    });

    this.logger.info('Sampler started', { intervalMs: this.options.intervalMs });
    this.emit('samplerStarted', { intervalMs: this.options.intervalMs });
  }

  /**
   * Stops the loop and resolves once the current pass (if any) has finished
   */
  async stop(): Promise<void> {
    if (!this.loop) {
      return;
    }

    this.abortController?.abort();
    await this.loop;
    this.loop = undefined;
    this.abortController = undefined;

    this.logger.info('Sampler stopped', { passes: this.passCount });
    this.emit('samplerStopped');
  }

  isRunning(): boolean {
    return this.loop !== undefined;
  }

  getPassCount(): number {
    return this.passCount;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const startedAt = performance.now();

      try {
        await this.sampleOnce();
      } catch (error) {
        this.logger.error('Sampling pass failed', { error: describeError(error) });
        this.emit('samplingError', error);
      }

      const remaining = Math.max(0, this.options.intervalMs - (performance.now() - startedAt));
      if (!(await this.pause(remaining, signal))) {
        break;
      }
    }
  }

  private async pause(ms: number, signal: AbortSignal): Promise<boolean> {
    try {
      await sleep(ms, undefined, { signal });
      return true;
    } catch (error) {
      if (signal.aborted) {
        return false;
      }
      throw error;
    }
  }
}
