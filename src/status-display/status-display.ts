/**
 * Status Display Orchestrator
 *
 * Wires the sampler, snapshot store and render loop together and owns their
 * lifecycle. A render loop failure (the transport gave up) is fatal: the
 * sampler is stopped and `fatal` is emitted.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger, describeError } from '../logging/subsystem.js';
import { SnapshotStore, type SnapshotPublishedEvent } from './snapshot-store/snapshot-store.js';
import { Sampler, type SampleCompletedEvent } from './sampler/sampler.js';
import { RenderLoop } from './render-loop/render-loop.js';
import type {
  DisplayConfiguration,
  DisplayTransport,
  DrawSurface,
  MetricSource,
  TextMeasurer,
} from './types/index.js';

export interface StatusDisplayDependencies {
  source: MetricSource;
  measurer: TextMeasurer;
  surface: DrawSurface;
  transport: DisplayTransport;
  /** Wall clock for the date/time line */
  now?: () => Date;
  /** Monotonic clock for scrolling */
  clock?: () => number;
}

export interface StatusDisplayStatus {
  running: boolean;
  snapshotVersion: number;
  samplingPasses: number;
  framesRendered: number;
  uptime: number; // milliseconds
}

export class StatusDisplay extends EventEmitter {
  private readonly logger = createSubsystemLogger('display/orchestrator');
  readonly store = new SnapshotStore();
  private sampler: Sampler;
  private renderLoop: RenderLoop;
  private transport: DisplayTransport;
  private startTime?: Date;
  private renderLoopDone?: Promise<void>;

  constructor(config: DisplayConfiguration, deps: StatusDisplayDependencies) {
    super();
    this.transport = deps.transport;

    this.sampler = new Sampler(this.store, deps.source, {
      intervalMs: config.sampler.intervalMs,
      thermalZones: config.thermalZones,
      now: deps.now,
    });

    this.renderLoop = new RenderLoop(this.store, deps.measurer, deps.surface, deps.transport, {
      font: config.font,
      linePadding: config.layout.linePadding,
      scrollSpeedPxPerSec: config.layout.scrollSpeedPxPerSec,
      background: config.layout.background,
      foreground: config.layout.foreground,
      clock: deps.clock,
    });

    this.store.on('snapshotPublished', (event: SnapshotPublishedEvent) => {
      this.logger.debug('Snapshot published', { ...event });
    });
    this.sampler.on('sampleCompleted', (event: SampleCompletedEvent) => {
      if (event.unavailable.length > 0) {
        this.logger.debug('Sampling pass used fallbacks', { unavailable: event.unavailable });
      }
    });
  }

  /**
   * Starts sampling and rendering. The first pass runs in the background, so
   * the first frames show an empty display until it is published.
   */
  start(): void {
    if (this.startTime) {
      return;
    }

    this.startTime = new Date();
    this.sampler.start();
    this.renderLoopDone = this.renderLoop.start().catch((error: unknown) => this.handleFatal(error));

    this.logger.info('Status display started');
    this.emit('started');
  }

  async stop(): Promise<void> {
    if (!this.startTime) {
      return;
    }

    this.startTime = undefined;
    try {
      await this.renderLoop.stop();
    } finally {
      await this.renderLoopDone;
      await this.sampler.stop();
      await this.transport.close();
    }

    this.logger.info('Status display stopped');
    this.emit('stopped');
  }

  getStatus(): StatusDisplayStatus {
    return {
      running: this.startTime !== undefined,
      snapshotVersion: this.store.version(),
      samplingPasses: this.sampler.getPassCount(),
      framesRendered: this.renderLoop.getStatus().framesRendered,
      uptime: this.startTime ? Date.now() - this.startTime.getTime() : 0,
    };
  }

  private async handleFatal(error: unknown): Promise<void> {
    this.logger.error('Display output failed, stopping', { error: describeError(error) });
    this.startTime = undefined;
    await this.sampler.stop();
    this.emit('fatal', error);
  }
}
