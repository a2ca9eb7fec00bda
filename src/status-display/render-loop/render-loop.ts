/**
 * Render Loop
 *
 * Produces frames continuously: read the latest snapshot, measure each line,
 * clear, lay out, draw and submit. There is no frame-rate cap; the transport
 * submit bounds the rate. Each iteration yields to the event loop so the
 * sampler keeps running alongside.
 */

import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import { layoutFrame } from '../scroll-layout/scroll-layout.js';
import type { SnapshotStore } from '../snapshot-store/snapshot-store.js';
import type {
  DisplayTransport,
  DrawSurface,
  FontSpec,
  LinePlacement,
  MeasuredLine,
  RGBColor,
  TextMeasurer,
} from '../types/index.js';

export interface RenderLoopOptions {
  font: FontSpec;
  linePadding: number;
  scrollSpeedPxPerSec: number;
  background: RGBColor;
  foreground: RGBColor;
  /** Monotonic clock in milliseconds */
  clock?: () => number;
}

export interface RenderLoopStatus {
  running: boolean;
  framesRendered: number;
  lastFrameMs: number;
}

const FRAME_LOG_INTERVAL = 1000;

export class RenderLoop extends EventEmitter {
  private readonly logger = createSubsystemLogger('display/render-loop');
  private store: SnapshotStore;
  private measurer: TextMeasurer;
  private surface: DrawSurface;
  private transport: DisplayTransport;
  private options: RenderLoopOptions;
  private clock: () => number;
  private startTime: number;
  private loop?: Promise<void>;
  private abortController?: AbortController;
  private framesRendered = 0;
  private lastFrameMs = 0;

  constructor(
    store: SnapshotStore,
    measurer: TextMeasurer,
    surface: DrawSurface,
    transport: DisplayTransport,
    options: RenderLoopOptions,
  ) {
    super();
    this.store = store;
    this.measurer = measurer;
    this.surface = surface;
    this.transport = transport;
    this.options = options;
    this.clock = options.clock ?? (() => performance.now());
    this.startTime = this.clock();
  }

  /**
   * Renders and submits one frame from the current snapshot
   */
  async renderFrame(): Promise<LinePlacement[]> {
    const frameStart = this.clock();
    const { font, background, foreground } = this.options;
    const snapshot = this.store.current();

    // Widths are measured per frame and never written back into the snapshot
    const measured: MeasuredLine[] = snapshot.lines.map(line => ({
      text: line.text,
      measuredWidthPx: Math.max(0, Math.round(this.measurer.measureWidth(line.text, font))),
    }));

    this.surface.clear(background);

    const placements = layoutFrame(measured, frameStart - this.startTime, {
      viewportWidth: this.surface.width,
      lineHeight: font.sizePx + this.options.linePadding,
      scrollSpeedPxPerSec: this.options.scrollSpeedPxPerSec,
    });

    for (const placement of placements) {
      this.surface.drawText(placement.x, placement.y, placement.text, font, foreground);
    }

    await this.transport.submit(this.surface.frame());

    this.framesRendered++;
    this.lastFrameMs = this.clock() - frameStart;
    if (this.framesRendered % FRAME_LOG_INTERVAL === 0) {
      this.logger.debug('Frames rendered', {
        frames: this.framesRendered,
        lastFrameMs: Math.round(this.lastFrameMs),
      });
    }

    return placements;
  }

  /**
   * Starts the loop. The returned promise settles when the loop ends: it
   * resolves after stop() and rejects when a frame cannot be submitted.
   */
  start(): Promise<void> {
    if (this.loop) {
      return this.loop;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.startTime = this.clock();
    this.loop = this.run(controller.signal);

    this.logger.info('Render loop started', {
      width: this.surface.width,
      height: this.surface.height,
      font: this.options.font.family,
    });
    this.emit('renderStarted');

    return this.loop;
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) {
      return;
    }

    this.abortController?.abort();
    await loop;
    this.logger.info('Render loop stopped', { frames: this.framesRendered });
    this.emit('renderStopped');
  }

  getStatus(): RenderLoopStatus {
    return {
      running: this.loop !== undefined,
      framesRendered: this.framesRendered,
      lastFrameMs: this.lastFrameMs,
    };
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        await this.renderFrame();
        await yieldToEventLoop();
      }
    } catch (error) {
      this.logger.error('Render loop failed', { error: describeError(error) });
      throw error;
    } finally {
      this.loop = undefined;
      this.abortController = undefined;
    }
  }
}
