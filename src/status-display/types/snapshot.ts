/**
 * Snapshot Types
 *
 * A Snapshot is one complete sampling pass: an ordered list of formatted lines.
 * Widths and positions are frame-local and live in MeasuredLine / LinePlacement.
 */

export type MetricId = 'ipv4' | 'mac' | 'datetime' | 'temperature' | 'cpuLoad' | 'memory';

export interface MetricLine {
  /** Which fact this line displays */
  readonly metric: MetricId;
  /** Fully formatted display text */
  readonly text: string;
  /** False when the text carries a sentinel instead of a reading */
  readonly available: boolean;
}

export interface Snapshot {
  /** Lines in vertical draw order */
  readonly lines: readonly MetricLine[];
  /** When the sampling pass completed; null for the initial empty snapshot */
  readonly sampledAt: Date | null;
}

export interface MeasuredLine {
  readonly text: string;
  /** Integer pixel width of `text` under the active font, recomputed every frame */
  readonly measuredWidthPx: number;
}

export interface LinePlacement {
  readonly text: string;
  readonly x: number;
  readonly y: number;
  /** True when the line overflows the viewport and is scrolling */
  readonly scrolling: boolean;
}
