/**
 * Scroll Layout
 *
 * Decides where each line of a frame is drawn. Lines that fit the viewport are
 * centered; wider lines slide left at a constant speed and wrap back in from
 * the right edge once they have fully left the screen.
 */

import type { LinePlacement, MeasuredLine } from '../types/index.js';

export const DEFAULT_SCROLL_SPEED_PX_PER_SEC = 10;

export interface LayoutOptions {
  viewportWidth: number;
  /** Font height plus line padding */
  lineHeight: number;
  scrollSpeedPxPerSec?: number;
}

/**
 * Period in pixels after which a scrolling line repeats its position.
 */
export function scrollPeriod(measuredWidthPx: number, viewportWidth: number): number {
  return measuredWidthPx + viewportWidth;
}

/**
 * Returns the scroll offset for an overflowing line, or undefined when the line
 * fits and should be centered instead.
 */
export function computeScrollOffset(
  measuredWidthPx: number,
  viewportWidth: number,
  elapsedMs: number,
  scrollSpeedPxPerSec: number = DEFAULT_SCROLL_SPEED_PX_PER_SEC,
): number | undefined {
  if (measuredWidthPx <= viewportWidth) {
    return undefined;
  }

  const travelledPx = Math.floor((Math.max(0, elapsedMs) * scrollSpeedPxPerSec) / 1000);
  return travelledPx % scrollPeriod(measuredWidthPx, viewportWidth);
}

/**
 * Horizontal draw position of a line at the given elapsed time.
 */
export function computeLineX(
  measuredWidthPx: number,
  viewportWidth: number,
  elapsedMs: number,
  scrollSpeedPxPerSec: number = DEFAULT_SCROLL_SPEED_PX_PER_SEC,
): number {
  const offset = computeScrollOffset(measuredWidthPx, viewportWidth, elapsedMs, scrollSpeedPxPerSec);
  if (offset === undefined) {
    return Math.floor((viewportWidth - measuredWidthPx) / 2);
  }
  return offset > 0 ? -offset : 0;
}

export function layoutFrame(
  lines: readonly MeasuredLine[],
  elapsedMs: number,
  options: LayoutOptions,
): LinePlacement[] {
  const speed = options.scrollSpeedPxPerSec ?? DEFAULT_SCROLL_SPEED_PX_PER_SEC;

  return lines.map((line, index) => ({
    text: line.text,
    x: computeLineX(line.measuredWidthPx, options.viewportWidth, elapsedMs, speed),
    y: index * options.lineHeight,
    scrolling: line.measuredWidthPx > options.viewportWidth,
  }));
}
