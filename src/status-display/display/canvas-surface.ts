/**
 * Canvas Surface
 *
 * Draw surface and text measurer backed by @napi-rs/canvas. Text is drawn with
 * a top baseline so a line's y is the top of its glyph box.
 */

import { existsSync } from 'node:fs';
import { createCanvas, GlobalFonts, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { DrawSurface, FontSpec, FrameBuffer, RGBColor, TextMeasurer } from '../types/index.js';

const log = createSubsystemLogger('display/canvas');

export function toCssColor(color: RGBColor): string {
  return `rgb(${color.r}, ${color.g}, ${color.b})`;
}

export function toCssFont(font: FontSpec): string {
  return `${font.bold ? 'bold ' : ''}${font.sizePx}px "${font.family}"`;
}

/**
 * Registers a font file under its family name; returns false when the
 * system font of that family will be used instead.
 */
export function registerFont(font: FontSpec): boolean {
  if (!font.path) {
    return false;
  }
  if (!existsSync(font.path)) {
    log.warn('Font file not found, using system font', { path: font.path, family: font.family });
    return false;
  }

  const registered = GlobalFonts.registerFromPath(font.path, font.family);
  if (!registered) {
    log.warn('Font file could not be registered, using system font', { path: font.path });
  }
  return registered;
}

export class CanvasSurface implements DrawSurface, TextMeasurer {
  readonly width: number;
  readonly height: number;
  private canvas: Canvas;
  private ctx: SKRSContext2D;
  private activeFont?: string;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.canvas = createCanvas(width, height);
    this.ctx = this.canvas.getContext('2d');
    this.ctx.textBaseline = 'top';
  }

  measureWidth(text: string, font: FontSpec): number {
    this.useFont(font);
    return Math.ceil(this.ctx.measureText(text).width);
  }

  clear(color: RGBColor): void {
    this.ctx.fillStyle = toCssColor(color);
    this.ctx.fillRect(0, 0, this.width, this.height);
  }

  drawText(x: number, y: number, text: string, font: FontSpec, color: RGBColor): void {
    this.useFont(font);
    this.ctx.fillStyle = toCssColor(color);
    this.ctx.fillText(text, x, y);
  }

  frame(): FrameBuffer {
    const image = this.ctx.getImageData(0, 0, this.width, this.height);
    return { width: image.width, height: image.height, data: image.data };
  }

  private useFont(font: FontSpec): void {
    const css = toCssFont(font);
    if (css !== this.activeFont) {
      this.ctx.font = css;
      this.activeFont = css;
    }
  }
}
