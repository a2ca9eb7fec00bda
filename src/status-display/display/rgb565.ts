/**
 * RGBA to RGB565 conversion for 16-bit panels.
 */

import type { FrameBuffer } from '../types/index.js';

export function packRGB565(r: number, g: number, b: number): number {
  return ((r & 0xf8) << 8) | ((g & 0xfc) << 3) | (b >> 3);
}

/**
 * Converts an RGBA frame into RGB565 pixels, little-endian unless told otherwise
 */
export function frameToRGB565(frame: FrameBuffer, target?: Buffer, bigEndian = false): Buffer {
  const pixelCount = frame.width * frame.height;
  const out = target && target.length >= pixelCount * 2 ? target : Buffer.alloc(pixelCount * 2);

  for (let pixel = 0; pixel < pixelCount; pixel++) {
    const src = pixel * 4;
    const value = packRGB565(frame.data[src] ?? 0, frame.data[src + 1] ?? 0, frame.data[src + 2] ?? 0);
    if (bigEndian) {
      out.writeUInt16BE(value, pixel * 2);
    } else {
      out.writeUInt16LE(value, pixel * 2);
    }
  }

  return out;
}
