/**
 * Framebuffer Transport
 *
 * Pushes finished frames to a Linux framebuffer device such as the /dev/fb1
 * node a panel driver exposes. Frames are converted to RGB565 and written as a
 * whole at offset 0.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import { DisplayTransportError } from '../errors.js';
import type { DisplayTransport, FrameBuffer } from '../types/index.js';
import { frameToRGB565 } from './rgb565.js';

const log = createSubsystemLogger('display/framebuffer');

export class FramebufferTransport implements DisplayTransport {
  readonly device: string;
  private handle?: FileHandle;
  private pixels?: Buffer;
  private framesWritten = 0;

  constructor(device: string) {
    this.device = device;
  }

  async submit(frame: FrameBuffer): Promise<void> {
    const handle = await this.ensureOpen();
    this.pixels = frameToRGB565(frame, this.pixels);
    const length = frame.width * frame.height * 2;

    try {
      await handle.write(this.pixels, 0, length, 0);
    } catch (error) {
      throw new DisplayTransportError(this.device, `Failed to write frame: ${describeError(error)}`, { cause: error });
    }
    this.framesWritten++;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }

    this.handle = undefined;
    await handle.close();
    log.info('Framebuffer closed', { device: this.device, framesWritten: this.framesWritten });
  }

  getFramesWritten(): number {
    return this.framesWritten;
  }

  private async ensureOpen(): Promise<FileHandle> {
    if (this.handle) {
      return this.handle;
    }

    try {
      this.handle = await open(this.device, 'r+');
    } catch (error) {
      throw new DisplayTransportError(this.device, `Failed to open framebuffer: ${describeError(error)}`, { cause: error });
    }
    log.info('Framebuffer opened', { device: this.device });
    return this.handle;
  }
}

/**
 * Discards frames; used for headless runs
 */
export class NullTransport implements DisplayTransport {
  private framesDiscarded = 0;

  async submit(_frame: FrameBuffer): Promise<void> {
    this.framesDiscarded++;
  }

  async close(): Promise<void> {
    log.info('Null transport closed', { framesDiscarded: this.framesDiscarded });
  }

  getFramesDiscarded(): number {
    return this.framesDiscarded;
  }
}
