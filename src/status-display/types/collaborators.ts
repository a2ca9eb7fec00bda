/**
 * Collaborator Contracts
 *
 * Interfaces the core calls into: metric sources, text measurement,
 * the draw surface and the display transport.
 */

export interface MemoryUsage {
  usedBytes: number;
  totalBytes: number;
}

export interface MetricSource {
  /** Degrees Celsius, or undefined when the zone file is missing or unparsable */
  readThermalZone(path: string): Promise<number | undefined>;
  /** Busy share of all CPUs over a short sampling window (0-100) */
  cpuLoadPercent(): Promise<number>;
  memoryUsage(): Promise<MemoryUsage>;
  localIPv4(): Promise<string>;
  hardwareMACAddress(): Promise<string>;
}

export interface RGBColor {
  r: number;
  g: number;
  b: number;
}

export interface FontSpec {
  /** Family name the font file is registered under */
  family: string;
  /** Path to a TrueType/OpenType file; the system font of `family` is used when absent */
  path?: string;
  sizePx: number;
  bold: boolean;
}

export interface FrameBuffer {
  width: number;
  height: number;
  /** RGBA, 4 bytes per pixel, row-major */
  data: Uint8ClampedArray;
}

export interface TextMeasurer {
  measureWidth(text: string, font: FontSpec): number;
}

export interface DrawSurface {
  readonly width: number;
  readonly height: number;
  clear(color: RGBColor): void;
  drawText(x: number, y: number, text: string, font: FontSpec, color: RGBColor): void;
  frame(): FrameBuffer;
}

export interface DisplayTransport {
  submit(frame: FrameBuffer): Promise<void>;
  close(): Promise<void>;
}
