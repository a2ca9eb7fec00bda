/**
 * DisplayConfiguration Interface
 *
 * Panel geometry, font, layout, sampling cadence and sensor paths.
 */

import type { FontSpec, RGBColor } from './collaborators.js';

export interface DisplayConfiguration {
  /** Panel configuration */
  display: {
    /** Viewport width in pixels */
    width: number;
    /** Viewport height in pixels */
    height: number;
    /** Framebuffer device path, or 'none' to discard frames */
    device: string;
  };

  font: FontSpec;

  /** Text layout configuration */
  layout: {
    /** Extra pixels between consecutive lines */
    linePadding: number;
    /** Horizontal scroll speed for overflowing lines */
    scrollSpeedPxPerSec: number;
    background: RGBColor;
    foreground: RGBColor;
  };

  /** Sampler configuration */
  sampler: {
    /** Target period between sampling passes in milliseconds */
    intervalMs: number;
    /** Window over which CPU load is measured in milliseconds */
    cpuSampleMs: number;
    /** Upper bound on the local address lookup in milliseconds */
    ipLookupTimeoutMs: number;
    /** Address the route-lookup socket is pointed at (no packets are sent) */
    probeHost: string;
    probePort: number;
  };

  /** Thermal zone files, values in millidegrees Celsius */
  thermalZones: {
    cpu: string;
    hotspot: string;
  };
}
