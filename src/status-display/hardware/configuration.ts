/**
 * Display Configuration
 *
 * Defaults for a 320x170 ST7789 panel on an RK3588 board, environment
 * overrides, and validation.
 */

import type { DisplayConfiguration } from '../types/index.js';

export const ENV_PREFIX = 'STATUS_DISPLAY_';

/**
 * Creates the default configuration
 */
export function createDefaultDisplayConfiguration(): DisplayConfiguration {
  return {
    display: {
      width: 320,
      height: 170,
      device: '/dev/fb1',
    },
    font: {
      family: 'DejaVu Sans',
      path: '/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf',
      sizePx: 22,
      bold: true,
    },
    layout: {
      linePadding: 2,
      scrollSpeedPxPerSec: 10,
      background: { r: 0, g: 0, b: 0 },
      foreground: { r: 255, g: 255, b: 255 },
    },
    sampler: {
      intervalMs: 1000,
      cpuSampleMs: 250,
      ipLookupTimeoutMs: 1000,
      probeHost: '8.8.8.8',
      probePort: 80,
    },
    thermalZones: {
      cpu: '/sys/class/thermal/thermal_zone0/temp',
      hotspot: '/sys/class/thermal/thermal_zone1/temp',
    },
  };
}

function readInteger(env: NodeJS.ProcessEnv, key: string, fallback: number, problems: string[]): number {
  const raw = env[`${ENV_PREFIX}${key}`];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    problems.push(`${ENV_PREFIX}${key} must be an integer, got "${raw}"`);
    return fallback;
  }
  return value;
}

function readString(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const raw = env[`${ENV_PREFIX}${key}`]?.trim();
  return raw ? raw : fallback;
}

/**
 * Builds a configuration from the defaults and STATUS_DISPLAY_* variables.
 * Unparsable values are reported through `problems` and left at their default.
 */
export function loadDisplayConfiguration(
  env: NodeJS.ProcessEnv = process.env,
  problems: string[] = [],
): DisplayConfiguration {
  const defaults = createDefaultDisplayConfiguration();
  const fontPath = env[`${ENV_PREFIX}FONT_PATH`]?.trim();

  return {
    display: {
      width: readInteger(env, 'WIDTH', defaults.display.width, problems),
      height: readInteger(env, 'HEIGHT', defaults.display.height, problems),
      device: readString(env, 'DEVICE', defaults.display.device),
    },
    font: {
      ...defaults.font,
      family: readString(env, 'FONT_FAMILY', defaults.font.family),
      path: fontPath === undefined ? defaults.font.path : fontPath || undefined,
      sizePx: readInteger(env, 'FONT_SIZE', defaults.font.sizePx, problems),
    },
    layout: {
      ...defaults.layout,
      linePadding: readInteger(env, 'LINE_PADDING', defaults.layout.linePadding, problems),
      scrollSpeedPxPerSec: readInteger(env, 'SCROLL_SPEED', defaults.layout.scrollSpeedPxPerSec, problems),
    },
    sampler: {
      ...defaults.sampler,
      intervalMs: readInteger(env, 'SAMPLE_INTERVAL_MS', defaults.sampler.intervalMs, problems),
      cpuSampleMs: readInteger(env, 'CPU_SAMPLE_MS', defaults.sampler.cpuSampleMs, problems),
      ipLookupTimeoutMs: readInteger(env, 'IP_LOOKUP_TIMEOUT_MS', defaults.sampler.ipLookupTimeoutMs, problems),
      probeHost: readString(env, 'PROBE_HOST', defaults.sampler.probeHost),
      probePort: readInteger(env, 'PROBE_PORT', defaults.sampler.probePort, problems),
    },
    thermalZones: {
      cpu: readString(env, 'CPU_THERMAL_ZONE', defaults.thermalZones.cpu),
      hotspot: readString(env, 'HOTSPOT_THERMAL_ZONE', defaults.thermalZones.hotspot),
    },
  };
}

/**
 * Validates a configuration; returns the list of problems found
 */
export function validateDisplayConfiguration(config: DisplayConfiguration): string[] {
  const errors: string[] = [];

  if (config.display.width <= 0 || config.display.height <= 0) {
    errors.push('Display dimensions must be positive');
  }

  if (config.font.sizePx <= 0) {
    errors.push('Font size must be positive');
  }

  if (config.layout.linePadding < 0) {
    errors.push('Line padding cannot be negative');
  }

  if (config.layout.scrollSpeedPxPerSec <= 0) {
    errors.push('Scroll speed must be positive');
  }

  if (config.sampler.intervalMs <= 0) {
    errors.push('Sampling interval must be positive');
  }

  if (config.sampler.cpuSampleMs <= 0 || config.sampler.cpuSampleMs >= config.sampler.intervalMs) {
    errors.push('CPU sampling window must be positive and shorter than the sampling interval');
  }

  if (config.sampler.ipLookupTimeoutMs <= 0) {
    errors.push('Address lookup timeout must be positive');
  }

  if (config.sampler.probePort < 1 || config.sampler.probePort > 65535) {
    errors.push('Probe port must be between 1 and 65535');
  }

  const colors = [config.layout.background, config.layout.foreground];
  const validChannel = (value: number): boolean => Number.isInteger(value) && value >= 0 && value <= 255;
  if (!colors.every(color => validChannel(color.r) && validChannel(color.g) && validChannel(color.b))) {
    errors.push('Colors must use integer channels between 0 and 255');
  }

  return errors;
}
