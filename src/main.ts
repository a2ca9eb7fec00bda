#!/usr/bin/env node
/**
 * Entry point: loads configuration from the environment, opens the panel and
 * runs until SIGINT/SIGTERM.
 */

import { createSubsystemLogger, describeError } from './logging/subsystem.js';
import {
  loadDisplayConfiguration,
  validateDisplayConfiguration,
} from './status-display/hardware/configuration.js';
import { ConfigurationError } from './status-display/errors.js';
import { LinuxMetricSource } from './status-display/metric-sources/metric-sources.js';
import { CanvasSurface, registerFont } from './status-display/display/canvas-surface.js';
import { FramebufferTransport, NullTransport } from './status-display/display/framebuffer-transport.js';
import { StatusDisplay } from './status-display/status-display.js';
import type { DisplayTransport } from './status-display/types/index.js';

const log = createSubsystemLogger('main');

async function main(): Promise<void> {
  const problems: string[] = [];
  const config = loadDisplayConfiguration(process.env, problems);
  problems.push(...validateDisplayConfiguration(config));
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  registerFont(config.font);
  const surface = new CanvasSurface(config.display.width, config.display.height);
  const transport: DisplayTransport = config.display.device === 'none'
    ? new NullTransport()
    : new FramebufferTransport(config.display.device);

  const display = new StatusDisplay(config, {
    source: new LinuxMetricSource(config.sampler),
    measurer: surface,
    surface,
    transport,
  });

  display.on('fatal', () => {
    process.exitCode = 1;
    transport.close().catch((error: unknown) => {
      log.warn('Failed to close transport', { error: describeError(error) });
    });
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info('Shutting down', { signal });
    display.stop().catch((error: unknown) => {
      log.error('Shutdown failed', { error: describeError(error) });
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  log.info('Starting status display', {
    width: config.display.width,
    height: config.display.height,
    device: config.display.device,
    intervalMs: config.sampler.intervalMs,
  });
  display.start();
}

main().catch((error: unknown) => {
  log.error('Status display failed to start', { error: describeError(error) });
  process.exitCode = 1;
});
