/**
 * Error types raised by collaborators and recovered (or not) by the core.
 */

import type { MetricId } from './types/index.js';

export class MetricUnavailableError extends Error {
  readonly metric: MetricId;

  constructor(metric: MetricId, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MetricUnavailableError';
    this.metric = metric;
  }
}

export class NetworkUnavailableError extends MetricUnavailableError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ipv4', message, options);
    this.name = 'NetworkUnavailableError';
  }
}

export class DisplayTransportError extends Error {
  readonly device: string;

  constructor(device: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DisplayTransportError';
    this.device = device;
  }
}

export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid display configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}
