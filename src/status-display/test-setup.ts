/**
 * Property-Based Testing Setup for the status display
 *
 * Shared fast-check generators and helpers.
 */

import * as fc from 'fast-check';
import type { MetricId, MetricLine, MetricSource, Snapshot } from './types/index.js';

export const metricIdArbitrary: fc.Arbitrary<MetricId> = fc.constantFrom(
  'ipv4', 'mac', 'datetime', 'temperature', 'cpuLoad', 'memory'
);

export const metricLineArbitrary: fc.Arbitrary<MetricLine> = fc.record({
  metric: metricIdArbitrary,
  text: fc.string({ maxLength: 60 }),
  available: fc.boolean(),
});

export const snapshotArbitrary: fc.Arbitrary<Snapshot> = fc.record({
  lines: fc.array(metricLineArbitrary, { maxLength: 8 }),
  sampledAt: fc.option(fc.date({ min: new Date(0), max: new Date(4102444800000), noInvalidDate: true }), { nil: null }),
});

// Panel widths seen on small SPI displays
export const viewportWidthArbitrary = fc.integer({ min: 1, max: 800 });

export const elapsedMsArbitrary = fc.integer({ min: 0, max: 24 * 60 * 60 * 1000 });

export const propertyTestConfig = {
  numRuns: 100,
};

/**
 * Metric source whose readings can be replaced per test
 */
export function createFakeMetricSource(overrides: Partial<MetricSource> = {}): MetricSource {
  return {
    readThermalZone: async (path: string) => (path.includes('zone0') ? 47.9 : 51.5),
    cpuLoadPercent: async () => 12.34,
    memoryUsage: async () => ({ usedBytes: 1536 * 1024 * 1024, totalBytes: 8192 * 1024 * 1024 }),
    localIPv4: async () => '192.168.1.50',
    hardwareMACAddress: async () => 'AA:BB:CC:DD:EE:01',
    ...overrides,
  };
}
