/**
 * Property-Based Tests for the scroll layout
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { computeLineX, scrollPeriod } from './scroll-layout.js';
import { elapsedMsArbitrary, propertyTestConfig, viewportWidthArbitrary } from '../test-setup.js';

describe('Scroll Layout Property-Based Tests', () => {
  it('should center fitting lines independently of time', () => {
    fc.assert(
      fc.property(
        viewportWidthArbitrary.chain(viewport =>
          fc.tuple(fc.constant(viewport), fc.integer({ min: 0, max: viewport }))
        ),
        elapsedMsArbitrary,
        elapsedMsArbitrary,
        ([viewport, width], t1, t2) => {
          const expected = Math.floor((viewport - width) / 2);
          expect(computeLineX(width, viewport, t1)).toBe(expected);
          expect(computeLineX(width, viewport, t2)).toBe(expected);
        }
      ),
      propertyTestConfig
    );
  });

  it('should repeat the position of overflowing lines every period', () => {
    fc.assert(
      fc.property(
        viewportWidthArbitrary,
        fc.integer({ min: 1, max: 4000 }),
        elapsedMsArbitrary,
        (viewport, overflow, elapsedMs) => {
          const width = viewport + overflow;
          // At 10 px/s one pixel takes 100ms
          const periodMs = scrollPeriod(width, viewport) * 100;

          expect(computeLineX(width, viewport, elapsedMs + periodMs))
            .toBe(computeLineX(width, viewport, elapsedMs));
        }
      ),
      propertyTestConfig
    );
  });

  it('should keep overflowing lines within one period left of the origin', () => {
    fc.assert(
      fc.property(
        viewportWidthArbitrary,
        fc.integer({ min: 1, max: 4000 }),
        elapsedMsArbitrary,
        (viewport, overflow, elapsedMs) => {
          const width = viewport + overflow;
          const x = computeLineX(width, viewport, elapsedMs);

          expect(x).toBeLessThanOrEqual(0);
          expect(x).toBeGreaterThan(-scrollPeriod(width, viewport));
        }
      ),
      propertyTestConfig
    );
  });
});
