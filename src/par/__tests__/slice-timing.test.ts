import { computeSliceTiming, interleavedAcquisitionOrder } from '../slice-timing';

describe('interleavedAcquisitionOrder', () => {
  it('should acquire odd positions first, then even ones', () => {
    expect(interleavedAcquisitionOrder(6)).toEqual([0, 2, 4, 1, 3, 5]);
    expect(interleavedAcquisitionOrder(5)).toEqual([0, 2, 4, 1, 3]);
    expect(interleavedAcquisitionOrder(1)).toEqual([0]);
  });
});

describe('computeSliceTiming', () => {
  it('should time four slices as [0, TR/2, TR/4, 3TR/4]', () => {
    expect(computeSliceTiming(2, 4)).toEqual([0, 1, 0.5, 1.5]);
  });

  it('should index timing by physical slice', () => {
    // Slice 1 is acquired fourth: 3 * (3.0 / 6)
    expect(computeSliceTiming(3, 6)).toEqual([0, 1.5, 0.5, 2, 1, 2.5]);
  });

  it('should round to six decimals', () => {
    expect(computeSliceTiming(1, 3)).toEqual([0, 0.666667, 0.333333]);
  });

  it('should produce n distinct multiples of TR/n in [0, TR)', () => {
    for (const n of [1, 2, 7, 32, 45]) {
      const tr = 2.5;
      const timing = computeSliceTiming(tr, n);

      expect(timing).toHaveLength(n);
      expect(Math.min(...timing)).toBe(0);
      expect(new Set(timing).size).toBe(n);
      for (const t of timing) {
        expect(t).toBeGreaterThanOrEqual(0);
        expect(t).toBeLessThan(tr);
        const steps = t / (tr / n);
        expect(Math.abs(steps - Math.round(steps))).toBeLessThan(1e-4);
      }
    }
  });

  it('should reject a non-positive or fractional slice count', () => {
    expect(() => computeSliceTiming(2, 0)).toThrow(RangeError);
    expect(() => computeSliceTiming(2, 2.5)).toThrow(RangeError);
  });
});
