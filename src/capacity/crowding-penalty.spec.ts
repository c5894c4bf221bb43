// src/capacity/crowding-penalty.spec.ts
import { CrowdingPenaltyCurve } from './crowding-penalty';

describe('CrowdingPenaltyCurve', () => {
  const curve = new CrowdingPenaltyCurve({ threshold: 0.7, exponent: 2, maxPenalty: 100 });

  it('should be zero up to the threshold', () => {
    expect(curve.penalty(0)).toBe(0);
    expect(curve.penalty(0.5)).toBe(0);
    expect(curve.penalty(0.69)).toBe(0);
    expect(curve.penalty(Number.NaN)).toBe(0);
  });

  it('should grow quadratically between the threshold and full load', () => {
    expect(curve.penalty(0.85)).toBeCloseTo(25, 6);
    expect(curve.penalty(0.95)).toBeCloseTo(69.4444, 4);
  });

  it('should hold the maximum at and above full load', () => {
    expect(curve.penalty(1)).toBe(100);
    expect(curve.penalty(1.5)).toBe(100);
  });

  it('should never decrease as the ratio grows', () => {
    let previous = 0;
    for (let ratio = 0; ratio <= 1.2; ratio += 0.01) {
      const value = curve.penalty(ratio);
      expect(value).toBeGreaterThanOrEqual(previous);
      previous = value;
    }
  });

  it('should treat a zero capacity as full once anyone is there', () => {
    expect(curve.penaltyFor(0, 0)).toBe(0);
    expect(curve.penaltyFor(1, 0)).toBe(100);
    expect(curve.penaltyFor(95, 100)).toBeCloseTo(69.4444, 4);
  });

  it('should follow the configured exponent', () => {
    const linear = new CrowdingPenaltyCurve({ threshold: 0.5, exponent: 1, maxPenalty: 10 });

    expect(linear.penalty(0.75)).toBeCloseTo(5, 6);
  });
});
