// src/capacity/crowding-penalty.ts

export interface CrowdingCurveOptions {
  /** Load ratio below which the penalty is 0 */
  threshold: number;
  /** Convexity; 2 = quadratic */
  exponent: number;
  /** Value at 100 % load, and the clamp above it */
  maxPenalty: number;
}

/**
 * Soft capacity penalty as a function of load ratio.
 *
 * 0 below the threshold, then ((r - threshold) / (1 - threshold))^exponent
 * scaled to `maxPenalty` at r = 1, and held at `maxPenalty` above that.
 */
export class CrowdingPenaltyCurve {
  constructor(readonly options: CrowdingCurveOptions) {}

  penalty(ratio: number): number {
    const { threshold, exponent, maxPenalty } = this.options;
    if (Number.isNaN(ratio) || ratio < threshold) {
      return 0;
    }
    if (ratio >= 1) {
      return maxPenalty;
    }
    return maxPenalty * Math.pow((ratio - threshold) / (1 - threshold), exponent);
  }

  /**
   * Penalty for a load against a capacity. A zero capacity counts as full as
   * soon as anyone is there.
   */
  penaltyFor(load: number, capacity: number): number {
    if (capacity <= 0) {
      return load > 0 ? this.options.maxPenalty : 0;
    }
    return this.penalty(load / capacity);
  }
}
