// src/preferences/cost-function.ts

import { TransportMode } from '../network/interfaces/network.interface';
import { LegCostInput, NormalizedWeights } from './interfaces/preference.interface';

/**
 * Scalar edge cost built from normalized preference weights.
 *
 *   cost = wTime * (wait + duration * modeFactor)
 *        + wTransfers * transferUnitCost * [transfer]
 *        + wCrowding * crowdingPenalty
 *
 * The search only ever calls `legCost`, so it stays independent of how the
 * weights were chosen.
 */
export class CostFunction {
  constructor(
    readonly weights: Readonly<NormalizedWeights>,
    readonly modeFactors: Readonly<Record<TransportMode, number>>,
    readonly transferUnitCost: number
  ) {}

  legCost(leg: LegCostInput): number {
    const factor = leg.mode ? this.modeFactors[leg.mode] : 1;
    const timeTerm = (leg.waitMin ?? 0) + leg.durationMin * factor;
    return (
      this.weights.minimizeTime * timeTerm +
      this.weights.minimizeTransfers * this.transferUnitCost * (leg.isTransfer ? 1 : 0) +
      this.weights.avoidCrowding * leg.crowdingPenalty
    );
  }

  describe(): string {
    const w = this.weights;
    return `time=${w.minimizeTime.toFixed(3)} transfers=${w.minimizeTransfers.toFixed(3)} crowding=${w.avoidCrowding.toFixed(3)}`;
  }
}
