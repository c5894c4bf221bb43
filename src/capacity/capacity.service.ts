// src/capacity/capacity.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { transitConfig, TransitConfig } from '../config/transit.config';
import { NetworkModel } from '../network/network-model';
import { CapacityTracker } from './capacity-tracker';
import { CrowdingPenaltyCurve } from './crowding-penalty';

/**
 * Creates capacity trackers bound to the configured crowding curve.
 */
@Injectable()
export class CapacityService {
  readonly curve: CrowdingPenaltyCurve;

  constructor(@Inject(transitConfig.KEY) config: TransitConfig) {
    this.curve = new CrowdingPenaltyCurve(config.crowding);
  }

  createTracker(network: NetworkModel): CapacityTracker {
    return new CapacityTracker(network, this.curve);
  }
}
