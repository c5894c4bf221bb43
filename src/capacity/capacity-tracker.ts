// src/capacity/capacity-tracker.ts

import { NetworkModel } from '../network/network-model';
import { Segment } from '../network/interfaces/network.interface';
import { Itinerary } from '../route-planner/interfaces/itinerary.interface';
import { CrowdingPenaltyCurve } from './crowding-penalty';

export interface StationLoadSnapshot {
  stationId: string;
  load: number;
  capacity: number;
  ratio: number;
  penalty: number;
}

/**
 * Load estimates per station and per trip segment.
 *
 * Every counter is independent: a reservation touches several counters but
 * there is no cross-counter transaction. Station counters start from the
 * network's baseline load; trip-segment counters start at 0.
 *
 * Not a singleton: create one per query, per test, or one shared live
 * tracker per network version.
 */
export class CapacityTracker {
  private readonly stationReserved = new Map<string, number>();
  private readonly segmentReserved = new Map<string, number>();
  private readonly segmentsById = new Map<string, Segment>();

  constructor(
    readonly network: NetworkModel,
    readonly curve: CrowdingPenaltyCurve
  ) {
    for (const segment of network.segments()) {
      this.segmentsById.set(segment.id, segment);
    }
  }

  /** Estimated load at a station */
  estimatedLoad(stationId: string): number;
  /** Estimated load of one trip on one of its segments */
  estimatedLoad(tripId: string, segmentId: string): number;
  estimatedLoad(id: string, segmentId?: string): number {
    if (segmentId !== undefined) {
      return this.segmentReserved.get(this.segmentKey(id, segmentId)) ?? 0;
    }
    const station = this.network.requireStation(id);
    return station.currentLoad + (this.stationReserved.get(id) ?? 0);
  }

  stationPenalty(stationId: string): number {
    const station = this.network.requireStation(stationId);
    return this.curve.penaltyFor(this.estimatedLoad(stationId), station.capacity);
  }

  segmentPenalty(tripId: string, segmentId: string): number {
    const segment = this.segmentsById.get(segmentId);
    if (!segment) {
      return 0;
    }
    return this.curve.penaltyFor(this.estimatedLoad(tripId, segmentId), segment.vehicleCapacity);
  }

  /**
   * Optimistically add `passengers` along every ride leg of the itinerary.
   */
  reserve(itinerary: Itinerary, passengers = 1): void {
    this.apply(itinerary, Math.abs(passengers));
  }

  /**
   * Undo a reservation. Counters never drop below zero.
   */
  release(itinerary: Itinerary, passengers = 1): void {
    this.apply(itinerary, -Math.abs(passengers));
  }

  /**
   * True when no station or trip segment on the itinerary is over capacity.
   */
  isFeasible(itinerary: Itinerary): boolean {
    const { stationIds, segmentKeys } = this.touched(itinerary);
    for (const stationId of stationIds) {
      const station = this.network.requireStation(stationId);
      if (this.estimatedLoad(stationId) > station.capacity) {
        return false;
      }
    }
    for (const [tripId, segmentId] of segmentKeys) {
      const segment = this.segmentsById.get(segmentId);
      if (segment && this.estimatedLoad(tripId, segmentId) > segment.vehicleCapacity) {
        return false;
      }
    }
    return true;
  }

  snapshot(): StationLoadSnapshot[] {
    return this.network.stations().map((station) => {
      const load = this.estimatedLoad(station.id);
      return {
        stationId: station.id,
        load,
        capacity: station.capacity,
        ratio: station.capacity > 0 ? load / station.capacity : load > 0 ? Number.POSITIVE_INFINITY : 0,
        penalty: this.curve.penaltyFor(load, station.capacity),
      };
    });
  }

  private apply(itinerary: Itinerary, delta: number): void {
    const { stationIds, segmentKeys } = this.touched(itinerary);
    for (const stationId of stationIds) {
      this.network.requireStation(stationId);
      CapacityTracker.bump(this.stationReserved, stationId, delta);
    }
    for (const [tripId, segmentId] of segmentKeys) {
      CapacityTracker.bump(this.segmentReserved, this.segmentKey(tripId, segmentId), delta);
    }
  }

  private touched(itinerary: Itinerary): { stationIds: Set<string>; segmentKeys: Array<[string, string]> } {
    const stationIds = new Set<string>();
    const segmentKeys: Array<[string, string]> = [];
    for (const leg of itinerary.legs) {
      if (leg.kind !== 'RIDE') {
        continue;
      }
      leg.stationIds.forEach((id) => stationIds.add(id));
      for (const segmentId of leg.segmentIds) {
        segmentKeys.push([leg.tripId, segmentId]);
      }
    }
    return { stationIds, segmentKeys };
  }

  private segmentKey(tripId: string, segmentId: string): string {
    return `${tripId}\u0000${segmentId}`;
  }

  private static bump(counters: Map<string, number>, key: string, delta: number): void {
    const next = Math.max(0, (counters.get(key) ?? 0) + delta);
    if (next === 0) {
      counters.delete(key);
    } else {
      counters.set(key, next);
    }
  }
}
