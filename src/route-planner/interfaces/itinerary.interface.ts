// src/route-planner/interfaces/itinerary.interface.ts

import { TransportMode } from '../../network/interfaces/network.interface';

/**
 * One uninterrupted ride on a single trip.
 */
export interface RideLeg {
  kind: 'RIDE';
  fromStationId: string;
  toStationId: string;
  lineId: string;
  mode: TransportMode;
  tripId: string;
  /** Stop index of the boarding station on the trip */
  boardStopIndex: number;
  /** Stop index of the alighting station on the trip */
  alightStopIndex: number;
  /** Stations passed, boarding and alighting included */
  stationIds: string[];
  /** Segment ids ridden, in order */
  segmentIds: string[];
  departureMin: number;
  arrivalMin: number;
}

/**
 * Walking/waiting change between two lines at one station.
 */
export interface TransferLeg {
  kind: 'TRANSFER';
  fromStationId: string;
  toStationId: string;
  fromLineId: string;
  toLineId: string;
  departureMin: number;
  arrivalMin: number;
}

export type Leg = RideLeg | TransferLeg;

/**
 * Planned journey returned to the caller. Immutable once produced.
 */
export interface Itinerary {
  originId: string;
  destinationId: string;
  /** Earliest allowed departure of the query */
  departAfterMin: number;
  legs: Leg[];
  /** Departure of the first ride (departAfter for a zero-leg itinerary) */
  departureMin: number;
  arrivalMin: number;
  /** arrival − departAfter, waiting at the origin included */
  totalDurationMin: number;
  inVehicleMin: number;
  /** Time spent neither riding nor in a transfer leg */
  waitMin: number;
  transferCount: number;
  /** Crowding penalty accrued per station id */
  crowdingPenalties: Record<string, number>;
  totalCrowdingPenalty: number;
  /** Accumulated cost under the query's cost function */
  cost: number;
  /** True when the search stopped before exhausting its queue */
  truncated: boolean;
}

export interface PlanRouteResult {
  itineraries: Itinerary[];
  /** Deadline or expansion cap hit before the search completed */
  truncated: boolean;
  /** Queue emptied before K itineraries were found */
  exhausted: boolean;
  expandedLabels: number;
  networkVersion: number;
  scheduleVersion: number;
}
