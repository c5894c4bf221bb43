// src/route-planner/interfaces/route-search.interface.ts

import { CapacityTracker } from '../../capacity/capacity-tracker';
import { NetworkModel } from '../../network/network-model';
import { TransportMode } from '../../network/interfaces/network.interface';
import { CostFunction } from '../../preferences/cost-function';
import { ScheduleIndex } from '../../schedule/schedule-index';

/**
 * Everything one query reads. Network and schedule are frozen versions;
 * the tracker is the query's own (or a shared live one).
 */
export interface SearchContext {
  network: NetworkModel;
  schedule: ScheduleIndex;
  tracker: CapacityTracker;
  costFunction: CostFunction;
  transfer: {
    sameModeMin: number;
    crossModeMin: number;
  };
}

export interface SearchQuery {
  originId: string;
  destinationId: string;
  departAfterMin: number;
  k: number;
  /** Absolute deadline in `now()` milliseconds */
  deadlineMs: number;
}

export interface SearchLimits {
  maxLabelsPerStation: number;
  maxExpansions: number;
  yieldEvery: number;
  /** Clock in milliseconds; injectable for tests */
  now: () => number;
}

export interface RideEdge {
  kind: 'RIDE';
  tripId: string;
  lineId: string;
  mode: TransportMode;
  fromStopIndex: number;
  toStopIndex: number;
  fromStationId: string;
  toStationId: string;
  segmentId: string;
  departureMin: number;
  arrivalMin: number;
  stationPenalty: number;
  segmentPenalty: number;
}

export interface TransferEdge {
  kind: 'TRANSFER';
  stationId: string;
  fromLineId: string;
  toLineId: string;
  departureMin: number;
  arrivalMin: number;
}

export type SearchEdge = RideEdge | TransferEdge;

/**
 * Search state: a station at a time, associated with the line the traveller
 * is on (null at the origin before boarding).
 */
export interface Label {
  /** Creation order; last tie-break */
  id: number;
  stationId: string;
  timeMin: number;
  lineId: string | null;
  cost: number;
  transfers: number;
  crowding: number;
  /** Stations and trip segments reached above capacity */
  overCapacity: number;
  parent: Label | null;
  edge: SearchEdge | null;
  /** Set when a later label dominated this one after it was queued */
  dead: boolean;
}
