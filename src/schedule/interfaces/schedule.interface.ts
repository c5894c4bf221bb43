// src/schedule/interfaces/schedule.interface.ts

import { ScheduleError } from '../../common/errors/transit-errors';

/**
 * Scheduled call of a trip at one station (minutes of the service day)
 */
export interface StopTime {
  stationId: string;
  arrivalMin: number;
  departureMin: number;
}

/**
 * One service instance of a line
 */
export interface Trip {
  id: string;
  lineId: string;
  stops: StopTime[];
}

/**
 * Trip as supplied by ingestion: times as `HH:mm` strings or minutes.
 * A stop with only one of arrival/departure uses it for both.
 */
export interface TripInput {
  id: string;
  lineId: string;
  stops: Array<{
    stationId: string;
    arrival?: string | number;
    departure?: string | number;
  }>;
}

export interface Departure {
  kind: 'DEPARTURE';
  trip: Trip;
  /** Index of the boarding stop within `trip.stops` */
  stopIndex: number;
  departureMin: number;
}

export interface NoMoreService {
  kind: 'NO_MORE_SERVICE';
}

/**
 * Returned by `nextDeparture` when the service day has no later departure.
 */
export const NO_MORE_SERVICE: NoMoreService = Object.freeze({ kind: 'NO_MORE_SERVICE' as const });

export type DepartureLookup = Departure | NoMoreService;

export type TimetableLoadMode = 'strict' | 'lenient';

export interface TimetableLoadOptions {
  /** strict: all-or-nothing; lenient: bad trips are dropped one by one */
  mode?: TimetableLoadMode;
}

export interface RejectedTrip {
  tripId: string;
  error: ScheduleError;
}

export interface TimetableLoadReport<I> {
  index: I;
  published: string[];
  rejected: RejectedTrip[];
}

/**
 * Regular-interval service definition
 */
export interface HeadwayServiceInput {
  lineId: string;
  /** `HH:mm`, default 05:00 */
  firstDeparture?: string;
  /** `HH:mm`, default 23:00, inclusive */
  lastDeparture?: string;
  /** Minutes between departures, default 15 */
  headwayMin?: number;
  /** Minutes spent at each intermediate stop, default 0 */
  dwellMin?: number;
}
