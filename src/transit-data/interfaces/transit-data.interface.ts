// src/transit-data/interfaces/transit-data.interface.ts

import { CapacityTracker } from '../../capacity/capacity-tracker';
import { HeadwayServiceInput, TimetableLoadMode, TripInput } from '../../schedule/interfaces/schedule.interface';
import { LineInput, SegmentInput, StationInput } from '../../network/interfaces/network.interface';
import { NetworkModel } from '../../network/network-model';
import { ScheduleIndex } from '../../schedule/schedule-index';

/**
 * Data one query reads. Both models are frozen, so a query keeps using the
 * version it started with while newer versions are published.
 */
export interface TransitDataVersion {
  network: NetworkModel;
  schedule: ScheduleIndex;
  /** Live load estimates, shared by every query on this network version */
  tracker: CapacityTracker;
}

/**
 * Network file / request body carrying topology and, optionally, service.
 */
export interface NetworkDocument {
  stations: StationInput[];
  lines: LineInput[];
  segments?: SegmentInput[];
  trips?: TripInput[];
  /** Regular-interval service generated from line travel times */
  services?: HeadwayServiceInput[];
  timetableMode?: TimetableLoadMode;
}

export interface IngestSummary {
  networkVersion: number;
  scheduleVersion: number;
  stations: number;
  lines: number;
  segments: number;
  transferPoints: number;
  trips: number;
  rejectedTrips: Array<{ tripId: string; violations: number }>;
}
