// src/route-planner/interfaces/plan-route.interface.ts

import { PreferenceConfig, PreferencePreset } from '../../preferences/interfaces/preference.interface';

/**
 * One route query.
 */
export interface PlanRouteRequest {
  originId: string;
  destinationId: string;
  /** `HH:mm` or minutes of the service day */
  departAfter: string | number;
  /** Explicit weights; takes precedence over `preset` */
  preferences?: PreferenceConfig;
  /** Named weight set, used when `preferences` is absent (default balanced) */
  preset?: PreferencePreset;
  /** Number of itineraries wanted (default from configuration) */
  k?: number;
  /** Search budget relative to the start of the query */
  timeoutMs?: number;
}

/**
 * A ride identified by trip and stop positions; enough to rebuild the leg
 * from the current timetable.
 */
export interface RideRef {
  tripId: string;
  boardStopIndex: number;
  alightStopIndex: number;
}
