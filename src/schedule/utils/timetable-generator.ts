// src/schedule/utils/timetable-generator.ts

import { ConfigurationError, Violation } from '../../common/errors/transit-errors';
import { minToCompact, parseHhmm } from '../../common/utils/time.util';
import { NetworkModel } from '../../network/network-model';
import { HeadwayServiceInput, Trip } from '../interfaces/schedule.interface';

export const DEFAULT_FIRST_DEPARTURE = '05:00';
export const DEFAULT_LAST_DEPARTURE = '23:00';
export const DEFAULT_HEADWAY_MIN = 15;

/**
 * Build regular-interval trips for one line from its nominal segment times.
 *
 * Departures run from `firstDeparture` to `lastDeparture` inclusive, one every
 * `headwayMin`. Each intermediate stop holds the vehicle for `dwellMin`.
 */
export function generateHeadwayTrips(network: NetworkModel, input: HeadwayServiceInput): Trip[] {
  const violations: Violation[] = [];
  const ref = input.lineId;
  const line = network.line(input.lineId);
  if (!line) {
    violations.push({ code: 'UNKNOWN_LINE', message: `Service references unknown line ${ref}`, ref });
  }

  const first = parseHhmm(input.firstDeparture ?? DEFAULT_FIRST_DEPARTURE);
  const last = parseHhmm(input.lastDeparture ?? DEFAULT_LAST_DEPARTURE);
  const headway = input.headwayMin ?? DEFAULT_HEADWAY_MIN;
  const dwell = input.dwellMin ?? 0;

  if (first === null) {
    violations.push({ code: 'INVALID_TIME', message: `Service ${ref} has an invalid first departure`, ref });
  }
  if (last === null) {
    violations.push({ code: 'INVALID_TIME', message: `Service ${ref} has an invalid last departure`, ref });
  }
  if (first !== null && last !== null && last < first) {
    violations.push({ code: 'INVALID_WINDOW', message: `Service ${ref} ends before it starts`, ref });
  }
  if (!Number.isFinite(headway) || headway <= 0) {
    violations.push({ code: 'INVALID_HEADWAY', message: `Service ${ref} headway must be positive`, ref });
  }
  if (!Number.isFinite(dwell) || dwell < 0) {
    violations.push({ code: 'INVALID_DWELL', message: `Service ${ref} dwell must be non-negative`, ref });
  }

  if (violations.length > 0 || !line || first === null || last === null) {
    throw new ConfigurationError(`Generated service for line ${ref} rejected`, violations);
  }

  const trips: Trip[] = [];
  for (let start = first; start <= last; start += headway) {
    let clock = start;
    const stops = line.stationIds.map((stationId, i) => {
      if (i > 0) {
        clock += line.travelTimes[i - 1];
      }
      const arrivalMin = clock;
      const isTerminal = i === 0 || i === line.stationIds.length - 1;
      const departureMin = isTerminal ? clock : clock + dwell;
      clock = departureMin;
      return { stationId, arrivalMin, departureMin };
    });
    trips.push({ id: `${line.id}-${minToCompact(start)}`, lineId: line.id, stops });
  }
  return trips;
}
