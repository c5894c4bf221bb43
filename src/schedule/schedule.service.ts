// src/schedule/schedule.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ScheduleError, Violation } from '../common/errors/transit-errors';
import { parseHhmm } from '../common/utils/time.util';
import { NetworkModel } from '../network/network-model';
import {
  HeadwayServiceInput,
  RejectedTrip,
  StopTime,
  TimetableLoadOptions,
  TimetableLoadReport,
  Trip,
  TripInput,
} from './interfaces/schedule.interface';
import { ScheduleIndex } from './schedule-index';
import { generateHeadwayTrips } from './utils/timetable-generator';

/**
 * Timetable ingestion.
 *
 * Produces new frozen ScheduleIndex versions; an existing version is never
 * modified.
 */
@Injectable()
export class ScheduleService {
  private readonly logger = new Logger(ScheduleService.name);

  /**
   * Convert ingestion input (`HH:mm` strings or minutes) to a Trip.
   */
  normalizeTrip(input: TripInput): { trip: Trip; violations: Violation[] } {
    const violations: Violation[] = [];
    const ref = input.id;

    const toMinutes = (value: string | number | undefined, label: string): number => {
      if (typeof value === 'number') {
        return value;
      }
      if (typeof value === 'string') {
        const parsed = parseHhmm(value);
        if (parsed !== null) {
          return parsed;
        }
      }
      violations.push({ code: 'INVALID_TIME', message: `Trip ${ref} ${label} is not a valid time`, ref });
      return Number.NaN;
    };

    const stops: StopTime[] = input.stops.map((stop, i) => {
      const arrivalRaw = stop.arrival ?? stop.departure;
      const departureRaw = stop.departure ?? stop.arrival;
      return {
        stationId: stop.stationId,
        arrivalMin: toMinutes(arrivalRaw, `stop ${i} arrival`),
        departureMin: toMinutes(departureRaw, `stop ${i} departure`),
      };
    });

    return { trip: { id: input.id, lineId: input.lineId, stops }, violations };
  }

  /**
   * Publish a batch of trips into a new timetable version.
   *
   * strict (default): every trip is checked and all violations are reported
   * in one ScheduleError; nothing is published if any trip is bad.
   * lenient: bad trips are rejected individually, the rest are published.
   */
  loadTimetable(
    network: NetworkModel,
    inputs: Array<TripInput | Trip>,
    options: TimetableLoadOptions & { previous?: ScheduleIndex } = {}
  ): TimetableLoadReport<ScheduleIndex> {
    const mode = options.mode ?? 'strict';
    const index = options.previous
      ? options.previous.clone(network).index
      : new ScheduleIndex(network, 1);

    const accepted: Trip[] = [];
    const rejected: RejectedTrip[] = [];
    const pendingIds = new Set<string>();

    for (const input of inputs) {
      const { trip, violations } = this.toTrip(input);
      violations.push(...index.validate(trip, pendingIds));
      if (violations.length > 0) {
        rejected.push({ tripId: trip.id, error: new ScheduleError(`Trip ${trip.id} rejected`, violations) });
        continue;
      }
      pendingIds.add(trip.id);
      accepted.push(trip);
    }

    if (mode === 'strict' && rejected.length > 0) {
      const all = rejected.flatMap((r) => r.error.violations);
      this.logger.warn(`Timetable rejected: ${rejected.length} bad trip(s), ${all.length} violation(s)`);
      throw new ScheduleError('Timetable rejected', all);
    }

    for (const trip of accepted) {
      index.publish(trip);
    }
    for (const r of rejected) {
      this.logger.warn(r.error.message);
    }
    index.freeze();

    this.logger.log(
      `Timetable v${index.version} on network v${network.version}: ` +
        `${accepted.length} trip(s) published, ${rejected.length} rejected, ${index.size} total`
    );
    return { index, published: accepted.map((t) => t.id), rejected };
  }

  /**
   * Regular-interval trips for the given service definitions.
   */
  generateService(network: NetworkModel, services: HeadwayServiceInput[]): Trip[] {
    return services.flatMap((service) => generateHeadwayTrips(network, service));
  }

  private toTrip(input: TripInput | Trip): { trip: Trip; violations: Violation[] } {
    if (ScheduleService.isTrip(input)) {
      return { trip: input, violations: [] };
    }
    return this.normalizeTrip(input);
  }

  private static isTrip(input: TripInput | Trip): input is Trip {
    const stops: ReadonlyArray<object> = input.stops;
    return stops.every((s) => 'arrivalMin' in s && 'departureMin' in s);
  }
}
