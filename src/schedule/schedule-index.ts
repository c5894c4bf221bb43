// src/schedule/schedule-index.ts

import { ScheduleError, Violation } from '../common/errors/transit-errors';
import { NetworkModel } from '../network/network-model';
import { DepartureLookup, NO_MORE_SERVICE, Trip } from './interfaces/schedule.interface';

interface DepartureEntry {
  departureMin: number;
  tripId: string;
  stopIndex: number;
}

function compareEntries(a: DepartureEntry, b: DepartureEntry): number {
  if (a.departureMin !== b.departureMin) return a.departureMin - b.departureMin;
  if (a.tripId !== b.tripId) return a.tripId < b.tripId ? -1 : 1;
  return a.stopIndex - b.stopIndex;
}

function isTime(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Per-(station, line) departure index over published trips.
 *
 * Each key holds departures sorted by (time, trip id, stop index), so
 * `nextDeparture` is a binary search. Only stops with a following stop are
 * indexed: nobody boards at a trip's terminus.
 */
export class ScheduleIndex {
  private readonly tripsById = new Map<string, Trip>();
  private readonly departures = new Map<string, DepartureEntry[]>();
  private frozen = false;

  constructor(
    readonly network: NetworkModel,
    readonly version: number = 1
  ) {}

  get size(): number {
    return this.tripsById.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Check a trip against the line topology and the stop-time ordering rules.
   *
   * @param pendingIds ids accepted earlier in the same batch
   */
  validate(trip: Trip, pendingIds: ReadonlySet<string> = new Set()): Violation[] {
    const violations: Violation[] = [];
    const ref = typeof trip.id === 'string' && trip.id !== '' ? trip.id : '<unnamed>';

    if (ref === '<unnamed>') {
      violations.push({ code: 'INVALID_TRIP_ID', message: 'Trip id must be a non-empty string' });
    } else if (this.tripsById.has(trip.id) || pendingIds.has(trip.id)) {
      violations.push({ code: 'DUPLICATE_TRIP', message: `Trip ${ref} is published more than once`, ref });
    }

    const line = this.network.line(trip.lineId);
    if (!line) {
      violations.push({ code: 'UNKNOWN_LINE', message: `Trip ${ref} references unknown line ${trip.lineId}`, ref });
    } else {
      if (trip.stops.length !== line.stationIds.length) {
        violations.push({
          code: 'STOP_COUNT_MISMATCH',
          message: `Trip ${ref} has ${trip.stops.length} stops, line ${line.id} has ${line.stationIds.length}`,
          ref,
        });
      }
      const common = Math.min(trip.stops.length, line.stationIds.length);
      for (let i = 0; i < common; i++) {
        if (trip.stops[i].stationId !== line.stationIds[i]) {
          violations.push({
            code: 'STATION_SEQUENCE_MISMATCH',
            message: `Trip ${ref} stop ${i} is ${trip.stops[i].stationId}, line ${line.id} expects ${line.stationIds[i]}`,
            ref,
          });
        }
      }
    }

    trip.stops.forEach((stop, i) => {
      if (!isTime(stop.arrivalMin) || !isTime(stop.departureMin)) {
        violations.push({
          code: 'INVALID_TIME',
          message: `Trip ${ref} stop ${i} has a missing or negative time`,
          ref,
        });
        return;
      }
      if (stop.arrivalMin > stop.departureMin) {
        violations.push({
          code: 'DEPARTS_BEFORE_ARRIVAL',
          message: `Trip ${ref} stop ${i} departs (${stop.departureMin}) before it arrives (${stop.arrivalMin})`,
          ref,
        });
      }
      const next = trip.stops[i + 1];
      if (next && isTime(next.arrivalMin) && stop.departureMin > next.arrivalMin) {
        violations.push({
          code: 'NON_MONOTONIC_TIMES',
          message: `Trip ${ref} arrives at stop ${i + 1} (${next.arrivalMin}) before leaving stop ${i} (${stop.departureMin})`,
          ref,
        });
      }
    });

    return violations;
  }

  /**
   * Insert one trip. Throws ScheduleError listing every problem of that trip.
   */
  publish(trip: Trip): void {
    this.assertMutable();
    const violations = this.validate(trip);
    if (violations.length > 0) {
      throw new ScheduleError(`Trip ${trip.id} rejected`, violations);
    }
    this.insert(trip);
  }

  /**
   * Earliest departure from `stationId` on `lineId` at or after `afterMin`.
   */
  nextDeparture(stationId: string, lineId: string, afterMin: number): DepartureLookup {
    const entries = this.departures.get(this.key(stationId, lineId));
    if (!entries || entries.length === 0) {
      return NO_MORE_SERVICE;
    }

    let lo = 0;
    let hi = entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (entries[mid].departureMin < afterMin) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    if (lo === entries.length) {
      return NO_MORE_SERVICE;
    }

    const entry = entries[lo];
    const trip = this.tripsById.get(entry.tripId);
    if (!trip) {
      return NO_MORE_SERVICE;
    }
    return { kind: 'DEPARTURE', trip, stopIndex: entry.stopIndex, departureMin: entry.departureMin };
  }

  trip(id: string): Trip | undefined {
    return this.tripsById.get(id);
  }

  trips(): Trip[] {
    return [...this.tripsById.values()];
  }

  tripsOfLine(lineId: string): Trip[] {
    return this.trips().filter((t) => t.lineId === lineId);
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  /**
   * Mutable copy with the next version number.
   *
   * When a different network version is given, every trip is re-validated
   * against it; trips that no longer fit are dropped and returned.
   */
  clone(network: NetworkModel = this.network): { index: ScheduleIndex; dropped: Trip[] } {
    const copy = new ScheduleIndex(network, this.version + 1);
    const dropped: Trip[] = [];
    for (const trip of this.tripsById.values()) {
      if (network === this.network || copy.validate(trip).length === 0) {
        copy.insert(trip);
      } else {
        dropped.push(trip);
      }
    }
    return { index: copy, dropped };
  }

  private insert(trip: Trip): void {
    const stored: Trip = {
      id: trip.id,
      lineId: trip.lineId,
      stops: trip.stops.map((s) => ({ ...s })),
    };
    this.tripsById.set(stored.id, stored);

    for (let i = 0; i < stored.stops.length - 1; i++) {
      const stop = stored.stops[i];
      const key = this.key(stop.stationId, stored.lineId);
      let entries = this.departures.get(key);
      if (!entries) {
        entries = [];
        this.departures.set(key, entries);
      }
      const entry: DepartureEntry = { departureMin: stop.departureMin, tripId: stored.id, stopIndex: i };
      entries.splice(this.insertionPoint(entries, entry), 0, entry);
    }
  }

  private insertionPoint(entries: DepartureEntry[], entry: DepartureEntry): number {
    let lo = 0;
    let hi = entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (compareEntries(entries[mid], entry) <= 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  private key(stationId: string, lineId: string): string {
    return `${stationId}\u0000${lineId}`;
  }

  private assertMutable(): void {
    if (this.frozen) {
      const message = `Timetable version ${this.version} is read-only; clone it to publish trips`;
      throw new ScheduleError(message, [{ code: 'TIMETABLE_FROZEN', message }]);
    }
  }
}
