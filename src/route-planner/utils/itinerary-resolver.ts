// src/route-planner/utils/itinerary-resolver.ts

import { ConfigurationError, ScheduleError, Violation } from '../../common/errors/transit-errors';
import { segmentId } from '../../network/network-model';
import { TransitDataVersion } from '../../transit-data/interfaces/transit-data.interface';
import { Itinerary, Leg, RideLeg } from '../interfaces/itinerary.interface';
import { RideRef } from '../interfaces/plan-route.interface';

export interface TransferTimes {
  sameModeMin: number;
  crossModeMin: number;
}

/**
 * Rebuild an itinerary from trip/stop references against one data version.
 *
 * Planned itineraries travel through clients as ride references; reserving,
 * releasing and highlighting turn them back into full legs here. A transfer
 * leg is inserted wherever consecutive rides change line, and the next ride
 * must leave no earlier than the end of that transfer. `cost` is 0 since no
 * preference applies.
 */
export function resolveItinerary(data: TransitDataVersion, rides: RideRef[], transfer: TransferTimes): Itinerary {
  const { network, schedule, tracker } = data;
  if (rides.length === 0) {
    throw ConfigurationError.single('EMPTY_ITINERARY', 'An itinerary needs at least one ride');
  }

  const violations: Violation[] = [];
  const rideLegs: RideLeg[] = [];
  for (const ref of rides) {
    const trip = schedule.trip(ref.tripId);
    if (!trip) {
      violations.push({ code: 'UNKNOWN_TRIP', message: `Unknown trip ${ref.tripId}`, ref: ref.tripId });
      continue;
    }
    const { boardStopIndex: board, alightStopIndex: alight } = ref;
    if (!Number.isInteger(board) || !Number.isInteger(alight) || board < 0 || alight <= board || alight >= trip.stops.length) {
      violations.push({
        code: 'INVALID_STOP_RANGE',
        message: `Trip ${trip.id} has no ride from stop ${board} to stop ${alight}`,
        ref: trip.id,
      });
      continue;
    }
    const line = network.requireLine(trip.lineId);
    const stops = trip.stops.slice(board, alight + 1);
    const segmentIds: string[] = [];
    for (let position = board; position < alight; position++) {
      segmentIds.push(network.segmentAt(trip.lineId, position)?.id ?? segmentId(trip.lineId, position));
    }
    rideLegs.push({
      kind: 'RIDE',
      fromStationId: stops[0].stationId,
      toStationId: stops[stops.length - 1].stationId,
      lineId: trip.lineId,
      mode: line.mode,
      tripId: trip.id,
      boardStopIndex: board,
      alightStopIndex: alight,
      stationIds: stops.map((s) => s.stationId),
      segmentIds,
      departureMin: stops[0].departureMin,
      arrivalMin: stops[stops.length - 1].arrivalMin,
    });
  }

  for (let i = 1; i < rideLegs.length; i++) {
    const previous = rideLegs[i - 1];
    const next = rideLegs[i];
    if (previous.toStationId !== next.fromStationId || next.departureMin < previous.arrivalMin) {
      violations.push({
        code: 'DISCONNECTED_RIDES',
        message: `Ride on ${next.tripId} does not continue from ${previous.tripId}`,
        ref: next.tripId,
      });
      continue;
    }
    if (previous.lineId !== next.lineId) {
      const minutes = transferMinutes(previous, next, transfer);
      if (next.departureMin < previous.arrivalMin + minutes) {
        violations.push({
          code: 'MISSED_TRANSFER',
          message: `Ride on ${next.tripId} leaves before the ${minutes} min transfer from ${previous.tripId} ends`,
          ref: next.tripId,
        });
      }
    }
  }
  if (violations.length > 0) {
    throw new ScheduleError('Itinerary cannot be resolved', violations);
  }

  const legs: Leg[] = [];
  const crowdingPenalties: Record<string, number> = {};
  let transferMin = 0;
  let transferCount = 0;
  for (let i = 0; i < rideLegs.length; i++) {
    const ride = rideLegs[i];
    const previous = i > 0 ? rideLegs[i - 1] : null;
    if (previous && previous.lineId !== ride.lineId) {
      const minutes = transferMinutes(previous, ride, transfer);
      transferMin += minutes;
      transferCount++;
      legs.push({
        kind: 'TRANSFER',
        fromStationId: ride.fromStationId,
        toStationId: ride.fromStationId,
        fromLineId: previous.lineId,
        toLineId: ride.lineId,
        departureMin: previous.arrivalMin,
        arrivalMin: previous.arrivalMin + minutes,
      });
    }
    legs.push(ride);
    for (const stationId of ride.stationIds.slice(1)) {
      crowdingPenalties[stationId] = (crowdingPenalties[stationId] ?? 0) + tracker.stationPenalty(stationId);
    }
  }

  const first = rideLegs[0];
  const last = rideLegs[rideLegs.length - 1];
  const inVehicleMin = rideLegs.reduce((sum, leg) => sum + leg.arrivalMin - leg.departureMin, 0);
  const totalDurationMin = last.arrivalMin - first.departureMin;
  return {
    originId: first.fromStationId,
    destinationId: last.toStationId,
    departAfterMin: first.departureMin,
    legs,
    departureMin: first.departureMin,
    arrivalMin: last.arrivalMin,
    totalDurationMin,
    inVehicleMin,
    waitMin: totalDurationMin - inVehicleMin - transferMin,
    transferCount,
    crowdingPenalties,
    totalCrowdingPenalty: Object.values(crowdingPenalties).reduce((sum, p) => sum + p, 0),
    cost: 0,
    truncated: false,
  };
}

function transferMinutes(from: RideLeg, to: RideLeg, transfer: TransferTimes): number {
  return from.mode === to.mode ? transfer.sameModeMin : transfer.crossModeMin;
}

/**
 * Ride references of an itinerary, the inverse of `resolveItinerary`.
 */
export function toRideRefs(itinerary: Itinerary): RideRef[] {
  const refs: RideRef[] = [];
  for (const leg of itinerary.legs) {
    if (leg.kind === 'RIDE') {
      refs.push({ tripId: leg.tripId, boardStopIndex: leg.boardStopIndex, alightStopIndex: leg.alightStopIndex });
    }
  }
  return refs;
}
