// src/route-planner/utils/itinerary-resolver.spec.ts
import { ConfigurationError, ScheduleError } from '../../common/errors/transit-errors';
import { crowdedInterchange } from '../../common/testing/transit-fixtures';
import { TransitDataVersion } from '../../transit-data/interfaces/transit-data.interface';
import { RideRef } from '../interfaces/plan-route.interface';
import { resolveItinerary, toRideRefs } from './itinerary-resolver';

const transfer = { sameModeMin: 3, crossModeMin: 5 };

describe('resolveItinerary', () => {
  let data: TransitDataVersion;

  beforeEach(() => {
    data = crowdedInterchange();
  });

  function scheduleCodes(rides: RideRef[]): string[] {
    try {
      resolveItinerary(data, rides, transfer);
    } catch (error) {
      if (error instanceof ScheduleError) {
        return error.violations.map((v) => v.code);
      }
      throw error;
    }
    return [];
  }

  it('should insert a transfer leg between rides on different lines', () => {
    const itinerary = resolveItinerary(
      data,
      [
        { tripId: 'X-0800', boardStopIndex: 0, alightStopIndex: 1 },
        { tripId: 'T-0815', boardStopIndex: 0, alightStopIndex: 1 },
      ],
      transfer
    );

    expect(itinerary.legs.map((l) => l.kind)).toEqual(['RIDE', 'TRANSFER', 'RIDE']);
    expect(itinerary.legs[1]).toEqual({
      kind: 'TRANSFER',
      fromStationId: 'D',
      toStationId: 'D',
      fromLineId: 'X',
      toLineId: 'T',
      departureMin: 490,
      arrivalMin: 495,
    });
    expect(itinerary).toEqual(
      expect.objectContaining({
        originId: 'A',
        destinationId: 'C',
        departureMin: 480,
        arrivalMin: 510,
        totalDurationMin: 30,
        inVehicleMin: 25,
        waitMin: 0,
        transferCount: 1,
        crowdingPenalties: { D: 0, C: 0 },
        cost: 0,
      })
    );
  });

  it('should charge crowding at the stations reached', () => {
    const itinerary = resolveItinerary(data, [{ tripId: 'M-0800', boardStopIndex: 0, alightStopIndex: 2 }], transfer);
    const [ride] = itinerary.legs;

    expect(ride.kind === 'RIDE' && ride.segmentIds).toEqual(['M#0', 'M#1']);
    expect(Object.keys(itinerary.crowdingPenalties)).toEqual(['B', 'C']);
    expect(itinerary.totalCrowdingPenalty).toBeCloseTo(69.4444, 4);
  });

  it('should not count a transfer between two rides of the same line', () => {
    const itinerary = resolveItinerary(
      data,
      [
        { tripId: 'M-0800', boardStopIndex: 0, alightStopIndex: 1 },
        { tripId: 'M-0800', boardStopIndex: 1, alightStopIndex: 2 },
      ],
      transfer
    );

    expect(itinerary.transferCount).toBe(0);
    expect(itinerary.waitMin).toBe(2);
  });

  it('should reject an empty ride list', () => {
    expect(() => resolveItinerary(data, [], transfer)).toThrow(ConfigurationError);
  });

  it('should reject unknown trips and stop ranges', () => {
    expect(scheduleCodes([{ tripId: 'nope', boardStopIndex: 0, alightStopIndex: 1 }])).toEqual(['UNKNOWN_TRIP']);
    expect(scheduleCodes([{ tripId: 'M-0800', boardStopIndex: 2, alightStopIndex: 1 }])).toEqual([
      'INVALID_STOP_RANGE',
    ]);
    expect(scheduleCodes([{ tripId: 'M-0800', boardStopIndex: 0, alightStopIndex: 3 }])).toEqual([
      'INVALID_STOP_RANGE',
    ]);
  });

  it('should reject rides that do not connect', () => {
    expect(
      scheduleCodes([
        { tripId: 'X-0800', boardStopIndex: 0, alightStopIndex: 1 },
        { tripId: 'M-0800', boardStopIndex: 1, alightStopIndex: 2 },
      ])
    ).toEqual(['DISCONNECTED_RIDES']);
  });

  it('should reject a change of line shorter than the transfer time', () => {
    const rides = [
      { tripId: 'X-0800', boardStopIndex: 0, alightStopIndex: 1 },
      { tripId: 'T-0815', boardStopIndex: 0, alightStopIndex: 1 },
    ];
    let caught: unknown;
    try {
      resolveItinerary(data, rides, { sameModeMin: 3, crossModeMin: 6 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ScheduleError);
    expect(caught).toMatchObject({
      violations: [
        {
          code: 'MISSED_TRANSFER',
          message: 'Ride on T-0815 leaves before the 6 min transfer from X-0800 ends',
          ref: 'T-0815',
        },
      ],
    });
    expect(scheduleCodes(rides)).toEqual([]);
  });
});

describe('toRideRefs', () => {
  it('should return the references an itinerary was resolved from', () => {
    const rides: RideRef[] = [
      { tripId: 'X-0800', boardStopIndex: 0, alightStopIndex: 1 },
      { tripId: 'T-0815', boardStopIndex: 0, alightStopIndex: 1 },
    ];

    expect(toRideRefs(resolveItinerary(crowdedInterchange(), rides, transfer))).toEqual(rides);
  });
});
