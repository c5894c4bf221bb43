// src/schedule/utils/timetable-generator.spec.ts
import { ConfigurationError } from '../../common/errors/transit-errors';
import { TransportMode } from '../../network/interfaces/network.interface';
import { NetworkModel } from '../../network/network-model';
import { ScheduleIndex } from '../schedule-index';
import { generateHeadwayTrips } from './timetable-generator';

describe('generateHeadwayTrips', () => {
  let network: NetworkModel;

  beforeEach(() => {
    network = new NetworkModel();
    ['A', 'B', 'C'].forEach((id) => network.addStation({ id, capacity: 100 }));
    network.addLine({ id: 'M', mode: TransportMode.METRO, stationIds: ['A', 'B', 'C'], travelTimes: [10, 13] });
    network.freeze();
  });

  it('should space departures by the headway, last one included', () => {
    const trips = generateHeadwayTrips(network, {
      lineId: 'M',
      firstDeparture: '08:00',
      lastDeparture: '08:30',
      headwayMin: 15,
      dwellMin: 2,
    });

    expect(trips.map((t) => t.id)).toEqual(['M-0800', 'M-0815', 'M-0830']);
    expect(trips[0].stops).toEqual([
      { stationId: 'A', arrivalMin: 480, departureMin: 480 },
      { stationId: 'B', arrivalMin: 490, departureMin: 492 },
      { stationId: 'C', arrivalMin: 505, departureMin: 505 },
    ]);
  });

  it('should run from 05:00 to 23:00 every 15 minutes by default', () => {
    const trips = generateHeadwayTrips(network, { lineId: 'M' });

    expect(trips).toHaveLength(73);
    expect(trips[0].id).toBe('M-0500');
    expect(trips[72].id).toBe('M-2300');
  });

  it('should produce trips the schedule index accepts', () => {
    const index = new ScheduleIndex(network);
    const trips = generateHeadwayTrips(network, { lineId: 'M', headwayMin: 60, dwellMin: 1 });

    expect(trips.flatMap((t) => index.validate(t))).toEqual([]);
  });

  it('should report every problem of a service definition', () => {
    let caught: unknown;
    try {
      generateHeadwayTrips(network, {
        lineId: 'Q',
        firstDeparture: '09:00',
        lastDeparture: '08:00',
        headwayMin: 0,
        dwellMin: -1,
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.violations.map((v) => v.code)).toEqual([
        'UNKNOWN_LINE',
        'INVALID_WINDOW',
        'INVALID_HEADWAY',
        'INVALID_DWELL',
      ]);
    }
  });

  it('should reject a malformed first departure', () => {
    expect(() => generateHeadwayTrips(network, { lineId: 'M', firstDeparture: '5am' })).toThrow(ConfigurationError);
  });
});
