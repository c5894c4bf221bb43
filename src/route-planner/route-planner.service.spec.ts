// src/route-planner/route-planner.service.spec.ts
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigurationError, InvalidPreferenceError } from '../common/errors/transit-errors';
import {
  buildTransitData,
  crowdedInterchange,
  metroVersusBus,
  stop,
  testConfig,
  trip,
} from '../common/testing/transit-fixtures';
import { TransitConfig, transitConfig } from '../config/transit.config';
import { TransportMode } from '../network/interfaces/network.interface';
import { PreferenceResolverService } from '../preferences/preference-resolver.service';
import { PLANNER_CLOCK, PlannerClock, RoutePlannerService } from './route-planner.service';

async function createService(config: TransitConfig = testConfig(), clock?: PlannerClock): Promise<RoutePlannerService> {
  const providers = [
    RoutePlannerService,
    PreferenceResolverService,
    { provide: transitConfig.KEY, useValue: config },
    ...(clock ? [{ provide: PLANNER_CLOCK, useValue: clock }] : []),
  ];
  const module: TestingModule = await Test.createTestingModule({ providers }).compile();
  return module.get<RoutePlannerService>(RoutePlannerService);
}

describe('RoutePlannerService', () => {
  let service: RoutePlannerService;

  beforeEach(async () => {
    service = await createService();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('ranking', () => {
    it('should rank the faster metro ahead of the direct bus', async () => {
      const data = metroVersusBus();
      const result = await service.planRoute(data, {
        originId: 'A',
        destinationId: 'C',
        departAfter: '08:00',
        preset: 'fastest',
      });

      expect(result.itineraries).toHaveLength(2);
      const [metro, bus] = result.itineraries;

      expect(metro.cost).toBeCloseTo(25);
      expect(metro.legs).toHaveLength(1);
      expect(metro.legs[0]).toEqual({
        kind: 'RIDE',
        fromStationId: 'A',
        toStationId: 'C',
        lineId: 'M',
        mode: TransportMode.METRO,
        tripId: 'M-0800',
        boardStopIndex: 0,
        alightStopIndex: 2,
        stationIds: ['A', 'B', 'C'],
        segmentIds: ['M#0', 'M#1'],
        departureMin: 480,
        arrivalMin: 505,
      });
      expect(metro.totalDurationMin).toBe(25);
      expect(metro.inVehicleMin).toBe(25);
      expect(metro.waitMin).toBe(0);
      expect(metro.transferCount).toBe(0);

      expect(bus.cost).toBeCloseTo(40);
      expect(bus.legs.map((l) => (l.kind === 'RIDE' ? l.tripId : l.kind))).toEqual(['X-0805']);
      expect(bus.departureMin).toBe(485);
      expect(bus.arrivalMin).toBe(520);
      expect(bus.inVehicleMin).toBe(35);
      expect(bus.waitMin).toBe(5);

      expect(result.truncated).toBe(false);
      expect(result.exhausted).toBe(true);
      expect(result.expandedLabels).toBe(4);
      expect(result.networkVersion).toBe(1);
      expect(result.scheduleVersion).toBe(1);
    });

    it('should return an empty result when no service departs late enough', async () => {
      const result = await service.planRoute(metroVersusBus(), {
        originId: 'A',
        destinationId: 'C',
        departAfter: '08:30',
        preset: 'fastest',
      });

      expect(result.itineraries).toEqual([]);
      expect(result.truncated).toBe(false);
      expect(result.exhausted).toBe(true);
    });

    it('should take the crowded metro when crowding carries no weight', async () => {
      const result = await service.planRoute(crowdedInterchange(), {
        originId: 'A',
        destinationId: 'C',
        departAfter: '08:00',
        preferences: { minimizeTime: 1, minimizeTransfers: 1, avoidCrowding: 0 },
      });

      expect(result.itineraries.map((i) => i.cost)).toEqual([
        expect.closeTo(15, 6),
        expect.closeTo(22.5, 6),
      ]);
      const [metro, detour] = result.itineraries;
      expect(metro.transferCount).toBe(0);
      expect(metro.crowdingPenalties.B).toBeCloseTo(69.4444, 3);
      expect(metro.crowdingPenalties.C).toBe(0);
      expect(metro.totalCrowdingPenalty).toBeCloseTo(69.4444, 3);
      expect(detour.transferCount).toBe(1);
    });

    it('should route around the crowded station when crowding is weighted', async () => {
      const result = await service.planRoute(crowdedInterchange(), {
        originId: 'A',
        destinationId: 'C',
        departAfter: '08:00',
        preferences: { minimizeTime: 1, minimizeTransfers: 1, avoidCrowding: 1 },
      });

      const [detour, metro] = result.itineraries;
      expect(detour.cost).toBeCloseTo(15);
      expect(metro.cost).toBeCloseTo((30 + 69.4444) / 3, 3);

      expect(detour.legs).toEqual([
        expect.objectContaining({ kind: 'RIDE', tripId: 'X-0800', fromStationId: 'A', toStationId: 'D' }),
        {
          kind: 'TRANSFER',
          fromStationId: 'D',
          toStationId: 'D',
          fromLineId: 'X',
          toLineId: 'T',
          departureMin: 490,
          arrivalMin: 495,
        },
        expect.objectContaining({ kind: 'RIDE', tripId: 'T-0815', fromStationId: 'D', toStationId: 'C' }),
      ]);
      expect(detour.totalDurationMin).toBe(30);
      expect(detour.inVehicleMin).toBe(25);
      expect(detour.waitMin).toBe(0);
      expect(detour.totalCrowdingPenalty).toBe(0);
    });

    it('should never add transfers when the transfer weight goes up', async () => {
      const data = crowdedInterchange();
      const request = { originId: 'A', destinationId: 'C', departAfter: '08:00' };

      const low = await service.planRoute(data, {
        ...request,
        preferences: { minimizeTime: 1, minimizeTransfers: 0, avoidCrowding: 1 },
      });
      const high = await service.planRoute(data, {
        ...request,
        preferences: { minimizeTime: 1, minimizeTransfers: 5, avoidCrowding: 1 },
      });

      expect(low.itineraries[0].transferCount).toBe(1);
      expect(high.itineraries[0].transferCount).toBe(0);
    });

    it('should return identical results for identical queries', async () => {
      const data = crowdedInterchange();
      const request = { originId: 'A', destinationId: 'C', departAfter: '08:00', preset: 'balanced' as const };

      const first = await service.planRoute(data, request);
      const second = await service.planRoute(data, request);

      expect(second).toEqual(first);
    });

    it('should match the synchronous run', async () => {
      const data = crowdedInterchange();
      const request = { originId: 'A', destinationId: 'C', departAfter: '08:00' };

      expect(service.planRouteSync(data, request)).toEqual(await service.planRoute(data, request));
    });

    it('should stop after k itineraries', async () => {
      const result = await service.planRoute(metroVersusBus(), {
        originId: 'A',
        destinationId: 'C',
        departAfter: '08:00',
        k: 1,
      });

      expect(result.itineraries).toHaveLength(1);
      expect(result.itineraries[0].legs[0]).toEqual(expect.objectContaining({ tripId: 'M-0800' }));
      expect(result.exhausted).toBe(false);
      expect(result.truncated).toBe(false);
    });
  });

  describe('crowding and capacity', () => {
    const stations = [
      { id: 'A', capacity: 1000 },
      { id: 'B', capacity: 100, currentLoad: 95 },
      { id: 'C', capacity: 1000 },
      { id: 'D', capacity: 100 },
    ];
    const request = { originId: 'A', destinationId: 'C', departAfter: '08:00' };
    const tripIds = (itineraries: { legs: Array<{ kind: string; tripId?: string }> }[]) =>
      itineraries.map((i) => i.legs.map((l) => l.tripId ?? l.kind).join('>'));

    // two direct metro lines, 20 minutes each; M passes crowded B, N passes empty D
    function parallelMetros(loadAtB = 95, capacityOfB = 100) {
      return buildTransitData(
        stations.map((s) => (s.id === 'B' ? { ...s, currentLoad: loadAtB, capacity: capacityOfB } : s)),
        [
          { id: 'M', mode: TransportMode.METRO, stationIds: ['A', 'B', 'C'], travelTimes: [10, 10] },
          { id: 'N', mode: TransportMode.METRO, stationIds: ['A', 'D', 'C'], travelTimes: [10, 10] },
        ],
        [
          trip('M-0800', 'M', [stop('A', '08:00'), stop('B', '08:10'), stop('C', '08:20')]),
          trip('N-0800', 'N', [stop('A', '08:00'), stop('D', '08:10'), stop('C', '08:20')]),
        ]
      );
    }

    it('should ignore crowding between equal transfer-free routes when it carries no weight', async () => {
      const result = await service.planRoute(parallelMetros(), {
        ...request,
        preferences: { minimizeTime: 1, minimizeTransfers: 1, avoidCrowding: 0 },
      });

      expect(tripIds(result.itineraries)).toEqual(['M-0800', 'N-0800']);
      expect(result.itineraries.map((i) => i.cost)).toEqual([expect.closeTo(10, 6), expect.closeTo(10, 6)]);
      expect(result.itineraries[0].totalCrowdingPenalty).toBeCloseTo(69.4444, 3);
    });

    it('should prefer the emptier of two equal transfer-free routes when crowding is weighted', async () => {
      const result = await service.planRoute(parallelMetros(), {
        ...request,
        preferences: { minimizeTime: 1, avoidCrowding: 1 },
      });

      expect(tripIds(result.itineraries)).toEqual(['N-0800', 'M-0800']);
      expect(result.itineraries[0].cost).toBeCloseTo(10);
      expect(result.itineraries[1].cost).toBeCloseTo(10 + 69.4444 / 2, 3);
    });

    it('should rank an over-capacity route last even when it is cheaper', async () => {
      const data = buildTransitData(
        stations.map((s) => (s.id === 'B' ? { ...s, currentLoad: 150 } : s)),
        [
          { id: 'M', mode: TransportMode.METRO, stationIds: ['A', 'B', 'C'], travelTimes: [10, 10] },
          { id: 'X', mode: TransportMode.BUS, stationIds: ['A', 'C'], travelTimes: [30] },
        ],
        [
          trip('M-0800', 'M', [stop('A', '08:00'), stop('B', '08:10'), stop('C', '08:20')]),
          trip('X-0800', 'X', [stop('A', '08:00'), stop('C', '08:30')]),
        ]
      );

      const result = await service.planRoute(data, { ...request, preferences: { minimizeTime: 1 } });

      expect(tripIds(result.itineraries)).toEqual(['X-0800', 'M-0800']);
      const [bus, metro] = result.itineraries;
      expect(bus.cost).toBeCloseTo(30);
      expect(metro.cost).toBeCloseTo(20);
      expect(data.tracker.isFeasible(bus)).toBe(true);
      expect(data.tracker.isFeasible(metro)).toBe(false);
    });

    it('should still return an over-capacity route when nothing else reaches the destination', async () => {
      const result = await service.planRoute(parallelMetros(150), { ...request, k: 1, preset: 'fastest' });

      expect(tripIds(result.itineraries)).toEqual(['N-0800']);

      const onlyThroughB = await service.planRoute(parallelMetros(150), {
        originId: 'A',
        destinationId: 'B',
        departAfter: '08:00',
      });
      expect(tripIds(onlyThroughB.itineraries)).toEqual(['M-0800']);
      expect(onlyThroughB.itineraries[0].crowdingPenalties.B).toBe(100);
    });

    it('should rank a trip segment above vehicle capacity last', async () => {
      // 901 riders fit every station but not the 900-seat metro
      const data = parallelMetros(0, 5000);
      const full = service.planRouteSync(data, { ...request, preset: 'fastest' }).itineraries[0];
      data.tracker.reserve(full, 901);

      const result = await service.planRoute(data, { ...request, preset: 'fastest' });

      expect(tripIds(result.itineraries)).toEqual(['N-0800', 'M-0800']);
    });
  });

  describe('edge cases', () => {
    it('should return one zero-leg itinerary when origin equals destination', async () => {
      const result = await service.planRoute(metroVersusBus(), {
        originId: 'B',
        destinationId: 'B',
        departAfter: '09:15',
      });

      expect(result.itineraries).toHaveLength(1);
      expect(result.itineraries[0]).toEqual({
        originId: 'B',
        destinationId: 'B',
        departAfterMin: 555,
        legs: [],
        departureMin: 555,
        arrivalMin: 555,
        totalDurationMin: 0,
        inVehicleMin: 0,
        waitMin: 0,
        transferCount: 0,
        crowdingPenalties: {},
        totalCrowdingPenalty: 0,
        cost: 0,
        truncated: false,
      });
    });

    it('should terminate on a looping line that never reaches the destination', async () => {
      const trips = ['08:00', '08:10', '08:20', '08:30'].map((start) => {
        const base = Number(start.slice(0, 2)) * 60 + Number(start.slice(3));
        const at = (offset: number) => {
          const t = base + offset;
          return `${String(Math.floor(t / 60)).padStart(2, '0')}:${String(t % 60).padStart(2, '0')}`;
        };
        return trip(`L-${start.replace(':', '')}`, 'L', [
          stop('A', at(0)),
          stop('B', at(3)),
          stop('C', at(6)),
          stop('A', at(9)),
        ]);
      });
      const data = buildTransitData(
        [
          { id: 'A', capacity: 100 },
          { id: 'B', capacity: 100 },
          { id: 'C', capacity: 100 },
          { id: 'Z', capacity: 100 },
        ],
        [{ id: 'L', mode: TransportMode.BUS, stationIds: ['A', 'B', 'C', 'A'], travelTimes: [3, 3, 3] }],
        trips
      );

      const result = await service.planRoute(data, { originId: 'A', destinationId: 'Z', departAfter: '08:00' });

      expect(result.itineraries).toEqual([]);
      expect(result.truncated).toBe(false);
      expect(result.exhausted).toBe(true);
    });

    it('should reject unknown stations with every offending id', async () => {
      await expect(
        service.planRoute(metroVersusBus(), { originId: 'Q', destinationId: 'R', departAfter: '08:00' })
      ).rejects.toMatchObject({
        code: 'CONFIGURATION_ERROR',
        violations: [
          expect.objectContaining({ code: 'UNKNOWN_STATION', ref: 'Q' }),
          expect.objectContaining({ code: 'UNKNOWN_STATION', ref: 'R' }),
        ],
      });
    });

    it('should reject k below 1', () => {
      expect(() =>
        service.planRouteSync(metroVersusBus(), { originId: 'A', destinationId: 'C', departAfter: '08:00', k: 0 })
      ).toThrow(InvalidPreferenceError);
    });

    it('should reject a malformed departure time', () => {
      let caught: unknown;
      try {
        service.planRouteSync(metroVersusBus(), { originId: 'A', destinationId: 'C', departAfter: '8h00' });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(InvalidPreferenceError);
      expect(caught).toMatchObject({ violations: [expect.objectContaining({ code: 'INVALID_DEPARTURE_TIME' })] });
    });

    it('should reject invalid preference weights before searching', () => {
      expect(() =>
        service.planRouteSync(metroVersusBus(), {
          originId: 'A',
          destinationId: 'C',
          departAfter: '08:00',
          preferences: { minimizeTime: -1 },
        })
      ).toThrow(InvalidPreferenceError);
    });

    it('should report unknown stations before query problems', () => {
      expect(() =>
        service.planRouteSync(metroVersusBus(), { originId: 'Q', destinationId: 'C', departAfter: 'later', k: 0 })
      ).toThrow(ConfigurationError);
    });
  });

  describe('limits', () => {
    it('should truncate when the deadline passes', async () => {
      let tick = 0;
      const clocked = await createService(testConfig(), () => tick++);

      const result = await clocked.planRoute(metroVersusBus(), {
        originId: 'A',
        destinationId: 'C',
        departAfter: '08:00',
        timeoutMs: 1,
      });

      expect(result.itineraries).toEqual([]);
      expect(result.truncated).toBe(true);
      expect(result.exhausted).toBe(false);
      expect(result.expandedLabels).toBe(0);
    });

    it('should mark itineraries found before the deadline as truncated', async () => {
      let tick = 0;
      // deadline at 4: pops at clock 1, 2, 3 run; the check at 4 stops the search
      const clocked = await createService(testConfig(), () => tick++);

      const result = await clocked.planRoute(metroVersusBus(), {
        originId: 'A',
        destinationId: 'C',
        departAfter: '08:00',
        preset: 'fastest',
        timeoutMs: 4,
      });

      expect(result.truncated).toBe(true);
      expect(result.expandedLabels).toBe(3);
      expect(result.itineraries).toHaveLength(1);
      expect(result.itineraries[0].truncated).toBe(true);
      expect(result.itineraries[0].cost).toBeCloseTo(25);
    });

    it('should truncate at the expansion cap', async () => {
      const capped = await createService(testConfig({ planner: { maxExpansions: 1 } }));

      const result = await capped.planRoute(metroVersusBus(), {
        originId: 'A',
        destinationId: 'C',
        departAfter: '08:00',
      });

      expect(result.itineraries).toEqual([]);
      expect(result.truncated).toBe(true);
      expect(result.expandedLabels).toBe(1);
    });

    it('should let concurrent queries finish independently', async () => {
      const yielding = await createService(testConfig({ planner: { yieldEvery: 1 } }));
      const data = crowdedInterchange();

      const [fast, balanced] = await Promise.all([
        yielding.planRoute(data, { originId: 'A', destinationId: 'C', departAfter: '08:00', preset: 'fastest' }),
        yielding.planRoute(data, { originId: 'A', destinationId: 'C', departAfter: '08:00', preset: 'balanced' }),
      ]);

      expect(fast.itineraries[0].transferCount).toBe(0);
      expect(balanced.itineraries[0].transferCount).toBe(1);
    });
  });
});
