// src/transit-data/network.controller.spec.ts
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigurationError } from '../common/errors/transit-errors';
import { crowdedInterchange } from '../common/testing/transit-fixtures';
import { TransportMode } from '../network/interfaces/network.interface';
import { NetworkService } from '../network/network.service';
import { RideRef } from '../route-planner/interfaces/plan-route.interface';
import { resolveItinerary } from '../route-planner/utils/itinerary-resolver';
import { NetworkDocumentDto } from './dto/network-document.dto';
import { TransitDataVersion } from './interfaces/transit-data.interface';
import { NetworkController } from './network.controller';
import { TransitDataService } from './transit-data.service';

describe('NetworkController', () => {
  let controller: NetworkController;
  const data: TransitDataVersion = crowdedInterchange();
  const transitData = {
    current: jest.fn(() => data),
    ingestDocument: jest.fn(),
    resolveItinerary: jest.fn((rides: RideRef[], version: TransitDataVersion) =>
      resolveItinerary(version, rides, { sameModeMin: 3, crossModeMin: 5 })
    ),
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [NetworkController],
      providers: [NetworkService, { provide: TransitDataService, useValue: transitData }],
    }).compile();

    controller = module.get<NetworkController>(NetworkController);
  });

  it('should return the ingest summary', () => {
    const summary = { networkVersion: 2, scheduleVersion: 1, stations: 1 };
    transitData.ingestDocument.mockReturnValue(summary);
    const dto: NetworkDocumentDto = {
      stations: [{ id: 'A', capacity: 10 }],
      lines: [{ id: 'L', mode: TransportMode.BUS, stationIds: ['A', 'A'] }],
    };

    expect(controller.loadNetwork(dto)).toEqual({ success: true, data: summary });
    expect(transitData.ingestDocument).toHaveBeenCalledWith(dto);
  });

  it('should report a rejected document with its violations', () => {
    const error = new ConfigurationError('Network rejected', [
      { code: 'REPEATED_STOP', message: 'Line L stops at A twice in a row', ref: 'L' },
    ]);
    transitData.ingestDocument.mockImplementation(() => {
      throw error;
    });

    const response = controller.loadNetwork({ stations: [], lines: [] });

    expect(response.success).toBe(false);
    expect(response.error?.code).toBe('CONFIGURATION_ERROR');
    expect(response.error?.details).toEqual({ violations: error.violations });
  });

  it('should return the snapshot of the current network', () => {
    const response = controller.getSnapshot();

    expect(response.data?.version).toBe(1);
    expect(response.data?.transferPointIds).toEqual(['A', 'C', 'D']);
  });

  it('should report a missing network', () => {
    transitData.current.mockImplementationOnce(() => {
      throw ConfigurationError.single('NO_NETWORK', 'No network has been loaded');
    });

    expect(controller.getSnapshot()).toEqual({
      success: false,
      error: {
        code: 'CONFIGURATION_ERROR',
        message: 'No network has been loaded (1 violation(s))\n  - [NO_NETWORK] No network has been loaded',
        details: { violations: [{ code: 'NO_NETWORK', message: 'No network has been loaded', ref: undefined }] },
      },
    });
  });

  it('should highlight the rides of an itinerary', () => {
    const response = controller.highlight({
      rides: [
        { tripId: 'X-0800', boardStopIndex: 0, alightStopIndex: 1 },
        { tripId: 'T-0815', boardStopIndex: 0, alightStopIndex: 1 },
      ],
    });

    expect(response).toEqual({
      success: true,
      data: { stationIds: ['A', 'D', 'C'], segmentIds: ['X#0', 'T#0'], transferStationIds: ['D'] },
    });
  });
});
