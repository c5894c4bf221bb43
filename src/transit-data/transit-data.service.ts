// src/transit-data/transit-data.service.ts
import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { readFile } from 'fs/promises';
import { CapacityService } from '../capacity/capacity.service';
import { ConfigurationError, Violation } from '../common/errors/transit-errors';
import { transitConfig, TransitConfig } from '../config/transit.config';
import { LineInput, SegmentInput, StationInput } from '../network/interfaces/network.interface';
import { NetworkService } from '../network/network.service';
import {
  HeadwayServiceInput,
  TimetableLoadMode,
  TimetableLoadReport,
  TripInput,
} from '../schedule/interfaces/schedule.interface';
import { ScheduleIndex } from '../schedule/schedule-index';
import { ScheduleService } from '../schedule/schedule.service';
import { Itinerary } from '../route-planner/interfaces/itinerary.interface';
import { RideRef } from '../route-planner/interfaces/plan-route.interface';
import { resolveItinerary } from '../route-planner/utils/itinerary-resolver';
import { NetworkDocumentDto } from './dto/network-document.dto';
import { IngestSummary, NetworkDocument, TransitDataVersion } from './interfaces/transit-data.interface';

/**
 * Flatten nested class-validator errors into violations with dotted paths.
 */
export function toViolations(errors: ValidationError[], parentPath = ''): Violation[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => ({
      code: 'INVALID_DOCUMENT',
      message: `${path}: ${message}`,
      ref: path,
    }));
    return [...own, ...toViolations(error.children ?? [], path)];
  });
}

/**
 * Holder of the current network, timetable and live capacity tracker.
 *
 * Every load builds new frozen versions and then swaps the reference, so a
 * query that already read `current()` keeps a consistent view.
 */
@Injectable()
export class TransitDataService implements OnModuleInit {
  private readonly logger = new Logger(TransitDataService.name);
  private state: TransitDataVersion | null = null;

  constructor(
    @Inject(transitConfig.KEY) private readonly config: TransitConfig,
    private readonly networkService: NetworkService,
    private readonly scheduleService: ScheduleService,
    private readonly capacityService: CapacityService
  ) {}

  async onModuleInit(): Promise<void> {
    if (!this.config.networkFile) {
      return;
    }
    const summary = await this.loadFile(this.config.networkFile);
    this.logger.log(
      `Loaded ${this.config.networkFile}: network v${summary.networkVersion}, ` +
        `${summary.trips} trip(s) in timetable v${summary.scheduleVersion}`
    );
  }

  get isLoaded(): boolean {
    return this.state !== null;
  }

  /**
   * Current data version. Throws until a network has been loaded.
   */
  current(): TransitDataVersion {
    if (!this.state) {
      throw ConfigurationError.single('NO_NETWORK', 'No network has been loaded');
    }
    return this.state;
  }

  /**
   * Publish a new network version. The timetable starts empty and the
   * capacity tracker starts from the stations' baseline loads.
   */
  loadNetwork(stations: StationInput[], lines: LineInput[], segments: SegmentInput[] = []): TransitDataVersion {
    const network = this.networkService.loadNetwork(stations, lines, segments, this.state?.network);
    const schedule = new ScheduleIndex(network, 1).freeze();
    this.state = { network, schedule, tracker: this.capacityService.createTracker(network) };
    return this.state;
  }

  /**
   * Publish trips on top of the current timetable.
   */
  loadTimetable(trips: TripInput[], mode: TimetableLoadMode = 'strict'): TimetableLoadReport<ScheduleIndex> {
    const current = this.current();
    const report = this.scheduleService.loadTimetable(current.network, trips, {
      mode,
      previous: current.schedule,
    });
    this.state = { ...current, schedule: report.index };
    return report;
  }

  /**
   * Generate regular-interval trips and publish them.
   */
  generateService(
    services: HeadwayServiceInput[],
    mode: TimetableLoadMode = 'strict'
  ): TimetableLoadReport<ScheduleIndex> {
    const current = this.current();
    const trips = this.scheduleService.generateService(current.network, services);
    const report = this.scheduleService.loadTimetable(current.network, trips, {
      mode,
      previous: current.schedule,
    });
    this.state = { ...current, schedule: report.index };
    return report;
  }

  /**
   * Load a whole document: topology, then explicit trips, then generated
   * service. Nothing is published unless the network itself is valid; the
   * timetable follows `timetableMode` (strict by default).
   */
  ingestDocument(document: NetworkDocument): IngestSummary {
    const previous = this.state;
    const network = this.networkService.loadNetwork(
      document.stations,
      document.lines,
      document.segments ?? [],
      previous?.network
    );

    const mode = document.timetableMode ?? 'strict';
    const trips = [
      ...(document.trips ?? []),
      ...this.scheduleService.generateService(network, document.services ?? []),
    ];
    const report = this.scheduleService.loadTimetable(network, trips, { mode });

    this.state = {
      network,
      schedule: report.index,
      tracker: this.capacityService.createTracker(network),
    };

    return {
      networkVersion: network.version,
      scheduleVersion: report.index.version,
      stations: network.stationCount,
      lines: network.lines().length,
      segments: network.segments().length,
      transferPoints: network.transferPoints().length,
      trips: report.index.size,
      rejectedTrips: report.rejected.map((r) => ({ tripId: r.tripId, violations: r.error.violations.length })),
    };
  }

  /**
   * Full itinerary for ride references on the current (or given) version.
   */
  resolveItinerary(rides: RideRef[], data: TransitDataVersion = this.current()): Itinerary {
    return resolveItinerary(data, rides, this.config.transfer);
  }

  /**
   * Validate a plain JSON value as a network document.
   */
  async parseDocument(raw: unknown): Promise<NetworkDocument> {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw ConfigurationError.single('INVALID_DOCUMENT', 'Network document must be a JSON object');
    }
    const dto = plainToInstance(NetworkDocumentDto, raw);
    const errors = await validate(dto, { whitelist: true, forbidUnknownValues: false });
    if (errors.length > 0) {
      throw new ConfigurationError('Network document rejected', toViolations(errors));
    }
    return dto;
  }

  /**
   * Read, validate and ingest a network document from disk.
   */
  async loadFile(filePath: string): Promise<IngestSummary> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw ConfigurationError.single('FILE_NOT_READABLE', `Cannot read ${filePath}: ${reason}`, filePath);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw ConfigurationError.single('INVALID_JSON', `${filePath} is not valid JSON: ${reason}`, filePath);
    }

    return this.ingestDocument(await this.parseDocument(raw));
  }
}
