// src/network/network.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigurationError, Violation } from '../common/errors/transit-errors';
import { Itinerary } from '../route-planner/interfaces/itinerary.interface';
import {
  ItineraryHighlight,
  LineInput,
  NetworkSnapshot,
  SegmentInput,
  StationInput,
} from './interfaces/network.interface';
import { NetworkModel } from './network-model';

/**
 * Network ingestion and the read-only query surface for visualization.
 */
@Injectable()
export class NetworkService {
  private readonly logger = new Logger(NetworkService.name);

  /**
   * Build a frozen network version from bulk input.
   *
   * Every record is checked; all violations are reported together in one
   * ConfigurationError and nothing is returned unless the whole input is
   * consistent.
   *
   * @param previous version being replaced; the new model gets its version + 1
   */
  loadNetwork(
    stations: StationInput[],
    lines: LineInput[],
    segments: SegmentInput[] = [],
    previous?: NetworkModel
  ): NetworkModel {
    const model = new NetworkModel(previous ? previous.version + 1 : 1);
    const violations: Violation[] = [];

    const collect = (action: () => void): void => {
      try {
        action();
      } catch (error) {
        if (error instanceof ConfigurationError) {
          violations.push(...error.violations);
          return;
        }
        throw error;
      }
    };

    for (const station of stations) {
      collect(() => model.addStation(station));
    }
    for (const line of lines) {
      collect(() => model.addLine(line));
    }
    for (const segment of segments) {
      collect(() => model.applySegment(segment));
    }

    if (violations.length > 0) {
      this.logger.warn(`Network rejected with ${violations.length} violation(s)`);
      throw new ConfigurationError('Network rejected', violations);
    }

    model.freeze();
    this.logger.log(
      `Network v${model.version} loaded: ${model.stationCount} stations, ` +
        `${model.lines().length} lines, ${model.segments().length} segments, ` +
        `${model.transferPoints().length} transfer points`
    );
    return model;
  }

  networkSnapshot(model: NetworkModel): NetworkSnapshot {
    return model.snapshot();
  }

  /**
   * Stations and segments an itinerary touches, for highlighting.
   */
  highlight(model: NetworkModel, itinerary: Itinerary): ItineraryHighlight {
    const stationIds: string[] = [];
    const segmentIds: string[] = [];
    const transferStationIds: string[] = [];
    const seen = new Set<string>();
    const addStation = (id: string): void => {
      if (!seen.has(id)) {
        seen.add(id);
        stationIds.push(id);
      }
    };

    addStation(itinerary.originId);
    for (const leg of itinerary.legs) {
      if (leg.kind === 'TRANSFER') {
        transferStationIds.push(leg.fromStationId);
        addStation(leg.fromStationId);
        continue;
      }
      leg.stationIds.forEach(addStation);
      segmentIds.push(...leg.segmentIds);
    }
    addStation(itinerary.destinationId);

    const unknown = stationIds.filter((id) => !model.hasStation(id));
    if (unknown.length > 0) {
      throw new ConfigurationError(
        `Itinerary does not belong to network v${model.version}`,
        unknown.map((id) => ({ code: 'UNKNOWN_STATION', message: `Unknown station ${id}`, ref: id }))
      );
    }
    return { stationIds, segmentIds, transferStationIds };
  }
}
