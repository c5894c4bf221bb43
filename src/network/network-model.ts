// src/network/network-model.ts

import { ConfigurationError, Violation } from '../common/errors/transit-errors';
import {
  Line,
  LineInput,
  NetworkSnapshot,
  Segment,
  SegmentInput,
  Station,
  StationInput,
  TRANSPORT_MODES,
  TransportMode,
} from './interfaces/network.interface';

/**
 * Nominal hop time used when a line is loaded without travel times (minutes)
 */
export const DEFAULT_TRAVEL_TIME_BY_MODE: Record<TransportMode, number> = {
  [TransportMode.METRO]: 2,
  [TransportMode.BUS]: 4,
  [TransportMode.TRAIN]: 3,
};

/**
 * Vehicle capacity class used when a line does not declare one
 */
export const DEFAULT_VEHICLE_CAPACITY_BY_MODE: Record<TransportMode, number> = {
  [TransportMode.METRO]: 900,
  [TransportMode.BUS]: 80,
  [TransportMode.TRAIN]: 1200,
};

export function segmentId(lineId: string, position: number): string {
  return `${lineId}#${position}`;
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Static graph of stations, lines and directed segments.
 *
 * Records live in arrays and are addressed by index. A model is mutable
 * while it is being built; `freeze()` makes it a read-only version that any
 * number of queries may share, and deep-freezes every record it hands out. Updates go through `clone()`, which returns a
 * mutable copy carrying the next version number.
 */
export class NetworkModel {
  private readonly stationList: Station[] = [];
  private readonly stationIndexById = new Map<string, number>();
  private readonly lineList: Line[] = [];
  private readonly lineIndexById = new Map<string, number>();
  private readonly segmentList: Segment[] = [];
  /** Outgoing segment indexes per station index */
  private readonly outgoing: number[][] = [];
  /** Segment indexes per line index, by position */
  private readonly lineSegments: number[][] = [];
  private transferPointCache: Station[] | null = null;
  private frozen = false;

  constructor(readonly version: number = 1) {}

  get isFrozen(): boolean {
    return this.frozen;
  }

  // ============================================
  // Mutation
  // ============================================

  addStation(input: StationInput): Station {
    this.assertMutable();
    const violations = NetworkModel.validateStation(input, this.stationIndexById);
    if (violations.length > 0) {
      throw new ConfigurationError(`Station ${input.id} rejected`, violations);
    }

    const station: Station = {
      id: input.id,
      index: this.stationList.length,
      name: input.name ?? input.id,
      coordinates: input.coordinates ? { ...input.coordinates } : undefined,
      lineIds: [],
      capacity: input.capacity,
      currentLoad: input.currentLoad ?? 0,
    };
    this.stationList.push(station);
    this.stationIndexById.set(station.id, station.index);
    this.outgoing.push([]);
    this.invalidate();
    return station;
  }

  addLine(input: LineInput): Line {
    this.assertMutable();
    const violations = this.validateLine(input);
    if (violations.length > 0) {
      throw new ConfigurationError(`Line ${input.id} rejected`, violations);
    }

    const hops = input.stationIds.length - 1;
    const travelTimes =
      input.travelTimes !== undefined
        ? [...input.travelTimes]
        : Array.from({ length: hops }, () => DEFAULT_TRAVEL_TIME_BY_MODE[input.mode]);
    const line: Line = {
      id: input.id,
      index: this.lineList.length,
      name: input.name ?? input.id,
      mode: input.mode,
      stationIds: [...input.stationIds],
      travelTimes,
      vehicleCapacity: input.vehicleCapacity ?? DEFAULT_VEHICLE_CAPACITY_BY_MODE[input.mode],
    };
    this.lineList.push(line);
    this.lineIndexById.set(line.id, line.index);
    this.lineSegments.push([]);

    for (let position = 0; position < hops; position++) {
      const from = this.requireStation(line.stationIds[position]);
      const to = this.requireStation(line.stationIds[position + 1]);
      const segment: Segment = {
        id: segmentId(line.id, position),
        index: this.segmentList.length,
        lineId: line.id,
        position,
        fromStationId: from.id,
        toStationId: to.id,
        travelTimeMin: travelTimes[position],
        vehicleCapacity: line.vehicleCapacity,
      };
      this.segmentList.push(segment);
      this.outgoing[from.index].push(segment.index);
      this.lineSegments[line.index].push(segment.index);
    }

    for (const stationId of new Set(line.stationIds)) {
      this.requireStation(stationId).lineIds.push(line.id);
    }
    this.invalidate();
    return line;
  }

  /**
   * Override the attributes of one existing segment.
   *
   * The pair must be consecutive on the named line; on a looping line every
   * matching position is updated.
   */
  applySegment(input: SegmentInput): Segment[] {
    this.assertMutable();
    const violations = this.validateSegment(input);
    if (violations.length > 0) {
      throw new ConfigurationError(`Segment ${input.fromStationId}->${input.toStationId} rejected`, violations);
    }

    const matches = this.segmentsOfLine(input.lineId).filter(
      (s) => s.fromStationId === input.fromStationId && s.toStationId === input.toStationId
    );
    const line = this.requireLine(input.lineId);
    for (const segment of matches) {
      if (input.travelTimeMin !== undefined) {
        segment.travelTimeMin = input.travelTimeMin;
        line.travelTimes[segment.position] = input.travelTimeMin;
      }
      if (input.vehicleCapacity !== undefined) {
        segment.vehicleCapacity = input.vehicleCapacity;
      }
    }
    this.invalidate();
    return matches;
  }

  /**
   * Make this version read-only. Returns `this` for chaining.
   */
  freeze(): this {
    if (this.frozen) {
      return this;
    }
    for (const station of this.stationList) {
      Object.freeze(station.lineIds);
      if (station.coordinates) {
        Object.freeze(station.coordinates);
      }
      Object.freeze(station);
    }
    for (const line of this.lineList) {
      Object.freeze(line.stationIds);
      Object.freeze(line.travelTimes);
      Object.freeze(line);
    }
    this.segmentList.forEach((segment) => Object.freeze(segment));
    Object.freeze(this.stationList);
    Object.freeze(this.lineList);
    Object.freeze(this.segmentList);
    this.frozen = true;
    return this;
  }

  /**
   * Mutable deep copy with the next version number.
   */
  clone(): NetworkModel {
    const copy = new NetworkModel(this.version + 1);
    for (const station of this.stationList) {
      copy.addStation({
        id: station.id,
        name: station.name,
        coordinates: station.coordinates,
        capacity: station.capacity,
        currentLoad: station.currentLoad,
      });
    }
    for (const line of this.lineList) {
      copy.addLine({
        id: line.id,
        name: line.name,
        mode: line.mode,
        stationIds: line.stationIds,
        travelTimes: line.travelTimes,
        vehicleCapacity: line.vehicleCapacity,
      });
    }
    for (const segment of this.segmentList) {
      const copied = copy.segmentList[segment.index];
      copied.vehicleCapacity = segment.vehicleCapacity;
    }
    return copy;
  }

  // ============================================
  // Queries
  // ============================================

  hasStation(id: string): boolean {
    return this.stationIndexById.has(id);
  }

  station(id: string): Station | undefined {
    const index = this.stationIndexById.get(id);
    return index === undefined ? undefined : this.stationList[index];
  }

  requireStation(id: string): Station {
    const station = this.station(id);
    if (!station) {
      throw ConfigurationError.single('UNKNOWN_STATION', `Unknown station ${id}`, id);
    }
    return station;
  }

  stationAt(index: number): Station {
    return this.stationList[index];
  }

  line(id: string): Line | undefined {
    const index = this.lineIndexById.get(id);
    return index === undefined ? undefined : this.lineList[index];
  }

  requireLine(id: string): Line {
    const line = this.line(id);
    if (!line) {
      throw ConfigurationError.single('UNKNOWN_LINE', `Unknown line ${id}`, id);
    }
    return line;
  }

  stations(): readonly Station[] {
    return this.stationList;
  }

  lines(): readonly Line[] {
    return this.lineList;
  }

  segments(): readonly Segment[] {
    return this.segmentList;
  }

  get stationCount(): number {
    return this.stationList.length;
  }

  /**
   * Outgoing segments of a station.
   */
  segmentsOf(stationId: string): Segment[] {
    const station = this.requireStation(stationId);
    return this.outgoing[station.index].map((i) => this.segmentList[i]);
  }

  segmentsOfLine(lineId: string): Segment[] {
    const index = this.lineIndexById.get(lineId);
    return index === undefined ? [] : this.lineSegments[index].map((i) => this.segmentList[i]);
  }

  /**
   * Segment at a position of a line.
   */
  segmentAt(lineId: string, position: number): Segment | undefined {
    const index = this.lineIndexById.get(lineId);
    if (index === undefined) {
      return undefined;
    }
    const segmentIndex = this.lineSegments[index][position];
    return segmentIndex === undefined ? undefined : this.segmentList[segmentIndex];
  }

  lineOf(segment: Segment): Line {
    return this.requireLine(segment.lineId);
  }

  /**
   * Stations served by two or more distinct lines. Returns a fresh array.
   */
  transferPoints(): Station[] {
    if (this.transferPointCache === null) {
      this.transferPointCache = this.stationList.filter((s) => s.lineIds.length >= 2);
    }
    return [...this.transferPointCache];
  }

  isTransferPoint(stationId: string): boolean {
    return (this.station(stationId)?.lineIds.length ?? 0) >= 2;
  }

  snapshot(): NetworkSnapshot {
    return {
      version: this.version,
      stations: this.stationList.map((s) => ({
        ...s,
        coordinates: s.coordinates ? { ...s.coordinates } : undefined,
        lineIds: [...s.lineIds],
      })),
      lines: this.lineList.map((l) => ({
        ...l,
        stationIds: [...l.stationIds],
        travelTimes: [...l.travelTimes],
      })),
      segments: this.segmentList.map((s) => ({ ...s })),
      transferPointIds: this.transferPoints().map((s) => s.id),
    };
  }

  // ============================================
  // Validation
  // ============================================

  static validateStation(input: StationInput, known: ReadonlyMap<string, number>): Violation[] {
    const violations: Violation[] = [];
    if (typeof input.id !== 'string' || input.id.trim() === '') {
      violations.push({ code: 'INVALID_STATION_ID', message: 'Station id must be a non-empty string' });
      return violations;
    }
    if (known.has(input.id)) {
      violations.push({
        code: 'DUPLICATE_STATION',
        message: `Station ${input.id} is defined more than once`,
        ref: input.id,
      });
    }
    if (!isNonNegativeNumber(input.capacity)) {
      violations.push({
        code: 'INVALID_CAPACITY',
        message: `Station ${input.id} capacity must be a non-negative number`,
        ref: input.id,
      });
    }
    if (input.currentLoad !== undefined && !isNonNegativeNumber(input.currentLoad)) {
      violations.push({
        code: 'INVALID_LOAD',
        message: `Station ${input.id} load must be a non-negative number`,
        ref: input.id,
      });
    }
    return violations;
  }

  private validateLine(input: LineInput): Violation[] {
    const violations: Violation[] = [];
    const ref = input.id;
    if (typeof input.id !== 'string' || input.id.trim() === '') {
      violations.push({ code: 'INVALID_LINE_ID', message: 'Line id must be a non-empty string' });
      return violations;
    }
    if (this.lineIndexById.has(input.id)) {
      violations.push({ code: 'DUPLICATE_LINE', message: `Line ${ref} is defined more than once`, ref });
    }
    if (!TRANSPORT_MODES.includes(input.mode)) {
      violations.push({
        code: 'INVALID_MODE',
        message: `Line ${ref} mode must be one of ${TRANSPORT_MODES.join(', ')}`,
        ref,
      });
    }
    if (input.stationIds.length < 2) {
      violations.push({ code: 'LINE_TOO_SHORT', message: `Line ${ref} must serve at least 2 stations`, ref });
    }
    input.stationIds.forEach((stationId, i) => {
      if (!this.stationIndexById.has(stationId)) {
        violations.push({
          code: 'UNKNOWN_STATION',
          message: `Line ${ref} stop ${i} references unknown station ${stationId}`,
          ref,
        });
      }
      if (i > 0 && input.stationIds[i - 1] === stationId) {
        violations.push({
          code: 'REPEATED_STOP',
          message: `Line ${ref} stops at ${stationId} twice in a row`,
          ref,
        });
      }
    });
    if (input.travelTimes !== undefined) {
      if (input.travelTimes.length !== Math.max(0, input.stationIds.length - 1)) {
        violations.push({
          code: 'TRAVEL_TIME_COUNT',
          message: `Line ${ref} has ${input.travelTimes.length} travel times for ${input.stationIds.length} stops`,
          ref,
        });
      }
      input.travelTimes.forEach((t, i) => {
        if (!isNonNegativeNumber(t)) {
          violations.push({
            code: 'INVALID_TRAVEL_TIME',
            message: `Line ${ref} travel time ${i} must be a non-negative number`,
            ref,
          });
        }
      });
    }
    if (input.vehicleCapacity !== undefined && !isNonNegativeNumber(input.vehicleCapacity)) {
      violations.push({
        code: 'INVALID_CAPACITY',
        message: `Line ${ref} vehicle capacity must be a non-negative number`,
        ref,
      });
    }
    return violations;
  }

  private validateSegment(input: SegmentInput): Violation[] {
    const violations: Violation[] = [];
    const ref = `${input.lineId}:${input.fromStationId}->${input.toStationId}`;
    for (const stationId of [input.fromStationId, input.toStationId]) {
      if (!this.stationIndexById.has(stationId)) {
        violations.push({
          code: 'DANGLING_SEGMENT',
          message: `Segment ${ref} references unknown station ${stationId}`,
          ref,
        });
      }
    }
    const line = this.line(input.lineId);
    if (!line) {
      violations.push({
        code: 'UNKNOWN_LINE',
        message: `Segment ${ref} references unknown line ${input.lineId}`,
        ref,
      });
    } else if (violations.length === 0) {
      const consecutive = this.segmentsOfLine(line.id).some(
        (s) => s.fromStationId === input.fromStationId && s.toStationId === input.toStationId
      );
      if (!consecutive) {
        violations.push({
          code: 'NOT_CONSECUTIVE',
          message: `Segment ${ref} is not a consecutive pair of line ${line.id}`,
          ref,
        });
      }
    }
    if (input.travelTimeMin !== undefined && !isNonNegativeNumber(input.travelTimeMin)) {
      violations.push({ code: 'INVALID_TRAVEL_TIME', message: `Segment ${ref} travel time must be non-negative`, ref });
    }
    if (input.vehicleCapacity !== undefined && !isNonNegativeNumber(input.vehicleCapacity)) {
      violations.push({ code: 'INVALID_CAPACITY', message: `Segment ${ref} vehicle capacity must be non-negative`, ref });
    }
    return violations;
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw ConfigurationError.single(
        'NETWORK_FROZEN',
        `Network version ${this.version} is read-only; clone it to apply changes`
      );
    }
  }

  private invalidate(): void {
    this.transferPointCache = null;
  }
}
