// src/network/interfaces/network.interface.ts

/**
 * Transport mode of a line.
 *
 * Routing is mode-agnostic; the mode only selects transfer times, default
 * vehicle capacity and preference factors.
 */
export enum TransportMode {
  METRO = 'METRO',
  BUS = 'BUS',
  TRAIN = 'TRAIN',
}

export const TRANSPORT_MODES: readonly TransportMode[] = [
  TransportMode.METRO,
  TransportMode.BUS,
  TransportMode.TRAIN,
];

/**
 * Geographic coordinate (WGS84)
 */
export interface GeoPoint {
  lat: number;
  lng: number;
}

/**
 * Station record.
 *
 * `index` is the arena slot inside one network version; `id` is the stable
 * external identifier.
 */
export interface Station {
  id: string;
  index: number;
  name: string;
  coordinates?: GeoPoint;
  /** Lines serving this station, in line load order */
  lineIds: string[];
  /** Maximum simultaneous occupancy */
  capacity: number;
  /** Baseline estimated load at load time */
  currentLoad: number;
}

export interface Line {
  id: string;
  index: number;
  name: string;
  mode: TransportMode;
  /** Stations in service order; a station may repeat on looping lines */
  stationIds: string[];
  /** Nominal travel time per segment, length = stationIds.length - 1 */
  travelTimes: number[];
  /** Vehicle capacity class for this line */
  vehicleCapacity: number;
}

/**
 * Directed edge between two consecutive stops of a line.
 */
export interface Segment {
  /** `${lineId}#${position}` */
  id: string;
  index: number;
  lineId: string;
  /** Position of the segment on its line (0 = first hop) */
  position: number;
  fromStationId: string;
  toStationId: string;
  travelTimeMin: number;
  vehicleCapacity: number;
}

export interface StationInput {
  id: string;
  name?: string;
  coordinates?: GeoPoint;
  capacity: number;
  currentLoad?: number;
}

export interface LineInput {
  id: string;
  name?: string;
  mode: TransportMode;
  stationIds: string[];
  travelTimes?: number[];
  vehicleCapacity?: number;
}

/**
 * Explicit per-segment override applied after the lines are built.
 */
export interface SegmentInput {
  lineId: string;
  fromStationId: string;
  toStationId: string;
  travelTimeMin?: number;
  vehicleCapacity?: number;
}

/**
 * Read-only data surface consumed by visualization
 */
export interface NetworkSnapshot {
  version: number;
  stations: Station[];
  lines: Line[];
  segments: Segment[];
  transferPointIds: string[];
}

/**
 * Highlight input derived from one itinerary
 */
export interface ItineraryHighlight {
  stationIds: string[];
  segmentIds: string[];
  transferStationIds: string[];
}
