// src/route-planner/route-search.ts

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { MinHeap } from '../common/utils/min-heap.util';
import { Itinerary, Leg, PlanRouteResult, RideLeg } from './interfaces/itinerary.interface';
import {
  Label,
  RideEdge,
  SearchContext,
  SearchEdge,
  SearchLimits,
  SearchQuery,
} from './interfaces/route-search.interface';

const EPSILON = 1e-9;

function compareCost(a: number, b: number): number {
  return Math.abs(a - b) <= EPSILON ? 0 : a - b;
}

/**
 * Queue order: fewer over-capacity crossings, then cost, then fewer
 * transfers, then earlier arrival, then creation order.
 */
export function compareLabels(a: Label, b: Label): number {
  return (
    a.overCapacity - b.overCapacity ||
    compareCost(a.cost, b.cost) ||
    a.transfers - b.transfers ||
    a.timeMin - b.timeMin ||
    a.id - b.id
  );
}

/**
 * True when `a` is at least as good as `b` on every criterion.
 */
export function dominates(a: Label, b: Label): boolean {
  return (
    a.overCapacity <= b.overCapacity &&
    a.cost <= b.cost + EPSILON &&
    a.timeMin <= b.timeMin &&
    a.transfers <= b.transfers &&
    a.crowding <= b.crowding + EPSILON
  );
}

/**
 * One time-dependent multi-criteria search over the schedule.
 *
 * Best-first over labels (station, time, boarded line), ordered by the
 * query's cost function, with labels that crossed an over-capacity station
 * or trip segment ranked behind every feasible one. Each (station, line) bucket keeps a bounded set of
 * mutually non-dominated labels, so itineraries that lose on time but win on
 * transfers or crowding survive. Time never decreases along an edge and
 * equal labels are discarded, so cyclic lines cannot loop forever.
 *
 * An instance is single-use and holds all per-query state.
 */
export class RouteSearch {
  private readonly queue = new MinHeap<Label>(compareLabels);
  private readonly buckets = new Map<string, Label[]>();
  private readonly results: Itinerary[] = [];
  private readonly signatures = new Set<string>();
  private readonly bucketCap: number;
  private nextId = 0;
  private expanded = 0;
  private truncated = false;
  private finished = false;

  constructor(
    private readonly ctx: SearchContext,
    private readonly query: SearchQuery,
    private readonly limits: SearchLimits
  ) {
    this.bucketCap = Math.max(query.k, limits.maxLabelsPerStation);
    this.push(this.createLabel(query.originId, query.departAfterMin, null, null, null, 0, 0, 0, 0));
  }

  get expandedLabels(): number {
    return this.expanded;
  }

  /**
   * Run to completion on the calling stack.
   */
  runSync(): PlanRouteResult {
    while (!this.step(Number.POSITIVE_INFINITY)) {
      // step() returns true once finished
    }
    return this.result();
  }

  /**
   * Run to completion, yielding to the event loop every `yieldEvery` pops so
   * concurrent queries interleave.
   */
  async run(): Promise<PlanRouteResult> {
    while (!this.step(this.limits.yieldEvery)) {
      await yieldToEventLoop();
    }
    return this.result();
  }

  /**
   * Process up to `budget` queue pops. Returns true when the search is over.
   */
  step(budget: number): boolean {
    let pops = 0;
    while (!this.finished && pops < budget) {
      if (this.results.length >= this.query.k) {
        this.finished = true;
        break;
      }
      if (this.limits.now() >= this.query.deadlineMs || this.expanded >= this.limits.maxExpansions) {
        this.truncated = true;
        this.finished = true;
        break;
      }
      const label = this.queue.pop();
      if (!label) {
        this.finished = true;
        break;
      }
      pops++;
      if (label.dead) {
        continue;
      }
      this.expanded++;

      if (label.stationId === this.query.destinationId) {
        this.finalize(label);
        continue;
      }
      this.expand(label);
    }
    return this.finished;
  }

  result(): PlanRouteResult {
    const itineraries = this.truncated
      ? this.results.map((itinerary) => ({ ...itinerary, truncated: true }))
      : this.results;
    return {
      itineraries,
      truncated: this.truncated,
      exhausted: !this.truncated && this.results.length < this.query.k,
      expandedLabels: this.expanded,
      networkVersion: this.ctx.network.version,
      scheduleVersion: this.ctx.schedule.version,
    };
  }

  // ============================================
  // Expansion
  // ============================================

  private expand(label: Label): void {
    const station = this.ctx.network.requireStation(label.stationId);
    const boardable = label.lineId === null ? station.lineIds : [label.lineId];

    for (const lineId of boardable) {
      this.expandRide(label, lineId);
    }

    if (label.lineId !== null) {
      for (const lineId of station.lineIds) {
        if (lineId !== label.lineId) {
          this.expandTransfer(label, label.lineId, lineId);
        }
      }
    }
  }

  private expandRide(label: Label, lineId: string): void {
    const { network, schedule, tracker, costFunction } = this.ctx;
    const departure = schedule.nextDeparture(label.stationId, lineId, label.timeMin);
    if (departure.kind === 'NO_MORE_SERVICE') {
      return;
    }

    const { trip, stopIndex, departureMin } = departure;
    const next = trip.stops[stopIndex + 1];
    const line = network.requireLine(lineId);
    const segment = network.segmentAt(lineId, stopIndex);
    const segmentId = segment ? segment.id : `${lineId}#${stopIndex}`;

    const stationPenalty = tracker.stationPenalty(next.stationId);
    const segmentPenalty = tracker.segmentPenalty(trip.id, segmentId);
    const crowding = stationPenalty + segmentPenalty;
    const overCapacity =
      (tracker.estimatedLoad(next.stationId) > network.requireStation(next.stationId).capacity ? 1 : 0) +
      (segment && tracker.estimatedLoad(trip.id, segmentId) > segment.vehicleCapacity ? 1 : 0);

    const edge: RideEdge = {
      kind: 'RIDE',
      tripId: trip.id,
      lineId,
      mode: line.mode,
      fromStopIndex: stopIndex,
      toStopIndex: stopIndex + 1,
      fromStationId: label.stationId,
      toStationId: next.stationId,
      segmentId,
      departureMin,
      arrivalMin: next.arrivalMin,
      stationPenalty,
      segmentPenalty,
    };
    const cost = costFunction.legCost({
      durationMin: next.arrivalMin - departureMin,
      waitMin: departureMin - label.timeMin,
      isTransfer: false,
      crowdingPenalty: crowding,
      mode: line.mode,
    });

    this.push(
      this.createLabel(
        next.stationId,
        next.arrivalMin,
        lineId,
        label,
        edge,
        label.cost + cost,
        label.transfers,
        label.crowding + crowding,
        label.overCapacity + overCapacity
      )
    );
  }

  private expandTransfer(label: Label, fromLineId: string, toLineId: string): void {
    const { network, costFunction, transfer } = this.ctx;
    const sameMode = network.requireLine(fromLineId).mode === network.requireLine(toLineId).mode;
    const minutes = sameMode ? transfer.sameModeMin : transfer.crossModeMin;

    const cost = costFunction.legCost({
      durationMin: minutes,
      isTransfer: true,
      crowdingPenalty: 0,
    });
    this.push(
      this.createLabel(
        label.stationId,
        label.timeMin + minutes,
        toLineId,
        label,
        {
          kind: 'TRANSFER',
          stationId: label.stationId,
          fromLineId,
          toLineId,
          departureMin: label.timeMin,
          arrivalMin: label.timeMin + minutes,
        },
        label.cost + cost,
        label.transfers + 1,
        label.crowding,
        label.overCapacity
      )
    );
  }

  // ============================================
  // Labels
  // ============================================

  private createLabel(
    stationId: string,
    timeMin: number,
    lineId: string | null,
    parent: Label | null,
    edge: SearchEdge | null,
    cost: number,
    transfers: number,
    crowding: number,
    overCapacity: number
  ): Label {
    return {
      id: this.nextId++,
      stationId,
      timeMin,
      lineId,
      cost,
      transfers,
      crowding,
      overCapacity,
      parent,
      edge,
      dead: false,
    };
  }

  /**
   * Queue a label unless a kept label in its bucket dominates it.
   */
  private push(label: Label): void {
    const key = `${label.stationId}\u0000${label.lineId ?? ''}`;
    const bucket = this.buckets.get(key) ?? [];

    if (bucket.some((kept) => dominates(kept, label))) {
      return;
    }

    const survivors: Label[] = [];
    for (const kept of bucket) {
      if (dominates(label, kept)) {
        kept.dead = true;
      } else {
        survivors.push(kept);
      }
    }
    survivors.push(label);
    survivors.sort(compareLabels);
    while (survivors.length > this.bucketCap) {
      const evicted = survivors.pop();
      if (evicted) {
        evicted.dead = true;
      }
    }
    this.buckets.set(key, survivors);

    if (!label.dead) {
      this.queue.push(label);
    }
  }

  // ============================================
  // Itinerary reconstruction
  // ============================================

  private finalize(label: Label): void {
    const itinerary = this.buildItinerary(label);
    const signature = itinerary.legs
      .map((leg) =>
        leg.kind === 'RIDE'
          ? `R:${leg.tripId}:${leg.boardStopIndex}-${leg.alightStopIndex}`
          : `T:${leg.fromStationId}:${leg.fromLineId}>${leg.toLineId}`
      )
      .join('|');
    if (this.signatures.has(signature)) {
      return;
    }
    this.signatures.add(signature);
    this.results.push(itinerary);
  }

  private buildItinerary(label: Label): Itinerary {
    const edges: SearchEdge[] = [];
    for (let cursor: Label | null = label; cursor !== null; cursor = cursor.parent) {
      if (cursor.edge) {
        edges.push(cursor.edge);
      }
    }
    edges.reverse();

    const legs: Leg[] = [];
    const crowdingPenalties: Record<string, number> = {};
    let current: RideLeg | null = null;

    for (const edge of edges) {
      if (edge.kind === 'TRANSFER') {
        current = null;
        legs.push({
          kind: 'TRANSFER',
          fromStationId: edge.stationId,
          toStationId: edge.stationId,
          fromLineId: edge.fromLineId,
          toLineId: edge.toLineId,
          departureMin: edge.departureMin,
          arrivalMin: edge.arrivalMin,
        });
        continue;
      }

      crowdingPenalties[edge.toStationId] = (crowdingPenalties[edge.toStationId] ?? 0) + edge.stationPenalty;

      if (current && current.tripId === edge.tripId && current.alightStopIndex === edge.fromStopIndex) {
        current.toStationId = edge.toStationId;
        current.alightStopIndex = edge.toStopIndex;
        current.stationIds.push(edge.toStationId);
        current.segmentIds.push(edge.segmentId);
        current.arrivalMin = edge.arrivalMin;
        continue;
      }

      current = {
        kind: 'RIDE',
        fromStationId: edge.fromStationId,
        toStationId: edge.toStationId,
        lineId: edge.lineId,
        mode: edge.mode,
        tripId: edge.tripId,
        boardStopIndex: edge.fromStopIndex,
        alightStopIndex: edge.toStopIndex,
        stationIds: [edge.fromStationId, edge.toStationId],
        segmentIds: [edge.segmentId],
        departureMin: edge.departureMin,
        arrivalMin: edge.arrivalMin,
      };
      legs.push(current);
    }

    const departAfterMin = this.query.departAfterMin;
    const firstRide = legs.find((leg) => leg.kind === 'RIDE');
    let inVehicleMin = 0;
    let transferMin = 0;
    for (const leg of legs) {
      if (leg.kind === 'RIDE') {
        inVehicleMin += leg.arrivalMin - leg.departureMin;
      } else {
        transferMin += leg.arrivalMin - leg.departureMin;
      }
    }
    const totalDurationMin = label.timeMin - departAfterMin;

    return {
      originId: this.query.originId,
      destinationId: this.query.destinationId,
      departAfterMin,
      legs,
      departureMin: firstRide ? firstRide.departureMin : departAfterMin,
      arrivalMin: label.timeMin,
      totalDurationMin,
      inVehicleMin,
      waitMin: totalDurationMin - inVehicleMin - transferMin,
      transferCount: label.transfers,
      crowdingPenalties,
      totalCrowdingPenalty: label.crowding,
      cost: label.cost,
      truncated: false,
    };
  }
}
