// src/route-planner/route-planner.service.ts
import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigurationError, InvalidPreferenceError, Violation } from '../common/errors/transit-errors';
import { minToHhmm, parseHhmm } from '../common/utils/time.util';
import { transitConfig, TransitConfig } from '../config/transit.config';
import { CostFunction } from '../preferences/cost-function';
import { PreferenceResolverService } from '../preferences/preference-resolver.service';
import { TransitDataVersion } from '../transit-data/interfaces/transit-data.interface';
import { PlanRouteResult } from './interfaces/itinerary.interface';
import { PlanRouteRequest } from './interfaces/plan-route.interface';
import { SearchQuery } from './interfaces/route-search.interface';
import { RouteSearch } from './route-search';

/** Injection token for the millisecond clock used by search deadlines */
export const PLANNER_CLOCK = 'PLANNER_CLOCK';

export type PlannerClock = () => number;

/**
 * Route queries against one frozen data version.
 *
 * Stateless between calls: every query builds its own RouteSearch, so
 * concurrent queries share nothing but the frozen models and the live
 * capacity tracker (read-only during a search).
 */
@Injectable()
export class RoutePlannerService {
  private readonly logger = new Logger(RoutePlannerService.name);
  private readonly now: PlannerClock;

  constructor(
    @Inject(transitConfig.KEY) private readonly config: TransitConfig,
    private readonly preferenceResolver: PreferenceResolverService,
    @Optional() @Inject(PLANNER_CLOCK) clock?: PlannerClock
  ) {
    this.now = clock ?? Date.now;
  }

  /**
   * Up to K itineraries ordered by cost.
   *
   * An empty result is not an error; neither is a truncated one.
   */
  async planRoute(data: TransitDataVersion, request: PlanRouteRequest): Promise<PlanRouteResult> {
    const search = this.createSearch(data, request);
    const result = await search.run();
    this.logResult(request, result);
    return result;
  }

  /**
   * Same as `planRoute` without yielding to the event loop.
   */
  planRouteSync(data: TransitDataVersion, request: PlanRouteRequest): PlanRouteResult {
    const result = this.createSearch(data, request).runSync();
    this.logResult(request, result);
    return result;
  }

  /**
   * Cost function for a request: explicit weights, else a preset, else balanced.
   */
  resolveCostFunction(request: Pick<PlanRouteRequest, 'preferences' | 'preset'>): CostFunction {
    if (request.preferences !== undefined) {
      return this.preferenceResolver.resolve(request.preferences);
    }
    return this.preferenceResolver.resolvePreset(request.preset ?? 'balanced');
  }

  // ============================================
  // Query preparation
  // ============================================

  private createSearch(data: TransitDataVersion, request: PlanRouteRequest): RouteSearch {
    const { network } = data;
    const stationViolations: Violation[] = [];
    for (const stationId of [request.originId, request.destinationId]) {
      if (!network.hasStation(stationId)) {
        stationViolations.push({ code: 'UNKNOWN_STATION', message: `Unknown station ${stationId}`, ref: stationId });
      }
    }
    if (stationViolations.length > 0) {
      throw new ConfigurationError(`Stations not in network v${network.version}`, stationViolations);
    }

    const planner = this.config.planner;
    const queryViolations: Violation[] = [];
    const departAfterMin = this.parseDepartAfter(request.departAfter);
    if (departAfterMin === null) {
      queryViolations.push({
        code: 'INVALID_DEPARTURE_TIME',
        message: `Departure time "${request.departAfter}" is not a valid HH:mm time`,
        ref: 'departAfter',
      });
    }
    const k = request.k ?? planner.defaultK;
    if (!Number.isInteger(k) || k < 1) {
      queryViolations.push({ code: 'INVALID_K', message: 'k must be a positive integer', ref: 'k' });
    }
    const timeoutMs = request.timeoutMs ?? planner.defaultTimeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      queryViolations.push({ code: 'INVALID_TIMEOUT', message: 'timeoutMs must be a positive number', ref: 'timeoutMs' });
    }
    if (queryViolations.length > 0 || departAfterMin === null) {
      throw new InvalidPreferenceError('Invalid route query', queryViolations);
    }

    const costFunction = this.resolveCostFunction(request);
    const query: SearchQuery = {
      originId: request.originId,
      destinationId: request.destinationId,
      departAfterMin,
      k,
      deadlineMs: this.now() + timeoutMs,
    };

    this.logger.debug(
      `Planning ${query.originId} -> ${query.destinationId} after ${minToHhmm(departAfterMin)} ` +
        `(k=${k}, ${costFunction.describe()})`
    );

    return new RouteSearch(
      {
        network,
        schedule: data.schedule,
        tracker: data.tracker,
        costFunction,
        transfer: { sameModeMin: this.config.transfer.sameModeMin, crossModeMin: this.config.transfer.crossModeMin },
      },
      query,
      {
        maxLabelsPerStation: planner.maxLabelsPerStation,
        maxExpansions: planner.maxExpansions,
        yieldEvery: planner.yieldEvery,
        now: this.now,
      }
    );
  }

  private parseDepartAfter(value: string | number): number | null {
    if (typeof value === 'number') {
      return Number.isFinite(value) && value >= 0 ? value : null;
    }
    return parseHhmm(value);
  }

  private logResult(request: PlanRouteRequest, result: PlanRouteResult): void {
    this.logger.debug(
      `${request.originId} -> ${request.destinationId}: ${result.itineraries.length} itinerary(ies), ` +
        `${result.expandedLabels} label(s) expanded` +
        (result.truncated ? ', truncated' : '') +
        (result.exhausted ? ', search space exhausted' : '')
    );
  }
}
