// src/cli/route-cli.ts

import { isTransitDataError } from '../common/errors/transit-errors';
import { minToHhmm } from '../common/utils/time.util';
import { NetworkModel } from '../network/network-model';
import { PREFERENCE_PRESETS, PreferenceConfig, PreferencePreset } from '../preferences/interfaces/preference.interface';
import { Itinerary, PlanRouteResult } from '../route-planner/interfaces/itinerary.interface';
import { PlanRouteRequest } from '../route-planner/interfaces/plan-route.interface';
import { RoutePlannerService } from '../route-planner/route-planner.service';
import { TransitDataService } from '../transit-data/transit-data.service';

export const ROUTE_CLI_USAGE = [
  'Usage: plan-route --network=<file> --from=<stationId> --to=<stationId> --depart=HH:mm',
  '                  [--minimize-time=<w>] [--minimize-transfers=<w>] [--avoid-crowding=<w>]',
  '                  [--preset=fastest|fewestTransfers|leastCrowded|balanced]',
  '                  [--k=<n>] [--timeout-ms=<n>] [--export=<file>] [--format=text|json]',
].join('\n');

export type OutputFormat = 'text' | 'json';

export interface RouteCliOptions {
  network: string;
  request: PlanRouteRequest;
  format: OutputFormat;
  exportPath?: string;
}

export interface RouteCliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  writeFile: (filePath: string, content: string) => Promise<void>;
}

export interface RouteCliDeps {
  transitData: Pick<TransitDataService, 'loadFile' | 'current'>;
  planner: Pick<RoutePlannerService, 'planRoute'>;
  io: RouteCliIo;
}

const KNOWN_FLAGS = [
  'network',
  'from',
  'to',
  'depart',
  'minimize-time',
  'minimize-transfers',
  'avoid-crowding',
  'preset',
  'k',
  'timeout-ms',
  'export',
  'format',
] as const;

type Flag = (typeof KNOWN_FLAGS)[number];

function isFlag(name: string): name is Flag {
  return (KNOWN_FLAGS as readonly string[]).includes(name);
}

function isPreset(name: string): name is PreferencePreset {
  return Object.prototype.hasOwnProperty.call(PREFERENCE_PRESETS, name);
}

/**
 * Parse `--name=value` arguments. Returns every problem found instead of
 * stopping at the first one.
 */
export function parseRouteArgs(argv: string[]): { options?: RouteCliOptions; errors: string[] } {
  const errors: string[] = [];
  const flags = new Map<Flag, string>();

  for (const arg of argv) {
    const match = /^--([a-z-]+)=(.*)$/.exec(arg);
    if (!match) {
      errors.push(`Unrecognized argument "${arg}"`);
      continue;
    }
    const [, name, value] = match;
    if (!isFlag(name)) {
      errors.push(`Unknown option --${name}`);
      continue;
    }
    flags.set(name, value);
  }

  const required = (name: Flag): string => {
    const value = flags.get(name);
    if (value === undefined || value === '') {
      errors.push(`Missing --${name}`);
      return '';
    }
    return value;
  };
  const number = (name: Flag): number | undefined => {
    const raw = flags.get(name);
    if (raw === undefined) {
      return undefined;
    }
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
      errors.push(`--${name} must be a number`);
      return undefined;
    }
    return value;
  };

  const network = required('network');
  const originId = required('from');
  const destinationId = required('to');
  const departAfter = required('depart');

  const preferences: PreferenceConfig = {};
  const minimizeTime = number('minimize-time');
  const minimizeTransfers = number('minimize-transfers');
  const avoidCrowding = number('avoid-crowding');
  if (minimizeTime !== undefined) preferences.minimizeTime = minimizeTime;
  if (minimizeTransfers !== undefined) preferences.minimizeTransfers = minimizeTransfers;
  if (avoidCrowding !== undefined) preferences.avoidCrowding = avoidCrowding;

  const presetName = flags.get('preset');
  let preset: PreferencePreset | undefined;
  if (presetName !== undefined) {
    if (isPreset(presetName)) {
      preset = presetName;
    } else {
      errors.push(`Unknown preset "${presetName}"`);
    }
  }

  const format = flags.get('format') ?? 'text';
  if (format !== 'text' && format !== 'json') {
    errors.push('--format must be text or json');
  }

  const k = number('k');
  const timeoutMs = number('timeout-ms');

  if (errors.length > 0 || (format !== 'text' && format !== 'json')) {
    return { errors };
  }

  return {
    errors,
    options: {
      network,
      format,
      exportPath: flags.get('export'),
      request: {
        originId,
        destinationId,
        departAfter,
        preferences: Object.keys(preferences).length > 0 ? preferences : undefined,
        preset,
        k,
        timeoutMs,
      },
    },
  };
}

// ============================================
// Text output
// ============================================

export function formatItinerary(itinerary: Itinerary, position: number, network: NetworkModel): string[] {
  const name = (stationId: string): string => network.station(stationId)?.name ?? stationId;
  const transfers = itinerary.transferCount === 1 ? '1 transfer' : `${itinerary.transferCount} transfers`;
  const lines = [
    `#${position}  ${minToHhmm(itinerary.departureMin)} -> ${minToHhmm(itinerary.arrivalMin)}  ` +
      `${itinerary.totalDurationMin} min, ${transfers}, cost ${itinerary.cost.toFixed(2)}`,
  ];

  if (itinerary.legs.length === 0) {
    lines.push('    already at destination');
  }
  for (const leg of itinerary.legs) {
    const window = `${minToHhmm(leg.departureMin)}-${minToHhmm(leg.arrivalMin)}`;
    if (leg.kind === 'RIDE') {
      lines.push(
        `    ${window}  ${leg.mode} ${leg.lineId} (${leg.tripId})  ` +
          `${name(leg.fromStationId)} -> ${name(leg.toStationId)}, ${leg.stationIds.length - 1} stop(s)`
      );
    } else {
      lines.push(`    ${window}  transfer ${leg.fromLineId} -> ${leg.toLineId} at ${name(leg.fromStationId)}`);
    }
  }
  lines.push(
    `    in vehicle ${itinerary.inVehicleMin} min, waiting ${itinerary.waitMin} min, ` +
      `crowding penalty ${itinerary.totalCrowdingPenalty.toFixed(2)}`
  );
  return lines;
}

export function formatResult(result: PlanRouteResult, request: PlanRouteRequest, network: NetworkModel): string {
  const header =
    `${request.originId} -> ${request.destinationId} after ${request.departAfter}: ` +
    `${result.itineraries.length} itinerary(ies)`;
  const lines = [header];
  if (result.truncated) {
    lines.push('(search stopped early; results may be incomplete)');
  }
  if (result.itineraries.length === 0) {
    lines.push('No route found.');
  }
  result.itineraries.forEach((itinerary, i) => {
    lines.push('', ...formatItinerary(itinerary, i + 1, network));
  });
  return lines.join('\n');
}

/**
 * Run one `plan-route` invocation and return the process exit code.
 *
 * 0 for any result set, empty included; 1 for bad arguments or rejected
 * network, timetable or preference data.
 */
export async function runRouteCommand(argv: string[], deps: RouteCliDeps): Promise<number> {
  const { io } = deps;
  const { options, errors } = parseRouteArgs(argv);
  if (!options) {
    errors.forEach((e) => io.err(e));
    io.err(ROUTE_CLI_USAGE);
    return 1;
  }

  try {
    await deps.transitData.loadFile(options.network);
    const data = deps.transitData.current();
    const result = await deps.planner.planRoute(data, options.request);

    const output =
      options.format === 'json'
        ? JSON.stringify(result, null, 2)
        : formatResult(result, options.request, data.network);

    if (options.exportPath) {
      await io.writeFile(options.exportPath, output + '\n');
      io.out(`Wrote ${result.itineraries.length} itinerary(ies) to ${options.exportPath}`);
    } else {
      io.out(output);
    }
    return 0;
  } catch (error) {
    if (isTransitDataError(error)) {
      io.err(error.message);
      return 1;
    }
    throw error;
  }
}
