// src/config/transit.config.ts
import { Logger } from '@nestjs/common';
import { registerAs } from '@nestjs/config';

const logger = new Logger('TransitConfig');

/**
 * Tunable parameters of the routing core.
 *
 * Transfer times, the crowding curve and search limits are left open by the
 * domain model, so they are configuration rather than constants.
 */
export interface TransitConfig {
  transfer: {
    /** Minimum transfer time between two lines of the same mode (minutes) */
    sameModeMin: number;
    /** Minimum transfer time between lines of different modes (minutes) */
    crossModeMin: number;
    /** Cost units of one transfer indicator */
    unitCost: number;
  };
  crowding: {
    /** Load ratio where the penalty starts */
    threshold: number;
    exponent: number;
    /** Penalty at 100 % load; also the clamp above it */
    maxPenalty: number;
  };
  planner: {
    defaultK: number;
    defaultTimeoutMs: number;
    maxLabelsPerStation: number;
    maxExpansions: number;
    /** Popped labels between cooperative yields to the event loop */
    yieldEvery: number;
  };
  /** Network document loaded on boot */
  networkFile?: string;
}

export const DEFAULT_TRANSIT_CONFIG: TransitConfig = {
  transfer: { sameModeMin: 3, crossModeMin: 5, unitCost: 15 },
  crowding: { threshold: 0.7, exponent: 2, maxPenalty: 100 },
  planner: {
    defaultK: 3,
    defaultTimeoutMs: 2000,
    maxLabelsPerStation: 8,
    maxExpansions: 200_000,
    yieldEvery: 500,
  },
};

type NumberRule = (value: number) => boolean;

const nonNegative: NumberRule = (v) => v >= 0;
const positive: NumberRule = (v) => v > 0;
const positiveInteger: NumberRule = (v) => Number.isInteger(v) && v > 0;
const openUnitInterval: NumberRule = (v) => v > 0 && v < 1;

function readNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  rule: NumberRule
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || !rule(value)) {
    logger.warn(`Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Build the routing configuration from environment variables.
 */
export function loadTransitConfig(env: NodeJS.ProcessEnv = process.env): TransitConfig {
  const d = DEFAULT_TRANSIT_CONFIG;
  return {
    transfer: {
      sameModeMin: readNumber(env, 'TRANSFER_MIN_SAME_MODE', d.transfer.sameModeMin, nonNegative),
      crossModeMin: readNumber(env, 'TRANSFER_MIN_CROSS_MODE', d.transfer.crossModeMin, nonNegative),
      unitCost: readNumber(env, 'TRANSFER_UNIT_COST', d.transfer.unitCost, nonNegative),
    },
    crowding: {
      threshold: readNumber(env, 'CROWDING_THRESHOLD', d.crowding.threshold, openUnitInterval),
      exponent: readNumber(env, 'CROWDING_EXPONENT', d.crowding.exponent, positive),
      maxPenalty: readNumber(env, 'CROWDING_MAX_PENALTY', d.crowding.maxPenalty, positive),
    },
    planner: {
      defaultK: readNumber(env, 'PLANNER_DEFAULT_K', d.planner.defaultK, positiveInteger),
      defaultTimeoutMs: readNumber(env, 'PLANNER_DEFAULT_TIMEOUT_MS', d.planner.defaultTimeoutMs, positive),
      maxLabelsPerStation: readNumber(
        env,
        'PLANNER_MAX_LABELS_PER_STATION',
        d.planner.maxLabelsPerStation,
        positiveInteger
      ),
      maxExpansions: readNumber(env, 'PLANNER_MAX_EXPANSIONS', d.planner.maxExpansions, positiveInteger),
      yieldEvery: readNumber(env, 'PLANNER_YIELD_EVERY', d.planner.yieldEvery, positiveInteger),
    },
    networkFile: env.NETWORK_FILE?.trim() || undefined,
  };
}

export const transitConfig = registerAs('transit', (): TransitConfig => loadTransitConfig());
