// src/preferences/interfaces/preference.interface.ts

import { TransportMode } from '../../network/interfaces/network.interface';

/**
 * Caller-supplied preference weights.
 *
 * Weights are non-negative, at least one must be positive; they are
 * normalized to sum to 1 before use.
 */
export interface PreferenceConfig {
  minimizeTime?: number;
  minimizeTransfers?: number;
  avoidCrowding?: number;
  /** Multiplier on in-vehicle time per mode (default 1) */
  modeFactors?: Partial<Record<TransportMode, number>>;
}

export const PREFERENCE_KEYS = ['minimizeTime', 'minimizeTransfers', 'avoidCrowding', 'modeFactors'] as const;

export const WEIGHT_KEYS = ['minimizeTime', 'minimizeTransfers', 'avoidCrowding'] as const;

export type WeightKey = (typeof WEIGHT_KEYS)[number];

/**
 * Normalized weights (sum = 1)
 */
export type NormalizedWeights = Record<WeightKey, number>;

/**
 * Cost inputs of one search edge
 */
export interface LegCostInput {
  /** Minutes moving: in vehicle for a ride, walking for a transfer */
  durationMin: number;
  /** Minutes waiting before the movement starts */
  waitMin?: number;
  isTransfer: boolean;
  crowdingPenalty: number;
  /** Mode of a ride edge; absent for transfers */
  mode?: TransportMode;
}

export type PreferencePreset = 'fastest' | 'fewestTransfers' | 'leastCrowded' | 'balanced';

export const PREFERENCE_PRESETS: Record<PreferencePreset, PreferenceConfig> = {
  fastest: { minimizeTime: 1 },
  fewestTransfers: { minimizeTransfers: 1, minimizeTime: 0.1 },
  leastCrowded: { avoidCrowding: 1, minimizeTime: 0.1 },
  balanced: { minimizeTime: 1, minimizeTransfers: 1, avoidCrowding: 1 },
};
