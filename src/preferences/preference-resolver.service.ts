// src/preferences/preference-resolver.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { InvalidPreferenceError, Violation } from '../common/errors/transit-errors';
import { transitConfig, TransitConfig } from '../config/transit.config';
import { TRANSPORT_MODES, TransportMode } from '../network/interfaces/network.interface';
import { CostFunction } from './cost-function';
import {
  NormalizedWeights,
  PREFERENCE_KEYS,
  PREFERENCE_PRESETS,
  PreferenceConfig,
  PreferencePreset,
  WEIGHT_KEYS,
} from './interfaces/preference.interface';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isKnownKey(key: string): key is (typeof PREFERENCE_KEYS)[number] {
  return (PREFERENCE_KEYS as readonly string[]).includes(key);
}

function isMode(key: string): key is TransportMode {
  return (TRANSPORT_MODES as readonly string[]).includes(key);
}

/**
 * Turns caller preferences into the cost function used by the route search.
 */
@Injectable()
export class PreferenceResolverService {
  constructor(@Inject(transitConfig.KEY) private readonly config: TransitConfig) {}

  /**
   * Validate weights and build a CostFunction with weights normalized to 1.
   *
   * Throws InvalidPreferenceError listing every problem found.
   */
  resolve(preferences: PreferenceConfig): CostFunction {
    const raw: unknown = preferences;
    const violations: Violation[] = [];

    if (!isPlainObject(raw)) {
      throw new InvalidPreferenceError('Preferences must be an object', [
        { code: 'NOT_AN_OBJECT', message: 'Preferences must be an object' },
      ]);
    }

    for (const key of Object.keys(raw)) {
      if (!isKnownKey(key)) {
        violations.push({ code: 'UNKNOWN_OPTION', message: `Unknown preference option "${key}"`, ref: key });
      }
    }

    const weights: NormalizedWeights = { minimizeTime: 0, minimizeTransfers: 0, avoidCrowding: 0 };
    for (const key of WEIGHT_KEYS) {
      const value = raw[key];
      if (value === undefined) {
        continue;
      }
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        violations.push({
          code: 'INVALID_WEIGHT',
          message: `Preference "${key}" must be a non-negative finite number`,
          ref: key,
        });
        continue;
      }
      weights[key] = value;
    }

    const modeFactors = this.resolveModeFactors(raw.modeFactors, violations);

    const total = weights.minimizeTime + weights.minimizeTransfers + weights.avoidCrowding;
    if (violations.length === 0 && total <= 0) {
      violations.push({ code: 'NO_POSITIVE_WEIGHT', message: 'At least one preference weight must be greater than 0' });
    }
    if (violations.length > 0) {
      throw new InvalidPreferenceError('Invalid preferences', violations);
    }

    return new CostFunction(
      {
        minimizeTime: weights.minimizeTime / total,
        minimizeTransfers: weights.minimizeTransfers / total,
        avoidCrowding: weights.avoidCrowding / total,
      },
      modeFactors,
      this.config.transfer.unitCost
    );
  }

  resolvePreset(preset: PreferencePreset): CostFunction {
    return this.resolve(PREFERENCE_PRESETS[preset]);
  }

  private resolveModeFactors(value: unknown, violations: Violation[]): Record<TransportMode, number> {
    const factors: Record<TransportMode, number> = {
      [TransportMode.METRO]: 1,
      [TransportMode.BUS]: 1,
      [TransportMode.TRAIN]: 1,
    };
    if (value === undefined) {
      return factors;
    }
    if (!isPlainObject(value)) {
      violations.push({ code: 'INVALID_MODE_FACTORS', message: 'modeFactors must be an object', ref: 'modeFactors' });
      return factors;
    }
    for (const [mode, factor] of Object.entries(value)) {
      if (!isMode(mode)) {
        violations.push({ code: 'UNKNOWN_MODE', message: `Unknown transport mode "${mode}"`, ref: mode });
        continue;
      }
      if (typeof factor !== 'number' || !Number.isFinite(factor) || factor <= 0) {
        violations.push({
          code: 'INVALID_MODE_FACTOR',
          message: `Mode factor for ${mode} must be a positive finite number`,
          ref: mode,
        });
        continue;
      }
      factors[mode] = factor;
    }
    return factors;
  }
}
