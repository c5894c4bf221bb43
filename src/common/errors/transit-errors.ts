// src/common/errors/transit-errors.ts

/**
 * A single inconsistency found while validating input data.
 *
 * Loaders collect every violation before failing so that a large network or
 * timetable file can be corrected in one pass.
 */
export interface Violation {
  /** Machine-readable violation code, e.g. UNKNOWN_STATION */
  code: string;
  /** Human-readable description */
  message: string;
  /** Identifier of the offending record (station, line, trip, field) */
  ref?: string;
}

export type TransitErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'SCHEDULE_ERROR'
  | 'INVALID_PREFERENCE';

/**
 * Base class for data errors raised by the routing core.
 */
export abstract class TransitDataError extends Error {
  abstract readonly code: TransitErrorCode;
  readonly violations: Violation[];

  protected constructor(summary: string, violations: Violation[]) {
    super(TransitDataError.formatMessage(summary, violations));
    this.name = new.target.name;
    this.violations = violations;
  }

  private static formatMessage(summary: string, violations: Violation[]): string {
    if (violations.length === 0) {
      return summary;
    }
    const lines = violations.map((v) => `  - [${v.code}] ${v.message}`);
    return `${summary} (${violations.length} violation(s))\n${lines.join('\n')}`;
  }
}

/**
 * Malformed or inconsistent network topology. Fatal to the load operation.
 */
export class ConfigurationError extends TransitDataError {
  readonly code = 'CONFIGURATION_ERROR' as const;

  constructor(summary: string, violations: Violation[] = []) {
    super(summary, violations);
  }

  static single(code: string, message: string, ref?: string): ConfigurationError {
    return new ConfigurationError(message, [{ code, message, ref }]);
  }
}

/**
 * Trip data inconsistent with line topology, or non-monotonic stop times.
 */
export class ScheduleError extends TransitDataError {
  readonly code = 'SCHEDULE_ERROR' as const;

  constructor(summary: string, violations: Violation[] = []) {
    super(summary, violations);
  }
}

/**
 * Malformed preference weights. Rejects only the request that carried them.
 */
export class InvalidPreferenceError extends TransitDataError {
  readonly code = 'INVALID_PREFERENCE' as const;

  constructor(summary: string, violations: Violation[] = []) {
    super(summary, violations);
  }
}

export function isTransitDataError(error: unknown): error is TransitDataError {
  return error instanceof TransitDataError;
}
