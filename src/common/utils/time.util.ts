// src/common/utils/time.util.ts

/**
 * Service-day clock helpers.
 *
 * Times are integer minutes from the start of the service day (00:00 = 0).
 * Values past 24:00 are allowed for late-running service; the day never wraps.
 */

const HHMM_PATTERN = /^(\d{1,2}):([0-5]\d)$/;

/** Upper bound for a service-day time (30:00), covering after-midnight service */
export const SERVICE_DAY_END_MIN = 30 * 60;

/**
 * Parse an `HH:mm` string into minutes, or return null when malformed.
 *
 * @example parseHhmm("08:05") // 485
 */
export function parseHhmm(hhmm: string): number | null {
  const match = HHMM_PATTERN.exec(hhmm.trim());
  if (!match) {
    return null;
  }
  const minutes = Number(match[1]) * 60 + Number(match[2]);
  return minutes <= SERVICE_DAY_END_MIN ? minutes : null;
}

/**
 * Convert an `HH:mm` string to minutes. Throws on malformed input.
 */
export function hhmmToMin(hhmm: string): number {
  const minutes = parseHhmm(hhmm);
  if (minutes === null) {
    throw new RangeError(`Invalid HH:mm time "${hhmm}"`);
  }
  return minutes;
}

/**
 * Format minutes as `HH:mm`.
 */
export function minToHhmm(min: number): string {
  const rounded = Math.round(min);
  const h = Math.floor(rounded / 60);
  const m = rounded % 60;
  return `${h.toString().padStart(2, '0')}:${m.toString().padStart(2, '0')}`;
}

/**
 * Compact form used in generated identifiers, e.g. 485 -> "0805".
 */
export function minToCompact(min: number): string {
  return minToHhmm(min).replace(':', '');
}
