/**
 * Scheduling Policy Configuration
 *
 * Centralized configuration for slot generation, booking limits and
 * write concurrency. Values can be overridden via environment variables.
 */

import { isValidTimeString } from '../services/time-window';
import {
  BusinessHours,
  DEFAULT_BUSINESS_HOURS,
  DEFAULT_SCHEDULING_CONFIG,
  SchedulingConfig,
  WorkingWindow,
} from '../services/types';

type EnvSource = Record<string, string | undefined>;

const CLOSED = 'closed';

function readInt(source: EnvSource, key: string, fallback: number): number {
  const raw = source[key];
  return raw === undefined || raw === '' ? fallback : Number(raw);
}

/**
 * Parses an opening-hours range such as `08:00-17:00`, or `closed`.
 */
export function parseHoursRange(value: string): WorkingWindow | null {
  const trimmed = value.trim();
  if (trimmed.toLowerCase() === CLOSED) {
    return null;
  }

  const [start, end, ...rest] = trimmed.split('-').map((part) => part.trim());
  if (rest.length > 0 || !start || !end || !isValidTimeString(start) || !isValidTimeString(end) || start >= end) {
    throw new Error(`Invalid hours range '${value}'. Expected HH:MM-HH:MM or '${CLOSED}'.`);
  }

  return { start, end };
}

function readBusinessHours(source: EnvSource): BusinessHours {
  const weekday = source.BUSINESS_HOURS_WEEKDAY
    ? parseHoursRange(source.BUSINESS_HOURS_WEEKDAY)
    : DEFAULT_BUSINESS_HOURS[1];
  const weekend = source.BUSINESS_HOURS_WEEKEND
    ? parseHoursRange(source.BUSINESS_HOURS_WEEKEND)
    : DEFAULT_BUSINESS_HOURS[0];

  return { 0: weekend, 1: weekday, 2: weekday, 3: weekday, 4: weekday, 5: weekday, 6: weekend };
}

/**
 * Builds the scheduling configuration from the environment.
 *
 * Recognised variables: SLOT_GRANULARITY_MINUTES, BUFFER_MINUTES,
 * BOOKING_HORIZON_DAYS, MAX_WRITE_RETRIES, RETRY_BASE_DELAY_MS,
 * LOCK_TIMEOUT_MS, NO_SHOW_GRACE_MINUTES, BUSINESS_HOURS_WEEKDAY and
 * BUSINESS_HOURS_WEEKEND.
 */
export function loadSchedulingConfig(source: EnvSource = process.env): SchedulingConfig {
  const defaults = DEFAULT_SCHEDULING_CONFIG;

  const config: SchedulingConfig = {
    slotGranularityMinutes: readInt(source, 'SLOT_GRANULARITY_MINUTES', defaults.slotGranularityMinutes),
    bufferMinutes: readInt(source, 'BUFFER_MINUTES', defaults.bufferMinutes),
    bookingHorizonDays: readInt(source, 'BOOKING_HORIZON_DAYS', defaults.bookingHorizonDays),
    maxWriteRetries: readInt(source, 'MAX_WRITE_RETRIES', defaults.maxWriteRetries),
    retryBaseDelayMs: readInt(source, 'RETRY_BASE_DELAY_MS', defaults.retryBaseDelayMs),
    lockTimeoutMs: readInt(source, 'LOCK_TIMEOUT_MS', defaults.lockTimeoutMs),
    noShowGraceMinutes: readInt(source, 'NO_SHOW_GRACE_MINUTES', defaults.noShowGraceMinutes),
    businessHours: readBusinessHours(source),
    now: defaults.now,
  };

  validateSchedulingConfig(config);
  return config;
}

/**
 * Validates scheduling configuration at startup.
 */
export function validateSchedulingConfig(config: SchedulingConfig): void {
  const positive: Array<[string, number]> = [
    ['SLOT_GRANULARITY_MINUTES', config.slotGranularityMinutes],
    ['BOOKING_HORIZON_DAYS', config.bookingHorizonDays],
    ['LOCK_TIMEOUT_MS', config.lockTimeoutMs],
  ];
  const nonNegative: Array<[string, number]> = [
    ['BUFFER_MINUTES', config.bufferMinutes],
    ['MAX_WRITE_RETRIES', config.maxWriteRetries],
    ['RETRY_BASE_DELAY_MS', config.retryBaseDelayMs],
    ['NO_SHOW_GRACE_MINUTES', config.noShowGraceMinutes],
  ];

  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`Invalid ${name}: ${value}. Must be a positive integer.`);
    }
  }

  for (const [name, value] of nonNegative) {
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`Invalid ${name}: ${value}. Must be a non-negative integer.`);
    }
  }

  if (1440 % config.slotGranularityMinutes !== 0) {
    throw new Error(
      `Invalid SLOT_GRANULARITY_MINUTES: ${config.slotGranularityMinutes}. ` +
      'Must divide a day evenly.'
    );
  }
}
