/**
 * Calendar arithmetic shared by availability, conflict and booking checks.
 *
 * All windows are half-open: [start, end).
 */

import { addDays, addMilliseconds, addMinutes, getDay, max, min, set, startOfDay } from 'date-fns';
import { BusinessHours, DAYS_OF_WEEK, DayOfWeek, WorkingHoursProfile, WorkingWindow } from './types';

export interface TimeWindow {
  start: Date;
  end: Date;
}

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function isValidTimeString(value: string): boolean {
  return TIME_PATTERN.test(value) || value === '24:00';
}

/**
 * Parses a time string (HH:MM) into hours and minutes
 */
export function parseTimeString(timeStr: string): { hours: number; minutes: number } {
  const [hours, minutes] = timeStr.split(':').map(Number);
  return { hours, minutes };
}

/**
 * Combines a date with a time string to create a full DateTime
 */
export function combineDateAndTime(date: Date, timeStr: string): Date {
  const { hours, minutes } = parseTimeString(timeStr);
  if (hours === 24) {
    return addDays(startOfDay(date), 1);
  }
  return set(date, { hours, minutes, seconds: 0, milliseconds: 0 });
}

export function getDayOfWeek(date: Date): DayOfWeek {
  return DAYS_OF_WEEK[getDay(date)];
}

/**
 * Checks if two time ranges overlap
 * [start1, end1) overlaps with [start2, end2)
 */
export function doTimeRangesOverlap(start1: Date, end1: Date, start2: Date, end2: Date): boolean {
  return start1 < end2 && start2 < end1;
}

/** Widens a window by `minutes` on both sides */
export function expandWindow(window: TimeWindow, minutes: number): TimeWindow {
  if (minutes === 0) {
    return window;
  }
  return { start: addMinutes(window.start, -minutes), end: addMinutes(window.end, minutes) };
}

/**
 * Intersection of two windows, or null when they do not overlap.
 */
export function clipWindow(window: TimeWindow, bounds: TimeWindow): TimeWindow | null {
  const start = max([window.start, bounds.start]);
  const end = min([window.end, bounds.end]);
  return start < end ? { start, end } : null;
}

export function containsWindow(outer: TimeWindow, inner: TimeWindow): boolean {
  return inner.start >= outer.start && inner.end <= outer.end;
}

/**
 * Sorts windows and merges the ones that overlap or touch.
 *
 * Example:
 *   [10:00-11:00, 10:30-12:00, 12:00-12:30, 14:00-15:00]
 *   => [10:00-12:30, 14:00-15:00]
 */
export function mergeWindows(windows: TimeWindow[]): TimeWindow[] {
  const sorted = [...windows].sort((a, b) => a.start.getTime() - b.start.getTime());
  const merged: TimeWindow[] = [];

  for (const window of sorted) {
    const last = merged[merged.length - 1];
    if (last && window.start <= last.end) {
      if (window.end > last.end) {
        last.end = window.end;
      }
      continue;
    }
    merged.push({ start: window.start, end: window.end });
  }

  return merged;
}

/**
 * Subtracts blocked time ranges from an availability window.
 *
 * Example:
 *   Window: 9:00-17:00
 *   Blocked: [10:00-11:00, 14:00-15:00]
 *   Result: [9:00-10:00, 11:00-14:00, 15:00-17:00]
 */
export function subtractWindows(window: TimeWindow, blocked: TimeWindow[]): TimeWindow[] {
  const relevant = mergeWindows(blocked).filter(
    (b) => b.start < window.end && b.end > window.start
  );

  const free: TimeWindow[] = [];
  let cursor = window.start;

  for (const block of relevant) {
    if (block.start > cursor) {
      free.push({ start: cursor, end: min([block.start, window.end]) });
    }
    if (block.end > cursor) {
      cursor = block.end;
    }
  }

  if (cursor < window.end) {
    free.push({ start: cursor, end: window.end });
  }

  return free;
}

/**
 * Rounds a date up to the next interval boundary, counted from midnight.
 *
 * Example: 9:07 with 15-minute interval becomes 9:15
 */
export function roundUpToInterval(date: Date, intervalMinutes: number): Date {
  const dayStart = startOfDay(date);
  const stepMs = intervalMinutes * 60 * 1000;
  const offsetMs = date.getTime() - dayStart.getTime();
  return addMilliseconds(dayStart, Math.ceil(offsetMs / stepMs) * stepMs);
}

export function toWindow(date: Date, hours: WorkingWindow): TimeWindow {
  return {
    start: combineDateAndTime(date, hours.start),
    end: combineDateAndTime(date, hours.end),
  };
}

/**
 * Business opening window for the date, or null when closed.
 */
export function businessWindowFor(date: Date, businessHours: BusinessHours): TimeWindow | null {
  const hours = businessHours[getDayOfWeek(date)];
  return hours ? toWindow(startOfDay(date), hours) : null;
}

/**
 * Effective working window of an employee on a date: their own hours for
 * that weekday (or the business default), clipped to business hours.
 */
export function workingWindowFor(
  date: Date,
  profile: WorkingHoursProfile | null,
  businessHours: BusinessHours
): TimeWindow | null {
  const business = businessWindowFor(date, businessHours);
  if (!business) {
    return null;
  }

  const day = getDayOfWeek(date);
  if (!profile || !(day in profile)) {
    return business;
  }

  const own = profile[day];
  if (!own) {
    return null;
  }

  return clipWindow(toWindow(startOfDay(date), own), business);
}
