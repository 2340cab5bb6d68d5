/**
 * Availability Slot Calculation Service
 *
 * Calculates bookable start times for a service on a date by:
 * - Resolving each candidate's working window (own hours or business hours)
 * - Subtracting their non-cancelled assignments (widened by the buffer)
 * - Stepping through the free time on granularity boundaries
 * - Merging the per-employee streams by (start time, employee id)
 */

import { addDays, addMinutes, isSameDay, max, startOfDay } from 'date-fns';
import { SchedulingReader } from '../store/types';
import { TimeWindow, expandWindow, roundUpToInterval, subtractWindows, workingWindowFor } from './time-window';
import {
  BUSY_ASSIGNMENT_STATUSES,
  Employee,
  ErrorCode,
  SchedulingConfig,
  Service,
  ServiceResult,
  TimeSlot,
  failure,
  success,
} from './types';

interface EmployeeFreeTime {
  employeeId: string;
  free: TimeWindow[];
}

// ============================================================================
// Candidates
// ============================================================================

export function isQualified(employee: Employee, serviceId: string): boolean {
  return !employee.serviceIds || employee.serviceIds.includes(serviceId);
}

/**
 * Active employees qualified for the service, optionally restricted to
 * `employeeIds`. Sorted by id.
 */
export async function resolveCandidates(
  reader: SchedulingReader,
  service: Service,
  employeeIds?: string[]
): Promise<Employee[]> {
  const employees = await reader.listEmployees();
  return employees.filter(
    (employee) =>
      employee.active &&
      isQualified(employee, service.id) &&
      (!employeeIds || employeeIds.includes(employee.id))
  );
}

// ============================================================================
// Slot generation
// ============================================================================

/**
 * Start times inside `free` on granularity boundaries where the whole
 * service still fits.
 */
export function* generateSlots(
  employeeId: string,
  free: TimeWindow[],
  durationMinutes: number,
  granularityMinutes: number
): Generator<TimeSlot> {
  for (const window of free) {
    let start = roundUpToInterval(window.start, granularityMinutes);
    let end = addMinutes(start, durationMinutes);

    while (end <= window.end) {
      yield { employeeId, startTime: start, endTime: end, available: true };
      start = addMinutes(start, granularityMinutes);
      end = addMinutes(start, durationMinutes);
    }
  }
}

function compareSlots(a: TimeSlot, b: TimeSlot): number {
  const byTime = a.startTime.getTime() - b.startTime.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  return a.employeeId < b.employeeId ? -1 : a.employeeId > b.employeeId ? 1 : 0;
}

/**
 * Lazily merges sorted slot streams into one sorted stream.
 */
export function* mergeSlotStreams(streams: Iterator<TimeSlot>[]): Generator<TimeSlot> {
  const heads = streams.map((iterator) => ({ iterator, current: advance(iterator) }));

  while (true) {
    let best: (typeof heads)[number] | undefined;
    let bestSlot: TimeSlot | undefined;

    for (const head of heads) {
      if (head.current && (!bestSlot || compareSlots(head.current, bestSlot) < 0)) {
        best = head;
        bestSlot = head.current;
      }
    }

    if (!best || !bestSlot) {
      return;
    }

    yield bestSlot;
    best.current = advance(best.iterator);
  }
}

function advance(iterator: Iterator<TimeSlot>): TimeSlot | undefined {
  const next = iterator.next();
  return next.done ? undefined : next.value;
}

async function loadFreeTime(
  reader: SchedulingReader,
  employee: Employee,
  date: Date,
  now: Date,
  config: SchedulingConfig
): Promise<EmployeeFreeTime> {
  const working = workingWindowFor(date, employee.workingHours, config.businessHours);
  if (!working) {
    return { employeeId: employee.id, free: [] };
  }

  const window: TimeWindow = isSameDay(date, now) ? { start: max([working.start, now]), end: working.end } : working;
  if (window.start >= window.end) {
    return { employeeId: employee.id, free: [] };
  }

  const query = expandWindow(window, config.bufferMinutes);
  const assignments = await reader.listEmployeeAssignments(employee.id, {
    from: query.start,
    to: query.end,
    statuses: BUSY_ASSIGNMENT_STATUSES,
  });

  const busy = assignments.map((a) => expandWindow({ start: a.startTime, end: a.endTime }, config.bufferMinutes));
  return { employeeId: employee.id, free: subtractWindows(window, busy) };
}

// ============================================================================
// Main Availability Calculation
// ============================================================================

/**
 * Available slots for `service` on `date` across `candidates`.
 *
 * The data is read once per call; the returned sequence can be iterated
 * any number of times and is ordered by start time, then employee id.
 * A fully booked day or a day off yields an empty sequence.
 */
export async function availableSlots(
  reader: SchedulingReader,
  candidates: Employee[],
  service: Service,
  date: Date,
  config: SchedulingConfig
): Promise<ServiceResult<Iterable<TimeSlot>>> {
  const now = config.now();
  const day = startOfDay(date);

  if (isNaN(day.getTime())) {
    return failure(ErrorCode.VALIDATION_ERROR, 'Date is not valid');
  }
  if (!Number.isInteger(service.durationMinutes) || service.durationMinutes <= 0) {
    return failure(ErrorCode.VALIDATION_ERROR, 'Service duration must be a positive number of minutes', {
      serviceId: service.id,
      durationMinutes: service.durationMinutes,
    });
  }
  if (day < startOfDay(now)) {
    return failure(ErrorCode.VALIDATION_ERROR, 'Cannot look up availability for a past date', {
      date: day.toISOString(),
    });
  }
  if (day > addDays(now, config.bookingHorizonDays)) {
    return failure(
      ErrorCode.VALIDATION_ERROR,
      `Availability is only published ${config.bookingHorizonDays} days ahead`,
      { date: day.toISOString() }
    );
  }

  const freeTime: EmployeeFreeTime[] = [];
  for (const employee of candidates) {
    freeTime.push(await loadFreeTime(reader, employee, day, now, config));
  }

  return success({
    [Symbol.iterator]: () =>
      mergeSlotStreams(
        freeTime.map(({ employeeId, free }) =>
          generateSlots(employeeId, free, service.durationMinutes, config.slotGranularityMinutes)
        )
      ),
  });
}

/**
 * Earliest slot at or after `from` within the next `maxDaysAhead` days,
 * or null when there is none.
 */
export async function nextAvailableSlot(
  reader: SchedulingReader,
  candidates: Employee[],
  service: Service,
  from: Date,
  maxDaysAhead: number,
  config: SchedulingConfig
): Promise<ServiceResult<TimeSlot | null>> {
  const now = config.now();
  const earliest = max([from, now]);

  for (let offset = 0; offset <= maxDaysAhead; offset++) {
    const day = addDays(startOfDay(earliest), offset);
    if (day > addDays(now, config.bookingHorizonDays)) {
      break;
    }

    const slots = await availableSlots(reader, candidates, service, day, config);
    if (!slots.success) return slots;

    for (const slot of slots.data) {
      if (slot.startTime >= earliest) {
        return success(slot);
      }
    }
  }

  return success(null);
}
