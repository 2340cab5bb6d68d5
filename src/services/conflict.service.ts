/**
 * Conflict Detection Service
 *
 * Decides whether an employee can take on work in a given window:
 * - The window must lie inside the employee's working hours for that day
 * - It must not overlap (after the configured buffer) any of the
 *   employee's ASSIGNED or IN_PROGRESS assignments
 *
 * Callers that write based on the answer must ask inside the same atomic
 * unit that performs the write.
 */

import { format, startOfDay } from 'date-fns';
import { SchedulingReader } from '../store/types';
import {
  ACTIVE_ASSIGNMENT_STATUSES,
  Employee,
  ErrorCode,
  ScheduledAssignment,
  SchedulingConfig,
  ServiceResult,
  failure,
  isActiveAssignment,
} from './types';
import { TimeWindow, containsWindow, doTimeRangesOverlap, expandWindow, workingWindowFor } from './time-window';

export interface ConflictCheckInput {
  employeeId: string;
  startTime: Date;
  endTime: Date;
  /** Assignment to leave out of the comparison (reschedule-in-place) */
  excludeAssignmentId?: string;
}

export type EmployeeFit =
  | { available: true }
  | { available: false; reason: 'OUTSIDE_WORKING_HOURS'; conflicts: [] }
  | { available: false; reason: 'TIME_CONFLICT'; conflicts: ScheduledAssignment[] };

/**
 * Assignments from `existing` that clash with `candidate`.
 *
 * Half-open comparison: back-to-back windows never clash unless a buffer
 * is configured.
 */
export function findConflicts(
  existing: ScheduledAssignment[],
  candidate: TimeWindow,
  bufferMinutes: number,
  excludeAssignmentId?: string
): ScheduledAssignment[] {
  const padded = expandWindow(candidate, bufferMinutes);

  return existing.filter(
    (assignment) =>
      assignment.id !== excludeAssignmentId &&
      isActiveAssignment(assignment) &&
      doTimeRangesOverlap(padded.start, padded.end, assignment.startTime, assignment.endTime)
  );
}

async function loadConflicts(
  reader: SchedulingReader,
  input: ConflictCheckInput,
  config: SchedulingConfig
): Promise<ScheduledAssignment[]> {
  const candidate = { start: input.startTime, end: input.endTime };
  const padded = expandWindow(candidate, config.bufferMinutes);

  const existing = await reader.listEmployeeAssignments(input.employeeId, {
    from: padded.start,
    to: padded.end,
    statuses: ACTIVE_ASSIGNMENT_STATUSES,
  });

  return findConflicts(existing, candidate, config.bufferMinutes, input.excludeAssignmentId);
}

export async function hasConflict(
  reader: SchedulingReader,
  input: ConflictCheckInput,
  config: SchedulingConfig
): Promise<boolean> {
  const conflicts = await loadConflicts(reader, input, config);
  return conflicts.length > 0;
}

/**
 * Full fitness check of an employee for a window: working hours first,
 * then overlapping assignments.
 */
export async function checkEmployeeFit(
  reader: SchedulingReader,
  employee: Employee,
  window: TimeWindow,
  config: SchedulingConfig,
  excludeAssignmentId?: string
): Promise<EmployeeFit> {
  const working = workingWindowFor(startOfDay(window.start), employee.workingHours, config.businessHours);
  if (!working || !containsWindow(working, window)) {
    return { available: false, reason: 'OUTSIDE_WORKING_HOURS', conflicts: [] };
  }

  const conflicts = await loadConflicts(
    reader,
    { employeeId: employee.id, startTime: window.start, endTime: window.end, excludeAssignmentId },
    config
  );

  return conflicts.length > 0 ? { available: false, reason: 'TIME_CONFLICT', conflicts } : { available: true };
}

function describeWindow(window: TimeWindow): string {
  return `${format(window.start, 'yyyy-MM-dd HH:mm')}-${format(window.end, 'HH:mm')}`;
}

/**
 * One line per blocked employee, naming the booking that blocks them.
 */
export function describeUnavailability(employee: Employee, fit: Exclude<EmployeeFit, { available: true }>): string {
  if (fit.reason === 'OUTSIDE_WORKING_HOURS') {
    return `${employee.name} is not working at that time`;
  }
  const clashes = fit.conflicts
    .map((c) => `appointment ${c.appointmentId} (${describeWindow({ start: c.startTime, end: c.endTime })})`)
    .join(', ');
  return `${employee.name} is already assigned to ${clashes}`;
}

export function unavailabilityDetails(employee: Employee, fit: Exclude<EmployeeFit, { available: true }>) {
  return {
    employeeId: employee.id,
    reason: fit.reason,
    conflictingAppointmentIds: fit.conflicts.map((c) => c.appointmentId),
  };
}

export function employeeUnavailable<T>(
  employee: Employee,
  window: TimeWindow,
  fit: Exclude<EmployeeFit, { available: true }>
): ServiceResult<T> {
  return failure(ErrorCode.CONFLICT, `Cannot assign: ${describeUnavailability(employee, fit)}`, {
    ...unavailabilityDetails(employee, fit),
    requestedStart: window.start.toISOString(),
    requestedEnd: window.end.toISOString(),
  });
}
