/**
 * Appointment Service
 *
 * Owns the appointment lifecycle and the rule end = start + service duration.
 *
 *   SCHEDULED   → CONFIRMED, CANCELLED, RESCHEDULED
 *   CONFIRMED   → IN_PROGRESS, CANCELLED, NO_SHOW, RESCHEDULED
 *   IN_PROGRESS → COMPLETED, CANCELLED
 *   RESCHEDULED → SCHEDULED
 *
 * Status changes that affect staff cascade to the appointment's assignments
 * inside the same atomic unit.
 */

import { randomUUID } from 'crypto';
import { addDays, addMinutes } from 'date-fns';
import { SchedulingReader, SchedulingTransaction, appointmentLock, employeeLock } from '../store/types';
import { UnitContext, assertLocked } from './atomic';
import { CascadeRules, cascadeAssignmentStatus } from './assignment.service';
import { checkEmployeeFit, describeUnavailability, unavailabilityDetails } from './conflict.service';
import { TimeWindow, businessWindowFor, containsWindow } from './time-window';
import {
  Appointment,
  AppointmentDetails,
  AppointmentStatus,
  AssignmentStatus,
  BookAppointmentInput,
  CancelAppointmentInput,
  CancellationResult,
  ErrorCode,
  SchedulingConfig,
  ServiceResult,
  failure,
  isActiveAssignment,
  success,
} from './types';

const MAX_NOTE_LENGTH = 500;

// ============================================================================
// State machine
// ============================================================================

export const APPOINTMENT_TRANSITIONS: Record<AppointmentStatus, readonly AppointmentStatus[]> = {
  [AppointmentStatus.SCHEDULED]: [
    AppointmentStatus.CONFIRMED,
    AppointmentStatus.CANCELLED,
    AppointmentStatus.RESCHEDULED,
  ],
  [AppointmentStatus.CONFIRMED]: [
    AppointmentStatus.IN_PROGRESS,
    AppointmentStatus.CANCELLED,
    AppointmentStatus.NO_SHOW,
    AppointmentStatus.RESCHEDULED,
  ],
  [AppointmentStatus.IN_PROGRESS]: [AppointmentStatus.COMPLETED, AppointmentStatus.CANCELLED],
  [AppointmentStatus.RESCHEDULED]: [AppointmentStatus.SCHEDULED],
  [AppointmentStatus.COMPLETED]: [],
  [AppointmentStatus.CANCELLED]: [],
  [AppointmentStatus.NO_SHOW]: [],
};

export function canTransition(from: AppointmentStatus, to: AppointmentStatus): boolean {
  return APPOINTMENT_TRANSITIONS[from].includes(to);
}

function invalidTransition<T>(appointment: Appointment, requested: AppointmentStatus): ServiceResult<T> {
  return failure(
    ErrorCode.INVALID_TRANSITION,
    `Cannot move appointment from ${appointment.status} to ${requested}`,
    { appointmentId: appointment.id, currentStatus: appointment.status, requestedStatus: requested }
  );
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Checks a proposed appointment window against the clock, the booking
 * horizon and the business hours of its day.
 */
export function validateBookingWindow(
  window: TimeWindow,
  config: SchedulingConfig,
  now: Date
): ServiceResult<TimeWindow> {
  if (isNaN(window.start.getTime())) {
    return failure(ErrorCode.VALIDATION_ERROR, 'Start time is not a valid date');
  }

  const details = {
    requestedStart: window.start.toISOString(),
    requestedEnd: window.end.toISOString(),
  };

  if (window.start < now) {
    return failure(ErrorCode.VALIDATION_ERROR, 'Cannot book appointments in the past', {
      ...details,
      currentTime: now.toISOString(),
    });
  }

  const horizon = addDays(now, config.bookingHorizonDays);
  if (window.start > horizon) {
    return failure(
      ErrorCode.VALIDATION_ERROR,
      `Appointments can only be booked up to ${config.bookingHorizonDays} days in advance`,
      { ...details, latestStart: horizon.toISOString() }
    );
  }

  const business = businessWindowFor(window.start, config.businessHours);
  if (!business || !containsWindow(business, window)) {
    return failure(ErrorCode.VALIDATION_ERROR, 'Requested time is outside business hours', {
      ...details,
      businessOpen: business?.start.toISOString() ?? null,
      businessClose: business?.end.toISOString() ?? null,
    });
  }

  return success(window);
}

function validateNotes(notes: string | undefined): ServiceResult<string | undefined> {
  if (notes !== undefined && notes.length > MAX_NOTE_LENGTH) {
    return failure(ErrorCode.VALIDATION_ERROR, `Notes must be at most ${MAX_NOTE_LENGTH} characters`);
  }
  return success(notes);
}

// ============================================================================
// Lookups
// ============================================================================

async function loadAppointment(reader: SchedulingReader, appointmentId: string): Promise<ServiceResult<Appointment>> {
  const appointment = await reader.findAppointment(appointmentId);
  if (!appointment) {
    return failure(ErrorCode.NOT_FOUND, `Appointment with ID ${appointmentId} not found`, { appointmentId });
  }
  return success(appointment);
}

async function withAssignments(tx: SchedulingReader, appointment: Appointment): Promise<AppointmentDetails> {
  return { appointment, assignments: await tx.listAppointmentAssignments(appointment.id) };
}

export async function getAppointmentDetails(
  reader: SchedulingReader,
  appointmentId: string
): Promise<ServiceResult<AppointmentDetails>> {
  const appointment = await loadAppointment(reader, appointmentId);
  if (!appointment.success) return appointment;

  return success(await withAssignments(reader, appointment.data));
}

// ============================================================================
// Booking
// ============================================================================

/**
 * Creates a SCHEDULED appointment. Staff are assigned separately.
 */
export async function bookAppointment(
  tx: SchedulingTransaction,
  input: BookAppointmentInput,
  ctx: UnitContext
): Promise<ServiceResult<Appointment>> {
  if (isNaN(input.startTime.getTime())) {
    return failure(ErrorCode.VALIDATION_ERROR, 'Start time is not a valid date');
  }

  const notes = validateNotes(input.notes);
  if (!notes.success) return notes;

  const customer = await tx.findCustomer(input.customerId);
  if (!customer) {
    return failure(ErrorCode.NOT_FOUND, `Customer with ID ${input.customerId} not found`, {
      customerId: input.customerId,
    });
  }

  const service = await tx.findService(input.serviceId);
  if (!service) {
    return failure(ErrorCode.NOT_FOUND, `Service with ID ${input.serviceId} not found`, {
      serviceId: input.serviceId,
    });
  }

  const window = validateBookingWindow(
    { start: input.startTime, end: addMinutes(input.startTime, service.durationMinutes) },
    ctx.config,
    ctx.now
  );
  if (!window.success) return window;

  const appointment: Appointment = {
    id: randomUUID(),
    customerId: customer.id,
    serviceId: service.id,
    startTime: window.data.start,
    endTime: window.data.end,
    status: AppointmentStatus.SCHEDULED,
    notes: notes.data,
    createdAt: ctx.now,
    updatedAt: ctx.now,
  };

  await tx.insertAppointment(appointment);
  return success(appointment);
}

// ============================================================================
// Rescheduling
// ============================================================================

/**
 * Lock keys for a reschedule: the appointment plus every employee holding
 * an active assignment on it. Read outside the lock and re-checked inside.
 */
export async function resolveRescheduleKeys(
  reader: SchedulingReader,
  appointmentId: string
): Promise<ServiceResult<string[]>> {
  const assignments = await reader.listAppointmentAssignments(appointmentId);
  return success([
    appointmentLock(appointmentId),
    ...assignments.filter(isActiveAssignment).map((a) => employeeLock(a.employeeId)),
  ]);
}

/**
 * Moves an appointment to a new start time, keeping its assignments.
 *
 * The appointment passes through RESCHEDULED and lands in SCHEDULED within
 * one unit; if any assigned employee cannot take the new window nothing is
 * written.
 */
export async function rescheduleAppointment(
  tx: SchedulingTransaction,
  input: { appointmentId: string; startTime: Date },
  ctx: UnitContext
): Promise<ServiceResult<AppointmentDetails>> {
  const found = await loadAppointment(tx, input.appointmentId);
  if (!found.success) return found;
  const appointment = found.data;

  const assignments = await tx.listAppointmentAssignments(appointment.id);
  const active = assignments.filter(isActiveAssignment);
  assertLocked(ctx, [appointmentLock(appointment.id), ...active.map((a) => employeeLock(a.employeeId))]);

  if (!canTransition(appointment.status, AppointmentStatus.RESCHEDULED)) {
    return invalidTransition(appointment, AppointmentStatus.RESCHEDULED);
  }

  const service = await tx.findService(appointment.serviceId);
  if (!service) {
    return failure(ErrorCode.NOT_FOUND, `Service with ID ${appointment.serviceId} not found`, {
      serviceId: appointment.serviceId,
    });
  }

  const window = validateBookingWindow(
    { start: input.startTime, end: addMinutes(input.startTime, service.durationMinutes) },
    ctx.config,
    ctx.now
  );
  if (!window.success) return window;

  const blocked: Array<{ message: string; details: Record<string, unknown> }> = [];

  for (const assignment of active) {
    const employee = await tx.findEmployee(assignment.employeeId);
    if (!employee) {
      blocked.push({
        message: `employee ${assignment.employeeId} no longer exists`,
        details: { employeeId: assignment.employeeId, reason: 'EMPLOYEE_NOT_FOUND', conflictingAppointmentIds: [] },
      });
      continue;
    }

    const fit = await checkEmployeeFit(tx, employee, window.data, ctx.config, assignment.id);
    if (!fit.available) {
      blocked.push({ message: describeUnavailability(employee, fit), details: unavailabilityDetails(employee, fit) });
    }
  }

  if (blocked.length > 0) {
    return failure(ErrorCode.CONFLICT, `Cannot reschedule: ${blocked.map((b) => b.message).join('; ')}`, {
      appointmentId: appointment.id,
      requestedStart: window.data.start.toISOString(),
      requestedEnd: window.data.end.toISOString(),
      employees: blocked.map((b) => b.details),
    });
  }

  const rescheduled = transition(appointment, AppointmentStatus.RESCHEDULED, ctx.now);
  const updated: Appointment = {
    ...transition(rescheduled, AppointmentStatus.SCHEDULED, ctx.now),
    startTime: window.data.start,
    endTime: window.data.end,
  };

  await tx.updateAppointment(updated);
  return success({ appointment: updated, assignments });
}

function transition(appointment: Appointment, status: AppointmentStatus, now: Date): Appointment {
  return { ...appointment, status, updatedAt: now };
}

// ============================================================================
// Lifecycle
// ============================================================================

const CANCEL_ALL: CascadeRules = {
  [AssignmentStatus.ASSIGNED]: AssignmentStatus.CANCELLED,
  [AssignmentStatus.IN_PROGRESS]: AssignmentStatus.CANCELLED,
};

const START_ALL: CascadeRules = {
  [AssignmentStatus.ASSIGNED]: AssignmentStatus.IN_PROGRESS,
};

const FINISH_ALL: CascadeRules = {
  [AssignmentStatus.IN_PROGRESS]: AssignmentStatus.COMPLETED,
  [AssignmentStatus.ASSIGNED]: AssignmentStatus.CANCELLED,
};

/**
 * Cancels a non-terminal appointment and every non-terminal assignment on it.
 */
export async function cancelAppointment(
  tx: SchedulingTransaction,
  input: CancelAppointmentInput,
  ctx: UnitContext
): Promise<ServiceResult<CancellationResult>> {
  assertLocked(ctx, [appointmentLock(input.appointmentId)]);

  const found = await loadAppointment(tx, input.appointmentId);
  if (!found.success) return found;
  const appointment = found.data;

  if (!canTransition(appointment.status, AppointmentStatus.CANCELLED)) {
    return invalidTransition(appointment, AppointmentStatus.CANCELLED);
  }

  const reason = validateNotes(input.reason);
  if (!reason.success) return reason;

  const updated: Appointment = {
    ...transition(appointment, AppointmentStatus.CANCELLED, ctx.now),
    cancellationReason: reason.data,
  };
  await tx.updateAppointment(updated);

  const cancelledAssignmentIds = await cascadeAssignmentStatus(tx, appointment.id, CANCEL_ALL, ctx.now);
  return success({ appointment: updated, cancelledAssignmentIds });
}

export async function confirmAppointment(
  tx: SchedulingTransaction,
  appointmentId: string,
  ctx: UnitContext
): Promise<ServiceResult<Appointment>> {
  assertLocked(ctx, [appointmentLock(appointmentId)]);

  const found = await loadAppointment(tx, appointmentId);
  if (!found.success) return found;

  if (!canTransition(found.data.status, AppointmentStatus.CONFIRMED)) {
    return invalidTransition(found.data, AppointmentStatus.CONFIRMED);
  }

  const updated = transition(found.data, AppointmentStatus.CONFIRMED, ctx.now);
  await tx.updateAppointment(updated);
  return success(updated);
}

/**
 * CONFIRMED → IN_PROGRESS; assigned staff start working with it.
 */
export async function startAppointment(
  tx: SchedulingTransaction,
  appointmentId: string,
  ctx: UnitContext
): Promise<ServiceResult<AppointmentDetails>> {
  assertLocked(ctx, [appointmentLock(appointmentId)]);

  const found = await loadAppointment(tx, appointmentId);
  if (!found.success) return found;

  if (!canTransition(found.data.status, AppointmentStatus.IN_PROGRESS)) {
    return invalidTransition(found.data, AppointmentStatus.IN_PROGRESS);
  }

  const updated = transition(found.data, AppointmentStatus.IN_PROGRESS, ctx.now);
  await tx.updateAppointment(updated);
  await cascadeAssignmentStatus(tx, appointmentId, START_ALL, ctx.now);

  return success(await withAssignments(tx, updated));
}

/**
 * IN_PROGRESS → COMPLETED. Work that nobody was staffed on cannot be
 * completed: at least one assignment must be IN_PROGRESS or COMPLETED.
 */
export async function completeAppointment(
  tx: SchedulingTransaction,
  appointmentId: string,
  ctx: UnitContext
): Promise<ServiceResult<AppointmentDetails>> {
  assertLocked(ctx, [appointmentLock(appointmentId)]);

  const found = await loadAppointment(tx, appointmentId);
  if (!found.success) return found;
  const appointment = found.data;

  const assignments = await tx.listAppointmentAssignments(appointmentId);
  const staffed = assignments.some(
    (a) => a.status === AssignmentStatus.IN_PROGRESS || a.status === AssignmentStatus.COMPLETED
  );
  if (!staffed) {
    return failure(ErrorCode.INVALID_STATE, 'Cannot complete an appointment with no staff working on it', {
      appointmentId,
      currentStatus: appointment.status,
      assignmentCount: assignments.length,
    });
  }

  if (!canTransition(appointment.status, AppointmentStatus.COMPLETED)) {
    return invalidTransition(appointment, AppointmentStatus.COMPLETED);
  }

  const updated = transition(appointment, AppointmentStatus.COMPLETED, ctx.now);
  await tx.updateAppointment(updated);
  await cascadeAssignmentStatus(tx, appointmentId, FINISH_ALL, ctx.now);

  return success(await withAssignments(tx, updated));
}

/**
 * CONFIRMED → NO_SHOW, allowed once the grace period after the start has
 * passed. Assigned staff are released.
 */
export async function markNoShow(
  tx: SchedulingTransaction,
  appointmentId: string,
  ctx: UnitContext
): Promise<ServiceResult<CancellationResult>> {
  assertLocked(ctx, [appointmentLock(appointmentId)]);

  const found = await loadAppointment(tx, appointmentId);
  if (!found.success) return found;
  const appointment = found.data;

  if (!canTransition(appointment.status, AppointmentStatus.NO_SHOW)) {
    return invalidTransition(appointment, AppointmentStatus.NO_SHOW);
  }

  const eligibleAt = addMinutes(appointment.startTime, ctx.config.noShowGraceMinutes);
  if (ctx.now < eligibleAt) {
    return failure(ErrorCode.INVALID_STATE, 'Cannot mark as no-show before the grace period has passed', {
      appointmentId,
      appointmentStart: appointment.startTime.toISOString(),
      eligibleAt: eligibleAt.toISOString(),
      currentTime: ctx.now.toISOString(),
    });
  }

  const updated = transition(appointment, AppointmentStatus.NO_SHOW, ctx.now);
  await tx.updateAppointment(updated);

  const cancelledAssignmentIds = await cascadeAssignmentStatus(tx, appointmentId, CANCEL_ALL, ctx.now);
  return success({ appointment: updated, cancelledAssignmentIds });
}

/**
 * CONFIRMED appointments whose grace period has run out, oldest first.
 */
export async function findNoShowCandidates(
  reader: SchedulingReader,
  config: SchedulingConfig,
  now: Date
): Promise<Appointment[]> {
  return reader.listAppointments({
    statuses: [AppointmentStatus.CONFIRMED],
    startsBefore: addMinutes(now, -config.noShowGraceMinutes),
  });
}
