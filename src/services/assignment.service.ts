/**
 * Assignment Service
 *
 * Binds employees to appointments and drives the assignment lifecycle:
 *
 *   ASSIGNED → IN_PROGRESS → COMPLETED
 *   ASSIGNED | IN_PROGRESS → CANCELLED
 *
 * All operations run inside an atomic unit (see atomic.ts); conflict checks
 * read the same transaction that performs the write.
 */

import { randomUUID } from 'crypto';
import { SchedulingReader, SchedulingTransaction, appointmentLock, employeeLock } from '../store/types';
import { UnitContext, assertLocked } from './atomic';
import { checkEmployeeFit, employeeUnavailable } from './conflict.service';
import {
  Appointment,
  Assignment,
  AssignmentStatus,
  CreateAssignmentInput,
  Employee,
  ErrorCode,
  ServiceResult,
  failure,
  isActiveAssignment,
  isTerminalAppointmentStatus,
  success,
} from './types';

// ============================================================================
// State machine
// ============================================================================

export const ASSIGNMENT_TRANSITIONS: Record<AssignmentStatus, readonly AssignmentStatus[]> = {
  [AssignmentStatus.ASSIGNED]: [AssignmentStatus.IN_PROGRESS, AssignmentStatus.CANCELLED],
  [AssignmentStatus.IN_PROGRESS]: [AssignmentStatus.COMPLETED, AssignmentStatus.CANCELLED],
  [AssignmentStatus.COMPLETED]: [],
  [AssignmentStatus.CANCELLED]: [],
};

export function canTransitionAssignment(from: AssignmentStatus, to: AssignmentStatus): boolean {
  return ASSIGNMENT_TRANSITIONS[from].includes(to);
}

function invalidTransition<T>(assignment: Assignment, requested: AssignmentStatus): ServiceResult<T> {
  return failure(
    ErrorCode.INVALID_TRANSITION,
    `Cannot move assignment from ${assignment.status} to ${requested}`,
    { assignmentId: assignment.id, currentStatus: assignment.status, requestedStatus: requested }
  );
}

// ============================================================================
// Lookups
// ============================================================================

async function loadAssignment(reader: SchedulingReader, assignmentId: string): Promise<ServiceResult<Assignment>> {
  const assignment = await reader.findAssignment(assignmentId);
  if (!assignment) {
    return failure(ErrorCode.NOT_FOUND, `Assignment with ID ${assignmentId} not found`, { assignmentId });
  }
  return success(assignment);
}

async function loadAppointment(reader: SchedulingReader, appointmentId: string): Promise<ServiceResult<Appointment>> {
  const appointment = await reader.findAppointment(appointmentId);
  if (!appointment) {
    return failure(ErrorCode.NOT_FOUND, `Appointment with ID ${appointmentId} not found`, { appointmentId });
  }
  return success(appointment);
}

/**
 * Employee who may take new work: exists, active, and qualified for the
 * appointment's service.
 */
async function loadAssignableEmployee(
  reader: SchedulingReader,
  employeeId: string,
  appointment: Appointment
): Promise<ServiceResult<Employee>> {
  const employee = await reader.findEmployee(employeeId);
  if (!employee) {
    return failure(ErrorCode.NOT_FOUND, `Employee with ID ${employeeId} not found`, { employeeId });
  }
  if (!employee.active) {
    return failure(ErrorCode.INVALID_STATE, `${employee.name} is not currently active`, {
      employeeId,
      reason: 'EMPLOYEE_INACTIVE',
    });
  }
  if (employee.serviceIds && !employee.serviceIds.includes(appointment.serviceId)) {
    return failure(ErrorCode.INVALID_STATE, `${employee.name} does not perform this service`, {
      employeeId,
      serviceId: appointment.serviceId,
      reason: 'NOT_QUALIFIED',
    });
  }
  return success(employee);
}

function requireOpenAppointment(appointment: Appointment): ServiceResult<Appointment> {
  if (isTerminalAppointmentStatus(appointment.status)) {
    return failure(ErrorCode.INVALID_STATE, `Appointment is already ${appointment.status}`, {
      appointmentId: appointment.id,
      currentStatus: appointment.status,
    });
  }
  return success(appointment);
}

// ============================================================================
// Operations
// ============================================================================

export async function createAssignment(
  tx: SchedulingTransaction,
  input: CreateAssignmentInput,
  ctx: UnitContext
): Promise<ServiceResult<Assignment>> {
  assertLocked(ctx, [appointmentLock(input.appointmentId), employeeLock(input.employeeId)]);

  const appointment = await loadAppointment(tx, input.appointmentId);
  if (!appointment.success) return appointment;

  const employee = await loadAssignableEmployee(tx, input.employeeId, appointment.data);
  if (!employee.success) return employee;

  const open = requireOpenAppointment(appointment.data);
  if (!open.success) return open;

  const window = { start: appointment.data.startTime, end: appointment.data.endTime };
  const fit = await checkEmployeeFit(tx, employee.data, window, ctx.config);
  if (!fit.available) {
    return employeeUnavailable(employee.data, window, fit);
  }

  const assignment: Assignment = {
    id: randomUUID(),
    appointmentId: appointment.data.id,
    employeeId: employee.data.id,
    status: AssignmentStatus.ASSIGNED,
    notes: input.notes,
    createdAt: ctx.now,
    updatedAt: ctx.now,
  };

  await tx.insertAssignment(assignment);
  return success(assignment);
}

/**
 * Moves an active assignment to another employee. The previous employee's
 * time is freed by the same write.
 */
export async function reassignEmployee(
  tx: SchedulingTransaction,
  input: { assignmentId: string; employeeId: string },
  ctx: UnitContext
): Promise<ServiceResult<Assignment>> {
  const found = await loadAssignment(tx, input.assignmentId);
  if (!found.success) return found;
  const assignment = found.data;

  assertLocked(ctx, [
    appointmentLock(assignment.appointmentId),
    employeeLock(assignment.employeeId),
    employeeLock(input.employeeId),
  ]);

  if (!isActiveAssignment(assignment)) {
    return failure(ErrorCode.INVALID_STATE, `Cannot reassign a ${assignment.status} assignment`, {
      assignmentId: assignment.id,
      currentStatus: assignment.status,
    });
  }

  if (assignment.employeeId === input.employeeId) {
    return success(assignment);
  }

  const appointment = await loadAppointment(tx, assignment.appointmentId);
  if (!appointment.success) return appointment;

  const open = requireOpenAppointment(appointment.data);
  if (!open.success) return open;

  const employee = await loadAssignableEmployee(tx, input.employeeId, appointment.data);
  if (!employee.success) return employee;

  const window = { start: appointment.data.startTime, end: appointment.data.endTime };
  const fit = await checkEmployeeFit(tx, employee.data, window, ctx.config);
  if (!fit.available) {
    return employeeUnavailable(employee.data, window, fit);
  }

  const updated: Assignment = { ...assignment, employeeId: employee.data.id, updatedAt: ctx.now };
  await tx.updateAssignment(updated);
  return success(updated);
}

/**
 * Idempotent: an assignment that is already CANCELLED is returned as is.
 */
export async function cancelAssignment(
  tx: SchedulingTransaction,
  assignmentId: string,
  ctx: UnitContext
): Promise<ServiceResult<Assignment>> {
  const found = await loadAssignment(tx, assignmentId);
  if (!found.success) return found;
  const assignment = found.data;

  assertLocked(ctx, [appointmentLock(assignment.appointmentId)]);

  if (assignment.status === AssignmentStatus.CANCELLED) {
    return success(assignment);
  }
  if (!canTransitionAssignment(assignment.status, AssignmentStatus.CANCELLED)) {
    return invalidTransition(assignment, AssignmentStatus.CANCELLED);
  }

  const updated: Assignment = { ...assignment, status: AssignmentStatus.CANCELLED, updatedAt: ctx.now };
  await tx.updateAssignment(updated);
  return success(updated);
}

export async function transitionAssignmentStatus(
  tx: SchedulingTransaction,
  input: { assignmentId: string; status: AssignmentStatus },
  ctx: UnitContext
): Promise<ServiceResult<Assignment>> {
  const found = await loadAssignment(tx, input.assignmentId);
  if (!found.success) return found;
  const assignment = found.data;

  assertLocked(ctx, [appointmentLock(assignment.appointmentId)]);

  if (!canTransitionAssignment(assignment.status, input.status)) {
    return invalidTransition(assignment, input.status);
  }

  const updated: Assignment = { ...assignment, status: input.status, updatedAt: ctx.now };
  await tx.updateAssignment(updated);
  return success(updated);
}

export async function listAssignments(
  reader: SchedulingReader,
  appointmentId: string
): Promise<ServiceResult<Assignment[]>> {
  const appointment = await loadAppointment(reader, appointmentId);
  if (!appointment.success) return appointment;

  return success(await reader.listAppointmentAssignments(appointmentId));
}

// ============================================================================
// Cascades
// ============================================================================

/** Target status per current status; statuses not listed are left alone */
export type CascadeRules = Partial<Record<AssignmentStatus, AssignmentStatus>>;

/**
 * Applies `rules` to every assignment of an appointment and returns the
 * ids that changed. Runs inside the appointment's atomic unit.
 */
export async function cascadeAssignmentStatus(
  tx: SchedulingTransaction,
  appointmentId: string,
  rules: CascadeRules,
  now: Date
): Promise<string[]> {
  const changed: string[] = [];

  for (const assignment of await tx.listAppointmentAssignments(appointmentId)) {
    const target = rules[assignment.status];
    if (!target || target === assignment.status) {
      continue;
    }
    await tx.updateAssignment({ ...assignment, status: target, updatedAt: now });
    changed.push(assignment.id);
  }

  return changed;
}
