/**
 * Persistence port of the scheduling engine.
 *
 * Implementations: PgSchedulingStore (production) and
 * MemorySchedulingStore (tests, local development).
 */

import {
  Appointment,
  AppointmentStatus,
  Assignment,
  AssignmentStatus,
  Customer,
  Employee,
  ScheduledAssignment,
  Service,
  ServiceResult,
} from '../services/types';

export interface EmployeeAssignmentQuery {
  /** Inclusive lower bound on the appointment end */
  from: Date;
  /** Exclusive upper bound on the appointment start */
  to: Date;
  statuses: readonly AssignmentStatus[];
}

export interface AppointmentQuery {
  statuses: readonly AppointmentStatus[];
  startsBefore: Date;
}

export interface SchedulingReader {
  findEmployee(id: string): Promise<Employee | null>;
  listEmployees(): Promise<Employee[]>;
  findService(id: string): Promise<Service | null>;
  findCustomer(id: string): Promise<Customer | null>;
  findAppointment(id: string): Promise<Appointment | null>;
  listAppointments(query: AppointmentQuery): Promise<Appointment[]>;
  findAssignment(id: string): Promise<Assignment | null>;
  listAppointmentAssignments(appointmentId: string): Promise<Assignment[]>;
  /** Assignments of an employee whose appointment window overlaps [from, to), by start time */
  listEmployeeAssignments(employeeId: string, query: EmployeeAssignmentQuery): Promise<ScheduledAssignment[]>;
}

export interface SchedulingWriter {
  insertAppointment(appointment: Appointment): Promise<void>;
  updateAppointment(appointment: Appointment): Promise<void>;
  insertAssignment(assignment: Assignment): Promise<void>;
  updateAssignment(assignment: Assignment): Promise<void>;
}

export type SchedulingTransaction = SchedulingReader & SchedulingWriter;

export interface LockOptions {
  /** Give up waiting for any single key after this many milliseconds */
  timeoutMs: number;
}

export interface SchedulingStore extends SchedulingReader {
  /**
   * Runs `work` as one atomic unit while holding every key in `keys`.
   *
   * Writes are committed only when `work` resolves to a success result;
   * a failure result or a thrown error leaves the store untouched.
   */
  withLocks<T>(
    keys: string[],
    work: (tx: SchedulingTransaction) => Promise<ServiceResult<T>>,
    options: LockOptions
  ): Promise<ServiceResult<T>>;
}

export function employeeLock(employeeId: string): string {
  return `employee:${employeeId}`;
}

export function appointmentLock(appointmentId: string): string {
  return `appointment:${appointmentId}`;
}

/** De-duplicated keys in global acquisition order */
export function normalizeLockKeys(keys: string[]): string[] {
  return [...new Set(keys)].sort();
}
