/**
 * Shared types and configuration for the scheduling engine
 */

// ============================================================================
// Configuration
// ============================================================================

/** Day of week as returned by `Date#getDay()` (Sunday = 0) */
export type DayOfWeek = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export const DAYS_OF_WEEK: readonly DayOfWeek[] = [0, 1, 2, 3, 4, 5, 6];

/** Wall-clock window within a single day, times as `HH:MM` */
export interface WorkingWindow {
  start: string;
  end: string;
}

/** Opening hours per weekday; `null` means closed */
export type BusinessHours = Record<DayOfWeek, WorkingWindow | null>;

/**
 * Per-employee weekday overrides. A missing day falls back to the business
 * hours, an explicit `null` is a day off.
 */
export type WorkingHoursProfile = Partial<Record<DayOfWeek, WorkingWindow | null>>;

export interface SchedulingConfig {
  /** Spacing of candidate start times in minutes (default: 15) */
  slotGranularityMinutes: number;
  /** Minimum gap between two assignments of the same employee (default: 0) */
  bufferMinutes: number;
  /** How many days ahead a booking may start (default: 90) */
  bookingHorizonDays: number;
  /** Retries for stale lock sets and transient store failures (default: 3) */
  maxWriteRetries: number;
  /** Base delay of the exponential backoff between retries (default: 50) */
  retryBaseDelayMs: number;
  /** Upper bound on waiting for a lock (default: 5000) */
  lockTimeoutMs: number;
  /** Minutes after start before a confirmed appointment may become a no-show (default: 10) */
  noShowGraceMinutes: number;
  businessHours: BusinessHours;
  /** Business clock; everything "in the past" is relative to this */
  now: () => Date;
}

const WEEKDAY_HOURS: WorkingWindow = { start: '08:00', end: '17:00' };
const WEEKEND_HOURS: WorkingWindow = { start: '09:00', end: '15:00' };

export const DEFAULT_BUSINESS_HOURS: BusinessHours = {
  0: WEEKEND_HOURS,
  1: WEEKDAY_HOURS,
  2: WEEKDAY_HOURS,
  3: WEEKDAY_HOURS,
  4: WEEKDAY_HOURS,
  5: WEEKDAY_HOURS,
  6: WEEKEND_HOURS,
};

export const DEFAULT_SCHEDULING_CONFIG: SchedulingConfig = {
  slotGranularityMinutes: 15,
  bufferMinutes: 0,
  bookingHorizonDays: 90,
  maxWriteRetries: 3,
  retryBaseDelayMs: 50,
  lockTimeoutMs: 5000,
  noShowGraceMinutes: 10,
  businessHours: DEFAULT_BUSINESS_HOURS,
  now: () => new Date(),
};

export function resolveConfig(config: Partial<SchedulingConfig> = {}): SchedulingConfig {
  return { ...DEFAULT_SCHEDULING_CONFIG, ...config };
}

// ============================================================================
// Domain
// ============================================================================

export enum AppointmentStatus {
  SCHEDULED = 'SCHEDULED',
  CONFIRMED = 'CONFIRMED',
  IN_PROGRESS = 'IN_PROGRESS',
  COMPLETED = 'COMPLETED',
  CANCELLED = 'CANCELLED',
  NO_SHOW = 'NO_SHOW',
  RESCHEDULED = 'RESCHEDULED',
}

export enum AssignmentStatus {
  ASSIGNED = 'ASSIGNED',
  IN_PROGRESS = 'IN_PROGRESS',
  COMPLETED = 'COMPLETED',
  CANCELLED = 'CANCELLED',
}

export enum StaffRole {
  ADMIN = 'ADMIN',
  MANAGER = 'MANAGER',
  TECHNICIAN = 'TECHNICIAN',
}

export interface Employee {
  id: string;
  name: string;
  role: StaffRole;
  active: boolean;
  workingHours: WorkingHoursProfile | null;
  /** Services this employee may perform; undefined means all of them */
  serviceIds?: string[];
}

export interface Service {
  id: string;
  name: string;
  durationMinutes: number;
  category: string;
}

export interface Customer {
  id: string;
  name: string;
  email?: string;
  phone?: string;
}

export interface Appointment {
  id: string;
  customerId: string;
  serviceId: string;
  startTime: Date;
  endTime: Date;
  status: AppointmentStatus;
  notes?: string;
  cancellationReason?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Assignment {
  id: string;
  appointmentId: string;
  employeeId: string;
  status: AssignmentStatus;
  notes?: string;
  createdAt: Date;
  updatedAt: Date;
}

/** An assignment together with the window it inherits from its appointment */
export interface ScheduledAssignment extends Assignment {
  startTime: Date;
  endTime: Date;
}

export interface TimeSlot {
  employeeId: string;
  startTime: Date;
  endTime: Date;
  available: boolean;
}

/** Assignment statuses that occupy the employee's time */
export const ACTIVE_ASSIGNMENT_STATUSES: readonly AssignmentStatus[] = [
  AssignmentStatus.ASSIGNED,
  AssignmentStatus.IN_PROGRESS,
];

/** Everything except CANCELLED; used when computing free time */
export const BUSY_ASSIGNMENT_STATUSES: readonly AssignmentStatus[] = [
  AssignmentStatus.ASSIGNED,
  AssignmentStatus.IN_PROGRESS,
  AssignmentStatus.COMPLETED,
];

export const TERMINAL_APPOINTMENT_STATUSES: readonly AppointmentStatus[] = [
  AppointmentStatus.COMPLETED,
  AppointmentStatus.CANCELLED,
  AppointmentStatus.NO_SHOW,
];

export function isTerminalAppointmentStatus(status: AppointmentStatus): boolean {
  return TERMINAL_APPOINTMENT_STATUSES.includes(status);
}

export function isActiveAssignment(assignment: Pick<Assignment, 'status'>): boolean {
  return ACTIVE_ASSIGNMENT_STATUSES.includes(assignment.status);
}

// ============================================================================
// Result Types (discriminated unions for type-safe error handling)
// ============================================================================

export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; error: ServiceError };

export interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export enum ErrorCode {
  /** Malformed or out-of-range input; never retried */
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  /** Time overlap or a lost concurrent write; retry with fresh availability */
  CONFLICT = 'CONFLICT',
  INVALID_STATE = 'INVALID_STATE',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  /** Store unavailable; transient */
  PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
}

// ============================================================================
// Input/Output DTOs
// ============================================================================

export interface BookAppointmentInput {
  customerId: string;
  serviceId: string;
  startTime: Date;
  notes?: string;
}

export interface CreateAssignmentInput {
  appointmentId: string;
  employeeId: string;
  notes?: string;
}

export interface CancelAppointmentInput {
  appointmentId: string;
  reason?: string;
}

export interface CancellationResult {
  appointment: Appointment;
  cancelledAssignmentIds: string[];
}

export interface AppointmentDetails {
  appointment: Appointment;
  assignments: Assignment[];
}

export interface AvailableSlotsInput {
  serviceId: string;
  date: Date;
  /** Restrict candidates; defaults to every active, qualified employee */
  employeeIds?: string[];
}

export interface NoShowDetectionResult {
  scanned: number;
  markedAsNoShow: number;
  details: Array<{ appointmentId: string; customerId: string }>;
  failures: Array<{ appointmentId: string; error: string }>;
}

// ============================================================================
// Helper functions
// ============================================================================

/**
 * Creates a success result
 */
export function success<T>(data: T): ServiceResult<T> {
  return { success: true, data };
}

/**
 * Creates an error result
 */
export function failure<T>(code: ErrorCode, message: string, details?: Record<string, unknown>): ServiceResult<T> {
  return {
    success: false,
    error: { code, message, details },
  };
}
