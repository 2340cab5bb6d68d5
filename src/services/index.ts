/**
 * Scheduling Engine Services
 *
 * Framework-agnostic entry points. HTTP routes and batch scripts should go
 * through SchedulingFacade; the individual services are exported for
 * callers that manage their own atomic units.
 */

// Re-export all types and configuration
export type {
  // Configuration
  SchedulingConfig,
  BusinessHours,
  WorkingWindow,
  WorkingHoursProfile,
  DayOfWeek,

  // Domain
  Employee,
  Service,
  Customer,
  Appointment,
  Assignment,
  ScheduledAssignment,
  TimeSlot,

  // Result types
  ServiceResult,
  ServiceError,

  // Input/Output DTOs
  BookAppointmentInput,
  CreateAssignmentInput,
  CancelAppointmentInput,
  CancellationResult,
  AppointmentDetails,
  AvailableSlotsInput,
  NoShowDetectionResult,
} from './types';

export {
  DEFAULT_SCHEDULING_CONFIG,
  DEFAULT_BUSINESS_HOURS,
  resolveConfig,
  AppointmentStatus,
  AssignmentStatus,
  StaffRole,
  ErrorCode,
  success,
  failure,
} from './types';

// Facade
export { SchedulingFacade } from './scheduling.facade';
export type { SchedulingFacadeOptions, NextSlotInput } from './scheduling.facade';

// Appointment lifecycle
export { APPOINTMENT_TRANSITIONS, canTransition, validateBookingWindow } from './appointment.service';

// Assignment lifecycle
export { ASSIGNMENT_TRANSITIONS, canTransitionAssignment } from './assignment.service';

// Conflict detection
export { hasConflict, findConflicts, checkEmployeeFit } from './conflict.service';

// Availability calculation
export { availableSlots, nextAvailableSlot, resolveCandidates } from './availability.service';

// Notifications
export { NotificationEventType, LoggingNotificationSender } from './notification.service';
export type { NotificationEvent, NotificationSender } from './notification.service';

// Stores
export { MemorySchedulingStore } from '../store/memory.store';
export { PgSchedulingStore } from '../store/pg.store';
export type { SchedulingStore, SchedulingReader, SchedulingTransaction } from '../store/types';
