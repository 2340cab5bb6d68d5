/**
 * Scheduling Facade
 *
 * The single entry point for callers (HTTP routes, batch jobs). Every write
 * runs as one atomic unit; bookings, reschedules and cancellations are
 * announced to the notification sender after they commit.
 */

import { Logger, silentLogger } from '../lib/logger';
import { SchedulingReader, SchedulingStore, appointmentLock, employeeLock } from '../store/types';
import {
  bookAppointment,
  cancelAppointment,
  completeAppointment,
  confirmAppointment,
  findNoShowCandidates,
  getAppointmentDetails,
  markNoShow,
  rescheduleAppointment,
  resolveRescheduleKeys,
  startAppointment,
} from './appointment.service';
import {
  cancelAssignment,
  createAssignment,
  listAssignments,
  reassignEmployee,
  transitionAssignmentStatus,
} from './assignment.service';
import { KeyResolver, UnitOfWork, runAtomic, runRead } from './atomic';
import { availableSlots, nextAvailableSlot, resolveCandidates } from './availability.service';
import {
  LoggingNotificationSender,
  NotificationEvent,
  NotificationEventType,
  NotificationSender,
  dispatchNotification,
} from './notification.service';
import {
  Appointment,
  AppointmentDetails,
  Assignment,
  AssignmentStatus,
  AvailableSlotsInput,
  BookAppointmentInput,
  CancelAppointmentInput,
  CancellationResult,
  CreateAssignmentInput,
  ErrorCode,
  NoShowDetectionResult,
  SchedulingConfig,
  Service,
  ServiceResult,
  TimeSlot,
  failure,
  resolveConfig,
  success,
} from './types';

const DEFAULT_SEARCH_DAYS = 14;

export interface SchedulingFacadeOptions {
  config?: Partial<SchedulingConfig>;
  notifier?: NotificationSender;
  logger?: Logger;
}

export interface NextSlotInput {
  serviceId: string;
  from: Date;
  /** Days after `from` to search (default: 14) */
  maxDaysAhead?: number;
  employeeIds?: string[];
}

function fixedKeys(...keys: string[]): KeyResolver {
  return async () => success(keys);
}

/** Keys for writes that only touch one assignment's appointment */
function assignmentKeys(
  assignmentId: string,
  ...extra: Array<(assignment: Assignment) => string[]>
): KeyResolver {
  return async (reader: SchedulingReader): Promise<ServiceResult<string[]>> => {
    const assignment = await reader.findAssignment(assignmentId);
    if (!assignment) {
      return failure(ErrorCode.NOT_FOUND, `Assignment with ID ${assignmentId} not found`, { assignmentId });
    }
    return success([appointmentLock(assignment.appointmentId), ...extra.flatMap((keys) => keys(assignment))]);
  };
}

export class SchedulingFacade {
  readonly config: SchedulingConfig;
  private readonly notifier: NotificationSender;
  private readonly log: Logger;
  private readonly pendingNotifications = new Set<Promise<void>>();

  constructor(
    private readonly store: SchedulingStore,
    options: SchedulingFacadeOptions = {}
  ) {
    this.config = resolveConfig(options.config);
    this.log = (options.logger ?? silentLogger).child({ component: 'scheduling' });
    this.notifier = options.notifier ?? new LoggingNotificationSender(this.log);
  }

  // ============================================================================
  // Appointments
  // ============================================================================

  async book(input: BookAppointmentInput): Promise<ServiceResult<Appointment>> {
    const result = await this.write(fixedKeys(), (tx, ctx) => bookAppointment(tx, input, ctx));

    if (result.success) {
      this.log.info({ appointmentId: result.data.id, startTime: result.data.startTime }, 'Appointment booked');
      this.notify({
        appointmentId: result.data.id,
        customerId: result.data.customerId,
        eventType: NotificationEventType.BOOKED,
        newStart: result.data.startTime.toISOString(),
      });
    }
    return result;
  }

  async reschedule(appointmentId: string, startTime: Date): Promise<ServiceResult<AppointmentDetails>> {
    const result = await this.write(
      (reader) => resolveRescheduleKeys(reader, appointmentId),
      (tx, ctx) => rescheduleAppointment(tx, { appointmentId, startTime }, ctx)
    );

    if (result.success) {
      const { appointment } = result.data;
      this.log.info({ appointmentId, startTime: appointment.startTime }, 'Appointment rescheduled');
      this.notify({
        appointmentId,
        customerId: appointment.customerId,
        eventType: NotificationEventType.RESCHEDULED,
        newStart: appointment.startTime.toISOString(),
      });
    }
    return result;
  }

  async cancel(input: CancelAppointmentInput): Promise<ServiceResult<CancellationResult>> {
    const result = await this.write(fixedKeys(appointmentLock(input.appointmentId)), (tx, ctx) =>
      cancelAppointment(tx, input, ctx)
    );

    if (result.success) {
      this.log.info(
        { appointmentId: input.appointmentId, cancelledAssignmentIds: result.data.cancelledAssignmentIds },
        'Appointment cancelled'
      );
      this.notify({
        appointmentId: input.appointmentId,
        customerId: result.data.appointment.customerId,
        eventType: NotificationEventType.CANCELLED,
      });
    }
    return result;
  }

  confirm(appointmentId: string): Promise<ServiceResult<Appointment>> {
    return this.write(fixedKeys(appointmentLock(appointmentId)), (tx, ctx) =>
      confirmAppointment(tx, appointmentId, ctx)
    );
  }

  start(appointmentId: string): Promise<ServiceResult<AppointmentDetails>> {
    return this.write(fixedKeys(appointmentLock(appointmentId)), (tx, ctx) =>
      startAppointment(tx, appointmentId, ctx)
    );
  }

  complete(appointmentId: string): Promise<ServiceResult<AppointmentDetails>> {
    return this.write(fixedKeys(appointmentLock(appointmentId)), (tx, ctx) =>
      completeAppointment(tx, appointmentId, ctx)
    );
  }

  markNoShow(appointmentId: string): Promise<ServiceResult<CancellationResult>> {
    return this.write(fixedKeys(appointmentLock(appointmentId)), (tx, ctx) => markNoShow(tx, appointmentId, ctx));
  }

  getAppointment(appointmentId: string): Promise<ServiceResult<AppointmentDetails>> {
    return runRead(this.config, () => getAppointmentDetails(this.store, appointmentId), this.log);
  }

  /**
   * Marks every CONFIRMED appointment past its grace period as NO_SHOW.
   * Each appointment is its own unit; one failure does not stop the sweep.
   */
  async detectNoShows(): Promise<ServiceResult<NoShowDetectionResult>> {
    const candidates = await runRead(
      this.config,
      async () => success(await findNoShowCandidates(this.store, this.config, this.config.now())),
      this.log
    );
    if (!candidates.success) return candidates;

    const result: NoShowDetectionResult = {
      scanned: candidates.data.length,
      markedAsNoShow: 0,
      details: [],
      failures: [],
    };

    for (const appointment of candidates.data) {
      const marked = await this.markNoShow(appointment.id);
      if (marked.success) {
        result.markedAsNoShow += 1;
        result.details.push({ appointmentId: appointment.id, customerId: appointment.customerId });
      } else {
        result.failures.push({ appointmentId: appointment.id, error: marked.error.message });
      }
    }

    this.log.info(
      { scanned: result.scanned, marked: result.markedAsNoShow, failed: result.failures.length },
      'No-show sweep finished'
    );
    return success(result);
  }

  // ============================================================================
  // Staff
  // ============================================================================

  assignStaff(input: CreateAssignmentInput): Promise<ServiceResult<Assignment>> {
    return this.write(
      fixedKeys(appointmentLock(input.appointmentId), employeeLock(input.employeeId)),
      (tx, ctx) => createAssignment(tx, input, ctx)
    );
  }

  reassignStaff(assignmentId: string, employeeId: string): Promise<ServiceResult<Assignment>> {
    return this.write(
      assignmentKeys(
        assignmentId,
        (assignment) => [employeeLock(assignment.employeeId)],
        () => [employeeLock(employeeId)]
      ),
      (tx, ctx) => reassignEmployee(tx, { assignmentId, employeeId }, ctx)
    );
  }

  unassignStaff(assignmentId: string): Promise<ServiceResult<Assignment>> {
    return this.write(assignmentKeys(assignmentId), (tx, ctx) => cancelAssignment(tx, assignmentId, ctx));
  }

  updateAssignmentStatus(assignmentId: string, status: AssignmentStatus): Promise<ServiceResult<Assignment>> {
    return this.write(assignmentKeys(assignmentId), (tx, ctx) =>
      transitionAssignmentStatus(tx, { assignmentId, status }, ctx)
    );
  }

  listAssignments(appointmentId: string): Promise<ServiceResult<Assignment[]>> {
    return runRead(this.config, () => listAssignments(this.store, appointmentId), this.log);
  }

  // ============================================================================
  // Availability
  // ============================================================================

  findAvailableSlots(input: AvailableSlotsInput): Promise<ServiceResult<Iterable<TimeSlot>>> {
    return runRead<Iterable<TimeSlot>>(
      this.config,
      async () => {
        const service = await this.loadService(input.serviceId);
        if (!service.success) return service;

        const candidates = await resolveCandidates(this.store, service.data, input.employeeIds);
        return availableSlots(this.store, candidates, service.data, input.date, this.config);
      },
      this.log
    );
  }

  findNextAvailableSlot(input: NextSlotInput): Promise<ServiceResult<TimeSlot | null>> {
    return runRead<TimeSlot | null>(
      this.config,
      async () => {
        const service = await this.loadService(input.serviceId);
        if (!service.success) return service;

        const candidates = await resolveCandidates(this.store, service.data, input.employeeIds);
        return nextAvailableSlot(
          this.store,
          candidates,
          service.data,
          input.from,
          input.maxDaysAhead ?? DEFAULT_SEARCH_DAYS,
          this.config
        );
      },
      this.log
    );
  }

  // ============================================================================
  // Internals
  // ============================================================================

  /** Resolves once every notification handed out so far has settled */
  async flushNotifications(): Promise<void> {
    await Promise.all([...this.pendingNotifications]);
  }

  private write<T>(resolveKeys: KeyResolver, work: UnitOfWork<T>): Promise<ServiceResult<T>> {
    return runAtomic(this.store, this.config, resolveKeys, work, this.log);
  }

  private async loadService(serviceId: string): Promise<ServiceResult<Service>> {
    const service = await this.store.findService(serviceId);
    if (!service) {
      return failure(ErrorCode.NOT_FOUND, `Service with ID ${serviceId} not found`, { serviceId });
    }
    return success(service);
  }

  private notify(event: NotificationEvent): void {
    const delivery = dispatchNotification(this.notifier, event, this.log);
    this.pendingNotifications.add(delivery);
    void delivery.finally(() => this.pendingNotifications.delete(delivery));
  }
}
