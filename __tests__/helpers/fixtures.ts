import { SchedulingFacade } from '../../src/services/scheduling.facade';
import { NotificationEvent, NotificationSender } from '../../src/services/notification.service';
import { addMinutes } from 'date-fns';
import {
  Appointment,
  AppointmentStatus,
  Assignment,
  AssignmentStatus,
  Customer,
  Employee,
  ErrorCode,
  SchedulingConfig,
  Service,
  ServiceError,
  ServiceResult,
  StaffRole,
  resolveConfig,
} from '../../src/services/types';
import { MemorySchedulingStore } from '../../src/store/memory.store';
import { UnitContext, UnitOfWork } from '../../src/services/atomic';

// Sunday 2030-01-06 12:00 (the test process runs with TZ=UTC)
export const NOW = new Date(2030, 0, 6, 12, 0);

/** Monday 2030-01-07 at the given wall-clock time */
export function monday(hours: number, minutes = 0): Date {
  return new Date(2030, 0, 7, hours, minutes);
}

export const customer: Customer = { id: 'cust-1', name: 'Casey Customer', email: 'casey@example.com' };

export const cleaning: Service = { id: 'svc-clean', name: 'Carpet cleaning', durationMinutes: 30, category: 'cleaning' };
export const deepClean: Service = { id: 'svc-deep', name: 'Deep clean', durationMinutes: 60, category: 'cleaning' };

export const alex: Employee = {
  id: 'emp-alex',
  name: 'Alex',
  role: StaffRole.TECHNICIAN,
  active: true,
  workingHours: null,
};

export const blair: Employee = {
  id: 'emp-blair',
  name: 'Blair',
  role: StaffRole.TECHNICIAN,
  active: true,
  workingHours: null,
};

/** Works Monday afternoons only */
export const parker: Employee = {
  id: 'emp-parker',
  name: 'Parker',
  role: StaffRole.TECHNICIAN,
  active: true,
  workingHours: { 1: { start: '12:00', end: '16:00' }, 2: null, 3: null, 4: null, 5: null, 6: null, 0: null },
};

export const retired: Employee = {
  id: 'emp-retired',
  name: 'Rory',
  role: StaffRole.TECHNICIAN,
  active: false,
  workingHours: null,
};

/** Qualified for deep cleans only */
export const specialist: Employee = {
  id: 'emp-spec',
  name: 'Sam',
  role: StaffRole.TECHNICIAN,
  active: true,
  workingHours: null,
  serviceIds: [deepClean.id],
};

export function appointmentAt(
  id: string,
  start: Date,
  minutes = 30,
  status: AppointmentStatus = AppointmentStatus.SCHEDULED
): Appointment {
  return {
    id,
    customerId: customer.id,
    serviceId: minutes === 60 ? deepClean.id : cleaning.id,
    startTime: start,
    endTime: addMinutes(start, minutes),
    status,
    createdAt: NOW,
    updatedAt: NOW,
  };
}

export function assignmentOf(
  id: string,
  appointmentId: string,
  employeeId: string,
  status: AssignmentStatus = AssignmentStatus.ASSIGNED
): Assignment {
  return { id, appointmentId, employeeId, status, createdAt: NOW, updatedAt: NOW };
}

export function testConfig(overrides: Partial<SchedulingConfig> = {}): SchedulingConfig {
  return resolveConfig({ now: () => NOW, retryBaseDelayMs: 1, lockTimeoutMs: 200, ...overrides });
}

export const staff: Employee[] = [alex, blair, parker, retired, specialist];

export function seededStore(
  appointments: Appointment[] = [],
  assignments: Assignment[] = [],
  employees: Employee[] = staff
): MemorySchedulingStore {
  return new MemorySchedulingStore({
    employees,
    services: [cleaning, deepClean],
    customers: [customer],
    appointments,
    assignments,
  });
}

export class RecordingNotifier implements NotificationSender {
  readonly events: NotificationEvent[] = [];

  async send(event: NotificationEvent): Promise<void> {
    this.events.push(event);
  }
}

export interface Harness {
  store: MemorySchedulingStore;
  facade: SchedulingFacade;
  notifier: RecordingNotifier;
}

export function createHarness(overrides: Partial<SchedulingConfig> = {}): Harness {
  const store = seededStore();
  const notifier = new RecordingNotifier();
  const facade = new SchedulingFacade(store, { config: testConfig(overrides), notifier });
  return { store, facade, notifier };
}

export function unitContext(lockedKeys: string[], overrides: Partial<SchedulingConfig> = {}): UnitContext {
  const config = testConfig(overrides);
  return { config, lockedKeys, now: config.now() };
}

/** Runs one unit of work directly against the store, holding `keys` */
export function inUnit<T>(
  store: MemorySchedulingStore,
  keys: string[],
  work: UnitOfWork<T>,
  overrides: Partial<SchedulingConfig> = {}
): Promise<ServiceResult<T>> {
  const ctx = unitContext(keys, overrides);
  return store.withLocks(keys, (tx) => work(tx, ctx), { timeoutMs: ctx.config.lockTimeoutMs });
}

export function unwrap<T>(result: ServiceResult<T>): T {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.data;
}

export function errorOf<T>(result: ServiceResult<T>, code: ErrorCode): ServiceError {
  if (result.success) {
    throw new Error(`Expected ${code}, got success`);
  }
  if (result.error.code !== code) {
    throw new Error(`Expected ${code}, got ${result.error.code}: ${result.error.message}`);
  }
  return result.error;
}
