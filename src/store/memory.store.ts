/**
 * In-process scheduling store.
 *
 * Serializes units per lock key with a KeyedLock and stages every write
 * of a unit in an overlay that is merged into the tables only when the
 * unit succeeds. Snapshots are cloned on the way in and out so callers
 * never share mutable state with the store.
 */

import {
  Appointment,
  Assignment,
  Customer,
  Employee,
  ScheduledAssignment,
  Service,
  ServiceResult,
} from '../services/types';
import { KeyedLock } from './keyed-lock';
import {
  AppointmentQuery,
  EmployeeAssignmentQuery,
  LockOptions,
  SchedulingReader,
  SchedulingStore,
  SchedulingTransaction,
  normalizeLockKeys,
} from './types';

interface Tables {
  employees: Map<string, Employee>;
  services: Map<string, Service>;
  customers: Map<string, Customer>;
  appointments: Map<string, Appointment>;
  assignments: Map<string, Assignment>;
}

interface StagedWrites {
  appointments: Map<string, Appointment>;
  assignments: Map<string, Assignment>;
}

export interface MemoryStoreSeed {
  employees?: Employee[];
  services?: Service[];
  customers?: Customer[];
  appointments?: Appointment[];
  assignments?: Assignment[];
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

function byStartTime(a: { startTime: Date }, b: { startTime: Date }): number {
  return a.startTime.getTime() - b.startTime.getTime();
}

class MemoryReader implements SchedulingReader {
  constructor(
    protected readonly tables: Tables,
    protected readonly staged: StagedWrites | null
  ) {}

  protected appointment(id: string): Appointment | undefined {
    return this.staged?.appointments.get(id) ?? this.tables.appointments.get(id);
  }

  protected allAppointments(): Appointment[] {
    return this.merged(this.tables.appointments, this.staged?.appointments);
  }

  protected allAssignments(): Assignment[] {
    return this.merged(this.tables.assignments, this.staged?.assignments);
  }

  private merged<T>(base: Map<string, T>, overlay: Map<string, T> | undefined): T[] {
    if (!overlay || overlay.size === 0) {
      return [...base.values()];
    }
    return [...new Map([...base, ...overlay]).values()];
  }

  async findEmployee(id: string): Promise<Employee | null> {
    const employee = this.tables.employees.get(id);
    return employee ? clone(employee) : null;
  }

  async listEmployees(): Promise<Employee[]> {
    return [...this.tables.employees.values()]
      .sort((a, b) => a.id.localeCompare(b.id))
      .map(clone);
  }

  async findService(id: string): Promise<Service | null> {
    const service = this.tables.services.get(id);
    return service ? clone(service) : null;
  }

  async findCustomer(id: string): Promise<Customer | null> {
    const customer = this.tables.customers.get(id);
    return customer ? clone(customer) : null;
  }

  async findAppointment(id: string): Promise<Appointment | null> {
    const appointment = this.appointment(id);
    return appointment ? clone(appointment) : null;
  }

  async listAppointments(query: AppointmentQuery): Promise<Appointment[]> {
    return this.allAppointments()
      .filter((a) => query.statuses.includes(a.status) && a.startTime < query.startsBefore)
      .sort(byStartTime)
      .map(clone);
  }

  async findAssignment(id: string): Promise<Assignment | null> {
    const assignment = this.staged?.assignments.get(id) ?? this.tables.assignments.get(id);
    return assignment ? clone(assignment) : null;
  }

  async listAppointmentAssignments(appointmentId: string): Promise<Assignment[]> {
    return this.allAssignments()
      .filter((a) => a.appointmentId === appointmentId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id))
      .map(clone);
  }

  async listEmployeeAssignments(
    employeeId: string,
    query: EmployeeAssignmentQuery
  ): Promise<ScheduledAssignment[]> {
    const result: ScheduledAssignment[] = [];

    for (const assignment of this.allAssignments()) {
      if (assignment.employeeId !== employeeId || !query.statuses.includes(assignment.status)) {
        continue;
      }
      const appointment = this.appointment(assignment.appointmentId);
      if (!appointment || appointment.startTime >= query.to || appointment.endTime <= query.from) {
        continue;
      }
      result.push({
        ...clone(assignment),
        startTime: new Date(appointment.startTime),
        endTime: new Date(appointment.endTime),
      });
    }

    return result.sort(byStartTime);
  }
}

class MemoryTransaction extends MemoryReader implements SchedulingTransaction {
  constructor(tables: Tables, private readonly writes: StagedWrites) {
    super(tables, writes);
  }

  async insertAppointment(appointment: Appointment): Promise<void> {
    if (this.appointment(appointment.id)) {
      throw new Error(`Appointment ${appointment.id} already exists`);
    }
    this.writes.appointments.set(appointment.id, clone(appointment));
  }

  async updateAppointment(appointment: Appointment): Promise<void> {
    if (!this.appointment(appointment.id)) {
      throw new Error(`Appointment ${appointment.id} does not exist`);
    }
    this.writes.appointments.set(appointment.id, clone(appointment));
  }

  async insertAssignment(assignment: Assignment): Promise<void> {
    if (await this.findAssignment(assignment.id)) {
      throw new Error(`Assignment ${assignment.id} already exists`);
    }
    this.writes.assignments.set(assignment.id, clone(assignment));
  }

  async updateAssignment(assignment: Assignment): Promise<void> {
    if (!(await this.findAssignment(assignment.id))) {
      throw new Error(`Assignment ${assignment.id} does not exist`);
    }
    this.writes.assignments.set(assignment.id, clone(assignment));
  }
}

export class MemorySchedulingStore extends MemoryReader implements SchedulingStore {
  private readonly locks = new KeyedLock();

  constructor(seed: MemoryStoreSeed = {}) {
    super(
      {
        employees: new Map(),
        services: new Map(),
        customers: new Map(),
        appointments: new Map(),
        assignments: new Map(),
      },
      null
    );
    seed.employees?.forEach((e) => this.addEmployee(e));
    seed.services?.forEach((s) => this.addService(s));
    seed.customers?.forEach((c) => this.addCustomer(c));
    seed.appointments?.forEach((a) => this.tables.appointments.set(a.id, clone(a)));
    seed.assignments?.forEach((a) => this.tables.assignments.set(a.id, clone(a)));
  }

  // Reference data is owned by staff management; these only seed it.

  addEmployee(employee: Employee): void {
    this.tables.employees.set(employee.id, clone(employee));
  }

  addService(service: Service): void {
    this.tables.services.set(service.id, clone(service));
  }

  addCustomer(customer: Customer): void {
    this.tables.customers.set(customer.id, clone(customer));
  }

  async withLocks<T>(
    keys: string[],
    work: (tx: SchedulingTransaction) => Promise<ServiceResult<T>>,
    options: LockOptions
  ): Promise<ServiceResult<T>> {
    const release = await this.locks.acquireAll(normalizeLockKeys(keys), options.timeoutMs);

    try {
      const writes: StagedWrites = { appointments: new Map(), assignments: new Map() };
      const result = await work(new MemoryTransaction(this.tables, writes));

      if (result.success) {
        writes.appointments.forEach((a, id) => this.tables.appointments.set(id, a));
        writes.assignments.forEach((a, id) => this.tables.assignments.set(id, a));
      }

      return result;
    } finally {
      release();
    }
  }

  /** Keys currently held or awaited */
  get pendingLocks(): number {
    return this.locks.size;
  }
}
