/**
 * PostgreSQL scheduling store.
 *
 * Each atomic unit is one transaction on a dedicated pooled client. Lock
 * keys become transaction-scoped advisory locks, taken in sorted order, so
 * they are released by COMMIT/ROLLBACK and never outlive the unit.
 */

import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { z } from 'zod';
import { Logger, silentLogger } from '../lib/logger';
import {
  Appointment,
  AppointmentStatus,
  Assignment,
  AssignmentStatus,
  Customer,
  DAYS_OF_WEEK,
  Employee,
  ScheduledAssignment,
  Service,
  ServiceResult,
  StaffRole,
  WorkingHoursProfile,
} from '../services/types';
import { ConcurrentModificationError, StoreUnavailableError } from './errors';
import {
  AppointmentQuery,
  EmployeeAssignmentQuery,
  LockOptions,
  SchedulingReader,
  SchedulingStore,
  SchedulingTransaction,
  normalizeLockKeys,
} from './types';

/** Rows come back untyped and are validated by the row schemas below */
export type RunQuery = (text: string, params?: unknown[]) => Promise<QueryResult<QueryResultRow>>;

/** A dedicated connection for one transaction */
export interface PgConnection {
  run: RunQuery;
  release(): void;
}

export type ConnectionFactory = () => Promise<PgConnection>;

// ============================================================================
// Error translation
// ============================================================================

const SERIALIZATION_FAILURE_CODES = ['40001', '40P01'];
const LOCK_NOT_AVAILABLE_CODE = '55P03';
const CONNECTION_FAILURE_CODES = ['08000', '08001', '08003', '08004', '08006', '53300', '57P01', '57P02', '57P03'];
const CONNECTION_FAILURE_MESSAGES = [
  'connection terminated unexpectedly',
  'server closed the connection',
  'connection closed',
  'socket hang up',
  'timeout exceeded when trying to connect',
  'econnreset',
  'econnrefused',
  'epipe',
];

/**
 * Maps driver errors onto store errors the atomic runner understands.
 * Anything unrecognised is returned unchanged.
 */
export function toStoreError(error: unknown): unknown {
  if (!(error instanceof Error)) {
    return error;
  }

  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;

  if (code && SERIALIZATION_FAILURE_CODES.includes(code)) {
    return new ConcurrentModificationError(error.message, { sqlState: code });
  }
  if (code === LOCK_NOT_AVAILABLE_CODE) {
    return new StoreUnavailableError(`Lock wait timed out: ${error.message}`, { cause: error });
  }

  const message = error.message.toLowerCase();
  if (
    (code && CONNECTION_FAILURE_CODES.includes(code)) ||
    CONNECTION_FAILURE_MESSAGES.some((fragment) => message.includes(fragment))
  ) {
    return new StoreUnavailableError(`Database unavailable: ${error.message}`, { cause: error });
  }

  return error;
}

function translated(query: RunQuery): RunQuery {
  return async (text: string, params?: unknown[]) => {
    try {
      return await query(text, params);
    } catch (error) {
      throw toStoreError(error);
    }
  };
}

// ============================================================================
// Row mapping
// ============================================================================

const workingWindowSchema = z.object({
  start: z.string(),
  end: z.string(),
});

const workingHoursSchema = z
  .record(z.string(), workingWindowSchema.nullable())
  .nullable()
  .transform((raw): WorkingHoursProfile | null => {
    if (!raw) {
      return null;
    }
    const profile: WorkingHoursProfile = {};
    for (const day of DAYS_OF_WEEK) {
      const key = String(day);
      if (key in raw) {
        profile[day] = raw[key] ?? null;
      }
    }
    return profile;
  });

const optionalText = z
  .string()
  .nullable()
  .transform((value) => value ?? undefined);

const employeeRow = z
  .object({
    id: z.string(),
    name: z.string(),
    role: z.nativeEnum(StaffRole),
    active: z.boolean(),
    working_hours: workingHoursSchema,
    service_ids: z.array(z.string()).nullable(),
  })
  .transform(
    (row): Employee => ({
      id: row.id,
      name: row.name,
      role: row.role,
      active: row.active,
      workingHours: row.working_hours,
      serviceIds: row.service_ids ?? undefined,
    })
  );

const serviceRow = z
  .object({
    id: z.string(),
    name: z.string(),
    duration_minutes: z.number().int(),
    category: z.string(),
  })
  .transform(
    (row): Service => ({
      id: row.id,
      name: row.name,
      durationMinutes: row.duration_minutes,
      category: row.category,
    })
  );

const customerRow = z
  .object({
    id: z.string(),
    name: z.string(),
    email: optionalText,
    phone: optionalText,
  })
  .transform((row): Customer => ({ id: row.id, name: row.name, email: row.email, phone: row.phone }));

const appointmentRow = z
  .object({
    id: z.string(),
    customer_id: z.string(),
    service_id: z.string(),
    start_time: z.date(),
    end_time: z.date(),
    status: z.nativeEnum(AppointmentStatus),
    notes: optionalText,
    cancellation_reason: optionalText,
    created_at: z.date(),
    updated_at: z.date(),
  })
  .transform(
    (row): Appointment => ({
      id: row.id,
      customerId: row.customer_id,
      serviceId: row.service_id,
      startTime: row.start_time,
      endTime: row.end_time,
      status: row.status,
      notes: row.notes,
      cancellationReason: row.cancellation_reason,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    })
  );

const assignmentFields = {
  id: z.string(),
  appointment_id: z.string(),
  employee_id: z.string(),
  status: z.nativeEnum(AssignmentStatus),
  notes: optionalText,
  created_at: z.date(),
  updated_at: z.date(),
};

const assignmentRow = z.object(assignmentFields).transform(
  (row): Assignment => ({
    id: row.id,
    appointmentId: row.appointment_id,
    employeeId: row.employee_id,
    status: row.status,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  })
);

const scheduledAssignmentRow = z
  .object({ ...assignmentFields, start_time: z.date(), end_time: z.date() })
  .transform(
    (row): ScheduledAssignment => ({
      id: row.id,
      appointmentId: row.appointment_id,
      employeeId: row.employee_id,
      status: row.status,
      notes: row.notes,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      startTime: row.start_time,
      endTime: row.end_time,
    })
  );

function first<T>(rows: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  return rows.length > 0 ? schema.parse(rows[0]) : null;
}

function all<T>(rows: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  return rows.map((row) => schema.parse(row));
}

// ============================================================================
// Queries
// ============================================================================

const EMPLOYEE_COLUMNS = 'id, name, role, active, working_hours, service_ids';
const APPOINTMENT_COLUMNS =
  'id, customer_id, service_id, start_time, end_time, status, notes, cancellation_reason, created_at, updated_at';
const ASSIGNMENT_COLUMNS = 'id, appointment_id, employee_id, status, notes, created_at, updated_at';

export class PgSchedulingReader implements SchedulingReader {
  protected readonly run: RunQuery;

  constructor(run: RunQuery) {
    this.run = translated(run);
  }

  async findEmployee(id: string): Promise<Employee | null> {
    const { rows } = await this.run(`SELECT ${EMPLOYEE_COLUMNS} FROM employees WHERE id = $1`, [id]);
    return first(rows, employeeRow);
  }

  async listEmployees(): Promise<Employee[]> {
    const { rows } = await this.run(`SELECT ${EMPLOYEE_COLUMNS} FROM employees ORDER BY id`);
    return all(rows, employeeRow);
  }

  async findService(id: string): Promise<Service | null> {
    const { rows } = await this.run('SELECT id, name, duration_minutes, category FROM services WHERE id = $1', [id]);
    return first(rows, serviceRow);
  }

  async findCustomer(id: string): Promise<Customer | null> {
    const { rows } = await this.run('SELECT id, name, email, phone FROM customers WHERE id = $1', [id]);
    return first(rows, customerRow);
  }

  async findAppointment(id: string): Promise<Appointment | null> {
    const { rows } = await this.run(`SELECT ${APPOINTMENT_COLUMNS} FROM appointments WHERE id = $1`, [id]);
    return first(rows, appointmentRow);
  }

  async listAppointments(query: AppointmentQuery): Promise<Appointment[]> {
    const { rows } = await this.run(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments
       WHERE status = ANY($1::text[]) AND start_time < $2
       ORDER BY start_time`,
      [query.statuses, query.startsBefore]
    );
    return all(rows, appointmentRow);
  }

  async findAssignment(id: string): Promise<Assignment | null> {
    const { rows } = await this.run(`SELECT ${ASSIGNMENT_COLUMNS} FROM service_assignments WHERE id = $1`, [id]);
    return first(rows, assignmentRow);
  }

  async listAppointmentAssignments(appointmentId: string): Promise<Assignment[]> {
    const { rows } = await this.run(
      `SELECT ${ASSIGNMENT_COLUMNS} FROM service_assignments
       WHERE appointment_id = $1
       ORDER BY created_at, id`,
      [appointmentId]
    );
    return all(rows, assignmentRow);
  }

  async listEmployeeAssignments(
    employeeId: string,
    query: EmployeeAssignmentQuery
  ): Promise<ScheduledAssignment[]> {
    const { rows } = await this.run(
      `SELECT sa.id, sa.appointment_id, sa.employee_id, sa.status, sa.notes, sa.created_at, sa.updated_at,
              a.start_time, a.end_time
       FROM service_assignments sa
       JOIN appointments a ON a.id = sa.appointment_id
       WHERE sa.employee_id = $1
         AND sa.status = ANY($2::text[])
         AND a.end_time > $3
         AND a.start_time < $4
       ORDER BY a.start_time, sa.id`,
      [employeeId, query.statuses, query.from, query.to]
    );
    return all(rows, scheduledAssignmentRow);
  }
}

export class PgSchedulingTransaction extends PgSchedulingReader implements SchedulingTransaction {
  async insertAppointment(appointment: Appointment): Promise<void> {
    await this.run(
      `INSERT INTO appointments (${APPOINTMENT_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        appointment.id,
        appointment.customerId,
        appointment.serviceId,
        appointment.startTime,
        appointment.endTime,
        appointment.status,
        appointment.notes ?? null,
        appointment.cancellationReason ?? null,
        appointment.createdAt,
        appointment.updatedAt,
      ]
    );
  }

  async updateAppointment(appointment: Appointment): Promise<void> {
    const { rowCount } = await this.run(
      `UPDATE appointments
       SET start_time = $2, end_time = $3, status = $4, notes = $5, cancellation_reason = $6, updated_at = $7
       WHERE id = $1`,
      [
        appointment.id,
        appointment.startTime,
        appointment.endTime,
        appointment.status,
        appointment.notes ?? null,
        appointment.cancellationReason ?? null,
        appointment.updatedAt,
      ]
    );
    if (rowCount === 0) {
      throw new Error(`Appointment ${appointment.id} does not exist`);
    }
  }

  async insertAssignment(assignment: Assignment): Promise<void> {
    await this.run(
      `INSERT INTO service_assignments (${ASSIGNMENT_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        assignment.id,
        assignment.appointmentId,
        assignment.employeeId,
        assignment.status,
        assignment.notes ?? null,
        assignment.createdAt,
        assignment.updatedAt,
      ]
    );
  }

  async updateAssignment(assignment: Assignment): Promise<void> {
    const { rowCount } = await this.run(
      `UPDATE service_assignments
       SET employee_id = $2, status = $3, notes = $4, updated_at = $5
       WHERE id = $1`,
      [assignment.id, assignment.employeeId, assignment.status, assignment.notes ?? null, assignment.updatedAt]
    );
    if (rowCount === 0) {
      throw new Error(`Assignment ${assignment.id} does not exist`);
    }
  }
}

// ============================================================================
// Store
// ============================================================================

function clientRunner(client: PoolClient): RunQuery {
  return (text: string, params: unknown[] = []) => client.query(text, params);
}

function poolRunner(pool: Pool): RunQuery {
  return (text: string, params: unknown[] = []) => pool.query(text, params);
}

function poolConnections(pool: Pool): ConnectionFactory {
  return async () => {
    const client = await pool.connect();
    return { run: clientRunner(client), release: () => client.release() };
  };
}

export class PgSchedulingStore extends PgSchedulingReader implements SchedulingStore {
  constructor(
    private readonly connect: ConnectionFactory,
    run: RunQuery,
    private readonly log: Logger = silentLogger
  ) {
    super(run);
  }

  static fromPool(pool: Pool, log: Logger = silentLogger): PgSchedulingStore {
    return new PgSchedulingStore(poolConnections(pool), poolRunner(pool), log);
  }

  async withLocks<T>(
    keys: string[],
    work: (tx: SchedulingTransaction) => Promise<ServiceResult<T>>,
    options: LockOptions
  ): Promise<ServiceResult<T>> {
    let connection: PgConnection;
    try {
      connection = await this.connect();
    } catch (error) {
      throw toStoreError(error);
    }

    const run = translated(connection.run);

    try {
      await run('BEGIN');
      // Bounds every advisory lock wait in this transaction
      await run(`SELECT set_config('lock_timeout', $1, true)`, [`${options.timeoutMs}ms`]);

      for (const key of normalizeLockKeys(keys)) {
        await run('SELECT pg_advisory_xact_lock(hashtextextended($1::text, 0))', [key]);
      }

      const result = await work(new PgSchedulingTransaction(connection.run));
      await run(result.success ? 'COMMIT' : 'ROLLBACK');
      return result;
    } catch (error) {
      await this.rollback(connection);
      throw error;
    } finally {
      connection.release();
    }
  }

  private async rollback(connection: PgConnection): Promise<void> {
    try {
      await connection.run('ROLLBACK');
    } catch (rollbackError) {
      this.log.error({ err: rollbackError }, 'Rollback failed');
    }
  }
}
