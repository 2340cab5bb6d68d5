import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import jwt from 'jsonwebtoken';
import { buildApp } from '../../src/app';
import { silentLogger } from '../../src/lib/logger';
import { StaffRole } from '../../src/services/types';
import { Harness, alex, cleaning, createHarness, customer, monday, parker } from '../helpers/fixtures';

const JWT_SECRET = 'test-secret';

function tokenFor(role: StaffRole): string {
  return jwt.sign({ userId: `user-${role.toLowerCase()}`, role }, JWT_SECRET, { expiresIn: '1h' });
}

const technician = { authorization: `Bearer ${tokenFor(StaffRole.TECHNICIAN)}` };
const manager = { authorization: `Bearer ${tokenFor(StaffRole.MANAGER)}` };

describe('HTTP API', () => {
  let harness: Harness;
  let app: Awaited<ReturnType<typeof buildApp>>;

  beforeEach(async () => {
    harness = createHarness();
    app = await buildApp({
      facade: harness.facade,
      jwtSecret: JWT_SECRET,
      corsOrigins: ['http://localhost:5173'],
      logger: silentLogger,
    });
  });

  afterEach(async () => {
    await app.close();
  });

  async function bookAt(start: Date): Promise<string> {
    const response = await app.inject({
      method: 'POST',
      url: '/appointments',
      headers: technician,
      payload: { customerId: customer.id, serviceId: cleaning.id, startTime: start.toISOString() },
    });
    expect(response.statusCode).toBe(201);
    return response.json().appointment.id;
  }

  it('answers health checks without a token', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  describe('authentication', () => {
    it('requires a bearer token', async () => {
      const response = await app.inject({ method: 'GET', url: '/appointments/apt-1' });

      expect(response.statusCode).toBe(401);
      expect(response.json().error.message).toBe('Missing or invalid Authorization header. Expected: Bearer <token>');
    });

    it('rejects expired tokens', async () => {
      const expired = jwt.sign(
        { userId: 'user-1', role: StaffRole.TECHNICIAN, exp: Math.floor(Date.now() / 1000) - 60 },
        JWT_SECRET
      );
      const response = await app.inject({
        method: 'GET',
        url: '/appointments/apt-1',
        headers: { authorization: `Bearer ${expired}` },
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().error.message).toBe('Token has expired');
    });

    it('rejects tokens signed with another secret', async () => {
      const forged = jwt.sign({ userId: 'user-1', role: StaffRole.ADMIN }, 'other-secret');
      const response = await app.inject({
        method: 'GET',
        url: '/appointments/apt-1',
        headers: { authorization: `Bearer ${forged}` },
      });

      expect(response.json().error.message).toBe('Invalid token');
    });

    it('rejects tokens without a known role', async () => {
      const odd = jwt.sign({ userId: 'user-1', role: 'CUSTOMER' }, JWT_SECRET);
      const response = await app.inject({
        method: 'GET',
        url: '/appointments/apt-1',
        headers: { authorization: `Bearer ${odd}` },
      });

      expect(response.json().error.message).toBe('Token payload is invalid');
    });

    it('limits staffing to managers', async () => {
      const appointmentId = await bookAt(monday(10));

      const response = await app.inject({
        method: 'POST',
        url: `/appointments/${appointmentId}/assignments`,
        headers: technician,
        payload: { employeeId: alex.id },
      });

      expect(response.statusCode).toBe(403);
      expect(response.json().error).toEqual({
        code: 'FORBIDDEN',
        message: 'Access denied. Required role: ADMIN or MANAGER',
      });
    });
  });

  describe('appointments', () => {
    it('books and reads back an appointment', async () => {
      const appointmentId = await bookAt(monday(10));

      const response = await app.inject({ method: 'GET', url: `/appointments/${appointmentId}`, headers: technician });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        appointment: {
          id: appointmentId,
          status: 'SCHEDULED',
          startTime: monday(10).toISOString(),
          endTime: monday(10, 30).toISOString(),
        },
        assignments: [],
      });
    });

    it('reports malformed bodies as validation errors', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/appointments',
        headers: technician,
        payload: { customerId: customer.id },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('VALIDATION_ERROR');
      expect(response.json().error.message).toBe('Invalid request');
    });

    it('maps service errors onto status codes', async () => {
      const past = await app.inject({
        method: 'POST',
        url: '/appointments',
        headers: technician,
        payload: { customerId: customer.id, serviceId: cleaning.id, startTime: new Date(2030, 0, 5, 10).toISOString() },
      });
      const missing = await app.inject({ method: 'GET', url: '/appointments/apt-missing', headers: technician });

      expect(past.statusCode).toBe(400);
      expect(past.json().error.message).toBe('Cannot book appointments in the past');
      expect(missing.statusCode).toBe(404);
    });

    it('returns 409 when staff would be double booked', async () => {
      const first = await bookAt(monday(10));
      const second = await bookAt(monday(10, 15));

      const assign = (appointmentId: string) =>
        app.inject({
          method: 'POST',
          url: `/appointments/${appointmentId}/assignments`,
          headers: manager,
          payload: { employeeId: alex.id },
        });

      expect((await assign(first)).statusCode).toBe(201);
      const conflict = await assign(second);
      expect(conflict.statusCode).toBe(409);
      expect(conflict.json().error.code).toBe('CONFLICT');
    });

    it('returns 422 for completing unstaffed work', async () => {
      const appointmentId = await bookAt(monday(10));

      const response = await app.inject({
        method: 'POST',
        url: `/appointments/${appointmentId}/complete`,
        headers: manager,
      });

      expect(response.statusCode).toBe(422);
      expect(response.json().error.code).toBe('INVALID_STATE');
    });

    it('reschedules and cancels', async () => {
      const appointmentId = await bookAt(monday(10));

      const moved = await app.inject({
        method: 'POST',
        url: `/appointments/${appointmentId}/reschedule`,
        headers: technician,
        payload: { startTime: monday(14).toISOString() },
      });
      const cancelled = await app.inject({
        method: 'POST',
        url: `/appointments/${appointmentId}/cancel`,
        headers: technician,
        payload: { reason: 'Customer request' },
      });

      expect(moved.json().appointment.startTime).toBe(monday(14).toISOString());
      expect(cancelled.json()).toMatchObject({
        appointment: { status: 'CANCELLED', cancellationReason: 'Customer request' },
        cancelledAssignmentIds: [],
      });
    });
  });

  describe('assignments', () => {
    it('moves an assignment through its states', async () => {
      const appointmentId = await bookAt(monday(10));
      const created = await app.inject({
        method: 'POST',
        url: `/appointments/${appointmentId}/assignments`,
        headers: manager,
        payload: { employeeId: alex.id },
      });
      const assignmentId = created.json().assignment.id;

      const bad = await app.inject({
        method: 'PUT',
        url: `/assignments/${assignmentId}/status`,
        headers: technician,
        payload: { status: 'DONE' },
      });
      const skipped = await app.inject({
        method: 'PUT',
        url: `/assignments/${assignmentId}/status`,
        headers: technician,
        payload: { status: 'COMPLETED' },
      });
      const started = await app.inject({
        method: 'PUT',
        url: `/assignments/${assignmentId}/status`,
        headers: technician,
        payload: { status: 'IN_PROGRESS' },
      });

      expect(bad.statusCode).toBe(400);
      expect(skipped.statusCode).toBe(422);
      expect(started.json().assignment.status).toBe('IN_PROGRESS');
    });
  });

  describe('availability', () => {
    it('lists slots for a day', async () => {
      const response = await app.inject({
        method: 'GET',
        url: `/services/${cleaning.id}/slots?date=2030-01-07&employeeIds=${parker.id}`,
        headers: technician,
      });

      expect(response.statusCode).toBe(200);
      const { slots } = response.json();
      expect(slots).toHaveLength(15);
      expect(slots[0]).toEqual({
        employeeId: parker.id,
        startTime: monday(12).toISOString(),
        endTime: monday(12, 30).toISOString(),
        available: true,
      });
    });

    it('rejects a malformed date', async () => {
      const response = await app.inject({
        method: 'GET',
        url: `/services/${cleaning.id}/slots?date=07-01-2030`,
        headers: technician,
      });

      expect(response.statusCode).toBe(400);
    });

    it('finds the next slot', async () => {
      const response = await app.inject({
        method: 'GET',
        url: `/services/${cleaning.id}/next-slot?from=${encodeURIComponent(monday(12, 5).toISOString())}&employeeIds=${parker.id}`,
        headers: technician,
      });

      expect(response.json().slot.startTime).toBe(monday(12, 15).toISOString());
    });
  });
});
