import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { StaffRole } from '../services/types';
import { RouteDependencies } from './context';
import { sendServiceError, sendValidationError } from './errors';

const idParams = z.object({ id: z.string().min(1) });

const bookBody = z.object({
  customerId: z.string().min(1),
  serviceId: z.string().min(1),
  startTime: z.coerce.date(),
  notes: z.string().optional(),
});

const rescheduleBody = z.object({
  startTime: z.coerce.date(),
});

const cancelBody = z
  .object({
    reason: z.string().optional(),
  })
  .default({});

const assignBody = z.object({
  employeeId: z.string().min(1),
  notes: z.string().optional(),
});

export const appointmentRoutes: FastifyPluginAsync<RouteDependencies> = async (server, { facade, guards }) => {
  const { requireAuth, requireRole } = guards;
  const requireManager = requireRole(StaffRole.ADMIN, StaffRole.MANAGER);

  // POST /appointments - Book an appointment (no staff assigned yet)
  server.post('/appointments', { preHandler: [requireAuth] }, async (request, reply) => {
    const body = bookBody.safeParse(request.body);
    if (!body.success) {
      return sendValidationError(reply, body.error);
    }

    const result = await facade.book(body.data);
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return reply.status(201).send({ appointment: result.data });
  });

  // GET /appointments/:id - Appointment with its assignments
  server.get('/appointments/:id', { preHandler: [requireAuth] }, async (request, reply) => {
    const params = idParams.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }

    const result = await facade.getAppointment(params.data.id);
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return result.data;
  });

  // POST /appointments/:id/reschedule - Move to a new start time
  server.post('/appointments/:id/reschedule', { preHandler: [requireAuth] }, async (request, reply) => {
    const params = idParams.safeParse(request.params);
    const body = rescheduleBody.safeParse(request.body);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }
    if (!body.success) {
      return sendValidationError(reply, body.error);
    }

    const result = await facade.reschedule(params.data.id, body.data.startTime);
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return result.data;
  });

  // POST /appointments/:id/cancel - Cancel and release assigned staff
  server.post('/appointments/:id/cancel', { preHandler: [requireAuth] }, async (request, reply) => {
    const params = idParams.safeParse(request.params);
    const body = cancelBody.safeParse(request.body ?? {});
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }
    if (!body.success) {
      return sendValidationError(reply, body.error);
    }

    const result = await facade.cancel({ appointmentId: params.data.id, reason: body.data.reason });
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return result.data;
  });

  // Lifecycle transitions without a body
  const transitions = {
    confirm: (id: string) => facade.confirm(id),
    start: (id: string) => facade.start(id),
    complete: (id: string) => facade.complete(id),
    'no-show': (id: string) => facade.markNoShow(id),
  };

  for (const [action, run] of Object.entries(transitions)) {
    server.post(`/appointments/:id/${action}`, { preHandler: [requireAuth, requireManager] }, async (request, reply) => {
      const params = idParams.safeParse(request.params);
      if (!params.success) {
        return sendValidationError(reply, params.error);
      }

      const result = await run(params.data.id);
      if (!result.success) {
        return sendServiceError(reply, result.error);
      }

      return result.data;
    });
  }

  // POST /appointments/:id/assignments - Assign an employee
  server.post(
    '/appointments/:id/assignments',
    { preHandler: [requireAuth, requireManager] },
    async (request, reply) => {
      const params = idParams.safeParse(request.params);
      const body = assignBody.safeParse(request.body);
      if (!params.success) {
        return sendValidationError(reply, params.error);
      }
      if (!body.success) {
        return sendValidationError(reply, body.error);
      }

      const result = await facade.assignStaff({ appointmentId: params.data.id, ...body.data });
      if (!result.success) {
        return sendServiceError(reply, result.error);
      }

      return reply.status(201).send({ assignment: result.data });
    }
  );

  // GET /appointments/:id/assignments - Staff on an appointment
  server.get('/appointments/:id/assignments', { preHandler: [requireAuth] }, async (request, reply) => {
    const params = idParams.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }

    const result = await facade.listAssignments(params.data.id);
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return { assignments: result.data };
  });
};
