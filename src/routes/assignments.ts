import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { AssignmentStatus, StaffRole } from '../services/types';
import { RouteDependencies } from './context';
import { sendServiceError, sendValidationError } from './errors';

const idParams = z.object({ id: z.string().min(1) });

const reassignBody = z.object({
  employeeId: z.string().min(1),
});

const statusBody = z.object({
  status: z.nativeEnum(AssignmentStatus),
});

export const assignmentRoutes: FastifyPluginAsync<RouteDependencies> = async (server, { facade, guards }) => {
  const { requireAuth, requireRole } = guards;
  const requireManager = requireRole(StaffRole.ADMIN, StaffRole.MANAGER);

  // PUT /assignments/:id/employee - Hand the work to another employee
  server.put('/assignments/:id/employee', { preHandler: [requireAuth, requireManager] }, async (request, reply) => {
    const params = idParams.safeParse(request.params);
    const body = reassignBody.safeParse(request.body);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }
    if (!body.success) {
      return sendValidationError(reply, body.error);
    }

    const result = await facade.reassignStaff(params.data.id, body.data.employeeId);
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return { assignment: result.data };
  });

  // POST /assignments/:id/cancel - Unassign (idempotent)
  server.post('/assignments/:id/cancel', { preHandler: [requireAuth, requireManager] }, async (request, reply) => {
    const params = idParams.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }

    const result = await facade.unassignStaff(params.data.id);
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return { assignment: result.data };
  });

  // PUT /assignments/:id/status - Progress an assignment (technicians report their own work)
  server.put('/assignments/:id/status', { preHandler: [requireAuth] }, async (request, reply) => {
    const params = idParams.safeParse(request.params);
    const body = statusBody.safeParse(request.body);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }
    if (!body.success) {
      return sendValidationError(reply, body.error);
    }

    const result = await facade.updateAssignmentStatus(params.data.id, body.data.status);
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return { assignment: result.data };
  });
};
