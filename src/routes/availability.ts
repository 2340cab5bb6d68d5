import { FastifyPluginAsync } from 'fastify';
import { parseISO } from 'date-fns';
import { z } from 'zod';
import { RouteDependencies } from './context';
import { sendServiceError, sendValidationError } from './errors';

const serviceParams = z.object({ serviceId: z.string().min(1) });

const employeeIdList = z
  .string()
  .optional()
  .transform((value) => (value ? value.split(',').map((id) => id.trim()).filter(Boolean) : undefined));

const slotsQuery = z.object({
  // Calendar date in the business time zone
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
    .transform((value) => parseISO(value)),
  employeeIds: employeeIdList,
});

const nextSlotQuery = z.object({
  from: z.coerce.date(),
  maxDaysAhead: z.coerce.number().int().min(0).max(365).optional(),
  employeeIds: employeeIdList,
});

export const availabilityRoutes: FastifyPluginAsync<RouteDependencies> = async (server, { facade, guards }) => {
  // GET /services/:serviceId/slots?date=YYYY-MM-DD - Bookable slots on a day
  server.get('/services/:serviceId/slots', { preHandler: [guards.requireAuth] }, async (request, reply) => {
    const params = serviceParams.safeParse(request.params);
    const query = slotsQuery.safeParse(request.query);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }
    if (!query.success) {
      return sendValidationError(reply, query.error);
    }

    const result = await facade.findAvailableSlots({
      serviceId: params.data.serviceId,
      date: query.data.date,
      employeeIds: query.data.employeeIds,
    });
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return { slots: [...result.data] };
  });

  // GET /services/:serviceId/next-slot?from=ISO - Earliest bookable slot
  server.get('/services/:serviceId/next-slot', { preHandler: [guards.requireAuth] }, async (request, reply) => {
    const params = serviceParams.safeParse(request.params);
    const query = nextSlotQuery.safeParse(request.query);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }
    if (!query.success) {
      return sendValidationError(reply, query.error);
    }

    const result = await facade.findNextAvailableSlot({ serviceId: params.data.serviceId, ...query.data });
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return { slot: result.data };
  });
};
