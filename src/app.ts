import Fastify from 'fastify';
import cors from '@fastify/cors';
import { Logger } from './lib/logger';
import { createAuthGuards } from './middleware/auth';
import { appointmentRoutes } from './routes/appointments';
import { assignmentRoutes } from './routes/assignments';
import { availabilityRoutes } from './routes/availability';
import { SchedulingFacade } from './services/scheduling.facade';

export interface AppOptions {
  facade: SchedulingFacade;
  jwtSecret: string;
  corsOrigins: string[];
  logger: Logger;
}

/**
 * Builds the HTTP server without binding a port, so tests can use inject().
 */
export async function buildApp(options: AppOptions) {
  const server = Fastify({ logger: options.logger });
  const guards = createAuthGuards(options.jwtSecret);

  server.get('/health', async () => {
    return { status: 'ok' };
  });

  // Register CORS - restrict to allowed origins only (no wildcards)
  await server.register(cors, {
    origin: options.corsOrigins,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
  });

  const deps = { facade: options.facade, guards };
  await server.register(appointmentRoutes, deps);
  await server.register(assignmentRoutes, deps);
  await server.register(availabilityRoutes, deps);

  return server;
}
