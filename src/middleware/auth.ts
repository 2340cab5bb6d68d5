import { FastifyReply, FastifyRequest } from 'fastify';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { StaffRole } from '../services/types';

/**
 * Tokens are issued by the external auth service; this layer only
 * verifies them and checks the staff role.
 */
const jwtPayloadSchema = z.object({
  userId: z.string(),
  role: z.nativeEnum(StaffRole),
});

export type JwtPayload = z.infer<typeof jwtPayloadSchema>;

// Extend FastifyRequest to include user info
declare module 'fastify' {
  interface FastifyRequest {
    user?: JwtPayload;
  }
}

export type AuthHook = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | void>;

export interface AuthGuards {
  requireAuth: AuthHook;
  requireRole: (...allowedRoles: StaffRole[]) => AuthHook;
}

type VerifyResult = { success: true; data: JwtPayload } | { success: false; message: string };

export function verifyToken(token: string, secret: string): VerifyResult {
  try {
    const parsed = jwtPayloadSchema.safeParse(jwt.verify(token, secret));
    if (!parsed.success) {
      return { success: false, message: 'Token payload is invalid' };
    }
    return { success: true, data: parsed.data };
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      return { success: false, message: 'Token has expired' };
    }
    if (error instanceof jwt.JsonWebTokenError) {
      return { success: false, message: 'Invalid token' };
    }
    throw error;
  }
}

export function createAuthGuards(jwtSecret: string): AuthGuards {
  /**
   * Requires a valid bearer token and attaches its payload to request.user.
   */
  async function requireAuth(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    const authHeader = request.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return reply.status(401).send({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Missing or invalid Authorization header. Expected: Bearer <token>',
        },
      });
    }

    const token = authHeader.substring(7); // Remove 'Bearer ' prefix
    const result = verifyToken(token, jwtSecret);

    if (!result.success) {
      return reply.status(401).send({
        error: {
          code: 'UNAUTHORIZED',
          message: result.message,
        },
      });
    }

    request.user = result.data;
  }

  /**
   * Requires one of the given roles. Must be used after requireAuth.
   */
  function requireRole(...allowedRoles: StaffRole[]): AuthHook {
    return async function (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
      if (!request.user) {
        return reply.status(401).send({
          error: {
            code: 'UNAUTHORIZED',
            message: 'Authentication required',
          },
        });
      }

      if (!allowedRoles.includes(request.user.role)) {
        return reply.status(403).send({
          error: {
            code: 'FORBIDDEN',
            message: `Access denied. Required role: ${allowedRoles.join(' or ')}`,
          },
        });
      }
    };
  }

  return { requireAuth, requireRole };
}
