import { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { ErrorCode, ServiceError } from '../services/types';

export function getStatusCodeForError(code: ErrorCode): number {
  switch (code) {
    case ErrorCode.VALIDATION_ERROR:
      return 400;
    case ErrorCode.NOT_FOUND:
      return 404;
    case ErrorCode.CONFLICT:
      return 409;
    case ErrorCode.INVALID_STATE:
    case ErrorCode.INVALID_TRANSITION:
      return 422;
    case ErrorCode.PERSISTENCE_ERROR:
      return 503;
    default:
      return 500;
  }
}

export function sendServiceError(reply: FastifyReply, error: ServiceError): FastifyReply {
  return reply.status(getStatusCodeForError(error.code)).send({
    error: {
      code: error.code,
      message: error.message,
      details: error.details,
    },
  });
}

export function sendValidationError(reply: FastifyReply, error: ZodError): FastifyReply {
  return reply.status(400).send({
    error: {
      code: ErrorCode.VALIDATION_ERROR,
      message: 'Invalid request',
      details: { issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })) },
    },
  });
}
