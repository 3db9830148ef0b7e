import { FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../utils/logger.js';
import { PreconditionError, type PreconditionCode } from '../services/saga.service.js';
import { getRequestId } from './request-id.js';

export interface ErrorResponse {
  error: string;
  message: string;
  code?: string;
  details?: Record<string, unknown>;
}

const preconditionStatus: Record<PreconditionCode, { statusCode: number; error: string }> = {
  INVALID_INPUT: { statusCode: 400, error: 'Bad Request' },
  SELF_DELETION: { statusCode: 403, error: 'Forbidden' },
  TENANT_NOT_FOUND: { statusCode: 404, error: 'Not Found' },
  USER_NOT_FOUND: { statusCode: 404, error: 'Not Found' },
  NOT_IN_TENANT: { statusCode: 404, error: 'Not Found' },
  LAST_ADMINISTRATOR: { statusCode: 409, error: 'Conflict' },
};

/**
 * Business rule rejections are reported as they are. Any other failure is a
 * workflow failure: its detail stays in logs and failure records.
 */
export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  if (error instanceof PreconditionError) {
    logger.info(
      { code: error.code, method: request.method, url: request.url, requestId: getRequestId() },
      'Request rejected by precondition'
    );

    const { statusCode, error: label } = preconditionStatus[error.code];
    reply.code(statusCode).send({
      error: label,
      message: error.message,
      code: error.code,
    } satisfies ErrorResponse);
    return;
  }

  // Fastify validation errors
  if (error.validation) {
    reply.code(400).send({
      error: 'Bad Request',
      message: 'Validation failed',
      code: 'VALIDATION_ERROR',
      details: {
        validation: error.validation,
      },
    } satisfies ErrorResponse);
    return;
  }

  logger.error(
    {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      request: {
        method: request.method,
        url: request.url,
        requestId: getRequestId(),
      },
    },
    'Request error'
  );

  const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
  reply.code(statusCode).send({
    error: statusCode >= 500 ? 'Internal Server Error' : 'Error',
    message: statusCode >= 500 ? 'The request could not be completed' : error.message,
    code: statusCode >= 500 ? 'WORKFLOW_FAILED' : error.code || 'UNKNOWN_ERROR',
  } satisfies ErrorResponse);
}
