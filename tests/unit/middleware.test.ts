import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { errorHandler } from '../../src/middleware/error-handler.js';
import { requestIdMiddleware } from '../../src/middleware/request-id.js';
import { PreconditionError, type PreconditionCode } from '../../src/services/saga.service.js';

class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string
  ) {
    super(message);
  }
}

describe('Middleware', () => {
  let app: FastifyInstance;
  let thrown: Error;

  beforeEach(async () => {
    app = Fastify();
    requestIdMiddleware(app);
    app.setErrorHandler(errorHandler);
    app.get('/fail', async () => {
      throw thrown;
    });
    app.get('/request-id', async (request) => ({ requestId: request.requestContext.requestId }));
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('errorHandler', () => {
    const cases: [PreconditionCode, number, string][] = [
      ['INVALID_INPUT', 400, 'Bad Request'],
      ['SELF_DELETION', 403, 'Forbidden'],
      ['TENANT_NOT_FOUND', 404, 'Not Found'],
      ['USER_NOT_FOUND', 404, 'Not Found'],
      ['NOT_IN_TENANT', 404, 'Not Found'],
      ['LAST_ADMINISTRATOR', 409, 'Conflict'],
    ];

    it.each(cases)('should map %s to %i', async (code, statusCode, label) => {
      thrown = new PreconditionError(code, 'rejected');

      const response = await app.inject({ method: 'GET', url: '/fail' });

      expect(response.statusCode).toBe(statusCode);
      expect(response.json()).toEqual({ error: label, message: 'rejected', code });
    });

    it('should hide the message of unexpected errors', async () => {
      thrown = new Error('step create_organization failed: connection reset');

      const response = await app.inject({ method: 'GET', url: '/fail' });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({
        error: 'Internal Server Error',
        message: 'The request could not be completed',
        code: 'WORKFLOW_FAILED',
      });
    });

    it('should pass client errors through', async () => {
      thrown = new HttpError('Payload too large', 413, 'FST_ERR_CTP_BODY_TOO_LARGE');

      const response = await app.inject({ method: 'GET', url: '/fail' });

      expect(response.statusCode).toBe(413);
      expect(response.json()).toEqual({
        error: 'Error',
        message: 'Payload too large',
        code: 'FST_ERR_CTP_BODY_TOO_LARGE',
      });
    });
  });

  describe('requestIdMiddleware', () => {
    it('should keep an incoming request id', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/request-id',
        headers: { 'x-request-id': 'req-abc' },
      });

      expect(response.headers['x-request-id']).toBe('req-abc');
      expect(response.json()).toEqual({ requestId: 'req-abc' });
    });

    it('should generate a request id when none is sent', async () => {
      const response = await app.inject({ method: 'GET', url: '/request-id' });

      const header = response.headers['x-request-id'];
      expect(header).toMatch(/^[0-9a-f-]{36}$/);
      expect(response.json()).toEqual({ requestId: header });
    });
  });
});
