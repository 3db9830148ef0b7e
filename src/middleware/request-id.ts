import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { AsyncLocalStorage } from 'async_hooks';

const requestContext = new AsyncLocalStorage<RequestContext>();

export interface RequestContext {
  requestId: string;
  startTime: bigint;
}

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export function requestIdMiddleware(fastify: FastifyInstance): void {
  fastify.addHook('onRequest', addRequestContext);
  fastify.addHook('onSend', requestIdResponseHook);
}

async function addRequestContext(request: FastifyRequest): Promise<void> {
  const header = request.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : uuidv4();

  const context: RequestContext = {
    requestId,
    startTime: process.hrtime.bigint(),
  };

  request.requestContext = context;
  requestContext.enterWith(context);
}

async function requestIdResponseHook(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  if (request.requestContext) {
    reply.header('x-request-id', request.requestContext.requestId);
  }
}

export function getRequestId(): string | undefined {
  return requestContext.getStore()?.requestId;
}
