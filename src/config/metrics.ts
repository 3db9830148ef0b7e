import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import client from 'prom-client';

declare module 'fastify' {
  interface FastifyRequest {
    metricsStartTime?: bigint;
  }
}

const register = new client.Registry();

client.collectDefaultMetrics({ register });

export const httpRequestsTotal = new client.Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [register],
});

export const httpRequestDuration = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register],
});

export const sagaExecutionsTotal = new client.Counter({
  name: 'saga_executions_total',
  help: 'Total number of saga executions by outcome',
  labelNames: ['saga', 'outcome'],
  registers: [register],
});

export const sagaDuration = new client.Histogram({
  name: 'saga_duration_seconds',
  help: 'Duration of saga executions in seconds, compensation included',
  labelNames: ['saga', 'outcome'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [register],
});

export const compensationFailuresTotal = new client.Counter({
  name: 'saga_compensation_failures_total',
  help: 'Total number of compensating actions that threw',
  labelNames: ['saga', 'step'],
  registers: [register],
});

export const reconciliationEventsTotal = new client.Counter({
  name: 'reconciliation_events_total',
  help: 'Registration events seen by the reconciliation loop, by outcome',
  labelNames: ['outcome'],
  registers: [register],
});

export const providerRequestDuration = new client.Histogram({
  name: 'identity_provider_request_duration_seconds',
  help: 'Duration of identity provider requests in seconds',
  labelNames: ['provider', 'operation', 'status'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [register],
});

export async function setupMetrics(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', async (request: FastifyRequest) => {
    request.metricsStartTime = process.hrtime.bigint();
  });

  fastify.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    const startTime = request.metricsStartTime;
    if (!startTime) return;

    const duration = Number(process.hrtime.bigint() - startTime) / 1e9;
    const route = request.routeOptions?.url || request.url;
    const labels = {
      method: request.method,
      route,
      status_code: reply.statusCode.toString(),
    };

    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, duration);
  });

  fastify.get('/metrics', async (_request, reply) => {
    reply.header('Content-Type', register.contentType);
    return register.metrics();
  });
}

export type SagaOutcome = 'succeeded' | 'compensated' | 'compensation_failed';

export function recordSaga(saga: string, outcome: SagaOutcome, durationSeconds: number): void {
  sagaExecutionsTotal.inc({ saga, outcome });
  sagaDuration.observe({ saga, outcome }, durationSeconds);
}

export function recordCompensationFailure(saga: string, step: string): void {
  compensationFailuresTotal.inc({ saga, step });
}

export function recordReconciliationEvent(outcome: 'succeeded' | 'skipped' | 'failed'): void {
  reconciliationEventsTotal.inc({ outcome });
}

export function recordProviderRequest(
  provider: string,
  operation: string,
  status: string,
  durationSeconds: number
): void {
  providerRequestDuration.observe({ provider, operation, status }, durationSeconds);
}

export { register };
