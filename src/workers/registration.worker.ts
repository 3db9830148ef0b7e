import { setTimeout as delay } from 'node:timers/promises';
import { createSaga, SagaOrchestrator, type SagaStep } from '../services/saga.service.js';
import {
  openLocalTransactionStep,
  persistLocallyStep,
  requireRole,
  type LocalTransactionFacts,
  type WorkflowDependencies,
} from '../services/saga-steps.js';
import { auditService } from '../services/audit.service.js';
import type { RegistrationEvent } from '../providers/base.provider.js';
import type { StoreTransaction } from '../db/store.js';
import { recordReconciliationEvent } from '../config/metrics.js';
import { logger } from '../utils/logger.js';

export type WorkerState = 'idle' | 'fetching' | 'processing';

export type EventOutcome = 'succeeded' | 'skipped' | 'failed';

export interface CycleSummary {
  fetched: number;
  succeeded: number;
  skipped: number;
  failed: number;
}

/** Resolves after `ms`, or as soon as `signal` aborts */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface RegistrationWorkerOptions extends WorkflowDependencies {
  intervalMs: number;
  /** Width of the event window; larger than the interval so windows overlap */
  windowMs: number;
  initialDelayMs?: number;
  sleep?: Sleep;
  now?: () => Date;
}

interface Registration {
  externalUserId: string;
  externalOrgId: string;
  email: string;
  firstName: string;
  lastName: string;
}

interface MaterializeContext extends LocalTransactionFacts {
  registration: Registration;
  providerUserAccepted?: boolean;
  userId?: string;
}

const defaultSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) throw error;
  }
};

function toRegistration(event: RegistrationEvent): Registration | string {
  if (!event.email?.trim()) return 'email is missing';
  if (!event.externalUserId) return 'external user id is missing';
  if (!event.externalOrgId) return 'external organization id is missing';

  return {
    externalUserId: event.externalUserId,
    externalOrgId: event.externalOrgId,
    email: event.email.trim(),
    firstName: event.firstName ?? '',
    lastName: event.lastName ?? '',
  };
}

/**
 * Absorbs registrations made directly against the identity provider into the
 * local store. Runs one cycle at a time; events already mapped locally are
 * skipped, so overlapping windows are harmless.
 */
export class RegistrationWorker {
  private currentState: WorkerState = 'idle';
  private inFlight: Promise<CycleSummary> | null = null;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  private readonly saga: SagaOrchestrator<MaterializeContext>;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(private readonly options: RegistrationWorkerOptions) {
    if (options.windowMs <= options.intervalMs) {
      throw new Error('Reconciliation window must be larger than the polling interval');
    }

    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.saga = createSaga<MaterializeContext>('reconciliation', options)
      .addStep(this.acceptProviderUserStep())
      .addStep(openLocalTransactionStep(options.store))
      .addStep(persistLocallyStep('persist_registered_user', (tx, ctx) => this.persist(tx, ctx)));
  }

  get state(): WorkerState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).catch((error: unknown) => {
      logger.error({ error }, 'Registration worker loop stopped unexpectedly');
    });

    logger.info(
      { intervalMs: this.options.intervalMs, windowMs: this.options.windowMs },
      'Registration worker started'
    );
  }

  /** Stops scheduling cycles. An in-flight cycle finishes its current event first. */
  async stop(): Promise<void> {
    const { controller, loop } = this;
    if (!controller || !loop) return;

    controller.abort();
    await loop;

    this.controller = null;
    this.loop = null;
    logger.info('Registration worker stopped');
  }

  /** Runs one cycle, or joins the cycle already running. */
  runCycle(): Promise<CycleSummary> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const signal = this.controller?.signal ?? new AbortController().signal;
    const cycle = this.cycle(signal).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async run(signal: AbortSignal): Promise<void> {
    await this.sleep(this.options.initialDelayMs ?? 0, signal);

    while (!signal.aborted) {
      try {
        await this.runCycle();
      } catch (error) {
        logger.error({ error }, 'Reconciliation cycle failed');
      }

      if (signal.aborted) break;
      await this.sleep(this.options.intervalMs, signal);
    }
  }

  private async cycle(signal: AbortSignal): Promise<CycleSummary> {
    const summary: CycleSummary = { fetched: 0, succeeded: 0, skipped: 0, failed: 0 };
    const to = this.now();
    const from = new Date(to.getTime() - this.options.windowMs);

    this.currentState = 'fetching';
    try {
      let events: RegistrationEvent[];
      try {
        events = await this.options.provider.listRecentRegistrationEvents({ from, to }, { signal });
      } catch (error) {
        logger.error({ error }, 'Failed to fetch registration events');
        return summary;
      }

      summary.fetched = events.length;
      this.currentState = 'processing';

      for (const [index, event] of events.entries()) {
        if (signal.aborted) {
          logger.info({ remaining: events.length - index }, 'Reconciliation cycle interrupted');
          break;
        }

        const outcome = await this.processEvent(event);
        summary[outcome]++;
        recordReconciliationEvent(outcome);
      }

      logger.info({ ...summary }, 'Reconciliation cycle completed');
      return summary;
    } finally {
      this.currentState = 'idle';
    }
  }

  private async processEvent(event: RegistrationEvent): Promise<EventOutcome> {
    const { store, providerId, failureLog } = this.options;

    try {
      if (event.externalUserId) {
        const mapping = await store.externalIdentities.findByExternalId(providerId, event.externalUserId);
        if (mapping) {
          logger.debug({ externalUserId: event.externalUserId }, 'Registration already materialized');
          return 'skipped';
        }
      }

      const registration = toRegistration(event);
      if (typeof registration === 'string') {
        logger.warn({ externalUserId: event.externalUserId, reason: registration }, 'Invalid registration event');
        return 'failed';
      }

      // Events run to completion once started; stopping only prevents the next one
      const result = await this.saga.execute({ registration });
      if (!result.success) {
        await failureLog.recordSagaFailure('reconciliation', result, registration);
        return 'failed';
      }

      logger.info(
        { externalUserId: registration.externalUserId, userId: result.context.userId },
        'Registration materialized'
      );
      return 'succeeded';
    } catch (error) {
      logger.error({ error, externalUserId: event.externalUserId }, 'Failed to process registration event');
      return 'failed';
    }
  }

  // Nothing is created here: the step exists so that a failed materialization
  // removes the provider user it could not mirror.
  private acceptProviderUserStep(): SagaStep<MaterializeContext> {
    return {
      name: 'accept_provider_user',
      execute: async (context) => ({ ...context, providerUserAccepted: true }),
      compensate: async (context, signal) => {
        if (context.providerUserAccepted) {
          await this.options.provider.deleteUser(context.registration.externalUserId, { signal });
        }
      },
    };
  }

  private async persist(tx: StoreTransaction, ctx: MaterializeContext): Promise<MaterializeContext> {
    const { providerId, roles } = this.options;
    const { registration } = ctx;

    const orgMapping = await tx.externalIdentities.findByExternalId(providerId, registration.externalOrgId);
    if (!orgMapping || orgMapping.entity_type !== 'tenant') {
      throw new Error(`Organization ${registration.externalOrgId} has no local tenant`);
    }

    const user = await tx.users.create({ email: registration.email });
    await tx.externalIdentities.create({
      provider_id: providerId,
      entity_type: 'user',
      entity_id: user.id,
      external_id: registration.externalUserId,
    });

    const member = await requireRole(tx, roles.member);
    const membership = await tx.memberships.create({
      tenant_id: orgMapping.entity_id,
      user_id: user.id,
      role_ids: [member.id],
    });
    await tx.profiles.create({
      membership_id: membership.id,
      first_name: registration.firstName,
      last_name: registration.lastName,
    });
    await auditService.logUserCreated(
      tx.auditLogs,
      user.id,
      { email: user.email, external_id: registration.externalUserId, source: 'registration' },
      { actor_type: 'system', tenant_id: orgMapping.entity_id }
    );

    return { ...ctx, userId: user.id };
  }
}
