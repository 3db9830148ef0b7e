import { createSaga, SagaOrchestrator, type SagaExecuteOptions } from './saga.service.js';
import {
  createOrganizationStep,
  linkUserToOrganizationStep,
  openLocalTransactionStep,
  persistLocallyStep,
  requireRole,
  resolveOrCreateUserStep,
  type LocalTransactionFacts,
  type NewTenantInput,
  type NewUserInput,
  type OrganizationFacts,
  type OrganizationLinkFacts,
  type ProviderUserFacts,
  type WorkflowDependencies,
} from './saga-steps.js';
import { auditService } from './audit.service.js';
import type { StoreTransaction } from '../db/store.js';
import { logger } from '../utils/logger.js';

export interface OnboardingResult {
  userId: string;
  tenantId: string;
}

interface OnboardingContext
  extends ProviderUserFacts,
    OrganizationFacts,
    OrganizationLinkFacts,
    LocalTransactionFacts {
  userId?: string;
  tenantId?: string;
}

export class OnboardingService {
  private readonly saga: SagaOrchestrator<OnboardingContext>;

  constructor(private readonly deps: WorkflowDependencies) {
    this.saga = createSaga<OnboardingContext>('onboarding', deps)
      .addStep(resolveOrCreateUserStep(deps.provider))
      .addStep(createOrganizationStep(deps.provider))
      .addStep(linkUserToOrganizationStep(deps.provider))
      .addStep(openLocalTransactionStep(deps.store))
      .addStep(persistLocallyStep('persist_locally', (tx, ctx) => this.persist(tx, ctx)));
  }

  /**
   * Creates an organization with `user` as its administrator in the identity
   * provider and mirrors both locally. Rejects with the error of the step that
   * failed after undoing what it can.
   */
  async onboardOrganization(
    user: NewUserInput,
    tenant: NewTenantInput,
    options: SagaExecuteOptions = {}
  ): Promise<OnboardingResult> {
    logger.info({ email: user.email, domain: tenant.domain }, 'Starting organization onboarding');

    const result = await this.saga.execute({ user, tenant }, options);

    if (!result.success) {
      await this.deps.failureLog.recordSagaFailure('onboarding', result, {
        externalUserId: result.context.externalUserId,
        externalOrgId: result.context.externalOrgId,
        email: user.email,
        firstName: user.firstName,
        lastName: user.lastName,
      });
      throw result.error;
    }

    const { userId, tenantId } = result.context;
    if (!userId || !tenantId) {
      throw new Error('Onboarding completed without local identifiers');
    }

    logger.info({ userId, tenantId }, 'Organization onboarded');
    return { userId, tenantId };
  }

  private async persist(tx: StoreTransaction, ctx: OnboardingContext): Promise<OnboardingContext> {
    const { providerId, roles } = this.deps;
    const externalUserId = ctx.externalUserId;
    const externalOrgId = ctx.externalOrgId;
    if (!externalUserId || !externalOrgId) {
      throw new Error('Cannot persist onboarding before the provider identities exist');
    }

    // A provider user seen before keeps its local row
    const existingMapping = await tx.externalIdentities.findByExternalId(providerId, externalUserId);
    let userId: string;
    if (existingMapping) {
      userId = existingMapping.entity_id;
    } else {
      const user = await tx.users.create({ email: ctx.user.email });
      await tx.externalIdentities.create({
        provider_id: providerId,
        entity_type: 'user',
        entity_id: user.id,
        external_id: externalUserId,
      });
      await auditService.logUserCreated(tx.auditLogs, user.id, { email: user.email, external_id: externalUserId });
      userId = user.id;
    }

    const tenant = await tx.tenants.create({ name: ctx.tenant.name, domains: [ctx.tenant.domain] });
    await tx.externalIdentities.create({
      provider_id: providerId,
      entity_type: 'tenant',
      entity_id: tenant.id,
      external_id: externalOrgId,
    });
    await auditService.logTenantCreated(tx.auditLogs, tenant.id, {
      name: tenant.name,
      domain: ctx.tenant.domain,
      external_id: externalOrgId,
    });

    const administrator = await requireRole(tx, roles.administrator);
    const membership = await tx.memberships.create({
      tenant_id: tenant.id,
      user_id: userId,
      role_ids: [administrator.id],
    });
    await tx.profiles.create({
      membership_id: membership.id,
      first_name: ctx.user.firstName,
      last_name: ctx.user.lastName,
    });
    await auditService.logMembershipCreated(
      tx.auditLogs,
      membership.id,
      { user_id: userId, role: administrator.name },
      { tenant_id: tenant.id }
    );

    return { ...ctx, userId, tenantId: tenant.id };
  }
}
