import {
  createSaga,
  PreconditionError,
  SagaOrchestrator,
  type SagaExecuteOptions,
} from './saga.service.js';
import {
  createOrganizationStep,
  linkUserToOrganizationStep,
  openLocalTransactionStep,
  persistLocallyStep,
  requireRole,
  resolveOrCreateUserStep,
  sendSetPasswordEmailStep,
  type LocalTransactionFacts,
  type NewTenantInput,
  type OrganizationFacts,
  type OrganizationLinkFacts,
  type ProviderUserFacts,
  type WorkflowDependencies,
} from './saga-steps.js';
import { auditService } from './audit.service.js';
import type { StoreTransaction } from '../db/store.js';
import { logger } from '../utils/logger.js';

export interface InviteUserInput {
  /** Internal id of the tenant the user is invited to */
  tenantId: string;
  email: string;
  firstName: string;
  lastName: string;
}

interface CreateTenantContext extends OrganizationFacts, LocalTransactionFacts {
  tenantId?: string;
}

interface InviteUserContext extends ProviderUserFacts, OrganizationLinkFacts, LocalTransactionFacts {
  tenantId: string;
  userId?: string;
}

export class TenantService {
  private readonly createTenantSaga: SagaOrchestrator<CreateTenantContext>;
  private readonly inviteUserSaga: SagaOrchestrator<InviteUserContext>;

  constructor(private readonly deps: WorkflowDependencies) {
    this.createTenantSaga = createSaga<CreateTenantContext>('tenant_creation', deps)
      .addStep(createOrganizationStep(deps.provider))
      .addStep(openLocalTransactionStep(deps.store))
      .addStep(persistLocallyStep('persist_tenant_locally', (tx, ctx) => this.persistTenant(tx, ctx)));

    this.inviteUserSaga = createSaga<InviteUserContext>('invitation', deps)
      .addStep(resolveOrCreateUserStep(deps.provider))
      .addStep(sendSetPasswordEmailStep(deps.provider))
      .addStep(linkUserToOrganizationStep(deps.provider))
      .addStep(openLocalTransactionStep(deps.store))
      .addStep(persistLocallyStep('persist_invited_user', (tx, ctx) => this.persistInvitedUser(tx, ctx)));
  }

  /** Resolves to the internal tenant id. */
  async createTenant(tenant: NewTenantInput, options: SagaExecuteOptions = {}): Promise<string> {
    const result = await this.createTenantSaga.execute({ tenant }, options);

    if (!result.success) {
      await this.deps.failureLog.recordSagaFailure('tenant_creation', result, {
        externalOrgId: result.context.externalOrgId,
      });
      throw result.error;
    }

    const { tenantId } = result.context;
    if (!tenantId) {
      throw new Error('Tenant creation completed without a local identifier');
    }

    logger.info({ tenantId, domain: tenant.domain }, 'Tenant created');
    return tenantId;
  }

  /**
   * Adds a user to an existing tenant as a member, creating the provider user
   * first when nobody has the email yet. New users are emailed to set a
   * password. Resolves to the internal user id.
   */
  async inviteUser(invite: InviteUserInput, options: SagaExecuteOptions = {}): Promise<string> {
    const { store, providerId } = this.deps;

    const tenant = await store.tenants.findById(invite.tenantId);
    const tenantMapping = tenant
      ? await store.externalIdentities.findByEntity(providerId, 'tenant', tenant.id)
      : null;
    if (!tenantMapping) {
      throw new PreconditionError('TENANT_NOT_FOUND', `Tenant ${invite.tenantId} not found`);
    }

    const user = { email: invite.email, firstName: invite.firstName, lastName: invite.lastName };
    const result = await this.inviteUserSaga.execute(
      { user, tenantId: invite.tenantId, externalOrgId: tenantMapping.external_id },
      options
    );

    if (!result.success) {
      await this.deps.failureLog.recordSagaFailure('invitation', result, {
        externalUserId: result.context.externalUserId,
        externalOrgId: tenantMapping.external_id,
        email: invite.email,
        firstName: invite.firstName,
        lastName: invite.lastName,
      });
      throw result.error;
    }

    const { userId } = result.context;
    if (!userId) {
      throw new Error('Invitation completed without a local identifier');
    }

    logger.info({ userId, tenantId: invite.tenantId }, 'User invited to tenant');
    return userId;
  }

  private async persistTenant(tx: StoreTransaction, ctx: CreateTenantContext): Promise<CreateTenantContext> {
    if (!ctx.externalOrgId) {
      throw new Error('Cannot persist a tenant before the organization exists');
    }

    const tenant = await tx.tenants.create({ name: ctx.tenant.name, domains: [ctx.tenant.domain] });
    await tx.externalIdentities.create({
      provider_id: this.deps.providerId,
      entity_type: 'tenant',
      entity_id: tenant.id,
      external_id: ctx.externalOrgId,
    });
    await auditService.logTenantCreated(tx.auditLogs, tenant.id, {
      name: tenant.name,
      domain: ctx.tenant.domain,
      external_id: ctx.externalOrgId,
    });

    return { ...ctx, tenantId: tenant.id };
  }

  private async persistInvitedUser(tx: StoreTransaction, ctx: InviteUserContext): Promise<InviteUserContext> {
    const { providerId, roles } = this.deps;
    if (!ctx.externalUserId) {
      throw new Error('Cannot persist an invitation before the provider user exists');
    }

    const mapping = await tx.externalIdentities.findByExternalId(providerId, ctx.externalUserId);
    let userId: string;
    if (mapping) {
      userId = mapping.entity_id;
    } else {
      const user = await tx.users.create({ email: ctx.user.email });
      await tx.externalIdentities.create({
        provider_id: providerId,
        entity_type: 'user',
        entity_id: user.id,
        external_id: ctx.externalUserId,
      });
      await auditService.logUserCreated(tx.auditLogs, user.id, { email: user.email, external_id: ctx.externalUserId });
      userId = user.id;
    }

    const existingMembership = await tx.memberships.find(ctx.tenantId, userId);
    if (existingMembership) {
      logger.info({ userId, tenantId: ctx.tenantId }, 'User is already a member of the tenant');
      return { ...ctx, userId };
    }

    const member = await requireRole(tx, roles.member);
    const membership = await tx.memberships.create({
      tenant_id: ctx.tenantId,
      user_id: userId,
      role_ids: [member.id],
    });
    await tx.profiles.create({
      membership_id: membership.id,
      first_name: ctx.user.firstName,
      last_name: ctx.user.lastName,
    });
    await auditService.log(tx.auditLogs, 'membership', membership.id, 'invited', {
      newValue: { user_id: userId, role: member.name },
      context: { tenant_id: ctx.tenantId },
    });

    return { ...ctx, userId };
  }
}
