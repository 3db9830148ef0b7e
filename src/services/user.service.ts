import {
  createSaga,
  PreconditionError,
  SagaOrchestrator,
  type SagaExecuteOptions,
  type SagaStep,
} from './saga.service.js';
import {
  createUserStep,
  linkUserToOrganizationStep,
  openLocalTransactionStep,
  persistLocallyStep,
  requireRole,
  type LocalTransactionFacts,
  type NewUserInput,
  type OrganizationLinkFacts,
  type ProviderUserFacts,
  type WorkflowDependencies,
} from './saga-steps.js';
import { auditService } from './audit.service.js';
import type { ExternalUser } from '../providers/base.provider.js';
import type { StoreTransaction } from '../db/store.js';
import { logger } from '../utils/logger.js';

interface CreateUserContext extends ProviderUserFacts, OrganizationLinkFacts, LocalTransactionFacts {
  /** Internal id of the tenant mapped to externalOrgId, when one was given */
  tenantId?: string;
  userId?: string;
}

interface DeleteUserContext extends LocalTransactionFacts {
  externalUserId: string;
  externalOrgId: string;
  actorId: string;
  userId: string;
  tenantId: string;
  mappingId: string;
  snapshot?: ExternalUser;
  providerUserDeleted?: boolean;
}

export class UserService {
  private readonly deleteUserSaga: SagaOrchestrator<DeleteUserContext>;

  constructor(private readonly deps: WorkflowDependencies) {
    this.deleteUserSaga = createSaga<DeleteUserContext>('user_deletion', deps)
      .addStep(this.captureSnapshotStep())
      .addStep(this.deleteProviderUserStep())
      .addStep(openLocalTransactionStep(deps.store))
      .addStep(persistLocallyStep('delete_user_locally', (tx, ctx) => this.deleteLocally(tx, ctx)));
  }

  /**
   * Creates a provider user and mirrors it locally. With an organization id
   * the user also joins that organization as a member. Resolves to the
   * internal user id.
   */
  async createUser(
    user: NewUserInput,
    organizationId?: string,
    options: SagaExecuteOptions = {}
  ): Promise<string> {
    let tenantId: string | undefined;
    if (organizationId) {
      const mapping = await this.deps.store.externalIdentities.findByExternalId(
        this.deps.providerId,
        organizationId
      );
      if (!mapping || mapping.entity_type !== 'tenant') {
        throw new PreconditionError('TENANT_NOT_FOUND', `Organization ${organizationId} not found`);
      }
      tenantId = mapping.entity_id;
    }

    // The link step only belongs to this run when there is something to link to
    const saga = createSaga<CreateUserContext>('user_creation', this.deps).addStep(createUserStep(this.deps.provider));
    if (organizationId) {
      saga.addStep(linkUserToOrganizationStep(this.deps.provider));
    }
    saga
      .addStep(openLocalTransactionStep(this.deps.store))
      .addStep(persistLocallyStep('persist_user_locally', (tx, ctx) => this.persistUser(tx, ctx)));

    const result = await saga.execute({ user, externalOrgId: organizationId, tenantId }, options);

    if (!result.success) {
      await this.deps.failureLog.recordSagaFailure('user_creation', result, {
        externalUserId: result.context.externalUserId,
        externalOrgId: organizationId,
        email: user.email,
        firstName: user.firstName,
        lastName: user.lastName,
      });
      throw result.error;
    }

    const { userId } = result.context;
    if (!userId) {
      throw new Error('User creation completed without a local identifier');
    }

    logger.info({ userId, organizationId }, 'User created');
    return userId;
  }

  /**
   * Deletes a user from the identity provider and the local store. All ids
   * are provider ids; `actorId` is the user performing the deletion.
   *
   * Business rules are checked before anything is touched and rejected with
   * a PreconditionError. If local deletion fails after the provider user is
   * gone, the provider user is re-created from a snapshot with a new id and
   * must reset their password.
   */
  async deleteUser(
    externalUserId: string,
    actorId: string,
    tenantId: string,
    options: SagaExecuteOptions = {}
  ): Promise<void> {
    const { store, providerId, roles } = this.deps;

    if (externalUserId === actorId) {
      throw new PreconditionError('SELF_DELETION', 'Users cannot delete themselves');
    }

    const tenantMapping = await store.externalIdentities.findByExternalId(providerId, tenantId);
    if (!tenantMapping || tenantMapping.entity_type !== 'tenant') {
      throw new PreconditionError('TENANT_NOT_FOUND', `Tenant ${tenantId} not found`);
    }

    const userMapping = await store.externalIdentities.findByExternalId(providerId, externalUserId);
    if (!userMapping || userMapping.entity_type !== 'user') {
      throw new PreconditionError('USER_NOT_FOUND', `User ${externalUserId} not found`);
    }

    const membership = await store.memberships.find(tenantMapping.entity_id, userMapping.entity_id);
    if (!membership) {
      throw new PreconditionError('NOT_IN_TENANT', `User ${externalUserId} is not a member of tenant ${tenantId}`);
    }

    const administrator = await requireRole(store, roles.administrator);
    if (membership.role_ids.includes(administrator.id)) {
      const administrators = await store.memberships.countWithRole(tenantMapping.entity_id, administrator.id);
      if (administrators <= 1) {
        throw new PreconditionError('LAST_ADMINISTRATOR', 'Cannot delete the last administrator of a tenant');
      }
    }

    const result = await this.deleteUserSaga.execute(
      {
        externalUserId,
        externalOrgId: tenantId,
        actorId,
        userId: userMapping.entity_id,
        tenantId: tenantMapping.entity_id,
        mappingId: userMapping.id,
      },
      options
    );

    if (!result.success) {
      const snapshot = result.context.snapshot;
      await this.deps.failureLog.recordSagaFailure('user_deletion', result, {
        externalUserId,
        externalOrgId: tenantId,
        email: snapshot?.email,
        firstName: snapshot?.firstName,
        lastName: snapshot?.lastName,
      });
      throw result.error;
    }

    logger.info({ externalUserId, tenantId, actorId }, 'User deleted');
  }

  private captureSnapshotStep(): SagaStep<DeleteUserContext> {
    return {
      name: 'capture_user_snapshot',
      readOnly: true,
      execute: async (context, signal) => {
        const snapshot = await this.deps.provider.getUserById(context.externalUserId, { signal });
        if (!snapshot) {
          throw new PreconditionError('USER_NOT_FOUND', `User ${context.externalUserId} not found`);
        }
        return { ...context, snapshot };
      },
    };
  }

  private deleteProviderUserStep(): SagaStep<DeleteUserContext> {
    return {
      name: 'delete_provider_user',
      execute: async (context, signal) => {
        await this.deps.provider.deleteUser(context.externalUserId, { signal });
        return { ...context, providerUserDeleted: true };
      },
      compensate: async (context, signal) => {
        if (context.providerUserDeleted && context.snapshot) {
          await this.restoreUser(context, context.snapshot, signal);
        }
      },
    };
  }

  // The provider cannot undelete: the user comes back with a new id and no
  // credentials, so the local mapping follows the new id.
  private async restoreUser(context: DeleteUserContext, snapshot: ExternalUser, signal: AbortSignal): Promise<void> {
    const { provider, store } = this.deps;

    const restored = await provider.createUser(
      {
        username: snapshot.username,
        email: snapshot.email,
        firstName: snapshot.firstName,
        lastName: snapshot.lastName,
        requiredActions: ['UPDATE_PASSWORD'],
      },
      { signal }
    );
    await provider.addUserToOrganization(restored.id, context.externalOrgId, { signal });
    await store.externalIdentities.updateExternalId(context.mappingId, restored.id);
    await auditService.logUserRestored(store.auditLogs, context.userId, context.externalUserId, restored.id, {
      actor: context.actorId,
      actor_type: 'user',
      tenant_id: context.tenantId,
    });

    logger.warn(
      {
        operatorActionRequired: true,
        userId: context.userId,
        previousExternalUserId: context.externalUserId,
        externalUserId: restored.id,
        email: snapshot.email,
      },
      'Deleted user restored under a new provider id; the user must reset their password'
    );
  }

  private async persistUser(tx: StoreTransaction, ctx: CreateUserContext): Promise<CreateUserContext> {
    const { providerId, roles } = this.deps;
    if (!ctx.externalUserId) {
      throw new Error('Cannot persist a user before the provider user exists');
    }

    const user = await tx.users.create({ email: ctx.user.email });
    await tx.externalIdentities.create({
      provider_id: providerId,
      entity_type: 'user',
      entity_id: user.id,
      external_id: ctx.externalUserId,
    });
    await auditService.logUserCreated(tx.auditLogs, user.id, { email: user.email, external_id: ctx.externalUserId });

    if (ctx.tenantId) {
      const member = await requireRole(tx, roles.member);
      const membership = await tx.memberships.create({
        tenant_id: ctx.tenantId,
        user_id: user.id,
        role_ids: [member.id],
      });
      await tx.profiles.create({
        membership_id: membership.id,
        first_name: ctx.user.firstName,
        last_name: ctx.user.lastName,
      });
      await auditService.logMembershipCreated(
        tx.auditLogs,
        membership.id,
        { user_id: user.id, role: member.name },
        { tenant_id: ctx.tenantId }
      );
    }

    return { ...ctx, userId: user.id };
  }

  private async deleteLocally(tx: StoreTransaction, ctx: DeleteUserContext): Promise<DeleteUserContext> {
    const user = await tx.users.findById(ctx.userId);

    await tx.profiles.deleteByUser(ctx.userId);
    await tx.memberships.deleteByUser(ctx.userId);
    await tx.externalIdentities.delete(ctx.mappingId);
    await tx.users.delete(ctx.userId);
    await auditService.logUserDeleted(
      tx.auditLogs,
      ctx.userId,
      { external_id: ctx.externalUserId, email: user?.email ?? ctx.snapshot?.email ?? null },
      { actor: ctx.actorId, actor_type: 'user', tenant_id: ctx.tenantId }
    );
    return ctx;
  }
}
