import { IdentityProviderError, type IdentityProvider } from '../providers/base.provider.js';
import type { StoreRepositories, StoreTransaction, TransactionalStore } from '../db/store.js';
import type { SagaStep, SagaOptions } from './saga.service.js';
import type { FailureLogService } from './failure-log.service.js';
import type { Role } from '../models/role.js';

export interface NewUserInput {
  username?: string;
  email: string;
  firstName: string;
  lastName: string;
  password?: string;
}

export interface NewTenantInput {
  name: string;
  domain: string;
}

/** Collaborators shared by every workflow service */
export interface WorkflowDependencies extends SagaOptions {
  provider: IdentityProvider;
  store: TransactionalStore;
  failureLog: FailureLogService;
  /** Row id of the identity provider every external identity points at */
  providerId: string;
  roles: { administrator: string; member: string };
}

export interface ProviderUserFacts {
  user: NewUserInput;
  externalUserId?: string;
  userWasCreated?: boolean;
}

export interface OrganizationFacts {
  tenant: NewTenantInput;
  externalOrgId?: string;
}

export interface OrganizationLinkFacts {
  externalUserId?: string;
  externalOrgId?: string;
  linkedToOrg?: boolean;
}

export interface LocalTransactionFacts {
  transaction?: StoreTransaction;
  localTransactionOpen?: boolean;
}

function requireFact<T>(value: T | undefined, fact: string): T {
  if (value === undefined) {
    throw new Error(`Saga fact ${fact} has not been established`);
  }
  return value;
}

async function createProviderUser(
  provider: IdentityProvider,
  user: NewUserInput,
  signal: AbortSignal
): Promise<string> {
  const created = await provider.createUser(
    {
      username: user.username ?? user.email,
      email: user.email,
      firstName: user.firstName,
      lastName: user.lastName,
      password: user.password,
    },
    { signal }
  );
  return created.id;
}

async function deleteCreatedUser<T extends ProviderUserFacts>(
  provider: IdentityProvider,
  context: T,
  signal: AbortSignal
): Promise<void> {
  if (context.userWasCreated && context.externalUserId) {
    await provider.deleteUser(context.externalUserId, { signal });
  }
}

/**
 * Reuses a provider user with the same email, or creates one. Only a user this
 * step created is deleted on compensation.
 */
export function resolveOrCreateUserStep<T extends ProviderUserFacts>(provider: IdentityProvider): SagaStep<T> {
  return {
    name: 'resolve_or_create_user',
    execute: async (context, signal) => {
      const existing = await provider.findUserByEmail(context.user.email, { signal });
      if (existing) {
        return { ...context, externalUserId: existing.id, userWasCreated: false };
      }

      const externalUserId = await createProviderUser(provider, context.user, signal);
      return { ...context, externalUserId, userWasCreated: true };
    },
    compensate: (context, signal) => deleteCreatedUser(provider, context, signal),
  };
}

/** Asks a user created by this saga to pick a password. Nothing to undo. */
export function sendSetPasswordEmailStep<T extends ProviderUserFacts>(provider: IdentityProvider): SagaStep<T> {
  return {
    name: 'send_set_password_email',
    execute: async (context, signal) => {
      if (context.userWasCreated) {
        const userId = requireFact(context.externalUserId, 'externalUserId');
        await provider.sendRequiredActionsEmail(userId, ['UPDATE_PASSWORD', 'VERIFY_EMAIL'], { signal });
      }
      return context;
    },
  };
}

/** Always creates the provider user; fails if the provider rejects the email. */
export function createUserStep<T extends ProviderUserFacts>(provider: IdentityProvider): SagaStep<T> {
  return {
    name: 'create_user',
    execute: async (context, signal) => {
      const externalUserId = await createProviderUser(provider, context.user, signal);
      return { ...context, externalUserId, userWasCreated: true };
    },
    compensate: (context, signal) => deleteCreatedUser(provider, context, signal),
  };
}

export function createOrganizationStep<T extends OrganizationFacts>(provider: IdentityProvider): SagaStep<T> {
  return {
    name: 'create_organization',
    execute: async (context, signal) => {
      const organization = await provider.createOrganization(
        { name: context.tenant.name, domain: context.tenant.domain },
        { signal }
      );
      return { ...context, externalOrgId: organization.id };
    },
    compensate: async (context, signal) => {
      if (context.externalOrgId) {
        await provider.deleteOrganization(context.externalOrgId, { signal });
      }
    },
  };
}

/**
 * Adds the user to the organization. A user who is already a member is left
 * as is, and compensation does not remove a link this step did not make.
 */
export function linkUserToOrganizationStep<T extends OrganizationLinkFacts>(
  provider: IdentityProvider
): SagaStep<T> {
  return {
    name: 'link_user_to_organization',
    execute: async (context, signal) => {
      const userId = requireFact(context.externalUserId, 'externalUserId');
      const orgId = requireFact(context.externalOrgId, 'externalOrgId');
      try {
        await provider.addUserToOrganization(userId, orgId, { signal });
      } catch (error) {
        if (error instanceof IdentityProviderError && error.status === 409) {
          return { ...context, linkedToOrg: false };
        }
        throw error;
      }
      return { ...context, linkedToOrg: true };
    },
    compensate: async (context, signal) => {
      if (context.linkedToOrg && context.externalUserId && context.externalOrgId) {
        await provider.removeUserFromOrganization(context.externalUserId, context.externalOrgId, { signal });
      }
    },
  };
}

export function openLocalTransactionStep<T extends LocalTransactionFacts>(
  store: TransactionalStore
): SagaStep<T> {
  return {
    name: 'open_local_transaction',
    execute: async (context) => {
      const transaction = await store.beginTransaction();
      return { ...context, transaction, localTransactionOpen: true };
    },
    compensate: async (context) => {
      if (context.localTransactionOpen && context.transaction?.isOpen) {
        await context.transaction.rollback();
      }
    },
  };
}

/**
 * Runs `write` inside the transaction opened by `openLocalTransactionStep` and
 * commits. A failed commit has already rolled back by the time it throws.
 */
export function persistLocallyStep<T extends LocalTransactionFacts>(
  name: string,
  write: (transaction: StoreTransaction, context: T) => Promise<T>
): SagaStep<T> {
  return {
    name,
    execute: async (context) => {
      const transaction = requireFact(context.transaction, 'transaction');
      const written = await write(transaction, context);
      await transaction.commit();
      return { ...written, localTransactionOpen: false };
    },
  };
}

export async function requireRole(repositories: StoreRepositories, name: string): Promise<Role> {
  const role = await repositories.roles.findByName(name);
  if (!role) {
    throw new Error(`Role ${name} is not seeded`);
  }
  return role;
}
