import type { Pool, PoolClient } from 'pg';
import type { Queryable } from './connection.js';
import type { StoreRepositories, StoreTransaction, TransactionalStore } from './store.js';
import { createUser, getUserById, deleteUser } from '../models/user.js';
import { createTenant, getTenantById } from '../models/tenant.js';
import {
  createExternalIdentity,
  getExternalIdentityByExternalId,
  getExternalIdentityByEntity,
  updateExternalIdentityExternalId,
  deleteExternalIdentity,
} from '../models/external-identity.js';
import {
  createMembership,
  getMembership,
  countMembersWithRole,
  deleteMembershipsByUser,
} from '../models/membership.js';
import { createProfile, deleteProfilesByUser } from '../models/profile.js';
import { getRoleByName } from '../models/role.js';
import { createAuditLog } from '../models/audit-log.js';
import { createFailureLog } from '../models/failure-log.js';
import { logger } from '../utils/logger.js';

function createRepositories(db: Queryable): StoreRepositories {
  return {
    users: {
      create: (input) => createUser(db, input),
      findById: (id) => getUserById(db, id),
      delete: (id) => deleteUser(db, id),
    },
    tenants: {
      create: (input) => createTenant(db, input),
      findById: (id) => getTenantById(db, id),
    },
    externalIdentities: {
      create: (input) => createExternalIdentity(db, input),
      findByExternalId: (providerId, externalId) =>
        getExternalIdentityByExternalId(db, providerId, externalId),
      findByEntity: (providerId, entityType, entityId) =>
        getExternalIdentityByEntity(db, providerId, entityType, entityId),
      updateExternalId: (id, externalId) => updateExternalIdentityExternalId(db, id, externalId),
      delete: (id) => deleteExternalIdentity(db, id),
    },
    memberships: {
      create: (input) => createMembership(db, input),
      find: (tenantId, userId) => getMembership(db, tenantId, userId),
      countWithRole: (tenantId, roleId) => countMembersWithRole(db, tenantId, roleId),
      deleteByUser: (userId) => deleteMembershipsByUser(db, userId),
    },
    profiles: {
      create: (input) => createProfile(db, input),
      deleteByUser: (userId) => deleteProfilesByUser(db, userId),
    },
    roles: {
      findByName: (name) => getRoleByName(db, name),
    },
    auditLogs: {
      create: (input) => createAuditLog(db, input),
    },
    failureLogs: {
      create: (input) => createFailureLog(db, input),
    },
  };
}

abstract class PgRepositories implements StoreRepositories {
  readonly users: StoreRepositories['users'];
  readonly tenants: StoreRepositories['tenants'];
  readonly externalIdentities: StoreRepositories['externalIdentities'];
  readonly memberships: StoreRepositories['memberships'];
  readonly profiles: StoreRepositories['profiles'];
  readonly roles: StoreRepositories['roles'];
  readonly auditLogs: StoreRepositories['auditLogs'];
  readonly failureLogs: StoreRepositories['failureLogs'];

  protected constructor(db: Queryable) {
    const repositories = createRepositories(db);
    this.users = repositories.users;
    this.tenants = repositories.tenants;
    this.externalIdentities = repositories.externalIdentities;
    this.memberships = repositories.memberships;
    this.profiles = repositories.profiles;
    this.roles = repositories.roles;
    this.auditLogs = repositories.auditLogs;
    this.failureLogs = repositories.failureLogs;
  }
}

class PgStoreTransaction extends PgRepositories implements StoreTransaction {
  private open = true;

  constructor(private readonly client: PoolClient) {
    super(client);
  }

  get isOpen(): boolean {
    return this.open;
  }

  async commit(): Promise<void> {
    if (!this.open) {
      throw new Error('Transaction is already closed');
    }

    try {
      await this.client.query('COMMIT');
      this.finish();
    } catch (error) {
      logger.error({ error }, 'Commit failed, rolling back');
      await this.rollback().catch((rollbackError: unknown) => {
        logger.error({ error: rollbackError }, 'Rollback after failed commit failed');
      });
      throw error;
    }
  }

  async rollback(): Promise<void> {
    if (!this.open) return;

    try {
      await this.client.query('ROLLBACK');
    } finally {
      this.finish();
    }
  }

  private finish(): void {
    this.open = false;
    this.client.release();
  }
}

/**
 * PostgreSQL-backed store. Each transaction checks out its own pooled
 * connection and returns it on commit or rollback.
 */
export class PgTransactionalStore extends PgRepositories implements TransactionalStore {
  constructor(private readonly pool: Pool) {
    super(pool);
  }

  async beginTransaction(): Promise<StoreTransaction> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
    } catch (error) {
      client.release();
      throw error;
    }
    return new PgStoreTransaction(client);
  }
}
