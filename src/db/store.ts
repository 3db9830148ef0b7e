import type { User, CreateUserInput } from '../models/user.js';
import type { Tenant, CreateTenantInput } from '../models/tenant.js';
import type { ExternalIdentity, ExternalEntityType, CreateExternalIdentityInput } from '../models/external-identity.js';
import type { Membership, CreateMembershipInput } from '../models/membership.js';
import type { Profile, CreateProfileInput } from '../models/profile.js';
import type { Role } from '../models/role.js';
import type { AuditLog, CreateAuditLogInput } from '../models/audit-log.js';
import type { FailureLog, CreateFailureLogInput } from '../models/failure-log.js';

export interface UserRepository {
  create(input: CreateUserInput): Promise<User>;
  findById(id: string): Promise<User | null>;
  delete(id: string): Promise<void>;
}

export interface TenantRepository {
  create(input: CreateTenantInput): Promise<Tenant>;
  findById(id: string): Promise<Tenant | null>;
}

export interface ExternalIdentityRepository {
  create(input: CreateExternalIdentityInput): Promise<ExternalIdentity>;
  findByExternalId(providerId: string, externalId: string): Promise<ExternalIdentity | null>;
  findByEntity(providerId: string, entityType: ExternalEntityType, entityId: string): Promise<ExternalIdentity | null>;
  updateExternalId(id: string, externalId: string): Promise<void>;
  delete(id: string): Promise<void>;
}

export interface MembershipRepository {
  create(input: CreateMembershipInput): Promise<Membership>;
  find(tenantId: string, userId: string): Promise<Membership | null>;
  countWithRole(tenantId: string, roleId: string): Promise<number>;
  deleteByUser(userId: string): Promise<void>;
}

export interface ProfileRepository {
  create(input: CreateProfileInput): Promise<Profile>;
  deleteByUser(userId: string): Promise<void>;
}

export interface RoleRepository {
  findByName(name: string): Promise<Role | null>;
}

export interface AuditLogRepository {
  create(input: CreateAuditLogInput): Promise<AuditLog>;
}

export interface FailureLogRepository {
  create(input: CreateFailureLogInput): Promise<FailureLog>;
}

export interface StoreRepositories {
  users: UserRepository;
  tenants: TenantRepository;
  externalIdentities: ExternalIdentityRepository;
  memberships: MembershipRepository;
  profiles: ProfileRepository;
  roles: RoleRepository;
  auditLogs: AuditLogRepository;
  failureLogs: FailureLogRepository;
}

/**
 * A unit of work owned by one saga run.
 *
 * `commit` rolls the transaction back itself when the commit fails, so a
 * transaction is never left open after either call. `rollback` on a closed
 * transaction does nothing.
 */
export interface StoreTransaction extends StoreRepositories {
  readonly isOpen: boolean;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

/** Repositories on the store itself run in auto-commit mode. */
export interface TransactionalStore extends StoreRepositories {
  beginTransaction(): Promise<StoreTransaction>;
}
