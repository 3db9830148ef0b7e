import type { AuditLog, AuditAction, AuditEntityType, CreateAuditLogInput } from '../models/audit-log.js';
import type { AuditLogRepository } from '../db/store.js';
import { logger } from '../utils/logger.js';

export interface AuditContext {
  actor?: string;
  actor_type?: string;
  tenant_id?: string;
}

class AuditService {
  /**
   * Writes through `repository`, normally the repository of the transaction
   * that made the change, so the record commits or rolls back with it.
   */
  async log(
    repository: AuditLogRepository,
    entityType: AuditEntityType,
    entityId: string,
    action: AuditAction,
    options: {
      oldValue?: Record<string, unknown> | null;
      newValue?: Record<string, unknown> | null;
      context?: AuditContext;
    } = {}
  ): Promise<AuditLog> {
    const input: CreateAuditLogInput = {
      entity_type: entityType,
      entity_id: entityId,
      action,
      old_value: options.oldValue,
      new_value: options.newValue,
      ...options.context,
    };

    try {
      const auditLog = await repository.create(input);
      logger.debug({ auditLog }, 'Audit log created');
      return auditLog;
    } catch (error) {
      logger.error({ error, input }, 'Failed to create audit log');
      throw error;
    }
  }

  async logTenantCreated(
    repository: AuditLogRepository,
    tenantId: string,
    tenantData: Record<string, unknown>,
    context?: AuditContext
  ): Promise<AuditLog> {
    return this.log(repository, 'tenant', tenantId, 'created', {
      newValue: tenantData,
      context: { ...context, tenant_id: tenantId },
    });
  }

  async logUserCreated(
    repository: AuditLogRepository,
    userId: string,
    userData: Record<string, unknown>,
    context?: AuditContext
  ): Promise<AuditLog> {
    return this.log(repository, 'user', userId, 'created', {
      newValue: userData,
      context,
    });
  }

  async logMembershipCreated(
    repository: AuditLogRepository,
    membershipId: string,
    membershipData: Record<string, unknown>,
    context?: AuditContext
  ): Promise<AuditLog> {
    return this.log(repository, 'membership', membershipId, 'created', {
      newValue: membershipData,
      context,
    });
  }

  async logUserDeleted(
    repository: AuditLogRepository,
    userId: string,
    userData: Record<string, unknown>,
    context?: AuditContext
  ): Promise<AuditLog> {
    return this.log(repository, 'user', userId, 'deleted', {
      oldValue: userData,
      context,
    });
  }

  async logUserRestored(
    repository: AuditLogRepository,
    userId: string,
    oldExternalId: string,
    newExternalId: string,
    context?: AuditContext
  ): Promise<AuditLog> {
    return this.log(repository, 'user', userId, 'restored', {
      oldValue: { external_id: oldExternalId },
      newValue: { external_id: newExternalId },
      context,
    });
  }
}

export const auditService = new AuditService();
