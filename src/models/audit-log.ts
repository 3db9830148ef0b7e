import { v4 as uuidv4 } from 'uuid';
import type { Queryable } from '../db/connection.js';

export type AuditEntityType = 'user' | 'tenant' | 'membership';
export type AuditAction = 'created' | 'deleted' | 'restored' | 'invited';

export interface AuditLog {
  id: string;
  entity_type: AuditEntityType;
  entity_id: string;
  action: AuditAction;
  old_value: Record<string, unknown> | null;
  new_value: Record<string, unknown> | null;
  actor: string | null;
  actor_type: string;
  tenant_id: string | null;
  created_at: Date;
}

export interface CreateAuditLogInput {
  entity_type: AuditEntityType;
  entity_id: string;
  action: AuditAction;
  old_value?: Record<string, unknown> | null;
  new_value?: Record<string, unknown> | null;
  actor?: string;
  actor_type?: string;
  tenant_id?: string;
}

export async function createAuditLog(db: Queryable, input: CreateAuditLogInput): Promise<AuditLog> {
  const id = uuidv4();

  const { rows } = await db.query<AuditLog>(
    `INSERT INTO audit_logs (
      id, entity_type, entity_id, action, old_value, new_value,
      actor, actor_type, tenant_id
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
    RETURNING *`,
    [
      id,
      input.entity_type,
      input.entity_id,
      input.action,
      input.old_value ? JSON.stringify(input.old_value) : null,
      input.new_value ? JSON.stringify(input.new_value) : null,
      input.actor || null,
      input.actor_type || 'system',
      input.tenant_id || null,
    ]
  );

  return rows[0]!;
}
