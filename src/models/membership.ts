import { v4 as uuidv4 } from 'uuid';
import type { Queryable } from '../db/connection.js';

export interface Membership {
  id: string;
  tenant_id: string;
  user_id: string;
  role_ids: string[];
  joined_at: Date;
}

export interface CreateMembershipInput {
  tenant_id: string;
  user_id: string;
  role_ids: string[];
}

export async function createMembership(db: Queryable, input: CreateMembershipInput): Promise<Membership> {
  const id = uuidv4();
  const { rows } = await db.query<Omit<Membership, 'role_ids'>>(
    `INSERT INTO memberships (id, tenant_id, user_id) VALUES ($1, $2, $3)
     RETURNING *`,
    [id, input.tenant_id, input.user_id]
  );

  for (const roleId of input.role_ids) {
    await db.query(
      'INSERT INTO membership_roles (membership_id, role_id) VALUES ($1, $2)',
      [id, roleId]
    );
  }

  return { ...rows[0]!, role_ids: [...input.role_ids] };
}

export async function getMembership(
  db: Queryable,
  tenantId: string,
  userId: string
): Promise<Membership | null> {
  const { rows } = await db.query<Membership>(
    `SELECT m.*, COALESCE(array_agg(mr.role_id) FILTER (WHERE mr.role_id IS NOT NULL), '{}') AS role_ids
     FROM memberships m
     LEFT JOIN membership_roles mr ON mr.membership_id = m.id
     WHERE m.tenant_id = $1 AND m.user_id = $2
     GROUP BY m.id`,
    [tenantId, userId]
  );
  return rows[0] || null;
}

export async function countMembersWithRole(
  db: Queryable,
  tenantId: string,
  roleId: string
): Promise<number> {
  const { rows } = await db.query<{ count: string }>(
    `SELECT COUNT(*) AS count FROM memberships m
     JOIN membership_roles mr ON mr.membership_id = m.id
     WHERE m.tenant_id = $1 AND mr.role_id = $2`,
    [tenantId, roleId]
  );
  return parseInt(rows[0]?.count || '0', 10);
}

export async function deleteMembershipsByUser(db: Queryable, userId: string): Promise<void> {
  await db.query('DELETE FROM memberships WHERE user_id = $1', [userId]);
}
