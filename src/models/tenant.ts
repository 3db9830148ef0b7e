import { v4 as uuidv4 } from 'uuid';
import type { Queryable } from '../db/connection.js';

export type TenantStatus = 'active' | 'suspended';

export interface Tenant {
  id: string;
  name: string;
  status: TenantStatus;
  created_at: Date;
}

export interface TenantDomain {
  id: string;
  tenant_id: string;
  domain: string;
  is_primary: boolean;
  is_verified: boolean;
  created_at: Date;
}

export interface CreateTenantInput {
  name: string;
  /** The first domain becomes the primary one */
  domains: string[];
}

export async function createTenant(db: Queryable, input: CreateTenantInput): Promise<Tenant> {
  const id = uuidv4();
  const { rows } = await db.query<Tenant>(
    `INSERT INTO tenants (id, name) VALUES ($1, $2)
     RETURNING *`,
    [id, input.name]
  );

  for (const [index, domain] of input.domains.entries()) {
    await db.query(
      `INSERT INTO tenant_domains (id, tenant_id, domain, is_primary)
       VALUES ($1, $2, $3, $4)`,
      [uuidv4(), id, domain.toLowerCase(), index === 0]
    );
  }

  return rows[0]!;
}

export async function getTenantById(db: Queryable, id: string): Promise<Tenant | null> {
  const { rows } = await db.query<Tenant>('SELECT * FROM tenants WHERE id = $1', [id]);
  return rows[0] || null;
}
