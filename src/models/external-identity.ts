import { v4 as uuidv4 } from 'uuid';
import type { Queryable } from '../db/connection.js';

export type ExternalEntityType = 'user' | 'tenant';

/**
 * Links a locally generated entity id to the id the identity provider issued
 * for it. Unique per (provider_id, external_id).
 */
export interface ExternalIdentity {
  id: string;
  provider_id: string;
  entity_type: ExternalEntityType;
  entity_id: string;
  external_id: string;
  created_at: Date;
}

export interface CreateExternalIdentityInput {
  provider_id: string;
  entity_type: ExternalEntityType;
  entity_id: string;
  external_id: string;
}

export async function createExternalIdentity(
  db: Queryable,
  input: CreateExternalIdentityInput
): Promise<ExternalIdentity> {
  const id = uuidv4();
  const { rows } = await db.query<ExternalIdentity>(
    `INSERT INTO external_identities (id, provider_id, entity_type, entity_id, external_id)
     VALUES ($1, $2, $3, $4, $5)
     RETURNING *`,
    [id, input.provider_id, input.entity_type, input.entity_id, input.external_id]
  );

  return rows[0]!;
}

export async function getExternalIdentityByExternalId(
  db: Queryable,
  providerId: string,
  externalId: string
): Promise<ExternalIdentity | null> {
  const { rows } = await db.query<ExternalIdentity>(
    `SELECT * FROM external_identities
     WHERE provider_id = $1 AND external_id = $2`,
    [providerId, externalId]
  );
  return rows[0] || null;
}

export async function getExternalIdentityByEntity(
  db: Queryable,
  providerId: string,
  entityType: ExternalEntityType,
  entityId: string
): Promise<ExternalIdentity | null> {
  const { rows } = await db.query<ExternalIdentity>(
    `SELECT * FROM external_identities
     WHERE provider_id = $1 AND entity_type = $2 AND entity_id = $3`,
    [providerId, entityType, entityId]
  );
  return rows[0] || null;
}

export async function updateExternalIdentityExternalId(
  db: Queryable,
  id: string,
  externalId: string
): Promise<void> {
  await db.query(
    'UPDATE external_identities SET external_id = $1 WHERE id = $2',
    [externalId, id]
  );
}

export async function deleteExternalIdentity(db: Queryable, id: string): Promise<void> {
  await db.query('DELETE FROM external_identities WHERE id = $1', [id]);
}
