import { v4 as uuidv4 } from 'uuid';
import type { Queryable } from '../db/connection.js';

export interface Profile {
  id: string;
  membership_id: string;
  first_name: string;
  last_name: string;
  created_at: Date;
}

export interface CreateProfileInput {
  membership_id: string;
  first_name: string;
  last_name: string;
}

export async function createProfile(db: Queryable, input: CreateProfileInput): Promise<Profile> {
  const id = uuidv4();
  const { rows } = await db.query<Profile>(
    `INSERT INTO profiles (id, membership_id, first_name, last_name)
     VALUES ($1, $2, $3, $4)
     RETURNING *`,
    [id, input.membership_id, input.first_name, input.last_name]
  );

  return rows[0]!;
}

export async function deleteProfilesByUser(db: Queryable, userId: string): Promise<void> {
  await db.query(
    `DELETE FROM profiles
     WHERE membership_id IN (SELECT id FROM memberships WHERE user_id = $1)`,
    [userId]
  );
}
