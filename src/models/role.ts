import type { Queryable } from '../db/connection.js';

export interface Role {
  id: string;
  name: string;
  display_name: string;
  created_at: Date;
}

export async function getRoleByName(db: Queryable, name: string): Promise<Role | null> {
  const { rows } = await db.query<Role>('SELECT * FROM roles WHERE name = $1', [name]);
  return rows[0] || null;
}
