import { v4 as uuidv4 } from 'uuid';
import type { Queryable } from '../db/connection.js';

export interface User {
  id: string;
  email: string;
  created_at: Date;
}

export interface CreateUserInput {
  email: string;
}

export async function createUser(db: Queryable, input: CreateUserInput): Promise<User> {
  const id = uuidv4();
  const { rows } = await db.query<User>(
    `INSERT INTO users (id, email) VALUES ($1, $2)
     RETURNING *`,
    [id, input.email.toLowerCase()]
  );

  return rows[0]!;
}

export async function getUserById(db: Queryable, id: string): Promise<User | null> {
  const { rows } = await db.query<User>('SELECT * FROM users WHERE id = $1', [id]);
  return rows[0] || null;
}

export async function deleteUser(db: Queryable, id: string): Promise<void> {
  await db.query('DELETE FROM users WHERE id = $1', [id]);
}
