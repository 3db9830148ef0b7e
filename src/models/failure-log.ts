import { v4 as uuidv4 } from 'uuid';
import type { Queryable } from '../db/connection.js';

export type FailureWorkflow =
  | 'onboarding'
  | 'tenant_creation'
  | 'user_creation'
  | 'user_deletion'
  | 'invitation'
  | 'reconciliation';

/**
 * Durable record of a workflow that failed after touching at least one system.
 * Operators use it to find half-undone work.
 */
export interface FailureLog {
  id: string;
  workflow: FailureWorkflow;
  external_user_id: string | null;
  external_org_id: string | null;
  email: string;
  first_name: string;
  last_name: string;
  error_message: string;
  failed_step: string | null;
  compensation_succeeded: boolean;
  compensation_errors: string[];
  occurred_at: Date;
}

export interface CreateFailureLogInput {
  workflow: FailureWorkflow;
  external_user_id?: string;
  external_org_id?: string;
  email?: string;
  first_name?: string;
  last_name?: string;
  error_message: string;
  failed_step?: string;
  compensation_succeeded: boolean;
  compensation_errors?: string[];
}

export async function createFailureLog(db: Queryable, input: CreateFailureLogInput): Promise<FailureLog> {
  const id = uuidv4();

  const { rows } = await db.query<FailureLog>(
    `INSERT INTO failure_logs (
      id, workflow, external_user_id, external_org_id, email, first_name, last_name,
      error_message, failed_step, compensation_succeeded, compensation_errors
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
    RETURNING *`,
    [
      id,
      input.workflow,
      input.external_user_id || null,
      input.external_org_id || null,
      input.email || '',
      input.first_name || '',
      input.last_name || '',
      input.error_message,
      input.failed_step || null,
      input.compensation_succeeded,
      JSON.stringify(input.compensation_errors ?? []),
    ]
  );

  return rows[0]!;
}
