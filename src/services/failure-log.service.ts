import type { FailureLogRepository } from '../db/store.js';
import type { FailureLog, FailureWorkflow } from '../models/failure-log.js';
import type { SagaFailure, SagaResult } from './saga.service.js';
import { IdentityProviderError } from '../providers/base.provider.js';
import { logger } from '../utils/logger.js';

export interface FailureSubject {
  externalUserId?: string;
  externalOrgId?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
}

function mayHaveLeftState<TContext>(result: SagaFailure<TContext>): boolean {
  if (result.compensatedSteps.length > 0) return true;
  if (!result.sideEffectsStarted) return false;
  // A 4xx is the provider refusing the write: nothing was created
  return !(result.error instanceof IdentityProviderError && result.error.isClientError);
}

/**
 * Persists failure records for workflows that may have left partial state.
 * Writes use the store's auto-commit repository: the saga's own transaction
 * is already rolled back when this runs.
 */
export class FailureLogService {
  constructor(private readonly repository: FailureLogRepository) {}

  /**
   * Records a failed saga run that may have left something behind: a step was
   * compensated, or a writing step failed with an unknown outcome. A run
   * whose only write the provider refused outright is not recorded. Resolves
   * to null when nothing is recorded and when the write itself fails, which
   * is logged instead of masking the workflow's own error.
   */
  async recordSagaFailure<TContext>(
    workflow: FailureWorkflow,
    result: SagaResult<TContext>,
    subject: FailureSubject
  ): Promise<FailureLog | null> {
    if (result.success || !mayHaveLeftState(result)) {
      return null;
    }

    const input = {
      workflow,
      external_user_id: subject.externalUserId,
      external_org_id: subject.externalOrgId,
      email: subject.email,
      first_name: subject.firstName,
      last_name: subject.lastName,
      error_message: result.error.message,
      failed_step: result.failedStep,
      compensation_succeeded: result.compensationErrors.length === 0,
      compensation_errors: result.compensationErrors.map(e => e.message),
    };

    try {
      const failureLog = await this.repository.create(input);
      logger.info(
        { failureLogId: failureLog.id, workflow, failedStep: result.failedStep },
        'Failure log recorded'
      );
      return failureLog;
    } catch (error) {
      logger.error({ error, input }, 'Failed to record failure log');
      return null;
    }
  }
}
