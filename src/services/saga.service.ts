import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { config } from '../config/index.js';
import { recordSaga, recordCompensationFailure, type SagaOutcome } from '../config/metrics.js';

/**
 * One forward action of a saga with its optional compensating action.
 *
 * `execute` returns the context extended with the facts it established; a
 * step that throws contributes no facts. `compensate` must treat an
 * already-undone resource as success.
 */
export interface SagaStep<TContext> {
  name: string;
  execute: (context: TContext, signal: AbortSignal) => Promise<TContext>;
  compensate?: (context: TContext, signal: AbortSignal) => Promise<void>;
  /** Set on steps that never write anything, inside or outside the process */
  readOnly?: boolean;
}

interface SagaResultBase<TContext> {
  context: TContext;
  completedSteps: string[];
  /** Steps whose compensation ran, in the order it ran */
  compensatedSteps: string[];
  compensationErrors: CompensationError[];
}

export type SagaFailure<TContext> = SagaResultBase<TContext> & {
  success: false;
  error: Error;
  failedStep: string;
  /**
   * Whether a step that writes had started: one completed, or the failing
   * step itself may have written before it threw.
   */
  sideEffectsStarted: boolean;
};

export type SagaResult<TContext> =
  | (SagaResultBase<TContext> & { success: true; error?: undefined; failedStep?: undefined })
  | SagaFailure<TContext>;

export interface SagaExecuteOptions {
  signal?: AbortSignal;
}

export interface SagaOptions {
  logger?: Logger;
  compensationTimeoutMs?: number;
}

export class CompensationError extends Error {
  constructor(
    public readonly step: string,
    cause: unknown
  ) {
    super(
      `Compensation of step ${step} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'CompensationError';
  }
}

export type PreconditionCode =
  | 'SELF_DELETION'
  | 'TENANT_NOT_FOUND'
  | 'USER_NOT_FOUND'
  | 'NOT_IN_TENANT'
  | 'LAST_ADMINISTRATOR'
  | 'INVALID_INPUT';

/** Business rule rejection raised before a saga has caused any side effect */
export class PreconditionError extends Error {
  constructor(
    public readonly code: PreconditionCode,
    message: string
  ) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export class SagaOrchestrator<TContext extends object> {
  private steps: SagaStep<TContext>[] = [];
  private readonly logger: Logger;
  private readonly compensationTimeoutMs: number;

  constructor(
    public readonly name: string,
    options: SagaOptions = {}
  ) {
    this.logger = (options.logger ?? rootLogger).child({ saga: name });
    this.compensationTimeoutMs = options.compensationTimeoutMs ?? config.saga.compensationTimeoutMs;
  }

  addStep(step: SagaStep<TContext>): this {
    this.steps.push(step);
    return this;
  }

  async execute(initialContext: TContext, options: SagaExecuteOptions = {}): Promise<SagaResult<TContext>> {
    const signal = options.signal ?? new AbortController().signal;
    const startTime = process.hrtime.bigint();
    const completedSteps: SagaStep<TContext>[] = [];
    let context = { ...initialContext };
    let started: SagaStep<TContext> | undefined;

    try {
      for (const step of this.steps) {
        signal.throwIfAborted();
        this.logger.debug({ step: step.name }, 'Executing saga step');

        started = step;
        context = await step.execute(context, signal);
        completedSteps.push(step);

        this.logger.debug({ step: step.name }, 'Saga step completed');
      }

      recordSaga(this.name, 'succeeded', this.elapsedSeconds(startTime));

      return {
        success: true,
        context,
        completedSteps: completedSteps.map(s => s.name),
        compensatedSteps: [],
        compensationErrors: [],
      };
    } catch (error) {
      const failedStep = this.steps[completedSteps.length];

      this.logger.error(
        { error, step: failedStep?.name },
        'Saga step failed, starting compensation'
      );

      const { compensatedSteps, compensationErrors } = await this.compensate(completedSteps, context);

      const outcome: SagaOutcome = compensationErrors.length > 0 ? 'compensation_failed' : 'compensated';
      recordSaga(this.name, outcome, this.elapsedSeconds(startTime));

      return {
        success: false,
        context,
        error: error instanceof Error ? error : new Error(String(error)),
        failedStep: failedStep?.name ?? 'unknown',
        sideEffectsStarted: [...completedSteps, started].some(s => s !== undefined && !s.readOnly),
        completedSteps: completedSteps.map(s => s.name),
        compensatedSteps,
        compensationErrors,
      };
    }
  }

  // Compensation must not inherit the caller's cancellation: an aborted
  // request still has to undo what it did.
  private async compensate(
    completedSteps: SagaStep<TContext>[],
    context: TContext
  ): Promise<Pick<SagaResultBase<TContext>, 'compensatedSteps' | 'compensationErrors'>> {
    const signal = AbortSignal.timeout(this.compensationTimeoutMs);
    const compensatedSteps: string[] = [];
    const compensationErrors: CompensationError[] = [];

    for (let i = completedSteps.length - 1; i >= 0; i--) {
      const step = completedSteps[i];
      if (!step?.compensate) continue;

      compensatedSteps.push(step.name);
      try {
        this.logger.debug({ step: step.name }, 'Executing compensation');
        await step.compensate(context, signal);
        this.logger.debug({ step: step.name }, 'Compensation completed');
      } catch (compensationError) {
        const wrapped = new CompensationError(step.name, compensationError);
        compensationErrors.push(wrapped);
        recordCompensationFailure(this.name, step.name);
        this.logger.error(
          { error: compensationError, step: step.name },
          'Compensation failed'
        );
      }
    }

    return { compensatedSteps, compensationErrors };
  }

  private elapsedSeconds(startTime: bigint): number {
    return Number(process.hrtime.bigint() - startTime) / 1e9;
  }
}

export function createSaga<TContext extends object>(
  name: string,
  options?: SagaOptions
): SagaOrchestrator<TContext> {
  return new SagaOrchestrator<TContext>(name, options);
}
