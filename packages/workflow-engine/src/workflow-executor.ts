import { randomUUID } from 'node:crypto';

import { errorMessage, type Logger } from '@wellness-automation/shared';

import type { CapabilityRegistry } from './capabilities.js';
import { LedgerConflictError, type ExecutionLedger } from './execution-ledger.js';
import { assertSameTenant } from './isolation-guard.js';
import { DEFAULT_RETRY_POLICY, RetryExecutor, getErrorCode, type RetryPolicy } from './retry-executor.js';
import { assertValidStepTransition } from './step-state-machine.js';
import type { TenantRegistry } from './tenant-registry.js';
import type {
  ExecutionRecord,
  ExecutionStatus,
  FailureCause,
  StepError,
  StepOutcome,
  StepState,
  Tenant,
  TriggerEvent,
  WorkflowDefinition,
  WorkflowStep,
} from './types.js';

export interface WorkflowExecutorDependencies {
  registry: TenantRegistry;
  ledger: ExecutionLedger;
  capabilities: CapabilityRegistry;
  logger: Logger;
  retryExecutor?: RetryExecutor;
  retryPolicy?: RetryPolicy;
  defaultStepTimeoutMs?: number;
  defaultWorkflowDeadlineMs?: number;
  clock?: () => Date;
}

type StepAttempt =
  | { kind: 'success'; status: 'succeeded' | 'skipped'; output: Record<string, unknown> }
  | { kind: 'failure'; retryable: boolean; error: StepError };

interface AbortWaiter {
  promise: Promise<'aborted'>;
  dispose(): void;
}

function waitForAbort(signal: AbortSignal): AbortWaiter {
  let onAbort = (): void => undefined;
  const promise = new Promise<'aborted'>((resolve) => {
    onAbort = () => resolve('aborted');
    if (signal.aborted) {
      resolve('aborted');
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });

  return {
    promise,
    dispose: () => signal.removeEventListener('abort', onAbort),
  };
}

function failure(retryable: boolean, code: string, message: string, cause: FailureCause): StepAttempt {
  return { kind: 'failure', retryable, error: { code, message, cause } };
}

function transition(outcome: StepOutcome, to: StepState): void {
  assertValidStepTransition(outcome.state, to);
  outcome.state = to;
}

function overallStatus(steps: StepOutcome[]): ExecutionStatus {
  if (steps.some((step) => step.state === 'failed' && step.onFailure === 'fatal')) {
    return 'failed';
  }

  return steps.some((step) => step.state === 'failed') ? 'partially-completed' : 'completed';
}

/**
 * Runs a workflow's steps in order for one trigger and appends the terminal
 * record to the ledger. Failures of any kind end up in the record; the
 * returned promise only rejects for a missing tenant or an isolation breach.
 */
export class WorkflowExecutor {
  private readonly registry: TenantRegistry;
  private readonly ledger: ExecutionLedger;
  private readonly capabilities: CapabilityRegistry;
  private readonly logger: Logger;
  private readonly retryExecutor: RetryExecutor;
  private readonly retryPolicy: RetryPolicy;
  private readonly defaultStepTimeoutMs: number;
  private readonly defaultWorkflowDeadlineMs: number;
  private readonly clock: () => Date;
  private readonly inFlight = new Map<string, { tenantId: string; promise: Promise<ExecutionRecord> }>();

  constructor(dependencies: WorkflowExecutorDependencies) {
    this.registry = dependencies.registry;
    this.ledger = dependencies.ledger;
    this.capabilities = dependencies.capabilities;
    this.logger = dependencies.logger.child({ component: 'workflow-executor' });
    this.retryExecutor = dependencies.retryExecutor ?? new RetryExecutor();
    this.retryPolicy = dependencies.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.defaultStepTimeoutMs = dependencies.defaultStepTimeoutMs ?? 60_000;
    this.defaultWorkflowDeadlineMs = dependencies.defaultWorkflowDeadlineMs ?? 15 * 60_000;
    this.clock = dependencies.clock ?? (() => new Date());
  }

  async execute(trigger: TriggerEvent): Promise<ExecutionRecord> {
    const existing = this.ledger.findByDedupKey(trigger.dedupKey);
    if (existing !== null) {
      assertSameTenant(trigger.tenantId, existing.tenantId, 'ledger record');
      this.logger.debug('duplicate trigger, returning recorded execution', {
        tenantId: trigger.tenantId,
        dedupKey: trigger.dedupKey,
        executionId: existing.id,
      });
      return existing;
    }

    const running = this.inFlight.get(trigger.dedupKey);
    if (running !== undefined) {
      assertSameTenant(trigger.tenantId, running.tenantId, 'in-flight execution');
      return running.promise;
    }

    const promise = this.run(trigger).finally(() => {
      this.inFlight.delete(trigger.dedupKey);
    });
    this.inFlight.set(trigger.dedupKey, { tenantId: trigger.tenantId, promise });
    return promise;
  }

  private async run(trigger: TriggerEvent): Promise<ExecutionRecord> {
    // The snapshot taken here is the configuration for the whole run.
    const tenant = this.registry.get(trigger.tenantId);
    const executionId = randomUUID();
    const startedAt = this.clock().toISOString();
    const log = this.logger.child({ tenantId: tenant.id, executionId, workflowId: trigger.workflowId });

    const workflow = tenant.workflows.find((candidate) => candidate.id === trigger.workflowId);
    if (workflow === undefined) {
      log.error('workflow not configured for tenant');
      return this.finalize(tenant, trigger, executionId, startedAt, 'info', [], 'configuration');
    }

    const steps: StepOutcome[] = workflow.steps.map((step) => ({
      name: step.name,
      capability: step.capability,
      onFailure: step.onFailure,
      state: 'pending',
      attempts: 0,
    }));

    const controller = new AbortController();
    const deadline = setTimeout(() => controller.abort(), workflow.deadlineMs ?? this.defaultWorkflowDeadlineMs);
    let failureCause: FailureCause | undefined;

    try {
      for (const [index, step] of workflow.steps.entries()) {
        const outcome = steps[index];
        if (outcome === undefined) {
          continue;
        }

        if (failureCause === undefined && controller.signal.aborted) {
          failureCause = 'workflow_timeout';
        }

        if (failureCause !== undefined) {
          transition(outcome, 'skipped');
          outcome.skipReason = 'halted';
          continue;
        }

        await this.runStep(tenant, executionId, step, outcome, controller.signal, log);
        // A deadline halts the run whatever the step's onFailure says.
        const deadlineHit = outcome.error?.cause === 'workflow_timeout';
        if (outcome.state === 'failed' && (step.onFailure === 'fatal' || deadlineHit)) {
          failureCause = outcome.error?.cause ?? 'fatal_step';
        }
      }
    } finally {
      clearTimeout(deadline);
    }

    return this.finalize(tenant, trigger, executionId, startedAt, workflow.severity, steps, failureCause);
  }

  private async runStep(
    tenant: Tenant,
    executionId: string,
    step: WorkflowStep,
    outcome: StepOutcome,
    workflowSignal: AbortSignal,
    log: Logger,
  ): Promise<void> {
    transition(outcome, 'running');
    outcome.startedAt = this.clock().toISOString();

    const result = await this.retryExecutor.run<StepAttempt>(
      async (attemptNumber) => {
        outcome.attempts = attemptNumber;
        const attempt = await this.invokeOnce(tenant, executionId, step, attemptNumber, workflowSignal);
        if (attempt.kind === 'success') {
          return { kind: 'success', value: attempt };
        }

        log.warn('step attempt failed', {
          step: step.name,
          attempt: attemptNumber,
          code: attempt.error.code,
          retryable: attempt.retryable,
        });
        return {
          kind: 'failure',
          retryable: attempt.retryable && step.onFailure === 'fatal',
          value: attempt,
        };
      },
      this.retryPolicy,
      workflowSignal,
    );

    const attempt = result.value;
    if (attempt.kind === 'success') {
      transition(outcome, attempt.status);
      outcome.output = attempt.output;
      if (attempt.status === 'skipped') {
        outcome.skipReason = 'capability';
      }
    } else if (workflowSignal.aborted && attempt.error.cause !== 'configuration') {
      transition(outcome, 'failed');
      outcome.error = {
        code: 'WORKFLOW_DEADLINE_EXCEEDED',
        message: 'Workflow deadline exceeded',
        cause: 'workflow_timeout',
      };
    } else {
      const cause: FailureCause =
        result.exhausted && attempt.error.cause === 'fatal_step' ? 'transient_exhausted' : attempt.error.cause;
      transition(outcome, 'failed');
      outcome.error = { ...attempt.error, cause };
    }

    outcome.endedAt = this.clock().toISOString();
    log.info('step finished', { step: step.name, state: outcome.state, attempts: outcome.attempts });
  }

  private async invokeOnce(
    tenant: Tenant,
    executionId: string,
    step: WorkflowStep,
    attempt: number,
    workflowSignal: AbortSignal,
  ): Promise<StepAttempt> {
    if (workflowSignal.aborted) {
      return failure(false, 'WORKFLOW_DEADLINE_EXCEEDED', 'Workflow deadline exceeded', 'workflow_timeout');
    }

    if (!this.capabilities.has(step.capability)) {
      return failure(false, 'UNKNOWN_CAPABILITY', `Capability not registered: ${step.capability}`, 'configuration');
    }
    const capability = this.capabilities.resolve(step.capability);

    const stepController = new AbortController();
    const workflowAbort = waitForAbort(workflowSignal);
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), step.timeoutMs ?? this.defaultStepTimeoutMs);
    });

    const invocation = capability
      .invoke({
        tenantId: tenant.id,
        capability: step.capability,
        executionId,
        stepName: step.name,
        attempt,
        stepInput: step.input,
        signal: stepController.signal,
      })
      .then(
        (outcome) => ({ kind: 'outcome' as const, outcome }),
        (error: unknown) => ({ kind: 'error' as const, error }),
      );

    try {
      const winner = await Promise.race([invocation, timeout, workflowAbort.promise]);

      if (winner === 'timeout') {
        stepController.abort();
        return failure(true, 'STEP_TIMEOUT', `Step ${step.name} timed out`, 'step_timeout');
      }

      if (winner === 'aborted') {
        stepController.abort();
        return failure(false, 'WORKFLOW_DEADLINE_EXCEEDED', 'Workflow deadline exceeded', 'workflow_timeout');
      }

      if (winner.kind === 'error') {
        return failure(
          this.retryExecutor.isRetryableError(winner.error, this.retryPolicy),
          getErrorCode(winner.error) ?? 'CAPABILITY_ERROR',
          errorMessage(winner.error),
          'fatal_step',
        );
      }

      const { outcome } = winner;
      if (outcome.status === 'failed') {
        return failure(
          outcome.retryable,
          outcome.error?.code ?? 'CAPABILITY_FAILED',
          outcome.error?.message ?? `Capability ${step.capability} reported failure`,
          'fatal_step',
        );
      }

      return { kind: 'success', status: outcome.status, output: outcome.output };
    } finally {
      clearTimeout(timer);
      workflowAbort.dispose();
    }
  }

  private finalize(
    tenant: Tenant,
    trigger: TriggerEvent,
    executionId: string,
    startedAt: string,
    workflowSeverity: WorkflowDefinition['severity'],
    steps: StepOutcome[],
    failureCause: FailureCause | undefined,
  ): ExecutionRecord {
    const status: ExecutionStatus = failureCause === undefined ? overallStatus(steps) : 'failed';
    const record: ExecutionRecord = {
      id: executionId,
      tenantId: tenant.id,
      triggerId: trigger.id,
      dedupKey: trigger.dedupKey,
      workflowId: trigger.workflowId,
      source: trigger.source,
      severity: trigger.severity,
      workflowSeverity,
      configVersion: tenant.configVersion,
      steps,
      status,
      ...(failureCause === undefined ? {} : { failureCause }),
      startedAt,
      endedAt: this.clock().toISOString(),
    };

    try {
      const stored = this.ledger.append(record);
      this.logger.info('execution finished', {
        tenantId: tenant.id,
        executionId,
        workflowId: trigger.workflowId,
        status,
        ...(failureCause === undefined ? {} : { failureCause }),
      });
      return stored;
    } catch (error) {
      const recorded = error instanceof LedgerConflictError ? this.ledger.findByDedupKey(trigger.dedupKey) : null;
      if (recorded === null) {
        throw error;
      }

      this.logger.warn('execution raced an existing record, keeping the first', {
        tenantId: tenant.id,
        dedupKey: trigger.dedupKey,
      });
      return recorded;
    }
  }
}
