import type {
  AutomationRule,
  EscalationChannel,
  ScheduleSpec,
  ServiceLevel,
  Severity,
  WorkflowDefinition,
  WorkflowStep,
} from './validation.js';

export type {
  AutomationRule,
  EscalationChannel,
  Recurrence,
  RuleOperator,
  ScheduleSpec,
  ServiceLevel,
  Severity,
  TenantConfig,
  TenantConfigInput,
  Weekday,
  WorkflowDefinition,
  WorkflowStep,
} from './validation.js';

export type TenantStatus = 'active' | 'deactivated';

export interface EscalationPolicy {
  channel: EscalationChannel;
  primaryContact: string;
  secondaryContact?: string;
  renotifyIntervalMs: number;
  escalationDelayMs: number;
  maxDeliveryAttempts: number;
  expireAfterMs: number;
}

export interface Tenant {
  id: string;
  name: string;
  serviceLevel: ServiceLevel;
  timeZone: string;
  status: TenantStatus;
  rules: AutomationRule[];
  schedules: ScheduleSpec[];
  workflows: WorkflowDefinition[];
  escalation: EscalationPolicy;
  configVersion: number;
  createdAt: string;
  updatedAt: string;
}

export type TriggerSource =
  | { kind: 'rule'; ruleId: string }
  | { kind: 'schedule'; scheduleId: string; dueAt: string }
  | { kind: 'manual'; requestedBy: string };

export interface TriggerEvent {
  id: string;
  tenantId: string;
  workflowId: string;
  source: TriggerSource;
  severity: Severity;
  occurredAt: string;
  dedupKey: string;
  payload: Record<string, unknown>;
}

export type StepState = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped';

export type FailureCause =
  | 'fatal_step'
  | 'transient_exhausted'
  | 'step_timeout'
  | 'workflow_timeout'
  | 'configuration'
  | 'isolation_violation';

export interface StepError {
  code: string;
  message: string;
  cause: FailureCause;
}

export interface StepOutcome {
  name: string;
  capability: string;
  onFailure: WorkflowStep['onFailure'];
  state: StepState;
  attempts: number;
  startedAt?: string | undefined;
  endedAt?: string | undefined;
  output?: Record<string, unknown> | undefined;
  error?: StepError | undefined;
  skipReason?: 'capability' | 'halted' | undefined;
}

export type ExecutionStatus = 'completed' | 'partially-completed' | 'failed';

export interface ExecutionRecord {
  id: string;
  tenantId: string;
  triggerId: string;
  dedupKey: string;
  workflowId: string;
  source: TriggerSource;
  severity: Severity;
  workflowSeverity: Severity;
  configVersion: number;
  steps: StepOutcome[];
  status: ExecutionStatus;
  failureCause?: FailureCause | undefined;
  startedAt: string;
  endedAt: string;
  compensates?: string | undefined;
}

export interface TimeRange {
  from?: string;
  to?: string;
}

export type AlertKind = 'tenant' | 'internal';
export type AlertState = 'pending' | 'notified' | 'acknowledged' | 'expired';

export interface Alert {
  id: string;
  tenantId: string;
  kind: AlertKind;
  severity: Severity;
  executionId: string;
  workflowId: string;
  message: string;
  state: AlertState;
  createdAt: string;
  deliveryAttempts: number;
  undeliverable: boolean;
  lastAttemptAt?: string;
  lastNotifiedAt?: string;
  escalatedAt?: string;
  acknowledgedAt?: string;
  acknowledgedBy?: string;
  expiredAt?: string;
}

export interface PendingTrigger {
  trigger: TriggerEvent;
  enqueuedAt: string;
  state: 'queued' | 'running';
}
