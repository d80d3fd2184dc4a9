import type { TenantConfigInput } from './types.js';

export type DefaultAutomation = Required<Pick<TenantConfigInput, 'rules' | 'schedules' | 'workflows'>>;

const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;

/** Automation every newly onboarded tenant starts with. Uses core capabilities only. */
export function defaultAutomation(): DefaultAutomation {
  return {
    workflows: [
      {
        id: 'daily_health_check',
        name: 'Daily Health Check',
        severity: 'info',
        steps: [
          { name: 'collect_metrics', capability: 'data-collector', timeoutMs: 300 * SECOND_MS },
          { name: 'analyze_patterns', capability: 'pattern-detector', timeoutMs: 180 * SECOND_MS },
          {
            name: 'generate_recommendations',
            capability: 'health-coach',
            onFailure: 'skippable',
            timeoutMs: 120 * SECOND_MS,
          },
          { name: 'update_daily_plan', capability: 'workout-planner', onFailure: 'skippable', timeoutMs: 60 * SECOND_MS },
          { name: 'send_summary', capability: 'notifier', timeoutMs: 30 * SECOND_MS },
        ],
      },
      {
        id: 'weekly_optimization',
        name: 'Weekly Health Optimization',
        severity: 'info',
        steps: [
          { name: 'collect_weekly_data', capability: 'data-collector', timeoutMs: 600 * SECOND_MS },
          { name: 'pattern_analysis', capability: 'pattern-detector', timeoutMs: 900 * SECOND_MS },
          { name: 'optimize_plans', capability: 'nutrition-planner', onFailure: 'skippable', timeoutMs: 300 * SECOND_MS },
          { name: 'generate_insights', capability: 'health-coach', onFailure: 'skippable', timeoutMs: 180 * SECOND_MS },
          { name: 'update_goals', capability: 'workout-planner', onFailure: 'skippable', timeoutMs: 120 * SECOND_MS },
        ],
      },
      {
        id: 'proactive_monitoring',
        name: 'Proactive Health Monitoring',
        severity: 'warning',
        deadlineMs: 5 * MINUTE_MS,
        steps: [
          { name: 'monitor_metrics', capability: 'data-collector', timeoutMs: 30 * SECOND_MS },
          { name: 'check_thresholds', capability: 'safety-officer', timeoutMs: 15 * SECOND_MS },
          { name: 'trigger_alerts', capability: 'notifier', timeoutMs: 10 * SECOND_MS },
          {
            name: 'update_recommendations',
            capability: 'health-coach',
            onFailure: 'skippable',
            timeoutMs: 20 * SECOND_MS,
          },
        ],
      },
      {
        id: 'recovery_protocol',
        name: 'Recovery Protocol',
        severity: 'warning',
        steps: [
          { name: 'safety_check', capability: 'safety-officer', timeoutMs: 30 * SECOND_MS },
          { name: 'adjust_training', capability: 'workout-planner', onFailure: 'skippable', timeoutMs: 60 * SECOND_MS },
          { name: 'notify_member', capability: 'notifier', timeoutMs: 30 * SECOND_MS },
        ],
      },
    ],
    rules: [
      {
        id: 'recovery_monitoring',
        name: 'Recovery Score Monitoring',
        metricKey: 'recovery_score',
        operator: '<',
        threshold: 30,
        cooldownMs: 60 * MINUTE_MS,
        workflowId: 'recovery_protocol',
        severity: 'critical',
      },
      {
        id: 'health_alert_escalation',
        name: 'Health Alert Escalation',
        metricKey: 'heart_rate_variability',
        operator: '<',
        threshold: 15,
        cooldownMs: 30 * MINUTE_MS,
        workflowId: 'recovery_protocol',
        severity: 'critical',
      },
    ],
    schedules: [
      { id: 'daily_health_check', workflowId: 'daily_health_check', recurrence: { kind: 'daily', at: '07:00' } },
      {
        id: 'weekly_optimization',
        workflowId: 'weekly_optimization',
        recurrence: { kind: 'weekly', day: 'monday', at: '08:00' },
      },
      {
        id: 'proactive_monitoring',
        workflowId: 'proactive_monitoring',
        recurrence: { kind: 'interval', everyMs: 15 * MINUTE_MS },
      },
    ],
  };
}

export type OnboardingInput = Omit<TenantConfigInput, 'rules' | 'schedules' | 'workflows'>;

export function onboardingConfig(input: OnboardingInput): TenantConfigInput {
  return { ...input, ...defaultAutomation() };
}
