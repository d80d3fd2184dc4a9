export const SERVICE_LEVELS = ['basic', 'premium', 'concierge', 'enterprise'] as const;

export type ServiceLevelName = (typeof SERVICE_LEVELS)[number];

export const CORE_CAPABILITIES = [
  'data-collector',
  'pattern-detector',
  'workout-planner',
  'nutrition-planner',
  'health-coach',
  'safety-officer',
  'notifier',
] as const;

export const PREMIUM_CAPABILITIES = [
  'advanced-workout-planner',
  'personalized-nutritionist',
  'medication-specialist',
  'sleep-optimizer',
  'stress-manager',
  'performance-analyst',
  'longevity-coach',
] as const;

export interface EscalationDefaults {
  renotifyIntervalMs: number;
  escalationDelayMs: number;
  expireAfterMs: number;
}

export interface ServiceLevelProfile {
  capabilities: readonly string[];
  escalation: EscalationDefaults;
}

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

const premiumTier = [...CORE_CAPABILITIES, ...PREMIUM_CAPABILITIES];

export const SERVICE_LEVEL_PROFILES: Record<ServiceLevelName, ServiceLevelProfile> = {
  basic: {
    capabilities: CORE_CAPABILITIES,
    escalation: { renotifyIntervalMs: 60 * MINUTE_MS, escalationDelayMs: 2 * HOUR_MS, expireAfterMs: 24 * HOUR_MS },
  },
  premium: {
    capabilities: premiumTier,
    escalation: { renotifyIntervalMs: 30 * MINUTE_MS, escalationDelayMs: HOUR_MS, expireAfterMs: 24 * HOUR_MS },
  },
  concierge: {
    capabilities: premiumTier,
    escalation: { renotifyIntervalMs: 15 * MINUTE_MS, escalationDelayMs: 30 * MINUTE_MS, expireAfterMs: 48 * HOUR_MS },
  },
  enterprise: {
    capabilities: premiumTier,
    escalation: { renotifyIntervalMs: 10 * MINUTE_MS, escalationDelayMs: 15 * MINUTE_MS, expireAfterMs: 72 * HOUR_MS },
  },
};

export function isCapabilityAvailable(serviceLevel: ServiceLevelName, capability: string): boolean {
  return SERVICE_LEVEL_PROFILES[serviceLevel].capabilities.includes(capability);
}
