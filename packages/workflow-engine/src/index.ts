export * from './types.js';
export * from './service-levels.js';
export * from './validation.js';
export * from './recurrence.js';
export * from './tenant-registry.js';
export * from './isolation-guard.js';
export * from './metric-feed.js';
export * from './rule-engine.js';
export * from './scheduler.js';
export * from './step-state-machine.js';
export * from './retry-executor.js';
export * from './capabilities.js';
export * from './execution-ledger.js';
export * from './workflow-executor.js';
export * from './escalation-manager.js';
export * from './tenant-work-queue.js';
export * from './automation-engine.js';
export * from './workflow-templates.js';
