import type { StepState } from './types.js';

export const STEP_ALLOWED_TRANSITIONS: Record<StepState, StepState[]> = {
  pending: ['running', 'skipped'],
  running: ['succeeded', 'failed', 'skipped'],
  succeeded: [],
  failed: [],
  skipped: [],
};

export class InvalidStepTransitionError extends Error {
  constructor(from: StepState, to: StepState) {
    super(`Invalid step transition: ${from} -> ${to}`);
    this.name = 'InvalidStepTransitionError';
  }
}

export function canTransitionStep(from: StepState, to: StepState): boolean {
  return STEP_ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertValidStepTransition(from: StepState, to: StepState): void {
  if (!canTransitionStep(from, to)) {
    throw new InvalidStepTransitionError(from, to);
  }
}

export function isTerminalStepState(state: StepState): boolean {
  return STEP_ALLOWED_TRANSITIONS[state].length === 0;
}
