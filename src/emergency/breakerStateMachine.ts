import type { BreakerStatus } from '../domain/models.js';

export type BreakerTrigger = 'FAILURE_THRESHOLD' | 'COOLDOWN_ELAPSED' | 'TRIAL_SUCCEEDED' | 'TRIAL_FAILED';

export function nextBreakerState(current: BreakerStatus, trigger: BreakerTrigger): BreakerStatus {
  if (current === 'Closed' && trigger === 'FAILURE_THRESHOLD') {
    return 'Open';
  }

  if (current === 'Open' && trigger === 'COOLDOWN_ELAPSED') {
    return 'HalfOpen';
  }

  if (current === 'HalfOpen' && trigger === 'TRIAL_SUCCEEDED') {
    return 'Closed';
  }

  if (current === 'HalfOpen' && trigger === 'TRIAL_FAILED') {
    return 'Open';
  }

  return current;
}
