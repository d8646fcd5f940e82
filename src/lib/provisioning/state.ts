import { ErrorCode } from '@/lib/errors/error-codes';
import { logEvent } from '@/lib/logging/logger';

import type { AppError } from '@/lib/errors/error';

export type ProvisioningState = 'pending' | 'in_progress' | 'completed' | 'failed' | 'rolled_back';

const TRANSITIONS: Record<ProvisioningState, readonly ProvisioningState[]> = {
  pending: ['in_progress'],
  in_progress: ['completed', 'failed'],
  failed: ['rolled_back'],
  completed: [],
  rolled_back: [],
};

export type ProvisioningTracker = {
  readonly operation: string;
  readonly subject: string;
  state: () => ProvisioningState;
  transition: (next: ProvisioningState) => void;
};

export function canTransition(from: ProvisioningState, to: ProvisioningState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function createProvisioningTracker(input: { operation: string; subject: string }): ProvisioningTracker {
  let current: ProvisioningState = 'pending';

  return {
    operation: input.operation,
    subject: input.subject,
    state: () => current,
    transition: (next) => {
      if (!canTransition(current, next)) {
        throw {
          code: ErrorCode.INTERNAL_ERROR,
          category: 'unknown',
          message: `illegal provisioning transition ${current} -> ${next}`,
          retryable: false,
          redacted_context: { operation: input.operation, subject: input.subject },
        } satisfies AppError;
      }
      logEvent({
        level: next === 'failed' || next === 'rolled_back' ? 'warn' : 'info',
        service: 'engine',
        event_type: 'provisioning.state',
        operation: input.operation,
        subject: input.subject,
        from: current,
        to: next,
      });
      current = next;
    },
  };
}
