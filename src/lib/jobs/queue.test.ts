import { describe, expect, it } from 'vitest';

import { isDue, nextStatusAfterFailure } from '@/lib/jobs/queue';

import type { AppError } from '@/lib/errors/error';

const now = new Date('2026-03-01T12:00:00.000Z');
const hour = 60 * 60_000;

describe('isDue', () => {
  it('enqueues the first job of a kind', () => {
    expect(isDue({ latest: null, now, intervalMs: hour })).toBe(true);
  });

  it('never stacks a second pending job', () => {
    const createdAt = new Date('2026-02-28T00:00:00.000Z');
    expect(isDue({ latest: { status: 'queued', createdAt }, now, intervalMs: hour })).toBe(false);
    expect(isDue({ latest: { status: 'running', createdAt }, now, intervalMs: hour })).toBe(false);
  });

  it('waits out the interval after the last job', () => {
    expect(isDue({ latest: { status: 'succeeded', createdAt: new Date('2026-03-01T11:30:00.000Z') }, now, intervalMs: hour })).toBe(
      false,
    );
    expect(isDue({ latest: { status: 'failed', createdAt: new Date('2026-03-01T11:00:00.000Z') }, now, intervalMs: hour })).toBe(
      true,
    );
  });
});

describe('nextStatusAfterFailure', () => {
  const network: AppError = { code: 'REMOTE_COMMUNICATION_FAILED', category: 'network', message: 'reset', retryable: true };
  const conflict: AppError = { code: 'MAINTENANCE_CONFLICT', category: 'conflict', message: 'busy', retryable: false };

  it('requeues retryable failures until attempts run out', () => {
    expect(nextStatusAfterFailure({ error: network, attempts: 1, maxAttempts: 3 })).toBe('queued');
    expect(nextStatusAfterFailure({ error: network, attempts: 3, maxAttempts: 3 })).toBe('failed');
  });

  it('fails permanent errors straight away', () => {
    expect(nextStatusAfterFailure({ error: conflict, attempts: 1, maxAttempts: 3 })).toBe('failed');
  });
});
