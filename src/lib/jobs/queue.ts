import { and, asc, desc, eq, inArray, isNull, lt, sql } from 'drizzle-orm';

import { monitoringJobs } from '@/lib/db/schema';
import { ErrorCode } from '@/lib/errors/error-codes';

import type { DbExecutor } from '@/lib/db/client';
import type { MonitoringJob } from '@/lib/db/schema';
import type { AppError, JsonValue } from '@/lib/errors/error';
import type { JobInput } from '@/lib/jobs/process-job';

export type JobStatus = MonitoringJob['status'];

export async function enqueueJob(args: { db: DbExecutor; job: JobInput }): Promise<{ id: string }> {
  const [row] = await args.db
    .insert(monitoringJobs)
    .values({ kind: args.job.kind, payload: args.job.payload ?? {} })
    .returning({ id: monitoringJobs.id });
  if (!row) throw new Error(`enqueue of ${args.job.kind} returned no row`);
  return row;
}

export async function claimQueuedJobs(args: { db: DbExecutor; batchSize: number }): Promise<MonitoringJob[]> {
  const next = args.db
    .select({ id: monitoringJobs.id })
    .from(monitoringJobs)
    .where(eq(monitoringJobs.status, 'queued'))
    .orderBy(asc(monitoringJobs.createdAt))
    .limit(args.batchSize)
    .for('update', { skipLocked: true });

  return args.db
    .update(monitoringJobs)
    .set({
      status: 'running',
      startedAt: sql`now()`,
      updatedAt: sql`now()`,
      attempts: sql`${monitoringJobs.attempts} + 1`,
    })
    .where(inArray(monitoringJobs.id, next))
    .returning();
}

export async function completeJob(args: { db: DbExecutor; jobId: string; result: JsonValue; now: Date }): Promise<void> {
  await args.db
    .update(monitoringJobs)
    .set({ status: 'succeeded', result: args.result, error: null, finishedAt: args.now, updatedAt: args.now })
    .where(eq(monitoringJobs.id, args.jobId));
}

/** Claimed jobs the worker never started go back to the queue without spending an attempt. */
export async function releaseJobs(args: { db: DbExecutor; jobIds: string[]; now: Date }): Promise<void> {
  if (args.jobIds.length === 0) return;
  await args.db
    .update(monitoringJobs)
    .set({ status: 'queued', startedAt: null, updatedAt: args.now, attempts: sql`${monitoringJobs.attempts} - 1` })
    .where(and(inArray(monitoringJobs.id, args.jobIds), eq(monitoringJobs.status, 'running')));
}

/** Retryable failures go back to the queue until `maxAttempts` is spent. */
export function nextStatusAfterFailure(args: { error: AppError; attempts: number; maxAttempts: number }): JobStatus {
  return args.error.retryable && args.attempts < args.maxAttempts ? 'queued' : 'failed';
}

export async function failJob(args: {
  db: DbExecutor;
  job: MonitoringJob;
  error: AppError;
  maxAttempts: number;
  now: Date;
}): Promise<{ status: JobStatus }> {
  const status = nextStatusAfterFailure({ error: args.error, attempts: args.job.attempts, maxAttempts: args.maxAttempts });
  await args.db
    .update(monitoringJobs)
    .set({
      status,
      error: args.error,
      finishedAt: status === 'failed' ? args.now : null,
      updatedAt: args.now,
    })
    .where(eq(monitoringJobs.id, args.job.id));
  return { status };
}

/**
 * A worker that died mid-job leaves it `running` forever. Only old `running` jobs are touched;
 * `queued` ones are left alone.
 */
export async function recycleStaleJobs(args: {
  db: DbExecutor;
  now: Date;
  staleAfterMs: number;
}): Promise<{ staleBefore: Date; recycled: number }> {
  const staleBefore = new Date(args.now.getTime() - args.staleAfterMs);
  const error: AppError = {
    code: ErrorCode.INTERNAL_ERROR,
    category: 'unknown',
    message: 'job recycled (stale running job)',
    retryable: true,
  };

  const rows = await args.db
    .update(monitoringJobs)
    .set({ status: 'failed', finishedAt: args.now, updatedAt: args.now, error })
    .where(
      and(
        eq(monitoringJobs.status, 'running'),
        lt(monitoringJobs.startedAt, staleBefore),
        isNull(monitoringJobs.finishedAt),
      ),
    )
    .returning({ id: monitoringJobs.id });

  return { staleBefore, recycled: rows.length };
}

export function isDue(args: {
  latest: { status: JobStatus; createdAt: Date } | null;
  now: Date;
  intervalMs: number;
}): boolean {
  if (!args.latest) return true;
  if (args.latest.status === 'queued' || args.latest.status === 'running') return false;
  return args.now.getTime() - args.latest.createdAt.getTime() >= args.intervalMs;
}

/** Single-flight enqueue for recurring jobs: at most one pending per kind, at most one per interval. */
export async function enqueueIfDue(args: {
  db: DbExecutor;
  job: JobInput;
  now: Date;
  intervalMs: number;
}): Promise<{ enqueued: boolean }> {
  const [latest] = await args.db
    .select({ status: monitoringJobs.status, createdAt: monitoringJobs.createdAt })
    .from(monitoringJobs)
    .where(eq(monitoringJobs.kind, args.job.kind))
    .orderBy(desc(monitoringJobs.createdAt))
    .limit(1);

  if (!isDue({ latest: latest ?? null, now: args.now, intervalMs: args.intervalMs })) return { enqueued: false };
  await enqueueJob({ db: args.db, job: args.job });
  return { enqueued: true };
}
