import { closeDb, getDb } from '@/lib/db/client';
import { serverEnv } from '@/lib/env/server';
import { errorMessage } from '@/lib/errors/error';
import { enqueueIfDue, recycleStaleJobs } from '@/lib/jobs/queue';
import { logEvent } from '@/lib/logging/logger';

import type { JobInput } from '@/lib/jobs/process-job';

function log(message: string, extra?: Record<string, unknown>) {
  const payload = extra ? ` ${JSON.stringify(extra)}` : '';
  console.log(`[scheduler] ${message}${payload}`);
}

function recurringJobs(): Array<{ job: JobInput; intervalMs: number }> {
  return [
    {
      job: {
        kind: 'refresh_sync_status',
        payload: { olderThanMinutes: serverEnv.MONITOR_SYNC_REFRESH_INTERVAL_MINUTES },
      },
      intervalMs: serverEnv.MONITOR_SYNC_REFRESH_INTERVAL_MINUTES * 60_000,
    },
    {
      job: {
        kind: 'maintenance_cleanup',
        payload: { graceMinutes: serverEnv.MONITOR_SYNC_MAINTENANCE_GRACE_MINUTES },
      },
      intervalMs: serverEnv.MONITOR_SYNC_SCHEDULER_TICK_MS,
    },
    {
      job: { kind: 'import_catalog', payload: {} },
      intervalMs: serverEnv.MONITOR_SYNC_CATALOG_INTERVAL_MINUTES * 60_000,
    },
  ];
}

async function enqueueDueJobs(now: Date) {
  const db = getDb();
  for (const { job, intervalMs } of recurringJobs()) {
    const res = await enqueueIfDue({ db, job, now, intervalMs });
    if (!res.enqueued) continue;
    logEvent({
      level: 'info',
      service: 'scheduler',
      event_type: 'job.enqueued',
      kind: job.kind,
      interval_ms: intervalMs,
    });
  }
}

async function main() {
  log('starting', { tickMs: serverEnv.MONITOR_SYNC_SCHEDULER_TICK_MS });

  const tick = async () => {
    try {
      const recycleRes = await recycleStaleJobs({
        db: getDb(),
        now: new Date(),
        staleAfterMs: serverEnv.MONITOR_SYNC_JOB_RECYCLE_AFTER_MS,
      });
      if (recycleRes.recycled > 0) {
        logEvent({
          level: 'info',
          service: 'scheduler',
          event_type: 'job.recycled',
          recycled: recycleRes.recycled,
          stale_before: recycleRes.staleBefore.toISOString(),
        });
      }

      await enqueueDueJobs(new Date());
    } catch (err) {
      log('tick failed', { error: errorMessage(err) });
    }
  };

  await tick();
  const interval = setInterval(() => void tick(), serverEnv.MONITOR_SYNC_SCHEDULER_TICK_MS);

  const shutdown = async (signal: string) => {
    clearInterval(interval);
    log('shutting down', { signal });
    await closeDb();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

void main();
