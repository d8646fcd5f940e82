import { createEncryptedSecretStore } from '@/lib/crypto/secret-store';
import { createDbAuditSink, createDbJobRegistry } from '@/lib/db/audit';
import { closeDb, getDb } from '@/lib/db/client';
import { createDrizzleInventoryLookup } from '@/lib/db/inventory-lookup';
import { createDrizzleSyncStore } from '@/lib/db/sync-store';
import { serverEnv } from '@/lib/env/server';
import { errorMessage, isAppError } from '@/lib/errors/error';
import { ErrorCode } from '@/lib/errors/error-codes';
import { processJob } from '@/lib/jobs/process-job';
import { claimQueuedJobs, completeJob, failJob, releaseJobs } from '@/lib/jobs/queue';
import { runBatch } from '@/lib/jobs/run-batch';
import { logEvent } from '@/lib/logging/logger';
import { createRpcMonitoringService } from '@/lib/monitoring/rpc-client';
import { createExclusionCheck } from '@/lib/provisioning/collaborators';
import { loadSyncSettings } from '@/lib/settings/sync-settings';

import type { MonitoringJob } from '@/lib/db/schema';
import type { AppError } from '@/lib/errors/error';
import type { EngineDeps } from '@/lib/provisioning/orchestrator';

function log(message: string, extra?: Record<string, unknown>) {
  const payload = extra ? ` ${JSON.stringify(extra)}` : '';
  console.log(`[worker] ${message}${payload}`);
}

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

function asAppError(err: unknown): AppError {
  if (isAppError(err)) return err;
  return {
    code: ErrorCode.INTERNAL_ERROR,
    category: 'unknown',
    message: errorMessage(err),
    retryable: true,
  };
}

async function buildDeps(): Promise<EngineDeps> {
  const endpoint = serverEnv.MONITOR_SYNC_API_ENDPOINT;
  if (!endpoint) {
    throw {
      code: ErrorCode.CONFIG_MISSING_API_CREDENTIALS,
      category: 'config',
      message: 'MONITOR_SYNC_API_ENDPOINT is not set',
      retryable: false,
    } satisfies AppError;
  }

  const db = getDb();
  const settings = await loadSyncSettings(serverEnv.MONITOR_SYNC_SETTINGS_PATH);
  const secrets = createEncryptedSecretStore({
    ciphertexts: {
      api_token: serverEnv.MONITOR_SYNC_API_TOKEN_ENC,
      tls_psk: serverEnv.MONITOR_SYNC_TLS_PSK_ENC,
    },
    keyB64Url: serverEnv.SECRET_ENCRYPTION_KEY,
  });
  const service = createRpcMonitoringService({
    endpoint,
    secrets,
    timeoutMs: serverEnv.MONITOR_SYNC_API_TIMEOUT_MS,
    tlsVerify: serverEnv.MONITOR_SYNC_API_TLS_VERIFY,
  });

  try {
    log('monitoring api reachable', { version: await service.getApiVersion() });
  } catch (err) {
    log('monitoring api version check failed', { error: errorMessage(err) });
  }

  return {
    store: createDrizzleSyncStore(db),
    service,
    inventory: createDrizzleInventoryLookup(db),
    audit: createDbAuditSink(db),
    jobs: createDbJobRegistry(db),
    exclusion: createExclusionCheck(settings.exclusion),
    secrets,
    settings,
  };
}

async function runJob(deps: EngineDeps, job: MonitoringJob, isCancelled: () => boolean) {
  const db = getDb();
  const startedAt = job.startedAt ? job.startedAt.getTime() : Date.now();
  log('processing job', { jobId: job.id, kind: job.kind, attempts: job.attempts });

  try {
    const result = await processJob({ deps, job, isCancelled });
    await completeJob({ db, jobId: job.id, result, now: new Date() });
    logEvent({
      level: 'info',
      service: 'worker',
      event_type: 'job.finished',
      job_id: job.id,
      kind: job.kind,
      status: 'succeeded',
      attempts: job.attempts,
      duration_ms: Date.now() - startedAt,
    });
  } catch (err) {
    const error = asAppError(err);
    const { status } = await failJob({
      db,
      job,
      error,
      maxAttempts: serverEnv.MONITOR_SYNC_JOB_MAX_ATTEMPTS,
      now: new Date(),
    });
    logEvent({
      level: status === 'failed' ? 'error' : 'warn',
      service: 'worker',
      event_type: 'job.finished',
      job_id: job.id,
      kind: job.kind,
      status: status === 'failed' ? 'failed' : 'requeued',
      attempts: job.attempts,
      duration_ms: Date.now() - startedAt,
      error,
    });
  }
}

async function main() {
  log('starting', {
    pollMs: serverEnv.MONITOR_SYNC_WORKER_POLL_MS,
    batchSize: serverEnv.MONITOR_SYNC_WORKER_BATCH_SIZE,
  });

  let deps: EngineDeps;
  try {
    deps = await buildDeps();
  } catch (err) {
    log('failed to start', { error: errorMessage(err) });
    await closeDb();
    process.exit(1);
  }

  let stopping = false;
  const isCancelled = () => stopping;
  // The running job finishes (sweeps stop at the next record); the loop then exits.
  const requestStop = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log('stop requested', { signal });
  };
  process.on('SIGINT', () => requestStop('SIGINT'));
  process.on('SIGTERM', () => requestStop('SIGTERM'));

  while (!stopping) {
    let jobs: MonitoringJob[];
    try {
      jobs = await claimQueuedJobs({ db: getDb(), batchSize: serverEnv.MONITOR_SYNC_WORKER_BATCH_SIZE });
    } catch (err) {
      log('failed to claim jobs', { error: errorMessage(err) });
      await sleep(serverEnv.MONITOR_SYNC_WORKER_POLL_MS);
      continue;
    }

    if (jobs.length === 0) {
      await sleep(serverEnv.MONITOR_SYNC_WORKER_POLL_MS);
      continue;
    }

    try {
      const { released } = await runBatch({
        jobs,
        isStopping: isCancelled,
        run: (job) => runJob(deps, job, isCancelled),
        release: (jobIds) => releaseJobs({ db: getDb(), jobIds, now: new Date() }),
      });
      if (released > 0) log('released unstarted jobs', { count: released });
    } catch (err) {
      // The scheduler's stale-job recycling picks up whatever is left running.
      log('batch aborted', { error: errorMessage(err) });
    }
  }

  log('shutting down');
  await closeDb();
  process.exit(0);
}

void main();
