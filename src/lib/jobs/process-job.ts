import { z } from 'zod/v4';

import { importCatalog } from '@/lib/catalog/import-catalog';
import { toJsonValue } from '@/lib/errors/error';
import { ErrorCode } from '@/lib/errors/error-codes';
import { logEvent } from '@/lib/logging/logger';
import {
  cleanupExpiredMaintenance,
  createRemoteMaintenance,
  deleteMaintenance,
  refreshMaintenanceStatuses,
} from '@/lib/maintenance/remote';
import { importHost } from '@/lib/provisioning/import-host';
import {
  createHost,
  deleteHostConfig,
  deleteObjectHost,
  provisionObject,
  reapplyMapping,
  syncHost,
} from '@/lib/provisioning/orchestrator';
import { refreshSyncStatuses, syncAllHosts } from '@/lib/provisioning/sweep';

import type { AppError, JsonValue } from '@/lib/errors/error';
import type { EngineDeps } from '@/lib/provisioning/orchestrator';

const RefSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('device'), id: z.number().int().positive() }),
  z.object({ kind: z.literal('virtual_machine'), id: z.number().int().positive() }),
]);

const hostConfigId = z.number().int().positive();
const windowId = z.number().int().positive();

export const JobSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('provision_host'),
    payload: z.object({
      ref: RefSchema,
      interfaceType: z.enum(['agent', 'snmp']),
      ipAddressId: z.number().int().positive().optional(),
      monitoredBy: z.enum(['direct', 'proxy', 'proxy_group']).optional(),
    }),
  }),
  z.object({ kind: z.literal('create_host'), payload: z.object({ hostConfigId }) }),
  z.object({
    kind: z.literal('sync_host'),
    payload: z.object({ hostConfigId, rotateSecrets: z.boolean().default(false) }),
  }),
  z.object({
    kind: z.literal('reapply_mapping'),
    payload: z.object({ hostConfigId, interfaceType: z.enum(['any', 'agent', 'snmp']).optional() }),
  }),
  z.object({ kind: z.literal('delete_host'), payload: z.object({ hostConfigId }) }),
  z.object({ kind: z.literal('delete_object_host'), payload: z.object({ ref: RefSchema }) }),
  z.object({ kind: z.literal('import_host'), payload: z.object({ ref: RefSchema }) }),
  z.object({ kind: z.literal('sync_all'), payload: z.object({}).prefault({}) }),
  z.object({
    kind: z.literal('refresh_sync_status'),
    payload: z.object({ olderThanMinutes: z.number().int().positive().default(60) }).prefault({}),
  }),
  z.object({ kind: z.literal('import_catalog'), payload: z.object({}).prefault({}) }),
  z.object({ kind: z.literal('create_maintenance'), payload: z.object({ windowId }) }),
  z.object({ kind: z.literal('delete_maintenance'), payload: z.object({ windowId }) }),
  z.object({
    kind: z.literal('maintenance_cleanup'),
    payload: z.object({ graceMinutes: z.number().int().nonnegative().default(60) }).prefault({}),
  }),
]);

export type Job = z.infer<typeof JobSchema>;
export type JobInput = z.input<typeof JobSchema>;
export type JobKind = Job['kind'];

export const JOB_KINDS: readonly JobKind[] = JobSchema.options.map((o) => o.shape.kind.value);

function isJobKind(kind: string): kind is JobKind {
  return JOB_KINDS.some((k) => k === kind);
}

export function parseJob(input: { kind: string; payload: unknown }): Job {
  if (!isJobKind(input.kind)) {
    throw {
      code: ErrorCode.JOB_UNKNOWN_KIND,
      category: 'schema',
      message: `unknown job kind ${input.kind}`,
      retryable: false,
    } satisfies AppError;
  }

  const result = JobSchema.safeParse(input);
  if (result.success) return result.data;
  throw {
    code: ErrorCode.VALIDATION_FAILED,
    category: 'schema',
    message: `invalid ${input.kind} job payload`,
    retryable: false,
    details: result.error.issues.map((issue) => ({
      field: issue.path.map(String).join('.'),
      issue: issue.code,
      message: issue.message,
    })),
  } satisfies AppError;
}

async function run(deps: EngineDeps, job: Job, isCancelled: () => boolean): Promise<unknown> {
  const now = deps.now?.() ?? new Date();

  switch (job.kind) {
    case 'provision_host': {
      const result = await provisionObject(deps, job.payload);
      return result.outcome === 'skipped'
        ? result
        : { outcome: result.outcome, host_config_id: result.hostConfig.id, remote_host_id: result.hostConfig.remoteHostId };
    }
    case 'create_host': {
      const hostConfig = await createHost(deps, job.payload);
      return { host_config_id: hostConfig.id, remote_host_id: hostConfig.remoteHostId };
    }
    case 'sync_host': {
      const result = await syncHost(deps, job.payload);
      return { outcome: result.outcome, differences: Object.keys(result.differences) };
    }
    case 'reapply_mapping': {
      const hostConfig = await reapplyMapping(deps, job.payload);
      return { host_config_id: hostConfig.id, template_ids: hostConfig.templateIds };
    }
    case 'delete_host':
      return deleteHostConfig(deps, { hostConfigId: job.payload.hostConfigId });
    case 'delete_object_host':
      return deleteObjectHost(deps, job.payload);
    case 'import_host': {
      const hostConfig = await importHost(deps, job.payload);
      return { host_config_id: hostConfig.id, remote_host_id: hostConfig.remoteHostId, in_sync: hostConfig.inSync };
    }
    case 'sync_all':
      return syncAllHosts(deps, { isCancelled });
    case 'refresh_sync_status':
      return refreshSyncStatuses(deps, {
        cutoff: new Date(now.getTime() - job.payload.olderThanMinutes * 60_000),
        isCancelled,
      });
    case 'import_catalog':
      return importCatalog({ store: deps.store, service: deps.service, maxDeletions: deps.settings.maxDeletions });
    case 'create_maintenance': {
      const window = await createRemoteMaintenance({ ...deps, windowId: job.payload.windowId, now });
      return { window_id: window.id, remote_id: window.remoteId, status: window.status };
    }
    case 'delete_maintenance':
      return deleteMaintenance({ ...deps, windowId: job.payload.windowId });
    case 'maintenance_cleanup': {
      const refreshed = await refreshMaintenanceStatuses({ store: deps.store, now });
      const cleaned = await cleanupExpiredMaintenance({ ...deps, now, graceMinutes: job.payload.graceMinutes });
      return { status_changes: refreshed.changed, ...cleaned };
    }
  }
}

/**
 * Run one job against the engine. Records the job creates are associated with `jobId`.
 * Errors propagate; the runner decides whether to retry.
 */
export async function processJob(args: {
  deps: EngineDeps;
  job: { id: string; kind: string; payload: unknown };
  isCancelled?: () => boolean;
}): Promise<JsonValue> {
  const job = parseJob(args.job);
  const startedAt = Date.now();
  const result = await run({ ...args.deps, jobId: args.job.id }, job, args.isCancelled ?? (() => false));

  logEvent({
    level: 'info',
    service: 'worker',
    event_type: 'job.processed',
    job_id: args.job.id,
    kind: job.kind,
    duration_ms: Date.now() - startedAt,
  });
  return toJsonValue(result);
}
