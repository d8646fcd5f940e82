import type { InventoryObject } from '@/lib/inventory/types';
import type { SyncSettings } from '@/lib/settings/sync-settings';

export type AuditModel = 'host_config' | 'maintenance_window' | 'mapping_rule';

export type AuditEvent = {
  model: AuditModel;
  objectId: number;
  objectName: string;
  changes?: Record<string, unknown>;
};

export type AuditSink = {
  logCreationEvent: (event: AuditEvent) => Promise<void>;
  logUpdateEvent: (event: AuditEvent) => Promise<void>;
  logDeletionEvent: (event: AuditEvent) => Promise<void>;
};

export type JobRegistry = {
  associateModelWithJob: (input: { jobId: string; model: AuditModel; objectId: number }) => Promise<void>;
};

export type ExclusionCheck = {
  isExcluded: (object: InventoryObject) => boolean;
};

function truthy(value: unknown): boolean {
  if (typeof value === 'string') return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
  return value === true || value === 1;
}

/** Objects carrying the configured custom field set to a truthy value are never provisioned. */
export function createExclusionCheck(settings: SyncSettings['exclusion']): ExclusionCheck {
  return {
    isExcluded: (object) => settings.enabled && truthy(object.customFields[settings.customFieldName]),
  };
}

export type RecordSinks = { audit: AuditSink; jobs: JobRegistry };

/**
 * Audit and job-association writes made inside `fn` are held back and written once `fn` has
 * resolved. Wrapped around a store transaction, a rolled-back change leaves no record behind.
 */
export async function deferRecords<T>(sinks: RecordSinks, fn: (deferred: RecordSinks) => Promise<T>): Promise<T> {
  const pending: Array<() => Promise<void>> = [];
  const hold =
    <A>(write: (input: A) => Promise<void>) =>
    async (input: A): Promise<void> => {
      pending.push(() => write(input));
    };

  const result = await fn({
    audit: {
      logCreationEvent: hold((event: AuditEvent) => sinks.audit.logCreationEvent(event)),
      logUpdateEvent: hold((event: AuditEvent) => sinks.audit.logUpdateEvent(event)),
      logDeletionEvent: hold((event: AuditEvent) => sinks.audit.logDeletionEvent(event)),
    },
    jobs: {
      associateModelWithJob: hold((input: Parameters<JobRegistry['associateModelWithJob']>[0]) =>
        sinks.jobs.associateModelWithJob(input),
      ),
    },
  });

  for (const write of pending) await write();
  return result;
}
