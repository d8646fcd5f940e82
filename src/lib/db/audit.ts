import { auditEvents, jobAssociations } from '@/lib/db/schema';
import { toJsonValue } from '@/lib/errors/error';

import type { DbExecutor } from '@/lib/db/client';
import type { AuditEvent, AuditSink, JobRegistry } from '@/lib/provisioning/collaborators';

type AuditAction = 'create' | 'update' | 'delete';

export function auditRow(action: AuditAction, event: AuditEvent) {
  return {
    action,
    model: event.model,
    objectId: event.objectId,
    objectName: event.objectName,
    changes: event.changes ? toJsonValue(event.changes) : null,
  };
}

export function createDbAuditSink(db: DbExecutor): AuditSink {
  return {
    logCreationEvent: async (event) => {
      await db.insert(auditEvents).values(auditRow('create', event));
    },
    logUpdateEvent: async (event) => {
      await db.insert(auditEvents).values(auditRow('update', event));
    },
    logDeletionEvent: async (event) => {
      await db.insert(auditEvents).values(auditRow('delete', event));
    },
  };
}

export function createDbJobRegistry(db: DbExecutor): JobRegistry {
  return {
    associateModelWithJob: async ({ jobId, model, objectId }) => {
      await db.insert(jobAssociations).values({ jobId, model, objectId }).onConflictDoNothing();
    },
  };
}
