import { ErrorCode } from '@/lib/errors/error-codes';
import { logEvent } from '@/lib/logging/logger';
import { assertRuleDeletable, validateMappingRule } from '@/lib/mapping/rule-schema';
import { deferRecords } from '@/lib/provisioning/collaborators';

import type { AppError } from '@/lib/errors/error';
import type { MappingRule } from '@/lib/mapping/types';
import type { AuditSink, JobRegistry } from '@/lib/provisioning/collaborators';
import type { SyncStore } from '@/lib/provisioning/store';

type RuleDeps = { store: SyncStore; audit: AuditSink };

const noJobs: JobRegistry = { associateModelWithJob: async () => {} };

function inTransaction<T>(deps: RuleDeps, fn: (tx: SyncStore, audit: AuditSink) => Promise<T>): Promise<T> {
  return deferRecords({ audit: deps.audit, jobs: noJobs }, ({ audit }) => deps.store.transaction((tx) => fn(tx, audit)));
}

async function loadRule(store: SyncStore, id: number): Promise<MappingRule> {
  const rule = await store.getMappingRule(id);
  if (rule) return rule;
  throw {
    code: ErrorCode.MAPPING_RULE_NOT_FOUND,
    category: 'not_found',
    message: `mapping rule ${id} not found`,
    retryable: false,
  } satisfies AppError;
}

export async function createMappingRule(deps: RuleDeps, input: unknown): Promise<MappingRule> {
  return inTransaction(deps, async (tx, audit) => {
    const draft = validateMappingRule({ input, existing: await tx.listMappingRules() });
    const rule = await tx.insertMappingRule(draft);
    await audit.logCreationEvent({ model: 'mapping_rule', objectId: rule.id, objectName: rule.name });
    logEvent({ level: 'info', service: 'engine', event_type: 'mapping_rule.created', rule_id: rule.id, is_default: rule.isDefault });
    return rule;
  });
}

/** Replaces every field of the rule; existing host configurations are left alone until re-applied. */
export async function updateMappingRule(deps: RuleDeps, args: { id: number; input: unknown }): Promise<MappingRule> {
  return inTransaction(deps, async (tx, audit) => {
    const current = await loadRule(tx, args.id);
    const draft = validateMappingRule({ input: args.input, existing: await tx.listMappingRules(), id: current.id });
    const rule = await tx.updateMappingRule({ ...draft, id: current.id });
    await audit.logUpdateEvent({
      model: 'mapping_rule',
      objectId: rule.id,
      objectName: rule.name,
      changes: { before: current, after: rule },
    });
    return rule;
  });
}

export async function deleteMappingRule(deps: RuleDeps, args: { id: number }): Promise<void> {
  await inTransaction(deps, async (tx, audit) => {
    const rule = await loadRule(tx, args.id);
    assertRuleDeletable(rule);
    await tx.deleteMappingRule(rule.id);
    await audit.logDeletionEvent({ model: 'mapping_rule', objectId: rule.id, objectName: rule.name });
  });
}
