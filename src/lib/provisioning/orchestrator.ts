import { errorMessage, isAppError, toJsonValue, toPublicError } from '@/lib/errors/error';
import { ErrorCode } from '@/lib/errors/error-codes';
import { addInterface, buildInterface } from '@/lib/host-config/interfaces';
import { newHostConfigDraft } from '@/lib/host-config/types';
import { refKey } from '@/lib/inventory/types';
import { logEvent } from '@/lib/logging/logger';
import { activeWindowsFor, maintenanceConflict } from '@/lib/maintenance/windows';
import { applyRule } from '@/lib/mapping/apply-rule';
import { interfaceTypeForKinds, matchRule } from '@/lib/mapping/match-rule';
import { compareHost } from '@/lib/monitoring/compare';
import { deleteRemoteHost } from '@/lib/monitoring/delete-host';
import { buildCreatePayload, buildHostBody, buildUpdatePayload, usesPsk } from '@/lib/monitoring/payload';
import { reconcileInterfaces } from '@/lib/provisioning/interface-reconciler';
import { deferRecords } from '@/lib/provisioning/collaborators';
import { createProvisioningTracker } from '@/lib/provisioning/state';
import { insertHostConfig, writeHostConfig } from '@/lib/provisioning/store';

import type { SecretStore } from '@/lib/crypto/secret-store';
import type { AppError } from '@/lib/errors/error';
import type { HostConfig, InterfaceConfig, InterfaceKind, MonitoredBy } from '@/lib/host-config/types';
import type { InventoryLookup, InventoryObject, InventoryObjectRef } from '@/lib/inventory/types';
import type { InterfaceTypeFilter } from '@/lib/mapping/types';
import type { FieldDifference } from '@/lib/monitoring/compare';
import type { RemoteDeleteResult } from '@/lib/monitoring/delete-host';
import type { MonitoringService } from '@/lib/monitoring/service';
import type { AuditSink, ExclusionCheck, JobRegistry } from '@/lib/provisioning/collaborators';
import type { SyncStore } from '@/lib/provisioning/store';
import type { SyncSettings } from '@/lib/settings/sync-settings';

export type EngineDeps = {
  store: SyncStore;
  service: MonitoringService;
  inventory: InventoryLookup;
  audit: AuditSink;
  jobs: JobRegistry;
  exclusion: ExclusionCheck;
  secrets: SecretStore;
  settings: SyncSettings;
  /** Job that triggered this invocation; created records are associated with it. */
  jobId?: string | null;
  now?: () => Date;
};

export type ProvisionResult =
  | { outcome: 'skipped'; reason: 'excluded' }
  | { outcome: 'created'; hostConfig: HostConfig }
  | { outcome: 'updated'; hostConfig: HostConfig };

export type SyncResult = {
  outcome: 'updated' | 'unchanged';
  hostConfig: HostConfig;
  differences: Record<string, FieldDifference>;
};

export type DeleteResult =
  | { outcome: 'deleted'; remote: RemoteDeleteResult | null; warning: string | null }
  | { outcome: 'blocked'; warning: string };

export type HostConfigChanges = Partial<
  Pick<
    HostConfig,
    'status' | 'description' | 'hostGroupIds' | 'templateIds' | 'monitoredBy' | 'proxyId' | 'proxyGroupId' | 'interfaces'
  >
>;

function nowOf(deps: EngineDeps): Date {
  return deps.now?.() ?? new Date();
}

function inTransaction<T>(deps: EngineDeps, fn: (scoped: EngineDeps) => Promise<T>): Promise<T> {
  return deferRecords(deps, (deferred) => deps.store.transaction((tx) => fn({ ...deps, ...deferred, store: tx })));
}

async function loadObject(inventory: InventoryLookup, ref: InventoryObjectRef): Promise<InventoryObject> {
  const object = await inventory.get(ref);
  if (object) return object;
  throw {
    code: ErrorCode.INVENTORY_OBJECT_NOT_FOUND,
    category: 'not_found',
    message: `inventory object ${refKey(ref)} not found`,
    retryable: false,
    redacted_context: { object: refKey(ref) },
  } satisfies AppError;
}

async function loadHostConfig(store: SyncStore, id: number): Promise<HostConfig> {
  const hostConfig = await store.getHostConfig(id);
  if (hostConfig) return hostConfig;
  throw {
    code: ErrorCode.HOST_CONFIG_NOT_FOUND,
    category: 'not_found',
    message: `host configuration ${id} not found`,
    retryable: false,
    redacted_context: { host_config_id: id },
  } satisfies AppError;
}

function pskFor(deps: EngineDeps): string | null {
  return usesPsk(deps.settings.tls) ? deps.secrets.getSecret('tls_psk') : null;
}

async function assertNotUnderMaintenance(
  deps: EngineDeps,
  hostConfig: HostConfig,
  object: InventoryObject | null,
  action: string,
): Promise<void> {
  const windows = activeWindowsFor({
    windows: await deps.store.listMaintenanceWindows(),
    hostConfig,
    object,
    now: nowOf(deps),
  });
  if (windows.length > 0) throw maintenanceConflict(hostConfig, windows, action);
}

async function associate(deps: EngineDeps, hostConfig: HostConfig): Promise<void> {
  if (!deps.jobId) return;
  await deps.jobs.associateModelWithJob({ jobId: deps.jobId, model: 'host_config', objectId: hostConfig.id });
}

function sameInterface(a: InterfaceConfig, b: InterfaceConfig): boolean {
  return a.kind === b.kind && a.ipAddressId === b.ipAddressId && a.port === b.port;
}

/**
 * Create the host remotely and link it. Anything that fails after the remote id exists deletes
 * that id again before the error is re-raised.
 */
export async function createRemoteHost(deps: EngineDeps, hostConfig: HostConfig, object: InventoryObject): Promise<HostConfig> {
  const tracker = createProvisioningTracker({ operation: 'create', subject: hostConfig.name });
  tracker.transition('in_progress');

  const payload = buildCreatePayload({ hostConfig, object, settings: deps.settings, psk: pskFor(deps) });

  let hostId: string;
  try {
    hostId = await deps.service.createHost(payload);
  } catch (err) {
    tracker.transition('failed');
    throw {
      code: ErrorCode.REMOTE_CREATE_FAILED,
      category: 'remote',
      message: `could not create ${hostConfig.name} remotely: ${errorMessage(err)}`,
      retryable: isAppError(err) ? err.retryable : true,
      redacted_context: {
        host_config_id: hostConfig.id,
        payload: toJsonValue(buildHostBody({ hostConfig, object, settings: deps.settings })),
        cause: toJsonValue(toPublicError(err)),
      },
    } satisfies AppError;
  }

  try {
    const linked = await writeHostConfig(deps.store, { ...hostConfig, remoteHostId: hostId }, object);
    const { hostConfig: reconciled } = await reconcileInterfaces({
      store: deps.store,
      service: deps.service,
      hostConfig: linked,
      object,
    });
    await deps.audit.logUpdateEvent({
      model: 'host_config',
      objectId: reconciled.id,
      objectName: reconciled.name,
      changes: { remoteHostId: hostId },
    });
    tracker.transition('completed');
    logEvent({
      level: 'info',
      service: 'engine',
      event_type: 'host.created',
      host_config_id: reconciled.id,
      remote_host_id: hostId,
    });
    return reconciled;
  } catch (err) {
    tracker.transition('failed');
    await compensateCreate(deps, hostId, hostConfig);
    tracker.transition('rolled_back');
    throw {
      code: ErrorCode.PARTIAL_PROVISIONING_FAILURE,
      category: 'remote',
      message: `provisioning ${hostConfig.name} failed after the remote host was created: ${errorMessage(err)}`,
      retryable: true,
      redacted_context: { host_config_id: hostConfig.id, remote_host_id: hostId, cause: toJsonValue(toPublicError(err)) },
    } satisfies AppError;
  }
}

async function compensateCreate(deps: EngineDeps, hostId: string, hostConfig: HostConfig): Promise<void> {
  try {
    await deps.service.deleteHost(hostId);
  } catch (err) {
    // Nothing more can be done locally; the orphan is reported for manual cleanup.
    logEvent({
      level: 'error',
      service: 'engine',
      event_type: 'host.orphaned',
      host_config_id: hostConfig.id,
      remote_host_id: hostId,
      error: toPublicError(err),
    });
  }
}

async function pushUpdate(
  deps: EngineDeps,
  hostConfig: HostConfig,
  object: InventoryObject,
  rotateSecrets: boolean,
): Promise<SyncResult> {
  const comparison = await compareHost({ service: deps.service, hostConfig, object, settings: deps.settings });
  const now = nowOf(deps);

  if (!comparison.equal) {
    const payload = buildUpdatePayload({
      hostConfig,
      object,
      settings: deps.settings,
      psk: pskFor(deps),
      preImage: comparison.remote,
      rotateSecrets,
    });
    await deps.service.updateHost(comparison.remote.hostid, payload);
  }

  const { hostConfig: reconciled } = await reconcileInterfaces({
    store: deps.store,
    service: deps.service,
    hostConfig,
    object,
  });
  await deps.store.updateSyncStatus(reconciled.id, { inSync: true, lastSyncUpdate: now });

  if (!comparison.equal) {
    await deps.audit.logUpdateEvent({
      model: 'host_config',
      objectId: reconciled.id,
      objectName: reconciled.name,
      changes: comparison.differences,
    });
  }

  logEvent({
    level: 'info',
    service: 'engine',
    event_type: 'host.synced',
    host_config_id: reconciled.id,
    remote_host_id: comparison.remote.hostid,
    changed_fields: Object.keys(comparison.differences),
  });

  return {
    outcome: comparison.equal ? 'unchanged' : 'updated',
    hostConfig: { ...reconciled, inSync: true, lastSyncUpdate: now },
    differences: comparison.differences,
  };
}

/**
 * Make sure an inventory object is monitored through an interface of `interfaceType`. An
 * existing configuration gains the interface; otherwise one is created from the best-matching
 * mapping rule.
 */
export async function provisionObject(
  deps: EngineDeps,
  input: { ref: InventoryObjectRef; interfaceType: InterfaceKind; ipAddressId?: number; monitoredBy?: MonitoredBy },
): Promise<ProvisionResult> {
  return inTransaction(deps, async (scoped): Promise<ProvisionResult> => {
    const object = await loadObject(scoped.inventory, input.ref);
    if (scoped.exclusion.isExcluded(object)) {
      logEvent({ level: 'info', service: 'engine', event_type: 'host.excluded', object: refKey(object.ref) });
      return { outcome: 'skipped', reason: 'excluded' };
    }

    const iface = buildInterface({
      object,
      kind: input.interfaceType,
      settings: scoped.settings,
      ...(input.ipAddressId !== undefined ? { ipAddressId: input.ipAddressId } : {}),
    });

    const existing = await scoped.store.findHostConfigByObject(object.ref);
    if (existing) {
      await assertNotUnderMaintenance(scoped, existing, object, 'add an interface to');
      const withInterface = existing.interfaces.some((i) => sameInterface(i, iface))
        ? existing
        : await writeHostConfig(scoped.store, addInterface(existing, iface), object);

      const hostConfig = withInterface.remoteHostId
        ? (await pushUpdate(scoped, withInterface, object, false)).hostConfig
        : await createRemoteHost(scoped, withInterface, object);
      return { outcome: 'updated', hostConfig };
    }

    const rules = await scoped.store.listMappingRules(object.ref.kind);
    const rule = matchRule(object, input.interfaceType, rules);
    const draft = addInterface(
      applyRule(newHostConfigDraft({ object: object.ref, objectName: object.name }), rule, input.monitoredBy),
      iface,
    );
    const inserted = await insertHostConfig(scoped.store, draft, object);
    await scoped.audit.logCreationEvent({
      model: 'host_config',
      objectId: inserted.id,
      objectName: inserted.name,
      changes: { mappingRuleId: rule.id },
    });
    await associate(scoped, inserted);

    const hostConfig = await createRemoteHost(scoped, inserted, object);
    return { outcome: 'created', hostConfig };
  });
}

/** Create a configuration that exists only locally on the monitoring side. */
export async function createHost(deps: EngineDeps, input: { hostConfigId: number }): Promise<HostConfig> {
  return inTransaction(deps, async (scoped) => {
    const hostConfig = await loadHostConfig(scoped.store, input.hostConfigId);
    if (hostConfig.remoteHostId) {
      throw {
        code: ErrorCode.VALIDATION_FAILED,
        category: 'conflict',
        message: `${hostConfig.name} already exists remotely as ${hostConfig.remoteHostId}`,
        retryable: false,
        details: [{ field: 'remoteHostId', issue: 'already_set' }],
      } satisfies AppError;
    }
    const object = await loadObject(scoped.inventory, hostConfig.object);
    return createRemoteHost(scoped, hostConfig, object);
  });
}

/** Bring the remote host in line with its configuration. Failures leave the sync status untouched. */
export async function syncHost(
  deps: EngineDeps,
  input: { hostConfigId: number; rotateSecrets?: boolean },
): Promise<SyncResult> {
  return inTransaction(deps, async (scoped) => {
    const hostConfig = await loadHostConfig(scoped.store, input.hostConfigId);
    const object = await loadObject(scoped.inventory, hostConfig.object);
    return pushUpdate(scoped, hostConfig, object, input.rotateSecrets ?? false);
  });
}

/** Compare only; records whether the remote host still matches. */
export async function refreshSyncStatus(
  deps: EngineDeps,
  input: { hostConfigId: number },
): Promise<{ inSync: boolean; differences: Record<string, FieldDifference> }> {
  return inTransaction(deps, async (scoped) => {
    const hostConfig = await loadHostConfig(scoped.store, input.hostConfigId);
    const object = await loadObject(scoped.inventory, hostConfig.object);
    const comparison = await compareHost({ service: scoped.service, hostConfig, object, settings: scoped.settings });
    await scoped.store.updateSyncStatus(hostConfig.id, { inSync: comparison.equal, lastSyncUpdate: nowOf(scoped) });
    return { inSync: comparison.equal, differences: comparison.differences };
  });
}

/** Local edit followed by a remote update when the host exists remotely. */
export async function editHostConfig(
  deps: EngineDeps,
  input: { hostConfigId: number; changes: HostConfigChanges },
): Promise<HostConfig> {
  return inTransaction(deps, async (scoped) => {
    const current = await loadHostConfig(scoped.store, input.hostConfigId);
    const object = await loadObject(scoped.inventory, current.object);
    await assertNotUnderMaintenance(scoped, current, object, 'edit');

    const saved = await writeHostConfig(scoped.store, { ...current, ...input.changes }, object);
    await scoped.audit.logUpdateEvent({
      model: 'host_config',
      objectId: saved.id,
      objectName: saved.name,
      changes: { fields: Object.keys(input.changes) },
    });
    if (!saved.remoteHostId) return saved;
    return (await pushUpdate(scoped, saved, object, false)).hostConfig;
  });
}

/** Re-run rule matching for an existing configuration and merge the winner in locally. */
export async function reapplyMapping(
  deps: EngineDeps,
  input: { hostConfigId: number; interfaceType?: InterfaceTypeFilter },
): Promise<HostConfig> {
  return inTransaction(deps, async (scoped) => {
    const current = await loadHostConfig(scoped.store, input.hostConfigId);
    const object = await loadObject(scoped.inventory, current.object);
    await assertNotUnderMaintenance(scoped, current, object, 'reapply the mapping of');

    const interfaceType = input.interfaceType ?? interfaceTypeForKinds(current.interfaces.map((i) => i.kind));
    const rule = matchRule(object, interfaceType, await scoped.store.listMappingRules(object.ref.kind));
    const saved = await writeHostConfig(scoped.store, applyRule(current, rule), object);
    await scoped.audit.logUpdateEvent({
      model: 'host_config',
      objectId: saved.id,
      objectName: saved.name,
      changes: { mappingRuleId: rule.id },
    });
    return saved;
  });
}

/**
 * Delete a configuration and its remote host. Under active maintenance nothing is touched:
 * interactive callers get a warning, everyone else MAINTENANCE_CONFLICT. A failed remote delete
 * is reported as a warning and the local record is removed anyway.
 */
export async function deleteHostConfig(
  deps: EngineDeps,
  input: { hostConfigId: number; interactive?: boolean },
): Promise<DeleteResult> {
  return inTransaction(deps, async (scoped): Promise<DeleteResult> => {
    const hostConfig = await loadHostConfig(scoped.store, input.hostConfigId);
    const object = await scoped.inventory.get(hostConfig.object);

    try {
      await assertNotUnderMaintenance(scoped, hostConfig, object, 'delete');
    } catch (err) {
      if (!input.interactive) throw err;
      return { outcome: 'blocked', warning: errorMessage(err) };
    }

    let remote: RemoteDeleteResult | null = null;
    let warning: string | null = null;
    if (hostConfig.remoteHostId) {
      try {
        remote = await deleteRemoteHost({ service: scoped.service, hostId: hostConfig.remoteHostId, settings: scoped.settings });
      } catch (err) {
        warning = `remote host ${hostConfig.remoteHostId} could not be deleted: ${errorMessage(err)}`;
        logEvent({
          level: 'warn',
          service: 'engine',
          event_type: 'host.remote_delete_failed',
          host_config_id: hostConfig.id,
          remote_host_id: hostConfig.remoteHostId,
          error: toPublicError(err),
        });
      }
    }

    await scoped.store.deleteHostConfig(hostConfig.id);
    await scoped.audit.logDeletionEvent({
      model: 'host_config',
      objectId: hostConfig.id,
      objectName: hostConfig.name,
      ...(remote ? { changes: { remote: remote.outcome } } : {}),
    });
    logEvent({
      level: 'info',
      service: 'engine',
      event_type: 'host.deleted',
      host_config_id: hostConfig.id,
      remote_outcome: remote?.outcome ?? null,
    });
    return { outcome: 'deleted', remote, warning };
  });
}

/** Inventory object removed: drop its configuration, if any. */
export async function deleteObjectHost(
  deps: EngineDeps,
  input: { ref: InventoryObjectRef },
): Promise<DeleteResult | null> {
  const hostConfig = await deps.store.findHostConfigByObject(input.ref);
  if (!hostConfig) return null;
  return deleteHostConfig(deps, { hostConfigId: hostConfig.id });
}
