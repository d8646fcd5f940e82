import { errorMessage } from '@/lib/errors/error';
import { ErrorCode } from '@/lib/errors/error-codes';
import { logEvent } from '@/lib/logging/logger';
import { buildMaintenancePayload, statusAt, validateMaintenanceWindow, windowCoversHost } from '@/lib/maintenance/windows';

import type { AppError } from '@/lib/errors/error';
import type { InventoryLookup, InventoryObject } from '@/lib/inventory/types';
import type { MaintenanceWindow } from '@/lib/maintenance/types';
import type { MonitoringService } from '@/lib/monitoring/service';
import type { AuditSink } from '@/lib/provisioning/collaborators';
import type { SyncStore } from '@/lib/provisioning/store';

type MaintenanceDeps = {
  store: SyncStore;
  service: MonitoringService;
};

async function loadWindow(store: SyncStore, id: number): Promise<MaintenanceWindow> {
  const window = await store.getMaintenanceWindow(id);
  if (window) return window;
  throw {
    code: ErrorCode.MAINTENANCE_WINDOW_NOT_FOUND,
    category: 'not_found',
    message: `maintenance window ${id} not found`,
    retryable: false,
  } satisfies AppError;
}

function needsObject(window: MaintenanceWindow): boolean {
  return window.targets.some((t) => t.kind === 'site' || t.kind === 'cluster');
}

/** Remote host ids of every provisioned host configuration the window targets. */
export async function resolveMaintenanceHostIds(args: {
  store: SyncStore;
  inventory: InventoryLookup;
  window: MaintenanceWindow;
}): Promise<string[]> {
  const withObject = needsObject(args.window);
  const hostIds: string[] = [];

  for (const hostConfig of await args.store.listHostConfigs()) {
    if (!hostConfig.remoteHostId) continue;
    const object: InventoryObject | null = withObject ? await args.inventory.get(hostConfig.object) : null;
    if (windowCoversHost(args.window, hostConfig, object)) hostIds.push(hostConfig.remoteHostId);
  }

  return hostIds;
}

/** Create the window remotely. A failure marks it `failed` locally and is re-raised. */
export async function createRemoteMaintenance(
  args: MaintenanceDeps & { inventory: InventoryLookup; windowId: number; now: Date },
): Promise<MaintenanceWindow> {
  const window = await loadWindow(args.store, args.windowId);

  try {
    const hostIds = await resolveMaintenanceHostIds({ store: args.store, inventory: args.inventory, window });
    const remoteId = await args.service.createMaintenance(buildMaintenancePayload(window, hostIds));
    const saved = await args.store.saveMaintenanceWindow({ ...window, remoteId, status: statusAt(window, args.now) });
    logEvent({
      level: 'info',
      service: 'engine',
      event_type: 'maintenance.created',
      maintenance_id: window.id,
      remote_id: remoteId,
      host_count: hostIds.length,
    });
    return saved;
  } catch (err) {
    await args.store.saveMaintenanceWindow({ ...window, status: 'failed' });
    logEvent({
      level: 'error',
      service: 'engine',
      event_type: 'maintenance.create_failed',
      maintenance_id: window.id,
      message: errorMessage(err),
    });
    throw err;
  }
}

/** Validate and store a new window, then create it remotely. */
export async function scheduleMaintenance(
  args: MaintenanceDeps & { inventory: InventoryLookup; audit: AuditSink; input: unknown; now: Date },
): Promise<MaintenanceWindow> {
  const draft = validateMaintenanceWindow(args.input);
  const window = await args.store.insertMaintenanceWindow(draft);
  await args.audit.logCreationEvent({ model: 'maintenance_window', objectId: window.id, objectName: window.name });
  return createRemoteMaintenance({
    store: args.store,
    service: args.service,
    inventory: args.inventory,
    windowId: window.id,
    now: args.now,
  });
}

/**
 * Delete a window locally. The remote delete is best-effort: its failure is logged and
 * returned as a warning.
 */
export async function deleteMaintenance(
  args: MaintenanceDeps & { windowId: number },
): Promise<{ warning: string | null }> {
  const window = await loadWindow(args.store, args.windowId);
  let warning: string | null = null;

  if (window.remoteId) {
    try {
      await args.service.deleteMaintenance(window.remoteId);
    } catch (err) {
      warning = `remote maintenance ${window.remoteId} could not be deleted: ${errorMessage(err)}`;
      logEvent({
        level: 'warn',
        service: 'engine',
        event_type: 'maintenance.remote_delete_failed',
        maintenance_id: window.id,
        remote_id: window.remoteId,
        message: warning,
      });
    }
  }

  await args.store.deleteMaintenanceWindow(window.id);
  return { warning };
}

export async function refreshMaintenanceStatuses(args: { store: SyncStore; now: Date }): Promise<{ changed: number }> {
  let changed = 0;
  for (const window of await args.store.listMaintenanceWindows()) {
    const status = statusAt(window, args.now);
    if (status === window.status) continue;
    await args.store.saveMaintenanceWindow({ ...window, status });
    changed += 1;
  }
  return { changed };
}

/** Remove windows that ended more than `graceMinutes` ago, locally and remotely. */
export async function cleanupExpiredMaintenance(
  args: MaintenanceDeps & { now: Date; graceMinutes: number },
): Promise<{ deleted: number; warnings: string[] }> {
  const cutoff = args.now.getTime() - args.graceMinutes * 60_000;
  const warnings: string[] = [];
  let deleted = 0;

  for (const window of await args.store.listMaintenanceWindows()) {
    if (window.endTime.getTime() > cutoff) continue;
    const result = await deleteMaintenance({ store: args.store, service: args.service, windowId: window.id });
    if (result.warning) warnings.push(result.warning);
    deleted += 1;
  }

  return { deleted, warnings };
}
