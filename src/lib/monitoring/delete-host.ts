import type { MonitoringService } from '@/lib/monitoring/service';
import type { SyncSettings } from '@/lib/settings/sync-settings';

export type RemoteDeleteResult =
  | { outcome: 'absent' }
  | { outcome: 'deleted' }
  | { outcome: 'archived'; archivedName: string; graveyardGroupId: string };

async function ensureHostGroup(service: MonitoringService, name: string): Promise<string> {
  const existing = (await service.listHostGroups()).find((g) => g.name === name);
  if (existing) return existing.groupid;
  return service.createHostGroup(name);
}

async function uniqueArchivedName(service: MonitoringService, hostId: string, base: string): Promise<string> {
  let candidate = base;
  for (let n = 1; ; n++) {
    const clash = await service.findHostByName(candidate);
    if (!clash || clash.hostid === hostId) return candidate;
    candidate = `${base}-${n}`;
  }
}

/**
 * Remove a host remotely. Soft mode renames it with the archive suffix, disables it and leaves
 * it only in the graveyard group; hard mode deletes it. A host that is already gone counts as
 * deleted.
 */
export async function deleteRemoteHost(args: {
  service: MonitoringService;
  hostId: string;
  settings: Pick<SyncSettings, 'deleteMode' | 'graveyardGroup' | 'graveyardSuffix'>;
}): Promise<RemoteDeleteResult> {
  const { service, hostId, settings } = args;

  const host = await service.getHost(hostId);
  if (!host) return { outcome: 'absent' };

  if (settings.deleteMode === 'hard') {
    await service.deleteHost(hostId);
    return { outcome: 'deleted' };
  }

  const graveyardGroupId = await ensureHostGroup(service, settings.graveyardGroup);
  const archivedName = await uniqueArchivedName(service, hostId, `${host.host}${settings.graveyardSuffix}`);
  await service.updateHost(hostId, { host: archivedName, groups: [{ groupid: graveyardGroupId }], status: '1' });
  return { outcome: 'archived', archivedName, graveyardGroupId };
}
