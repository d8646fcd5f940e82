import { ErrorCode } from '@/lib/errors/error-codes';
import { logEvent } from '@/lib/logging/logger';
import { interfacePayload } from '@/lib/monitoring/payload';
import { writeHostConfig } from '@/lib/provisioning/store';

import type { AppError } from '@/lib/errors/error';
import type { HostConfig, InterfaceConfig } from '@/lib/host-config/types';
import type { InventoryObject } from '@/lib/inventory/types';
import type { InterfacePayload } from '@/lib/monitoring/payload';
import type { RemoteInterface } from '@/lib/monitoring/remote-records';
import type { MonitoringService } from '@/lib/monitoring/service';
import type { SyncStore } from '@/lib/provisioning/store';

export type ReconcileResult = {
  hostConfig: HostConfig;
  linked: number;
  created: number;
};

function sameAddress(local: InterfacePayload, remote: RemoteInterface): boolean {
  if (local.useip === '1') return !!local.ip && local.ip === remote.ip;
  return !!local.dns && local.dns === remote.dns;
}

function pickRemote(local: InterfacePayload, candidates: RemoteInterface[]): RemoteInterface | null {
  const sameType = candidates.filter((r) => r.type === local.type);
  const byAddress = sameType.find((r) => sameAddress(local, r));
  if (byAddress) return byAddress;
  const [only] = sameType;
  return sameType.length === 1 && only ? only : null;
}

/**
 * Give every local interface a remote counterpart: link to an unclaimed remote interface of
 * the same type and address, or create one. Remote interfaces are never deleted.
 */
export async function reconcileInterfaces(args: {
  store: SyncStore;
  service: MonitoringService;
  hostConfig: HostConfig;
  object: InventoryObject;
}): Promise<ReconcileResult> {
  const { service, hostConfig, object } = args;
  const hostId = hostConfig.remoteHostId;
  if (!hostId) {
    throw {
      code: ErrorCode.VALIDATION_FAILED,
      category: 'schema',
      message: `${hostConfig.name} has not been created remotely`,
      retryable: false,
      details: [{ field: 'remoteHostId', issue: 'required' }],
    } satisfies AppError;
  }

  const remote = await service.getHostInterfaces(hostId);
  const remoteIds = new Set(remote.map((r) => r.interfaceid));
  const claimed = new Set(
    hostConfig.interfaces.flatMap((i) => (i.remoteInterfaceId && remoteIds.has(i.remoteInterfaceId) ? [i.remoteInterfaceId] : [])),
  );

  let linked = 0;
  let created = 0;
  const interfaces: InterfaceConfig[] = [];

  for (const iface of hostConfig.interfaces) {
    if (iface.remoteInterfaceId && claimed.has(iface.remoteInterfaceId)) {
      interfaces.push(iface);
      continue;
    }

    const payload = interfacePayload(iface, object, true);
    const match = pickRemote(
      payload,
      remote.filter((r) => !claimed.has(r.interfaceid)),
    );

    let remoteInterfaceId: string;
    if (match) {
      remoteInterfaceId = match.interfaceid;
      linked += 1;
    } else {
      // The remote side allows one main interface per type; the next update settles the flags.
      const remoteHasMain = remote.some((r) => r.type === payload.type && r.main === '1');
      remoteInterfaceId = await service.createHostInterface(hostId, {
        ...payload,
        main: payload.main === '1' && !remoteHasMain ? '1' : '0',
      });
      created += 1;
    }

    claimed.add(remoteInterfaceId);
    interfaces.push({ ...iface, remoteInterfaceId });
  }

  if (linked === 0 && created === 0) return { hostConfig, linked, created };

  const saved = await writeHostConfig(args.store, { ...hostConfig, interfaces }, object);
  logEvent({
    level: 'info',
    service: 'engine',
    event_type: 'interfaces.reconciled',
    host_config_id: hostConfig.id,
    remote_host_id: hostId,
    linked,
    created,
  });
  return { hostConfig: saved, linked, created };
}
