import { ErrorCode } from '@/lib/errors/error-codes';
import { defaultSnmpDetails } from '@/lib/host-config/interfaces';
import { newHostConfigDraft } from '@/lib/host-config/types';
import { refKey, stripPrefixLength } from '@/lib/inventory/types';
import { logEvent } from '@/lib/logging/logger';
import { compareHost } from '@/lib/monitoring/compare';
import {
  decodeCode,
  MONITORED_BY_CODE,
  SNMP_AUTH_PROTOCOL_CODE,
  SNMP_PRIV_PROTOCOL_CODE,
  SNMP_SECURITY_LEVEL_CODE,
  STATUS_CODE,
} from '@/lib/monitoring/wire-codes';
import { deferRecords } from '@/lib/provisioning/collaborators';
import { insertHostConfig } from '@/lib/provisioning/store';

import type { AppError, ErrorDetail } from '@/lib/errors/error';
import type { HostConfig, InterfaceConfig, SnmpDetails } from '@/lib/host-config/types';
import type { InventoryObject, InventoryObjectRef } from '@/lib/inventory/types';
import type { RemoteHost, RemoteInterface } from '@/lib/monitoring/remote-records';
import type { EngineDeps } from '@/lib/provisioning/orchestrator';
import type { SyncSettings } from '@/lib/settings/sync-settings';

function importError(object: InventoryObject, message: string, details: ErrorDetail[]): AppError {
  return {
    code: ErrorCode.VALIDATION_FAILED,
    category: 'schema',
    message: `cannot import ${object.name}: ${message}`,
    retryable: false,
    details,
    redacted_context: { object: refKey(object.ref) },
  };
}

function findAddress(object: InventoryObject, remote: RemoteInterface) {
  for (const networkInterface of object.interfaces) {
    for (const ipAddress of networkInterface.ipAddresses) {
      const matches =
        remote.useip === '1'
          ? stripPrefixLength(ipAddress.address) === remote.ip
          : !!remote.dns && ipAddress.dnsName === remote.dns;
      if (matches) return { networkInterface, ipAddress };
    }
  }
  return null;
}

function snmpFromRemote(details: Record<string, string> | null, settings: SyncSettings['snmp']): SnmpDetails {
  const fallback = defaultSnmpDetails(settings);
  if (!details) return fallback;
  const version = details.version === '1' ? 1 : details.version === '2' ? 2 : 3;
  return {
    ...fallback,
    version,
    community: details.community ?? fallback.community,
    bulk: details.bulk === undefined ? fallback.bulk : details.bulk === '1',
    maxRepetitions: details.max_repetitions ? Number(details.max_repetitions) : fallback.maxRepetitions,
    contextName: details.contextname ?? fallback.contextName,
    securityName: details.securityname ?? fallback.securityName,
    securityLevel: decodeCode(SNMP_SECURITY_LEVEL_CODE, details.securitylevel ?? '') ?? fallback.securityLevel,
    authProtocol: decodeCode(SNMP_AUTH_PROTOCOL_CODE, details.authprotocol ?? '') ?? fallback.authProtocol,
    privProtocol: decodeCode(SNMP_PRIV_PROTOCOL_CODE, details.privprotocol ?? '') ?? fallback.privProtocol,
  };
}

function importInterfaces(object: InventoryObject, remote: RemoteHost, settings: SyncSettings): InterfaceConfig[] {
  const details: ErrorDetail[] = [];
  const interfaces: InterfaceConfig[] = [];

  remote.interfaces.forEach((r, index) => {
    if (r.type !== '1' && r.type !== '2') return;
    const found = findAddress(object, r);
    if (!found) {
      details.push({
        field: `interfaces.${index}`,
        issue: 'address_not_on_object',
        message: `${r.useip === '1' ? r.ip : r.dns} is not assigned to ${object.name}`,
      });
      return;
    }

    const base = {
      id: null,
      name: `${object.name}-${r.type === '1' ? 'agent' : 'snmp'}`,
      remoteInterfaceId: r.interfaceid,
      connection: r.useip === '1' ? ('ip' as const) : ('dns' as const),
      main: r.main === '1',
      port: Number(r.port),
      networkInterfaceId: found.networkInterface.id,
      ipAddressId: found.ipAddress.id,
    };
    interfaces.push(
      r.type === '1' ? { ...base, kind: 'agent' } : { ...base, kind: 'snmp', snmp: snmpFromRemote(r.details, settings.snmp) },
    );
  });

  if (details.length > 0) throw importError(object, 'interfaces do not match the inventory', details);
  return interfaces;
}

/**
 * Adopt a host that already exists remotely under the object's name. Its templates must be
 * known to the local catalog and its interface addresses must belong to the object.
 */
export async function importHost(deps: EngineDeps, input: { ref: InventoryObjectRef }): Promise<HostConfig> {
  return deferRecords(deps, ({ audit, jobs }) =>
    deps.store.transaction(async (tx) => {
      const object = await deps.inventory.get(input.ref);
      if (!object) {
        throw {
          code: ErrorCode.INVENTORY_OBJECT_NOT_FOUND,
          category: 'not_found',
          message: `inventory object ${refKey(input.ref)} not found`,
          retryable: false,
        } satisfies AppError;
      }

      if (await tx.findHostConfigByObject(object.ref)) {
        throw importError(object, 'it already has a host configuration', [{ field: 'object', issue: 'already_configured' }]);
      }

      const remote = await deps.service.findHostByName(object.name);
      if (!remote) {
        throw {
          code: ErrorCode.REMOTE_HOST_NOT_FOUND,
          category: 'not_found',
          message: `no remote host named ${object.name}`,
          retryable: false,
          redacted_context: { object: refKey(object.ref) },
        } satisfies AppError;
      }

      const knownTemplates = new Set((await tx.listCatalogItems('template')).map((t) => t.remoteId));
      const unknown = remote.parentTemplates.filter((t) => !knownTemplates.has(t.templateid));
      if (unknown.length > 0) {
        throw importError(
          object,
          'it uses templates missing from the catalog',
          unknown.map((t) => ({ field: 'templates', issue: 'unknown_template', message: t.templateid })),
        );
      }

      const monitoredBy = decodeCode(MONITORED_BY_CODE, remote.monitored_by) ?? 'direct';
      const draft = {
        ...newHostConfigDraft({ object: object.ref, objectName: object.name }),
        remoteHostId: remote.hostid,
        status: decodeCode(STATUS_CODE, remote.status) ?? 'enabled',
        description: remote.description === '' ? null : remote.description,
        hostGroupIds: remote.groups.map((g) => g.groupid),
        templateIds: remote.parentTemplates.map((t) => t.templateid),
        monitoredBy,
        proxyId: monitoredBy === 'proxy' ? remote.proxyid : null,
        proxyGroupId: monitoredBy === 'proxy_group' ? remote.proxy_groupid : null,
        interfaces: importInterfaces(object, remote, deps.settings),
      };

      const hostConfig = await insertHostConfig(tx, draft, object);
      await audit.logCreationEvent({
        model: 'host_config',
        objectId: hostConfig.id,
        objectName: hostConfig.name,
        changes: { importedFrom: remote.hostid },
      });
      if (deps.jobId) {
        await jobs.associateModelWithJob({ jobId: deps.jobId, model: 'host_config', objectId: hostConfig.id });
      }

      const comparison = await compareHost({ service: deps.service, hostConfig, object, settings: deps.settings });
      const now = deps.now?.() ?? new Date();
      await tx.updateSyncStatus(hostConfig.id, { inSync: comparison.equal, lastSyncUpdate: now });

      logEvent({
        level: 'info',
        service: 'engine',
        event_type: 'host.imported',
        host_config_id: hostConfig.id,
        remote_host_id: remote.hostid,
        in_sync: comparison.equal,
      });
      return { ...hostConfig, inSync: comparison.equal, lastSyncUpdate: now };
    }),
  );
}
