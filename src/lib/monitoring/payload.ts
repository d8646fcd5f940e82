import { ErrorCode } from '@/lib/errors/error-codes';
import { resolveInterfaceAddress } from '@/lib/host-config/interfaces';
import { buildInventoryFields } from '@/lib/mapping/inventory-fields';
import { buildHostTags } from '@/lib/mapping/tags';
import {
  INTERFACE_TYPE_CODE,
  INVENTORY_MODE_CODE,
  MONITORED_BY_CODE,
  SNMP_AUTH_PROTOCOL_CODE,
  SNMP_PRIV_PROTOCOL_CODE,
  SNMP_SECURITY_LEVEL_CODE,
  STATUS_CODE,
  TLS_CODE,
  USEIP_CODE,
} from '@/lib/monitoring/wire-codes';

import type { AppError } from '@/lib/errors/error';
import type { HostConfigDraft, InterfaceConfig } from '@/lib/host-config/types';
import type { InventoryObject } from '@/lib/inventory/types';
import type { HostTag } from '@/lib/mapping/tags';
import type { RemoteHost, RemoteInterface } from '@/lib/monitoring/remote-records';
import type { SyncSettings } from '@/lib/settings/sync-settings';

export type SnmpDetailsPayload = {
  version: string;
  bulk: string;
  community?: string;
  max_repetitions?: string;
  contextname?: string;
  securityname?: string;
  securitylevel?: string;
  authprotocol?: string;
  authpassphrase?: string;
  privprotocol?: string;
  privpassphrase?: string;
};

export type InterfacePayload = {
  interfaceid?: string;
  type: string;
  main: string;
  useip: string;
  ip: string;
  dns: string;
  port: string;
  details?: SnmpDetailsPayload;
};

export type HostPayload = {
  hostid?: string;
  host: string;
  status: string;
  description: string;
  monitored_by: string;
  proxyid?: string;
  proxy_groupid?: string;
  groups: Array<{ groupid: string }>;
  templates: Array<{ templateid: string }>;
  templates_clear?: Array<{ templateid: string }>;
  tags: HostTag[];
  interfaces: InterfacePayload[];
  inventory_mode: string;
  inventory?: Record<string, string>;
  tls_connect: string;
  tls_accept: string;
  tls_psk_identity?: string;
  tls_psk?: string;
};

export type HostPatch = Partial<Omit<HostPayload, 'hostid'>>;

function invalid(message: string, field: string, issue: string): AppError {
  return { code: ErrorCode.VALIDATION_FAILED, category: 'schema', message, retryable: false, details: [{ field, issue }] };
}

function snmpDetailsPayload(iface: Extract<InterfaceConfig, { kind: 'snmp' }>, includeSecrets: boolean): SnmpDetailsPayload {
  const s = iface.snmp;
  const base = { version: String(s.version), bulk: s.bulk ? '1' : '0' };
  if (s.version !== 3) {
    return { ...base, community: s.community, ...(s.version === 2 ? { max_repetitions: String(s.maxRepetitions) } : {}) };
  }
  return {
    ...base,
    max_repetitions: String(s.maxRepetitions),
    contextname: s.contextName,
    securityname: s.securityName,
    securitylevel: SNMP_SECURITY_LEVEL_CODE[s.securityLevel],
    authprotocol: SNMP_AUTH_PROTOCOL_CODE[s.authProtocol],
    privprotocol: SNMP_PRIV_PROTOCOL_CODE[s.privProtocol],
    ...(includeSecrets ? { authpassphrase: s.authPassphrase, privpassphrase: s.privPassphrase } : {}),
  };
}

export function interfacePayload(iface: InterfaceConfig, object: InventoryObject, includeSecrets = true): InterfacePayload {
  const address = resolveInterfaceAddress(iface, object);
  if (iface.connection === 'ip' && !address.ip) {
    throw invalid(`interface ${iface.name} connects by ip but has no ip address`, 'ipAddressId', 'ip_missing');
  }
  if (iface.connection === 'dns' && !address.dns) {
    throw invalid(`interface ${iface.name} connects by dns but its address has no dns name`, 'connection', 'dns_missing');
  }

  return {
    type: INTERFACE_TYPE_CODE[iface.kind],
    main: iface.main ? '1' : '0',
    useip: USEIP_CODE[iface.connection],
    ip: address.ip,
    dns: address.dns,
    port: String(iface.port),
    ...(iface.kind === 'snmp' ? { details: snmpDetailsPayload(iface, includeSecrets) } : {}),
  };
}

export function usesPsk(settings: SyncSettings['tls']): boolean {
  return settings.connect === 'psk' || settings.accept === 'psk';
}

/**
 * Desired remote host state without secrets or remote ids. Shared by the create/update payloads
 * and the comparator.
 */
export function buildHostBody(args: {
  hostConfig: HostConfigDraft;
  object: InventoryObject;
  settings: SyncSettings;
}): HostPayload {
  const { hostConfig, object, settings } = args;

  if (hostConfig.monitoredBy === 'proxy' && !hostConfig.proxyId) {
    throw invalid(`${hostConfig.name} is monitored by proxy but has no proxy`, 'proxyId', 'required');
  }
  if (hostConfig.monitoredBy === 'proxy_group' && !hostConfig.proxyGroupId) {
    throw invalid(`${hostConfig.name} is monitored by proxy group but has no proxy group`, 'proxyGroupId', 'required');
  }

  const inventoryMode = INVENTORY_MODE_CODE[settings.inventoryMode];

  return {
    host: object.name,
    status: STATUS_CODE[hostConfig.status],
    description: hostConfig.description ?? object.description ?? '',
    monitored_by: MONITORED_BY_CODE[hostConfig.monitoredBy],
    ...(hostConfig.monitoredBy === 'proxy' && hostConfig.proxyId ? { proxyid: hostConfig.proxyId } : {}),
    ...(hostConfig.monitoredBy === 'proxy_group' && hostConfig.proxyGroupId
      ? { proxy_groupid: hostConfig.proxyGroupId }
      : {}),
    groups: hostConfig.hostGroupIds.map((groupid) => ({ groupid })),
    templates: hostConfig.templateIds.map((templateid) => ({ templateid })),
    tags: buildHostTags(object, settings.tags),
    interfaces: hostConfig.interfaces.map((iface) => interfacePayload(iface, object, false)),
    inventory_mode: inventoryMode,
    ...(settings.inventoryMode === 'manual' ? { inventory: buildInventoryFields(object, settings.inventory) } : {}),
    tls_connect: TLS_CODE[settings.tls.connect],
    tls_accept: TLS_CODE[settings.tls.accept],
  };
}

function pskFields(settings: SyncSettings['tls'], psk: string | null): Pick<HostPayload, 'tls_psk_identity' | 'tls_psk'> {
  if (!settings.pskIdentity || !psk) {
    throw invalid('tls psk is enabled but the psk identity or key is not configured', 'tls', 'psk_missing');
  }
  return { tls_psk_identity: settings.pskIdentity, tls_psk: psk };
}

export function buildCreatePayload(args: {
  hostConfig: HostConfigDraft;
  object: InventoryObject;
  settings: SyncSettings;
  psk: string | null;
}): HostPayload {
  const body = buildHostBody(args);
  return {
    ...body,
    interfaces: args.hostConfig.interfaces.map((iface) => interfacePayload(iface, args.object, true)),
    ...(usesPsk(args.settings.tls) ? pskFields(args.settings.tls, args.psk) : {}),
  };
}

function sameEndpoint(local: InterfacePayload, remote: RemoteInterface): boolean {
  if (local.type !== remote.type || local.port !== remote.port) return false;
  return local.useip === '1' ? !!local.ip && local.ip === remote.ip : !!local.dns && local.dns === remote.dns;
}

function remoteInterfacePayload(remote: RemoteInterface): InterfacePayload {
  return {
    interfaceid: remote.interfaceid,
    type: remote.type,
    main: '0',
    useip: remote.useip,
    ip: remote.ip,
    dns: remote.dns,
    port: remote.port,
  };
}

function unionBy<T>(local: T[], remote: T[], key: (item: T) => string): T[] {
  const keys = new Set(local.map(key));
  return [...local, ...remote.filter((item) => !keys.has(key(item)))];
}

/**
 * Update request built against the last-known remote state. Secrets already in effect remotely
 * are not resent unless `rotateSecrets` is set.
 */
export function buildUpdatePayload(args: {
  hostConfig: HostConfigDraft;
  object: InventoryObject;
  settings: SyncSettings;
  psk: string | null;
  preImage: RemoteHost;
  rotateSecrets?: boolean;
}): HostPayload {
  const { hostConfig, object, settings, preImage } = args;
  const rotate = args.rotateSecrets ?? false;
  const body = buildHostBody(args);
  const claimed = new Set<string>();

  const interfaces = hostConfig.interfaces.map((iface) => {
    const bare = interfacePayload(iface, object, false);
    const match =
      (iface.remoteInterfaceId && preImage.interfaces.find((r) => r.interfaceid === iface.remoteInterfaceId)) ||
      preImage.interfaces.find((r) => !claimed.has(r.interfaceid) && sameEndpoint(bare, r));
    if (match) claimed.add(match.interfaceid);

    const withSecrets = rotate || !match ? interfacePayload(iface, object, true) : bare;
    return match ? { ...withSecrets, interfaceid: match.interfaceid } : withSecrets;
  });

  const localTemplateIds = new Set(hostConfig.templateIds);
  const preImageTemplates = preImage.parentTemplates.map((t) => ({ templateid: t.templateid }));
  const preImageGroups = preImage.groups.map((g) => ({ groupid: g.groupid }));

  const preserve = settings.syncMode === 'preserve';
  const payload: HostPayload = {
    ...body,
    hostid: preImage.hostid,
    interfaces: preserve
      ? [...interfaces, ...preImage.interfaces.filter((r) => !claimed.has(r.interfaceid)).map(remoteInterfacePayload)]
      : interfaces,
    groups: preserve ? unionBy(body.groups, preImageGroups, (g) => g.groupid) : body.groups,
    templates: preserve ? unionBy(body.templates, preImageTemplates, (t) => t.templateid) : body.templates,
    tags: preserve ? unionBy(body.tags, preImage.tags, (t) => `${t.tag}\u0000${t.value}`) : body.tags,
  };

  if (!preserve) {
    const removed = preImageTemplates.filter((t) => !localTemplateIds.has(t.templateid));
    if (removed.length > 0) payload.templates_clear = removed;
  }

  if (usesPsk(settings.tls)) {
    const remoteOnPsk = preImage.tls_connect === TLS_CODE.psk || preImage.tls_accept === TLS_CODE.psk;
    const identityChanged =
      preImage.tls_psk_identity !== undefined && preImage.tls_psk_identity !== settings.tls.pskIdentity;
    if (rotate || !remoteOnPsk || identityChanged) Object.assign(payload, pskFields(settings.tls, args.psk));
  }

  return payload;
}
