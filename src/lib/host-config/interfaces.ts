import { ErrorCode } from '@/lib/errors/error-codes';
import { findIpAddress, stripPrefixLength } from '@/lib/inventory/types';

import type { AppError, ErrorDetail } from '@/lib/errors/error';
import type { HostConfigDraft, InterfaceConfig, InterfaceKind, SnmpDetails } from '@/lib/host-config/types';
import type { InventoryObject } from '@/lib/inventory/types';
import type { SyncSettings } from '@/lib/settings/sync-settings';

export type InterfaceAddress = { ip: string; dns: string };

const FAMILIES: readonly InterfaceKind[] = ['agent', 'snmp'];

/**
 * Keep exactly one main interface per family. When several are flagged, an interface that was
 * not main in `previous` beats one that already was, then the last in list order wins; an
 * unflagged family promotes its first.
 */
export function normalizeMainFlags(interfaces: InterfaceConfig[], previous: InterfaceConfig[] = []): InterfaceConfig[] {
  const wasMain = new Set(previous.flatMap((i) => (i.main && i.id !== null ? [i.id] : [])));
  const mainIndex = new Map<InterfaceKind, number>();
  for (const family of FAMILIES) {
    let chosen = -1;
    let chosenIsNew = false;
    interfaces.forEach((iface, index) => {
      if (iface.kind !== family || !iface.main) return;
      const isNew = iface.id === null || !wasMain.has(iface.id);
      if (isNew || !chosenIsNew) {
        chosen = index;
        chosenIsNew = isNew;
      }
    });
    if (chosen === -1) chosen = interfaces.findIndex((iface) => iface.kind === family);
    if (chosen !== -1) mainIndex.set(family, chosen);
  }

  return interfaces.map((iface, index) => {
    const main = mainIndex.get(iface.kind) === index;
    return iface.main === main ? iface : { ...iface, main };
  });
}

/** Append an interface; a new main interface demotes the family's previous main. */
export function addInterface<T extends HostConfigDraft>(hostConfig: T, iface: InterfaceConfig): T {
  const others = iface.main
    ? hostConfig.interfaces.map((i) => (i.kind === iface.kind && i.main ? { ...i, main: false } : i))
    : hostConfig.interfaces;
  return { ...hostConfig, interfaces: normalizeMainFlags([...others, iface]) };
}

export function validateInterfaces(hostConfig: HostConfigDraft, object: InventoryObject): void {
  const details: ErrorDetail[] = [];

  hostConfig.interfaces.forEach((iface, index) => {
    const networkInterface = object.interfaces.find((n) => n.id === iface.networkInterfaceId);
    if (!networkInterface) {
      details.push({
        field: `interfaces.${index}.networkInterfaceId`,
        issue: 'unknown_interface',
        message: `network interface ${iface.networkInterfaceId} does not belong to ${object.name}`,
      });
      return;
    }
    if (iface.ipAddressId !== null && !networkInterface.ipAddresses.some((ip) => ip.id === iface.ipAddressId)) {
      details.push({
        field: `interfaces.${index}.ipAddressId`,
        issue: 'ip_not_on_interface',
        message: `ip address ${iface.ipAddressId} is not assigned to ${networkInterface.name}`,
      });
    }
    if (iface.port < 1 || iface.port > 65535) {
      details.push({ field: `interfaces.${index}.port`, issue: 'out_of_range' });
    }
  });

  if (details.length === 0) return;
  throw {
    code: ErrorCode.VALIDATION_FAILED,
    category: 'schema',
    message: `invalid interfaces for ${hostConfig.name}`,
    retryable: false,
    details,
  } satisfies AppError;
}

export function resolveInterfaceAddress(iface: InterfaceConfig, object: InventoryObject): InterfaceAddress {
  if (iface.ipAddressId === null) return { ip: '', dns: '' };
  const found = findIpAddress(object, iface.ipAddressId);
  if (!found) return { ip: '', dns: '' };
  return { ip: stripPrefixLength(found.ipAddress.address), dns: found.ipAddress.dnsName ?? '' };
}

export function defaultSnmpDetails(settings: SyncSettings['snmp']): SnmpDetails {
  return {
    version: settings.version,
    community: settings.community,
    bulk: settings.bulk,
    maxRepetitions: settings.maxRepetitions,
    contextName: settings.contextName,
    securityName: settings.securityName,
    securityLevel: settings.securityLevel,
    authProtocol: settings.authProtocol,
    authPassphrase: settings.authPassphrase,
    privProtocol: settings.privProtocol,
    privPassphrase: settings.privPassphrase,
  };
}

function missingAddress(object: InventoryObject, reason: string): AppError {
  return {
    code: ErrorCode.VALIDATION_FAILED,
    category: 'schema',
    message: `cannot pick an address for ${object.name}: ${reason}`,
    retryable: false,
    details: [{ field: 'ipAddressId', issue: 'address_unavailable', message: reason }],
  };
}

/**
 * A new interface configuration for an object. With `primary` assignment the object's primary
 * IPv4 is used; `manual` requires the caller to name the address.
 */
export function buildInterface(args: {
  object: InventoryObject;
  kind: InterfaceKind;
  settings: SyncSettings;
  ipAddressId?: number;
}): InterfaceConfig {
  let ipAddressId: number;
  if (args.ipAddressId !== undefined) {
    ipAddressId = args.ipAddressId;
  } else if (args.settings.ipAssignmentMethod === 'primary') {
    if (!args.object.primaryIp4) throw missingAddress(args.object, 'object has no primary IPv4 address');
    ipAddressId = args.object.primaryIp4.id;
  } else {
    throw missingAddress(args.object, 'manual assignment requires an explicit ip address');
  }

  const found = findIpAddress(args.object, ipAddressId);
  if (!found) throw missingAddress(args.object, `ip address ${ipAddressId} is not assigned to any interface`);

  const base = {
    id: null,
    name: `${args.object.name}-${args.kind}`,
    remoteInterfaceId: null,
    connection: args.settings.connection,
    main: true,
    networkInterfaceId: found.networkInterface.id,
    ipAddressId,
  };

  if (args.kind === 'agent') return { ...base, kind: 'agent', port: args.settings.agent.port };
  return { ...base, kind: 'snmp', port: args.settings.snmp.port, snmp: defaultSnmpDetails(args.settings.snmp) };
}
