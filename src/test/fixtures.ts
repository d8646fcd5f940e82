import { defaultSyncSettings } from '@/lib/settings/sync-settings';

import type { HostConfig, InterfaceConfig, SnmpDetails, SnmpInterfaceConfig } from '@/lib/host-config/types';
import type { InventoryObject } from '@/lib/inventory/types';
import type { MappingRule } from '@/lib/mapping/types';

export const SITE_DC1 = { id: 1, name: 'DC1', slug: 'dc1', region: { id: 10, name: 'North' } };
export const SITE_DC2 = { id: 2, name: 'DC2', slug: 'dc2', region: null };
export const ROLE_WEB = { id: 21, name: 'web' };
export const ROLE_DB = { id: 22, name: 'db' };
export const PLATFORM_LINUX = { id: 31, name: 'linux' };

export function makeDevice(overrides: Partial<InventoryObject> & { id?: number } = {}): InventoryObject {
  const { id = 100, ...rest } = overrides;
  return {
    ref: { kind: 'device', id },
    name: `device-${id}`,
    site: SITE_DC1,
    role: ROLE_WEB,
    platform: PLATFORM_LINUX,
    cluster: null,
    primaryIp4: { id: id * 10 + 1, address: `10.0.0.${id % 250}/24`, dnsName: `device-${id}.example.test` },
    interfaces: [
      {
        id: id * 10,
        name: 'eth0',
        ipAddresses: [{ id: id * 10 + 1, address: `10.0.0.${id % 250}/24`, dnsName: `device-${id}.example.test` }],
      },
    ],
    tags: [],
    customFields: {},
    serial: `SN-${id}`,
    description: null,
    ...rest,
  };
}

export function makeRule(overrides: Partial<MappingRule> & { id: number }): MappingRule {
  return {
    name: `rule-${overrides.id}`,
    objectKind: 'device',
    isDefault: false,
    description: null,
    siteIds: [],
    roleIds: [],
    platformIds: [],
    interfaceType: 'any',
    hostGroupIds: [],
    templateIds: [],
    proxyId: null,
    proxyGroupId: null,
    ...overrides,
  };
}

export function makeDefaultRule(overrides: Partial<MappingRule> = {}): MappingRule {
  return makeRule({ id: 1, name: 'default', isDefault: true, hostGroupIds: ['2'], templateIds: ['10001'], ...overrides });
}

export function snmpDetails(overrides: Partial<SnmpDetails> = {}): SnmpDetails {
  const s = defaultSyncSettings().snmp;
  return {
    version: s.version,
    community: s.community,
    bulk: s.bulk,
    maxRepetitions: s.maxRepetitions,
    contextName: s.contextName,
    securityName: s.securityName,
    securityLevel: s.securityLevel,
    authProtocol: s.authProtocol,
    authPassphrase: s.authPassphrase,
    privProtocol: s.privProtocol,
    privPassphrase: s.privPassphrase,
    ...overrides,
  };
}

export function agentInterface(overrides: Partial<Omit<InterfaceConfig, 'kind'>> = {}): InterfaceConfig {
  return {
    kind: 'agent',
    id: null,
    name: 'agent',
    remoteInterfaceId: null,
    connection: 'ip',
    main: true,
    port: 10050,
    networkInterfaceId: 1000,
    ipAddressId: 1001,
    ...overrides,
  };
}

export function snmpInterface(overrides: Partial<Omit<SnmpInterfaceConfig, 'kind'>> = {}): InterfaceConfig {
  return {
    kind: 'snmp',
    id: null,
    name: 'snmp',
    remoteInterfaceId: null,
    connection: 'ip',
    main: true,
    port: 161,
    networkInterfaceId: 1000,
    ipAddressId: 1001,
    snmp: snmpDetails(),
    ...overrides,
  };
}

export function makeHostConfig(overrides: Partial<HostConfig> = {}): HostConfig {
  return {
    id: 1,
    name: 'z-device-100',
    object: { kind: 'device', id: 100 },
    remoteHostId: null,
    status: 'enabled',
    description: null,
    inSync: false,
    lastSyncUpdate: null,
    hostGroupIds: ['2'],
    templateIds: ['10001'],
    monitoredBy: 'direct',
    proxyId: null,
    proxyGroupId: null,
    interfaces: [agentInterface()],
    ...overrides,
  };
}
