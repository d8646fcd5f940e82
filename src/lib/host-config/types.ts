import type { InventoryObjectRef } from '@/lib/inventory/types';
import type { SnmpAuthProtocol, SnmpPrivProtocol, SnmpSecurityLevel } from '@/lib/settings/sync-settings';

export type HostStatus = 'enabled' | 'disabled';
export type MonitoredBy = 'direct' | 'proxy' | 'proxy_group';
export type ConnectionMethod = 'ip' | 'dns';
export type InterfaceKind = 'agent' | 'snmp';

export type SnmpDetails = {
  version: 1 | 2 | 3;
  community: string;
  bulk: boolean;
  maxRepetitions: number;
  contextName: string;
  securityName: string;
  securityLevel: SnmpSecurityLevel;
  authProtocol: SnmpAuthProtocol;
  authPassphrase: string;
  privProtocol: SnmpPrivProtocol;
  privPassphrase: string;
};

type InterfaceBase = {
  /** `null` until the interface has been persisted. */
  id: number | null;
  name: string;
  remoteInterfaceId: string | null;
  connection: ConnectionMethod;
  main: boolean;
  port: number;
  networkInterfaceId: number;
  ipAddressId: number | null;
};

export type AgentInterfaceConfig = InterfaceBase & { kind: 'agent' };
export type SnmpInterfaceConfig = InterfaceBase & { kind: 'snmp'; snmp: SnmpDetails };
export type InterfaceConfig = AgentInterfaceConfig | SnmpInterfaceConfig;

export type HostConfig = {
  id: number;
  name: string;
  object: InventoryObjectRef;
  remoteHostId: string | null;
  status: HostStatus;
  description: string | null;
  inSync: boolean;
  lastSyncUpdate: Date | null;
  hostGroupIds: string[];
  templateIds: string[];
  monitoredBy: MonitoredBy;
  proxyId: string | null;
  proxyGroupId: string | null;
  interfaces: InterfaceConfig[];
};

export type HostConfigDraft = Omit<HostConfig, 'id'>;

export function hostConfigName(objectName: string): string {
  return `z-${objectName}`;
}

export function newHostConfigDraft(input: { object: InventoryObjectRef; objectName: string }): HostConfigDraft {
  return {
    name: hostConfigName(input.objectName),
    object: input.object,
    remoteHostId: null,
    status: 'enabled',
    description: null,
    inSync: false,
    lastSyncUpdate: null,
    hostGroupIds: [],
    templateIds: [],
    monitoredBy: 'direct',
    proxyId: null,
    proxyGroupId: null,
    interfaces: [],
  };
}
