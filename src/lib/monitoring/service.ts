import type { HostPatch, HostPayload, InterfacePayload } from '@/lib/monitoring/payload';
import type {
  RemoteHost,
  RemoteHostGroup,
  RemoteInterface,
  RemoteProxy,
  RemoteProxyGroup,
  RemoteTemplate,
} from '@/lib/monitoring/remote-records';

export type MaintenancePayload = {
  name: string;
  active_since: number;
  active_till: number;
  description: string;
  maintenance_type: 0 | 1;
  hostids: string[];
  tags_evaltype: 0;
  timeperiods: Array<{ timeperiod_type: 0; start_date: number; period: number }>;
};

/**
 * Operations the engine needs from the monitoring platform. Lookups return `null` for absent
 * records; every other failure surfaces as an AppError.
 */
export type MonitoringService = {
  createHost: (payload: HostPayload) => Promise<string>;
  updateHost: (hostId: string, payload: HostPatch) => Promise<void>;
  deleteHost: (hostId: string) => Promise<void>;
  getHost: (hostId: string) => Promise<RemoteHost | null>;
  findHostByName: (name: string) => Promise<RemoteHost | null>;
  getHostInterfaces: (hostId: string) => Promise<RemoteInterface[]>;
  createHostInterface: (hostId: string, payload: InterfacePayload) => Promise<string>;
  listHostGroups: () => Promise<RemoteHostGroup[]>;
  createHostGroup: (name: string) => Promise<string>;
  listTemplates: () => Promise<RemoteTemplate[]>;
  listProxies: () => Promise<RemoteProxy[]>;
  listProxyGroups: () => Promise<RemoteProxyGroup[]>;
  createMaintenance: (payload: MaintenancePayload) => Promise<string>;
  deleteMaintenance: (maintenanceId: string) => Promise<void>;
};
