import { ErrorCode } from '@/lib/errors/error-codes';
import { buildHostBody } from '@/lib/monitoring/payload';

import type { AppError } from '@/lib/errors/error';
import type { HostConfig } from '@/lib/host-config/types';
import type { InventoryObject } from '@/lib/inventory/types';
import type { HostPayload } from '@/lib/monitoring/payload';
import type { RemoteHost } from '@/lib/monitoring/remote-records';
import type { MonitoringService } from '@/lib/monitoring/service';
import type { SyncSettings } from '@/lib/settings/sync-settings';

export type CanonicalHost = {
  host: string;
  status: string;
  description: string;
  monitored_by: string;
  proxyid: string;
  proxy_groupid: string;
  groups: string[];
  templates: string[];
  tags: string[];
  interfaces: string[];
  inventory_mode: string;
  inventory: Record<string, string>;
  tls_connect: string;
  tls_accept: string;
};

export type FieldDifference = { local: unknown; remote: unknown };

export type HostComparison = {
  equal: boolean;
  differences: Record<string, FieldDifference>;
};

const SNMP_FIELDS_V1_V2 = ['version', 'bulk', 'community'] as const;
const SNMP_FIELDS_V3 = [
  'version',
  'bulk',
  'max_repetitions',
  'contextname',
  'securityname',
  'securitylevel',
  'authprotocol',
  'privprotocol',
] as const;

type InterfaceLike = {
  type: string;
  main: string;
  useip: string;
  ip: string;
  dns: string;
  port: string;
  details?: Partial<Record<string, string>> | null;
};

function stableStringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  if (typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => a.localeCompare(b));
    return `{${entries.map(([k, v]) => `${k}:${stableStringify(v)}`).join(',')}}`;
  }
  return String(value);
}

/** Interface identity plus its non-secret SNMP parameters, as one comparable string. */
function canonicalInterface(iface: InterfaceLike): string {
  const parts = [`type=${iface.type}`, `main=${iface.main}`, `useip=${iface.useip}`, `ip=${iface.ip}`, `dns=${iface.dns}`, `port=${iface.port}`];
  if (iface.type === '2' && iface.details) {
    const details = iface.details;
    const fields = details.version === '3' ? SNMP_FIELDS_V3 : SNMP_FIELDS_V1_V2;
    for (const field of fields) parts.push(`${field}=${details[field] ?? ''}`);
  }
  return parts.join('|');
}

function sorted(values: string[]): string[] {
  return [...new Set(values)].sort();
}

function withoutEmpty(record: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(record).filter(([, v]) => v !== ''));
}

export function canonicalFromPayload(payload: HostPayload): CanonicalHost {
  return {
    host: payload.host,
    status: payload.status,
    description: payload.description,
    monitored_by: payload.monitored_by,
    proxyid: payload.monitored_by === '1' ? (payload.proxyid ?? '0') : '0',
    proxy_groupid: payload.monitored_by === '2' ? (payload.proxy_groupid ?? '0') : '0',
    groups: sorted(payload.groups.map((g) => g.groupid)),
    templates: sorted(payload.templates.map((t) => t.templateid)),
    tags: sorted(payload.tags.map((t) => `${t.tag}=${t.value}`)),
    interfaces: sorted(payload.interfaces.map(canonicalInterface)),
    inventory_mode: payload.inventory_mode,
    inventory: payload.inventory_mode === '0' ? withoutEmpty(payload.inventory ?? {}) : {},
    tls_connect: payload.tls_connect,
    tls_accept: payload.tls_accept,
  };
}

export function canonicalFromRemote(remote: RemoteHost): CanonicalHost {
  return {
    host: remote.host,
    status: remote.status,
    description: remote.description,
    monitored_by: remote.monitored_by,
    proxyid: remote.monitored_by === '1' ? remote.proxyid : '0',
    proxy_groupid: remote.monitored_by === '2' ? remote.proxy_groupid : '0',
    groups: sorted(remote.groups.map((g) => g.groupid)),
    templates: sorted(remote.parentTemplates.map((t) => t.templateid)),
    tags: sorted(remote.tags.map((t) => `${t.tag}=${t.value}`)),
    interfaces: sorted(remote.interfaces.map(canonicalInterface)),
    inventory_mode: remote.inventory_mode,
    inventory: remote.inventory_mode === '0' ? withoutEmpty(remote.inventory) : {},
    tls_connect: remote.tls_connect,
    tls_accept: remote.tls_accept,
  };
}

/**
 * Field-level diff of two canonical hosts. In `preserve` mode items that exist only remotely
 * (groups, templates, tags, interfaces, inventory fields) are not differences.
 */
export function diffCanonical(local: CanonicalHost, remote: CanonicalHost, syncMode: SyncSettings['syncMode']): HostComparison {
  const effectiveRemote: CanonicalHost =
    syncMode === 'preserve'
      ? {
          ...remote,
          groups: remote.groups.filter((g) => local.groups.includes(g)),
          templates: remote.templates.filter((t) => local.templates.includes(t)),
          tags: remote.tags.filter((t) => local.tags.includes(t)),
          interfaces: remote.interfaces.filter((i) => local.interfaces.includes(i)),
          inventory: Object.fromEntries(Object.entries(remote.inventory).filter(([k]) => k in local.inventory)),
        }
      : remote;

  const differences: Record<string, FieldDifference> = {};
  for (const key of Object.keys(local)) {
    if (!(key in effectiveRemote)) continue;
    const l: unknown = Reflect.get(local, key);
    const r: unknown = Reflect.get(effectiveRemote, key);
    if (stableStringify(l) !== stableStringify(r)) differences[key] = { local: l, remote: r };
  }

  return { equal: Object.keys(differences).length === 0, differences };
}

/**
 * Compare a host configuration with the live remote host. A stale remote id is reported as
 * REMOTE_HOST_NOT_FOUND; it is never recreated from here.
 */
export async function compareHost(args: {
  service: MonitoringService;
  hostConfig: HostConfig;
  object: InventoryObject;
  settings: SyncSettings;
}): Promise<HostComparison & { remote: RemoteHost }> {
  const { hostConfig } = args;
  if (!hostConfig.remoteHostId) {
    throw {
      code: ErrorCode.VALIDATION_FAILED,
      category: 'schema',
      message: `${hostConfig.name} has not been created remotely`,
      retryable: false,
      details: [{ field: 'remoteHostId', issue: 'required' }],
    } satisfies AppError;
  }

  const remote = await args.service.getHost(hostConfig.remoteHostId);
  if (!remote) {
    throw {
      code: ErrorCode.REMOTE_HOST_NOT_FOUND,
      category: 'not_found',
      message: `remote host ${hostConfig.remoteHostId} for ${hostConfig.name} no longer exists`,
      retryable: false,
      redacted_context: { host_config_id: hostConfig.id, remote_host_id: hostConfig.remoteHostId },
    } satisfies AppError;
  }

  const local = canonicalFromPayload(buildHostBody(args));
  return { ...diffCanonical(local, canonicalFromRemote(remote), args.settings.syncMode), remote };
}
