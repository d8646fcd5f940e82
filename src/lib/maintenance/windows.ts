import { z } from 'zod/v4';

import { ErrorCode } from '@/lib/errors/error-codes';

import type { AppError } from '@/lib/errors/error';
import type { HostConfig } from '@/lib/host-config/types';
import type { InventoryObject } from '@/lib/inventory/types';
import type { MaintenanceStatus, MaintenanceWindow, MaintenanceWindowDraft } from '@/lib/maintenance/types';
import type { MaintenancePayload } from '@/lib/monitoring/service';

const TargetSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('host_config'), id: z.number().int().positive() }),
  z.object({ kind: z.literal('site'), id: z.number().int().positive() }),
  z.object({ kind: z.literal('cluster'), id: z.number().int().positive() }),
  z.object({ kind: z.literal('host_group'), id: z.string().min(1) }),
  z.object({ kind: z.literal('proxy'), id: z.string().min(1) }),
  z.object({ kind: z.literal('proxy_group'), id: z.string().min(1) }),
]);

export const MaintenanceWindowInputSchema = z
  .object({
    name: z.string().trim().min(1),
    startTime: z.coerce.date(),
    endTime: z.coerce.date(),
    targets: z.array(TargetSchema).min(1),
    disableDataCollection: z.boolean().default(false),
    description: z.string().nullable().default(null),
  })
  .superRefine((w, ctx) => {
    if (w.endTime.getTime() <= w.startTime.getTime()) {
      ctx.addIssue({ code: 'custom', path: ['endTime'], message: 'end time must be after start time' });
    }
  });

export function validateMaintenanceWindow(input: unknown): MaintenanceWindowDraft {
  const result = MaintenanceWindowInputSchema.safeParse(input);
  if (result.success) return result.data;
  throw {
    code: ErrorCode.VALIDATION_FAILED,
    category: 'schema',
    message: 'invalid maintenance window',
    retryable: false,
    details: result.error.issues.map((issue) => ({
      field: issue.path.map(String).join('.'),
      issue: issue.code,
      message: issue.message,
    })),
  } satisfies AppError;
}

/** Active on `[startTime, endTime)` unless the remote create failed. */
export function isActiveAt(window: MaintenanceWindow, now: Date): boolean {
  if (window.status === 'failed') return false;
  const t = now.getTime();
  return window.startTime.getTime() <= t && t < window.endTime.getTime();
}

export function statusAt(window: MaintenanceWindow, now: Date): MaintenanceStatus {
  if (window.status === 'failed') return 'failed';
  if (now.getTime() < window.startTime.getTime()) return 'pending';
  return isActiveAt(window, now) ? 'active' : 'expired';
}

/** `object` may be null when the inventory record is gone; site and cluster targets then never match. */
export function windowCoversHost(window: MaintenanceWindow, hostConfig: HostConfig, object: InventoryObject | null): boolean {
  return window.targets.some((target) => {
    switch (target.kind) {
      case 'host_config':
        return target.id === hostConfig.id;
      case 'site':
        return object?.site?.id === target.id;
      case 'cluster':
        return object?.cluster?.id === target.id;
      case 'host_group':
        return hostConfig.hostGroupIds.includes(target.id);
      case 'proxy':
        return hostConfig.monitoredBy === 'proxy' && hostConfig.proxyId === target.id;
      case 'proxy_group':
        return hostConfig.monitoredBy === 'proxy_group' && hostConfig.proxyGroupId === target.id;
    }
  });
}

export function activeWindowsFor(args: {
  windows: MaintenanceWindow[];
  hostConfig: HostConfig;
  object: InventoryObject | null;
  now: Date;
}): MaintenanceWindow[] {
  return args.windows.filter((w) => isActiveAt(w, args.now) && windowCoversHost(w, args.hostConfig, args.object));
}

export function maintenanceConflict(hostConfig: HostConfig, windows: MaintenanceWindow[], action: string): AppError {
  return {
    code: ErrorCode.MAINTENANCE_CONFLICT,
    category: 'conflict',
    message: `cannot ${action} ${hostConfig.name}: it is under active maintenance (${windows.map((w) => w.name).join(', ')})`,
    retryable: true,
    redacted_context: { host_config_id: hostConfig.id, maintenance_ids: windows.map((w) => w.id) },
  };
}

function epochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function buildMaintenancePayload(window: MaintenanceWindow, hostIds: string[]): MaintenancePayload {
  if (hostIds.length === 0) {
    throw {
      code: ErrorCode.VALIDATION_FAILED,
      category: 'schema',
      message: `maintenance ${window.name} does not cover any provisioned host`,
      retryable: false,
      details: [{ field: 'targets', issue: 'no_hosts' }],
    } satisfies AppError;
  }

  const since = epochSeconds(window.startTime);
  const till = epochSeconds(window.endTime);
  return {
    name: window.name,
    active_since: since,
    active_till: till,
    description: window.description ?? '',
    maintenance_type: window.disableDataCollection ? 1 : 0,
    hostids: [...new Set(hostIds)].sort(),
    tags_evaltype: 0,
    timeperiods: [{ timeperiod_type: 0, start_date: since, period: till - since }],
  };
}
