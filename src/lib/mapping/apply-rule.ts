import { ErrorCode } from '@/lib/errors/error-codes';

import type { AppError } from '@/lib/errors/error';
import type { HostConfigDraft, MonitoredBy } from '@/lib/host-config/types';
import type { MappingRule } from '@/lib/mapping/types';

function union(current: string[], added: string[]): string[] {
  const out = [...current];
  for (const id of added) if (!out.includes(id)) out.push(id);
  return out;
}

export function monitoredByForRule(rule: MappingRule): MonitoredBy {
  if (rule.proxyId) return 'proxy';
  if (rule.proxyGroupId) return 'proxy_group';
  return 'direct';
}

/**
 * Merge a rule's assignments into a host configuration. Groups and templates are unioned so
 * local additions survive a re-apply; the monitoring source follows the rule unless overridden.
 */
export function applyRule<T extends HostConfigDraft>(hostConfig: T, rule: MappingRule, monitoredByOverride?: MonitoredBy): T {
  const monitoredBy = monitoredByOverride ?? monitoredByForRule(rule);

  if (monitoredBy === 'proxy' && !rule.proxyId) {
    throw {
      code: ErrorCode.VALIDATION_FAILED,
      category: 'schema',
      message: `mapping rule ${rule.name} has no proxy to monitor through`,
      retryable: false,
      details: [{ field: 'monitoredBy', issue: 'proxy_missing' }],
    } satisfies AppError;
  }
  if (monitoredBy === 'proxy_group' && !rule.proxyGroupId) {
    throw {
      code: ErrorCode.VALIDATION_FAILED,
      category: 'schema',
      message: `mapping rule ${rule.name} has no proxy group to monitor through`,
      retryable: false,
      details: [{ field: 'monitoredBy', issue: 'proxy_group_missing' }],
    } satisfies AppError;
  }

  return {
    ...hostConfig,
    hostGroupIds: union(hostConfig.hostGroupIds, rule.hostGroupIds),
    templateIds: union(hostConfig.templateIds, rule.templateIds),
    monitoredBy,
    proxyId: monitoredBy === 'proxy' ? rule.proxyId : null,
    proxyGroupId: monitoredBy === 'proxy_group' ? rule.proxyGroupId : null,
  };
}
