import { z } from 'zod/v4';

import { ErrorCode } from '@/lib/errors/error-codes';

import type { AppError, ErrorDetail } from '@/lib/errors/error';
import type { MappingRule, MappingRuleDraft } from '@/lib/mapping/types';

const idSet = z.array(z.number().int().positive()).default([]);
const remoteIdSet = z.array(z.string().min(1)).default([]);

export const MappingRuleInputSchema = z
  .object({
    name: z.string().trim().min(1),
    objectKind: z.enum(['device', 'virtual_machine']),
    isDefault: z.boolean().default(false),
    description: z.string().nullable().default(null),
    siteIds: idSet,
    roleIds: idSet,
    platformIds: idSet,
    interfaceType: z.enum(['any', 'agent', 'snmp']).default('any'),
    hostGroupIds: remoteIdSet,
    templateIds: remoteIdSet,
    proxyId: z.string().min(1).nullable().default(null),
    proxyGroupId: z.string().min(1).nullable().default(null),
  })
  .superRefine((rule, ctx) => {
    if (rule.proxyId && rule.proxyGroupId) {
      ctx.addIssue({ code: 'custom', path: ['proxyGroupId'], message: 'proxy and proxy group are mutually exclusive' });
    }

    const filterCount = [rule.siteIds, rule.roleIds, rule.platformIds].filter((s) => s.length > 0).length;
    if (rule.isDefault && filterCount > 0) {
      ctx.addIssue({ code: 'custom', path: ['isDefault'], message: 'default rule cannot carry filters' });
    }
    if (!rule.isDefault && filterCount === 0) {
      ctx.addIssue({ code: 'custom', path: ['siteIds'], message: 'non-default rule needs at least one filter' });
    }
  });

export type MappingRuleInput = z.input<typeof MappingRuleInputSchema>;

function validationError(message: string, details: ErrorDetail[], context?: AppError['redacted_context']): AppError {
  return {
    code: ErrorCode.VALIDATION_FAILED,
    category: 'schema',
    message,
    retryable: false,
    details,
    ...(context ? { redacted_context: context } : {}),
  };
}

function dedupe<T>(values: T[]): T[] {
  return [...new Set(values)];
}

/**
 * Validate a rule before it is written. `existing` is the current rule set; the rule being
 * edited (if any) is identified by `id` so it does not collide with itself.
 */
export function validateMappingRule(args: {
  input: unknown;
  existing: MappingRule[];
  id?: number;
}): MappingRuleDraft {
  const result = MappingRuleInputSchema.safeParse(args.input);
  if (!result.success) {
    throw validationError(
      'invalid mapping rule',
      result.error.issues.map((issue) => ({
        field: issue.path.map(String).join('.'),
        issue: issue.code,
        message: issue.message,
      })),
    );
  }

  const rule = result.data;
  if (rule.isDefault) {
    const otherDefault = args.existing.find(
      (r) => r.isDefault && r.objectKind === rule.objectKind && r.id !== args.id,
    );
    if (otherDefault) {
      throw validationError(
        `a default ${rule.objectKind} rule already exists`,
        [{ field: 'isDefault', issue: 'duplicate_default', message: `rule ${otherDefault.name} is already the default` }],
        { existing_rule_id: otherDefault.id },
      );
    }
  }

  return {
    ...rule,
    siteIds: dedupe(rule.siteIds),
    roleIds: dedupe(rule.roleIds),
    platformIds: dedupe(rule.platformIds),
    hostGroupIds: dedupe(rule.hostGroupIds),
    templateIds: dedupe(rule.templateIds),
  };
}

export function assertRuleDeletable(rule: MappingRule): void {
  if (!rule.isDefault) return;
  throw validationError(
    'default mapping rule cannot be deleted',
    [{ field: 'isDefault', issue: 'default_rule_delete', message: `rule ${rule.name} is the default` }],
    { rule_id: rule.id },
  );
}
