import { ErrorCode } from '@/lib/errors/error-codes';
import { logEvent } from '@/lib/logging/logger';

import type { AppError } from '@/lib/errors/error';
import type { InterfaceKind } from '@/lib/host-config/types';
import type { InventoryObject } from '@/lib/inventory/types';
import type { InterfaceTypeFilter, MappingRule } from '@/lib/mapping/types';

type FilterDimension = 'siteIds' | 'roleIds' | 'platformIds';

const DIMENSIONS: ReadonlyArray<{ key: FilterDimension; read: (o: InventoryObject) => number | null }> = [
  { key: 'siteIds', read: (o) => o.site?.id ?? null },
  { key: 'roleIds', read: (o) => o.role?.id ?? null },
  { key: 'platformIds', read: (o) => o.platform?.id ?? null },
];

export function ruleSpecificity(rule: MappingRule): number {
  return DIMENSIONS.filter((d) => rule[d.key].length > 0).length;
}

export function interfaceTypeAccepts(rule: MappingRule, requested: InterfaceTypeFilter): boolean {
  return rule.interfaceType === 'any' || rule.interfaceType === requested;
}

/** Every non-empty filter set contains the object's attribute. */
export function ruleFiltersMatch(rule: MappingRule, object: InventoryObject): boolean {
  return DIMENSIONS.every((d) => {
    const ids = rule[d.key];
    if (ids.length === 0) return true;
    const value = d.read(object);
    return value !== null && ids.includes(value);
  });
}

export function findDefaultRule(rules: MappingRule[], object: InventoryObject): MappingRule {
  const defaults = rules.filter((r) => r.isDefault && r.objectKind === object.ref.kind);
  if (defaults.length === 1 && defaults[0]) return defaults[0];

  const error: AppError =
    defaults.length === 0
      ? {
          code: ErrorCode.NO_DEFAULT_MAPPING,
          category: 'config',
          message: `no default ${object.ref.kind} mapping rule defined; unable to map ${object.name}`,
          retryable: false,
          redacted_context: { object_kind: object.ref.kind, object_id: object.ref.id },
        }
      : {
          code: ErrorCode.MULTIPLE_DEFAULT_MAPPINGS,
          category: 'config',
          message: `multiple default ${object.ref.kind} mapping rules defined; unable to map ${object.name}`,
          retryable: false,
          redacted_context: { object_kind: object.ref.kind, rule_ids: defaults.map((r) => r.id) },
        };

  logEvent({ level: 'error', service: 'engine', event_type: 'mapping.default_missing', error });
  throw error;
}

/**
 * Select the most specific rule for an object. Equal-specificity winners are a configuration
 * error, never a silent pick.
 */
export function matchRule(object: InventoryObject, interfaceType: InterfaceTypeFilter, rules: MappingRule[]): MappingRule {
  const fallback = findDefaultRule(rules, object);

  const candidates = rules.filter(
    (r) => !r.isDefault && r.objectKind === object.ref.kind && interfaceTypeAccepts(r, interfaceType) && ruleFiltersMatch(r, object),
  );
  if (candidates.length === 0) return fallback;

  const top = Math.max(...candidates.map(ruleSpecificity));
  const winners = candidates.filter((r) => ruleSpecificity(r) === top);
  if (winners.length === 1 && winners[0]) return winners[0];

  const error: AppError = {
    code: ErrorCode.MAPPING_AMBIGUOUS,
    category: 'config',
    message: `mapping rules ${winners.map((r) => r.name).join(', ')} match ${object.name} with equal specificity`,
    retryable: false,
    redacted_context: {
      object_kind: object.ref.kind,
      object_id: object.ref.id,
      interface_type: interfaceType,
      rule_ids: winners.map((r) => r.id),
      specificity: top,
    },
  };
  logEvent({ level: 'warn', service: 'engine', event_type: 'mapping.ambiguous', error });
  throw error;
}

/** Interface family the object's host is (or will be) monitored through. */
export function interfaceTypeForKinds(kinds: InterfaceKind[]): InterfaceTypeFilter {
  if (kinds.includes('agent')) return 'agent';
  if (kinds.includes('snmp')) return 'snmp';
  return 'any';
}

/**
 * Objects a rule would win for: they satisfy its filters and no strictly more specific
 * non-default rule with a compatible interface filter claims them.
 */
export function matchingObjects(rule: MappingRule, rules: MappingRule[], objects: InventoryObject[]): InventoryObject[] {
  const own = objects.filter((o) => o.ref.kind === rule.objectKind && ruleFiltersMatch(rule, o));
  if (rule.isDefault) {
    const others = rules.filter((r) => !r.isDefault && r.objectKind === rule.objectKind);
    return own.filter((o) => !others.some((r) => ruleFiltersMatch(r, o)));
  }

  const mySpecificity = ruleSpecificity(rule);
  const stronger = rules.filter(
    (r) =>
      r.id !== rule.id &&
      !r.isDefault &&
      r.objectKind === rule.objectKind &&
      ruleSpecificity(r) > mySpecificity &&
      (r.interfaceType === rule.interfaceType || r.interfaceType === 'any'),
  );
  return own.filter((o) => !stronger.some((r) => ruleFiltersMatch(r, o)));
}
