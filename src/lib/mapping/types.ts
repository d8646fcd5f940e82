import type { InventoryObjectKind } from '@/lib/inventory/types';

export type InterfaceTypeFilter = 'any' | 'agent' | 'snmp';

export type MappingRule = {
  id: number;
  name: string;
  objectKind: InventoryObjectKind;
  isDefault: boolean;
  description: string | null;
  /** Empty filter set matches anything. */
  siteIds: number[];
  roleIds: number[];
  platformIds: number[];
  interfaceType: InterfaceTypeFilter;
  hostGroupIds: string[];
  templateIds: string[];
  proxyId: string | null;
  proxyGroupId: string | null;
};

export type MappingRuleDraft = Omit<MappingRule, 'id'>;
