import { normalizeMainFlags, validateInterfaces } from '@/lib/host-config/interfaces';

import type { CatalogEntry, CatalogItem, CatalogKind } from '@/lib/catalog/types';
import type { HostConfig, HostConfigDraft } from '@/lib/host-config/types';
import type { InventoryObject, InventoryObjectKind, InventoryObjectRef } from '@/lib/inventory/types';
import type { MaintenanceWindow, MaintenanceWindowDraft } from '@/lib/maintenance/types';
import type { MappingRule, MappingRuleDraft } from '@/lib/mapping/types';

export type SyncStatus = { inSync: boolean; lastSyncUpdate: Date };

/**
 * Local persistence used by the engine. Writes made inside `transaction` are committed together
 * or not at all.
 */
export type SyncStore = {
  transaction: <T>(fn: (tx: SyncStore) => Promise<T>) => Promise<T>;

  listMappingRules: (kind?: InventoryObjectKind) => Promise<MappingRule[]>;
  getMappingRule: (id: number) => Promise<MappingRule | null>;
  insertMappingRule: (draft: MappingRuleDraft) => Promise<MappingRule>;
  updateMappingRule: (rule: MappingRule) => Promise<MappingRule>;
  deleteMappingRule: (id: number) => Promise<void>;

  getHostConfig: (id: number) => Promise<HostConfig | null>;
  findHostConfigByObject: (ref: InventoryObjectRef) => Promise<HostConfig | null>;
  listHostConfigs: () => Promise<HostConfig[]>;
  /** Interfaces with a `null` id are inserted; persisted ones missing from the list are removed. */
  insertHostConfig: (draft: HostConfigDraft) => Promise<HostConfig>;
  saveHostConfig: (hostConfig: HostConfig) => Promise<HostConfig>;
  deleteHostConfig: (id: number) => Promise<void>;
  updateSyncStatus: (id: number, status: SyncStatus) => Promise<void>;

  listMaintenanceWindows: () => Promise<MaintenanceWindow[]>;
  getMaintenanceWindow: (id: number) => Promise<MaintenanceWindow | null>;
  insertMaintenanceWindow: (draft: MaintenanceWindowDraft) => Promise<MaintenanceWindow>;
  saveMaintenanceWindow: (window: MaintenanceWindow) => Promise<MaintenanceWindow>;
  deleteMaintenanceWindow: (id: number) => Promise<void>;

  listCatalogItems: (kind: CatalogKind) => Promise<CatalogItem[]>;
  upsertCatalogItems: (kind: CatalogKind, entries: CatalogEntry[]) => Promise<void>;
  deleteCatalogItems: (kind: CatalogKind, remoteIds: string[]) => Promise<void>;
  markCatalogItems: (kind: CatalogKind, remoteIds: string[]) => Promise<void>;
};

function prepare<T extends HostConfigDraft>(hostConfig: T, object: InventoryObject, previous: HostConfig | null): T {
  const prepared = { ...hostConfig, interfaces: normalizeMainFlags(hostConfig.interfaces, previous?.interfaces) };
  validateInterfaces(prepared, object);
  return prepared;
}

/**
 * Every host configuration write goes through here so the interface invariants always hold. A
 * newly flagged main interface demotes the one stored as main.
 */
export async function writeHostConfig(store: SyncStore, hostConfig: HostConfig, object: InventoryObject): Promise<HostConfig> {
  const persisted = await store.getHostConfig(hostConfig.id);
  return store.saveHostConfig(prepare(hostConfig, object, persisted));
}

export async function insertHostConfig(
  store: SyncStore,
  draft: HostConfigDraft,
  object: InventoryObject,
): Promise<HostConfig> {
  return store.insertHostConfig(prepare(draft, object, null));
}
