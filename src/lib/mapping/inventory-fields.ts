import { logEvent } from '@/lib/logging/logger';
import { resolvePath } from '@/lib/inventory/resolve-path';

import inventoryProperties from '@/lib/mapping/inventory-properties.json';

import type { InventoryObject } from '@/lib/inventory/types';
import type { SyncSettings } from '@/lib/settings/sync-settings';

const LEGAL_PROPERTIES: ReadonlySet<string> = new Set(inventoryProperties);

export function isInventoryProperty(key: string): boolean {
  return LEGAL_PROPERTIES.has(key);
}

/** Remote inventory fields for an object; each key takes the first path that resolves. */
export function buildInventoryFields(object: InventoryObject, settings: SyncSettings['inventory']): Record<string, string> {
  const inventory: Record<string, string> = {};

  for (const field of settings[object.ref.kind]) {
    if (!field.enabled) continue;
    if (!isInventoryProperty(field.invkey)) {
      logEvent({
        level: 'error',
        service: 'engine',
        event_type: 'inventory.illegal_property',
        invkey: field.invkey,
        object_kind: object.ref.kind,
      });
      continue;
    }

    for (const path of field.paths) {
      const value = resolvePath(object, path);
      if (value === null) continue;
      inventory[field.invkey] = typeof value === 'object' ? JSON.stringify(value) : String(value);
      break;
    }
  }

  return inventory;
}
