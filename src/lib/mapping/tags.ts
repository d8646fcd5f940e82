import { resolvePath } from '@/lib/inventory/resolve-path';

import type { InventoryObject } from '@/lib/inventory/types';
import type { SyncSettings } from '@/lib/settings/sync-settings';

export type HostTag = { tag: string; value: string };

function formatName(name: string, formatting: SyncSettings['tags']['nameFormatting']): string {
  if (formatting === 'upper') return name.toUpperCase();
  if (formatting === 'lower') return name.toLowerCase();
  return name;
}

function scalarToString(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  if (typeof value === 'object' && 'name' in value && typeof value.name === 'string') return value.name;
  return null;
}

/**
 * Remote host tags for an object: the default identity tag, mapped inventory tags the object
 * carries, and configured field selections. List values expand into one tag per item.
 */
export function buildHostTags(object: InventoryObject, settings: SyncSettings['tags']): HostTag[] {
  const mapping = settings[object.ref.kind];
  const prefix = settings.prefix;
  const raw: HostTag[] = [];

  if (settings.defaultTag) raw.push({ tag: `${prefix}${settings.defaultTag}`, value: String(object.ref.id) });

  for (const name of mapping.tags) {
    if (object.tags.includes(name)) raw.push({ tag: `${prefix}${name}`, value: name });
  }

  for (const field of mapping.fields) {
    if (!field.enabled) continue;
    const value = resolvePath(object, field.path);
    if (value === null) continue;

    if (Array.isArray(value)) {
      for (const item of value) {
        const label = scalarToString(item);
        if (label) raw.push({ tag: `${prefix}${label}`, value: label });
      }
      continue;
    }

    const text = scalarToString(value);
    if (text !== null) raw.push({ tag: `${prefix}${field.name}`, value: text });
  }

  const seen = new Set<string>();
  const out: HostTag[] = [];
  for (const t of raw) {
    const tag = formatName(t.tag, settings.nameFormatting);
    const key = `${tag}\u0000${t.value}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push({ tag, value: t.value });
  }
  return out;
}
