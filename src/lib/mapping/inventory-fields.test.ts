import { describe, expect, it, vi } from 'vitest';

import { buildInventoryFields, isInventoryProperty } from '@/lib/mapping/inventory-fields';
import { parseSyncSettings } from '@/lib/settings/sync-settings';
import { makeDevice } from '@/test/fixtures';

describe('buildInventoryFields', () => {
  it('takes the first resolving path per inventory key', () => {
    const settings = parseSyncSettings({
      inventory: {
        device: [
          { invkey: 'serialno_a', paths: ['serial'] },
          { invkey: 'location', paths: ['cluster.name', 'site.region.name', 'site.name'] },
          { invkey: 'os', paths: ['platform.name'], enabled: false },
          { invkey: 'contact', paths: ['customFields.owner'] },
        ],
      },
    }).inventory;

    expect(buildInventoryFields(makeDevice({ id: 5 }), settings)).toEqual({ serialno_a: 'SN-5', location: 'North' });
  });

  it('skips keys the remote inventory does not know', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const settings = parseSyncSettings({ inventory: { device: [{ invkey: 'favorite_color', paths: ['serial'] }] } }).inventory;

    expect(buildInventoryFields(makeDevice(), settings)).toEqual({});
    expect(JSON.parse(String(spy.mock.calls[0]?.[0]))).toMatchObject({
      event_type: 'inventory.illegal_property',
      invkey: 'favorite_color',
    });
    spy.mockRestore();
  });

  it('knows the standard inventory properties', () => {
    expect(isInventoryProperty('serialno_a')).toBe(true);
    expect(isInventoryProperty('poc_2_notes')).toBe(true);
    expect(isInventoryProperty('serial')).toBe(false);
  });
});
