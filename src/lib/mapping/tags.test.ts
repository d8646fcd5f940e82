import { describe, expect, it } from 'vitest';

import { buildHostTags } from '@/lib/mapping/tags';
import { parseSyncSettings } from '@/lib/settings/sync-settings';
import { makeDevice } from '@/test/fixtures';

describe('buildHostTags', () => {
  it('emits the default tag, carried inventory tags and field selections', () => {
    const settings = parseSyncSettings({
      tags: {
        defaultTag: 'inventory-id',
        prefix: 'inv-',
        device: {
          tags: ['production', 'pci'],
          fields: [
            { name: 'site', path: 'site.name' },
            { name: 'region', path: 'site.region.name' },
            { name: 'cluster', path: 'cluster.name' },
            { name: 'platform', path: 'platform.name', enabled: false },
          ],
        },
      },
    }).tags;

    const device = makeDevice({ id: 7, tags: ['production', 'other'] });

    expect(buildHostTags(device, settings)).toEqual([
      { tag: 'inv-inventory-id', value: '7' },
      { tag: 'inv-production', value: 'production' },
      { tag: 'inv-site', value: 'DC1' },
      { tag: 'inv-region', value: 'North' },
    ]);
  });

  it('expands list values and dedupes after formatting', () => {
    const settings = parseSyncSettings({
      tags: {
        nameFormatting: 'upper',
        device: { tags: ['Web'], fields: [{ name: 'tags', path: 'tags' }] },
      },
    }).tags;

    expect(buildHostTags(makeDevice({ tags: ['Web', 'web', 'edge'] }), settings)).toEqual([
      { tag: 'WEB', value: 'Web' },
      { tag: 'WEB', value: 'web' },
      { tag: 'EDGE', value: 'edge' },
    ]);
  });

  it('uses the related object name for non-scalar values', () => {
    const settings = parseSyncSettings({ tags: { device: { fields: [{ name: 'role', path: 'role' }] } } }).tags;
    expect(buildHostTags(makeDevice(), settings)).toEqual([{ tag: 'role', value: 'web' }]);
  });
});
