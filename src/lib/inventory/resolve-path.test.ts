import { describe, expect, it } from 'vitest';

import { isEmptyValue, resolveFirst, resolvePath } from '@/lib/inventory/resolve-path';

const device = {
  name: 'web-01',
  site: { id: 1, name: 'DC1', region: { id: 9, name: 'Nordics' } },
  platform: null,
  tags: ['prod', 'web'],
  interfaces: [{ name: 'eth0' }],
  customFields: { owner: '', rack: 'R12' },
};

describe('resolvePath', () => {
  it('walks nested objects', () => {
    expect(resolvePath(device, 'site.region.name')).toBe('Nordics');
    expect(resolvePath(device, 'name')).toBe('web-01');
  });

  it('returns null for missing or null intermediate links', () => {
    expect(resolvePath(device, 'platform.name')).toBeNull();
    expect(resolvePath(device, 'cluster.name')).toBeNull();
    expect(resolvePath(device, 'site.region.parent.name')).toBeNull();
    expect(resolvePath(null, 'name')).toBeNull();
  });

  it('indexes arrays numerically and returns arrays as-is', () => {
    expect(resolvePath(device, 'interfaces.0.name')).toBe('eth0');
    expect(resolvePath(device, 'interfaces.name')).toBeNull();
    expect(resolvePath(device, 'tags')).toEqual(['prod', 'web']);
  });

  it('does not reach into prototype properties', () => {
    expect(resolvePath(device, 'name.length')).toBeNull();
    expect(resolvePath(device, 'toString')).toBeNull();
  });

  it('treats an empty path as unresolvable', () => {
    expect(resolvePath(device, '')).toBeNull();
  });
});

describe('resolveFirst', () => {
  it('skips empty values in the fallback chain', () => {
    expect(resolveFirst(device, ['customFields.owner', 'platform.name', 'customFields.rack'])).toEqual({
      path: 'customFields.rack',
      value: 'R12',
    });
  });

  it('returns null when nothing resolves', () => {
    expect(resolveFirst(device, ['platform.name', 'customFields.owner'])).toBeNull();
  });
});

describe('isEmptyValue', () => {
  it('treats blank strings and empty arrays as empty', () => {
    expect(isEmptyValue('  ')).toBe(true);
    expect(isEmptyValue([])).toBe(true);
    expect(isEmptyValue(0)).toBe(false);
    expect(isEmptyValue(false)).toBe(false);
  });
});
