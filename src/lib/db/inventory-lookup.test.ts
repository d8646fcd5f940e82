import { describe, expect, it } from 'vitest';

import { parseInventoryRow } from '@/lib/db/inventory-lookup';

describe('parseInventoryRow', () => {
  it('fills absent attributes with empty values', () => {
    const object = parseInventoryRow({ kind: 'virtual_machine', objectId: 7, name: 'vm-7', data: {} });

    expect(object).toEqual({
      ref: { kind: 'virtual_machine', id: 7 },
      name: 'vm-7',
      site: null,
      role: null,
      platform: null,
      cluster: null,
      primaryIp4: null,
      interfaces: [],
      tags: [],
      customFields: {},
      serial: null,
      description: null,
    });
  });

  it('keeps interfaces and addresses', () => {
    const object = parseInventoryRow({
      kind: 'device',
      objectId: 3,
      name: 'sw-3',
      data: {
        site: { id: 1, name: 'DC1', region: { id: 10, name: 'North' } },
        primaryIp4: { id: 11, address: '10.0.0.3/24' },
        interfaces: [{ id: 5, name: 'eth0', ipAddresses: [{ id: 11, address: '10.0.0.3/24', dnsName: 'sw-3.example.test' }] }],
      },
    });

    expect(object.site?.region?.name).toBe('North');
    expect(object.primaryIp4).toEqual({ id: 11, address: '10.0.0.3/24', dnsName: null });
    expect(object.interfaces[0]?.ipAddresses[0]?.dnsName).toBe('sw-3.example.test');
  });

  it('rejects a malformed record', () => {
    expect(() =>
      parseInventoryRow({ kind: 'device', objectId: 4, name: 'bad', data: { tags: 'linux' } }),
    ).toThrow(expect.objectContaining({ code: 'DB_READ_FAILED', message: 'inventory record device:4 is malformed' }));
  });
});
