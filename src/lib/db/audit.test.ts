import { describe, expect, it } from 'vitest';

import { auditRow } from '@/lib/db/audit';

describe('auditRow', () => {
  it('stores changes as plain json', () => {
    const row = auditRow('update', {
      model: 'host_config',
      objectId: 3,
      objectName: 'z-device-100',
      changes: { lastSyncUpdate: new Date('2026-03-01T12:00:00.000Z'), proxyId: undefined, templateIds: ['10001'] },
    });

    expect(row).toEqual({
      action: 'update',
      model: 'host_config',
      objectId: 3,
      objectName: 'z-device-100',
      changes: { lastSyncUpdate: '2026-03-01T12:00:00.000Z', templateIds: ['10001'] },
    });
  });

  it('leaves changes empty when none were given', () => {
    expect(auditRow('delete', { model: 'mapping_rule', objectId: 2, objectName: 'web' }).changes).toBeNull();
  });
});
