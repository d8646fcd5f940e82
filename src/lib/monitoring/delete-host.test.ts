import { describe, expect, it } from 'vitest';

import { deleteRemoteHost } from '@/lib/monitoring/delete-host';
import { defaultSyncSettings } from '@/lib/settings/sync-settings';
import { FakeMonitoringService } from '@/test/fake-monitoring';

const settings = defaultSyncSettings();

describe('deleteRemoteHost', () => {
  it('archives into the graveyard group in soft mode', async () => {
    const service = new FakeMonitoringService();
    service.addHost({ hostid: '501', host: 'device-100', groups: [{ groupid: '2' }] });

    const result = await deleteRemoteHost({ service, hostId: '501', settings });

    expect(result).toEqual({ outcome: 'archived', archivedName: 'device-100_archived', graveyardGroupId: '10101' });
    expect(service.hosts.get('501')).toMatchObject({
      host: 'device-100_archived',
      status: '1',
      groups: [{ groupid: '10101' }],
    });
    expect(service.hostGroups).toEqual([{ groupid: '10101', name: 'graveyard' }]);
  });

  it('reuses an existing graveyard group and avoids name clashes', async () => {
    const service = new FakeMonitoringService();
    service.hostGroups.push({ groupid: '77', name: 'graveyard' });
    service.addHost({ hostid: '400', host: 'device-100_archived' });
    service.addHost({ hostid: '501', host: 'device-100' });

    const result = await deleteRemoteHost({ service, hostId: '501', settings });

    expect(result).toEqual({ outcome: 'archived', archivedName: 'device-100_archived-1', graveyardGroupId: '77' });
    expect(service.callsTo('createHostGroup')).toHaveLength(0);
  });

  it('deletes outright in hard mode', async () => {
    const service = new FakeMonitoringService();
    service.addHost({ hostid: '501', host: 'device-100' });

    const result = await deleteRemoteHost({ service, hostId: '501', settings: { ...settings, deleteMode: 'hard' } });

    expect(result).toEqual({ outcome: 'deleted' });
    expect(service.hosts.has('501')).toBe(false);
  });

  it('treats a missing host as already gone', async () => {
    const service = new FakeMonitoringService();

    expect(await deleteRemoteHost({ service, hostId: '501', settings })).toEqual({ outcome: 'absent' });
    expect(service.callsTo('deleteHost')).toHaveLength(0);
  });
});
