import { beforeEach, describe, expect, it, vi } from 'vitest';

import { importHost } from '@/lib/provisioning/import-host';
import { makeEngine } from '@/test/engine';
import { makeDevice, makeHostConfig } from '@/test/fixtures';

import type { RemoteInterface } from '@/lib/monitoring/remote-records';

const device = makeDevice();

const agent: RemoteInterface = {
  interfaceid: '31',
  type: '1',
  main: '1',
  useip: '1',
  ip: '10.0.0.100',
  dns: 'device-100.example.test',
  port: '10050',
  details: null,
};

function setup(interfaces: RemoteInterface[] = [agent], templateId = '10001') {
  const engine = makeEngine({ objects: [device] });
  engine.store.state.catalog.push({
    kind: 'template',
    remoteId: '10001',
    name: 'Linux by agent',
    proxyGroupId: null,
    markedForDeletion: false,
  });
  engine.service.addHost({
    hostid: '601',
    host: 'device-100',
    groups: [{ groupid: '2' }],
    parentTemplates: [{ templateid: templateId }],
    interfaces,
    inventory_mode: '0',
    monitored_by: '1',
    proxyid: '55',
  });
  return engine;
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

describe('importHost', () => {
  it('adopts the remote host with its ids linked', async () => {
    const { deps, store, audit } = setup();

    const hostConfig = await importHost(deps, { ref: device.ref });

    expect(hostConfig).toMatchObject({
      id: 1,
      name: 'z-device-100',
      remoteHostId: '601',
      hostGroupIds: ['2'],
      templateIds: ['10001'],
      monitoredBy: 'proxy',
      proxyId: '55',
      proxyGroupId: null,
      inSync: true,
    });
    expect(hostConfig.interfaces).toEqual([
      {
        id: 2,
        kind: 'agent',
        name: 'device-100-agent',
        remoteInterfaceId: '31',
        connection: 'ip',
        main: true,
        port: 10050,
        networkInterfaceId: 1000,
        ipAddressId: 1001,
      },
    ]);
    expect((await store.getHostConfig(1))?.inSync).toBe(true);
    expect(audit.logCreationEvent).toHaveBeenCalledWith(expect.objectContaining({ changes: { importedFrom: '601' } }));
  });

  it('reads snmp parameters back from the remote interface', async () => {
    const { deps } = setup([
      { ...agent, interfaceid: '32', type: '2', port: '161', details: { version: '2', community: 'public', bulk: '0' } },
    ]);

    const hostConfig = await importHost(deps, { ref: device.ref });

    expect(hostConfig.interfaces[0]).toMatchObject({
      kind: 'snmp',
      snmp: { version: 2, community: 'public', bulk: false, maxRepetitions: 10 },
    });
  });

  it('rejects templates the catalog does not know', async () => {
    const { deps } = setup([agent], '10999');

    await expect(importHost(deps, { ref: device.ref })).rejects.toMatchObject({
      code: 'VALIDATION_FAILED',
      details: [{ field: 'templates', issue: 'unknown_template', message: '10999' }],
    });
  });

  it('rejects interfaces on addresses the object does not own', async () => {
    const { deps, store } = setup([{ ...agent, ip: '192.0.2.50' }]);

    await expect(importHost(deps, { ref: device.ref })).rejects.toMatchObject({
      details: [{ field: 'interfaces.0', issue: 'address_not_on_object', message: '192.0.2.50 is not assigned to device-100' }],
    });
    expect(await store.listHostConfigs()).toEqual([]);
  });

  it('needs a remote host with the object name', async () => {
    const { deps, service } = setup();
    service.hosts.clear();

    await expect(importHost(deps, { ref: device.ref })).rejects.toMatchObject({ code: 'REMOTE_HOST_NOT_FOUND' });
  });

  it('refuses objects that are already configured', async () => {
    const { deps, store } = setup();
    store.state.hostConfigs.push(makeHostConfig({ id: 50 }));

    await expect(importHost(deps, { ref: device.ref })).rejects.toMatchObject({
      details: [{ field: 'object', issue: 'already_configured' }],
    });
  });
});
