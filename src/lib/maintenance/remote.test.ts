import { beforeEach, describe, expect, it, vi } from 'vitest';

import {
  cleanupExpiredMaintenance,
  createRemoteMaintenance,
  deleteMaintenance,
  refreshMaintenanceStatuses,
  scheduleMaintenance,
} from '@/lib/maintenance/remote';
import { activeWindow, NOW } from '@/test/engine';
import { FakeMonitoringService } from '@/test/fake-monitoring';
import { makeDevice, makeHostConfig, SITE_DC2 } from '@/test/fixtures';
import { MemoryStore, memoryInventory } from '@/test/memory-store';

import type { MaintenanceWindow } from '@/lib/maintenance/types';
import type { AuditSink } from '@/lib/provisioning/collaborators';

const inventory = memoryInventory([makeDevice({ id: 100 }), makeDevice({ id: 101, site: SITE_DC2 }), makeDevice({ id: 102 })]);

function setup(windows: MaintenanceWindow[]) {
  const store = new MemoryStore({
    hostConfigs: [
      makeHostConfig({ id: 1, remoteHostId: '501' }),
      makeHostConfig({ id: 2, name: 'z-device-101', object: { kind: 'device', id: 101 }, remoteHostId: '502' }),
      makeHostConfig({ id: 3, name: 'z-device-102', object: { kind: 'device', id: 102 } }),
    ],
    windows,
  });
  return { store, service: new FakeMonitoringService() };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

describe('createRemoteMaintenance', () => {
  it('targets the provisioned hosts of the site', async () => {
    const { store, service } = setup([activeWindow({ status: 'pending' })]);

    const saved = await createRemoteMaintenance({ store, service, inventory, windowId: 90, now: NOW });

    expect(saved).toMatchObject({ remoteId: '10101', status: 'active' });
    expect(service.maintenances.get('10101')?.hostids).toEqual(['501']);
  });

  it('marks the window failed when nothing can be created', async () => {
    const { store, service } = setup([activeWindow({ status: 'pending', targets: [{ kind: 'site', id: 9 }] })]);

    await expect(createRemoteMaintenance({ store, service, inventory, windowId: 90, now: NOW })).rejects.toMatchObject({
      code: 'VALIDATION_FAILED',
    });
    expect((await store.getMaintenanceWindow(90))?.status).toBe('failed');
    expect(service.callsTo('createMaintenance')).toHaveLength(0);
  });

  it('reports an unknown window', async () => {
    const { store, service } = setup([]);

    await expect(createRemoteMaintenance({ store, service, inventory, windowId: 1, now: NOW })).rejects.toMatchObject({
      code: 'MAINTENANCE_WINDOW_NOT_FOUND',
    });
  });
});

describe('scheduleMaintenance', () => {
  function audit() {
    return {
      logCreationEvent: vi.fn<AuditSink['logCreationEvent']>(async () => {}),
      logUpdateEvent: vi.fn<AuditSink['logUpdateEvent']>(async () => {}),
      logDeletionEvent: vi.fn<AuditSink['logDeletionEvent']>(async () => {}),
    };
  }

  it('stores, audits and creates the window remotely', async () => {
    const { store, service } = setup([]);
    const sink = audit();

    const window = await scheduleMaintenance({
      store,
      service,
      inventory,
      audit: sink,
      now: NOW,
      input: {
        name: 'kernel upgrade',
        startTime: '2026-03-01T11:00:00.000Z',
        endTime: '2026-03-01T13:00:00.000Z',
        targets: [{ kind: 'host_config', id: 2 }],
      },
    });

    expect(window).toMatchObject({ id: 4, remoteId: '10101', status: 'active', disableDataCollection: false });
    expect(sink.logCreationEvent).toHaveBeenCalledWith({ model: 'maintenance_window', objectId: 4, objectName: 'kernel upgrade' });
    expect(service.maintenances.get('10101')?.hostids).toEqual(['502']);
  });

  it('rejects a window that ends before it starts', async () => {
    const { store, service } = setup([]);
    const sink = audit();

    await expect(
      scheduleMaintenance({
        store,
        service,
        inventory,
        audit: sink,
        now: NOW,
        input: {
          name: 'backwards',
          startTime: '2026-03-01T13:00:00.000Z',
          endTime: '2026-03-01T11:00:00.000Z',
          targets: [{ kind: 'site', id: 1 }],
        },
      }),
    ).rejects.toMatchObject({ code: 'VALIDATION_FAILED', details: [{ field: 'endTime' }] });
    expect(await store.listMaintenanceWindows()).toEqual([]);
  });
});

describe('deleteMaintenance', () => {
  it('deletes locally even when the remote delete fails', async () => {
    const { store, service } = setup([activeWindow({ remoteId: '77' })]);
    service.failNext('deleteMaintenance');

    const result = await deleteMaintenance({ store, service, windowId: 90 });

    expect(result.warning).toBe('remote maintenance 77 could not be deleted: connection reset');
    expect(await store.listMaintenanceWindows()).toEqual([]);
  });
});

describe('refreshMaintenanceStatuses', () => {
  it('moves windows along the clock', async () => {
    const { store } = setup([
      activeWindow({ status: 'pending' }),
      activeWindow({ id: 91, status: 'active', endTime: new Date('2026-03-01T11:30:00.000Z') }),
      activeWindow({ id: 92, status: 'failed' }),
    ]);

    expect(await refreshMaintenanceStatuses({ store, now: NOW })).toEqual({ changed: 2 });
    expect((await store.listMaintenanceWindows()).map((w) => w.status)).toEqual(['active', 'expired', 'failed']);
  });
});

describe('cleanupExpiredMaintenance', () => {
  it('removes windows past the grace period only', async () => {
    const { store, service } = setup([
      activeWindow({ id: 91, remoteId: '71', endTime: new Date('2026-03-01T10:30:00.000Z') }),
      activeWindow({ id: 92, remoteId: '72', endTime: new Date('2026-03-01T11:30:00.000Z') }),
    ]);

    const result = await cleanupExpiredMaintenance({ store, service, now: NOW, graceMinutes: 60 });

    expect(result).toEqual({ deleted: 1, warnings: [] });
    expect(service.callsTo('deleteMaintenance').map((c) => c.args)).toEqual([['71']]);
    expect((await store.listMaintenanceWindows()).map((w) => w.id)).toEqual([92]);
  });
});
