import { beforeEach, describe, expect, it, vi } from 'vitest';

import { importCatalog } from '@/lib/catalog/import-catalog';
import { FakeMonitoringService } from '@/test/fake-monitoring';
import { MemoryStore } from '@/test/memory-store';

import type { CatalogItem } from '@/lib/catalog/types';

function template(remoteId: string, markedForDeletion = false): CatalogItem {
  return { kind: 'template', remoteId, name: `template-${remoteId}`, proxyGroupId: null, markedForDeletion };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

describe('importCatalog', () => {
  it('mirrors every kind and drops stale entries', async () => {
    const service = new FakeMonitoringService();
    service.hostGroups.push({ groupid: '2', name: 'Linux servers' });
    service.templates.push({ templateid: '10001', name: 'Linux by agent' });
    service.proxies.push({ proxyid: '55', name: 'edge-proxy', proxy_groupid: '8' }, { proxyid: '56', name: 'lab', proxy_groupid: '0' });
    service.proxyGroups.push({ proxy_groupid: '8', name: 'edge' });
    const store = new MemoryStore({ catalog: [template('10001', true), template('10400')] });

    const summary = await importCatalog({ store, service, maxDeletions: 3 });

    expect(summary).toEqual({
      host_group: { upserted: 1, deleted: 0, marked: 0 },
      template: { upserted: 1, deleted: 1, marked: 0 },
      proxy: { upserted: 2, deleted: 0, marked: 0 },
      proxy_group: { upserted: 1, deleted: 0, marked: 0 },
    });
    expect(await store.listCatalogItems('template')).toEqual([
      { kind: 'template', remoteId: '10001', name: 'Linux by agent', proxyGroupId: null, markedForDeletion: false },
    ]);
    expect((await store.listCatalogItems('proxy')).map((p) => [p.remoteId, p.proxyGroupId])).toEqual([
      ['55', '8'],
      ['56', null],
    ]);
  });

  it('marks instead of deleting too many entries', async () => {
    const service = new FakeMonitoringService();
    const store = new MemoryStore({ catalog: [template('1'), template('2'), template('3')] });

    await expect(importCatalog({ store, service, maxDeletions: 2 })).rejects.toMatchObject({
      code: 'CATALOG_TOO_MANY_DELETIONS',
      redacted_context: { marked: { template: 3 }, max_deletions: 2 },
    });
    expect((await store.listCatalogItems('template')).map((t) => t.markedForDeletion)).toEqual([true, true, true]);
  });

  it('deletes exactly the maximum', async () => {
    const service = new FakeMonitoringService();
    const store = new MemoryStore({ catalog: [template('1'), template('2')] });

    const summary = await importCatalog({ store, service, maxDeletions: 2 });

    expect(summary.template).toEqual({ upserted: 0, deleted: 2, marked: 0 });
    expect(await store.listCatalogItems('template')).toEqual([]);
  });
});
