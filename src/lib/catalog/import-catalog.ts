import { ErrorCode } from '@/lib/errors/error-codes';
import { logEvent } from '@/lib/logging/logger';
import { CATALOG_KINDS } from '@/lib/catalog/types';

import type { CatalogEntry, CatalogKind } from '@/lib/catalog/types';
import type { AppError } from '@/lib/errors/error';
import type { MonitoringService } from '@/lib/monitoring/service';
import type { SyncStore } from '@/lib/provisioning/store';

export type CatalogKindSummary = {
  upserted: number;
  deleted: number;
  /** Stale entries kept and flagged because there were too many to delete. */
  marked: number;
};

export type CatalogImportSummary = Record<CatalogKind, CatalogKindSummary>;

async function fetchEntries(service: MonitoringService, kind: CatalogKind): Promise<CatalogEntry[]> {
  switch (kind) {
    case 'host_group':
      return (await service.listHostGroups()).map((g) => ({ remoteId: g.groupid, name: g.name, proxyGroupId: null }));
    case 'template':
      return (await service.listTemplates()).map((t) => ({ remoteId: t.templateid, name: t.name, proxyGroupId: null }));
    case 'proxy':
      return (await service.listProxies()).map((p) => ({
        remoteId: p.proxyid,
        name: p.name,
        proxyGroupId: p.proxy_groupid === '0' ? null : p.proxy_groupid,
      }));
    case 'proxy_group':
      return (await service.listProxyGroups()).map((g) => ({ remoteId: g.proxy_groupid, name: g.name, proxyGroupId: null }));
  }
}

/**
 * Mirror the remote host groups, templates, proxies and proxy groups. More than `maxDeletions`
 * stale entries of one kind are marked instead of deleted and the import fails with
 * CATALOG_TOO_MANY_DELETIONS once every kind has been processed.
 */
export async function importCatalog(args: {
  store: SyncStore;
  service: MonitoringService;
  maxDeletions: number;
}): Promise<CatalogImportSummary> {
  const empty = (): CatalogKindSummary => ({ upserted: 0, deleted: 0, marked: 0 });
  const summary: CatalogImportSummary = { host_group: empty(), template: empty(), proxy: empty(), proxy_group: empty() };
  const refused: Record<string, number> = {};

  for (const kind of CATALOG_KINDS) {
    const entries = await fetchEntries(args.service, kind);
    const remoteIds = new Set(entries.map((e) => e.remoteId));

    const kindSummary = await args.store.transaction(async (tx) => {
      const stale = (await tx.listCatalogItems(kind)).filter((item) => !remoteIds.has(item.remoteId)).map((i) => i.remoteId);
      await tx.upsertCatalogItems(kind, entries);

      if (stale.length > args.maxDeletions) {
        await tx.markCatalogItems(kind, stale);
        return { upserted: entries.length, deleted: 0, marked: stale.length };
      }
      await tx.deleteCatalogItems(kind, stale);
      return { upserted: entries.length, deleted: stale.length, marked: 0 };
    });

    summary[kind] = kindSummary;
    if (kindSummary.marked > 0) refused[kind] = kindSummary.marked;
  }

  logEvent({ level: 'info', service: 'engine', event_type: 'catalog.imported', summary });

  if (Object.keys(refused).length > 0) {
    throw {
      code: ErrorCode.CATALOG_TOO_MANY_DELETIONS,
      category: 'conflict',
      message: `refusing to delete more than ${args.maxDeletions} catalog entries per kind; stale entries were marked`,
      retryable: false,
      redacted_context: { marked: refused, max_deletions: args.maxDeletions },
    } satisfies AppError;
  }

  return summary;
}
