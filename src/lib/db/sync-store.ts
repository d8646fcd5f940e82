import { and, asc, eq, inArray, notInArray, sql } from 'drizzle-orm';

import {
  catalogItems,
  hostConfigs,
  interfaceConfigs,
  maintenanceWindows,
  mappingRules,
} from '@/lib/db/schema';
import { errorMessage, isAppError } from '@/lib/errors/error';
import { ErrorCode } from '@/lib/errors/error-codes';

import type { SQL } from 'drizzle-orm';
import type { DbExecutor } from '@/lib/db/client';
import type { HostConfigRow, InterfaceConfigRow } from '@/lib/db/schema';
import type { AppError } from '@/lib/errors/error';
import type { HostConfig, HostConfigDraft, InterfaceConfig } from '@/lib/host-config/types';
import type { SyncStore } from '@/lib/provisioning/store';

async function write<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isAppError(err)) throw err;
    throw {
      code: ErrorCode.DB_WRITE_FAILED,
      category: 'db',
      message: `${operation} failed`,
      retryable: true,
      redacted_context: { cause: errorMessage(err) },
    } satisfies AppError;
  }
}

function toInterface(row: InterfaceConfigRow): InterfaceConfig {
  const base = {
    id: row.id,
    name: row.name,
    remoteInterfaceId: row.remoteInterfaceId,
    connection: row.connection,
    main: row.main,
    port: row.port,
    networkInterfaceId: row.networkInterfaceId,
    ipAddressId: row.ipAddressId,
  };
  if (row.kind === 'agent') return { ...base, kind: 'agent' };
  if (!row.snmp) {
    throw {
      code: ErrorCode.INTERNAL_ERROR,
      category: 'db',
      message: `snmp interface ${row.id} has no snmp details`,
      retryable: false,
    } satisfies AppError;
  }
  return { ...base, kind: 'snmp', snmp: row.snmp };
}

function toHostConfig(row: HostConfigRow, interfaces: InterfaceConfigRow[]): HostConfig {
  return {
    id: row.id,
    name: row.name,
    object: { kind: row.objectKind, id: row.objectId },
    remoteHostId: row.remoteHostId,
    status: row.status,
    description: row.description,
    inSync: row.inSync,
    lastSyncUpdate: row.lastSyncUpdate,
    hostGroupIds: row.hostGroupIds,
    templateIds: row.templateIds,
    monitoredBy: row.monitoredBy,
    proxyId: row.proxyId,
    proxyGroupId: row.proxyGroupId,
    interfaces: interfaces.map(toInterface),
  };
}

function hostValues(hostConfig: HostConfigDraft) {
  return {
    name: hostConfig.name,
    objectKind: hostConfig.object.kind,
    objectId: hostConfig.object.id,
    remoteHostId: hostConfig.remoteHostId,
    status: hostConfig.status,
    description: hostConfig.description,
    inSync: hostConfig.inSync,
    lastSyncUpdate: hostConfig.lastSyncUpdate,
    hostGroupIds: hostConfig.hostGroupIds,
    templateIds: hostConfig.templateIds,
    monitoredBy: hostConfig.monitoredBy,
    proxyId: hostConfig.proxyId,
    proxyGroupId: hostConfig.proxyGroupId,
  };
}

function interfaceValues(hostConfigId: number, iface: InterfaceConfig) {
  return {
    hostConfigId,
    kind: iface.kind,
    name: iface.name,
    remoteInterfaceId: iface.remoteInterfaceId,
    connection: iface.connection,
    main: iface.main,
    port: iface.port,
    networkInterfaceId: iface.networkInterfaceId,
    ipAddressId: iface.ipAddressId,
    snmp: iface.kind === 'snmp' ? iface.snmp : null,
  };
}

async function loadHostConfigs(db: DbExecutor, where?: SQL, lock = false): Promise<HostConfig[]> {
  const query = db.select().from(hostConfigs).where(where).orderBy(asc(hostConfigs.id));
  // Inside a transaction the rows stay locked until commit; a second writer waits for them.
  const rows = lock ? await query.for('update') : await query;
  if (rows.length === 0) return [];

  const interfaceRows = await db
    .select()
    .from(interfaceConfigs)
    .where(
      inArray(
        interfaceConfigs.hostConfigId,
        rows.map((r) => r.id),
      ),
    )
    .orderBy(asc(interfaceConfigs.id));

  return rows.map((row) =>
    toHostConfig(
      row,
      interfaceRows.filter((i) => i.hostConfigId === row.id),
    ),
  );
}

async function loadHostConfig(db: DbExecutor, id: number, lock = false): Promise<HostConfig | null> {
  const [hostConfig] = await loadHostConfigs(db, eq(hostConfigs.id, id), lock);
  return hostConfig ?? null;
}

async function saveInterfaces(db: DbExecutor, hostConfigId: number, interfaces: InterfaceConfig[]): Promise<void> {
  const keptIds = interfaces.flatMap((i) => (i.id === null ? [] : [i.id]));
  await db
    .delete(interfaceConfigs)
    .where(
      keptIds.length > 0
        ? and(eq(interfaceConfigs.hostConfigId, hostConfigId), notInArray(interfaceConfigs.id, keptIds))
        : eq(interfaceConfigs.hostConfigId, hostConfigId),
    );

  for (const iface of interfaces) {
    if (iface.id === null) {
      await db.insert(interfaceConfigs).values(interfaceValues(hostConfigId, iface));
    } else {
      await db
        .update(interfaceConfigs)
        .set(interfaceValues(hostConfigId, iface))
        .where(and(eq(interfaceConfigs.id, iface.id), eq(interfaceConfigs.hostConfigId, hostConfigId)));
    }
  }
}

async function reloadHostConfig(db: DbExecutor, id: number): Promise<HostConfig> {
  const hostConfig = await loadHostConfig(db, id);
  if (hostConfig) return hostConfig;
  throw {
    code: ErrorCode.HOST_CONFIG_NOT_FOUND,
    category: 'not_found',
    message: `host configuration ${id} not found`,
    retryable: false,
  } satisfies AppError;
}

/**
 * PostgreSQL-backed store; `transaction` opens a drizzle transaction (a savepoint when nested).
 * Host configurations read inside a transaction are locked `FOR UPDATE`.
 */
export function createDrizzleSyncStore(db: DbExecutor, options: { inTransaction: boolean } = { inTransaction: false }): SyncStore {
  return {
    transaction: (fn) => db.transaction((tx) => fn(createDrizzleSyncStore(tx, { inTransaction: true }))),

    listMappingRules: async (kind) =>
      db
        .select()
        .from(mappingRules)
        .where(kind ? eq(mappingRules.objectKind, kind) : undefined)
        .orderBy(asc(mappingRules.id)),

    getMappingRule: async (id) => {
      const [rule] = await db.select().from(mappingRules).where(eq(mappingRules.id, id));
      return rule ?? null;
    },

    insertMappingRule: (draft) =>
      write('insert mapping rule', async () => {
        const [rule] = await db.insert(mappingRules).values(draft).returning();
        if (!rule) throw new Error('insert returned no row');
        return rule;
      }),

    updateMappingRule: (rule) =>
      write('update mapping rule', async () => {
        const { id, ...values } = rule;
        const [updated] = await db.update(mappingRules).set(values).where(eq(mappingRules.id, id)).returning();
        if (!updated) throw new Error(`mapping rule ${id} vanished`);
        return updated;
      }),

    deleteMappingRule: (id) =>
      write('delete mapping rule', async () => {
        await db.delete(mappingRules).where(eq(mappingRules.id, id));
      }),

    getHostConfig: (id) => loadHostConfig(db, id, options.inTransaction),

    findHostConfigByObject: async (ref) => {
      const [hostConfig] = await loadHostConfigs(
        db,
        and(eq(hostConfigs.objectKind, ref.kind), eq(hostConfigs.objectId, ref.id)),
        options.inTransaction,
      );
      return hostConfig ?? null;
    },

    listHostConfigs: () => loadHostConfigs(db),

    insertHostConfig: (draft) =>
      write('insert host configuration', async () => {
        const [row] = await db.insert(hostConfigs).values(hostValues(draft)).returning({ id: hostConfigs.id });
        if (!row) throw new Error('insert returned no row');
        await saveInterfaces(db, row.id, draft.interfaces);
        return reloadHostConfig(db, row.id);
      }),

    saveHostConfig: (hostConfig) =>
      write('save host configuration', async () => {
        await db.update(hostConfigs).set(hostValues(hostConfig)).where(eq(hostConfigs.id, hostConfig.id));
        await saveInterfaces(db, hostConfig.id, hostConfig.interfaces);
        return reloadHostConfig(db, hostConfig.id);
      }),

    deleteHostConfig: (id) =>
      write('delete host configuration', async () => {
        await db.delete(hostConfigs).where(eq(hostConfigs.id, id));
      }),

    updateSyncStatus: (id, status) =>
      write('update sync status', async () => {
        await db
          .update(hostConfigs)
          .set({ inSync: status.inSync, lastSyncUpdate: status.lastSyncUpdate })
          .where(eq(hostConfigs.id, id));
      }),

    listMaintenanceWindows: async () => db.select().from(maintenanceWindows).orderBy(asc(maintenanceWindows.id)),

    getMaintenanceWindow: async (id) => {
      const [window] = await db.select().from(maintenanceWindows).where(eq(maintenanceWindows.id, id));
      return window ?? null;
    },

    insertMaintenanceWindow: (draft) =>
      write('insert maintenance window', async () => {
        const [window] = await db
          .insert(maintenanceWindows)
          .values({ ...draft, remoteId: null, status: 'pending' })
          .returning();
        if (!window) throw new Error('insert returned no row');
        return window;
      }),

    saveMaintenanceWindow: (window) =>
      write('save maintenance window', async () => {
        const { id, ...values } = window;
        const [saved] = await db.update(maintenanceWindows).set(values).where(eq(maintenanceWindows.id, id)).returning();
        if (!saved) throw new Error(`maintenance window ${id} vanished`);
        return saved;
      }),

    deleteMaintenanceWindow: (id) =>
      write('delete maintenance window', async () => {
        await db.delete(maintenanceWindows).where(eq(maintenanceWindows.id, id));
      }),

    listCatalogItems: async (kind) =>
      db
        .select({
          kind: catalogItems.kind,
          remoteId: catalogItems.remoteId,
          name: catalogItems.name,
          proxyGroupId: catalogItems.proxyGroupId,
          markedForDeletion: catalogItems.markedForDeletion,
        })
        .from(catalogItems)
        .where(eq(catalogItems.kind, kind))
        .orderBy(asc(catalogItems.remoteId)),

    upsertCatalogItems: (kind, entries) =>
      write(`upsert ${kind} catalog`, async () => {
        if (entries.length === 0) return;
        await db
          .insert(catalogItems)
          .values(entries.map((e) => ({ ...e, kind, markedForDeletion: false })))
          .onConflictDoUpdate({
            target: [catalogItems.kind, catalogItems.remoteId],
            set: {
              name: sql`excluded.name`,
              proxyGroupId: sql`excluded.proxy_group_id`,
              markedForDeletion: false,
              updatedAt: sql`now()`,
            },
          });
      }),

    deleteCatalogItems: (kind, remoteIds) =>
      write(`delete ${kind} catalog entries`, async () => {
        if (remoteIds.length === 0) return;
        await db.delete(catalogItems).where(and(eq(catalogItems.kind, kind), inArray(catalogItems.remoteId, remoteIds)));
      }),

    markCatalogItems: (kind, remoteIds) =>
      write(`mark ${kind} catalog entries`, async () => {
        if (remoteIds.length === 0) return;
        await db
          .update(catalogItems)
          .set({ markedForDeletion: true, updatedAt: sql`now()` })
          .where(and(eq(catalogItems.kind, kind), inArray(catalogItems.remoteId, remoteIds)));
      }),
  };
}
