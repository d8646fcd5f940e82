import { and, asc, eq } from 'drizzle-orm';
import { z } from 'zod/v4';

import { inventoryObjects } from '@/lib/db/schema';
import { ErrorCode } from '@/lib/errors/error-codes';

import type { DbExecutor } from '@/lib/db/client';
import type { AppError } from '@/lib/errors/error';
import type { InventoryLookup, InventoryObject, InventoryObjectKind, InventoryObjectRef } from '@/lib/inventory/types';

const NamedRefSchema = z.object({ id: z.number().int(), name: z.string(), slug: z.string().optional() });

const IpAddressSchema = z.object({
  id: z.number().int(),
  address: z.string().min(1),
  dnsName: z.string().nullable().default(null),
});

export const InventoryDataSchema = z.object({
  site: NamedRefSchema.extend({ region: NamedRefSchema.nullable().default(null) }).nullable().default(null),
  role: NamedRefSchema.nullable().default(null),
  platform: NamedRefSchema.nullable().default(null),
  cluster: NamedRefSchema.nullable().default(null),
  primaryIp4: IpAddressSchema.nullable().default(null),
  interfaces: z
    .array(z.object({ id: z.number().int(), name: z.string(), ipAddresses: z.array(IpAddressSchema).default([]) }))
    .default([]),
  tags: z.array(z.string()).default([]),
  customFields: z.record(z.string(), z.unknown()).default({}),
  serial: z.string().nullable().default(null),
  description: z.string().nullable().default(null),
});

export type InventoryRow = { kind: InventoryObjectKind; objectId: number; name: string; data: unknown };

export function parseInventoryRow(row: InventoryRow): InventoryObject {
  const ref: InventoryObjectRef = { kind: row.kind, id: row.objectId };
  const parsed = InventoryDataSchema.safeParse(row.data);
  if (!parsed.success) {
    throw {
      code: ErrorCode.DB_READ_FAILED,
      category: 'schema',
      message: `inventory record ${row.kind}:${row.objectId} is malformed`,
      retryable: false,
      details: parsed.error.issues.map((issue) => ({
        field: issue.path.map(String).join('.'),
        issue: issue.code,
        message: issue.message,
      })),
    } satisfies AppError;
  }
  return { ref, name: row.name, ...parsed.data };
}

export function createDrizzleInventoryLookup(db: DbExecutor): InventoryLookup {
  return {
    get: async (ref) => {
      const [row] = await db
        .select()
        .from(inventoryObjects)
        .where(and(eq(inventoryObjects.kind, ref.kind), eq(inventoryObjects.objectId, ref.id)));
      return row ? parseInventoryRow(row) : null;
    },
    list: async (kind) => {
      const rows = await db
        .select()
        .from(inventoryObjects)
        .where(eq(inventoryObjects.kind, kind))
        .orderBy(asc(inventoryObjects.objectId));
      return rows.map(parseInventoryRow);
    },
  };
}
