import { readFile } from 'node:fs/promises';

import { z } from 'zod/v4';

import { ErrorCode } from '@/lib/errors/error-codes';

import type { AppError } from '@/lib/errors/error';

const TagFieldSelection = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
  enabled: z.boolean().default(true),
});

const TagMapping = z.object({
  // Inventory tags copied to the remote host when the object carries them.
  tags: z.array(z.string().min(1)).default([]),
  fields: z.array(TagFieldSelection).default([]),
});

const InventoryFieldSelection = z.object({
  invkey: z.string().min(1),
  paths: z.array(z.string().min(1)).min(1),
  enabled: z.boolean().default(true),
});

const SnmpSecurityLevel = z.enum(['noAuthNoPriv', 'authNoPriv', 'authPriv']);
const SnmpAuthProtocol = z.enum(['MD5', 'SHA1', 'SHA224', 'SHA256', 'SHA384', 'SHA512']);
const SnmpPrivProtocol = z.enum(['DES', 'AES128', 'AES192', 'AES256', 'AES192C', 'AES256C']);
const TlsMode = z.enum(['none', 'psk', 'certificate']);

export const SyncSettingsSchema = z.object({
  ipAssignmentMethod: z.enum(['primary', 'manual']).default('primary'),
  connection: z.enum(['ip', 'dns']).default('ip'),
  deleteMode: z.enum(['soft', 'hard']).default('soft'),
  graveyardGroup: z.string().min(1).default('graveyard'),
  graveyardSuffix: z.string().min(1).default('_archived'),
  exclusion: z
    .object({
      enabled: z.boolean().default(false),
      customFieldName: z.string().min(1).default('exclude_from_monitoring'),
    })
    .prefault({}),
  inventoryMode: z.enum(['disabled', 'manual', 'automatic']).default('manual'),
  syncMode: z.enum(['overwrite', 'preserve']).default('overwrite'),
  tls: z
    .object({
      connect: TlsMode.default('none'),
      accept: TlsMode.default('none'),
      pskIdentity: z.string().min(1).nullable().default(null),
    })
    .prefault({}),
  agent: z.object({ port: z.number().int().min(1).max(65535).default(10050) }).prefault({}),
  snmp: z
    .object({
      port: z.number().int().min(1).max(65535).default(161),
      version: z.union([z.literal(1), z.literal(2), z.literal(3)]).default(3),
      community: z.string().default('{$SNMP_COMMUNITY}'),
      bulk: z.boolean().default(true),
      maxRepetitions: z.number().int().positive().default(10),
      contextName: z.string().default(''),
      securityName: z.string().default('{$SNMPV3_USER}'),
      securityLevel: SnmpSecurityLevel.default('authPriv'),
      authProtocol: SnmpAuthProtocol.default('SHA1'),
      authPassphrase: z.string().default('{$SNMPV3_AUTHPASS}'),
      privProtocol: SnmpPrivProtocol.default('AES128'),
      privPassphrase: z.string().default('{$SNMPV3_PRIVPASS}'),
    })
    .prefault({}),
  tags: z
    .object({
      defaultTag: z.string().min(1).nullable().default(null),
      prefix: z.string().default(''),
      nameFormatting: z.enum(['keep', 'upper', 'lower']).default('keep'),
      device: TagMapping.prefault({}),
      virtual_machine: TagMapping.prefault({}),
    })
    .prefault({}),
  inventory: z
    .object({
      device: z.array(InventoryFieldSelection).default([]),
      virtual_machine: z.array(InventoryFieldSelection).default([]),
    })
    .prefault({}),
  maxDeletions: z.number().int().nonnegative().default(3),
});

export type SyncSettings = z.infer<typeof SyncSettingsSchema>;
export type TagFieldSelection = z.infer<typeof TagFieldSelection>;
export type InventoryFieldSelection = z.infer<typeof InventoryFieldSelection>;
export type SnmpSecurityLevel = z.infer<typeof SnmpSecurityLevel>;
export type SnmpAuthProtocol = z.infer<typeof SnmpAuthProtocol>;
export type SnmpPrivProtocol = z.infer<typeof SnmpPrivProtocol>;
export type TlsMode = z.infer<typeof TlsMode>;

export function parseSyncSettings(input: unknown): SyncSettings {
  const result = SyncSettingsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw {
      code: ErrorCode.CONFIG_INVALID_SETTINGS,
      category: 'config',
      message: 'invalid sync settings',
      retryable: false,
      details: result.error.issues.map((issue) => ({
        field: issue.path.map(String).join('.'),
        issue: issue.code,
        message: issue.message,
      })),
    } satisfies AppError;
  }
  return result.data;
}

export function defaultSyncSettings(): SyncSettings {
  return parseSyncSettings({});
}

export async function loadSyncSettings(filePath: string): Promise<SyncSettings> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return defaultSyncSettings();
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw {
      code: ErrorCode.CONFIG_INVALID_SETTINGS,
      category: 'parse',
      message: `settings file is not valid json: ${err instanceof Error ? err.message : String(err)}`,
      retryable: false,
      redacted_context: { path: filePath },
    } satisfies AppError;
  }
  return parseSyncSettings(raw);
}
