import { sql } from 'drizzle-orm';
import {
  boolean,
  index,
  integer,
  jsonb,
  pgTable,
  primaryKey,
  serial,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from 'drizzle-orm/pg-core';

import type { SnmpDetails } from '@/lib/host-config/types';
import type { MaintenanceTarget } from '@/lib/maintenance/types';

const OBJECT_KINDS = ['device', 'virtual_machine'] as const;

/** Read-only mirror of the inventory; `data` holds everything but the reference. */
export const inventoryObjects = pgTable(
  'inventory_objects',
  {
    kind: text('kind', { enum: OBJECT_KINDS }).notNull(),
    objectId: integer('object_id').notNull(),
    name: text('name').notNull(),
    data: jsonb('data').notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [primaryKey({ columns: [table.kind, table.objectId] })],
);

export const mappingRules = pgTable(
  'mapping_rules',
  {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
    objectKind: text('object_kind', { enum: OBJECT_KINDS }).notNull(),
    isDefault: boolean('is_default').notNull().default(false),
    description: text('description'),
    siteIds: jsonb('site_ids').$type<number[]>().notNull().default([]),
    roleIds: jsonb('role_ids').$type<number[]>().notNull().default([]),
    platformIds: jsonb('platform_ids').$type<number[]>().notNull().default([]),
    interfaceType: text('interface_type', { enum: ['any', 'agent', 'snmp'] }).notNull().default('any'),
    hostGroupIds: jsonb('host_group_ids').$type<string[]>().notNull().default([]),
    templateIds: jsonb('template_ids').$type<string[]>().notNull().default([]),
    proxyId: text('proxy_id'),
    proxyGroupId: text('proxy_group_id'),
  },
  (table) => [
    uniqueIndex('mapping_rules_name_key').on(table.name),
    // At most one default per object kind.
    uniqueIndex('mapping_rules_default_key').on(table.objectKind).where(sql`${table.isDefault}`),
  ],
);

export const hostConfigs = pgTable(
  'host_configs',
  {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
    objectKind: text('object_kind', { enum: OBJECT_KINDS }).notNull(),
    objectId: integer('object_id').notNull(),
    remoteHostId: text('remote_host_id'),
    status: text('status', { enum: ['enabled', 'disabled'] }).notNull().default('enabled'),
    description: text('description'),
    inSync: boolean('in_sync').notNull().default(false),
    lastSyncUpdate: timestamp('last_sync_update', { withTimezone: true }),
    hostGroupIds: jsonb('host_group_ids').$type<string[]>().notNull().default([]),
    templateIds: jsonb('template_ids').$type<string[]>().notNull().default([]),
    monitoredBy: text('monitored_by', { enum: ['direct', 'proxy', 'proxy_group'] }).notNull().default('direct'),
    proxyId: text('proxy_id'),
    proxyGroupId: text('proxy_group_id'),
  },
  (table) => [
    uniqueIndex('host_configs_name_key').on(table.name),
    uniqueIndex('host_configs_object_key').on(table.objectKind, table.objectId),
    index('host_configs_last_sync_idx').on(table.lastSyncUpdate),
  ],
);

export const interfaceConfigs = pgTable(
  'interface_configs',
  {
    id: serial('id').primaryKey(),
    hostConfigId: integer('host_config_id')
      .notNull()
      .references(() => hostConfigs.id, { onDelete: 'cascade' }),
    kind: text('kind', { enum: ['agent', 'snmp'] }).notNull(),
    name: text('name').notNull(),
    remoteInterfaceId: text('remote_interface_id'),
    connection: text('connection', { enum: ['ip', 'dns'] }).notNull(),
    main: boolean('main').notNull().default(false),
    port: integer('port').notNull(),
    networkInterfaceId: integer('network_interface_id').notNull(),
    ipAddressId: integer('ip_address_id'),
    snmp: jsonb('snmp').$type<SnmpDetails>(),
  },
  (table) => [index('interface_configs_host_idx').on(table.hostConfigId)],
);

export const maintenanceWindows = pgTable('maintenance_windows', {
  id: serial('id').primaryKey(),
  name: text('name').notNull(),
  startTime: timestamp('start_time', { withTimezone: true }).notNull(),
  endTime: timestamp('end_time', { withTimezone: true }).notNull(),
  targets: jsonb('targets').$type<MaintenanceTarget[]>().notNull(),
  disableDataCollection: boolean('disable_data_collection').notNull().default(false),
  remoteId: text('remote_id'),
  status: text('status', { enum: ['pending', 'active', 'expired', 'failed'] }).notNull().default('pending'),
  description: text('description'),
});

export const catalogItems = pgTable(
  'catalog_items',
  {
    kind: text('kind', { enum: ['host_group', 'template', 'proxy', 'proxy_group'] }).notNull(),
    remoteId: text('remote_id').notNull(),
    name: text('name').notNull(),
    proxyGroupId: text('proxy_group_id'),
    markedForDeletion: boolean('marked_for_deletion').notNull().default(false),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [primaryKey({ columns: [table.kind, table.remoteId] })],
);

export const auditEvents = pgTable(
  'audit_events',
  {
    id: serial('id').primaryKey(),
    action: text('action', { enum: ['create', 'update', 'delete'] }).notNull(),
    model: text('model', { enum: ['host_config', 'maintenance_window', 'mapping_rule'] }).notNull(),
    objectId: integer('object_id').notNull(),
    objectName: text('object_name').notNull(),
    changes: jsonb('changes'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('audit_events_object_idx').on(table.model, table.objectId)],
);

export const monitoringJobs = pgTable(
  'monitoring_jobs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    kind: text('kind').notNull(),
    payload: jsonb('payload').notNull().default({}),
    status: text('status', { enum: ['queued', 'running', 'succeeded', 'failed'] }).notNull().default('queued'),
    attempts: integer('attempts').notNull().default(0),
    result: jsonb('result'),
    error: jsonb('error'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    startedAt: timestamp('started_at', { withTimezone: true }),
    finishedAt: timestamp('finished_at', { withTimezone: true }),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('monitoring_jobs_status_idx').on(table.status, table.createdAt)],
);

export const jobAssociations = pgTable(
  'job_associations',
  {
    jobId: uuid('job_id')
      .notNull()
      .references(() => monitoringJobs.id, { onDelete: 'cascade' }),
    model: text('model', { enum: ['host_config', 'maintenance_window', 'mapping_rule'] }).notNull(),
    objectId: integer('object_id').notNull(),
  },
  (table) => [primaryKey({ columns: [table.jobId, table.model, table.objectId] })],
);

export type MonitoringJob = typeof monitoringJobs.$inferSelect;
export type HostConfigRow = typeof hostConfigs.$inferSelect;
export type InterfaceConfigRow = typeof interfaceConfigs.$inferSelect;
export type MappingRuleRow = typeof mappingRules.$inferSelect;
export type MaintenanceWindowRow = typeof maintenanceWindows.$inferSelect;
