import { z } from 'zod/v4';

// The remote API returns ids and enum codes as strings, but tolerate numbers.
const wireString = z.union([z.string(), z.number()]).transform(String);

export const RemoteInterfaceSchema = z.object({
  interfaceid: wireString,
  type: wireString,
  main: wireString,
  useip: wireString,
  ip: z.string().default(''),
  dns: z.string().default(''),
  port: wireString,
  // `[]` for agent interfaces, an object for SNMP.
  details: z
    .union([z.record(z.string(), wireString), z.array(z.unknown())])
    .optional()
    .transform((v) => (v === undefined || Array.isArray(v) ? null : v)),
});

const RemoteTagSchema = z.object({ tag: z.string(), value: z.string().default('') });

export const RemoteHostSchema = z.object({
  hostid: wireString,
  host: z.string(),
  name: z.string().optional(),
  status: wireString,
  description: z.string().default(''),
  monitored_by: wireString.default('0'),
  proxyid: wireString.default('0'),
  proxy_groupid: wireString.default('0'),
  groups: z.array(z.object({ groupid: wireString, name: z.string().optional() })).default([]),
  parentTemplates: z.array(z.object({ templateid: wireString, name: z.string().optional() })).default([]),
  tags: z.array(RemoteTagSchema).default([]),
  interfaces: z.array(RemoteInterfaceSchema).default([]),
  inventory_mode: wireString.default('-1'),
  inventory: z
    .union([z.record(z.string(), z.union([z.string(), z.number(), z.null()])), z.array(z.unknown())])
    .optional()
    .transform((v) => {
      const out: Record<string, string> = {};
      if (v === undefined || Array.isArray(v)) return out;
      for (const [key, value] of Object.entries(v)) {
        if (value === null) continue;
        out[key] = String(value);
      }
      return out;
    }),
  tls_connect: wireString.default('1'),
  tls_accept: wireString.default('1'),
  tls_psk_identity: z.string().optional(),
});

export const RemoteHostGroupSchema = z.object({ groupid: wireString, name: z.string() });
export const RemoteTemplateSchema = z.object({ templateid: wireString, name: z.string() });
export const RemoteProxySchema = z.object({
  proxyid: wireString,
  name: z.string(),
  proxy_groupid: wireString.default('0'),
});
export const RemoteProxyGroupSchema = z.object({ proxy_groupid: wireString, name: z.string() });

export type RemoteInterface = z.output<typeof RemoteInterfaceSchema>;
export type RemoteHost = z.output<typeof RemoteHostSchema>;
export type RemoteHostGroup = z.output<typeof RemoteHostGroupSchema>;
export type RemoteTemplate = z.output<typeof RemoteTemplateSchema>;
export type RemoteProxy = z.output<typeof RemoteProxySchema>;
export type RemoteProxyGroup = z.output<typeof RemoteProxyGroupSchema>;
