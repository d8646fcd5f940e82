import { request as httpRequest } from 'node:http';
import { request as httpsRequest } from 'node:https';

import { z } from 'zod/v4';

import { ErrorCode } from '@/lib/errors/error-codes';
import {
  RemoteHostGroupSchema,
  RemoteHostSchema,
  RemoteInterfaceSchema,
  RemoteProxyGroupSchema,
  RemoteProxySchema,
  RemoteTemplateSchema,
} from '@/lib/monitoring/remote-records';

import type { SecretStore } from '@/lib/crypto/secret-store';
import type { AppError } from '@/lib/errors/error';
import type { MonitoringService } from '@/lib/monitoring/service';

const RPC_PATH = '/api_jsonrpc.php';

const HOST_OUTPUT = [
  'hostid',
  'host',
  'name',
  'status',
  'description',
  'monitored_by',
  'proxyid',
  'proxy_groupid',
  'inventory_mode',
  'tls_connect',
  'tls_accept',
  'tls_psk_identity',
];

const wireId = z.union([z.string(), z.number()]).transform(String);
const idsResult = (key: string) => z.object({ [key]: z.array(wireId).min(1) });

const RpcResponseSchema = z.union([
  z.object({ jsonrpc: z.literal('2.0'), result: z.unknown(), id: z.unknown() }),
  z.object({
    jsonrpc: z.literal('2.0'),
    error: z.object({ code: z.number(), message: z.string(), data: z.string().optional() }),
    id: z.unknown(),
  }),
]);

function normalizeRpcUrl(endpoint: string): string {
  const normalized = endpoint.trim().replace(/\/+$/, '');
  if (normalized.toLowerCase().endsWith(RPC_PATH)) return normalized;
  return `${normalized}${RPC_PATH}`;
}

async function postJsonText(args: {
  url: string;
  payload: unknown;
  headers: Record<string, string>;
  timeoutMs: number;
  tlsVerify: boolean;
}): Promise<{ status: number; bodyText: string }> {
  const url = new URL(args.url);
  const isHttps = url.protocol === 'https:';
  const reqFn = isHttps ? httpsRequest : httpRequest;

  const body = Buffer.from(JSON.stringify(args.payload), 'utf8');

  return new Promise((resolve, reject) => {
    const req = reqFn(
      {
        protocol: url.protocol,
        hostname: url.hostname,
        port: url.port ? Number(url.port) : undefined,
        path: `${url.pathname}${url.search}`,
        method: 'POST',
        headers: {
          ...args.headers,
          'content-type': 'application/json-rpc',
          'content-length': String(body.length),
        },
        ...(isHttps ? { rejectUnauthorized: args.tlsVerify } : {}),
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk) => chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))));
        res.on('end', () => resolve({ status: res.statusCode ?? 0, bodyText: Buffer.concat(chunks).toString('utf8') }));
      },
    );

    req.on('error', (err) => reject(err));
    req.setTimeout(args.timeoutMs, () => {
      req.destroy(new Error('timeout'));
    });
    req.write(body);
    req.end();
  });
}

function invalidResponse(method: string, issue: string, bodyText?: string): AppError {
  return {
    code: ErrorCode.REMOTE_INVALID_RESPONSE,
    category: 'parse',
    message: `${method} returned an invalid response: ${issue}`,
    retryable: false,
    redacted_context: { method, ...(bodyText !== undefined ? { body_excerpt: bodyText.slice(0, 2000) } : {}) },
  };
}

function parseWith<S extends z.ZodType>(schema: S, value: unknown, method: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const first = result.error.issues[0];
    throw invalidResponse(method, first ? `${first.path.map(String).join('.')}: ${first.message}` : 'schema mismatch');
  }
  return result.data;
}

function firstId(result: Record<string, string[]>, key: string, method: string): string {
  const id = result[key]?.[0];
  if (!id) throw invalidResponse(method, `missing ${key}`);
  return id;
}

export type RpcMonitoringService = MonitoringService & {
  getApiVersion: () => Promise<string>;
};

/**
 * JSON-RPC client for the monitoring platform. The API token is read from the secret store on
 * every call and is never kept on the client.
 */
export function createRpcMonitoringService(input: {
  endpoint: string;
  secrets: SecretStore;
  timeoutMs: number;
  tlsVerify: boolean;
}): RpcMonitoringService {
  const url = normalizeRpcUrl(input.endpoint);
  let nextId = 1;

  const call = async (method: string, params: unknown, opts: { auth: boolean } = { auth: true }): Promise<unknown> => {
    const headers: Record<string, string> = { accept: 'application/json' };
    if (opts.auth) headers.authorization = `Bearer ${input.secrets.getSecret('api_token')}`;

    let res: { status: number; bodyText: string };
    try {
      res = await postJsonText({
        url,
        payload: { jsonrpc: '2.0', method, params, id: nextId++ },
        headers,
        timeoutMs: input.timeoutMs,
        tlsVerify: input.tlsVerify,
      });
    } catch (err) {
      throw {
        code: ErrorCode.REMOTE_COMMUNICATION_FAILED,
        category: 'network',
        message: `${method} failed: ${err instanceof Error ? err.message : String(err)}`,
        retryable: true,
        redacted_context: { method },
      } satisfies AppError;
    }

    if (res.status === 401 || res.status === 403) {
      throw {
        code: ErrorCode.REMOTE_AUTH_FAILED,
        category: 'auth',
        message: `${method} was rejected with status ${res.status}`,
        retryable: false,
        redacted_context: { method, status: res.status },
      } satisfies AppError;
    }
    if (res.status < 200 || res.status >= 300) {
      throw {
        code: ErrorCode.REMOTE_COMMUNICATION_FAILED,
        category: 'network',
        message: `${method} failed with status ${res.status}`,
        retryable: res.status >= 500 || res.status === 429,
        redacted_context: { method, status: res.status, body_excerpt: res.bodyText.slice(0, 2000) },
      } satisfies AppError;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(res.bodyText);
    } catch (err) {
      throw invalidResponse(method, err instanceof Error ? err.message : String(err), res.bodyText);
    }

    const envelope = parseWith(RpcResponseSchema, parsed, method);
    if ('error' in envelope) {
      const authFailure = /not authori[sz]ed|session terminated|re-login/i.test(
        `${envelope.error.message} ${envelope.error.data ?? ''}`,
      );
      throw {
        code: authFailure ? ErrorCode.REMOTE_AUTH_FAILED : ErrorCode.REMOTE_COMMUNICATION_FAILED,
        category: authFailure ? 'auth' : 'remote',
        message: `${method}: ${envelope.error.data ?? envelope.error.message}`,
        retryable: false,
        redacted_context: {
          method,
          rpc_code: envelope.error.code,
          rpc_message: envelope.error.message,
          ...(envelope.error.data ? { rpc_data: envelope.error.data } : {}),
        },
      } satisfies AppError;
    }
    return envelope.result;
  };

  const getHostBy = async (filter: Record<string, unknown>) => {
    const result = await call('host.get', {
      output: HOST_OUTPUT,
      selectGroups: ['groupid', 'name'],
      selectParentTemplates: ['templateid', 'name'],
      selectTags: ['tag', 'value'],
      selectInterfaces: 'extend',
      selectInventory: 'extend',
      ...filter,
    });
    const hosts = parseWith(z.array(RemoteHostSchema), result, 'host.get');
    return hosts[0] ?? null;
  };

  return {
    async getApiVersion() {
      return parseWith(z.string(), await call('apiinfo.version', {}, { auth: false }), 'apiinfo.version');
    },

    async createHost(payload) {
      const result = parseWith(idsResult('hostids'), await call('host.create', payload), 'host.create');
      return firstId(result, 'hostids', 'host.create');
    },

    async updateHost(hostId, payload) {
      parseWith(idsResult('hostids'), await call('host.update', { ...payload, hostid: hostId }), 'host.update');
    },

    async deleteHost(hostId) {
      parseWith(idsResult('hostids'), await call('host.delete', [hostId]), 'host.delete');
    },

    getHost: (hostId) => getHostBy({ hostids: [hostId] }),

    findHostByName: (name) => getHostBy({ filter: { host: [name] } }),

    async getHostInterfaces(hostId) {
      const result = await call('hostinterface.get', { output: 'extend', hostids: [hostId] });
      return parseWith(z.array(RemoteInterfaceSchema), result, 'hostinterface.get');
    },

    async createHostInterface(hostId, payload) {
      const result = parseWith(
        idsResult('interfaceids'),
        await call('hostinterface.create', { ...payload, hostid: hostId }),
        'hostinterface.create',
      );
      return firstId(result, 'interfaceids', 'hostinterface.create');
    },

    async listHostGroups() {
      const result = await call('hostgroup.get', { output: ['groupid', 'name'] });
      return parseWith(z.array(RemoteHostGroupSchema), result, 'hostgroup.get');
    },

    async createHostGroup(name) {
      const result = parseWith(idsResult('groupids'), await call('hostgroup.create', { name }), 'hostgroup.create');
      return firstId(result, 'groupids', 'hostgroup.create');
    },

    async listTemplates() {
      const result = await call('template.get', { output: ['templateid', 'name'] });
      return parseWith(z.array(RemoteTemplateSchema), result, 'template.get');
    },

    async listProxies() {
      const result = await call('proxy.get', { output: ['proxyid', 'name', 'proxy_groupid'] });
      return parseWith(z.array(RemoteProxySchema), result, 'proxy.get');
    },

    async listProxyGroups() {
      const result = await call('proxygroup.get', { output: ['proxy_groupid', 'name'] });
      return parseWith(z.array(RemoteProxyGroupSchema), result, 'proxygroup.get');
    },

    async createMaintenance(payload) {
      const result = parseWith(
        idsResult('maintenanceids'),
        await call('maintenance.create', payload),
        'maintenance.create',
      );
      return firstId(result, 'maintenanceids', 'maintenance.create');
    },

    async deleteMaintenance(maintenanceId) {
      parseWith(idsResult('maintenanceids'), await call('maintenance.delete', [maintenanceId]), 'maintenance.delete');
    },
  };
}
