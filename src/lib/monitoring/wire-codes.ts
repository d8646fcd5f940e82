import type { ConnectionMethod, HostStatus, InterfaceKind, MonitoredBy } from '@/lib/host-config/types';
import type {
  SnmpAuthProtocol,
  SnmpPrivProtocol,
  SnmpSecurityLevel,
  SyncSettings,
  TlsMode,
} from '@/lib/settings/sync-settings';

// The remote API encodes enums as numeric strings.

export const STATUS_CODE: Record<HostStatus, string> = { enabled: '0', disabled: '1' };
export const MONITORED_BY_CODE: Record<MonitoredBy, string> = { direct: '0', proxy: '1', proxy_group: '2' };
export const INTERFACE_TYPE_CODE: Record<InterfaceKind, string> = { agent: '1', snmp: '2' };
export const USEIP_CODE: Record<ConnectionMethod, string> = { dns: '0', ip: '1' };
export const INVENTORY_MODE_CODE: Record<SyncSettings['inventoryMode'], string> = {
  disabled: '-1',
  manual: '0',
  automatic: '1',
};
export const TLS_CODE: Record<TlsMode, string> = { none: '1', psk: '2', certificate: '4' };
export const SNMP_SECURITY_LEVEL_CODE: Record<SnmpSecurityLevel, string> = {
  noAuthNoPriv: '0',
  authNoPriv: '1',
  authPriv: '2',
};
export const SNMP_AUTH_PROTOCOL_CODE: Record<SnmpAuthProtocol, string> = {
  MD5: '0',
  SHA1: '1',
  SHA224: '2',
  SHA256: '3',
  SHA384: '4',
  SHA512: '5',
};
export const SNMP_PRIV_PROTOCOL_CODE: Record<SnmpPrivProtocol, string> = {
  DES: '0',
  AES128: '1',
  AES192: '2',
  AES256: '3',
  AES192C: '4',
  AES256C: '5',
};

function isKeyOf<K extends string>(table: Record<K, string>, key: string): key is K {
  return Object.hasOwn(table, key);
}

export function decodeCode<K extends string>(table: Record<K, string>, code: string): K | null {
  for (const key of Object.keys(table)) {
    if (isKeyOf(table, key) && table[key] === code) return key;
  }
  return null;
}
