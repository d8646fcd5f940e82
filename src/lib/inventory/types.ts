export type InventoryObjectKind = 'device' | 'virtual_machine';

export type DeviceRef = { kind: 'device'; id: number };
export type VirtualMachineRef = { kind: 'virtual_machine'; id: number };
export type InventoryObjectRef = DeviceRef | VirtualMachineRef;

export type NamedRef = { id: number; name: string; slug?: string };

export type IpAddressRecord = {
  id: number;
  /** CIDR notation, e.g. `10.0.0.5/24`. */
  address: string;
  dnsName: string | null;
};

export type NetworkInterfaceRecord = {
  id: number;
  name: string;
  ipAddresses: IpAddressRecord[];
};

export type InventoryObject = {
  ref: InventoryObjectRef;
  name: string;
  site: (NamedRef & { region: NamedRef | null }) | null;
  role: NamedRef | null;
  platform: NamedRef | null;
  cluster: NamedRef | null;
  primaryIp4: IpAddressRecord | null;
  interfaces: NetworkInterfaceRecord[];
  tags: string[];
  customFields: Record<string, unknown>;
  serial: string | null;
  description: string | null;
};

export type InventoryLookup = {
  get: (ref: InventoryObjectRef) => Promise<InventoryObject | null>;
  list: (kind: InventoryObjectKind) => Promise<InventoryObject[]>;
};

export function refKey(ref: InventoryObjectRef): string {
  return `${ref.kind}:${ref.id}`;
}

export function sameRef(a: InventoryObjectRef, b: InventoryObjectRef): boolean {
  return a.kind === b.kind && a.id === b.id;
}

export function stripPrefixLength(address: string): string {
  const slash = address.indexOf('/');
  return slash === -1 ? address : address.slice(0, slash);
}

export function findIpAddress(
  object: InventoryObject,
  ipAddressId: number,
): { networkInterface: NetworkInterfaceRecord; ipAddress: IpAddressRecord } | null {
  for (const networkInterface of object.interfaces) {
    const ipAddress = networkInterface.ipAddresses.find((ip) => ip.id === ipAddressId);
    if (ipAddress) return { networkInterface, ipAddress };
  }
  return null;
}
