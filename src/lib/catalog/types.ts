export type CatalogKind = 'host_group' | 'template' | 'proxy' | 'proxy_group';

export const CATALOG_KINDS: readonly CatalogKind[] = ['host_group', 'template', 'proxy', 'proxy_group'];

export type CatalogEntry = {
  remoteId: string;
  name: string;
  /** Only proxies carry one. */
  proxyGroupId: string | null;
};

export type CatalogItem = CatalogEntry & {
  kind: CatalogKind;
  markedForDeletion: boolean;
};
