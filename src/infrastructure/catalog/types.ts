export type CatalogListResult =
  | { ok: true; identifiers: string[] }
  | { ok: false; error: Error };

/** Lists model identifiers available from a remote catalog. */
export interface CatalogLister {
  list(): Promise<CatalogListResult>;
}
