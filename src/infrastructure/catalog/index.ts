export { extractModelIdentifiers, GeminiCatalogLister } from "./GeminiCatalogLister";
export type { CatalogLister, CatalogListResult } from "./types";
