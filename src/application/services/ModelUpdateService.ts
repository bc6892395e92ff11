import { CURRENT_MODELS } from "@/application/constants";
import type { CatalogLister } from "@/infrastructure/catalog";
import { type AppLogger, logger } from "@/infrastructure/logger";
import { errorMessage } from "@/shared/helpers";

export type ModelScanOptions = {
  currentModels?: readonly string[];
  log?: AppLogger;
};

/** Listed identifiers not in the running set, deduplicated in first-seen order. */
export function diffModelIdentifiers(
  identifiers: readonly string[],
  currentModels: readonly string[] = CURRENT_MODELS,
): string[] {
  const running = new Set( currentModels.map( (m) => m.toLowerCase() ) );
  const found = new Set<string>();
  for ( const raw of identifiers ) {
    const id = raw.trim().toLowerCase();
    if ( !id || running.has( id ) ) continue;
    found.add( id );
  }
  return [ ...found ];
}

/** Listing failures are logged and yield no updates. */
export async function scanModelUpdates(lister: CatalogLister, opts: ModelScanOptions = {}): Promise<string[]> {
  const log = opts.log ?? logger;
  try {
    const listing = await lister.list();
    if ( !listing.ok ) {
      log.debug( { type: "models.list_failed", err: listing.error.message } );
      return [];
    }
    return diffModelIdentifiers( listing.identifiers, opts.currentModels );
  } catch ( err ) {
    log.debug( { type: "models.list_failed", err: errorMessage( err ) } );
    return [];
  }
}
