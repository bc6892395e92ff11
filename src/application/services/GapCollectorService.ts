import { GAP_SENTINELS, GAP_SOURCES, GAP_WINDOW_DAYS, type GapSource } from "@/application/constants";
import type { TradingStore } from "@/infrastructure/database/TradingStore";
import { type AppLogger, logger } from "@/infrastructure/logger";
import { errorMessage, subtractDays, toLocalDateString } from "@/shared/helpers";
import type { GapCount } from "@/types/health";

/** Trim and lowercase; sentinel values ("", "none") and non-strings yield null */
export function normalizeGapDescriptor(raw: unknown): string | null {
  if ( typeof raw !== "string" ) return null;
  const normalized = raw.trim().toLowerCase();
  return GAP_SENTINELS.includes( normalized ) ? null : normalized;
}

/** Descriptors from one data_gaps_json value; malformed or non-array JSON yields none */
export function parseGapField(raw: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse( raw );
  } catch {
    return [];
  }
  if ( !Array.isArray( parsed ) ) return [];
  const descriptors: string[] = [];
  for ( const entry of parsed ) {
    const descriptor = normalizeGapDescriptor( entry );
    if ( descriptor !== null ) descriptors.push( descriptor );
  }
  return descriptors;
}

export type CollectGapsOptions = {
  windowDays?: number;
  now?: Date;
  sources?: readonly GapSource[];
  log?: AppLogger;
};

/**
 * Count normalized gap descriptors across every source table within the
 * window. A table whose query fails contributes nothing.
 */
export function collectRecentGaps(store: TradingStore, opts: CollectGapsOptions = {}): GapCount {
  const windowDays = opts.windowDays ?? GAP_WINDOW_DAYS;
  const cutoff = toLocalDateString( subtractDays( opts.now ?? new Date(), windowDays ) );
  const log = opts.log ?? logger;
  const counts: GapCount = new Map();

  for ( const source of opts.sources ?? GAP_SOURCES ) {
    let fields: string[];
    try {
      fields = store.gapFieldsSince( source, cutoff );
    } catch ( err ) {
      log.warn( { type: "gaps.query_failed", table: source.table, err: errorMessage( err ) } );
      continue;
    }
    for ( const field of fields ) {
      for ( const descriptor of parseGapField( field ) ) {
        counts.set( descriptor, (counts.get( descriptor ) ?? 0) + 1 );
      }
    }
  }
  return counts;
}
