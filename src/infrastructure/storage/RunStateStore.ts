import path from "path";
import { z } from "zod";

import { normalizeGapDescriptor } from "@/application/services/GapCollectorService";
import { logger } from "@/infrastructure/logger";
import { errorMessage } from "@/shared/helpers";
import type { HealthResult, RunState } from "@/types/health";

import { type FileStorageService, getFileStorage } from "./FileStorageService";

/** Persistence port for the single run-state record. */
export interface RunStateStore {
  load(): RunState;

  save(state: RunState): void;
}

export function emptyRunState(): RunState {
  return { flaggedGaps: [], flaggedOn: {} };
}

const stringList = z.array( z.string() );

const healthResultSchema = z.object( {
  status: z.enum( [ "ok", "warning", "critical" ] ),
  summary: z.string(),
  apis_ok: stringList,
  apis_down: stringList,
  signal_healthy: z.boolean(),
  signal_message: z.string(),
  recurring_gaps: stringList,
  new_gaps: stringList,
  new_models: stringList,
  gap_counts: z.record( z.number() ),
  run_date: z.string(),
} );

// Each field is validated on its own so one bad value never costs the rest
const stateFileSchema = z.record( z.unknown() );
const lastRunDateSchema = z.string().min( 1 );
const flaggedGapsSchema = z.array( z.unknown() );
const flaggedOnSchema = z.record( z.unknown() );

type StoredHealthResult = z.infer<typeof healthResultSchema>;
type StoredState = {
  last_run_date?: string;
  flagged_gaps: string[];
  flagged_on: Record<string, string>;
  last_result?: StoredHealthResult;
};

function toStoredResult(result: HealthResult): StoredHealthResult {
  return {
    status: result.status,
    summary: result.summary,
    apis_ok: result.apisOk,
    apis_down: result.apisDown,
    signal_healthy: result.signalHealthy,
    signal_message: result.signalMessage,
    recurring_gaps: result.recurringGaps,
    new_gaps: result.newGaps,
    new_models: result.newModels,
    gap_counts: result.gapCounts,
    run_date: result.runDate,
  };
}

function fromStoredResult(stored: StoredHealthResult): HealthResult {
  return {
    status: stored.status,
    summary: stored.summary,
    apisOk: stored.apis_ok,
    apisDown: stored.apis_down,
    signalHealthy: stored.signal_healthy,
    signalMessage: stored.signal_message,
    recurringGaps: stored.recurring_gaps,
    newGaps: stored.new_gaps,
    newModels: stored.new_models,
    gapCounts: stored.gap_counts,
    runDate: stored.run_date,
  };
}

export function serializeRunState(state: RunState): string {
  const stored: StoredState = {
    last_run_date: state.lastRunDate,
    flagged_gaps: [ ...state.flaggedGaps ].sort(),
    flagged_on: state.flaggedOn,
    last_result: state.lastResult ? toStoredResult( state.lastResult ) : undefined,
  };
  return `${ JSON.stringify( stored, null, 2 ) }\n`;
}

function normalizedFlags(raw: unknown): string[] {
  const parsed = flaggedGapsSchema.safeParse( raw );
  if ( !parsed.success ) return [];
  const flags = new Set<string>();
  for ( const entry of parsed.data ) {
    const descriptor = normalizeGapDescriptor( entry );
    if ( descriptor !== null ) flags.add( descriptor );
  }
  return [ ...flags ].sort();
}

function normalizedFlagDates(raw: unknown): Map<string, string> {
  const dates = new Map<string, string>();
  const parsed = flaggedOnSchema.safeParse( raw );
  if ( !parsed.success ) return dates;
  for ( const [ key, value ] of Object.entries( parsed.data ) ) {
    const descriptor = normalizeGapDescriptor( key );
    if ( descriptor === null || typeof value !== "string" || dates.has( descriptor ) ) continue;
    dates.set( descriptor, value );
  }
  return dates;
}

/**
 * Parse a state file body. A body that is not a JSON object yields the empty
 * state; otherwise each field that fails validation is dropped on its own and
 * non-string flag entries are skipped. Flags are normalized like counted
 * descriptors. Files written before flag dates were tracked get their flags
 * dated with last_run_date.
 */
export function deserializeRunState(raw: string): RunState {
  let json: unknown;
  try {
    json = JSON.parse( raw );
  } catch {
    return emptyRunState();
  }
  const parsed = stateFileSchema.safeParse( json );
  if ( !parsed.success ) return emptyRunState();

  const stored = parsed.data;
  const lastRunDate = lastRunDateSchema.safeParse( stored.last_run_date );
  const lastRun = lastRunDate.success ? lastRunDate.data : undefined;
  const flaggedGaps = normalizedFlags( stored.flagged_gaps );
  const dates = normalizedFlagDates( stored.flagged_on );
  const flaggedOn: Record<string, string> = {};
  for ( const gap of flaggedGaps ) {
    const date = dates.get( gap ) ?? lastRun;
    if ( date ) flaggedOn[gap] = date;
  }
  const lastResult = healthResultSchema.safeParse( stored.last_result );

  return {
    lastRunDate: lastRun,
    flaggedGaps,
    flaggedOn,
    lastResult: lastResult.success ? fromStoredResult( lastResult.data ) : undefined,
  };
}

/**
 * JSON file store. Saves go to a sibling temp file which is then renamed over
 * the target, so readers see either the old or the new record.
 */
export class FileRunStateStore implements RunStateStore {
  private readonly log = logger;

  constructor(
    private readonly filePath: string,
    private readonly storage: FileStorageService = getFileStorage(),
  ) {}

  load(): RunState {
    if ( !this.storage.fileExists( this.filePath ) ) return emptyRunState();
    try {
      return deserializeRunState( this.storage.readFile( this.filePath, "utf-8" ) );
    } catch ( err ) {
      this.log.warn( { type: "state.read_failed", filePath: this.filePath, err: errorMessage( err ) } );
      return emptyRunState();
    }
  }

  save(state: RunState): void {
    this.storage.ensureDir( path.dirname( this.filePath ) );
    const tempPath = `${ this.filePath }.${ process.pid }.tmp`;
    try {
      this.storage.writeFile( tempPath, serializeRunState( state ), { encoding: "utf-8" } );
      this.storage.rename( tempPath, this.filePath );
    } catch ( err ) {
      this.storage.removeFile( tempPath );
      throw err;
    }
  }
}

export class InMemoryRunStateStore implements RunStateStore {
  public saveCount = 0;
  private raw?: string;

  constructor(initial?: RunState) {
    if ( initial ) this.raw = serializeRunState( initial );
  }

  load(): RunState {
    return this.raw ? deserializeRunState( this.raw ) : emptyRunState();
  }

  save(state: RunState): void {
    this.raw = serializeRunState( state );
    this.saveCount += 1;
  }
}
