import Database from "better-sqlite3";
import { z } from "zod";

import type { GapSource } from "@/application/constants";
import { getFileStorage } from "@/infrastructure/storage/FileStorageService";
import { StoreSetupError } from "@/shared/errors";
import { errorMessage } from "@/shared/helpers";

/**
 * Read side of the trading database used by the health checks.
 * Query methods throw on failure; callers decide how to degrade.
 */
export interface TradingStore {
  /** Throws StoreSetupError when the database is missing or cannot be opened */
  verify(): void;

  /** `monitoring_date || ' ' || monitoring_time` of the newest cycle, or null */
  latestMonitoringTimestamp(): string | null;

  /** Raw data_gaps_json values of rows dated on or after `cutoff` (YYYY-MM-DD) */
  gapFieldsSince(source: GapSource, cutoff: string): string[];

  close(): void;
}

const latestCycleRow = z.object( { last_ts: z.string().nullable() } ).optional();

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function assertIdentifier(name: string): string {
  if ( !IDENTIFIER.test( name ) ) throw new Error( `Invalid SQL identifier: ${ name }` );
  return name;
}

export class SqliteTradingStore implements TradingStore {
  private readonly dbPath: string;
  private db?: Database.Database;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  verify(): void {
    if ( !getFileStorage().fileExists( this.dbPath ) ) {
      throw new StoreSetupError( `Trading database not found at ${ this.dbPath }`, this.dbPath );
    }
    try {
      this.connection();
    } catch ( err ) {
      throw new StoreSetupError(
        `Trading database at ${ this.dbPath } could not be opened: ${ errorMessage( err ) }`,
        this.dbPath,
        { cause: err },
      );
    }
  }

  connection(): Database.Database {
    if ( this.db ) return this.db;
    const db = new Database( this.dbPath, { fileMustExist: true, timeout: 5000 } );
    db.pragma( "journal_mode = WAL" );
    this.db = db;
    return db;
  }

  latestMonitoringTimestamp(): string | null {
    const row = this.connection().prepare( `
      SELECT monitoring_date || ' ' || monitoring_time AS last_ts
      FROM signal_monitoring
      ORDER BY monitoring_date DESC, monitoring_time DESC
      LIMIT 1
    ` ).get();
    const parsed = latestCycleRow.parse( row );
    return parsed?.last_ts ?? null;
  }

  gapFieldsSince(source: GapSource, cutoff: string): string[] {
    const table = assertIdentifier( source.table );
    const column = assertIdentifier( source.dateColumn );
    const values = this.connection().prepare( `
      SELECT data_gaps_json FROM ${ table }
      WHERE ${ column } >= ? AND data_gaps_json IS NOT NULL
    ` ).pluck().all( cutoff );
    return values.filter( (v): v is string => typeof v === "string" );
  }

  close(): void {
    if ( !this.db ) return;
    this.db.close();
    this.db = undefined;
  }
}
