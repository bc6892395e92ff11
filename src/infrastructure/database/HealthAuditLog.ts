import type { HealthResult } from "@/types/health";

import type { SqliteTradingStore } from "./TradingStore";

export interface HealthAuditLog {
  record(result: HealthResult): void;
}

/** Append-only `health_checks` table, one row per completed run. */
export class SqliteHealthAuditLog implements HealthAuditLog {
  private initialized = false;

  constructor(private readonly store: SqliteTradingStore) {}

  record(result: HealthResult): void {
    const db = this.store.connection();
    if ( !this.initialized ) {
      db.exec( `
        CREATE TABLE IF NOT EXISTS health_checks (
          id                  INTEGER PRIMARY KEY AUTOINCREMENT,
          run_date            TEXT NOT NULL,
          status              TEXT NOT NULL,
          summary             TEXT,
          apis_ok_json        TEXT,
          apis_down_json      TEXT,
          signal_healthy      INTEGER,
          signal_message      TEXT,
          recurring_gaps_json TEXT,
          new_gaps_json       TEXT,
          new_models_json     TEXT,
          gap_counts_json     TEXT,
          created_at          TIMESTAMP DEFAULT CURRENT_TIMESTAMP
        )
      ` );
      this.initialized = true;
    }
    db.prepare( `
      INSERT INTO health_checks
      (run_date, status, summary, apis_ok_json, apis_down_json,
       signal_healthy, signal_message, recurring_gaps_json,
       new_gaps_json, new_models_json, gap_counts_json)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ` ).run(
      result.runDate,
      result.status,
      result.summary,
      JSON.stringify( result.apisOk ),
      JSON.stringify( result.apisDown ),
      result.signalHealthy ? 1 : 0,
      result.signalMessage,
      JSON.stringify( result.recurringGaps ),
      JSON.stringify( result.newGaps ),
      JSON.stringify( result.newModels ),
      JSON.stringify( result.gapCounts ),
    );
  }
}
