import { logger } from "@/infrastructure/logger";

import type { HealthReportEvent, NotificationSink, SinkResult } from "./types";

export class StdoutSink implements NotificationSink {
  public readonly kind = "stdout" as const;

  async send(event: HealthReportEvent): Promise<SinkResult> {
    try {
      const level = event.status === "ok" ? "info" : "warn";
      logger[level]( {
        type: event.type,
        status: event.status,
        summary: event.summary,
        apisDown: event.apisDown,
        newModels: event.newModels,
        recurringGaps: event.recurringGaps,
        timestamp: event.timestamp,
      } );
      return { ok: true };
    } catch ( err ) {
      const error = err instanceof Error ? err : new Error( String( err ) );
      return { ok: false, error };
    }
  }
}
