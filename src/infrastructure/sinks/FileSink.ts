import path from "path";

import { getFileStorage } from "@/infrastructure/storage/FileStorageService";

import type { FileSinkOptions, HealthReportEvent, NotificationSink, SinkResult } from "./types";

/** Appends one NDJSON line per report. */
export class FileSink implements NotificationSink {
  public readonly kind = "file" as const;
  private readonly filePath: string;

  constructor(options: FileSinkOptions) {
    this.filePath = options.path;
  }

  async send(event: HealthReportEvent): Promise<SinkResult> {
    try {
      const storage = getFileStorage();
      storage.ensureDir( path.dirname( this.filePath ) );
      storage.appendFile( this.filePath, `${ JSON.stringify( event ) }\n` );
      return { ok: true };
    } catch ( err ) {
      const error = err instanceof Error ? err : new Error( String( err ) );
      return { ok: false, error };
    }
  }
}
