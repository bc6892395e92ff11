import type { SinksConfig } from "@/config";
import { logger } from "@/infrastructure/logger";

import { FileSink } from "./FileSink";
import { StdoutSink } from "./StdoutSink";
import type { NotificationSink } from "./types";
import { WebhookSink } from "./WebhookSink";

export { FileSink } from "./FileSink";
export { StdoutSink } from "./StdoutSink";
export { WebhookSink } from "./WebhookSink";
export type { HealthReportEvent, NotificationSink, SinkKind, SinkResult } from "./types";

/** Instantiate enabled sinks; a sink enabled without its settings is skipped with a warning. */
export function buildSinks(config: SinksConfig): NotificationSink[] {
  const sinks: NotificationSink[] = [];
  for ( const kind of config.enabled ) {
    switch ( kind ) {
      case "stdout":
        sinks.push( new StdoutSink() );
        break;
      case "file":
        if ( config.file ) sinks.push( new FileSink( config.file ) );
        else logger.warn( { type: "sink.misconfigured", sink: kind, msg: "SINK_FILE_PATH is not set" } );
        break;
      case "webhook":
        if ( config.webhook ) sinks.push( new WebhookSink( config.webhook ) );
        else logger.warn( { type: "sink.misconfigured", sink: kind, msg: "SINK_WEBHOOK_URL is not set" } );
        break;
      default:
        logger.warn( { type: "sink.unknown", sink: kind } );
    }
  }
  return sinks;
}
