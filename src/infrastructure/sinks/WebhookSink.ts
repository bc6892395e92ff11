import { fetchJson, HTTP_METHOD, HttpStatusError, type JsonFetcher } from "@/application/helpers/http";
import { formatHealthReportText } from "@/application/helpers/health";

import type { HealthReportEvent, NotificationSink, SinkResult, WebhookSinkOptions } from "./types";

export class WebhookSink implements NotificationSink {
  public readonly kind = "webhook" as const;
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly maxRetries: number;
  private readonly backoffMs: (attempt: number) => number;
  private readonly timeoutMs: number;
  private readonly fetcher: JsonFetcher;

  constructor(options: WebhookSinkOptions, fetcher: JsonFetcher = fetchJson) {
    this.url = options.url;
    this.headers = options.headers || { "content-type": "application/json" };
    this.maxRetries = options.maxRetries ?? 3;
    this.backoffMs = options.backoffMs ?? ((n) => Math.min( 2000, 250 * n ));
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.fetcher = fetcher;
  }

  async send(event: HealthReportEvent): Promise<SinkResult> {
    // `text` lets chat-style incoming webhooks render the report as-is
    const body = JSON.stringify( { ...event, text: formatHealthReportText( event ) } );
    let attempt = 0;
    while ( true ) {
      attempt += 1;
      try {
        await this.fetcher( this.url, {
          method: HTTP_METHOD.POST,
          headers: this.headers,
          body,
          timeoutMs: this.timeoutMs,
        } );
        return { ok: true };
      } catch ( err ) {
        const error = err instanceof Error ? err : new Error( String( err ) );
        const clientError = err instanceof HttpStatusError && err.status < 500;
        if ( clientError || attempt > this.maxRetries ) return { ok: false, error };
        await new Promise( (r) => setTimeout( r, this.backoffMs( attempt ) ) );
      }
    }
  }
}
