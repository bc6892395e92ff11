import { requestStatus, type StatusRequester } from "@/application/helpers/http";
import type { ProbeOutcome } from "@/types/health";

import { describeRequestError, failed, passed, type Probe } from "./types";

export type FredProbeOptions = {
  apiKey?: string;
  seriesId?: string; // default: DGS10
  baseUrl?: string; // default: https://api.stlouisfed.org
  timeoutMs?: number; // default: 10000
  request?: StatusRequester;
};

/** Macro-data provider. Without an API key the probe reports down without a request. */
export class FredProbe implements Probe {
  public readonly name = "FRED";
  public readonly critical = false;
  private readonly apiKey?: string;
  private readonly seriesId: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly request: StatusRequester;

  constructor(opts: FredProbeOptions = {}) {
    this.apiKey = opts.apiKey?.trim() || undefined;
    this.seriesId = opts.seriesId || "DGS10";
    this.baseUrl = (opts.baseUrl || "https://api.stlouisfed.org").replace( /\/$/, "" );
    this.timeoutMs = opts.timeoutMs ?? 10000;
    this.request = opts.request ?? requestStatus;
  }

  async check(): Promise<ProbeOutcome> {
    const started = Date.now();
    if ( !this.apiKey ) return failed( this, started, "no api_key configured" );

    const params = new URLSearchParams( {
      series_id: this.seriesId,
      api_key: this.apiKey,
      limit: "1",
      sort_order: "desc",
      file_type: "json",
    } );
    try {
      const status = await this.request( `${ this.baseUrl }/fred/series/observations?${ params.toString() }`, {
        headers: { "Accept": "application/json" },
        timeoutMs: this.timeoutMs,
      } );
      if ( status === 200 ) return passed( this, started );
      return failed( this, started, `HTTP ${ status }` );
    } catch ( err ) {
      return failed( this, started, describeRequestError( err ) );
    }
  }
}
