import { z } from "zod";

import { fetchJson, type JsonFetcher } from "@/application/helpers/http";
import type { ProbeOutcome } from "@/types/health";

import { describeRequestError, failed, passed, type Probe } from "./types";

export type MarketDataProbeOptions = {
  symbol?: string; // default: SPY
  baseUrl?: string; // default: https://query1.finance.yahoo.com
  timeoutMs?: number; // default: 10000
  fetcher?: JsonFetcher;
};

const chartSchema = z.object( {
  chart: z.object( {
    result: z.array( z.object( {
      timestamp: z.array( z.number() ).optional(),
    } ) ).nullable(),
  } ),
} );

/** Pulls one day of daily bars from the Yahoo Finance chart endpoint. */
export class MarketDataProbe implements Probe {
  public readonly name = "Yahoo Finance";
  public readonly critical = true;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetcher: JsonFetcher;

  constructor(opts: MarketDataProbeOptions = {}) {
    const baseUrl = (opts.baseUrl || "https://query1.finance.yahoo.com").replace( /\/$/, "" );
    const symbol = encodeURIComponent( opts.symbol || "SPY" );
    this.url = `${ baseUrl }/v8/finance/chart/${ symbol }?range=1d&interval=1d`;
    this.timeoutMs = opts.timeoutMs ?? 10000;
    this.fetcher = opts.fetcher ?? fetchJson;
  }

  async check(): Promise<ProbeOutcome> {
    const started = Date.now();
    try {
      const json = await this.fetcher( this.url, {
        headers: { "User-Agent": "pipeline-health-auditor" },
        timeoutMs: this.timeoutMs,
      } );
      const parsed = chartSchema.safeParse( json );
      const bars = parsed.success ? (parsed.data.chart.result?.[0]?.timestamp?.length ?? 0) : 0;
      if ( bars === 0 ) return failed( this, started, "empty response" );
      return passed( this, started, this.name, { bars } );
    } catch ( err ) {
      return failed( this, started, describeRequestError( err ) );
    }
  }
}
