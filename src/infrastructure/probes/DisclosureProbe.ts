import { requestStatus, type StatusRequester } from "@/application/helpers/http";
import type { ProbeOutcome } from "@/types/health";

import { describeRequestError, failed, passed, type Probe } from "./types";

export type DisclosureProbeOptions = {
  url?: string; // default: https://www.capitoltrades.com/trades?page=1
  timeoutMs?: number; // default: 10000
  request?: StatusRequester;
};

// 403 is the site's anti-bot wall; the host still answered
const REACHABLE_STATUSES = new Set( [ 200, 403 ] );

/** Congressional trade-disclosure site. Only reachability is checked. */
export class DisclosureProbe implements Probe {
  public readonly name = "Capitol Trades";
  public readonly critical = false;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly request: StatusRequester;

  constructor(opts: DisclosureProbeOptions = {}) {
    this.url = opts.url || "https://www.capitoltrades.com/trades?page=1";
    this.timeoutMs = opts.timeoutMs ?? 10000;
    this.request = opts.request ?? requestStatus;
  }

  async check(): Promise<ProbeOutcome> {
    const started = Date.now();
    try {
      const status = await this.request( this.url, {
        headers: { "User-Agent": "pipeline-health-auditor" },
        timeoutMs: this.timeoutMs,
      } );
      if ( REACHABLE_STATUSES.has( status ) ) {
        return passed( this, started, `${ this.name } (reachable)`, { httpStatus: status } );
      }
      return failed( this, started, `HTTP ${ status }` );
    } catch ( err ) {
      return failed( this, started, describeRequestError( err ) );
    }
  }
}
