import type { AppLogger } from "@/infrastructure/logger";
import type {
  GapCount,
  HealthNotification,
  HealthResult,
  HealthStatus,
  ProbeOutcome,
  RecurringGap,
} from "@/types/health";

/**
 * First match wins: a failed critical probe, then any failure or a stale
 * monitoring loop, then ok.
 */
export function deriveStatus(outcomes: readonly ProbeOutcome[], signalHealthy: boolean): HealthStatus {
  const down = outcomes.filter( (o) => !o.ok );
  if ( down.some( (o) => o.critical ) ) return "critical";
  if ( down.length > 0 || !signalHealthy ) return "warning";
  return "ok";
}

export type SummaryInput = {
  apisOk: readonly string[];
  apisDown: readonly string[];
  signalHealthy: boolean;
  recurringGaps: readonly unknown[];
  newModels: readonly unknown[];
};

export function buildSummary(input: SummaryInput): string {
  const total = input.apisOk.length + input.apisDown.length;
  const parts = [ `${ input.apisOk.length }/${ total } APIs healthy` ];
  if ( !input.signalHealthy ) parts.push( "monitoring loop stale" );
  if ( input.recurringGaps.length > 0 ) parts.push( `${ input.recurringGaps.length } recurring gaps need coding` );
  if ( input.newModels.length > 0 ) parts.push( `${ input.newModels.length } model update(s) available` );
  return parts.join( " | " );
}

export function formatRecurringGap(gap: RecurringGap): string {
  return `${ gap.descriptor } (×${ gap.count })`;
}

/** Top-N descriptors by count; ties keep first-seen order */
export function topGapCounts(counts: GapCount, limit: number): Record<string, number> {
  const sorted = [ ...counts.entries() ].sort( (a, b) => b[1] - a[1] );
  return Object.fromEntries( sorted.slice( 0, limit ) );
}

export function toNotification(result: HealthResult): HealthNotification {
  return {
    status: result.status,
    summary: result.summary,
    apisDown: result.apisDown,
    newModels: result.newModels,
    recurringGaps: result.recurringGaps,
  };
}

const STATUS_TAG: Record<HealthStatus, string> = {
  ok: "OK",
  warning: "WARNING",
  critical: "CRITICAL",
};

/** Plain-text rendering of a report, one fact per line */
export function formatHealthReportText(report: HealthNotification): string {
  const lines = [ `[${ STATUS_TAG[report.status] }] System health: ${ report.summary }` ];
  if ( report.apisDown.length > 0 ) lines.push( `APIs down: ${ report.apisDown.join( ", " ) }` );
  if ( report.recurringGaps.length > 0 ) lines.push( `Recurring gaps: ${ report.recurringGaps.join( " | " ) }` );
  if ( report.newModels.length > 0 ) lines.push( `New models: ${ report.newModels.join( ", " ) }` );
  return lines.join( "\n" );
}

export function logProbeOutcome(log: AppLogger, outcome: ProbeOutcome): void {
  const payload = {
    type: "health.probe",
    provider: outcome.name,
    ok: outcome.ok,
    latencyMs: outcome.latencyMs,
    details: outcome.details,
  } as const;
  if ( outcome.ok ) {
    log.debug( payload );
  } else {
    log.warn( payload );
  }
}

export function logHealthResult(log: AppLogger, result: HealthResult): void {
  const level = result.status === "ok" ? "info" : "warn";
  log[level]( { type: "health.result", status: result.status, msg: result.summary } );
  if ( result.apisDown.length > 0 ) log.warn( { type: "health.apis_down", apisDown: result.apisDown } );
  log.info( { type: "health.signal", healthy: result.signalHealthy, msg: result.signalMessage } );
  if ( result.recurringGaps.length > 0 ) {
    log.info( { type: "health.recurring_gaps", recurringGaps: result.recurringGaps } );
  }
  if ( result.newModels.length > 0 ) log.info( { type: "health.new_models", newModels: result.newModels } );
}
