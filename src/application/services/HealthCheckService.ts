import {
  CURRENT_MODELS,
  GAP_COUNTS_SNAPSHOT_SIZE,
  GAP_RECURRENCE_THRESHOLD,
  GAP_WINDOW_DAYS,
  HEALTH_THROTTLE_DAYS,
  SIGNAL_STALE_MINUTES,
} from "@/application/constants";
import {
  buildSummary,
  deriveStatus,
  formatRecurringGap,
  logHealthResult,
  toNotification,
  topGapCounts,
} from "@/application/helpers/health";
import type { CatalogLister } from "@/infrastructure/catalog";
import type { HealthAuditLog } from "@/infrastructure/database/HealthAuditLog";
import type { TradingStore } from "@/infrastructure/database/TradingStore";
import { type AppLogger, getLogger } from "@/infrastructure/logger";
import type { Probe } from "@/infrastructure/probes";
import type { HealthReportEvent, NotificationSink } from "@/infrastructure/sinks";
import type { RunStateStore } from "@/infrastructure/storage/RunStateStore";
import { errorMessage, parseLocalDate, toLocalDateString, wholeDaysBetween } from "@/shared/helpers";
import type { HealthResult, HealthRunOutcome, RunState } from "@/types/health";

import { collectRecentGaps } from "./GapCollectorService";
import { scanModelUpdates } from "./ModelUpdateService";
import { runProbes } from "./ProbeService";
import { classifyGaps, mergeFlaggedGaps, pruneExpiredFlags, unflag } from "./RecurrenceClassifier";
import { checkSignalRecency } from "./SignalRecencyService";

export type HealthCheckPolicy = {
  throttleDays: number;
  gapWindowDays: number;
  gapRecurrenceThreshold: number;
  signalStaleMinutes: number;
  flaggedGapTtlDays?: number;
  currentModels: readonly string[];
};

export const DEFAULT_HEALTH_POLICY: HealthCheckPolicy = {
  throttleDays: HEALTH_THROTTLE_DAYS,
  gapWindowDays: GAP_WINDOW_DAYS,
  gapRecurrenceThreshold: GAP_RECURRENCE_THRESHOLD,
  signalStaleMinutes: SIGNAL_STALE_MINUTES,
  currentModels: CURRENT_MODELS,
};

export type HealthCheckDeps = {
  store: TradingStore;
  stateStore: RunStateStore;
  probes: readonly Probe[];
  catalog: CatalogLister;
  auditLog?: HealthAuditLog;
  sinks?: readonly NotificationSink[];
  policy?: Partial<HealthCheckPolicy>;
  clock?: () => Date;
  log?: AppLogger;
};

export type ThrottleDecision =
  | { due: true }
  | { due: false; daysSinceLastRun: number };

/** A run is due when forced, never run, unparseable, or at least `throttleDays` old */
export function checkThrottle(state: RunState, now: Date, throttleDays: number, force: boolean): ThrottleDecision {
  if ( force || !state.lastRunDate ) return { due: true };
  const last = parseLocalDate( state.lastRunDate );
  if ( !last ) return { due: true };
  const daysSinceLastRun = wholeDaysBetween( last, now );
  return daysSinceLastRun < throttleDays ? { due: false, daysSinceLastRun } : { due: true };
}

/**
 * Periodic pipeline health audit. One `run` loads state, checks the throttle,
 * runs every check, and saves state once at the end.
 */
export class HealthCheckService {
  private readonly deps: HealthCheckDeps;
  private readonly policy: HealthCheckPolicy;
  private readonly clock: () => Date;
  private readonly log: AppLogger;

  constructor(deps: HealthCheckDeps) {
    this.deps = deps;
    this.policy = { ...DEFAULT_HEALTH_POLICY, ...deps.policy };
    this.clock = deps.clock ?? (() => new Date());
    this.log = deps.log ?? getLogger( "health" );
  }

  /**
   * Throws StoreSetupError when the trading database is missing; every other
   * failure is folded into the result.
   */
  async run(opts: { force?: boolean } = {}): Promise<HealthRunOutcome> {
    const now = this.clock();
    const today = toLocalDateString( now );
    const state = this.deps.stateStore.load();

    const throttle = checkThrottle( state, now, this.policy.throttleDays, opts.force ?? false );
    if ( !throttle.due ) {
      const nextInDays = this.policy.throttleDays - throttle.daysSinceLastRun;
      this.log.info( {
        type: "health.skipped",
        daysSinceLastRun: throttle.daysSinceLastRun,
        nextInDays,
      } );
      return {
        kind: "skipped",
        summary: `Last ran ${ throttle.daysSinceLastRun }d ago`,
        runDate: today,
        daysSinceLastRun: throttle.daysSinceLastRun,
      };
    }

    this.deps.store.verify();
    this.log.info( { type: "health.run", force: opts.force ?? false, runDate: today } );

    const [ probeReport, newModels ] = await Promise.all( [
      runProbes( this.deps.probes, this.log ),
      scanModelUpdates( this.deps.catalog, {
        currentModels: this.policy.currentModels,
        log: this.log,
      } ),
    ] );
    const recency = checkSignalRecency( this.deps.store, {
      now,
      staleMinutes: this.policy.signalStaleMinutes,
    } );
    const gapCounts = collectRecentGaps( this.deps.store, {
      now,
      windowDays: this.policy.gapWindowDays,
      log: this.log,
    } );

    const activeFlags = pruneExpiredFlags( state, now, this.policy.flaggedGapTtlDays );
    const expired = state.flaggedGaps.filter( (g) => !activeFlags.flaggedGaps.includes( g ) );
    if ( expired.length > 0 ) this.log.info( { type: "gaps.flags_expired", expired } );

    const classification = classifyGaps( gapCounts, activeFlags.flaggedGaps, this.policy.gapRecurrenceThreshold );
    const recurringGaps = classification.recurring.map( formatRecurringGap );

    const result: HealthResult = {
      status: deriveStatus( probeReport.outcomes, recency.healthy ),
      summary: buildSummary( {
        apisOk: probeReport.apisOk,
        apisDown: probeReport.apisDown,
        signalHealthy: recency.healthy,
        recurringGaps,
        newModels,
      } ),
      apisOk: probeReport.apisOk,
      apisDown: probeReport.apisDown,
      signalHealthy: recency.healthy,
      signalMessage: recency.message,
      recurringGaps,
      newGaps: classification.newGaps,
      newModels,
      gapCounts: topGapCounts( gapCounts, GAP_COUNTS_SNAPSHOT_SIZE ),
      runDate: today,
    };
    logHealthResult( this.log, result );

    const flags = mergeFlaggedGaps( activeFlags, classification.recurring, today );
    const nextState: RunState = {
      lastRunDate: today,
      flaggedGaps: flags.flaggedGaps,
      flaggedOn: flags.flaggedOn,
      lastResult: result,
    };
    this.deps.stateStore.save( nextState );

    return { kind: "completed", result, state: nextState };
  }

  /**
   * Run, then write the audit row and notify every sink. Skipped runs notify
   * nobody. Audit and sink failures are logged only.
   */
  async runAndNotify(opts: { force?: boolean } = {}): Promise<HealthRunOutcome> {
    const outcome = await this.run( opts );
    if ( outcome.kind === "skipped" ) return outcome;
    const { result } = outcome;

    if ( this.deps.auditLog ) {
      try {
        this.deps.auditLog.record( result );
      } catch ( err ) {
        this.log.warn( { type: "health.audit_failed", err: errorMessage( err ) } );
      }
    }

    const event: HealthReportEvent = {
      type: "health_report",
      timestamp: this.clock().toISOString(),
      ...toNotification( result ),
    };
    await Promise.all( (this.deps.sinks ?? []).map( async (sink) => {
      try {
        const sent = await sink.send( event );
        if ( !sent.ok ) this.log.warn( { type: "sink.failed", sink: sink.kind, err: sent.error.message } );
      } catch ( err ) {
        this.log.warn( { type: "sink.failed", sink: sink.kind, err: errorMessage( err ) } );
      }
    } ) );

    return outcome;
  }

  /**
   * Remove descriptors from the persisted flagged set so they can alert again.
   * Returns the descriptors that were actually flagged.
   */
  unflagGaps(descriptors: readonly string[]): string[] {
    const state = this.deps.stateStore.load();
    const { flags, removed } = unflag( state, descriptors );
    if ( removed.length === 0 ) return [];
    this.deps.stateStore.save( { ...state, ...flags } );
    this.log.info( { type: "gaps.unflagged", removed } );
    return removed;
  }
}
