export type HealthStatus = "ok" | "warning" | "critical";

export type ProbeOutcome = {
  name: string;
  ok: boolean;
  /** Label appended to apisOk / apisDown */
  label: string;
  /** A failure of a critical probe turns the whole run critical */
  critical: boolean;
  latencyMs: number;
  checkedAt: string;
  details?: Record<string, unknown>;
};

export type ProbeSetReport = {
  apisOk: string[];
  apisDown: string[];
  outcomes: ProbeOutcome[];
};

export type RecencyResult =
  | { healthy: false; kind: "no_cycles"; message: string }
  | { healthy: false; kind: "query_failed"; message: string }
  | { healthy: true; kind: "unparseable"; message: string; lastTimestamp: string }
  | { healthy: boolean; kind: "measured"; message: string; lastTimestamp: string; ageMinutes: number };

export type GapCount = Map<string, number>;

export type RecurringGap = {
  descriptor: string;
  count: number;
};

export type GapClassification = {
  recurring: RecurringGap[];
  newGaps: string[];
};

export type HealthResult = {
  status: HealthStatus;
  summary: string;
  apisOk: string[];
  apisDown: string[];
  signalHealthy: boolean;
  signalMessage: string;
  recurringGaps: string[];
  newGaps: string[];
  newModels: string[];
  gapCounts: Record<string, number>;
  runDate: string;
};

export type HealthNotification = Pick<HealthResult, "status" | "summary" | "apisDown" | "newModels" | "recurringGaps">;

export type RunState = {
  lastRunDate?: string;
  flaggedGaps: string[];
  /** descriptor -> local date it was first flagged */
  flaggedOn: Record<string, string>;
  lastResult?: HealthResult;
};

export type HealthRunOutcome =
  | { kind: "skipped"; summary: string; runDate: string; daysSinceLastRun: number }
  | { kind: "completed"; result: HealthResult; state: RunState };
