export const HEALTH_THROTTLE_DAYS = 13;
export const GAP_WINDOW_DAYS = 14;
export const GAP_RECURRENCE_THRESHOLD = 2;
export const SIGNAL_STALE_MINUTES = 30;
export const GAP_COUNTS_SNAPSHOT_SIZE = 20;

export const PROBE_TIMEOUT_MS = 10_000;
export const CLI_TIMEOUT_MS = 20_000;

export const CURRENT_MODELS: readonly string[] = [
  "gemini-2.5-flash",
  "gemini-3-pro-preview",
];

export const TRACKED_MODEL_PREFIXES: readonly string[] = [
  "gemini-2.5",
  "gemini-3",
  "gemini-3.1",
  "gemini-2.0",
];

/** Sentinel gap values the briefing writers emit when nothing was missing */
export const GAP_SENTINELS: readonly string[] = [ "", "none" ];

export type GapSource = {
  table: string;
  dateColumn: string;
};

export const GAP_SOURCES: readonly GapSource[] = [
  { table: "daily_briefings", dateColumn: "date" },
  { table: "conditional_tracking", dateColumn: "date_created" },
];
