export { collectRecentGaps, normalizeGapDescriptor, parseGapField } from "./GapCollectorService";
export { checkThrottle, DEFAULT_HEALTH_POLICY, HealthCheckService } from "./HealthCheckService";
export type { HealthCheckDeps, HealthCheckPolicy, ThrottleDecision } from "./HealthCheckService";
export { diffModelIdentifiers, scanModelUpdates } from "./ModelUpdateService";
export { runProbes } from "./ProbeService";
export { classifyGaps, mergeFlaggedGaps, pruneExpiredFlags, unflag } from "./RecurrenceClassifier";
export { checkSignalRecency, parseMonitoringTimestamp } from "./SignalRecencyService";
