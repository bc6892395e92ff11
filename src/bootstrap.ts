import { HealthCheckService } from "@/application/services";
import { type AppConfig, loadProviderCredentials } from "@/config";
import { GeminiCatalogLister } from "@/infrastructure/catalog";
import { SqliteHealthAuditLog } from "@/infrastructure/database/HealthAuditLog";
import { SqliteTradingStore } from "@/infrastructure/database/TradingStore";
import { createDefaultProbes } from "@/infrastructure/probes";
import { buildSinks } from "@/infrastructure/sinks";
import { FileRunStateStore } from "@/infrastructure/storage/RunStateStore";

export type HealthCheckRuntime = {
  service: HealthCheckService;
  store: SqliteTradingStore;
};

/** Wire the production collaborators from validated config. */
export function createHealthCheckRuntime(cfg: AppConfig): HealthCheckRuntime {
  const store = new SqliteTradingStore( cfg.dbPath );
  const credentials = loadProviderCredentials( cfg.credentialsPath, { fredApiKey: cfg.fredApiKey } );

  const service = new HealthCheckService( {
    store,
    stateStore: new FileRunStateStore( cfg.statePath ),
    probes: createDefaultProbes( {
      probeTimeoutMs: cfg.probeTimeoutMs,
      cliTimeoutMs: cfg.cliTimeoutMs,
      geminiBin: cfg.geminiBin,
      fredApiKey: credentials.fredApiKey,
    } ),
    catalog: new GeminiCatalogLister( {
      bin: cfg.geminiBin,
      timeoutMs: cfg.cliTimeoutMs,
      trackedPrefixes: cfg.trackedModelPrefixes,
    } ),
    auditLog: cfg.auditLogEnabled ? new SqliteHealthAuditLog( store ) : undefined,
    sinks: buildSinks( cfg.sinks ),
    policy: {
      throttleDays: cfg.throttleDays,
      gapWindowDays: cfg.gapWindowDays,
      gapRecurrenceThreshold: cfg.gapRecurrenceThreshold,
      signalStaleMinutes: cfg.signalStaleMinutes,
      flaggedGapTtlDays: cfg.flaggedGapTtlDays,
      currentModels: cfg.currentModels,
    },
  } );
  return { service, store };
}
