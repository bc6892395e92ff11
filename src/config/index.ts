import path from "path";
import { z } from "zod";

import {
  CLI_TIMEOUT_MS,
  CURRENT_MODELS,
  GAP_RECURRENCE_THRESHOLD,
  GAP_WINDOW_DAYS,
  HEALTH_THROTTLE_DAYS,
  PROBE_TIMEOUT_MS,
  SIGNAL_STALE_MINUTES,
  TRACKED_MODEL_PREFIXES,
} from "@/application/constants";
import { findProjectRoot } from "@/infrastructure/storage/FileStorageService";
import { parseCsv } from "@/shared/helpers";

import { loadEnvFiles } from "./env";

export { loadProviderCredentials } from "./credentials";
export type { ProviderCredentials } from "./credentials";

export type SinksConfig = {
  enabled: string[];
  file?: { path: string };
  webhook?: { url: string; headers?: Record<string, string>; maxRetries?: number };
};

export type AppConfig = {
  // storage
  dbPath: string;
  statePath: string;
  credentialsPath: string;
  fredApiKey?: string;
  // policy
  throttleDays: number;
  gapWindowDays: number;
  gapRecurrenceThreshold: number;
  signalStaleMinutes: number;
  /** Days after which a flagged gap may alert again; undefined keeps flags forever */
  flaggedGapTtlDays?: number;
  // probes
  probeTimeoutMs: number;
  cliTimeoutMs: number;
  geminiBin: string;
  currentModels: string[];
  trackedModelPrefixes: string[];
  // outputs
  auditLogEnabled: boolean;
  sinks: SinksConfig;
  // logger
  environment: string;
  serviceName: string;
  logLevel: string;
  logPretty: boolean;
};

const booleanish = z.union( [ z.string(), z.boolean() ] ).optional();

const envSchema = z.object( {
  HEALTH_DATA_DIR: z.string().optional(),
  HEALTH_DB_PATH: z.string().optional(),
  HEALTH_STATE_PATH: z.string().optional(),
  HEALTH_CREDENTIALS_PATH: z.string().optional(),
  FRED_API_KEY: z.string().optional(),
  HEALTH_THROTTLE_DAYS: z.coerce.number().int().min( 0 ).default( HEALTH_THROTTLE_DAYS ),
  GAP_WINDOW_DAYS: z.coerce.number().int().min( 1 ).default( GAP_WINDOW_DAYS ),
  GAP_RECURRENCE_THRESHOLD: z.coerce.number().int().min( 1 ).default( GAP_RECURRENCE_THRESHOLD ),
  SIGNAL_STALE_MINUTES: z.coerce.number().positive().default( SIGNAL_STALE_MINUTES ),
  FLAGGED_GAP_TTL_DAYS: z.preprocess(
    (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
    z.coerce.number().int().min( 1 ).optional(),
  ),
  PROBE_TIMEOUT_MS: z.coerce.number().int().min( 1 ).default( PROBE_TIMEOUT_MS ),
  CLI_TIMEOUT_MS: z.coerce.number().int().min( 1 ).default( CLI_TIMEOUT_MS ),
  GEMINI_BIN: z.string().optional().default( "gemini" ),
  CURRENT_MODELS: z.string().optional(),
  TRACKED_MODEL_PREFIXES: z.string().optional(),
  AUDIT_LOG_ENABLED: booleanish,
  SINKS_ENABLED: z.string().optional().default( "stdout" ),
  SINK_FILE_PATH: z.string().optional(),
  SINK_WEBHOOK_URL: z.string().url( { message: "must be a valid URL" } ).optional(),
  SINK_WEBHOOK_HEADERS: z.string().optional(),
  SINK_WEBHOOK_MAX_RETRIES: z.coerce.number().int().min( 0 ).optional(),
  APP_ENV: z.string().optional(),
  NODE_ENV: z.string().optional(),
  LOG_SERVICE_NAME: z.string().optional().default( "pipeline-health-auditor" ),
  LOG_LEVEL: z.string().optional(),
  LOG_PRETTY: booleanish,
} );

const tips: Record<string, string> = {
  HEALTH_THROTTLE_DAYS: "Use a non-negative integer; defaults to 13",
  GAP_WINDOW_DAYS: "Use a positive integer; defaults to 14",
  GAP_RECURRENCE_THRESHOLD: "Use a positive integer; defaults to 2",
  SIGNAL_STALE_MINUTES: "Use a positive number of minutes; defaults to 30",
  FLAGGED_GAP_TTL_DAYS: "Use a positive integer, or leave unset to keep flags forever",
  PROBE_TIMEOUT_MS: "Use a positive integer; defaults to 10000",
  CLI_TIMEOUT_MS: "Use a positive integer; defaults to 20000",
  SINKS_ENABLED: "CSV list of enabled sinks, e.g. stdout,file,webhook",
  SINK_WEBHOOK_URL: "Set to an http(s) URL, e.g. https://hooks.example.com/health",
  SINK_WEBHOOK_HEADERS: "JSON object string, e.g. {\"Authorization\":\"Bearer ...\"}",
  LOG_PRETTY: "Use true or false (defaults to true in development)",
};

const headersSchema = z.record( z.string() );

function isTruthy(raw: string | boolean | undefined, fallback: boolean): boolean {
  if ( raw === undefined ) return fallback;
  if ( typeof raw === "boolean" ) return raw;
  const value = raw.trim().toLowerCase();
  if ( !value ) return fallback;
  return [ "1", "true", "yes", "on" ].includes( value );
}

function parseWebhookHeaders(raw: string | undefined): Record<string, string> | undefined {
  if ( !raw || !raw.trim() ) return undefined;
  let json: unknown;
  try {
    json = JSON.parse( raw.trim() );
  } catch {
    throw new Error( "Environment validation failed:\n- SINK_WEBHOOK_HEADERS: must be valid JSON. Tip: e.g. {\"Authorization\":\"Bearer ...\"}" );
  }
  const parsed = headersSchema.safeParse( json );
  if ( !parsed.success ) {
    throw new Error( "Environment validation failed:\n- SINK_WEBHOOK_HEADERS: must be a JSON object of string values." );
  }
  return parsed.data;
}

function resolvePath(raw: string | undefined, fallback: string, baseDir: string): string {
  const value = raw?.trim();
  if ( !value ) return fallback;
  return path.isAbsolute( value ) ? value : path.join( baseDir, value );
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  if ( source === process.env ) loadEnvFiles();

  const result = envSchema.safeParse( source );
  if ( !result.success ) {
    const details = result.error.issues.map( (issue) => {
      const keyName = String( issue.path[0] ?? issue.code );
      const tip = tips[keyName] ? ` Tip: ${ tips[keyName] }.` : "";
      return `- ${ keyName }: ${ issue.message }.${ tip }`;
    } ).join( "\n" );
    throw new Error( `Environment validation failed:\n${ details }` );
  }
  const env = result.data;

  const projectRoot = findProjectRoot( process.cwd() );
  const dataDir = resolvePath( env.HEALTH_DATA_DIR, path.join( projectRoot, "trading_data" ), projectRoot );

  const environment = (env.APP_ENV || env.NODE_ENV || "development").trim();
  const defaultLevel = environment === "development" ? "debug" : "info";
  const currentModels = parseCsv( env.CURRENT_MODELS ).map( (m) => m.toLowerCase() );
  const trackedPrefixes = parseCsv( env.TRACKED_MODEL_PREFIXES ).map( (m) => m.toLowerCase() );
  const fredApiKey = env.FRED_API_KEY?.trim();

  return {
    dbPath: resolvePath( env.HEALTH_DB_PATH, path.join( dataDir, "trading_history.db" ), projectRoot ),
    statePath: resolvePath( env.HEALTH_STATE_PATH, path.join( dataDir, "health_state.json" ), projectRoot ),
    credentialsPath: resolvePath(
      env.HEALTH_CREDENTIALS_PATH,
      path.join( dataDir, "orchestrator_config.json" ),
      projectRoot,
    ),
    fredApiKey: fredApiKey || undefined,
    throttleDays: env.HEALTH_THROTTLE_DAYS,
    gapWindowDays: env.GAP_WINDOW_DAYS,
    gapRecurrenceThreshold: env.GAP_RECURRENCE_THRESHOLD,
    signalStaleMinutes: env.SIGNAL_STALE_MINUTES,
    flaggedGapTtlDays: env.FLAGGED_GAP_TTL_DAYS,
    probeTimeoutMs: env.PROBE_TIMEOUT_MS,
    cliTimeoutMs: env.CLI_TIMEOUT_MS,
    geminiBin: env.GEMINI_BIN.trim() || "gemini",
    currentModels: currentModels.length > 0 ? currentModels : [ ...CURRENT_MODELS ],
    trackedModelPrefixes: trackedPrefixes.length > 0 ? trackedPrefixes : [ ...TRACKED_MODEL_PREFIXES ],
    auditLogEnabled: isTruthy( env.AUDIT_LOG_ENABLED, true ),
    sinks: {
      enabled: parseCsv( env.SINKS_ENABLED ).map( (s) => s.toLowerCase() ),
      file: env.SINK_FILE_PATH?.trim()
        ? { path: resolvePath( env.SINK_FILE_PATH, "", projectRoot ) }
        : undefined,
      webhook: env.SINK_WEBHOOK_URL ? {
        url: env.SINK_WEBHOOK_URL.trim(),
        headers: parseWebhookHeaders( env.SINK_WEBHOOK_HEADERS ),
        maxRetries: env.SINK_WEBHOOK_MAX_RETRIES,
      } : undefined,
    },
    environment,
    serviceName: env.LOG_SERVICE_NAME.trim(),
    logLevel: (env.LOG_LEVEL || defaultLevel).trim(),
    logPretty: isTruthy( env.LOG_PRETTY, environment === "development" ),
  };
}
