import os from "os";
import path from "path";
import pino, { type Logger as PinoLogger } from "pino";

import { loadEnvFiles } from "@/config/env";
import { findProjectRoot } from "@/infrastructure/storage/FileStorageService";

import {
  buildStdoutStream,
  createFileDestination,
  ensureFile,
  getLoggingEnv,
  normalizeLogFileName,
} from "./helpers";

export type AppLogger = PinoLogger;

const cachedByFileName: Map<string, AppLogger> = new Map();

/**
 * Logger writing NDJSON to logs/output.ndjson and stdout. When a component
 * name is given, records are also written to logs/<name>.ndjson.
 */
export function getLogger(fileName?: string): AppLogger {
  const name = fileName?.trim();
  const cacheKey = name || "__default__";
  const existing = cachedByFileName.get( cacheKey );
  if ( existing ) return existing;
  // Load .env files without performing any validation. This keeps the logger
  // independent of the validated app config.
  loadEnvFiles();

  const { environment, serviceName, logLevel, logPretty, logStdout } = getLoggingEnv();
  const projectRoot = findProjectRoot( process.cwd() );
  const isSync = environment === "development";

  const logFilePath = path.join( projectRoot, "logs", "output.ndjson" );
  ensureFile( logFilePath, "" );
  const streams: pino.StreamEntry[] = [
    { level: "trace", stream: createFileDestination( logFilePath, isSync ) },
  ];

  if ( name ) {
    const specificLogFilePath = path.join( projectRoot, "logs", normalizeLogFileName( name ) );
    ensureFile( specificLogFilePath, "" );
    streams.push( { level: "trace", stream: createFileDestination( specificLogFilePath, isSync ) } );
  }
  if ( logStdout ) streams.push( { level: "trace", stream: buildStdoutStream( logPretty ) } );

  const loggerInstance = pino(
    {
      level: logLevel,
      base: { service: serviceName, env: environment, pid: process.pid, hostname: os.hostname() },
      timestamp: pino.stdTimeFunctions.isoTime,
      messageKey: "msg",
      formatters: {
        level(label) {
          return { level: label };
        },
      },
      /* Redact common sensitive keys if accidentally logged */
      redact: {
        paths: [
          "*.password",
          "*.apiKey",
          "*.token",
          "*.secret",
          "*.fredApiKey",
          "req.headers.authorization",
        ],
        censor: "[*****]",
      },
    },
    pino.multistream( streams ),
  );
  cachedByFileName.set( cacheKey, loggerInstance );
  return loggerInstance;
}

export const logger: AppLogger = getLogger();
