import path from "path";
import pino from "pino";

import { getFileStorage } from "@/infrastructure/storage/FileStorageService";

export type LoggingEnv = {
  environment: string;
  serviceName: string;
  logLevel: string;
  logPretty: boolean;
  logStdout: boolean;
};

const FALSY = [ "false", "0", "no", "off" ];

export function getLoggingEnv(): LoggingEnv {
  const environment = (process.env.APP_ENV || process.env.NODE_ENV || "development").trim();
  const serviceName = process.env.LOG_SERVICE_NAME || "pipeline-health-auditor";
  const defaultLevel = environment === "development" ? "debug" : "info";
  const logLevel = process.env.LOG_LEVEL || defaultLevel;
  const prettyDefault = environment === "development" ? "true" : "false";
  const logPretty = (process.env.LOG_PRETTY || prettyDefault).toLowerCase() === "true";
  const logStdout = !FALSY.includes( String( process.env.LOG_STDOUT ?? "true" ).trim().toLowerCase() );
  return { environment, serviceName, logLevel, logPretty, logStdout };
}

export function ensureFile(filePath: string, initialContent = ""): void {
  const storage = getFileStorage();
  storage.ensureFile( filePath, initialContent );
}

/**
 * Normalize a component log name to `<stem>.ndjson`.
 * Strips directories and any existing .json or .ndjson extension.
 */
export function normalizeLogFileName(rawName: string): string {
  const base = path.basename( rawName.trim() );
  const lower = base.toLowerCase();
  let stem = base;
  if ( lower.endsWith( ".json" ) ) {
    stem = base.slice( 0, -5 );
  } else if ( lower.endsWith( ".ndjson" ) ) {
    stem = base.slice( 0, -7 );
  }
  return `${ stem }.ndjson`;
}

export function createFileDestination(filePath: string, isSync: boolean): pino.DestinationStream {
  return pino.destination( { dest: filePath, sync: isSync } );
}

export function buildStdoutStream(logPretty: boolean): pino.DestinationStream {
  if ( logPretty ) {
    return pino.transport( {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        singleLine: false,
        messageKey: "msg",
        ignore: "pid,hostname",
      },
    } );
  }
  return pino.destination( 1 );
}
