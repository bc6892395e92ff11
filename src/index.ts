import { parseArgs } from "util";

import { formatHealthReportText, toNotification } from "@/application/helpers/health";
import { closeAllHttpPools } from "@/application/helpers/http";
import { createHealthCheckRuntime } from "@/bootstrap";
import { loadConfig } from "@/config";
import { logger } from "@/infrastructure/logger";
import { StoreSetupError } from "@/shared/errors";
import { errorMessage } from "@/shared/helpers";

const USAGE = `Usage: pipeline-health [--force] [--json] [--unflag <descriptor>]...

  --force            run even if the last run was inside the throttle window
  --json             print the full result as JSON
  --unflag <gap>     forget a flagged gap so it can alert again (repeatable)`;

async function main(): Promise<number> {
  const { values } = parseArgs( {
    options: {
      force: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      unflag: { type: "string", multiple: true },
      help: { type: "boolean", short: "h", default: false },
    },
  } );
  if ( values.help ) {
    process.stdout.write( `${ USAGE }\n` );
    return 0;
  }

  const cfg = loadConfig();
  const { service, store } = createHealthCheckRuntime( cfg );
  try {
    if ( values.unflag && values.unflag.length > 0 ) {
      const removed = service.unflagGaps( values.unflag );
      process.stdout.write( removed.length > 0
        ? `Unflagged: ${ removed.join( ", " ) }\n`
        : "No matching flagged gaps\n" );
      return 0;
    }

    const outcome = await service.runAndNotify( { force: values.force } );
    if ( outcome.kind === "skipped" ) {
      process.stdout.write( `Health check skipped: ${ outcome.summary }\n` );
      return 0;
    }
    const { result } = outcome;
    process.stdout.write( values.json
      ? `${ JSON.stringify( result, null, 2 ) }\n`
      : `${ formatHealthReportText( toNotification( result ) ) }\n` );
    return 0;
  } catch ( err ) {
    if ( err instanceof StoreSetupError ) {
      logger.error( { type: "health.setup_failed", dbPath: err.dbPath, msg: err.message } );
      return 1;
    }
    throw err;
  } finally {
    store.close();
    await closeAllHttpPools();
  }
}

main().then( (code) => {
  process.exitCode = code;
} ).catch( (err) => {
  logger.error( { err, msg: `Health check failed: ${ errorMessage( err ) }` } );
  process.exitCode = 1;
} );
