import { SIGNAL_STALE_MINUTES } from "@/application/constants";
import type { TradingStore } from "@/infrastructure/database/TradingStore";
import { buildLocalDate, errorMessage, roundHalfEven } from "@/shared/helpers";
import type { RecencyResult } from "@/types/health";

type TimestampFormat = {
  name: string;
  pattern: RegExp;
};

// Ordered; the first format that matches wins
const TIMESTAMP_FORMATS: readonly TimestampFormat[] = [
  { name: "date time.fraction", pattern: /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})\.(\d{1,6})$/ },
  { name: "date time", pattern: /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/ },
  { name: "iso", pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})$/ },
];

// Microsecond precision caps a timestamp at 26 characters
const MAX_TIMESTAMP_LENGTH = 26;

/** Parse a monitoring-cycle timestamp as local time, or null if no format matches */
export function parseMonitoringTimestamp(raw: string): Date | null {
  const candidate = raw.slice( 0, MAX_TIMESTAMP_LENGTH );
  for ( const format of TIMESTAMP_FORMATS ) {
    const match = format.pattern.exec( candidate );
    if ( !match ) continue;
    const [ , year, month, day, hours, minutes, seconds, fraction ] = match;
    const ms = fraction ? Math.floor( Number( fraction.padEnd( 6, "0" ) ) / 1000 ) : 0;
    const date = buildLocalDate(
      Number( year ), Number( month ), Number( day ),
      Number( hours ), Number( minutes ), Number( seconds ), ms,
    );
    if ( date ) return date;
  }
  return null;
}

export type SignalRecencyOptions = {
  now?: Date;
  staleMinutes?: number;
};

/**
 * Classify the newest monitoring cycle as fresh or stale. Store failures and
 * an empty table yield an unhealthy result; an unrecognised timestamp format
 * yields a healthy one so a format change alone never fails the run.
 */
export function checkSignalRecency(store: TradingStore, opts: SignalRecencyOptions = {}): RecencyResult {
  const now = opts.now ?? new Date();
  const staleMinutes = opts.staleMinutes ?? SIGNAL_STALE_MINUTES;

  let lastTimestamp: string | null;
  try {
    lastTimestamp = store.latestMonitoringTimestamp();
  } catch ( err ) {
    return { healthy: false, kind: "query_failed", message: `signal_monitoring query failed: ${ errorMessage( err ) }` };
  }
  if ( !lastTimestamp ) {
    return { healthy: false, kind: "no_cycles", message: "No monitoring cycles found in signal_monitoring table" };
  }

  const last = parseMonitoringTimestamp( lastTimestamp );
  if ( !last ) {
    return {
      healthy: true,
      kind: "unparseable",
      message: `Last cycle: ${ lastTimestamp } (parse format unknown)`,
      lastTimestamp,
    };
  }

  const ageMinutes = (now.getTime() - last.getTime()) / 60_000;
  const rounded = roundHalfEven( ageMinutes );
  if ( ageMinutes > staleMinutes ) {
    return {
      healthy: false,
      kind: "measured",
      message: `Last monitoring cycle was ${ rounded } min ago (expected ≤${ staleMinutes })`,
      lastTimestamp,
      ageMinutes,
    };
  }
  return {
    healthy: true,
    kind: "measured",
    message: `Monitoring healthy, last cycle ${ rounded }m ago`,
    lastTimestamp,
    ageMinutes,
  };
}
