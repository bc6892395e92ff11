const MS_PER_DAY = 24 * 60 * 60 * 1000;

function pad(value: number, width = 2): string {
  return String( value ).padStart( width, "0" );
}

/** Local calendar date as YYYY-MM-DD */
export function toLocalDateString(date: Date): string {
  return `${ date.getFullYear() }-${ pad( date.getMonth() + 1 ) }-${ pad( date.getDate() ) }`;
}

/**
 * Parse a strict YYYY-MM-DD string as local midnight.
 * Returns null for anything that is not a real calendar date.
 */
export function parseLocalDate(raw: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec( raw.trim() );
  if ( !match ) return null;
  return buildLocalDate( Number( match[1] ), Number( match[2] ), Number( match[3] ) );
}

/**
 * Build a local Date and reject overflowed components (e.g. month 13, Feb 30).
 */
export function buildLocalDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
  ms = 0,
): Date | null {
  if ( hours > 23 || minutes > 59 || seconds > 59 ) return null;
  const date = new Date( year, month - 1, day, hours, minutes, seconds, ms );
  if (
    date.getFullYear() !== year
    || date.getMonth() !== month - 1
    || date.getDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * Calendar days from `from` to `to`, counted on their local dates so a DST
 * shift inside the span never shortens it.
 */
export function wholeDaysBetween(from: Date, to: Date): number {
  const start = Date.UTC( from.getFullYear(), from.getMonth(), from.getDate() );
  const end = Date.UTC( to.getFullYear(), to.getMonth(), to.getDate() );
  return Math.round( (end - start) / MS_PER_DAY );
}

/** Round to the nearest integer, ties to even (30.5 -> 30, 31.5 -> 32) */
export function roundHalfEven(value: number): number {
  const floor = Math.floor( value );
  const fraction = value - floor;
  if ( fraction > 0.5 ) return floor + 1;
  if ( fraction < 0.5 ) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function subtractDays(date: Date, days: number): Date {
  const copy = new Date( date.getTime() );
  copy.setDate( copy.getDate() - days );
  return copy;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String( err );
}

export function parseCsv(raw: string | undefined): string[] {
  if ( !raw ) return [];
  return raw
    .split( "," )
    .map( (s) => s.trim() )
    .filter( Boolean );
}
