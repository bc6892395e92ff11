import { GAP_RECURRENCE_THRESHOLD } from "@/application/constants";
import { parseLocalDate, wholeDaysBetween } from "@/shared/helpers";
import type { GapClassification, GapCount, RecurringGap, RunState } from "@/types/health";

import { normalizeGapDescriptor } from "./GapCollectorService";

/**
 * Split counted descriptors into recurring (at or above the threshold) and
 * new (below it). Descriptors already flagged are left out of both, so a gap
 * is reported as recurring once in its lifetime.
 */
export function classifyGaps(
  counts: GapCount,
  flagged: Iterable<string>,
  threshold: number = GAP_RECURRENCE_THRESHOLD,
): GapClassification {
  const alreadyFlagged = new Set( flagged );
  const recurring: RecurringGap[] = [];
  const newGaps: string[] = [];

  // Array sort is stable, so equal counts keep first-seen order
  const byFrequency = [ ...counts.entries() ].sort( (a, b) => b[1] - a[1] );
  for ( const [ descriptor, count ] of byFrequency ) {
    if ( alreadyFlagged.has( descriptor ) ) continue;
    if ( count >= threshold ) {
      recurring.push( { descriptor, count } );
    } else {
      newGaps.push( descriptor );
    }
  }
  return { recurring, newGaps };
}

export type FlagSet = Pick<RunState, "flaggedGaps" | "flaggedOn">;

/** Add newly recurring descriptors to the flagged set, dated `today` */
export function mergeFlaggedGaps(flags: FlagSet, recurring: readonly RecurringGap[], today: string): FlagSet {
  const flaggedOn = { ...flags.flaggedOn };
  const all = new Set( flags.flaggedGaps );
  for ( const { descriptor } of recurring ) {
    if ( !all.has( descriptor ) ) flaggedOn[descriptor] = today;
    all.add( descriptor );
  }
  return { flaggedGaps: [ ...all ].sort(), flaggedOn };
}

/**
 * Drop flags older than `ttlDays` so the gap can alert again. Flags without a
 * recorded date are kept.
 */
export function pruneExpiredFlags(flags: FlagSet, now: Date, ttlDays: number | undefined): FlagSet {
  if ( ttlDays === undefined ) return flags;
  const flaggedOn: Record<string, string> = {};
  const kept: string[] = [];
  for ( const descriptor of flags.flaggedGaps ) {
    const raw = flags.flaggedOn[descriptor];
    const date = raw ? parseLocalDate( raw ) : null;
    if ( date && wholeDaysBetween( date, now ) >= ttlDays ) continue;
    kept.push( descriptor );
    if ( raw ) flaggedOn[descriptor] = raw;
  }
  return { flaggedGaps: kept, flaggedOn };
}

/** Remove descriptors (normalized first) from the flagged set */
export function unflag(flags: FlagSet, descriptors: readonly string[]): { flags: FlagSet; removed: string[] } {
  const targets = new Set(
    descriptors
      .map( (d) => normalizeGapDescriptor( d ) )
      .filter( (d): d is string => d !== null ),
  );
  const removed = flags.flaggedGaps.filter( (d) => targets.has( d ) );
  const flaggedOn = { ...flags.flaggedOn };
  for ( const descriptor of removed ) delete flaggedOn[descriptor];
  return {
    flags: { flaggedGaps: flags.flaggedGaps.filter( (d) => !targets.has( d ) ), flaggedOn },
    removed,
  };
}
