import { afterEach, describe, expect, it } from "vitest";

import {
  collectRecentGaps,
  normalizeGapDescriptor,
  parseGapField,
} from "@/application/services/GapCollectorService";
import { SqliteTradingStore } from "@/infrastructure/database/TradingStore";

import { BrokenStore } from "./helpers/fakes";
import { createTradingDb, type TradingDbFixture } from "./helpers/tradingDb";

const NOW = new Date( 2026, 2, 20, 12, 0, 0 );

describe("normalizeGapDescriptor", () => {
  it("trims and lowercases", () => {
    expect( normalizeGapDescriptor( "  VIX Data " ) ).toBe( "vix data" );
  });

  it("drops sentinels, blanks and non-strings", () => {
    expect( normalizeGapDescriptor( "None" ) ).toBeNull();
    expect( normalizeGapDescriptor( "   " ) ).toBeNull();
    expect( normalizeGapDescriptor( 42 ) ).toBeNull();
    expect( normalizeGapDescriptor( null ) ).toBeNull();
  });
});

describe("parseGapField", () => {
  it("skips malformed and non-array payloads", () => {
    expect( parseGapField( "{not json" ) ).toEqual( [] );
    expect( parseGapField( "{\"gap\":\"x\"}" ) ).toEqual( [] );
  });

  it("keeps valid string entries from a mixed array", () => {
    expect( parseGapField( JSON.stringify( [ "Put/Call Ratio", 3, "none", "" ] ) ) ).toEqual( [ "put/call ratio" ] );
  });
});

describe("collectRecentGaps", () => {
  let fixture: TradingDbFixture | undefined;
  let store: SqliteTradingStore | undefined;

  afterEach( () => {
    store?.close();
    fixture?.cleanup();
    store = undefined;
    fixture = undefined;
  } );

  it("counts equivalent descriptors under one key across both tables", () => {
    fixture = createTradingDb();
    fixture.addBriefing( "2026-03-18", [ "VIX Data" ] );
    fixture.addConditional( "2026-03-19", [ " vix data ", "Breadth" ] );
    store = new SqliteTradingStore( fixture.dbPath );

    const counts = collectRecentGaps( store, { now: NOW, windowDays: 14 } );
    expect( [ ...counts.entries() ] ).toEqual( [ [ "vix data", 2 ], [ "breadth", 1 ] ] );
  });

  it("ignores rows before the window cutoff and null gap fields", () => {
    fixture = createTradingDb();
    fixture.addBriefing( "2026-03-06", [ "on cutoff" ] );
    fixture.addBriefing( "2026-03-05", [ "too old" ] );
    fixture.addBriefing( "2026-03-10", null );
    fixture.addBriefing( "2026-03-11", "not json at all" );
    store = new SqliteTradingStore( fixture.dbPath );

    const counts = collectRecentGaps( store, { now: NOW, windowDays: 14 } );
    expect( [ ...counts.entries() ] ).toEqual( [ [ "on cutoff", 1 ] ] );
  });

  it("lets a missing table contribute nothing while the other still counts", () => {
    fixture = createTradingDb();
    fixture.db.exec( "DROP TABLE conditional_tracking" );
    fixture.addBriefing( "2026-03-15", [ "earnings date" ] );
    store = new SqliteTradingStore( fixture.dbPath );

    const counts = collectRecentGaps( store, { now: NOW } );
    expect( counts.get( "earnings date" ) ).toBe( 1 );
    expect( counts.size ).toBe( 1 );
  });

  it("returns an empty count when every query fails", () => {
    expect( collectRecentGaps( new BrokenStore(), { now: NOW } ).size ).toBe( 0 );
  });
});
