import { afterEach, describe, expect, it } from "vitest";

import { checkSignalRecency, parseMonitoringTimestamp } from "@/application/services/SignalRecencyService";
import { SqliteTradingStore } from "@/infrastructure/database/TradingStore";

import { BrokenStore } from "./helpers/fakes";
import { createTradingDb, type TradingDbFixture } from "./helpers/tradingDb";

const NOW = new Date( 2026, 2, 20, 12, 0, 0 );

describe("parseMonitoringTimestamp", () => {
  it("accepts fractional, plain and ISO forms as local time", () => {
    expect( parseMonitoringTimestamp( "2026-03-20 11:50:00.250000" )?.getTime() )
      .toBe( new Date( 2026, 2, 20, 11, 50, 0, 250 ).getTime() );
    expect( parseMonitoringTimestamp( "2026-03-20 11:50:00" )?.getTime() )
      .toBe( new Date( 2026, 2, 20, 11, 50, 0 ).getTime() );
    expect( parseMonitoringTimestamp( "2026-03-20T11:50:00" )?.getTime() )
      .toBe( new Date( 2026, 2, 20, 11, 50, 0 ).getTime() );
  });

  it("only looks at the first 26 characters", () => {
    expect( parseMonitoringTimestamp( "2026-03-20 11:50:00.123456+00:00" )?.getTime() )
      .toBe( new Date( 2026, 2, 20, 11, 50, 0, 123 ).getTime() );
  });

  it("rejects impossible dates and unknown layouts", () => {
    expect( parseMonitoringTimestamp( "2026-02-30 10:00:00" ) ).toBeNull();
    expect( parseMonitoringTimestamp( "20/03/2026 11:50" ) ).toBeNull();
  });
});

describe("checkSignalRecency", () => {
  let fixture: TradingDbFixture | undefined;
  let store: SqliteTradingStore | undefined;

  afterEach( () => {
    store?.close();
    fixture?.cleanup();
    store = undefined;
    fixture = undefined;
  } );

  function open(): { db: TradingDbFixture; store: SqliteTradingStore } {
    fixture = createTradingDb();
    store = new SqliteTradingStore( fixture.dbPath );
    return { db: fixture, store };
  }

  it("is healthy for a cycle inside the staleness window", () => {
    const { db, store } = open();
    db.addCycle( "2026-03-20", "11:40:00" );
    db.addCycle( "2026-03-20", "11:50:00" );
    db.addCycle( "2026-03-19", "23:59:00" );

    const result = checkSignalRecency( store, { now: NOW } );
    expect( result ).toEqual( {
      healthy: true,
      kind: "measured",
      message: "Monitoring healthy, last cycle 10m ago",
      lastTimestamp: "2026-03-20 11:50:00",
      ageMinutes: 10,
    } );
  });

  it("is unhealthy past the staleness window", () => {
    const { db, store } = open();
    db.addCycle( "2026-03-20", "11:15:00" );
    const result = checkSignalRecency( store, { now: NOW } );
    expect( result.healthy ).toBe( false );
    expect( result.message ).toBe( "Last monitoring cycle was 45 min ago (expected ≤30)" );
  });

  it("rounds a half minute to even in the message", () => {
    const { db, store } = open();
    db.addCycle( "2026-03-20", "11:29:30" );
    const result = checkSignalRecency( store, { now: NOW } );
    expect( result.healthy ).toBe( false );
    expect( result.message ).toBe( "Last monitoring cycle was 30 min ago (expected ≤30)" );
  });

  it("treats exactly the window as healthy", () => {
    const { db, store } = open();
    db.addCycle( "2026-03-20", "11:30:00" );
    const result = checkSignalRecency( store, { now: NOW } );
    expect( result.healthy ).toBe( true );
    expect( result.message ).toBe( "Monitoring healthy, last cycle 30m ago" );
  });

  it("reports an empty table as unhealthy", () => {
    const { store } = open();
    expect( checkSignalRecency( store, { now: NOW } ) ).toEqual( {
      healthy: false,
      kind: "no_cycles",
      message: "No monitoring cycles found in signal_monitoring table",
    } );
  });

  it("passes an unrecognised timestamp as healthy", () => {
    const { db, store } = open();
    db.addCycle( "20/03/2026", "11:50" );
    const result = checkSignalRecency( store, { now: NOW } );
    expect( result.healthy ).toBe( true );
    expect( result.message ).toBe( "Last cycle: 20/03/2026 11:50 (parse format unknown)" );
  });

  it("reports a failing query as unhealthy", () => {
    const result = checkSignalRecency( new BrokenStore(), { now: NOW } );
    expect( result ).toEqual( {
      healthy: false,
      kind: "query_failed",
      message: "signal_monitoring query failed: database is locked",
    } );
  });
});
