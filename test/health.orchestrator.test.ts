import { afterEach, describe, expect, it } from "vitest";

import { HttpStatusError } from "@/application/helpers/http";
import { checkThrottle, type HealthCheckDeps, HealthCheckService } from "@/application/services/HealthCheckService";
import type { CatalogListResult } from "@/infrastructure/catalog";
import { SqliteHealthAuditLog } from "@/infrastructure/database/HealthAuditLog";
import { SqliteTradingStore } from "@/infrastructure/database/TradingStore";
import { logger } from "@/infrastructure/logger";
import { MarketDataProbe } from "@/infrastructure/probes";
import { InMemoryRunStateStore } from "@/infrastructure/storage/RunStateStore";
import { StoreSetupError } from "@/shared/errors";
import type { HealthRunOutcome, RunState } from "@/types/health";

import { FakeCatalog, FakeProbe, probeSet, RecordingSink, ThrowingSink } from "./helpers/fakes";
import { createTradingDb, type TradingDbFixture } from "./helpers/tradingDb";

const NOW = new Date( 2026, 2, 20, 12, 0, 0 );

type Harness = {
  db: TradingDbFixture;
  store: SqliteTradingStore;
  stateStore: InMemoryRunStateStore;
  service: HealthCheckService;
};

const open: Harness[] = [];

type HarnessOptions = Partial<Omit<HealthCheckDeps, "store" | "stateStore">> & {
  initialState?: RunState;
  audited?: boolean;
};

function harness({ initialState, audited = false, ...overrides }: HarnessOptions = {}): Harness {
  const db = createTradingDb();
  const store = new SqliteTradingStore( db.dbPath );
  const stateStore = new InMemoryRunStateStore( initialState );
  const service = new HealthCheckService( {
    store,
    stateStore,
    probes: probeSet(),
    catalog: new FakeCatalog(),
    auditLog: audited ? new SqliteHealthAuditLog( store ) : undefined,
    clock: () => NOW,
    log: logger,
    ...overrides,
  } );
  const h = { db, store, stateStore, service };
  open.push( h );
  return h;
}

function completed(outcome: HealthRunOutcome) {
  if ( outcome.kind !== "completed" ) throw new Error( `expected a completed run, got ${ outcome.kind }` );
  return outcome;
}

afterEach( () => {
  for ( const h of open.splice( 0 ) ) {
    h.store.close();
    h.db.cleanup();
  }
} );

describe("checkThrottle", () => {
  it("is due when forced, never run, or the last date is unreadable", () => {
    expect( checkThrottle( { flaggedGaps: [], flaggedOn: {}, lastRunDate: "2026-03-19" }, NOW, 13, true ) ).toEqual( { due: true } );
    expect( checkThrottle( { flaggedGaps: [], flaggedOn: {} }, NOW, 13, false ) ).toEqual( { due: true } );
    expect( checkThrottle( { flaggedGaps: [], flaggedOn: {}, lastRunDate: "last tuesday" }, NOW, 13, false ) ).toEqual( { due: true } );
  });

  it("counts whole days against the throttle", () => {
    expect( checkThrottle( { flaggedGaps: [], flaggedOn: {}, lastRunDate: "2026-03-08" }, NOW, 13, false ) )
      .toEqual( { due: false, daysSinceLastRun: 12 } );
    expect( checkThrottle( { flaggedGaps: [], flaggedOn: {}, lastRunDate: "2026-03-07" }, NOW, 13, false ) )
      .toEqual( { due: true } );
  });
});

describe("HealthCheckService.run", () => {
  it("skips a recent run without probing or saving", async () => {
    const probes = probeSet();
    const { service, stateStore } = harness( {
      probes,
      initialState: { lastRunDate: "2026-03-15", flaggedGaps: [], flaggedOn: {} },
    } );

    const outcome = await service.run();
    expect( outcome ).toEqual( { kind: "skipped", summary: "Last ran 5d ago", runDate: "2026-03-20", daysSinceLastRun: 5 } );
    expect( stateStore.saveCount ).toBe( 0 );
    expect( probes.map( (p) => p.calls ) ).toEqual( [ 0, 0, 0, 0 ] );
  });

  it("is critical when the market data probe fails", async () => {
    const market = new MarketDataProbe( {
      fetcher: async (url) => {
        throw new HttpStatusError( "GET", url, 503, "Service Unavailable", "" );
      },
    } );
    const [ , macro, llm, disclosure ] = probeSet();
    const { db, service } = harness( { probes: [ market, macro, llm, disclosure ] } );
    db.addCycle( "2026-03-20", "11:55:00" );

    const { result } = completed( await service.run( { force: true } ) );
    expect( result.status ).toBe( "critical" );
    expect( result.apisDown ).toEqual( [ "Yahoo Finance (HTTP 503)" ] );
    expect( result.apisOk ).toEqual( [ "FRED", "Gemini CLI", "Capitol Trades" ] );
    expect( result.summary ).toBe( "3/4 APIs healthy" );
  });

  it("is a warning when only a non-critical probe fails", async () => {
    const { db, service } = harness( { probes: probeSet( { macro: "no api_key configured" } ) } );
    db.addCycle( "2026-03-20", "11:55:00" );

    const { result } = completed( await service.run() );
    expect( result.status ).toBe( "warning" );
    expect( result.apisDown ).toEqual( [ "FRED (no api_key configured)" ] );
  });

  it("is a warning when the monitoring loop is stale", async () => {
    const { db, service } = harness();
    db.addCycle( "2026-03-20", "11:15:00" );

    const { result } = completed( await service.run() );
    expect( result.status ).toBe( "warning" );
    expect( result.signalHealthy ).toBe( false );
    expect( result.signalMessage ).toBe( "Last monitoring cycle was 45 min ago (expected ≤30)" );
    expect( result.summary ).toBe( "4/4 APIs healthy | monitoring loop stale" );
  });

  it("surfaces a recurring gap once and remembers it", async () => {
    const catalog = new FakeCatalog( { ok: true, identifiers: [ "gemini-2.5-flash", "gemini-3.1-pro" ] } satisfies CatalogListResult );
    const { db, service, stateStore } = harness( { catalog } );
    db.addCycle( "2026-03-20", "11:50:00" );
    db.addBriefing( "2026-03-10", [ "Earnings Date" ] );
    db.addBriefing( "2026-03-12", [ "earnings date ", "VIX level" ] );
    db.addConditional( "2026-03-15", [ "EARNINGS DATE", "none" ] );

    const first = completed( await service.run() );
    expect( first.result ).toEqual( {
      status: "ok",
      summary: "4/4 APIs healthy | 1 recurring gaps need coding | 1 model update(s) available",
      apisOk: [ "Yahoo Finance", "FRED", "Gemini CLI", "Capitol Trades" ],
      apisDown: [],
      signalHealthy: true,
      signalMessage: "Monitoring healthy, last cycle 10m ago",
      recurringGaps: [ "earnings date (×3)" ],
      newGaps: [ "vix level" ],
      newModels: [ "gemini-3.1-pro" ],
      gapCounts: { "earnings date": 3, "vix level": 1 },
      runDate: "2026-03-20",
    } );
    expect( first.state.flaggedGaps ).toEqual( [ "earnings date" ] );
    expect( first.state.flaggedOn ).toEqual( { "earnings date": "2026-03-20" } );
    expect( stateStore.load().lastRunDate ).toBe( "2026-03-20" );

    const second = completed( await service.run( { force: true } ) );
    expect( second.result.recurringGaps ).toEqual( [] );
    expect( second.result.newGaps ).toEqual( [ "vix level" ] );
    expect( second.result.summary ).toBe( "4/4 APIs healthy | 1 model update(s) available" );
    expect( second.state.flaggedGaps ).toEqual( [ "earnings date" ] );
    expect( stateStore.saveCount ).toBe( 2 );
  });

  it("lets an expired flag alert again when a ttl is set", async () => {
    const { db, service } = harness( {
      policy: { flaggedGapTtlDays: 30 },
      initialState: { lastRunDate: "2026-01-01", flaggedGaps: [ "earnings date" ], flaggedOn: { "earnings date": "2026-01-01" } },
    } );
    db.addCycle( "2026-03-20", "11:50:00" );
    db.addBriefing( "2026-03-10", [ "earnings date" ] );
    db.addBriefing( "2026-03-11", [ "earnings date" ] );

    const { result, state } = completed( await service.run() );
    expect( result.recurringGaps ).toEqual( [ "earnings date (×2)" ] );
    expect( state.flaggedOn ).toEqual( { "earnings date": "2026-03-20" } );
  });

  it("raises a setup error when the database is missing and leaves state alone", async () => {
    const stateStore = new InMemoryRunStateStore();
    const service = new HealthCheckService( {
      store: new SqliteTradingStore( "/nonexistent/trading_history.db" ),
      stateStore,
      probes: probeSet(),
      catalog: new FakeCatalog(),
      clock: () => NOW,
      log: logger,
    } );

    await expect( service.run() ).rejects.toBeInstanceOf( StoreSetupError );
    expect( stateStore.saveCount ).toBe( 0 );
  });
});

describe("HealthCheckService.runAndNotify", () => {
  it("notifies every sink and survives failing sinks and audit writes", async () => {
    const recording = new RecordingSink();
    const { db, service } = harness( {
      sinks: [ new ThrowingSink(), recording ],
      auditLog: {
        record: () => {
          throw new Error( "disk full" );
        },
      },
    } );
    db.addCycle( "2026-03-20", "11:50:00" );

    const outcome = await service.runAndNotify();
    expect( outcome.kind ).toBe( "completed" );
    expect( recording.events ).toEqual( [ {
      type: "health_report",
      timestamp: NOW.toISOString(),
      status: "ok",
      summary: "4/4 APIs healthy",
      apisDown: [],
      newModels: [],
      recurringGaps: [],
    } ] );
  });

  it("sends nothing for a skipped run", async () => {
    const recording = new RecordingSink();
    const { service } = harness( {
      sinks: [ recording ],
      initialState: { lastRunDate: "2026-03-19", flaggedGaps: [], flaggedOn: {} },
    } );

    const outcome = await service.runAndNotify();
    expect( outcome.kind ).toBe( "skipped" );
    expect( recording.events ).toEqual( [] );
  });

  it("writes one audit row per completed run", async () => {
    const { db, service } = harness( { audited: true, probes: [ new FakeProbe( "FRED", false, "HTTP 500" ) ] } );
    db.addCycle( "2026-03-20", "11:50:00" );

    await service.runAndNotify();
    const rows = db.db.prepare( "SELECT run_date, status, summary, apis_down_json, signal_healthy FROM health_checks" ).all();
    expect( rows ).toEqual( [ {
      run_date: "2026-03-20",
      status: "warning",
      summary: "0/1 APIs healthy",
      apis_down_json: "[\"FRED (HTTP 500)\"]",
      signal_healthy: 1,
    } ] );
  });
});

describe("HealthCheckService.unflagGaps", () => {
  it("removes normalized descriptors and saves only on change", () => {
    const { service, stateStore } = harness( {
      initialState: {
        lastRunDate: "2026-03-01",
        flaggedGaps: [ "earnings date", "vix level" ],
        flaggedOn: { "earnings date": "2026-02-01", "vix level": "2026-03-01" },
      },
    } );

    expect( service.unflagGaps( [ " Earnings Date" ] ) ).toEqual( [ "earnings date" ] );
    expect( stateStore.saveCount ).toBe( 1 );
    expect( stateStore.load() ).toEqual( {
      lastRunDate: "2026-03-01",
      flaggedGaps: [ "vix level" ],
      flaggedOn: { "vix level": "2026-03-01" },
      lastResult: undefined,
    } );

    expect( service.unflagGaps( [ "breadth" ] ) ).toEqual( [] );
    expect( stateStore.saveCount ).toBe( 1 );
  });
});
