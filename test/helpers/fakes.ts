import type { CatalogLister, CatalogListResult } from "@/infrastructure/catalog";
import type { TradingStore } from "@/infrastructure/database/TradingStore";
import { failed, passed, type Probe } from "@/infrastructure/probes/types";
import type { HealthReportEvent, NotificationSink, SinkResult } from "@/infrastructure/sinks";
import type { ProbeOutcome } from "@/types/health";

export class FakeProbe implements Probe {
  public calls = 0;

  constructor(
    public readonly name: string,
    public readonly critical: boolean,
    private readonly cause: string | null = null,
  ) {}

  async check(): Promise<ProbeOutcome> {
    this.calls += 1;
    const started = Date.now();
    return this.cause === null ? passed( this, started ) : failed( this, started, this.cause );
  }
}

/** Market data, macro data, LLM CLI, disclosure; all passing unless a cause is given */
export function probeSet(causes: Partial<Record<"market" | "macro" | "llm" | "disclosure", string>> = {}): FakeProbe[] {
  return [
    new FakeProbe( "Yahoo Finance", true, causes.market ?? null ),
    new FakeProbe( "FRED", false, causes.macro ?? null ),
    new FakeProbe( "Gemini CLI", true, causes.llm ?? null ),
    new FakeProbe( "Capitol Trades", false, causes.disclosure ?? null ),
  ];
}

export class FakeCatalog implements CatalogLister {
  constructor(private readonly result: CatalogListResult = { ok: true, identifiers: [] }) {}

  async list(): Promise<CatalogListResult> {
    return this.result;
  }
}

export class RecordingSink implements NotificationSink {
  public readonly kind = "file" as const;
  public readonly events: HealthReportEvent[] = [];

  async send(event: HealthReportEvent): Promise<SinkResult> {
    this.events.push( event );
    return { ok: true };
  }
}

export class ThrowingSink implements NotificationSink {
  public readonly kind = "webhook" as const;

  async send(): Promise<SinkResult> {
    throw new Error( "channel offline" );
  }
}

/** Store whose queries always fail, for degraded-path checks */
export class BrokenStore implements TradingStore {
  verify(): void {}

  latestMonitoringTimestamp(): string | null {
    throw new Error( "database is locked" );
  }

  gapFieldsSince(): string[] {
    throw new Error( "no such table: daily_briefings" );
  }

  close(): void {}
}
