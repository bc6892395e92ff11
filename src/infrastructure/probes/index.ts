import type { AppConfig } from "@/config";
import type { CommandRunner } from "@/infrastructure/process/runCommand";

import { DisclosureProbe } from "./DisclosureProbe";
import { FredProbe } from "./FredProbe";
import { GeminiCliProbe } from "./GeminiCliProbe";
import { MarketDataProbe } from "./MarketDataProbe";
import type { Probe } from "./types";

export { DisclosureProbe } from "./DisclosureProbe";
export { FredProbe } from "./FredProbe";
export { GeminiCliProbe } from "./GeminiCliProbe";
export { MarketDataProbe } from "./MarketDataProbe";
export type { Probe } from "./types";

export type DefaultProbeOptions = Pick<AppConfig, "probeTimeoutMs" | "cliTimeoutMs" | "geminiBin"> & {
  fredApiKey?: string;
  runner?: CommandRunner;
};

/** The probe set in display order: market data, macro data, LLM CLI, disclosure site. */
export function createDefaultProbes(opts: DefaultProbeOptions): Probe[] {
  return [
    new MarketDataProbe( { timeoutMs: opts.probeTimeoutMs } ),
    new FredProbe( { apiKey: opts.fredApiKey, timeoutMs: opts.probeTimeoutMs } ),
    new GeminiCliProbe( { bin: opts.geminiBin, timeoutMs: opts.cliTimeoutMs, runner: opts.runner } ),
    new DisclosureProbe( { timeoutMs: opts.probeTimeoutMs } ),
  ];
}
