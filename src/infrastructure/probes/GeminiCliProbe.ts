import { type CommandRunner, runCommand } from "@/infrastructure/process/runCommand";
import type { ProbeOutcome } from "@/types/health";

import { describeCommandFailure, failed, passed, type Probe } from "./types";

export type GeminiCliProbeOptions = {
  bin?: string; // default: gemini
  model?: string; // default: gemini-2.5-flash
  timeoutMs?: number; // default: 20000
  runner?: CommandRunner;
};

/** Sends a one-word prompt through the LLM command-line tool. */
export class GeminiCliProbe implements Probe {
  public readonly name = "Gemini CLI";
  public readonly critical = true;
  private readonly bin: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(opts: GeminiCliProbeOptions = {}) {
    this.bin = opts.bin || "gemini";
    this.model = opts.model || "gemini-2.5-flash";
    this.timeoutMs = opts.timeoutMs ?? 20000;
    this.runner = opts.runner ?? runCommand;
  }

  async check(): Promise<ProbeOutcome> {
    const started = Date.now();
    const result = await this.runner( this.bin, [ "-p", "ping", "--model", this.model ], { timeoutMs: this.timeoutMs } );
    const cause = describeCommandFailure( result );
    return cause === null ? passed( this, started ) : failed( this, started, cause );
  }
}
