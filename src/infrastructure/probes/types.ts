import { HttpStatusError } from "@/application/helpers/http";
import type { CommandResult } from "@/infrastructure/process/runCommand";
import type { ProbeOutcome } from "@/types/health";

/**
 * A single bounded reachability check. `check` resolves with a pass/fail
 * outcome and never rejects.
 */
export interface Probe {
  readonly name: string;
  readonly critical: boolean;

  check(): Promise<ProbeOutcome>;
}

export function passed(
  probe: Probe,
  startedAt: number,
  label: string = probe.name,
  details?: Record<string, unknown>,
): ProbeOutcome {
  return {
    name: probe.name,
    ok: true,
    label,
    critical: probe.critical,
    latencyMs: Date.now() - startedAt,
    checkedAt: new Date().toISOString(),
    details,
  };
}

export function failed(probe: Probe, startedAt: number, cause: string): ProbeOutcome {
  return {
    name: probe.name,
    ok: false,
    label: `${ probe.name } (${ cause })`,
    critical: probe.critical,
    latencyMs: Date.now() - startedAt,
    checkedAt: new Date().toISOString(),
    details: { error: cause },
  };
}

/** Short cause string for a rejected HTTP request */
export function describeRequestError(err: unknown): string {
  if ( err instanceof HttpStatusError ) return `HTTP ${ err.status }`;
  if ( err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError") ) return "timeout";
  return err instanceof Error ? err.message : String( err );
}

/** Short cause string for a command that did not exit cleanly, or null when it did */
export function describeCommandFailure(result: CommandResult): string | null {
  switch ( result.kind ) {
    case "exited":
      return result.exitCode === 0 ? null : `exit ${ result.exitCode }`;
    case "not_found":
      return "binary not found";
    case "timeout":
      return "timeout";
    case "failed":
      return result.message;
  }
}
