import { logProbeOutcome } from "@/application/helpers/health";
import { type AppLogger, logger } from "@/infrastructure/logger";
import type { Probe } from "@/infrastructure/probes";
import { errorMessage } from "@/shared/helpers";
import type { ProbeOutcome, ProbeSetReport } from "@/types/health";

function escapedFailure(probe: Probe, err: unknown): ProbeOutcome {
  const cause = errorMessage( err );
  return {
    name: probe.name,
    ok: false,
    label: `${ probe.name } (${ cause })`,
    critical: probe.critical,
    latencyMs: 0,
    checkedAt: new Date().toISOString(),
    details: { error: cause },
  };
}

/**
 * Run every probe concurrently. Labels are reported in registration order
 * regardless of completion order.
 */
export async function runProbes(probes: readonly Probe[], log: AppLogger = logger): Promise<ProbeSetReport> {
  const outcomes = await Promise.all( probes.map( async (probe) => {
    try {
      return await probe.check();
    } catch ( err ) {
      return escapedFailure( probe, err );
    }
  } ) );

  for ( const outcome of outcomes ) logProbeOutcome( log, outcome );

  return {
    apisOk: outcomes.filter( (o) => o.ok ).map( (o) => o.label ),
    apisDown: outcomes.filter( (o) => !o.ok ).map( (o) => o.label ),
    outcomes,
  };
}
