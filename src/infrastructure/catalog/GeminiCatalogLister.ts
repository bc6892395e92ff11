import { TRACKED_MODEL_PREFIXES } from "@/application/constants";
import { describeCommandFailure } from "@/infrastructure/probes/types";
import { type CommandRunner, runCommand } from "@/infrastructure/process/runCommand";

import type { CatalogLister, CatalogListResult } from "./types";

export type GeminiCatalogListerOptions = {
  bin?: string; // default: gemini
  timeoutMs?: number; // default: 20000
  trackedPrefixes?: readonly string[];
  runner?: CommandRunner;
};

const MODEL_ID = /gemini-[\w.-]+/gi;

/**
 * Pull model identifiers out of free-form CLI text. Only lines mentioning a
 * tracked prefix are read, and every identifier on such a line is kept.
 * Identifiers are lowercased and lose trailing punctuation picked up from
 * prose ("gemini-3-pro.").
 */
export function extractModelIdentifiers(
  output: string,
  trackedPrefixes: readonly string[] = TRACKED_MODEL_PREFIXES,
): string[] {
  const identifiers: string[] = [];
  for ( const line of output.split( /\r?\n/ ) ) {
    const lower = line.toLowerCase();
    if ( !trackedPrefixes.some( (prefix) => lower.includes( prefix ) ) ) continue;
    for ( const match of line.matchAll( MODEL_ID ) ) {
      const id = match[0].toLowerCase().replace( /[.,;:]+$/, "" );
      if ( id ) identifiers.push( id );
    }
  }
  return identifiers;
}

/** Runs `gemini models list` and scrapes identifiers from stdout and stderr. */
export class GeminiCatalogLister implements CatalogLister {
  private readonly bin: string;
  private readonly timeoutMs: number;
  private readonly trackedPrefixes: readonly string[];
  private readonly runner: CommandRunner;

  constructor(opts: GeminiCatalogListerOptions = {}) {
    this.bin = opts.bin || "gemini";
    this.timeoutMs = opts.timeoutMs ?? 20000;
    this.trackedPrefixes = (opts.trackedPrefixes ?? TRACKED_MODEL_PREFIXES).map( (p) => p.toLowerCase() );
    this.runner = opts.runner ?? runCommand;
  }

  async list(): Promise<CatalogListResult> {
    const result = await this.runner( this.bin, [ "models", "list" ], { timeoutMs: this.timeoutMs } );
    const cause = describeCommandFailure( result );
    if ( cause !== null || result.kind !== "exited" ) {
      return { ok: false, error: new Error( `${ this.bin } models list failed: ${ cause ?? "unknown" }` ) };
    }
    const identifiers = extractModelIdentifiers( `${ result.stdout }\n${ result.stderr }`, this.trackedPrefixes );
    return { ok: true, identifiers };
  }
}
