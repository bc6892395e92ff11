import dotenv from "dotenv";
import path from "path";

import { getFileStorage } from "@/infrastructure/storage/FileStorageService";

function envFileCandidates(dir: string, env: string): string[] {
  return [
    path.join( dir, ".env" ),
    path.join( dir, ".env.local" ),
    path.join( dir, `.env.${ env }` ),
    path.join( dir, `.env.${ env }.local` ),
  ];
}

/**
 * Find the nearest project root (directory containing package.json or any .env*)
 * starting from startDir and walking up.
 */
function findBaseDir(startDir: string, env: string): string {
  const storage = getFileStorage();
  let current = startDir;
  while ( true ) {
    const hasPkg = storage.fileExists( path.join( current, "package.json" ) );
    const hasAnyEnv = envFileCandidates( current, env ).some( (p) => storage.fileExists( p ) );
    if ( hasPkg || hasAnyEnv ) return current;
    const parent = path.dirname( current );
    if ( parent === current ) return startDir;
    current = parent;
  }
}

export function loadEnvFiles(cwd: string = process.cwd()): void {
  const env = (process.env.NODE_ENV || process.env.APP_ENV || "development").trim();
  const storage = getFileStorage();

  for ( const p of envFileCandidates( findBaseDir( cwd, env ), env ) ) {
    if ( !storage.fileExists( p ) ) continue;
    // External env takes precedence over .env files
    dotenv.config( { path: p, override: false } );
  }
}
