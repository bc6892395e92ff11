import { z } from "zod";

import { logger } from "@/infrastructure/logger";
import { getFileStorage } from "@/infrastructure/storage/FileStorageService";
import { errorMessage } from "@/shared/helpers";

export type ProviderCredentials = {
  fredApiKey?: string;
};

const credentialsFileSchema = z.object( {
  fred_api_key: z.string().optional().nullable(),
} ).passthrough();

/**
 * Read provider credentials from the orchestrator's JSON config file.
 * A missing or malformed file yields no credentials; the probe that needs
 * one then reports itself down.
 */
export function loadProviderCredentials(filePath: string, overrides: ProviderCredentials = {}): ProviderCredentials {
  if ( overrides.fredApiKey ) return { fredApiKey: overrides.fredApiKey };

  const storage = getFileStorage();
  if ( !storage.fileExists( filePath ) ) return {};
  try {
    const parsed = credentialsFileSchema.safeParse( JSON.parse( storage.readFile( filePath, "utf-8" ) ) );
    if ( !parsed.success ) {
      logger.warn( { type: "config.credentials_invalid", filePath } );
      return {};
    }
    const fredApiKey = parsed.data.fred_api_key?.trim();
    return fredApiKey ? { fredApiKey } : {};
  } catch ( err ) {
    logger.warn( { type: "config.credentials_unreadable", filePath, err: errorMessage( err ) } );
    return {};
  }
}
