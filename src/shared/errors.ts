/**
 * Raised when the relational store the health checks read from is missing or
 * cannot be opened. Every other failure degrades into the health result.
 */
export class StoreSetupError extends Error {
  public readonly dbPath: string;

  constructor(message: string, dbPath: string, options?: { cause?: unknown }) {
    super( message, options );
    this.name = "StoreSetupError";
    this.dbPath = dbPath;

    if ( Error.captureStackTrace ) {
      Error.captureStackTrace( this, StoreSetupError );
    }
  }
}
