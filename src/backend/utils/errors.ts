/**
 * Error types raised by the play detection and reconciliation engine.
 *
 * Callers branch on `code` (or instanceof) to decide between surfacing the
 * error to the user and retrying on the next scheduled sync.
 */

export type PlaytallyErrorCode =
  | 'PERMISSION_DENIED'
  | 'CATALOG_UNAVAILABLE'
  | 'PERSISTENCE_FAILURE';

export class PlaytallyError extends Error {
  readonly code: PlaytallyErrorCode;

  constructor(code: PlaytallyErrorCode, message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Access to the media catalog or player was refused. Not retried. */
export class PermissionDeniedError extends PlaytallyError {
  constructor(message = 'Media library access has not been granted') {
    super('PERMISSION_DENIED', message);
  }
}

/** Catalog enumeration failed; the next scheduled sync retries. */
export class CatalogUnavailableError extends PlaytallyError {
  constructor(message = 'Media catalog is unavailable', cause?: unknown) {
    super('CATALOG_UNAVAILABLE', message, cause);
  }
}

/** A ledger commit did not complete. Nothing from the transaction was kept. */
export class PersistenceFailureError extends PlaytallyError {
  constructor(message: string, cause?: unknown) {
    super('PERSISTENCE_FAILURE', message, cause);
  }
}

export function isPlaytallyError(error: unknown): error is PlaytallyError {
  return error instanceof PlaytallyError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
