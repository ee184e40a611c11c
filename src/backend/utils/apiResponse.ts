import { Response } from 'express';

import { PlaytallyError, PlaytallyErrorCode } from './errors';

/**
 * Standard API response helpers.
 * All API endpoints should return { success: boolean, ... } for consistency.
 */

interface ErrorResponseOptions {
  /** Additional data to include alongside the error (e.g., validation details) */
  data?: unknown;
}

const STATUS_BY_CODE: Record<PlaytallyErrorCode, number> = {
  PERMISSION_DENIED: 403,
  CATALOG_UNAVAILABLE: 503,
  PERSISTENCE_FAILURE: 500,
};

/**
 * Send a standardized error response.
 */
export function sendError(
  res: Response,
  statusCode: number,
  message: string,
  options?: ErrorResponseOptions
): void {
  const body: Record<string, unknown> = { success: false, error: message };
  if (options?.data !== undefined) {
    body.data = options.data;
  }
  res.status(statusCode).json(body);
}

/**
 * Send an error response for a thrown value. Engine errors map to their own
 * status code and carry their code in `data`; anything else is a 500.
 */
export function sendErrorFromException(
  res: Response,
  error: unknown,
  fallbackMessage: string
): void {
  if (error instanceof PlaytallyError) {
    sendError(res, STATUS_BY_CODE[error.code], error.message, {
      data: { code: error.code },
    });
    return;
  }
  sendError(
    res,
    500,
    error instanceof Error ? error.message : fallbackMessage
  );
}

/**
 * Send a standardized success response.
 */
export function sendSuccess(
  res: Response,
  data?: unknown,
  statusCode = 200
): void {
  res.status(statusCode).json({ success: true, data });
}
