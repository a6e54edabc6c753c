// Centralized error handling utilities

import type { ApiError } from '../types';

/** HTTP statuses the application maps its errors to */
export type ErrorStatus = 400 | 404 | 500 | 502 | 504;

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: ErrorStatus = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(
      id ? `${resource} not found: ${id}` : `${resource} not found`,
      'NOT_FOUND',
      404
    );
    this.name = 'NotFoundError';
  }
}

/**
 * Rejected user input (no artists, bad track count, unknown format...)
 */
export class InputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INPUT_ERROR', 400, details);
    this.name = 'InputError';
  }
}

export class ExternalApiError extends AppError {
  constructor(service: string, message: string, status: ErrorStatus = 502) {
    super(`${service} API error: ${message}`, 'EXTERNAL_API_ERROR', status);
    this.name = 'ExternalApiError';
  }
}

/**
 * An artist could not be looked up: network failure, timeout, non-2xx,
 * an error payload or no matching artist.
 */
export class LookupError extends ExternalApiError {
  constructor(
    public artist: string,
    reason: string,
    cause?: unknown
  ) {
    super('Deezer', `lookup failed for "${artist}": ${reason}`);
    this.name = 'LookupError';
    this.code = 'LOOKUP_ERROR';
    this.details = { artist };
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class ExportError extends AppError {
  constructor(
    public path: string,
    reason: string,
    cause?: unknown
  ) {
    super(`Could not export to ${path}: ${reason}`, 'EXPORT_ERROR', 500, { path });
    this.name = 'ExportError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert unknown error to AppError
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError(error.message, 'INTERNAL_ERROR', 500);
  }
  return new AppError('An unexpected error occurred', 'INTERNAL_ERROR', 500);
}

/**
 * Readable message for logs, whatever was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create a standardized error response
 */
export function errorResponse(error: AppError): Response {
  return new Response(
    JSON.stringify({
      error: {
        message: error.message,
        code: error.code,
        ...(error.details && { details: error.details }),
      },
    } satisfies ApiError),
    {
      status: error.status,
      headers: {
        'Content-Type': 'application/json',
      },
    }
  );
}
