import { SubmitError, SubmitErrorKind } from '../types/SpendTypes';

/**
 * Type-safe error message extraction utility.
 * Handles unknown error types safely without using `any` type assertions.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String((error as { message: unknown }).message);
  }
  return 'Unknown error';
}

/**
 * Extract error response data from axios-like errors.
 * Returns undefined if no response data is available.
 */
export function getErrorResponseData(error: unknown): unknown {
  if (error && typeof error === 'object' && 'response' in error) {
    const response = (error as { response: unknown }).response;
    if (response && typeof response === 'object' && 'data' in response) {
      return (response as { data: unknown }).data;
    }
  }
  return undefined;
}

/**
 * Extract HTTP status code from axios-like errors.
 * Returns undefined if no status is available.
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'response' in error) {
    const response = (error as { response: unknown }).response;
    if (response && typeof response === 'object' && 'status' in response) {
      const status = (response as { status: unknown }).status;
      if (typeof status === 'number') {
        return status;
      }
    }
  }
  return undefined;
}

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);
const TRANSIENT_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ECONNABORTED', 'EAI_AGAIN', 'ENOTFOUND']);

/**
 * Decide whether a failed purchase may be retried as a fresh attempt.
 * SubmitError carries its own kind; HTTP-like errors are judged by status;
 * anything else is treated as fatal.
 */
export function classifySubmitError(error: unknown): SubmitErrorKind {
  if (error instanceof SubmitError) {
    return error.kind;
  }
  const status = getErrorStatus(error);
  if (status !== undefined) {
    return TRANSIENT_STATUSES.has(status) ? 'transient' : 'fatal';
  }
  if (error && typeof error === 'object' && 'code' in error) {
    const code = (error as { code: unknown }).code;
    if (typeof code === 'string' && TRANSIENT_CODES.has(code)) {
      return 'transient';
    }
  }
  return 'fatal';
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
