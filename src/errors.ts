import { inspect } from 'node:util';

import { isError, isObject } from './type-guards.js';

export type RedirectErrorCode = 'ETOOMANYREDIRECTS' | 'EBADREDIRECT';

/**
 * Aborts a whole transfer when a redirect hop is refused. Transport failures
 * are never wrapped in this class, so `instanceof RedirectError` separates
 * policy decisions from network errors.
 */
export class RedirectError extends Error {
  readonly code: RedirectErrorCode;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(
    message: string,
    code: RedirectErrorCode,
    readonly url: string,
    details: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'RedirectError';
    this.code = code;
    this.details = Object.freeze({ url, ...details });
    Error.captureStackTrace(this, this.constructor);
  }
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) return error.message;
  if (isNonEmptyString(error)) return error;
  if (isErrorWithMessage(error)) return error.message;
  return formatUnknownError(error);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function isErrorWithMessage(error: unknown): error is { message: string } {
  if (!isObject(error)) return false;
  const { message } = error;
  return isNonEmptyString(message);
}

function formatUnknownError(error: unknown): string {
  if (error === null || error === undefined) return 'Unknown error';
  return inspect(error, {
    depth: 2,
    maxStringLength: 200,
    breakLength: Infinity,
    compact: true,
    colors: false,
  });
}

export function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  if (!isError(error)) return false;
  if (!('code' in error)) return false;
  return typeof error.code === 'string';
}
