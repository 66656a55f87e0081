import { S3ServiceException } from '@aws-sdk/client-s3';
import { BackendError, TieringError } from '@tierdeck/core';

const DISPATCH_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'CredentialsProviderError'
]);

const TIMEOUT_ERROR_NAMES = new Set(['TimeoutError', 'RequestTimeout', 'AbortError']);

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Maps a failure raised by the S3 client onto a classified backend error. Errors that are
 * already classified pass through unchanged.
 */
export function toBackendError(error: unknown): TieringError {
  if (error instanceof TieringError) {
    return error;
  }
  if (error instanceof S3ServiceException) {
    return new BackendError(
      {
        category: 'serviceRejected',
        code: error.name || 'ServiceError',
        message: error.message || 'no message provided'
      },
      { cause: error }
    );
  }
  if (!(error instanceof Error)) {
    return new BackendError({ category: 'unknown', raw: String(error) });
  }

  const code = errorCode(error);
  if (TIMEOUT_ERROR_NAMES.has(error.name) || code === 'ETIMEDOUT') {
    return new BackendError({ category: 'timeout' }, { cause: error });
  }
  if ((code && DISPATCH_ERROR_CODES.has(code)) || DISPATCH_ERROR_CODES.has(error.name)) {
    return new BackendError({ category: 'dispatchFailure', detail: error.message }, { cause: error });
  }
  if (error instanceof SyntaxError || '$responseBodyText' in error) {
    return new BackendError({ category: 'responseMalformed', detail: error.message }, { cause: error });
  }
  return new BackendError({ category: 'unknown', raw: error.message }, { cause: error });
}

export async function withBackendErrors<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw toBackendError(error);
  }
}
