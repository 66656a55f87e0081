export type FailureClassification =
  | { category: 'validation'; message: string }
  | { category: 'serviceRejected'; code: string; message: string }
  | { category: 'dispatchFailure'; detail: string }
  | { category: 'timeout' }
  | { category: 'responseMalformed'; detail: string }
  | { category: 'unknown'; raw: string };

export type FailureCategory = FailureClassification['category'];

export type TieringErrorCode =
  | 'VALIDATION_FAILED'
  | 'BACKEND_FAILURE'
  | 'POLICY_STORE_FAILURE'
  | 'POLICY_VALIDATION_FAILED';

export class TieringError extends Error {
  readonly code: TieringErrorCode;

  constructor(message: string, code: TieringErrorCode) {
    super(message);
    this.name = 'TieringError';
    this.code = code;
  }
}

/** A local precondition failure. Never sent to the backend. */
export class ValidationError extends TieringError {
  constructor(message: string) {
    super(message, 'VALIDATION_FAILED');
    this.name = 'ValidationError';
  }
}

/**
 * Thrown by storage backend implementations. Each implementation maps its own client
 * failures into one of the classification categories.
 */
export class BackendError extends TieringError {
  readonly classification: FailureClassification;

  constructor(classification: FailureClassification, options: { cause?: unknown } = {}) {
    super(describeFailure(classification), 'BACKEND_FAILURE');
    this.name = 'BackendError';
    this.classification = classification;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class PolicyStoreError extends TieringError {
  constructor(message: string) {
    super(message, 'POLICY_STORE_FAILURE');
    this.name = 'PolicyStoreError';
  }
}

export class PolicyValidationError extends TieringError {
  readonly issues: unknown;

  constructor(message: string, issues: unknown) {
    super(message, 'POLICY_VALIDATION_FAILED');
    this.name = 'PolicyValidationError';
    this.issues = issues;
  }
}

const FRIENDLY_SERVICE_MESSAGES: Record<string, string> = {
  NoSuchKey: 'object was not found (mask may target stale keys or bucket differs)',
  InvalidObjectState: 'object is already being restored or not eligible for this operation'
};

export function classifyFailure(error: unknown): FailureClassification {
  if (error instanceof BackendError) {
    return error.classification;
  }
  if (error instanceof ValidationError) {
    return { category: 'validation', message: error.message };
  }
  if (error instanceof Error) {
    return { category: 'unknown', raw: error.message };
  }
  return { category: 'unknown', raw: String(error) };
}

export function describeFailure(classification: FailureClassification): string {
  switch (classification.category) {
    case 'validation':
      return classification.message;
    case 'serviceRejected': {
      const friendly = FRIENDLY_SERVICE_MESSAGES[classification.code];
      return `${classification.code}: ${friendly ?? classification.message}`;
    }
    case 'dispatchFailure':
      return `network/dispatch failure: ${classification.detail}`;
    case 'timeout':
      return 'request timed out; please retry';
    case 'responseMalformed':
      return `response error: ${classification.detail}`;
    case 'unknown':
      return classification.raw;
    default:
      return assertUnreachable(classification);
  }
}

export function assertUnreachable(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}
