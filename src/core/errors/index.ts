/**
 * Request body is not a JSON object. Nothing is stored.
 */
export class MalformedPayloadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedPayloadError';
  }
}

/**
 * The payload store could not read or write a record
 */
export class PayloadStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PayloadStoreError';
  }
}

/**
 * Message and stack for logging, with the cause chain folded into the message
 */
export function describeError(error: unknown): {
  message: string;
  stack?: string;
} {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  let message = error.message;
  let cause: unknown = error.cause;
  while (cause instanceof Error) {
    message += `: ${cause.message}`;
    cause = cause.cause;
  }
  return { message, stack: error.stack };
}
