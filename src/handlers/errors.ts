export type HandlerErrorKind = 'validation' | 'upstream' | 'unsupported';

export class HandlerError extends Error {
  readonly kind: HandlerErrorKind;

  constructor(kind: HandlerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HandlerError';
    this.kind = kind;
  }
}

export function validationError(message: string): HandlerError {
  return new HandlerError('validation', message);
}

export function upstreamError(message: string, cause?: unknown): HandlerError {
  return new HandlerError('upstream', message, { cause });
}

export function unsupportedError(message: string): HandlerError {
  return new HandlerError('unsupported', message);
}

/** Message carried by any thrown value; never empty. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error && err.message) return err.message;
  if (typeof err === 'string' && err) return err;
  if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string' && err.message) {
    return err.message;
  }
  return 'Unknown error';
}
