export type ValidationErrorKind = 'transport' | 'decode' | 'authority' | 'protocol';

/**
 * Reason the identity authority could not confirm a token.
 */
export abstract class ValidationError extends Error {
  abstract readonly kind: ValidationErrorKind;
}

/**
 * The authority could not be reached: refused connection, DNS failure,
 * timeout, or the caller went away while the call was outstanding.
 */
export class TransportError extends ValidationError {
  readonly kind = 'transport';

  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

export class DecodeError extends ValidationError {
  readonly kind = 'decode';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DecodeError';
  }
}

/**
 * The authority rejected the token or answered with a non-OK status.
 */
export class AuthorityError extends ValidationError {
  readonly kind = 'authority';

  constructor(
    public readonly statusLine: string,
    public readonly authorityMessage?: string,
    public readonly code?: number
  ) {
    super(authorityMessage !== undefined ? `${statusLine} : ${authorityMessage}` : statusLine);
    this.name = 'AuthorityError';
  }
}

export class ProtocolError extends ValidationError {
  readonly kind = 'protocol';

  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}
