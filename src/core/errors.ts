export type PiiErrorCode =
  | 'INVALID_INPUT'
  | 'INVALID_OPTIONS'
  | 'TOKENIZATION_KEY_MISMATCH'
  | 'IRREVERSIBLE_TOKEN';

export class PiiEngineError extends Error {
  constructor(
    readonly code: PiiErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends PiiEngineError {
  constructor(message = 'Text is empty or whitespace-only') {
    super('INVALID_INPUT', message);
  }
}

export class InvalidOptionsError extends PiiEngineError {
  constructor(message: string) {
    super('INVALID_OPTIONS', message);
  }
}

/** The payload was produced under a different secret (GCM authentication failed). */
export class TokenizationKeyMismatchError extends PiiEngineError {
  constructor(options?: { cause?: unknown }) {
    super('TOKENIZATION_KEY_MISMATCH', 'Token cannot be reversed with the configured key', options);
  }
}

export class IrreversibleTokenError extends PiiEngineError {
  constructor(message = 'Token was produced without a secret and cannot be reversed') {
    super('IRREVERSIBLE_TOKEN', message);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
