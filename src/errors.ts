export type GeneratorErrorCode = 'UNSUPPORTED_PROTOTYPE' | 'MALFORMED_RECORD';

export class GeneratorError extends Error {
  readonly code: GeneratorErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: GeneratorErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.code = code;
    this.details = details;
  }
}

/**
 * The prototype uses a code the argument model cannot translate.
 *
 * The generator skips the whole function when it sees this.
 */
export class UnsupportedPrototypeError extends GeneratorError {
  override name = 'UnsupportedPrototypeError';

  constructor(message: string, details?: Record<string, unknown>) {
    super('UNSUPPORTED_PROTOTYPE', message, details);
  }
}

/** A catalog record is missing a required key. Aborts the run. */
export class MalformedRecordError extends GeneratorError {
  override name = 'MalformedRecordError';

  constructor(message: string, details?: Record<string, unknown>) {
    super('MALFORMED_RECORD', message, details);
  }
}
