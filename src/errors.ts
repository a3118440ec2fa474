export type ConversionErrorKind =
  | 'InputMissing'
  | 'ProbeFailed'
  | 'LaunchFailed'
  | 'EncoderExitedNonZero'
  | 'OutputIncomplete'
  | 'NamingCollisionExhausted'
  | 'JobBusy'
  | 'JobNotFound'
  | 'InvalidTransition'
  | 'InvalidRetry'
  | 'MissingCoverImage'
  | 'EmptyAudioList'
  | 'Unexpected';

/**
 * Error raised by the conversion core. `kind` tells callers whether a failure belongs
 * to a single job or stops the whole queue.
 */
export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;

  constructor(kind: ConversionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConversionError';
    this.kind = kind;
  }
}

/**
 * Errors that leave the encoder unusable for every remaining job.
 */
export const isQueueFatal = (error: ConversionError): boolean => error.kind === 'LaunchFailed';

/**
 * Wraps an unknown thrown value, keeping an existing ConversionError untouched.
 */
export const toConversionError = (
  error: unknown,
  fallbackKind: ConversionErrorKind,
): ConversionError => {
  if (error instanceof ConversionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConversionError(fallbackKind, message, { cause: error });
};

/**
 * Reads the errno code (ENOENT, EACCES, ...) carried by Node system errors.
 */
export const errorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};
