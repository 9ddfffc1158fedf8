/**
 * Resolution errors
 */

export type ResolutionErrorKind =
  | 'InvalidRoot'
  | 'MalformedRemapping'
  | 'MalformedLibraryLink'
  | 'ConfigurationBuildFailure';

export type Result<T, E> = { success: true; value: T } | { success: false; error: E };

export class ResolutionError extends Error {
  readonly kind: ResolutionErrorKind;
  /** The offending entry, verbatim */
  readonly input?: string;

  constructor(
    kind: ResolutionErrorKind,
    message: string,
    options: { input?: string; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ResolutionError';
    this.kind = kind;
    this.input = options.input;
  }
}

export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError;
}

/**
 * Run a resolution step, converting a thrown ResolutionError into a failed Result.
 * Anything else is a bug and keeps propagating.
 */
export function attempt<T>(fn: () => T): Result<T, ResolutionError> {
  try {
    return { success: true, value: fn() };
  } catch (error) {
    if (isResolutionError(error)) {
      return { success: false, error };
    }
    throw error;
  }
}
