/**
 * Error kinds raised while generating a target.
 */

export type TargetErrorCode = 'INVALID_PARAMETER' | 'RENDER_FAILURE';

/**
 * Base class for target generation errors.
 */
export class TargetError extends Error {
  readonly code: TargetErrorCode;

  constructor(code: TargetErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A request parameter is missing, out of range, or unsupported.
 * Raised before anything is drawn.
 */
export class InvalidParameterError extends TargetError {
  /** Name of the offending option */
  readonly field: string;

  constructor(field: string, message: string) {
    super('INVALID_PARAMETER', message);
    this.field = field;
  }
}

/**
 * The PDF library could not produce the document.
 */
export class RenderFailureError extends TargetError {
  constructor(message: string, cause?: unknown) {
    super('RENDER_FAILURE', message, { cause });
  }
}

/**
 * Returns a printable message for any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
