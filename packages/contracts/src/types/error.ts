/**
 * Error codes for level generation.
 *
 * - `CONFIG_INVALID`: the profile or map skeleton failed validation before a run
 * - `OUT_OF_BOUNDS`: the walker (or a direct cell write) left the grid
 * - `WALKER_STUCK`: position locking lagged behind for too many steps
 * - `SKIP_REJECTED`: a shortcut candidate broke a skip constraint (non-fatal)
 */
export type GenerationErrorCode =
  | "CONFIG_INVALID"
  | "OUT_OF_BOUNDS"
  | "WALKER_STUCK"
  | "SKIP_REJECTED";

/**
 * Unified error type for all level generation operations.
 *
 * @example
 * ```typescript
 * throw GenerationError.walkerStuck("Position lock lagged behind", {
 *   step: 812,
 *   delay: 1001,
 *   maxDelay: 1000,
 * });
 * ```
 */
export class GenerationError extends Error {
  override readonly name = "GenerationError";

  constructor(
    public readonly code: GenerationErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GenerationError);
    }
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): GenerationError {
    return new GenerationError("CONFIG_INVALID", message, details);
  }

  static outOfBounds(
    message: string,
    details?: Record<string, unknown>,
  ): GenerationError {
    return new GenerationError("OUT_OF_BOUNDS", message, details);
  }

  static walkerStuck(
    message: string,
    details?: Record<string, unknown>,
  ): GenerationError {
    return new GenerationError("WALKER_STUCK", message, details);
  }

  static skipRejected(
    message: string,
    details?: Record<string, unknown>,
  ): GenerationError {
    return new GenerationError("SKIP_REJECTED", message, details);
  }

  /**
   * Only `SKIP_REJECTED` is recovered inside a run; everything else aborts it.
   */
  get fatal(): boolean {
    return this.code !== "SKIP_REJECTED";
  }

  static isGenerationError(error: unknown): error is GenerationError {
    return error instanceof GenerationError;
  }

  toJSON(): {
    name: string;
    code: GenerationErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
