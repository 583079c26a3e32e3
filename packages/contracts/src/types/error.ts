/**
 * Error codes for dungeon generation operations.
 */
export type DungeonErrorCode =
  | "REQUEST_INVALID"
  | "CONFIG_INVALID"
  | "CATALOG_INVALID"
  | "GENERATION_FAILED";

/**
 * Unified error type for the generation service.
 *
 * The engine itself never throws one during a request: unknown themes, sizes
 * and locations fall back to defaults. These surface at the edges, when a
 * request or the environment fails validation, or when catalog data is
 * malformed at load.
 *
 * @example
 * ```typescript
 * const error = DungeonError.requestInvalid("Invalid dungeon request", {
 *   issues: parsed.error.issues,
 * });
 * ```
 */
export class DungeonError extends Error {
  readonly name = "DungeonError";

  constructor(
    public readonly code: DungeonErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DungeonError);
    }
  }

  static requestInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): DungeonError {
    return new DungeonError("REQUEST_INVALID", message, details);
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): DungeonError {
    return new DungeonError("CONFIG_INVALID", message, details);
  }

  static catalogInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): DungeonError {
    return new DungeonError("CATALOG_INVALID", message, details);
  }

  static generationFailed(
    message: string,
    details?: Record<string, unknown>,
  ): DungeonError {
    return new DungeonError("GENERATION_FAILED", message, details);
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: DungeonErrorCode;
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
