export type PngErrorCode =
  | "invalid_type_code"
  | "malformed_chunk"
  | "checksum_mismatch"
  | "bad_signature"
  | "chunk_not_found"
  | "text_decode"
  | "invalid_manifest"
  | "io";

/**
 * Structured metadata attached to an error, e.g. the chunk type or the
 * expected and actual checksums.
 */
export type PngErrorContext = Readonly<Record<string, unknown>>;

export type PngErrorOptions = Readonly<{
  context?: PngErrorContext;
  cause?: unknown;
}>;

export class PngError extends Error {
  readonly code: PngErrorCode;
  readonly context: PngErrorContext;

  constructor(code: PngErrorCode, message: string, options: PngErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "PngError";
    this.code = code;
    this.context = Object.freeze({ ...options.context });
  }
}

export const isPngError = (error: unknown): error is PngError =>
  error instanceof PngError;

/**
 * Convert a caught value into a `PngError`.
 *
 * - `PngError` passes through unchanged
 * - anything else is wrapped under `code`, keeping the original as `cause`
 */
export const toPngError = (
  error: unknown,
  code: PngErrorCode,
  context?: PngErrorContext
): PngError => {
  if (isPngError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PngError(code, message, { context, cause: error });
};
