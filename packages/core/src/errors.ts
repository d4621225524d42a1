/**
 * Error taxonomy for a conversion run.
 *
 * Recoverable per-item problems are never thrown: they are logged and the
 * item is skipped. Everything thrown as a ConversionError aborts the run.
 */

export type ConversionErrorCode =
  | "input_missing"
  | "invalid_pack"
  | "invalid_config"
  | "dependency_missing"
  | "no_sounds";

/** A fatal error that aborts the run with a non-zero exit. */
export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(message: string, code: ConversionErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConversionError";
    this.code = code;
  }
}

export function isConversionError(value: unknown): value is ConversionError {
  return value instanceof ConversionError;
}

/** True when `err` is a Node system error with the given `code` (e.g. "ENOENT"). */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/** Message of an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
