/**
 * Error taxonomy for decoding and geometry.
 *
 * Fallible operations return a `Result` instead of throwing. Host models
 * call `unwrap` at their boundary, which rethrows the carried `TmxError`.
 */

export type TmxErrorKind =
  | 'UnsupportedEncoding'
  | 'UnsupportedCompression'
  | 'UnsupportedTileFormat'
  | 'InvalidChunkAttribute'
  | 'MalformedShapeData'
  | 'NonConvexPolygon'
  | 'CorruptLayerData';

export class TmxError extends Error {
  readonly kind: TmxErrorKind;
  readonly detail: string | undefined;

  constructor(kind: TmxErrorKind, message: string, detail?: string) {
    super(message);
    this.name = 'TmxError';
    this.kind = kind;
    this.detail = detail;
  }
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: TmxError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(
  kind: TmxErrorKind,
  message: string,
  detail?: string,
): Result<T> {
  return { ok: false, error: new TmxError(kind, message, detail) };
}

/** Return the value of a successful result, or throw its error. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

export function isTmxError(value: unknown): value is TmxError {
  return value instanceof TmxError;
}
