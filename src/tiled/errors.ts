// src/tiled/errors.ts
export type WarnFn = (msg: string) => void;

export type TiledErrorKind =
  | "NotFound"
  | "UnsupportedFormat"
  | "MalformedDocument"
  | "MissingRequiredAttribute"
  | "UnsupportedEncoding"
  | "UnsupportedCompression"
  | "UnknownElementKind"
  | "ExternalTilesetNotFound";

export class TiledParseError extends Error {
  public override readonly name = "TiledParseError";
  /** The message without the trailing context. */
  public readonly reason: string;

  public constructor(
    public readonly kind: TiledErrorKind,
    message: string,
    public readonly context?: string,
    options?: { cause?: unknown },
  ) {
    super(context === undefined ? message : `${message} (at ${context})`, options);
    this.reason = message;
  }
}

/**
 * Rewrap any failure raised while parsing under a single error that keeps the
 * first cause's kind and context. Foreign exceptions (xml syntax, inflate) become
 * MalformedDocument.
 */
export function wrapParseError(err: unknown, what: string): TiledParseError {
  if (err instanceof TiledParseError) {
    return new TiledParseError(err.kind, `Failed to parse ${what}: ${err.reason}`, err.context, { cause: err });
  }
  const msg = err instanceof Error ? err.message : String(err);
  return new TiledParseError("MalformedDocument", `Failed to parse ${what}: ${msg}`, undefined, { cause: err });
}
