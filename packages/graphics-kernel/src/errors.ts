/** Degenerate geometry or an invalid window/viewport rejected at construction. */
export class ValidationError extends Error {
  override name = "ValidationError";
}

/** A scene file directive that cannot be decoded; `line` is 1-based. */
export class ParseError extends Error {
  override name = "ParseError";

  constructor(
    readonly line: number,
    readonly text: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`line ${line}: ${reason} (${JSON.stringify(text)})`, options);
  }
}

/** A clipping method that is known by name but has no working implementation. */
export class UnsupportedAlgorithmError extends Error {
  override name = "UnsupportedAlgorithmError";

  constructor(readonly method: string) {
    super(`Clipping method "${method}" is not supported`);
  }
}

export function isEditorError(error: unknown): error is ValidationError | ParseError | UnsupportedAlgorithmError {
  return (
    error instanceof ValidationError ||
    error instanceof ParseError ||
    error instanceof UnsupportedAlgorithmError
  );
}
