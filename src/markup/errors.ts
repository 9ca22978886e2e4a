export type MarkupErrorKind =
  | "UnknownDirective"
  | "InvalidArgument"
  | "NestedVerbatim"
  | "UnmatchedEndOutput"
  | "UnterminatedVerbatim"
  | "MismatchedTag"
  | "UnclosedTag";

/**
 * Compilation failure. Always fatal: no partial document is produced.
 */
export class MarkupError extends Error {
  readonly kind: MarkupErrorKind;
  /** 1-indexed source line */
  readonly line: number;

  constructor(kind: MarkupErrorKind, line: number, message: string) {
    super(message);
    this.name = "MarkupError";
    this.kind = kind;
    this.line = line;
  }
}

export function formatMarkupError(error: MarkupError, source?: string): string {
  const location = source ? `${source}:${error.line}` : `line ${error.line}`;
  return `${location}: ${error.kind}: ${error.message}`;
}
