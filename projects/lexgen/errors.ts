import type { PatternError } from '../regex-compiler/errors.js';

export enum ErrorKind {
  SYNTAX = 'Syntax',
  PATTERN = 'Pattern',
  SEMANTIC = 'Semantic',
  IO = 'IO',
}

/**
 * 1-based position in a syntax file.
 */
export type SourceLocation = { source: string; line: number; column: number };

function formatMessage(
  kind: ErrorKind,
  detail: string,
  location?: SourceLocation,
  sourceLine?: string
) {
  if (!location) {
    return `${kind}Error: ${detail}`;
  }
  const { source, line, column } = location;
  let message = `${kind}Error at ${source}:${line}:${column}: ${detail}`;
  if (sourceLine !== undefined) {
    message += `\n${sourceLine}\n${' '.repeat(Math.max(0, column - 1))}^`;
  }
  return message;
}

/**
 * Anything wrong with the input or environment of a generator run.
 * All of them stop the run before any output is written.
 */
export class LexgenError extends Error {
  readonly kind: ErrorKind;
  readonly detail: string;
  readonly location?: SourceLocation;

  constructor(
    kind: ErrorKind,
    detail: string,
    location?: SourceLocation,
    sourceLine?: string
  ) {
    super(formatMessage(kind, detail, location, sourceLine));
    this.name = `${kind}Error`;
    this.kind = kind;
    this.detail = detail;
    this.location = location;
  }
}

export class SyntaxFileError extends LexgenError {
  constructor(detail: string, location: SourceLocation, sourceLine?: string) {
    super(ErrorKind.SYNTAX, detail, location, sourceLine);
  }
}

export class RulePatternError extends LexgenError {
  readonly patternError: PatternError;

  /**
   * @param patternStart where the pattern text starts in the file
   */
  constructor(
    patternError: PatternError,
    patternStart: SourceLocation,
    sourceLine?: string
  ) {
    super(
      ErrorKind.PATTERN,
      `${patternError.message} (${patternError.kind})`,
      { ...patternStart, column: patternStart.column + patternError.offset },
      sourceLine
    );
    this.patternError = patternError;
  }
}

export enum SemanticErrorCode {
  CYCLIC_DEFINITION = 'CYCLIC_DEFINITION',
  CONTINUATION_WITHOUT_FOLLOWER = 'CONTINUATION_WITHOUT_FOLLOWER',
  EMPTY_RULE_SET = 'EMPTY_RULE_SET',
  DUPLICATE_DEFINITION = 'DUPLICATE_DEFINITION',
}

export class SemanticError extends LexgenError {
  readonly code: SemanticErrorCode;
  constructor(
    code: SemanticErrorCode,
    detail: string,
    location?: SourceLocation,
    sourceLine?: string
  ) {
    super(ErrorKind.SEMANTIC, detail, location, sourceLine);
    this.code = code;
  }
}

export class LexgenIOError extends LexgenError {
  readonly path: string;
  constructor(detail: string, path: string) {
    super(ErrorKind.IO, `${detail}: ${path}`);
    this.path = path;
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
