export enum PatternErrorKind {
  UNTERMINATED_BRACKET = 'UNTERMINATED_BRACKET',
  UNTERMINATED_STRING = 'UNTERMINATED_STRING',
  UNTERMINATED_BRACE = 'UNTERMINATED_BRACE',
  UNKNOWN_POSIX_CLASS = 'UNKNOWN_POSIX_CLASS',
  UNDEFINED_MACRO = 'UNDEFINED_MACRO',
  CYCLIC_DEFINITION = 'CYCLIC_DEFINITION',
  UNBALANCED_PARENS = 'UNBALANCED_PARENS',
  MALFORMED_REPETITION = 'MALFORMED_REPETITION',
  INVALID_RANGE = 'INVALID_RANGE',
  DANGLING_ESCAPE = 'DANGLING_ESCAPE',
  NOTHING_TO_REPEAT = 'NOTHING_TO_REPEAT',
  EMPTY_PATTERN = 'EMPTY_PATTERN',
  SYMBOL_OUT_OF_RANGE = 'SYMBOL_OUT_OF_RANGE',
}

/**
 * An error found while parsing a single pattern. offset is the
 * 0-based position in the pattern text where the problem starts.
 */
export class PatternError extends Error {
  readonly kind: PatternErrorKind;
  readonly offset: number;

  constructor(kind: PatternErrorKind, offset: number, message: string) {
    super(message);
    this.name = 'PatternError';
    this.kind = kind;
    this.offset = offset;
  }
}
