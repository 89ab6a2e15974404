type Pos = number;
export type Span = { from: Pos; to: Pos };

/**
 * 1-based line and column of the first symbol of a token.
 */
export type Location = { line: number; column: number };

export class LexToken<T> {
  token: T;
  span: Span;
  substr: string;
  location: Location;
  constructor(token: T, span: Span, substr: string, location: Location) {
    this.token = token;
    this.span = span;
    this.substr = substr;
    this.location = location;
  }
}
