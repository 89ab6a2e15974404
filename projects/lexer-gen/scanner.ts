import type { DFA } from '../nfa-to-dfa/dfa.js';
import { log } from '../utils/debug.js';
import { Iter } from '../utils/iter.js';
import { LexToken, type Location } from './LexToken.js';

/**
 * Everything the scanner knows about one input stream. A context
 * is created when the stream is opened and threaded through every
 * call to {@link Scanner.next}.
 */
export type ScannerContext = {
  input: Uint8Array;
  /**
   * Offset of the next symbol to read.
   */
  pos: number;
  /**
   * Text of the most recent match.
   */
  text: string;
  leng: number;
  lineno: number;
  column: number;
};

export type ScanResult =
  | ({
      kind: 'match';
      rule: number;
      from: number;
      to: number;
      text: string;
    } & Location)
  | ({ kind: 'unrecognized'; offset: number; symbol: number } & Location)
  | { kind: 'eof' };

export class UnrecognizedInputError extends Error {
  readonly offset: number;
  readonly location: Location;
  constructor(offset: number, symbol: number, location: Location) {
    super(
      `Unrecognized input ${JSON.stringify(
        String.fromCharCode(symbol)
      )} at offset ${offset} (line ${location.line}, column ${location.column})`
    );
    this.name = 'UnrecognizedInputError';
    this.offset = offset;
    this.location = location;
  }
}

export type ScannerOptions = {
  /**
   * What to do when no rule matches at the current position:
   * throw an {@link UnrecognizedInputError}, or skip one symbol
   * and report it.
   */
  onUnrecognized?: 'throw' | 'skip';
};

export function toBytes(input: Uint8Array | string): Uint8Array {
  return typeof input == 'string' ? Buffer.from(input, 'latin1') : input;
}

function latin1(bytes: Uint8Array, from: number, to: number): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset + from, to - from).toString(
    'latin1'
  );
}

/**
 * Runs a DFA over input with maximal munch: the longest prefix that
 * ends in an accepting state wins, and symbols read past it are
 * given back for the next token.
 */
export class Scanner {
  readonly dfa: DFA;
  private onUnrecognized: 'throw' | 'skip';

  constructor(dfa: DFA, options: ScannerOptions = {}) {
    this.dfa = dfa;
    this.onUnrecognized = options.onUnrecognized ?? 'throw';
  }

  createContext(input: Uint8Array | string): ScannerContext {
    return {
      input: toBytes(input),
      pos: 0,
      text: '',
      leng: 0,
      lineno: 1,
      column: 1,
    };
  }

  private advance(ctx: ScannerContext, to: number) {
    for (let i = ctx.pos; i < to; i++) {
      if (ctx.input[i] == 0x0a) {
        ctx.lineno++;
        ctx.column = 1;
      } else {
        ctx.column++;
      }
    }
    ctx.text = latin1(ctx.input, ctx.pos, to);
    ctx.leng = to - ctx.pos;
    ctx.pos = to;
  }

  /**
   * Find the longest match at the current position and move past it.
   */
  next(ctx: ScannerContext): ScanResult {
    const { input } = ctx;
    const from = ctx.pos;
    if (from >= input.length) {
      return { kind: 'eof' };
    }

    const dfa = this.dfa;
    const alphabetSize = dfa.symbolClasses.alphabetSize;
    let state = dfa.getStartState();
    let mark: { pos: number; rule: number } | null = null;
    for (let pos = from; pos < input.length; ) {
      const symbol = input[pos];
      if (symbol >= alphabetSize) {
        break;
      }
      state = dfa.getNextState(state, symbol);
      if (dfa.isRejectState(state)) {
        break;
      }
      pos++;
      const rule = dfa.getAccept(state);
      if (rule !== null) {
        mark = { pos, rule };
      }
    }

    const location = { line: ctx.lineno, column: ctx.column };
    if (mark === null) {
      const symbol = input[from];
      if (this.onUnrecognized == 'throw') {
        throw new UnrecognizedInputError(from, symbol, location);
      }
      log('scanner: skipping unrecognized symbol', symbol, 'at', from);
      this.advance(ctx, from + 1);
      return { kind: 'unrecognized', offset: from, symbol, ...location };
    }
    this.advance(ctx, mark.pos);
    return {
      kind: 'match',
      rule: mark.rule,
      from,
      to: mark.pos,
      text: ctx.text,
      ...location,
    };
  }

  /**
   * Iterate over the tokens of input, naming each match after its
   * rule. Matches of rules in ignore are not yielded.
   */
  tokens<T>(
    input: Uint8Array | string,
    ruleNames: readonly T[],
    ignore: readonly T[] = []
  ): TokenIterator<T> {
    return new TokenIterator(this, this.createContext(input), ruleNames, ignore);
  }
}

export class TokenIterator<T> extends Iter<LexToken<T>> {
  private scanner: Scanner;
  private ctx: ScannerContext;
  private ruleNames: readonly T[];
  private ignore: readonly T[];

  constructor(
    scanner: Scanner,
    ctx: ScannerContext,
    ruleNames: readonly T[],
    ignore: readonly T[]
  ) {
    super();
    this.scanner = scanner;
    this.ctx = ctx;
    this.ruleNames = ruleNames;
    this.ignore = ignore;
  }

  next(): IteratorResult<LexToken<T>> {
    while (true) {
      const result = this.scanner.next(this.ctx);
      if (result.kind == 'eof') {
        return { done: true, value: undefined };
      }
      if (result.kind == 'unrecognized') {
        continue;
      }
      const token = this.ruleNames[result.rule];
      if (token === undefined) {
        throw new Error(`No name given for rule ${result.rule}`);
      }
      if (this.ignore.indexOf(token) >= 0) {
        continue;
      }
      return {
        done: false,
        value: new LexToken(
          token,
          { from: result.from, to: result.to },
          result.text,
          { line: result.line, column: result.column }
        ),
      };
    }
  }
}
