import { err, ok, type Result } from 'neverthrow';
import type { DefinitionTable } from './definitions.js';
import { PatternError, PatternErrorKind } from './errors.js';
import { posixClassRanges } from './posix-classes.js';
import {
  anyCharNode,
  charClassNode,
  charNode,
  concatNode,
  emptyNode,
  expandedSize,
  optionalNode,
  orNode,
  plusNode,
  repeatNode,
  sequenceNode,
  starNode,
  type RegexNode,
  type SymbolRange,
} from './regex-node.js';

export type PatternOptions = {
  /**
   * Definitions that {NAME} references are resolved against.
   */
  definitions?: DefinitionTable;
  /**
   * Name of the definition being parsed, if any. Used to report
   * references that loop back to it.
   */
  definingName?: string;
  /**
   * Number of symbols in the alphabet. Defaults to 256.
   */
  alphabetSize?: number;
};

const MAX_REPEAT = 1000;
const MAX_EXPANDED_SIZE = 100_000;

const SIMPLE_ESCAPES: { [char: string]: number } = {
  n: 0x0a,
  t: 0x09,
  r: 0x0d,
  f: 0x0c,
  v: 0x0b,
  a: 0x07,
  b: 0x08,
};

function isDigit(c: string | undefined) {
  return c !== undefined && c >= '0' && c <= '9';
}

function isOctal(c: string | undefined) {
  return c !== undefined && c >= '0' && c <= '7';
}

function isHex(c: string | undefined) {
  return c !== undefined && /^[0-9a-fA-F]$/.test(c);
}

function isNameStart(c: string | undefined) {
  return c !== undefined && /^[A-Za-z]$/.test(c);
}

/**
 * Recursive descent parser for a single pattern.
 *
 * Precedence, from tightest to loosest: atoms (literals, classes,
 * quoted strings, groups, macro references), repetition operators,
 * concatenation, alternation.
 */
export class RegexParser {
  private input: string;
  private pos = 0;
  private definitions?: DefinitionTable;
  private definingName?: string;
  private alphabetSize: number;

  private constructor(input: string, options: PatternOptions) {
    this.input = input;
    this.definitions = options.definitions;
    this.definingName = options.definingName;
    this.alphabetSize = options.alphabetSize ?? 256;
  }

  static parseOrThrow(input: string, options: PatternOptions = {}): RegexNode {
    return new RegexParser(input, options).parse();
  }

  static parseResult(
    input: string,
    options: PatternOptions = {}
  ): Result<RegexNode, PatternError> {
    try {
      return ok(RegexParser.parseOrThrow(input, options));
    } catch (e) {
      if (e instanceof PatternError) {
        return err(e);
      }
      throw e;
    }
  }

  private fail(kind: PatternErrorKind, offset: number, message: string): never {
    throw new PatternError(kind, offset, message);
  }

  private peek(ahead = 0): string | undefined {
    return this.input[this.pos + ahead];
  }

  private get done() {
    return this.pos >= this.input.length;
  }

  private symbol(code: number, offset: number): number {
    if (code >= this.alphabetSize) {
      this.fail(
        PatternErrorKind.SYMBOL_OUT_OF_RANGE,
        offset,
        `Symbol ${code} is outside the alphabet of ${this.alphabetSize} symbols`
      );
    }
    return code;
  }

  parse(): RegexNode {
    if (this.input.length == 0) {
      this.fail(PatternErrorKind.EMPTY_PATTERN, 0, 'Pattern is empty');
    }
    const node = this.parseOr(0);
    this.checkSize(node, 0);
    if (!this.done) {
      // parseOr only stops early on a ) at depth 0, which parseBranch
      // has already reported.
      throw new Error(`Parser stopped at offset ${this.pos}`);
    }
    return node;
  }

  /**
   * Nested bounds and spliced definitions multiply, so the size of the
   * whole expanded tree is capped as well as each bound.
   */
  private checkSize(node: RegexNode, offset: number) {
    if (expandedSize(node) > MAX_EXPANDED_SIZE) {
      this.fail(
        PatternErrorKind.MALFORMED_REPETITION,
        offset,
        `Pattern expands to more than ${MAX_EXPANDED_SIZE} symbols`
      );
    }
  }

  private parseOr(depth: number): RegexNode {
    let node = this.parseBranch(depth);
    while (this.peek() == '|') {
      this.pos++;
      node = orNode(node, this.parseBranch(depth));
    }
    return node;
  }

  private parseBranch(depth: number): RegexNode {
    let node: RegexNode | null = null;
    while (!this.done) {
      const c = this.peek();
      if (c == '|') {
        break;
      }
      if (c == ')') {
        if (depth > 0) {
          break;
        }
        this.fail(
          PatternErrorKind.UNBALANCED_PARENS,
          this.pos,
          'Found ) without a matching ('
        );
      }
      node = concatNode(node, this.parseStarPlus(this.parseAtom(depth)));
    }
    return node ?? emptyNode();
  }

  private parseAtom(depth: number): RegexNode {
    const start = this.pos;
    const c = this.input[start];
    switch (c) {
      case '(':
        return this.parseParens(depth);
      case '[':
        return this.parseBracket();
      case '"':
        return this.parseQuoted();
      case '.':
        this.pos++;
        return anyCharNode();
      case '\\':
        return charNode(this.parseEscape());
      case '{':
        if (isNameStart(this.peek(1))) {
          return this.parseMacro();
        }
        return this.fail(
          PatternErrorKind.NOTHING_TO_REPEAT,
          start,
          'Expected an expression before {'
        );
      case '*':
      case '+':
      case '?':
        return this.fail(
          PatternErrorKind.NOTHING_TO_REPEAT,
          start,
          `Expected an expression before ${c}`
        );
      default:
        this.pos++;
        return charNode(this.symbol(c.charCodeAt(0), start));
    }
  }

  private parseParens(depth: number): RegexNode {
    const open = this.pos;
    this.pos++;
    const child = this.parseOr(depth + 1);
    if (this.peek() != ')') {
      this.fail(
        PatternErrorKind.UNBALANCED_PARENS,
        open,
        'Reached end of input before finding matching )'
      );
    }
    this.pos++;
    return child;
  }

  private parseStarPlus(atom: RegexNode): RegexNode {
    let node = atom;
    while (!this.done) {
      const c = this.peek();
      if (c == '*') {
        node = starNode(node);
      } else if (c == '+') {
        node = plusNode(node);
      } else if (c == '?') {
        node = optionalNode(node);
      } else if (c == '{' && (isDigit(this.peek(1)) || this.peek(1) == ',')) {
        node = this.parseRepetition(node);
        continue;
      } else {
        break;
      }
      this.pos++;
    }
    return node;
  }

  /**
   * {n}, {n,} or {n,m} following an atom.
   */
  private parseRepetition(child: RegexNode): RegexNode {
    const open = this.pos;
    const close = this.input.indexOf('}', open);
    if (close < 0) {
      this.fail(
        PatternErrorKind.UNTERMINATED_BRACE,
        open,
        'Reached end of input before finding matching }'
      );
    }
    const body = this.input.slice(open + 1, close);
    const match = /^(\d+)(,(\d*))?$/.exec(body);
    if (!match) {
      this.fail(
        PatternErrorKind.MALFORMED_REPETITION,
        open,
        `Malformed repetition {${body}}`
      );
    }
    const min = parseInt(match[1], 10);
    let max: number | null = min;
    if (match[2] !== undefined) {
      max = match[3] ? parseInt(match[3], 10) : null;
    }
    if (max !== null && max < min) {
      this.fail(
        PatternErrorKind.MALFORMED_REPETITION,
        open,
        `Repetition {${body}} has an upper bound below its lower bound`
      );
    }
    if (min > MAX_REPEAT || (max ?? 0) > MAX_REPEAT) {
      this.fail(
        PatternErrorKind.MALFORMED_REPETITION,
        open,
        `Repetition bounds may not exceed ${MAX_REPEAT}`
      );
    }
    const node = repeatNode(child, min, max);
    this.checkSize(node, open);
    this.pos = close + 1;
    return node;
  }

  private parseMacro(): RegexNode {
    const open = this.pos;
    const close = this.input.indexOf('}', open);
    if (close < 0) {
      this.fail(
        PatternErrorKind.UNTERMINATED_BRACE,
        open,
        'Reached end of input before finding matching }'
      );
    }
    const name = this.input.slice(open + 1, close);
    const node = this.definitions?.lookup(name);
    if (node === undefined) {
      if (
        this.definitions &&
        this.definingName !== undefined &&
        this.definitions.reaches(name, this.definingName)
      ) {
        this.fail(
          PatternErrorKind.CYCLIC_DEFINITION,
          open,
          `Definition {${name}} refers back to ${this.definingName}`
        );
      }
      this.fail(
        PatternErrorKind.UNDEFINED_MACRO,
        open,
        `Undefined definition {${name}}`
      );
    }
    this.pos = close + 1;
    return node;
  }

  /**
   * Consume an escape sequence starting at the backslash, returning
   * the symbol it stands for.
   */
  private parseEscape(): number {
    const start = this.pos;
    const c = this.peek(1);
    if (c === undefined) {
      this.fail(
        PatternErrorKind.DANGLING_ESCAPE,
        start,
        'Pattern ends with an unfinished escape'
      );
    }
    if (isOctal(c)) {
      let digits = '';
      this.pos++;
      while (digits.length < 3 && isOctal(this.peek())) {
        digits += this.peek();
        this.pos++;
      }
      return this.symbol(parseInt(digits, 8), start);
    }
    if (c == 'x' && isHex(this.peek(2))) {
      let digits = '';
      this.pos += 2;
      while (digits.length < 2 && isHex(this.peek())) {
        digits += this.peek();
        this.pos++;
      }
      return this.symbol(parseInt(digits, 16), start);
    }
    this.pos += 2;
    const simple = SIMPLE_ESCAPES[c];
    if (simple !== undefined) {
      return simple;
    }
    return this.symbol(c.charCodeAt(0), start);
  }

  private parseQuoted(): RegexNode {
    const open = this.pos;
    this.pos++;
    const symbols: number[] = [];
    while (true) {
      const c = this.peek();
      if (c === undefined) {
        this.fail(
          PatternErrorKind.UNTERMINATED_STRING,
          open,
          'Reached end of input before finding closing "'
        );
      }
      if (c == '"') {
        this.pos++;
        break;
      }
      if (c == '\\') {
        symbols.push(this.parseEscape());
      } else {
        symbols.push(this.symbol(c.charCodeAt(0), this.pos));
        this.pos++;
      }
    }
    return sequenceNode(symbols);
  }

  /**
   * A single member of a bracket expression: a plain character or an
   * escape.
   */
  private parseClassChar(open: number): number {
    const c = this.peek();
    if (c === undefined) {
      this.fail(
        PatternErrorKind.UNTERMINATED_BRACKET,
        open,
        'Reached end of input before finding matching ]'
      );
    }
    if (c == '\\') {
      return this.parseEscape();
    }
    this.pos++;
    return this.symbol(c.charCodeAt(0), this.pos - 1);
  }

  private parseBracket(): RegexNode {
    const open = this.pos;
    this.pos++;
    let negated = false;
    if (this.peek() == '^') {
      negated = true;
      this.pos++;
    }
    const ranges: SymbolRange[] = [];
    let first = true;
    while (true) {
      const c = this.peek();
      if (c === undefined) {
        this.fail(
          PatternErrorKind.UNTERMINATED_BRACKET,
          open,
          'Reached end of input before finding matching ]'
        );
      }
      if (c == ']' && !first) {
        this.pos++;
        break;
      }
      first = false;
      if (c == '[' && this.peek(1) == ':') {
        const close = this.input.indexOf(':]', this.pos + 2);
        if (close >= 0) {
          const name = this.input.slice(this.pos + 2, close);
          const classRanges = posixClassRanges(name);
          if (classRanges === undefined) {
            this.fail(
              PatternErrorKind.UNKNOWN_POSIX_CLASS,
              this.pos,
              `Unknown character class [:${name}:]`
            );
          }
          ranges.push(...classRanges);
          this.pos = close + 2;
          continue;
        }
      }
      const rangeStart = this.pos;
      const from = this.parseClassChar(open);
      const next = this.peek(1);
      if (this.peek() == '-' && next !== undefined && next != ']') {
        this.pos++;
        const to = this.parseClassChar(open);
        if (to < from) {
          this.fail(
            PatternErrorKind.INVALID_RANGE,
            rangeStart,
            `Range ${this.input.slice(rangeStart, this.pos)} is out of order`
          );
        }
        ranges.push({ from, to });
      } else {
        ranges.push({ from, to: from });
      }
    }
    return charClassNode(ranges, negated);
  }
}

export const parseRegex = RegexParser.parseOrThrow;
