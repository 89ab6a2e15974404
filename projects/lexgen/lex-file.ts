import { err, ok, type Result } from 'neverthrow';
import { DEFINITION_NAME, DefinitionTable } from '../regex-compiler/definitions.js';
import { PatternErrorKind } from '../regex-compiler/errors.js';
import { RegexParser } from '../regex-compiler/parser.js';
import type { RegexNode } from '../regex-compiler/regex-node.js';
import { log } from '../utils/debug.js';
import {
  LexgenError,
  RulePatternError,
  SemanticError,
  SemanticErrorCode,
  SyntaxFileError,
  type SourceLocation,
} from './errors.js';

/**
 * What a rule does when it matches: run some code, or run the code
 * of a later rule (written as `|` in the syntax file).
 */
export type RuleAction =
  | { kind: 'code'; code: string }
  | { kind: 'continuation'; target: number };

export type Rule = {
  /**
   * Position in declaration order. Lower indices win ties.
   */
  index: number;
  patternText: string;
  pattern: RegexNode;
  action: RuleAction;
  location: SourceLocation;
};

export type Definition = {
  name: string;
  text: string;
  location: SourceLocation;
};

export type SyntaxFile = {
  source: string;
  definitions: DefinitionTable;
  definitionList: Definition[];
  rules: Rule[];
  /**
   * Code blocks from the definitions section, in order.
   */
  prologue: string[];
  /**
   * Code blocks from the rules section, which go at the top of the
   * scanning function.
   */
  rulesPrelude: string[];
  /**
   * Everything after the second %%, or null if there is none.
   */
  epilogue: string | null;
};

export type LexFileOptions = {
  /**
   * Name of the file, for error messages.
   */
  source?: string;
  alphabetSize?: number;
};

type PendingRule = {
  patternText: string;
  pattern: RegexNode;
  location: SourceLocation;
};

function isSeparator(line: string) {
  return line.trimEnd() == '%%';
}

function isBlank(line: string) {
  return line.trim() == '';
}

function startsIndented(line: string) {
  return line.startsWith(' ') || line.startsWith('\t');
}

/**
 * Find where the pattern of a rule line ends: the first blank or tab
 * that is not escaped, quoted, or inside a bracket expression.
 */
export function findPatternEnd(line: string): number {
  let inQuote = false;
  let inBracket = false;
  for (let i = 0; i < line.length; i++) {
    const c = line[i];
    if (c == '\\') {
      i++;
      continue;
    }
    if (inQuote) {
      if (c == '"') {
        inQuote = false;
      }
      continue;
    }
    if (inBracket) {
      if (c == '[' && line[i + 1] == ':') {
        const close = line.indexOf(':]', i + 2);
        if (close >= 0) {
          i = close + 1;
          continue;
        }
      }
      if (c == ']') {
        inBracket = false;
      }
      continue;
    }
    if (c == '"') {
      inQuote = true;
    } else if (c == '[') {
      inBracket = true;
      if (line[i + 1] == '^') {
        i++;
      }
      // a ] right after the opening bracket is a member
      if (line[i + 1] == ']') {
        i++;
      }
    } else if (c == ' ' || c == '\t') {
      return i;
    }
  }
  return line.length;
}

/**
 * Tracks the nesting of braces in C-like code, line by line,
 * skipping braces inside string and character literals and comments.
 */
export class BraceCounter {
  depth = 0;
  private inBlockComment = false;

  feed(line: string): number {
    let quote: string | null = null;
    for (let i = 0; i < line.length; i++) {
      const c = line[i];
      if (this.inBlockComment) {
        if (c == '*' && line[i + 1] == '/') {
          this.inBlockComment = false;
          i++;
        }
      } else if (quote !== null) {
        if (c == '\\') {
          i++;
        } else if (c == quote) {
          quote = null;
        }
      } else if (c == '/' && line[i + 1] == '*') {
        this.inBlockComment = true;
        i++;
      } else if (c == '/' && line[i + 1] == '/') {
        break;
      } else if (c == '"' || c == "'") {
        quote = c;
      } else if (c == '{') {
        this.depth++;
      } else if (c == '}') {
        this.depth--;
      }
    }
    return this.depth;
  }
}

class LexFileParser {
  private lines: string[];
  private lineIndex = 0;
  private source: string;
  private alphabetSize: number;
  private separatorLine = 0;

  private definitions = new DefinitionTable();
  private definitionList: Definition[] = [];
  private prologue: string[] = [];
  private rulesPrelude: string[] = [];
  private rules: Rule[] = [];
  // rules written with | that wait for the next rule's action
  private pending: PendingRule[] = [];

  constructor(text: string, options: LexFileOptions) {
    this.lines = text.replace(/\r\n/g, '\n').split('\n');
    this.source = options.source ?? '<input>';
    this.alphabetSize = options.alphabetSize ?? 256;
  }

  private loc(lineIndex: number, column: number): SourceLocation {
    return { source: this.source, line: lineIndex + 1, column };
  }

  private syntaxError(detail: string, lineIndex: number, column = 1): never {
    throw new SyntaxFileError(
      detail,
      this.loc(lineIndex, column),
      this.lines[lineIndex]
    );
  }

  parse(): SyntaxFile {
    this.parseDefinitionsSection();
    this.buildDefinitions();
    const epilogue = this.parseRulesSection();
    this.finishRules();
    log(
      `lex-file: ${this.definitionList.length} definitions, ${this.rules.length} rules in ${this.source}`
    );
    return {
      source: this.source,
      definitions: this.definitions,
      definitionList: this.definitionList,
      rules: this.rules,
      prologue: this.prologue,
      rulesPrelude: this.rulesPrelude,
      epilogue,
    };
  }

  /**
   * Read a %{ ... %} block starting at the current line and return
   * the lines between the markers.
   */
  private readCodeBlock(): string {
    const start = this.lineIndex;
    const code: string[] = [];
    this.lineIndex++;
    while (true) {
      if (this.lineIndex >= this.lines.length) {
        this.syntaxError('Unclosed %{ block', start);
      }
      const line = this.lines[this.lineIndex++];
      if (line.trimEnd() == '%}') {
        return code.join('\n');
      }
      code.push(line);
    }
  }

  private parseDefinitionsSection() {
    while (true) {
      if (this.lineIndex >= this.lines.length) {
        this.syntaxError(
          'Missing %% after the definitions section',
          this.lines.length - 1
        );
      }
      const line = this.lines[this.lineIndex];
      if (isSeparator(line)) {
        this.separatorLine = this.lineIndex++;
        return;
      }
      if (line.trimEnd() == '%{') {
        this.prologue.push(this.readCodeBlock());
        continue;
      }
      const lineIndex = this.lineIndex++;
      if (isBlank(line) || line.startsWith('//') || line.startsWith('#')) {
        continue;
      }
      if (startsIndented(line)) {
        this.prologue.push(line);
        continue;
      }
      if (line.startsWith('%')) {
        this.syntaxError(
          `Unsupported directive ${line.split(/[ \t]/)[0]}`,
          lineIndex
        );
      }
      this.parseDefinitionLine(line, lineIndex);
    }
  }

  private parseDefinitionLine(line: string, lineIndex: number) {
    const nameEnd = line.search(/[ \t]/);
    const name = nameEnd < 0 ? line : line.slice(0, nameEnd);
    if (!DEFINITION_NAME.test(name)) {
      this.syntaxError(`Malformed definition name ${name}`, lineIndex);
    }
    const rest = nameEnd < 0 ? '' : line.slice(nameEnd);
    const text = rest.trim();
    if (text == '') {
      this.syntaxError(`Definition ${name} has no pattern`, lineIndex);
    }
    const location = this.loc(
      lineIndex,
      nameEnd + (rest.length - rest.trimStart().length) + 1
    );
    if (this.definitionList.some((d) => d.name == name)) {
      throw new SemanticError(
        SemanticErrorCode.DUPLICATE_DEFINITION,
        `${name} is already defined`,
        this.loc(lineIndex, 1),
        line
      );
    }
    this.definitionList.push({ name, text, location });
  }

  /**
   * Parse every definition in order. All of them are declared first
   * so a reference that loops back can be told from one that is just
   * not defined yet.
   */
  private buildDefinitions() {
    for (const { name, text } of this.definitionList) {
      this.definitions.declare(name, text);
    }
    for (const { name, text, location } of this.definitionList) {
      const result = RegexParser.parseResult(text, {
        definitions: this.definitions,
        definingName: name,
        alphabetSize: this.alphabetSize,
      });
      if (result.isErr()) {
        const error = result.error;
        const sourceLine = this.lines[location.line - 1];
        if (error.kind == PatternErrorKind.CYCLIC_DEFINITION) {
          throw new SemanticError(
            SemanticErrorCode.CYCLIC_DEFINITION,
            error.message,
            { ...location, column: location.column + error.offset },
            sourceLine
          );
        }
        throw new RulePatternError(error, location, sourceLine);
      }
      this.definitions.define(name, result.value);
    }
  }

  /**
   * @returns the text after the closing %%, if there is one
   */
  private parseRulesSection(): string | null {
    while (this.lineIndex < this.lines.length) {
      const line = this.lines[this.lineIndex];
      if (isSeparator(line)) {
        return this.lines.slice(this.lineIndex + 1).join('\n');
      }
      if (line.trimEnd() == '%{') {
        this.rulesPrelude.push(this.readCodeBlock());
        continue;
      }
      if (isBlank(line)) {
        this.lineIndex++;
        continue;
      }
      if (startsIndented(line)) {
        if (this.rules.length > 0 || this.pending.length > 0) {
          this.syntaxError('Expected a rule to start with a pattern', this.lineIndex);
        }
        this.rulesPrelude.push(line);
        this.lineIndex++;
        continue;
      }
      this.parseRule();
    }
    return null;
  }

  private parseRule() {
    const lineIndex = this.lineIndex++;
    const line = this.lines[lineIndex];
    const patternEnd = findPatternEnd(line);
    const patternText = line.slice(0, patternEnd);
    const location = this.loc(lineIndex, 1);
    const result = RegexParser.parseResult(patternText, {
      definitions: this.definitions,
      alphabetSize: this.alphabetSize,
    });
    if (result.isErr()) {
      throw new RulePatternError(result.error, location, line);
    }
    const pattern = result.value;

    const rest = line.slice(patternEnd);
    const action = rest.trim();
    if (action == '|') {
      this.pending.push({ patternText, pattern, location });
      return;
    }
    let code = action;
    if (action.startsWith('{')) {
      const column = patternEnd + (rest.length - rest.trimStart().length) + 1;
      code = this.readActionBlock(rest.trimStart(), lineIndex, column);
    }

    const target = this.rules.length + this.pending.length;
    for (const pending of this.pending) {
      this.rules.push({
        index: this.rules.length,
        ...pending,
        action: { kind: 'continuation', target },
      });
    }
    this.pending = [];
    this.rules.push({
      index: this.rules.length,
      patternText,
      pattern,
      action: { kind: 'code', code },
      location,
    });
  }

  /**
   * Collect a brace-delimited action that may span several lines.
   */
  private readActionBlock(
    first: string,
    startLine: number,
    column: number
  ): string {
    const counter = new BraceCounter();
    const lines = [first];
    counter.feed(first);
    while (counter.depth > 0) {
      if (this.lineIndex >= this.lines.length) {
        this.syntaxError('Unclosed action block', startLine, column);
      }
      const line = this.lines[this.lineIndex++];
      lines.push(line);
      counter.feed(line);
    }
    return lines.join('\n').trimEnd();
  }

  private finishRules() {
    const last = this.pending[this.pending.length - 1];
    if (last) {
      throw new SemanticError(
        SemanticErrorCode.CONTINUATION_WITHOUT_FOLLOWER,
        `Rule ${last.patternText} uses | but no rule follows it`,
        last.location,
        this.lines[last.location.line - 1]
      );
    }
    if (this.rules.length == 0) {
      throw new SemanticError(
        SemanticErrorCode.EMPTY_RULE_SET,
        'No rules were declared',
        this.loc(this.separatorLine, 1),
        this.lines[this.separatorLine]
      );
    }
  }
}

/**
 * Split a syntax file into its sections and parse every definition
 * and rule pattern in it.
 */
export function parseLexFile(
  text: string,
  options: LexFileOptions = {}
): Result<SyntaxFile, LexgenError> {
  try {
    return ok(new LexFileParser(text, options).parse());
  } catch (e) {
    if (e instanceof LexgenError) {
      return err(e);
    }
    throw e;
  }
}

export function parseLexFileOrThrow(
  text: string,
  options: LexFileOptions = {}
): SyntaxFile {
  return new LexFileParser(text, options).parse();
}
