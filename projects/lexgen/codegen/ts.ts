import type { CompiledLexer } from '../compile.js';
import {
  actionGroups,
  buildTables,
  commentSafe,
  formatNumbers,
  type ScannerTables,
} from './common.js';

const RUNTIME = `/**
 * State of one scan. Create it with createContext() and pass it to
 * every call of yylex().
 */
export type ScannerContext = {
  input: Uint8Array;
  pos: number;
  /**
   * Text and length of the most recent match.
   */
  text: string;
  leng: number;
  lineno: number;
  column: number;
  /**
   * Called at the end of the input. Return more input to keep
   * scanning, or null to stop.
   */
  wrap?: () => Uint8Array | null;
  /**
   * Called with the offset and value of a symbol no rule matches.
   * The symbol is skipped. Without a handler yylex() throws.
   */
  onUnrecognized?: (offset: number, symbol: number) => void;
};

export class UnrecognizedInputError extends Error {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
  constructor(offset: number, symbol: number, line: number, column: number) {
    super(
      \`Unrecognized input \${JSON.stringify(
        String.fromCharCode(symbol)
      )} at offset \${offset} (line \${line}, column \${column})\`
    );
    this.name = 'UnrecognizedInputError';
    this.offset = offset;
    this.line = line;
    this.column = column;
  }
}`;

const CREATE_CONTEXT = `export function createContext(input: Uint8Array | string): ScannerContext {
  let bytes: Uint8Array;
  if (typeof input == 'string') {
    bytes = new Uint8Array(input.length);
    for (let i = 0; i < input.length; i++) {
      bytes[i] = input.charCodeAt(i) & 0xff;
    }
  } else {
    bytes = input;
  }
  return { input: bytes, pos: 0, text: '', leng: 0, lineno: 1, column: 1 };
}

function yyDecode(bytes: Uint8Array, from: number, to: number): string {
  let text = '';
  for (let i = from; i < to; i++) {
    text += String.fromCharCode(bytes[i]);
  }
  return text;
}`;

function tables(t: ScannerTables): string {
  return [
    `const YY_ALPHABET_SIZE = ${t.alphabetSize};`,
    `const YY_NUM_CLASSES = ${t.numClasses};`,
    `const YY_START_STATE = ${t.startState};`,
    `const YY_REJECT_STATE = 0;`,
    '',
    '// symbol class of each input symbol',
    'const YY_EC: readonly number[] = [',
    formatNumbers(t.classOf, '  '),
    '];',
    '',
    '// next state, indexed by state * YY_NUM_CLASSES + class',
    'const YY_NXT: readonly number[] = [',
    formatNumbers(t.next, '  '),
    '];',
    '',
    '// rule accepted in each state, or -1',
    'const YY_ACCEPT: readonly number[] = [',
    formatNumbers(t.accept, '  '),
    '];',
  ].join('\n');
}

function scanFunction(lexer: CompiledLexer): string {
  const { rules, rulesPrelude } = lexer.file;
  const out: string[] = [
    '/**',
    ' * Scan the next token and run its action. Returns 0 at the end',
    ' * of the input, or whatever an action returns.',
    ' */',
    'export function yylex(ctx: ScannerContext) {',
  ];
  for (const block of rulesPrelude) {
    out.push(block);
  }
  out.push(
    '  while (true) {',
    '    if (ctx.pos >= ctx.input.length) {',
    '      const more = ctx.wrap ? ctx.wrap() : null;',
    '      if (more === null) {',
    '        return 0;',
    '      }',
    '      ctx.input = more;',
    '      ctx.pos = 0;',
    '      continue;',
    '    }',
    '',
    '    const yyStart = ctx.pos;',
    '    let yyState = YY_START_STATE;',
    '    let yyRule = -1;',
    '    let yyMark = yyStart;',
    '    for (let yyCp = yyStart; yyCp < ctx.input.length; ) {',
    '      const yyC = ctx.input[yyCp];',
    '      if (yyC >= YY_ALPHABET_SIZE) {',
    '        break;',
    '      }',
    '      yyState = YY_NXT[yyState * YY_NUM_CLASSES + YY_EC[yyC]];',
    '      if (yyState == YY_REJECT_STATE) {',
    '        break;',
    '      }',
    '      yyCp++;',
    '      if (YY_ACCEPT[yyState] >= 0) {',
    '        yyRule = YY_ACCEPT[yyState];',
    '        yyMark = yyCp;',
    '      }',
    '    }',
    '    if (yyRule < 0) {',
    '      yyMark = yyStart + 1;',
    '    }',
    '',
    '    const yyLine = ctx.lineno;',
    '    const yyColumn = ctx.column;',
    '    for (let yyCp = yyStart; yyCp < yyMark; yyCp++) {',
    '      if (ctx.input[yyCp] == 0x0a) {',
    '        ctx.lineno++;',
    '        ctx.column = 1;',
    '      } else {',
    '        ctx.column++;',
    '      }',
    '    }',
    '    ctx.text = yyDecode(ctx.input, yyStart, yyMark);',
    '    ctx.leng = yyMark - yyStart;',
    '    ctx.pos = yyMark;',
    '',
    '    if (yyRule < 0) {',
    '      const yySymbol = ctx.input[yyStart];',
    '      if (!ctx.onUnrecognized) {',
    '        throw new UnrecognizedInputError(yyStart, yySymbol, yyLine, yyColumn);',
    '      }',
    '      ctx.onUnrecognized(yyStart, yySymbol);',
    '      continue;',
    '    }',
    '',
    '    const yytext = ctx.text;',
    '    const yyleng = ctx.leng;',
    '    switch (yyRule) {'
  );
  for (const group of actionGroups(rules)) {
    for (const index of group.rules) {
      const rule = rules[index];
      out.push(
        `      case ${index}: /* ${commentSafe(rule.patternText)} (line ${
          rule.location.line
        }) */`
      );
    }
    out.push('      {');
    if (group.code.length > 0) {
      out.push(group.code);
    }
    out.push('        break;', '      }');
  }
  out.push('    }', '    void yytext;', '    void yyleng;', '  }', '}');
  return out.join('\n');
}

/**
 * Generate a self-contained TypeScript scanner module exporting
 * createContext() and yylex(ctx).
 */
export function generateTS(lexer: CompiledLexer): string {
  const { file } = lexer;
  const sections = [
    `/* Scanner generated by lexgen from ${commentSafe(file.source)}. */`,
  ];
  for (const block of file.prologue) {
    sections.push(block);
  }
  sections.push(
    RUNTIME,
    tables(buildTables(lexer.dfa)),
    CREATE_CONTEXT,
    scanFunction(lexer)
  );
  let out = sections.join('\n\n') + '\n';
  if (file.epilogue !== null) {
    out += '\n' + file.epilogue;
  }
  return out;
}
