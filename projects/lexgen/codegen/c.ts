import type { CompiledLexer } from '../compile.js';
import {
  actionGroups,
  buildTables,
  commentSafe,
  formatNumbers,
  type ScannerTables,
} from './common.js';

const HEADER = `#include <stdio.h>
#include <stdlib.h>`;

const UNRECOGNIZED = `#ifndef YY_UNRECOGNIZED
#define YY_UNRECOGNIZED()                                              \\
  do {                                                                 \\
    fprintf(stderr, "unrecognized character 0x%02x at line %d\\n",      \\
            (unsigned char) yytext[0], yylineno);                      \\
    return -1;                                                         \\
  } while (0)
#endif`;

const GLOBALS = `FILE *yyin = NULL;
char *yytext = NULL;
int yyleng = 0;
int yylineno = 1;
int yycolumn = 1;

int yywrap(void);`;

const BUFFER = `static char *yy_buf = NULL;
static size_t yy_len = 0;
static size_t yy_pos = 0;
static size_t yy_hold_pos = 0;
static char yy_hold_char = '\\0';
static int yy_loaded = 0;

static void yy_fatal(const char *msg)
{
  fprintf(stderr, "%s\\n", msg);
  exit(2);
}

/* Read the rest of yyin into the buffer. */
static void yy_load(void)
{
  size_t cap = 4096;
  size_t n;
  if (yyin == NULL) {
    yyin = stdin;
  }
  free(yy_buf);
  yy_buf = (char *) malloc(cap + 1);
  if (yy_buf == NULL) {
    yy_fatal("out of memory");
  }
  yy_len = 0;
  while ((n = fread(yy_buf + yy_len, 1, cap - yy_len, yyin)) > 0) {
    yy_len += n;
    if (yy_len == cap) {
      char *grown;
      cap *= 2;
      grown = (char *) realloc(yy_buf, cap + 1);
      if (grown == NULL) {
        yy_fatal("out of memory");
      }
      yy_buf = grown;
    }
  }
  if (ferror(yyin)) {
    yy_fatal("error reading input");
  }
  yy_buf[yy_len] = '\\0';
  yy_pos = 0;
  yy_hold_pos = yy_len;
  yy_hold_char = '\\0';
  yy_loaded = 1;
}`;

function tables(t: ScannerTables): string {
  return [
    `#define YY_ALPHABET_SIZE ${t.alphabetSize}`,
    `#define YY_NUM_STATES ${t.numStates}`,
    `#define YY_NUM_CLASSES ${t.numClasses}`,
    `#define YY_START_STATE ${t.startState}`,
    `#define YY_REJECT_STATE 0`,
    '',
    '/* symbol class of each input symbol */',
    `static const int yy_ec[YY_ALPHABET_SIZE] = {`,
    formatNumbers(t.classOf, '  '),
    '};',
    '',
    '/* next state, indexed by state * YY_NUM_CLASSES + class */',
    `static const int yy_nxt[YY_NUM_STATES * YY_NUM_CLASSES] = {`,
    formatNumbers(t.next, '  '),
    '};',
    '',
    '/* rule accepted in each state, or -1 */',
    `static const int yy_accept[YY_NUM_STATES] = {`,
    formatNumbers(t.accept, '  '),
    '};',
  ].join('\n');
}

function scanFunction(lexer: CompiledLexer, t: ScannerTables): string {
  const { rules, rulesPrelude } = lexer.file;
  const out: string[] = ['int yylex(void)', '{'];
  for (const block of rulesPrelude) {
    out.push(block);
  }
  out.push(
    '  for (;;) {',
    '    size_t yy_start;',
    '    size_t yy_cp;',
    '    size_t yy_mark;',
    '    int yy_state = YY_START_STATE;',
    '    int yy_rule = -1;',
    '',
    '    if (!yy_loaded) {',
    '      yy_load();',
    '    }',
    '    yy_buf[yy_hold_pos] = yy_hold_char;',
    '    if (yy_pos >= yy_len) {',
    '      yy_loaded = 0;',
    '      if (yywrap()) {',
    '        return 0;',
    '      }',
    '      continue;',
    '    }',
    '',
    '    yy_start = yy_pos;',
    '    yy_mark = yy_start;',
    '    for (yy_cp = yy_start; yy_cp < yy_len;) {',
    '      unsigned char yy_c = (unsigned char) yy_buf[yy_cp];'
  );
  if (t.alphabetSize < 256) {
    out.push('      if (yy_c >= YY_ALPHABET_SIZE) {', '        break;', '      }');
  }
  out.push(
    '      yy_state = yy_nxt[yy_state * YY_NUM_CLASSES + yy_ec[yy_c]];',
    '      if (yy_state == YY_REJECT_STATE) {',
    '        break;',
    '      }',
    '      ++yy_cp;',
    '      if (yy_accept[yy_state] >= 0) {',
    '        yy_rule = yy_accept[yy_state];',
    '        yy_mark = yy_cp;',
    '      }',
    '    }',
    '    if (yy_rule < 0) {',
    '      yy_mark = yy_start + 1;',
    '    }',
    '',
    '    yytext = yy_buf + yy_start;',
    '    yyleng = (int) (yy_mark - yy_start);',
    '    yy_hold_pos = yy_mark;',
    '    yy_hold_char = yy_buf[yy_mark];',
    "    yy_buf[yy_mark] = '\\0';",
    '    yy_pos = yy_mark;',
    '    for (yy_cp = 0; yy_cp < (size_t) yyleng; ++yy_cp) {',
    "      if (yytext[yy_cp] == '\\n') {",
    '        ++yylineno;',
    '        yycolumn = 1;',
    '      } else {',
    '        ++yycolumn;',
    '      }',
    '    }',
    '',
    '    if (yy_rule < 0) {',
    '      YY_UNRECOGNIZED();',
    '      continue;',
    '    }',
    '',
    '    switch (yy_rule) {'
  );
  for (const group of actionGroups(rules)) {
    for (const index of group.rules) {
      const rule = rules[index];
      out.push(
        `    case ${index}: /* ${commentSafe(rule.patternText)} (line ${
          rule.location.line
        }) */`
      );
    }
    out.push('      {');
    if (group.code.length > 0) {
      out.push(group.code);
    }
    out.push('      }', '      break;');
  }
  out.push('    default:', '      break;', '    }', '  }', '}');
  return out.join('\n');
}

/**
 * Generate a C scanner with the usual lex interface: yylex(),
 * yytext, yyleng, yylineno and yyin, calling yywrap() at the end of
 * the input.
 */
export function generateC(lexer: CompiledLexer): string {
  const { file } = lexer;
  const t = buildTables(lexer.dfa);
  const sections = [
    `/* Scanner generated by lexgen from ${commentSafe(file.source)}. */`,
  ];
  for (const block of file.prologue) {
    sections.push(block);
  }
  sections.push(
    HEADER,
    UNRECOGNIZED,
    GLOBALS,
    tables(t),
    BUFFER,
    scanFunction(lexer, t)
  );
  let out = sections.join('\n\n') + '\n';
  if (file.epilogue !== null) {
    out += '\n' + file.epilogue;
  }
  return out;
}
