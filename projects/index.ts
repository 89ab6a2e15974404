export * from './regex-compiler/regex-node.js';
export { PatternError, PatternErrorKind } from './regex-compiler/errors.js';
export { DefinitionTable } from './regex-compiler/definitions.js';
export {
  RegexParser,
  parseRegex,
  type PatternOptions,
} from './regex-compiler/parser.js';
export { POSIX_CLASS_NAMES } from './regex-compiler/posix-classes.js';
export { NFA, type ConstNFA, type NFAEdge } from './nfa-to-dfa/nfa.js';
export {
  CombinedNFA,
  regexNFA,
  type AlphabetOptions,
} from './nfa-to-dfa/regex-nfa.js';
export { SymbolClasses } from './nfa-to-dfa/symbol-classes.js';
export { DFA, type DFAMatch } from './nfa-to-dfa/dfa.js';
export { minimize } from './nfa-to-dfa/minimize.js';
export {
  Scanner,
  UnrecognizedInputError,
  type ScannerContext,
  type ScannerOptions,
  type ScanResult,
} from './lexer-gen/scanner.js';
export { LexToken, type Location } from './lexer-gen/LexToken.js';
export * from './lexgen/errors.js';
export {
  parseLexFile,
  parseLexFileOrThrow,
  type Rule,
  type RuleAction,
  type SyntaxFile,
} from './lexgen/lex-file.js';
export {
  TargetLanguage,
  resolveOptions,
  type GeneratorOptions,
} from './lexgen/options.js';
export {
  buildAutomaton,
  compileLexFile,
  scannerFor,
  type CompiledLexer,
  type CompileStats,
} from './lexgen/compile.js';
export { generateC } from './lexgen/codegen/c.js';
export { generateTS } from './lexgen/codegen/ts.js';
export { generateCode } from './lexgen/cli.js';
