import type { Result } from 'neverthrow';
import { DFA } from '../nfa-to-dfa/dfa.js';
import { minimize } from '../nfa-to-dfa/minimize.js';
import { CombinedNFA } from '../nfa-to-dfa/regex-nfa.js';
import { Scanner, type ScannerOptions } from '../lexer-gen/scanner.js';
import { log } from '../utils/debug.js';
import type { LexgenError } from './errors.js';
import { parseLexFile, type SyntaxFile } from './lex-file.js';
import { resolveOptions, type GeneratorOptions } from './options.js';

export type CompileStats = {
  rules: number;
  nfaStates: number;
  symbolClasses: number;
  dfaStates: number;
  minimizedStates: number | null;
};

export type CompiledLexer = {
  file: SyntaxFile;
  options: GeneratorOptions;
  nfa: CombinedNFA;
  /**
   * The DFA straight out of the subset construction.
   */
  determinized: DFA;
  /**
   * The DFA code is generated from: the minimized one unless
   * minimization was turned off.
   */
  dfa: DFA;
  stats: CompileStats;
};

/**
 * Build the automaton for an already parsed syntax file.
 */
export function buildAutomaton(
  file: SyntaxFile,
  options: Partial<GeneratorOptions> = {}
): CompiledLexer {
  const resolved = resolveOptions(options);
  const nfa = new CombinedNFA(
    file.rules.map((rule) => rule.pattern),
    resolved
  );
  log(`nfa: ${nfa.numStates} states for ${nfa.numRules} rules`);

  const determinized = DFA.fromNFA(nfa, resolved.alphabetSize);
  log(
    `dfa: ${determinized.numStates} states over ${determinized.numClasses} symbol classes`
  );

  let dfa = determinized;
  let minimizedStates: number | null = null;
  if (resolved.minimize) {
    dfa = minimize(determinized);
    minimizedStates = dfa.numStates;
    log(`minimize: ${determinized.numStates} -> ${dfa.numStates} states`);
  }

  return {
    file,
    options: resolved,
    nfa,
    determinized,
    dfa,
    stats: {
      rules: file.rules.length,
      nfaStates: nfa.numStates,
      symbolClasses: determinized.numClasses,
      dfaStates: determinized.numStates,
      minimizedStates,
    },
  };
}

/**
 * Parse a syntax file and build its automaton.
 */
export function compileLexFile(
  text: string,
  source: string,
  options: Partial<GeneratorOptions> = {}
): Result<CompiledLexer, LexgenError> {
  const resolved = resolveOptions(options);
  return parseLexFile(text, {
    source,
    alphabetSize: resolved.alphabetSize,
  }).map((file) => buildAutomaton(file, resolved));
}

/**
 * An in-process scanner for a compiled syntax file.
 */
export function scannerFor(
  lexer: CompiledLexer,
  options: ScannerOptions = {}
): Scanner {
  return new Scanner(lexer.dfa, options);
}
