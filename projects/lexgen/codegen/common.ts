import type { DFA } from '../../nfa-to-dfa/dfa.js';
import type { Rule } from '../lex-file.js';

/**
 * The DFA flattened into plain arrays, ready to be printed.
 */
export type ScannerTables = {
  alphabetSize: number;
  numStates: number;
  numClasses: number;
  startState: number;
  /**
   * Symbol class of each symbol.
   */
  classOf: readonly number[];
  /**
   * Next state, row-major: next[state * numClasses + cls].
   */
  next: readonly number[];
  /**
   * Rule accepted in each state, or -1.
   */
  accept: readonly number[];
};

export function buildTables(dfa: DFA): ScannerTables {
  const next: number[] = [];
  const accept: number[] = [];
  for (let state = 0; state < dfa.numStates; state++) {
    for (let cls = 0; cls < dfa.numClasses; cls++) {
      next.push(dfa.getClassTransition(state, cls));
    }
    accept.push(dfa.getAccept(state) ?? -1);
  }
  return {
    alphabetSize: dfa.symbolClasses.alphabetSize,
    numStates: dfa.numStates,
    numClasses: dfa.numClasses,
    startState: dfa.getStartState(),
    classOf: dfa.symbolClasses.toArray(),
    next,
    accept,
  };
}

/**
 * Print numbers as the body of an array literal, a fixed number
 * per line.
 */
export function formatNumbers(
  values: readonly number[],
  indent: string,
  perLine = 16
): string {
  const lines: string[] = [];
  for (let i = 0; i < values.length; i += perLine) {
    lines.push(indent + values.slice(i, i + perLine).join(', ') + ',');
  }
  return lines.join('\n');
}

/**
 * A block of code run by one or more rules. Rules written with `|`
 * share the code of the rule that follows them.
 */
export type ActionGroup = { rules: number[]; code: string };

export function actionGroups(rules: readonly Rule[]): ActionGroup[] {
  const groups: ActionGroup[] = [];
  let waiting: number[] = [];
  for (const rule of rules) {
    waiting.push(rule.index);
    if (rule.action.kind == 'code') {
      groups.push({ rules: waiting, code: rule.action.code });
      waiting = [];
    }
  }
  return groups;
}

/**
 * Pattern text safe to put inside a block comment.
 */
export function commentSafe(text: string): string {
  return text.replace(/\*\//g, '*\\/');
}
