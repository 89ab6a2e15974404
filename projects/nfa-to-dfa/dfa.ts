import { Table, type ConstTable } from '../utils/data-structures/table.js';
import type { IHaveDebugStr } from '../utils/debug.js';
import { NumberSet } from '../utils/sets.js';
import { closure, move, rangesToStr, type ConstNFA } from './nfa.js';
import { SymbolClasses } from './symbol-classes.js';

export type DFAMatch = {
  /**
   * Number of symbols in the longest match.
   */
  length: number;
  /**
   * The rule that accepts it.
   */
  rule: number;
};

/**
 * The earliest rule accepted by any of the given nfa states.
 */
function acceptOf(nfa: ConstNFA, nfaStates: Iterable<number>): number | null {
  let accept: number | null = null;
  for (const state of nfaStates) {
    const rule = nfa.getAccept(state);
    if (rule !== null && (accept === null || rule < accept)) {
      accept = rule;
    }
  }
  return accept;
}

/**
 * Convert an NFA to a DFA with the subset construction.
 * See page 47 of Engineering a Compiler (Cooper & Torczon)
 *
 * DFA state 0 is the reject state, whose configuration is the empty
 * set. State 1 is the closure of the NFA's start state. The other
 * states are numbered in the order a breadth first traversal finds
 * them, trying symbol classes in ascending order.
 */
function toDFA(nfa: ConstNFA, classes: SymbolClasses): DFA {
  let hasAccepting = false;
  for (let si = 0; si < nfa.numStates && !hasAccepting; si++) {
    hasAccepting = nfa.getAccept(si) !== null;
  }
  if (!hasAccepting) {
    throw new Error('Cannot build a DFA from an NFA that accepts no rule');
  }

  // the NFA configuration of each DFA state, and their canonical keys
  const configs: NumberSet[] = [new NumberSet()];
  const stateForKey: Map<string, number> = new Map([[configs[0].hash(), 0]]);
  const lookupOrAdd = (config: NumberSet) => {
    const key = config.hash();
    let state = stateForKey.get(key);
    if (state === undefined) {
      state = configs.length;
      configs.push(config);
      stateForKey.set(key, state);
    }
    return state;
  };
  lookupOrAdd(new NumberSet(closure(nfa, [nfa.getStartState()])));

  const transitions: Table<number> = new Table(classes.numClasses);
  transitions.addRow(() => DFA.REJECT_STATE);
  // configs grows while we walk it, which makes this a worklist
  for (let state = 1; state < configs.length; state++) {
    const config = configs[state];
    transitions.addRow((cls) =>
      lookupOrAdd(
        new NumberSet(
          closure(nfa, move(nfa, config, classes.representative(cls)))
        )
      )
    );
  }

  return new DFA(
    classes,
    transitions,
    configs.map((config) => acceptOf(nfa, config)),
    1
  );
}

/**
 * A deterministic automaton over symbol classes. The transition
 * function is total: a missing transition is an edge to the reject
 * state, which loops to itself and never accepts.
 */
export class DFA implements IHaveDebugStr {
  static readonly REJECT_STATE = 0;

  readonly symbolClasses: SymbolClasses;
  private readonly transitions: ConstTable<number>;
  private readonly accept: readonly (number | null)[];
  private readonly startState: number;

  constructor(
    symbolClasses: SymbolClasses,
    transitions: ConstTable<number>,
    accept: readonly (number | null)[],
    startState: number
  ) {
    if (transitions.numRows != accept.length) {
      throw new Error(
        `DFA has ${transitions.numRows} rows of transitions but ${accept.length} accept tags`
      );
    }
    if (accept[DFA.REJECT_STATE] !== null) {
      throw new Error('The reject state can not be accepting');
    }
    this.symbolClasses = symbolClasses;
    this.transitions = transitions;
    this.accept = accept;
    this.startState = startState;
  }

  /**
   * Build a DFA from nfa. Symbols are grouped into classes by the
   * edges of nfa unless classes are given.
   */
  static fromNFA(
    nfa: ConstNFA,
    alphabetSize: number,
    classes: SymbolClasses = SymbolClasses.fromNFA(nfa, alphabetSize)
  ): DFA {
    return toDFA(nfa, classes);
  }

  get numStates() {
    return this.transitions.numRows;
  }

  get numClasses() {
    return this.symbolClasses.numClasses;
  }

  getStartState() {
    return this.startState;
  }

  isRejectState(state: number) {
    return state == DFA.REJECT_STATE;
  }

  getAccept(state: number): number | null {
    return this.accept[state];
  }

  isAcceptingState(state: number) {
    return this.accept[state] !== null;
  }

  /**
   * Next state from a state on a symbol class.
   */
  getClassTransition(state: number, cls: number): number {
    return this.transitions.getCell(state, cls);
  }

  getNextState(state: number, symbol: number): number {
    return this.getClassTransition(state, this.symbolClasses.getClass(symbol));
  }

  /**
   * Find the longest prefix of input accepted from the start state.
   * Empty matches are not reported.
   */
  match(input: Iterable<number>): DFAMatch | null {
    let state = this.startState;
    let matched: DFAMatch | null = null;
    let length = 0;
    for (const symbol of input) {
      state = this.getNextState(state, symbol);
      if (this.isRejectState(state)) {
        break;
      }
      length++;
      const rule = this.getAccept(state);
      if (rule !== null) {
        matched = { length, rule };
      }
    }
    return matched;
  }

  toDebugStr(): string {
    const table: Table<string> = new Table(1 + this.numClasses);
    table.addRow((col) =>
      col == 0 ? 'δ' : rangesToStr(this.symbolClasses.getMembers(col - 1))
    );
    for (let si = 0; si < this.numStates; si++) {
      table.addRow((col) => {
        if (col > 0) {
          const next = this.getClassTransition(si, col - 1);
          return this.isRejectState(next) ? '_' : `s${next}`;
        }
        let label = `s${si}`;
        const rule = this.getAccept(si);
        if (rule !== null) {
          label = `*${label}(r${rule})`;
        }
        if (si == this.startState) {
          label = '>' + label;
        }
        return label + ':';
      });
    }
    return table.toDebugStr();
  }
}
