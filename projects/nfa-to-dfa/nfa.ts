import { Table } from '../utils/data-structures/table.js';
import type { IHaveDebugStr } from '../utils/debug.js';
import type { SymbolRange } from '../regex-compiler/regex-node.js';

export type NFAEdge =
  | { kind: 'epsilon'; to: number }
  | { kind: 'symbols'; ranges: readonly SymbolRange[]; to: number };

export interface ConstNFA extends IHaveDebugStr {
  /**
   * Get the number of states
   */
  readonly numStates: number;

  /**
   * Get the start state of the nfa
   */
  getStartState(): number;

  /**
   * Outgoing edges of a state, in the order they were added.
   */
  getEdges(state: number): readonly NFAEdge[];

  /**
   * The rule a state accepts for, or null if it is not accepting.
   */
  getAccept(state: number): number | null;
}

export function rangesContain(
  ranges: readonly SymbolRange[],
  symbol: number
): boolean {
  for (const { from, to } of ranges) {
    if (symbol < from) {
      return false;
    }
    if (symbol <= to) {
      return true;
    }
  }
  return false;
}

/**
 * An NFA whose states live in a flat arena and refer to each other
 * by index, so loops are just data.
 */
export class NFA implements ConstNFA {
  private edges: NFAEdge[][] = [];
  private accept: (number | null)[] = [];
  private startState = -1;

  get numStates() {
    return this.edges.length;
  }

  getStartState() {
    return this.startState;
  }

  setStartState(state: number) {
    this.checkState(state, 'startState');
    this.startState = state;
  }

  /**
   * Adds a new state.
   *
   * @returns the index of the newly added state.
   */
  addState(accept: number | null = null): number {
    this.edges.push([]);
    this.accept.push(accept);
    return this.edges.length - 1;
  }

  private checkState(state: number, name: string) {
    if (state < 0 || state >= this.edges.length) {
      throw new Error(
        `IndexError: ${name} ${state} is not valid. Must be < ${this.edges.length}`
      );
    }
  }

  addEpsilonEdge(fromState: number, toState: number) {
    this.checkState(fromState, 'fromState');
    this.checkState(toState, 'toState');
    this.edges[fromState].push({ kind: 'epsilon', to: toState });
  }

  /**
   * Add an edge taken on any symbol in the given sorted, disjoint
   * ranges. An edge with no ranges is never taken, so it is dropped.
   */
  addSymbolEdge(
    fromState: number,
    toState: number,
    ranges: readonly SymbolRange[]
  ) {
    this.checkState(fromState, 'fromState');
    this.checkState(toState, 'toState');
    if (ranges.length == 0) {
      return;
    }
    this.edges[fromState].push({ kind: 'symbols', ranges, to: toState });
  }

  getEdges(state: number): readonly NFAEdge[] {
    return this.edges[state];
  }

  getAccept(state: number): number | null {
    return this.accept[state];
  }

  setAccept(state: number, rule: number | null) {
    this.checkState(state, 'state');
    this.accept[state] = rule;
  }

  toDebugStr(): string {
    const table: Table<string> = new Table(2);
    table.addRow((col) => (col == 0 ? 'δ' : 'edges'));
    for (let si = 0; si < this.numStates; si++) {
      let label = 's' + si;
      const accept = this.getAccept(si);
      if (accept !== null) {
        label = `*${label}(r${accept})`;
      }
      if (si == this.startState) {
        label = '>' + label;
      }
      const edges = this.getEdges(si)
        .map((edge) =>
          edge.kind == 'epsilon'
            ? `ϵ→s${edge.to}`
            : `${rangesToStr(edge.ranges)}→s${edge.to}`
        )
        .join(' ');
      table.addRow((col) => (col == 0 ? label + ':' : edges || '_'));
    }
    return table.toDebugStr();
  }
}

export function rangesToStr(ranges: readonly SymbolRange[]): string {
  const symbol = (s: number) =>
    s >= 0x21 && s <= 0x7e && s != 0x5d && s != 0x2d
      ? String.fromCharCode(s)
      : '\\x' + s.toString(16).padStart(2, '0');
  return (
    '[' +
    ranges
      .map(({ from, to }) =>
        from == to ? symbol(from) : `${symbol(from)}-${symbol(to)}`
      )
      .join('') +
    ']'
  );
}

/**
 * compute the epsilon closure for a set of nfa states.
 *
 * @returns the set of states reachable from the given start
 * states by only traversing epsilon edges
 */
export function closure(
  nfa: ConstNFA,
  startStates: Iterable<number>
): Set<number> {
  let visited: Set<number> = new Set();
  let toVisit = [...startStates];

  while (toVisit.length > 0) {
    let current = toVisit.pop();
    if (current === undefined || visited.has(current)) {
      continue;
    }
    visited.add(current);
    for (const edge of nfa.getEdges(current)) {
      if (edge.kind == 'epsilon' && !visited.has(edge.to)) {
        toVisit.push(edge.to);
      }
    }
  }
  return visited;
}

/**
 * move(T,a)
 *
 * Set of NFA states to which there is a transition on
 * input symbol a from some state s in T.
 */
export function move(
  nfa: ConstNFA,
  startStates: Iterable<number>,
  symbol: number
): Set<number> {
  let set: Set<number> = new Set();
  for (const stateId of startStates) {
    for (const edge of nfa.getEdges(stateId)) {
      if (edge.kind == 'symbols' && rangesContain(edge.ranges, symbol)) {
        set.add(edge.to);
      }
    }
  }
  return set;
}
