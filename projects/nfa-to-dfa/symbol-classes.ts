import type { SymbolRange } from '../regex-compiler/regex-node.js';
import type { ConstNFA } from './nfa.js';

/**
 * A partition of the alphabet into classes of symbols that no edge
 * of an NFA tells apart. Every DFA built from that NFA behaves the
 * same on all the symbols of a class, so tables only need one
 * column per class.
 *
 * Classes are numbered in order of their smallest symbol.
 */
export class SymbolClasses {
  readonly alphabetSize: number;
  private readonly classOf: number[];
  private readonly members: SymbolRange[][];

  private constructor(classOf: number[]) {
    this.alphabetSize = classOf.length;
    this.classOf = classOf;
    this.members = [];
    for (const [symbol, cls] of classOf.entries()) {
      if (this.members[cls] === undefined) {
        this.members[cls] = [];
      }
      const ranges = this.members[cls];
      const last = ranges[ranges.length - 1];
      if (last && last.to == symbol - 1) {
        last.to = symbol;
      } else {
        ranges.push({ from: symbol, to: symbol });
      }
    }
  }

  /**
   * Every symbol in a class of its own.
   */
  static identity(alphabetSize: number): SymbolClasses {
    return new SymbolClasses([...Array(alphabetSize).keys()]);
  }

  /**
   * Refine a single class covering the whole alphabet against the
   * symbol set of every edge in nfa.
   */
  static fromNFA(nfa: ConstNFA, alphabetSize: number): SymbolClasses {
    let classOf = Array.from({ length: alphabetSize }, () => 0);
    const seen: Set<string> = new Set();
    for (let si = 0; si < nfa.numStates; si++) {
      for (const edge of nfa.getEdges(si)) {
        if (edge.kind == 'epsilon') {
          continue;
        }
        const key = JSON.stringify(edge.ranges);
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);
        classOf = refine(classOf, edge.ranges);
      }
    }
    return new SymbolClasses(classOf);
  }

  get numClasses() {
    return this.members.length;
  }

  getClass(symbol: number): number {
    const cls = this.classOf[symbol];
    if (cls === undefined) {
      throw new Error(
        `IndexError: symbol ${symbol} is not in an alphabet of ${this.alphabetSize}`
      );
    }
    return cls;
  }

  /**
   * The smallest symbol of a class.
   */
  representative(cls: number): number {
    return this.members[cls][0].from;
  }

  getMembers(cls: number): readonly SymbolRange[] {
    return this.members[cls];
  }

  /**
   * The class of each symbol, indexed by symbol.
   */
  toArray(): readonly number[] {
    return this.classOf;
  }
}

function refine(classOf: number[], ranges: readonly SymbolRange[]): number[] {
  const inSet = classOf.map(() => false);
  for (const { from, to } of ranges) {
    for (let s = from; s <= to && s < classOf.length; s++) {
      inSet[s] = true;
    }
  }
  const renumber: Map<string, number> = new Map();
  return classOf.map((cls, symbol) => {
    const key = `${cls}:${inSet[symbol]}`;
    let next = renumber.get(key);
    if (next === undefined) {
      next = renumber.size;
      renumber.set(key, next);
    }
    return next;
  });
}
