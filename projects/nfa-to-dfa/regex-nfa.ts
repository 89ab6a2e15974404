/**
 * This file implements the McNaughton-Yamada-Thompson algorithm
 * for converting regular expressions to NFAs. You can find a
 * description in Section 3.7.4 of the dragon book (p. 159):
 * "Construction of an NFA from a Regular Expression"
 */

import {
  assertNever,
  NodeKind,
  normalizeRanges,
  type RegexNode,
  type SymbolRange,
} from '../regex-compiler/regex-node.js';
import { NFA } from './nfa.js';

export type AlphabetOptions = {
  /**
   * Number of symbols in the alphabet. Symbols are 0..alphabetSize-1.
   */
  alphabetSize: number;
  /**
   * Whether . matches \n.
   */
  dotMatchesNewline: boolean;
};

export const DEFAULT_ALPHABET: AlphabetOptions = {
  alphabetSize: 256,
  dotMatchesNewline: true,
};

/**
 * A piece of an NFA with one way in and one way out.
 */
export type Fragment = { start: number; accept: number };

const NEWLINE = 0x0a;

/**
 * The symbols outside of ranges, within the alphabet.
 */
export function complementRanges(
  ranges: readonly SymbolRange[],
  alphabetSize: number
): SymbolRange[] {
  const complement: SymbolRange[] = [];
  let next = 0;
  for (const { from, to } of normalizeRanges(ranges)) {
    if (from > next) {
      complement.push({ from: next, to: Math.min(from - 1, alphabetSize - 1) });
    }
    next = Math.max(next, to + 1);
  }
  if (next < alphabetSize) {
    complement.push({ from: next, to: alphabetSize - 1 });
  }
  return complement.filter(({ from, to }) => from <= to);
}

function clipRanges(
  ranges: readonly SymbolRange[],
  alphabetSize: number
): SymbolRange[] {
  return ranges
    .filter(({ from }) => from < alphabetSize)
    .map(({ from, to }) => ({ from, to: Math.min(to, alphabetSize - 1) }));
}

function symbolsFragment(nfa: NFA, ranges: readonly SymbolRange[]): Fragment {
  const start = nfa.addState();
  const accept = nfa.addState();
  nfa.addSymbolEdge(start, accept, ranges);
  return { start, accept };
}

function emptyFragment(nfa: NFA): Fragment {
  const start = nfa.addState();
  const accept = nfa.addState();
  nfa.addEpsilonEdge(start, accept);
  return { start, accept };
}

function concat(nfa: NFA, left: Fragment, right: Fragment): Fragment {
  nfa.addEpsilonEdge(left.accept, right.start);
  return { start: left.start, accept: right.accept };
}

function or(nfa: NFA, left: Fragment, right: Fragment): Fragment {
  const start = nfa.addState();
  const accept = nfa.addState();
  nfa.addEpsilonEdge(start, left.start);
  nfa.addEpsilonEdge(start, right.start);
  nfa.addEpsilonEdge(left.accept, accept);
  nfa.addEpsilonEdge(right.accept, accept);
  return { start, accept };
}

function star(nfa: NFA, child: Fragment): Fragment {
  const start = nfa.addState();
  const accept = nfa.addState();
  nfa.addEpsilonEdge(start, child.start);
  nfa.addEpsilonEdge(start, accept);
  nfa.addEpsilonEdge(child.accept, child.start);
  nfa.addEpsilonEdge(child.accept, accept);
  return { start, accept };
}

// one mandatory pass through child, then the same loop as star()
function plus(nfa: NFA, child: Fragment): Fragment {
  const start = nfa.addState();
  const accept = nfa.addState();
  nfa.addEpsilonEdge(start, child.start);
  nfa.addEpsilonEdge(child.accept, child.start);
  nfa.addEpsilonEdge(child.accept, accept);
  return { start, accept };
}

function optional(nfa: NFA, child: Fragment): Fragment {
  const start = nfa.addState();
  const accept = nfa.addState();
  nfa.addEpsilonEdge(start, child.start);
  nfa.addEpsilonEdge(start, accept);
  nfa.addEpsilonEdge(child.accept, accept);
  return { start, accept };
}

/**
 * Add the states for a regex to nfa, returning the fragment
 * that matches it.
 */
export function addRegex(
  nfa: NFA,
  node: RegexNode,
  options: AlphabetOptions = DEFAULT_ALPHABET
): Fragment {
  const { alphabetSize } = options;
  switch (node.kind) {
    case NodeKind.EMPTY:
      return emptyFragment(nfa);
    case NodeKind.LITERAL:
      return symbolsFragment(
        nfa,
        clipRanges([{ from: node.symbol, to: node.symbol }], alphabetSize)
      );
    case NodeKind.ANY_CHAR:
      return symbolsFragment(
        nfa,
        options.dotMatchesNewline
          ? [{ from: 0, to: alphabetSize - 1 }]
          : complementRanges([{ from: NEWLINE, to: NEWLINE }], alphabetSize)
      );
    case NodeKind.CHAR_CLASS:
      return symbolsFragment(
        nfa,
        node.negated
          ? complementRanges(node.ranges, alphabetSize)
          : clipRanges(normalizeRanges(node.ranges), alphabetSize)
      );
    case NodeKind.CONCAT:
      return concat(
        nfa,
        addRegex(nfa, node.left, options),
        addRegex(nfa, node.right, options)
      );
    case NodeKind.OR:
      return or(
        nfa,
        addRegex(nfa, node.left, options),
        addRegex(nfa, node.right, options)
      );
    case NodeKind.STAR:
      return star(nfa, addRegex(nfa, node.child, options));
    case NodeKind.ONE_OR_MORE:
      return plus(nfa, addRegex(nfa, node.child, options));
    case NodeKind.OPTIONAL:
      return optional(nfa, addRegex(nfa, node.child, options));
    case NodeKind.REPEAT: {
      // min mandatory copies, then either a starred copy or
      // max - min optional ones.
      let parts: Fragment[] = [];
      for (let i = 0; i < node.min; i++) {
        parts.push(addRegex(nfa, node.child, options));
      }
      if (node.max === null) {
        parts.push(star(nfa, addRegex(nfa, node.child, options)));
      } else {
        for (let i = node.min; i < node.max; i++) {
          parts.push(optional(nfa, addRegex(nfa, node.child, options)));
        }
      }
      if (parts.length == 0) {
        return emptyFragment(nfa);
      }
      return parts.reduce((left, right) => concat(nfa, left, right));
    }
    default:
      return assertNever(node);
  }
}

/**
 * An NFA for a single regex, whose accepting state is tagged with
 * rule 0.
 */
export function regexNFA(
  node: RegexNode,
  options: AlphabetOptions = DEFAULT_ALPHABET
): NFA {
  const nfa = new NFA();
  const { start, accept } = addRegex(nfa, node, options);
  nfa.setStartState(start);
  nfa.setAccept(accept, 0);
  return nfa;
}

/**
 * The NFAs of several rules joined under one start state.
 *
 * The start state is state 0 and has one epsilon edge per rule, in
 * rule order. The accepting state of rule i's fragment is tagged
 * with i.
 */
export class CombinedNFA extends NFA {
  readonly numRules: number;

  constructor(
    patterns: readonly RegexNode[],
    options: AlphabetOptions = DEFAULT_ALPHABET
  ) {
    super();
    const start = this.addState();
    this.setStartState(start);
    for (const [rule, pattern] of patterns.entries()) {
      const fragment = addRegex(this, pattern, options);
      this.addEpsilonEdge(start, fragment.start);
      this.setAccept(fragment.accept, rule);
    }
    this.numRules = patterns.length;
  }

  override toDebugStr() {
    return `CombinedNFA (${this.numRules} rules):\n${super.toDebugStr()}`;
  }
}
