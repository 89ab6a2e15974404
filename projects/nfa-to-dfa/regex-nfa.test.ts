import { parseRegex } from '../regex-compiler/parser.js';
import { charNode, type SymbolRange } from '../regex-compiler/regex-node.js';
import { closure, move, NFA } from './nfa.js';
import { CombinedNFA, complementRanges, regexNFA } from './regex-nfa.js';

describe('NFA', () => {
  let nfa: NFA;
  beforeAll(() => {
    // a(b|c)*, laid out as in Engineering a Compiler
    // (Cooper & Torczon) page 51
    nfa = new NFA();
    for (let i = 0; i <= 9; i++) {
      nfa.addState();
    }
    nfa.setStartState(0);
    nfa.setAccept(9, 0);
    const sym = (c: string) => [{ from: c.charCodeAt(0), to: c.charCodeAt(0) }];
    nfa.addSymbolEdge(0, 1, sym('a'));
    nfa.addSymbolEdge(4, 5, sym('b'));
    nfa.addSymbolEdge(6, 7, sym('c'));
    const epsilons: [number, number][] = [
      [1, 2],
      [2, 3],
      [2, 9],
      [3, 4],
      [3, 6],
      [5, 8],
      [7, 8],
      [8, 3],
      [8, 9],
    ];
    epsilons.forEach(([from, to]) => nfa.addEpsilonEdge(from, to));
  });

  test('closure', () => {
    expect([...closure(nfa, [1])].sort((a, b) => a - b)).toEqual([
      1, 2, 3, 4, 6, 9,
    ]);
    expect([...closure(nfa, [0])]).toEqual([0]);
  });

  test('move', () => {
    expect([...move(nfa, [3, 4, 6], 'b'.charCodeAt(0))]).toEqual([5]);
    expect([...move(nfa, [3, 4, 6], 'a'.charCodeAt(0))]).toEqual([]);
  });

  test('edges must connect existing states', () => {
    expect(() => nfa.addEpsilonEdge(0, 10)).toThrow(
      'IndexError: toState 10 is not valid. Must be < 10'
    );
  });
});

describe('regexNFA', () => {
  test('concatenation links the two fragments with epsilon', () => {
    const nfa = regexNFA(parseRegex('ab'));
    expect(nfa.numStates).toEqual(4);
    expect(nfa.getStartState()).toEqual(0);
    expect(nfa.getEdges(1)).toEqual([{ kind: 'epsilon', to: 2 }]);
    expect(nfa.getAccept(3)).toEqual(0);
    expect(nfa.getAccept(1)).toBeNull();
  });

  test('a negated class becomes the complement within the alphabet', () => {
    const nfa = regexNFA(parseRegex('[^a]'), {
      alphabetSize: 128,
      dotMatchesNewline: true,
    });
    expect(nfa.getEdges(0)).toEqual([
      {
        kind: 'symbols',
        ranges: [
          { from: 0, to: 96 },
          { from: 98, to: 127 },
        ],
        to: 1,
      },
    ]);
  });

  test('. leaves out newline unless told otherwise', () => {
    const nfa = regexNFA(parseRegex('.'), {
      alphabetSize: 256,
      dotMatchesNewline: false,
    });
    expect(nfa.getEdges(0)).toEqual([
      {
        kind: 'symbols',
        ranges: [
          { from: 0, to: 9 },
          { from: 11, to: 255 },
        ],
        to: 1,
      },
    ]);
  });
});

describe('complementRanges', () => {
  const cases: [SymbolRange[], number, SymbolRange[]][] = [
    [
      [{ from: 10, to: 10 }],
      256,
      [
        { from: 0, to: 9 },
        { from: 11, to: 255 },
      ],
    ],
    [[{ from: 0, to: 255 }], 256, []],
    [[{ from: 0, to: 127 }], 128, []],
    [[{ from: 100, to: 200 }], 128, [{ from: 0, to: 99 }]],
    [[], 4, [{ from: 0, to: 3 }]],
  ];
  test.each(cases)('%p in %p symbols', (ranges, size, expected) => {
    expect(complementRanges(ranges, size)).toEqual(expected);
  });
});

describe('CombinedNFA', () => {
  test('joins the rules under a new start state, in order', () => {
    const nfa = new CombinedNFA([charNode('a'), charNode('b')]);
    expect(nfa.numRules).toEqual(2);
    expect(nfa.getStartState()).toEqual(0);
    expect(nfa.getEdges(0)).toEqual([
      { kind: 'epsilon', to: 1 },
      { kind: 'epsilon', to: 3 },
    ]);
    expect(nfa.getAccept(2)).toEqual(0);
    expect(nfa.getAccept(4)).toEqual(1);
  });
});
