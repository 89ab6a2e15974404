import { parseRegex } from '../regex-compiler/parser.js';
import { charNode } from '../regex-compiler/regex-node.js';
import { DFA } from './dfa.js';
import { minimize } from './minimize.js';
import { CombinedNFA, DEFAULT_ALPHABET } from './regex-nfa.js';
import { SymbolClasses } from './symbol-classes.js';

function bytes(s: string): number[] {
  return s.split('').map((c) => c.charCodeAt(0));
}

function dfaFor(patterns: string[]): DFA {
  const nfa = new CombinedNFA(patterns.map((p) => parseRegex(p)));
  return DFA.fromNFA(nfa, DEFAULT_ALPHABET.alphabetSize);
}

const KEYWORD = 0;
const IDENTIFIER = 1;
const NUMBER = 2;
const SKIP = 3;
const scenarioRules = [
  '"if"',
  '[a-zA-Z][a-zA-Z0-9_]*',
  '[0-9]+',
  '[ \\t]+',
];

describe('SymbolClasses', () => {
  test('symbols no edge tells apart share a class', () => {
    const nfa = new CombinedNFA([parseRegex('[a-c]|b')]);
    const classes = SymbolClasses.fromNFA(nfa, 256);
    expect(classes.numClasses).toEqual(3);
    expect(classes.getMembers(0)).toEqual([
      { from: 0, to: 96 },
      { from: 100, to: 255 },
    ]);
    expect(classes.getMembers(1)).toEqual([
      { from: 97, to: 97 },
      { from: 99, to: 99 },
    ]);
    expect(classes.getMembers(2)).toEqual([{ from: 98, to: 98 }]);
    expect(classes.representative(1)).toEqual(97);
    expect(classes.getClass(99)).toEqual(1);
  });

  test('symbols outside the alphabet have no class', () => {
    expect(() => SymbolClasses.identity(4).getClass(4)).toThrow(
      'IndexError: symbol 4 is not in an alphabet of 4'
    );
  });
});

describe('DFA.fromNFA', () => {
  test('state 0 rejects and state 1 starts', () => {
    const dfa = dfaFor(scenarioRules);
    expect(dfa.getStartState()).toEqual(1);
    expect(dfa.getAccept(DFA.REJECT_STATE)).toBeNull();
    for (let cls = 0; cls < dfa.numClasses; cls++) {
      expect(dfa.getClassTransition(DFA.REJECT_STATE, cls)).toEqual(
        DFA.REJECT_STATE
      );
    }
  });

  test('toDebugStr', () => {
    const nfa = new CombinedNFA([charNode(1)], {
      alphabetSize: 2,
      dotMatchesNewline: true,
    });
    const dfa = DFA.fromNFA(nfa, 2);
    expect('\n' + dfa.toDebugStr()).toEqual(
      '\n' +
        '         δ  [\\x00]  [\\x01]\n' +
        '       s0:       _       _\n' +
        '      >s1:       _      s2\n' +
        '  *s2(r0):       _       _\n'
    );
  });

  test('an NFA without rules can not be determinized', () => {
    expect(() => DFA.fromNFA(new CombinedNFA([]), 256)).toThrow(
      'Cannot build a DFA from an NFA that accepts no rule'
    );
  });

  const cases: [string, { length: number; rule: number } | null][] = [
    ['if', { length: 2, rule: KEYWORD }],
    ['iffy', { length: 4, rule: IDENTIFIER }],
    ['if(', { length: 2, rule: KEYWORD }],
    ['42', { length: 2, rule: NUMBER }],
    ['a 1', { length: 1, rule: IDENTIFIER }],
    [' \t x', { length: 3, rule: SKIP }],
    ['@', null],
    ['', null],
  ];
  test.each(cases)('match %p', (input, expected) => {
    expect(dfaFor(scenarioRules).match(bytes(input))).toEqual(expected);
  });

  test('the earlier rule wins a tie', () => {
    expect(dfaFor(['[a-z]+', 'abc']).match(bytes('abc'))).toEqual({
      length: 3,
      rule: 0,
    });
    expect(dfaFor(['abc', '[a-z]+']).match(bytes('abc'))).toEqual({
      length: 3,
      rule: 0,
    });
  });

  test('backs up to the last accepting state', () => {
    expect(dfaFor(['a', 'abc']).match(bytes('abd'))).toEqual({
      length: 1,
      rule: 0,
    });
  });

  test('bounded repetition', () => {
    const dfa = dfaFor(['a{2,3}']);
    expect(dfa.match(bytes('a'))).toBeNull();
    expect(dfa.match(bytes('aa'))).toEqual({ length: 2, rule: 0 });
    expect(dfa.match(bytes('aaaa'))).toEqual({ length: 3, rule: 0 });
  });
});

describe('minimize', () => {
  test('merges states with the same behavior', () => {
    const dfa = dfaFor(['a|b']);
    expect(dfa.numStates).toEqual(4);
    const minimized = minimize(dfa);
    expect(minimized.numStates).toEqual(3);
    expect(minimized.getStartState()).toEqual(1);
    expect(minimized.getAccept(2)).toEqual(0);
    expect(minimized.getNextState(1, 'a'.charCodeAt(0))).toEqual(2);
    expect(minimized.getNextState(1, 'b'.charCodeAt(0))).toEqual(2);
    expect(minimized.getNextState(1, 'c'.charCodeAt(0))).toEqual(0);
  });

  test('never merges states that accept different rules', () => {
    const minimized = minimize(dfaFor(['a', 'b']));
    expect(minimized.numStates).toEqual(4);
    expect(minimized.match(bytes('a'))).toEqual({ length: 1, rule: 0 });
    expect(minimized.match(bytes('b'))).toEqual({ length: 1, rule: 1 });
  });

  test('is a fixed point', () => {
    const once = minimize(dfaFor(scenarioRules));
    expect(minimize(once).numStates).toEqual(once.numStates);
  });

  test('preserves which rule matches and how much', () => {
    const rules = [...scenarioRules, '(a|b)*abb', 'x?y?z', '.'];
    const dfa = dfaFor(rules);
    const minimized = minimize(dfa);
    expect(minimized.numStates).toBeLessThan(dfa.numStates);
    const inputs = [
      'if',
      'iffy',
      'if9',
      '007',
      'abb',
      'ababb',
      'abab',
      'z',
      'xz',
      'xyz',
      'yx',
      '  ',
      '\n',
      'if x',
    ];
    for (const input of inputs) {
      expect([input, minimized.match(bytes(input))]).toEqual([
        input,
        dfa.match(bytes(input)),
      ]);
    }
  });
});
