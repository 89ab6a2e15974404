import { DefinitionTable, macroReferences } from './definitions.js';
import { PatternErrorKind } from './errors.js';
import { parseRegex, RegexParser } from './parser.js';
import {
  anyCharNode,
  charClassNode,
  charNode,
  concatNode,
  emptyNode,
  NodeKind,
  nodeToString,
  optionalNode,
  orNode,
  plusNode,
  repeatNode,
  starNode,
  type RegexNode,
} from './regex-node.js';

describe('parseRegex', () => {
  const cases: { [index: string]: RegexNode } = {
    a: charNode('a'),
    ab: concatNode(charNode('a'), charNode('b')),
    'a|b': orNode(charNode('a'), charNode('b')),
    'a*': starNode(charNode('a')),
    'a+?': optionalNode(plusNode(charNode('a'))),
    '(a|b)*a': concatNode(
      starNode(orNode(charNode('a'), charNode('b'))),
      charNode('a')
    ),
    'ab|cd': orNode(
      concatNode(charNode('a'), charNode('b')),
      concatNode(charNode('c'), charNode('d'))
    ),
    'a{2,3}': repeatNode(charNode('a'), 2, 3),
    'a{2}': repeatNode(charNode('a'), 2, 2),
    'a{2,}': repeatNode(charNode('a'), 2, null),
    '"a*"': concatNode(charNode('a'), charNode('*')),
    '"ab"*': starNode(concatNode(charNode('a'), charNode('b'))),
    '""': emptyNode(),
    '()': emptyNode(),
    'a|': orNode(charNode('a'), emptyNode()),
    '.': anyCharNode(),
    '^a$': concatNode(concatNode(charNode('^'), charNode('a')), charNode('$')),
    '[a-c_]': charClassNode([
      { from: 95, to: 95 },
      { from: 97, to: 99 },
    ]),
    '[^0-9]': charClassNode([{ from: 48, to: 57 }], true),
    '[[:digit:]x]': charClassNode([
      { from: 48, to: 57 },
      { from: 120, to: 120 },
    ]),
    '[]a]': charClassNode([
      { from: 93, to: 93 },
      { from: 97, to: 97 },
    ]),
    '[a-]': charClassNode([
      { from: 45, to: 45 },
      { from: 97, to: 97 },
    ]),
    '[\\]\\n]': charClassNode([
      { from: 10, to: 10 },
      { from: 93, to: 93 },
    ]),
    '\\n': charNode(10),
    '\\x41': charNode(0x41),
    '\\101': charNode(65),
    '\\0': charNode(0),
    '\\.': charNode('.'),
    '"\\t"': charNode(9),
  };
  test.each(Object.entries(cases))('%s', (input, expected) => {
    expect(parseRegex(input)).toEqual(expected);
  });

  test('bracket ranges merge', () => {
    expect(parseRegex('[a-fc-z]')).toEqual(
      charClassNode([{ from: 0x61, to: 0x7a }])
    );
  });
});

describe('pattern errors', () => {
  const cases: [string, PatternErrorKind, number][] = [
    ['[abc', PatternErrorKind.UNTERMINATED_BRACKET, 0],
    ['x"ab', PatternErrorKind.UNTERMINATED_STRING, 1],
    ['[[:foo:]]', PatternErrorKind.UNKNOWN_POSIX_CLASS, 1],
    ['{FOO}', PatternErrorKind.UNDEFINED_MACRO, 0],
    ['(ab', PatternErrorKind.UNBALANCED_PARENS, 0],
    ['ab)', PatternErrorKind.UNBALANCED_PARENS, 2],
    ['a{3,1}', PatternErrorKind.MALFORMED_REPETITION, 1],
    ['a{1,2,3}', PatternErrorKind.MALFORMED_REPETITION, 1],
    ['a{1001}', PatternErrorKind.MALFORMED_REPETITION, 1],
    ['((a{1000}){1000}){1000}', PatternErrorKind.MALFORMED_REPETITION, 10],
    ['a{2', PatternErrorKind.UNTERMINATED_BRACE, 1],
    ['[z-a]', PatternErrorKind.INVALID_RANGE, 1],
    ['a\\', PatternErrorKind.DANGLING_ESCAPE, 1],
    ['*a', PatternErrorKind.NOTHING_TO_REPEAT, 0],
    ['a|*', PatternErrorKind.NOTHING_TO_REPEAT, 2],
    ['', PatternErrorKind.EMPTY_PATTERN, 0],
  ];
  test.each(cases)('%p', (input, kind, offset) => {
    const error = RegexParser.parseResult(input)._unsafeUnwrapErr();
    expect(error.kind).toEqual(kind);
    expect(error.offset).toEqual(offset);
  });

  test('nested bounds are capped by the expanded size', () => {
    expect(RegexParser.parseResult('(a{100}){1000}').isOk()).toBe(true);
    const error = RegexParser.parseResult('(ab{100}){1000}')._unsafeUnwrapErr();
    expect(error.message).toEqual('Pattern expands to more than 100000 symbols');
  });

  test('symbols outside a 7-bit alphabet', () => {
    const error = RegexParser.parseResult('a\\xff', {
      alphabetSize: 128,
    })._unsafeUnwrapErr();
    expect(error.kind).toEqual(PatternErrorKind.SYMBOL_OUT_OF_RANGE);
    expect(error.offset).toEqual(1);
  });

  test('parseOrThrow throws the PatternError', () => {
    expect(() => RegexParser.parseOrThrow('(')).toThrow(
      'Reached end of input before finding matching )'
    );
  });
});

describe('definitions', () => {
  let definitions: DefinitionTable;
  beforeEach(() => {
    definitions = new DefinitionTable();
    definitions.define('DIGIT', parseRegex('[0-9]'));
    definitions.define(
      'NUMBER',
      parseRegex('{DIGIT}+', { definitions })
    );
  });

  test('references are spliced in', () => {
    expect(nodeToString(parseRegex('x{NUMBER}', { definitions }))).toEqual(
      '(cat x (+ [0-9]))'
    );
  });

  test('every reference gets its own copy', () => {
    const node = parseRegex('{DIGIT}{DIGIT}', { definitions });
    if (node.kind != NodeKind.CONCAT) {
      throw new Error('expected a concatenation');
    }
    expect(node.left).toEqual(node.right);
    expect(node.left).not.toBe(node.right);
  });

  test('a definition that refers to itself is cyclic', () => {
    definitions.declare('A', '{A}');
    const error = RegexParser.parseResult('{A}', {
      definitions,
      definingName: 'A',
    })._unsafeUnwrapErr();
    expect(error.kind).toEqual(PatternErrorKind.CYCLIC_DEFINITION);
  });

  test('a reference that loops back through a later definition is cyclic', () => {
    definitions.declare('A', 'x{B}');
    definitions.declare('B', '{A}');
    const error = RegexParser.parseResult('x{B}', {
      definitions,
      definingName: 'A',
    })._unsafeUnwrapErr();
    expect(error.kind).toEqual(PatternErrorKind.CYCLIC_DEFINITION);
    expect(error.offset).toEqual(1);
  });

  test('a plain forward reference is undefined', () => {
    definitions.declare('A', 'x{B}');
    definitions.declare('B', 'y');
    const error = RegexParser.parseResult('x{B}', {
      definitions,
      definingName: 'A',
    })._unsafeUnwrapErr();
    expect(error.kind).toEqual(PatternErrorKind.UNDEFINED_MACRO);
  });

  test('braces in strings and brackets are not references', () => {
    definitions.declare('A', '{B}');
    definitions.declare('B', '"{A}"{C}');
    const error = RegexParser.parseResult('{B}', {
      definitions,
      definingName: 'A',
    })._unsafeUnwrapErr();
    expect(error.kind).toEqual(PatternErrorKind.UNDEFINED_MACRO);
    expect(error.message).toEqual('Undefined definition {B}');
  });

  test('defining a name twice throws', () => {
    expect(() => definitions.define('DIGIT', charNode('0'))).toThrow(
      'Definition DIGIT is already defined'
    );
  });
});

describe('macroReferences', () => {
  test('finds names outside strings and brackets', () => {
    expect(macroReferences('{A}"{B}"[{C}]\\{D}{E}x{2,3}')).toEqual(['A', 'E']);
    expect(macroReferences('[]{]{F}[[:alpha:]{]{G}')).toEqual(['F', 'G']);
  });
});
