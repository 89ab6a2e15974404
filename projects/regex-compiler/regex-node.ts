/**
 * The parse tree of a single pattern. Every node owns its children
 * exclusively: trees are never shared, macro references are spliced
 * in as deep copies (see {@link cloneNode}).
 */

export enum NodeKind {
  EMPTY = 'EMPTY',
  LITERAL = 'LITERAL',
  ANY_CHAR = 'ANY_CHAR',
  CHAR_CLASS = 'CHAR_CLASS',
  CONCAT = 'CONCAT',
  OR = 'OR',
  STAR = 'STAR',
  ONE_OR_MORE = 'ONE_OR_MORE',
  OPTIONAL = 'OPTIONAL',
  REPEAT = 'REPEAT',
}

/**
 * An inclusive range of symbol values.
 */
export type SymbolRange = { from: number; to: number };

export type EmptyNode = { kind: NodeKind.EMPTY };
export type LiteralNode = { kind: NodeKind.LITERAL; symbol: number };
export type AnyCharNode = { kind: NodeKind.ANY_CHAR };
export type CharClassNode = {
  kind: NodeKind.CHAR_CLASS;
  ranges: SymbolRange[];
  negated: boolean;
};
export type ConcatNode = {
  kind: NodeKind.CONCAT;
  left: RegexNode;
  right: RegexNode;
};
export type OrNode = { kind: NodeKind.OR; left: RegexNode; right: RegexNode };
export type StarNode = { kind: NodeKind.STAR; child: RegexNode };
export type OneOrMoreNode = { kind: NodeKind.ONE_OR_MORE; child: RegexNode };
export type OptionalNode = { kind: NodeKind.OPTIONAL; child: RegexNode };
/**
 * child repeated at least min times and at most max times.
 * A null max means there is no upper bound.
 */
export type RepeatNode = {
  kind: NodeKind.REPEAT;
  child: RegexNode;
  min: number;
  max: number | null;
};

export type RegexNode =
  | EmptyNode
  | LiteralNode
  | AnyCharNode
  | CharClassNode
  | ConcatNode
  | OrNode
  | StarNode
  | OneOrMoreNode
  | OptionalNode
  | RepeatNode;

export function assertNever(value: never): never {
  throw new Error(`Unhandled value ${JSON.stringify(value)}`);
}

export function emptyNode(): EmptyNode {
  return { kind: NodeKind.EMPTY };
}

export function charNode(char: string | number): LiteralNode {
  const symbol = typeof char == 'string' ? char.charCodeAt(0) : char;
  return { kind: NodeKind.LITERAL, symbol };
}

export function anyCharNode(): AnyCharNode {
  return { kind: NodeKind.ANY_CHAR };
}

export function charClassNode(
  ranges: SymbolRange[],
  negated = false
): CharClassNode {
  return { kind: NodeKind.CHAR_CLASS, ranges: normalizeRanges(ranges), negated };
}

export function concatNode(left: RegexNode | null, right: RegexNode): RegexNode {
  if (left == null) {
    return right;
  }
  return { kind: NodeKind.CONCAT, left, right };
}

export function orNode(left: RegexNode, right: RegexNode): OrNode {
  return { kind: NodeKind.OR, left, right };
}

export function starNode(child: RegexNode): StarNode {
  return { kind: NodeKind.STAR, child };
}

export function plusNode(child: RegexNode): OneOrMoreNode {
  return { kind: NodeKind.ONE_OR_MORE, child };
}

export function optionalNode(child: RegexNode): OptionalNode {
  return { kind: NodeKind.OPTIONAL, child };
}

export function repeatNode(
  child: RegexNode,
  min: number,
  max: number | null
): RepeatNode {
  return { kind: NodeKind.REPEAT, child, min, max };
}

/**
 * A node matching exactly the given sequence of symbols.
 */
export function sequenceNode(symbols: Iterable<number>): RegexNode {
  let node: RegexNode | null = null;
  for (const symbol of symbols) {
    node = concatNode(node, charNode(symbol));
  }
  return node ?? emptyNode();
}

/**
 * Sort ranges and merge the ones that overlap or touch.
 */
export function normalizeRanges(ranges: readonly SymbolRange[]): SymbolRange[] {
  const sorted = [...ranges].sort((a, b) => a.from - b.from || a.to - b.to);
  const merged: SymbolRange[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.from <= last.to + 1) {
      last.to = Math.max(last.to, range.to);
    } else {
      merged.push({ from: range.from, to: range.to });
    }
  }
  return merged;
}

export function cloneNode(node: RegexNode): RegexNode {
  switch (node.kind) {
    case NodeKind.EMPTY:
    case NodeKind.ANY_CHAR:
      return { kind: node.kind };
    case NodeKind.LITERAL:
      return { kind: node.kind, symbol: node.symbol };
    case NodeKind.CHAR_CLASS:
      return {
        kind: node.kind,
        ranges: node.ranges.map(({ from, to }) => ({ from, to })),
        negated: node.negated,
      };
    case NodeKind.CONCAT:
    case NodeKind.OR:
      return {
        kind: node.kind,
        left: cloneNode(node.left),
        right: cloneNode(node.right),
      };
    case NodeKind.STAR:
    case NodeKind.ONE_OR_MORE:
    case NodeKind.OPTIONAL:
      return { kind: node.kind, child: cloneNode(node.child) };
    case NodeKind.REPEAT:
      return {
        kind: node.kind,
        child: cloneNode(node.child),
        min: node.min,
        max: node.max,
      };
    default:
      return assertNever(node);
  }
}

/**
 * Number of leaf copies the NFA builder makes for node once every
 * bounded repetition is spelled out.
 */
export function expandedSize(node: RegexNode): number {
  switch (node.kind) {
    case NodeKind.EMPTY:
    case NodeKind.LITERAL:
    case NodeKind.ANY_CHAR:
    case NodeKind.CHAR_CLASS:
      return 1;
    case NodeKind.CONCAT:
    case NodeKind.OR:
      return expandedSize(node.left) + expandedSize(node.right);
    case NodeKind.STAR:
    case NodeKind.ONE_OR_MORE:
    case NodeKind.OPTIONAL:
      return expandedSize(node.child);
    case NodeKind.REPEAT:
      return (
        expandedSize(node.child) * Math.max(1, node.max ?? node.min + 1)
      );
    default:
      return assertNever(node);
  }
}

function symbolStr(symbol: number): string {
  if (symbol >= 0x21 && symbol <= 0x7e) {
    return String.fromCharCode(symbol);
  }
  return '\\x' + symbol.toString(16).padStart(2, '0');
}

/**
 * Render a tree as a compact s-expression, for debug output and tests.
 */
export function nodeToString(node: RegexNode): string {
  switch (node.kind) {
    case NodeKind.EMPTY:
      return 'ε';
    case NodeKind.LITERAL:
      return symbolStr(node.symbol);
    case NodeKind.ANY_CHAR:
      return '.';
    case NodeKind.CHAR_CLASS: {
      const body = node.ranges
        .map(({ from, to }) =>
          from == to ? symbolStr(from) : `${symbolStr(from)}-${symbolStr(to)}`
        )
        .join('');
      return `[${node.negated ? '^' : ''}${body}]`;
    }
    case NodeKind.CONCAT:
      return `(cat ${nodeToString(node.left)} ${nodeToString(node.right)})`;
    case NodeKind.OR:
      return `(or ${nodeToString(node.left)} ${nodeToString(node.right)})`;
    case NodeKind.STAR:
      return `(* ${nodeToString(node.child)})`;
    case NodeKind.ONE_OR_MORE:
      return `(+ ${nodeToString(node.child)})`;
    case NodeKind.OPTIONAL:
      return `(? ${nodeToString(node.child)})`;
    case NodeKind.REPEAT:
      return `(repeat ${node.min} ${node.max ?? 'inf'} ${nodeToString(
        node.child
      )})`;
    default:
      return assertNever(node);
  }
}
