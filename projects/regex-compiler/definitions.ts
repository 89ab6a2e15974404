import { cloneNode, type RegexNode } from './regex-node.js';

const MACRO_REF = /\{([A-Za-z][A-Za-z0-9_]*)\}/y;

export const DEFINITION_NAME = /^[A-Za-z][A-Za-z0-9_]*$/;

/**
 * Names of the {NAME} references in the text of a pattern. Braces
 * inside quoted strings, bracket expressions and escapes are literal
 * text and are skipped.
 */
export function macroReferences(text: string): string[] {
  const names: string[] = [];
  let i = 0;
  while (i < text.length) {
    switch (text[i]) {
      case '\\':
        i += 2;
        break;
      case '"':
        i++;
        while (i < text.length && text[i] != '"') {
          i += text[i] == '\\' ? 2 : 1;
        }
        i++;
        break;
      case '[':
        i++;
        if (text[i] == '^') {
          i++;
        }
        if (text[i] == ']') {
          i++;
        }
        while (i < text.length && text[i] != ']') {
          const close = text.startsWith('[:', i) ? text.indexOf(':]', i + 2) : -1;
          if (close >= 0) {
            i = close + 2;
          } else {
            i += text[i] == '\\' ? 2 : 1;
          }
        }
        i++;
        break;
      case '{': {
        MACRO_REF.lastIndex = i;
        const match = MACRO_REF.exec(text);
        if (match) {
          names.push(match[1]);
          i += match[0].length;
        } else {
          i++;
        }
        break;
      }
      default:
        i++;
    }
  }
  return names;
}

/**
 * Named pattern definitions ("macros").
 *
 * Definitions are parsed one at a time, so a definition can only refer
 * to the ones above it. The raw text of every definition can be
 * declared up front, which lets a reference to a name that is not yet
 * parsed be told apart as either a cycle or just an undefined name.
 */
export class DefinitionTable {
  private definitions: Map<string, RegexNode> = new Map();
  private declared: Map<string, string> = new Map();

  has(name: string) {
    return this.definitions.has(name);
  }

  /**
   * Record the unparsed text of a definition.
   */
  declare(name: string, text: string) {
    if (!this.declared.has(name)) {
      this.declared.set(name, text);
    }
  }

  /**
   * Add a parsed definition. Throws if name is already defined.
   */
  define(name: string, node: RegexNode) {
    if (this.definitions.has(name)) {
      throw new Error(`Definition ${name} is already defined`);
    }
    this.definitions.set(name, node);
    this.declare(name, '');
  }

  /**
   * A private copy of the tree defined under name.
   */
  lookup(name: string): RegexNode | undefined {
    const node = this.definitions.get(name);
    return node && cloneNode(node);
  }

  /**
   * Whether following declared references from name eventually
   * leads back to target.
   */
  reaches(name: string, target: string): boolean {
    const visited: Set<string> = new Set();
    let toVisit = [name];
    while (toVisit.length > 0) {
      let current = toVisit.pop();
      if (current === undefined || visited.has(current)) {
        continue;
      }
      if (current == target) {
        return true;
      }
      visited.add(current);
      const text = this.declared.get(current);
      if (text === undefined || this.definitions.has(current)) {
        continue;
      }
      toVisit.push(...macroReferences(text));
    }
    return false;
  }
}
