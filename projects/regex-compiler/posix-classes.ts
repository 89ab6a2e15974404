import type { SymbolRange } from './regex-node.js';

function r(from: string, to: string = from): SymbolRange {
  return { from: from.charCodeAt(0), to: to.charCodeAt(0) };
}

// ASCII definitions from the POSIX locale.
const POSIX_CLASSES: Readonly<Record<string, readonly SymbolRange[]>> = {
  alnum: [r('0', '9'), r('A', 'Z'), r('a', 'z')],
  alpha: [r('A', 'Z'), r('a', 'z')],
  blank: [r(' '), r('\t')],
  cntrl: [{ from: 0x00, to: 0x1f }, { from: 0x7f, to: 0x7f }],
  digit: [r('0', '9')],
  graph: [{ from: 0x21, to: 0x7e }],
  lower: [r('a', 'z')],
  print: [{ from: 0x20, to: 0x7e }],
  punct: [r('!', '/'), r(':', '@'), r('[', '`'), r('{', '~')],
  space: [r(' '), { from: 0x09, to: 0x0d }],
  upper: [r('A', 'Z')],
  xdigit: [r('0', '9'), r('A', 'F'), r('a', 'f')],
};

export const POSIX_CLASS_NAMES = Object.keys(POSIX_CLASSES);

/**
 * Look up the ranges of a named class such as `digit`, or undefined
 * if there is no class by that name.
 */
export function posixClassRanges(name: string): SymbolRange[] | undefined {
  if (!Object.prototype.hasOwnProperty.call(POSIX_CLASSES, name)) {
    return undefined;
  }
  return POSIX_CLASSES[name].map(({ from, to }) => ({ from, to }));
}
