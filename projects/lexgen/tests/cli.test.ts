import fs from 'fs';
import os from 'os';
import path from 'path';
import { dump, generate, readSource, scan, writeAtomic } from '../cli.js';
import { logger } from '../../utils/debug.js';
import { ErrorKind } from '../errors.js';
import { TargetLanguage } from '../options.js';

const fixture = (name: string) => path.join(__dirname, 'fixtures', name);

describe('cli', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lexgen-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('readSource', () => {
    test('reads every byte as one character', () => {
      const file = path.join(dir, 'bytes.l');
      fs.writeFileSync(file, Buffer.from([0x61, 0xe9, 0x0a]));
      expect(readSource(file)._unsafeUnwrap()).toEqual({
        text: 'aé\n',
        source: file,
      });
    });

    test('reports a missing file', () => {
      const file = path.join(dir, 'missing.l');
      const error = readSource(file)._unsafeUnwrapErr();
      expect(error.kind).toEqual(ErrorKind.IO);
      expect(error.message).toEqual(
        `IOError: Cannot read file (ENOENT): ${file}`
      );
    });
  });

  describe('writeAtomic', () => {
    test('replaces the file and leaves no temporary file behind', () => {
      const file = path.join(dir, 'out.c');
      fs.writeFileSync(file, 'old');
      expect(writeAtomic(file, 'new')._unsafeUnwrap()).toEqual(file);
      expect(fs.readFileSync(file, { encoding: 'latin1' })).toEqual('new');
      expect(fs.readdirSync(dir)).toEqual(['out.c']);
    });

    test('fails when the directory does not exist', () => {
      const file = path.join(dir, 'nowhere', 'out.c');
      const error = writeAtomic(file, 'text')._unsafeUnwrapErr();
      expect(error.kind).toEqual(ErrorKind.IO);
      expect(error.detail).toEqual(`Cannot write file (ENOENT): ${file}`);
    });

    test('returns an error when the temporary file can not be removed', () => {
      const file = path.join(dir, 'out.c');
      const tmp = `${file}.${process.pid}.tmp`;
      fs.mkdirSync(tmp);
      const logs: string[] = [];
      const result = logger.capture(() => writeAtomic(file, 'text'), logs);
      expect(result._unsafeUnwrapErr().detail).toEqual(
        `Cannot write file (EISDIR): ${file}`
      );
      expect(logs).toHaveLength(1);
      expect(logs[0].startsWith(`write: could not remove ${tmp} (`)).toBe(true);
      expect(fs.existsSync(file)).toBe(false);
    });
  });

  describe('generate', () => {
    test('writes a C scanner', () => {
      const output = path.join(dir, 'calc.c');
      const result = generate(fixture('calc.l'), { output })._unsafeUnwrap();
      expect(result.output).toEqual(output);
      expect(result.lexer.stats.rules).toEqual(8);
      const code = fs.readFileSync(output, { encoding: 'latin1' });
      expect(code.split('\n')[0]).toEqual(
        `/* Scanner generated by lexgen from ${fixture('calc.l')}. */`
      );
      expect(code.endsWith('int yywrap(void) { return 1; }\n')).toBe(true);
    });

    test('writes a TypeScript scanner', () => {
      const output = path.join(dir, 'keywords.ts');
      generate(fixture('keywords.l'), {
        output,
        language: TargetLanguage.TS,
      })._unsafeUnwrap();
      const code = fs.readFileSync(output, { encoding: 'latin1' });
      expect(code).toContain('export function yylex(ctx: ScannerContext) {');
    });

    test('writes nothing when the syntax file is broken', () => {
      const output = path.join(dir, 'broken.c');
      const error = generate(fixture('broken.l'), {
        output,
      })._unsafeUnwrapErr();
      expect(error.kind).toEqual(ErrorKind.PATTERN);
      expect(error.location).toEqual({
        source: fixture('broken.l'),
        line: 1,
        column: 9,
      });
      expect(fs.existsSync(output)).toBe(false);
    });

    test('leaves an existing output alone on failure', () => {
      const output = path.join(dir, 'kept.c');
      fs.writeFileSync(output, 'previous');
      generate(fixture('broken.l'), { output })._unsafeUnwrapErr();
      expect(fs.readFileSync(output, { encoding: 'latin1' })).toEqual(
        'previous'
      );
    });
  });

  describe('scan', () => {
    test('prints one line per token', () => {
      const lines = scan(fixture('keywords.l'), 'if x1\t42 iffy')._unsafeUnwrap();
      expect(lines).toEqual([
        '0 1:1 "if"',
        '3 1:3 " "',
        '1 1:4 "x1"',
        '3 1:6 "\\t"',
        '2 1:7 "42"',
        '3 1:9 " "',
        '1 1:10 "iffy"',
      ]);
    });

    test('reports unrecognized bytes and keeps going', () => {
      const lines = scan(fixture('keywords.l'), 'a\n@b')._unsafeUnwrap();
      expect(lines).toEqual([
        '1 1:1 "a"',
        'unrecognized 1',
        'unrecognized 2',
        '1 2:2 "b"',
      ]);
    });
  });

  describe('dump', () => {
    test('prints each automaton', () => {
      const text = dump(fixture('keywords.l'))._unsafeUnwrap();
      const headings = text
        .split('\n')
        .filter((line) => /^(NFA|DFA|Minimized DFA) \(\d+ states\)$/.test(line));
      expect(headings.map((h) => h.split(' (')[0])).toEqual([
        'NFA',
        'DFA',
        'Minimized DFA',
      ]);
    });
  });
});
