import fs from 'fs';
import { err, ok, type Result } from 'neverthrow';
import { log } from '../utils/debug.js';
import { generateC } from './codegen/c.js';
import { generateTS } from './codegen/ts.js';
import { compileLexFile, scannerFor, type CompiledLexer } from './compile.js';
import { describeError, LexgenError, LexgenIOError } from './errors.js';
import {
  resolveOptions,
  TargetLanguage,
  type GeneratorOptions,
} from './options.js';

export const STDIN_SOURCE = '<stdin>';

function reason(e: unknown): string {
  if (e instanceof Error && 'code' in e && typeof e.code == 'string') {
    return e.code;
  }
  return describeError(e);
}

export type SourceText = { text: string; source: string };

/**
 * Read a syntax file, or standard input when no path is given. Every
 * byte becomes one character.
 */
export function readSource(path?: string): Result<SourceText, LexgenError> {
  const source = path ?? STDIN_SOURCE;
  try {
    const text = fs.readFileSync(path ?? 0, { encoding: 'latin1' });
    return ok({ text, source });
  } catch (e) {
    return err(new LexgenIOError(`Cannot read file (${reason(e)})`, source));
  }
}

/**
 * Write text to a temporary file beside path and rename it into
 * place, so path either keeps its old content or gets all of text.
 */
export function writeAtomic(
  path: string,
  text: string
): Result<string, LexgenError> {
  const tmp = `${path}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(tmp, text, { encoding: 'latin1' });
    fs.renameSync(tmp, path);
    return ok(path);
  } catch (e) {
    try {
      if (fs.existsSync(tmp)) {
        fs.unlinkSync(tmp);
      }
    } catch (cleanup) {
      log(`write: could not remove ${tmp} (${reason(cleanup)})`);
    }
    return err(new LexgenIOError(`Cannot write file (${reason(e)})`, path));
  }
}

export function generateCode(lexer: CompiledLexer): string {
  switch (lexer.options.language) {
    case TargetLanguage.C:
      return generateC(lexer);
    case TargetLanguage.TS:
      return generateTS(lexer);
  }
}

export type GenerateResult = {
  output: string;
  lexer: CompiledLexer;
  elapsedMs: number;
};

function compilePath(
  path: string | undefined,
  options: Partial<GeneratorOptions>
): Result<CompiledLexer, LexgenError> {
  return readSource(path).andThen(({ text, source }) =>
    compileLexFile(text, source, options)
  );
}

/**
 * Compile a syntax file and write the generated scanner. Nothing is
 * written unless every stage succeeds.
 */
export function generate(
  path: string | undefined,
  options: Partial<GeneratorOptions> = {}
): Result<GenerateResult, LexgenError> {
  const start = Date.now();
  const resolved = resolveOptions(options);
  return compilePath(path, resolved).andThen((lexer) => {
    const code = generateCode(lexer);
    log(`codegen: ${code.length} bytes of ${resolved.language}`);
    return writeAtomic(resolved.output, code).map((output) => ({
      output,
      lexer,
      elapsedMs: Date.now() - start,
    }));
  });
}

/**
 * Run the scanner for a syntax file over some input and describe
 * each token on its own line.
 */
export function scan(
  path: string,
  input: Uint8Array | string,
  options: Partial<GeneratorOptions> = {}
): Result<string[], LexgenError> {
  return compilePath(path, options).map((lexer) => {
    const scanner = scannerFor(lexer, { onUnrecognized: 'skip' });
    const ctx = scanner.createContext(input);
    const lines: string[] = [];
    while (true) {
      const result = scanner.next(ctx);
      if (result.kind == 'eof') {
        return lines;
      }
      if (result.kind == 'unrecognized') {
        lines.push(`unrecognized ${result.offset}`);
      } else {
        lines.push(
          `${result.rule} ${result.line}:${result.column} ${JSON.stringify(
            result.text
          )}`
        );
      }
    }
  });
}

/**
 * Read the input for scan: a file, or standard input.
 */
export function readInput(path?: string): Result<Uint8Array, LexgenError> {
  try {
    return ok(fs.readFileSync(path ?? 0));
  } catch (e) {
    return err(
      new LexgenIOError(`Cannot read file (${reason(e)})`, path ?? STDIN_SOURCE)
    );
  }
}

/**
 * The automata built for a syntax file, as tables.
 */
export function dump(
  path: string,
  options: Partial<GeneratorOptions> = {}
): Result<string, LexgenError> {
  return compilePath(path, { ...options, minimize: true }).map((lexer) =>
    [
      `NFA (${lexer.nfa.numStates} states)`,
      lexer.nfa.toDebugStr(),
      '',
      `DFA (${lexer.determinized.numStates} states)`,
      lexer.determinized.toDebugStr(),
      '',
      `Minimized DFA (${lexer.dfa.numStates} states)`,
      lexer.dfa.toDebugStr(),
    ].join('\n')
  );
}
