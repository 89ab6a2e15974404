#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { colors, useColors } from '../utils/debug.js';
import { dump, generate, readInput, scan } from './cli.js';
import type { LexgenError } from './errors.js';
import { ALPHABET_SIZES, TargetLanguage } from './options.js';

if (process.stdout.isTTY) {
  useColors();
}

function fail(error: LexgenError) {
  console.error(colors.red(error.message));
  process.exitCode = 1;
}

function targetLanguage(value: string): TargetLanguage {
  return value == TargetLanguage.TS ? TargetLanguage.TS : TargetLanguage.C;
}

function compileOptions<T>(argv: yargs.Argv<T>) {
  return argv
    .option('alphabet', {
      type: 'number',
      choices: ALPHABET_SIZES,
      description: 'number of input symbols: 256 for bytes, 128 for ASCII',
      default: 256,
    })
    .option('dot-all', {
      type: 'boolean',
      description: 'let . match a newline',
      default: true,
    })
    .option('minimize', {
      type: 'boolean',
      description: 'merge indistinguishable DFA states',
      default: true,
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      description: 'print timings and automaton sizes to stderr',
      default: false,
    });
}

yargs(hideBin(process.argv))
  .scriptName('lexgen')
  .command({
    command: '$0 [file]',
    describe: 'generate a scanner from a syntax file (stdin by default)',
    builder: (argv) =>
      compileOptions(argv)
        .positional('file', {
          describe: 'syntax file to compile',
          type: 'string',
        })
        .option('language', {
          alias: 'l',
          type: 'string',
          choices: [TargetLanguage.C, TargetLanguage.TS],
          description: 'language of the generated scanner',
          default: TargetLanguage.C,
        })
        .option('output', {
          alias: 'o',
          type: 'string',
          description: 'where to write the scanner (lex.yy.c or lex.yy.ts)',
        }),
    handler: (args) => {
      const result = generate(args.file, {
        language: targetLanguage(args.language),
        output: args.output,
        alphabetSize: args.alphabet,
        dotMatchesNewline: args['dot-all'],
        minimize: args.minimize,
        verbose: args.verbose,
      });
      if (result.isErr()) {
        fail(result.error);
        return;
      }
      const { output, lexer, elapsedMs } = result.value;
      if (lexer.options.verbose) {
        const { stats } = lexer;
        console.error(`rules: ${stats.rules}`);
        console.error(`nfa states: ${stats.nfaStates}`);
        console.error(`symbol classes: ${stats.symbolClasses}`);
        console.error(`dfa states: ${stats.dfaStates}`);
        if (stats.minimizedStates !== null) {
          console.error(`minimized dfa states: ${stats.minimizedStates}`);
        }
        console.error(`done in ${elapsedMs}ms`);
      }
      console.log(colors.bold(colors.green('✓')), 'wrote', output);
    },
  })
  .command({
    command: 'scan <file> [input]',
    describe: 'run the scanner for a syntax file over an input file (or stdin)',
    builder: (argv) =>
      compileOptions(argv)
        .positional('file', {
          describe: 'syntax file to compile',
          type: 'string',
          demandOption: true,
        })
        .positional('input', {
          describe: 'file to scan',
          type: 'string',
        }),
    handler: (args) => {
      const result = readInput(args.input).andThen((input) =>
        scan(args.file, input, {
          alphabetSize: args.alphabet,
          dotMatchesNewline: args['dot-all'],
          minimize: args.minimize,
        })
      );
      if (result.isErr()) {
        fail(result.error);
        return;
      }
      for (const line of result.value) {
        console.log(line);
      }
    },
  })
  .command({
    command: 'dump <file>',
    describe: 'print the NFA and DFA tables built for a syntax file',
    builder: (argv) =>
      compileOptions(argv).positional('file', {
        describe: 'syntax file to compile',
        type: 'string',
        demandOption: true,
      }),
    handler: (args) => {
      const result = dump(args.file, {
        alphabetSize: args.alphabet,
        dotMatchesNewline: args['dot-all'],
      });
      if (result.isErr()) {
        fail(result.error);
        return;
      }
      console.log(result.value);
    },
  })
  .strict()
  .parse();
