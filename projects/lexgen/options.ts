export enum TargetLanguage {
  C = 'c',
  TS = 'ts',
}

export type GeneratorOptions = {
  /**
   * Language of the generated scanner.
   */
  language: TargetLanguage;
  /**
   * Where to write the generated scanner.
   */
  output: string;
  /**
   * 256 for raw bytes, 128 for 7-bit ASCII.
   */
  alphabetSize: number;
  /**
   * Whether . matches a newline.
   */
  dotMatchesNewline: boolean;
  /**
   * Whether to merge indistinguishable DFA states.
   */
  minimize: boolean;
  /**
   * Report timings and stage summaries on stderr.
   */
  verbose: boolean;
};

export const ALPHABET_SIZES = [128, 256];

export const DEFAULT_OUTPUT: Readonly<Record<TargetLanguage, string>> = {
  [TargetLanguage.C]: 'lex.yy.c',
  [TargetLanguage.TS]: 'lex.yy.ts',
};

/**
 * Fill in defaults for every option that was not given. The default
 * output file depends on the language.
 */
export function resolveOptions(
  options: Partial<GeneratorOptions> = {}
): GeneratorOptions {
  const language = options.language ?? TargetLanguage.C;
  const alphabetSize = options.alphabetSize ?? 256;
  if (ALPHABET_SIZES.indexOf(alphabetSize) < 0) {
    throw new Error(
      `alphabetSize must be one of ${ALPHABET_SIZES.join(', ')}, got ${alphabetSize}`
    );
  }
  return {
    language,
    output: options.output ?? DEFAULT_OUTPUT[language],
    alphabetSize,
    dotMatchesNewline: options.dotMatchesNewline ?? true,
    minimize: options.minimize ?? true,
    verbose: options.verbose ?? false,
  };
}
