export interface ParserOptions {
  /** Receives progress and timing messages; nothing is logged without it. */
  timingCallback?: (message: string) => void;
  /** Inflate gzip-compressed input before parsing. Defaults to true. */
  decompress?: boolean;
}

export interface ResolvedParserOptions {
  log: (message: string) => void;
  decompress: boolean;
}

const noop = (): void => {};

export function resolveParserOptions(options: ParserOptions = {}): ResolvedParserOptions {
  return {
    log: options.timingCallback ?? noop,
    decompress: options.decompress ?? true,
  };
}
