import type { DiagnosticsLogger } from '../application/ports';

const PREFIX = 'manview:';

export interface ConsoleLike {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/** Writes to the console; debug lines only appear in verbose mode. */
export class ConsoleDiagnosticsLogger implements DiagnosticsLogger {
  private verbose: boolean;
  private readonly output: ConsoleLike;

  constructor(options: { verbose?: boolean; output?: ConsoleLike } = {}) {
    this.verbose = options.verbose ?? false;
    this.output = options.output ?? console;
  }

  setVerbose(enabled: boolean): void {
    this.verbose = enabled;
  }

  debug(message: string): void {
    if (!this.verbose) return;
    this.output.debug(PREFIX, message);
  }

  warn(message: string): void {
    this.output.warn(PREFIX, message);
  }

  error(message: string): void {
    this.output.error(PREFIX, message);
  }
}
