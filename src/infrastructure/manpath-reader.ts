import { execFileSync } from 'node:child_process';

import { errorMessage } from '../application/formatter-bridge';
import type { DiagnosticsLogger, ManPathResolver } from '../application/ports';

interface ManPathReaderDeps {
  logger: DiagnosticsLogger;
  env?: NodeJS.ProcessEnv;
  runManpath?: () => string;
}

export function splitManPathOutput(output: string): string[] {
  return output
    .split(/[:\n]/)
    .map((path) => path.trim())
    .filter((path) => path.length > 0);
}

function runManpathCommand(): string {
  return execFileSync('manpath', ['--quiet'], { encoding: 'utf8', stdio: ['ignore', 'pipe', 'ignore'] });
}

/** `MANPATH`, else `manpath --quiet`, else the configured roots. */
export class ManPathReader implements ManPathResolver {
  private readonly deps: ManPathReaderDeps;
  private cached: string[] | null = null;

  constructor(deps: ManPathReaderDeps) {
    this.deps = deps;
  }

  resolveManPaths(fallback: readonly string[]): string[] {
    if (!this.cached) {
      this.cached = this.read();
    }
    return this.cached.length > 0 ? [...this.cached] : [...fallback];
  }

  private read(): string[] {
    const { logger } = this.deps;
    const fromEnv = splitManPathOutput((this.deps.env ?? process.env).MANPATH ?? '');
    if (fromEnv.length > 0) {
      logger.debug(`Using ${fromEnv.length} man paths from MANPATH.`);
      return fromEnv;
    }

    try {
      const paths = splitManPathOutput((this.deps.runManpath ?? runManpathCommand)());
      logger.debug(`Using ${paths.length} man paths from manpath.`);
      return paths;
    } catch (error) {
      logger.debug(`manpath unavailable: ${errorMessage(error)}`);
      return [];
    }
  }
}
