export const APP_NAME = 'manview';
export const APP_VERSION = '0.1.0';

export type CommandLineRequest =
  | { type: 'catalog-search' }
  | { type: 'version' }
  | { type: 'help' }
  | { type: 'open-file'; path: string }
  | { type: 'open-page'; name: string; section: string | null }
  | { type: 'search'; query: string }
  | { type: 'invalid'; message: string };

export function parseCommandLine(args: readonly string[]): CommandLineRequest {
  const [first, second] = args;
  if (first === undefined) {
    return { type: 'catalog-search' };
  }

  switch (first) {
    case '--version':
      return { type: 'version' };
    case '-h':
    case '--help':
      return { type: 'help' };
    case '-f':
      return second === undefined
        ? { type: 'invalid', message: 'Argument required after "-f"' }
        : { type: 'open-file', path: second };
    case '-k':
      return second === undefined
        ? { type: 'invalid', message: 'Argument required after "-k"' }
        : { type: 'search', query: second };
    default:
      break;
  }

  if (args.length === 1) {
    return { type: 'open-page', name: first, section: null };
  }
  if (args.length === 2 && second !== undefined) {
    return { type: 'open-page', name: second, section: first };
  }
  return { type: 'invalid', message: 'Too many arguments' };
}

export function usageText(executable: string): string {
  return [
    'Usage:',
    executable,
    `${executable} [section] man_page`,
    `${executable} -f man_page_file`,
    `${executable} -k search_term`,
    '',
  ].join('\n');
}

export function versionText(): string {
  return `${APP_NAME} ${APP_VERSION}`;
}
