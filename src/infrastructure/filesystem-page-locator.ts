import { statSync } from 'node:fs';

import fg from 'fast-glob';

import { catalogKey, missingPageMessage, type OpenTarget } from '../application/catalog';
import { joinPath } from '../application/path-utils';

export interface PageLocatorOptions {
  roots: readonly string[];
  sections: readonly string[];
  /** Where `./name.section` is looked up. */
  workingDirectory: string;
}

/**
 * Finds a page on disk the way `man` would, without the catalog: per root,
 * then per section, the source page, the preformatted page, any other page
 * with a numeric suffix, and finally a file beside the working directory.
 */
export class FilesystemPageLocator {
  private readonly options: PageLocatorOptions;

  constructor(options: PageLocatorOptions) {
    this.options = options;
  }

  locate(name: string, section: string | null): OpenTarget {
    const sections = section ? [section] : this.options.sections;
    for (const root of this.options.roots) {
      for (const candidate of sections) {
        const path = this.lookup(root, candidate, name);
        if (path) {
          return { type: 'entry', entry: { key: catalogKey(name, candidate), path, directory: root } };
        }
      }
    }
    return { type: 'missing', message: missingPageMessage(name, section) };
  }

  private lookup(root: string, section: string, name: string): string | null {
    const sourcePage = joinPath(root, `man${section}`, `${name}.${section}`);
    if (isFile(sourcePage)) {
      return sourcePage;
    }

    const catPage = joinPath(root, `cat${section}`, `${name}.0`);
    if (isFile(catPage)) {
      return catPage;
    }

    const suffixed = firstSuffixedPage(joinPath(root, `man${section}`), name);
    if (suffixed) {
      return suffixed;
    }

    const local = joinPath(this.options.workingDirectory, `${name}.${section}`);
    return isFile(local) ? local : null;
  }
}

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

function firstSuffixedPage(directory: string, name: string): string | null {
  if (!statSync(directory, { throwIfNoEntry: false })?.isDirectory()) {
    return null;
  }
  const matches = fg.sync(`${fg.escapePath(name)}.[0-9]*`, {
    cwd: directory,
    absolute: true,
    onlyFiles: true,
  });
  return matches.sort()[0] ?? null;
}
