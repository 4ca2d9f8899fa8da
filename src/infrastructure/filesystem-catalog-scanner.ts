import fg from 'fast-glob';

import type { ScannedPage } from '../application/catalog';
import { errorMessage } from '../application/formatter-bridge';
import { joinPath } from '../application/path-utils';
import type { CatalogSource, DiagnosticsLogger } from '../application/ports';

export class FilesystemCatalogScanner implements CatalogSource {
  private readonly logger: DiagnosticsLogger;

  constructor(logger: DiagnosticsLogger) {
    this.logger = logger;
  }

  scan(roots: readonly string[], sections: readonly string[]): ScannedPage[] {
    const pages: ScannedPage[] = [];
    for (const root of roots) {
      for (const section of sections) {
        for (const path of this.listPages(root, section)) {
          pages.push({ path, directory: root });
        }
      }
    }
    this.logger.debug(`Scanned ${pages.length} page files under ${roots.length} roots.`);
    return pages;
  }

  private listPages(root: string, section: string): string[] {
    try {
      return fg
        .sync(`man${fg.escapePath(section)}/*`, { cwd: root, absolute: true, onlyFiles: true })
        .sort(compareCodeUnits);
    } catch (error) {
      if (isMissingDirectory(error)) {
        return [];
      }
      this.logger.warn(`${joinPath(root, `man${section}`)}: ${errorMessage(error)}`);
      return [];
    }
  }
}

function isMissingDirectory(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

function compareCodeUnits(left: string, right: string): number {
  return left < right ? -1 : left > right ? 1 : 0;
}
