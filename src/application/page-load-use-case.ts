import { createEmptyPageSearchState, type CatalogEntry, type ManPage } from '../domain';
import { lookupCatalogKey, parsePageFileName, type Catalog } from './catalog';
import type { FormatResult } from './formatter-bridge';
import type { LayoutMetrics } from './layout-metrics';
import { findLinks } from './link-resolver';
import type { DiagnosticsLogger } from './ports';

export type PageLoadResult = { type: 'loaded'; page: ManPage } | { type: 'failed'; message: string };

export interface PageFormatter {
  format(path: string, directory: string): FormatResult;
}

interface PageLoadUseCaseDeps {
  formatter: PageFormatter;
  getCatalog: () => Catalog;
  getMetrics: () => Pick<LayoutMetrics, 'characterAdvance' | 'lineAdvance' | 'lineHeight'>;
  logger: DiagnosticsLogger;
}

/** Formats a page file and discovers its cross-references. */
export class PageLoadUseCase {
  private readonly deps: PageLoadUseCaseDeps;

  constructor(deps: PageLoadUseCaseDeps) {
    this.deps = deps;
  }

  load(entry: Pick<CatalogEntry, 'path' | 'directory'>): PageLoadResult {
    const { formatter, logger } = this.deps;
    const formatted = formatter.format(entry.path, entry.directory);
    if (formatted.type === 'failed') {
      logger.error(`Failed to open ${entry.path}: ${formatted.message}`);
      return formatted;
    }

    const catalog = this.deps.getCatalog();
    const links = findLinks(formatted.content, (key) => lookupCatalogKey(catalog, key), this.deps.getMetrics());
    const fileName = parsePageFileName(entry.path);
    logger.debug(`Found ${links.length} links in ${entry.path}.`);

    return {
      type: 'loaded',
      page: {
        name: fileName?.name ?? '',
        section: fileName?.section ?? '',
        path: entry.path,
        directory: entry.directory,
        content: formatted.content,
        scrollPosition: 0,
        links,
        search: createEmptyPageSearchState(),
      },
    };
  }
}
