import { basename } from 'node:path';

import { buildCatalog, entryForFile, resolveOpenTarget, type Catalog } from './application/catalog';
import { FormatterBridge } from './application/formatter-bridge';
import { BUILTIN_FONT_METRICS, deriveLayoutMetrics } from './application/layout-metrics';
import { PageLoadUseCase, type PageLoadResult } from './application/page-load-use-case';
import { ConsoleDiagnosticsLogger } from './infrastructure/console-diagnostics-logger';
import { FilesystemCatalogScanner } from './infrastructure/filesystem-catalog-scanner';
import { FilesystemPageLocator } from './infrastructure/filesystem-page-locator';
import { ManPathReader } from './infrastructure/manpath-reader';
import { PreformattedPageEngine } from './infrastructure/preformatted-page-engine';
import { RcFileSettingsStore } from './infrastructure/rc-file-settings-store';
import {
  APP_NAME,
  ManViewerApp,
  parseCommandLine,
  renderCatalogResults,
  renderPageText,
  usageText,
  versionText,
} from './presentation';

function run(argv: readonly string[]): number {
  const executable = basename(argv[1] ?? APP_NAME);
  const request = parseCommandLine(argv.slice(2));

  switch (request.type) {
    case 'version':
      process.stdout.write(`${versionText()}\n`);
      return 0;
    case 'help':
      process.stderr.write(usageText(executable));
      return 0;
    case 'catalog-search':
      process.stderr.write(usageText(executable));
      return 1;
    case 'invalid':
      process.stderr.write(`${request.message}\n${usageText(executable)}`);
      return 1;
    default:
      break;
  }

  const logger = new ConsoleDiagnosticsLogger();
  const settings = new RcFileSettingsStore({ logger }).load();
  logger.setVerbose(settings.verbose);

  const roots = new ManPathReader({ logger }).resolveManPaths(settings.manPaths);
  let catalog: Catalog | null = null;
  const getCatalog = (): Catalog => {
    catalog ??= buildCatalog(new FilesystemCatalogScanner(logger).scan(roots, settings.sections));
    return catalog;
  };

  const metrics = deriveLayoutMetrics(BUILTIN_FONT_METRICS, settings);
  const app = new ManViewerApp({
    pageLoader: new PageLoadUseCase({
      formatter: new FormatterBridge({ engine: new PreformattedPageEngine(), logger }),
      getCatalog,
      getMetrics: () => metrics,
      logger,
    }),
    getCatalog,
    settings,
    metrics,
    logger,
    appName: APP_NAME,
  });

  if (request.type === 'search') {
    app.setCatalogQuery(request.query);
    const lines = renderCatalogResults(app.catalogSearch(), getCatalog());
    if (lines.length === 0) {
      process.stderr.write(`No pages match "${request.query}".\n`);
      return 1;
    }
    process.stdout.write(`${lines.join('\n')}\n`);
    return 0;
  }

  let result: PageLoadResult;
  if (request.type === 'open-file') {
    result = app.open(entryForFile(request.path));
  } else {
    const located = new FilesystemPageLocator({
      roots,
      sections: settings.sections,
      workingDirectory: process.cwd(),
    }).locate(request.name, request.section);
    const target =
      located.type === 'entry'
        ? located
        : resolveOpenTarget({
            catalog: getCatalog(),
            name: request.name,
            section: request.section,
            sectionOrder: settings.sections,
          });
    if (target.type === 'missing') {
      process.stderr.write(`${target.message}\n`);
      return 1;
    }
    result = app.open(target.entry);
  }

  // Load failures are already reported through the logger.
  if (result.type === 'failed') {
    return 1;
  }

  logger.debug(app.windowTitle());
  process.stdout.write(`${renderPageText(result.page, { styled: process.stdout.isTTY === true })}\n`);
  return 0;
}

process.exitCode = run(process.argv);
