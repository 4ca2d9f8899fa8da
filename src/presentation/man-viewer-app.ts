import { entryForFile, lookupCatalogKey, resolveOpenTarget, type Catalog } from '../application/catalog';
import {
  appendCatalogQueryCharacter,
  clearCatalogQuery,
  createEmptyCatalogSearchState,
  deleteCatalogQueryCharacter,
  hoverResult,
  scrollResults,
  selectNextResult,
  selectPreviousResult,
  selectedEntry,
  setCatalogQuery,
  CATALOG_RESULT_ROWS,
  type CatalogSearchOptions,
  type CatalogSearchState,
} from '../application/catalog-search';
import { documentHeight, fittingWindowSize, type LayoutMetrics } from '../application/layout-metrics';
import type { PageLoadResult } from '../application/page-load-use-case';
import {
  appendPageSearchCharacter,
  beginPageSearch,
  cancelPageSearchInput,
  clearPageSearch,
  commitPageSearchInput,
  deletePageSearchCharacter,
  pageSearchStatusLabel,
  setPageSearchQuery,
  stepPageSearchMatch,
  type PageSearchEnvironment,
  type PageSearchStep,
} from '../application/page-search';
import {
  canGoBack,
  canGoForward,
  createEmptyPageStack,
  currentStackPage,
  openStackPage,
  rewindPageStack,
  stepBack,
  stepForward,
  type PageStackState,
} from '../application/page-stack';
import type { DiagnosticsLogger } from '../application/ports';
import type { ViewerSettings } from '../application/settings';
import {
  clampScrollPosition,
  clampThumbPosition,
  pageStep,
  thumbPositionToScrollPosition,
  visibleLineRange,
  type LineRange,
  type ScrollbarThumb,
  type ViewportGeometry,
} from '../application/viewport';
import { manPageTitle, type CatalogEntry, type ManPage } from '../domain';
import { catalogResultRowAt } from './catalog-results-layout';
import { DocumentLinkController, type LinkViewport } from './document-link-controller';
import {
  resolveCatalogSearchIntent,
  resolvePageKeyIntent,
  resolvePageSearchInputIntent,
  type KeyboardShortcutInput,
  type PageIntent,
} from './keyboard-shortcuts';
import { ScrollbarController, currentThumb, type ScrollbarLayout } from './scrollbar-controller';

export type DisplayMode = 'page' | 'catalog-search';

export type PointerButton = 'primary' | 'secondary';

export interface PageLoader {
  load(entry: Pick<CatalogEntry, 'path' | 'directory'>): PageLoadResult;
}

interface ManViewerAppDeps {
  pageLoader: PageLoader;
  getCatalog: () => Catalog;
  settings: ViewerSettings;
  metrics: LayoutMetrics;
  logger: DiagnosticsLogger;
  appName: string;
  windowSize?: { width: number; height: number };
}

const BOTTOM = Number.MAX_SAFE_INTEGER;

/**
 * The viewer's single application instance. Every operation runs to completion
 * and raises the redraw flag when something visible changed; the host drains
 * it with `consumeRedraw()`.
 */
export class ManViewerApp {
  private readonly deps: ManViewerAppDeps;
  private readonly scrollbar = new ScrollbarController();
  private readonly linkController = new DocumentLinkController();
  private stack: PageStackState<ManPage> = createEmptyPageStack();
  private mode: DisplayMode = 'catalog-search';
  private catalogSearchState: CatalogSearchState = createEmptyCatalogSearchState();
  private windowWidth: number;
  private windowHeight: number;
  private redrawRequested = true;
  private status: string | null = null;
  private gPending = false;
  private quitRequested = false;

  constructor(deps: ManViewerAppDeps) {
    this.deps = deps;
    const size =
      deps.windowSize ?? fittingWindowSize(deps.settings.initialWindowRows, deps.metrics);
    this.windowWidth = size.width;
    this.windowHeight = size.height;
  }

  displayMode(): DisplayMode {
    return this.mode;
  }

  currentPage(): ManPage | null {
    return currentStackPage(this.stack);
  }

  windowSize(): { width: number; height: number } {
    return { width: this.windowWidth, height: this.windowHeight };
  }

  windowTitle(): string {
    const page = this.currentPage();
    if (this.mode === 'page' && page) {
      return manPageTitle(page, this.deps.appName);
    }
    return this.deps.appName;
  }

  statusMessage(): string | null {
    return this.status;
  }

  /** Match position shown beside the page search field, while it is open. */
  pageSearchStatus(): string | null {
    const page = this.currentPage();
    return page && page.search.visible ? pageSearchStatusLabel(page.search) : null;
  }

  isQuitRequested(): boolean {
    return this.quitRequested;
  }

  catalogSearch(): CatalogSearchState {
    return this.catalogSearchState;
  }

  consumeRedraw(): boolean {
    const requested = this.redrawRequested;
    this.redrawRequested = false;
    return requested;
  }

  scrollbarThumb(): ScrollbarThumb | null {
    const layout = this.scrollbarLayout();
    return layout ? currentThumb(layout) : null;
  }

  visibleLines(): LineRange {
    const page = this.currentPage();
    if (!page) {
      return { first: 0, end: 0 };
    }
    return visibleLineRange({
      scrollPosition: page.scrollPosition,
      viewportHeight: this.windowHeight,
      lineCount: page.content.lineCount,
      metrics: this.deps.metrics,
    });
  }

  open(entry: Pick<CatalogEntry, 'path' | 'directory'>): PageLoadResult {
    const result = this.deps.pageLoader.load(entry);
    if (result.type === 'failed') {
      this.status = result.message;
      this.requestRedraw();
      return result;
    }

    const opened = openStackPage(this.stack, result.page);
    if (opened.released.length > 0) {
      this.deps.logger.debug(`Released ${opened.released.length} pages from the forward history.`);
    }
    this.stack = opened.state;
    this.mode = 'page';
    this.status = null;
    this.linkController.reset();
    this.requestRedraw();
    return result;
  }

  openByName(name: string, section: string | null): PageLoadResult {
    const target = resolveOpenTarget({
      catalog: this.deps.getCatalog(),
      name,
      section,
      sectionOrder: this.deps.settings.sections,
    });
    if (target.type === 'missing') {
      this.status = target.message;
      this.requestRedraw();
      return { type: 'failed', message: target.message };
    }
    return this.open(target.entry);
  }

  /** Opens a catalog key such as `ls(1)`, or a file path when no key matches. */
  openKeyOrPath(keyOrPath: string): PageLoadResult {
    const entry = lookupCatalogKey(this.deps.getCatalog(), keyOrPath) ?? entryForFile(keyOrPath);
    return this.open(entry);
  }

  goBack(): void {
    if (canGoBack(this.stack)) {
      this.stack = stepBack(this.stack);
      this.afterPageChange();
      return;
    }
    if (this.mode === 'page') {
      this.mode = 'catalog-search';
      this.stack = rewindPageStack(this.stack);
      this.requestRedraw();
    }
  }

  goForward(): void {
    if (!canGoForward(this.stack)) {
      return;
    }
    this.stack = stepForward(this.stack);
    this.afterPageChange();
  }

  /** Returns true when the position changed. */
  setScroll(position: number): boolean {
    const page = this.currentPage();
    const geometry = this.geometry();
    if (!page || !geometry) {
      return false;
    }
    const next = clampScrollPosition(position, geometry);
    if (next === page.scrollPosition) {
      return false;
    }
    page.scrollPosition = next;
    this.requestRedraw();
    return true;
  }

  scrollBy(delta: number): boolean {
    const page = this.currentPage();
    return page ? this.setScroll(page.scrollPosition + delta) : false;
  }

  resize(width: number, height: number): void {
    this.windowWidth = width;
    this.windowHeight = height;
    const page = this.currentPage();
    const geometry = this.geometry();
    if (page && geometry) {
      page.scrollPosition = clampScrollPosition(page.scrollPosition, geometry);
    }
    this.requestRedraw();
  }

  /** Scrolls as if the scrollbar thumb had been dragged to `thumbPosition`. */
  dragThumb(thumbPosition: number): boolean {
    const page = this.currentPage();
    if (!page) {
      return false;
    }
    const geometry = this.pageGeometry(page);
    const { thumbMinSize } = this.deps.metrics;
    const clamped = clampThumbPosition(thumbPosition, geometry, thumbMinSize);
    return this.setScroll(thumbPositionToScrollPosition(clamped, geometry, thumbMinSize));
  }

  setPageSearchQuery(query: string): void {
    const page = this.currentPage();
    if (this.mode !== 'page' || !page) {
      return;
    }
    const search = page.search.visible ? page.search : beginPageSearch(page.scrollPosition);
    this.applySearchStep(page, setPageSearchQuery(search, query, page.scrollPosition, this.searchEnvironment(page)));
  }

  nextMatch(): void {
    this.stepMatch('next');
  }

  previousMatch(): void {
    this.stepMatch('previous');
  }

  setCatalogQuery(query: string): void {
    this.catalogSearchState = setCatalogQuery(query, this.deps.getCatalog(), this.catalogOptions());
    this.requestRedraw();
  }

  openCatalogSearch(): void {
    this.mode = 'catalog-search';
    this.requestRedraw();
  }

  handleKey(input: KeyboardShortcutInput): void {
    const page = this.currentPage();
    if (this.mode === 'catalog-search' || !page) {
      this.handleCatalogKey(input);
      return;
    }
    if (page.search.inputActive) {
      this.handlePageSearchKey(page, input);
      return;
    }

    const resolution = resolvePageKeyIntent(input, this.gPending);
    this.gPending = resolution.gPending;
    this.applyPageIntent(page, resolution.intent);
  }

  pointerMove(x: number, y: number): void {
    if (this.mode === 'catalog-search') {
      const row = this.resultRowAt(x, y);
      const next = hoverResult(this.catalogSearchState, row);
      if (next !== this.catalogSearchState) {
        this.catalogSearchState = next;
        this.requestRedraw();
      }
      return;
    }

    const page = this.currentPage();
    const layout = this.scrollbarLayout();
    if (!page || !layout) {
      return;
    }
    if (this.scrollbar.isDragging()) {
      const scrollPosition = this.scrollbar.dragTo(y, layout);
      if (scrollPosition !== null) {
        this.setScroll(scrollPosition);
      }
      return;
    }

    const thumbChanged = this.scrollbar.hover(x, y, layout);
    const linksChanged = this.linkController.hover(page.links, x, y, this.linkViewport(page));
    if (thumbChanged || linksChanged) {
      this.requestRedraw();
    }
  }

  pointerDown(button: PointerButton, x: number, y: number): void {
    const page = this.currentPage();
    const layout = this.scrollbarLayout();
    if (this.mode !== 'page' || button !== 'primary' || !page || !layout) {
      return;
    }

    const press = this.scrollbar.press(x, y, layout);
    if (press.type === 'drag-start') {
      this.requestRedraw();
    } else if (press.type === 'page') {
      this.scrollBy(press.pages * pageStep(this.windowHeight, this.deps.metrics));
    } else {
      this.linkController.press(page.links, x, y, this.linkViewport(page));
    }
  }

  pointerUp(button: PointerButton, x: number, y: number): void {
    if (this.mode === 'catalog-search') {
      if (button === 'primary') {
        this.openResultAt(x, y);
      }
      return;
    }

    if (button === 'secondary') {
      this.goBack();
      return;
    }

    const page = this.currentPage();
    if (this.scrollbar.isDragging()) {
      this.scrollbar.release();
      this.requestRedraw();
    }
    if (!page) {
      return;
    }
    const target = this.linkController.release(page.links, x, y, this.linkViewport(page));
    if (target) {
      this.open(target);
    }
  }

  wheel(direction: -1 | 1, x: number, y: number): void {
    if (this.mode === 'page') {
      this.scrollBy(direction * this.deps.metrics.scrollAmount);
      return;
    }

    const row = this.resultRowAt(x, y);
    if (row < 0) {
      return;
    }
    const next = scrollResults(this.catalogSearchState, direction, row);
    if (next !== this.catalogSearchState) {
      this.catalogSearchState = next;
      this.requestRedraw();
    }
  }

  private applyPageIntent(page: ManPage, intent: PageIntent): void {
    const { metrics } = this.deps;
    switch (intent.type) {
      case 'none':
        return;
      case 'quit':
        this.quitRequested = true;
        return;
      case 'go-back':
        this.goBack();
        return;
      case 'go-forward':
        this.goForward();
        return;
      case 'open-catalog-search':
        this.openCatalogSearch();
        return;
      case 'begin-page-search':
        page.search = beginPageSearch(page.scrollPosition);
        this.requestRedraw();
        return;
      case 'clear-page-search':
        page.search = clearPageSearch(page.search);
        this.requestRedraw();
        return;
      case 'next-match':
        this.nextMatch();
        return;
      case 'previous-match':
        this.previousMatch();
        return;
      case 'scroll-steps':
        this.scrollBy(intent.steps * metrics.scrollAmount);
        return;
      case 'scroll-pages':
        this.scrollBy(intent.pages * pageStep(this.windowHeight, metrics));
        return;
      case 'scroll-to-top':
        this.setScroll(0);
        return;
      case 'scroll-to-bottom':
        this.setScroll(BOTTOM);
        return;
      case 'fit-window-width':
        this.resize(fittingWindowSize(0, metrics).width, this.windowHeight);
        return;
    }
  }

  private handlePageSearchKey(page: ManPage, input: KeyboardShortcutInput): void {
    const intent = resolvePageSearchInputIntent(input);
    const env = this.searchEnvironment(page);
    switch (intent.type) {
      case 'none':
        return;
      case 'cancel':
        this.applySearchStep(page, cancelPageSearchInput(page.search, env.geometry));
        return;
      case 'commit':
        page.search = commitPageSearchInput(page.search);
        this.requestRedraw();
        return;
      case 'delete-character':
        this.applySearchStep(page, deletePageSearchCharacter(page.search, page.scrollPosition, env));
        return;
      case 'append-character':
        this.applySearchStep(
          page,
          appendPageSearchCharacter(page.search, intent.character, page.scrollPosition, env)
        );
        return;
    }
  }

  private handleCatalogKey(input: KeyboardShortcutInput): void {
    const catalog = this.deps.getCatalog();
    const options = this.catalogOptions();
    const intent = resolveCatalogSearchIntent(input);
    switch (intent.type) {
      case 'none':
        return;
      case 'quit':
        this.quitRequested = true;
        return;
      case 'open-selected': {
        const entry = selectedEntry(this.catalogSearchState, catalog);
        if (entry) {
          this.open(entry);
        }
        return;
      }
      case 'delete-character':
        this.updateCatalogSearch(deleteCatalogQueryCharacter(this.catalogSearchState, catalog, options));
        return;
      case 'clear-query':
        this.updateCatalogSearch(clearCatalogQuery(this.catalogSearchState, catalog, options));
        return;
      case 'select-previous':
        this.updateCatalogSearch(selectPreviousResult(this.catalogSearchState));
        return;
      case 'select-next':
        this.updateCatalogSearch(selectNextResult(this.catalogSearchState, CATALOG_RESULT_ROWS));
        return;
      case 'append-character':
        this.updateCatalogSearch(
          appendCatalogQueryCharacter(this.catalogSearchState, intent.character, catalog, options)
        );
        return;
    }
  }

  private openResultAt(x: number, y: number): void {
    const row = this.resultRowAt(x, y);
    if (row < 0) {
      return;
    }
    const selected = hoverResult(this.catalogSearchState, row);
    const index = row + selected.viewOffset;
    if (index >= selected.matches.length) {
      return;
    }
    this.catalogSearchState = selected;
    const entry = selectedEntry(selected, this.deps.getCatalog());
    if (entry) {
      this.open(entry);
    }
  }

  private updateCatalogSearch(next: CatalogSearchState): void {
    if (next === this.catalogSearchState) {
      return;
    }
    this.catalogSearchState = next;
    this.requestRedraw();
  }

  private stepMatch(direction: 'next' | 'previous'): void {
    const page = this.currentPage();
    if (this.mode !== 'page' || !page) {
      return;
    }
    this.applySearchStep(
      page,
      stepPageSearchMatch(page.search, direction, page.scrollPosition, this.searchEnvironment(page))
    );
  }

  private applySearchStep(page: ManPage, step: PageSearchStep): void {
    if (step.search === page.search && step.scrollPosition === page.scrollPosition) {
      return;
    }
    page.search = step.search;
    page.scrollPosition = step.scrollPosition;
    this.requestRedraw();
  }

  private afterPageChange(): void {
    this.mode = 'page';
    this.linkController.reset();
    const page = this.currentPage();
    const geometry = this.geometry();
    if (page && geometry) {
      page.scrollPosition = clampScrollPosition(page.scrollPosition, geometry);
    }
    this.requestRedraw();
  }

  private searchEnvironment(page: ManPage): PageSearchEnvironment {
    return {
      content: page.content,
      metrics: this.deps.metrics,
      geometry: this.pageGeometry(page),
      matchLimit: this.deps.settings.searchMatchLimit,
      scrollMarginLines: this.deps.settings.scrollMarginLines,
    };
  }

  private catalogOptions(): CatalogSearchOptions {
    return {
      resultLimit: this.deps.settings.catalogResultLimit,
      positionPenalty: this.deps.settings.positionPenalty,
    };
  }

  private resultRowAt(x: number, y: number): number {
    return catalogResultRowAt(x, y, {
      windowWidth: this.windowWidth,
      metrics: this.deps.metrics,
      rows: CATALOG_RESULT_ROWS,
    });
  }

  private linkViewport(page: ManPage): LinkViewport {
    return { documentMargin: this.deps.metrics.documentMargin, scrollPosition: page.scrollPosition };
  }

  private geometry(): ViewportGeometry | null {
    const page = this.currentPage();
    return page ? this.pageGeometry(page) : null;
  }

  private pageGeometry(page: ManPage): ViewportGeometry {
    return {
      viewportHeight: this.windowHeight,
      documentHeight: documentHeight(page.content.lineCount, this.deps.metrics),
    };
  }

  private scrollbarLayout(): ScrollbarLayout | null {
    const page = this.currentPage();
    if (this.mode !== 'page' || !page) {
      return null;
    }
    return {
      windowWidth: this.windowWidth,
      geometry: this.pageGeometry(page),
      scrollbarWidth: this.deps.metrics.scrollbarWidth,
      thumbMinSize: this.deps.metrics.thumbMinSize,
      scrollPosition: page.scrollPosition,
    };
  }

  private requestRedraw(): void {
    this.redrawRequested = true;
  }
}
