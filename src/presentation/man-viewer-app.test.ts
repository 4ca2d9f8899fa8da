import { describe, expect, it, vi } from 'vitest';

import { buildCatalog, lookupCatalogKey } from '../application/catalog';
import { BUILTIN_FONT_METRICS, deriveLayoutMetrics } from '../application/layout-metrics';
import type { PageLoadResult } from '../application/page-load-use-case';
import { DEFAULT_SETTINGS } from '../application/settings';
import { DocumentContent, createEmptyPageSearchState, type CatalogEntry, type Link, type ManPage } from '../domain';
import { ManViewerApp } from './man-viewer-app';

const catalog = buildCatalog([
  { path: '/man/man1/ls.1', directory: '/man' },
  { path: '/man/man1/cat.1', directory: '/man' },
  { path: '/man/man5/tool.conf.5', directory: '/man' },
]);

function catalogEntry(key: string): CatalogEntry {
  const entry = lookupCatalogKey(catalog, key);
  if (!entry) {
    throw new Error(`missing ${key}`);
  }
  return entry;
}

function contentFrom(lines: string[]): DocumentContent {
  const content = new DocumentContent();
  for (const line of lines) {
    content.startLine();
    for (const character of line) {
      content.appendCodePoint(character.codePointAt(0) ?? 0);
    }
  }
  return content;
}

function longLines(): string[] {
  const lines = Array.from({ length: 60 }, () => 'filler text');
  lines[5] = 'target near the top';
  lines[50] = 'target far below';
  return lines;
}

function createPage(entry: Pick<CatalogEntry, 'path' | 'directory'>): ManPage | null {
  const base = {
    path: entry.path,
    directory: entry.directory,
    scrollPosition: 0,
    search: createEmptyPageSearchState(),
  };
  switch (entry.path) {
    case '/man/man1/ls.1': {
      const links: Link[] = [
        { rect: { x: 0, y: 0, x2: 42, y2: 14 }, highlighted: false, target: catalogEntry('cat(1)') },
      ];
      return { ...base, name: 'ls', section: '1', content: contentFrom(longLines()), links };
    }
    case '/man/man1/cat.1':
      return { ...base, name: 'cat', section: '1', content: contentFrom(['NAME', '     cat']), links: [] };
    case '/man/man5/tool.conf.5':
      return { ...base, name: 'tool.conf', section: '5', content: contentFrom(['NAME']), links: [] };
    default:
      return null;
  }
}

function createApp() {
  const logger = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const load = vi.fn((entry: Pick<CatalogEntry, 'path' | 'directory'>): PageLoadResult => {
    const page = createPage(entry);
    return page ? { type: 'loaded', page } : { type: 'failed', message: 'boom' };
  });
  const app = new ManViewerApp({
    pageLoader: { load },
    getCatalog: () => catalog,
    settings: DEFAULT_SETTINGS,
    metrics: deriveLayoutMetrics(BUILTIN_FONT_METRICS, { lineSpacing: 1, guiScale: 1 }),
    logger,
    appName: 'manview',
    windowSize: { width: 600, height: 200 },
  });
  return { app, load, logger };
}

function key(value: string, modifiers: { ctrlKey?: boolean; shiftKey?: boolean } = {}) {
  return { key: value, ctrlKey: modifiers.ctrlKey ?? false, shiftKey: modifiers.shiftKey ?? false };
}

function scrollOf(app: ManViewerApp): number | undefined {
  return app.currentPage()?.scrollPosition;
}

describe('man-viewer-app (presentation)', () => {
  it('starts in catalog search under the application title', () => {
    const { app } = createApp();

    expect(app.displayMode()).toBe('catalog-search');
    expect(app.windowTitle()).toBe('manview');
    expect(app.currentPage()).toBeNull();
    expect(app.consumeRedraw()).toBe(true);
    expect(app.consumeRedraw()).toBe(false);
  });

  it('opens a page and titles the window after it', () => {
    const { app } = createApp();

    const result = app.open(catalogEntry('ls(1)'));

    expect(result.type).toBe('loaded');
    expect(app.displayMode()).toBe('page');
    expect(app.windowTitle()).toBe('ls(1) - manview');
    expect(app.visibleLines()).toEqual({ first: 0, end: 13 });
  });

  it('keeps the history when a page fails to load', () => {
    const { app } = createApp();

    expect(app.open({ path: '/man/man1/broken.1', directory: '/man' })).toEqual({
      type: 'failed',
      message: 'boom',
    });
    expect(app.statusMessage()).toBe('boom');
    expect(app.displayMode()).toBe('catalog-search');
    expect(app.currentPage()).toBeNull();
  });

  it('opens pages by name and section', () => {
    const { app, load } = createApp();

    app.openByName('nope', null);
    expect(app.statusMessage()).toBe('No entry for nope in the manual.');
    expect(load).not.toHaveBeenCalled();

    app.openByName('tool.conf', '5');
    expect(app.windowTitle()).toBe('tool.conf(5) - manview');
    expect(app.statusMessage()).toBeNull();
  });

  it('walks back and forward and returns to catalog search from the first page', () => {
    const { app, logger } = createApp();
    app.open(catalogEntry('ls(1)'));
    app.open(catalogEntry('cat(1)'));

    app.goBack();
    expect(app.currentPage()?.name).toBe('ls');
    app.goForward();
    expect(app.currentPage()?.name).toBe('cat');

    app.goBack();
    app.goBack();
    expect(app.displayMode()).toBe('catalog-search');
    expect(app.currentPage()).toBeNull();

    app.open(catalogEntry('tool.conf(5)'));
    expect(logger.debug).toHaveBeenCalledWith('Released 2 pages from the forward history.');
    app.goForward();
    expect(app.currentPage()?.name).toBe('tool.conf');
  });

  it('scrolls with the page keys', () => {
    const { app } = createApp();
    app.open(catalogEntry('ls(1)'));

    app.handleKey(key('j'));
    expect(scrollOf(app)).toBe(40);
    app.handleKey(key('J'));
    expect(scrollOf(app)).toBe(240);
    app.handleKey(key('k'));
    expect(scrollOf(app)).toBe(200);
    app.handleKey(key('G'));
    expect(scrollOf(app)).toBe(698);
    app.handleKey(key('g'));
    app.handleKey(key('g'));
    expect(scrollOf(app)).toBe(0);
    app.handleKey(key(' '));
    expect(scrollOf(app)).toBe(186);
    app.handleKey(key(' ', { shiftKey: true }));
    expect(scrollOf(app)).toBe(0);
    app.handleKey(key('End'));
    expect(scrollOf(app)).toBe(698);
    app.handleKey(key('Home'));
    expect(scrollOf(app)).toBe(0);
  });

  it('swallows the key after a lone g', () => {
    const { app } = createApp();
    app.open(catalogEntry('ls(1)'));

    app.handleKey(key('g'));
    app.handleKey(key('j'));
    expect(scrollOf(app)).toBe(0);
    app.handleKey(key('j'));
    expect(scrollOf(app)).toBe(40);
  });

  it('raises the redraw flag only when the scroll position changes', () => {
    const { app } = createApp();
    app.open(catalogEntry('ls(1)'));
    app.consumeRedraw();

    expect(app.setScroll(0)).toBe(false);
    expect(app.consumeRedraw()).toBe(false);
    expect(app.setScroll(5000)).toBe(true);
    expect(scrollOf(app)).toBe(698);
    expect(app.consumeRedraw()).toBe(true);
  });

  it('requests quit on Ctrl-C and q', () => {
    const first = createApp().app;
    first.handleKey(key('c', { ctrlKey: true }));
    expect(first.isQuitRequested()).toBe(true);

    const second = createApp().app;
    second.open(catalogEntry('cat(1)'));
    second.handleKey(key('q'));
    expect(second.isQuitRequested()).toBe(true);
  });

  it('searches the page incrementally and restores the scroll on cancel', () => {
    const { app } = createApp();
    app.open(catalogEntry('ls(1)'));

    app.handleKey(key('/'));
    for (const character of 'far') {
      app.handleKey(key(character));
    }
    expect(app.currentPage()?.search.query).toBe('far');
    expect(scrollOf(app)).toBe(585);

    app.handleKey(key('Escape'));
    expect(scrollOf(app)).toBe(0);
    expect(app.currentPage()?.search.inputActive).toBe(false);
    expect(app.displayMode()).toBe('page');
  });

  it('steps through committed matches with n and N', () => {
    const { app } = createApp();
    app.open(catalogEntry('ls(1)'));

    app.handleKey(key('/'));
    for (const character of 'target') {
      app.handleKey(key(character));
    }
    app.handleKey(key('Enter'));
    expect(scrollOf(app)).toBe(0);
    expect(app.currentPage()?.search.matches).toHaveLength(2);
    expect(app.pageSearchStatus()).toBe('1 / 2');

    app.handleKey(key('n'));
    expect(scrollOf(app)).toBe(585);
    expect(app.pageSearchStatus()).toBe('2 / 2');
    app.handleKey(key('n'));
    expect(scrollOf(app)).toBe(57);
    app.handleKey(key('N'));
    expect(scrollOf(app)).toBe(585);

    app.handleKey(key('Enter'));
    expect(app.currentPage()?.search.visible).toBe(false);
    expect(app.pageSearchStatus()).toBeNull();
    expect(app.currentPage()?.search.query).toBe('');
  });

  it('scrolls with the wheel and the scrollbar track', () => {
    const { app } = createApp();
    app.open(catalogEntry('ls(1)'));

    app.wheel(1, 100, 100);
    expect(scrollOf(app)).toBe(40);
    app.wheel(-1, 100, 100);
    expect(scrollOf(app)).toBe(0);

    expect(app.scrollbarThumb()).toEqual({ size: 44, position: 0 });
    app.pointerDown('primary', 595, 150);
    expect(scrollOf(app)).toBe(186);
    expect(app.scrollbarThumb()).toEqual({ size: 44, position: 42 });
    app.pointerDown('primary', 595, 10);
    expect(scrollOf(app)).toBe(0);
  });

  it('drags the scrollbar thumb', () => {
    const { app } = createApp();
    app.open(catalogEntry('ls(1)'));

    app.pointerDown('primary', 595, 20);
    app.pointerMove(595, 98);
    expect(scrollOf(app)).toBe(349);

    app.pointerUp('primary', 595, 98);
    app.pointerMove(595, 300);
    expect(scrollOf(app)).toBe(349);
  });

  it('maps a thumb position onto the scroll range', () => {
    const { app } = createApp();
    app.open(catalogEntry('ls(1)'));

    expect(app.dragThumb(78)).toBe(true);
    expect(scrollOf(app)).toBe(349);
    expect(app.dragThumb(500)).toBe(true);
    expect(scrollOf(app)).toBe(698);
    expect(app.dragThumb(156)).toBe(false);
    expect(app.dragThumb(Number.NaN)).toBe(true);
    expect(scrollOf(app)).toBe(0);
  });

  it('moves a non-numeric scroll request to the top', () => {
    const { app } = createApp();
    app.open(catalogEntry('ls(1)'));

    expect(app.setScroll(1e12)).toBe(true);
    expect(scrollOf(app)).toBe(698);
    expect(app.setScroll(Number.NaN)).toBe(true);
    expect(scrollOf(app)).toBe(0);
    expect(app.setScroll(-1e12)).toBe(false);
  });

  it('opens catalog keys and falls back to file paths', () => {
    const { app, load } = createApp();

    app.openKeyOrPath('cat(1)');
    expect(load).toHaveBeenLastCalledWith({ key: 'cat(1)', path: '/man/man1/cat.1', directory: '/man' });

    app.openKeyOrPath('/man/man5/tool.conf.5');
    expect(load).toHaveBeenLastCalledWith({
      key: 'tool.conf(5)',
      path: '/man/man5/tool.conf.5',
      directory: '/man/man5',
    });
    expect(app.windowTitle()).toBe('tool.conf(5) - manview');
  });

  it('follows a link when pressed and released on it', () => {
    const { app } = createApp();
    app.open(catalogEntry('ls(1)'));
    app.consumeRedraw();

    app.pointerMove(30, 30);
    expect(app.currentPage()?.links[0].highlighted).toBe(true);
    expect(app.consumeRedraw()).toBe(true);

    app.pointerDown('primary', 30, 30);
    app.pointerUp('primary', 100, 100);
    expect(app.currentPage()?.name).toBe('ls');

    app.pointerDown('primary', 30, 30);
    app.pointerUp('primary', 31, 31);
    expect(app.currentPage()?.name).toBe('cat');

    app.pointerUp('secondary', 0, 0);
    expect(app.currentPage()?.name).toBe('ls');
  });

  it('types a catalog query and opens the selected result', () => {
    const { app } = createApp();

    for (const character of 'cax') {
      app.handleKey(key(character));
    }
    app.handleKey(key('Backspace'));
    app.handleKey(key('t'));
    expect(app.catalogSearch().query).toBe('cat');
    expect(app.catalogSearch().matches).toEqual([{ index: 0, goodness: -3 }]);

    app.handleKey(key('Enter'));
    expect(app.displayMode()).toBe('page');
    expect(app.windowTitle()).toBe('cat(1) - manview');

    app.handleKey(key('f', { ctrlKey: true }));
    expect(app.displayMode()).toBe('catalog-search');
    expect(app.windowTitle()).toBe('manview');
    app.handleKey(key('Escape'));
    expect(app.catalogSearch().query).toBe('');
  });

  it('selects and opens catalog results with the pointer', () => {
    const { app } = createApp();
    app.setCatalogQuery('l');
    expect(app.catalogSearch().matches.map((match) => match.index)).toEqual([1, 2]);

    app.pointerMove(200, 155);
    expect(app.catalogSearch().selectedIndex).toBe(1);
    app.pointerMove(10, 155);
    expect(app.catalogSearch().selectedIndex).toBe(1);

    app.pointerUp('primary', 200, 155);
    expect(app.windowTitle()).toBe('tool.conf(5) - manview');
  });

  it('clamps the scroll position on resize and fits the document width', () => {
    const { app } = createApp();
    app.open(catalogEntry('ls(1)'));
    app.handleKey(key('G'));

    app.resize(600, 400);
    expect(scrollOf(app)).toBe(498);

    app.handleKey(key('i'));
    expect(app.windowSize()).toEqual({ width: 630, height: 400 });
  });
});
