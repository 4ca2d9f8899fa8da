import type { DocumentContent } from './document-content';
import type { Rect } from './geometry';

export interface CatalogEntry {
  key: string;
  path: string;
  directory: string;
}

export interface Link {
  rect: Rect;
  highlighted: boolean;
  target: CatalogEntry;
}

export interface SearchMatch {
  rect: Rect;
}

export interface PageSearchState {
  query: string;
  inputActive: boolean;
  visible: boolean;
  matches: SearchMatch[];
  currentIndex: number;
  startScrollPosition: number;
}

export interface ManPage {
  name: string;
  section: string;
  path: string;
  directory: string;
  content: DocumentContent;
  scrollPosition: number;
  links: Link[];
  search: PageSearchState;
}

export function createEmptyPageSearchState(): PageSearchState {
  return {
    query: '',
    inputActive: false,
    visible: false,
    matches: [],
    currentIndex: 0,
    startScrollPosition: 0,
  };
}

export function manPageTitle(page: Pick<ManPage, 'name' | 'section' | 'path'>, appName: string): string {
  if (page.name) {
    return `${page.name}(${page.section}) - ${appName}`;
  }
  return `${page.path} - ${appName}`;
}
