import { asciiLowercase, containsUppercase, type CatalogEntry } from '../domain';
import { lookupCatalogKey, type Catalog } from './catalog';

export const CATALOG_RESULT_ROWS = 12;

export interface MatchEntry {
  /** Index into `Catalog.names`. */
  index: number;
  goodness: number;
}

export interface CatalogSearchState {
  query: string;
  matches: MatchEntry[];
  selectedIndex: number;
  viewOffset: number;
}

export interface CatalogSearchOptions {
  resultLimit: number;
  positionPenalty: number;
}

export function createEmptyCatalogSearchState(): CatalogSearchState {
  return {
    query: '',
    matches: [],
    selectedIndex: 0,
    viewOffset: 0,
  };
}

/**
 * Inserts after every entry with equal or better goodness. Entries pushed past
 * `capacity` are dropped.
 */
export function insertMatch(matches: MatchEntry[], entry: MatchEntry, capacity: number): void {
  let low = 0;
  let high = matches.length;
  while (low < high) {
    const middle = (low + high) >> 1;
    if (matches[middle].goodness >= entry.goodness) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }

  if (low >= capacity) {
    return;
  }
  matches.splice(low, 0, entry);
  if (matches.length > capacity) {
    matches.length = capacity;
  }
}

/** Ranks catalog names containing `query`; earlier and tighter matches first. */
export function searchCatalog(catalog: Catalog, query: string, options: CatalogSearchOptions): MatchEntry[] {
  const matches: MatchEntry[] = [];
  if (!query) {
    return matches;
  }

  const ignoreCase = !containsUppercase(query);
  const names = ignoreCase ? catalog.lowercaseNames : catalog.names;
  const needle = ignoreCase ? asciiLowercase(query) : query;

  names.forEach((name, index) => {
    const position = name.indexOf(needle);
    if (position < 0) {
      return;
    }
    const goodness = 0 - position * options.positionPenalty - (name.length - needle.length);
    insertMatch(matches, { index, goodness }, options.resultLimit);
  });

  return matches;
}

export function setCatalogQuery(
  query: string,
  catalog: Catalog,
  options: CatalogSearchOptions
): CatalogSearchState {
  return {
    query,
    matches: searchCatalog(catalog, query, options),
    selectedIndex: 0,
    viewOffset: 0,
  };
}

export function appendCatalogQueryCharacter(
  state: CatalogSearchState,
  character: string,
  catalog: Catalog,
  options: CatalogSearchOptions
): CatalogSearchState {
  return setCatalogQuery(state.query + character, catalog, options);
}

export function deleteCatalogQueryCharacter(
  state: CatalogSearchState,
  catalog: Catalog,
  options: CatalogSearchOptions
): CatalogSearchState {
  if (!state.query) {
    return state;
  }
  return setCatalogQuery(state.query.slice(0, -1), catalog, options);
}

export function clearCatalogQuery(
  state: CatalogSearchState,
  catalog: Catalog,
  options: CatalogSearchOptions
): CatalogSearchState {
  if (!state.query) {
    return state;
  }
  return setCatalogQuery('', catalog, options);
}

export function selectPreviousResult(state: CatalogSearchState): CatalogSearchState {
  if (state.selectedIndex <= 0) {
    return state;
  }
  const selectedIndex = state.selectedIndex - 1;
  return {
    ...state,
    selectedIndex,
    viewOffset: Math.min(state.viewOffset, selectedIndex),
  };
}

export function selectNextResult(
  state: CatalogSearchState,
  visibleRows = CATALOG_RESULT_ROWS
): CatalogSearchState {
  if (state.selectedIndex >= state.matches.length - 1) {
    return state;
  }
  const selectedIndex = state.selectedIndex + 1;
  const lastVisible = state.viewOffset + visibleRows - 1;
  return {
    ...state,
    selectedIndex,
    viewOffset: selectedIndex > lastVisible ? selectedIndex - visibleRows + 1 : state.viewOffset,
  };
}

/**
 * Moves the view by one row while the pointer rests on `hoveredRow`; the
 * selection follows the row under the pointer.
 */
export function scrollResults(
  state: CatalogSearchState,
  direction: -1 | 1,
  hoveredRow: number,
  visibleRows = CATALOG_RESULT_ROWS
): CatalogSearchState {
  const canMove =
    direction < 0 ? state.viewOffset > 0 : state.viewOffset < state.matches.length - visibleRows;
  if (!canMove) {
    return state;
  }

  const viewOffset = state.viewOffset + direction;
  const hovered = hoveredRow + viewOffset;
  return {
    ...state,
    viewOffset,
    selectedIndex: hovered < state.matches.length ? hovered : state.selectedIndex,
  };
}

export function hoverResult(state: CatalogSearchState, row: number): CatalogSearchState {
  const index = row + state.viewOffset;
  if (row < 0 || index >= state.matches.length || index === state.selectedIndex) {
    return state;
  }
  return { ...state, selectedIndex: index };
}

export function visibleResults(
  state: CatalogSearchState,
  catalog: Catalog,
  visibleRows = CATALOG_RESULT_ROWS
): Array<{ row: number; name: string; selected: boolean }> {
  return state.matches.slice(state.viewOffset, state.viewOffset + visibleRows).map((match, row) => ({
    row,
    name: catalog.names[match.index],
    selected: row + state.viewOffset === state.selectedIndex,
  }));
}

export function resultEntry(catalog: Catalog, match: MatchEntry | undefined): CatalogEntry | null {
  if (!match) {
    return null;
  }
  const name = catalog.names[match.index];
  return name === undefined ? null : lookupCatalogKey(catalog, name);
}

export function selectedEntry(state: CatalogSearchState, catalog: Catalog): CatalogEntry | null {
  if (state.selectedIndex >= state.matches.length) {
    return null;
  }
  return resultEntry(catalog, state.matches[state.selectedIndex]);
}
