import {
  asciiLowercase,
  containsUppercase,
  type DocumentContent,
  type PageSearchState,
  type SearchMatch,
} from '../domain';
import type { LayoutMetrics } from './layout-metrics';
import { LINK_SCAN_LIMIT } from './link-resolver';
import {
  clampScrollPosition,
  scrollIntoView,
  scrollMargin,
  toScrollSpace,
  type ViewportGeometry,
} from './viewport';

export const QUERY_LENGTH_LIMIT = 254;

export type SearchMetrics = Pick<
  LayoutMetrics,
  'characterAdvance' | 'lineAdvance' | 'lineHeight' | 'documentMargin'
>;

export interface PageSearchEnvironment {
  content: DocumentContent;
  metrics: SearchMetrics;
  geometry: ViewportGeometry;
  matchLimit: number;
  scrollMarginLines: number;
}

/** A search state together with the scroll position it asks for. */
export interface PageSearchStep {
  search: PageSearchState;
  scrollPosition: number;
}

export interface PageMatches {
  matches: SearchMatch[];
  currentIndex: number;
}

/**
 * Non-overlapping, left-to-right matches of `query` in every decoded line,
 * stopping at `limit`. Lowercase queries ignore ASCII case.
 */
export function findPageMatches(input: {
  content: DocumentContent;
  query: string;
  metrics: SearchMetrics;
  limit: number;
  startScrollPosition: number;
}): PageMatches {
  const { content, query, metrics, limit, startScrollPosition } = input;
  const matches: SearchMatch[] = [];
  let currentIndex: number | null = null;
  if (!query || limit <= 0) {
    return { matches, currentIndex: 0 };
  }

  const ignoreCase = !containsUppercase(query);
  const needle = ignoreCase ? asciiLowercase(query) : query;

  for (let lineIndex = 0; lineIndex < content.lineCount && matches.length < limit; lineIndex += 1) {
    const decoded = content.lines[lineIndex].plainText(LINK_SCAN_LIMIT);
    const haystack = ignoreCase ? asciiLowercase(decoded) : decoded;

    let column = haystack.indexOf(needle);
    while (column >= 0 && matches.length < limit) {
      const x = column * metrics.characterAdvance;
      const y = lineIndex * metrics.lineAdvance;
      const match = {
        rect: { x, y, x2: x + needle.length * metrics.characterAdvance, y2: y + metrics.lineHeight },
      };
      if (currentIndex === null && y + metrics.documentMargin >= startScrollPosition) {
        currentIndex = matches.length;
      }
      matches.push(match);
      column = haystack.indexOf(needle, column + needle.length);
    }
  }

  return { matches, currentIndex: currentIndex ?? 0 };
}

export function beginPageSearch(scrollPosition: number): PageSearchState {
  return {
    query: '',
    inputActive: true,
    visible: true,
    matches: [],
    currentIndex: 0,
    startScrollPosition: scrollPosition,
  };
}

/** Replaces the query, recomputes matches and brings the current one into view. */
export function setPageSearchQuery(
  search: PageSearchState,
  query: string,
  scrollPosition: number,
  env: PageSearchEnvironment
): PageSearchStep {
  const capped = query.slice(0, QUERY_LENGTH_LIMIT);
  const { matches, currentIndex } = findPageMatches({
    content: env.content,
    query: capped,
    metrics: env.metrics,
    limit: env.matchLimit,
    startScrollPosition: search.startScrollPosition,
  });
  const next = { ...search, query: capped, matches, currentIndex };

  return {
    search: next,
    scrollPosition: revealCurrentMatch(next, search.startScrollPosition, scrollPosition, env),
  };
}

export function appendPageSearchCharacter(
  search: PageSearchState,
  character: string,
  scrollPosition: number,
  env: PageSearchEnvironment
): PageSearchStep {
  if (search.query.length >= QUERY_LENGTH_LIMIT) {
    return { search, scrollPosition };
  }
  return setPageSearchQuery(search, search.query + character, scrollPosition, env);
}

export function deletePageSearchCharacter(
  search: PageSearchState,
  scrollPosition: number,
  env: PageSearchEnvironment
): PageSearchStep {
  if (!search.query) {
    return { search, scrollPosition };
  }
  return setPageSearchQuery(search, search.query.slice(0, -1), scrollPosition, env);
}

export function cancelPageSearchInput(
  search: PageSearchState,
  geometry: ViewportGeometry
): PageSearchStep {
  return {
    search: { ...search, inputActive: false },
    scrollPosition: clampScrollPosition(search.startScrollPosition, geometry),
  };
}

export function commitPageSearchInput(search: PageSearchState): PageSearchState {
  return { ...search, inputActive: false };
}

export function clearPageSearch(search: PageSearchState): PageSearchState {
  return {
    ...search,
    query: '',
    inputActive: false,
    visible: false,
    matches: [],
    currentIndex: 0,
  };
}

export function stepPageSearchMatch(
  search: PageSearchState,
  direction: 'next' | 'previous',
  scrollPosition: number,
  env: PageSearchEnvironment
): PageSearchStep {
  const count = search.matches.length;
  if (!search.visible || count === 0) {
    return { search, scrollPosition };
  }

  const currentIndex =
    direction === 'next'
      ? (search.currentIndex + 1) % count
      : (search.currentIndex - 1 + count) % count;
  const next = { ...search, currentIndex };

  return {
    search: next,
    scrollPosition: revealCurrentMatch(next, scrollPosition, scrollPosition, env),
  };
}

export function pageSearchStatusLabel(search: PageSearchState): string {
  if (search.matches.length === 0) {
    return '0 / 0';
  }
  return `${search.currentIndex + 1} / ${search.matches.length}`;
}

function revealCurrentMatch(
  search: PageSearchState,
  preferred: number,
  scrollPosition: number,
  env: PageSearchEnvironment
): number {
  const match = search.matches[search.currentIndex];
  if (!match) {
    return scrollPosition;
  }
  return scrollIntoView({
    rect: toScrollSpace(match.rect, env.metrics.documentMargin),
    preferred,
    margin: scrollMargin(env.metrics, env.scrollMarginLines),
    geometry: env.geometry,
  });
}
