import type { CatalogEntry, DocumentContent, Link } from '../domain';
import type { LayoutMetrics } from './layout-metrics';

export const LINK_SCAN_LIMIT = 2047;

export type LinkMetrics = Pick<LayoutMetrics, 'characterAdvance' | 'lineAdvance' | 'lineHeight'>;

export type CatalogLookup = (key: string) => CatalogEntry | null;

const SEPARATORS = new Set([' ', ',', '\t', '\r', '\n']);
const NON_STARTERS = new Set(['(', ')', '|']);

/**
 * Finds `name(section)` references in one decoded line. Misses are skipped
 * silently.
 */
export function findLinksInLine(
  text: string,
  lineIndex: number,
  lookup: CatalogLookup,
  metrics: LinkMetrics
): Link[] {
  const links: Link[] = [];
  let word = '';
  let openParen = false;

  for (let index = 0; index < text.length; index += 1) {
    const character = text[index];
    if (SEPARATORS.has(character)) {
      word = '';
      openParen = false;
      continue;
    }
    if (word.length === 0 && NON_STARTERS.has(character)) {
      openParen = false;
      continue;
    }

    word += character;
    if (character === '(') {
      openParen = true;
    } else if (character === ')' && openParen) {
      const target = lookup(word);
      if (target) {
        const x = (index + 1 - word.length) * metrics.characterAdvance;
        const y = lineIndex * metrics.lineAdvance;
        links.push({
          rect: {
            x,
            y,
            x2: x + word.length * metrics.characterAdvance,
            y2: y + metrics.lineHeight,
          },
          highlighted: false,
          target,
        });
      }
      word = '';
      openParen = false;
    }
  }

  return links;
}

export function findLinks(content: DocumentContent, lookup: CatalogLookup, metrics: LinkMetrics): Link[] {
  const links: Link[] = [];
  content.lines.forEach((line, lineIndex) => {
    links.push(...findLinksInLine(line.plainText(LINK_SCAN_LIMIT), lineIndex, lookup, metrics));
  });
  return links;
}
