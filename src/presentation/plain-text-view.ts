import type { Catalog } from '../application/catalog';
import { visibleResults, type CatalogSearchState } from '../application/catalog-search';
import type { Line, ManPage, RunStyle, StyledRun } from '../domain';

export interface TextRenderOptions {
  /** Emit terminal escape sequences for bold, italic and dim runs. */
  styled: boolean;
}

const STYLE_ESCAPES: Record<Exclude<RunStyle, 'plain'>, readonly [string, string]> = {
  bold: ['\u001b[1m', '\u001b[22m'],
  italic: ['\u001b[4m', '\u001b[24m'],
  dim: ['\u001b[2m', '\u001b[22m'],
};

export function lineRuns(line: Line): StyledRun[] {
  return line.spans.flatMap((span) => span.runs());
}

export function renderStyledRun(run: StyledRun): string {
  if (run.style === 'plain') {
    return run.text;
  }
  const [open, close] = STYLE_ESCAPES[run.style];
  return `${open}${run.text}${close}`;
}

export function renderLineText(line: Line, options: TextRenderOptions): string {
  if (!options.styled) {
    return line.plainText();
  }
  return lineRuns(line).map(renderStyledRun).join('');
}

export function renderPageText(page: Pick<ManPage, 'content'>, options: TextRenderOptions): string {
  return page.content.lines.map((line) => renderLineText(line, options)).join('\n');
}

export function renderCatalogResults(state: CatalogSearchState, catalog: Catalog): string[] {
  return visibleResults(state, catalog).map((result) => `${result.selected ? '>' : ' '} ${result.name}`);
}
