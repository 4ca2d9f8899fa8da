import type { LayoutMetrics } from '../application/layout-metrics';

export const RESULTS_TOP = 100;

export type ResultsMetrics = Pick<LayoutMetrics, 'lineHeight' | 'guiPadding' | 'searchWidth'>;

export function resultRowHeight(metrics: Pick<LayoutMetrics, 'lineHeight'>): number {
  return Math.trunc((metrics.lineHeight * 3) / 2);
}

/** Row of the catalog result list under the pointer, or -1. */
export function catalogResultRowAt(
  x: number,
  y: number,
  input: { windowWidth: number; metrics: ResultsMetrics; rows: number }
): number {
  const { windowWidth, metrics, rows } = input;
  const rowHeight = resultRowHeight(metrics);
  const firstRowTop = RESULTS_TOP + rowHeight + metrics.guiPadding;
  const left = Math.trunc(windowWidth / 2) - Math.trunc(metrics.searchWidth / 2);
  if (x < left || x >= left + metrics.searchWidth || y < firstRowTop) {
    return -1;
  }

  const row = Math.floor((y - firstRowTop) / rowHeight);
  return row < rows ? row : -1;
}
