import type { ViewerSettings } from './settings';

/** Measurements of the active font, in pixels. */
export interface FontMetrics {
  characterAdvance: number;
  characterWidth: number;
  characterHeight: number;
  lineHeight: number;
}

export interface LayoutMetrics {
  characterAdvance: number;
  lineHeight: number;
  lineAdvance: number;
  documentMargin: number;
  scrollAmount: number;
  guiPadding: number;
  searchWidth: number;
  scrollbarWidth: number;
  thumbMinSize: number;
}

export const DOCUMENT_COLUMNS = 78;

// The builtin bitmap font: 7px advance on a 14px line, glyph box 6x9.
export const BUILTIN_FONT_METRICS: FontMetrics = {
  characterAdvance: 7,
  characterWidth: 6,
  characterHeight: 9,
  lineHeight: 14,
};

// Base sizes at the builtin font's 6x9 glyph box.
const BASE_DIMENSIONS = {
  scrollbarWidth: 12,
  thumbMinSize: 20,
  documentMargin: 29,
  searchWidth: 300,
  scrollAmount: 40,
  guiPadding: 9,
};

export function deriveLayoutMetrics(
  font: FontMetrics,
  settings: Pick<ViewerSettings, 'lineSpacing' | 'guiScale'>
): LayoutMetrics {
  const verticalScale = font.characterHeight / 9;
  const horizontalScale = font.characterWidth / 6;

  return {
    characterAdvance: font.characterAdvance,
    lineHeight: font.lineHeight,
    lineAdvance: Math.trunc(settings.lineSpacing * font.lineHeight),
    documentMargin: Math.trunc(verticalScale * BASE_DIMENSIONS.documentMargin),
    scrollAmount: Math.trunc(verticalScale * BASE_DIMENSIONS.scrollAmount),
    guiPadding: Math.trunc(verticalScale * BASE_DIMENSIONS.guiPadding),
    searchWidth: Math.trunc(horizontalScale * BASE_DIMENSIONS.searchWidth),
    scrollbarWidth: Math.trunc(settings.guiScale * BASE_DIMENSIONS.scrollbarWidth),
    thumbMinSize: Math.trunc(settings.guiScale * BASE_DIMENSIONS.thumbMinSize),
  };
}

export function documentHeight(
  lineCount: number,
  metrics: Pick<LayoutMetrics, 'lineAdvance' | 'documentMargin'>
): number {
  return lineCount * metrics.lineAdvance + 2 * metrics.documentMargin;
}

export function documentWidth(metrics: Pick<LayoutMetrics, 'documentMargin' | 'characterAdvance'>): number {
  return 2 * metrics.documentMargin + (DOCUMENT_COLUMNS + 2) * metrics.characterAdvance;
}

export function fittingWindowSize(
  rows: number,
  metrics: LayoutMetrics
): { width: number; height: number } {
  return {
    width: documentWidth(metrics) + metrics.scrollbarWidth,
    height: rows * metrics.lineAdvance,
  };
}
