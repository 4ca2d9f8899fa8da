import { translateRect, type Rect } from '../domain';
import type { LayoutMetrics } from './layout-metrics';

export interface ViewportGeometry {
  viewportHeight: number;
  documentHeight: number;
}

export interface ScrollbarThumb {
  size: number;
  position: number;
}

export interface LineRange {
  first: number;
  /** Exclusive. */
  end: number;
}

export function maxScrollPosition(geometry: ViewportGeometry): number {
  return Math.max(geometry.documentHeight - geometry.viewportHeight, 0);
}

/** `NaN` clamps to the top. */
export function clampScrollPosition(position: number, geometry: ViewportGeometry): number {
  const whole = Number.isNaN(position) ? 0 : Math.trunc(position);
  return Math.min(Math.max(whole, 0), maxScrollPosition(geometry));
}

export function scrollbarThumbSize(geometry: ViewportGeometry, minThumbSize: number): number {
  const { viewportHeight, documentHeight } = geometry;
  const proportional = Math.trunc((viewportHeight / (documentHeight - 1)) * viewportHeight);
  return Math.min(Math.max(proportional, minThumbSize), viewportHeight);
}

export function scrollbarThumb(
  scrollPosition: number,
  geometry: ViewportGeometry,
  minThumbSize: number
): ScrollbarThumb {
  const size = scrollbarThumbSize(geometry, minThumbSize);
  const scrollRange = geometry.documentHeight - geometry.viewportHeight;
  if (scrollRange <= 0) {
    return { size, position: 0 };
  }
  return {
    size,
    position: Math.round((scrollPosition / scrollRange) * (geometry.viewportHeight - size)),
  };
}

/** Inverse of the thumb position mapping, truncated toward zero. */
export function thumbPositionToScrollPosition(
  thumbPosition: number,
  geometry: ViewportGeometry,
  minThumbSize: number
): number {
  const size = scrollbarThumbSize(geometry, minThumbSize);
  const track = geometry.viewportHeight - size;
  if (track === 0) {
    return 0;
  }
  return Math.trunc((thumbPosition / track) * (geometry.documentHeight - geometry.viewportHeight));
}

export function clampThumbPosition(
  thumbPosition: number,
  geometry: ViewportGeometry,
  minThumbSize: number
): number {
  const track = geometry.viewportHeight - scrollbarThumbSize(geometry, minThumbSize);
  const position = Number.isNaN(thumbPosition) ? 0 : thumbPosition;
  return Math.min(Math.max(position, 0), Math.max(track, 0));
}

export function toScrollSpace(rect: Rect, documentMargin: number): Rect {
  return translateRect(rect, documentMargin, documentMargin);
}

/**
 * Picks a scroll position showing `rect` (already in scroll space) with
 * `margin` pixels above or below it, or `preferred` when it is already visible
 * from there.
 */
export function scrollIntoView(input: {
  rect: Rect;
  preferred: number;
  margin: number;
  geometry: ViewportGeometry;
}): number {
  const { rect, preferred, margin, geometry } = input;
  if (rect.y - margin < preferred) {
    return clampScrollPosition(rect.y - margin, geometry);
  }
  if (rect.y2 + margin > preferred + geometry.viewportHeight) {
    return clampScrollPosition(rect.y2 - geometry.viewportHeight + margin, geometry);
  }
  return preferred;
}

export function scrollMargin(metrics: Pick<LayoutMetrics, 'lineAdvance'>, marginLines: number): number {
  return marginLines * metrics.lineAdvance;
}

export function pageStep(viewportHeight: number, metrics: Pick<LayoutMetrics, 'lineAdvance'>): number {
  return viewportHeight - metrics.lineAdvance;
}

/** Lines intersecting the viewport, clipped to the document. */
export function visibleLineRange(input: {
  scrollPosition: number;
  viewportHeight: number;
  lineCount: number;
  metrics: Pick<LayoutMetrics, 'lineAdvance' | 'documentMargin'>;
}): LineRange {
  const { scrollPosition, viewportHeight, lineCount, metrics } = input;
  if (lineCount === 0 || metrics.lineAdvance <= 0) {
    return { first: 0, end: 0 };
  }
  const top = scrollPosition - metrics.documentMargin;
  const first = Math.min(Math.max(Math.floor(top / metrics.lineAdvance), 0), lineCount);
  const end = Math.min(
    Math.max(Math.ceil((top + viewportHeight) / metrics.lineAdvance), first),
    lineCount
  );
  return { first, end };
}
