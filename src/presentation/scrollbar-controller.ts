import {
  clampThumbPosition,
  scrollbarThumb,
  thumbPositionToScrollPosition,
  type ScrollbarThumb,
  type ViewportGeometry,
} from '../application/viewport';

export interface ScrollbarLayout {
  windowWidth: number;
  geometry: ViewportGeometry;
  scrollbarWidth: number;
  thumbMinSize: number;
  scrollPosition: number;
}

export type ScrollbarPress =
  | { type: 'drag-start' }
  | { type: 'page'; pages: 1 | -1 }
  | { type: 'outside' };

interface DragAnchor {
  pointerY: number;
  thumbPosition: number;
}

export function currentThumb(layout: ScrollbarLayout): ScrollbarThumb {
  return scrollbarThumb(layout.scrollPosition, layout.geometry, layout.thumbMinSize);
}

export class ScrollbarController {
  private drag: DragAnchor | null = null;
  private hovered = false;

  isDragging(): boolean {
    return this.drag !== null;
  }

  isThumbHovered(): boolean {
    return this.hovered;
  }

  press(x: number, y: number, layout: ScrollbarLayout): ScrollbarPress {
    const thumb = currentThumb(layout);
    if (this.hitsThumb(x, y, layout, thumb)) {
      this.drag = { pointerY: y, thumbPosition: thumb.position };
      return { type: 'drag-start' };
    }
    if (x >= layout.windowWidth - layout.scrollbarWidth) {
      if (y < thumb.position) {
        return { type: 'page', pages: -1 };
      }
      if (y >= thumb.position + thumb.size) {
        return { type: 'page', pages: 1 };
      }
    }
    return { type: 'outside' };
  }

  /** The scroll position for the pointer at `y`, or null when not dragging. */
  dragTo(y: number, layout: ScrollbarLayout): number | null {
    if (!this.drag) {
      return null;
    }
    const thumbPosition = clampThumbPosition(
      this.drag.thumbPosition + y - this.drag.pointerY,
      layout.geometry,
      layout.thumbMinSize
    );
    return thumbPositionToScrollPosition(thumbPosition, layout.geometry, layout.thumbMinSize);
  }

  release(): void {
    this.drag = null;
  }

  /** Returns true when the hover state changed. */
  hover(x: number, y: number, layout: ScrollbarLayout): boolean {
    const hovered = this.hitsThumb(x, y, layout, currentThumb(layout));
    if (hovered === this.hovered) {
      return false;
    }
    this.hovered = hovered;
    return true;
  }

  private hitsThumb(x: number, y: number, layout: ScrollbarLayout, thumb: ScrollbarThumb): boolean {
    return (
      x > layout.windowWidth - layout.scrollbarWidth &&
      y >= thumb.position &&
      y < thumb.position + thumb.size
    );
  }
}
