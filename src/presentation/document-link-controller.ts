import { insideRect, sameRect, translateRect, type CatalogEntry, type Link, type Rect } from '../domain';

export interface LinkViewport {
  documentMargin: number;
  scrollPosition: number;
}

export function linkWindowRect(link: Link, view: LinkViewport): Rect {
  return translateRect(link.rect, view.documentMargin, view.documentMargin - view.scrollPosition);
}

export function linkUnderPointer(
  links: readonly Link[],
  x: number,
  y: number,
  view: LinkViewport
): Link | null {
  return links.find((link) => insideRect(linkWindowRect(link, view), x, y)) ?? null;
}

/** Follows a link when press and release land on the same one. */
export class DocumentLinkController {
  private pressed: Link | null = null;

  /** Highlights the link under the pointer; returns true when any flag changed. */
  hover(links: readonly Link[], x: number, y: number, view: LinkViewport): boolean {
    let changed = false;
    for (const link of links) {
      const inside = insideRect(linkWindowRect(link, view), x, y);
      if (inside !== link.highlighted) {
        link.highlighted = inside;
        changed = true;
      }
    }
    return changed;
  }

  press(links: readonly Link[], x: number, y: number, view: LinkViewport): boolean {
    this.pressed = linkUnderPointer(links, x, y, view);
    return this.pressed !== null;
  }

  release(links: readonly Link[], x: number, y: number, view: LinkViewport): CatalogEntry | null {
    const pressed = this.pressed;
    this.pressed = null;
    if (!pressed) {
      return null;
    }

    const released = linkUnderPointer(links, x, y, view);
    if (!released || !sameRect(released.rect, pressed.rect) || released.target.path !== pressed.target.path) {
      return null;
    }
    return released.target;
  }

  reset(): void {
    this.pressed = null;
  }
}
