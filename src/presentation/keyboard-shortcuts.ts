export interface KeyboardShortcutInput {
  key: string;
  ctrlKey: boolean;
  shiftKey: boolean;
}

export type PageIntent =
  | { type: 'none' }
  | { type: 'quit' }
  | { type: 'go-back' }
  | { type: 'go-forward' }
  | { type: 'open-catalog-search' }
  | { type: 'begin-page-search' }
  | { type: 'clear-page-search' }
  | { type: 'next-match' }
  | { type: 'previous-match' }
  | { type: 'scroll-steps'; steps: number }
  | { type: 'scroll-pages'; pages: 1 | -1 }
  | { type: 'scroll-to-top' }
  | { type: 'scroll-to-bottom' }
  | { type: 'fit-window-width' };

export type PageSearchInputIntent =
  | { type: 'none' }
  | { type: 'cancel' }
  | { type: 'commit' }
  | { type: 'delete-character' }
  | { type: 'append-character'; character: string };

export type CatalogSearchIntent =
  | { type: 'none' }
  | { type: 'quit' }
  | { type: 'open-selected' }
  | { type: 'delete-character' }
  | { type: 'clear-query' }
  | { type: 'select-previous' }
  | { type: 'select-next' }
  | { type: 'append-character'; character: string };

export interface PageKeyResolution {
  intent: PageIntent;
  /** Whether a lone `g` is waiting for its partner. */
  gPending: boolean;
}

const LARGE_STEP = 5;

/** `gg` goes to the top; any other key after a lone `g` is swallowed. */
export function resolvePageKeyIntent(input: KeyboardShortcutInput, gPending: boolean): PageKeyResolution {
  if (!input.ctrlKey && input.key === 'g') {
    return gPending
      ? { intent: { type: 'scroll-to-top' }, gPending: false }
      : { intent: { type: 'none' }, gPending: true };
  }
  if (gPending) {
    return { intent: { type: 'none' }, gPending: false };
  }
  return { intent: pageIntent(input), gPending: false };
}

function pageIntent(input: KeyboardShortcutInput): PageIntent {
  if (input.ctrlKey) {
    const key = input.key.toLowerCase();
    if (key === 'c' || key === 'd') {
      return { type: 'quit' };
    }
    if (key === 'f') {
      return { type: 'open-catalog-search' };
    }
    return { type: 'none' };
  }

  switch (input.key) {
    case 'q':
    case 'Q':
      return { type: 'quit' };
    case 'b':
    case 'Escape':
      return { type: 'go-back' };
    case 'f':
      return { type: 'go-forward' };
    case '/':
      return { type: 'begin-page-search' };
    case 'Enter':
      return { type: 'clear-page-search' };
    case 'n':
      return { type: 'next-match' };
    case 'N':
      return { type: 'previous-match' };
    case 'i':
    case 'o':
      return { type: 'fit-window-width' };
    case 'j':
    case 'ArrowDown':
      return { type: 'scroll-steps', steps: 1 };
    case 'k':
    case 'ArrowUp':
      return { type: 'scroll-steps', steps: -1 };
    case 'J':
      return { type: 'scroll-steps', steps: LARGE_STEP };
    case 'K':
      return { type: 'scroll-steps', steps: -LARGE_STEP };
    case ' ':
      return { type: 'scroll-pages', pages: input.shiftKey ? -1 : 1 };
    case 'PageDown':
      return { type: 'scroll-pages', pages: 1 };
    case 'PageUp':
      return { type: 'scroll-pages', pages: -1 };
    case 'G':
    case 'End':
      return { type: 'scroll-to-bottom' };
    case 'Home':
      return { type: 'scroll-to-top' };
    default:
      return { type: 'none' };
  }
}

export function resolvePageSearchInputIntent(input: KeyboardShortcutInput): PageSearchInputIntent {
  if (input.ctrlKey) {
    const key = input.key.toLowerCase();
    return key === 'c' || key === 'd' ? { type: 'cancel' } : { type: 'none' };
  }
  if (input.key === 'Escape') {
    return { type: 'cancel' };
  }
  if (input.key === 'Enter') {
    return { type: 'commit' };
  }
  if (input.key === 'Backspace') {
    return { type: 'delete-character' };
  }
  return isPrintable(input.key) ? { type: 'append-character', character: input.key } : { type: 'none' };
}

export function resolveCatalogSearchIntent(input: KeyboardShortcutInput): CatalogSearchIntent {
  if (input.ctrlKey) {
    const key = input.key.toLowerCase();
    return key === 'c' || key === 'd' ? { type: 'quit' } : { type: 'none' };
  }

  switch (input.key) {
    case 'Enter':
      return { type: 'open-selected' };
    case 'Backspace':
      return { type: 'delete-character' };
    case 'Escape':
      return { type: 'clear-query' };
    case 'ArrowUp':
      return { type: 'select-previous' };
    case 'ArrowDown':
      return { type: 'select-next' };
    default:
      return isPrintable(input.key)
        ? { type: 'append-character', character: input.key }
        : { type: 'none' };
  }
}

function isPrintable(key: string): boolean {
  return [...key].length === 1 && key >= ' ';
}
