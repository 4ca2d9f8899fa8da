/**
 * Back/forward history. `slots` is an arena that never shrinks; `position` is
 * the 1-based index of the shown page, 0 when nothing is shown. A slot past
 * the position may be empty after a branch was cut off.
 */
export interface PageStackState<TPage> {
  slots: (TPage | null)[];
  position: number;
}

export interface OpenPageResult<TPage> {
  state: PageStackState<TPage>;
  released: TPage[];
}

export function createEmptyPageStack<TPage>(): PageStackState<TPage> {
  return {
    slots: [],
    position: 0,
  };
}

export function currentStackPage<TPage>(state: PageStackState<TPage>): TPage | null {
  if (state.position <= 0) {
    return null;
  }
  return state.slots[state.position - 1] ?? null;
}

export function openStackPage<TPage>(state: PageStackState<TPage>, page: TPage): OpenPageResult<TPage> {
  if (state.position >= state.slots.length) {
    return {
      state: { slots: [...state.slots, page], position: state.position + 1 },
      released: [],
    };
  }

  const released: TPage[] = [];
  const slots = state.slots.map((slot, index) => {
    if (index < state.position || slot === null) {
      return slot;
    }
    released.push(slot);
    return null;
  });
  slots[state.position] = page;

  return {
    state: { slots, position: state.position + 1 },
    released,
  };
}

export function canGoBack<TPage>(state: PageStackState<TPage>): boolean {
  return state.position > 1;
}

export function canGoForward<TPage>(state: PageStackState<TPage>): boolean {
  return state.position < state.slots.length && state.slots[state.position] != null;
}

export function stepBack<TPage>(state: PageStackState<TPage>): PageStackState<TPage> {
  if (!canGoBack(state)) {
    return state;
  }
  return { ...state, position: state.position - 1 };
}

export function stepForward<TPage>(state: PageStackState<TPage>): PageStackState<TPage> {
  if (!canGoForward(state)) {
    return state;
  }
  return { ...state, position: state.position + 1 };
}

/** Hides every page while keeping the slots; the next open starts over at slot 0. */
export function rewindPageStack<TPage>(state: PageStackState<TPage>): PageStackState<TPage> {
  return { ...state, position: 0 };
}
