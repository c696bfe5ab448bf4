import type { Direction, PaginationState } from "../shared/record.js";

export const FIRST_PAGE = 1;

export type PaginationCursor = {
  nextPageToken: (direction: Direction) => number;
  advance: (direction: Direction, token: number) => void;
  markExhausted: (direction: Direction) => void;
  isExhausted: (direction: Direction) => boolean;
  snapshot: (direction: Direction) => PaginationState;
};

// "older" starts past page 1 and only moves forward; "newer" always restarts at page 1.
export const createPaginationCursor = (): PaginationCursor => {
  const states: Record<Direction, PaginationState> = {
    newer: { direction: "newer", cursor: FIRST_PAGE - 1, exhausted: false },
    older: { direction: "older", cursor: FIRST_PAGE, exhausted: false }
  };

  const nextPageToken = (direction: Direction) =>
    direction === "newer" ? FIRST_PAGE : states.older.cursor + 1;

  // A token at or behind the older cursor was already covered by a concurrent call.
  const advance = (direction: Direction, token: number) => {
    const state = states[direction];
    if (direction === "newer") {
      state.cursor = token;
      return;
    }
    if (token <= state.cursor) return;
    const expected = state.cursor + 1;
    if (token !== expected) {
      throw new RangeError(`Cannot advance ${direction} cursor to page ${token}; next page is ${expected}`);
    }
    state.cursor = token;
  };

  const markExhausted = (direction: Direction) => {
    if (direction === "newer") {
      throw new RangeError("The newer direction has no end");
    }
    states[direction].exhausted = true;
  };

  return {
    nextPageToken,
    advance,
    markExhausted,
    isExhausted: (direction) => states[direction].exhausted,
    snapshot: (direction) => ({ ...states[direction] })
  };
};
