import type { CursorState } from './types.js';

const INITIAL_CURSOR: CursorState = {
  maxId: null,
  offset: 0,
  emptyPageCount: 0,
};

function oldestId(messages: ReadonlyArray<{ id: string }>): bigint | null {
  let oldest: bigint | null = null;

  for (const message of messages) {
    const id = BigInt(message.id);
    if (oldest === null || id < oldest) {
      oldest = id;
    }
  }

  return oldest;
}

/** Moves the cursor strictly below `id` and clears the intra-page offset. */
function advancePast(cursor: CursorState, id: bigint): CursorState {
  return {
    ...cursor,
    maxId: id - 1n,
    offset: 0,
  };
}

function describeCursor(cursor: CursorState): string {
  const bound =
    cursor.maxId === null ? 'from newest' : `max_id=${cursor.maxId}`;
  return `${bound}, offset=${cursor.offset}`;
}

export { INITIAL_CURSOR, oldestId, advancePast, describeCursor };
