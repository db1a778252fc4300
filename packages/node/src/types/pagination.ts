/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { p } where p is the
 * last position returned. List endpoints read `limit + 1` items after
 * that position from the store and return
 * { data, pagination: { cursor, hasMore } }.
 */

// =============================================================================
// Types
// =============================================================================

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

export function encodeCursor(position: number): string {
  return Buffer.from(JSON.stringify({ p: position })).toString("base64url");
}

/**
 * Decode a cursor into the last seen position.
 *
 * @returns The position, or undefined if the cursor is malformed.
 */
export function decodeCursor(cursor: string): number | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null || !("p" in data)) {
    return undefined;
  }
  const { p } = data;
  return typeof p === "number" && Number.isSafeInteger(p) && p >= 0 ? p : undefined;
}

/** The position a page starts after. Absent or malformed cursors start at 0. */
export function startAfter(cursor: string | undefined): number {
  return cursor === undefined ? 0 : decodeCursor(cursor) ?? 0;
}

/**
 * Build a page from at most `limit + 1` items read after the cursor
 * position; the extra item only signals that more remain.
 */
export function toPage<T>(
  fetched: readonly T[],
  limit: number,
  positionOf: (item: T) => number,
): PaginatedResponse<T> {
  const hasMore = fetched.length > limit;
  const data = hasMore ? fetched.slice(0, limit) : fetched;

  const last = data[data.length - 1];
  const cursor = hasMore && last !== undefined ? encodeCursor(positionOf(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
