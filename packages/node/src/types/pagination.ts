/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { f: field, v: value }.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 */

import { RequestError } from "./error.js";

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

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

export function encodeCursor(field: string, value: string): string {
  return Buffer.from(JSON.stringify({ f: field, v: value })).toString("base64url");
}

/**
 * Decode a cursor into field name and last seen value.
 *
 * @returns Decoded cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(
  cursor: string,
): { field: string; value: string } | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (
    typeof data === "object" &&
    data !== null &&
    "f" in data &&
    "v" in data &&
    typeof data.f === "string" &&
    typeof data.v === "string"
  ) {
    return { field: data.f, value: data.v };
  }
  return undefined;
}

/**
 * Apply cursor-based pagination to a sorted array.
 *
 * Items must be sorted by the cursor field in ascending order, and the
 * field must be unique. A cursor issued for another field is rejected.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getField: (item: T) => string,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded === undefined || decoded.field !== fieldName) {
      throw new RequestError("Invalid pagination cursor", { cursor: query.cursor });
    }
    const after = decoded.value;
    filtered = filtered.filter((item) => getField(item) > after);
  }

  // One extra row tells us whether another page exists
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data[data.length - 1];

  const cursor =
    hasMore && last !== undefined ? encodeCursor(fieldName, getField(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}

/** Stable, unique sort key for records that carry a creation time and id. */
export function createdKey(item: { readonly createdAt: string; readonly id: string }): string {
  return `${item.createdAt}|${item.id}`;
}

export function sortByCreated<T extends { readonly createdAt: string; readonly id: string }>(
  items: readonly T[],
): T[] {
  return [...items].sort((a, b) => {
    const ka = createdKey(a);
    const kb = createdKey(b);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });
}
