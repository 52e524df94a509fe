/**
 * Tests for cursor-based pagination.
 */

import { describe, it, expect } from "vitest";
import {
  createdKey,
  decodeCursor,
  encodeCursor,
  paginate,
  sortByCreated,
} from "../src/types/pagination.js";
import { RequestError } from "../src/types/error.js";

// =============================================================================
// encodeCursor / decodeCursor
// =============================================================================

describe("cursor encoding", () => {
  it("decodes what it encodes", () => {
    const cursor = encodeCursor("id", "txn-42");
    expect(decodeCursor(cursor)).toEqual({ field: "id", value: "txn-42" });
  });

  it("produces url-safe strings", () => {
    const cursor = encodeCursor("created", "2025-03-15T12:00:00.000Z|m-1");
    expect(cursor).toMatch(/^[A-Za-z0-9_-]+$/);
  });

  it("returns undefined for garbage", () => {
    expect(decodeCursor("not-a-cursor")).toBeUndefined();
  });

  it("returns undefined for JSON with the wrong shape", () => {
    const arr = Buffer.from(JSON.stringify(["id", "a"])).toString("base64url");
    expect(decodeCursor(arr)).toBeUndefined();

    const num = Buffer.from(JSON.stringify({ f: "id", v: 7 })).toString("base64url");
    expect(decodeCursor(num)).toBeUndefined();
  });
});

// =============================================================================
// paginate
// =============================================================================

interface Item {
  id: string;
}

const items: Item[] = [{ id: "a" }, { id: "b" }, { id: "c" }, { id: "d" }, { id: "e" }];
const getId = (item: Item) => item.id;

describe("paginate", () => {
  it("returns first page with hasMore when items exceed limit", () => {
    const result = paginate(items, { limit: 2 }, getId, "id");

    expect(result.data).toEqual([{ id: "a" }, { id: "b" }]);
    expect(result.pagination.hasMore).toBe(true);
    expect(result.pagination.cursor).toBe(encodeCursor("id", "b"));
  });

  it("returns all items when limit exceeds array length", () => {
    const result = paginate(items, { limit: 10 }, getId, "id");

    expect(result.data).toEqual(items);
    expect(result.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("continues after the cursor", () => {
    const cursor = encodeCursor("id", "b");
    const result = paginate(items, { cursor, limit: 2 }, getId, "id");

    expect(result.data).toEqual([{ id: "c" }, { id: "d" }]);
    expect(result.pagination.hasMore).toBe(true);
  });

  it("reports no more pages on an exact fit", () => {
    const cursor = encodeCursor("id", "c");
    const result = paginate(items, { cursor, limit: 2 }, getId, "id");

    expect(result.data).toEqual([{ id: "d" }, { id: "e" }]);
    expect(result.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("rejects an undecodable cursor", () => {
    expect(() => paginate(items, { cursor: "garbage", limit: 3 }, getId, "id")).toThrow(
      RequestError,
    );
  });

  it("rejects a cursor issued for another field", () => {
    const cursor = encodeCursor("created", "b");
    expect(() => paginate(items, { cursor, limit: 3 }, getId, "id")).toThrow(
      "Invalid pagination cursor",
    );
  });

  it("returns empty result for empty items", () => {
    const result = paginate([], { limit: 5 }, getId, "id");

    expect(result.data).toEqual([]);
    expect(result.pagination).toEqual({ cursor: null, hasMore: false });
  });
});

// =============================================================================
// sortByCreated
// =============================================================================

describe("sortByCreated", () => {
  it("orders by creation time, then id", () => {
    const records = [
      { id: "m-2", createdAt: "2025-03-15T12:00:00.000Z" },
      { id: "m-3", createdAt: "2025-03-14T09:00:00.000Z" },
      { id: "m-1", createdAt: "2025-03-15T12:00:00.000Z" },
    ];

    expect(sortByCreated(records).map((r) => r.id)).toEqual(["m-3", "m-1", "m-2"]);
    expect(createdKey(records[0]!)).toBe("2025-03-15T12:00:00.000Z|m-2");
  });

  it("does not mutate its input", () => {
    const records = [
      { id: "b", createdAt: "2025-03-15T00:00:00.000Z" },
      { id: "a", createdAt: "2025-03-15T00:00:00.000Z" },
    ];
    sortByCreated(records);
    expect(records[0]!.id).toBe("b");
  });
});
