/**
 * Cursor-based pagination.
 *
 * Cursors are base64url-encoded JSON objects: { f: field, v: lastValue }.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 */

import { z } from "zod";

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

const CursorSchema = z.object({ f: z.string(), v: z.number().int() });

export function encodeCursor(field: string, value: number): string {
  return Buffer.from(JSON.stringify({ f: field, v: value })).toString("base64url");
}

/**
 * @returns the last seen value, or undefined if the cursor is not one of
 *   ours or belongs to another field
 */
export function decodeCursor(cursor: string, field: string): number | undefined {
  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  const parsed = CursorSchema.safeParse(json);
  if (!parsed.success || parsed.data.f !== field) {
    return undefined;
  }
  return parsed.data.v;
}

/**
 * Page through items sorted ascending by a numeric key.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getKey: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const after = decodeCursor(query.cursor, fieldName);
    if (after !== undefined) {
      filtered = filtered.filter((item) => getKey(item) > after);
    }
  }

  // One extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data[data.length - 1];

  const cursor = hasMore && last !== undefined ? encodeCursor(fieldName, getKey(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
