import type { SQLiteDatabase } from "./database.js";
import type { Page, PageMeta, PageRequest } from "../types/contracts.js";

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;
export const MAX_PAGE_OFFSET = Number.MAX_SAFE_INTEGER;

export type SortKey = {
  column: string;
  direction: "asc" | "desc";
  nullsLast?: boolean;
};

/** Most recently used first; never-used items last; ties by name (code-point order). */
export const CATALOG_SORT: SortKey[] = [
  { column: "last_used", direction: "desc", nullsLast: true },
  { column: "name", direction: "asc" },
];

/** Newest first; id breaks ties so the order is total. */
export const NEWEST_FIRST_SORT: SortKey[] = [
  { column: "created_at", direction: "desc" },
  { column: "id", direction: "asc" },
];

export type ContainsFilter = {
  column: string;
  query: string;
  caseSensitive: boolean;
};

export type ListQuery = {
  table: string;
  where?: string[];
  params?: unknown[];
  contains?: ContainsFilter;
  sort: SortKey[];
};

export function normalizePageRequest(rawLimit: unknown, rawOffset: unknown): PageRequest {
  const limit = toInteger(rawLimit) ?? DEFAULT_PAGE_LIMIT;
  const offset = toInteger(rawOffset) ?? 0;

  return {
    limit: Math.max(1, Math.min(limit, MAX_PAGE_LIMIT)),
    // Larger offsets do not bind as SQLite integers; past the end either way.
    offset: Math.max(0, Math.min(offset, MAX_PAGE_OFFSET)),
  };
}

export function orderByClause(keys: SortKey[]): string {
  if (keys.length === 0) {
    return "";
  }

  const parts = keys.flatMap((key) => {
    const direction = key.direction === "desc" ? "DESC" : "ASC";
    const term = `${key.column} ${direction}`;
    return key.nullsLast ? [`${key.column} IS NULL`, term] : [term];
  });

  return `ORDER BY ${parts.join(", ")}`;
}

export function containsClause(filter: ContainsFilter): { sql: string; params: unknown[] } {
  if (filter.caseSensitive) {
    return { sql: `instr(${filter.column}, ?) > 0`, params: [filter.query] };
  }
  return { sql: `instr(fold(${filter.column}), fold(?)) > 0`, params: [filter.query] };
}

/**
 * Runs the count and the windowed select for one list query. The count uses
 * the same filter as the select so `total` always describes the filtered set.
 */
export function listPage<Row, T>(
  db: SQLiteDatabase,
  query: ListQuery,
  page: PageRequest,
  map: (row: Row) => T
): Page<T> {
  const { whereSQL, params } = buildWhere(query);

  const countRow = db
    .prepare<unknown[], { count: number }>(`SELECT COUNT(*) AS count FROM ${query.table} ${whereSQL}`)
    .get(...params);

  const rows = db
    .prepare<unknown[], Row>(
      `SELECT * FROM ${query.table} ${whereSQL} ${orderByClause(query.sort)} LIMIT ? OFFSET ?`
    )
    .all(...params, page.limit, page.offset);

  return {
    items: rows.map(map),
    total: countRow?.count ?? 0,
  };
}

export function listAll<Row, T>(db: SQLiteDatabase, query: ListQuery, map: (row: Row) => T): T[] {
  const { whereSQL, params } = buildWhere(query);
  return db
    .prepare<unknown[], Row>(`SELECT * FROM ${query.table} ${whereSQL} ${orderByClause(query.sort)}`)
    .all(...params)
    .map(map);
}

export function buildPageMeta(
  result: { items: unknown[]; total: number },
  request: PageRequest,
  basePath: string,
  extraParams: Record<string, string | undefined> = {}
): PageMeta {
  const { limit, offset } = request;
  const hasNext = offset + result.items.length < result.total;
  const hasPrev = offset > 0;

  const links: PageMeta["links"] = {};
  if (hasNext) {
    links.next = pageLink(basePath, limit, offset + limit, extraParams);
  }
  if (hasPrev) {
    links.prev = pageLink(basePath, limit, Math.max(0, offset - limit), extraParams);
  }

  return {
    total: result.total,
    limit,
    offset,
    page: Math.floor(offset / limit) + 1,
    has_next: hasNext,
    has_prev: hasPrev,
    links,
  };
}

function pageLink(
  basePath: string,
  limit: number,
  offset: number,
  extraParams: Record<string, string | undefined>
): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(extraParams)) {
    if (value !== undefined) {
      search.set(key, value);
    }
  }
  search.set("limit", String(limit));
  search.set("offset", String(offset));
  return `${basePath}?${search.toString()}`;
}

function buildWhere(query: ListQuery): { whereSQL: string; params: unknown[] } {
  const clauses = [...(query.where ?? [])];
  const params = [...(query.params ?? [])];

  if (query.contains) {
    const contains = containsClause(query.contains);
    clauses.push(contains.sql);
    params.push(...contains.params);
  }

  return {
    whereSQL: clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "",
    params,
  };
}

function toInteger(value: unknown): number | undefined {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  const parsed = typeof value === "number" ? value : Number(String(value));
  if (!Number.isFinite(parsed)) {
    return undefined;
  }
  return Math.trunc(parsed);
}
