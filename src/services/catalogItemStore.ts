import { randomUUID } from "node:crypto";
import { isUniqueViolation, UniqueViolationError, type SQLiteDatabase } from "./database.js";
import { CATALOG_SORT, listAll, listPage, type ListQuery } from "./pagination.js";
import type { CatalogItem, Page, PageRequest } from "../types/contracts.js";

type CatalogItemRow = {
  id: string;
  name: string;
  last_used: string | null;
};

export type CatalogSearch = {
  name: string;
  caseSensitive: boolean;
};

export interface CatalogItemRepository {
  findById(itemId: string): CatalogItem | null;
  /** Exact, case-sensitive lookup; the name is used as given. */
  findByName(name: string): CatalogItem | null;
  /** @throws UniqueViolationError when the name is already taken */
  create(name: string): CatalogItem;
  /** @throws UniqueViolationError when the name is already taken */
  rename(itemId: string, name: string): CatalogItem | null;
  touchLastUsed(itemId: string, timestamp: string): void;
  delete(itemId: string): boolean;
  countRecipeLinks(itemId: string): number;
  listPage(page: PageRequest, search?: CatalogSearch): Page<CatalogItem>;
  listAll(): CatalogItem[];
}

export class SqliteCatalogItemStore implements CatalogItemRepository {
  constructor(private readonly db: SQLiteDatabase) {}

  findById(itemId: string): CatalogItem | null {
    const row = this.db
      .prepare<[string], CatalogItemRow>("SELECT id, name, last_used FROM catalog_items WHERE id = ?")
      .get(itemId);
    return row ? toCatalogItem(row) : null;
  }

  findByName(name: string): CatalogItem | null {
    const row = this.db
      .prepare<[string], CatalogItemRow>("SELECT id, name, last_used FROM catalog_items WHERE name = ?")
      .get(name);
    return row ? toCatalogItem(row) : null;
  }

  create(name: string): CatalogItem {
    const item: CatalogItem = { id: randomUUID(), name, lastUsed: null };
    try {
      this.db
        .prepare("INSERT INTO catalog_items (id, name, last_used) VALUES (?, ?, NULL)")
        .run(item.id, item.name);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new UniqueViolationError("Catalog item", name);
      }
      throw error;
    }
    return item;
  }

  rename(itemId: string, name: string): CatalogItem | null {
    try {
      const result = this.db.prepare("UPDATE catalog_items SET name = ? WHERE id = ?").run(name, itemId);
      if (result.changes === 0) {
        return null;
      }
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new UniqueViolationError("Catalog item", name);
      }
      throw error;
    }
    return this.findById(itemId);
  }

  touchLastUsed(itemId: string, timestamp: string): void {
    this.db.prepare("UPDATE catalog_items SET last_used = ? WHERE id = ?").run(timestamp, itemId);
  }

  delete(itemId: string): boolean {
    const result = this.db.prepare("DELETE FROM catalog_items WHERE id = ?").run(itemId);
    return result.changes > 0;
  }

  countRecipeLinks(itemId: string): number {
    const row = this.db
      .prepare<[string], { count: number }>("SELECT COUNT(*) AS count FROM recipe_items WHERE item_id = ?")
      .get(itemId);
    return row?.count ?? 0;
  }

  listPage(page: PageRequest, search?: CatalogSearch): Page<CatalogItem> {
    return listPage<CatalogItemRow, CatalogItem>(this.db, catalogQuery(search), page, toCatalogItem);
  }

  listAll(): CatalogItem[] {
    return listAll<CatalogItemRow, CatalogItem>(this.db, catalogQuery(), toCatalogItem);
  }
}

function catalogQuery(search?: CatalogSearch): ListQuery {
  return {
    table: "catalog_items",
    sort: CATALOG_SORT,
    contains: search
      ? { column: "name", query: search.name, caseSensitive: search.caseSensitive }
      : undefined,
  };
}

function toCatalogItem(row: CatalogItemRow): CatalogItem {
  return {
    id: row.id,
    name: row.name,
    lastUsed: row.last_used,
  };
}
