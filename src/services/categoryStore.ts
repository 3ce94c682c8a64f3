import { randomUUID } from "node:crypto";
import {
  isForeignKeyViolation,
  isUniqueViolation,
  UniqueViolationError,
  type SQLiteDatabase,
} from "./database.js";
import { listAll, listPage, NEWEST_FIRST_SORT, type ListQuery } from "./pagination.js";
import { ConflictError } from "../middleware/error.js";
import type { Category, Page, PageRequest } from "../types/contracts.js";

type CategoryRow = {
  id: string;
  name: string;
  created_at: string;
};

export class CategoryStore {
  constructor(private readonly db: SQLiteDatabase) {}

  create(name: string, createdAt: string): Category {
    const category: Category = { id: randomUUID(), name, createdAt };
    try {
      this.db
        .prepare("INSERT INTO categories (id, name, created_at) VALUES (?, ?, ?)")
        .run(category.id, category.name, category.createdAt);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new UniqueViolationError("Category", name);
      }
      throw error;
    }
    return category;
  }

  findById(categoryId: string): Category | null {
    const row = this.db.prepare<[string], CategoryRow>("SELECT * FROM categories WHERE id = ?").get(categoryId);
    return row ? toCategory(row) : null;
  }

  rename(categoryId: string, name: string): Category | null {
    try {
      if (this.db.prepare("UPDATE categories SET name = ? WHERE id = ?").run(name, categoryId).changes === 0) {
        return null;
      }
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new UniqueViolationError("Category", name);
      }
      throw error;
    }
    return this.findById(categoryId);
  }

  /** @throws ConflictError while materials still belong to the category */
  delete(categoryId: string): boolean {
    try {
      return this.db.prepare("DELETE FROM categories WHERE id = ?").run(categoryId).changes > 0;
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new ConflictError(`Category ${categoryId} still has materials`);
      }
      throw error;
    }
  }

  listPage(page: PageRequest, name?: { query: string; caseSensitive: boolean }): Page<Category> {
    return listPage<CategoryRow, Category>(this.db, categoryQuery(name), page, toCategory);
  }

  listAll(): Category[] {
    return listAll<CategoryRow, Category>(this.db, categoryQuery(), toCategory);
  }
}

function categoryQuery(name?: { query: string; caseSensitive: boolean }): ListQuery {
  return {
    table: "categories",
    sort: NEWEST_FIRST_SORT,
    contains: name ? { column: "name", ...name } : undefined,
  };
}

function toCategory(row: CategoryRow): Category {
  return { id: row.id, name: row.name, createdAt: row.created_at };
}
