import { randomUUID } from "node:crypto";
import {
  isForeignKeyViolation,
  isUniqueViolation,
  UniqueViolationError,
  type SQLiteDatabase,
} from "./database.js";
import { listAll, listPage, NEWEST_FIRST_SORT, type ListQuery, type SortKey } from "./pagination.js";
import { ValidationError } from "../middleware/error.js";
import type { Material, MaterialUnit, Page, PageRequest } from "../types/contracts.js";

type MaterialRow = {
  id: string;
  category_id: string;
  name: string;
  description: string;
  unit: MaterialUnit;
  created_at: string;
};

export type MaterialInput = {
  categoryId: string;
  name: string;
  description: string;
  unit: MaterialUnit;
};

export type MaterialFilter = {
  name?: { query: string; caseSensitive: boolean };
  categoryId?: string;
  constructionId?: string;
};

const BY_NAME_SORT: SortKey[] = [
  { column: "name", direction: "asc" },
  { column: "id", direction: "asc" },
];

export class MaterialStore {
  constructor(private readonly db: SQLiteDatabase) {}

  /**
   * @throws UniqueViolationError when the name is taken
   * @throws ValidationError when the category does not exist
   */
  create(input: MaterialInput, createdAt: string): Material {
    const material: Material = { id: randomUUID(), ...input, createdAt };
    try {
      this.db
        .prepare(`
          INSERT INTO materials (id, category_id, name, description, unit, created_at)
          VALUES (?, ?, ?, ?, ?, ?)
        `)
        .run(material.id, material.categoryId, material.name, material.description, material.unit, material.createdAt);
    } catch (error) {
      throw translateWriteError(error, input);
    }
    return material;
  }

  findById(materialId: string): Material | null {
    const row = this.db.prepare<[string], MaterialRow>("SELECT * FROM materials WHERE id = ?").get(materialId);
    return row ? toMaterial(row) : null;
  }

  findByName(name: string): Material | null {
    const row = this.db.prepare<[string], MaterialRow>("SELECT * FROM materials WHERE name = ?").get(name);
    return row ? toMaterial(row) : null;
  }

  update(materialId: string, patch: Partial<MaterialInput>): Material | null {
    const current = this.findById(materialId);
    if (!current) {
      return null;
    }

    const next: Material = {
      ...current,
      categoryId: patch.categoryId ?? current.categoryId,
      name: patch.name ?? current.name,
      description: patch.description ?? current.description,
      unit: patch.unit ?? current.unit,
    };

    try {
      this.db
        .prepare("UPDATE materials SET category_id = ?, name = ?, description = ?, unit = ? WHERE id = ?")
        .run(next.categoryId, next.name, next.description, next.unit, materialId);
    } catch (error) {
      throw translateWriteError(error, next);
    }
    return next;
  }

  delete(materialId: string): boolean {
    return this.db.prepare("DELETE FROM materials WHERE id = ?").run(materialId).changes > 0;
  }

  listPage(page: PageRequest, filter: MaterialFilter = {}): Page<Material> {
    return listPage<MaterialRow, Material>(this.db, materialQuery(filter), page, toMaterial);
  }

  listAll(): Material[] {
    return listAll<MaterialRow, Material>(this.db, materialQuery({}), toMaterial);
  }
}

function materialQuery(filter: MaterialFilter): ListQuery {
  const where: string[] = [];
  const params: unknown[] = [];

  if (filter.categoryId) {
    where.push("category_id = ?");
    params.push(filter.categoryId);
  }
  if (filter.constructionId) {
    where.push("id IN (SELECT material_id FROM storage_items WHERE construction_id = ?)");
    params.push(filter.constructionId);
  }

  return {
    table: "materials",
    where,
    params,
    // Stock listings read naturally alphabetically; everything else newest first.
    sort: filter.constructionId ? BY_NAME_SORT : NEWEST_FIRST_SORT,
    contains: filter.name ? { column: "name", ...filter.name } : undefined,
  };
}

function translateWriteError(error: unknown, input: Pick<MaterialInput, "name" | "categoryId">): unknown {
  if (isUniqueViolation(error)) {
    return new UniqueViolationError("Material", input.name);
  }
  if (isForeignKeyViolation(error)) {
    return new ValidationError("Material references a missing category", [
      { path: "category_id", message: `Category ${input.categoryId} does not exist` },
    ]);
  }
  return error;
}

function toMaterial(row: MaterialRow): Material {
  return {
    id: row.id,
    categoryId: row.category_id,
    name: row.name,
    description: row.description,
    unit: row.unit,
    createdAt: row.created_at,
  };
}
