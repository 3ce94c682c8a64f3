import { isForeignKeyViolation, type SQLiteDatabase } from "./database.js";
import { ValidationError } from "../middleware/error.js";
import type { StorageItem } from "../types/contracts.js";

type StorageItemRow = {
  construction_id: string;
  material_id: string;
  quantity_value: number;
  created_at: string;
};

export type StockedMaterial = StorageItem & {
  materialName: string;
  unit: string;
};

export class StorageItemStore {
  constructor(private readonly db: SQLiteDatabase) {}

  find(constructionId: string, materialId: string): StorageItem | null {
    const row = this.db
      .prepare<[string, string], StorageItemRow>(
        "SELECT * FROM storage_items WHERE construction_id = ? AND material_id = ?"
      )
      .get(constructionId, materialId);
    return row ? toStorageItem(row) : null;
  }

  /**
   * Sets the stocked quantity of a material on a construction, creating the
   * row on first use. `createdAt` is kept from the first insert.
   */
  upsert(constructionId: string, materialId: string, quantityValue: number, now: string): StorageItem {
    try {
      this.db
        .prepare(`
          INSERT INTO storage_items (construction_id, material_id, quantity_value, created_at)
          VALUES (?, ?, ?, ?)
          ON CONFLICT(construction_id, material_id) DO UPDATE SET
            quantity_value = excluded.quantity_value
        `)
        .run(constructionId, materialId, quantityValue, now);
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new ValidationError("Storage item references a missing construction or material", [
          { path: "construction_id", message: `Construction ${constructionId} must exist` },
          { path: "material_id", message: `Material ${materialId} must exist` },
        ]);
      }
      throw error;
    }

    const stored = this.find(constructionId, materialId);
    if (!stored) {
      throw new Error(`Storage item ${constructionId}/${materialId} vanished after upsert`);
    }
    return stored;
  }

  delete(constructionId: string, materialId: string): boolean {
    return (
      this.db
        .prepare("DELETE FROM storage_items WHERE construction_id = ? AND material_id = ?")
        .run(constructionId, materialId).changes > 0
    );
  }

  /** Stock of one construction, joined with material names, alphabetically. */
  listByConstruction(constructionId: string): StockedMaterial[] {
    const rows = this.db
      .prepare<[string], StorageItemRow & { name: string; unit: string }>(`
        SELECT s.*, m.name, m.unit
        FROM storage_items s
        JOIN materials m ON m.id = s.material_id
        WHERE s.construction_id = ?
        ORDER BY m.name ASC
      `)
      .all(constructionId);

    return rows.map((row) => ({
      ...toStorageItem(row),
      materialName: row.name,
      unit: row.unit,
    }));
  }
}

function toStorageItem(row: StorageItemRow): StorageItem {
  return {
    constructionId: row.construction_id,
    materialId: row.material_id,
    quantityValue: row.quantity_value,
    createdAt: row.created_at,
  };
}
