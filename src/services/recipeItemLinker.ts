import { randomUUID } from "node:crypto";
import { isForeignKeyViolation, type SQLiteDatabase } from "./database.js";
import { ValidationError } from "../middleware/error.js";
import type { Quantity, RecipeIngredient, RecipeItem } from "../types/contracts.js";

type RecipeIngredientRow = {
  id: string;
  item_id: string;
  name: string;
  quantity_value: number;
  quantity_unit: string;
};

export interface RecipeItemLinker {
  /**
   * Appends a link after the recipe's existing ones. The quantity is expected
   * to be validated already.
   * @throws ValidationError when the recipe or the catalog item does not exist
   */
  link(recipeId: string, itemId: string, quantity: Quantity): RecipeItem;
  /** Links of one recipe, in insertion order. */
  listByRecipe(recipeId: string): RecipeIngredient[];
}

export class SqliteRecipeItemLinker implements RecipeItemLinker {
  constructor(private readonly db: SQLiteDatabase) {}

  link(recipeId: string, itemId: string, quantity: Quantity): RecipeItem {
    const recipeItem: RecipeItem = { id: randomUUID(), recipeId, itemId, quantity };

    try {
      this.db
        .prepare(`
          INSERT INTO recipe_items (id, recipe_id, item_id, position, quantity_value, quantity_unit)
          SELECT ?, ?, ?, COALESCE(MAX(position), -1) + 1, ?, ?
          FROM recipe_items
          WHERE recipe_id = ?
        `)
        .run(recipeItem.id, recipeId, itemId, quantity.value, quantity.unit, recipeId);
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new ValidationError("Recipe item references a missing recipe or catalog item", [
          { path: "recipe_id", message: `Recipe ${recipeId} must exist` },
          { path: "item_id", message: `Catalog item ${itemId} must exist` },
        ]);
      }
      throw error;
    }

    return recipeItem;
  }

  listByRecipe(recipeId: string): RecipeIngredient[] {
    const rows = this.db
      .prepare<[string], RecipeIngredientRow>(`
        SELECT ri.id, ri.item_id, ci.name, ri.quantity_value, ri.quantity_unit
        FROM recipe_items ri
        JOIN catalog_items ci ON ci.id = ri.item_id
        WHERE ri.recipe_id = ?
        ORDER BY ri.position ASC
      `)
      .all(recipeId);

    return rows.map((row) => ({
      recipeItemId: row.id,
      itemId: row.item_id,
      ingredientName: row.name,
      quantity: { value: row.quantity_value, unit: row.quantity_unit },
    }));
  }
}
