import { randomUUID } from "node:crypto";
import type { SQLiteDatabase } from "./database.js";
import { listAll, listPage, NEWEST_FIRST_SORT, type ListQuery } from "./pagination.js";
import type { Page, PageRequest, Recipe, RecipeFields } from "../types/contracts.js";

type RecipeRow = {
  id: string;
  user_id: string;
  title: string;
  external_url: string | null;
  image_url: string | null;
  preparation_steps: string;
  prep_time_minutes: number;
  created_at: string;
};

export type RecipeFilter = {
  userId?: string;
  title?: { query: string; caseSensitive: boolean };
};

export type RecipePatch = Partial<RecipeFields>;

export interface RecipeRepository {
  create(userId: string, fields: RecipeFields, createdAt: string): Recipe;
  findById(recipeId: string): Recipe | null;
  update(recipeId: string, patch: RecipePatch): Recipe | null;
  /** Links are removed with the recipe; catalog items stay. */
  delete(recipeId: string): boolean;
  listPage(page: PageRequest, filter?: RecipeFilter): Page<Recipe>;
  listAll(): Recipe[];
}

export class SqliteRecipeStore implements RecipeRepository {
  constructor(private readonly db: SQLiteDatabase) {}

  create(userId: string, fields: RecipeFields, createdAt: string): Recipe {
    const recipe: Recipe = {
      id: randomUUID(),
      userId,
      title: fields.title,
      externalUrl: fields.externalUrl ?? null,
      imageUrl: fields.imageUrl ?? null,
      preparationSteps: fields.preparationSteps ?? "",
      prepTimeMinutes: fields.prepTimeMinutes ?? 0,
      createdAt,
    };

    this.db
      .prepare(`
        INSERT INTO recipes (id, user_id, title, external_url, image_url, preparation_steps, prep_time_minutes, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        recipe.id,
        recipe.userId,
        recipe.title,
        recipe.externalUrl,
        recipe.imageUrl,
        recipe.preparationSteps,
        recipe.prepTimeMinutes,
        recipe.createdAt
      );

    return recipe;
  }

  findById(recipeId: string): Recipe | null {
    const row = this.db.prepare<[string], RecipeRow>("SELECT * FROM recipes WHERE id = ?").get(recipeId);
    return row ? toRecipe(row) : null;
  }

  update(recipeId: string, patch: RecipePatch): Recipe | null {
    const current = this.findById(recipeId);
    if (!current) {
      return null;
    }

    const next: Recipe = {
      ...current,
      title: patch.title ?? current.title,
      externalUrl: patch.externalUrl !== undefined ? patch.externalUrl : current.externalUrl,
      imageUrl: patch.imageUrl !== undefined ? patch.imageUrl : current.imageUrl,
      preparationSteps: patch.preparationSteps ?? current.preparationSteps,
      prepTimeMinutes: patch.prepTimeMinutes ?? current.prepTimeMinutes,
    };

    this.db
      .prepare(`
        UPDATE recipes
        SET title = ?, external_url = ?, image_url = ?, preparation_steps = ?, prep_time_minutes = ?
        WHERE id = ?
      `)
      .run(next.title, next.externalUrl, next.imageUrl, next.preparationSteps, next.prepTimeMinutes, recipeId);

    return next;
  }

  delete(recipeId: string): boolean {
    return this.db.prepare("DELETE FROM recipes WHERE id = ?").run(recipeId).changes > 0;
  }

  listPage(page: PageRequest, filter: RecipeFilter = {}): Page<Recipe> {
    return listPage<RecipeRow, Recipe>(this.db, recipeQuery(filter), page, toRecipe);
  }

  listAll(): Recipe[] {
    return listAll<RecipeRow, Recipe>(this.db, recipeQuery({}), toRecipe);
  }
}

function recipeQuery(filter: RecipeFilter): ListQuery {
  const where: string[] = [];
  const params: unknown[] = [];
  if (filter.userId) {
    where.push("user_id = ?");
    params.push(filter.userId);
  }

  return {
    table: "recipes",
    where,
    params,
    sort: NEWEST_FIRST_SORT,
    contains: filter.title
      ? { column: "title", query: filter.title.query, caseSensitive: filter.title.caseSensitive }
      : undefined,
  };
}

function toRecipe(row: RecipeRow): Recipe {
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    externalUrl: row.external_url,
    imageUrl: row.image_url,
    preparationSteps: row.preparation_steps,
    prepTimeMinutes: row.prep_time_minutes,
    createdAt: row.created_at,
  };
}
