import type { UnitOfWork } from "./unitOfWork.js";
import type { RecipePatch } from "./recipeStore.js";
import { NotFoundError } from "../middleware/error.js";
import type { Page, PageRequest, Recipe, RecipeIngredient } from "../types/contracts.js";

export type RecipeIngredients = {
  recipeId: string;
  ingredients: RecipeIngredient[];
  total: number;
};

type RecipeServiceOptions = {
  searchCaseSensitive: boolean;
};

export class RecipeService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly options: RecipeServiceOptions
  ) {}

  getRecipe(recipeId: string): Recipe {
    const recipe = this.unitOfWork.stores.recipes.findById(recipeId);
    if (!recipe) {
      throw new NotFoundError("Recipe", recipeId);
    }
    return recipe;
  }

  /** Ingredients in the order they were submitted with the recipe. */
  getRecipeIngredients(recipeId: string): RecipeIngredients {
    return this.unitOfWork.run((stores) => {
      if (!stores.recipes.findById(recipeId)) {
        throw new NotFoundError("Recipe", recipeId);
      }
      const ingredients = stores.recipeItems.listByRecipe(recipeId);
      return { recipeId, ingredients, total: ingredients.length };
    });
  }

  updateRecipe(recipeId: string, patch: RecipePatch): Recipe {
    return this.unitOfWork.run((stores) => {
      const updated = stores.recipes.update(recipeId, patch);
      if (!updated) {
        throw new NotFoundError("Recipe", recipeId);
      }
      return updated;
    });
  }

  deleteRecipe(recipeId: string): void {
    const deleted = this.unitOfWork.run((stores) => stores.recipes.delete(recipeId));
    if (!deleted) {
      throw new NotFoundError("Recipe", recipeId);
    }
  }

  listRecipes(page: PageRequest): Page<Recipe> {
    return this.unitOfWork.stores.recipes.listPage(page);
  }

  listAllRecipes(): Recipe[] {
    return this.unitOfWork.stores.recipes.listAll();
  }

  searchRecipes(query: string, page: PageRequest): Page<Recipe> {
    return this.unitOfWork.stores.recipes.listPage(page, {
      title: { query, caseSensitive: this.options.searchCaseSensitive },
    });
  }

  listUserRecipes(userId: string, page: PageRequest): Page<Recipe> {
    return this.unitOfWork.run((stores) => {
      if (!stores.users.findById(userId)) {
        throw new NotFoundError("User", userId);
      }
      return stores.recipes.listPage(page, { userId });
    });
  }
}
