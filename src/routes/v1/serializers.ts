import type { RecipeIngredients } from "../../services/recipeService.js";
import type { StockedMaterial } from "../../services/storageItemStore.js";
import type {
  CatalogItem,
  Category,
  Construction,
  ConstructionStatistics,
  Material,
  Recipe,
  StorageItem,
  User,
} from "../../types/contracts.js";

// Wire format is snake_case throughout.

export function recipeSummary(recipe: Recipe) {
  return {
    recipe_id: recipe.id,
    user_id: recipe.userId,
    title: recipe.title,
    external_url: recipe.externalUrl,
    image_url: recipe.imageUrl,
    preparation_steps: recipe.preparationSteps,
    prep_time_minutes: recipe.prepTimeMinutes,
    created_at: recipe.createdAt,
  };
}

export function recipeIngredients(result: RecipeIngredients) {
  return {
    recipe_id: result.recipeId,
    ingredients: result.ingredients.map((ingredient) => ({
      recipe_item_id: ingredient.recipeItemId,
      item_id: ingredient.itemId,
      ingredient_name: ingredient.ingredientName,
      quantity_value: ingredient.quantity.value,
      quantity_unit: ingredient.quantity.unit,
    })),
    total: result.total,
  };
}

export function catalogItem(item: CatalogItem) {
  return { item_id: item.id, name: item.name };
}

export function catalogItemWithUsage(item: CatalogItem) {
  return { item_id: item.id, name: item.name, last_used: item.lastUsed };
}

export function user(value: User) {
  return {
    user_id: value.id,
    email: value.email,
    is_admin: value.isAdmin,
    created_at: value.createdAt,
  };
}

export function construction(value: Construction) {
  return {
    construction_id: value.id,
    name: value.name,
    description: value.description,
    address: value.address,
    start_date: value.startDate,
    status: value.status,
    img_url: value.imgUrl,
    created_at: value.createdAt,
  };
}

export function constructionStatistics(value: ConstructionStatistics) {
  return {
    construction_id: value.constructionId,
    construction_name: value.constructionName,
    total_items: value.totalItems,
    total_quantity: value.totalQuantity,
    measured_at: value.measuredAt,
  };
}

export function category(value: Category) {
  return { category_id: value.id, name: value.name, created_at: value.createdAt };
}

export function material(value: Material) {
  return {
    material_id: value.id,
    category_id: value.categoryId,
    name: value.name,
    description: value.description,
    unit: value.unit,
    created_at: value.createdAt,
  };
}

export function storageItem(value: StorageItem) {
  return {
    construction_id: value.constructionId,
    material_id: value.materialId,
    quantity_value: value.quantityValue,
    created_at: value.createdAt,
  };
}

export function stockedMaterial(value: StockedMaterial) {
  return {
    ...storageItem(value),
    material_name: value.materialName,
    unit: value.unit,
  };
}
