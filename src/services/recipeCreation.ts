import { z } from "zod";
import { UniqueViolationError } from "./database.js";
import { quantityUnitSchema, quantityValueSchema } from "./quantity.js";
import type { CatalogItemRepository } from "./catalogItemStore.js";
import type { UnitOfWork } from "./unitOfWork.js";
import { ConflictError, NotFoundError, ValidationError, zodIssues } from "../middleware/error.js";
import { catalogNameSchema, prepTimeSchema, recipeTitleSchema } from "../types/schemas.js";
import { createChildLogger, type Logger } from "../utils/logger.js";
import type {
  CatalogItem,
  IngredientInput,
  Recipe,
  RecipeFields,
  RecipeItem,
} from "../types/contracts.js";

export type RecipeCreationResult = {
  recipe: Recipe;
  /** Catalog items this call had to create, in first-reference order. */
  createdCatalogItems: CatalogItem[];
  /** Links in ingredient-list order. */
  recipeItems: RecipeItem[];
};

type ResolvedCatalogItem = {
  item: CatalogItem;
  created: boolean;
};

const recipeFieldsSchema = z.object({
  title: recipeTitleSchema,
  externalUrl: z.string().max(2048).nullish(),
  imageUrl: z.string().max(500).nullish(),
  preparationSteps: z.string().default(""),
  prepTimeMinutes: prepTimeSchema.default(0),
});

const ingredientSchema = z.object({
  name: catalogNameSchema,
  quantity: z.object({
    value: quantityValueSchema,
    unit: quantityUnitSchema,
  }),
});

const submissionSchema = z.object({
  fields: recipeFieldsSchema,
  ingredients: z.array(ingredientSchema),
});

export class RecipeCreationService {
  private readonly log: Logger;

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly now: () => Date = () => new Date(),
    log?: Logger
  ) {
    this.log = log ?? createChildLogger({ component: "recipe-creation" });
  }

  /**
   * Creates a recipe and links each ingredient to the catalog entry with
   * exactly the same name, creating missing entries on the way. Everything
   * happens in one transaction: on any error nothing is persisted.
   *
   * @throws ValidationError listing every invalid field; raised before any write
   * @throws NotFoundError when the owner does not exist
   * @throws ConflictError when a catalog name stays unresolvable after one re-read
   */
  createRecipeWithIngredients(
    ownerId: string,
    recipeFields: RecipeFields,
    ingredientList: IngredientInput[] = []
  ): RecipeCreationResult {
    const parsed = submissionSchema.safeParse({ fields: recipeFields, ingredients: ingredientList });
    if (!parsed.success) {
      // Drop the wrapper key so paths read "title", "ingredients.0.quantity.value".
      const details = zodIssues(parsed.error).map((issue) => ({
        ...issue,
        path: issue.path.replace(/^fields\./, ""),
      }));
      throw new ValidationError("Invalid recipe submission", details);
    }

    const { fields, ingredients } = parsed.data;
    const timestamp = this.now().toISOString();

    const result = this.unitOfWork.run((stores) => {
      if (!stores.users.findById(ownerId)) {
        throw new NotFoundError("User", ownerId);
      }

      const recipe = stores.recipes.create(ownerId, fields, timestamp);
      const createdCatalogItems: CatalogItem[] = [];
      const recipeItems: RecipeItem[] = [];

      for (const ingredient of ingredients) {
        const resolved = this.findOrCreateCatalogItem(stores.catalogItems, ingredient.name);
        const link = stores.recipeItems.link(recipe.id, resolved.item.id, Object.freeze(ingredient.quantity));
        stores.catalogItems.touchLastUsed(resolved.item.id, timestamp);

        if (resolved.created) {
          createdCatalogItems.push({ ...resolved.item, lastUsed: timestamp });
        }
        recipeItems.push(link);
      }

      return { recipe, createdCatalogItems, recipeItems };
    });

    this.log.info({
      msg: "Recipe created",
      recipeId: result.recipe.id,
      ownerId,
      ingredients: result.recipeItems.length,
      newCatalogItems: result.createdCatalogItems.length,
    });

    return result;
  }

  private findOrCreateCatalogItem(catalog: CatalogItemRepository, name: string): ResolvedCatalogItem {
    const existing = catalog.findByName(name);
    if (existing) {
      return { item: existing, created: false };
    }

    try {
      return { item: catalog.create(name), created: true };
    } catch (error) {
      if (!(error instanceof UniqueViolationError)) {
        throw error;
      }

      this.log.warn({ msg: "Catalog name inserted concurrently, re-reading", name });
      const winner = catalog.findByName(name);
      if (winner) {
        return { item: winner, created: false };
      }
      throw new ConflictError(`Catalog item '${name}' could not be created`);
    }
  }
}
